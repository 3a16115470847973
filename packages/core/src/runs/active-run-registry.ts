/**
 * Registry of in-flight pipeline runs (observability only)
 */

export class ActiveRunRegistry {
  private readonly runs = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  add(runId: string): void {
    this.runs.set(runId, this.now());
  }

  remove(runId: string): void {
    this.runs.delete(runId);
  }

  /**
   * Copy of run id → start time (epoch ms)
   */
  list(): Map<string, number> {
    return new Map(this.runs);
  }

  get size(): number {
    return this.runs.size;
  }
}

let defaultRegistry: ActiveRunRegistry | undefined;

export function getActiveRunRegistry(): ActiveRunRegistry {
  if (!defaultRegistry) {
    defaultRegistry = new ActiveRunRegistry();
  }
  return defaultRegistry;
}
