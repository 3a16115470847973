/**
 * Kill switch for strategy governance
 *
 * Emergency control that stops new runs from starting. Read once at run start;
 * the pipeline never toggles it.
 */

import { z } from 'zod';
import { KillSwitchActiveError, createLogger } from '@stratgate/utils';

const logger = createLogger('core:kill-switch');

/**
 * Kill switch state
 */
export const KillSwitchStateSchema = z.object({
  enabled: z.boolean(),
  reason: z.string().optional(),
  triggeredAt: z.number().optional(),
  triggeredBy: z.string().optional(),
});

export type KillSwitchState = z.infer<typeof KillSwitchStateSchema>;

export class KillSwitch {
  private state: KillSwitchState;
  private readonly now: () => number;

  constructor(initial: KillSwitchState = { enabled: false }, now: () => number = Date.now) {
    this.state = KillSwitchStateSchema.parse(initial);
    this.now = now;
  }

  /**
   * Activate the kill switch
   */
  enable(reason: string, triggeredBy: string): void {
    this.state = {
      enabled: true,
      reason,
      triggeredAt: this.now(),
      triggeredBy,
    };
    logger.warn('Kill switch activated', { reason, triggeredBy });
  }

  /**
   * Deactivate the kill switch
   */
  disable(): void {
    if (this.state.enabled) {
      logger.info('Kill switch deactivated', { reason: this.state.reason });
    }
    this.state = { enabled: false };
  }

  isActive(): boolean {
    return this.state.enabled;
  }

  /**
   * Copy of the current state
   */
  snapshot(): KillSwitchState {
    return { ...this.state };
  }

  /**
   * Throw KillSwitchActiveError when active
   */
  assertInactive(): void {
    if (this.state.enabled) {
      throw new KillSwitchActiveError(this.state.reason, {
        triggeredBy: this.state.triggeredBy,
        triggeredAt: this.state.triggeredAt,
      });
    }
  }
}

let defaultKillSwitch: KillSwitch | undefined;

/**
 * Process-wide kill switch
 */
export function getKillSwitch(): KillSwitch {
  if (!defaultKillSwitch) {
    defaultKillSwitch = new KillSwitch();
  }
  return defaultKillSwitch;
}
