/**
 * Result Sink Port
 *
 * Persists candidate results. Saving is best-effort: a failing sink is logged
 * and never changes the result returned to the caller.
 */

import type { CandidateResult } from '../domain/candidate.js';

export interface ResultSinkPort {
  save(result: CandidateResult): Promise<void>;
}
