/**
 * Repository interfaces for store-router persistence.
 */

import type { IGateResult, IValidationReport } from '../../harness/types.js';
import type { HarnessPhase, MatchMode } from '../../types.js';

/** Summary row kept for each harness run */
export interface IValidationRun {
  id: number;
  phase: HarnessPhase;
  corpus: string;
  ruleSetName: string | null;
  ruleSetVersion: string | null;
  extractor: string | null;
  matchMode: MatchMode;
  startedAt: string;
  durationMs: number;
  total: number;
  passed: number;
  accuracy: number;
  /** Null when the run was not gated */
  threshold: number | null;
  gatePassed: boolean | null;
}

export interface IValidationRunRepository {
  record(report: IValidationReport, gate?: IGateResult): IValidationRun;
  getRecent(limit: number, phase?: HarnessPhase): IValidationRun[];
  getById(id: number): IValidationRun | null;
  /** The full JSON report stored with the run */
  getReportJson(id: number): string | null;
}
