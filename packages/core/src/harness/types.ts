/**
 * Types for validation runs and their reports
 */

import type {
  CriteriaField,
  CriteriaInput,
  HarnessPhase,
  ICriteria,
  MatchMode,
  StorageBackend,
} from '../types.js';

export interface IValidationCase {
  id: string;
  category: string;
  /** Natural-language request; required by the extractor and end-to-end phases */
  request?: string;
  /** Hand-labelled criteria, still unvalidated so that a bad label fails only its own case */
  criteria?: CriteriaInput;
  expectedStorageTargets: StorageBackend[];
  notes?: string;
}

export interface ICorpus {
  name: string;
  description: string;
  cases: IValidationCase[];
}

/**
 * pass: correct. miss: ran cleanly but wrong. hard_failure: schema or rule set integrity error.
 * parse_failure: the extractor could not classify. error: anything else thrown.
 */
export type CaseStatus = 'pass' | 'miss' | 'hard_failure' | 'parse_failure' | 'error';

/** Which stage caused an end-to-end miss, judged against the case's labelled criteria */
export type MissAttribution = 'rule_set' | 'extractor' | 'both';

export interface ICaseError {
  name: string;
  code: string | null;
  message: string;
}

export interface ICaseRecord {
  id: string;
  category: string;
  status: CaseStatus;
  expectedStorageTargets: StorageBackend[];
  predictedStorageTargets: readonly StorageBackend[] | null;
  expectedCriteria: ICriteria | null;
  predictedCriteria: ICriteria | null;
  /** Criteria fields the extractor got wrong (extractor and end-to-end phases) */
  fieldMismatches: CriteriaField[];
  matchedRuleId: string | null;
  matchedRulePriority: number | null;
  /** All repeated runs produced the same output */
  consistent: boolean;
  /** Latency of the first run, in ms */
  latencyMs: number;
  attribution: MissAttribution | null;
  error: ICaseError | null;
}

export interface ILatencySummary {
  samples: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
  max: number;
  mean: number;
}

export interface ICategoryAccuracy {
  category: string;
  total: number;
  passed: number;
  accuracy: number;
}

export interface IFieldAccuracy {
  field: CriteriaField;
  total: number;
  correct: number;
  accuracy: number;
}

export interface IConsistencySummary {
  runsPerCase: number;
  consistentCases: number;
  rate: number;
}

export interface IValidationReport {
  phase: HarnessPhase;
  corpus: string;
  ruleSet: { name: string; version: string } | null;
  extractor: string | null;
  matchMode: MatchMode;
  startedAt: string;
  durationMs: number;
  total: number;
  passed: number;
  misses: number;
  hardFailures: number;
  parseFailures: number;
  errors: number;
  /** passed / total; 0 for an empty corpus */
  accuracy: number;
  byCategory: ICategoryAccuracy[];
  /** Empty for the engine-only phase */
  byField: IFieldAccuracy[];
  consistency: IConsistencySummary;
  latency: ILatencySummary;
  /** End-to-end misses by cause; null outside the end-to-end phase */
  attribution: Record<MissAttribution, number> | null;
  cases: ICaseRecord[];
}

export interface IGateResult {
  passed: boolean;
  accuracy: number;
  threshold: number;
}
