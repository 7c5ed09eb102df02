/**
 * Validation harness: replays a corpus against the engine, an extractor, or both,
 * and reports accuracy, consistency and latency.
 *
 * Per-case failures never abort a run. Schema and integrity errors are counted as
 * hard failures, extractor ParseErrors as parse failures, anything else as errors.
 */

import {
  CRITERIA_FIELDS,
  criteriaEqual,
  diffCriteria,
  formatCriteria,
  validateCriteria,
} from '../criteria/criteria.js';
import {
  DEFAULT_CONCURRENCY,
  DEFAULT_CONSISTENCY_RUNS,
  DEFAULT_MATCH_MODE,
} from '../constants.js';
import { evaluateRuleSet } from '../engine/decision-engine.js';
import { ParseError, SchemaError, StoreRouterError, isHardFailure } from '../errors.js';
import type { ICriteriaExtractor } from '../extractor/types.js';
import { targetsMatch } from '../rules/targets.js';
import type {
  CriteriaField,
  ICriteria,
  IDecisionResult,
  IRuleSet,
  MatchMode,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import {
  type IPhaseTally,
  categoryAccuracy,
  createTally,
  fieldAccuracy,
  mergeTallies,
  ratio,
  recordCase,
  summarizeLatency,
} from './metrics.js';
import type {
  CaseStatus,
  ICaseError,
  ICaseRecord,
  IGateResult,
  IValidationCase,
  IValidationReport,
  MissAttribution,
} from './types.js';
import { runPool } from './worker-pool.js';

const log = createLogger('harness');

export interface IHarnessOptions {
  /** Times each case is replayed to measure consistency */
  consistencyRuns?: number;
  concurrency?: number;
  matchMode?: MatchMode;
  /** Label recorded in the report */
  corpusName?: string;
  /** Monotonic clock in ms */
  now?: () => number;
}

type PhaseContext =
  | { phase: 'engine'; ruleSet: IRuleSet }
  | { phase: 'extractor'; extractor: ICriteriaExtractor }
  | { phase: 'e2e'; extractor: ICriteriaExtractor; ruleSet: IRuleSet };

interface IRunOutcome {
  criteria: ICriteria | null;
  decision: IDecisionResult | null;
  error: unknown;
  failed: boolean;
  latencyMs: number;
  /** Identity of the output, compared across repeated runs */
  key: string;
}

function describeError(error: unknown): ICaseError {
  if (error instanceof StoreRouterError) {
    return { name: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { name: error.name, code: null, message: error.message };
  }
  return { name: 'Error', code: null, message: String(error) };
}

function classifyError(error: unknown): CaseStatus {
  if (isHardFailure(error)) return 'hard_failure';
  if (error instanceof ParseError) return 'parse_failure';
  return 'error';
}

/**
 * Criteria label of a case, or the SchemaError explaining why it is unusable.
 * A missing label is an error only where the phase scores against it.
 */
function readLabel(entry: IValidationCase, required: boolean): { criteria: ICriteria | null; error: unknown } {
  if (!entry.criteria) {
    return {
      criteria: null,
      error: required ? new SchemaError('criteria', entry.criteria, 'missing_case_input') : null,
    };
  }
  try {
    return { criteria: validateCriteria(entry.criteria), error: null };
  } catch (error) {
    return { criteria: null, error };
  }
}

export class ValidationHarness {
  private readonly consistencyRuns: number;
  private readonly concurrency: number;
  private readonly matchMode: MatchMode;
  private readonly corpusName: string;
  private readonly now: () => number;

  constructor(options: IHarnessOptions = {}) {
    this.consistencyRuns = Math.max(1, Math.floor(options.consistencyRuns ?? DEFAULT_CONSISTENCY_RUNS));
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
    this.matchMode = options.matchMode ?? DEFAULT_MATCH_MODE;
    this.corpusName = options.corpusName ?? 'corpus';
    this.now = options.now ?? (() => performance.now());
  }

  runEngineOnly(cases: readonly IValidationCase[], ruleSet: IRuleSet): Promise<IValidationReport> {
    return this.run(cases, { phase: 'engine', ruleSet });
  }

  runExtractorOnly(
    cases: readonly IValidationCase[],
    extractor: ICriteriaExtractor,
  ): Promise<IValidationReport> {
    return this.run(cases, { phase: 'extractor', extractor });
  }

  runEndToEnd(
    cases: readonly IValidationCase[],
    extractor: ICriteriaExtractor,
    ruleSet: IRuleSet,
  ): Promise<IValidationReport> {
    return this.run(cases, { phase: 'e2e', extractor, ruleSet });
  }

  private async run(cases: readonly IValidationCase[], ctx: PhaseContext): Promise<IValidationReport> {
    const startedAt = new Date().toISOString();
    const start = this.now();
    log.info('Validation run started', {
      phase: ctx.phase,
      corpus: this.corpusName,
      cases: cases.length,
      runs: this.consistencyRuns,
      concurrency: this.concurrency,
    });

    const { results, tallies } = await runPool(cases, this.concurrency, createTally, (entry, _index, tally) =>
      this.runCase(entry, ctx, tally),
    );

    const merged = mergeTallies(tallies);
    const report = this.buildReport(ctx, cases, results, merged, startedAt, this.now() - start);

    log.info('Validation run finished', {
      phase: ctx.phase,
      accuracy: Number(report.accuracy.toFixed(4)),
      passed: report.passed,
      total: report.total,
      hardFailures: report.hardFailures,
      parseFailures: report.parseFailures,
      errors: report.errors,
    });
    return report;
  }

  private async runCase(entry: IValidationCase, ctx: PhaseContext, tally: IPhaseTally): Promise<ICaseRecord> {
    const outcomes: IRunOutcome[] = [];
    for (let run = 0; run < this.consistencyRuns; run++) {
      outcomes.push(await this.runOnce(entry, ctx));
    }
    const first = outcomes[0];
    const consistent = outcomes.every((outcome) => outcome.key === first.key);

    const record = this.buildRecord(entry, ctx, first, consistent);
    recordCase(
      tally,
      record,
      outcomes.map((outcome) => outcome.latencyMs),
      ctx.phase !== 'engine' && record.expectedCriteria !== null,
    );
    return record;
  }

  private async runOnce(entry: IValidationCase, ctx: PhaseContext): Promise<IRunOutcome> {
    let criteria: ICriteria | null = null;
    let decision: IDecisionResult | null = null;
    const start = this.now();
    try {
      if (ctx.phase === 'engine') {
        if (!entry.criteria) {
          throw new SchemaError('criteria', entry.criteria, 'missing_case_input');
        }
        decision = evaluateRuleSet(ctx.ruleSet, entry.criteria);
      } else {
        if (!entry.request) {
          throw new SchemaError('request', entry.request, 'missing_case_input');
        }
        criteria = await ctx.extractor.extract(entry.request);
        if (ctx.phase === 'e2e') {
          decision = evaluateRuleSet(ctx.ruleSet, criteria);
        }
      }
      return {
        criteria,
        decision,
        error: null,
        failed: false,
        latencyMs: this.now() - start,
        key: `${criteria ? formatCriteria(criteria) : '-'} -> ${decision ? decision.storageTargets.join(',') : '-'}`,
      };
    } catch (error) {
      const described = describeError(error);
      return {
        criteria,
        decision: null,
        error,
        failed: true,
        latencyMs: this.now() - start,
        key: `error:${described.name}:${described.message}`,
      };
    }
  }

  private buildRecord(
    entry: IValidationCase,
    ctx: PhaseContext,
    outcome: IRunOutcome,
    consistent: boolean,
  ): ICaseRecord {
    const label =
      ctx.phase === 'engine' ? { criteria: null, error: null } : readLabel(entry, ctx.phase === 'extractor');
    const expectedCriteria = label.criteria;

    let fieldMismatches: CriteriaField[] = [];
    if (expectedCriteria) {
      fieldMismatches = outcome.criteria
        ? diffCriteria(expectedCriteria, outcome.criteria)
        : [...CRITERIA_FIELDS];
    }

    let status: CaseStatus;
    let error: unknown = outcome.failed ? outcome.error : null;
    if (outcome.failed) {
      status = classifyError(outcome.error);
    } else if (ctx.phase === 'extractor') {
      if (label.error) {
        status = classifyError(label.error);
        error = label.error;
      } else {
        status = expectedCriteria && outcome.criteria && criteriaEqual(expectedCriteria, outcome.criteria)
          ? 'pass'
          : 'miss';
      }
    } else {
      const predicted = outcome.decision?.storageTargets ?? [];
      status = targetsMatch(predicted, entry.expectedStorageTargets, this.matchMode) ? 'pass' : 'miss';
    }

    let attribution: MissAttribution | null = null;
    if (ctx.phase === 'e2e' && status === 'miss' && expectedCriteria) {
      attribution = this.attributeMiss(ctx.ruleSet, entry, expectedCriteria, fieldMismatches);
    }

    return {
      id: entry.id,
      category: entry.category,
      status,
      expectedStorageTargets: entry.expectedStorageTargets,
      predictedStorageTargets: outcome.decision?.storageTargets ?? null,
      expectedCriteria,
      predictedCriteria: outcome.criteria,
      fieldMismatches,
      matchedRuleId: outcome.decision?.matchedRuleId ?? null,
      matchedRulePriority: outcome.decision?.matchedRulePriority ?? null,
      consistent,
      latencyMs: outcome.latencyMs,
      attribution,
      error: error === null ? null : describeError(error),
    };
  }

  /**
   * rule_set: extraction was right, routing was wrong. extractor: the labelled criteria
   * route correctly, so extraction caused the miss. both: neither stage was right.
   */
  private attributeMiss(
    ruleSet: IRuleSet,
    entry: IValidationCase,
    expectedCriteria: ICriteria,
    fieldMismatches: readonly CriteriaField[],
  ): MissAttribution {
    if (fieldMismatches.length === 0) return 'rule_set';
    let labelledRoutesCorrectly = false;
    try {
      const labelled = evaluateRuleSet(ruleSet, expectedCriteria);
      labelledRoutesCorrectly = targetsMatch(labelled.storageTargets, entry.expectedStorageTargets, this.matchMode);
    } catch (error) {
      log.debug('Labelled criteria failed to evaluate', { caseId: entry.id, error: describeError(error).message });
    }
    return labelledRoutesCorrectly ? 'extractor' : 'both';
  }

  private buildReport(
    ctx: PhaseContext,
    cases: readonly IValidationCase[],
    records: ICaseRecord[],
    tally: IPhaseTally,
    startedAt: string,
    durationMs: number,
  ): IValidationReport {
    const total = records.length;
    const categories = [...new Set(cases.map((entry) => entry.category))];
    return {
      phase: ctx.phase,
      corpus: this.corpusName,
      ruleSet: ctx.phase === 'extractor' ? null : { name: ctx.ruleSet.name, version: ctx.ruleSet.version },
      extractor: ctx.phase === 'engine' ? null : ctx.extractor.name,
      matchMode: this.matchMode,
      startedAt,
      durationMs,
      total,
      passed: tally.statuses.pass,
      misses: tally.statuses.miss,
      hardFailures: tally.statuses.hard_failure,
      parseFailures: tally.statuses.parse_failure,
      errors: tally.statuses.error,
      accuracy: ratio(tally.statuses.pass, total),
      byCategory: categoryAccuracy(tally, categories),
      byField: ctx.phase === 'engine' ? [] : fieldAccuracy(tally),
      consistency: {
        runsPerCase: this.consistencyRuns,
        consistentCases: tally.consistentCases,
        rate: ratio(tally.consistentCases, total),
      },
      latency: summarizeLatency(tally.latencies),
      attribution: ctx.phase === 'e2e' ? { ...tally.attribution } : null,
      cases: records,
    };
  }
}

export function runEngineOnly(
  cases: readonly IValidationCase[],
  ruleSet: IRuleSet,
  options?: IHarnessOptions,
): Promise<IValidationReport> {
  return new ValidationHarness(options).runEngineOnly(cases, ruleSet);
}

export function runExtractorOnly(
  cases: readonly IValidationCase[],
  extractor: ICriteriaExtractor,
  options?: IHarnessOptions,
): Promise<IValidationReport> {
  return new ValidationHarness(options).runExtractorOnly(cases, extractor);
}

export function runEndToEnd(
  cases: readonly IValidationCase[],
  extractor: ICriteriaExtractor,
  ruleSet: IRuleSet,
  options?: IHarnessOptions,
): Promise<IValidationReport> {
  return new ValidationHarness(options).runEndToEnd(cases, extractor, ruleSet);
}

/**
 * Regression gate: accuracy at or above the threshold passes
 */
export function checkThreshold(report: IValidationReport, threshold: number): IGateResult {
  return { passed: report.accuracy >= threshold, accuracy: report.accuracy, threshold };
}
