/**
 * Per-worker tallies and the aggregate metrics computed from them.
 */

import { CRITERIA_FIELDS } from '../criteria/criteria.js';
import type { CriteriaField } from '../types.js';
import type {
  CaseStatus,
  ICaseRecord,
  ICategoryAccuracy,
  IFieldAccuracy,
  ILatencySummary,
  MissAttribution,
} from './types.js';

interface ICounter {
  total: number;
  hits: number;
}

export interface IPhaseTally {
  statuses: Record<CaseStatus, number>;
  consistentCases: number;
  latencies: number[];
  categories: Map<string, ICounter>;
  fields: Map<CriteriaField, ICounter>;
  attribution: Record<MissAttribution, number>;
}

export function createTally(): IPhaseTally {
  return {
    statuses: { pass: 0, miss: 0, hard_failure: 0, parse_failure: 0, error: 0 },
    consistentCases: 0,
    latencies: [],
    categories: new Map(),
    fields: new Map(),
    attribution: { rule_set: 0, extractor: 0, both: 0 },
  };
}

function bump<K>(map: Map<K, ICounter>, key: K, hit: boolean): void {
  const counter = map.get(key) ?? { total: 0, hits: 0 };
  counter.total += 1;
  if (hit) counter.hits += 1;
  map.set(key, counter);
}

/**
 * Fold one finished case into a worker's tally
 */
export function recordCase(
  tally: IPhaseTally,
  record: ICaseRecord,
  latencies: readonly number[],
  scoredFields: boolean,
): void {
  tally.statuses[record.status] += 1;
  if (record.consistent) tally.consistentCases += 1;
  tally.latencies.push(...latencies);
  bump(tally.categories, record.category, record.status === 'pass');
  if (scoredFields) {
    for (const field of CRITERIA_FIELDS) {
      bump(tally.fields, field, !record.fieldMismatches.includes(field));
    }
  }
  if (record.attribution) tally.attribution[record.attribution] += 1;
}

export function mergeTallies(tallies: readonly IPhaseTally[]): IPhaseTally {
  const merged = createTally();
  for (const tally of tallies) {
    merged.statuses.pass += tally.statuses.pass;
    merged.statuses.miss += tally.statuses.miss;
    merged.statuses.hard_failure += tally.statuses.hard_failure;
    merged.statuses.parse_failure += tally.statuses.parse_failure;
    merged.statuses.error += tally.statuses.error;
    merged.consistentCases += tally.consistentCases;
    merged.latencies.push(...tally.latencies);
    for (const [category, counter] of tally.categories) {
      const into = merged.categories.get(category) ?? { total: 0, hits: 0 };
      merged.categories.set(category, { total: into.total + counter.total, hits: into.hits + counter.hits });
    }
    for (const [field, counter] of tally.fields) {
      const into = merged.fields.get(field) ?? { total: 0, hits: 0 };
      merged.fields.set(field, { total: into.total + counter.total, hits: into.hits + counter.hits });
    }
    merged.attribution.rule_set += tally.attribution.rule_set;
    merged.attribution.extractor += tally.attribution.extractor;
    merged.attribution.both += tally.attribution.both;
  }
  return merged;
}

export function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

/**
 * Nearest-rank percentile over ascending samples
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1];
}

export function summarizeLatency(samples: readonly number[]): ILatencySummary {
  const sorted = [...samples].sort((a, b) => a - b);
  const sum = sorted.reduce((acc, value) => acc + value, 0);
  return {
    samples: sorted.length,
    p50: percentile(sorted, 50),
    p90: percentile(sorted, 90),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    max: sorted.length > 0 ? sorted[sorted.length - 1] : 0,
    mean: ratio(sum, sorted.length),
  };
}

/**
 * Categories in first-seen corpus order
 */
export function categoryAccuracy(tally: IPhaseTally, order: readonly string[]): ICategoryAccuracy[] {
  return order.flatMap((category) => {
    const counter = tally.categories.get(category);
    if (!counter) return [];
    return [{ category, total: counter.total, passed: counter.hits, accuracy: ratio(counter.hits, counter.total) }];
  });
}

export function fieldAccuracy(tally: IPhaseTally): IFieldAccuracy[] {
  return CRITERIA_FIELDS.flatMap((field) => {
    const counter = tally.fields.get(field);
    if (!counter) return [];
    return [{ field, total: counter.total, correct: counter.hits, accuracy: ratio(counter.hits, counter.total) }];
  });
}
