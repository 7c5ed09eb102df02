/**
 * Static analysis of a loaded rule set over the whole criteria domain.
 * Reports problems; never reorders or rewrites rules.
 */

import { enumerateCriteria } from '../criteria/criteria.js';
import type { ICriteria, IRule, IRuleSet, IShadowedRule } from '../types.js';
import { conditionsIntersect, isDefaultCondition, matchesCondition, subsumes } from './condition.js';

/** Two rules that can both match one criteria, neither subsuming the other, with different outcomes */
export interface IRuleOverlap {
  firstIndex: number;
  firstId: string;
  secondIndex: number;
  secondId: string;
  /** Criteria matched by both rules; the earlier one always wins them */
  sharedCombinations: number;
}

export interface IRuleCoverage {
  index: number;
  id: string;
  /** Criteria for which this rule is the first hit */
  firstHits: number;
}

export interface IRuleSetAnalysis {
  name: string;
  version: string;
  ruleCount: number;
  domainSize: number;
  shadowed: readonly IShadowedRule[];
  /** Non-default rules never reached first for any criteria */
  unreachable: number[];
  overlaps: IRuleOverlap[];
  coverage: IRuleCoverage[];
}

function sameOutcome(a: IRule, b: IRule): boolean {
  return (
    a.outcome.storageTargets.length === b.outcome.storageTargets.length &&
    a.outcome.storageTargets.every((target, i) => b.outcome.storageTargets[i] === target)
  );
}

export function firstHitIndex(rules: readonly IRule[], criteria: ICriteria): number {
  return rules.findIndex((rule) => matchesCondition(rule.condition, criteria));
}

export function findOverlaps(rules: readonly IRule[], domain: readonly ICriteria[]): IRuleOverlap[] {
  const overlaps: IRuleOverlap[] = [];
  for (let i = 0; i < rules.length; i++) {
    for (let j = i + 1; j < rules.length; j++) {
      const a = rules[i];
      const b = rules[j];
      if (isDefaultCondition(a.condition) || isDefaultCondition(b.condition)) continue;
      if (!conditionsIntersect(a.condition, b.condition)) continue;
      if (subsumes(a.condition, b.condition) || subsumes(b.condition, a.condition)) continue;
      if (sameOutcome(a, b)) continue;
      const sharedCombinations = domain.filter(
        (criteria) => matchesCondition(a.condition, criteria) && matchesCondition(b.condition, criteria),
      ).length;
      overlaps.push({ firstIndex: i, firstId: a.id, secondIndex: j, secondId: b.id, sharedCombinations });
    }
  }
  return overlaps;
}

export function analyzeRuleSet(ruleSet: IRuleSet): IRuleSetAnalysis {
  const domain = enumerateCriteria();
  const hits = new Array<number>(ruleSet.rules.length).fill(0);

  for (const criteria of domain) {
    const index = firstHitIndex(ruleSet.rules, criteria);
    if (index >= 0) hits[index] += 1;
  }

  const coverage = ruleSet.rules.map((rule, index) => ({
    index,
    id: rule.id,
    firstHits: hits[index],
  }));

  const unreachable = coverage
    .filter((entry) => entry.firstHits === 0 && !isDefaultCondition(ruleSet.rules[entry.index].condition))
    .map((entry) => entry.index);

  return {
    name: ruleSet.name,
    version: ruleSet.version,
    ruleCount: ruleSet.rules.length,
    domainSize: domain.length,
    shadowed: ruleSet.shadowed,
    unreachable,
    overlaps: findOverlaps(ruleSet.rules, domain),
    coverage,
  };
}
