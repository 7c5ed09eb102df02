/**
 * Decision table evaluation.
 *
 * `evaluateRuleSet` and `collectAllMatches` are pure functions over one snapshot.
 * `DecisionEngine` binds them to a RuleSetHandle and reads the snapshot once per call,
 * so a reload that lands mid-call never mixes two rule sets.
 */

import 'reflect-metadata';

import { inject, injectable } from 'tsyringe';

import { validateCriteria } from '../criteria/criteria.js';
import { RuleSetIntegrityError } from '../errors.js';
import { matchesCondition } from '../rules/condition.js';
import { canonicalizeTargets } from '../rules/targets.js';
import type { ICollectAllResult, IDecisionResult, IRuleSet } from '../types.js';
import { renderRationale } from './rationale.js';
import { RuleSetHandle } from './rule-set-handle.js';

function noMatch(ruleSet: IRuleSet): RuleSetIntegrityError {
  return new RuleSetIntegrityError(
    'NO_MATCH',
    `No rule of ${ruleSet.name} ${ruleSet.version} matched; the rule set has no effective default rule`,
  );
}

/**
 * First-hit evaluation. Throws SchemaError on invalid criteria and
 * RuleSetIntegrityError when no rule matches.
 */
export function evaluateRuleSet(ruleSet: IRuleSet, input: unknown): IDecisionResult {
  const criteria = validateCriteria(input);
  const rule = ruleSet.rules.find((candidate) => matchesCondition(candidate.condition, criteria));
  if (!rule) {
    throw noMatch(ruleSet);
  }
  return {
    storageTargets: rule.outcome.storageTargets,
    operationHints: rule.outcome.operationHints,
    rationale: renderRationale(rule.outcome.rationaleTemplate, criteria, rule),
    matchedRulePriority: rule.priority,
    matchedRuleId: rule.id,
    ruleSetVersion: ruleSet.version,
  };
}

/**
 * Union of every matching rule's outcome. For exploring a rule set, not for routing.
 */
export function collectAllMatches(ruleSet: IRuleSet, input: unknown): ICollectAllResult {
  const criteria = validateCriteria(input);
  const matched = ruleSet.rules.filter((rule) => matchesCondition(rule.condition, criteria));
  if (matched.length === 0) {
    throw noMatch(ruleSet);
  }
  const hints: string[] = [];
  for (const rule of matched) {
    for (const hint of rule.outcome.operationHints) {
      if (!hints.includes(hint)) hints.push(hint);
    }
  }
  return {
    storageTargets: canonicalizeTargets(matched.flatMap((rule) => rule.outcome.storageTargets)),
    operationHints: hints,
    matchedRulePriorities: matched.map((rule) => rule.priority),
    ruleSetVersion: ruleSet.version,
  };
}

@injectable()
export class DecisionEngine {
  constructor(@inject(RuleSetHandle) private readonly handle: RuleSetHandle) {}

  evaluate(criteria: unknown): IDecisionResult {
    return evaluateRuleSet(this.handle.current(), criteria);
  }

  evaluateAll(criteria: unknown): ICollectAllResult {
    return collectAllMatches(this.handle.current(), criteria);
  }
}
