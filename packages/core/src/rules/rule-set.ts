/**
 * Rule set construction: artifact parsing, vocabulary checks, shadow analysis
 * and default-rule placement. The result is a frozen snapshot.
 */

import { WILDCARD } from '../constants.js';
import { isCriteriaField, isFieldValue } from '../criteria/criteria.js';
import { RuleSetIntegrityError, ShadowedRuleWarning } from '../errors.js';
import type {
  CriteriaField,
  ICriteria,
  IRule,
  IRuleSet,
  IShadowedRule,
  RuleCondition,
  StorageBackend,
  Wildcard,
} from '../types.js';
import { createLogger } from '../utils/logger.js';
import { isDefaultCondition, subsumes } from './condition.js';
import { type RuleDefinition, RuleSetDefinitionSchema, formatIssues } from './schema.js';
import { canonicalizeTargets, isStorageBackend } from './targets.js';

const log = createLogger('rule-set');

export interface ILoadRuleSetOptions {
  /** Promote shadowed-rule warnings to RuleSetIntegrityError */
  strict?: boolean;
}

function normalizeCondition(raw: Record<string, string | boolean>, index: number): RuleCondition {
  for (const key of Object.keys(raw)) {
    if (!isCriteriaField(key)) {
      throw new RuleSetIntegrityError(
        'UNKNOWN_FIELD',
        `Rule ${index} conditions on unknown field "${key}"`,
        { ruleIndex: index },
      );
    }
  }

  const cell = <F extends CriteriaField>(field: F): ICriteria[F] | Wildcard => {
    if (!Object.hasOwn(raw, field)) return WILDCARD;
    const value = raw[field];
    if (value === WILDCARD) return WILDCARD;
    if (!isFieldValue(field, value)) {
      throw new RuleSetIntegrityError(
        'INVALID_VALUE',
        `Rule ${index} field "${field}" has undeclared value ${JSON.stringify(value)}`,
        { ruleIndex: index },
      );
    }
    return value;
  };

  return Object.freeze({
    storage_intent: cell('storage_intent'),
    access_pattern: cell('access_pattern'),
    analytic_intent: cell('analytic_intent'),
    data_type: cell('data_type'),
    search_intensity: cell('search_intensity'),
  });
}

function normalizeTargets(raw: string[], index: number): StorageBackend[] {
  if (raw.length === 0) {
    throw new RuleSetIntegrityError('EMPTY_TARGETS', `Rule ${index} has no storage targets`, {
      ruleIndex: index,
    });
  }
  const targets: StorageBackend[] = [];
  for (const target of raw) {
    if (!isStorageBackend(target)) {
      throw new RuleSetIntegrityError(
        'INVALID_TARGET',
        `Rule ${index} targets unknown backend "${target}"`,
        { ruleIndex: index },
      );
    }
    targets.push(target);
  }
  return canonicalizeTargets(targets);
}

function buildRule(definition: RuleDefinition, index: number): IRule {
  const condition = normalizeCondition(definition.condition, index);
  const storageTargets = normalizeTargets(definition.outcome.storage_targets, index);
  return Object.freeze({
    id: definition.id ?? `rule-${index}`,
    priority: index,
    condition,
    outcome: Object.freeze({
      storageTargets: Object.freeze(storageTargets),
      operationHints: Object.freeze([...definition.outcome.operation_hints]),
      rationaleTemplate: definition.outcome.rationale_template,
    }),
  });
}

/**
 * Every later rule subsumed by an earlier one. Each shadowed rule is reported
 * once, against the first rule that subsumes it.
 */
export function findShadowedRules(rules: readonly IRule[]): IShadowedRule[] {
  const shadowed: IShadowedRule[] = [];
  rules.forEach((later, laterIndex) => {
    const earlier = rules.slice(0, laterIndex).find((rule) => subsumes(rule.condition, later.condition));
    if (earlier) {
      shadowed.push({
        shadowedIndex: laterIndex,
        shadowedId: later.id,
        shadowedByIndex: earlier.priority,
        shadowedById: earlier.id,
      });
    }
  });
  return shadowed;
}

function checkDefaultRule(rules: readonly IRule[], shadowed: readonly IShadowedRule[]): void {
  const defaults = rules.filter((rule) => isDefaultCondition(rule.condition));
  const lastIndex = rules.length - 1;

  if (defaults.length === 0) {
    throw new RuleSetIntegrityError(
      'MISSING_DEFAULT',
      'Rule set has no default rule (a rule whose every condition is a wildcard)',
      { shadowed },
    );
  }
  if (defaults.length > 1) {
    throw new RuleSetIntegrityError(
      'MULTIPLE_DEFAULTS',
      `Rule set has ${defaults.length} default rules (at ${defaults
        .map((rule) => rule.priority)
        .join(', ')}); exactly one is allowed`,
      { ruleIndex: defaults[1].priority, shadowed },
    );
  }
  if (defaults[0].priority !== lastIndex) {
    throw new RuleSetIntegrityError(
      'DEFAULT_NOT_LAST',
      `Default rule ${defaults[0].priority} (${defaults[0].id}) must be the last rule`,
      { ruleIndex: defaults[0].priority, shadowed },
    );
  }
}

/**
 * Build an immutable rule set from an untyped artifact (parsed JSON).
 * Throws RuleSetIntegrityError on the first defect found.
 */
export function loadRuleSet(definition: unknown, options: ILoadRuleSetOptions = {}): IRuleSet {
  const parsed = RuleSetDefinitionSchema.safeParse(definition);
  if (!parsed.success) {
    throw new RuleSetIntegrityError(
      'INVALID_ARTIFACT',
      `Rule set artifact is malformed: ${formatIssues(parsed.error)}`,
      { cause: parsed.error },
    );
  }
  const artifact = parsed.data;

  const rules = artifact.rules.map((rule, index) => buildRule(rule, index));

  const seenIds = new Map<string, number>();
  for (const rule of rules) {
    const previous = seenIds.get(rule.id);
    if (previous !== undefined) {
      throw new RuleSetIntegrityError(
        'DUPLICATE_RULE_ID',
        `Rule ${rule.priority} reuses id "${rule.id}" (first used by rule ${previous})`,
        { ruleIndex: rule.priority },
      );
    }
    seenIds.set(rule.id, rule.priority);
  }

  const shadowed = findShadowedRules(rules);
  checkDefaultRule(rules, shadowed);

  if (shadowed.length > 0) {
    if (options.strict) {
      const first = shadowed[0];
      throw new RuleSetIntegrityError('SHADOWED_RULE', new ShadowedRuleWarning(first).message, {
        ruleIndex: first.shadowedIndex,
        shadowed,
      });
    }
    for (const detail of shadowed) {
      log.warn(new ShadowedRuleWarning(detail).message, {
        ruleSet: artifact.name,
        version: artifact.version,
      });
    }
  }

  log.debug('Rule set loaded', {
    name: artifact.name,
    version: artifact.version,
    rules: rules.length,
  });

  return Object.freeze({
    name: artifact.name,
    version: artifact.version,
    createdAt: artifact.created_at,
    description: artifact.description,
    rules: Object.freeze(rules),
    shadowed: Object.freeze(shadowed.map((detail) => Object.freeze(detail))),
  });
}

/**
 * Warnings for every shadowed rule of a loaded set
 */
export function shadowWarnings(ruleSet: IRuleSet): ShadowedRuleWarning[] {
  return ruleSet.shadowed.map((detail) => new ShadowedRuleWarning(detail));
}
