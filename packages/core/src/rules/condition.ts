/**
 * Condition algebra over the finite criteria domain.
 * A cell is either a literal value of its field or the wildcard.
 */

import { WILDCARD } from '../constants.js';
import { CRITERIA_FIELDS } from '../criteria/criteria.js';
import type { ICriteria, RuleCondition } from '../types.js';

export function matchesCondition(condition: RuleCondition, criteria: ICriteria): boolean {
  return CRITERIA_FIELDS.every(
    (field) => condition[field] === WILDCARD || condition[field] === criteria[field],
  );
}

/**
 * True when every criteria matching `narrower` also matches `broader`
 */
export function subsumes(broader: RuleCondition, narrower: RuleCondition): boolean {
  return CRITERIA_FIELDS.every(
    (field) => broader[field] === WILDCARD || broader[field] === narrower[field],
  );
}

/**
 * True when at least one criteria matches both conditions
 */
export function conditionsIntersect(a: RuleCondition, b: RuleCondition): boolean {
  return CRITERIA_FIELDS.every(
    (field) => a[field] === WILDCARD || b[field] === WILDCARD || a[field] === b[field],
  );
}

export function isDefaultCondition(condition: RuleCondition): boolean {
  return CRITERIA_FIELDS.every((field) => condition[field] === WILDCARD);
}

/**
 * Non-wildcard cells only, e.g. `storage_intent=file, analytic_intent=true`
 */
export function formatCondition(condition: RuleCondition): string {
  const cells = CRITERIA_FIELDS.filter((field) => condition[field] !== WILDCARD).map(
    (field) => `${field}=${String(condition[field])}`,
  );
  return cells.length > 0 ? cells.join(', ') : '(any)';
}
