/**
 * Criteria vocabulary and validation.
 * Every value that reaches the decision engine passes through validateCriteria first.
 */

import {
  VALID_ACCESS_PATTERNS,
  VALID_ANALYTIC_INTENTS,
  VALID_DATA_TYPES,
  VALID_SEARCH_INTENSITIES,
  VALID_STORAGE_INTENTS,
} from '../constants.js';
import { SchemaError } from '../errors.js';
import type { CriteriaField, ICriteria } from '../types.js';

/**
 * Declared values per criteria field. Field order is the canonical order used
 * when enumerating the criteria space and when printing criteria.
 */
export const CRITERIA_VOCABULARY: { readonly [F in CriteriaField]: readonly ICriteria[F][] } = {
  storage_intent: VALID_STORAGE_INTENTS,
  access_pattern: VALID_ACCESS_PATTERNS,
  analytic_intent: VALID_ANALYTIC_INTENTS,
  data_type: VALID_DATA_TYPES,
  search_intensity: VALID_SEARCH_INTENSITIES,
};

export const CRITERIA_FIELDS: readonly CriteriaField[] = [
  'storage_intent',
  'access_pattern',
  'analytic_intent',
  'data_type',
  'search_intensity',
];

export function isCriteriaField(name: string): name is CriteriaField {
  return CRITERIA_FIELDS.some((field) => field === name);
}

/**
 * Type guard: value is one of the declared values of `field`
 */
export function isFieldValue<F extends CriteriaField>(
  field: F,
  value: unknown,
): value is ICriteria[F] {
  const allowed: readonly unknown[] = CRITERIA_VOCABULARY[field];
  return allowed.includes(value);
}

function readField<F extends CriteriaField>(
  entries: ReadonlyMap<string, unknown>,
  field: F,
): ICriteria[F] {
  if (!entries.has(field)) {
    throw new SchemaError(field, undefined, 'missing');
  }
  const value = entries.get(field);
  if (!isFieldValue(field, value)) {
    throw new SchemaError(field, value, 'invalid_value');
  }
  return value;
}

/**
 * Validate an untyped criteria object. Fails on the first missing field,
 * undeclared value or unknown field. Never coerces ("true" is not true).
 */
export function validateCriteria(input: unknown): ICriteria {
  if (input === null || typeof input !== 'object' || Array.isArray(input)) {
    throw new SchemaError('', input, 'not_an_object');
  }

  const entries = new Map<string, unknown>(Object.entries(input));
  for (const key of entries.keys()) {
    if (!isCriteriaField(key)) {
      throw new SchemaError(key, entries.get(key), 'unknown_field');
    }
  }

  return {
    storage_intent: readField(entries, 'storage_intent'),
    access_pattern: readField(entries, 'access_pattern'),
    analytic_intent: readField(entries, 'analytic_intent'),
    data_type: readField(entries, 'data_type'),
    search_intensity: readField(entries, 'search_intensity'),
  };
}

/**
 * Every point of the criteria space, in canonical field order (4 * 4 * 2 * 4 * 3 = 384)
 */
export function enumerateCriteria(): ICriteria[] {
  const all: ICriteria[] = [];
  for (const storage_intent of VALID_STORAGE_INTENTS) {
    for (const access_pattern of VALID_ACCESS_PATTERNS) {
      for (const analytic_intent of VALID_ANALYTIC_INTENTS) {
        for (const data_type of VALID_DATA_TYPES) {
          for (const search_intensity of VALID_SEARCH_INTENSITIES) {
            all.push({ storage_intent, access_pattern, analytic_intent, data_type, search_intensity });
          }
        }
      }
    }
  }
  return all;
}

export function criteriaEqual(a: ICriteria, b: ICriteria): boolean {
  return CRITERIA_FIELDS.every((field) => a[field] === b[field]);
}

/**
 * Fields on which two criteria disagree, in canonical order
 */
export function diffCriteria(expected: ICriteria, actual: ICriteria): CriteriaField[] {
  return CRITERIA_FIELDS.filter((field) => expected[field] !== actual[field]);
}

/**
 * Stable one-line rendering, e.g. `storage_intent=file access_pattern=crud ...`
 */
export function formatCriteria(criteria: ICriteria): string {
  return CRITERIA_FIELDS.map((field) => `${field}=${String(criteria[field])}`).join(' ');
}
