/**
 * Tests for criteria validation and enumeration
 */

import { describe, it, expect } from 'vitest';

import {
  criteriaEqual,
  diffCriteria,
  enumerateCriteria,
  formatCriteria,
  validateCriteria,
} from '../../criteria/criteria.js';
import { SchemaError } from '../../errors.js';
import { makeCriteria } from '../fixtures.js';

function schemaErrorOf(input: unknown): SchemaError {
  try {
    validateCriteria(input);
  } catch (error) {
    if (error instanceof SchemaError) return error;
    throw error;
  }
  throw new Error('expected validateCriteria to throw');
}

describe('validateCriteria', () => {
  it('should return a criteria object with every declared field', () => {
    const input = makeCriteria({ storage_intent: 'vector', data_type: 'text', search_intensity: 'high' });

    expect(validateCriteria(input)).toEqual(input);
  });

  it('should reject values that are not plain objects', () => {
    for (const input of [null, [], 'memory', 42]) {
      const error = schemaErrorOf(input);
      expect(error.reason).toBe('not_an_object');
      expect(error.code).toBe('SCHEMA_ERROR');
    }
  });

  it('should reject a missing field', () => {
    const { data_type: _omitted, ...rest } = makeCriteria();
    const error = schemaErrorOf(rest);

    expect(error.field).toBe('data_type');
    expect(error.reason).toBe('missing');
    expect(error.message).toBe('Criteria field "data_type" is missing');
  });

  it('should reject an undeclared value', () => {
    const error = schemaErrorOf({ ...makeCriteria(), data_type: 'unrecognized' });

    expect(error.field).toBe('data_type');
    expect(error.value).toBe('unrecognized');
    expect(error.reason).toBe('invalid_value');
    expect(error.message).toBe('Criteria field "data_type" has undeclared value "unrecognized"');
  });

  it('should not coerce strings into booleans', () => {
    const error = schemaErrorOf({ ...makeCriteria(), analytic_intent: 'true' });

    expect(error.field).toBe('analytic_intent');
    expect(error.reason).toBe('invalid_value');
  });

  it('should report unknown fields before missing ones', () => {
    const error = schemaErrorOf({ storage_intent: 'memory', priority: 1 });

    expect(error.field).toBe('priority');
    expect(error.reason).toBe('unknown_field');
    expect(error.message).toBe('Criteria field "priority" is not a declared field');
  });
});

describe('enumerateCriteria', () => {
  it('should enumerate the whole criteria space once', () => {
    const all = enumerateCriteria();

    expect(all).toHaveLength(384);
    expect(new Set(all.map(formatCriteria)).size).toBe(384);
  });

  it('should follow canonical field order', () => {
    const all = enumerateCriteria();

    expect(all[0]).toEqual({
      storage_intent: 'memory',
      access_pattern: 'crud',
      analytic_intent: true,
      data_type: 'structured',
      search_intensity: 'none',
    });
    expect(all[all.length - 1]).toEqual({
      storage_intent: 'file',
      access_pattern: 'filter',
      analytic_intent: false,
      data_type: 'binary',
      search_intensity: 'high',
    });
  });
});

describe('criteria helpers', () => {
  it('should compare and diff criteria field by field', () => {
    const expected = makeCriteria();
    const actual = makeCriteria({ access_pattern: 'query', analytic_intent: true });

    expect(criteriaEqual(expected, makeCriteria())).toBe(true);
    expect(criteriaEqual(expected, actual)).toBe(false);
    expect(diffCriteria(expected, actual)).toEqual(['access_pattern', 'analytic_intent']);
  });

  it('should format criteria on one line', () => {
    expect(formatCriteria(makeCriteria())).toBe(
      'storage_intent=database access_pattern=crud analytic_intent=false data_type=structured search_intensity=none',
    );
  });
});
