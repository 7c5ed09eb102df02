/**
 * Tests for first-hit evaluation and the engine bound to a rule set handle
 */

import { describe, it, expect } from 'vitest';

import { enumerateCriteria } from '../../criteria/criteria.js';
import { DecisionEngine, collectAllMatches, evaluateRuleSet } from '../../engine/decision-engine.js';
import { renderRationale } from '../../engine/rationale.js';
import { RuleSetHandle } from '../../engine/rule-set-handle.js';
import { RuleSetIntegrityError, SchemaError } from '../../errors.js';
import { loadRuleSet } from '../../rules/rule-set.js';
import type { IRuleSet } from '../../types.js';
import { DEFAULT_RULE, loadBundledRuleSet, makeCriteria, makeRuleSetDefinition } from '../fixtures.js';

describe('evaluateRuleSet', () => {
  const ruleSet = loadBundledRuleSet();

  it('should route personal facts to memory', () => {
    const result = evaluateRuleSet(
      ruleSet,
      makeCriteria({ storage_intent: 'memory', data_type: 'text' }),
    );

    expect(result.storageTargets).toEqual(['memory']);
    expect(result.operationHints).toEqual(['upsert_key']);
    expect(result.rationale).toBe('Personal facts and preferences are kept as key-value memory (text)');
    expect(result.matchedRulePriority).toBe(0);
    expect(result.matchedRuleId).toBe('memory-intent');
    expect(result.ruleSetVersion).toBe('v1');
  });

  it('should route analytical queries to the analytical store', () => {
    const result = evaluateRuleSet(ruleSet, makeCriteria({ access_pattern: 'query', analytic_intent: true }));

    expect(result.storageTargets).toEqual(['analytical_store']);
    expect(result.operationHints).toEqual(['run_analytical_query']);
    expect(result.rationale).toBe('Analytical queries run on the columnar store');
  });

  it('should route semantic search to the vector store', () => {
    const result = evaluateRuleSet(
      ruleSet,
      makeCriteria({ storage_intent: 'vector', access_pattern: 'search', data_type: 'text', search_intensity: 'high' }),
    );

    expect(result.storageTargets).toEqual(['vector_store']);
    expect(result.rationale).toBe('Search by meaning over text content (high search intensity)');
    expect(result.matchedRuleId).toBe('vector-intent');
  });

  it('should route tracked records with analytics to both stores', () => {
    const result = evaluateRuleSet(ruleSet, makeCriteria({ analytic_intent: true }));

    expect(result.storageTargets).toEqual(['relational_store', 'analytical_store']);
    expect(result.operationHints).toEqual(['insert_row', 'load_for_analysis']);
    expect(result.matchedRuleId).toBe('database-crud-analytic');
  });

  it('should raise SchemaError for an undeclared value', () => {
    expect(() => evaluateRuleSet(ruleSet, { ...makeCriteria(), data_type: 'unrecognized' })).toThrow(SchemaError);
  });

  it('should return a result for every point of the criteria space', () => {
    for (const criteria of enumerateCriteria()) {
      const result = evaluateRuleSet(ruleSet, criteria);
      expect(result.storageTargets.length).toBeGreaterThan(0);
    }
  });

  it('should be deterministic', () => {
    const criteria = makeCriteria({ storage_intent: 'file', analytic_intent: true });

    expect(evaluateRuleSet(ruleSet, criteria)).toEqual(evaluateRuleSet(ruleSet, criteria));
  });

  it('should let the earliest matching rule win', () => {
    const ordered = loadRuleSet(
      makeRuleSetDefinition([
        { id: 'first', condition: { storage_intent: 'database' }, outcome: { storage_targets: ['relational_store'] } },
        { id: 'second', condition: { access_pattern: 'crud' }, outcome: { storage_targets: ['memory'] } },
        DEFAULT_RULE,
      ]),
    );

    expect(evaluateRuleSet(ordered, makeCriteria()).matchedRuleId).toBe('first');
    expect(evaluateRuleSet(ordered, makeCriteria({ storage_intent: 'file' })).matchedRuleId).toBe('second');
    expect(
      evaluateRuleSet(ordered, makeCriteria({ storage_intent: 'file', access_pattern: 'query' })).matchedRuleId,
    ).toBe('default');
  });

  it('should raise NO_MATCH when a malformed rule set falls through', () => {
    const empty: IRuleSet = {
      name: 'empty',
      version: 'v0',
      createdAt: '2026-01-01T00:00:00Z',
      description: '',
      rules: [],
      shadowed: [],
    };

    try {
      evaluateRuleSet(empty, makeCriteria());
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RuleSetIntegrityError);
      expect(error instanceof RuleSetIntegrityError && error.reason).toBe('NO_MATCH');
    }
  });
});

describe('collectAllMatches', () => {
  it('should union every matching outcome', () => {
    const result = collectAllMatches(loadBundledRuleSet(), makeCriteria({ analytic_intent: true }));

    expect(result.matchedRulePriorities).toEqual([15, 16, 17]);
    expect(result.storageTargets).toEqual(['relational_store', 'analytical_store', 'file_store']);
    expect(result.operationHints).toEqual(['insert_row', 'load_for_analysis', 'write_file']);
    expect(result.ruleSetVersion).toBe('v1');
  });
});

describe('renderRationale', () => {
  it('should fill known placeholders and keep unknown ones', () => {
    const ruleSet = loadBundledRuleSet();
    const rule = ruleSet.rules[3];

    expect(renderRationale('{rule_id}#{priority} {unknown} {data_type}', makeCriteria(), rule)).toBe(
      'vector-intent#3 {unknown} structured',
    );
  });
});

describe('DecisionEngine', () => {
  it('should refuse to evaluate before a rule set is published', () => {
    const engine = new DecisionEngine(new RuleSetHandle());

    expect(() => engine.evaluate(makeCriteria())).toThrow('No rule set has been loaded');
  });

  it('should evaluate against the published snapshot', () => {
    const handle = new RuleSetHandle();
    const engine = new DecisionEngine(handle);
    handle.publish(loadBundledRuleSet());

    expect(engine.evaluate(makeCriteria()).storageTargets).toEqual(['relational_store']);
    expect(engine.evaluateAll(makeCriteria()).matchedRulePriorities).toEqual([16, 17]);
  });
});
