/**
 * Tests for static rule set analysis
 */

import { describe, it, expect } from 'vitest';

import { analyzeRuleSet, firstHitIndex } from '../../rules/analysis.js';
import { conditionsIntersect, subsumes } from '../../rules/condition.js';
import { loadRuleSet } from '../../rules/rule-set.js';
import { DEFAULT_RULE, loadBundledRuleSet, makeCriteria, makeRuleSetDefinition } from '../fixtures.js';

describe('condition algebra', () => {
  const ruleSet = loadBundledRuleSet();
  const byId = (id: string) => {
    const rule = ruleSet.rules.find((candidate) => candidate.id === id);
    if (!rule) throw new Error(`no rule ${id}`);
    return rule.condition;
  };

  it('should detect subsumption', () => {
    expect(subsumes(byId('database-crud'), byId('database-crud-analytic'))).toBe(true);
    expect(subsumes(byId('database-crud-analytic'), byId('database-crud'))).toBe(false);
    expect(subsumes(byId('default'), byId('memory-intent'))).toBe(true);
  });

  it('should detect intersection', () => {
    expect(conditionsIntersect(byId('file-analytics'), byId('file-text-search'))).toBe(true);
    expect(conditionsIntersect(byId('vector-structured'), byId('vector-numeric'))).toBe(false);
  });
});

describe('analyzeRuleSet', () => {
  it('should cover the whole domain with the bundled rule set', () => {
    const analysis = analyzeRuleSet(loadBundledRuleSet());

    expect(analysis.domainSize).toBe(384);
    expect(analysis.ruleCount).toBe(18);
    expect(analysis.shadowed).toEqual([]);
    expect(analysis.unreachable).toEqual([]);
    expect(analysis.coverage.map((entry) => entry.firstHits)).toEqual([
      96, 24, 24, 48, 48, 1, 1, 46, 24, 24, 12, 1, 1, 1, 9, 12, 12, 0,
    ]);
  });

  it('should report overlapping rules with different outcomes', () => {
    const analysis = analyzeRuleSet(loadBundledRuleSet());

    expect(
      analysis.overlaps.map((overlap) => [overlap.firstId, overlap.secondId, overlap.sharedCombinations]),
    ).toEqual([
      ['file-analytics', 'file-text-search', 1],
      ['file-analytics', 'file-binary-search', 1],
      ['database-search-analytic', 'database-text-search-high', 1],
      ['database-search-analytic', 'database-text-search-low', 1],
      ['database-search-analytic', 'database-text-unsearched', 1],
    ]);
  });

  it('should list shadowed rules as unreachable', () => {
    const ruleSet = loadRuleSet(
      makeRuleSetDefinition([
        { id: 'broad', condition: { storage_intent: 'database' }, outcome: { storage_targets: ['relational_store'] } },
        {
          id: 'narrow',
          condition: { storage_intent: 'database', access_pattern: 'query' },
          outcome: { storage_targets: ['analytical_store'] },
        },
        DEFAULT_RULE,
      ]),
    );
    const analysis = analyzeRuleSet(ruleSet);

    expect(analysis.unreachable).toEqual([1]);
    expect(analysis.coverage.map((entry) => entry.firstHits)).toEqual([96, 0, 288]);
  });

  it('should find the first matching rule', () => {
    const ruleSet = loadBundledRuleSet();

    expect(firstHitIndex(ruleSet.rules, makeCriteria({ access_pattern: 'query', analytic_intent: true }))).toBe(8);
    expect(firstHitIndex([], makeCriteria())).toBe(-1);
  });
});
