/**
 * Tests for rule set construction and integrity checks
 */

import { describe, it, expect } from 'vitest';

import { RuleSetIntegrityError } from '../../errors.js';
import { formatCondition } from '../../rules/condition.js';
import { loadRuleSet, shadowWarnings } from '../../rules/rule-set.js';
import type { RuleDefinitionInput } from '../../rules/schema.js';
import { DEFAULT_RULE, loadBundledRuleSet, makeRuleSetDefinition } from '../fixtures.js';

const MEMORY_RULE: RuleDefinitionInput = {
  id: 'memory',
  condition: { storage_intent: 'memory' },
  outcome: { storage_targets: ['memory'] },
};

function integrityErrorOf(definition: unknown, strict = false): RuleSetIntegrityError {
  try {
    loadRuleSet(definition, { strict });
  } catch (error) {
    if (error instanceof RuleSetIntegrityError) return error;
    throw error;
  }
  throw new Error('expected loadRuleSet to throw');
}

describe('loadRuleSet', () => {
  it('should load the bundled rule set without shadowing', () => {
    const ruleSet = loadBundledRuleSet();

    expect(ruleSet.name).toBe('storage-selection');
    expect(ruleSet.version).toBe('v1');
    expect(ruleSet.rules).toHaveLength(18);
    expect(ruleSet.shadowed).toEqual([]);
    expect(ruleSet.rules[17].id).toBe('default');
    expect(formatCondition(ruleSet.rules[17].condition)).toBe('(any)');
  });

  it('should freeze the snapshot', () => {
    const ruleSet = loadRuleSet(makeRuleSetDefinition([MEMORY_RULE, DEFAULT_RULE]));

    expect(Object.isFrozen(ruleSet)).toBe(true);
    expect(Object.isFrozen(ruleSet.rules)).toBe(true);
    expect(Object.isFrozen(ruleSet.rules[0].condition)).toBe(true);
  });

  it('should assign priorities, default ids and canonical targets', () => {
    const ruleSet = loadRuleSet(
      makeRuleSetDefinition([
        { condition: { storage_intent: 'file' }, outcome: { storage_targets: ['file_store', 'memory', 'file_store'] } },
        DEFAULT_RULE,
      ]),
    );

    expect(ruleSet.rules[0].id).toBe('rule-0');
    expect(ruleSet.rules[0].priority).toBe(0);
    expect(ruleSet.rules[1].priority).toBe(1);
    expect(ruleSet.rules[0].outcome.storageTargets).toEqual(['memory', 'file_store']);
    expect(ruleSet.rules[0].outcome.operationHints).toEqual([]);
    expect(ruleSet.rules[0].outcome.rationaleTemplate).toBe('');
  });

  it('should treat omitted fields and "*" as wildcards', () => {
    const ruleSet = loadRuleSet(
      makeRuleSetDefinition([
        { id: 'memory', condition: { storage_intent: 'memory', data_type: '*' }, outcome: { storage_targets: ['memory'] } },
        DEFAULT_RULE,
      ]),
    );

    expect(ruleSet.rules[0].condition).toEqual({
      storage_intent: 'memory',
      access_pattern: '*',
      analytic_intent: '*',
      data_type: '*',
      search_intensity: '*',
    });
    expect(formatCondition(ruleSet.rules[0].condition)).toBe('storage_intent=memory');
  });

  it('should reject a malformed artifact', () => {
    const error = integrityErrorOf({ name: 'broken' });

    expect(error.reason).toBe('INVALID_ARTIFACT');
    expect(error.message).toMatch(/^Rule set artifact is malformed: /);
  });

  it('should reject an artifact without rules', () => {
    expect(integrityErrorOf(makeRuleSetDefinition([])).reason).toBe('INVALID_ARTIFACT');
  });

  it('should reject an unknown condition field', () => {
    const error = integrityErrorOf(
      makeRuleSetDefinition([
        { condition: { colour: 'red' }, outcome: { storage_targets: ['memory'] } },
        DEFAULT_RULE,
      ]),
    );

    expect(error.reason).toBe('UNKNOWN_FIELD');
    expect(error.ruleIndex).toBe(0);
    expect(error.message).toBe('Rule 0 conditions on unknown field "colour"');
  });

  it('should reject an undeclared condition value', () => {
    const error = integrityErrorOf(
      makeRuleSetDefinition([
        MEMORY_RULE,
        { condition: { analytic_intent: 'true' }, outcome: { storage_targets: ['analytical_store'] } },
        DEFAULT_RULE,
      ]),
    );

    expect(error.reason).toBe('INVALID_VALUE');
    expect(error.ruleIndex).toBe(1);
    expect(error.message).toBe('Rule 1 field "analytic_intent" has undeclared value "true"');
  });

  it('should reject unknown and empty targets', () => {
    const unknown = integrityErrorOf(
      makeRuleSetDefinition([{ condition: {}, outcome: { storage_targets: ['s3_bucket'] } }]),
    );
    const empty = integrityErrorOf(makeRuleSetDefinition([{ condition: {}, outcome: { storage_targets: [] } }]));

    expect(unknown.reason).toBe('INVALID_TARGET');
    expect(unknown.message).toBe('Rule 0 targets unknown backend "s3_bucket"');
    expect(empty.reason).toBe('EMPTY_TARGETS');
  });

  it('should reject duplicate rule ids', () => {
    const error = integrityErrorOf(
      makeRuleSetDefinition([MEMORY_RULE, { ...MEMORY_RULE, condition: { storage_intent: 'file' } }, DEFAULT_RULE]),
    );

    expect(error.reason).toBe('DUPLICATE_RULE_ID');
    expect(error.ruleIndex).toBe(1);
  });

  it('should require a default rule', () => {
    const error = integrityErrorOf(makeRuleSetDefinition([MEMORY_RULE]));

    expect(error.reason).toBe('MISSING_DEFAULT');
    expect(error.shadowed).toEqual([]);
  });

  it('should require the default rule to be last and report what it shadows', () => {
    const error = integrityErrorOf(makeRuleSetDefinition([DEFAULT_RULE, MEMORY_RULE]));

    expect(error.reason).toBe('DEFAULT_NOT_LAST');
    expect(error.ruleIndex).toBe(0);
    expect(error.message).toBe('Default rule 0 (default) must be the last rule');
    expect(error.shadowed).toEqual([
      { shadowedIndex: 1, shadowedId: 'memory', shadowedByIndex: 0, shadowedById: 'default' },
    ]);
  });

  it('should reject more than one default rule', () => {
    const error = integrityErrorOf(
      makeRuleSetDefinition([MEMORY_RULE, DEFAULT_RULE, { ...DEFAULT_RULE, id: 'fallback' }]),
    );

    expect(error.reason).toBe('MULTIPLE_DEFAULTS');
    expect(error.ruleIndex).toBe(2);
    expect(error.message).toBe('Rule set has 2 default rules (at 1, 2); exactly one is allowed');
    expect(error.shadowed).toEqual([
      { shadowedIndex: 2, shadowedId: 'fallback', shadowedByIndex: 1, shadowedById: 'default' },
    ]);
  });
});

describe('shadow analysis', () => {
  const shadowing = makeRuleSetDefinition([
    { id: 'broad', condition: { storage_intent: 'database' }, outcome: { storage_targets: ['relational_store'] } },
    {
      id: 'narrow',
      condition: { storage_intent: 'database', access_pattern: 'query' },
      outcome: { storage_targets: ['analytical_store'] },
    },
    DEFAULT_RULE,
  ]);

  it('should report a subsumed rule and still load by default', () => {
    const ruleSet = loadRuleSet(shadowing);

    expect(ruleSet.shadowed).toEqual([
      { shadowedIndex: 1, shadowedId: 'narrow', shadowedByIndex: 0, shadowedById: 'broad' },
    ]);
    expect(shadowWarnings(ruleSet).map((warning) => warning.message)).toEqual([
      'Rule 1 (narrow) is shadowed by rule 0 (broad) and can never match first',
    ]);
  });

  it('should fail to load in strict mode', () => {
    const error = integrityErrorOf(shadowing, true);

    expect(error.reason).toBe('SHADOWED_RULE');
    expect(error.ruleIndex).toBe(1);
    expect(error.message).toBe('Rule 1 (narrow) is shadowed by rule 0 (broad) and can never match first');
  });

  it('should not report rules that only partially overlap', () => {
    const ruleSet = loadRuleSet(
      makeRuleSetDefinition(
        [
          { id: 'database', condition: { storage_intent: 'database' }, outcome: { storage_targets: ['relational_store'] } },
          { id: 'query', condition: { access_pattern: 'query' }, outcome: { storage_targets: ['analytical_store'] } },
          DEFAULT_RULE,
        ],
      ),
      { strict: true },
    );

    expect(ruleSet.shadowed).toEqual([]);
  });
});
