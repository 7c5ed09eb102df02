/**
 * Builders shared by the core test suites
 */

import { getBundledPath } from '../config.js';
import { readRuleSetFile } from '../rules/rule-set-loader.js';
import type { RuleDefinitionInput, RuleSetDefinitionInput } from '../rules/schema.js';
import type { ICriteria, IRuleSet } from '../types.js';

export const BUNDLED_RULE_SET_PATH = getBundledPath('rules', 'storage-selection.v1.json');
export const BUNDLED_CORPUS_PATH = getBundledPath('corpora', 'reference-50.json');

export function loadBundledRuleSet(): IRuleSet {
  return readRuleSetFile(BUNDLED_RULE_SET_PATH);
}

export function makeCriteria(overrides: Partial<ICriteria> = {}): ICriteria {
  return {
    storage_intent: 'database',
    access_pattern: 'crud',
    analytic_intent: false,
    data_type: 'structured',
    search_intensity: 'none',
    ...overrides,
  };
}

export const DEFAULT_RULE: RuleDefinitionInput = {
  id: 'default',
  condition: {},
  outcome: { storage_targets: ['file_store'], operation_hints: ['write_file'] },
};

export function makeRuleSetDefinition(
  rules: RuleDefinitionInput[],
  overrides: Partial<RuleSetDefinitionInput> = {},
): RuleSetDefinitionInput {
  return {
    name: 'test-rules',
    version: 'v1',
    created_at: '2026-01-01T00:00:00Z',
    rules,
    ...overrides,
  };
}
