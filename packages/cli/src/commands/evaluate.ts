/**
 * Evaluate command - routes one Criteria object through the decision table
 */

import { Command } from 'commander';
import {
  DecisionEngine,
  type ICollectAllResult,
  type IDecisionResult,
  type IRuleSetSelection,
  type IStoreRouterConfig,
  RuleSetHandle,
  formatTargets,
  header,
  label,
  loadConfig,
  loadConfiguredRuleSet,
} from '@store-router/core';

import { type IRuleSetFlags, exitWithError, ruleSetSelection } from '../options.js';

export interface IEvaluateOptions extends IRuleSetFlags {
  criteria: string;
  collectAll?: boolean;
  json?: boolean;
}

/**
 * Engine over a freshly loaded rule set snapshot
 */
export function createEngine(config: IStoreRouterConfig, selection: IRuleSetSelection): DecisionEngine {
  const handle = new RuleSetHandle();
  handle.publish(loadConfiguredRuleSet(config, selection));
  return new DecisionEngine(handle);
}

export function parseCriteriaJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new Error(`--criteria is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
}

export function performEvaluate(
  projectDir: string,
  options: IEvaluateOptions,
): IDecisionResult | ICollectAllResult {
  const criteria = parseCriteriaJson(options.criteria);
  const engine = createEngine(loadConfig(projectDir), ruleSetSelection(projectDir, options));
  return options.collectAll ? engine.evaluateAll(criteria) : engine.evaluate(criteria);
}

export function printDecision(result: IDecisionResult): void {
  header('Decision');
  label('Targets', formatTargets(result.storageTargets));
  label('Hints', result.operationHints.join(', ') || '-');
  label('Rule', `${result.matchedRuleId} (priority ${result.matchedRulePriority})`);
  label('Rationale', result.rationale);
  label('Rule set version', result.ruleSetVersion);
}

function printCollectAll(result: ICollectAllResult): void {
  header('All matching rules');
  label('Targets', formatTargets(result.storageTargets));
  label('Hints', result.operationHints.join(', ') || '-');
  label('Priorities', result.matchedRulePriorities.join(', '));
  label('Rule set version', result.ruleSetVersion);
}

/**
 * Register the evaluate command with the program
 */
export function evaluateCommand(program: Command): void {
  program
    .command('evaluate')
    .description('Evaluate one Criteria object against the rule set')
    .requiredOption('--criteria <json>', 'Criteria as a JSON object')
    .option('--collect-all', 'Union every matching rule instead of the first hit')
    .option('--rules <file>', 'Rule set artifact to use instead of the configured one')
    .option('--rule-version <version>', 'Rule set version to resolve from the rules directories')
    .option('--json', 'Print the result as JSON')
    .action((options: IEvaluateOptions) => {
      let result: IDecisionResult | ICollectAllResult;
      try {
        result = performEvaluate(process.cwd(), options);
      } catch (err: unknown) {
        exitWithError(err);
      }

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if ('matchedRulePriorities' in result) {
        printCollectAll(result);
      } else {
        printDecision(result);
      }
    });
}
