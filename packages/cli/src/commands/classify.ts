/**
 * Classify command - extracts Criteria from a request, then routes it
 */

import { Command } from 'commander';
import {
  type ICriteria,
  type IDecisionResult,
  VALID_EXTRACTORS,
  createExtractor,
  formatCriteria,
  label,
  loadConfig,
} from '@store-router/core';

import { type IRuleSetFlags, exitWithError, parseChoice, ruleSetSelection } from '../options.js';
import { createEngine, printDecision } from './evaluate.js';

export interface IClassifyOptions extends IRuleSetFlags {
  extractor?: string;
  json?: boolean;
}

export interface IClassification {
  request: string;
  extractor: string;
  criteria: ICriteria;
  decision: IDecisionResult;
}

export async function performClassify(
  projectDir: string,
  request: string,
  options: IClassifyOptions,
): Promise<IClassification> {
  const config = loadConfig(projectDir);
  const kind = options.extractor
    ? parseChoice('--extractor', options.extractor, VALID_EXTRACTORS)
    : config.extractor;
  // Load the rules first so a broken rule set fails before any model call
  const engine = createEngine(config, ruleSetSelection(projectDir, options));
  const extractor = createExtractor(config, kind);
  const criteria = await extractor.extract(request);
  return { request, extractor: extractor.name, criteria, decision: engine.evaluate(criteria) };
}

/**
 * Register the classify command with the program
 */
export function classifyCommand(program: Command): void {
  program
    .command('classify')
    .description('Extract Criteria from a natural-language request and route it')
    .argument('<request>', 'Storage request text')
    .option('--extractor <kind>', 'Extractor to use (keyword or llm)')
    .option('--rules <file>', 'Rule set artifact to use instead of the configured one')
    .option('--rule-version <version>', 'Rule set version to resolve from the rules directories')
    .option('--json', 'Print the result as JSON')
    .action(async (request: string, options: IClassifyOptions) => {
      let result: IClassification;
      try {
        result = await performClassify(process.cwd(), request, options);
      } catch (err: unknown) {
        exitWithError(err);
      }

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      label('Extractor', result.extractor);
      label('Criteria', formatCriteria(result.criteria));
      printDecision(result.decision);
    });
}
