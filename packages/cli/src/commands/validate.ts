/**
 * Validate command - replays the pinned corpus through one harness phase and gates on accuracy
 */

import * as path from 'path';

import { Command } from 'commander';
import {
  type IGateResult,
  type IValidationReport,
  SqliteValidationRunRepository,
  VALID_EXTRACTORS,
  VALID_MATCH_MODES,
  VALID_PHASES,
  ValidationHarness,
  checkThreshold,
  container,
  createExtractor,
  createSpinner,
  getStateDir,
  initContainer,
  loadConfig,
  loadConfiguredRuleSet,
  loadCorpus,
  renderSummary,
  writeReport,
} from '@store-router/core';

import {
  type IRuleSetFlags,
  exitWithError,
  parseChoice,
  parseCount,
  parseThreshold,
  ruleSetSelection,
} from '../options.js';

export interface IValidateOptions extends IRuleSetFlags {
  phase: string;
  corpus?: string;
  threshold?: string;
  extractor?: string;
  runs?: string;
  concurrency?: string;
  match?: string;
  json?: string;
  /** False under --no-record */
  record: boolean;
}

export interface IValidateResult {
  report: IValidationReport;
  gate: IGateResult;
  /** History row id; null when recording was skipped */
  runId: number | null;
}

export async function performValidate(
  projectDir: string,
  options: IValidateOptions,
): Promise<IValidateResult> {
  const config = loadConfig(projectDir);
  const phase = parseChoice('--phase', options.phase, VALID_PHASES);
  const threshold = options.threshold !== undefined ? parseThreshold(options.threshold) : config.threshold;
  const matchMode = options.match
    ? parseChoice('--match', options.match, VALID_MATCH_MODES)
    : config.matchMode;
  const kind = options.extractor
    ? parseChoice('--extractor', options.extractor, VALID_EXTRACTORS)
    : config.extractor;
  const consistencyRuns = options.runs ? parseCount('--runs', options.runs) : config.consistencyRuns;
  const concurrency = options.concurrency
    ? parseCount('--concurrency', options.concurrency)
    : config.concurrency;

  const corpus = loadCorpus(options.corpus ? path.resolve(projectDir, options.corpus) : config.corpusPath);
  const harness = new ValidationHarness({
    consistencyRuns,
    concurrency,
    matchMode,
    corpusName: corpus.name,
  });
  const loadRules = () => loadConfiguredRuleSet(config, ruleSetSelection(projectDir, options));

  const runPhase = (): Promise<IValidationReport> => {
    switch (phase) {
      case 'engine':
        return harness.runEngineOnly(corpus.cases, loadRules());
      case 'extractor':
        return harness.runExtractorOnly(corpus.cases, createExtractor(config, kind));
      case 'e2e':
        return harness.runEndToEnd(corpus.cases, createExtractor(config, kind), loadRules());
    }
  };

  const report = await runPhase();
  const gate = checkThreshold(report, threshold);

  if (options.json) {
    writeReport(path.resolve(projectDir, options.json), report, gate);
  }

  let runId: number | null = null;
  if (options.record) {
    initContainer(getStateDir());
    runId = container.resolve(SqliteValidationRunRepository).record(report, gate).id;
  }

  return { report, gate, runId };
}

/**
 * Register the validate command with the program
 */
export function validateCommand(program: Command): void {
  program
    .command('validate')
    .description('Run the validation harness over a corpus and fail below the accuracy threshold')
    .requiredOption('--phase <phase>', 'Harness phase (engine, extractor or e2e)')
    .option('--corpus <file>', 'Corpus JSON file to replay instead of the configured one')
    .option('--rules <file>', 'Rule set artifact to use instead of the configured one')
    .option('--rule-version <version>', 'Rule set version to resolve from the rules directories')
    .option('--threshold <fraction>', 'Minimum accuracy between 0 and 1')
    .option('--extractor <kind>', 'Extractor to use (keyword or llm)')
    .option('--runs <n>', 'Times each case is replayed to measure consistency')
    .option('--concurrency <n>', 'Cases evaluated in parallel')
    .option('--match <mode>', 'Target comparison (exact or covers)')
    .option('--json <file>', 'Write the machine-readable report to a file')
    .option('--strict', 'Fail to load a rule set with shadowed rules')
    .option('--no-record', 'Do not store the run in the history database')
    .action(async (options: IValidateOptions) => {
      const spinner = createSpinner(`Running ${options.phase} validation...`);
      spinner.start();

      let result: IValidateResult;
      try {
        result = await performValidate(process.cwd(), options);
      } catch (err: unknown) {
        spinner.fail('Validation could not run');
        exitWithError(err);
      }

      spinner.stop();
      console.log(renderSummary(result.report, result.gate));
      if (options.json) {
        console.log(`\nReport written to ${path.resolve(process.cwd(), options.json)}`);
      }

      if (!result.gate.passed) {
        process.exit(1);
      }
    });
}
