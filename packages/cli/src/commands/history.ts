/**
 * History command - lists recorded validation runs
 */

import { Command } from 'commander';
import {
  DEFAULT_HISTORY_LIMIT,
  type IValidationRun,
  SqliteValidationRunRepository,
  VALID_PHASES,
  container,
  createTable,
  formatPercent,
  getStateDir,
  header,
  info,
  initContainer,
} from '@store-router/core';

import { exitWithError, parseChoice, parseCount } from '../options.js';

export interface IHistoryOptions {
  limit?: string;
  phase?: string;
  show?: string;
}

function repository(): SqliteValidationRunRepository {
  initContainer(getStateDir());
  return container.resolve(SqliteValidationRunRepository);
}

export function performHistory(options: IHistoryOptions): IValidationRun[] {
  const limit = options.limit ? parseCount('--limit', options.limit) : DEFAULT_HISTORY_LIMIT;
  const phase = options.phase ? parseChoice('--phase', options.phase, VALID_PHASES) : undefined;
  return repository().getRecent(limit, phase);
}

/**
 * Stored JSON report of one run
 */
export function performShow(id: string): string {
  const runId = parseCount('--show', id);
  const json = repository().getReportJson(runId);
  if (json === null) {
    throw new Error(`No validation run with id ${runId}`);
  }
  return json;
}

function formatGate(run: IValidationRun): string {
  if (run.gatePassed === null) return '-';
  return run.gatePassed ? 'pass' : 'fail';
}

export function printRuns(runs: readonly IValidationRun[]): void {
  header('Validation history');
  const table = createTable({
    head: ['ID', 'Started', 'Phase', 'Corpus', 'Rule set', 'Extractor', 'Accuracy', 'Gate'],
  });
  for (const run of runs) {
    table.push([
      String(run.id),
      run.startedAt,
      run.phase,
      run.corpus,
      run.ruleSetName ? `${run.ruleSetName} ${run.ruleSetVersion ?? ''}`.trim() : '-',
      run.extractor ?? '-',
      `${formatPercent(run.accuracy)} (${run.passed}/${run.total})`,
      formatGate(run),
    ]);
  }
  console.log(table.toString());
}

/**
 * Register the history command with the program
 */
export function historyCommand(program: Command): void {
  program
    .command('history')
    .description('List recorded validation runs, newest first')
    .option('--limit <n>', `Number of runs to list (default ${DEFAULT_HISTORY_LIMIT})`)
    .option('--phase <phase>', 'Only runs of one phase (engine, extractor or e2e)')
    .option('--show <id>', 'Print the stored JSON report of one run')
    .action((options: IHistoryOptions) => {
      try {
        if (options.show) {
          console.log(performShow(options.show));
          return;
        }

        const runs = performHistory(options);
        if (runs.length === 0) {
          info('No validation runs recorded yet');
          return;
        }
        printRuns(runs);
      } catch (err: unknown) {
        exitWithError(err);
      }
    });
}
