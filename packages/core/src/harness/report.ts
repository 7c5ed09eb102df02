/**
 * Validation report output: machine-readable JSON and a terminal summary.
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

import { formatTargets } from '../rules/targets.js';
import {
  createTable,
  formatAccuracy,
  formatHeader,
  formatLabel,
  formatMs,
  formatPercent,
} from '../utils/ui.js';
import type { CaseStatus, ICaseRecord, IGateResult, IValidationReport } from './types.js';

const MAX_FAILED_ROWS = 20;

const STATUS_LABELS: Record<CaseStatus, string> = {
  pass: 'pass',
  miss: 'miss',
  hard_failure: 'hard failure',
  parse_failure: 'parse failure',
  error: 'error',
};

export function serializeReport(report: IValidationReport, gate?: IGateResult): string {
  return JSON.stringify(gate ? { ...report, gate } : report, null, 2);
}

export function writeReport(filePath: string, report: IValidationReport, gate?: IGateResult): void {
  fs.mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  fs.writeFileSync(filePath, serializeReport(report, gate) + '\n', 'utf-8');
}

function caseDetail(record: ICaseRecord): string {
  if (record.error) return record.error.message;
  const parts: string[] = [];
  if (record.fieldMismatches.length > 0) parts.push(`fields: ${record.fieldMismatches.join(', ')}`);
  if (record.attribution) parts.push(`cause: ${record.attribution}`);
  if (record.matchedRuleId) parts.push(`rule: ${record.matchedRuleId}`);
  return parts.join('; ');
}

/**
 * Human-readable summary: totals, per-category and per-field tables, failed cases, gate verdict
 */
export function renderSummary(report: IValidationReport, gate?: IGateResult): string {
  const lines: string[] = [formatHeader(`Validation report: ${report.phase} phase`)];

  lines.push(formatLabel('Corpus', report.corpus));
  if (report.ruleSet) lines.push(formatLabel('Rule set', `${report.ruleSet.name} ${report.ruleSet.version}`));
  if (report.extractor) lines.push(formatLabel('Extractor', report.extractor));
  lines.push(formatLabel('Match mode', report.matchMode));
  lines.push(
    formatLabel(
      'Accuracy',
      `${formatAccuracy(report.accuracy, gate?.threshold)} (${report.passed}/${report.total})`,
    ),
  );
  lines.push(formatLabel('Misses', String(report.misses)));
  lines.push(formatLabel('Hard failures', String(report.hardFailures)));
  lines.push(formatLabel('Parse failures', String(report.parseFailures)));
  lines.push(formatLabel('Errors', String(report.errors)));
  lines.push(
    formatLabel(
      'Consistency',
      `${formatPercent(report.consistency.rate)} (${report.consistency.consistentCases}/${report.total} cases, ` +
        `${report.consistency.runsPerCase} runs each)`,
    ),
  );
  lines.push(
    formatLabel(
      'Latency',
      `p50 ${formatMs(report.latency.p50)}  p90 ${formatMs(report.latency.p90)}  ` +
        `p95 ${formatMs(report.latency.p95)}  p99 ${formatMs(report.latency.p99)}  ` +
        `max ${formatMs(report.latency.max)}  mean ${formatMs(report.latency.mean)}`,
    ),
  );
  if (report.attribution) {
    const { rule_set, extractor, both } = report.attribution;
    lines.push(formatLabel('Miss causes', `rule set ${rule_set}, extractor ${extractor}, both ${both}`));
  }

  if (report.byCategory.length > 0) {
    const table = createTable({ head: ['Category', 'Passed', 'Total', 'Accuracy'] });
    for (const row of report.byCategory) {
      table.push([row.category, String(row.passed), String(row.total), formatPercent(row.accuracy)]);
    }
    lines.push('', table.toString());
  }

  if (report.byField.length > 0) {
    const table = createTable({ head: ['Field', 'Correct', 'Total', 'Accuracy'] });
    for (const row of report.byField) {
      table.push([row.field, String(row.correct), String(row.total), formatPercent(row.accuracy)]);
    }
    lines.push('', table.toString());
  }

  const failed = report.cases.filter((record) => record.status !== 'pass');
  if (failed.length > 0) {
    const table = createTable({ head: ['Case', 'Status', 'Expected', 'Predicted', 'Detail'] });
    for (const record of failed.slice(0, MAX_FAILED_ROWS)) {
      table.push([
        record.id,
        STATUS_LABELS[record.status],
        formatTargets(record.expectedStorageTargets),
        record.predictedStorageTargets ? formatTargets(record.predictedStorageTargets) : '-',
        caseDetail(record),
      ]);
    }
    lines.push('', table.toString());
    if (failed.length > MAX_FAILED_ROWS) {
      lines.push(chalk.dim(`  ... ${failed.length - MAX_FAILED_ROWS} more failed cases in the JSON report`));
    }
  }

  if (gate) {
    const verdict = gate.passed ? chalk.green('PASS') : chalk.red('FAIL');
    const comparison = gate.passed ? '>=' : '<';
    lines.push(
      '',
      `Gate ${verdict}: accuracy ${formatPercent(gate.accuracy)} ${comparison} threshold ${formatPercent(gate.threshold)}`,
    );
  }

  return lines.join('\n');
}
