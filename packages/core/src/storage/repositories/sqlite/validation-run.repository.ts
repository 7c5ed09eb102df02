/**
 * SQLite implementation of IValidationRunRepository.
 * Persists harness run summaries and their JSON reports in `validation_runs`.
 */

import 'reflect-metadata';

import Database from 'better-sqlite3';
import { inject, injectable } from 'tsyringe';

import { VALID_MATCH_MODES, VALID_PHASES } from '../../../constants.js';
import { serializeReport } from '../../../harness/report.js';
import type { IGateResult, IValidationReport } from '../../../harness/types.js';
import type { HarnessPhase, MatchMode } from '../../../types.js';
import type { IValidationRun, IValidationRunRepository } from '../interfaces.js';

interface IValidationRunRow {
  id: number;
  phase: string;
  corpus: string;
  rule_set_name: string | null;
  rule_set_version: string | null;
  extractor: string | null;
  match_mode: string;
  started_at: string;
  duration_ms: number;
  total: number;
  passed: number;
  accuracy: number;
  threshold: number | null;
  gate_passed: number | null;
}

const SUMMARY_COLUMNS = `id, phase, corpus, rule_set_name, rule_set_version, extractor, match_mode,
  started_at, duration_ms, total, passed, accuracy, threshold, gate_passed`;

function toPhase(value: string): HarnessPhase {
  const phase = VALID_PHASES.find((candidate) => candidate === value);
  if (!phase) throw new Error(`Unknown phase in validation_runs: ${value}`);
  return phase;
}

function toMatchMode(value: string): MatchMode {
  const mode = VALID_MATCH_MODES.find((candidate) => candidate === value);
  if (!mode) throw new Error(`Unknown match mode in validation_runs: ${value}`);
  return mode;
}

function rowToRun(row: IValidationRunRow): IValidationRun {
  return {
    id: row.id,
    phase: toPhase(row.phase),
    corpus: row.corpus,
    ruleSetName: row.rule_set_name,
    ruleSetVersion: row.rule_set_version,
    extractor: row.extractor,
    matchMode: toMatchMode(row.match_mode),
    startedAt: row.started_at,
    durationMs: row.duration_ms,
    total: row.total,
    passed: row.passed,
    accuracy: row.accuracy,
    threshold: row.threshold,
    gatePassed: row.gate_passed === null ? null : row.gate_passed === 1,
  };
}

@injectable()
export class SqliteValidationRunRepository implements IValidationRunRepository {
  private readonly _db: Database.Database;

  constructor(@inject('Database') db: Database.Database) {
    this._db = db;
  }

  record(report: IValidationReport, gate?: IGateResult): IValidationRun {
    const result = this._db
      .prepare<
        [
          string,
          string,
          string | null,
          string | null,
          string | null,
          string,
          string,
          number,
          number,
          number,
          number,
          number | null,
          number | null,
          string,
        ]
      >(
        `INSERT INTO validation_runs
           (phase, corpus, rule_set_name, rule_set_version, extractor, match_mode,
            started_at, duration_ms, total, passed, accuracy, threshold, gate_passed, report_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        report.phase,
        report.corpus,
        report.ruleSet?.name ?? null,
        report.ruleSet?.version ?? null,
        report.extractor,
        report.matchMode,
        report.startedAt,
        report.durationMs,
        report.total,
        report.passed,
        report.accuracy,
        gate ? gate.threshold : null,
        gate ? (gate.passed ? 1 : 0) : null,
        serializeReport(report, gate),
      );

    return {
      id: Number(result.lastInsertRowid),
      phase: report.phase,
      corpus: report.corpus,
      ruleSetName: report.ruleSet?.name ?? null,
      ruleSetVersion: report.ruleSet?.version ?? null,
      extractor: report.extractor,
      matchMode: report.matchMode,
      startedAt: report.startedAt,
      durationMs: report.durationMs,
      total: report.total,
      passed: report.passed,
      accuracy: report.accuracy,
      threshold: gate ? gate.threshold : null,
      gatePassed: gate ? gate.passed : null,
    };
  }

  getRecent(limit: number, phase?: HarnessPhase): IValidationRun[] {
    const rows = phase
      ? this._db
          .prepare<[string, number], IValidationRunRow>(
            `SELECT ${SUMMARY_COLUMNS} FROM validation_runs
             WHERE phase = ?
             ORDER BY id DESC LIMIT ?`,
          )
          .all(phase, limit)
      : this._db
          .prepare<[number], IValidationRunRow>(
            `SELECT ${SUMMARY_COLUMNS} FROM validation_runs
             ORDER BY id DESC LIMIT ?`,
          )
          .all(limit);
    return rows.map(rowToRun);
  }

  getById(id: number): IValidationRun | null {
    const row = this._db
      .prepare<[number], IValidationRunRow>(`SELECT ${SUMMARY_COLUMNS} FROM validation_runs WHERE id = ?`)
      .get(id);
    return row ? rowToRun(row) : null;
  }

  getReportJson(id: number): string | null {
    const row = this._db
      .prepare<[number], { report_json: string }>('SELECT report_json FROM validation_runs WHERE id = ?')
      .get(id);
    return row ? row.report_json : null;
  }
}
