/**
 * Validation corpus loading.
 */

import * as fs from 'fs';

import { CorpusSchema, formatIssues } from '../rules/schema.js';
import { canonicalizeTargets, isStorageBackend } from '../rules/targets.js';
import type { StorageBackend } from '../types.js';
import type { ICorpus, IValidationCase } from './types.js';

export function parseCorpus(raw: unknown, source = 'corpus'): ICorpus {
  const parsed = CorpusSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid corpus ${source}: ${formatIssues(parsed.error)}`);
  }

  const seen = new Set<string>();
  const cases = parsed.data.cases.map((entry): IValidationCase => {
    if (seen.has(entry.id)) {
      throw new Error(`Invalid corpus ${source}: duplicate case id "${entry.id}"`);
    }
    seen.add(entry.id);

    const targets: StorageBackend[] = [];
    for (const target of entry.expected_storage_targets) {
      if (!isStorageBackend(target)) {
        throw new Error(`Invalid corpus ${source}: case ${entry.id} expects unknown backend "${target}"`);
      }
      targets.push(target);
    }

    return {
      id: entry.id,
      category: entry.category,
      request: entry.request,
      criteria: entry.criteria,
      expectedStorageTargets: canonicalizeTargets(targets),
      notes: entry.notes,
    };
  });

  return { name: parsed.data.name, description: parsed.data.description, cases };
}

export function loadCorpus(filePath: string): ICorpus {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Could not read corpus ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  return parseCorpus(raw, filePath);
}
