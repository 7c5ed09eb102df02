/**
 * Rule set artifacts on disk: `<name>.<version>.json`.
 * An override directory, when configured, is searched before the bundled rules directory.
 */

import * as fs from 'fs';
import * as path from 'path';

import { RULE_SET_FILE_EXTENSION } from '../constants.js';
import { RuleSetIntegrityError } from '../errors.js';
import type { IRuleSet, IStoreRouterConfig } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { type ILoadRuleSetOptions, loadRuleSet } from './rule-set.js';

const log = createLogger('rule-set-loader');

export interface IRuleSetFile {
  name: string;
  version: string;
  path: string;
}

export interface IResolveRuleSetOptions {
  name: string;
  /** Empty or omitted selects the highest version */
  version?: string;
  /** Searched in order; the first directory holding the rule set wins */
  dirs: string[];
}

/**
 * Rule set files in a directory, sorted by name then version
 */
export function listRuleSetFiles(dir: string): IRuleSetFile[] {
  if (!dir || !fs.existsSync(dir)) return [];

  return fs
    .readdirSync(dir)
    .filter((entry) => entry.endsWith(RULE_SET_FILE_EXTENSION))
    .flatMap((entry) => {
      const stem = entry.slice(0, -RULE_SET_FILE_EXTENSION.length);
      const dot = stem.indexOf('.');
      if (dot <= 0 || dot === stem.length - 1) return [];
      return [{ name: stem.slice(0, dot), version: stem.slice(dot + 1), path: path.join(dir, entry) }];
    })
    .sort((a, b) => a.name.localeCompare(b.name) || compareVersions(a.version, b.version));
}

/**
 * Numeric-aware version order: v2 < v10
 */
export function compareVersions(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
}

export function resolveRuleSetFile(options: IResolveRuleSetOptions): IRuleSetFile {
  const searched: string[] = [];

  for (const dir of options.dirs.filter((d) => d !== '')) {
    searched.push(dir);
    const candidates = listRuleSetFiles(dir).filter((file) => file.name === options.name);
    if (candidates.length === 0) continue;

    if (options.version) {
      const exact = candidates.find((file) => file.version === options.version);
      if (exact) return exact;
      continue;
    }
    return candidates[candidates.length - 1];
  }

  const wanted = options.version ? `${options.name} ${options.version}` : options.name;
  throw new RuleSetIntegrityError(
    'NOT_FOUND',
    `Rule set ${wanted} not found in ${searched.length > 0 ? searched.join(', ') : '(no directories)'}`,
  );
}

/**
 * Read and build one artifact. JSON syntax errors are integrity errors.
 */
export function readRuleSetFile(filePath: string, options: ILoadRuleSetOptions = {}): IRuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new RuleSetIntegrityError(
      fs.existsSync(filePath) ? 'INVALID_ARTIFACT' : 'NOT_FOUND',
      `Could not read rule set ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }

  const ruleSet = loadRuleSet(raw, options);
  log.info('Rule set loaded', {
    name: ruleSet.name,
    version: ruleSet.version,
    rules: ruleSet.rules.length,
    shadowed: ruleSet.shadowed.length,
    path: filePath,
  });
  return ruleSet;
}

export interface IRuleSetSelection {
  /** Explicit artifact path; bypasses directory resolution */
  file?: string;
  version?: string;
  strict?: boolean;
}

/**
 * Load the configured rule set, honouring per-call overrides
 */
export function loadConfiguredRuleSet(
  config: IStoreRouterConfig,
  selection: IRuleSetSelection = {},
): IRuleSet {
  const strict = selection.strict ?? config.strictShadowing;
  if (selection.file) {
    return readRuleSetFile(selection.file, { strict });
  }
  const file = resolveRuleSetFile({
    name: config.ruleSetName,
    version: selection.version ?? config.ruleSetVersion,
    dirs: [config.overrideRulesDir, config.rulesDir],
  });
  return readRuleSetFile(file.path, { strict });
}
