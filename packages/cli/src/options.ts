/**
 * Option parsing shared by the store-router commands
 */

import * as path from 'path';

import { type IRuleSetSelection, error as uiError } from '@store-router/core';

/** Flags every rule-set-reading command accepts */
export interface IRuleSetFlags {
  rules?: string;
  ruleVersion?: string;
  strict?: boolean;
}

export function parseChoice<T extends string>(flag: string, value: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new Error(`Invalid ${flag} "${value}"; expected one of ${choices.join(', ')}`);
  }
  return match;
}

/**
 * Positive integer, e.g. --runs or --concurrency
 */
export function parseCount(flag: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new Error(`Invalid ${flag} "${value}"; expected a positive integer`);
  }
  return parsed;
}

/**
 * Accuracy threshold as a fraction between 0 and 1
 */
export function parseThreshold(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`Invalid --threshold "${value}"; expected a number between 0 and 1`);
  }
  return parsed;
}

export function ruleSetSelection(projectDir: string, flags: IRuleSetFlags): IRuleSetSelection {
  return {
    file: flags.rules ? path.resolve(projectDir, flags.rules) : undefined,
    version: flags.ruleVersion,
    strict: flags.strict,
  };
}

/**
 * Print the error with a red cross and exit 1
 */
export function exitWithError(err: unknown): never {
  uiError(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
