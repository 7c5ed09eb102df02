import { VALID_STORAGE_BACKENDS } from '../constants.js';
import type { MatchMode, StorageBackend } from '../types.js';

export function isStorageBackend(value: unknown): value is StorageBackend {
  return VALID_STORAGE_BACKENDS.some((backend) => backend === value);
}

/**
 * Deduplicate and sort into the canonical backend order
 */
export function canonicalizeTargets(targets: Iterable<StorageBackend>): StorageBackend[] {
  const present = new Set(targets);
  return VALID_STORAGE_BACKENDS.filter((backend) => present.has(backend));
}

/**
 * Compare a predicted target set against an expected one.
 * exact: same set. covers: every expected backend was predicted.
 */
export function targetsMatch(
  predicted: readonly StorageBackend[],
  expected: readonly StorageBackend[],
  mode: MatchMode,
): boolean {
  const predictedSet = new Set(predicted);
  const covers = expected.every((backend) => predictedSet.has(backend));
  if (mode === 'covers') return covers;
  return covers && new Set(expected).size === predictedSet.size;
}

export function formatTargets(targets: readonly StorageBackend[]): string {
  return targets.length > 0 ? targets.join(', ') : '(none)';
}
