import 'reflect-metadata';

import { injectable } from 'tsyringe';

import { RuleSetIntegrityError } from '../errors.js';
import type { IRuleSet } from '../types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('rule-set-handle');

export type RuleSetLoader = () => IRuleSet | Promise<IRuleSet>;

/**
 * Holds the active rule set snapshot. Publishing swaps the reference in one
 * assignment; readers that already took a snapshot keep using it.
 */
@injectable()
export class RuleSetHandle {
  private snapshot: IRuleSet | null = null;

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  /**
   * The active snapshot. Throws when nothing has been published yet.
   */
  current(): IRuleSet {
    if (this.snapshot === null) {
      throw new RuleSetIntegrityError('NOT_LOADED', 'No rule set has been loaded');
    }
    return this.snapshot;
  }

  /** Returns the snapshot that was replaced, if any */
  publish(ruleSet: IRuleSet): IRuleSet | null {
    const previous = this.snapshot;
    this.snapshot = ruleSet;
    log.info('Rule set published', {
      name: ruleSet.name,
      version: ruleSet.version,
      previous: previous?.version,
    });
    return previous;
  }

  /**
   * Build a new snapshot and publish it. On failure the previous snapshot
   * stays active and the error is rethrown.
   */
  async reload(loader: RuleSetLoader): Promise<IRuleSet> {
    try {
      const next = await loader();
      this.publish(next);
      return next;
    } catch (error) {
      log.error('Rule set reload failed; keeping previous snapshot', {
        active: this.snapshot?.version,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}
