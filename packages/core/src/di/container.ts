/**
 * DI composition root for store-router.
 * Bootstraps the tsyringe container with the SQLite run history database,
 * the validation run repository and the decision engine singletons.
 */

import 'reflect-metadata';

import { container } from 'tsyringe';

import { DecisionEngine } from '../engine/decision-engine.js';
import { RuleSetHandle } from '../engine/rule-set-handle.js';
import { SqliteValidationRunRepository } from '../storage/repositories/sqlite/validation-run.repository.js';
import { createDbForDir } from '../storage/sqlite/client.js';
import { runMigrations } from '../storage/sqlite/migrations.js';

/** Opaque DB type inferred from the storage factory */
type DbInstance = ReturnType<typeof createDbForDir>;

/** Token used to inject the raw better-sqlite3 Database instance. */
export const DATABASE_TOKEN = 'Database';

/**
 * Initialize the DI container with the SQLite database rooted at `stateDir`.
 * Subsequent calls are no-ops while the Database token is registered.
 */
export function initContainer(stateDir: string): void {
  if (container.isRegistered(DATABASE_TOKEN)) {
    return;
  }

  const db = createDbForDir(stateDir);
  runMigrations(db);

  container.registerInstance<DbInstance>(DATABASE_TOKEN, db);
  container.registerSingleton(SqliteValidationRunRepository);
  container.registerSingleton(RuleSetHandle);
  container.registerSingleton(DecisionEngine);
}

export function isContainerInitialized(): boolean {
  return container.isRegistered(DATABASE_TOKEN);
}

/**
 * Close the registered database and clear every registration
 */
export function resetContainer(): void {
  if (container.isRegistered(DATABASE_TOKEN)) {
    container.resolve<DbInstance>(DATABASE_TOKEN).close();
  }
  container.reset();
}

export { container };
