/**
 * SQLite database client for store-router.
 * Opens (or creates) the run history database at <state dir>/state.db
 * with WAL journal mode and busy_timeout applied.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import Database from 'better-sqlite3';

import { GLOBAL_CONFIG_DIR, STATE_DB_FILE_NAME } from '../../constants.js';

/**
 * Directory holding global state. STORE_ROUTER_HOME overrides ~/.store-router
 */
export function getStateDir(): string {
  return process.env.STORE_ROUTER_HOME || path.join(os.homedir(), GLOBAL_CONFIG_DIR);
}

function openDb(dbPath: string): Database.Database {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  return db;
}

/**
 * Open `<dir>/state.db`. Callers own the returned instance.
 */
export function createDbForDir(dir: string): Database.Database {
  return openDb(path.join(dir, STATE_DB_FILE_NAME));
}
