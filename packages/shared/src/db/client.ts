import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import Database from 'better-sqlite3';
import type { RunResult } from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { BaseSQLiteDatabase } from 'drizzle-orm/sqlite-core';
import * as schema from './schema.js';
import { PersistenceError, toErrorMessage } from '../errors.js';

export type PublishDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Either the connection itself or an open transaction on it
 */
export type DatabaseExecutor = BaseSQLiteDatabase<'sync', RunResult, typeof schema>;

export interface DatabaseConnection {
  db: PublishDatabase;
  close(): void;
}

const SCHEMA_PATH = fileURLToPath(new URL('../../sql/schema.sql', import.meta.url));

/**
 * Open a dedicated connection to the content store
 */
export function openDatabase(dbPath: string): DatabaseConnection {
  let sqlite: Database.Database;
  try {
    sqlite = new Database(dbPath);
    sqlite.pragma('journal_mode = WAL');
    sqlite.pragma('foreign_keys = ON');
    sqlite.pragma('busy_timeout = 5000');
  } catch (error) {
    throw new PersistenceError(`Failed to open database at ${dbPath}: ${toErrorMessage(error)}`, { dbPath }, error);
  }

  const handle = sqlite;
  return {
    db: drizzle(handle, { schema }),
    close: () => handle.close(),
  };
}

/**
 * Run `work` on a fresh connection and close it afterwards, whatever the outcome
 */
export async function withDatabase<T>(
  dbPath: string,
  work: (db: PublishDatabase) => Promise<T> | T
): Promise<T> {
  const connection = openDatabase(dbPath);
  try {
    return await work(connection.db);
  } finally {
    connection.close();
  }
}

/**
 * Create the tables if they are missing
 */
export async function applySchema(dbPath: string): Promise<void> {
  const ddl = await fs.readFile(SCHEMA_PATH, 'utf-8');
  let sqlite: Database.Database | undefined;
  try {
    sqlite = new Database(dbPath);
    sqlite.exec(ddl);
  } catch (error) {
    throw new PersistenceError(`Failed to apply schema to ${dbPath}: ${toErrorMessage(error)}`, { dbPath }, error);
  } finally {
    sqlite?.close();
  }
}

export { schema };
