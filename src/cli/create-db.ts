/**
 * Create a SQLite database from a SQL script.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import * as logger from './logger.js';

/**
 * Location of the database created for a data handle.
 */
export function databasePathFor(handle: string, dataDir: string = './data'): string {
  return join(dataDir, handle, 'data.sqlite');
}

/**
 * Create `<dataDir>/<handle>/data.sqlite`, replacing any existing file, and
 * run every statement of the script against it.
 *
 * @returns Path of the created database
 */
export function createDatabase(
  handle: string,
  scriptPath: string,
  dataDir: string = './data'
): string {
  const script = readFileSync(scriptPath, 'utf-8');
  const dbPath = databasePathFor(handle, dataDir);

  mkdirSync(join(dataDir, handle), { recursive: true });
  if (existsSync(dbPath)) {
    rmSync(dbPath);
  }

  const db = new Database(dbPath);
  try {
    db.exec(script);
  } finally {
    db.close();
  }
  return dbPath;
}

/**
 * CLI wrapper with progress output.
 */
export function runCreateDatabase(handle: string, scriptPath: string): void {
  const spin = logger.progress(`Creating database "${handle}" from ${scriptPath}...`);
  try {
    const dbPath = createDatabase(handle, scriptPath);
    spin.succeed('Database created');
    logger.panel('sqlchat', [
      ['Database', dbPath],
      ['Serve it', `sqlchat serve ${dbPath}`],
    ]);
  } catch (error) {
    spin.fail('Error while creating database');
    throw error;
  }
}
