/**
 * Query executor for the SQLite database a session chats with.
 *
 * Every call opens its own connection and closes it afterwards, so no
 * connection state is shared between statements or sessions.
 */

import knex, { Knex } from 'knex';
import Database from 'better-sqlite3';
import { SchemaInspector } from 'knex-schema-inspector';
import { existsSync } from 'fs';
import { logger } from '../utils/logger.js';
import { SQLExecutionError } from '../types/errors.js';
import type { QueryOutcome } from '../types/models.js';
import { isRow, isRowValues } from '../types/utils.js';
import type { Row, RowValues, SqlParam } from '../types/utils.js';

/**
 * Statements starting with one of these verbs return rows.
 */
const READ_VERBS = ['select', 'with', 'pragma', 'explain'] as const;

/**
 * Executes statements and captures schema snapshots.
 * The controller depends on this interface so tests can observe calls.
 */
export interface QueryExecutor {
  execute(
    databasePath: string,
    statement: string,
    params?: readonly SqlParam[]
  ): Promise<QueryOutcome>;
  extractSchema(databasePath: string): Promise<string>;
}

/**
 * Open a fresh Knex instance on a SQLite file.
 */
export function openDatabase(databasePath: string): Knex {
  return knex({
    client: 'better-sqlite3',
    connection: {
      filename: databasePath,
    },
    useNullAsDefault: true,
  });
}

async function withDatabase<T>(
  databasePath: string,
  work: (db: Knex) => Promise<T>
): Promise<T> {
  const db = openDatabase(databasePath);
  try {
    return await work(db);
  } finally {
    await db.destroy();
  }
}

/**
 * Classify a statement as a read (returns rows) or a write (committed).
 */
export function isReadStatement(statement: string): boolean {
  const normalized = statement.trim().toLowerCase();
  return READ_VERBS.some((verb) => normalized.startsWith(verb));
}

/**
 * Knex hands back the driver's raw result; for better-sqlite3 readers that is
 * an array of row objects.
 */
function toRows(result: unknown): Row[] {
  if (!Array.isArray(result)) {
    return [];
  }
  return result.filter(isRow);
}

/**
 * Execute one statement inside a transaction.
 *
 * Reads return the column names and every row as a positional array, so
 * joins keep columns that share a name. Writes are committed. Any failure
 * rolls the transaction back and is reported as a `failed` outcome instead
 * of being thrown.
 *
 * Runs on better-sqlite3 directly: Knex only hands out rows keyed by column.
 */
export async function executeStatement(
  databasePath: string,
  statement: string,
  params: readonly SqlParam[] = []
): Promise<QueryOutcome> {
  let db: Database.Database | undefined;
  try {
    db = new Database(databasePath, { fileMustExist: true });
    return runInTransaction(db, statement, params);
  } catch (error) {
    logger.error({ err: error, statement }, 'Database error, transaction rolled back');
    return {
      kind: 'failed',
      error: error instanceof Error ? error.message : String(error),
    };
  } finally {
    db?.close();
  }
}

function runInTransaction(
  db: Database.Database,
  statement: string,
  params: readonly SqlParam[]
): QueryOutcome {
  return db.transaction((): QueryOutcome => {
    const prepared = db.prepare(statement);

    if (isReadStatement(statement)) {
      if (!prepared.reader) {
        prepared.run(...params);
        return { kind: 'rows', columns: [], rows: [] };
      }
      const columns = prepared.columns().map((column) => column.name);
      const rows = prepared.raw(true).all(...params).filter(isRowValues);
      logger.debug(`Read ${rows.length} rows: ${statement}`);
      return { kind: 'rows', columns, rows };
    }

    // RETURNING makes a write a reader; its rows are not reported
    if (prepared.reader) {
      prepared.all(...params);
    } else {
      prepared.run(...params);
    }
    logger.debug(`Committed: ${statement}`);
    return { kind: 'committed' };
  })();
}

/**
 * Capture the schema snapshot: every table definition from the catalog,
 * newline-joined in catalog order.
 *
 * @throws SQLExecutionError if the file does not exist or cannot be read
 */
export async function extractSchema(databasePath: string): Promise<string> {
  // better-sqlite3 would silently create a missing file
  if (!existsSync(databasePath)) {
    throw new SQLExecutionError(`Database file not found: ${databasePath}`);
  }

  try {
    return await withDatabase(databasePath, async (db) => {
      const result: unknown = await db.raw(
        "SELECT sql FROM sqlite_master WHERE type = 'table'"
      );
      return toRows(result)
        .map((row) => row.sql)
        .filter((sql): sql is string => typeof sql === 'string')
        .join('\n');
    });
  } catch (error) {
    throw new SQLExecutionError(`Failed to read schema from ${databasePath}: ${error}`);
  }
}

/**
 * Get all user table names using schema inspector.
 */
export async function listTables(databasePath: string): Promise<string[]> {
  return withDatabase(databasePath, async (db) => {
    const inspector = SchemaInspector(db);
    return inspector.tables();
  });
}

/**
 * Render a single value the way it appears in the transcript.
 */
export function renderValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'NULL';
  }
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  if (Buffer.isBuffer(value)) {
    return `<blob ${value.length} bytes>`;
  }
  if (value instanceof Date) {
    return `'${value.toISOString()}'`;
  }
  return JSON.stringify(value);
}

/**
 * Render rows one per line as `(v1, v2, ...)`.
 */
export function renderRows(rows: readonly RowValues[]): string {
  return rows.map((row) => `(${row.map(renderValue).join(', ')})`).join('\n');
}

/**
 * Default executor backed by SQLite files.
 */
export const sqliteExecutor: QueryExecutor = {
  execute: executeStatement,
  extractSchema,
};
