/**
 * Durable log of session transcripts.
 *
 * One row per session in a `sessions` table of its own SQLite file. Rows are
 * never deleted; sessions accumulate for auditing.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Knex } from 'knex';
import { openDatabase } from './database.js';
import { logger } from '../utils/logger.js';
import { TranscriptStoreError } from '../types/errors.js';
import { TranscriptSchema } from '../types/models.js';
import type { Message } from '../types/models.js';

const SESSIONS_TABLE = 'sessions';

/**
 * Shape of a row in the sessions table.
 */
interface SessionRow {
  id: number;
  session_id: string;
  message_log: string | null;
  started_at: string;
  updated_at: string | null;
}

/**
 * A session as read back from the log.
 */
export interface StoredSession {
  sessionId: string;
  messages: Message[];
  startedAt: string;
  updatedAt: string | null;
}

/**
 * Persistence contract the controller writes through.
 */
export interface SessionStore {
  ensureSchema(): Promise<void>;
  createSession(sessionId: string): Promise<void>;
  updateSession(sessionId: string, messages: readonly Message[]): Promise<void>;
  getSession(sessionId: string): Promise<StoredSession | undefined>;
  close(): Promise<void>;
}

/**
 * Knex-backed transcript store.
 */
export class TranscriptStore implements SessionStore {
  private readonly db: Knex;

  constructor(private readonly logsPath: string) {
    if (logsPath !== ':memory:') {
      mkdirSync(dirname(logsPath), { recursive: true });
    }
    this.db = openDatabase(logsPath);
  }

  /**
   * Create the sessions table if it does not exist yet. Safe to call on
   * every start.
   */
  async ensureSchema(): Promise<void> {
    try {
      const exists = await this.db.schema.hasTable(SESSIONS_TABLE);
      if (exists) {
        return;
      }
      await this.db.schema.createTable(SESSIONS_TABLE, (table) => {
        table.increments('id');
        table.string('session_id').notNullable().unique();
        table.text('message_log');
        table.dateTime('started_at').notNullable().defaultTo(this.db.fn.now());
        table.dateTime('updated_at');
      });
      logger.info(`Created ${SESSIONS_TABLE} table in ${this.logsPath}`);
    } catch (error) {
      throw new TranscriptStoreError(`Failed to create ${SESSIONS_TABLE} table: ${error}`);
    }
  }

  async createSession(sessionId: string): Promise<void> {
    try {
      await this.db<SessionRow>(SESSIONS_TABLE).insert({ session_id: sessionId });
    } catch (error) {
      throw new TranscriptStoreError(`Failed to create session ${sessionId}: ${error}`);
    }
  }

  /**
   * Replace the stored transcript and refresh `updated_at`.
   */
  async updateSession(sessionId: string, messages: readonly Message[]): Promise<void> {
    let updated: number;
    try {
      updated = await this.db<SessionRow>(SESSIONS_TABLE)
        .where({ session_id: sessionId })
        .update({
          message_log: JSON.stringify(messages, null, 4),
          updated_at: this.db.fn.now(),
        });
    } catch (error) {
      throw new TranscriptStoreError(`Failed to update session ${sessionId}: ${error}`);
    }

    if (updated === 0) {
      throw new TranscriptStoreError(`Unknown session: ${sessionId}`);
    }
  }

  async getSession(sessionId: string): Promise<StoredSession | undefined> {
    let row: SessionRow | undefined;
    try {
      row = await this.db<SessionRow>(SESSIONS_TABLE)
        .where({ session_id: sessionId })
        .first();
    } catch (error) {
      throw new TranscriptStoreError(`Failed to read session ${sessionId}: ${error}`);
    }

    if (!row) {
      return undefined;
    }

    let stored: unknown;
    try {
      stored = row.message_log === null ? [] : JSON.parse(row.message_log);
    } catch (error) {
      throw new TranscriptStoreError(`Stored transcript for ${sessionId} is not JSON: ${error}`);
    }

    const parsed = TranscriptSchema.safeParse(stored);
    if (!parsed.success) {
      throw new TranscriptStoreError(`Stored transcript for ${sessionId} is malformed`);
    }

    return {
      sessionId: row.session_id,
      messages: parsed.data,
      startedAt: row.started_at,
      updatedAt: row.updated_at,
    };
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
