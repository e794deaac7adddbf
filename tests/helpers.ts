/**
 * Shared fixtures: temp directories, small SQLite databases and a
 * scripted completion client.
 */

import Database from 'better-sqlite3';
import * as sinon from 'sinon';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { CompletionClient } from '../src/services/llm.js';
import type { CompletionResponse, Message, TokenUsage } from '../src/types/models.js';

export const USERS_TABLE_SQL = 'CREATE TABLE users (id INTEGER PRIMARY KEY, name TEXT NOT NULL)';
export const PRODUCTS_TABLE_SQL = 'CREATE TABLE products (id INTEGER PRIMARY KEY, title TEXT)';
export const TEMPLATE_TEXT = 'You turn questions into SQL.\n{db_schema}\nReply in JSON.';
export const SERVED_MODEL = 'gpt-4o-mini-2024-07-18';

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'sqlchat-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Create `users` with `count` rows named user-1..user-N.
 */
export function createUsersDatabase(dir: string, count: number = 5): string {
  const dbPath = join(dir, 'users.sqlite');
  const db = new Database(dbPath);
  try {
    db.exec(USERS_TABLE_SQL);
    const insert = db.prepare('INSERT INTO users (name) VALUES (?)');
    for (let i = 1; i <= count; i++) {
      insert.run(`user-${i}`);
    }
  } finally {
    db.close();
  }
  return dbPath;
}

export function createProductsDatabase(dir: string): string {
  const dbPath = join(dir, 'products.sqlite');
  const db = new Database(dbPath);
  try {
    db.exec(PRODUCTS_TABLE_SQL);
  } finally {
    db.close();
  }
  return dbPath;
}

export function countUsers(dbPath: string): number {
  const db = new Database(dbPath, { readonly: true });
  try {
    const row = db.prepare('SELECT COUNT(*) AS total FROM users').get();
    return typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number'
      ? row.total
      : -1;
  } finally {
    db.close();
  }
}

export function writeTemplate(dir: string, text: string = TEMPLATE_TEXT): string {
  const templatePath = join(dir, 'template.md');
  writeFileSync(templatePath, text);
  return templatePath;
}

export function usage(prompt: number, completion: number): TokenUsage {
  return {
    prompt_tokens: prompt,
    completion_tokens: completion,
    total_tokens: prompt + completion,
  };
}

export function completion(content: string, tokens: TokenUsage): CompletionResponse {
  return { content, model: SERVED_MODEL, usage: tokens };
}

/**
 * Manually advanced millisecond clock.
 */
export class FakeClock {
  private current = 0;

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface ScriptedStep {
  reply: CompletionResponse | null;
  /** Milliseconds the call takes on the fake clock. */
  latency?: number;
}

/**
 * Completion client that answers each call with the next scripted step.
 */
export function scriptedClient(steps: ScriptedStep[], clock?: FakeClock) {
  const complete = sinon.stub<[readonly Message[]], Promise<CompletionResponse | null>>();
  steps.forEach((step, index) => {
    complete.onCall(index).callsFake(async () => {
      clock?.advance(step.latency ?? 0);
      return step.reply;
    });
  });

  const client: CompletionClient = {
    provider: 'openai',
    model: 'gpt-4o-mini',
    complete,
  };
  return { client, complete };
}
