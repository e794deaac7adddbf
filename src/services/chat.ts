/**
 * Conversation controller.
 *
 * Owns one chat session against one SQLite database and runs the two-phase
 * turn protocol:
 *
 * 1. the model turns the user's message into a reply that may carry `SQL`;
 * 2. when it does, the statement is executed locally and the model is asked
 *    again to explain the output (`Answer`).
 *
 * Token usage and latency of both phases are merged into one TurnResult.
 */

import { randomBytes } from 'crypto';
import type { CompletionClient } from './llm.js';
import { sqliteExecutor, renderRows } from './database.js';
import type { QueryExecutor } from './database.js';
import type { SessionStore } from './transcript-store.js';
import { loadTaskTemplate, renderSystemPrompt } from './template.js';
import { parseReply, readAnswer, readSql } from './reply-parser.js';
import { logger } from '../utils/logger.js';
import { NO_SQL } from '../types/models.js';
import type {
  CompletionResponse,
  Message,
  QueryOutcome,
  Session,
  SessionSnapshot,
  TokenUsage,
  TurnResult,
} from '../types/models.js';

/**
 * Everything a controller needs, passed explicitly instead of read from
 * process-wide configuration.
 */
export interface ChatControllerOptions {
  /** Backend used for both phases; carries model id and credential. */
  completionClient: CompletionClient;
  /** Durable transcript log. */
  store: SessionStore;
  /** Path of the task template containing the `{db_schema}` placeholder. */
  taskTemplatePath: string;
  /** SQLite file the session chats with. */
  databasePath: string;
  /** Pause between the SQL phase and the explanation phase. */
  interCallDelayMs: number;
  executor?: QueryExecutor;
  sleep?: (ms: number) => Promise<void>;
  /** Millisecond clock used for latency measurement. */
  clock?: () => number;
}

interface TimedCompletion {
  response: CompletionResponse | null;
  latencyMs: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const defaultClock = (): number => performance.now();

/**
 * Generate an opaque, globally unique session identifier.
 */
export function generateSessionId(): string {
  return `session_${randomBytes(32).toString('base64url')}`;
}

/**
 * Build the synthetic user message that feeds query output back to the model.
 * Failed or empty executions produce an empty output section.
 */
export function formatExecutionMessage(sql: string, outcome: QueryOutcome): string {
  const output = outcome.kind === 'rows' ? renderRows(outcome.rows) : '';
  return `SQL Query:\n${sql}\n\nOutput:\n${output}`;
}

/**
 * Add token counts field by field.
 */
export function addTokenUsage(a: TokenUsage, b: TokenUsage): TokenUsage {
  return {
    prompt_tokens: a.prompt_tokens + b.prompt_tokens,
    completion_tokens: a.completion_tokens + b.completion_tokens,
    total_tokens: a.total_tokens + b.total_tokens,
  };
}

export class ChatController {
  private readonly client: CompletionClient;
  private readonly store: SessionStore;
  private readonly executor: QueryExecutor;
  private readonly template: string;
  private readonly interCallDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  private session: Session;
  // Turns and reconfiguration run one at a time, in arrival order
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    options: ChatControllerOptions,
    template: string,
    session: Session
  ) {
    this.client = options.completionClient;
    this.store = options.store;
    this.executor = options.executor ?? sqliteExecutor;
    this.template = template;
    this.interCallDelayMs = options.interCallDelayMs;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? defaultClock;
    this.session = session;
  }

  /**
   * Load the template, capture the schema snapshot, open a new session whose
   * transcript is exactly the system prompt, and persist it.
   */
  static async create(options: ChatControllerOptions): Promise<ChatController> {
    const template = await loadTaskTemplate(options.taskTemplatePath);
    const executor = options.executor ?? sqliteExecutor;

    // Table creation is idempotent, so it runs on every construction
    await bestEffort('ensure transcript schema', () => options.store.ensureSchema());

    const session = await openSession(executor, options.store, template, options.databasePath);
    return new ChatController(options, template, session);
  }

  get sessionId(): string {
    return this.session.id;
  }

  get databasePath(): string {
    return this.session.databasePath;
  }

  get schema(): string {
    return this.session.schema;
  }

  get provider(): string {
    return this.client.provider;
  }

  get model(): string {
    return this.client.model;
  }

  /**
   * Copy of the current transcript.
   */
  get messages(): Message[] {
    return this.session.messages.map((message) => ({ ...message }));
  }

  snapshot(): SessionSnapshot {
    return {
      session_id: this.session.id,
      database_path: this.session.databasePath,
      started_at: this.session.startedAt.toISOString(),
      updated_at: this.session.updatedAt.toISOString(),
      messages: this.messages,
    };
  }

  /**
   * Point the controller at another database.
   *
   * Postcondition: a new schema snapshot is captured, the transcript is reset
   * to a single system message and a new session is opened and persisted.
   * Queued behind any turn in flight.
   */
  reconfigure(databasePath: string): Promise<string> {
    return this.enqueue(async () => {
      this.session = await openSession(this.executor, this.store, this.template, databasePath);
      return this.session.id;
    });
  }

  /**
   * Run one user turn through the protocol.
   *
   * Backend failures resolve to a result with `status: 'error'`.
   *
   * @throws ReplyParseError if a model reply is not a JSON object
   */
  submitTurn(userText: string): Promise<TurnResult> {
    return this.enqueue(() => this.runTurn(userText));
  }

  private enqueue<T>(work: () => Promise<T>): Promise<T> {
    const next = this.queue.then(work);
    // Keep the chain alive after a failed turn; the caller still gets the rejection
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  private async runTurn(userText: string): Promise<TurnResult> {
    const session = this.session;
    const base = {
      session_id: session.id,
      provider: this.client.provider,
    };

    await this.append(session, { role: 'user', content: userText });

    // Phase 1: generate
    const first = await this.timedComplete(session);
    if (!first.response) {
      logger.warn(`Turn failed in phase 1 for ${session.id}`);
      const failed: TurnResult = { ...base, model: this.client.model, status: 'error' };
      return Object.freeze(failed);
    }

    await this.append(session, { role: 'assistant', content: first.response.content });
    const details = parseReply(first.response.content);
    const sql = readSql(details);

    const phaseOne: TurnResult = {
      ...details,
      ...base,
      status: 'ok',
      model: first.response.model,
      latency_ms: first.latencyMs,
      token_usage: first.response.usage,
      // The model's own SQL value stays in the result as given
      ...(sql === undefined ? { SQL: NO_SQL } : {}),
    };

    if (sql === undefined) {
      return Object.freeze(phaseOne);
    }

    // Phase 2: execute and explain
    await this.sleep(this.interCallDelayMs);

    const outcome = await this.executor.execute(session.databasePath, sql);
    if (outcome.kind === 'failed') {
      logger.warn(`Generated SQL failed, explaining empty output: ${outcome.error}`);
    }
    await this.append(session, { role: 'user', content: formatExecutionMessage(sql, outcome) });

    const second = await this.timedComplete(session);
    if (!second.response) {
      logger.warn(`Turn failed in phase 2 for ${session.id}`);
      const failed: TurnResult = { ...phaseOne, status: 'error' };
      return Object.freeze(failed);
    }

    await this.append(session, { role: 'assistant', content: second.response.content });
    const answer = readAnswer(parseReply(second.response.content));

    const explained: TurnResult = {
      ...phaseOne,
      ...(answer === undefined ? {} : { Answer: answer }),
      status: 'ok',
      latency_ms: first.latencyMs + this.interCallDelayMs + second.latencyMs,
      token_usage: addTokenUsage(first.response.usage, second.response.usage),
    };
    return Object.freeze(explained);
  }

  private async timedComplete(session: Session): Promise<TimedCompletion> {
    const start = this.clock();
    const response = await this.client.complete([...session.messages]);
    const latencyMs = Math.round(this.clock() - start);
    return { response, latencyMs };
  }

  private async append(session: Session, message: Message): Promise<void> {
    session.messages.push(message);
    await persist(this.store, session);
  }
}

/**
 * Capture the schema, build the system prompt and register a fresh session.
 */
async function openSession(
  executor: QueryExecutor,
  store: SessionStore,
  template: string,
  databasePath: string
): Promise<Session> {
  const schema = await executor.extractSchema(databasePath);
  const now = new Date();
  const session: Session = {
    id: generateSessionId(),
    databasePath,
    schema,
    messages: [{ role: 'system', content: renderSystemPrompt(template, schema) }],
    startedAt: now,
    updatedAt: now,
  };

  await bestEffort('create session', () => store.createSession(session.id));
  await persist(store, session);

  logger.info(`Opened ${session.id} on ${databasePath}`);
  return session;
}

async function persist(store: SessionStore, session: Session): Promise<void> {
  session.updatedAt = new Date();
  await bestEffort('persist transcript', () =>
    store.updateSession(session.id, session.messages)
  );
}

/**
 * Store writes never block a turn: failures are logged and the turn goes on.
 */
async function bestEffort(action: string, work: () => Promise<void>): Promise<void> {
  try {
    await work();
  } catch (error) {
    logger.error({ err: error }, `Failed to ${action}`);
  }
}
