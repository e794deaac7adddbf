/**
 * Type definitions and Zod schemas for chat sessions and turn results.
 */

import { z } from 'zod';
import type { JsonObject, JsonValue, RowValues } from './utils.js';

// ============================================================================
// TRANSCRIPT
// ============================================================================

export const MessageRoleSchema = z.enum(['system', 'user', 'assistant']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

/**
 * One entry of a session transcript.
 */
export const MessageSchema = z.object({
	role: MessageRoleSchema,
	content: z.string(),
});
export type Message = z.infer<typeof MessageSchema>;

export const TranscriptSchema = z.array(MessageSchema);

/**
 * In-memory state of the session owned by one controller.
 * The first message is always the system prompt.
 */
export interface Session {
	readonly id: string;
	readonly databasePath: string;
	readonly schema: string;
	readonly messages: Message[];
	readonly startedAt: Date;
	updatedAt: Date;
}

/**
 * Read-only view of a session handed out to callers.
 */
export interface SessionSnapshot {
	session_id: string;
	database_path: string;
	started_at: string;
	updated_at: string;
	messages: Message[];
}

// ============================================================================
// BACKEND COMPLETIONS
// ============================================================================

/**
 * Token accounting for one or more backend calls.
 * Declared as a type alias so it stays assignable to JsonObject.
 */
export type TokenUsage = {
	prompt_tokens: number;
	completion_tokens: number;
	total_tokens: number;
};

/**
 * A successful backend reply.
 */
export interface CompletionResponse {
	/** Raw text of the first choice, usually JSON wrapped in a code fence. */
	content: string;
	/** Model identifier the backend actually served. */
	model: string;
	usage: TokenUsage;
}

// ============================================================================
// QUERY EXECUTION
// ============================================================================

/**
 * Discriminated union for the outcome of one executed statement.
 */
export type QueryOutcome =
	| { readonly kind: 'rows'; readonly columns: string[]; readonly rows: RowValues[] }
	| { readonly kind: 'committed' }
	| { readonly kind: 'failed'; readonly error: string };

// ============================================================================
// TURN RESULTS
// ============================================================================

export type TurnStatus = 'ok' | 'error';

/**
 * Sentinel stored in the SQL field when the model reply has no SQL field.
 */
export const NO_SQL = 'N/A';

/**
 * The single record returned for each user turn.
 *
 * Besides the fixed keys it carries every other field the model put in its
 * first reply, so the index signature stays open.
 */
export type TurnResult = {
	readonly session_id: string;
	readonly provider: string;
	readonly status: TurnStatus;
	readonly model: string;
	readonly latency_ms?: number;
	readonly token_usage?: TokenUsage;
	readonly SQL?: JsonValue;
	readonly Answer?: JsonValue;
	readonly [field: string]: JsonValue | undefined;
};

/**
 * Fields parsed out of a model reply.
 */
export type ReplyDetails = JsonObject;

// ============================================================================
// HTTP PAYLOADS
// ============================================================================

/**
 * Request body for POST /api/chat.
 */
export const ChatRequestSchema = z.object({
	message: z.string().min(1).describe('Natural language message from the user'),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;

/**
 * Request body for POST /api/session/database.
 */
export const ReconfigureRequestSchema = z.object({
	database_path: z.string().min(1).describe('Path to the SQLite database to chat with'),
});
export type ReconfigureRequest = z.infer<typeof ReconfigureRequestSchema>;
