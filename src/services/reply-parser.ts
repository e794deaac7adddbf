/**
 * Parsing of model replies.
 *
 * The task template asks the model to answer with a JSON object. Models often
 * wrap that object in a markdown code fence (with or without a `json` label),
 * so the fence markers are stripped before parsing. Anything that is still not
 * a JSON object is a hard failure for the call.
 */

import type { ReplyDetails } from '../types/models.js';
import { isJsonObject } from '../types/utils.js';
import type { JsonValue } from '../types/utils.js';
import { ReplyParseError } from '../types/errors.js';

const FENCE_MARKER = /```(?:json)?/gi;

/**
 * Remove every markdown fence marker from a reply.
 */
export function stripCodeFence(content: string): string {
  return content.replace(FENCE_MARKER, '').trim();
}

/**
 * Parse a raw reply into its fields.
 *
 * @throws ReplyParseError if the text is not a JSON object
 */
export function parseReply(content: string): ReplyDetails {
  const stripped = stripCodeFence(content);

  let parsed: JsonValue;
  try {
    parsed = JSON.parse(stripped);
  } catch (error) {
    throw new ReplyParseError(`Model reply is not valid JSON: ${error}`, content);
  }

  if (!isJsonObject(parsed)) {
    throw new ReplyParseError('Model reply must be a JSON object', content);
  }
  return parsed;
}

/**
 * Statement text of the reply's `SQL` field, or undefined when the reply has
 * no such field. Non-string values are passed on as their JSON text, which
 * then fails at execution like any other bad statement.
 */
export function readSql(details: ReplyDetails): string | undefined {
  if (!Object.prototype.hasOwnProperty.call(details, 'SQL')) {
    return undefined;
  }
  const sql = details.SQL;
  return typeof sql === 'string' ? sql : JSON.stringify(sql);
}

/**
 * Natural language answer from an explanation reply, if any.
 */
export function readAnswer(details: ReplyDetails): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(details, 'Answer') ? details.Answer : undefined;
}
