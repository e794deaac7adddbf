/**
 * Custom error classes for sqlchat.
 */

/**
 * Error thrown when the language model backend cannot be reached or
 * answers with a non-2xx status.
 */
export class LLMError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LLMError';
    Object.setPrototypeOf(this, LLMError.prototype);
  }
}

/**
 * Error thrown when a model reply is not a JSON object after fence stripping.
 * Carries the raw reply so callers can log what the model actually said.
 */
export class ReplyParseError extends Error {
  public readonly content: string;

  constructor(message: string, content: string) {
    super(message);
    this.name = 'ReplyParseError';
    this.content = content;
    Object.setPrototypeOf(this, ReplyParseError.prototype);
  }
}

/**
 * Error thrown when the target database cannot be opened or introspected.
 */
export class SQLExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SQLExecutionError';
    Object.setPrototypeOf(this, SQLExecutionError.prototype);
  }
}

/**
 * Error thrown when the transcript log cannot be written or read.
 */
export class TranscriptStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptStoreError';
    Object.setPrototypeOf(this, TranscriptStoreError.prototype);
  }
}

/**
 * Error thrown when the task template is missing or has no schema placeholder.
 */
export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
    Object.setPrototypeOf(this, TemplateError.prototype);
  }
}

/**
 * Error thrown when environment configuration fails validation.
 */
export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}
