/**
 * Configuration management using Zod for validation.
 */

import { z } from 'zod';
import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { existsSync } from 'fs';
import { ConfigError } from './types/errors.js';

// Get directory name in ES modules
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// Sources live in src/, compiled output in dist/src/
export const rootDir = existsSync(join(__dirname, '..', 'package.json'))
  ? join(__dirname, '..')
  : join(__dirname, '..', '..');

// Load .env file if it exists
const envPath = join(rootDir, '.env');
if (existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export const LogLevelSchema = z
  .enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL', 'SILENT'])
  .default('INFO');

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LLMProviderSchema = z.enum(['openai', 'anthropic']);
export type LLMProvider = z.infer<typeof LLMProviderSchema>;

/**
 * Configuration schema with validation and defaults.
 */
const ConfigSchema = z.object({
  // LLM Provider Configuration
  LLM_PROVIDER: LLMProviderSchema.default('openai'),
  LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  // API Keys (provider-specific)
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),

  // Database Configuration
  DATABASE_PATH: z.string().optional(),
  MESSAGE_LOGS_PATH: z.string().default('./data/message_logs.sqlite'),
  TASK_TEMPLATE_PATH: z.string().default(join(rootDir, 'llm_task_template.md')),

  // Turn protocol
  INTER_CALL_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),

  // Server Configuration
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: LogLevelSchema,
});

/**
 * Type for base configuration object.
 */
type BaseConfig = z.infer<typeof ConfigSchema>;

/**
 * Credentials and model selection for the completion backend.
 */
export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeoutMs: number;
}

/**
 * Extended configuration with the provider-specific LLM_CONFIG resolved.
 */
export interface Config extends Omit<BaseConfig,
  'LLM_PROVIDER' | 'LLM_MODEL' | 'LLM_TIMEOUT_MS' | 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'
> {
  LLM_CONFIG: LLMConfig;
}

/**
 * Parse and validate configuration from environment variables.
 *
 * @throws ConfigError listing every failed field
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const baseConfig = parsed.data;

  // Determine API key based on provider
  let apiKey: string | undefined;
  switch (baseConfig.LLM_PROVIDER) {
    case 'openai':
      apiKey = baseConfig.OPENAI_API_KEY;
      break;
    case 'anthropic':
      apiKey = baseConfig.ANTHROPIC_API_KEY;
      break;
  }

  if (!apiKey) {
    const keyName = `${baseConfig.LLM_PROVIDER.toUpperCase()}_API_KEY`;
    throw new ConfigError([
      `${keyName}: required when LLM_PROVIDER is ${baseConfig.LLM_PROVIDER}`,
    ]);
  }

  const {
    LLM_PROVIDER,
    LLM_MODEL,
    LLM_TIMEOUT_MS,
    OPENAI_API_KEY,
    ANTHROPIC_API_KEY,
    ...rest
  } = baseConfig;

  return {
    ...rest,
    LLM_CONFIG: {
      provider: LLM_PROVIDER,
      model: LLM_MODEL,
      apiKey,
      timeoutMs: LLM_TIMEOUT_MS,
    },
  };
}
