/**
 * Completion client using Vercel AI SDK.
 * Supports multiple LLM providers: OpenAI, Anthropic.
 *
 * The backend is stateless, so every call resends the whole transcript.
 * Failures are not retried here; they surface as a `null` completion.
 */

import { generateText } from 'ai';
import type { LanguageModel, ModelMessage } from 'ai';
import type { LLMConfig, LLMProvider } from '../config.js';
import { logger } from '../utils/logger.js';
import { LLMError } from '../types/errors.js';
import type { CompletionResponse, Message } from '../types/models.js';

/**
 * Sampling temperature used for every turn.
 */
export const TURN_TEMPERATURE = 1.0;

/**
 * Contract between the controller and the language model backend.
 */
export interface CompletionClient {
  /** Provider label reported in turn results. */
  readonly provider: string;
  /** Configured model identifier. */
  readonly model: string;
  /**
   * Send the full transcript. Resolves to `null` when the backend could not
   * be reached or answered with an error.
   */
  complete(messages: readonly Message[]): Promise<CompletionResponse | null>;
}

/**
 * Initialize the language model based on the configured provider.
 */
async function initializeModel(config: LLMConfig): Promise<LanguageModel> {
  const { provider, model, apiKey } = config;

  logger.info(`Initializing LLM: ${provider}/${model}`);

  switch (provider) {
    case 'openai': {
      const { createOpenAI } = await import('@ai-sdk/openai');
      return createOpenAI({ apiKey }).chat(model);
    }

    case 'anthropic': {
      const { createAnthropic } = await import('@ai-sdk/anthropic');
      return createAnthropic({ apiKey })(model);
    }

    default:
      throw new LLMError(`Unsupported LLM provider: ${provider}`);
  }
}

/**
 * Map a transcript entry onto the SDK's message union.
 */
export function toModelMessage(message: Message): ModelMessage {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Completion client backed by an AI SDK language model.
 */
export class AiSdkCompletionClient implements CompletionClient {
  readonly provider: LLMProvider;
  readonly model: string;

  private modelInstance: LanguageModel | null;

  /**
   * @param config Provider, model, credential and network timeout
   * @param languageModel Pre-built model; created lazily from `config` when omitted
   */
  constructor(
    private readonly config: LLMConfig,
    languageModel?: LanguageModel
  ) {
    this.provider = config.provider;
    this.model = config.model;
    this.modelInstance = languageModel ?? null;
  }

  private async getModel(): Promise<LanguageModel> {
    if (!this.modelInstance) {
      this.modelInstance = await initializeModel(this.config);
    }
    return this.modelInstance;
  }

  async complete(messages: readonly Message[]): Promise<CompletionResponse | null> {
    try {
      const model = await this.getModel();
      const result = await generateText({
        model,
        messages: messages.map(toModelMessage),
        temperature: TURN_TEMPERATURE,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.config.timeoutMs),
      });

      const promptTokens = result.usage.inputTokens ?? 0;
      const completionTokens = result.usage.outputTokens ?? 0;
      const usage = {
        prompt_tokens: promptTokens,
        completion_tokens: completionTokens,
        total_tokens: result.usage.totalTokens ?? promptTokens + completionTokens,
      };

      logger.info(
        `LLM API call successful - ` +
          `Input: ${usage.prompt_tokens}, ` +
          `Output: ${usage.completion_tokens}`
      );

      return {
        content: result.text,
        model: result.response.modelId,
        usage,
      };
    } catch (error) {
      logger.error({ err: error }, `LLM API call failed (${this.provider}/${this.model})`);
      return null;
    }
  }
}
