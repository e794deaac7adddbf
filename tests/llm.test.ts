import * as assert from 'assert';
import { MockLanguageModelV2 } from 'ai/test';
import { AiSdkCompletionClient, TURN_TEMPERATURE, toModelMessage } from '../src/services/llm.js';
import type { LLMConfig } from '../src/config.js';
import type { Message } from '../src/types/models.js';

const CONFIG: LLMConfig = {
  provider: 'openai',
  model: 'gpt-4o-mini',
  apiKey: 'test-secret',
  timeoutMs: 5000,
};

const TRANSCRIPT: Message[] = [
  { role: 'system', content: 'You turn questions into SQL.' },
  { role: 'user', content: 'How many users are there?' },
  { role: 'assistant', content: '{"SQL": "SELECT COUNT(*) FROM users;"}' },
  { role: 'user', content: 'SQL Query:\nSELECT COUNT(*) FROM users;\n\nOutput:\n(5)' },
];

function replyingModel(
  text: string,
  inputTokens: number | undefined,
  outputTokens: number | undefined,
  totalTokens: number | undefined
): MockLanguageModelV2 {
  return new MockLanguageModelV2({
    modelId: 'gpt-4o-mini',
    doGenerate: async () => ({
      content: [{ type: 'text', text }],
      finishReason: 'stop',
      usage: { inputTokens, outputTokens, totalTokens },
      warnings: [],
      response: { id: 'resp-1', timestamp: new Date(0), modelId: 'gpt-4o-mini-2024-07-18' },
    }),
  });
}

describe('AiSdkCompletionClient', () => {
  it('should expose the configured provider and model', () => {
    const client = new AiSdkCompletionClient(CONFIG, replyingModel('{}', 1, 1, 2));

    assert.strictEqual(client.provider, 'openai');
    assert.strictEqual(client.model, 'gpt-4o-mini');
  });

  it('should return the reply text, served model and token usage', async () => {
    const model = replyingModel('{"Answer": "There are 5 users."}', 40, 8, 48);
    const client = new AiSdkCompletionClient(CONFIG, model);

    const response = await client.complete(TRANSCRIPT);

    assert.deepStrictEqual(response, {
      content: '{"Answer": "There are 5 users."}',
      model: 'gpt-4o-mini-2024-07-18',
      usage: { prompt_tokens: 40, completion_tokens: 8, total_tokens: 48 },
    });
  });

  it('should send the whole transcript with the turn temperature', async () => {
    const model = replyingModel('{"Answer": "ok"}', 1, 1, 2);
    const client = new AiSdkCompletionClient(CONFIG, model);

    await client.complete(TRANSCRIPT);

    assert.strictEqual(model.doGenerateCalls.length, 1);
    const call = model.doGenerateCalls[0];
    assert.deepStrictEqual(
      call?.prompt.map((message) => message.role),
      ['system', 'user', 'assistant', 'user']
    );
    assert.strictEqual(call?.temperature, TURN_TEMPERATURE);
  });

  it('should count missing usage as zero', async () => {
    const client = new AiSdkCompletionClient(
      CONFIG,
      replyingModel('{"Answer": "ok"}', undefined, undefined, undefined)
    );

    const response = await client.complete(TRANSCRIPT);

    assert.deepStrictEqual(response?.usage, {
      prompt_tokens: 0,
      completion_tokens: 0,
      total_tokens: 0,
    });
  });

  it('should resolve to null when the backend fails', async () => {
    const model = new MockLanguageModelV2({
      doGenerate: async () => {
        throw new Error('503 Service Unavailable');
      },
    });
    const client = new AiSdkCompletionClient(CONFIG, model);

    assert.strictEqual(await client.complete(TRANSCRIPT), null);
    assert.strictEqual(model.doGenerateCalls.length, 1);
  });
});

describe('AiSdkCompletionClient without a prebuilt model', () => {
  it('should resolve to null when the provider cannot be set up', async () => {
    // Config files are untyped JSON; an unknown provider only shows up at run time
    const config: LLMConfig = JSON.parse(
      '{"provider": "mystery", "model": "m-1", "apiKey": "test-secret", "timeoutMs": 5000}'
    );
    const client = new AiSdkCompletionClient(config);

    assert.strictEqual(await client.complete(TRANSCRIPT), null);
  });
});

describe('toModelMessage', () => {
  it('should keep role and content', () => {
    assert.deepStrictEqual(toModelMessage({ role: 'assistant', content: '{"Answer": 1}' }), {
      role: 'assistant',
      content: '{"Answer": 1}',
    });
  });
});
