/**
 * Language Model Client Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LLMLanguageModelClient, toDebateError } from '../src/services/llm/language-model-client.js';
import { LLMError, type CompletionProvider, type LLMRequest, type LLMResponse } from '../src/types/llm.js';
import { GenerationError, TimeoutError, UnavailableError } from '../src/types/errors.js';

function response(content: string): LLMResponse {
  return {
    content,
    model: 'test-model',
    usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
    finishReason: 'stop',
    provider: 'openai',
  };
}

function fakeProvider(content: string = 'Generated text') {
  const complete = vi.fn<(request: LLMRequest) => Promise<LLMResponse>>().mockResolvedValue(response(content));
  const provider: CompletionProvider = { complete };
  return { provider, complete };
}

describe('LLMLanguageModelClient', () => {
  it('should send the system prompt, the transcript and the prompt in order', async () => {
    const { provider, complete } = fakeProvider();
    const client = new LLMLanguageModelClient(provider, 'test-model', 'debater');

    await client.generate(
      'Make your point',
      [
        { side: 'for', text: 'Remote work saves commuting time', round: 1 },
        { side: 'moderator', text: 'Please stay on topic', kind: 'correction' },
      ],
      { system: 'You argue FOR.', timeoutMs: 500, temperature: 0.7, maxTokens: 150 }
    );

    expect(complete).toHaveBeenCalledWith({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'You argue FOR.' },
        {
          role: 'user',
          content: 'Debate so far:\nFOR: Remote work saves commuting time\nMODERATOR: Please stay on topic',
        },
        { role: 'user', content: 'Make your point' },
      ],
      temperature: 0.7,
      maxTokens: 150,
      timeout: 500,
    });
  });

  it('should omit the transcript message when there is no context', async () => {
    const { provider, complete } = fakeProvider();
    const client = new LLMLanguageModelClient(provider, 'test-model', 'stance');

    await client.generate('Generate stances', []);

    expect(complete.mock.calls[0]?.[0].messages).toEqual([
      { role: 'system', content: 'You are a helpful assistant taking part in a structured debate.' },
      { role: 'user', content: 'Generate stances' },
    ]);
  });

  it('should hand the abort signal to the provider', async () => {
    const { provider, complete } = fakeProvider();
    const client = new LLMLanguageModelClient(provider, 'test-model', 'debater');
    const controller = new AbortController();

    await client.generate('Go', [], { signal: controller.signal });

    expect(complete.mock.calls[0]?.[0].signal).toBe(controller.signal);
  });

  it('should trim the generated text', async () => {
    const { provider } = fakeProvider('  Actually, commutes cost hours.\n');
    const client = new LLMLanguageModelClient(provider, 'test-model', 'debater');

    expect(await client.generate('Go', [])).toBe('Actually, commutes cost hours.');
  });

  it('should reject empty output with a GenerationError', async () => {
    const { provider } = fakeProvider('   ');
    const client = new LLMLanguageModelClient(provider, 'test-model', 'debater');

    const failure = client.generate('Go', []);

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow('Empty response from debater model');
  });

  it('should translate provider failures', async () => {
    const { provider, complete } = fakeProvider();
    complete.mockRejectedValue(new LLMError('Request timeout after 500ms', 'timeout'));
    const client = new LLMLanguageModelClient(provider, 'test-model', 'moderator');

    await expect(client.generate('Summarise', [])).rejects.toBeInstanceOf(TimeoutError);
  });
});

describe('toDebateError', () => {
  it.each([
    [new LLMError('slow', 'timeout'), 'timeout'],
    [new LLMError('down', 'unavailable'), 'unavailable'],
    [new LLMError('overloaded', 'server_error', { statusCode: 503 }), 'unavailable'],
    [new LLMError('slow down', 'rate_limit', { statusCode: 429 }), 'unavailable'],
    [new LLMError('no such model', 'not_found', { statusCode: 404 }), 'unavailable'],
    [new LLMError('bad prompt', 'invalid_request', { statusCode: 400 }), 'generation'],
    [new Error('connect ECONNREFUSED 127.0.0.1:11434'), 'unavailable'],
    ['something odd', 'generation'],
  ])('%s -> %s', (error, code) => {
    expect(toDebateError(error).code).toBe(code);
  });

  it('should pass engine errors through unchanged', () => {
    const error = new UnavailableError('model runtime unreachable');
    expect(toDebateError(error)).toBe(error);
  });

  it('should keep the provider error as the cause', () => {
    const cause = new LLMError('slow', 'timeout');
    expect(toDebateError(cause).cause).toBe(cause);
  });
});
