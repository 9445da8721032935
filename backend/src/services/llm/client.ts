/**
 * Provider client for the model runtime
 *
 * One adapter per SDK: an OpenAI-compatible endpoint (a local Ollama server
 * by default) or Anthropic. The client adds per-request timeouts and retries
 * retryable failures with exponential backoff.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import {
  LLMError,
  type CompletionProvider,
  type FinishReason,
  type LLMProviderName,
  type LLMRequest,
  type LLMResponse,
  type RetryConfig,
} from '../../types/llm.js';
import { llmConfig, type LLMConfig } from '../../config/llm.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'LLMClient' });

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 1024;

export interface LLMClientOptions {
  config?: LLMConfig;
  retry?: Partial<RetryConfig>;
}

/**
 * Sends one request through one SDK; failures come back as LLMError
 */
interface ProviderAdapter {
  send(request: LLMRequest): Promise<LLMResponse>;
}

type ErrorClass<T extends Error = Error> = new (...args: never[]) => T;

/**
 * Error classes an SDK throws, most specific first
 */
interface SdkErrorClasses {
  timeout: ErrorClass;
  connection: ErrorClass;
  api: ErrorClass<Error & { status?: number }>;
}

function classifySdkError(error: unknown, sdk: SdkErrorClasses): LLMError {
  if (error instanceof sdk.timeout) {
    return new LLMError(error.message, 'timeout', { cause: error });
  }
  if (error instanceof sdk.connection) {
    return new LLMError(error.message, 'unavailable', { cause: error });
  }
  if (error instanceof sdk.api) {
    const classified = LLMError.fromStatus(error.message, error.status, error);
    if (classified) {
      return classified;
    }
  }
  return LLMError.fromError(error);
}

function abortedError(signal: AbortSignal): LLMError {
  return new LLMError('Request aborted by caller', 'aborted', { cause: signal.reason });
}

function openAIFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'length':
      return 'length';
    case 'content_filter':
      return 'content_filter';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    default:
      return 'stop';
  }
}

function openAICompatibleAdapter(cfg: LLMConfig): ProviderAdapter {
  const client = new OpenAI({ apiKey: cfg.openai.apiKey, baseURL: cfg.openai.baseURL, maxRetries: 0 });
  logger.info({ baseURL: cfg.openai.baseURL }, 'Using OpenAI-compatible endpoint');

  return {
    async send(request) {
      try {
        const completion = await client.chat.completions.create({
          model: request.model,
          messages: request.messages.map((msg) => ({ role: msg.role, content: msg.content })),
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          stream: false,
        }, { signal: request.signal });

        const choice = completion.choices[0];
        if (!choice) {
          throw new LLMError('No completion choices returned', 'server_error');
        }

        return {
          content: choice.message.content ?? '',
          model: completion.model,
          usage: {
            promptTokens: completion.usage?.prompt_tokens ?? 0,
            completionTokens: completion.usage?.completion_tokens ?? 0,
            totalTokens: completion.usage?.total_tokens ?? 0,
          },
          finishReason: openAIFinishReason(choice.finish_reason),
          provider: 'openai',
        };
      } catch (error) {
        throw classifySdkError(error, {
          timeout: OpenAI.APIConnectionTimeoutError,
          connection: OpenAI.APIConnectionError,
          api: OpenAI.APIError,
        });
      }
    },
  };
}

function anthropicAdapter(cfg: LLMConfig): ProviderAdapter {
  if (!cfg.anthropic.apiKey) {
    logger.warn('Anthropic selected but ANTHROPIC_API_KEY is missing');
    return {
      async send() {
        throw new LLMError('Anthropic client not initialized - missing API key', 'authentication');
      },
    };
  }

  const client = new Anthropic({ apiKey: cfg.anthropic.apiKey, baseURL: cfg.anthropic.baseURL, maxRetries: 0 });
  logger.info('Using Anthropic');

  return {
    async send(request) {
      // System prompt travels outside the message list
      const system = request.messages.find((msg) => msg.role === 'system')?.content;
      const messages = request.messages.flatMap((msg) =>
        msg.role === 'user' || msg.role === 'assistant' ? [{ role: msg.role, content: msg.content }] : []
      );

      try {
        const response = await client.messages.create({
          model: request.model,
          system,
          messages,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        }, { signal: request.signal });

        return {
          content: response.content.map((block) => ('text' in block ? block.text : '')).join('\n'),
          model: response.model,
          usage: {
            promptTokens: response.usage.input_tokens,
            completionTokens: response.usage.output_tokens,
            totalTokens: response.usage.input_tokens + response.usage.output_tokens,
          },
          finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
          provider: 'anthropic',
        };
      } catch (error) {
        throw classifySdkError(error, {
          timeout: Anthropic.APIConnectionTimeoutError,
          connection: Anthropic.APIConnectionError,
          api: Anthropic.APIError,
        });
      }
    },
  };
}

export class LLMClient implements CompletionProvider {
  private readonly provider: LLMProviderName;
  private readonly adapter: ProviderAdapter;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;

  constructor(options: LLMClientOptions = {}) {
    const cfg = options.config ?? llmConfig;

    this.provider = cfg.provider;
    this.timeoutMs = cfg.timeoutMs;
    this.retry = { ...cfg.retry, ...options.retry };
    this.adapter = cfg.provider === 'openai' ? openAICompatibleAdapter(cfg) : anthropicAdapter(cfg);
  }

  getProvider(): LLMProviderName {
    return this.provider;
  }

  /**
   * Complete a request, retrying retryable failures.
   * A timed-out attempt is not retried: it has already used the caller's budget.
   * Aborting `request.signal` cancels the attempt in flight and any retry still to come.
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const startTime = Date.now();
    const signal = request.signal;

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) {
        throw abortedError(signal);
      }

      try {
        const response = await this.attempt(request);
        logger.debug({
          model: response.model,
          usage: response.usage,
          finishReason: response.finishReason,
          attempts: attempt + 1,
          durationMs: Date.now() - startTime,
        }, 'Completion received');
        return response;
      } catch (error) {
        if (signal?.aborted) {
          logger.debug({ model: request.model, attempts: attempt + 1 }, 'Completion aborted');
          throw abortedError(signal);
        }

        const llmError = LLMError.fromError(error);
        const canRetry = llmError.retryable && llmError.code !== 'timeout' && attempt < this.retry.maxRetries;

        if (!canRetry) {
          logger.error({
            provider: this.provider,
            model: request.model,
            code: llmError.code,
            statusCode: llmError.statusCode,
            attempts: attempt + 1,
            durationMs: Date.now() - startTime,
          }, `Completion failed: ${llmError.message}`);
          throw llmError;
        }

        const delay = this.backoff(attempt);
        logger.warn({ model: request.model, code: llmError.code, attempt: attempt + 1, delay }, 'Retrying completion');
        await this.wait(delay, signal);
      }
    }
  }

  /**
   * Backoff sleep that ends early when the request is aborted
   */
  private wait(ms: number, signal: AbortSignal | undefined): Promise<void> {
    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private backoff(attempt: number): number {
    const exponential = this.retry.baseDelay * 2 ** attempt;
    const jitter = Math.random() * 0.3 * exponential;
    return Math.min(exponential + jitter, this.retry.maxDelay);
  }

  private async attempt(request: LLMRequest): Promise<LLMResponse> {
    const timeout = request.timeout ?? this.timeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new LLMError(`Request timeout after ${timeout}ms`, 'timeout'));
      }, timeout);
    });

    try {
      return await Promise.race([this.adapter.send(request), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
