/**
 * Language Model Client
 *
 * The seam the debate engine talks through: a prompt plus the ordered
 * transcript in, generated text out. Provider failures are translated into
 * the engine's error taxonomy here so nothing above this layer sees LLMError.
 */

import type { Turn } from '../../types/debate.js';
import type { CompletionProvider, ChatMessage } from '../../types/llm.js';
import { LLMError } from '../../types/llm.js';
import { GenerationError, TimeoutError, UnavailableError, isDebateError, type DebateError } from '../../types/errors.js';
import { formatTranscript } from '../agents/prompts/transcript.js';
import { loggers } from '../logging/index.js';

/**
 * Per-call generation options
 */
export interface GenerateOptions {
  /** System prompt for this call */
  system?: string;
  /** Caller-enforced timeout in milliseconds */
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
  /** Debate the call belongs to, for logging */
  debateId?: string;
  /** Template the prompt was built from, for logging */
  promptId?: string;
  /** Cancels the call; the caller stops waiting and the provider stops retrying */
  signal?: AbortSignal;
}

/**
 * Generates text from a prompt and the debate so far.
 * Rejects with UnavailableError, TimeoutError or GenerationError.
 */
export interface LanguageModelClient {
  generate(prompt: string, context: readonly Turn[], options?: GenerateOptions): Promise<string>;
}

const DEFAULT_SYSTEM_PROMPT = 'You are a helpful assistant taking part in a structured debate.';

/**
 * Map a provider error onto the engine taxonomy
 */
export function toDebateError(error: unknown): DebateError {
  if (isDebateError(error)) {
    return error;
  }

  const llmError = LLMError.fromError(error);

  switch (llmError.code) {
    case 'timeout':
      return new TimeoutError(llmError.message, undefined, { cause: llmError });
    case 'unavailable':
    case 'server_error':
    case 'rate_limit':
    case 'authentication':
    case 'not_found':
      return new UnavailableError(llmError.message, { cause: llmError });
    default:
      return new GenerationError(llmError.message, { cause: llmError });
  }
}

/**
 * LanguageModelClient backed by an LLMClient and one model
 */
export class LLMLanguageModelClient implements LanguageModelClient {
  private readonly provider: CompletionProvider;
  private readonly model: string;
  private readonly role: string;

  constructor(provider: CompletionProvider, model: string, role: string) {
    this.provider = provider;
    this.model = model;
    this.role = role;
  }

  async generate(prompt: string, context: readonly Turn[], options: GenerateOptions = {}): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: options.system ?? DEFAULT_SYSTEM_PROMPT },
    ];

    if (context.length > 0) {
      messages.push({ role: 'user', content: `Debate so far:\n${formatTranscript(context)}` });
    }
    messages.push({ role: 'user', content: prompt });

    const startTime = Date.now();
    let content: string;

    try {
      const response = await this.provider.complete({
        model: this.model,
        messages,
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        timeout: options.timeoutMs,
        signal: options.signal,
      });
      content = response.content.trim();
    } catch (error) {
      const debateError = toDebateError(error);
      loggers.modelCall({
        debateId: options.debateId,
        promptId: options.promptId,
        role: this.role,
        model: this.model,
        latencyMs: Date.now() - startTime,
        outcome: 'failed',
        errorCode: debateError.code,
      });
      throw debateError;
    }

    loggers.modelCall({
      debateId: options.debateId,
      promptId: options.promptId,
      role: this.role,
      model: this.model,
      latencyMs: Date.now() - startTime,
      outcome: content.length > 0 ? 'ok' : 'empty',
    });

    if (content.length === 0) {
      throw new GenerationError(`Empty response from ${this.role} model`);
    }

    return content;
  }
}
