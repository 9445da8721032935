/**
 * Provider-level types: chat requests to an OpenAI-compatible endpoint
 * (a local Ollama server by default) or Anthropic, and the errors they raise.
 */

export type LLMProviderName = 'openai' | 'anthropic';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface LLMRequest {
  /** Model name as the runtime knows it, e.g. 'llama3.2:3b' */
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Per-request budget in ms; the client's default applies otherwise */
  timeout?: number;
  /** Aborts the request and any retries still pending */
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'error';

export interface LLMResponse {
  content: string;
  model: string;
  usage: TokenUsage;
  finishReason: FinishReason;
  provider: LLMProviderName;
}

/**
 * Anything that can complete a chat request
 */
export interface CompletionProvider {
  complete(request: LLMRequest): Promise<LLMResponse>;
}

export interface RetryConfig {
  maxRetries: number;
  /** Delay before the first retry; doubles on each further attempt */
  baseDelay: number;
  maxDelay: number;
}

export type LLMErrorCode =
  | 'rate_limit'
  | 'timeout'
  | 'unavailable'
  | 'invalid_request'
  | 'server_error'
  | 'authentication'
  | 'not_found'
  | 'aborted'
  | 'unknown';

const RETRYABLE_CODES: ReadonlySet<LLMErrorCode> = new Set(['rate_limit', 'timeout', 'unavailable', 'server_error']);

/**
 * Message fragments recognised on errors that carry no status, checked in order
 */
const MESSAGE_PATTERNS: ReadonlyArray<{ pattern: RegExp; code: LLMErrorCode; statusCode?: number }> = [
  { pattern: /rate limit|429/, code: 'rate_limit', statusCode: 429 },
  { pattern: /timeout|timed out/, code: 'timeout' },
  { pattern: /econnrefused|econnreset|enotfound|connection error|fetch failed/, code: 'unavailable' },
  { pattern: /authentication|unauthorized|401/, code: 'authentication', statusCode: 401 },
  { pattern: /not found|404/, code: 'not_found', statusCode: 404 },
  { pattern: /invalid|bad request|400/, code: 'invalid_request', statusCode: 400 },
  { pattern: /server error|500|503/, code: 'server_error', statusCode: 500 },
];

export interface LLMErrorOptions {
  statusCode?: number;
  cause?: unknown;
}

export class LLMError extends Error {
  readonly code: LLMErrorCode;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(message: string, code: LLMErrorCode, options: LLMErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LLMError';
    this.code = code;
    this.retryable = RETRYABLE_CODES.has(code);
    this.statusCode = options.statusCode;
  }

  /**
   * Classify an HTTP status from a provider SDK; null when the status says nothing useful
   */
  static fromStatus(message: string, status: number | undefined, cause?: unknown): LLMError | null {
    if (status === undefined) {
      return null;
    }
    if (status === 429) {
      return new LLMError(message, 'rate_limit', { statusCode: status, cause });
    }
    if (status === 401 || status === 403) {
      return new LLMError(message, 'authentication', { statusCode: status, cause });
    }
    if (status === 404) {
      return new LLMError(message, 'not_found', { statusCode: status, cause });
    }
    if (status === 400) {
      return new LLMError(message, 'invalid_request', { statusCode: status, cause });
    }
    if (status >= 500) {
      return new LLMError(message, 'server_error', { statusCode: status, cause });
    }
    return null;
  }

  /**
   * Classify anything thrown below the client by its message
   */
  static fromError(error: unknown, defaultCode: LLMErrorCode = 'unknown'): LLMError {
    if (error instanceof LLMError) {
      return error;
    }
    if (!(error instanceof Error)) {
      return new LLMError(String(error), defaultCode);
    }

    const message = error.message.toLowerCase();
    const match = MESSAGE_PATTERNS.find(({ pattern }) => pattern.test(message));

    return match
      ? new LLMError(error.message, match.code, { statusCode: match.statusCode, cause: error })
      : new LLMError(error.message, defaultCode, { cause: error });
  }
}
