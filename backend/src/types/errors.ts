/**
 * Debate Error Types
 *
 * Error taxonomy for the debate engine. Provider-level failures arrive as
 * LLMError and are mapped onto these at the LanguageModelClient seam.
 */

/**
 * Debate error codes
 */
export type DebateErrorCode =
  | 'invalid_topic'   // Topic rejected, debate never created
  | 'generation'      // Model produced no usable text
  | 'unavailable'     // Model runtime unreachable
  | 'timeout';        // Model runtime too slow

/**
 * Base class for all engine errors
 */
export class DebateError extends Error {
  /** Error code categorizing the failure */
  public readonly code: DebateErrorCode;
  /** Whether the caller may simply try again */
  public readonly retryable: boolean;

  constructor(message: string, code: DebateErrorCode, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DebateError';
    this.code = code;
    this.retryable = retryable;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * User input rejected; terminal for that start attempt
 */
export class InvalidTopicError extends DebateError {
  public readonly reason: string;

  constructor(reason: string) {
    super(`Invalid debate topic: ${reason}`, 'invalid_topic', false);
    this.name = 'InvalidTopicError';
    this.reason = reason;
  }
}

/**
 * The model call produced no usable text
 */
export class GenerationError extends DebateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'generation', true, options);
    this.name = 'GenerationError';
  }
}

/**
 * The model runtime could not be reached
 */
export class UnavailableError extends DebateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'unavailable', true, options);
    this.name = 'UnavailableError';
  }
}

/**
 * The model runtime did not answer in time
 */
export class TimeoutError extends DebateError {
  public readonly timeoutMs?: number;

  constructor(message: string, timeoutMs?: number, options?: { cause?: unknown }) {
    super(message, 'timeout', true, options);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Narrow an unknown thrown value to a DebateError
 */
export function isDebateError(error: unknown): error is DebateError {
  return error instanceof DebateError;
}
