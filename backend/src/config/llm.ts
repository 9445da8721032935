/**
 * LLM Configuration
 *
 * Configuration for the model runtime loaded from environment variables.
 * The default provider talks to an OpenAI-compatible endpoint, which is a
 * local Ollama server unless LLM_BASE_URL says otherwise.
 */

import { config } from 'dotenv';
import type { LLMProviderName, RetryConfig } from '../types/llm.js';

// Load environment variables
config();

/**
 * Roles that each get their own model
 */
export const MODEL_ROLES = ['guard', 'stance', 'debater', 'moderator'] as const;

export type ModelRole = (typeof MODEL_ROLES)[number];

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  /** Provider used for every role */
  provider: LLMProviderName;
  /** OpenAI-compatible endpoint settings */
  openai: {
    apiKey: string;
    baseURL: string;
  };
  /** Anthropic settings */
  anthropic: {
    apiKey: string;
    baseURL?: string;
  };
  /** Model per role */
  models: Record<ModelRole, string>;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Retry configuration */
  retry: RetryConfig;
}

/**
 * Get environment variable or throw error if required and missing
 */
function getEnvVar(key: string, required: boolean = false, defaultValue?: string): string {
  const value = process.env[key] || defaultValue;

  if (required && !value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }

  return value || '';
}

/**
 * Parse integer from environment variable
 */
export function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    console.warn(`Invalid integer value for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }

  return parsed;
}

/**
 * Validate provider name
 */
function validateProvider(provider: string): LLMProviderName {
  if (provider !== 'openai' && provider !== 'anthropic') {
    throw new Error(`Invalid LLM provider: ${provider}. Must be 'openai' or 'anthropic'`);
  }
  return provider;
}

const DEFAULT_MODEL = getEnvVar('LLM_MODEL', false, 'llama3.2:3b');

/**
 * LLM_MODEL_<ROLE> for each role, falling back to LLM_MODEL
 */
function modelsByRole(): Record<ModelRole, string> {
  const models: Record<ModelRole, string> = {
    guard: DEFAULT_MODEL,
    stance: DEFAULT_MODEL,
    debater: DEFAULT_MODEL,
    moderator: DEFAULT_MODEL,
  };
  for (const role of MODEL_ROLES) {
    models[role] = getEnvVar(`LLM_MODEL_${role.toUpperCase()}`, false, DEFAULT_MODEL);
  }
  return models;
}

/**
 * LLM configuration loaded from environment variables
 *
 * Environment variables:
 * - LLM_PROVIDER: 'openai' (any OpenAI-compatible endpoint) or 'anthropic' (default: 'openai')
 * - LLM_BASE_URL: OpenAI-compatible base URL (default: 'http://localhost:11434/v1')
 * - OPENAI_API_KEY: API key for the OpenAI-compatible endpoint (default: 'ollama')
 * - ANTHROPIC_API_KEY / ANTHROPIC_BASE_URL: Anthropic settings
 * - LLM_MODEL: fallback model for every role (default: 'llama3.2:3b')
 * - LLM_MODEL_GUARD / LLM_MODEL_STANCE / LLM_MODEL_DEBATER / LLM_MODEL_MODERATOR
 * - LLM_TIMEOUT_MS: Request timeout in milliseconds (default: 60000)
 * - LLM_MAX_RETRIES: Maximum retry attempts (default: 2)
 * - LLM_RETRY_BASE_DELAY: Base retry delay in milliseconds (default: 1000)
 * - LLM_RETRY_MAX_DELAY: Maximum retry delay in milliseconds (default: 10000)
 */
export const llmConfig: LLMConfig = {
  provider: validateProvider(getEnvVar('LLM_PROVIDER', false, 'openai')),
  openai: {
    apiKey: getEnvVar('OPENAI_API_KEY', false, 'ollama'),
    baseURL: getEnvVar('LLM_BASE_URL', false, 'http://localhost:11434/v1'),
  },
  anthropic: {
    apiKey: getEnvVar('ANTHROPIC_API_KEY'),
    baseURL: getEnvVar('ANTHROPIC_BASE_URL') || undefined,
  },
  models: modelsByRole(),
  timeoutMs: getEnvInt('LLM_TIMEOUT_MS', 60000),
  retry: {
    maxRetries: getEnvInt('LLM_MAX_RETRIES', 2),
    baseDelay: getEnvInt('LLM_RETRY_BASE_DELAY', 1000),
    maxDelay: getEnvInt('LLM_RETRY_MAX_DELAY', 10000),
  },
};

/**
 * Validate configuration at startup
 */
export function validateLLMConfig(cfg: LLMConfig = llmConfig): void {
  const errors: string[] = [];

  if (cfg.provider === 'anthropic' && !cfg.anthropic.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER is set to "anthropic"');
  }

  if (cfg.provider === 'openai' && !cfg.openai.baseURL) {
    errors.push('LLM_BASE_URL must not be empty when LLM_PROVIDER is set to "openai"');
  }

  for (const role of MODEL_ROLES) {
    if (!cfg.models[role].trim()) {
      errors.push(`No model configured for the ${role} role (LLM_MODEL_${role.toUpperCase()})`);
    }
  }

  if (cfg.retry.maxRetries < 0) {
    errors.push('LLM_MAX_RETRIES must be >= 0');
  }

  if (cfg.retry.baseDelay < 0) {
    errors.push('LLM_RETRY_BASE_DELAY must be >= 0');
  }

  if (cfg.retry.maxDelay < cfg.retry.baseDelay) {
    errors.push('LLM_RETRY_MAX_DELAY must be >= LLM_RETRY_BASE_DELAY');
  }

  if (cfg.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (errors.length > 0) {
    throw new Error(`LLM configuration validation failed:\n${errors.join('\n')}`);
  }
}

// Auto-validate on import (can be disabled for testing)
if (process.env.NODE_ENV !== 'test') {
  try {
    validateLLMConfig();
  } catch (error) {
    console.error('LLM configuration validation failed:', error);
    // Don't throw in development to allow partial configuration
    if (process.env.NODE_ENV === 'production') {
      throw error;
    }
  }
}
