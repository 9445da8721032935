/**
 * Debate Protocol Configuration
 *
 * Round cap, per-call timeout and moderator trigger settings. These drive
 * the round scheduler and the moderator policy.
 */

import { getEnvInt } from './llm.js';

/**
 * Default maximum number of argument rounds
 */
export const MAX_ROUNDS = 6;

/**
 * Moderator trigger settings
 * Which conditions make the moderator step in
 */
export interface ModeratorTriggerConfig {
  /** Summarise every N completed rounds (0 disables) */
  summaryInterval: number;

  /** Ask the content guard about the latest argument and correct flagged ones */
  flagArguments: boolean;

  /** Ask the moderator model whether an intervention is needed */
  modelCheck: boolean;

  /** Hand the next turn back to the side whose argument was flagged */
  reassignFlaggedSide: boolean;

  /** Let the moderator conclude an exhausted debate before the cap */
  endDetection: boolean;
}

/**
 * Protocol configuration
 */
export interface DebateProtocolConfig {
  /** Argument rounds before the debate terminates */
  maxRounds: number;

  /** Caller-enforced timeout for each model call in a round (ms) */
  turnTimeoutMs: number;

  /** Number of most recent turns shown to the models in prompts (0 = all) */
  historyWindow: number;

  /** Generate a system prompt per side at start instead of the built-in persona */
  generatePersonaPrompts: boolean;

  moderator: ModeratorTriggerConfig;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value === 'true' || value === '1';
}

/**
 * Protocol configuration loaded from environment variables
 *
 * Environment variables:
 * - DEBATE_MAX_ROUNDS (default: 6)
 * - DEBATE_TURN_TIMEOUT_MS (default: 90000)
 * - DEBATE_HISTORY_WINDOW (default: 0, full history)
 * - DEBATE_PERSONA_PROMPTS (default: false)
 * - MODERATOR_SUMMARY_INTERVAL (default: 3)
 * - MODERATOR_FLAG_ARGUMENTS (default: true)
 * - MODERATOR_MODEL_CHECK (default: false)
 * - MODERATOR_REASSIGN_FLAGGED (default: false)
 * - MODERATOR_END_DETECTION (default: false)
 */
export const debateProtocolConfig: DebateProtocolConfig = {
  maxRounds: getEnvInt('DEBATE_MAX_ROUNDS', MAX_ROUNDS),
  turnTimeoutMs: getEnvInt('DEBATE_TURN_TIMEOUT_MS', 90000),
  historyWindow: getEnvInt('DEBATE_HISTORY_WINDOW', 0),
  generatePersonaPrompts: getEnvBool('DEBATE_PERSONA_PROMPTS', false),
  moderator: {
    summaryInterval: getEnvInt('MODERATOR_SUMMARY_INTERVAL', 3),
    flagArguments: getEnvBool('MODERATOR_FLAG_ARGUMENTS', true),
    modelCheck: getEnvBool('MODERATOR_MODEL_CHECK', false),
    reassignFlaggedSide: getEnvBool('MODERATOR_REASSIGN_FLAGGED', false),
    endDetection: getEnvBool('MODERATOR_END_DETECTION', false),
  },
};

/**
 * Validate a protocol configuration
 */
export function validateDebateProtocolConfig(cfg: DebateProtocolConfig): void {
  const errors: string[] = [];

  if (!Number.isInteger(cfg.maxRounds) || cfg.maxRounds < 1) {
    errors.push('DEBATE_MAX_ROUNDS must be an integer >= 1');
  }

  if (cfg.turnTimeoutMs < 1000) {
    errors.push('DEBATE_TURN_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (cfg.historyWindow < 0) {
    errors.push('DEBATE_HISTORY_WINDOW must be >= 0');
  }

  if (cfg.moderator.summaryInterval < 0) {
    errors.push('MODERATOR_SUMMARY_INTERVAL must be >= 0');
  }

  if (errors.length > 0) {
    throw new Error(`Debate protocol configuration validation failed:\n${errors.join('\n')}`);
  }
}
