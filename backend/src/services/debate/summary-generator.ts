/**
 * Summary Generator
 *
 * Produces the single closing synthesis of a terminated debate from its full
 * ordered history.
 */

import type { DebateState } from '../../types/debate.js';
import { GenerationError, isDebateError } from '../../types/errors.js';
import type { LanguageModelClient } from '../llm/language-model-client.js';
import { ClosingSummaryPrompt, MODERATOR_SYSTEM_PROMPT, fillTemplate } from '../agents/prompts/index.js';
import { argumentTurns } from './debate-state.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'SummaryGenerator' });

/** Closing line for a debate that ended before anyone argued */
export const NO_ARGUMENTS_SUMMARY = 'The debate ended before either side made an argument.';

export class SummaryGenerator {
  private readonly client: LanguageModelClient;
  private readonly timeoutMs?: number;

  constructor(client: LanguageModelClient, options: { timeoutMs?: number } = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * @throws GenerationError on model failure
   */
  async generate(state: DebateState): Promise<string> {
    if (argumentTurns(state.history).length === 0) {
      return NO_ARGUMENTS_SUMMARY;
    }

    let summary: string;
    try {
      summary = await this.client.generate(
        fillTemplate(ClosingSummaryPrompt, {
          topic: state.topic,
          forStance: state.stance.forStance,
          againstStance: state.stance.againstStance,
        }),
        state.history,
        {
          system: MODERATOR_SYSTEM_PROMPT,
          temperature: 0.4,
          maxTokens: 400,
          timeoutMs: this.timeoutMs,
          debateId: state.id,
          promptId: ClosingSummaryPrompt.id,
        }
      );
    } catch (error) {
      logger.error({ debateId: state.id, error }, 'Closing summary failed');
      const reason = isDebateError(error) ? error.message : String(error);
      throw new GenerationError(`Failed to generate closing summary: ${reason}`, { cause: error });
    }

    const trimmed = summary.trim();
    if (trimmed.length === 0) {
      throw new GenerationError('Failed to generate closing summary: empty response');
    }
    return trimmed;
  }
}
