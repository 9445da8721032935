/**
 * Content Guard
 *
 * Screens topics before a debate is created and evaluates arguments while it
 * runs. The LLM-backed guard asks the guard model; a failed topic check
 * rejects the topic.
 */

import { z } from 'zod';
import type { LanguageModelClient } from '../llm/language-model-client.js';
import { GenerationError } from '../../types/errors.js';
import {
  ArgumentEvaluationPrompt,
  GUARD_SYSTEM_PROMPT,
  TopicFilterPrompt,
  fillTemplate,
} from '../agents/prompts/index.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'ContentGuard' });

export type TopicVerdict =
  | { verdict: 'accepted' }
  | { verdict: 'rejected'; reason: string };

export type ArgumentVerdict =
  | { verdict: 'ok' }
  | { verdict: 'flagged'; reason: string };

/**
 * Classifies topics and in-progress arguments
 */
export interface ContentGuard {
  checkTopic(topic: string): Promise<TopicVerdict>;
  checkArgument(text: string, topic: string): Promise<ArgumentVerdict>;
}

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

/**
 * Shape of the guard model's argument evaluation
 */
export const ArgumentEvaluationSchema = z.object({
  is_on_topic: booleanish,
  is_circular: booleanish,
  is_logical: booleanish,
  feedback: z.string().default(''),
});

export type ArgumentEvaluation = z.infer<typeof ArgumentEvaluationSchema>;

/**
 * Pull the first JSON object out of a model answer
 */
export function extractJson(content: string): unknown {
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(jsonMatch[0]);
    return parsed;
  } catch (error) {
    logger.debug({ error }, 'Model answer contained malformed JSON');
    return null;
  }
}

/**
 * Read a true/false answer: whichever word comes first decides
 */
export function parseVerdict(answer: string): boolean {
  const lower = answer.toLowerCase();
  const trueIndex = lower.search(/\btrue\b/);
  const falseIndex = lower.search(/\bfalse\b/);

  if (trueIndex === -1) {
    return false;
  }
  return falseIndex === -1 || trueIndex < falseIndex;
}

/**
 * Describe the failed criteria of an evaluation, or null when it passed
 */
export function describeEvaluation(evaluation: ArgumentEvaluation): string | null {
  const problems: string[] = [];
  if (!evaluation.is_on_topic) problems.push('off-topic');
  if (evaluation.is_circular) problems.push('circular');
  if (!evaluation.is_logical) problems.push('illogical');

  if (problems.length === 0) {
    return null;
  }

  const feedback = evaluation.feedback.trim();
  return feedback ? `${problems.join(', ')}: ${feedback}` : problems.join(', ');
}

/**
 * ContentGuard backed by the guard model
 */
export class LLMContentGuard implements ContentGuard {
  private readonly client: LanguageModelClient;
  private readonly timeoutMs?: number;

  constructor(client: LanguageModelClient, options: { timeoutMs?: number } = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs;
  }

  async checkTopic(topic: string): Promise<TopicVerdict> {
    if (topic.trim().length === 0) {
      return { verdict: 'rejected', reason: 'Empty topic provided' };
    }

    try {
      const answer = await this.client.generate(
        fillTemplate(TopicFilterPrompt, { topic }),
        [],
        { system: GUARD_SYSTEM_PROMPT, temperature: 0.1, maxTokens: 120, timeoutMs: this.timeoutMs, promptId: TopicFilterPrompt.id }
      );

      const accepted = parseVerdict(answer);
      const reason = answer.replace(/\b(true|false)\b/gi, '').trim() || 'Topic analyzed for appropriateness';

      logger.info({ topic, accepted }, `Topic filtered as ${accepted ? 'appropriate' : 'inappropriate'}`);

      return accepted ? { verdict: 'accepted' } : { verdict: 'rejected', reason };
    } catch (error) {
      logger.error({ topic, error }, 'Failed to filter topic');
      return { verdict: 'rejected', reason: 'Unable to verify topic appropriateness' };
    }
  }

  async checkArgument(text: string, topic: string): Promise<ArgumentVerdict> {
    const answer = await this.client.generate(
      fillTemplate(ArgumentEvaluationPrompt, { topic, argument: text }),
      [],
      { system: GUARD_SYSTEM_PROMPT, temperature: 0.2, maxTokens: 200, timeoutMs: this.timeoutMs, promptId: ArgumentEvaluationPrompt.id }
    );

    const parsed = ArgumentEvaluationSchema.safeParse(extractJson(answer));
    if (!parsed.success) {
      logger.warn({ answer }, 'Failed to parse argument evaluation');
      throw new GenerationError('Unparseable argument evaluation');
    }

    const problem = describeEvaluation(parsed.data);
    return problem ? { verdict: 'flagged', reason: problem } : { verdict: 'ok' };
  }
}
