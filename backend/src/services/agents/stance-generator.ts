/**
 * Stance Generator
 *
 * Derives the two opposing stances from the topic with one model call, and
 * the system prompt each debater persona argues under.
 */

import type { ArguingSide, PersonaPrompts, Stance } from '../../types/debate.js';
import { GenerationError, isDebateError } from '../../types/errors.js';
import type { LanguageModelClient } from '../llm/language-model-client.js';
import {
  DefaultPersonaPrompt,
  PersonaPromptGeneration,
  StanceGenerationPrompt,
  fillTemplate,
} from './prompts/index.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'StanceGenerator' });

/** Shortest stance accepted from the model */
const MIN_STANCE_LENGTH = 5;

/** Shortest generated persona prompt accepted from the model */
const MIN_PERSONA_PROMPT_LENGTH = 50;

export interface StanceGeneratorOptions {
  /** Ask the model for a system prompt per side instead of the built-in persona */
  generatePersonas?: boolean;
  timeoutMs?: number;
}

/**
 * Strip list markers and bold markup the model may wrap lines in
 */
function normalizeLine(line: string): string {
  return line.replace(/\*\*/g, '').replace(/^[-*#>\s]+/, '').trim();
}

/**
 * Parse the model's stance answer
 *
 * Accepts `FOR:` / `AGAINST:` lines, then `FOR ` / `AGAINST ` prefixes,
 * then the first two non-empty lines. Returns null when either stance is
 * missing or too short.
 */
export function parseStances(raw: string): Stance | null {
  const lines = raw
    .split('\n')
    .map(normalizeLine)
    .filter((line) => line.length > 0);

  let forStance = '';
  let againstStance = '';

  for (const line of lines) {
    const upper = line.toUpperCase();
    if (upper.startsWith('FOR:') || upper.startsWith('FOR ')) {
      forStance = line.slice(4).trim();
    } else if (upper.startsWith('AGAINST:') || upper.startsWith('AGAINST ')) {
      againstStance = line.slice(8).trim();
    }
  }

  if (!forStance && !againstStance && lines.length >= 2) {
    forStance = lines[0] ?? '';
    againstStance = lines[1] ?? '';
  }

  if (forStance.length < MIN_STANCE_LENGTH || againstStance.length < MIN_STANCE_LENGTH) {
    return null;
  }

  return { forStance, againstStance };
}

export class StanceGenerator {
  private readonly client: LanguageModelClient;
  private readonly options: StanceGeneratorOptions;

  constructor(client: LanguageModelClient, options: StanceGeneratorOptions = {}) {
    this.client = client;
    this.options = options;
  }

  /**
   * Generate the stance pair with a single model call
   * @throws GenerationError when the call fails or the answer cannot be parsed
   */
  async generateStances(topic: string): Promise<Stance> {
    let raw: string;
    try {
      raw = await this.client.generate(
        fillTemplate(StanceGenerationPrompt, { topic }),
        [],
        { temperature: 0.5, maxTokens: 200, timeoutMs: this.options.timeoutMs, promptId: StanceGenerationPrompt.id }
      );
    } catch (error) {
      logger.error({ topic, error }, 'Stance generation call failed');
      throw new GenerationError(
        `Failed to generate debate stances: ${isDebateError(error) ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const stance = parseStances(raw);
    if (!stance) {
      logger.warn({ topic, raw }, 'Generated stances could not be parsed');
      throw new GenerationError('Failed to generate debate stances: unparseable response');
    }

    logger.info({ topic, ...stance }, 'Generated stances');
    return stance;
  }

  /**
   * System prompts for both debaters
   */
  async generatePersonas(topic: string, stance: Stance): Promise<PersonaPrompts> {
    if (!this.options.generatePersonas) {
      return {
        for: this.defaultPersona('for', topic, stance.forStance),
        against: this.defaultPersona('against', topic, stance.againstStance),
      };
    }

    const forPrompt = await this.generatePersona(topic, stance.forStance);
    const againstPrompt = await this.generatePersona(topic, stance.againstStance);
    return { for: forPrompt, against: againstPrompt };
  }

  private defaultPersona(side: ArguingSide, topic: string, stance: string): string {
    return fillTemplate(DefaultPersonaPrompt, { side: side.toUpperCase(), topic, stance });
  }

  private async generatePersona(topic: string, stance: string): Promise<string> {
    let prompt: string;
    try {
      prompt = await this.client.generate(
        fillTemplate(PersonaPromptGeneration, { topic, stance }),
        [],
        { temperature: 0.5, maxTokens: 400, timeoutMs: this.options.timeoutMs, promptId: PersonaPromptGeneration.id }
      );
    } catch (error) {
      throw new GenerationError('Failed to generate persona prompt', { cause: error });
    }

    if (prompt.length < MIN_PERSONA_PROMPT_LENGTH) {
      throw new GenerationError('Generated persona prompt is too short');
    }
    return prompt;
  }
}
