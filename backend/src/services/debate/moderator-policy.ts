/**
 * Moderator Policy
 *
 * Decides, before each argument round, whether the moderator steps in.
 * Triggers are checked in order and at most one fires per call:
 *
 * 1. The content guard flags the latest argument: correction
 * 2. Every `summaryInterval` completed rounds: summary
 * 3. The moderator model asks for an intervention: summary
 *
 * A failed argument check skips only the correction. A summary may conclude
 * the debate when end detection is on. Any other failure degrades to `continue`.
 */

import { z } from 'zod';
import type { ModeratorTriggerConfig } from '../../config/debate-protocol.js';
import type { DebateState, ModeratorDecision } from '../../types/debate.js';
import type { LanguageModelClient } from '../llm/language-model-client.js';
import { extractJson, parseVerdict, type ContentGuard } from '../guard/index.js';
import {
  EndDetectionPrompt,
  InterventionCheckPrompt,
  MODERATOR_SYSTEM_PROMPT,
  ModeratorCorrectionPrompt,
  ModeratorSummaryPrompt,
  fillTemplate,
  windowHistory,
  type PromptTemplate,
} from '../agents/prompts/index.js';
import { isModeratorTurn, lastArgument, lastTurn } from './debate-state.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'ModeratorPolicy' });

/** Confidence at which end detection concludes the debate */
export const END_CONFIDENCE_THRESHOLD = 0.75;

const CONTINUE: ModeratorDecision = { action: 'continue' };

/**
 * Decides whether the moderator intervenes before the next round
 */
export interface ModeratorPolicy {
  evaluate(state: DebateState): Promise<ModeratorDecision>;
}

const InterventionCheckSchema = z.object({
  needs_intervention: z.boolean(),
  reason: z.string().optional(),
});

const EndDetectionSchema = z.object({
  shouldEnd: z.boolean(),
  confidence: z.number().min(0).max(1),
  reasons: z.array(z.string()).default([]),
});

export interface ModeratorPolicyOptions {
  timeoutMs?: number;
  /** Most recent turns shown to the moderator (0 = all) */
  historyWindow?: number;
}

/**
 * Policy backed by the content guard and the moderator model
 */
export class DefaultModeratorPolicy implements ModeratorPolicy {
  private readonly client: LanguageModelClient;
  private readonly guard: ContentGuard;
  private readonly triggers: ModeratorTriggerConfig;
  private readonly options: ModeratorPolicyOptions;

  constructor(
    client: LanguageModelClient,
    guard: ContentGuard,
    triggers: ModeratorTriggerConfig,
    options: ModeratorPolicyOptions = {}
  ) {
    this.client = client;
    this.guard = guard;
    this.triggers = triggers;
    this.options = options;
  }

  async evaluate(state: DebateState): Promise<ModeratorDecision> {
    const latest = lastTurn(state);

    // Nothing to moderate yet, and never two interventions in a row
    if (!latest || isModeratorTurn(latest)) {
      return CONTINUE;
    }

    try {
      return await this.decide(state);
    } catch (error) {
      logger.warn({ debateId: state.id, error }, 'Moderator evaluation failed, continuing');
      return CONTINUE;
    }
  }

  private async decide(state: DebateState): Promise<ModeratorDecision> {
    const correction = await this.correctionFor(state);
    if (correction) {
      return correction;
    }

    const interval = this.triggers.summaryInterval;
    const cadenceDue = interval > 0 && state.roundCount > 0 && state.roundCount % interval === 0;

    if (cadenceDue || (this.triggers.modelCheck && (await this.modelWantsIntervention(state)))) {
      const summary = await this.ask(state, ModeratorSummaryPrompt, {
        topic: state.topic,
        roundCount: String(state.roundCount),
        maxRounds: String(state.maxRounds),
      });
      const concludeDebate = this.triggers.endDetection ? await this.debateExhausted(state) : false;
      return { action: 'intervene-with-summary', summary, concludeDebate };
    }

    return CONTINUE;
  }

  /**
   * Correction for a flagged latest argument; a failed check leaves the other triggers to run
   */
  private async correctionFor(state: DebateState): Promise<ModeratorDecision | null> {
    const argument = lastArgument(state);
    if (!this.triggers.flagArguments || !argument) {
      return null;
    }

    try {
      const verdict = await this.guard.checkArgument(argument.text, state.topic);
      if (verdict.verdict === 'ok') {
        return null;
      }

      logger.info({ debateId: state.id, side: argument.side, reason: verdict.reason }, 'Argument flagged');
      const message = await this.ask(state, ModeratorCorrectionPrompt, {
        side: argument.side.toUpperCase(),
        reason: verdict.reason,
        topic: state.topic,
      });
      return this.triggers.reassignFlaggedSide
        ? { action: 'intervene-with-correction', message, correctedSide: argument.side }
        : { action: 'intervene-with-correction', message };
    } catch (error) {
      logger.warn({ debateId: state.id, error }, 'Argument check failed, skipping correction');
      return null;
    }
  }

  private async ask(
    state: DebateState,
    template: PromptTemplate,
    variables: Record<string, string>,
    maxTokens: number = 200
  ): Promise<string> {
    return this.client.generate(
      fillTemplate(template, variables),
      windowHistory(state.history, this.options.historyWindow ?? 0),
      {
        system: MODERATOR_SYSTEM_PROMPT,
        temperature: 0.3,
        maxTokens,
        timeoutMs: this.options.timeoutMs,
        debateId: state.id,
        promptId: template.id,
      }
    );
  }

  /**
   * Ask the moderator model whether to step in; unstructured answers fall back to a true/false reading
   */
  private async modelWantsIntervention(state: DebateState): Promise<boolean> {
    const answer = await this.ask(state, InterventionCheckPrompt, { topic: state.topic }, 100);
    const parsed = InterventionCheckSchema.safeParse(extractJson(answer));
    const needed = parsed.success ? parsed.data.needs_intervention : parseVerdict(answer);

    logger.debug({ debateId: state.id, needed }, 'Intervention check completed');
    return needed;
  }

  /**
   * End detection; a failed or unparseable check never concludes the debate
   */
  private async debateExhausted(state: DebateState): Promise<boolean> {
    try {
      const answer = await this.ask(state, EndDetectionPrompt, {
        topic: state.topic,
        roundCount: String(state.roundCount),
        maxRounds: String(state.maxRounds),
      });
      const parsed = EndDetectionSchema.safeParse(extractJson(answer));
      if (!parsed.success) {
        logger.warn({ debateId: state.id, answer }, 'Failed to parse end detection response');
        return false;
      }

      const { shouldEnd, confidence, reasons } = parsed.data;
      logger.info({ debateId: state.id, shouldEnd, confidence, reasons }, 'End detection evaluation completed');
      return shouldEnd && confidence >= END_CONFIDENCE_THRESHOLD;
    } catch (error) {
      logger.warn({ debateId: state.id, error }, 'End detection failed');
      return false;
    }
  }
}
