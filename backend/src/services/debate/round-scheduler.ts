/**
 * Round Scheduler
 *
 * Drives one debate through Idle -> Running -> Moderating -> Terminated.
 * Every operation takes a DebateState and returns a new one; the scheduler
 * itself holds no per-debate state, runs no timers between calls and does
 * no locking. One driver per debate is expected to call it sequentially.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { debateProtocolConfig, type DebateProtocolConfig } from '../../config/debate-protocol.js';
import {
  SchedulerPhase,
  type ArguingSide,
  type DebateState,
  type FinalizeOutcome,
  type ModeratorDecision,
  type ModeratorTurn,
  type PhaseTransitionEvent,
  type RoundErrorInfo,
  type RoundOutcome,
  type Turn,
} from '../../types/debate.js';
import { InvalidTopicError, TimeoutError } from '../../types/errors.js';
import { toDebateError, type LanguageModelClient } from '../llm/language-model-client.js';
import type { ContentGuard } from '../guard/index.js';
import type { StanceGenerator } from '../agents/stance-generator.js';
import {
  ArgumentPrompt,
  CorrectionInstruction,
  OpeningInstruction,
  fillTemplate,
  windowHistory,
} from '../agents/prompts/index.js';
import type { ModeratorPolicy } from './moderator-policy.js';
import type { SummaryGenerator } from './summary-generator.js';
import { transition } from './state-machine.js';
import {
  appendTurns,
  argumentTurns,
  capReached,
  completeRound,
  createDebateState,
  moderatorTurn,
  stanceFor,
  terminate,
  withFinalSummary,
} from './debate-state.js';
import { createLogger, loggers, startTimer } from '../logging/index.js';

const logger = createLogger({ module: 'RoundScheduler' });

/**
 * Payload of each event emitted by the RoundScheduler
 */
export interface RoundSchedulerEvents {
  phase_transition: PhaseTransitionEvent;
  turn: { debateId: string; turn: Turn };
  finalized: { debateId: string; finalSummary: string };
}

export type SchedulerSettings = Pick<DebateProtocolConfig, 'maxRounds' | 'turnTimeoutMs' | 'historyWindow'>;

export interface RoundSchedulerDeps {
  /** Generates the debaters' arguments */
  debater: LanguageModelClient;
  guard: ContentGuard;
  stances: StanceGenerator;
  policy: ModeratorPolicy;
  summaries: SummaryGenerator;
  config?: Partial<SchedulerSettings>;
}

export interface StartDebateOptions {
  /** Overrides the configured round cap for this debate */
  maxRounds?: number;
}

export class RoundScheduler extends EventEmitter {
  private readonly debater: LanguageModelClient;
  private readonly guard: ContentGuard;
  private readonly stances: StanceGenerator;
  private readonly policy: ModeratorPolicy;
  private readonly summaries: SummaryGenerator;
  private readonly settings: SchedulerSettings;

  constructor(deps: RoundSchedulerDeps) {
    super();
    this.debater = deps.debater;
    this.guard = deps.guard;
    this.stances = deps.stances;
    this.policy = deps.policy;
    this.summaries = deps.summaries;
    this.settings = {
      maxRounds: deps.config?.maxRounds ?? debateProtocolConfig.maxRounds,
      turnTimeoutMs: deps.config?.turnTimeoutMs ?? debateProtocolConfig.turnTimeoutMs,
      historyWindow: deps.config?.historyWindow ?? debateProtocolConfig.historyWindow,
    };
  }

  /**
   * Screen the topic, generate stances and personas, and open the debate
   * @throws InvalidTopicError when the topic is empty or rejected
   * @throws GenerationError when stances or personas cannot be generated
   */
  async startDebate(topic: string, options: StartDebateOptions = {}): Promise<DebateState> {
    const trimmed = topic.trim();
    if (trimmed.length === 0) {
      throw new InvalidTopicError('Topic must not be empty');
    }

    const verdict = await this.guard.checkTopic(trimmed);
    if (verdict.verdict === 'rejected') {
      logger.info({ topic: trimmed, reason: verdict.reason }, 'Topic rejected');
      throw new InvalidTopicError(verdict.reason);
    }

    const stance = await this.stances.generateStances(trimmed);
    const personas = await this.stances.generatePersonas(trimmed, stance);

    const created = createDebateState({
      id: uuidv4(),
      topic: trimmed,
      stance,
      personas,
      maxRounds: options.maxRounds ?? this.settings.maxRounds,
    });
    const state = this.moveTo(created, SchedulerPhase.RUNNING);

    loggers.debateLifecycle(state.id, 'started', { topic: trimmed, maxRounds: state.maxRounds });
    return state;
  }

  /**
   * Run one round: consult the moderator, then produce at most one argument.
   * Model failures come back as a retryable soft error with the state unchanged.
   */
  async advanceRound(input: DebateState): Promise<RoundOutcome> {
    const endTimer = startTimer();
    const outcome = await this.runRound(input);
    endTimer('advance_round', { debateId: outcome.state.id, status: outcome.result.status });
    return outcome;
  }

  private async runRound(input: DebateState): Promise<RoundOutcome> {
    const state = this.ensureStarted(input);

    // Cap is checked on entry; a round started below the cap always completes
    if (!state.active || capReached(state)) {
      return this.terminateRound(state);
    }

    const moderating = this.moveTo(state, SchedulerPhase.MODERATING);
    const decision = await this.consultModerator(state);

    switch (decision.action) {
      case 'continue':
        return this.argue(state, moderating);
      case 'intervene-with-summary':
        return this.summarize(moderating, decision.summary, decision.concludeDebate);
      case 'intervene-with-correction':
        return this.correct(state, moderating, decision);
    }
  }

  /**
   * Close the debate and attach the closing summary.
   * Once a summary exists, later calls return it without another model call.
   */
  async finalize(input: DebateState): Promise<FinalizeOutcome> {
    if (input.finalSummary !== null) {
      return { status: 'success', state: terminate(input), finalSummary: input.finalSummary };
    }

    const closed = this.close(this.ensureStarted(input));

    let summary: string;
    try {
      summary = await this.summaries.generate(closed);
    } catch (error) {
      const info = this.describeError(error);
      loggers.debateLifecycle(closed.id, 'failed', { stage: 'finalize', ...info });
      return { status: 'error', state: closed, error: info };
    }

    const finalized = withFinalSummary(closed, summary);
    const closing = finalized.history[finalized.history.length - 1];
    if (closing) {
      this.notify('turn', { debateId: finalized.id, turn: closing });
    }
    this.notify('finalized', { debateId: finalized.id, finalSummary: summary });
    loggers.debateLifecycle(finalized.id, 'finalized', { roundCount: finalized.roundCount });

    return { status: 'success', state: finalized, finalSummary: summary };
  }

  private async terminateRound(state: DebateState): Promise<RoundOutcome> {
    const closed = this.close(state);
    if (closed.finalSummary !== null) {
      return { state: closed, result: { status: 'terminated', finalSummary: closed.finalSummary } };
    }

    const outcome = await this.finalize(closed);
    if (outcome.status === 'success') {
      return { state: outcome.state, result: { status: 'terminated', finalSummary: outcome.finalSummary } };
    }
    return { state: outcome.state, result: { status: 'terminated', finalSummary: null, error: outcome.error } };
  }

  private async consultModerator(state: DebateState): Promise<ModeratorDecision> {
    try {
      const decision = await this.policy.evaluate(state);
      loggers.moderatorDecision(state.id, state.roundCount, decision);
      return decision;
    } catch (error) {
      logger.warn({ debateId: state.id, error }, 'Moderator policy failed, continuing');
      return { action: 'continue' };
    }
  }

  private async argue(state: DebateState, moderating: DebateState): Promise<RoundOutcome> {
    const side = state.currentSide;
    const instruction = argumentTurns(state.history).length === 0 ? OpeningInstruction : '';

    let text: string;
    try {
      text = await this.generateArgument(state, side, state.history, instruction);
    } catch (error) {
      return this.softError(state, moderating, error);
    }

    const { state: next, turn } = completeRound(moderating, side, text);
    this.notify('turn', { debateId: next.id, turn });
    const settled = this.leaveModeration(next);

    return { state: settled, result: { status: 'success', turn, nextSide: settled.currentSide } };
  }

  private summarize(moderating: DebateState, summary: string, concludeDebate: boolean): RoundOutcome {
    const turn = moderatorTurn('summary', summary);
    const withSummary = appendTurns(moderating, [turn]);
    this.notify('turn', { debateId: withSummary.id, turn });
    loggers.debateLifecycle(withSummary.id, 'intervened', { kind: 'summary', concludeDebate });

    const settled = concludeDebate
      ? this.close(withSummary)
      : this.moveTo(withSummary, SchedulerPhase.RUNNING);

    return {
      state: settled,
      result: {
        status: 'moderator_intervention',
        messages: [turn],
        summary,
        nextSide: settled.currentSide,
      },
    };
  }

  private async correct(
    state: DebateState,
    moderating: DebateState,
    decision: Extract<ModeratorDecision, { action: 'intervene-with-correction' }>
  ): Promise<RoundOutcome> {
    const messages: ModeratorTurn[] = [];
    if (decision.summary) {
      messages.push(moderatorTurn('summary', decision.summary));
    }
    messages.push(moderatorTurn('correction', decision.message));

    const side = decision.correctedSide ?? state.currentSide;

    let text: string;
    try {
      text = await this.generateArgument(state, side, [...state.history, ...messages], CorrectionInstruction);
    } catch (error) {
      return this.softError(state, moderating, error);
    }

    // Moderator turns and the corrected argument are committed together
    const { state: next, turn } = completeRound(appendTurns(moderating, messages), side, text);
    for (const message of messages) {
      this.notify('turn', { debateId: next.id, turn: message });
    }
    this.notify('turn', { debateId: next.id, turn });
    loggers.debateLifecycle(next.id, 'intervened', { kind: 'correction', correctedSide: decision.correctedSide });

    const settled = this.leaveModeration(next);

    return {
      state: settled,
      result: {
        status: 'moderator_intervention',
        messages,
        summary: decision.summary,
        argument: turn,
        nextSide: settled.currentSide,
      },
    };
  }

  private async generateArgument(
    state: DebateState,
    side: ArguingSide,
    context: readonly Turn[],
    instruction: string
  ): Promise<string> {
    const prompt = fillTemplate(ArgumentPrompt, {
      topic: state.topic,
      side: side.toUpperCase(),
      stance: stanceFor(state, side),
      instruction,
    });

    return this.withTimeout(
      (signal) =>
        this.debater.generate(prompt, windowHistory(context, this.settings.historyWindow), {
          system: state.personas[side],
          temperature: 0.7,
          maxTokens: 150,
          timeoutMs: this.settings.turnTimeoutMs,
          debateId: state.id,
          promptId: ArgumentPrompt.id,
          signal,
        }),
      this.settings.turnTimeoutMs
    );
  }

  /**
   * Run a model call under the turn timeout; on expiry the call is aborted, not just abandoned
   */
  private async withTimeout<T>(run: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TimeoutError(`Argument generation timed out after ${timeoutMs}ms`, timeoutMs);
        controller.abort(error);
        reject(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([run(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Soft failure: the returned state is the caller's state, untouched
   */
  private softError(state: DebateState, moderating: DebateState, error: unknown): RoundOutcome {
    const info = this.describeError(error);
    this.moveTo(moderating, SchedulerPhase.RUNNING);
    logger.warn({ debateId: state.id, roundCount: state.roundCount, ...info }, 'Round failed, state unchanged');

    return { state, result: { status: 'error', error: info, retryable: true } };
  }

  private describeError(error: unknown): RoundErrorInfo {
    const debateError = toDebateError(error);
    return { code: debateError.code, message: debateError.message };
  }

  private leaveModeration(state: DebateState): DebateState {
    return capReached(state) ? this.close(state) : this.moveTo(state, SchedulerPhase.RUNNING);
  }

  private ensureStarted(state: DebateState): DebateState {
    return state.phase === SchedulerPhase.IDLE ? this.moveTo(state, SchedulerPhase.RUNNING) : state;
  }

  private close(state: DebateState): DebateState {
    if (state.phase === SchedulerPhase.TERMINATED) {
      return terminate(state);
    }
    const closed = this.moveTo(state, SchedulerPhase.TERMINATED);
    loggers.debateLifecycle(closed.id, 'terminated', { roundCount: closed.roundCount });
    return closed;
  }

  private notify<E extends keyof RoundSchedulerEvents>(event: E, payload: RoundSchedulerEvents[E]): void {
    this.emit(event, payload);
  }

  private moveTo(state: DebateState, to: SchedulerPhase): DebateState {
    const { state: next, event } = transition(state, to);
    this.notify('phase_transition', event);
    return next;
  }
}
