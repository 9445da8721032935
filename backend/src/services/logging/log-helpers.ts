/**
 * Structured log records for the debate engine
 *
 * Each helper writes one record with a fixed `category` so debates can be
 * followed across modules by `debateId`.
 */

import type { ModeratorDecision, PhaseTransitionEvent } from '../../types/debate.js';
import { logger } from './logger.js';

export type DebateLifecycleEvent = 'started' | 'intervened' | 'terminated' | 'finalized' | 'failed';

export type ModelCallOutcome = 'ok' | 'empty' | 'failed';

export interface ModelCallRecord {
  debateId?: string;
  promptId?: string;
  /** Role the model played: guard, stance, debater or moderator */
  role: string;
  model: string;
  latencyMs: number;
  outcome: ModelCallOutcome;
  errorCode?: string;
}

const MODEL_CALL_LEVEL = {
  ok: 'info',
  empty: 'warn',
  failed: 'error',
} as const satisfies Record<ModelCallOutcome, 'info' | 'warn' | 'error'>;

export const loggers = {
  phaseTransition(event: PhaseTransitionEvent) {
    logger.debug({
      category: 'scheduler',
      debateId: event.debateId,
      from: event.fromPhase,
      to: event.toPhase,
      roundCount: event.roundCount,
    }, `${event.fromPhase} -> ${event.toPhase}`);
  },

  modelCall(record: ModelCallRecord) {
    logger[MODEL_CALL_LEVEL[record.outcome]]({
      category: 'model_call',
      ...record,
    }, `${record.role} model call ${record.outcome} after ${record.latencyMs}ms`);
  },

  moderatorDecision(debateId: string, roundCount: number, decision: ModeratorDecision) {
    if (decision.action === 'continue') {
      return;
    }
    logger.info({
      category: 'moderator',
      debateId,
      roundCount,
      action: decision.action,
      concludeDebate: decision.action === 'intervene-with-summary' ? decision.concludeDebate : undefined,
      correctedSide: decision.action === 'intervene-with-correction' ? decision.correctedSide : undefined,
    }, `Moderator decided: ${decision.action}`);
  },

  debateLifecycle(debateId: string, event: DebateLifecycleEvent, details: Record<string, unknown> = {}) {
    logger.info({
      category: 'debate_lifecycle',
      event,
      debateId,
      ...details,
    }, `Debate ${event}`);
  },
};

/**
 * Start a stopwatch; calling the result logs and returns the elapsed ms
 */
export function startTimer() {
  const start = Date.now();
  return (operation: string, details: Record<string, unknown> = {}) => {
    const durationMs = Date.now() - start;
    logger.debug({ category: 'timing', operation, durationMs, ...details }, `${operation} took ${durationMs}ms`);
    return durationMs;
  };
}
