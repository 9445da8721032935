/**
 * Scheduler State Machine
 *
 * Transition rules between scheduler phases. Terminated is absorbing;
 * Moderating is only ever entered from Running and left within the same call.
 */

import { SchedulerPhase, type DebateState, type PhaseTransitionEvent } from '../../types/debate.js';
import { loggers } from '../logging/index.js';

/**
 * Transition map defining valid state transitions
 * Key: from phase, Value: array of allowed destination phases
 */
const TRANSITIONS: Map<SchedulerPhase, SchedulerPhase[]> = new Map([
  [SchedulerPhase.IDLE, [SchedulerPhase.RUNNING]],
  [SchedulerPhase.RUNNING, [SchedulerPhase.MODERATING, SchedulerPhase.TERMINATED]],
  [SchedulerPhase.MODERATING, [SchedulerPhase.RUNNING, SchedulerPhase.TERMINATED]],
  [SchedulerPhase.TERMINATED, []],
]);

/**
 * Check if a transition is valid
 */
export function isValidTransition(from: SchedulerPhase, to: SchedulerPhase): boolean {
  return TRANSITIONS.get(from)?.includes(to) ?? false;
}

/**
 * Phases reachable from the given one
 */
export function getValidTransitions(from: SchedulerPhase): SchedulerPhase[] {
  return [...(TRANSITIONS.get(from) ?? [])];
}

/**
 * Move a state to another phase
 * @throws Error on a transition the map does not allow
 */
export function transition(state: DebateState, to: SchedulerPhase): { state: DebateState; event: PhaseTransitionEvent } {
  const from = state.phase;

  if (!isValidTransition(from, to)) {
    throw new Error(`Invalid transition from ${from} to ${to}`);
  }

  const next: DebateState = to === SchedulerPhase.TERMINATED
    ? { ...state, phase: to, active: false }
    : { ...state, phase: to };

  const event: PhaseTransitionEvent = {
    debateId: state.id,
    fromPhase: from,
    toPhase: to,
    roundCount: state.roundCount,
    timestamp: new Date(),
  };
  loggers.phaseTransition(event);

  return { state: next, event };
}
