/**
 * Debate State helpers
 *
 * Pure functions over DebateState. Each returns a new value; the history
 * array is only ever extended, never reordered or truncated.
 */

import {
  SchedulerPhase,
  type ArgumentTurn,
  type ArguingSide,
  type DebateState,
  type ModeratorTurn,
  type PersonaPrompts,
  type Stance,
  type Turn,
} from '../../types/debate.js';

export interface NewDebateInput {
  id: string;
  topic: string;
  stance: Stance;
  personas: PersonaPrompts;
  maxRounds: number;
}

/**
 * Fresh state for a debate that passed topic screening; the scheduler moves it to Running
 */
export function createDebateState(input: NewDebateInput): DebateState {
  return {
    id: input.id,
    topic: input.topic,
    stance: input.stance,
    personas: input.personas,
    history: [],
    currentSide: 'for',
    roundCount: 0,
    maxRounds: input.maxRounds,
    active: true,
    phase: SchedulerPhase.IDLE,
    finalSummary: null,
  };
}

export function otherSide(side: ArguingSide): ArguingSide {
  return side === 'for' ? 'against' : 'for';
}

export function isArgumentTurn(turn: Turn): turn is ArgumentTurn {
  return turn.side !== 'moderator';
}

export function isModeratorTurn(turn: Turn): turn is ModeratorTurn {
  return turn.side === 'moderator';
}

export function argumentTurns(history: readonly Turn[]): ArgumentTurn[] {
  return history.filter(isArgumentTurn);
}

/**
 * Most recent argument turn, if any
 */
export function lastArgument(state: DebateState): ArgumentTurn | undefined {
  for (let i = state.history.length - 1; i >= 0; i--) {
    const turn = state.history[i];
    if (turn && isArgumentTurn(turn)) {
      return turn;
    }
  }
  return undefined;
}

export function capReached(state: DebateState): boolean {
  return state.roundCount >= state.maxRounds;
}

export function lastTurn(state: DebateState): Turn | undefined {
  return state.history[state.history.length - 1];
}

export function stanceFor(state: DebateState, side: ArguingSide): string {
  return side === 'for' ? state.stance.forStance : state.stance.againstStance;
}

export function moderatorTurn(kind: ModeratorTurn['kind'], text: string): ModeratorTurn {
  return { side: 'moderator', kind, text };
}

/**
 * Append turns without touching counters
 */
export function appendTurns(state: DebateState, turns: readonly Turn[]): DebateState {
  if (turns.length === 0) {
    return state;
  }
  return { ...state, history: [...state.history, ...turns] };
}

/**
 * Mark the debate inactive; idempotent
 */
export function terminate(state: DebateState): DebateState {
  if (!state.active && state.phase === SchedulerPhase.TERMINATED) {
    return state;
  }
  return { ...state, active: false, phase: SchedulerPhase.TERMINATED };
}

/**
 * Record one completed round: append the argument, count it, flip the side
 */
export function completeRound(
  state: DebateState,
  side: ArguingSide,
  text: string
): { state: DebateState; turn: ArgumentTurn } {
  if (!state.active) {
    throw new Error(`Debate ${state.id} is no longer active`);
  }

  const roundCount = state.roundCount + 1;
  const turn: ArgumentTurn = { side, text, round: roundCount };

  return {
    state: {
      ...state,
      history: [...state.history, turn],
      roundCount,
      currentSide: otherSide(side),
    },
    turn,
  };
}

/**
 * Attach the closing summary; a second call keeps the first summary
 */
export function withFinalSummary(state: DebateState, summary: string): DebateState {
  if (state.finalSummary !== null) {
    return state;
  }
  const closed = terminate(state);
  return {
    ...closed,
    history: [...closed.history, moderatorTurn('closing', summary)],
    finalSummary: summary,
  };
}
