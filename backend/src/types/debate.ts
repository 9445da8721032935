/**
 * Debate Type Definitions
 *
 * Types for a single debate instance: the topic and stances, the append-only
 * transcript, and the scheduler phase. A DebateState value is immutable; every
 * engine operation takes one and returns a new one.
 */

/**
 * Scheduler phase enum
 * Tracks where a debate is in its lifecycle
 */
export enum SchedulerPhase {
  /** No debate started yet */
  IDLE = 'IDLE',

  /** Steady loop, argument rounds are being produced */
  RUNNING = 'RUNNING',

  /** Transient: the moderator policy is being consulted */
  MODERATING = 'MODERATING',

  /** Absorbing: no further argument turns */
  TERMINATED = 'TERMINATED',
}

/**
 * A side that argues a stance
 */
export type ArguingSide = 'for' | 'against';

/**
 * Speaker of a turn
 */
export type Side = ArguingSide | 'moderator';

/**
 * Kind of a moderator turn
 */
export type ModeratorTurnKind = 'summary' | 'correction' | 'closing';

/**
 * Opposing positions generated once at debate start
 */
export interface Stance {
  forStance: string;
  againstStance: string;
}

/**
 * System prompts the two debater personas argue under
 */
export interface PersonaPrompts {
  for: string;
  against: string;
}

/**
 * One argument in the transcript
 */
export interface ArgumentTurn {
  side: ArguingSide;
  text: string;
  /** Round number this argument completed (1-based) */
  round: number;
}

/**
 * A moderator message: never an argument for either side
 */
export interface ModeratorTurn {
  side: 'moderator';
  text: string;
  kind: ModeratorTurnKind;
}

export type Turn = ArgumentTurn | ModeratorTurn;

/**
 * Authoritative record of one debate
 */
export interface DebateState {
  readonly id: string;
  readonly topic: string;
  readonly stance: Stance;
  readonly personas: PersonaPrompts;
  readonly history: readonly Turn[];
  readonly currentSide: ArguingSide;
  readonly roundCount: number;
  readonly maxRounds: number;
  readonly active: boolean;
  readonly phase: SchedulerPhase;
  /** Set once by the first successful finalization */
  readonly finalSummary: string | null;
}

/**
 * Moderator policy decision
 * Three cases; a summary never carries an argument and continue carries nothing
 */
export type ModeratorDecision =
  | { action: 'continue' }
  | {
      action: 'intervene-with-summary';
      summary: string;
      /** Terminal moderator decision: the debate is exhausted */
      concludeDebate: boolean;
    }
  | {
      action: 'intervene-with-correction';
      message: string;
      /** Side that must speak next, when the moderator reassigns the turn */
      correctedSide?: ArguingSide;
      /** Optional summary issued alongside the correction */
      summary?: string;
    };

/**
 * Error payload surfaced to the driver
 */
export interface RoundErrorInfo {
  code: string;
  message: string;
}

/**
 * Result of one advanceRound call
 */
export type RoundResult =
  | {
      status: 'success';
      turn: ArgumentTurn;
      nextSide: ArguingSide;
    }
  | {
      status: 'moderator_intervention';
      /** Moderator turns appended by this call, in order */
      messages: ModeratorTurn[];
      summary?: string;
      /** Argument produced under the corrected side, if any */
      argument?: ArgumentTurn;
      nextSide: ArguingSide;
    }
  | {
      status: 'error';
      error: RoundErrorInfo;
      retryable: true;
    }
  | {
      status: 'terminated';
      finalSummary: string | null;
      /** Set when the triggered finalization failed */
      error?: RoundErrorInfo;
    };

/**
 * Outcome of advanceRound: the next state plus the discriminated result
 */
export interface RoundOutcome {
  state: DebateState;
  result: RoundResult;
}

/**
 * Outcome of finalize; the returned state is inactive either way
 */
export type FinalizeOutcome =
  | { status: 'success'; state: DebateState; finalSummary: string }
  | { status: 'error'; state: DebateState; error: RoundErrorInfo };

/**
 * Phase transition event payload
 */
export interface PhaseTransitionEvent {
  debateId: string;
  fromPhase: SchedulerPhase;
  toPhase: SchedulerPhase;
  roundCount: number;
  timestamp: Date;
}
