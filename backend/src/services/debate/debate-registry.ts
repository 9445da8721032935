/**
 * Debate Registry
 *
 * Holds debate states in memory by id until the driver deletes them, and
 * serialises drivers: only one round or finalize request per debate may be
 * in flight at a time.
 */

import type { DebateState } from '../../types/debate.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'DebateRegistry' });

export class DebateNotFoundError extends Error {
  readonly debateId: string;

  constructor(debateId: string) {
    super(`Debate not found: ${debateId}`);
    this.name = 'DebateNotFoundError';
    this.debateId = debateId;
  }
}

export class DebateBusyError extends Error {
  readonly debateId: string;

  constructor(debateId: string) {
    super(`Debate ${debateId} already has a request in progress`);
    this.name = 'DebateBusyError';
    this.debateId = debateId;
  }
}

/**
 * Result of exclusive work: the state to store plus the value to hand back
 */
export interface ExclusiveResult<T> {
  state: DebateState;
  value: T;
}

export class DebateRegistry {
  private debates: Map<string, DebateState> = new Map();
  private inFlight: Set<string> = new Set();

  /**
   * Store a debate state, replacing any previous one with the same id
   */
  save(state: DebateState): void {
    this.debates.set(state.id, state);
  }

  get(debateId: string): DebateState | undefined {
    return this.debates.get(debateId);
  }

  isBusy(debateId: string): boolean {
    return this.inFlight.has(debateId);
  }

  /**
   * Drop a debate; a debate with a request in flight stays
   * @throws DebateNotFoundError for an unknown id
   * @throws DebateBusyError when a request for the debate is in flight
   */
  delete(debateId: string): DebateState {
    const state = this.debates.get(debateId);
    if (!state) {
      throw new DebateNotFoundError(debateId);
    }
    if (this.isBusy(debateId)) {
      throw new DebateBusyError(debateId);
    }

    this.debates.delete(debateId);
    logger.info({ debateId, finalized: state.finalSummary !== null }, 'Debate removed');
    return state;
  }

  getCount(): number {
    return this.debates.size;
  }

  /**
   * Run work against a debate while holding it; the returned state is stored
   * @throws DebateNotFoundError for an unknown id
   * @throws DebateBusyError when another request for the debate is in flight
   */
  async runExclusive<T>(
    debateId: string,
    work: (state: DebateState) => Promise<ExclusiveResult<T>>
  ): Promise<T> {
    const state = this.debates.get(debateId);
    if (!state) {
      throw new DebateNotFoundError(debateId);
    }
    if (this.isBusy(debateId)) {
      logger.warn({ debateId }, 'Rejected concurrent request');
      throw new DebateBusyError(debateId);
    }

    this.inFlight.add(debateId);
    try {
      const result = await work(state);
      this.debates.set(debateId, result.state);
      return result.value;
    } finally {
      this.inFlight.delete(debateId);
    }
  }
}

// Singleton instance
export const debateRegistry = new DebateRegistry();
