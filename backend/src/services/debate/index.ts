/**
 * Debate Services Barrel Export
 *
 * Central export point for the debate engine
 */

export { RoundScheduler } from './round-scheduler.js';
export type {
  RoundSchedulerDeps,
  RoundSchedulerEvents,
  SchedulerSettings,
  StartDebateOptions,
} from './round-scheduler.js';

export { DefaultModeratorPolicy, END_CONFIDENCE_THRESHOLD } from './moderator-policy.js';
export type { ModeratorPolicy, ModeratorPolicyOptions } from './moderator-policy.js';

export { SummaryGenerator, NO_ARGUMENTS_SUMMARY } from './summary-generator.js';

export { isValidTransition, getValidTransitions, transition } from './state-machine.js';

export * from './debate-state.js';

export { DebateRegistry, DebateBusyError, DebateNotFoundError, debateRegistry } from './debate-registry.js';
export type { ExclusiveResult } from './debate-registry.js';

export { createDebateEngine } from './engine-factory.js';
export type { DebateEngineOverrides } from './engine-factory.js';
