export { logger, createLogger, logStartup, logShutdown, type ServerStartDetails } from './logger.js';
export {
  loggers,
  startTimer,
  type DebateLifecycleEvent,
  type ModelCallOutcome,
  type ModelCallRecord,
} from './log-helpers.js';
