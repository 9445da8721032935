/**
 * Debate server entry point
 */

import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { llmConfig, validateLLMConfig } from './config/llm.js';
import { debateProtocolConfig, validateDebateProtocolConfig } from './config/debate-protocol.js';
import { createDebateEngine, debateRegistry } from './services/debate/index.js';
import { logger, logShutdown, logStartup } from './services/logging/index.js';

const PORT = process.env.PORT || 3000;

let server: Server | null = null;

function start(): Server {
  validateLLMConfig();
  validateDebateProtocolConfig(debateProtocolConfig);

  const app = createApp({ scheduler: createDebateEngine(), registry: debateRegistry });

  const listening = app.listen(PORT, () => {
    logStartup({ port: PORT, maxRounds: debateProtocolConfig.maxRounds, provider: llmConfig.provider });
  });
  listening.on('error', (error: Error) => {
    logger.fatal({ err: error }, 'HTTP server error');
    process.exit(1);
  });
  return listening;
}

/**
 * Stop accepting requests; debates held in memory are dropped
 */
function shutdown(signal: string): void {
  logShutdown(signal);

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    logger.info({ droppedDebates: debateRegistry.getCount() }, 'HTTP server closed');
    process.exit(error ? 1 : 0);
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception');
  shutdown('uncaughtException');
});
process.on('unhandledRejection', (reason: unknown) => {
  logger.fatal({ reason }, 'Unhandled promise rejection');
  shutdown('unhandledRejection');
});

try {
  server = start();
} catch (error) {
  logger.fatal({ err: error }, 'Failed to start debate server');
  process.exit(1);
}

export { start, shutdown };
