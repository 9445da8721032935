/**
 * Debate Engine Factory
 *
 * Wires one provider client into a language model client per role and
 * builds the scheduler on top of them.
 */

import { debateProtocolConfig, type DebateProtocolConfig } from '../../config/debate-protocol.js';
import {
  LLMClient,
  LLMLanguageModelClient,
  llmConfig,
  type CompletionProvider,
  type LLMConfig,
} from '../llm/index.js';
import { LLMContentGuard } from '../guard/index.js';
import { StanceGenerator } from '../agents/stance-generator.js';
import { DefaultModeratorPolicy } from './moderator-policy.js';
import { SummaryGenerator } from './summary-generator.js';
import { RoundScheduler } from './round-scheduler.js';
import { createLogger } from '../logging/index.js';

const logger = createLogger({ module: 'DebateEngineFactory' });

export interface DebateEngineOverrides {
  llm?: LLMConfig;
  protocol?: DebateProtocolConfig;
  /** Completion provider shared by every role; an LLMClient by default */
  provider?: CompletionProvider;
}

export function createDebateEngine(overrides: DebateEngineOverrides = {}): RoundScheduler {
  const llm = overrides.llm ?? llmConfig;
  const protocol = overrides.protocol ?? debateProtocolConfig;
  const provider = overrides.provider ?? new LLMClient({ config: llm });
  const timeoutMs = protocol.turnTimeoutMs;

  const guard = new LLMContentGuard(
    new LLMLanguageModelClient(provider, llm.models.guard, 'guard'),
    { timeoutMs }
  );
  const moderatorClient = new LLMLanguageModelClient(provider, llm.models.moderator, 'moderator');

  logger.info({ models: llm.models, maxRounds: protocol.maxRounds }, 'Debate engine created');

  return new RoundScheduler({
    debater: new LLMLanguageModelClient(provider, llm.models.debater, 'debater'),
    guard,
    stances: new StanceGenerator(
      new LLMLanguageModelClient(provider, llm.models.stance, 'stance'),
      { generatePersonas: protocol.generatePersonaPrompts, timeoutMs }
    ),
    policy: new DefaultModeratorPolicy(moderatorClient, guard, protocol.moderator, {
      timeoutMs,
      historyWindow: protocol.historyWindow,
    }),
    summaries: new SummaryGenerator(moderatorClient, { timeoutMs }),
    config: {
      maxRounds: protocol.maxRounds,
      turnTimeoutMs: protocol.turnTimeoutMs,
      historyWindow: protocol.historyWindow,
    },
  });
}
