/**
 * In-process fakes for the engine's collaborators
 */

import { vi, type Mock } from 'vitest';
import type { ArgumentTurn, DebateState, ModeratorDecision, Turn } from '../../src/types/debate.js';
import { SchedulerPhase } from '../../src/types/debate.js';
import type { GenerateOptions, LanguageModelClient } from '../../src/services/llm/language-model-client.js';
import type { ArgumentVerdict, ContentGuard, TopicVerdict } from '../../src/services/guard/index.js';
import type { ModeratorPolicy } from '../../src/services/debate/moderator-policy.js';
import { createDebateState } from '../../src/services/debate/debate-state.js';

export type GenerateFn = (prompt: string, context: readonly Turn[], options?: GenerateOptions) => Promise<string>;

export interface FakeLanguageModelClient extends LanguageModelClient {
  generate: Mock<GenerateFn>;
}

export interface FakeContentGuard extends ContentGuard {
  checkTopic: Mock<(topic: string) => Promise<TopicVerdict>>;
  checkArgument: Mock<(text: string, topic: string) => Promise<ArgumentVerdict>>;
}

export interface FakeModeratorPolicy extends ModeratorPolicy {
  evaluate: Mock<(state: DebateState) => Promise<ModeratorDecision>>;
}

export const TOPIC = 'Is remote work better than office work?';

export const STANCE = {
  forStance: 'Remote work improves focus and saves commuting time',
  againstStance: 'Office work builds stronger teams and mentoring',
};

export const STANCE_ANSWER = `FOR: ${STANCE.forStance}\nAGAINST: ${STANCE.againstStance}`;

export function fakeClient(reply: string = 'Generated text'): FakeLanguageModelClient {
  return { generate: vi.fn<GenerateFn>().mockResolvedValue(reply) };
}

/**
 * Client answering "Argument 1", "Argument 2", ... in call order
 */
export function countingClient(): FakeLanguageModelClient {
  let calls = 0;
  return {
    generate: vi.fn<GenerateFn>().mockImplementation(async () => {
      calls += 1;
      return `Argument ${calls}`;
    }),
  };
}

export function fakeGuard(): FakeContentGuard {
  return {
    checkTopic: vi.fn<(topic: string) => Promise<TopicVerdict>>().mockResolvedValue({ verdict: 'accepted' }),
    checkArgument: vi.fn<(text: string, topic: string) => Promise<ArgumentVerdict>>().mockResolvedValue({ verdict: 'ok' }),
  };
}

export function fakePolicy(): FakeModeratorPolicy {
  return {
    evaluate: vi.fn<(state: DebateState) => Promise<ModeratorDecision>>().mockResolvedValue({ action: 'continue' }),
  };
}

/**
 * A running debate with `rounds` alternating argument turns already played
 */
export function runningState(rounds: number = 0, overrides: Partial<DebateState> = {}): DebateState {
  const history: ArgumentTurn[] = [];
  for (let i = 0; i < rounds; i++) {
    history.push({ side: i % 2 === 0 ? 'for' : 'against', text: `Point ${i + 1}`, round: i + 1 });
  }

  return {
    ...createDebateState({
      id: 'debate-1',
      topic: TOPIC,
      stance: STANCE,
      personas: { for: 'You argue FOR.', against: 'You argue AGAINST.' },
      maxRounds: 6,
    }),
    phase: SchedulerPhase.RUNNING,
    history,
    roundCount: rounds,
    currentSide: rounds % 2 === 0 ? 'for' : 'against',
    ...overrides,
  };
}
