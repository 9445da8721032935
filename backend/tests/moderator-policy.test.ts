/**
 * Moderator Policy Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { ModeratorTriggerConfig } from '../src/config/debate-protocol.js';
import { DefaultModeratorPolicy } from '../src/services/debate/moderator-policy.js';
import { appendTurns, moderatorTurn } from '../src/services/debate/debate-state.js';
import { MODERATOR_SYSTEM_PROMPT } from '../src/services/agents/prompts/index.js';
import { GenerationError } from '../src/types/errors.js';
import {
  fakeClient,
  fakeGuard,
  runningState,
  type FakeContentGuard,
  type FakeLanguageModelClient,
} from './helpers/debate-fakes.js';

const TRIGGERS: ModeratorTriggerConfig = {
  summaryInterval: 3,
  flagArguments: true,
  modelCheck: false,
  reassignFlaggedSide: false,
  endDetection: false,
};

describe('DefaultModeratorPolicy', () => {
  let client: FakeLanguageModelClient;
  let guard: FakeContentGuard;

  beforeEach(() => {
    client = fakeClient('Moderator note');
    guard = fakeGuard();
  });

  function policy(overrides: Partial<ModeratorTriggerConfig> = {}): DefaultModeratorPolicy {
    return new DefaultModeratorPolicy(client, guard, { ...TRIGGERS, ...overrides }, { timeoutMs: 5000 });
  }

  it('should continue before any argument was made', async () => {
    const decision = await policy().evaluate(runningState());

    expect(decision).toEqual({ action: 'continue' });
    expect(guard.checkArgument).not.toHaveBeenCalled();
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('should never intervene twice in a row', async () => {
    const state = appendTurns(runningState(3), [moderatorTurn('summary', 'So far so good')]);

    const decision = await policy().evaluate(state);

    expect(decision).toEqual({ action: 'continue' });
    expect(guard.checkArgument).not.toHaveBeenCalled();
  });

  it('should continue between summaries when the argument is fine', async () => {
    const decision = await policy().evaluate(runningState(2));

    expect(decision).toEqual({ action: 'continue' });
    expect(guard.checkArgument).toHaveBeenCalledWith('Point 2', runningState().topic);
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('should correct a flagged argument', async () => {
    guard.checkArgument.mockResolvedValue({ verdict: 'flagged', reason: 'off-topic' });
    client.generate.mockResolvedValue('Please return to the topic.');
    const state = runningState(2);

    const decision = await policy().evaluate(state);

    expect(decision).toEqual({ action: 'intervene-with-correction', message: 'Please return to the topic.' });

    const [prompt, context, options] = client.generate.mock.calls[0] ?? [];
    expect(prompt).toContain('The latest argument from the AGAINST side was flagged: off-topic');
    expect(context).toEqual(state.history);
    expect(options?.system).toBe(MODERATOR_SYSTEM_PROMPT);
    expect(options?.promptId).toBe('moderator-correction-v1');
  });

  it('should hand the turn back to the flagged side when reassignment is on', async () => {
    guard.checkArgument.mockResolvedValue({ verdict: 'flagged', reason: 'circular' });

    const decision = await policy({ reassignFlaggedSide: true }).evaluate(runningState(2));

    expect(decision).toEqual({
      action: 'intervene-with-correction',
      message: 'Moderator note',
      correctedSide: 'against',
    });
  });

  it('should not consult the guard when flagging is off', async () => {
    await policy({ flagArguments: false }).evaluate(runningState(2));

    expect(guard.checkArgument).not.toHaveBeenCalled();
  });

  it('should summarise every summaryInterval rounds', async () => {
    client.generate.mockResolvedValue('Both sides traded points on focus and teamwork.');

    const decision = await policy().evaluate(runningState(3));

    expect(decision).toEqual({
      action: 'intervene-with-summary',
      summary: 'Both sides traded points on focus and teamwork.',
      concludeDebate: false,
    });
    expect(client.generate.mock.calls[0]?.[0]).toContain('Rounds completed: 3 of 6');
  });

  it('should not summarise on cadence when the interval is 0', async () => {
    const decision = await policy({ summaryInterval: 0 }).evaluate(runningState(3));

    expect(decision).toEqual({ action: 'continue' });
  });

  it('should summarise when the moderator model asks for it', async () => {
    client.generate
      .mockResolvedValueOnce('{"needs_intervention": true, "reason": "repetition"}')
      .mockResolvedValueOnce('A short summary.');

    const decision = await policy({ modelCheck: true }).evaluate(runningState(2));

    expect(decision).toEqual({ action: 'intervene-with-summary', summary: 'A short summary.', concludeDebate: false });
    expect(client.generate).toHaveBeenCalledTimes(2);
  });

  it('should read a plain true/false intervention answer', async () => {
    client.generate.mockResolvedValueOnce('false, the debate is on track');

    const decision = await policy({ modelCheck: true }).evaluate(runningState(2));

    expect(decision).toEqual({ action: 'continue' });
    expect(client.generate).toHaveBeenCalledTimes(1);
  });

  it('should conclude the debate when end detection is confident', async () => {
    client.generate
      .mockResolvedValueOnce('A short summary.')
      .mockResolvedValueOnce('{"shouldEnd": true, "confidence": 0.9, "reasons": ["repeating points"]}');

    const decision = await policy({ endDetection: true }).evaluate(runningState(3));

    expect(decision).toEqual({ action: 'intervene-with-summary', summary: 'A short summary.', concludeDebate: true });
  });

  it('should keep going when end detection is not confident enough', async () => {
    client.generate
      .mockResolvedValueOnce('A short summary.')
      .mockResolvedValueOnce('{"shouldEnd": true, "confidence": 0.5, "reasons": []}');

    const decision = await policy({ endDetection: true }).evaluate(runningState(3));

    expect(decision).toEqual({ action: 'intervene-with-summary', summary: 'A short summary.', concludeDebate: false });
  });

  it('should keep going when end detection fails', async () => {
    client.generate
      .mockResolvedValueOnce('A short summary.')
      .mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

    const decision = await policy({ endDetection: true }).evaluate(runningState(3));

    expect(decision).toEqual({ action: 'intervene-with-summary', summary: 'A short summary.', concludeDebate: false });
  });

  it('should still summarise on cadence when the argument check fails', async () => {
    guard.checkArgument.mockRejectedValue(new GenerationError('Unparseable argument evaluation'));
    client.generate.mockResolvedValue('Both sides held their ground.');

    const decision = await policy().evaluate(runningState(3));

    expect(decision).toEqual({
      action: 'intervene-with-summary',
      summary: 'Both sides held their ground.',
      concludeDebate: false,
    });
    expect(client.generate).toHaveBeenCalledTimes(1);
  });

  it('should continue off cadence when the argument check fails', async () => {
    guard.checkArgument.mockRejectedValue(new Error('guard offline'));

    const decision = await policy().evaluate(runningState(2));

    expect(decision).toEqual({ action: 'continue' });
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('should degrade to continue when the moderator call fails', async () => {
    client.generate.mockRejectedValue(new Error('Request timed out'));

    const decision = await policy().evaluate(runningState(3));

    expect(decision).toEqual({ action: 'continue' });
  });
});
