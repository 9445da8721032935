/**
 * Summary Generator Tests
 */

import { describe, it, expect } from 'vitest';
import { NO_ARGUMENTS_SUMMARY, SummaryGenerator } from '../src/services/debate/summary-generator.js';
import { GenerationError, TimeoutError } from '../src/types/errors.js';
import { MODERATOR_SYSTEM_PROMPT } from '../src/services/agents/prompts/index.js';
import { STANCE, fakeClient, runningState } from './helpers/debate-fakes.js';

describe('SummaryGenerator', () => {
  it('should close a debate without arguments without calling the model', async () => {
    const client = fakeClient();

    const summary = await new SummaryGenerator(client).generate(runningState());

    expect(summary).toBe(NO_ARGUMENTS_SUMMARY);
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('should summarise from the full ordered history', async () => {
    const client = fakeClient('  Both sides agreed flexibility matters.  ');
    const state = runningState(4);

    const summary = await new SummaryGenerator(client, { timeoutMs: 3000 }).generate(state);

    expect(summary).toBe('Both sides agreed flexibility matters.');
    const [prompt, context, options] = client.generate.mock.calls[0] ?? [];
    expect(prompt).toContain(`FOR stance: ${STANCE.forStance}`);
    expect(prompt).toContain(`AGAINST stance: ${STANCE.againstStance}`);
    expect(context).toEqual(state.history);
    expect(options).toEqual({
      system: MODERATOR_SYSTEM_PROMPT,
      temperature: 0.4,
      maxTokens: 400,
      timeoutMs: 3000,
      debateId: 'debate-1',
      promptId: 'moderator-closing-summary-v1',
    });
  });

  it('should wrap model failures in a GenerationError', async () => {
    const client = fakeClient();
    client.generate.mockRejectedValue(new TimeoutError('Model call timed out'));

    const failure = new SummaryGenerator(client).generate(runningState(2));

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow('Failed to generate closing summary: Model call timed out');
  });

  it('should reject an empty summary', async () => {
    const client = fakeClient('   ');

    await expect(new SummaryGenerator(client).generate(runningState(2))).rejects.toThrow(
      'Failed to generate closing summary: empty response'
    );
  });
});
