/**
 * Stance Generator Tests
 */

import { describe, it, expect } from 'vitest';
import { StanceGenerator, parseStances } from '../src/services/agents/stance-generator.js';
import { GenerationError, UnavailableError } from '../src/types/errors.js';
import { STANCE, STANCE_ANSWER, TOPIC, fakeClient } from './helpers/debate-fakes.js';

describe('parseStances', () => {
  it('should read FOR: and AGAINST: lines', () => {
    expect(parseStances(STANCE_ANSWER)).toEqual(STANCE);
  });

  it('should strip markdown around the labels', () => {
    const raw = '**FOR** Remote work improves focus\n- **AGAINST** Offices build culture';

    expect(parseStances(raw)).toEqual({
      forStance: 'Remote work improves focus',
      againstStance: 'Offices build culture',
    });
  });

  it('should fall back to the first two lines', () => {
    const raw = 'Remote work improves focus\n\nOffices build culture\nExtra line';

    expect(parseStances(raw)).toEqual({
      forStance: 'Remote work improves focus',
      againstStance: 'Offices build culture',
    });
  });

  it('should reject stances that are too short', () => {
    expect(parseStances('FOR: yes\nAGAINST: Offices build culture')).toBeNull();
  });

  it('should reject a single line', () => {
    expect(parseStances('Remote work improves focus')).toBeNull();
  });
});

describe('StanceGenerator', () => {
  it('should generate the stance pair with one call', async () => {
    const client = fakeClient(STANCE_ANSWER);

    const stance = await new StanceGenerator(client).generateStances(TOPIC);

    expect(stance).toEqual(STANCE);
    expect(client.generate).toHaveBeenCalledTimes(1);
    expect(client.generate.mock.calls[0]?.[0]).toContain(TOPIC);
  });

  it('should fail with a GenerationError on an unparseable answer', async () => {
    const client = fakeClient('I cannot help with that');

    const failure = new StanceGenerator(client).generateStances(TOPIC);

    await expect(failure).rejects.toBeInstanceOf(GenerationError);
    await expect(failure).rejects.toThrow('Failed to generate debate stances: unparseable response');
  });

  it('should turn a failed call into a GenerationError', async () => {
    const client = fakeClient();
    client.generate.mockRejectedValue(new UnavailableError('model runtime unreachable'));

    await expect(new StanceGenerator(client).generateStances(TOPIC)).rejects.toThrow(
      'Failed to generate debate stances: model runtime unreachable'
    );
  });

  it('should use the built-in persona when generation is off', async () => {
    const client = fakeClient();

    const personas = await new StanceGenerator(client).generatePersonas(TOPIC, STANCE);

    expect(personas.for).toContain('You are a debater arguing FOR the topic "Is remote work better than office work?".');
    expect(personas.for).toContain(`Your position: ${STANCE.forStance}`);
    expect(personas.against).toContain(`Your position: ${STANCE.againstStance}`);
    expect(client.generate).not.toHaveBeenCalled();
  });

  it('should generate one persona per side when enabled', async () => {
    const persona = 'You are a thoughtful debater who argues with evidence and stays polite throughout.';
    const client = fakeClient(persona);

    const personas = await new StanceGenerator(client, { generatePersonas: true }).generatePersonas(TOPIC, STANCE);

    expect(personas).toEqual({ for: persona, against: persona });
    expect(client.generate).toHaveBeenCalledTimes(2);
  });

  it('should reject a generated persona that is too short', async () => {
    const client = fakeClient('Be nice.');

    await expect(
      new StanceGenerator(client, { generatePersonas: true }).generatePersonas(TOPIC, STANCE)
    ).rejects.toThrow('Generated persona prompt is too short');
  });
});
