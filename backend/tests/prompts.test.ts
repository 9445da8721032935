import { describe, it, expect } from 'vitest';
import {
  ArgumentPrompt,
  fillTemplate,
  formatTranscript,
  windowHistory,
  type PromptTemplate,
} from '../src/services/agents/prompts/index.js';
import type { Turn } from '../src/types/debate.js';

const history: Turn[] = [
  { side: 'for', text: 'Point 1', round: 1 },
  { side: 'moderator', kind: 'summary', text: 'Recap' },
  { side: 'against', text: 'Point 2', round: 2 },
];

describe('fillTemplate', () => {
  const template: PromptTemplate = {
    id: 'test-template-v1',
    template: 'Topic: {topic}. Side: {side}. Keep {unknown}.',
  };

  it('should substitute known placeholders and keep unknown ones', () => {
    expect(fillTemplate(template, { topic: 'Tea', side: 'FOR' })).toBe('Topic: Tea. Side: FOR. Keep {unknown}.');
  });

  it('should not read inherited properties as variables', () => {
    const inherited: PromptTemplate = { ...template, template: '{constructor}' };

    expect(fillTemplate(inherited, {})).toBe('{constructor}');
  });

  it('should fill every placeholder of the argument prompt', () => {
    const prompt = fillTemplate(ArgumentPrompt, {
      topic: 'Tea',
      side: 'FOR',
      stance: 'Tea is better',
      instruction: '',
    });

    expect(prompt).not.toMatch(/\{\w+\}/);
  });
});

describe('transcript helpers', () => {
  it('should label each turn by its side', () => {
    expect(formatTranscript(history)).toBe('FOR: Point 1\nMODERATOR: Recap\nAGAINST: Point 2');
  });

  it('should keep the most recent turns of a window', () => {
    expect(windowHistory(history, 2)).toEqual(history.slice(1));
    expect(windowHistory(history, 0)).toBe(history);
    expect(windowHistory(history, 5)).toBe(history);
  });
});
