/**
 * Debater Prompt Templates
 */

import type { PromptTemplate } from './types.js';

export const ArgumentPrompt: PromptTemplate = {
  id: 'debater-argument-v1',
  template: `You are participating in a casual debate about: {topic}
Your side is: {side}
Your stance is: {stance}

{instruction}Respond in a conversational way by:
1. Using natural, casual language
2. Keeping it brief (1-2 sentences)
3. Building on or answering the latest points in the discussion
4. Starting with phrases like 'Actually...', 'I see your point, but...', 'Let me add...'

Keep your response under 40 words.`,
};

export const OpeningInstruction = 'You speak first, so open the debate with your strongest point.\n\n';

export const CorrectionInstruction =
  'The moderator has just corrected the discussion. Take the correction into account.\n\n';
