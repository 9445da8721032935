/**
 * Stance and Persona Prompt Templates
 */

import type { PromptTemplate } from './types.js';

export const StanceGenerationPrompt: PromptTemplate = {
  id: 'stance-generation-v1',
  template: `You are helping set up a debate about: '{topic}'

Generate exactly two opposing stances in this exact format:
FOR: (write a one-sentence stance supporting the topic)
AGAINST: (write a one-sentence stance opposing the topic)

Make each stance clear and specific. Do not add any other text.`,
};

export const PersonaPromptGeneration: PromptTemplate = {
  id: 'stance-persona-generation-v1',
  template: `Create a system prompt for an AI debater that will argue this position on the topic "{topic}":
{stance}

The system prompt should include:
1. Clear definition of the AI's role and perspective
2. Guidelines for maintaining respectful discourse
3. Requirements for using logic and evidence
4. Instructions for keeping responses focused and concise
5. Strategies for addressing counter-arguments

Return only the system prompt, no explanations.`,
};

/**
 * Built-in persona used when persona prompts are not generated
 */
export const DefaultPersonaPrompt: PromptTemplate = {
  id: 'debater-default-persona-v1',
  template: `You are a debater arguing {side} the topic "{topic}".
Your position: {stance}

Stay in character for the whole debate. Argue only your own position, respond to
your opponent's latest points, keep a respectful tone and never concede your stance.`,
};
