/**
 * Content Guard Prompt Templates
 *
 * Topic screening before a debate starts and per-argument evaluation while
 * it runs.
 */

import type { PromptTemplate } from './types.js';

export const TopicFilterPrompt: PromptTemplate = {
  id: 'guard-topic-filter-v1',
  template: `Analyze the following debate topic and determine if it is appropriate:
Topic: {topic}

Consider these criteria:
1. Not harmful or promoting hate
2. Not explicitly graphic or violent
3. Suitable for constructive debate
4. Not personally targeting individuals

Return only 'true' if the topic is appropriate for debate, 'false' if not.
Include a brief reason for the decision.`,
};

export const ArgumentEvaluationPrompt: PromptTemplate = {
  id: 'guard-argument-evaluation-v1',
  template: `As a debate moderator, evaluate the following argument in the context of the debate.

Topic: {topic}
Current Argument: {argument}

Respond in JSON format:
{
  "is_on_topic": true/false,
  "is_circular": true/false,
  "is_logical": true/false,
  "feedback": "brief moderator feedback"
}`,
};

export const GUARD_SYSTEM_PROMPT =
  'You screen debate content for a moderated debate platform. Be brief and literal.';
