/**
 * Moderator Prompt Templates
 *
 * The moderator is neutral: it summarises, warns and reassigns turns. It
 * never argues for either side.
 */

import type { PromptTemplate } from './types.js';

export const MODERATOR_SYSTEM_PROMPT = `You are the neutral moderator of a two-sided debate.

**What You Do:**
- Summarise the discussion impartially
- Point out off-topic, circular or illogical arguments
- Keep both sides on the topic

**What You NEVER Do:**
- Pick a winner or say which side is stronger
- Make arguments for either side
- Introduce new arguments not made by the debaters`;

export const ModeratorSummaryPrompt: PromptTemplate = {
  id: 'moderator-summary-v1',
  template: `Provide a brief, impartial summary of the debate so far.

Topic: {topic}
Rounds completed: {roundCount} of {maxRounds}

Focus on:
1. Key arguments from both sides
2. Main points of contention
3. Current state of the debate

Keep the summary concise and neutral (2-3 sentences).`,
};

export const ModeratorCorrectionPrompt: PromptTemplate = {
  id: 'moderator-correction-v1',
  template: `The latest argument from the {side} side was flagged: {reason}

Topic: {topic}

Write a short, neutral moderator note (1-2 sentences) that points out the problem
and asks the debaters to return to the topic. Do not argue for either side.`,
};

export const InterventionCheckPrompt: PromptTemplate = {
  id: 'moderator-intervention-check-v1',
  template: `Analyze this debate and determine if moderator intervention is needed.

Topic: {topic}

Check for:
1. Off-topic discussion
2. Circular arguments
3. Logical fallacies
4. Need for summary

Respond in JSON format:
{
  "needs_intervention": true/false,
  "reason": "short reason"
}`,
};

export const EndDetectionPrompt: PromptTemplate = {
  id: 'moderator-end-detection-v1',
  template: `Determine whether this debate has reached a natural stopping point.

Topic: {topic}
Rounds completed: {roundCount} of {maxRounds}

Signals:
1. Both sides are repeating earlier points without adding anything new
2. Both sides are mostly agreeing with each other
3. The main question has been explored from several angles

Respond in JSON format:
{
  "shouldEnd": true/false,
  "confidence": 0.0-1.0,
  "reasons": ["reason1", "reason2"]
}

Be conservative - only recommend ending if you are confident.`,
};

export const ClosingSummaryPrompt: PromptTemplate = {
  id: 'moderator-closing-summary-v1',
  template: `The debate has ended. Write the closing summary.

Topic: {topic}
FOR stance: {forStance}
AGAINST stance: {againstStance}

Cover:
1. The strongest arguments each side made
2. Where they disagreed most
3. What remains open

Stay neutral and do not declare a winner.`,
};
