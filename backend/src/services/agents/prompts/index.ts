/**
 * Prompt library exports
 */

export { fillTemplate, type PromptTemplate } from './types.js';
export { formatTurn, formatTranscript, windowHistory } from './transcript.js';
export { TopicFilterPrompt, ArgumentEvaluationPrompt, GUARD_SYSTEM_PROMPT } from './guard-prompts.js';
export { StanceGenerationPrompt, PersonaPromptGeneration, DefaultPersonaPrompt } from './stance-prompts.js';
export { ArgumentPrompt, OpeningInstruction, CorrectionInstruction } from './debater-prompts.js';
export {
  MODERATOR_SYSTEM_PROMPT,
  ModeratorSummaryPrompt,
  ModeratorCorrectionPrompt,
  InterventionCheckPrompt,
  EndDetectionPrompt,
  ClosingSummaryPrompt,
} from './moderator-prompts.js';
