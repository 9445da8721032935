export {
  LLMContentGuard,
  ArgumentEvaluationSchema,
  extractJson,
  parseVerdict,
  describeEvaluation,
  type ContentGuard,
  type TopicVerdict,
  type ArgumentVerdict,
  type ArgumentEvaluation,
} from './content-guard.js';
