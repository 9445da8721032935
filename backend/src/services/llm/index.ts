export { LLMClient, type LLMClientOptions } from './client.js';
export {
  LLMLanguageModelClient,
  toDebateError,
  type LanguageModelClient,
  type GenerateOptions,
} from './language-model-client.js';
export { LLMError, type CompletionProvider, type LLMRequest, type LLMResponse } from '../../types/llm.js';
export { llmConfig, type LLMConfig, type ModelRole } from '../../config/llm.js';
