export * from './context/index.js';

export { formatCodeForLlm, sendForReview, validateDirectory } from './pipeline.js';
export type { BundleOptions, BundleResult, ReviewOptions } from './pipeline.js';

// Prompt + providers
export {
  ACTIONS,
  DEFAULT_ACTION,
  SYSTEM_INSTRUCTION,
  createPrompt,
  listActions,
  resolveActionInstruction,
  validateAction,
} from './ai/prompt.js';
export type { ModelBackend, ProviderName, BackendOptions } from './ai/backend.js';
export { AnthropicBackend } from './ai/anthropic.js';
export { GeminiBackend } from './ai/gemini.js';
export {
  API_KEY_ENV,
  DEFAULT_MODELS,
  PROVIDERS,
  createBackend,
  parseProvider,
  requestCompletion,
  resolveApiKey,
  sendToAnthropic,
  sendToGemini,
  sendToProvider,
} from './ai/providers.js';
export type { SendOptions } from './ai/providers.js';

// Rendering
export { cleanResponse, displayResponse, saveResponse } from './render/response.js';
export type { DisplayOptions } from './render/response.js';
export { formatMarkdown, renderMarkdown } from './render/markdown.js';

// Config + errors
export { loadConfig, CONFIG_TEMPLATE } from './config.js';
export type { CliConfig } from './config.js';
export {
  RepoCoderError,
  ValidationError,
  ConfigurationError,
  BundleError,
  ProviderError,
  getErrorMessage,
  getErrorCode,
} from './errors.js';
