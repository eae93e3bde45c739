/**
 * Gemini service exports
 */

export {
  GeminiClient,
  type GeminiClientDeps,
  type GeminiResponse,
  type StructuredExtractionService,
  type TokenUsage,
} from './client.js';
export { CircuitBreaker, CircuitBreakerOpenError, CircuitState, isServerError } from './circuit-breaker.js';
export {
  GEMINI_MODELS,
  GeminiConfigSchema,
  geminiConfigFromEnv,
  loadGeminiConfig,
  type GeminiConfig,
  type GeminiConfigInput,
} from './config.js';
