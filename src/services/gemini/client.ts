/**
 * Gemini client for structured metadata extraction
 *
 * Text-in, JSON-out generation through @google/genai, behind a circuit
 * breaker and exponential-backoff retry for transient failures.
 */

import { GoogleGenAI } from '@google/genai';

import { withRetry, type RetryHooks } from '../../utils/backoff.js';
import { createLogger, type Logger } from '../../utils/logger.js';
import { CircuitBreaker, isServerError } from './circuit-breaker.js';
import { loadGeminiConfig, type GeminiConfig, type GeminiConfigInput } from './config.js';

/**
 * Token usage from a response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GeminiResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

/**
 * Generative structured-extraction service: instruction + text in, raw JSON text out
 */
export interface StructuredExtractionService {
  infer(instruction: string, text: string): Promise<string>;
}

export interface GeminiClientDeps {
  logger?: Logger;
  circuitBreaker?: CircuitBreaker;
  /** Replaces the backoff sleep (tests) */
  sleep?: RetryHooks['sleep'];
}

export class GeminiClient implements StructuredExtractionService {
  private readonly config: GeminiConfig;
  private readonly ai: GoogleGenAI;
  private readonly circuitBreaker: CircuitBreaker;
  private readonly logger: Logger;
  private readonly sleep?: RetryHooks['sleep'];

  constructor(config: GeminiConfigInput = {}, deps: GeminiClientDeps = {}) {
    this.config = loadGeminiConfig(config);
    this.logger = deps.logger ?? createLogger('Gemini');
    this.sleep = deps.sleep;
    this.circuitBreaker =
      deps.circuitBreaker ?? new CircuitBreaker(this.config.circuitBreaker, this.logger.child('CircuitBreaker'));

    if (this.config.useVertex) {
      if (!this.config.project) {
        throw new Error('Vertex AI mode requires a project id (GCP_PROJECT_ID)');
      }
      this.ai = new GoogleGenAI({ vertexai: true, project: this.config.project, location: this.config.location });
    } else {
      if (!this.config.apiKey) {
        throw new Error('GEMINI_API_KEY (or GOOGLE_API_KEY) is required unless GEMINI_USE_VERTEX=true');
      }
      this.ai = new GoogleGenAI({ apiKey: this.config.apiKey });
    }
  }

  get model(): string {
    return this.config.model;
  }

  async infer(instruction: string, text: string): Promise<string> {
    const response = await this.generateJson(instruction, text);
    this.logger.debug(
      `${response.model}: ${response.usage.inputTokens} in / ${response.usage.outputTokens} out tokens, ${response.processingTimeMs}ms`
    );
    return response.text;
  }

  /**
   * One JSON-mode generation, retried on transient errors
   */
  async generateJson(instruction: string, text: string): Promise<GeminiResponse> {
    const startTime = Date.now();
    const { maxAttempts, baseDelayMs, maxDelayMs } = this.config.retry;

    const response = await this.circuitBreaker.execute(() =>
      withRetry(() => this.callGenerateContent(instruction, text), isServerError, {
        maxAttempts,
        baseDelayMs,
        maxDelayMs,
        sleep: this.sleep,
        onRetry: (attempt, delay, error) =>
          this.logger.warn(
            `Attempt ${attempt + 1}/${maxAttempts} failed: ${error instanceof Error ? error.message : String(error)}. Retrying in ${delay}ms`
          ),
      })
    );

    return { ...response, processingTimeMs: Date.now() - startTime };
  }

  private async callGenerateContent(
    instruction: string,
    text: string
  ): Promise<Omit<GeminiResponse, 'processingTimeMs'>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);

    try {
      const response = await this.ai.models.generateContent({
        model: this.config.model,
        contents: text,
        config: {
          systemInstruction: instruction,
          temperature: this.config.temperature,
          maxOutputTokens: this.config.maxOutputTokens,
          responseMimeType: 'application/json',
          abortSignal: controller.signal,
        },
      });

      const output = response.text;
      if (!output) {
        throw new Error('Gemini returned an empty response');
      }

      const usage = response.usageMetadata;
      const inputTokens = usage?.promptTokenCount ?? 0;
      const outputTokens = usage?.candidatesTokenCount ?? 0;
      return {
        text: output,
        model: this.config.model,
        usage: { inputTokens, outputTokens, totalTokens: usage?.totalTokenCount ?? inputTokens + outputTokens },
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
