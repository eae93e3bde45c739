/**
 * Gemini configuration for the AI metadata extractor
 *
 * Either an API key (Gemini Developer API) or Vertex AI with project and
 * location. Sampling is deterministic: temperature 0, JSON response.
 */

import { z } from 'zod';

export const GEMINI_MODELS = {
  FLASH: 'gemini-2.5-flash',
  FLASH_LITE: 'gemini-2.5-flash-lite',
  PRO: 'gemini-2.5-pro',
} as const;

export const GeminiConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  useVertex: z.boolean().default(false),
  project: z.string().optional(),
  location: z.string().default('us-central1'),
  model: z.string().min(1).default(GEMINI_MODELS.FLASH),

  // Generation
  temperature: z.number().min(0).max(2).default(0),
  maxOutputTokens: z.number().int().positive().default(2048),
  requestTimeoutMs: z.number().int().positive().default(60000),

  // Retry configuration
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(10000),
    })
    .default({}),

  // Circuit breaker
  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60000),
    })
    .default({}),
});

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;
export type GeminiConfigInput = z.input<typeof GeminiConfigSchema>;

export type EnvRecord = Record<string, string | undefined>;

export function parseIntEnv(env: EnvRecord, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric env var ${name}: "${raw}"`);
  }
  return parsed;
}

export function parseBoolEnv(env: EnvRecord, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  throw new Error(`Invalid boolean env var ${name}: "${env[name]}"`);
}

/**
 * Gemini settings from an environment record.
 *
 * Environment variables:
 *   GEMINI_API_KEY / GOOGLE_API_KEY - API key (Developer API)
 *   GEMINI_USE_VERTEX               - use Vertex AI with GCP_PROJECT_ID
 *   GEMINI_LOCATION                 - Vertex location (default: us-central1)
 *   GEMINI_MODEL                    - model id (default: gemini-2.5-flash)
 *   GEMINI_TIMEOUT_MS               - per-request timeout (default: 60000)
 */
export function geminiConfigFromEnv(env: EnvRecord): GeminiConfigInput {
  const apiKey = env.GEMINI_API_KEY || env.GOOGLE_API_KEY || undefined;
  return {
    apiKey,
    useVertex: parseBoolEnv(env, 'GEMINI_USE_VERTEX', false),
    project: env.GCP_PROJECT_ID || undefined,
    location: env.GEMINI_LOCATION || undefined,
    model: env.GEMINI_MODEL || undefined,
    requestTimeoutMs: parseIntEnv(env, 'GEMINI_TIMEOUT_MS', 60000),
  };
}

export function loadGeminiConfig(overrides: GeminiConfigInput = {}): GeminiConfig {
  return GeminiConfigSchema.parse(overrides);
}
