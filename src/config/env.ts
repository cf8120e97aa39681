/**
 * Environment configuration
 * Parsed once from process.env; every knob has a default except the API key.
 */

import 'dotenv/config';
import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
  }
}

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true' || value === '1'));

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'none']).default('openai'),
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  LLM_MODEL: z.string().trim().min(1).optional(),
  OPENAI_MODEL: z.string().trim().min(1).optional(),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  LLM_TOP_P: z.coerce.number().gt(0).max(1).default(0.95),
  LLM_TOP_K: z.coerce.number().int().positive().default(64),
  LLM_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(2048),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  FEATURE_VOICE_INPUT: booleanFlag(true),
  MAX_RECENT_SEARCHES: z.coerce.number().int().positive().default(10),
  ASSISTANT_STATE_FILE: z.string().trim().min(1).default('./data/assistant-state.json'),
});

export interface GenerationSettings {
  model: string;
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface AppConfig {
  llmProvider: 'openai' | 'none';
  openaiApiKey: string | undefined;
  generation: GenerationSettings;
  llmTimeoutMs: number;
  features: {
    voiceInput: boolean;
  };
  maxRecentSearches: number;
  stateFile: string;
}

export const DEFAULT_MODEL = 'gpt-4o-mini';

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    llmProvider: e.LLM_PROVIDER,
    openaiApiKey: e.OPENAI_API_KEY,
    generation: {
      model: e.LLM_MODEL ?? e.OPENAI_MODEL ?? DEFAULT_MODEL,
      temperature: e.LLM_TEMPERATURE,
      topP: e.LLM_TOP_P,
      topK: e.LLM_TOP_K,
      maxOutputTokens: e.LLM_MAX_OUTPUT_TOKENS,
    },
    llmTimeoutMs: e.LLM_TIMEOUT_MS,
    features: {
      voiceInput: e.FEATURE_VOICE_INPUT,
    },
    maxRecentSearches: e.MAX_RECENT_SEARCHES,
    stateFile: e.ASSISTANT_STATE_FILE,
  };
}

/**
 * Sanitized summary for startup logs
 */
export function getConfigSummary(config: AppConfig): Record<string, string | number | boolean> {
  return {
    llmProvider: config.llmProvider,
    model: config.generation.model,
    hasOpenAIKey: !!config.openaiApiKey,
    voiceInput: config.features.voiceInput,
    stateFile: config.stateFile,
  };
}
