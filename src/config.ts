import { resolve } from 'path';
import { z } from 'zod';
import { LLMConfig, LLMProvider, RetryPolicy } from './clients/llm.js';

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n- ${issues.join('\n- ')}`);
    this.name = 'ConfigError';
  }
}

const booleanFlag = z
  .string()
  .default('false')
  .transform((value) => ['true', '1', 'yes'].includes(value.toLowerCase()));

const envSchema = z.object({
  HOMEWORK_FOLDER: z.string().min(1).default('./homework'),
  RESULTS_FOLDER: z.string().min(1).default('results'),
  PROCESSING_FOLDER: z.string().min(1).default('processing'),

  ORACLE_PROVIDER: z.enum(['openai', 'gemini', 'anthropic']).default('openai'),
  ORACLE_MODEL: z.string().min(1).default('qwen-vl-max'),
  ORACLE_BASE_URL: z.string().url().optional(),
  ORACLE_API_KEY: z.string().optional(),
  QWEN_API: z.string().optional(),
  ORACLE_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  ORACLE_MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(8000),
  ORACLE_RETRY_TIMES: z.coerce.number().int().min(1).default(3),
  ORACLE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),

  IMAGE_MAX_SIZE: z.coerce.number().int().positive().default(512),
  IMAGE_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  ANSWER_CONCURRENCY: z.coerce.number().int().min(1).default(1),
  SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  HOMEWORK_WATCH: booleanFlag,
});

export interface FolderConfig {
  homework: string;
  results: string;
  processing: string;
  jobs: string;
}

export interface ImageConfig {
  maxSize: number;
  quality: number;
}

export interface HomeworkConfig {
  folders: FolderConfig;
  oracle: LLMConfig;
  retry: RetryPolicy;
  images: ImageConfig;
  answerConcurrency: number;
  settleDelayMs: number;
  watch: boolean;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (typeof child === 'object' && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

/**
 * Build the immutable runtime configuration from an environment record.
 * Empty strings count as unset.
 */
export function loadConfig(env: Record<string, string | undefined>): Readonly<HomeworkConfig> {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const e = parsed.data;
  const homework = resolve(e.HOMEWORK_FOLDER);
  const provider: LLMProvider = e.ORACLE_PROVIDER;

  return deepFreeze({
    folders: {
      homework,
      results: resolve(homework, e.RESULTS_FOLDER),
      processing: resolve(homework, e.PROCESSING_FOLDER),
      jobs: resolve(homework, '.jobs'),
    },
    oracle: {
      provider,
      model: e.ORACLE_MODEL,
      apiKey: e.ORACLE_API_KEY ?? e.QWEN_API ?? '',
      baseUrl: e.ORACLE_BASE_URL,
      timeout: e.ORACLE_TIMEOUT_MS,
      maxOutputTokens: e.ORACLE_MAX_OUTPUT_TOKENS,
      temperature: e.ORACLE_TEMPERATURE,
    },
    retry: {
      attempts: e.ORACLE_RETRY_TIMES,
      delayMs: e.ORACLE_RETRY_DELAY_MS,
    },
    images: {
      maxSize: e.IMAGE_MAX_SIZE,
      quality: e.IMAGE_QUALITY,
    },
    answerConcurrency: e.ANSWER_CONCURRENCY,
    settleDelayMs: e.SETTLE_DELAY_MS,
    watch: e.HOMEWORK_WATCH,
  });
}
