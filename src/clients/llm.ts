import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { ContentOracle, ContentTurn, OracleResponse } from '../types/index.js';

export type LLMProvider = 'openai' | 'gemini' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  baseUrl?: string;          // OpenAI-compatible endpoint (default: DashScope compatible mode)
  timeout?: number;          // Per-attempt timeout in milliseconds (default: 120000)
  maxOutputTokens?: number;  // default: 8000
  temperature?: number;      // default: 0.3
}

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export const DEFAULT_OPENAI_BASE_URL = 'https://dashscope.aliyuncs.com/compatible-mode/v1';

export class OracleError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'OracleError';
  }
}

export function oracleFailureText(attempts: number): string {
  return `Oracle call failed after ${attempts} attempts`;
}

const openAIResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable().optional() }) })).optional(),
});

const geminiResponseSchema = z.object({
  candidates: z
    .array(z.object({ content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).optional() }).optional() }))
    .optional(),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).optional(),
});

async function postJson(url: string, headers: Record<string, string>, body: unknown, timeout: number, label: string): Promise<unknown> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`${label} API error: ${response.status} ${response.statusText}`);
    }

    return await response.json();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * OpenAI-compatible chat completions (OpenAI, DashScope/Qwen, vLLM...)
 */
async function callOpenAI(systemPrompt: string, turns: ContentTurn[], config: Required<LLMConfig>): Promise<string> {
  const content = turns.map((turn) =>
    turn.type === 'text'
      ? { type: 'text', text: turn.text }
      : { type: 'image_url', image_url: { url: `data:${turn.mimeType};base64,${turn.data}` } }
  );

  const data = await postJson(
    `${config.baseUrl.replace(/\/+$/, '')}/chat/completions`,
    { Authorization: `Bearer ${config.apiKey}` },
    {
      model: config.model,
      messages: [
        { role: 'system', content: systemPrompt },
        { role: 'user', content },
      ],
      temperature: config.temperature,
      max_tokens: config.maxOutputTokens,
    },
    config.timeout,
    'OpenAI'
  );

  return openAIResponseSchema.parse(data).choices?.[0]?.message.content || '';
}

/**
 * Gemini generateContent with inline image data
 */
async function callGemini(systemPrompt: string, turns: ContentTurn[], config: Required<LLMConfig>): Promise<string> {
  const parts = turns.map((turn) =>
    turn.type === 'text'
      ? { text: turn.text }
      : { inline_data: { mime_type: turn.mimeType, data: turn.data } }
  );

  const data = await postJson(
    `https://generativelanguage.googleapis.com/v1beta/models/${config.model}:generateContent?key=${config.apiKey}`,
    {},
    {
      system_instruction: { parts: [{ text: systemPrompt }] },
      contents: [{ role: 'user', parts }],
      generationConfig: { temperature: config.temperature, maxOutputTokens: config.maxOutputTokens },
    },
    config.timeout,
    'Gemini'
  );

  const candidateParts = geminiResponseSchema.parse(data).candidates?.[0]?.content?.parts ?? [];
  return candidateParts.map((part) => part.text ?? '').join('');
}

/**
 * Anthropic messages API with base64 image blocks
 */
async function callAnthropic(systemPrompt: string, turns: ContentTurn[], config: Required<LLMConfig>): Promise<string> {
  const content = turns.map((turn) =>
    turn.type === 'text'
      ? { type: 'text', text: turn.text }
      : { type: 'image', source: { type: 'base64', media_type: turn.mimeType, data: turn.data } }
  );

  const data = await postJson(
    'https://api.anthropic.com/v1/messages',
    { 'x-api-key': config.apiKey, 'anthropic-version': '2023-06-01' },
    {
      model: config.model,
      system: systemPrompt,
      messages: [{ role: 'user', content }],
      max_tokens: config.maxOutputTokens,
      temperature: config.temperature,
    },
    config.timeout,
    'Anthropic'
  );

  const blocks = anthropicResponseSchema.parse(data).content ?? [];
  return blocks.filter((block) => block.type === 'text').map((block) => block.text ?? '').join('');
}

/**
 * Single attempt against the configured provider. Throws OracleError on failure.
 */
export async function callLLM(systemPrompt: string, turns: ContentTurn[], config: LLMConfig): Promise<string> {
  const resolved: Required<LLMConfig> = {
    ...config,
    baseUrl: config.baseUrl || DEFAULT_OPENAI_BASE_URL,
    timeout: config.timeout || 120000,
    maxOutputTokens: config.maxOutputTokens || 8000,
    temperature: config.temperature ?? 0.3,
  };

  try {
    if (resolved.provider === 'openai') return await callOpenAI(systemPrompt, turns, resolved);
    if (resolved.provider === 'gemini') return await callGemini(systemPrompt, turns, resolved);
    return await callAnthropic(systemPrompt, turns, resolved);
  } catch (error) {
    throw new OracleError(
      `${resolved.model} call failed: ${error instanceof Error ? error.message : String(error)}`,
      resolved.model,
      error
    );
  }
}

/**
 * Content oracle over HTTP with a fixed retry policy.
 * Never rejects: after the last attempt it resolves with the sentinel text and `error` set.
 */
export class HttpContentOracle implements ContentOracle {
  constructor(
    private readonly config: Readonly<LLMConfig>,
    private readonly retry: Readonly<RetryPolicy>
  ) {}

  async complete(systemPrompt: string, turns: ContentTurn[]): Promise<OracleResponse> {
    const attempts = Math.max(1, this.retry.attempts);
    let lastError = '';

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        const content = await callLLM(systemPrompt, turns, this.config);
        return { model: this.config.model, content };
      } catch (error) {
        lastError = error instanceof Error ? error.message : String(error);
        console.error(`[Oracle] Attempt ${attempt}/${attempts} failed: ${lastError}`);
        if (attempt < attempts) await sleep(this.retry.delayMs);
      }
    }

    return { model: this.config.model, content: oracleFailureText(attempts), error: lastError };
  }
}
