/**
 * OpenAI-compatible chat client configuration.
 * Defaults to Gemini's OpenAI endpoint; any compatible base URL works.
 */

import OpenAI from 'openai';

export const DEFAULT_AI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';
export const DEFAULT_AI_MODEL = 'gemini-2.0-flash';

export interface AIConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  timeoutMs: number;
}

export type ChatMessage = OpenAI.ChatCompletionMessageParam;

/** Sends messages, returns the text of the first choice (null when empty). */
export type ChatCompletionFn = (messages: ChatMessage[]) => Promise<string | null>;

let clientInstance: OpenAI | null = null;
let currentConfig: AIConfig | null = null;

function firstNonEmpty(...values: (string | undefined)[]): string | undefined {
  return values.find((value) => value !== undefined && value !== '');
}

/**
 * Get AI configuration from environment variables or explicit config.
 * Priority: explicit config > environment variables
 */
export function getAIConfig(config?: Partial<AIConfig>): AIConfig {
  const apiKey = firstNonEmpty(
    config?.apiKey,
    process.env['AI_API_KEY'],
    process.env['GEMINI_API_KEY'],
    process.env['GOOGLE_API_KEY']
  );

  if (apiKey === undefined) {
    throw new Error(
      'AI API key is required. Set AI_API_KEY (or GEMINI_API_KEY) environment variable or pass apiKey in config.'
    );
  }

  const timeoutRaw = config?.timeoutMs ?? Number(process.env['AI_TIMEOUT_MS'] ?? '60000');
  if (!Number.isFinite(timeoutRaw) || timeoutRaw <= 0) {
    throw new Error(`Invalid AI_TIMEOUT_MS: "${String(process.env['AI_TIMEOUT_MS'])}". Must be a positive number.`);
  }

  return {
    apiKey,
    baseURL: firstNonEmpty(config?.baseURL, process.env['AI_BASE_URL']) ?? DEFAULT_AI_BASE_URL,
    model: firstNonEmpty(config?.model, process.env['AI_MODEL']) ?? DEFAULT_AI_MODEL,
    timeoutMs: timeoutRaw,
  };
}

/**
 * Check if an AI key is available (environment variables are set).
 */
export function isAIConfigured(): boolean {
  return firstNonEmpty(process.env['AI_API_KEY'], process.env['GEMINI_API_KEY'], process.env['GOOGLE_API_KEY']) !== undefined;
}

export function createAIClient(config?: Partial<AIConfig>): OpenAI {
  const aiConfig = getAIConfig(config);
  return new OpenAI({
    apiKey: aiConfig.apiKey,
    baseURL: aiConfig.baseURL,
    timeout: aiConfig.timeoutMs,
    maxRetries: 2,
  });
}

/**
 * Get or create a singleton client. Reused for the lifetime of a CLI run.
 */
export function getAIClient(config?: Partial<AIConfig>): OpenAI {
  const newConfig = getAIConfig(config);
  if (
    clientInstance === null ||
    currentConfig === null ||
    currentConfig.apiKey !== newConfig.apiKey ||
    currentConfig.baseURL !== newConfig.baseURL
  ) {
    clientInstance = createAIClient(newConfig);
    currentConfig = newConfig;
  }
  return clientInstance;
}

/**
 * Reset the singleton client instance.
 * Useful for testing or when configuration changes.
 */
export function resetAIClient(): void {
  clientInstance = null;
  currentConfig = null;
}

/** Chat completion in JSON mode at temperature 0. */
export function createJsonChat(config?: Partial<AIConfig>): ChatCompletionFn {
  const aiConfig = getAIConfig(config);
  const client = getAIClient(aiConfig);
  return async (messages) => {
    const response = await client.chat.completions.create({
      model: aiConfig.model,
      messages,
      temperature: 0,
      response_format: { type: 'json_object' },
    });
    return response.choices[0]?.message?.content ?? null;
  };
}

/** Plain-text chat completion at temperature 0. */
export function createTextChat(config?: Partial<AIConfig>): ChatCompletionFn {
  const aiConfig = getAIConfig(config);
  const client = getAIClient(aiConfig);
  return async (messages) => {
    const response = await client.chat.completions.create({
      model: aiConfig.model,
      messages,
      temperature: 0,
    });
    return response.choices[0]?.message?.content ?? null;
  };
}

/**
 * Parses a model reply as JSON, tolerating a ```json fence around it.
 * Throws when the reply is empty or not JSON.
 */
export function parseJsonReply(reply: string | null): unknown {
  if (reply === null || reply.trim() === '') {
    throw new Error('Model returned an empty reply');
  }
  const unfenced = reply
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();
  try {
    return JSON.parse(unfenced);
  } catch (err) {
    const preview = unfenced.slice(0, 200);
    throw new Error(`Model reply is not valid JSON (${err instanceof Error ? err.message : String(err)}): ${preview}`);
  }
}
