import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  AIAccountClassifier,
  AIPageTranscriber,
  AITransactionClassifier,
  DEFAULT_AI_BASE_URL,
  DEFAULT_AI_MODEL,
  buildClassificationPrompt,
  buildPageMessages,
  getAIConfig,
  isAIConfigured,
  parseJsonReply,
  type ChatCompletionFn,
  type ChatMessage,
} from '@monthbook/categorizer';

const AI_ENV_KEYS = ['AI_API_KEY', 'GEMINI_API_KEY', 'GOOGLE_API_KEY', 'AI_BASE_URL', 'AI_MODEL', 'AI_TIMEOUT_MS'];

function recordingChat(reply: string | null): { chat: ChatCompletionFn; calls: ChatMessage[][] } {
  const calls: ChatMessage[][] = [];
  return {
    calls,
    chat: (messages) => {
      calls.push(messages);
      return Promise.resolve(reply);
    },
  };
}

function textOf(message: ChatMessage | undefined): string {
  return typeof message?.content === 'string' ? message.content : '';
}

describe('getAIConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of AI_ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of AI_ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('should throw when no key is available', () => {
    expect(isAIConfigured()).toBe(false);
    expect(() => getAIConfig()).toThrow('AI API key is required');
  });

  it('should use defaults around an explicit key', () => {
    expect(getAIConfig({ apiKey: 'test-secret' })).toEqual({
      apiKey: 'test-secret',
      baseURL: DEFAULT_AI_BASE_URL,
      model: DEFAULT_AI_MODEL,
      timeoutMs: 60000,
    });
  });

  it('should read the environment', () => {
    process.env['GEMINI_API_KEY'] = 'test-secret';
    process.env['AI_MODEL'] = 'local-model';
    process.env['AI_BASE_URL'] = 'http://localhost:11434/v1';
    expect(isAIConfigured()).toBe(true);
    const config = getAIConfig();
    expect(config.apiKey).toBe('test-secret');
    expect(config.model).toBe('local-model');
    expect(config.baseURL).toBe('http://localhost:11434/v1');
  });

  it('should prefer explicit config over the environment', () => {
    process.env['AI_API_KEY'] = 'env-secret';
    expect(getAIConfig({ apiKey: 'test-secret' }).apiKey).toBe('test-secret');
  });

  it('should reject a bad timeout', () => {
    process.env['AI_API_KEY'] = 'test-secret';
    process.env['AI_TIMEOUT_MS'] = 'soon';
    expect(() => getAIConfig()).toThrow('Invalid AI_TIMEOUT_MS: "soon". Must be a positive number.');
  });
});

describe('parseJsonReply', () => {
  it('should parse plain and fenced JSON', () => {
    expect(parseJsonReply('{"a": 1}')).toEqual({ a: 1 });
    expect(parseJsonReply('```json\n{"a": 1}\n```')).toEqual({ a: 1 });
  });

  it('should reject empty and non-JSON replies', () => {
    expect(() => parseJsonReply(null)).toThrow('Model returned an empty reply');
    expect(() => parseJsonReply('  ')).toThrow('Model returned an empty reply');
    expect(() => parseJsonReply('Sure! Here you go')).toThrow('Model reply is not valid JSON');
  });
});

describe('AITransactionClassifier', () => {
  it('should send the prompt and the indexed batch', async () => {
    const { chat, calls } = recordingChat('{"processed_transactions": []}');
    const classifier = new AITransactionClassifier({ chat });
    const items = [{ index: 0, date: '01/03/2024', description: 'SWIGGY', amount: 300 }];

    const reply = await classifier.classify(items);

    expect(reply).toEqual({ processed_transactions: [] });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.[0]?.role).toBe('system');
    expect(textOf(calls[0]?.[1])).toBe(JSON.stringify(items, null, 2));
  });

  it('should list every category and both parties in the prompt', () => {
    const prompt = buildClassificationPrompt({ primary: 'Sam', secondary: 'Alex' });
    expect(prompt).toContain('a household of two: Sam and Alex');
    expect(prompt).toContain('  ENTERTAINMENT (Entertainment)');
    expect(prompt).toContain('  INCOME_TAX (Income Tax)');
  });

  it('should surface a non-JSON reply as an error', async () => {
    const { chat } = recordingChat('I cannot help with that');
    await expect(new AITransactionClassifier({ chat }).classify([])).rejects.toThrow('Model reply is not valid JSON');
  });
});

describe('AIAccountClassifier', () => {
  it('should return the raw reply', async () => {
    const { chat, calls } = recordingChat('HDFC Savings\n');
    const account = await new AIAccountClassifier({ chat }).pickAccount('stmt_03.pdf', ['HDFC Savings', 'Cash']);
    expect(account).toBe('HDFC Savings\n');
    expect(textOf(calls[0]?.[0])).toContain('from this list: HDFC Savings, Cash.');
  });

  it('should return an empty string for an empty reply', async () => {
    const { chat } = recordingChat(null);
    expect(await new AIAccountClassifier({ chat }).pickAccount('x.pdf', ['Cash'])).toBe('');
  });
});

describe('AIPageTranscriber', () => {
  it('should skip the model for a blank text page', async () => {
    const { chat, calls } = recordingChat('{}');
    const reply = await new AIPageTranscriber({ chat }).transcribe(
      { kind: 'text', pageNumber: 1, text: '  \n ' },
      { fileName: 'a.pdf', pageNumber: 1, pageCount: 1 }
    );
    expect(reply).toEqual({ transactions: [] });
    expect(calls).toHaveLength(0);
  });

  it('should send page text with its position in the file', async () => {
    const { chat, calls } = recordingChat('{"transactions": []}');
    await new AIPageTranscriber({ chat }).transcribe(
      { kind: 'text', pageNumber: 2, text: '01/03/2024\tSWIGGY\t300.00' },
      { fileName: 'card.pdf', pageNumber: 2, pageCount: 3 }
    );
    expect(textOf(calls[0]?.[1])).toBe(
      'File: card.pdf, page 2 of 3.\nPage text (columns separated by tabs):\n\n01/03/2024\tSWIGGY\t300.00'
    );
  });

  it('should send an image page as a data URL', () => {
    const messages = buildPageMessages(
      { kind: 'image', pageNumber: 1, mimeType: 'image/png', data: new Uint8Array([1, 2, 3]) },
      { fileName: 'scan.png', pageNumber: 1, pageCount: 1 }
    );
    const user = messages[1];
    expect(Array.isArray(user?.content)).toBe(true);
    expect(JSON.stringify(user?.content)).toContain('"url":"data:image/png;base64,AQID"');
  });
});
