import type { AccountClassifier } from '@monthbook/pdf-extract';
import { createTextChat, type AIConfig, type ChatCompletionFn } from './client.js';

export interface AIAccountClassifierOptions {
  ai?: Partial<AIConfig>;
  chat?: ChatCompletionFn;
}

/** Asks the model for the one allowed account name a statement file name belongs to. */
export class AIAccountClassifier implements AccountClassifier {
  private readonly chat: ChatCompletionFn;

  constructor(options: AIAccountClassifierOptions = {}) {
    this.chat = options.chat ?? createTextChat(options.ai);
  }

  async pickAccount(fileName: string, allowedAccounts: readonly string[]): Promise<string> {
    const reply = await this.chat([
      {
        role: 'user',
        content:
          `Analyze the following filename: '${fileName}'. ` +
          `Choose the single best matching account name from this list: ${allowedAccounts.join(', ')}. ` +
          'Respond with only the chosen account name from the list, and nothing else.',
      },
    ]);
    return reply ?? '';
  }
}
