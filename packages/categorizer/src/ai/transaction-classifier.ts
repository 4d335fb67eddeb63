import { CATEGORY_DEFINITIONS, DEFAULT_PARTIES, type Parties } from '@monthbook/types';
import type { ClassificationRequestItem, TransactionClassifier } from '../classifier.js';
import { createJsonChat, parseJsonReply, type AIConfig, type ChatCompletionFn } from './client.js';

export function buildClassificationPrompt(parties: Parties = DEFAULT_PARTIES): string {
  const categories = CATEGORY_DEFINITIONS.map((d) => `  ${d.key} (${d.value})`).join('\n');
  return `You categorize personal bank and credit card transactions for a household of two: ${parties.primary} and ${parties.secondary}.

You receive a JSON array of transactions, each with "index", "date", "description" and "amount".
For every transaction return one object with:
- "original_index": the "index" you were given, unchanged
- "category_str": exactly one category name from the list below
- "is_expense": 1 for money spent, 0 for income, refunds, cashback, transfers between own accounts and card bill payments
- "is_split": 0 when the expense is ${parties.primary}'s alone, 1 when it is shared evenly, 2 when it belongs entirely to ${parties.secondary}

Reply with a single JSON object {"processed_transactions": [...]} holding one entry per input transaction and nothing else.

Valid categories:
${categories}
`;
}

export interface AITransactionClassifierOptions {
  ai?: Partial<AIConfig>;
  parties?: Parties;
  /** Injected completion function; defaults to an OpenAI-compatible JSON chat. */
  chat?: ChatCompletionFn;
}

export class AITransactionClassifier implements TransactionClassifier {
  readonly name = 'AI classifier';
  private readonly chat: ChatCompletionFn;
  private readonly prompt: string;

  constructor(options: AITransactionClassifierOptions = {}) {
    this.chat = options.chat ?? createJsonChat(options.ai);
    this.prompt = buildClassificationPrompt(options.parties);
  }

  async classify(items: readonly ClassificationRequestItem[]): Promise<unknown> {
    const reply = await this.chat([
      { role: 'system', content: this.prompt },
      { role: 'user', content: JSON.stringify(items, null, 2) },
    ]);
    return parseJsonReply(reply);
  }
}
