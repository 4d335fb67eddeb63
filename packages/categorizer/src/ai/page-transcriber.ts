import type { PageContent, PageContext, PageTranscriber } from '@monthbook/pdf-extract';
import { createJsonChat, parseJsonReply, type AIConfig, type ChatCompletionFn, type ChatMessage } from './client.js';

export const PAGE_TRANSCRIPTION_PROMPT = `You read one page of a bank or credit card statement.

1. Extract rows only from the main transaction table(s). Ignore headers, footers, summaries, account details, interest calculations and totals.
2. For each row return "date", "description", "amount" and "transaction_type".
3. "amount" is the number exactly as printed, normally positive. Never add a sign for debits.
4. "transaction_type" is "credit" when the row carries a credit marker (CR, Credit, a credit column) and "debit" otherwise.
5. If the page has no transaction table, return {"transactions": []}.

Reply with a single JSON object {"transactions": [{"date": "...", "description": "...", "amount": 0, "transaction_type": "debit"}]} and nothing else.`;

export interface AIPageTranscriberOptions {
  ai?: Partial<AIConfig>;
  chat?: ChatCompletionFn;
}

export function buildPageMessages(page: PageContent, context: PageContext): ChatMessage[] {
  const header = `File: ${context.fileName}, page ${context.pageNumber} of ${context.pageCount}.`;
  if (page.kind === 'text') {
    return [
      { role: 'system', content: PAGE_TRANSCRIPTION_PROMPT },
      {
        role: 'user',
        content: `${header}\nPage text (columns separated by tabs):\n\n${page.text}`,
      },
    ];
  }
  const dataUrl = `data:${page.mimeType};base64,${Buffer.from(page.data).toString('base64')}`;
  return [
    { role: 'system', content: PAGE_TRANSCRIPTION_PROMPT },
    {
      role: 'user',
      content: [
        { type: 'text', text: header },
        { type: 'image_url', image_url: { url: dataUrl } },
      ],
    },
  ];
}

/** Vision/text model transcription of a statement page. */
export class AIPageTranscriber implements PageTranscriber {
  private readonly chat: ChatCompletionFn;

  constructor(options: AIPageTranscriberOptions = {}) {
    this.chat = options.chat ?? createJsonChat(options.ai);
  }

  async transcribe(page: PageContent, context: PageContext): Promise<unknown> {
    if (page.kind === 'text' && page.text.trim() === '') {
      return { transactions: [] };
    }
    return parseJsonReply(await this.chat(buildPageMessages(page, context)));
  }
}
