/**
 * Statement PDFs attached to mail received around the accounting month.
 */

import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import dayjs from 'dayjs';
import { google, type Auth, type gmail_v1 } from 'googleapis';
import { describeError, silentLogger, type AccountingMonth, type Logger } from '@monthbook/types';
import type { StatementDocument } from '@monthbook/pdf-extract';
import { PDF_MIME_TYPE, type StatementSource } from './types.js';

export const STATEMENT_SUBJECTS = [
  'Credit Card Statement',
  'E - Pass Sheet',
  'Combined Account Statement',
  'Combined Email Statement',
] as const;

/**
 * Mail from the first day of the month until the first day two months on,
 * since a month's statements arrive during the following month.
 */
export function buildGmailQuery(month: AccountingMonth, extra?: string): string {
  const start = dayjs(new Date(month.year, month.month - 1, 1));
  const end = start.add(2, 'month');
  const subjects = STATEMENT_SUBJECTS.map((s) => `"${s}"`).join(' OR ');
  const parts = [
    `after:${start.format('YYYY/MM/DD')}`,
    `before:${end.format('YYYY/MM/DD')}`,
    'has:attachment',
    'filename:pdf',
    `subject:(${subjects})`,
  ];
  if (extra !== undefined && extra.trim() !== '') parts.push(extra.trim());
  return parts.join(' ');
}

export interface PdfPart {
  fileName: string;
  attachmentId: string;
}

/** PDF attachments anywhere in a message's MIME tree. */
export function findPdfParts(part: gmail_v1.Schema$MessagePart | undefined): PdfPart[] {
  if (part === undefined) return [];
  const found: PdfPart[] = [];
  const mimeType = (part.mimeType ?? '').toLowerCase();
  const fileName = part.filename ?? '';
  const attachmentId = part.body?.attachmentId ?? '';
  const looksLikePdf =
    mimeType === PDF_MIME_TYPE ||
    (mimeType === 'application/octet-stream' && fileName.toLowerCase().endsWith('.pdf'));

  if (looksLikePdf && fileName !== '' && attachmentId !== '') {
    found.push({ fileName, attachmentId });
  }
  for (const child of part.parts ?? []) {
    found.push(...findPdfParts(child));
  }
  return found;
}

export function headerValue(part: gmail_v1.Schema$MessagePart | undefined, name: string): string | null {
  const header = part?.headers?.find((h) => h.name?.toLowerCase() === name.toLowerCase());
  return header?.value ?? null;
}

function safeFileComponent(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

export interface GmailStatementSourceOptions {
  extraQuery?: string;
  /** Also write each attachment here, as the statement archive. */
  downloadDir?: string;
  logger?: Logger;
}

export class GmailStatementSource implements StatementSource {
  readonly name = 'gmail';
  private readonly gmail: gmail_v1.Gmail;
  private readonly options: GmailStatementSourceOptions;
  private readonly logger: Logger;

  constructor(auth: Auth.OAuth2Client, options: GmailStatementSourceOptions = {}) {
    this.gmail = google.gmail({ version: 'v1', auth });
    this.options = options;
    this.logger = options.logger ?? silentLogger;
  }

  private async listMessageIds(query: string): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;
    do {
      const res = await this.gmail.users.messages.list({ userId: 'me', q: query, pageToken });
      for (const message of res.data.messages ?? []) {
        if (message.id !== null && message.id !== undefined) ids.push(message.id);
      }
      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken !== undefined);
    return ids;
  }

  private async downloadAttachment(messageId: string, attachmentId: string): Promise<Uint8Array> {
    const res = await this.gmail.users.messages.attachments.get({ userId: 'me', messageId, id: attachmentId });
    const data = res.data.data;
    if (data === null || data === undefined || data === '') {
      throw new Error('attachment has no data');
    }
    return new Uint8Array(Buffer.from(data, 'base64url'));
  }

  async fetch(month: AccountingMonth): Promise<StatementDocument[]> {
    const query = buildGmailQuery(month, this.options.extraQuery);
    this.logger.info(`Searching Gmail: ${query}`);
    const messageIds = await this.listMessageIds(query);
    this.logger.info(`Found ${messageIds.length} matching message(s)`);

    if (this.options.downloadDir !== undefined) {
      await mkdir(this.options.downloadDir, { recursive: true });
    }

    const documents: StatementDocument[] = [];
    for (const messageId of messageIds) {
      const res = await this.gmail.users.messages.get({ userId: 'me', id: messageId, format: 'full' });
      const subject = headerValue(res.data.payload, 'Subject') ?? '';
      const parts = findPdfParts(res.data.payload);
      if (parts.length === 0) {
        this.logger.debug(`No PDF attachment in message ${messageId} (${subject})`);
        continue;
      }

      for (const part of parts) {
        try {
          const data = await this.downloadAttachment(messageId, part.attachmentId);
          documents.push({ fileName: part.fileName, subject, mimeType: PDF_MIME_TYPE, data });
          this.logger.info(`Fetched '${part.fileName}' from "${subject}"`);
          if (this.options.downloadDir !== undefined) {
            const target = join(this.options.downloadDir, `${messageId}_${safeFileComponent(part.fileName)}`);
            await writeFile(target, data);
          }
        } catch (err) {
          this.logger.error(`Could not download '${part.fileName}' from message ${messageId}: ${describeError(err)}`);
        }
      }
    }
    return documents;
  }
}
