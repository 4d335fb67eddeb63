/**
 * Extraction stage: statement documents in, raw transactions out.
 *
 * Documents and their pages are processed one at a time. A bad page is
 * skipped, a locked or unreadable document is skipped, and only a review
 * abort stops the stage.
 */

import { z } from 'zod';
import {
  DEFAULT_PARTIES,
  ExtractedRowSchema,
  createTransaction,
  describeError,
  silentLogger,
  type Logger,
  type Transaction,
} from '@monthbook/types';
import { inferSourceAccount, type AccountRule } from './account-inference.js';
import { DocumentLockedError, PageTranscriptionError, ReviewAbortError } from './errors.js';
import { PdfjsOpener } from './pdf-reader.js';
import {
  acceptAllReviewGate,
  type AccountClassifier,
  type DocumentOutcome,
  type PageContent,
  type PageTranscriber,
  type PdfOpener,
  type ReviewGate,
  type StatementDocument,
} from './types.js';

export const PageTranscriptionSchema = z.object({
  transactions: z.array(z.unknown()),
});

export interface ExtractionOptions {
  allowedAccounts: readonly string[];
  transcriber: PageTranscriber;
  passwords?: readonly string[];
  accountClassifier?: AccountClassifier | null;
  accountRules?: readonly AccountRule[];
  pdfOpener?: PdfOpener;
  reviewGate?: ReviewGate;
  /** Descriptions containing this token (case-insensitive) start with `isSplit = 2`. */
  secondaryPartyToken?: string;
  logger?: Logger;
}

export interface DocumentExtraction {
  transactions: Transaction[];
  outcome: DocumentOutcome;
}

export interface ExtractionResult {
  transactions: Transaction[];
  documents: DocumentOutcome[];
}

interface PageRows {
  transactions: Transaction[];
  rowsDropped: number;
}

function rowsFromReply(
  reply: unknown,
  pageNumber: number,
  sourceAccount: string,
  splitToken: string,
  logger: Logger
): PageRows {
  const page = PageTranscriptionSchema.safeParse(reply);
  if (!page.success) {
    throw new PageTranscriptionError(pageNumber, 'reply is not a { transactions: [...] } object');
  }

  const transactions: Transaction[] = [];
  let rowsDropped = 0;
  page.data.transactions.forEach((item, index) => {
    const row = ExtractedRowSchema.safeParse(item);
    if (!row.success) {
      rowsDropped++;
      logger.warn(`Page ${pageNumber}: dropping row ${index} (${row.error.issues[0]?.message ?? 'invalid row'})`);
      return;
    }
    const tx = createTransaction({
      date: row.data.date ?? null,
      description: row.data.description,
      amount: row.data.amount,
      transactionType: row.data.transaction_type,
      sourceAccount,
    });
    if (splitToken !== '' && tx.description.toLowerCase().includes(splitToken)) {
      tx.isSplit = 2;
    }
    transactions.push(tx);
  });
  return { transactions, rowsDropped };
}

async function loadPages(
  document: StatementDocument,
  opener: PdfOpener,
  passwords: readonly string[]
): Promise<{ pageCount: number; read: (pageNumber: number) => Promise<PageContent>; close: () => Promise<void> }> {
  if (document.mimeType.startsWith('image/')) {
    const page: PageContent = { kind: 'image', pageNumber: 1, mimeType: document.mimeType, data: document.data };
    return { pageCount: 1, read: () => Promise.resolve(page), close: () => Promise.resolve() };
  }
  const pdf = await opener.open(document.data, passwords);
  return { pageCount: pdf.pageCount, read: (n) => pdf.getPage(n), close: () => pdf.close() };
}

export async function extractDocument(
  document: StatementDocument,
  options: ExtractionOptions
): Promise<DocumentExtraction> {
  const logger = options.logger ?? silentLogger;
  const splitToken = (options.secondaryPartyToken ?? DEFAULT_PARTIES.secondary).toLowerCase();
  const { fileName } = document;

  const sourceAccount = await inferSourceAccount(fileName, document.subject, {
    allowedAccounts: options.allowedAccounts,
    classifier: options.accountClassifier ?? null,
    logger,
    ...(options.accountRules !== undefined ? { rules: options.accountRules } : {}),
  });

  const outcome: DocumentOutcome = {
    fileName,
    sourceAccount,
    status: 'accepted',
    pagesRead: 0,
    pagesSkipped: 0,
    rowsDropped: 0,
    transactionCount: 0,
  };

  let pages: Awaited<ReturnType<typeof loadPages>>;
  try {
    pages = await loadPages(document, options.pdfOpener ?? new PdfjsOpener(), options.passwords ?? []);
  } catch (err) {
    const locked = err instanceof DocumentLockedError;
    logger.warn(
      locked
        ? `Skipping ${fileName}: none of the configured passwords opened it`
        : `Skipping ${fileName}: ${describeError(err)}`
    );
    return { transactions: [], outcome: { ...outcome, status: locked ? 'locked' : 'failed', error: describeError(err) } };
  }

  const transactions: Transaction[] = [];
  try {
    for (let pageNumber = 1; pageNumber <= pages.pageCount; pageNumber++) {
      logger.debug(`${fileName}: page ${pageNumber}/${pages.pageCount}`);
      try {
        const content = await pages.read(pageNumber);
        const reply = await options.transcriber.transcribe(content, {
          fileName,
          pageNumber,
          pageCount: pages.pageCount,
        });
        const rows = rowsFromReply(reply, pageNumber, sourceAccount, splitToken, logger);
        transactions.push(...rows.transactions);
        outcome.rowsDropped += rows.rowsDropped;
        outcome.pagesRead++;
      } catch (err) {
        outcome.pagesSkipped++;
        logger.warn(`Skipping page ${pageNumber} of ${fileName}: ${describeError(err)}`);
      }
    }
  } finally {
    try {
      await pages.close();
    } catch (err) {
      logger.warn(`Could not close ${fileName}: ${describeError(err)}`);
    }
  }

  logger.info(`Extracted ${transactions.length} transactions from ${fileName} (${sourceAccount})`);

  if (transactions.length > 0) {
    const decision = await (options.reviewGate ?? acceptAllReviewGate).review({
      fileName,
      sourceAccount,
      transactions,
    });
    if (decision === 'abort') {
      throw new ReviewAbortError(fileName);
    }
    if (decision === 'discard') {
      logger.info(`Discarded ${transactions.length} transactions from ${fileName} at review`);
      return { transactions: [], outcome: { ...outcome, status: 'discarded' } };
    }
  }

  return { transactions, outcome: { ...outcome, transactionCount: transactions.length } };
}

/**
 * Extracts every document in order. A {@link ReviewAbortError} propagates
 * so the caller can stop without checkpointing.
 */
export async function extractStatements(
  documents: readonly StatementDocument[],
  options: ExtractionOptions
): Promise<ExtractionResult> {
  const logger = options.logger ?? silentLogger;
  const transactions: Transaction[] = [];
  const outcomes: DocumentOutcome[] = [];

  for (const document of documents) {
    const result = await extractDocument(document, options);
    transactions.push(...result.transactions);
    outcomes.push(result.outcome);
  }

  const skipped = outcomes.filter((o) => o.status === 'locked' || o.status === 'failed').length;
  logger.info(
    `Extraction finished: ${transactions.length} transactions from ${documents.length} document(s), ${skipped} skipped`
  );
  return { transactions, documents: outcomes };
}
