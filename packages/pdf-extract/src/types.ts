import type { Transaction } from '@monthbook/types';

/** A statement as delivered by a source (mailbox, directory). */
export interface StatementDocument {
  fileName: string;
  /** Subject line of the originating message; empty for local files. */
  subject: string;
  mimeType: string;
  data: Uint8Array;
}

/**
 * What the transcriber sees of one page: positioned text lines from the
 * PDF text layer, or a page image for scanned statements.
 */
export type PageContent =
  | { kind: 'text'; pageNumber: number; text: string }
  | { kind: 'image'; pageNumber: number; mimeType: string; data: Uint8Array };

export interface PageContext {
  fileName: string;
  pageNumber: number;
  pageCount: number;
}

/**
 * Turns one page into `{ transactions: [...] }`. The raw reply is returned
 * unvalidated; the extraction stage owns validation.
 */
export interface PageTranscriber {
  transcribe(page: PageContent, context: PageContext): Promise<unknown>;
}

/** Picks the closest account for a file name; the reply is checked against the list. */
export interface AccountClassifier {
  pickAccount(fileName: string, allowedAccounts: readonly string[]): Promise<string>;
}

export interface OpenedPdf {
  readonly pageCount: number;
  /** The password that unlocked the file, or null when none was needed. */
  readonly password: string | null;
  getPage(pageNumber: number): Promise<PageContent>;
  close(): Promise<void>;
}

export interface PdfOpener {
  open(data: Uint8Array, passwords: readonly string[]): Promise<OpenedPdf>;
}

export type ReviewDecision = 'accept' | 'discard' | 'abort';

export interface ReviewBatch {
  fileName: string;
  sourceAccount: string;
  transactions: readonly Transaction[];
}

/** Hook run after each document is extracted, before its rows join the run. */
export interface ReviewGate {
  review(batch: ReviewBatch): Promise<ReviewDecision>;
}

export const acceptAllReviewGate: ReviewGate = {
  review: () => Promise.resolve('accept'),
};

export type DocumentStatus = 'accepted' | 'discarded' | 'locked' | 'failed';

export interface DocumentOutcome {
  fileName: string;
  sourceAccount: string;
  status: DocumentStatus;
  pagesRead: number;
  pagesSkipped: number;
  rowsDropped: number;
  transactionCount: number;
  error?: string;
}
