import type { StatementDocument } from '@monthbook/pdf-extract';
import type { AccountingMonth } from '@monthbook/types';

/** Where statements for a month come from. */
export interface StatementSource {
  readonly name: string;
  fetch(month: AccountingMonth): Promise<StatementDocument[]>;
}

export const PDF_MIME_TYPE = 'application/pdf';

const MIME_BY_EXTENSION: Readonly<Record<string, string>> = {
  '.pdf': PDF_MIME_TYPE,
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

/** Statement MIME type for a file extension (lower-case, with the dot), or null. */
export function statementMimeType(extension: string): string | null {
  return MIME_BY_EXTENSION[extension.toLowerCase()] ?? null;
}
