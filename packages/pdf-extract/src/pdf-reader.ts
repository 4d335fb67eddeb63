/**
 * pdfjs-dist backed {@link PdfOpener}: unlocks the file, then serves each
 * page as layout-aware text lines.
 */

import { DocumentLockedError } from './errors.js';
import { buildLinesFromItems, type PositionedText } from './layout/lines.js';
import type { OpenedPdf, PageContent, PdfOpener } from './types.js';

type PdfjsModule = typeof import('pdfjs-dist/legacy/build/pdf.mjs');
type PdfDocument = Awaited<ReturnType<PdfjsModule['getDocument']>['promise']>;

let pdfjsModule: PdfjsModule | null = null;

async function loadPdfjs(): Promise<PdfjsModule> {
  // Dynamic import for pdfjs-dist (ESM only)
  if (pdfjsModule === null) {
    pdfjsModule = await import('pdfjs-dist/legacy/build/pdf.mjs');
  }
  return pdfjsModule;
}

export function isPasswordError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'PasswordException' || /password/i.test(error.message));
}

async function loadDocument(pdfjs: PdfjsModule, data: Uint8Array, password: string | null): Promise<PdfDocument> {
  // pdfjs takes ownership of the buffer it is given, so every attempt gets a copy
  const loadingTask = pdfjs.getDocument({
    data: new Uint8Array(data),
    useSystemFonts: true,
    isEvalSupported: false,
    ...(password !== null ? { password } : {}),
  });
  try {
    return await loadingTask.promise;
  } catch (error) {
    await loadingTask.destroy();
    throw error;
  }
}

async function readPageText(doc: PdfDocument, pageNumber: number): Promise<PageContent> {
  const page = await doc.getPage(pageNumber);
  const textContent = await page.getTextContent();

  const items: PositionedText[] = [];
  for (const item of textContent.items) {
    if (!('str' in item)) continue;
    const str = item.str.trim();
    if (str.length === 0) continue;
    // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
    const x = Number(item.transform[4]) || 0;
    const y = Number(item.transform[5]) || 0;
    const width = item.width || Math.abs(Number(item.transform[0]) || 1) * str.length * 0.6;
    items.push({ str, x, y, width });
  }
  page.cleanup();

  return { kind: 'text', pageNumber, text: buildLinesFromItems(items).join('\n') };
}

/**
 * Tries the file without a password, then each password in order.
 * Throws {@link DocumentLockedError} when none opens it; any other load
 * failure is rethrown as is.
 */
export class PdfjsOpener implements PdfOpener {
  async open(data: Uint8Array, passwords: readonly string[]): Promise<OpenedPdf> {
    const pdfjs = await loadPdfjs();
    const attempts: (string | null)[] = [null, ...passwords];

    for (const password of attempts) {
      let doc: PdfDocument;
      try {
        doc = await loadDocument(pdfjs, data, password);
      } catch (error) {
        if (isPasswordError(error)) continue;
        throw error;
      }
      return {
        pageCount: doc.numPages,
        password,
        getPage: (pageNumber) => readPageText(doc, pageNumber),
        close: () => doc.destroy(),
      };
    }

    throw new DocumentLockedError(attempts.length);
  }
}
