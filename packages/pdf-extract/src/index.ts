// Extraction stage
export {
  extractStatements,
  extractDocument,
  PageTranscriptionSchema,
  type ExtractionOptions,
  type ExtractionResult,
  type DocumentExtraction,
} from './extraction-stage.js';

// Source-account inference
export {
  inferSourceAccount,
  matchAccountRule,
  DEFAULT_ACCOUNT_RULES,
  type AccountRule,
  type AccountInferenceOptions,
} from './account-inference.js';

// PDF opening and layout-aware page text using pdfjs-dist
export { PdfjsOpener, isPasswordError } from './pdf-reader.js';
export { buildLinesFromItems, LINE_TOLERANCES, type PositionedText } from './layout/lines.js';

export { DocumentLockedError, PageTranscriptionError, ReviewAbortError } from './errors.js';

export {
  acceptAllReviewGate,
  type StatementDocument,
  type PageContent,
  type PageContext,
  type PageTranscriber,
  type AccountClassifier,
  type OpenedPdf,
  type PdfOpener,
  type ReviewDecision,
  type ReviewBatch,
  type ReviewGate,
  type DocumentStatus,
  type DocumentOutcome,
} from './types.js';
