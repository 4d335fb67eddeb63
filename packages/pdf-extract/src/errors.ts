export class DocumentLockedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Document could not be opened after ${attempts} attempt(s); no password matched`);
    this.name = 'DocumentLockedError';
    this.attempts = attempts;
  }
}

export class PageTranscriptionError extends Error {
  readonly pageNumber: number;

  constructor(pageNumber: number, message: string) {
    super(`Page ${pageNumber}: ${message}`);
    this.name = 'PageTranscriptionError';
    this.pageNumber = pageNumber;
  }
}

/** Thrown when the reviewer stops the run; nothing after it is checkpointed. */
export class ReviewAbortError extends Error {
  readonly fileName: string;

  constructor(fileName: string) {
    super(`Run aborted during review of ${fileName}`);
    this.name = 'ReviewAbortError';
    this.fileName = fileName;
  }
}
