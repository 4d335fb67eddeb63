import { readdir, readFile, stat } from 'fs/promises';
import { join, extname } from 'path';
import { describeError, silentLogger, type Logger } from '@monthbook/types';
import type { StatementDocument } from '@monthbook/pdf-extract';
import { statementMimeType, type StatementSource } from './types.js';

export interface StatementFile {
  filePath: string;
  fileName: string;
  mimeType: string;
  sizeBytes: number;
}

export interface DirectoryScan {
  files: StatementFile[];
  skipped: Array<{ fileName: string; reason: string }>;
}

/**
 * Statements already on disk. Every file in the directory is used whatever
 * the month; the date-window filter trims the transactions later.
 */
export class DirectoryStatementSource implements StatementSource {
  readonly name: string;
  private readonly directory: string;
  private readonly logger: Logger;

  constructor(directory: string, logger: Logger = silentLogger) {
    this.directory = directory;
    this.logger = logger;
    this.name = `directory ${directory}`;
  }

  /** PDFs and page images in the directory, sorted by file name. */
  async scan(): Promise<DirectoryScan> {
    await this.assertDirectory();
    const entries = await readdir(this.directory, { withFileTypes: true });
    const scan: DirectoryScan = { files: [], skipped: [] };

    for (const entry of entries) {
      if (!entry.isFile()) continue;
      const fileName = entry.name;
      const mimeType = statementMimeType(extname(fileName));
      if (mimeType === null) continue;

      // office lock files and dotfiles
      if (fileName.startsWith('~$') || fileName.startsWith('.')) {
        scan.skipped.push({ fileName, reason: 'temporary or hidden file' });
        continue;
      }

      const filePath = join(this.directory, fileName);
      const { size } = await stat(filePath);
      if (size === 0) {
        scan.skipped.push({ fileName, reason: 'empty file' });
        continue;
      }
      scan.files.push({ filePath, fileName, mimeType, sizeBytes: size });
    }

    scan.files.sort((a, b) => a.fileName.localeCompare(b.fileName));
    return scan;
  }

  async fetch(): Promise<StatementDocument[]> {
    const scan = await this.scan();
    for (const skip of scan.skipped) {
      this.logger.warn(`Skipping ${skip.fileName}: ${skip.reason}`);
    }
    this.logger.info(`Found ${scan.files.length} statement file(s) in ${this.directory}`);

    const documents: StatementDocument[] = [];
    for (const file of scan.files) {
      const data = await readFile(file.filePath);
      documents.push({
        fileName: file.fileName,
        subject: '',
        mimeType: file.mimeType,
        data: new Uint8Array(data),
      });
    }
    return documents;
  }

  private async assertDirectory(): Promise<void> {
    let isDirectory: boolean;
    try {
      isDirectory = (await stat(this.directory)).isDirectory();
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? error.code : undefined;
      throw new Error(
        code === 'ENOENT'
          ? `Directory does not exist: ${this.directory}`
          : `Cannot access directory ${this.directory}: ${describeError(error)}`
      );
    }
    if (!isDirectory) {
      throw new Error(`Not a directory: ${this.directory}`);
    }
  }
}
