/**
 * One monthly run: resume from checkpoints where possible, otherwise
 * fetch -> extract -> date window -> checkpoint -> enrich -> checkpoint,
 * then reconcile the month's workbook.
 */

import {
  DEFAULT_PARTIES,
  describeError,
  silentLogger,
  type AccountingMonth,
  type Logger,
  type Parties,
  type Transaction,
} from '@monthbook/types';
import { extractStatements, type DocumentOutcome, type ExtractionOptions } from '@monthbook/pdf-extract';
import {
  applyCategoryDefaults,
  enrichTransactions,
  filterExpenses,
  type EnrichmentReport,
  type TransactionClassifier,
} from '@monthbook/categorizer';
import {
  describeResumePoint,
  resolveResumePoint,
  type CheckpointStage,
  type CheckpointStore,
  type ResumeStage,
} from '@monthbook/store';
import { reconcileWorkbook, type SpreadsheetDocument, type WorkbookReport } from '@monthbook/sheets';
import type { StatementSource } from '../sources/types.js';
import { filterByDateWindow, type DateWindowResult } from './date-window.js';

export interface WriteSummary {
  month: AccountingMonth;
  resumedFrom: ResumeStage;
  transactionCount: number;
  expenseCount: number;
  checkpointFile: string;
}

export interface PipelineDeps {
  store: Pick<CheckpointStore, 'load' | 'save' | 'getFilePath'>;
  source: StatementSource;
  extraction: Omit<ExtractionOptions, 'logger'>;
  classifier: TransactionClassifier | null;
  openWorkbook: (month: AccountingMonth) => Promise<SpreadsheetDocument>;
  /** Asked before anything is written to the workbook; false stops the run. */
  confirmWrite?: (summary: WriteSummary) => Promise<boolean>;
  logger?: Logger;
}

export interface PipelineOptions {
  month: AccountingMonth;
  parties?: Parties;
  reconFormulas?: boolean;
}

export type PipelineStatus = 'written' | 'no-transactions' | 'declined';

export interface PipelineReport {
  status: PipelineStatus;
  month: AccountingMonth;
  resumedFrom: ResumeStage;
  documents: DocumentOutcome[];
  dateWindow: DateWindowResult | null;
  enrichment: EnrichmentReport | null;
  transactionCount: number;
  expenseCount: number;
  workbook: WorkbookReport | null;
}

function saveCheckpoint(
  store: PipelineDeps['store'],
  stage: CheckpointStage,
  transactions: readonly Transaction[],
  logger: Logger
): void {
  try {
    store.save(stage, transactions);
  } catch (err) {
    // the run continues; only resumability is lost
    logger.error(`Could not save ${stage} checkpoint to ${store.getFilePath(stage)}: ${describeError(err)}`);
  }
}

export async function runPipeline(deps: PipelineDeps, options: PipelineOptions): Promise<PipelineReport> {
  const logger = deps.logger ?? silentLogger;
  const parties = options.parties ?? DEFAULT_PARTIES;
  const { month } = options;

  const resume = resolveResumePoint(deps.store);
  logger.info(describeResumePoint(resume));

  const report: PipelineReport = {
    status: 'no-transactions',
    month,
    resumedFrom: resume.stage,
    documents: [],
    dateWindow: null,
    enrichment: null,
    transactionCount: 0,
    expenseCount: 0,
    workbook: null,
  };

  let transactions: Transaction[];
  if (resume.stage === 'fresh') {
    logger.info(`--- Stage 1: fetching statements from ${deps.source.name} ---`);
    const documents = await deps.source.fetch(month);
    const extraction = await extractStatements(documents, { ...deps.extraction, logger });
    report.documents = extraction.documents;

    report.dateWindow = filterByDateWindow(extraction.transactions, month, logger);
    transactions = report.dateWindow.kept;
    if (transactions.length > 0) {
      saveCheckpoint(deps.store, 'extraction', transactions, logger);
    } else {
      logger.info('No transactions after filtering, skipping extraction checkpoint');
    }
  } else {
    transactions = resume.transactions;
  }

  if (resume.stage !== 'categorized' && transactions.length > 0) {
    logger.info('--- Stage 2: categorizing transactions ---');
    report.enrichment = await enrichTransactions(transactions, deps.classifier, { logger });
    applyCategoryDefaults(transactions, logger);
    saveCheckpoint(deps.store, 'categorized', transactions, logger);
  } else if (resume.stage === 'categorized') {
    // the categorized file may have been edited by hand before this run
    applyCategoryDefaults(transactions, logger);
  }

  report.transactionCount = transactions.length;
  if (transactions.length === 0) {
    logger.warn('No transactions available, nothing will be written');
    return report;
  }
  report.expenseCount = filterExpenses(transactions, logger).length;

  if (deps.confirmWrite !== undefined) {
    const proceed = await deps.confirmWrite({
      month,
      resumedFrom: resume.stage,
      transactionCount: report.transactionCount,
      expenseCount: report.expenseCount,
      checkpointFile: deps.store.getFilePath('categorized'),
    });
    if (!proceed) {
      logger.warn('Workbook update declined; checkpoint files were kept');
      report.status = 'declined';
      return report;
    }
  }

  logger.info('--- Stage 3: updating the workbook ---');
  const doc = await deps.openWorkbook(month);
  report.workbook = await reconcileWorkbook(doc, transactions, {
    parties,
    reconFormulas: options.reconFormulas ?? false,
    logger,
  });
  report.status = 'written';
  logger.info(`Workbook updated: ${doc.url}`);
  return report;
}
