#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command, Option } from 'commander';
import type { Auth } from 'googleapis';
import {
  APP_VERSION,
  createConsoleLogger,
  describeError,
  monthName,
  parseAccountingMonth,
  previousMonth,
  type AccountingMonth,
  type Logger,
} from '@monthbook/types';
import { ReviewAbortError, type PageTranscriber } from '@monthbook/pdf-extract';
import {
  AIAccountClassifier,
  AIPageTranscriber,
  AITransactionClassifier,
  RuleBasedClassifier,
  isAIConfigured,
  type TransactionClassifier,
} from '@monthbook/categorizer';
import { CheckpointStore, describeResumePoint, resolveResumePoint } from '@monthbook/store';
import { openMonthlyWorkbook, workbookName } from '@monthbook/sheets';
import { envBool, loadConfig, requireGoogleConfig, type AppConfig } from '../config.js';
import { createGoogleAuth } from '../google/auth.js';
import { DirectoryStatementSource } from '../sources/directory-source.js';
import { GmailStatementSource } from '../sources/gmail-source.js';
import type { StatementSource } from '../sources/types.js';
import { runPipeline, type PipelineReport } from '../pipeline/runner.js';
import { createTerminalConfirm, createTerminalReviewGate } from './prompts.js';

const CLASSIFIERS = ['ai', 'rules'] as const;
type ClassifierChoice = (typeof CLASSIFIERS)[number];

interface RunOptions {
  preview: boolean;
  yes: boolean;
  fresh: boolean;
  month?: string;
  inputDir?: string;
  classifier: ClassifierChoice;
  reconFormulas: boolean;
  verbose: boolean;
}

const program = new Command();

program
  .name('monthbook')
  .description('Turn last month\'s statement PDFs into a categorized, split-aware Google Sheets workbook')
  .version(APP_VERSION);

program
  .command('run', { isDefault: true })
  .description('Fetch, extract, categorize and write one month of transactions')
  .option('--preview', 'Review each document\'s transactions before keeping them', envBool('MONTHBOOK_PREVIEW', false))
  .option('-y, --yes', 'Write to the workbook without asking', envBool('MONTHBOOK_YES', false))
  .option('--fresh', 'Delete checkpoints and start from the statement sources', false)
  .option('-m, --month <YYYY-MM>', 'Accounting month (default: previous month)', process.env['MONTHBOOK_MONTH'])
  .option('-d, --input-dir <directory>', 'Read statements from a local directory instead of Gmail', process.env['MONTHBOOK_INPUT_DIR'])
  .addOption(
    new Option('--classifier <name>', 'Transaction classifier')
      .choices(CLASSIFIERS)
      .default(process.env['MONTHBOOK_CLASSIFIER'] === 'rules' ? 'rules' : 'ai')
  )
  .option('--recon-formulas', 'Write the Final Recon aggregation formulas', envBool('MONTHBOOK_RECON_FORMULAS', false))
  .option('-v, --verbose', 'Enable verbose output', envBool('MONTHBOOK_VERBOSE', false))
  .action(async (options: RunOptions) => {
    const logger = createConsoleLogger({ verbose: options.verbose });
    try {
      const report = await run(options, logger);
      printSummary(report);
      process.exitCode = report.status === 'written' ? 0 : 1;
    } catch (error) {
      if (error instanceof ReviewAbortError) {
        console.error(`[ERROR] ${error.message}`);
        process.exit(130);
      }
      console.error(`[ERROR] ${describeError(error)}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

program
  .command('checkpoints')
  .description('Show which stage the next run resumes from')
  .option('--clear', 'Delete both checkpoint files', false)
  .action((options: { clear: boolean }) => {
    const config = loadConfig();
    const logger = createConsoleLogger({ verbose: config.verbose });
    const store = new CheckpointStore({ directory: config.checkpointDir, logger });
    if (options.clear) {
      store.clear();
      console.error('[INFO] Checkpoints cleared');
      return;
    }
    console.log(describeResumePoint(resolveResumePoint(store)));
  });

function resolveMonth(value: string | undefined): AccountingMonth {
  return value === undefined || value === '' ? previousMonth() : parseAccountingMonth(value);
}

function memoizedAuth(config: AppConfig): () => Promise<Auth.OAuth2Client> {
  let auth: Promise<Auth.OAuth2Client> | null = null;
  return () => {
    auth ??= createGoogleAuth(requireGoogleConfig(config));
    return auth;
  };
}

function buildClassifier(choice: ClassifierChoice, config: AppConfig, logger: Logger): TransactionClassifier | null {
  if (choice === 'rules') {
    return new RuleBasedClassifier({ secondaryPartyToken: config.parties.secondary });
  }
  if (!isAIConfigured()) {
    logger.warn('No AI key set (AI_API_KEY / GEMINI_API_KEY); every transaction will get the fallback category');
    return null;
  }
  return new AITransactionClassifier({ parties: config.parties });
}

function buildTranscriber(): PageTranscriber {
  if (isAIConfigured()) {
    return new AIPageTranscriber();
  }
  return {
    transcribe: () => Promise.reject(new Error('AI API key is required to read statement pages. Set AI_API_KEY.')),
  };
}

async function run(options: RunOptions, logger: Logger): Promise<PipelineReport> {
  const config = loadConfig({ verbose: options.verbose });
  const month = resolveMonth(options.month);
  const getAuth = memoizedAuth(config);

  logger.info(`Accounting month: ${monthName(month)} ${month.year} (workbook ${workbookName(month)})`);

  const store = new CheckpointStore({ directory: config.checkpointDir, logger });
  if (options.fresh) {
    store.clear();
    logger.info('Checkpoints cleared');
  }

  const source: StatementSource =
    options.inputDir !== undefined
      ? new DirectoryStatementSource(options.inputDir, logger)
      : {
          name: 'gmail',
          fetch: async (m) =>
            new GmailStatementSource(await getAuth(), {
              extraQuery: config.google.gmailQuery,
              downloadDir: config.downloadDir,
              logger,
            }).fetch(m),
        };

  return runPipeline(
    {
      store,
      source,
      extraction: {
        allowedAccounts: config.accountNames,
        passwords: config.pdfPasswords,
        transcriber: buildTranscriber(),
        accountClassifier: isAIConfigured() ? new AIAccountClassifier() : null,
        secondaryPartyToken: config.parties.secondary,
        ...(options.preview ? { reviewGate: createTerminalReviewGate() } : {}),
      },
      classifier: buildClassifier(options.classifier, config, logger),
      openWorkbook: async (m) => {
        const google = requireGoogleConfig(config);
        return openMonthlyWorkbook(await getAuth(), { budgetFolderId: google.budgetFolderId, month: m, logger });
      },
      ...(options.yes ? {} : { confirmWrite: createTerminalConfirm() }),
      logger,
    },
    { month, parties: config.parties, reconFormulas: options.reconFormulas }
  );
}

function printSummary(report: PipelineReport): void {
  console.error('');
  console.error('=== Monthly Run Summary ===');
  console.error(`Month:                 ${monthName(report.month)} ${report.month.year}`);
  console.error(`Resumed from:          ${report.resumedFrom}`);
  if (report.documents.length > 0) {
    const count = (status: string): number => report.documents.filter((d) => d.status === status).length;
    console.error(`Documents read:        ${report.documents.length}`);
    console.error(`  accepted/discarded:  ${count('accepted')}/${count('discarded')}`);
    console.error(`  locked/failed:       ${count('locked')}/${count('failed')}`);
  }
  if (report.dateWindow !== null) {
    console.error(`Out of window:         ${report.dateWindow.droppedOutOfRange}`);
    console.error(`Without a date:        ${report.dateWindow.droppedUndated}`);
  }
  if (report.enrichment !== null) {
    console.error(`Classifier outcome:    ${report.enrichment.outcome}`);
    console.error(`Unmatched by classifier: ${report.enrichment.unmatched}`);
  }
  console.error(`Transactions:          ${report.transactionCount} (${report.expenseCount} expenses)`);
  if (report.workbook !== null) {
    console.error(`Sheets added/deleted:  ${report.workbook.sync.added.length}/${report.workbook.sync.deleted.length}`);
    console.error(`Sheets skipped:        ${report.workbook.skipped.length}`);
    console.error(`Workbook:              ${report.workbook.spreadsheetUrl}`);
  }
  console.error(`Status:                ${report.status}`);
  console.error('===========================');
}

program.parse();
