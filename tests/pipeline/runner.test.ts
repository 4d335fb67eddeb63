import { describe, it, expect } from 'vitest';
import { createTransaction, type Transaction } from '@monthbook/types';
import type { PageContext, PageTranscriber, StatementDocument } from '@monthbook/pdf-extract';
import { RuleBasedClassifier, type TransactionClassifier } from '@monthbook/categorizer';
import type { CheckpointStage } from '@monthbook/store';
import { InMemorySpreadsheetDocument } from '@monthbook/sheets';
import { runPipeline, type PipelineDeps, type WriteSummary } from '../../src/pipeline/runner.js';
import type { StatementSource } from '../../src/sources/types.js';
import { RecordingLogger } from '../helpers/logger.js';

/** Keeps copies of what was saved, as the file store would. */
class MemoryCheckpoints {
  readonly saved: CheckpointStage[] = [];
  failSaves = false;

  constructor(private readonly files: Partial<Record<CheckpointStage, Transaction[]>> = {}) {}

  load(stage: CheckpointStage): Transaction[] | null {
    const stored = this.files[stage];
    return stored === undefined ? null : stored.map((tx) => ({ ...tx }));
  }

  save(stage: CheckpointStage, transactions: readonly Transaction[]): void {
    if (this.failSaves) throw new Error('disk full');
    this.files[stage] = transactions.map((tx) => ({ ...tx, category: stage === 'extraction' ? null : tx.category }));
    this.saved.push(stage);
  }

  getFilePath(stage: CheckpointStage): string {
    return `memory/${stage}`;
  }
}

class FakeSource implements StatementSource {
  readonly name = 'fake mailbox';
  fetches = 0;

  constructor(private readonly documents: StatementDocument[]) {}

  fetch(): Promise<StatementDocument[]> {
    this.fetches++;
    return Promise.resolve(this.documents);
  }
}

const transcriber = (rowsByFile: Record<string, unknown[]>): PageTranscriber => ({
  transcribe: (_page, context: PageContext) => Promise.resolve({ transactions: rowsByFile[context.fileName] ?? [] }),
});

const scan = (fileName: string): StatementDocument => ({
  fileName,
  subject: '',
  mimeType: 'image/png',
  data: new Uint8Array([1]),
});

const MARCH_ROWS: Record<string, unknown[]> = {
  'hdfc.png': [
    { date: '01/03/2024', description: 'SWIGGY ORDER', amount: 100, transaction_type: 'debit' },
    { date: '15/02/2024', description: 'LAST MONTH', amount: 5, transaction_type: 'debit' },
    { date: '05/03/2024', description: 'SALARY MARCH', amount: 5000, transaction_type: 'credit' },
  ],
};

const refusingClassifier: TransactionClassifier = {
  name: 'must not run',
  classify: () => Promise.reject(new Error('classifier should not be called')),
};

interface Harness {
  deps: PipelineDeps;
  store: MemoryCheckpoints;
  source: FakeSource;
  doc: InMemorySpreadsheetDocument;
  opened: number;
  logger: RecordingLogger;
}

function harness(
  overrides: Partial<PipelineDeps> = {},
  store = new MemoryCheckpoints(),
  rows: Record<string, unknown[]> = MARCH_ROWS
): Harness {
  const source = new FakeSource([scan('hdfc.png')]);
  const doc = new InMemorySpreadsheetDocument({ id: 'march' });
  const logger = new RecordingLogger();
  const h: Harness = {
    store,
    source,
    doc,
    opened: 0,
    logger,
    deps: {
      store,
      source,
      extraction: {
        allowedAccounts: ['HDFC Savings'],
        transcriber: transcriber(rows),
        accountClassifier: { pickAccount: () => Promise.resolve('HDFC Savings') },
      },
      classifier: new RuleBasedClassifier(),
      openWorkbook: () => {
        h.opened++;
        return Promise.resolve(doc);
      },
      logger,
      ...overrides,
    },
  };
  return h;
}

const MARCH = { year: 2024, month: 3 };

describe('runPipeline', () => {
  it('should extract, classify and write a fresh month', async () => {
    const h = harness();
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.status).toBe('written');
    expect(report.resumedFrom).toBe('fresh');
    expect(report.documents.map((d) => [d.fileName, d.status, d.transactionCount])).toEqual([['hdfc.png', 'accepted', 3]]);
    expect(report.dateWindow?.droppedOutOfRange).toBe(1);
    expect(report.enrichment).toEqual({ outcome: 'classified', updated: 2, unmatched: 0, discarded: 0 });
    expect(report.transactionCount).toBe(2);
    expect(report.expenseCount).toBe(1);
    expect(h.store.saved).toEqual(['extraction', 'categorized']);
    expect(h.doc.getRow('HDFC Savings', 2, 7)).toEqual(['01/03/2024', 1, 'Food', '', 'SWIGGY ORDER', 100, 0]);
    expect(h.doc.getRow('HDFC Savings', 3, 7)).toEqual(['05/03/2024', 0, 'Salary', '', 'SALARY MARCH', -5000, 0]);
    expect(report.workbook?.spreadsheetUrl).toBe('memory://spreadsheets/march');
  });

  it('should save the extraction checkpoint without categories', async () => {
    const h = harness();
    await runPipeline(h.deps, { month: MARCH });
    expect(h.store.load('extraction')?.map((tx) => tx.category)).toEqual([null, null]);
    expect(h.store.load('categorized')?.map((tx) => tx.category)).toEqual(['Food', 'Salary']);
  });

  it('should stop before the workbook when nothing is left', async () => {
    const h = harness({}, new MemoryCheckpoints(), { 'hdfc.png': [{ date: '15/02/2024', description: 'OLD', amount: 1, transaction_type: 'debit' }] });
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.status).toBe('no-transactions');
    expect(report.transactionCount).toBe(0);
    expect(report.enrichment).toBeNull();
    expect(h.store.saved).toEqual([]);
    expect(h.opened).toBe(0);
  });

  it('should stop when the write is declined', async () => {
    const summaries: WriteSummary[] = [];
    const h = harness({
      confirmWrite: (summary) => {
        summaries.push(summary);
        return Promise.resolve(false);
      },
    });
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.status).toBe('declined');
    expect(report.workbook).toBeNull();
    expect(h.opened).toBe(0);
    expect(h.store.saved).toEqual(['extraction', 'categorized']);
    expect(summaries).toEqual([
      { month: MARCH, resumedFrom: 'fresh', transactionCount: 2, expenseCount: 1, checkpointFile: 'memory/categorized' },
    ]);
  });

  it('should write after a confirmed prompt', async () => {
    const h = harness({ confirmWrite: () => Promise.resolve(true) });
    expect((await runPipeline(h.deps, { month: MARCH })).status).toBe('written');
    expect(h.opened).toBe(1);
  });

  it('should resume from the categorized checkpoint without fetching or classifying', async () => {
    const first = harness();
    await runPipeline(first.deps, { month: MARCH });

    const h = harness({ classifier: refusingClassifier }, first.store);
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.resumedFrom).toBe('categorized');
    expect(report.status).toBe('written');
    expect(report.enrichment).toBeNull();
    expect(h.source.fetches).toBe(0);
    expect(h.doc.getCell('HDFC Savings', 'C2')).toBe('Food');
  });

  it('should default blank fields in a hand-edited categorized checkpoint', async () => {
    const store = new MemoryCheckpoints({
      categorized: [
        createTransaction({
          date: '05/03/2024',
          description: 'CAB',
          amount: 120,
          sourceAccount: 'HDFC Savings',
          transactionType: 'debit',
        }),
      ],
    });
    const h = harness({ classifier: refusingClassifier }, store);
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.status).toBe('written');
    expect(report.expenseCount).toBe(1);
    expect(h.doc.getRow('HDFC Savings', 2, 7)).toEqual(['05/03/2024', 1, 'Uncategorized', '', 'CAB', 120, 0]);
    expect(h.logger.messages('warn')).toContain('Applied default category and flags to 1 transactions');
  });

  it('should resume from the extraction checkpoint and classify', async () => {
    const extracted = new MemoryCheckpoints();
    const seed = harness({ confirmWrite: () => Promise.resolve(false) }, extracted);
    await runPipeline(seed.deps, { month: MARCH });
    const onlyExtraction = new MemoryCheckpoints({ extraction: extracted.load('extraction') ?? [] });

    const h = harness({}, onlyExtraction);
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.resumedFrom).toBe('extracted');
    expect(h.source.fetches).toBe(0);
    expect(report.enrichment?.updated).toBe(2);
    expect(onlyExtraction.saved).toEqual(['categorized']);
  });

  it('should fall back to default categories without a classifier', async () => {
    const h = harness({ classifier: null });
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.enrichment?.outcome).toBe('not-configured');
    expect(report.expenseCount).toBe(2);
    expect(h.doc.getCell('HDFC Savings', 'C2')).toBe('Uncategorized');
  });

  it('should carry on when a checkpoint cannot be saved', async () => {
    const store = new MemoryCheckpoints();
    store.failSaves = true;
    const h = harness({}, store);
    const report = await runPipeline(h.deps, { month: MARCH });

    expect(report.status).toBe('written');
    expect(h.logger.messages('error')).toEqual([
      'Could not save extraction checkpoint to memory/extraction: disk full',
      'Could not save categorized checkpoint to memory/categorized: disk full',
    ]);
  });

  it('should pass the party names to the workbook', async () => {
    const h = harness();
    await runPipeline(h.deps, { month: MARCH, parties: { primary: 'Sam', secondary: 'Alex' } });
    expect(h.doc.sheetTitles()).toEqual(['Cash', 'Alex', 'Final Recon', 'Reporting', 'HDFC Savings']);
  });
});
