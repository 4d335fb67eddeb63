/**
 * File-backed checkpoints for the two pipeline stages.
 * Each stage is a pretty-printed JSON array of snake_case transaction records.
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import {
  CHECKPOINT_FILES,
  TransactionRecordSchema,
  describeError,
  resolveCategory,
  silentLogger,
  toTransactionRecord,
  type Logger,
  type Transaction,
} from '@monthbook/types';

export type CheckpointStage = keyof typeof CHECKPOINT_FILES;

export const CHECKPOINT_STAGES: readonly CheckpointStage[] = ['extraction', 'categorized'];

export interface CheckpointStoreOptions {
  /** Directory holding the checkpoint files (default: cwd). */
  directory?: string;
  logger?: Logger;
}

export class CheckpointStore {
  private readonly directory: string;
  private readonly logger: Logger;

  constructor(options: CheckpointStoreOptions = {}) {
    this.directory = options.directory ?? process.cwd();
    this.logger = options.logger ?? silentLogger;
  }

  getFilePath(stage: CheckpointStage): string {
    return join(this.directory, CHECKPOINT_FILES[stage]);
  }

  save(stage: CheckpointStage, transactions: readonly Transaction[]): void {
    const records = transactions.map((tx) => {
      const record = toTransactionRecord(tx);
      return stage === 'extraction' ? { ...record, category: null } : record;
    });
    if (!existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
    }
    const filePath = this.getFilePath(stage);
    writeFileSync(filePath, JSON.stringify(records, null, 2), 'utf-8');
    this.logger.info(`Saved ${records.length} transactions to ${filePath}`);
  }

  /**
   * Returns null when the checkpoint is missing, empty or unreadable.
   * Records that fail validation are dropped one by one.
   */
  load(stage: CheckpointStage): Transaction[] | null {
    const filePath = this.getFilePath(stage);
    if (!existsSync(filePath)) {
      this.logger.debug(`No ${stage} checkpoint at ${filePath}`);
      return null;
    }

    let parsed: unknown;
    try {
      const data = readFileSync(filePath, 'utf-8');
      if (data.trim() === '') {
        this.logger.warn(`Checkpoint ${filePath} is empty, ignoring it`);
        return null;
      }
      parsed = JSON.parse(data);
    } catch (err) {
      this.logger.warn(`Checkpoint ${filePath} could not be read: ${describeError(err)}`);
      return null;
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn(`Checkpoint ${filePath} does not hold a JSON array, ignoring it`);
      return null;
    }
    if (parsed.length === 0) {
      this.logger.warn(`Checkpoint ${filePath} holds no transactions, ignoring it`);
      return null;
    }

    const transactions: Transaction[] = [];
    parsed.forEach((item: unknown, index) => {
      const result = TransactionRecordSchema.safeParse(item);
      if (!result.success) {
        const issue = result.error.issues[0];
        const detail = issue === undefined ? 'invalid record' : `${issue.path.join('.') || 'record'}: ${issue.message}`;
        this.logger.warn(`Dropping checkpoint record ${index} from ${CHECKPOINT_FILES[stage]} (${detail})`);
        return;
      }
      const record = result.data;
      if (stage === 'extraction' && record.category !== null) {
        this.logger.warn(`Extraction checkpoint record ${index} carries a category, clearing it`);
      }
      transactions.push({
        date: record.date,
        description: record.description,
        amount: record.amount,
        sourceAccount: record.source_account,
        transactionType: record.transaction_type,
        shortDescription: record.short_description,
        category:
          stage === 'categorized' && record.category !== null
            ? resolveCategory(record.category, this.logger)
            : null,
        isExpense: record.is_expense,
        isSplit: record.is_split,
      });
    });

    this.logger.info(`Loaded ${transactions.length} of ${parsed.length} transactions from ${filePath}`);
    return transactions;
  }

  clear(): void {
    for (const stage of CHECKPOINT_STAGES) {
      rmSync(this.getFilePath(stage), { force: true });
    }
  }
}
