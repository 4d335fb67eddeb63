import { describe, it, expect } from 'vitest';
import { inferSourceAccount, matchAccountRule, type AccountClassifier } from '@monthbook/pdf-extract';
import { RecordingLogger } from '../helpers/logger.js';

const replying = (reply: string): AccountClassifier => ({ pickAccount: () => Promise.resolve(reply) });

describe('matchAccountRule', () => {
  const allowed = ['HDFC Savings', 'Cash'];

  it('should match the savings statement file name and subject', () => {
    expect(matchAccountRule('5010_01032024_stmt.pdf', 'Your HDFC Bank Combined Account Statement', allowed)).toBe(
      'HDFC Savings'
    );
  });

  it('should need every subject keyword', () => {
    expect(matchAccountRule('5010_01032024_stmt.pdf', 'Your HDFC Bank e-mail', allowed)).toBeNull();
  });

  it('should need the file name pattern', () => {
    expect(matchAccountRule('statement.pdf', 'HDFC Statement', allowed)).toBeNull();
  });

  it('should ignore a rule whose account is not allowed', () => {
    expect(matchAccountRule('5010_01032024_stmt.pdf', 'HDFC Statement', ['Cash'])).toBeNull();
  });
});

describe('inferSourceAccount', () => {
  it('should prefer a rule over the classifier', async () => {
    const account = await inferSourceAccount('5010_01032024_stmt.pdf', 'HDFC Statement', {
      allowedAccounts: ['HDFC Savings', 'Cash'],
      classifier: replying('Cash'),
    });
    expect(account).toBe('HDFC Savings');
  });

  it('should accept a trimmed classifier reply from the allowed list', async () => {
    const account = await inferSourceAccount('card.pdf', '', {
      allowedAccounts: ['HDFC Regalia CC', 'Cash'],
      classifier: replying('  HDFC Regalia CC\n'),
    });
    expect(account).toBe('HDFC Regalia CC');
  });

  it('should reject a reply outside the list', async () => {
    const logger = new RecordingLogger();
    const account = await inferSourceAccount('card.pdf', '', {
      allowedAccounts: ['HDFC Regalia CC'],
      classifier: replying('HDFC Regalia'),
      logger,
    });
    expect(account).toBe('Unknown Account');
    expect(logger.messages('warn')).toEqual(["Classifier reply 'HDFC Regalia' for 'card.pdf' is not an allowed account"]);
  });

  it('should fall back when the classifier fails', async () => {
    const account = await inferSourceAccount('card.pdf', '', {
      allowedAccounts: ['Cash'],
      classifier: { pickAccount: () => Promise.reject(new Error('offline')) },
    });
    expect(account).toBe('Unknown Account');
  });

  it('should fall back without a classifier or an account list', async () => {
    expect(await inferSourceAccount('card.pdf', '', { allowedAccounts: ['Cash'] })).toBe('Unknown Account');
    expect(await inferSourceAccount('card.pdf', '', { allowedAccounts: [], classifier: replying('Cash') })).toBe(
      'Unknown Account'
    );
  });
});
