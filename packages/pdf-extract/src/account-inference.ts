import { UNKNOWN_ACCOUNT, describeError, silentLogger, type Logger } from '@monthbook/types';
import type { AccountClassifier } from './types.js';

/**
 * A file-name and subject rule that names an account without asking the
 * classifier. It only applies when its account is in the allowed list.
 */
export interface AccountRule {
  account: string;
  fileNamePattern: RegExp;
  /** Every keyword must appear in the subject, case-insensitive. */
  subjectKeywords: readonly string[];
}

export const DEFAULT_ACCOUNT_RULES: readonly AccountRule[] = [
  {
    account: 'HDFC Savings',
    fileNamePattern: /^.+_\d{8}_.+\.pdf$/,
    subjectKeywords: ['hdfc', 'statement'],
  },
];

export interface AccountInferenceOptions {
  allowedAccounts: readonly string[];
  classifier?: AccountClassifier | null;
  rules?: readonly AccountRule[];
  logger?: Logger;
}

export function matchAccountRule(
  fileName: string,
  subject: string,
  allowedAccounts: readonly string[],
  rules: readonly AccountRule[] = DEFAULT_ACCOUNT_RULES
): string | null {
  const lowerSubject = subject.toLowerCase();
  for (const rule of rules) {
    if (!allowedAccounts.includes(rule.account)) continue;
    if (!rule.fileNamePattern.test(fileName)) continue;
    if (!rule.subjectKeywords.every((keyword) => lowerSubject.includes(keyword.toLowerCase()))) continue;
    return rule.account;
  }
  return null;
}

/**
 * Rule first, then the classifier; anything that is not exactly one of the
 * allowed names becomes {@link UNKNOWN_ACCOUNT}.
 */
export async function inferSourceAccount(
  fileName: string,
  subject: string,
  options: AccountInferenceOptions
): Promise<string> {
  const logger = options.logger ?? silentLogger;
  const { allowedAccounts } = options;

  const ruled = matchAccountRule(fileName, subject, allowedAccounts, options.rules);
  if (ruled !== null) {
    logger.info(`Account rule matched '${fileName}' to '${ruled}'`);
    return ruled;
  }

  if (allowedAccounts.length === 0) {
    logger.warn(`No account names configured, '${fileName}' is assigned to ${UNKNOWN_ACCOUNT}`);
    return UNKNOWN_ACCOUNT;
  }
  const classifier = options.classifier ?? null;
  if (classifier === null) {
    logger.warn(`No account classifier available, '${fileName}' is assigned to ${UNKNOWN_ACCOUNT}`);
    return UNKNOWN_ACCOUNT;
  }

  try {
    const reply = (await classifier.pickAccount(fileName, allowedAccounts)).trim();
    if (allowedAccounts.includes(reply)) {
      logger.info(`Classifier mapped '${fileName}' to '${reply}'`);
      return reply;
    }
    logger.warn(`Classifier reply '${reply}' for '${fileName}' is not an allowed account`);
  } catch (err) {
    logger.warn(`Account classification failed for '${fileName}': ${describeError(err)}`);
  }
  return UNKNOWN_ACCOUNT;
}
