/**
 * Offline classifier: first matching description rule wins.
 * Replies in the same batch shape as the AI classifier so it can stand in
 * for it anywhere.
 */

import { DEFAULT_PARTIES, FALLBACK_CATEGORY, type ExpenseFlag } from '@monthbook/types';
import type {
  ClassificationBatch,
  ClassificationRequestItem,
  ClassificationResult,
  TransactionClassifier,
} from './classifier.js';

export interface CategoryRule {
  pattern: RegExp;
  /** Display value from the category vocabulary */
  category: string;
  isExpense: ExpenseFlag;
}

export const CATEGORY_RULES: readonly CategoryRule[] = [
  // Income
  { pattern: /\b(salary|payroll|sal cr)\b/i, category: 'Salary', isExpense: 0 },
  { pattern: /\b(interest paid|int\.? ?pd|interest credit)\b/i, category: 'Interest', isExpense: 0 },
  { pattern: /\b(refund|reversal)\b/i, category: 'Refund', isExpense: 0 },
  { pattern: /\bcashback\b/i, category: 'Cashback', isExpense: 0 },
  { pattern: /\b(neft|imps|rtgs).*\b(cr|credit)\b/i, category: 'Transfer', isExpense: 0 },
  { pattern: /\b(payment received|thank you for your payment|autopay)\b/i, category: 'Payment', isExpense: 0 },

  // Food
  { pattern: /\b(swiggy|zomato|eatsure|restaurant|cafe|coffee|starbucks|dominos|pizza)\b/i, category: 'Food', isExpense: 1 },
  { pattern: /\b(bigbasket|blinkit|zepto|dmart|grocery|supermarket|more retail)\b/i, category: 'Grocery', isExpense: 1 },

  // Transport
  { pattern: /\b(uber|ola|rapido|metro|irctc|redbus)\b/i, category: 'Transportation', isExpense: 1 },
  { pattern: /\b(petrol|fuel|hpcl|bpcl|indian oil|iocl|shell)\b/i, category: 'Fuel', isExpense: 1 },
  { pattern: /\b(indigo|air india|vistara|akasa|makemytrip|goibibo|cleartrip|hotel|airbnb)\b/i, category: 'Travel', isExpense: 1 },

  // Bills
  { pattern: /\b(electricity|bescom|tneb|kseb|msedcl|power)\b/i, category: 'Electricity', isExpense: 1 },
  { pattern: /\b(water board|bwssb|water bill)\b/i, category: 'Water', isExpense: 1 },
  { pattern: /\b(airtel|jio|vodafone|vi prepaid|bsnl)\b/i, category: 'Phone', isExpense: 1 },
  { pattern: /\b(act fibernet|broadband|hathway|internet)\b/i, category: 'Internet', isExpense: 1 },
  { pattern: /\b(rent|nobroker)\b/i, category: 'Rent', isExpense: 1 },

  // Subscriptions and software
  { pattern: /\b(netflix|hotstar|prime video|spotify|youtube premium|sonyliv)\b/i, category: 'Subscription', isExpense: 1 },
  { pattern: /\b(openai|chatgpt|github|google \*|microsoft|adobe|apple\.com)\b/i, category: 'Software', isExpense: 1 },
  { pattern: /\b(bookmyshow|pvr|inox|cinema)\b/i, category: 'Entertainment', isExpense: 1 },

  // Health and care
  { pattern: /\b(pharmacy|apollo|medplus|hospital|clinic|practo|1mg|pharmeasy)\b/i, category: 'Medical', isExpense: 1 },
  { pattern: /\b(gym|cult\.?fit|fitness)\b/i, category: 'Gym', isExpense: 1 },
  { pattern: /\b(salon|barber|spa|naturals)\b/i, category: 'Salon', isExpense: 1 },

  // Shopping
  { pattern: /\b(amazon|amzn|flipkart|myntra|ajio|meesho)\b/i, category: 'Shopping', isExpense: 1 },
  { pattern: /\b(insurance|lic|premium)\b/i, category: 'Insurance', isExpense: 1 },
  { pattern: /\b(mutual fund|sip|zerodha|groww|ppf)\b/i, category: 'Investment', isExpense: 1 },
  { pattern: /\b(income tax|tds|advance tax)\b/i, category: 'Income Tax', isExpense: 1 },
];

export interface RuleBasedClassifierOptions {
  rules?: readonly CategoryRule[];
  /** Descriptions containing this token (case-insensitive) are split to the secondary party. */
  secondaryPartyToken?: string;
}

export function matchCategoryRule(description: string, rules: readonly CategoryRule[] = CATEGORY_RULES): CategoryRule | null {
  return rules.find((rule) => rule.pattern.test(description)) ?? null;
}

export class RuleBasedClassifier implements TransactionClassifier {
  readonly name = 'rule-based classifier';
  private readonly rules: readonly CategoryRule[];
  private readonly splitToken: string;

  constructor(options: RuleBasedClassifierOptions = {}) {
    this.rules = options.rules ?? CATEGORY_RULES;
    this.splitToken = (options.secondaryPartyToken ?? DEFAULT_PARTIES.secondary).toLowerCase();
  }

  classify(items: readonly ClassificationRequestItem[]): Promise<ClassificationBatch> {
    return Promise.resolve({
      processed_transactions: items.map((item): ClassificationResult => {
        const rule = matchCategoryRule(item.description, this.rules);
        const isSecondary = this.splitToken !== '' && item.description.toLowerCase().includes(this.splitToken);
        return {
          original_index: item.index,
          category_str: rule?.category ?? FALLBACK_CATEGORY,
          is_expense: rule?.isExpense ?? 1,
          is_split: isSecondary ? 2 : 0,
        };
      }),
    });
  }
}
