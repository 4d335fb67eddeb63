import { describe, it, expect } from 'vitest';
import {
  CATEGORY_VALUES,
  FALLBACK_CATEGORY,
  VALIDATION_CATEGORIES,
  isCategory,
  normalizeCategoryKey,
  resolveCategory,
} from '@monthbook/types';
import { RecordingLogger } from '../helpers/logger.js';

describe('resolveCategory', () => {
  it('should resolve a member key', () => {
    expect(resolveCategory('FOOD')).toBe('Food');
  });

  it('should resolve a display value case-insensitively', () => {
    expect(resolveCategory('food')).toBe('Food');
    expect(resolveCategory('  Grocery ')).toBe('Grocery');
  });

  it('should map spaces to underscores for multi-word keys', () => {
    expect(resolveCategory('income tax')).toBe('Income Tax');
    expect(resolveCategory('International Trip')).toBe('International Trip');
  });

  it('should correct known misspellings and legacy labels', () => {
    expect(resolveCategory('ENTERTAINTMENT')).toBe('Entertainment');
    expect(resolveCategory('Body')).toBe('Gym');
    expect(resolveCategory('house')).toBe('Household');
  });

  it('should fall back and warn for unknown text', () => {
    const logger = new RecordingLogger();
    expect(resolveCategory('Foobar', logger)).toBe('Uncategorized');
    expect(logger.messages('warn')).toEqual(["Could not map category 'Foobar', falling back to Uncategorized"]);
  });

  it('should fall back for empty and non-text input', () => {
    const logger = new RecordingLogger();
    expect(resolveCategory('', logger)).toBe(FALLBACK_CATEGORY);
    expect(resolveCategory(null, logger)).toBe(FALLBACK_CATEGORY);
    expect(resolveCategory(42, logger)).toBe(FALLBACK_CATEGORY);
    expect(logger.messages('warn')).toHaveLength(3);
    expect(logger.messages('warn')[1]).toBe('Empty or non-text category null, using Uncategorized');
  });
});

describe('category vocabulary', () => {
  it('should use Uncategorized as the fallback', () => {
    expect(FALLBACK_CATEGORY).toBe('Uncategorized');
  });

  it('should leave the fallback out of the validation list', () => {
    expect(VALIDATION_CATEGORIES).not.toContain('Uncategorized');
    expect(VALIDATION_CATEGORIES).toHaveLength(CATEGORY_VALUES.length - 1);
    expect(VALIDATION_CATEGORIES.slice(0, 3)).toEqual(['Achu', 'Aishu', 'Amma']);
  });

  it('should only accept exact display values as categories', () => {
    expect(isCategory('Food')).toBe(true);
    expect(isCategory('food')).toBe(false);
    expect(isCategory('Foobar')).toBe(false);
  });

  it('should normalize keys', () => {
    expect(normalizeCategoryKey(' value add ')).toBe('VALUE_ADD');
  });
});
