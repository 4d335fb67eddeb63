import { readFileSync } from 'fs';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';

export const CategorySchema = z.string().min(1).brand<'Category'>();
export type Category = z.infer<typeof CategorySchema>;

const CategoryDefinitionSchema = z.object({
  key: z.string().regex(/^[A-Z][A-Z_]*$/, 'Category key must be UPPER_SNAKE_CASE'),
  value: CategorySchema,
});
export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

const FALLBACK_KEY = 'UNCATEGORIZED';

/**
 * Misspellings and legacy labels seen in classifier output, keyed by their
 * normalized form.
 */
export const CATEGORY_SYNONYMS: Readonly<Record<string, string>> = {
  ENTERTAINTMENT: 'ENTERTAINMENT',
  BODY: 'GYM',
  HOUSE: 'HOUSEHOLD',
};

function loadDefinitions(): CategoryDefinition[] {
  const raw = readFileSync(new URL('./categories.json', import.meta.url), 'utf-8');
  return z.array(CategoryDefinitionSchema).min(1).parse(JSON.parse(raw));
}

export const CATEGORY_DEFINITIONS: readonly CategoryDefinition[] = loadDefinitions();

const byKey = new Map<string, Category>(CATEGORY_DEFINITIONS.map((d) => [d.key, d.value]));
const byUpperValue = new Map<string, Category>(
  CATEGORY_DEFINITIONS.map((d) => [d.value.toUpperCase(), d.value])
);

function requireFallback(): Category {
  const fallback = byKey.get(FALLBACK_KEY);
  if (fallback === undefined) {
    throw new Error(`Category vocabulary is missing the ${FALLBACK_KEY} member`);
  }
  return fallback;
}

export const FALLBACK_CATEGORY: Category = requireFallback();

/** Every display value, in vocabulary order. */
export const CATEGORY_VALUES: readonly Category[] = CATEGORY_DEFINITIONS.map((d) => d.value);

/** The values a user may pick in the ledger: everything except the fallback, sorted. */
export const VALIDATION_CATEGORIES: readonly string[] = CATEGORY_VALUES.filter(
  (value) => value !== FALLBACK_CATEGORY
)
  .map((value) => String(value))
  .sort((a, b) => a.localeCompare(b));

export function isCategory(value: string): value is Category {
  return byUpperValue.get(value.toUpperCase()) === value;
}

export function normalizeCategoryKey(value: string): string {
  return value.toUpperCase().trim().replace(/ /g, '_');
}

/**
 * Maps free-form classifier text onto the closed vocabulary.
 * Never throws; anything unrecognised becomes the fallback and is logged.
 */
export function resolveCategory(raw: unknown, logger?: Logger): Category {
  if (typeof raw !== 'string' || raw.trim() === '') {
    logger?.warn(`Empty or non-text category ${String(raw)}, using ${FALLBACK_CATEGORY}`);
    return FALLBACK_CATEGORY;
  }

  const normalized = normalizeCategoryKey(raw);
  const key = CATEGORY_SYNONYMS[normalized] ?? normalized;

  const keyMatch = byKey.get(key);
  if (keyMatch !== undefined) return keyMatch;

  const valueMatch = byUpperValue.get(raw.trim().toUpperCase());
  if (valueMatch !== undefined) return valueMatch;

  logger?.warn(`Could not map category '${raw}', falling back to ${FALLBACK_CATEGORY}`);
  return FALLBACK_CATEGORY;
}
