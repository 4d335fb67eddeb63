/**
 * @monthbook/categorizer
 *
 * Batch classification contract, the enrichment stage and the classifiers
 * behind it (OpenAI-compatible model or offline rules).
 */

export {
  ClassificationBatchSchema,
  ClassificationResultSchema,
  ClassifierError,
  type ClassificationBatch,
  type ClassificationResult,
  type ClassificationRequestItem,
  type ClassifierFailure,
  type TransactionClassifier,
} from './classifier.js';

export {
  enrichTransactions,
  applyCategoryDefaults,
  filterExpenses,
  buildClassificationRequest,
  type EnrichmentOutcome,
  type EnrichmentReport,
  type EnrichmentOptions,
} from './enrichment.js';

export {
  RuleBasedClassifier,
  CATEGORY_RULES,
  matchCategoryRule,
  type CategoryRule,
  type RuleBasedClassifierOptions,
} from './rule-classifier.js';

export {
  getAIConfig,
  isAIConfigured,
  createAIClient,
  getAIClient,
  resetAIClient,
  createJsonChat,
  createTextChat,
  parseJsonReply,
  DEFAULT_AI_BASE_URL,
  DEFAULT_AI_MODEL,
  type AIConfig,
  type ChatMessage,
  type ChatCompletionFn,
} from './ai/client.js';

export {
  AITransactionClassifier,
  buildClassificationPrompt,
  type AITransactionClassifierOptions,
} from './ai/transaction-classifier.js';
export { AIAccountClassifier, type AIAccountClassifierOptions } from './ai/account-classifier.js';
export {
  AIPageTranscriber,
  buildPageMessages,
  PAGE_TRANSCRIPTION_PROMPT,
  type AIPageTranscriberOptions,
} from './ai/page-transcriber.js';
