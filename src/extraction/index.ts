// ============================================================================
// Extraction Module: Barrel Export
// ============================================================================
//
// Classification and field extraction for business emails: the heuristic
// classifier, the model-backed engine, JSON recovery, the regex invoice
// fallback and the deterministic helpers they share.

// Types
export type {
  Category,
  Priority,
  Classification,
  InvoiceFieldKey,
  InvoiceFields,
  RequestFields,
  ExtractionPayload,
  RawExtraction,
} from './types.js';

export {
  CATEGORIES,
  PRIORITIES,
  INVOICE_FIELD_KEYS,
  isCategory,
  isPriority,
  emptyInvoiceFields,
  countPopulated,
} from './types.js';

// Config
export { extractionConfig } from './config.js';
export type { ExtractionConfig, ModelBackend } from './config.js';

// Errors
export { ModelOutputError, ModelBackendError, ValidationError } from './errors.js';

// Engine
export { ExtractionEngine, normalizeCategory, normalizePriority } from './engine.js';
export type { EngineSettings } from './engine.js';

// Heuristic classifier
export { classifyHeuristically } from './heuristic.js';
export type { HeuristicInput, HeuristicOptions, HeuristicResult } from './heuristic.js';
export { DEFAULT_CATEGORY_RULES, DEFAULT_URGENCY_KEYWORDS, loadCategoryRules } from './keywords.js';
export type { CategoryRule } from './keywords.js';

// Fallbacks and helpers
export { fallbackInvoiceParse, mergeMissingFields } from './invoice-fallback.js';
export { findFirstJsonValue, parseLenientJson, parseStrictJson, stripCodeFences } from './json-recovery.js';
export { computeTicketNumber, deterministicSeed, shortHash, yyyymmddFromIso } from './determinism.js';
