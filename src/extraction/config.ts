/**
 * Extraction Configuration
 *
 * Centralizes all environment variable access for the classification and
 * extraction pipeline. Follows the same pattern as src/config.ts.
 *
 * Environment variables:
 * - MODEL_BACKEND: 'ollama' (default) or 'gemini'
 * - OLLAMA_HOST: Ollama base URL (default http://localhost:11434)
 * - OLLAMA_KEEP_ALIVE: How long Ollama keeps models loaded (default 30m)
 * - GEMINI_API_KEY: Required when MODEL_BACKEND=gemini
 * - CLASSIFIER_MODEL / INVOICE_MODEL / REQUEST_MODEL: Model per task
 * - MODEL_TEMPERATURE: Sampling temperature (default 0)
 * - MODEL_MAX_TOKENS: Output token cap for classification/summary (default 200)
 * - INVOICE_MAX_TOKENS: Output token cap for invoice extraction (default 400)
 * - MODEL_CONTEXT_WINDOW: Context window passed to Ollama as num_ctx (default 3072)
 * - CLASSIFY_MAX_CHARS: Body characters sent for classification (default 4000)
 * - EXTRACTOR_MAX_CHARS: Body/attachment characters sent for extraction (default 12000)
 * - MODEL_TIMEOUT_MS: Per-call timeout; 0 disables (default 120000)
 * - MODEL_WARN_MS: Per-call duration that triggers a warning; 0 disables (default 30000)
 * - TICKET_PREFIX: Prefix for generated ticket numbers (default REQ-)
 * - URGENCY_KEYWORDS: Comma-separated urgency words for the heuristic classifier
 * - CATEGORY_KEYWORDS_FILE: JSON file replacing the heuristic category table
 */

import 'dotenv/config';
import { floatEnv, intEnv, optionalEnv } from '../config.js';
import {
  DEFAULT_CATEGORY_RULES,
  DEFAULT_URGENCY_KEYWORDS,
  loadCategoryRules,
  parseKeywordList,
} from './keywords.js';
import type { CategoryRule } from './keywords.js';

export type ModelBackend = 'ollama' | 'gemini';

export interface ExtractionConfig {
  backend: ModelBackend;
  ollamaHost: string;
  ollamaKeepAlive: string;
  /** Empty unless MODEL_BACKEND=gemini; checked when the Gemini backend is built */
  geminiApiKey: string;
  classifierModel: string;
  invoiceModel: string;
  requestModel: string;
  temperature: number;
  maxTokens: number;
  invoiceMaxTokens: number;
  contextWindow: number;
  classifyMaxChars: number;
  extractMaxChars: number;
  timeoutMs: number;
  warnMs: number;
  ticketPrefix: string;
  urgencyKeywords: readonly string[];
  categoryRules: readonly CategoryRule[];
}

function parseBackend(value: string): ModelBackend {
  const normalized = value.trim().toLowerCase();
  if (normalized === 'ollama' || normalized === 'gemini') return normalized;
  throw new Error(`Unsupported MODEL_BACKEND "${value}". Use "ollama" or "gemini".`);
}

const backend = parseBackend(optionalEnv('MODEL_BACKEND', 'ollama'));
const urgencyOverride = parseKeywordList(optionalEnv('URGENCY_KEYWORDS'));
const categoryFile = optionalEnv('CATEGORY_KEYWORDS_FILE');

export const extractionConfig: ExtractionConfig = {
  backend,
  ollamaHost: optionalEnv('OLLAMA_HOST', 'http://localhost:11434').replace(/\/+$/, ''),
  ollamaKeepAlive: optionalEnv('OLLAMA_KEEP_ALIVE', '30m'),
  geminiApiKey: optionalEnv('GEMINI_API_KEY'),
  classifierModel: optionalEnv('CLASSIFIER_MODEL', backend === 'gemini' ? 'gemini-2.0-flash' : 'mail-classifier-small'),
  invoiceModel: optionalEnv('INVOICE_MODEL', backend === 'gemini' ? 'gemini-2.0-flash' : 'invoice-extractor-small'),
  requestModel: optionalEnv('REQUEST_MODEL', backend === 'gemini' ? 'gemini-2.0-flash' : 'request-summarizer-small'),
  temperature: floatEnv('MODEL_TEMPERATURE', 0),
  maxTokens: intEnv('MODEL_MAX_TOKENS', 200),
  invoiceMaxTokens: intEnv('INVOICE_MAX_TOKENS', 400),
  contextWindow: intEnv('MODEL_CONTEXT_WINDOW', 3072),
  classifyMaxChars: intEnv('CLASSIFY_MAX_CHARS', 4000),
  extractMaxChars: intEnv('EXTRACTOR_MAX_CHARS', 12000),
  timeoutMs: intEnv('MODEL_TIMEOUT_MS', 120000),
  warnMs: intEnv('MODEL_WARN_MS', 30000),
  ticketPrefix: optionalEnv('TICKET_PREFIX', 'REQ-'),
  urgencyKeywords: urgencyOverride.length > 0 ? urgencyOverride : DEFAULT_URGENCY_KEYWORDS,
  categoryRules: categoryFile ? loadCategoryRules(categoryFile) : DEFAULT_CATEGORY_RULES,
};
