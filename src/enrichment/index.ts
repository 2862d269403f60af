// ============================================================================
// Enrichment Module: Barrel Export
// ============================================================================
//
// Phase 2 of ingestion: the business-rule flattener, the enrichment worker,
// the bounded pool it runs in, and batch progress.

export {
  flattenExtraction,
  categoryKind,
  isInvoiceResult,
  isCustomerRequestResult,
} from './flatten.js';
export type {
  EnrichmentResult,
  InvoiceResult,
  CustomerRequestResult,
  LabelOnlyResult,
  CategoryKind,
} from './flatten.js';

export { enrichAndPatch } from './worker.js';
export type { EnrichmentOutcome, FailureReason, WorkerDeps } from './worker.js';

export { EnrichmentPool } from './pool.js';
export type { PoolTask } from './pool.js';

export { ProgressCounter } from './progress.js';
