// ============================================================================
// Ingestion Module: Barrel Export
// ============================================================================

export { ingestMessages } from './driver.js';
export type { IngestionDeps, IngestionDetail, IngestionSummary } from './driver.js';
