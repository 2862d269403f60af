/**
 * Batch progress for the enrichment pool.
 *
 * One counter per ingestion batch, injected into every worker of that batch.
 * Increments run on the event loop, so concurrent workers never lose a count.
 */

export class ProgressCounter {
  private processedCount = 0;

  constructor(readonly total: number) {
    console.log('[progress] Starting enrichment', { total });
  }

  get processed(): number {
    return this.processedCount;
  }

  /** Record one message reaching a terminal state */
  increment(): number {
    this.processedCount += 1;
    console.log('[progress] Processed', {
      processed: this.processedCount,
      total: this.total,
    });
    return this.processedCount;
  }
}
