/**
 * Bounded Enrichment Pool
 *
 * In-process task pool on p-limit:
 * - submit() queues a task and returns immediately
 * - at most `concurrency` tasks run at once; queued tasks start FIFO
 * - a rejected task is logged and its slot freed; nothing is left unhandled
 * - onIdle() resolves once every submitted task has settled
 */

import pLimit from 'p-limit';

export type PoolTask = () => Promise<unknown>;

export class EnrichmentPool {
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Pool concurrency must be a positive integer, got ${concurrency}`);
    }
    this.limit = pLimit(concurrency);
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.limit.pendingCount;
  }

  /** Tasks currently running */
  get active(): number {
    return this.limit.activeCount;
  }

  submit(task: PoolTask): void {
    const run = this.limit(task).then(
      () => undefined,
      (err: unknown) => {
        console.error('[pool] Task failed', {
          error: err instanceof Error ? err.message : String(err),
        });
      },
    );
    this.inFlight.add(run);
    void run.then(() => {
      this.inFlight.delete(run);
    });
  }

  async onIdle(): Promise<void> {
    // Tasks may submit more work while we wait
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
