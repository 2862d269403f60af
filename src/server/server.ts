/**
 * Express Ingestion Server
 *
 * HTTP layer in front of the ingestion driver. Routes:
 * - POST /mails: Accept a batch of already-fetched messages, run Phase 1,
 *   queue Phase 2, return the batch summary (202)
 * - GET /health: Server status, pool size and kill switch state
 *
 * The ingestion endpoint:
 * 1. Checks kill switch (returns 503 if active)
 * 2. Validates the body with zod (400 with the issue list on failure)
 * 3. Runs the ingestion driver and returns 202 with its summary
 *
 * Message text is never logged; only ids, counts and the request id.
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import { appConfig } from '../config.js';
import { ingestMessages } from '../ingestion/driver.js';
import type { IngestionDeps } from '../ingestion/driver.js';
import { IngestRequestSchema } from '../mail/types.js';
import { healthHandler } from './health.js';
import { getRequestId, requestId } from './request-id.js';

/** Largest accepted request body (attachment text makes batches large) */
const BODY_LIMIT = '10mb';

/**
 * Create the Express application with all routes configured.
 *
 * Exported as a factory function so tests can create fresh app instances
 * with their own store, pool and engine.
 */
export function createApp(deps: IngestionDeps) {
  const app = express();
  app.use(requestId);
  app.use(express.json({ limit: BODY_LIMIT }));

  // Health check
  app.get('/health', healthHandler(deps.pool.concurrency));

  // Batch ingestion
  app.post('/mails', async (req: Request, res: Response, next: NextFunction) => {
    const reqId = getRequestId(res);

    // Kill switch check: 503 so the caller retries later
    if (appConfig.killSwitch) {
      console.log('[server] Kill switch active: rejecting batch', { requestId: reqId });
      res.status(503).json({ message: 'Automation disabled' });
      return;
    }

    const parsed = IngestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      console.warn('[server] Invalid ingestion payload', {
        requestId: reqId,
        issues: parsed.error.issues.length,
      });
      res.status(400).json({
        error: 'Invalid request body',
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      return;
    }

    try {
      console.log('[server] Ingestion batch received', {
        requestId: reqId,
        count: parsed.data.messages.length,
      });
      const summary = await ingestMessages(parsed.data.messages, deps);
      res.status(202).json(summary);
    } catch (err) {
      next(err);
    }
  });

  // Global error handler
  app.use((err: Error & { status?: number }, _req: Request, res: Response, _next: NextFunction) => {
    // Body parser rejections (malformed JSON, oversized body) keep their 4xx status
    if (err.status !== undefined && err.status >= 400 && err.status < 500) {
      console.warn('[server] Rejected request body', { requestId: getRequestId(res), status: err.status });
      res.status(err.status).json({ error: 'Invalid request body' });
      return;
    }
    console.error('[server] Unhandled error:', { requestId: getRequestId(res), error: err.message });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
