/**
 * Health Check Endpoint Handler
 *
 * Returns server status, pool size, kill switch state, version, and
 * timestamp. Used by load balancers, monitoring, and manual verification.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function healthHandler(workers: number) {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      workers,
      killSwitch: appConfig.killSwitch,
      version: process.env.npm_package_version ?? 'dev',
    });
  };
}
