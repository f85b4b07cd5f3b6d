/**
 * Health Check Endpoint Handler
 *
 * Returns server status, enabled features, version, and timestamp.
 * Used by the platform's liveness probe and manual verification; it does
 * not call Gmail or Firestore.
 */

import type { Request, Response } from 'express';
import type { AppConfig } from '../config.js';

export function createHealthHandler(config: AppConfig) {
  return (_req: Request, res: Response): void => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version ?? 'dev',
      features: {
        tracking: config.features.tracking,
        autoFollowup: config.features.autoFollowup,
        appendSignature: config.features.appendSignature,
      },
    });
  };
}
