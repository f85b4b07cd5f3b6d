/**
 * Request Logging Middleware
 *
 * One line per request on completion: method, path, status, duration and a
 * request id. The id comes from X-Request-ID when the caller sends one and
 * is echoed back on the response. Query strings and bodies are not logged.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';

export const REQUEST_ID_HEADER = 'X-Request-ID';

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get(REQUEST_ID_HEADER) || randomUUID();
  const startedAt = process.hrtime.bigint();
  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.locals.requestId = requestId;

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    const meta = {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Math.round(durationMs),
    };
    if (res.statusCode >= 500) {
      console.error('[http] Request failed', meta);
    } else {
      console.log('[http] Request completed', meta);
    }
  });

  next();
}
