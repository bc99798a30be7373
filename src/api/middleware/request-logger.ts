import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const REQUEST_ID_HEADER = 'x-request-id';

const log = logger.child({ module: 'http' });

/** Logs one line per finished request and echoes a request id back to the caller. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = req.get(REQUEST_ID_HEADER) || randomUUID();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const level = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';

    log[level](
      {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
        contentLength: req.get('content-length'),
      },
      'HTTP request',
    );
  });

  next();
}
