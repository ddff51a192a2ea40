import type { NextFunction, Request, Response } from 'express';
import { v4 as uuid } from 'uuid';

import { logger } from '../utils/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.header(REQUEST_ID_HEADER) || uuid();
  const startedAt = process.hrtime.bigint();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.info(
      {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Math.round(durationMs),
      },
      'HTTP request completed',
    );
  });

  next();
}
