import type { Response } from 'express';

import { ConfigurationError } from '../config/appConfig';
import {
  NotReadyError,
  PersistenceError,
  ShareNotFoundError,
  UpstreamError,
  ValidationError,
  WebhookSignatureError,
} from '../models/SongError';
import { logger } from '../utils/logger';

export interface ErrorResponse {
  error: string;
  message: string;
}

export function createError(error: string, message: string): ErrorResponse {
  return { error, message };
}

export function handleSongError(res: Response, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(400).json(createError('INVALID_REQUEST', error.message));
    return;
  }
  if (error instanceof NotReadyError) {
    res.status(404).json(createError('NOT_READY', error.message));
    return;
  }
  if (error instanceof ShareNotFoundError) {
    res.status(404).json(createError('SHARE_NOT_FOUND', error.message));
    return;
  }
  if (error instanceof WebhookSignatureError) {
    res.status(400).json(createError('INVALID_SIGNATURE', error.message));
    return;
  }
  if (error instanceof ConfigurationError) {
    logger.error({ error: error.message }, 'Request needs missing configuration');
    res.status(500).json(createError('CONFIGURATION_ERROR', error.message));
    return;
  }
  if (error instanceof PersistenceError) {
    logger.error({ error }, 'Share store write failed');
    res.status(500).json(createError('PERSISTENCE_ERROR', 'Unable to save the share link, please try again'));
    return;
  }
  if (error instanceof UpstreamError) {
    logger.error({ error, service: error.service }, 'Upstream service failed');
    res.status(502).json(createError('UPSTREAM_ERROR', `The ${error.service} service is unavailable, please try again later`));
    return;
  }
  logger.error({ error }, 'Unexpected error');
  res.status(500).json(createError('INTERNAL_ERROR', 'An unexpected error occurred'));
}
