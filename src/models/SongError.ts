export abstract class SongError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = 'SongError';
  }
}

export type UpstreamService = 'openai' | 'mureka' | 'stripe' | 'resend' | 'klaviyo';

export class UpstreamError extends SongError {
  constructor(public service: UpstreamService, errorMessage: string, cause?: unknown) {
    super(`Upstream error from ${service}: ${errorMessage}`, cause);
    this.name = 'UpstreamError';
  }
}

export class NotReadyError extends SongError {
  constructor(message: string) {
    super(message);
    this.name = 'NotReadyError';
  }
}

export class ValidationError extends SongError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class PersistenceError extends SongError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'PersistenceError';
  }
}

export class ShareNotFoundError extends SongError {
  constructor() {
    super('Share link not found or expired');
    this.name = 'ShareNotFoundError';
  }
}

export class WebhookSignatureError extends SongError {
  constructor(message: string, cause?: unknown) {
    super(`Webhook verification failed: ${message}`, cause);
    this.name = 'WebhookSignatureError';
  }
}
