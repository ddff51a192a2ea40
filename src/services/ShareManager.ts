import { randomBytes } from 'node:crypto';

import { Mutex } from 'async-mutex';

import { ShareConfig } from '../config/appConfig';
import {
  CreateShareInput,
  DEFAULT_SHARE_SUBTITLE,
  DEFAULT_SHARE_TITLE,
  ShareRecord,
} from '../models/ShareRecord';
import { PersistenceError } from '../models/SongError';
import { ShareMap, ShareStorage } from '../storage/ShareStorage';
import { logger } from '../utils/logger';

const TOKEN_BYTES = 32;

export function generateShareToken(): string {
  return randomBytes(TOKEN_BYTES).toString('base64url');
}

function nowSeconds(): number {
  return Date.now() / 1000;
}

/**
 * Token -> share record store with lazy expiry.
 *
 * Every operation reloads the whole mapping, sweeps expired records, mutates
 * and writes back under one mutex, so concurrent requests in this process
 * cannot overwrite each other. The sweep is a linear scan on every call, which
 * only holds up while the store stays small; a larger deployment needs an
 * expiry index or a background sweep instead.
 */
export class ShareManager {
  private readonly mutex = new Mutex();

  constructor(private readonly storage: ShareStorage, private readonly config: ShareConfig) { }

  async create(input: CreateShareInput): Promise<string> {
    return this.mutex.runExclusive(async () => {
      const shares = await this.storage.load();
      this.sweep(shares);

      let token = generateShareToken();
      while (Object.hasOwn(shares, token)) {
        token = generateShareToken();
      }

      const record: ShareRecord = {
        token,
        songId: input.songId,
        audioUrl: input.audioUrl,
        title: presentOrUndefined(input.title) ?? DEFAULT_SHARE_TITLE,
        subtitle: presentOrUndefined(input.subtitle) ?? DEFAULT_SHARE_SUBTITLE,
        recipientName: presentOrUndefined(input.recipientName),
        subject: presentOrUndefined(input.subject),
        lyrics: presentOrUndefined(input.lyrics),
        createdAt: nowSeconds(),
      };
      shares[token] = record;

      try {
        await this.storage.save(shares);
      } catch (error) {
        throw new PersistenceError('Failed to persist share record', error);
      }

      logger.info({ token, songId: record.songId }, 'Created share record');
      return token;
    });
  }

  async get(token: string): Promise<ShareRecord | null> {
    return this.mutex.runExclusive(async () => {
      const shares = await this.storage.load();
      await this.sweepAndPersist(shares);
      return Object.hasOwn(shares, token) ? shares[token] : null;
    });
  }

  /** Runs the expiry sweep on its own and returns how many records it dropped. */
  async prune(): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const shares = await this.storage.load();
      const removed = this.sweep(shares);
      if (removed > 0) {
        try {
          await this.storage.save(shares);
        } catch (error) {
          throw new PersistenceError('Failed to persist pruned share store', error);
        }
      }
      return removed;
    });
  }

  private async sweepAndPersist(shares: ShareMap): Promise<void> {
    const removed = this.sweep(shares);
    if (removed === 0) {
      return;
    }
    try {
      await this.storage.save(shares);
    } catch (error) {
      logger.warn({ error, removed }, 'Failed to persist share expiry sweep');
    }
  }

  private sweep(shares: ShareMap): number {
    const now = nowSeconds();
    let removed = 0;
    for (const [token, record] of Object.entries(shares)) {
      if (now - record.createdAt > this.config.ttlSeconds) {
        delete shares[token];
        removed += 1;
      }
    }
    if (removed > 0) {
      logger.info({ removed }, 'Swept expired share records');
    }
    return removed;
  }
}

function presentOrUndefined(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
