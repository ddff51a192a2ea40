import fs from 'node:fs/promises';
import path from 'node:path';

import { v4 as uuid } from 'uuid';

import { shareRecordSchema } from '../models/ShareRecord';
import { logger } from '../utils/logger';
import { ShareMap, ShareStorage } from './ShareStorage';

/**
 * Keeps every share record in a single JSON document. Reads are fail-open;
 * writes go to a temp file that is renamed over the store.
 */
export class FileShareStorage implements ShareStorage {
  private readonly storagePath: string;

  constructor(storagePath: string) {
    this.storagePath = path.resolve(storagePath);
  }

  get path(): string {
    return this.storagePath;
  }

  async load(): Promise<ShareMap> {
    let contents: string;
    try {
      contents = await fs.readFile(this.storagePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        logger.warn({ error, storagePath: this.storagePath }, 'Share store unreadable, treating as empty');
      }
      return {};
    }

    if (!contents.trim()) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(contents);
    } catch (error) {
      logger.warn({ error, storagePath: this.storagePath }, 'Share store is not valid JSON, treating as empty');
      return {};
    }

    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      logger.warn({ storagePath: this.storagePath }, 'Share store is not a token mapping, treating as empty');
      return {};
    }

    const shares: ShareMap = {};
    for (const [token, value] of Object.entries(parsed)) {
      const result = shareRecordSchema.safeParse(value);
      if (!result.success || result.data.token !== token) {
        logger.warn({ token }, 'Skipping malformed share record');
        continue;
      }
      shares[token] = result.data;
    }
    return shares;
  }

  async save(shares: ShareMap): Promise<void> {
    const dir = path.dirname(this.storagePath);
    const tempPath = path.join(dir, `.${path.basename(this.storagePath)}.${uuid()}.tmp`);
    await fs.mkdir(dir, { recursive: true });
    try {
      await fs.writeFile(tempPath, JSON.stringify(shares, null, 2), 'utf-8');
      await fs.rename(tempPath, this.storagePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        logger.warn({ error: cleanupError, tempPath }, 'Failed to remove temporary share store file');
      });
      throw error;
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
