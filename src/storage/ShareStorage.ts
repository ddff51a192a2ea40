import { ShareRecord } from '../models/ShareRecord';

export type ShareMap = Record<string, ShareRecord>;

export interface ShareStorage {
  /** Whole token -> record mapping; an unreadable store loads as empty. */
  load(): Promise<ShareMap>;
  /** Replaces the whole mapping. Rejects when the write fails. */
  save(shares: ShareMap): Promise<void>;
}
