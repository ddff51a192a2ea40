import { vi } from 'vitest';

import type { AppConfig, ShareConfig, SiteConfig } from '../config/appConfig';
import { DEFAULTS } from '../config/appConfig';
import type { EmailSender } from '../services/email/EmailSender';
import type { LyricsWriter } from '../services/lyrics/types';
import type { MailingListClient } from '../services/marketing/MailingListClient';
import type { SongGenerationClient } from '../services/music/SongGenerationClient';
import type { ShareMap, ShareStorage } from '../storage/ShareStorage';

export const TEST_SITE: SiteConfig = {
  siteUrl: 'https://songs.test',
  apiBaseUrl: 'https://api.songs.test',
  shareImageUrl: 'https://songs.test/og.png',
};

export const TEST_SHARES: ShareConfig = {
  storagePath: './unused.json',
  ttlSeconds: 100,
};

export const TEST_WEBHOOK_SECRET = 'whsec_test_secret';

export function testConfig(): AppConfig {
  return {
    ...DEFAULTS,
    stripe: {
      secretKey: 'test-secret',
      priceId: 'price_test',
      webhookSecret: TEST_WEBHOOK_SECRET,
      timeoutMs: 1000,
    },
    shares: TEST_SHARES,
    site: TEST_SITE,
  };
}

/** In-process stand-in for the share file. */
export class MemoryShareStorage implements ShareStorage {
  data: ShareMap = {};
  saves = 0;
  failSaves = false;

  async load(): Promise<ShareMap> {
    return structuredClone(this.data);
  }

  async save(shares: ShareMap): Promise<void> {
    if (this.failSaves) {
      throw new Error('disk full');
    }
    this.saves += 1;
    this.data = structuredClone(shares);
  }
}

export function fakeMusicClient() {
  return {
    startGeneration: vi.fn<SongGenerationClient['startGeneration']>(),
    queryStatus: vi.fn<SongGenerationClient['queryStatus']>(),
  } satisfies SongGenerationClient;
}

export function fakeLyricsWriter() {
  return {
    writeKidLyrics: vi.fn<LyricsWriter['writeKidLyrics']>(),
    writeAdultLyrics: vi.fn<LyricsWriter['writeAdultLyrics']>(),
  } satisfies LyricsWriter;
}

export function fakeEmailSender() {
  return {
    sendSongEmail: vi.fn<EmailSender['sendSongEmail']>().mockResolvedValue(undefined),
  } satisfies EmailSender;
}

export function fakeMailingList() {
  return {
    subscribe: vi.fn<MailingListClient['subscribe']>().mockResolvedValue(true),
  } satisfies MailingListClient;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
