import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError, DEFAULTS, listMissingCredentials, loadConfig } from '../config/appConfig';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'app-config-'));
    configPath = path.join(dir, 'app.config.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('uses the defaults when nothing is set', () => {
    expect(loadConfig({}, configPath)).toEqual(DEFAULTS);
  });

  it('keeps shares for two years by default', () => {
    expect(loadConfig({}, configPath).shares.ttlSeconds).toBe(63_072_000);
  });

  it('reads values from the environment', () => {
    const config = loadConfig(
      {
        OPENAI_API_KEY: 'test-openai',
        STRIPE_SECRET_KEY: 'test-secret',
        SHARES_TTL_SECONDS: '3600',
        SITE_URL: 'https://songs.test/',
        MUREKA_BASE_URL: 'https://mureka.test/v1//',
      },
      configPath,
    );

    expect(config.openai.apiKey).toBe('test-openai');
    expect(config.stripe.secretKey).toBe('test-secret');
    expect(config.shares.ttlSeconds).toBe(3600);
    expect(config.site.siteUrl).toBe('https://songs.test');
    expect(config.mureka.baseUrl).toBe('https://mureka.test/v1');
  });

  it('falls back to the default for a non-positive number', () => {
    expect(loadConfig({ SHARES_TTL_SECONDS: '-5' }, configPath).shares.ttlSeconds).toBe(DEFAULTS.shares.ttlSeconds);
    expect(loadConfig({ MUREKA_TIMEOUT_MS: 'soon' }, configPath).mureka.timeoutMs).toBe(DEFAULTS.mureka.timeoutMs);
  });

  it('layers the config file under the environment', async () => {
    await fs.writeFile(
      configPath,
      JSON.stringify({
        shoutout: {
          openai: { model: 'gpt-test' },
          shares: { storagePath: '/var/lib/shares.json', ttlSeconds: 120 },
        },
      }),
      'utf-8',
    );

    const config = loadConfig({ SHARES_TTL_SECONDS: '60' }, configPath);

    expect(config.openai.model).toBe('gpt-test');
    expect(config.shares).toEqual({ storagePath: '/var/lib/shares.json', ttlSeconds: 60 });
  });

  it('throws ConfigurationError for a malformed file', async () => {
    await fs.writeFile(configPath, '{ "shoutout": ', 'utf-8');

    expect(() => loadConfig({}, configPath)).toThrow(ConfigurationError);
  });
});

describe('listMissingCredentials', () => {
  it('names every credential that is unset', () => {
    expect(listMissingCredentials(DEFAULTS)).toEqual([
      'OPENAI_API_KEY',
      'MUREKA_API_KEY',
      'STRIPE_SECRET_KEY',
      'STRIPE_PRICE_ID',
      'STRIPE_WEBHOOK_SECRET',
      'RESEND_API_KEY',
      'KLAVIYO_API_KEY',
      'KLAVIYO_LIST_ID',
    ]);
  });

  it('returns nothing once all credentials are set', () => {
    const config = {
      ...DEFAULTS,
      openai: { ...DEFAULTS.openai, apiKey: 'k' },
      mureka: { ...DEFAULTS.mureka, apiKey: 'k' },
      stripe: { ...DEFAULTS.stripe, secretKey: 'k', priceId: 'p', webhookSecret: 'w' },
      email: { ...DEFAULTS.email, resendApiKey: 'k' },
      klaviyo: { ...DEFAULTS.klaviyo, apiKey: 'k', listId: 'l' },
    };

    expect(listMissingCredentials(config)).toEqual([]);
  });
});
