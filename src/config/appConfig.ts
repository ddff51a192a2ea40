import fs from 'node:fs';
import path from 'node:path';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface OpenAIConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export interface MurekaConfig {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface StripeConfig {
  secretKey: string;
  priceId: string;
  webhookSecret: string;
  timeoutMs: number;
}

export interface EmailConfig {
  resendApiKey: string;
  fromAddress: string;
  templatePath: string;
  timeoutMs: number;
}

export interface KlaviyoConfig {
  apiKey: string;
  listId: string;
  revision: string;
  timeoutMs: number;
}

export interface ShareConfig {
  storagePath: string;
  ttlSeconds: number;
}

export interface SiteConfig {
  /** Public web app; share viewers and checkout return pages live here. */
  siteUrl: string;
  /** Public base URL of this API, used in share and download links. */
  apiBaseUrl: string;
  shareImageUrl: string;
}

export interface AppConfig {
  openai: OpenAIConfig;
  mureka: MurekaConfig;
  stripe: StripeConfig;
  email: EmailConfig;
  klaviyo: KlaviyoConfig;
  shares: ShareConfig;
  site: SiteConfig;
}

interface RawConfigFile {
  shoutout?: {
    openai?: Partial<OpenAIConfig>;
    mureka?: Partial<MurekaConfig>;
    stripe?: Partial<StripeConfig>;
    email?: Partial<EmailConfig>;
    klaviyo?: Partial<KlaviyoConfig>;
    shares?: Partial<ShareConfig>;
    site?: Partial<SiteConfig>;
  };
}

type Env = Record<string, string | undefined>;

const TWO_YEARS_SECONDS = 2 * 365 * 24 * 60 * 60;

export const DEFAULTS: AppConfig = {
  openai: {
    apiKey: '',
    model: 'gpt-4.1-mini',
    timeoutMs: 60_000,
  },
  mureka: {
    apiKey: '',
    baseUrl: 'https://api.mureka.ai/v1',
    timeoutMs: 30_000,
  },
  stripe: {
    secretKey: '',
    priceId: '',
    webhookSecret: '',
    timeoutMs: 20_000,
  },
  email: {
    resendApiKey: '',
    fromAddress: 'Shoutout Song <songs@shoutoutsong.com>',
    templatePath: './templates/song-email.html',
    timeoutMs: 15_000,
  },
  klaviyo: {
    apiKey: '',
    listId: '',
    revision: '2024-10-15',
    timeoutMs: 15_000,
  },
  shares: {
    storagePath: './data/shares.json',
    ttlSeconds: TWO_YEARS_SECONDS,
  },
  site: {
    siteUrl: 'https://shoutoutsong.com',
    apiBaseUrl: 'http://localhost:8080',
    shareImageUrl: 'https://shoutoutsong.com/og-image.png',
  },
};

export function loadConfig(env: Env = process.env, configPath = path.resolve(process.cwd(), 'config/app.config.json')): AppConfig {
  let fileOverrides: RawConfigFile = {};

  if (fs.existsSync(configPath)) {
    try {
      const contents = fs.readFileSync(configPath, 'utf-8');
      fileOverrides = JSON.parse(contents) as RawConfigFile;
    } catch {
      throw new ConfigurationError(`Unable to parse config file: ${configPath}`);
    }
  }

  const shoutout = fileOverrides.shoutout ?? {};

  return {
    openai: {
      apiKey: String(env.OPENAI_API_KEY ?? shoutout.openai?.apiKey ?? DEFAULTS.openai.apiKey),
      model: String(env.OPENAI_MODEL ?? shoutout.openai?.model ?? DEFAULTS.openai.model),
      timeoutMs: parsePositiveNumber(env.OPENAI_TIMEOUT_MS ?? shoutout.openai?.timeoutMs, DEFAULTS.openai.timeoutMs),
    },
    mureka: {
      apiKey: String(env.MUREKA_API_KEY ?? shoutout.mureka?.apiKey ?? DEFAULTS.mureka.apiKey),
      baseUrl: trimTrailingSlash(String(env.MUREKA_BASE_URL ?? shoutout.mureka?.baseUrl ?? DEFAULTS.mureka.baseUrl)),
      timeoutMs: parsePositiveNumber(env.MUREKA_TIMEOUT_MS ?? shoutout.mureka?.timeoutMs, DEFAULTS.mureka.timeoutMs),
    },
    stripe: {
      secretKey: String(env.STRIPE_SECRET_KEY ?? shoutout.stripe?.secretKey ?? DEFAULTS.stripe.secretKey),
      priceId: String(env.STRIPE_PRICE_ID ?? shoutout.stripe?.priceId ?? DEFAULTS.stripe.priceId),
      webhookSecret: String(env.STRIPE_WEBHOOK_SECRET ?? shoutout.stripe?.webhookSecret ?? DEFAULTS.stripe.webhookSecret),
      timeoutMs: parsePositiveNumber(env.STRIPE_TIMEOUT_MS ?? shoutout.stripe?.timeoutMs, DEFAULTS.stripe.timeoutMs),
    },
    email: {
      resendApiKey: String(env.RESEND_API_KEY ?? shoutout.email?.resendApiKey ?? DEFAULTS.email.resendApiKey),
      fromAddress: String(env.EMAIL_FROM ?? shoutout.email?.fromAddress ?? DEFAULTS.email.fromAddress),
      templatePath: String(env.EMAIL_TEMPLATE_PATH ?? shoutout.email?.templatePath ?? DEFAULTS.email.templatePath),
      timeoutMs: parsePositiveNumber(env.EMAIL_TIMEOUT_MS ?? shoutout.email?.timeoutMs, DEFAULTS.email.timeoutMs),
    },
    klaviyo: {
      apiKey: String(env.KLAVIYO_API_KEY ?? shoutout.klaviyo?.apiKey ?? DEFAULTS.klaviyo.apiKey),
      listId: String(env.KLAVIYO_LIST_ID ?? shoutout.klaviyo?.listId ?? DEFAULTS.klaviyo.listId),
      revision: String(env.KLAVIYO_REVISION ?? shoutout.klaviyo?.revision ?? DEFAULTS.klaviyo.revision),
      timeoutMs: parsePositiveNumber(env.KLAVIYO_TIMEOUT_MS ?? shoutout.klaviyo?.timeoutMs, DEFAULTS.klaviyo.timeoutMs),
    },
    shares: {
      storagePath: String(env.SHARES_STORAGE_PATH ?? shoutout.shares?.storagePath ?? DEFAULTS.shares.storagePath),
      ttlSeconds: parsePositiveNumber(env.SHARES_TTL_SECONDS ?? shoutout.shares?.ttlSeconds, DEFAULTS.shares.ttlSeconds),
    },
    site: {
      siteUrl: trimTrailingSlash(String(env.SITE_URL ?? shoutout.site?.siteUrl ?? DEFAULTS.site.siteUrl)),
      apiBaseUrl: trimTrailingSlash(String(env.API_BASE_URL ?? shoutout.site?.apiBaseUrl ?? DEFAULTS.site.apiBaseUrl)),
      shareImageUrl: String(env.SHARE_IMAGE_URL ?? shoutout.site?.shareImageUrl ?? DEFAULTS.site.shareImageUrl),
    },
  };
}

/**
 * Names the credentials that are not set. The server still starts without
 * them; requests that need one fail with a ConfigurationError instead.
 */
export function listMissingCredentials(config: AppConfig): string[] {
  const required: Array<[string, string]> = [
    ['OPENAI_API_KEY', config.openai.apiKey],
    ['MUREKA_API_KEY', config.mureka.apiKey],
    ['STRIPE_SECRET_KEY', config.stripe.secretKey],
    ['STRIPE_PRICE_ID', config.stripe.priceId],
    ['STRIPE_WEBHOOK_SECRET', config.stripe.webhookSecret],
    ['RESEND_API_KEY', config.email.resendApiKey],
    ['KLAVIYO_API_KEY', config.klaviyo.apiKey],
    ['KLAVIYO_LIST_ID', config.klaviyo.listId],
  ];
  return required.filter(([, value]) => !value).map(([name]) => name);
}

function parsePositiveNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}
