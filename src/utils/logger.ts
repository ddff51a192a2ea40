import pino from 'pino';

type Env = Record<string, string | undefined>;

export interface LogSettings {
  level: string;
  /** pino-pretty is a dev dependency, so only `NODE_ENV=development` turns it on. */
  pretty: boolean;
}

export function resolveLogSettings(env: Env = process.env): LogSettings {
  const isTest = env.NODE_ENV === 'test' || env.VITEST === 'true';
  const isDev = env.NODE_ENV === 'development' && !isTest;
  return {
    level: env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
    pretty: isDev,
  };
}

const settings = resolveLogSettings();

export const logger = pino(
  {
    level: settings.level,
    base: { service: 'shoutout-song-api' },
    redact: {
      paths: ['req.headers.authorization', 'headers.authorization', 'apiKey', 'secretKey', 'webhookSecret'],
      remove: true,
    },
  },
  settings.pretty
    ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        translateTime: 'HH:MM:ss',
      },
    })
    : undefined,
);

/** Child logger bound to a music-vendor job. */
export function songLogger(songId: string) {
  return logger.child({ songId });
}
