import http from 'node:http';

import dotenv from 'dotenv';

import { createApp } from './app';
import { listMissingCredentials } from './config/appConfig';
import { ServiceContainer } from './container/ServiceContainer';
import { logger } from './utils/logger';

dotenv.config();

function bootstrap(): void {
  try {
    const container = ServiceContainer.initialize();
    const config = container.getConfig();

    const missing = listMissingCredentials(config);
    if (missing.length) {
      logger.warn({ missing }, 'Starting with missing credentials; requests that need them will fail');
    }
    logger.info(
      {
        shareStoragePath: config.shares.storagePath,
        shareTtlSeconds: config.shares.ttlSeconds,
        siteUrl: config.site.siteUrl,
        apiBaseUrl: config.site.apiBaseUrl,
      },
      'Configuration loaded successfully',
    );

    const app = createApp(container.getAppServices());
    const server = http.createServer(app);

    const port = Number(process.env.PORT ?? 8080);
    server.listen(port, '0.0.0.0', () => {
      logger.info(`Shoutout Song backend running on port ${port}`);
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

bootstrap();

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});

process.on('SIGTERM', () => {
  logger.info('Received SIGTERM, shutting down');
  process.exit(0);
});
