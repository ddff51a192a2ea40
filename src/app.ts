import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import { requestLogger } from './middleware/requestLogger';
import { HttpRouteServices, registerHttpRoutes } from './routes';
import { createError, handleSongError } from './routes/types';
import { createWebhookRoutes } from './routes/webhookRoutes';
import { FulfillmentService } from './services/FulfillmentService';

export interface AppServices extends HttpRouteServices {
  fulfillmentService: FulfillmentService;
}

export function createApp(services: AppServices): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(cors());
  app.use(requestLogger);

  app.get('/', (_req: Request, res: Response) => {
    res.json({ message: 'Shoutout Song backend is running' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use(createWebhookRoutes(services.paymentService, services.fulfillmentService));
  app.use(express.json());
  registerHttpRoutes(app, services);

  app.use((_req: Request, res: Response) => {
    res.status(404).json(createError('NOT_FOUND', 'Route not found'));
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isMalformedBody(error)) {
      res.status(400).json(createError('INVALID_REQUEST', 'Request body is not valid JSON'));
      return;
    }
    handleSongError(res, error);
  });

  return app;
}

function isMalformedBody(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}
