import { Request, Response, Router } from 'express';

import { parseBody, subscribeRequestSchema } from '../models/SongRequest';
import { MailingListClient } from '../services/marketing/MailingListClient';
import { logger } from '../utils/logger';
import { handleSongError } from './types';

export function createSubscribeRoutes(mailingList: MailingListClient): Router {
  const router = Router();

  router.post('/subscribe', async (req: Request, res: Response) => {
    try {
      const body = parseBody(subscribeRequestSchema, req.body);
      const added = await mailingList.subscribe(body.email, body.source).catch((error: unknown) => {
        logger.warn({ error }, 'Mailing list signup failed');
        return false;
      });
      res.json({ success: true, klaviyo_added: added });
    } catch (error) {
      handleSongError(res, error);
    }
  });

  return router;
}
