import { Request, Response, Router } from 'express';

import { checkoutRequestSchema, parseBody } from '../models/SongRequest';
import { PaymentService } from '../services/payments/PaymentService';
import { handleSongError } from './types';

export function createCheckoutRoutes(paymentService: PaymentService): Router {
  const router = Router();

  router.post('/create-checkout-session', async (req: Request, res: Response) => {
    try {
      const body = parseBody(checkoutRequestSchema, req.body);
      const checkoutUrl = await paymentService.createCheckoutSession({
        songId: body.song_id,
        recipientName: body.recipient_name,
        subject: body.subject,
      });
      res.json({ checkout_url: checkoutUrl });
    } catch (error) {
      handleSongError(res, error);
    }
  });

  return router;
}
