import express, { Request, Response, Router } from 'express';
import type Stripe from 'stripe';

import { FulfillmentResult, FulfillmentService } from '../services/FulfillmentService';
import { PaymentService } from '../services/payments/PaymentService';
import { logger } from '../utils/logger';
import { handleSongError } from './types';

/**
 * Stripe posts checkout events here. Signature checks need the exact bytes
 * Stripe sent, so this router parses its own raw body and must be mounted
 * before `express.json()`.
 */
export function createWebhookRoutes(paymentService: PaymentService, fulfillmentService: FulfillmentService): Router {
  const router = Router();

  router.post('/stripe-webhook', express.raw({ type: '*/*' }), async (req: Request, res: Response) => {
    const rawBody: unknown = req.body;
    const payload = Buffer.isBuffer(rawBody) ? rawBody : Buffer.alloc(0);

    let event: Stripe.Event;
    try {
      event = paymentService.constructEvent(payload, req.header('stripe-signature'));
    } catch (error) {
      logger.warn({ error }, 'Rejected Stripe webhook');
      handleSongError(res, error);
      return;
    }

    let result: FulfillmentResult;
    try {
      result = await fulfillmentService.handleEvent(event);
    } catch (error) {
      logger.error({ error, eventId: event.id }, 'Webhook fulfillment failed');
      result = { status: 'error' };
    }

    res.status(200).json({
      received: true,
      status: result.status,
      song_id: result.songId ?? null,
      share_token: result.shareToken ?? null,
      email_sent: result.emailSent ?? false,
      klaviyo_added: result.klaviyoAdded ?? false,
    });
  });

  return router;
}
