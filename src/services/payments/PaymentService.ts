import Stripe from 'stripe';

import { ConfigurationError, SiteConfig, StripeConfig } from '../../config/appConfig';
import { UpstreamError, WebhookSignatureError } from '../../models/SongError';
import { logger } from '../../utils/logger';

export interface CheckoutInput {
  songId: string;
  recipientName?: string;
  subject?: string;
}

export class PaymentService {
  private client: Stripe | null = null;

  constructor(private readonly config: StripeConfig, private readonly site: SiteConfig) { }

  /** Creates a one-item Checkout session tied to the song and returns its URL. */
  async createCheckoutSession(input: CheckoutInput): Promise<string> {
    if (!this.config.secretKey || !this.config.priceId) {
      throw new ConfigurationError('Payments are not configured. Set STRIPE_SECRET_KEY and STRIPE_PRICE_ID');
    }

    const metadata: Record<string, string> = { song_id: input.songId };
    if (input.recipientName) {
      metadata.recipient_name = input.recipientName;
    }
    if (input.subject) {
      metadata.subject = input.subject;
    }

    const songParam = encodeURIComponent(input.songId);
    let session: Stripe.Checkout.Session;
    try {
      session = await this.getClient().checkout.sessions.create({
        mode: 'payment',
        line_items: [{ price: this.config.priceId, quantity: 1 }],
        client_reference_id: input.songId,
        metadata,
        success_url: `${this.site.siteUrl}/success?song_id=${songParam}&session_id={CHECKOUT_SESSION_ID}`,
        cancel_url: `${this.site.siteUrl}/cancel?song_id=${songParam}`,
      });
    } catch (error) {
      logger.error({ error, songId: input.songId }, 'Stripe checkout session creation failed');
      throw new UpstreamError('stripe', 'Unable to start checkout', error);
    }

    if (!session.url) {
      throw new UpstreamError('stripe', 'Checkout session was created without a URL');
    }
    logger.info({ songId: input.songId, sessionId: session.id }, 'Created checkout session');
    return session.url;
  }

  /** Verifies the `Stripe-Signature` header against the raw body and parses the event. */
  constructEvent(rawBody: Buffer | string, signature: string | undefined): Stripe.Event {
    if (!this.config.webhookSecret) {
      throw new ConfigurationError('Stripe webhooks are not configured. Set STRIPE_WEBHOOK_SECRET');
    }
    if (!signature) {
      throw new WebhookSignatureError('missing Stripe-Signature header');
    }
    try {
      return this.getClient().webhooks.constructEvent(rawBody, signature, this.config.webhookSecret);
    } catch (error) {
      throw new WebhookSignatureError(error instanceof Error ? error.message : 'invalid payload', error);
    }
  }

  private getClient(): Stripe {
    if (!this.client) {
      this.client = new Stripe(this.config.secretKey, {
        timeout: this.config.timeoutMs,
        maxNetworkRetries: 0,
      });
    }
    return this.client;
  }
}
