import type Stripe from 'stripe';

import { SiteConfig } from '../config/appConfig';
import { shareSubtitleFor } from '../models/ShareRecord';
import { logger, songLogger } from '../utils/logger';
import { downloadUrl, shareLinkUrl } from '../utils/links';
import { EmailSender } from './email/EmailSender';
import { MailingListClient } from './marketing/MailingListClient';
import { ShareManager } from './ShareManager';
import { SongService } from './SongService';

export type FulfillmentStatus = 'ignored' | 'no_email' | 'no_song' | 'fulfilled' | 'error';

export interface FulfillmentResult {
  status: FulfillmentStatus;
  songId?: string;
  shareToken?: string | null;
  emailSent?: boolean;
  klaviyoAdded?: boolean;
}

/** The parts of a completed Checkout session that fulfillment reads. */
export interface CompletedCheckout {
  id: string;
  customer_details?: { email?: string | null } | null;
  metadata?: Record<string, string> | null;
  client_reference_id?: string | null;
}

const PURCHASE_SOURCE = 'purchase';
const FALLBACK_RECIPIENT = 'someone special';
const FALLBACK_SUBJECT = 'music';

/**
 * Side effects of a paid checkout. Each step logs its own failure and the
 * remaining steps still run; nothing here rejects, so the webhook can always
 * acknowledge the event.
 */
export class FulfillmentService {
  constructor(
    private readonly songService: SongService,
    private readonly shareManager: ShareManager,
    private readonly emailSender: EmailSender,
    private readonly mailingList: MailingListClient,
    private readonly site: SiteConfig,
  ) { }

  async handleEvent(event: Stripe.Event): Promise<FulfillmentResult> {
    if (event.type !== 'checkout.session.completed') {
      logger.debug({ eventId: event.id, type: event.type }, 'Ignoring webhook event');
      return { status: 'ignored' };
    }
    return this.fulfillCheckout(event.data.object);
  }

  async fulfillCheckout(session: CompletedCheckout): Promise<FulfillmentResult> {
    const email = session.customer_details?.email;
    if (!email) {
      logger.warn({ sessionId: session.id }, 'Completed checkout has no customer email');
      return { status: 'no_email' };
    }

    const metadata = session.metadata ?? {};
    const songId = metadata.song_id || session.client_reference_id;
    if (!songId) {
      logger.warn({ sessionId: session.id }, 'Completed checkout has no song reference');
      return { status: 'no_song' };
    }

    const log = songLogger(songId);
    const recipientName = metadata.recipient_name || undefined;
    const subject = metadata.subject || undefined;

    let audioUrl: string | null = null;
    try {
      audioUrl = await this.songService.findAudioUrl(songId);
    } catch (error) {
      log.error({ error }, 'Failed to look up purchased song audio');
    }

    let shareToken: string | null = null;
    if (audioUrl) {
      try {
        shareToken = await this.shareManager.create({
          songId,
          audioUrl,
          recipientName,
          subject,
          subtitle: shareSubtitleFor(recipientName, subject),
        });
      } catch (error) {
        log.error({ error }, 'Failed to create share record for purchased song');
      }
    } else {
      log.warn('Purchased song has no audio yet, skipping share record');
    }

    const download = downloadUrl(this.site, songId);
    let emailSent = false;
    try {
      await this.emailSender.sendSongEmail({
        to: email,
        recipientName: recipientName ?? FALLBACK_RECIPIENT,
        subject: subject ?? FALLBACK_SUBJECT,
        downloadUrl: download,
        shareUrl: shareToken ? shareLinkUrl(this.site, shareToken) : download,
      });
      emailSent = true;
    } catch (error) {
      log.error({ error }, 'Failed to send song email');
    }

    let klaviyoAdded = false;
    try {
      klaviyoAdded = await this.mailingList.subscribe(email, PURCHASE_SOURCE);
    } catch (error) {
      log.error({ error }, 'Failed to add buyer to mailing list');
    }

    log.info({ shareToken, emailSent, klaviyoAdded }, 'Fulfilled checkout');
    return { status: 'fulfilled', songId, shareToken, emailSent, klaviyoAdded };
  }
}
