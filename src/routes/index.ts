import type { Express } from 'express';

import { SiteConfig } from '../config/appConfig';
import { MailingListClient } from '../services/marketing/MailingListClient';
import { PaymentService } from '../services/payments/PaymentService';
import { ShareManager } from '../services/ShareManager';
import { SongService } from '../services/SongService';
import { createCheckoutRoutes } from './checkoutRoutes';
import { createShareRoutes } from './shareRoutes';
import { createSongRoutes } from './songRoutes';
import { createSubscribeRoutes } from './subscribeRoutes';

export interface HttpRouteServices {
  site: SiteConfig;
  songService: SongService;
  paymentService: PaymentService;
  shareManager: ShareManager;
  mailingList: MailingListClient;
}

/** JSON routes; the Stripe webhook is registered separately ahead of the body parser. */
export function registerHttpRoutes(app: Express, services: HttpRouteServices): void {
  app.use(createSongRoutes(services.songService));
  app.use(createCheckoutRoutes(services.paymentService));
  app.use(createShareRoutes(services.shareManager, services.songService, services.site));
  app.use(createSubscribeRoutes(services.mailingList));
}
