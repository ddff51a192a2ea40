import { KlaviyoConfig } from '../../config/appConfig';
import { logger } from '../../utils/logger';
import { MailingListClient } from './MailingListClient';

const KLAVIYO_SUBSCRIBE_URL = 'https://a.klaviyo.com/api/profile-subscription-bulk-create-jobs';
const DEFAULT_SOURCE = 'website';

type FetchLike = typeof fetch;

export function buildSubscriptionPayload(email: string, listId: string, source: string) {
  return {
    data: {
      type: 'profile-subscription-bulk-create-job',
      attributes: {
        custom_source: source,
        profiles: {
          data: [
            {
              type: 'profile',
              attributes: {
                email,
                subscriptions: {
                  email: { marketing: { consent: 'SUBSCRIBED' } },
                },
              },
            },
          ],
        },
      },
      relationships: {
        list: { data: { type: 'list', id: listId } },
      },
    },
  };
}

export class KlaviyoService implements MailingListClient {
  constructor(
    private readonly config: KlaviyoConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) { }

  async subscribe(email: string, source = DEFAULT_SOURCE): Promise<boolean> {
    if (!this.config.apiKey || !this.config.listId) {
      logger.warn('Klaviyo is not configured, skipping mailing list signup');
      return false;
    }

    try {
      const response = await this.fetchImpl(KLAVIYO_SUBSCRIBE_URL, {
        method: 'POST',
        headers: {
          Authorization: `Klaviyo-API-Key ${this.config.apiKey}`,
          accept: 'application/vnd.api+json',
          'content-type': 'application/vnd.api+json',
          revision: this.config.revision,
        },
        body: JSON.stringify(buildSubscriptionPayload(email, this.config.listId, source)),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        logger.warn({ status: response.status, source }, 'Klaviyo subscription request failed');
        return false;
      }

      logger.info({ source }, 'Added subscriber to mailing list');
      return true;
    } catch (error) {
      logger.warn({ error, source }, 'Klaviyo subscription request errored');
      return false;
    }
  }
}
