import { describe, expect, it, vi } from 'vitest';

import { KlaviyoConfig } from '../config/appConfig';
import { buildSubscriptionPayload, KlaviyoService } from '../services/marketing/KlaviyoService';
import { jsonResponse } from './helpers';

const CONFIG: KlaviyoConfig = {
  apiKey: 'test-key',
  listId: 'LIST1',
  revision: '2024-10-15',
  timeoutMs: 1000,
};

describe('KlaviyoService', () => {
  it('subscribes the email to the configured list', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 202 }));
    const service = new KlaviyoService(CONFIG, fetchImpl);

    await expect(service.subscribe('fan@example.com', 'footer')).resolves.toBe(true);

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://a.klaviyo.com/api/profile-subscription-bulk-create-jobs');
    const headers = new Headers(init?.headers);
    expect(headers.get('Authorization')).toBe('Klaviyo-API-Key test-key');
    expect(headers.get('revision')).toBe('2024-10-15');
    expect(JSON.parse(String(init?.body))).toEqual(buildSubscriptionPayload('fan@example.com', 'LIST1', 'footer'));
  });

  it('defaults the source to website', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(new Response(null, { status: 202 }));
    await new KlaviyoService(CONFIG, fetchImpl).subscribe('fan@example.com');

    const body: unknown = JSON.parse(String(fetchImpl.mock.calls[0][1]?.body));
    expect(body).toEqual(buildSubscriptionPayload('fan@example.com', 'LIST1', 'website'));
  });

  it('reports false without calling out when unconfigured', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    await expect(new KlaviyoService({ ...CONFIG, listId: '' }, fetchImpl).subscribe('fan@example.com')).resolves.toBe(false);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('reports false when the vendor rejects or is unreachable', async () => {
    const rejecting = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ errors: [] }, 400));
    await expect(new KlaviyoService(CONFIG, rejecting).subscribe('fan@example.com')).resolves.toBe(false);

    const failing = vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));
    await expect(new KlaviyoService(CONFIG, failing).subscribe('fan@example.com')).resolves.toBe(false);
  });
});
