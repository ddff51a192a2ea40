import { describe, expect, it, vi } from 'vitest';

import { ConfigurationError, MurekaConfig } from '../config/appConfig';
import { UpstreamError } from '../models/SongError';
import { MurekaClient } from '../services/music/MurekaClient';
import { jsonResponse } from './helpers';

const CONFIG: MurekaConfig = {
  apiKey: 'test-key',
  baseUrl: 'https://mureka.test/v1',
  timeoutMs: 1000,
};

function setup(config: MurekaConfig = CONFIG) {
  const fetchImpl = vi.fn<typeof fetch>();
  return { fetchImpl, client: new MurekaClient(config, fetchImpl) };
}

describe('MurekaClient', () => {
  it('submits the generation job and returns its id', async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValue(jsonResponse({ id: 'task-42', status: 'preparing' }));

    const taskId = await client.startGeneration({
      lyrics: 'Verse 1:\nla la',
      prompt: 'Song for Maya.',
      durationSeconds: 60,
      genre: 'pop',
    });

    expect(taskId).toBe('task-42');
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://mureka.test/v1/song/generate');
    expect(init?.method).toBe('POST');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Bearer test-key');
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'auto',
      lyrics: 'Verse 1:\nla la',
      prompt: 'Song for Maya.',
      duration: 60,
      genre: 'pop',
    });
  });

  it('queries job status by id', async () => {
    const { fetchImpl, client } = setup();
    const payload = { id: 'task 42', status: 'succeeded', choices: [{ url: 'https://cdn.test/a.mp3' }] };
    fetchImpl.mockResolvedValue(jsonResponse(payload));

    await expect(client.queryStatus('task 42')).resolves.toEqual(payload);
    expect(fetchImpl.mock.calls[0][0]).toBe('https://mureka.test/v1/song/query/task%2042');
  });

  it('raises UpstreamError on a non-2xx answer', async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValue(new Response('quota exceeded', { status: 429 }));

    await expect(client.queryStatus('task-1')).rejects.toThrow('Upstream error from mureka: Request failed with status 429');
  });

  it('raises UpstreamError when the vendor is unreachable', async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockRejectedValue(new TypeError('fetch failed'));

    await expect(client.queryStatus('task-1')).rejects.toBeInstanceOf(UpstreamError);
  });

  it('raises UpstreamError when no job id comes back', async () => {
    const { fetchImpl, client } = setup();
    fetchImpl.mockResolvedValue(jsonResponse({ status: 'preparing' }));

    await expect(
      client.startGeneration({ lyrics: 'la', prompt: 'p', durationSeconds: 30, genre: 'pop' }),
    ).rejects.toBeInstanceOf(UpstreamError);
  });

  it('fails with ConfigurationError before calling out when the key is missing', async () => {
    const { fetchImpl, client } = setup({ ...CONFIG, apiKey: '' });

    await expect(client.queryStatus('task-1')).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
