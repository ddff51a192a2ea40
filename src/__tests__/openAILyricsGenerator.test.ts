import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: mocks.create } };
  },
}));

import { ConfigurationError, OpenAIConfig } from '../config/appConfig';
import { UpstreamError } from '../models/SongError';
import { OpenAILyricsGenerator } from '../services/lyrics/OpenAILyricsGenerator';

const CONFIG: OpenAIConfig = { apiKey: 'test-key', model: 'gpt-4.1-mini', timeoutMs: 1000 };

const KID_REQUEST = {
  childName: 'Maya',
  theme: 'dinosaurs',
  occasion: 'everyday',
  vibe: 'sunny_kids',
  voiceType: 'any',
};

describe('OpenAILyricsGenerator', () => {
  beforeEach(() => {
    mocks.create.mockReset();
  });

  it('returns the trimmed completion text', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: '\n Verse 1:\nRoar Maya \n' } }] });

    await expect(new OpenAILyricsGenerator(CONFIG).writeKidLyrics(KID_REQUEST)).resolves.toBe('Verse 1:\nRoar Maya');

    const [params] = mocks.create.mock.calls[0];
    expect(params).toMatchObject({ model: 'gpt-4.1-mini', temperature: 0.9, max_tokens: 400 });
    expect(params.messages[0].role).toBe('system');
    expect(params.messages[1].content).toContain('a child named Maya');
  });

  it('uses the adult prompt settings', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: 'Chorus:\nSam!' } }] });

    await new OpenAILyricsGenerator(CONFIG).writeAdultLyrics({
      recipientName: 'Sam',
      relationship: 'friend',
      occasion: 'birthday',
      storyOrDetails: 'Plays the banjo.',
      genre: 'folk',
      vibe: 'fun',
      voiceType: 'male',
    });

    expect(mocks.create.mock.calls[0][0]).toMatchObject({ temperature: 0.95, max_tokens: 600 });
  });

  it('raises UpstreamError for empty output', async () => {
    mocks.create.mockResolvedValue({ choices: [{ message: { content: '   ' } }] });

    await expect(new OpenAILyricsGenerator(CONFIG).writeKidLyrics(KID_REQUEST)).rejects.toBeInstanceOf(UpstreamError);
  });

  it('raises UpstreamError when the API call fails', async () => {
    mocks.create.mockRejectedValue(new Error('503 Service Unavailable'));

    await expect(new OpenAILyricsGenerator(CONFIG).writeKidLyrics(KID_REQUEST)).rejects.toThrow(
      'Upstream error from openai: Lyrics generation failed',
    );
  });

  it('raises ConfigurationError when no API key is set', async () => {
    await expect(new OpenAILyricsGenerator({ ...CONFIG, apiKey: '' }).writeKidLyrics(KID_REQUEST)).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    expect(mocks.create).not.toHaveBeenCalled();
  });
});
