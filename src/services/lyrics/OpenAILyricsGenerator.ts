import OpenAI from 'openai';

import { ConfigurationError, OpenAIConfig } from '../../config/appConfig';
import { UpstreamError } from '../../models/SongError';
import { logger } from '../../utils/logger';
import { buildAdultLyricsPrompt, buildKidLyricsPrompt } from './prompts';
import type { AdultLyricsRequest, KidLyricsRequest, LyricsPrompt, LyricsWriter } from './types';

export class OpenAILyricsGenerator implements LyricsWriter {
  private client: OpenAI | null = null;

  constructor(private readonly config: OpenAIConfig) { }

  async writeKidLyrics(request: KidLyricsRequest): Promise<string> {
    return this.complete(buildKidLyricsPrompt(request), 'kid');
  }

  async writeAdultLyrics(request: AdultLyricsRequest): Promise<string> {
    return this.complete(buildAdultLyricsPrompt(request), 'adult');
  }

  private async complete(prompt: LyricsPrompt, kind: 'kid' | 'adult'): Promise<string> {
    const client = this.getClient();

    let content: string | null | undefined;
    try {
      const completion = await client.chat.completions.create({
        model: this.config.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        temperature: prompt.temperature,
        max_tokens: prompt.maxTokens,
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      logger.error({ error, kind }, 'Lyrics generation request failed');
      throw new UpstreamError('openai', 'Lyrics generation failed', error);
    }

    const lyrics = content?.trim();
    if (!lyrics) {
      throw new UpstreamError('openai', 'Lyrics generation returned no text');
    }
    logger.debug({ kind, length: lyrics.length }, 'Generated lyrics');
    return lyrics;
  }

  private getClient(): OpenAI {
    if (this.client) {
      return this.client;
    }
    if (!this.config.apiKey) {
      throw new ConfigurationError('Lyrics generation is not configured. Set OPENAI_API_KEY');
    }
    this.client = new OpenAI({
      apiKey: this.config.apiKey,
      timeout: this.config.timeoutMs,
      maxRetries: 0,
    });
    return this.client;
  }
}
