import { ConfigurationError, MurekaConfig } from '../../config/appConfig';
import { UpstreamError } from '../../models/SongError';
import { GenerationJob, SongStatus } from '../../models/SongStatus';
import { logger } from '../../utils/logger';
import { SongGenerationClient } from './SongGenerationClient';

interface GenerateResponse {
  id?: string;
}

type FetchLike = typeof fetch;

export class MurekaClient implements SongGenerationClient {
  constructor(
    private readonly config: MurekaConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) { }

  async startGeneration(job: GenerationJob): Promise<string> {
    const payload = await this.request<GenerateResponse>('/song/generate', {
      method: 'POST',
      body: JSON.stringify({
        model: 'auto',
        lyrics: job.lyrics,
        prompt: job.prompt,
        duration: job.durationSeconds,
        genre: job.genre,
      }),
    });

    if (typeof payload.id !== 'string' || !payload.id) {
      throw new UpstreamError('mureka', 'Song generation response did not include a job id');
    }
    logger.info({ songId: payload.id, durationSeconds: job.durationSeconds, genre: job.genre }, 'Submitted song generation job');
    return payload.id;
  }

  async queryStatus(taskId: string): Promise<SongStatus> {
    return this.request<SongStatus>(`/song/query/${encodeURIComponent(taskId)}`, { method: 'GET' });
  }

  private async request<T>(pathname: string, init: RequestInit): Promise<T> {
    if (!this.config.apiKey) {
      throw new ConfigurationError('Music generation is not configured. Set MUREKA_API_KEY');
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.config.baseUrl}${pathname}`, {
        ...init,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      logger.error({ error, pathname }, 'Music vendor request failed');
      throw new UpstreamError('mureka', 'Music service is unreachable', error);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      logger.warn({ status: response.status, pathname, detail }, 'Music vendor returned non-2xx');
      throw new UpstreamError('mureka', `Request failed with status ${response.status}`);
    }

    try {
      return (await response.json()) as T;
    } catch (error) {
      throw new UpstreamError('mureka', 'Music service returned invalid JSON', error);
    }
  }
}
