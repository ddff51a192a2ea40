import { SongChoice, SongStatus } from '../../models/SongStatus';

const URL_FIELDS = ['url', 'audio_url', 'mp3_url'] as const;

export function firstChoice(status: SongStatus): SongChoice | null {
  const choices = Array.isArray(status.choices) ? status.choices : [];
  return choices[0] ?? null;
}

/** Playable URL of the first choice, or null while the job has none. */
export function extractAudioUrl(status: SongStatus): string | null {
  const choice = firstChoice(status);
  if (!choice) {
    return null;
  }
  for (const field of URL_FIELDS) {
    const value = choice[field];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return null;
}

/**
 * File name offered for downloads: the vendor's title when it sent one,
 * otherwise `shoutout-song-<taskId>`.
 */
export function deriveDownloadFilename(taskId: string, status: SongStatus): string {
  const title = firstChoice(status)?.title;
  const base = typeof title === 'string' && title.trim() ? title : `shoutout-song-${taskId}`;
  const cleaned = base
    .replace(/[^A-Za-z0-9 _-]/g, '')
    .trim()
    .replace(/\s+/g, '-');
  return `${cleaned || 'shoutout-song'}.mp3`;
}
