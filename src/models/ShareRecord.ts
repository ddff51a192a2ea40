import { z } from 'zod';

export const DEFAULT_SHARE_TITLE = 'Your Shoutout Song';
export const DEFAULT_SHARE_SUBTITLE = 'A custom song made just for you';

export const shareRecordSchema = z.object({
  token: z.string().min(1),
  songId: z.string().min(1),
  audioUrl: z.string().min(1),
  title: z.string(),
  subtitle: z.string(),
  recipientName: z.string().optional(),
  subject: z.string().optional(),
  lyrics: z.string().optional(),
  createdAt: z.number(),
});

export type ShareRecord = z.infer<typeof shareRecordSchema>;

export interface CreateShareInput {
  songId: string;
  audioUrl: string;
  title?: string;
  subtitle?: string;
  recipientName?: string;
  subject?: string;
  lyrics?: string;
}

/** Wire shape returned by `GET /share/:token`. */
export interface ShareRecordResponse {
  token: string;
  song_id: string;
  audio_url: string;
  title: string;
  subtitle: string;
  recipient_name: string | null;
  subject: string | null;
  lyrics: string | null;
  created_at: number;
}

export function toShareResponse(record: ShareRecord): ShareRecordResponse {
  return {
    token: record.token,
    song_id: record.songId,
    audio_url: record.audioUrl,
    title: record.title,
    subtitle: record.subtitle,
    recipient_name: record.recipientName ?? null,
    subject: record.subject ?? null,
    lyrics: record.lyrics ?? null,
    created_at: record.createdAt,
  };
}

/** Subtitle for a share built from whatever recipient details are known. */
export function shareSubtitleFor(recipientName?: string, subject?: string): string | undefined {
  if (recipientName && subject) {
    return `A song for ${recipientName} about ${subject}`;
  }
  if (recipientName) {
    return `A song for ${recipientName}`;
  }
  return undefined;
}
