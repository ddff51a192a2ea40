/**
 * One rendered candidate for a generation job. The vendor has used more than
 * one field name for the audio location, so all of them are optional.
 */
export interface SongChoice {
  index?: number;
  id?: string;
  title?: string;
  url?: string;
  audio_url?: string;
  mp3_url?: string;
  flac_url?: string;
  duration?: number;
  [key: string]: unknown;
}

export interface SongStatus {
  id?: string;
  status?: string;
  failed_reason?: string;
  choices?: SongChoice[];
  [key: string]: unknown;
}

export interface GenerationJob {
  lyrics: string;
  prompt: string;
  durationSeconds: number;
  genre: string;
}
