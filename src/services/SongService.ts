import { AdultSongRequest, KidSongRequest } from '../models/SongRequest';
import { NotReadyError } from '../models/SongError';
import { SongStatus } from '../models/SongStatus';
import { songLogger } from '../utils/logger';
import { LyricsWriter } from './lyrics/types';
import { buildAdultStylePrompt, buildKidStylePrompt } from './lyrics/prompts';
import { deriveDownloadFilename, extractAudioUrl } from './music/audio';
import { SongGenerationClient } from './music/SongGenerationClient';

export type SongKind = 'kid' | 'adult';

export interface GeneratedSong {
  kind: SongKind;
  taskId: string;
  lyrics: string;
}

export interface SongAudio {
  audioUrl: string;
  filename: string;
}

const KID_SONG_GENRE = 'pop';

export class SongService {
  constructor(
    private readonly lyricsWriter: LyricsWriter,
    private readonly musicClient: SongGenerationClient,
  ) { }

  async generateKidSong(request: KidSongRequest): Promise<GeneratedSong> {
    const details = {
      childName: request.child_name,
      theme: request.theme,
      occasion: request.occasion,
      vibe: request.vibe,
      voiceType: request.voice_type,
    };
    const lyrics = await this.lyricsWriter.writeKidLyrics(details);
    const taskId = await this.musicClient.startGeneration({
      lyrics,
      prompt: buildKidStylePrompt(details),
      durationSeconds: request.duration_seconds,
      genre: KID_SONG_GENRE,
    });
    return { kind: 'kid', taskId, lyrics };
  }

  async generateAdultSong(request: AdultSongRequest): Promise<GeneratedSong> {
    const details = {
      recipientName: request.recipient_name,
      relationship: request.relationship,
      occasion: request.occasion,
      storyOrDetails: request.story_or_details,
      genre: request.genre,
      vibe: request.vibe,
      voiceType: request.voice_type,
    };
    const lyrics = await this.lyricsWriter.writeAdultLyrics(details);
    const taskId = await this.musicClient.startGeneration({
      lyrics,
      prompt: buildAdultStylePrompt(details),
      durationSeconds: request.duration_seconds,
      genre: request.genre,
    });
    return { kind: 'adult', taskId, lyrics };
  }

  async getStatus(taskId: string): Promise<SongStatus> {
    return this.musicClient.queryStatus(taskId);
  }

  /** Audio URL of a finished job, or null while nothing is playable yet. */
  async findAudioUrl(songId: string): Promise<string | null> {
    const status = await this.musicClient.queryStatus(songId);
    const audioUrl = extractAudioUrl(status);
    if (!audioUrl) {
      songLogger(songId).debug({ status: status.status }, 'Song has no playable audio yet');
    }
    return audioUrl;
  }

  async getDownload(taskId: string): Promise<SongAudio> {
    const status = await this.musicClient.queryStatus(taskId);
    const audioUrl = extractAudioUrl(status);
    if (!audioUrl) {
      throw new NotReadyError('Audio not ready');
    }
    return { audioUrl, filename: deriveDownloadFilename(taskId, status) };
  }
}
