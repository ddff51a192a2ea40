import { describe, expect, it } from 'vitest';

import { deriveDownloadFilename, extractAudioUrl } from '../services/music/audio';

describe('extractAudioUrl', () => {
  it('returns null when the job has no choices yet', () => {
    expect(extractAudioUrl({ status: 'running' })).toBeNull();
    expect(extractAudioUrl({ status: 'running', choices: [] })).toBeNull();
  });

  it('returns null when the first choice has no URL field', () => {
    expect(extractAudioUrl({ choices: [{ id: 'c1', duration: 60 }] })).toBeNull();
    expect(extractAudioUrl({ choices: [{ url: '   ' }] })).toBeNull();
  });

  it('prefers url, then audio_url, then mp3_url on the first choice', () => {
    expect(extractAudioUrl({ choices: [{ url: 'https://a/1.mp3', audio_url: 'https://a/2.mp3' }] })).toBe('https://a/1.mp3');
    expect(extractAudioUrl({ choices: [{ audio_url: 'https://a/2.mp3', mp3_url: 'https://a/3.mp3' }] })).toBe('https://a/2.mp3');
    expect(extractAudioUrl({ choices: [{ mp3_url: 'https://a/3.mp3' }] })).toBe('https://a/3.mp3');
  });

  it('ignores later choices', () => {
    expect(extractAudioUrl({ choices: [{ id: 'first' }, { url: 'https://a/second.mp3' }] })).toBeNull();
  });
});

describe('deriveDownloadFilename', () => {
  it('uses the vendor title with unsafe characters removed', () => {
    expect(deriveDownloadFilename('task-1', { choices: [{ title: 'Maya & the Dinos!' }] })).toBe('Maya-the-Dinos.mp3');
  });

  it('falls back to the task id', () => {
    expect(deriveDownloadFilename('task-1', { choices: [{ url: 'https://a/1.mp3' }] })).toBe('shoutout-song-task-1.mp3');
  });

  it('never yields an empty name', () => {
    expect(deriveDownloadFilename('task-1', { choices: [{ title: '***' }] })).toBe('shoutout-song.mp3');
  });
});
