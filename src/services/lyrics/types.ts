export interface KidLyricsRequest {
  childName: string;
  theme: string;
  occasion: string;
  vibe: string;
  voiceType: string;
}

export interface AdultLyricsRequest {
  recipientName: string;
  relationship: string;
  occasion: string;
  storyOrDetails: string;
  genre: string;
  vibe: string;
  voiceType: string;
}

export interface LyricsWriter {
  writeKidLyrics(request: KidLyricsRequest): Promise<string>;
  writeAdultLyrics(request: AdultLyricsRequest): Promise<string>;
}

export interface LyricsPrompt {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
}
