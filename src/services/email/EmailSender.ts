export interface SongEmail {
  to: string;
  recipientName: string;
  subject: string;
  downloadUrl: string;
  shareUrl: string;
}

export interface EmailSender {
  /** Resolves once the provider accepted the message; rejects otherwise. */
  sendSongEmail(email: SongEmail): Promise<void>;
}
