import fs from 'node:fs/promises';
import path from 'node:path';

import escapeHtml from 'escape-html';

import { ConfigurationError, EmailConfig } from '../../config/appConfig';
import { UpstreamError } from '../../models/SongError';
import { logger } from '../../utils/logger';
import { EmailSender, SongEmail } from './EmailSender';

const RESEND_EMAILS_URL = 'https://api.resend.com/emails';

export interface RenderedEmail {
  subjectLine: string;
  html: string;
  text: string;
}

type FetchLike = typeof fetch;

export function renderSongEmail(template: string, email: SongEmail): RenderedEmail {
  const values: Record<string, string> = {
    recipient_name: email.recipientName,
    subject: email.subject,
    download_url: email.downloadUrl,
    share_url: email.shareUrl,
  };
  const html = template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) =>
    Object.hasOwn(values, key) ? escapeHtml(values[key]) : placeholder,
  );

  const text = [
    'Your Shoutout Song is Ready!',
    '',
    `A song about ${email.recipientName} and their love for ${email.subject}`,
    '',
    `Download: ${email.downloadUrl}`,
    `Share: ${email.shareUrl}`,
    '',
    'Make another: https://shoutoutsong.com',
  ].join('\n');

  return {
    subjectLine: `Your song about ${email.recipientName} is ready!`,
    html,
    text,
  };
}

export class ResendEmailService implements EmailSender {
  private template: string | null = null;

  constructor(
    private readonly config: EmailConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) { }

  async sendSongEmail(email: SongEmail): Promise<void> {
    if (!this.config.resendApiKey) {
      throw new ConfigurationError('Email delivery is not configured. Set RESEND_API_KEY');
    }

    const rendered = renderSongEmail(await this.loadTemplate(), email);

    let response: Response;
    try {
      response = await this.fetchImpl(RESEND_EMAILS_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.resendApiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          from: this.config.fromAddress,
          to: [email.to],
          subject: rendered.subjectLine,
          html: rendered.html,
          text: rendered.text,
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new UpstreamError('resend', 'Email service is unreachable', error);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      logger.warn({ status: response.status, detail }, 'Resend rejected song email');
      throw new UpstreamError('resend', `Email request failed with status ${response.status}`);
    }

    logger.info({ to: email.to }, 'Sent song email');
  }

  private async loadTemplate(): Promise<string> {
    if (this.template === null) {
      const templatePath = path.resolve(process.cwd(), this.config.templatePath);
      this.template = await fs.readFile(templatePath, 'utf-8');
    }
    return this.template;
  }
}
