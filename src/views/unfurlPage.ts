import escapeHtml from 'escape-html';

import { ShareRecord } from '../models/ShareRecord';

export const PLACEHOLDER_TITLE = 'Listen to this Shoutout Song';
export const PLACEHOLDER_DESCRIPTION = 'A personalised song made with Shoutout Song.';

export interface UnfurlPageOptions {
  /** Canonical URL of the unfurl page itself. */
  pageUrl: string;
  /** Where human visitors end up. */
  redirectUrl: string;
  imageUrl: string;
}

function describeRecord(record: ShareRecord): string {
  if (record.recipientName && record.subject) {
    return `A song for ${record.recipientName} about ${record.subject}`;
  }
  return record.subtitle || PLACEHOLDER_DESCRIPTION;
}

/**
 * Minimal page for link-preview crawlers: Open Graph and Twitter card tags
 * from the share record (placeholders when there is none), then an immediate
 * redirect to the player.
 */
export function renderUnfurlPage(record: ShareRecord | null, options: UnfurlPageOptions): string {
  const title = escapeHtml(record?.title || PLACEHOLDER_TITLE);
  const description = escapeHtml(record ? describeRecord(record) : PLACEHOLDER_DESCRIPTION);
  const pageUrl = escapeHtml(options.pageUrl);
  const redirectUrl = escapeHtml(options.redirectUrl);
  const imageUrl = escapeHtml(options.imageUrl);

  const meta = [
    `<meta property="og:type" content="music.song" />`,
    `<meta property="og:site_name" content="Shoutout Song" />`,
    `<meta property="og:title" content="${title}" />`,
    `<meta property="og:description" content="${description}" />`,
    `<meta property="og:url" content="${pageUrl}" />`,
    `<meta property="og:image" content="${imageUrl}" />`,
    ...(record ? [`<meta property="og:audio" content="${escapeHtml(record.audioUrl)}" />`] : []),
    `<meta name="twitter:card" content="summary_large_image" />`,
    `<meta name="twitter:title" content="${title}" />`,
    `<meta name="twitter:description" content="${description}" />`,
    `<meta name="twitter:image" content="${imageUrl}" />`,
  ];

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8" />',
    `<title>${title}</title>`,
    `<meta name="description" content="${description}" />`,
    ...meta,
    `<meta http-equiv="refresh" content="0;url=${redirectUrl}" />`,
    `<script>window.location.replace(${JSON.stringify(options.redirectUrl).replace(/</g, '\\u003c')});</script>`,
    '</head>',
    '<body>',
    `<p>Redirecting to <a href="${redirectUrl}">${title}</a>&hellip;</p>`,
    '</body>',
    '</html>',
  ].join('\n');
}
