import { SiteConfig } from '../config/appConfig';

export function shareLinkUrl(site: SiteConfig, token: string): string {
  return `${site.apiBaseUrl}/s/${encodeURIComponent(token)}`;
}

export function downloadUrl(site: SiteConfig, songId: string): string {
  return `${site.apiBaseUrl}/full-audio/${encodeURIComponent(songId)}`;
}

/** Human-facing player page the unfurl page sends visitors on to. */
export function viewerUrl(site: SiteConfig, token: string): string {
  return `${site.siteUrl}/listen/${encodeURIComponent(token)}`;
}
