/**
 * src/modules/hub-auth/hub-urls.ts
 *
 * Browser-facing hub URLs. Prefixes come normalized from config ("/hub/").
 */

import type { HubAuthSettings } from '../../app/config';

type HubUrlSettings = Pick<HubAuthSettings, 'hubHost' | 'hubPrefix'>;

export function hubLoginUrl(settings: HubUrlSettings, next?: string): string {
  const url = `${settings.hubHost}${settings.hubPrefix}login`;
  return next ? `${url}?next=${encodeURIComponent(next)}` : url;
}

export function hubLogoutUrl(settings: HubUrlSettings): string {
  return `${settings.hubHost}${settings.hubPrefix}logout`;
}

/**
 * Only same-origin absolute paths are honoured as redirect targets.
 * "//evil.example" and "https://..." fall back to `fallback`.
 */
export function safeNextPath(next: unknown, fallback: string): string {
  if (typeof next !== 'string') return fallback;
  if (!next.startsWith('/') || next.startsWith('//') || next.startsWith('/\\')) return fallback;
  return next;
}
