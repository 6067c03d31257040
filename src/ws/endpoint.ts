import type { PageLocation } from '../types/connection.js';
import { ConfigError } from '../errors.js';

export const DEFAULT_CHANNEL_PATH = '/ws/main';

/**
 * Build the channel URL for the page the client runs on.
 * A page served over https gets a secure socket; everything else gets ws:.
 */
export function resolveEndpoint(location: PageLocation, path = DEFAULT_CHANNEL_PATH): string {
  const scheme = location.protocol === 'https:' ? 'wss:' : 'ws:';
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return `${scheme}//${location.host}${normalizedPath}`;
}

/** Parse an origin such as `https://learn.example.com` into a PageLocation. */
export function parsePageLocation(origin: string): PageLocation {
  let url: URL;
  try {
    url = new URL(origin);
  } catch {
    throw new ConfigError('origin', `not a valid URL: ${origin}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError('origin', `expected http: or https:, got ${url.protocol}`);
  }
  return { protocol: url.protocol, host: url.host };
}
