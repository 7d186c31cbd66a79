import type { MagnetLink } from './types';

const MAGNET_PREFIX = 'magnet:?';
const BTIH_PREFIX = 'urn:btih:';

/**
 * Parses a magnet URI into its named parameters.
 *
 * @example
 * parseMagnetLink('magnet:?xt=urn:btih:abc123&dn=Example')
 * // { hash: 'abc123', displayName: 'Example', trackers: [], ... }
 */
export function parseMagnetLink(uri: string): MagnetLink {
  if (!uri.startsWith(MAGNET_PREFIX)) {
    throw new Error('invalid magnet link format');
  }

  const params = new URLSearchParams(uri.slice(MAGNET_PREFIX.length));
  const topic = params.get('xt') ?? '';

  return {
    hash: topic.startsWith(BTIH_PREFIX) ? topic.slice(BTIH_PREFIX.length) : topic,
    displayName: params.get('dn') ?? '',
    trackers: params.getAll('tr'),
    exactLength: params.get('xl') ?? '',
    exactSource: params.get('xs') ?? '',
    keywords: params.get('kt') ?? '',
    acceptableSource: params.get('as') ?? '',
  };
}
