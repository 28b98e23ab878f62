/**
 * Layout Address Decoding
 *
 * Configuration pages are addressed as
 *   https://<host>/<geometry>/<anything>/<layout-id>/<revision-id>/...
 * The decoder only extracts those positional tokens; it does not check that
 * the ids look like hashes.
 */

import { InvalidAddressError, toError } from '../errors';

export interface LayoutAddress {
  geometry: string;
  layoutId: string;
  revisionId: string;
}

const MIN_SEGMENTS = 4;

function parseUrl(address: string): URL {
  try {
    return new URL(address.trim());
  } catch (error) {
    throw new InvalidAddressError(`Failed to parse layout address as a URL: ${address}`, address, toError(error));
  }
}

function decodePath(pathname: string, address: string): string {
  try {
    return decodeURIComponent(pathname);
  } catch (error) {
    throw new InvalidAddressError(`Invalid escape sequence in layout address: ${address}`, address, toError(error));
  }
}

/**
 * Split a URL path into segments after dropping every leading slash
 */
export function splitAddressPath(pathname: string): string[] {
  return pathname.replace(/^\/+/, '').split('/');
}

/**
 * Decode a configuration page address into geometry, layout and revision ids
 */
export function decodeLayoutAddress(address: string): LayoutAddress {
  const url = parseUrl(address);
  // Decoded before splitting, so an escaped slash (%2F) separates segments
  const segments = splitAddressPath(decodePath(url.pathname, address));

  const nonEmpty = segments.filter((segment) => segment.length > 0).length;
  const [geometry, , layoutId, revisionId] = segments;

  if (nonEmpty < MIN_SEGMENTS || !geometry || !layoutId || !revisionId) {
    throw new InvalidAddressError(`Invalid configuration page address: ${address}`, address);
  }

  return { geometry, layoutId, revisionId };
}
