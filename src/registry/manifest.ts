/**
 * Manifest inspection helpers: media type classification, size estimate,
 * config digest and catalog pagination cursor
 */

import { MEDIA_TYPES } from './types';

function normalizeMediaType(mediaType: string): string {
  return mediaType.split(';')[0].trim().toLowerCase();
}

export function isImageManifest(mediaType: string): boolean {
  const normalized = normalizeMediaType(mediaType);
  return normalized === MEDIA_TYPES.dockerManifest || normalized === MEDIA_TYPES.ociManifest;
}

export function isManifestIndex(mediaType: string): boolean {
  const normalized = normalizeMediaType(mediaType);
  return normalized === MEDIA_TYPES.dockerManifestList || normalized === MEDIA_TYPES.ociIndex;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sizeOf(descriptor: unknown): number {
  if (!isRecord(descriptor)) return 0;
  return typeof descriptor.size === 'number' && Number.isInteger(descriptor.size) ? descriptor.size : 0;
}

/**
 * Config + layers for an image manifest, sum of child manifests for an index,
 * undefined for anything else
 */
export function estimateManifestSize(
  manifest: Record<string, unknown>,
  mediaType: string
): number | undefined {
  if (isImageManifest(mediaType)) {
    const layers = Array.isArray(manifest.layers) ? manifest.layers : [];
    return layers.reduce((total: number, layer: unknown) => total + sizeOf(layer), sizeOf(manifest.config));
  }

  if (isManifestIndex(mediaType)) {
    if (!Array.isArray(manifest.manifests)) return undefined;
    return manifest.manifests.reduce((total: number, item: unknown) => total + sizeOf(item), 0);
  }

  return undefined;
}

export function configDigestOf(manifest: Record<string, unknown>, mediaType: string): string | undefined {
  if (!isImageManifest(mediaType)) return undefined;
  const config = manifest.config;
  if (!isRecord(config)) return undefined;
  return typeof config.digest === 'string' && config.digest ? config.digest : undefined;
}

/**
 * Normalize the config blob "created" field to ISO-8601 UTC.
 * Unparsable values are returned as-is.
 */
export function normalizeCreatedAt(created: unknown): string | undefined {
  if (typeof created !== 'string' || !created) return undefined;
  // Go timestamps carry nanoseconds; Date only takes milliseconds
  const parsed = new Date(created.replace(/(\.\d{3})\d+/, '$1'));
  if (Number.isNaN(parsed.getTime())) return created;
  return parsed.toISOString();
}

/**
 * Extract the `last` cursor from a `Link: </v2/_catalog?last=x&n=y>; rel="next"` header
 */
export function parseNextCursor(linkHeader?: string): string | undefined {
  if (!linkHeader) return undefined;

  for (const rawPart of linkHeader.split(',')) {
    const part = rawPart.trim();
    if (!part.includes('rel="next"')) continue;
    const end = part.indexOf('>');
    if (!part.startsWith('<') || end === -1) continue;

    const url = new URL(part.slice(1, end), 'http://registry.invalid');
    const last = url.searchParams.get('last');
    if (last) return last;
  }

  return undefined;
}
