/**
 * Registry V2 media types and response payloads
 */

export const MEDIA_TYPES = {
  dockerManifest: 'application/vnd.docker.distribution.manifest.v2+json',
  ociManifest: 'application/vnd.oci.image.manifest.v1+json',
  dockerManifestList: 'application/vnd.docker.distribution.manifest.list.v2+json',
  ociIndex: 'application/vnd.oci.image.index.v1+json',
} as const;

export const MANIFEST_ACCEPT_HEADER = [
  MEDIA_TYPES.dockerManifest,
  MEDIA_TYPES.ociManifest,
  MEDIA_TYPES.dockerManifestList,
  MEDIA_TYPES.ociIndex,
].join(', ');

export interface ManifestResult {
  manifest: Record<string, unknown>;
  mediaType: string;
}

export interface CatalogResponse {
  repositories?: unknown;
}

export interface TagListResponse {
  name?: string;
  tags?: unknown;
}
