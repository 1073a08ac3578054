/**
 * Registry Client - Docker Registry HTTP API V2 adapter
 *
 * Stateless apart from its configuration. Every registry failure is normalized
 * into NotFoundError, UnavailableError or RegistryError.
 */

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { NotFoundError, RegistryError, UnavailableError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import { RegistryHealth, RepositoryPage, TagDescriptor } from '../types';
import {
  configDigestOf,
  estimateManifestSize,
  isRecord,
  normalizeCreatedAt,
  parseNextCursor,
} from './manifest';
import { CatalogResponse, MANIFEST_ACCEPT_HEADER, MEDIA_TYPES, ManifestResult, TagListResponse } from './types';

const log = createLogger('registry');

export interface RegistryClientOptions {
  baseUrl: string;
  pushHost: string;
  timeoutMs?: number;
}

export interface ListRepositoriesOptions {
  /** Drop repositories without tags. Costs one tag listing per candidate. */
  nonEmptyOnly?: boolean;
}

export class RegistryClient {
  private http: AxiosInstance;
  readonly baseUrl: string;
  readonly pushHost: string;

  /**
   * Create a registry client. `http` lets callers supply their own axios instance.
   */
  constructor(options: RegistryClientOptions, http?: AxiosInstance) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pushHost = options.pushHost;
    this.http =
      http ||
      axios.create({
        baseURL: this.baseUrl,
        timeout: options.timeoutMs || 20000,
      });
  }

  // ==================== Catalog ====================

  /**
   * List one page of repositories. `cursor` is the `next` value of a previous page.
   */
  async listRepositories(
    pageSize: number,
    cursor?: string,
    options: ListRepositoriesOptions = {}
  ): Promise<RepositoryPage> {
    const params: Record<string, string | number> = { n: pageSize };
    if (cursor) {
      params.last = cursor;
    }

    const response = await this.request<CatalogResponse>('GET', '/v2/_catalog', { params });
    const payload: unknown = response.data;
    const repositories = isRecord(payload) ? (payload.repositories ?? []) : undefined;
    if (!Array.isArray(repositories)) {
      throw new RegistryError('Invalid catalog response from registry.', 502);
    }

    const names = repositories.filter((name): name is string => typeof name === 'string' && name.length > 0);
    const next = parseNextCursor(this.header(response, 'link'));

    if (!options.nonEmptyOnly) {
      return { repositories: names, next };
    }

    const nonEmpty: string[] = [];
    for (const repository of names) {
      try {
        const tags = await this.listTagNames(repository);
        if (tags.length > 0) {
          nonEmpty.push(repository);
        }
      } catch (error) {
        // Inaccessible repositories count as empty for this view
        log.debug({ repository, err: errorMessage(error) }, 'Tag probe failed');
      }
    }
    return { repositories: nonEmpty, next };
  }

  // ==================== Tags ====================

  /**
   * List tag names of a repository
   */
  async listTagNames(repository: string): Promise<string[]> {
    const response = await this.request<TagListResponse>('GET', `/v2/${repository}/tags/list`);
    const payload: unknown = response.data;
    const tags = isRecord(payload) ? payload.tags : undefined;
    if (!Array.isArray(tags)) {
      return [];
    }
    return tags.filter((tag): tag is string => typeof tag === 'string' && tag.length > 0);
  }

  /**
   * List tags with digest, size and build time. A tag whose inspection fails
   * is returned with only `tag` and `error`.
   */
  async listTags(repository: string): Promise<TagDescriptor[]> {
    const tags = await this.listTagNames(repository);
    const descriptors: TagDescriptor[] = [];

    for (const tag of tags) {
      try {
        descriptors.push(await this.getTagDetails(repository, tag));
      } catch (error) {
        log.warn({ repository, tag, err: errorMessage(error) }, 'Tag inspection failed');
        descriptors.push({ tag, error: errorMessage(error) });
      }
    }

    return descriptors;
  }

  async getTagDetails(repository: string, tag: string): Promise<TagDescriptor> {
    const digest = await this.resolveDigest(repository, tag);
    const { manifest, mediaType } = await this.getManifest(repository, digest);

    return {
      tag,
      digest,
      mediaType,
      sizeBytes: estimateManifestSize(manifest, mediaType),
      createdAt: await this.readCreatedAt(repository, manifest, mediaType),
    };
  }

  // ==================== Manifests ====================

  /**
   * Resolve a tag (or digest) to its manifest digest
   */
  async resolveDigest(repository: string, reference: string): Promise<string> {
    const path = `/v2/${repository}/manifests/${reference}`;
    const headers = { Accept: MANIFEST_ACCEPT_HEADER };

    const head = await this.request('HEAD', path, { headers });
    const digest = this.header(head, 'docker-content-digest');
    if (digest) {
      return digest;
    }

    // Some registries only send the digest header on GET
    const fallback = await this.request('GET', path, { headers });
    const fallbackDigest = this.header(fallback, 'docker-content-digest');
    if (!fallbackDigest) {
      throw new RegistryError(`Digest not found for ${repository}:${reference}.`, 502);
    }
    return fallbackDigest;
  }

  async getManifest(repository: string, reference: string): Promise<ManifestResult> {
    const response = await this.request<unknown>(
      'GET',
      `/v2/${repository}/manifests/${reference}`,
      { headers: { Accept: MANIFEST_ACCEPT_HEADER } }
    );

    const manifest = this.parseJsonObject(response.data);
    if (!manifest) {
      throw new RegistryError(`Malformed manifest for ${repository}@${reference}.`, 502);
    }

    const declared = typeof manifest.mediaType === 'string' ? manifest.mediaType : undefined;
    const mediaType = this.header(response, 'content-type') || declared || MEDIA_TYPES.dockerManifest;
    return { manifest, mediaType };
  }

  /**
   * Delete a tag. Registries only delete by digest, so the digest is resolved
   * first; nothing is deleted when resolution fails.
   */
  async deleteTag(repository: string, tag: string): Promise<string> {
    const digest = await this.resolveDigest(repository, tag);
    await this.deleteManifest(repository, digest);
    return digest;
  }

  async deleteManifest(repository: string, digest: string): Promise<void> {
    await this.request('DELETE', `/v2/${repository}/manifests/${digest}`);
  }

  // ==================== Health ====================

  /**
   * Smallest possible catalog request; never throws
   */
  async healthCheck(): Promise<RegistryHealth> {
    try {
      await this.request('GET', '/v2/_catalog', { params: { n: 1 } });
      return { healthy: true, pushHost: this.pushHost };
    } catch (error) {
      log.warn({ err: errorMessage(error) }, 'Registry health check failed');
      return { healthy: false, pushHost: this.pushHost };
    }
  }

  // ==================== Internals ====================

  private async readCreatedAt(
    repository: string,
    manifest: Record<string, unknown>,
    mediaType: string
  ): Promise<string | undefined> {
    const configDigest = configDigestOf(manifest, mediaType);
    if (!configDigest) {
      return undefined;
    }

    try {
      const response = await this.request<unknown>('GET', `/v2/${repository}/blobs/${configDigest}`);
      const blob = this.parseJsonObject(response.data);
      return blob ? normalizeCreatedAt(blob.created) : undefined;
    } catch (error) {
      log.debug({ repository, configDigest, err: errorMessage(error) }, 'Config blob unavailable');
      return undefined;
    }
  }

  private parseJsonObject(data: unknown): Record<string, unknown> | undefined {
    let value = data;
    if (typeof value === 'string') {
      try {
        value = JSON.parse(value);
      } catch {
        return undefined;
      }
    }
    return isRecord(value) ? value : undefined;
  }

  private header(response: AxiosResponse, name: string): string | undefined {
    const value: unknown = response.headers[name];
    if (typeof value !== 'string') {
      return undefined;
    }
    return value.trim() || undefined;
  }

  private async request<T = unknown>(
    method: 'GET' | 'HEAD' | 'DELETE',
    url: string,
    config: AxiosRequestConfig = {}
  ): Promise<AxiosResponse<T>> {
    log.debug(`${method} ${url}`);

    let response: AxiosResponse<T>;
    try {
      response = await this.http.request<T>({ ...config, method, url, validateStatus: () => true });
    } catch (error) {
      throw new UnavailableError(`Registry request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status < 400) {
      return response;
    }

    if (response.status === 404) {
      throw new NotFoundError(`Registry returned 404 for ${method} ${url}.`);
    }

    if (method === 'DELETE' && response.status === 405) {
      throw new RegistryError(
        'Registry denied manifest delete (405). ' +
          'Enable REGISTRY_STORAGE_DELETE_ENABLED=true on registry and restart it.',
        405
      );
    }

    const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
    throw new RegistryError(`Registry API error ${response.status}: ${body.slice(0, 300)}`, response.status);
  }
}
