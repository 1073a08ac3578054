/**
 * Image reference helpers: split, prefix rename, architecture labels
 */

import { ValidationError } from '../errors';
import { PrefixMode } from '../types';

export interface RepositoryTag {
  repository: string;
  tag: string;
}

function isRegistryComponent(value: string): boolean {
  return value.includes('.') || value.includes(':') || value === 'localhost';
}

/**
 * Split an image reference into the repository path (without registry host) and tag.
 * Digest references produce a tag derived from the digest.
 */
export function splitImageRef(image: string): RepositoryTag {
  const value = image.trim();
  if (!value) {
    throw new ValidationError('Image reference cannot be empty.');
  }

  let baseName: string;
  let tag: string;

  const at = value.lastIndexOf('@');
  if (at !== -1) {
    baseName = value.slice(0, at);
    tag = value.slice(at + 1).replace(/:/g, '-');
  } else {
    const slash = value.lastIndexOf('/');
    const colon = value.lastIndexOf(':');
    if (colon > slash) {
      baseName = value.slice(0, colon);
      tag = value.slice(colon + 1);
    } else {
      baseName = value;
      tag = 'latest';
    }
  }

  const components = baseName.split('/');
  const repository =
    components.length > 1 && isRegistryComponent(components[0]) ? components.slice(1).join('/') : baseName;

  if (!repository || !tag) {
    throw new ValidationError(`Cannot derive target repository from '${image}'.`);
  }
  return { repository, tag };
}

/**
 * Add or strip a repository path prefix. Removing a prefix equal to the whole
 * repository yields an empty string.
 */
export function applyPrefix(repository: string, mode: PrefixMode, prefixValue: string): string {
  const base = repository.replace(/^\/+|\/+$/g, '');
  const prefix = prefixValue.replace(/^\/+|\/+$/g, '');

  if (!prefix || mode === 'none') {
    return base;
  }
  if (mode === 'add') {
    if (base === prefix || base.startsWith(`${prefix}/`)) {
      return base;
    }
    return `${prefix}/${base}`;
  }
  if (base.startsWith(`${prefix}/`)) {
    return base.slice(prefix.length + 1);
  }
  return base === prefix ? '' : base;
}

/**
 * Map a machine name (uname -m or Node's os.arch()) to the short label used in tags
 */
export function detectArchLabel(raw: string): string {
  const machine = raw.trim().toLowerCase();
  if (machine === 'x86_64' || machine === 'amd64' || machine === 'x64') {
    return 'x86';
  }
  if (machine === 'aarch64' || machine === 'arm64' || machine.startsWith('arm')) {
    return 'arm';
  }
  return machine || 'unknown';
}

export function withArchSuffix(tag: string, archLabel?: string): string {
  if (!archLabel) return tag;
  const suffix = `-${archLabel}`;
  return tag.endsWith(suffix) ? tag : `${tag}${suffix}`;
}

/**
 * Append `:latest` to references without a tag or digest
 */
export function withDefaultTag(ref: string): string {
  const value = ref.trim();
  if (value.includes('@')) return value;
  return value.lastIndexOf(':') > value.lastIndexOf('/') ? value : `${value}:latest`;
}

export function imageRef(host: string, repository: string, tag: string): string {
  return `${host}/${repository}:${tag}`;
}
