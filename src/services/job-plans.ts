/**
 * Job plans - validate a submission and normalize it into what the runner executes.
 * Everything here throws ValidationError before a job is created.
 */

import { ValidationError } from '../errors';
import { ArchMode, JobRequest, PrefixMode } from '../types';
import { applyPrefix, imageRef, splitImageRef, withDefaultTag } from './image-ref';

const ARCH_MODES: readonly ArchMode[] = ['none', 'auto', 'custom'];
const PREFIX_MODES: readonly PrefixMode[] = ['none', 'add', 'remove'];

export interface MirrorSyncPlan {
  type: 'mirror-sync';
  source: string;
  target: string;
  cleanupLocalTag: boolean;
}

export interface LocalPushItem {
  source: string;
  sourceRepository: string;
  sourceTag: string;
  targetRepository: string;
}

export interface LocalPushPlan {
  type: 'local-push';
  items: LocalPushItem[];
  archMode: ArchMode;
  /** Lower-cased label, set when archMode is custom */
  archValue?: string;
  prefixMode: PrefixMode;
  prefixValue: string;
  registryHost: string;
  cleanupLocalTag: boolean;
  cleanupRegistrySourceTag: boolean;
}

export interface RemotePrefixRenamePlan {
  type: 'remote-prefix-rename';
  repositories: string[];
  prefixMode: 'add' | 'remove';
  prefixValue: string;
  sourceHost: string;
  registryHost: string;
  cleanupSourceTag: boolean;
}

export interface RepoDeletePlan {
  type: 'repo-delete';
  repositories: string[];
}

export interface LocalDeletePlan {
  type: 'local-delete';
  imageRefs: string[];
}

export type JobPlan = MirrorSyncPlan | LocalPushPlan | RemotePrefixRenamePlan | RepoDeletePlan | LocalDeletePlan;

export interface PlanSummary {
  sourceSummary: string;
  targetSummary: string;
  totalItems: number;
}

export function parseArchMode(value: unknown): ArchMode | undefined {
  return parseMode(value, ARCH_MODES, 'archMode');
}

export function parsePrefixMode(value: unknown): PrefixMode | undefined {
  return parseMode(value, PREFIX_MODES, 'prefixMode');
}

function parseMode<T extends string>(value: unknown, modes: readonly T[], field: string): T | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be one of: ${modes.join(', ')}.`);
  }
  const normalized = value.trim().toLowerCase();
  if (!normalized) return undefined;

  const mode = modes.find((candidate) => candidate === normalized);
  if (!mode) {
    throw new ValidationError(`${field} must be one of: ${modes.join(', ')}.`);
  }
  return mode;
}

/**
 * Trimmed and non-blank; duplicates stay, each is its own item
 */
function nonBlank(values: string[]): string[] {
  return values.map((value) => value.trim()).filter((value) => value.length > 0);
}

function hostOrDefault(host: string | null | undefined, fallback: string): string {
  const value = (host || '').trim().replace(/\/+$/, '') || fallback;
  if (!value) {
    throw new ValidationError('targetRegistryHost cannot be empty.');
  }
  return value;
}

function requirePrefix(mode: PrefixMode, value: string | undefined): string {
  const prefix = (value || '').trim().replace(/^\/+|\/+$/g, '');
  if (mode !== 'none' && !prefix) {
    throw new ValidationError(`prefixValue is required when prefixMode=${mode}.`);
  }
  return prefix;
}

/**
 * Validate a submission and turn it into an executable plan
 */
export function planJob(request: JobRequest, pushHost: string): JobPlan {
  switch (request.type) {
    case 'mirror-sync': {
      const { params } = request;
      const source = (params.sourceImage || '').trim();
      if (!source) {
        throw new ValidationError('sourceImage is required.');
      }
      const derived = splitImageRef(source);
      const repository = (params.targetRepository || '').trim() || derived.repository;
      const tag = (params.targetTag || '').trim() || derived.tag;

      return {
        type: 'mirror-sync',
        source,
        target: imageRef(pushHost, repository, tag),
        cleanupLocalTag: params.cleanupLocalTag === true,
      };
    }

    case 'local-push': {
      const { params } = request;
      const refs = nonBlank(params.imageRefs || []);
      if (refs.length === 0) {
        throw new ValidationError('At least one local image is required.');
      }

      const archMode = params.archMode || 'auto';
      let archValue: string | undefined;
      if (archMode === 'custom') {
        archValue = (params.archValue || '').trim().toLowerCase();
        if (!archValue) {
          throw new ValidationError('archValue is required when archMode=custom.');
        }
      }

      const prefixMode = params.prefixMode || 'none';
      const prefixValue = requirePrefix(prefixMode, params.prefixValue);

      const items = refs.map((source): LocalPushItem => {
        const { repository, tag } = splitImageRef(source);
        const targetRepository = applyPrefix(repository, prefixMode, prefixValue);
        if (!targetRepository) {
          throw new ValidationError(`Prefix operation removed repository name entirely for ${source}.`);
        }
        return { source, sourceRepository: repository, sourceTag: tag, targetRepository };
      });

      return {
        type: 'local-push',
        items,
        archMode,
        archValue,
        prefixMode,
        prefixValue,
        registryHost: hostOrDefault(params.targetRegistryHost, pushHost),
        cleanupLocalTag: params.cleanupLocalTag === true,
        cleanupRegistrySourceTag: params.cleanupRegistrySourceTag === true,
      };
    }

    case 'remote-prefix-rename': {
      const { params } = request;
      const repositories = nonBlank(params.repositories || []);
      if (repositories.length === 0) {
        throw new ValidationError('At least one repository is required.');
      }
      if (params.prefixMode !== 'add' && params.prefixMode !== 'remove') {
        throw new ValidationError('prefixMode must be one of: add, remove.');
      }

      return {
        type: 'remote-prefix-rename',
        repositories,
        prefixMode: params.prefixMode,
        prefixValue: requirePrefix(params.prefixMode, params.prefixValue),
        sourceHost: pushHost,
        registryHost: hostOrDefault(params.targetRegistryHost, pushHost),
        cleanupSourceTag: params.cleanupSourceTag === true,
      };
    }

    case 'repo-delete': {
      const repositories = nonBlank(request.params.repositories || []);
      if (repositories.length === 0) {
        throw new ValidationError('At least one repository is required.');
      }
      return { type: 'repo-delete', repositories };
    }

    case 'local-delete': {
      const imageRefs = nonBlank(request.params.imageRefs || []).map(withDefaultTag);
      if (imageRefs.length === 0) {
        throw new ValidationError('At least one local image is required.');
      }
      return { type: 'local-delete', imageRefs };
    }
  }
}

function summarize(items: string[], noun: string): string {
  if (items.length === 1) return items[0];
  return `${items.length} ${noun} (first: ${items[0]})`;
}

/**
 * Human-readable source/target and the initial item count of a plan
 */
export function describePlan(plan: JobPlan): PlanSummary {
  switch (plan.type) {
    case 'mirror-sync':
      return { sourceSummary: plan.source, targetSummary: plan.target, totalItems: 1 };

    case 'local-push':
      return {
        sourceSummary: summarize(
          plan.items.map((item) => item.source),
          'local images'
        ),
        targetSummary: plan.registryHost,
        totalItems: plan.items.length,
      };

    case 'remote-prefix-rename':
      return {
        sourceSummary: summarize(plan.repositories, 'repositories'),
        targetSummary: `${plan.registryHost} (${plan.prefixMode} prefix '${plan.prefixValue}')`,
        totalItems: plan.repositories.length,
      };

    case 'repo-delete':
      return {
        sourceSummary: summarize(plan.repositories, 'repositories'),
        targetSummary: 'registry (delete)',
        totalItems: plan.repositories.length,
      };

    case 'local-delete':
      return {
        sourceSummary: summarize(plan.imageRefs, 'local images'),
        targetSummary: 'local runtime (delete)',
        totalItems: plan.imageRefs.length,
      };
  }
}
