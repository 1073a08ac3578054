/**
 * Core types for the registry manager
 */

export type JobType =
  | 'mirror-sync'
  | 'local-push'
  | 'remote-prefix-rename'
  | 'repo-delete'
  | 'local-delete';

export type JobStatus = 'queued' | 'running' | 'success' | 'failed';

export interface ItemResult {
  item: string;
  ok: boolean;
  error?: string;
}

export interface Job {
  id: string;
  type: JobType;
  status: JobStatus;
  createdAt: string; // ISO timestamp
  updatedAt: string; // ISO timestamp
  logs: string[];
  sourceSummary: string;
  targetSummary: string;
  totalItems: number;
  itemResults: ItemResult[];
  error?: string;
}

export type ArchMode = 'none' | 'auto' | 'custom';
export type PrefixMode = 'none' | 'add' | 'remove';

export interface MirrorSyncParams {
  sourceImage: string;
  targetRepository?: string | null;
  targetTag?: string | null;
  cleanupLocalTag?: boolean;
}

export interface LocalPushParams {
  imageRefs: string[];
  archMode?: ArchMode;
  archValue?: string;
  prefixMode?: PrefixMode;
  prefixValue?: string;
  targetRegistryHost?: string | null;
  cleanupLocalTag?: boolean;
  cleanupRegistrySourceTag?: boolean;
}

export interface RemotePrefixRenameParams {
  repositories: string[];
  prefixMode: PrefixMode;
  prefixValue: string;
  cleanupSourceTag?: boolean;
  targetRegistryHost?: string | null;
}

export interface RepoDeleteParams {
  repositories: string[];
}

export interface LocalDeleteParams {
  imageRefs: string[];
}

export type JobRequest =
  | { type: 'mirror-sync'; params: MirrorSyncParams }
  | { type: 'local-push'; params: LocalPushParams }
  | { type: 'remote-prefix-rename'; params: RemotePrefixRenameParams }
  | { type: 'repo-delete'; params: RepoDeleteParams }
  | { type: 'local-delete'; params: LocalDeleteParams };

export interface RepositoryPage {
  repositories: string[];
  next?: string;
}

export interface TagDescriptor {
  tag: string;
  digest?: string;
  mediaType?: string;
  sizeBytes?: number;
  createdAt?: string;
  error?: string;
}

export interface RegistryHealth {
  healthy: boolean;
  pushHost: string;
}

export interface LocalImageDescriptor {
  reference: string; // repository:tag
  repository: string;
  tag: string;
  id: string;
  size: string;
  os?: string;
  architecture?: string;
}

/**
 * Container runtime capability consumed by the job engine.
 * Every method may reject with a transport or execution error.
 */
export interface ContainerRuntime {
  pull(ref: string): Promise<void>;
  tag(source: string, target: string): Promise<void>;
  push(ref: string): Promise<void>;
  removeLocalTag(ref: string): Promise<void>;
  removeImageById(id: string): Promise<void>;
  listLocalImages(limit?: number): Promise<LocalImageDescriptor[]>;
  hostArchitecture(): Promise<string>;
}
