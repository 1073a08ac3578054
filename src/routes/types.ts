/**
 * Dependencies the API routers are built from
 */

import { Config } from '../config';
import { RegistryClient } from '../registry/client';
import { JobOrchestrator } from '../services/job';
import { ContainerRuntime } from '../types';

export type RegistryApi = Pick<
  RegistryClient,
  'listRepositories' | 'listTagNames' | 'listTags' | 'deleteTag' | 'healthCheck'
>;

export type JobsApi = Pick<JobOrchestrator, 'submit' | 'get' | 'list'>;

export interface ApiDependencies {
  config: Pick<Config, 'registryApiUrl' | 'registryPushHost' | 'maxCatalogResults'>;
  registry: RegistryApi;
  runtime: ContainerRuntime;
  jobs: JobsApi;
}
