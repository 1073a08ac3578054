export { createHealthRouter } from './health';
export { createJobsRouter } from './jobs';
export { createLocalImagesRouter } from './local-images';
export { createRepositoriesRouter } from './repositories';
export type { ApiDependencies, JobsApi, RegistryApi } from './types';
