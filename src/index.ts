/**
 * Registry Manager - Entry point
 */

import { loadConfig } from './config';
import { logger } from './logger';
import { RegistryClient } from './registry/client';
import { DockerCliRuntime } from './runtime/docker';
import { createServer } from './server';
import { JobOrchestrator } from './services/job';
import { JobStore } from './services/job-store';

async function main(): Promise<void> {
  const config = loadConfig();

  const registry = new RegistryClient({
    baseUrl: config.registryApiUrl,
    pushHost: config.registryPushHost,
    timeoutMs: config.requestTimeoutMs,
  });
  const runtime = new DockerCliRuntime({ bin: config.dockerBin, timeoutMs: config.dockerCommandTimeoutMs });
  const jobs = new JobOrchestrator({
    store: new JobStore(config.jobRetention),
    runtime,
    registry,
    pushHost: config.registryPushHost,
  });

  const { start, stop } = createServer({ config, registry, runtime, jobs }, { port: config.port, host: config.host });

  logger.info({ registry: config.registryApiUrl, pushHost: config.registryPushHost }, 'Starting Registry Manager...');
  await start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down, waiting for running jobs');

    stop()
      .then(() => jobs.drain())
      .then(() => {
        logger.info('Shutdown complete');
        process.exit(0);
      })
      .catch((err) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  logger.error({ err }, 'Failed to start server');
  process.exit(1);
});
