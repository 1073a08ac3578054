/**
 * Configuration loaded from environment variables
 */

import { ValidationError } from './errors';

export interface Config {
  registryApiUrl: string;
  registryPushHost: string;
  requestTimeoutMs: number;
  dockerBin: string;
  dockerCommandTimeoutMs: number;
  maxCatalogResults: number;
  jobRetention: number;
  port: number;
  host: string;
}

const DEFAULT_REGISTRY_URL = 'http://localhost:5000';

/**
 * Add a scheme when missing and drop trailing slashes
 */
export function normalizeRegistryUrl(raw?: string): string {
  let value = (raw || '').trim();
  if (!value) {
    value = DEFAULT_REGISTRY_URL;
  }
  if (!value.startsWith('http://') && !value.startsWith('https://')) {
    value = `http://${value}`;
  }
  return value.replace(/\/+$/, '');
}

/**
 * Push host is the explicit value without scheme, or the host of the API URL
 */
export function resolvePushHost(registryUrl: string, explicitPushHost?: string): string {
  const explicit = (explicitPushHost || '').trim();
  if (explicit) {
    return explicit.replace(/^https?:\/\//, '').replace(/\/+$/, '');
  }
  return new URL(registryUrl).host;
}

function positiveNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive number (received '${raw}')`);
  }
  return value;
}

// Smaller retention settings are raised to this
const MIN_JOB_RETENTION = 20;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const registryApiUrl = normalizeRegistryUrl(env.REGISTRY_API_URL);

  return {
    registryApiUrl,
    registryPushHost: resolvePushHost(registryApiUrl, env.REGISTRY_PUSH_HOST),
    requestTimeoutMs: positiveNumber(env, 'REQUEST_TIMEOUT_SEC', 20) * 1000,
    dockerBin: (env.DOCKER_BIN || '').trim() || 'docker',
    dockerCommandTimeoutMs: positiveNumber(env, 'DOCKER_COMMAND_TIMEOUT_SEC', 1800) * 1000,
    maxCatalogResults: Math.floor(positiveNumber(env, 'MAX_CATALOG_RESULTS', 200)),
    jobRetention: Math.max(MIN_JOB_RETENTION, Math.floor(positiveNumber(env, 'SYNC_JOB_RETENTION', 120))),
    port: Math.floor(positiveNumber(env, 'PORT', 8080)),
    host: env.HOST || '0.0.0.0',
  };
}
