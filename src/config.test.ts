/**
 * Config loading tests
 */

import { loadConfig, normalizeRegistryUrl, resolvePushHost } from './config';
import { ValidationError } from './errors';

describe('config', () => {
  describe('normalizeRegistryUrl', () => {
    test('should default to localhost registry', () => {
      expect(normalizeRegistryUrl(undefined)).toBe('http://localhost:5000');
      expect(normalizeRegistryUrl('   ')).toBe('http://localhost:5000');
    });

    test('should add scheme and strip trailing slashes', () => {
      expect(normalizeRegistryUrl('registry.test:5000/')).toBe('http://registry.test:5000');
      expect(normalizeRegistryUrl('https://registry.test//')).toBe('https://registry.test');
    });
  });

  describe('resolvePushHost', () => {
    test('should use host of API URL by default', () => {
      expect(resolvePushHost('http://registry.test:5000')).toBe('registry.test:5000');
    });

    test('should strip scheme from explicit push host', () => {
      expect(resolvePushHost('http://registry.test:5000', 'https://push.test:443/')).toBe('push.test:443');
    });
  });

  describe('loadConfig', () => {
    test('should apply defaults', () => {
      const config = loadConfig({});

      expect(config).toEqual({
        registryApiUrl: 'http://localhost:5000',
        registryPushHost: 'localhost:5000',
        requestTimeoutMs: 20000,
        dockerBin: 'docker',
        dockerCommandTimeoutMs: 1800000,
        maxCatalogResults: 200,
        jobRetention: 120,
        port: 8080,
        host: '0.0.0.0',
      });
    });

    test('should read overrides', () => {
      const config = loadConfig({
        REGISTRY_API_URL: 'registry.test:5000',
        REGISTRY_PUSH_HOST: 'push.test:5000',
        REQUEST_TIMEOUT_SEC: '2.5',
        SYNC_JOB_RETENTION: '50',
        PORT: '9000',
      });

      expect(config.registryApiUrl).toBe('http://registry.test:5000');
      expect(config.registryPushHost).toBe('push.test:5000');
      expect(config.requestTimeoutMs).toBe(2500);
      expect(config.jobRetention).toBe(50);
      expect(config.port).toBe(9000);
    });

    test('should raise job retention to at least 20', () => {
      expect(loadConfig({ SYNC_JOB_RETENTION: '5' }).jobRetention).toBe(20);
    });

    test('should reject invalid numbers', () => {
      expect(() => loadConfig({ SYNC_JOB_RETENTION: 'many' })).toThrow(ValidationError);
      expect(() => loadConfig({ REQUEST_TIMEOUT_SEC: '0' })).toThrow(
        "REQUEST_TIMEOUT_SEC must be a positive number (received '0')"
      );
    });
  });
});
