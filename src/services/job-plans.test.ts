import { ValidationError } from '../errors';
import { describePlan, parseArchMode, parsePrefixMode, planJob } from './job-plans';

const PUSH_HOST = 'registry.test:5000';

describe('planJob', () => {
  describe('mirror-sync', () => {
    test('should derive target from the source reference', () => {
      const plan = planJob({ type: 'mirror-sync', params: { sourceImage: ' nginx:1.27 ' } }, PUSH_HOST);

      expect(plan).toEqual({
        type: 'mirror-sync',
        source: 'nginx:1.27',
        target: 'registry.test:5000/nginx:1.27',
        cleanupLocalTag: false,
      });
    });

    test('should drop the source registry host and honor overrides', () => {
      const plan = planJob(
        {
          type: 'mirror-sync',
          params: { sourceImage: 'ghcr.io/team/app', targetRepository: 'mirror/app', targetTag: null },
        },
        PUSH_HOST
      );

      expect(plan).toMatchObject({ target: 'registry.test:5000/mirror/app:latest' });
    });

    test('should reject a blank source', () => {
      expect(() => planJob({ type: 'mirror-sync', params: { sourceImage: '  ' } }, PUSH_HOST)).toThrow(
        'sourceImage is required.'
      );
    });
  });

  describe('local-push', () => {
    test('should keep duplicate refs and apply the prefix', () => {
      const plan = planJob(
        {
          type: 'local-push',
          params: { imageRefs: ['app:v1', ' app:v1', 'tools/cli:2'], prefixMode: 'add', prefixValue: '/team/' },
        },
        PUSH_HOST
      );

      expect(plan).toEqual({
        type: 'local-push',
        items: [
          { source: 'app:v1', sourceRepository: 'app', sourceTag: 'v1', targetRepository: 'team/app' },
          { source: 'app:v1', sourceRepository: 'app', sourceTag: 'v1', targetRepository: 'team/app' },
          { source: 'tools/cli:2', sourceRepository: 'tools/cli', sourceTag: '2', targetRepository: 'team/tools/cli' },
        ],
        archMode: 'auto',
        archValue: undefined,
        prefixMode: 'add',
        prefixValue: 'team',
        registryHost: PUSH_HOST,
        cleanupLocalTag: false,
        cleanupRegistrySourceTag: false,
      });
    });

    test('should require archValue for custom mode', () => {
      expect(() =>
        planJob({ type: 'local-push', params: { imageRefs: ['app:v1'], archMode: 'custom' } }, PUSH_HOST)
      ).toThrow('archValue is required when archMode=custom.');
    });

    test('should require prefixValue when a prefix mode is set', () => {
      expect(() =>
        planJob({ type: 'local-push', params: { imageRefs: ['app:v1'], prefixMode: 'remove' } }, PUSH_HOST)
      ).toThrow('prefixValue is required when prefixMode=remove.');
    });

    test('should reject a prefix removal that empties the repository', () => {
      expect(() =>
        planJob(
          { type: 'local-push', params: { imageRefs: ['team:v1'], prefixMode: 'remove', prefixValue: 'team' } },
          PUSH_HOST
        )
      ).toThrow('Prefix operation removed repository name entirely for team:v1.');
    });

    test('should reject an empty list', () => {
      expect(() => planJob({ type: 'local-push', params: { imageRefs: [' '] } }, PUSH_HOST)).toThrow(
        ValidationError
      );
    });

    test('should use an explicit target registry host', () => {
      const plan = planJob(
        { type: 'local-push', params: { imageRefs: ['app:v1'], targetRegistryHost: 'mirror.test/' } },
        PUSH_HOST
      );

      expect(plan).toMatchObject({ registryHost: 'mirror.test' });
    });
  });

  describe('remote-prefix-rename', () => {
    test('should require add or remove', () => {
      expect(() =>
        planJob(
          { type: 'remote-prefix-rename', params: { repositories: ['app'], prefixMode: 'none', prefixValue: 'x' } },
          PUSH_HOST
        )
      ).toThrow('prefixMode must be one of: add, remove.');
    });

    test('should keep the push host as source', () => {
      const plan = planJob(
        {
          type: 'remote-prefix-rename',
          params: { repositories: ['app', 'app', 'web'], prefixMode: 'add', prefixValue: 'team', cleanupSourceTag: true },
        },
        PUSH_HOST
      );

      expect(plan).toEqual({
        type: 'remote-prefix-rename',
        repositories: ['app', 'app', 'web'],
        prefixMode: 'add',
        prefixValue: 'team',
        sourceHost: PUSH_HOST,
        registryHost: PUSH_HOST,
        cleanupSourceTag: true,
      });
    });
  });

  describe('deletes', () => {
    test('should require at least one repository', () => {
      expect(() => planJob({ type: 'repo-delete', params: { repositories: [] } }, PUSH_HOST)).toThrow(
        'At least one repository is required.'
      );
    });

    test('should add latest to untagged local refs and drop blanks', () => {
      const plan = planJob(
        { type: 'local-delete', params: { imageRefs: ['app', ' ', 'app:latest', 'web:1'] } },
        PUSH_HOST
      );

      expect(plan).toEqual({ type: 'local-delete', imageRefs: ['app:latest', 'app:latest', 'web:1'] });
    });

    test('should count every submitted repository as an item', () => {
      const plan = planJob({ type: 'repo-delete', params: { repositories: ['app', ' app ', '', 'web'] } }, PUSH_HOST);

      expect(plan).toEqual({ type: 'repo-delete', repositories: ['app', 'app', 'web'] });
      expect(describePlan(plan).totalItems).toBe(3);
    });
  });
});

describe('describePlan', () => {
  test('should describe a single item by itself', () => {
    const plan = planJob({ type: 'mirror-sync', params: { sourceImage: 'nginx:1.27' } }, PUSH_HOST);

    expect(describePlan(plan)).toEqual({
      sourceSummary: 'nginx:1.27',
      targetSummary: 'registry.test:5000/nginx:1.27',
      totalItems: 1,
    });
  });

  test('should summarize batches by count and first item', () => {
    const rename = planJob(
      { type: 'remote-prefix-rename', params: { repositories: ['app', 'web'], prefixMode: 'remove', prefixValue: 'team' } },
      PUSH_HOST
    );
    const remove = planJob({ type: 'local-delete', params: { imageRefs: ['app:v1', 'web:v2', 'db:v3'] } }, PUSH_HOST);

    expect(describePlan(rename)).toEqual({
      sourceSummary: '2 repositories (first: app)',
      targetSummary: "registry.test:5000 (remove prefix 'team')",
      totalItems: 2,
    });
    expect(describePlan(remove)).toEqual({
      sourceSummary: '3 local images (first: app:v1)',
      targetSummary: 'local runtime (delete)',
      totalItems: 3,
    });
  });
});

describe('mode parsing', () => {
  test('should normalize case and treat blank as unset', () => {
    expect(parseArchMode(' Custom ')).toBe('custom');
    expect(parseArchMode('')).toBeUndefined();
    expect(parsePrefixMode(undefined)).toBeUndefined();
  });

  test('should reject unknown modes', () => {
    expect(() => parseArchMode('sparc')).toThrow('archMode must be one of: none, auto, custom.');
    expect(() => parsePrefixMode(3)).toThrow('prefixMode must be one of: none, add, remove.');
  });
});
