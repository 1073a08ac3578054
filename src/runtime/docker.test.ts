/**
 * Unit tests for the Docker CLI runtime with a mocked spawn
 */

import { EventEmitter } from 'events';
import { ContainerRuntimeError, UnavailableError } from '../errors';
import { DockerCliRuntime, parseImageList, parseInspectPlatforms } from './docker';

interface FakeRun {
  stdout?: string;
  stderr?: string;
  code?: number;
  error?: NodeJS.ErrnoException;
  hang?: boolean;
}

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  kill = jest.fn();
}

const mockSpawn = jest.fn<FakeChild, [string, string[]]>();

jest.mock('child_process', () => ({
  spawn: (command: string, args: string[]) => mockSpawn(command, args),
}));

// Queue one fake process per expected spawn call
function queueRuns(...runs: FakeRun[]): void {
  for (const run of runs) {
    mockSpawn.mockImplementationOnce(() => {
      const child = new FakeChild();
      setImmediate(() => {
        if (run.hang) return;
        if (run.error) {
          child.emit('error', run.error);
          return;
        }
        if (run.stdout) child.stdout.emit('data', Buffer.from(run.stdout));
        if (run.stderr) child.stderr.emit('data', Buffer.from(run.stderr));
        child.emit('close', run.code ?? 0);
      });
      return child;
    });
  }
}

const spawnedArgs = (): string[][] => mockSpawn.mock.calls.map(([command, args]) => [command, ...args]);

describe('DockerCliRuntime', () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  test('should run pull, tag and push', async () => {
    queueRuns({}, {}, {});
    const runtime = new DockerCliRuntime({ bin: 'docker' });

    await runtime.pull('nginx:1.27');
    await runtime.tag('nginx:1.27', 'registry.test:5000/nginx:1.27');
    await runtime.push('registry.test:5000/nginx:1.27');

    expect(spawnedArgs()).toEqual([
      ['docker', 'pull', 'nginx:1.27'],
      ['docker', 'tag', 'nginx:1.27', 'registry.test:5000/nginx:1.27'],
      ['docker', 'push', 'registry.test:5000/nginx:1.27'],
    ]);
  });

  test('should force remove by image id', async () => {
    queueRuns({});
    await new DockerCliRuntime().removeImageById('abc123');

    expect(spawnedArgs()).toEqual([['docker', 'image', 'rm', '-f', 'abc123']]);
  });

  test('should reject non-zero exits with stderr and exit code', async () => {
    queueRuns({ code: 1, stderr: 'denied: requested access to the resource is denied\n' });

    const result = new DockerCliRuntime().push('registry.test:5000/app:v1');

    await expect(result).rejects.toThrow(ContainerRuntimeError);
    await expect(result).rejects.toMatchObject({
      message:
        'docker push registry.test:5000/app:v1 exited with code 1: denied: requested access to the resource is denied',
      exitCode: 1,
    });
  });

  test('should report a missing binary as unavailable', async () => {
    const missing: NodeJS.ErrnoException = Object.assign(new Error('spawn podman ENOENT'), { code: 'ENOENT' });
    queueRuns({ error: missing });

    const result = new DockerCliRuntime({ bin: 'podman' }).pull('nginx:1.27');

    await expect(result).rejects.toThrow(UnavailableError);
    await expect(result).rejects.toThrow("Docker CLI 'podman' not found.");
  });

  test('should kill commands that exceed the timeout', async () => {
    jest.useFakeTimers();
    try {
      queueRuns({ hang: true });
      const result = new DockerCliRuntime({ timeoutMs: 5000 }).pull('nginx:1.27');

      jest.advanceTimersByTime(5000);

      await expect(result).rejects.toThrow('docker pull nginx:1.27 timed out after 5s.');
      const child = mockSpawn.mock.results[0].value;
      expect(child.kill).toHaveBeenCalledWith('SIGKILL');
    } finally {
      jest.useRealTimers();
    }
  });

  test('should list local images with their platforms', async () => {
    queueRuns(
      { stdout: 'nginx|1.27|abc|67MB\n<none>|<none>|def|1MB\nregistry.test:5000/app|v1|123|5MB\n' },
      {
        stdout: JSON.stringify([
          { RepoTags: ['nginx:1.27'], Os: 'linux', Architecture: 'amd64' },
          { RepoTags: ['registry.test:5000/app:v1'], Os: 'linux', Architecture: 'arm64' },
        ]),
      }
    );

    const images = await new DockerCliRuntime().listLocalImages();

    expect(images).toEqual([
      { reference: 'nginx:1.27', repository: 'nginx', tag: '1.27', id: 'abc', size: '67MB', os: 'linux', architecture: 'amd64' },
      {
        reference: 'registry.test:5000/app:v1',
        repository: 'registry.test:5000/app',
        tag: 'v1',
        id: '123',
        size: '5MB',
        os: 'linux',
        architecture: 'arm64',
      },
    ]);
    expect(spawnedArgs()[1]).toEqual(['docker', 'image', 'inspect', 'nginx:1.27', 'registry.test:5000/app:v1']);
  });

  test('should keep the listing when inspect fails', async () => {
    queueRuns({ stdout: 'nginx|1.27|abc|67MB\n' }, { code: 1, stderr: 'boom' });

    const images = await new DockerCliRuntime().listLocalImages();

    expect(images).toEqual([{ reference: 'nginx:1.27', repository: 'nginx', tag: '1.27', id: 'abc', size: '67MB' }]);
  });
});

describe('parseImageList', () => {
  test('should skip malformed and untagged rows and honor the limit', () => {
    const stdout = ['a|1|id1|1MB', 'garbage', 'b|<none>|id2|2MB', 'c|3|id3|3MB', 'd|4|id4|4MB'].join('\n');

    expect(parseImageList(stdout, 2).map((image) => image.reference)).toEqual(['a:1', 'c:3']);
  });
});

describe('parseInspectPlatforms', () => {
  test('should map every repo tag and ignore entries without tags', () => {
    const platforms = parseInspectPlatforms(
      JSON.stringify([{ RepoTags: ['a:1', 'a:latest'], Os: 'linux', Architecture: 'arm64' }, { Os: 'linux' }])
    );

    expect(Array.from(platforms.keys())).toEqual(['a:1', 'a:latest']);
    expect(platforms.get('a:latest')).toEqual({ os: 'linux', architecture: 'arm64' });
  });
});
