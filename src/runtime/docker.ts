/**
 * Docker CLI runtime - pull, tag, push and remove images through the docker binary
 */

import { spawn } from 'child_process';
import * as os from 'os';
import { ContainerRuntimeError, UnavailableError } from '../errors';
import { createLogger } from '../logger';
import { isRecord } from '../registry/manifest';
import { detectArchLabel } from '../services/image-ref';
import { ContainerRuntime, LocalImageDescriptor } from '../types';

const log = createLogger('docker');

const IMAGE_LIST_FORMAT = '{{.Repository}}|{{.Tag}}|{{.ID}}|{{.Size}}';

export interface DockerCliOptions {
  bin?: string;
  timeoutMs?: number;
}

export interface ImagePlatform {
  os?: string;
  architecture?: string;
}

/**
 * Parse `docker image ls` rows in IMAGE_LIST_FORMAT. Untagged images are skipped.
 */
export function parseImageList(stdout: string, limit?: number): LocalImageDescriptor[] {
  const images: LocalImageDescriptor[] = [];

  for (const line of stdout.split('\n')) {
    if (limit !== undefined && images.length >= limit) break;

    const parts = line.trim().split('|');
    if (parts.length !== 4) continue;

    const [repository, tag, id, size] = parts.map((part) => part.trim());
    if (!repository || repository === '<none>' || !tag || tag === '<none>') continue;

    images.push({ reference: `${repository}:${tag}`, repository, tag, id, size });
  }

  return images;
}

/**
 * Map every RepoTag of `docker image inspect` output to its platform
 */
export function parseInspectPlatforms(stdout: string): Map<string, ImagePlatform> {
  const platforms = new Map<string, ImagePlatform>();
  const payload: unknown = JSON.parse(stdout);
  if (!Array.isArray(payload)) return platforms;

  for (const item of payload) {
    if (!isRecord(item) || !Array.isArray(item.RepoTags)) continue;

    const platform: ImagePlatform = {};
    if (typeof item.Os === 'string') platform.os = item.Os;
    if (typeof item.Architecture === 'string') platform.architecture = item.Architecture;

    for (const ref of item.RepoTags) {
      if (typeof ref === 'string') platforms.set(ref, platform);
    }
  }

  return platforms;
}

export class DockerCliRuntime implements ContainerRuntime {
  private readonly bin: string;
  private readonly timeoutMs: number;

  constructor(options: DockerCliOptions = {}) {
    this.bin = options.bin || 'docker';
    this.timeoutMs = options.timeoutMs || 1_800_000;
  }

  async pull(ref: string): Promise<void> {
    await this.run(['pull', ref]);
  }

  async tag(source: string, target: string): Promise<void> {
    await this.run(['tag', source, target]);
  }

  async push(ref: string): Promise<void> {
    await this.run(['push', ref]);
  }

  async removeLocalTag(ref: string): Promise<void> {
    await this.run(['image', 'rm', ref]);
  }

  async removeImageById(id: string): Promise<void> {
    await this.run(['image', 'rm', '-f', id]);
  }

  async listLocalImages(limit?: number): Promise<LocalImageDescriptor[]> {
    const images = parseImageList(await this.run(['image', 'ls', '--format', IMAGE_LIST_FORMAT]), limit);
    if (images.length === 0) return images;

    let platforms: Map<string, ImagePlatform>;
    try {
      platforms = parseInspectPlatforms(await this.run(['image', 'inspect', ...images.map((image) => image.reference)]));
    } catch (error) {
      // Platforms are informational; the listing stands without them
      log.warn({ err: error }, 'docker image inspect failed');
      return images;
    }

    return images.map((image) => ({ ...image, ...platforms.get(image.reference) }));
  }

  async hostArchitecture(): Promise<string> {
    return detectArchLabel(os.arch());
  }

  /**
   * Run the docker binary and resolve with its stdout
   */
  private run(args: string[]): Promise<string> {
    const command = `${this.bin} ${args.join(' ')}`;
    log.debug({ command }, 'Running docker command');

    return new Promise<string>((resolve, reject) => {
      const child = spawn(this.bin, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let settled = false;

      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        finish(() => reject(new UnavailableError(`${command} timed out after ${this.timeoutMs / 1000}s.`)));
      }, this.timeoutMs);

      const finish = (settle: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        settle();
      };

      child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

      child.on('error', (error) => {
        const missing = 'code' in error && error.code === 'ENOENT';
        const message = missing ? `Docker CLI '${this.bin}' not found.` : `Failed to run ${command}: ${error.message}`;
        finish(() => reject(new UnavailableError(message, { cause: error })));
      });

      child.on('close', (code) => {
        const out = Buffer.concat(stdout).toString('utf-8');
        const err = Buffer.concat(stderr).toString('utf-8').trim();
        log.debug({ command, code, stdout: out.trim(), stderr: err }, 'docker command exited');

        finish(() => {
          if (code === 0) {
            resolve(out);
            return;
          }
          const reason = err ? `: ${err}` : '';
          reject(
            new ContainerRuntimeError(`${command} exited with code ${code}${reason}`, {
              exitCode: code === null ? undefined : code,
            })
          );
        });
      });
    });
  }
}
