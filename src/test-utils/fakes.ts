/**
 * In-process stand-ins for the container runtime and the registry
 */

import { ContainerRuntime, LocalImageDescriptor } from '../types';
import { NotFoundError } from '../errors';
import { JobRegistry } from '../services/job-runner';

export function localImage(reference: string, id: string): LocalImageDescriptor {
  const colon = reference.lastIndexOf(':');
  return {
    reference,
    repository: reference.slice(0, colon),
    tag: reference.slice(colon + 1),
    id,
    size: '10MB',
  };
}

/**
 * Records every call as `<method> <args>`; calls listed in `failures` reject
 */
export class FakeRuntime implements ContainerRuntime {
  calls: string[] = [];
  failures: Map<string, Error> = new Map();
  images: LocalImageDescriptor[] = [];
  arch: string = 'x86';

  failOn(call: string, error: Error = new Error('simulated failure')): this {
    this.failures.set(call, error);
    return this;
  }

  async pull(ref: string): Promise<void> {
    this.record(`pull ${ref}`);
  }

  async tag(source: string, target: string): Promise<void> {
    this.record(`tag ${source} ${target}`);
  }

  async push(ref: string): Promise<void> {
    this.record(`push ${ref}`);
  }

  async removeLocalTag(ref: string): Promise<void> {
    this.record(`rmi ${ref}`);
  }

  async removeImageById(id: string): Promise<void> {
    this.record(`rmi -f ${id}`);
  }

  async listLocalImages(limit?: number): Promise<LocalImageDescriptor[]> {
    this.record('images');
    return limit === undefined ? [...this.images] : this.images.slice(0, limit);
  }

  async hostArchitecture(): Promise<string> {
    return this.arch;
  }

  private record(call: string): void {
    this.calls.push(call);
    const failure = this.failures.get(call);
    if (failure) {
      throw failure;
    }
  }
}

/**
 * Repositories and their tags; digests are `sha256:<repo>-<tag>`
 */
export class FakeRegistry implements JobRegistry {
  calls: string[] = [];
  repositories: Map<string, string[]> = new Map();
  failures: Map<string, Error> = new Map();

  constructor(repositories: Record<string, string[]> = {}) {
    for (const [name, tags] of Object.entries(repositories)) {
      this.repositories.set(name, [...tags]);
    }
  }

  failOn(call: string, error: Error = new Error('simulated failure')): this {
    this.failures.set(call, error);
    return this;
  }

  async listTagNames(repository: string): Promise<string[]> {
    this.record(`list ${repository}`);
    const tags = this.repositories.get(repository);
    if (!tags) {
      throw new NotFoundError(`Registry returned 404 for GET /v2/${repository}/tags/list.`);
    }
    return [...tags];
  }

  async deleteTag(repository: string, tag: string): Promise<string> {
    this.record(`delete ${repository}:${tag}`);
    const tags = this.repositories.get(repository) || [];
    if (!tags.includes(tag)) {
      throw new NotFoundError(`Registry returned 404 for HEAD /v2/${repository}/manifests/${tag}.`);
    }
    this.repositories.set(
      repository,
      tags.filter((candidate) => candidate !== tag)
    );
    return `sha256:${repository}-${tag}`;
  }

  private record(call: string): void {
    this.calls.push(call);
    const failure = this.failures.get(call);
    if (failure) {
      throw failure;
    }
  }
}
