/**
 * Job procedures
 *
 * Each step appends one log line once it completes. A failed step ends its
 * item; sibling items keep going. Items run one after another in input order.
 */

import { NotFoundError, StepFailureError, ValidationError, errorMessage } from '../errors';
import { RegistryClient } from '../registry/client';
import { ContainerRuntime, ItemResult, LocalImageDescriptor } from '../types';
import { applyPrefix, imageRef, withArchSuffix } from './image-ref';
import {
  JobPlan,
  LocalDeletePlan,
  LocalPushPlan,
  MirrorSyncPlan,
  RemotePrefixRenamePlan,
  RepoDeletePlan,
} from './job-plans';

/**
 * The registry operations jobs need
 */
export type JobRegistry = Pick<RegistryClient, 'listTagNames' | 'deleteTag'>;

export interface JobDependencies {
  runtime: ContainerRuntime;
  registry: JobRegistry;
}

/**
 * Write access to one job's record
 */
export interface JobContext {
  log(message: string): void;
  recordItem(result: ItemResult): void;
  setTotalItems(total: number): void;
}

interface RepositoryTags {
  repository: string;
  tags: string[];
  error?: string;
}

/**
 * Run one step. Resolves with nothing, or rejects with StepFailureError after
 * logging the failure. `action` may return a detail for the success line.
 */
async function step(
  ctx: JobContext,
  name: string,
  target: string,
  action: () => Promise<string | void>
): Promise<void> {
  let detail: string | void;
  try {
    detail = await action();
  } catch (error) {
    ctx.log(`[${name}] ${target} failed: ${errorMessage(error)}`);
    throw new StepFailureError(name, target, { cause: error });
  }
  ctx.log(detail ? `[${name}] ${target} ok (${detail})` : `[${name}] ${target} ok`);
}

/**
 * Run one item and record its outcome. Never rejects.
 */
async function runItem(ctx: JobContext, item: string, body: () => Promise<void>): Promise<boolean> {
  try {
    await body();
  } catch (error) {
    if (!(error instanceof StepFailureError)) {
      ctx.log(`[item] ${item} failed: ${errorMessage(error)}`);
    }
    ctx.recordItem({ item, ok: false, error: errorMessage(error) });
    return false;
  }
  ctx.recordItem({ item, ok: true });
  return true;
}

/**
 * A shared step failed before any item started; every planned item fails with it
 */
function failEvery(ctx: JobContext, items: string[], error: unknown): void {
  for (const item of items) {
    ctx.recordItem({ item, ok: false, error: errorMessage(error) });
  }
}

async function mirrorSync(plan: MirrorSyncPlan, ctx: JobContext, { runtime }: JobDependencies): Promise<void> {
  await runItem(ctx, plan.target, async () => {
    await step(ctx, 'pull', plan.source, () => runtime.pull(plan.source));
    await step(ctx, 'tag', `${plan.source} -> ${plan.target}`, () => runtime.tag(plan.source, plan.target));
    await step(ctx, 'push', plan.target, () => runtime.push(plan.target));
    if (plan.cleanupLocalTag) {
      await step(ctx, 'cleanup', `local ${plan.target}`, () => runtime.removeLocalTag(plan.target));
    }
  });
}

async function localPush(plan: LocalPushPlan, ctx: JobContext, deps: JobDependencies): Promise<void> {
  const { runtime, registry } = deps;

  let archLabel: string | undefined;
  if (plan.archMode === 'auto') {
    try {
      archLabel = await runtime.hostArchitecture();
    } catch (error) {
      ctx.log(`[arch] host architecture failed: ${errorMessage(error)}`);
      failEvery(ctx, plan.items.map((item) => item.source), error);
      return;
    }
  } else if (plan.archMode === 'custom') {
    archLabel = plan.archValue;
  }

  ctx.log(
    `[plan] archMode=${plan.archMode} arch=${archLabel || '-'} ` +
      `prefixMode=${plan.prefixMode} prefix=${plan.prefixValue || '-'}`
  );

  const items = plan.items.map((item) => {
    const targetTag = withArchSuffix(item.sourceTag, archLabel);
    return { ...item, targetTag, target: imageRef(plan.registryHost, item.targetRepository, targetTag) };
  });
  for (const item of items) {
    ctx.log(`[map] ${item.source} => ${item.target}`);
  }

  for (const item of items) {
    await runItem(ctx, `${item.source} => ${item.target}`, async () => {
      await step(ctx, 'tag', `${item.source} -> ${item.target}`, () => runtime.tag(item.source, item.target));
      await step(ctx, 'push', item.target, () => runtime.push(item.target));

      if (plan.cleanupLocalTag) {
        if (item.source === item.target) {
          ctx.log(`[cleanup] local ${item.source} skipped: same as pushed target`);
        } else {
          await step(ctx, 'cleanup', `local ${item.source}`, () => runtime.removeLocalTag(item.source));
        }
      }

      if (plan.cleanupRegistrySourceTag) {
        const sourceTag = `${item.sourceRepository}:${item.sourceTag}`;
        const pushedOver =
          item.sourceRepository === item.targetRepository && item.sourceTag === item.targetTag;
        if (pushedOver) {
          ctx.log(`[cleanup] registry ${sourceTag} skipped: same as pushed target`);
          return;
        }
        await step(ctx, 'cleanup', `registry ${sourceTag}`, async () => {
          try {
            return await registry.deleteTag(item.sourceRepository, item.sourceTag);
          } catch (error) {
            if (error instanceof NotFoundError) {
              return 'not in registry';
            }
            throw error;
          }
        });
      }
    });
  }
}

/**
 * List tags of every repository up front and size the job from the result.
 * A failed listing and an empty repository each count as one item.
 */
async function enumerateTags(
  repositories: string[],
  ctx: JobContext,
  { registry }: JobDependencies
): Promise<RepositoryTags[]> {
  const entries: RepositoryTags[] = [];

  for (const repository of repositories) {
    try {
      const tags = await registry.listTagNames(repository);
      ctx.log(`[list] ${repository}: ${tags.length} tags`);
      entries.push({ repository, tags });
    } catch (error) {
      ctx.log(`[list] ${repository} failed: ${errorMessage(error)}`);
      entries.push({ repository, tags: [], error: errorMessage(error) });
    }
  }

  ctx.setTotalItems(entries.reduce((total, entry) => total + Math.max(1, entry.tags.length), 0));
  return entries;
}

/**
 * Record the single item of a repository with nothing to iterate. Returns false
 * when the repository has tags to process.
 */
function settledWithoutTags(entry: RepositoryTags, ctx: JobContext): boolean {
  if (entry.error !== undefined) {
    ctx.recordItem({ item: entry.repository, ok: false, error: entry.error });
    return true;
  }
  if (entry.tags.length === 0) {
    ctx.log(`[skip] ${entry.repository} has no tags`);
    ctx.recordItem({ item: entry.repository, ok: true });
    return true;
  }
  return false;
}

async function remotePrefixRename(
  plan: RemotePrefixRenamePlan,
  ctx: JobContext,
  deps: JobDependencies
): Promise<void> {
  const { runtime, registry } = deps;
  const entries = await enumerateTags(plan.repositories, ctx, deps);

  for (const entry of entries) {
    if (settledWithoutTags(entry, ctx)) continue;

    const renamed = applyPrefix(entry.repository, plan.prefixMode, plan.prefixValue);
    for (const tag of entry.tags) {
      await runItem(ctx, `${entry.repository}:${tag}`, async () => {
        if (!renamed) {
          throw new ValidationError(`Prefix operation removed repository name entirely for ${entry.repository}.`);
        }
        if (renamed === entry.repository && plan.registryHost === plan.sourceHost) {
          ctx.log(`[skip] ${entry.repository}:${tag} already named ${renamed}`);
          return;
        }

        const source = imageRef(plan.sourceHost, entry.repository, tag);
        const target = imageRef(plan.registryHost, renamed, tag);
        await step(ctx, 'pull', source, () => runtime.pull(source));
        await step(ctx, 'tag', `${source} -> ${target}`, () => runtime.tag(source, target));
        await step(ctx, 'push', target, () => runtime.push(target));
        if (plan.cleanupSourceTag) {
          await step(ctx, 'delete', `${entry.repository}:${tag}`, () => registry.deleteTag(entry.repository, tag));
        }
      });
    }
  }
}

async function repoDelete(plan: RepoDeletePlan, ctx: JobContext, deps: JobDependencies): Promise<void> {
  const { registry } = deps;
  const entries = await enumerateTags(plan.repositories, ctx, deps);

  for (const entry of entries) {
    if (settledWithoutTags(entry, ctx)) continue;

    for (const tag of entry.tags) {
      const ref = `${entry.repository}:${tag}`;
      await runItem(ctx, ref, () => step(ctx, 'delete', ref, () => registry.deleteTag(entry.repository, tag)));
    }
  }
}

async function localDelete(plan: LocalDeletePlan, ctx: JobContext, { runtime }: JobDependencies): Promise<void> {
  ctx.log('[warn] Removing by image id also removes every other tag that references the same id.');

  let images: LocalImageDescriptor[];
  try {
    images = await runtime.listLocalImages();
  } catch (error) {
    ctx.log(`[list] local images failed: ${errorMessage(error)}`);
    ctx.setTotalItems(plan.imageRefs.length);
    failEvery(ctx, plan.imageRefs, error);
    return;
  }
  const idByRef = new Map(images.map((image) => [image.reference, image.id]));

  const refsById = new Map<string, string[]>();
  let missing = 0;
  for (const ref of plan.imageRefs) {
    const id = idByRef.get(ref);
    if (!id) {
      missing++;
      continue;
    }
    const refs = refsById.get(id) || [];
    if (!refs.includes(ref)) {
      refsById.set(id, [...refs, ref]);
    }
  }
  ctx.setTotalItems(refsById.size + missing);

  const removed = new Set<string>();
  for (const ref of plan.imageRefs) {
    const id = idByRef.get(ref);
    if (!id) {
      await runItem(ctx, ref, async () => {
        throw new NotFoundError(`Local image ${ref} not found.`);
      });
      continue;
    }
    if (removed.has(id)) {
      ctx.log(`[skip] ${ref} shares image id ${id}, already removed`);
      continue;
    }
    removed.add(id);

    const refs = refsById.get(id) || [ref];
    await runItem(ctx, `${id} (${refs.join(', ')})`, () =>
      step(ctx, 'remove', `image ${id}`, () => runtime.removeImageById(id))
    );
  }
}

/**
 * Execute a plan against the runtime and the registry
 */
export async function runPlan(plan: JobPlan, ctx: JobContext, deps: JobDependencies): Promise<void> {
  switch (plan.type) {
    case 'mirror-sync':
      return mirrorSync(plan, ctx, deps);
    case 'local-push':
      return localPush(plan, ctx, deps);
    case 'remote-prefix-rename':
      return remotePrefixRename(plan, ctx, deps);
    case 'repo-delete':
      return repoDelete(plan, ctx, deps);
    case 'local-delete':
      return localDelete(plan, ctx, deps);
  }
}
