/**
 * Unit tests for JobStore
 */

import { JobStore, NewJob } from './job-store';

const newJob = (sourceSummary: string): NewJob => ({
  type: 'mirror-sync',
  sourceSummary,
  targetSummary: 'registry.test:5000',
  totalItems: 1,
});

describe('JobStore', () => {
  let store: JobStore;

  beforeEach(() => {
    store = new JobStore(3);
  });

  describe('create', () => {
    test('should create queued job with unique id', () => {
      const first = store.create(newJob('nginx:1.27'));
      const second = store.create(newJob('nginx:1.27'));

      expect(first.id).toMatch(/^job-1-[0-9a-f]{8}$/);
      expect(second.id).toMatch(/^job-2-/);
      expect(first.status).toBe('queued');
      expect(first.logs).toEqual([]);
      expect(first.itemResults).toEqual([]);
      expect(first.createdAt).toBe(first.updatedAt);
    });

    test('should keep totalItems at least one', () => {
      const job = store.create({ ...newJob('none'), totalItems: 0 });
      expect(job.totalItems).toBe(1);
    });
  });

  describe('retention', () => {
    test('should evict the oldest job when over capacity', () => {
      const jobs = ['a', 'b', 'c', 'd'].map((name) => store.create(newJob(name)));

      expect(store.size()).toBe(3);
      expect(store.get(jobs[0].id)).toBeUndefined();
      expect(store.list().map((job) => job.sourceSummary)).toEqual(['d', 'c', 'b']);
    });

    test('should evict running jobs too', () => {
      const running = store.create(newJob('running'));
      store.transition(running.id, 'running');

      store.create(newJob('b'));
      store.create(newJob('c'));
      store.create(newJob('d'));

      expect(store.get(running.id)).toBeUndefined();
      expect(store.appendLog(running.id, 'late line')).toBe(false);
    });

    test('should never hold more than capacity', () => {
      for (let i = 0; i < 20; i++) {
        store.create(newJob(`job-${i}`));
        expect(store.size()).toBeLessThanOrEqual(3);
      }
    });
  });

  describe('list', () => {
    test('should return most recent first bounded by limit', () => {
      store.create(newJob('a'));
      store.create(newJob('b'));
      store.create(newJob('c'));

      expect(store.list(2).map((job) => job.sourceSummary)).toEqual(['c', 'b']);
      expect(store.list(0)).toEqual([]);
    });
  });

  describe('updates', () => {
    test('should append timestamped log lines', () => {
      const job = store.create(newJob('a'));

      store.appendLog(job.id, '[pull] a ok');
      store.appendLog(job.id, '[tag] a ok');

      const logs = store.get(job.id)?.logs;
      expect(logs).toHaveLength(2);
      expect(logs?.[0]).toMatch(/^\d{2}:\d{2}:\d{2} \[pull\] a ok$/);
      expect(logs?.[1]).toMatch(/\[tag\] a ok$/);
    });

    test('should return snapshots that callers cannot mutate', () => {
      const job = store.create(newJob('a'));
      const copy = store.get(job.id);
      copy?.logs.push('forged');
      copy?.itemResults.push({ item: 'x', ok: true });

      expect(store.get(job.id)?.logs).toEqual([]);
      expect(store.get(job.id)?.itemResults).toEqual([]);
    });

    test('should record item results in order', () => {
      const job = store.create(newJob('a'));
      store.addItemResult(job.id, { item: 'one', ok: true });
      store.addItemResult(job.id, { item: 'two', ok: false, error: 'boom' });

      expect(store.get(job.id)?.itemResults).toEqual([
        { item: 'one', ok: true },
        { item: 'two', ok: false, error: 'boom' },
      ]);
    });
  });

  describe('transition', () => {
    test('should only move forward', () => {
      const job = store.create(newJob('a'));

      expect(store.transition(job.id, 'success')).toBe(false);
      expect(store.transition(job.id, 'running')).toBe(true);
      expect(store.transition(job.id, 'queued')).toBe(false);
      expect(store.transition(job.id, 'failed', '1 of 1 items failed')).toBe(true);
      expect(store.transition(job.id, 'success')).toBe(false);

      const finished = store.get(job.id);
      expect(finished?.status).toBe('failed');
      expect(finished?.error).toBe('1 of 1 items failed');
    });

    test('should ignore unknown ids', () => {
      expect(store.transition('job-404', 'running')).toBe(false);
    });
  });
});
