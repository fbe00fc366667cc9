import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CacheWriteError, ClipUnavailableError, JobCancelledError } from '../../utils/errors';
import { ClipCache, cacheKey, normalizeQuery, type ClipFetchRequest, type ClipFetcher } from './clip-cache.service';

function fakeFetcher(durationSeconds = 8): { fetcher: ClipFetcher; calls: ClipFetchRequest[] } {
  const calls: ClipFetchRequest[] = [];
  const fetcher: ClipFetcher = async (request) => {
    calls.push(request);
    await fs.promises.writeFile(request.destinationPath, 'fake-mp4-bytes');
    return { durationSeconds, sourceUrl: 'https://videos.example.com/clip.mp4' };
  };
  return { fetcher, calls };
}

function gate(): { promise: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open: () => open() };
}

describe('cacheKey', () => {
  it('should map case and whitespace variants to the same key', () => {
    expect(cacheKey('Team  Collab')).toBe(cacheKey('team collab'));
    expect(cacheKey('  TEAM\tcollab\n')).toBe(cacheKey('team collab'));
  });

  it('should be a sha256 hex digest', () => {
    expect(cacheKey('office workspace')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('should separate different queries', () => {
    expect(cacheKey('team collab')).not.toBe(cacheKey('team collaboration'));
  });

  it('should normalize queries', () => {
    expect(normalizeQuery('  Coffee   Shop ')).toBe('coffee shop');
  });
});

describe('ClipCache', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'clip-cache-'));
  });

  afterEach(async () => {
    await fs.promises.rm(rootDir, { recursive: true, force: true });
  });

  describe('resolve', () => {
    it('should fetch on a miss and store the clip under its key', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher(8);

      const entry = await cache.resolve('Team Collab', fetcher, { minDurationSeconds: 3.5 });

      expect(calls).toHaveLength(1);
      expect(calls[0].query).toBe('team collab');
      expect(calls[0].minDurationSeconds).toBe(3.5);
      expect(entry.key).toBe(cacheKey('team collab'));
      expect(entry.localPath).toBe(path.join(rootDir, `${entry.key}.mp4`));
      expect(entry.sourceDurationSeconds).toBe(8);
      expect(entry.sourceUrl).toBe('https://videos.example.com/clip.mp4');
      expect(await fs.promises.readFile(entry.localPath, 'utf-8')).toBe('fake-mp4-bytes');
    });

    it('should serve later calls from the cache', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher();

      await cache.resolve('team collab', fetcher);
      const second = await cache.resolveDetailed('TEAM  COLLAB', fetcher);

      expect(calls).toHaveLength(1);
      expect(second.cacheHit).toBe(true);
    });

    it('should issue one fetch for concurrent callers of the same key', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher();

      const entries = await Promise.all([
        cache.resolve('Team Collab', fetcher),
        cache.resolve('team  collab', fetcher),
        cache.resolve('TEAM COLLAB', fetcher),
        cache.fetch('team collab', fetcher),
      ]);

      expect(calls).toHaveLength(1);
      expect(new Set(entries.map((e) => e.localPath)).size).toBe(1);
    });

    it('should fetch distinct keys independently', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher();

      await Promise.all([cache.resolve('coffee', fetcher), cache.resolve('laptop', fetcher)]);

      expect(calls.map((c) => c.query).sort()).toEqual(['coffee', 'laptop']);
      expect(cache.entries()).toHaveLength(2);
    });
  });

  describe('failures', () => {
    it('should raise ClipUnavailableError when nothing is found', async () => {
      const cache = await ClipCache.open(rootDir);
      const fetcher: ClipFetcher = async () => null;

      await expect(cache.resolve('unicorn office', fetcher)).rejects.toMatchObject({
        name: 'ClipUnavailableError',
        query: 'unicorn office',
        reason: 'no matching clip found',
      });
    });

    it('should carry the collaborator error as the reason', async () => {
      const cache = await ClipCache.open(rootDir);
      const fetcher: ClipFetcher = async () => {
        throw new Error('Rate limit exceeded (429)');
      };

      const result = cache.resolve('city', fetcher);

      await expect(result).rejects.toBeInstanceOf(ClipUnavailableError);
      await expect(result).rejects.toMatchObject({ reason: 'Rate limit exceeded (429)' });
    });

    it('should not remember failures', async () => {
      const cache = await ClipCache.open(rootDir);
      let attempts = 0;
      const { fetcher: working } = fakeFetcher();
      const flaky: ClipFetcher = async (request) => {
        attempts++;
        return attempts === 1 ? null : working(request);
      };

      await expect(cache.resolve('beach', flaky)).rejects.toBeInstanceOf(ClipUnavailableError);
      const entry = await cache.resolve('beach', flaky);

      expect(attempts).toBe(2);
      expect(entry.query).toBe('beach');
    });

    it('should map a full disk to CacheWriteError and leave no partial file', async () => {
      const cache = await ClipCache.open(rootDir);
      const fetcher: ClipFetcher = async (request) => {
        await fs.promises.writeFile(request.destinationPath, 'half');
        throw Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
      };

      await expect(cache.resolve('mountains', fetcher)).rejects.toBeInstanceOf(CacheWriteError);
      expect(await fs.promises.readdir(rootDir)).toEqual([]);
    });

    it('should find a full disk under a wrapping error', async () => {
      const cache = await ClipCache.open(rootDir);
      const diskFull = Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
      const fetcher: ClipFetcher = async () => {
        throw new Error('Download failed', { cause: diskFull });
      };

      await expect(cache.resolve('glacier', fetcher)).rejects.toBeInstanceOf(CacheWriteError);
    });

    it('should reject a fetch that wrote nothing', async () => {
      const cache = await ClipCache.open(rootDir);
      const fetcher: ClipFetcher = async () => ({ durationSeconds: 5 });

      await expect(cache.resolve('forest', fetcher)).rejects.toMatchObject({ reason: 'clip source wrote no data' });
    });

    it('should reject an empty query', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher();

      await expect(cache.resolve('   ', fetcher)).rejects.toBeInstanceOf(ClipUnavailableError);
      expect(calls).toHaveLength(0);
    });
  });

  describe('cancellation', () => {
    it('should detach a cancelled waiter without aborting the shared fetch', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher: write } = fakeFetcher();
      const release = gate();
      const calls: string[] = [];
      const slow: ClipFetcher = async (request) => {
        calls.push(request.query);
        await release.promise;
        return write(request);
      };

      const controller = new AbortController();
      const cancelled = cache.resolve('skyline', slow, { signal: controller.signal });
      const patient = cache.resolve('skyline', slow);
      await vi.waitFor(() => expect(calls).toHaveLength(1));

      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(JobCancelledError);

      release.open();
      const entry = await patient;

      expect(calls).toEqual(['skyline']);
      expect(entry.query).toBe('skyline');
    });

    it('should let the fetch land when its only waiter cancels', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher: write } = fakeFetcher();
      const release = gate();
      let started = false;
      const slow: ClipFetcher = async (request) => {
        started = true;
        await release.promise;
        return write(request);
      };

      const controller = new AbortController();
      const cancelled = cache.resolve('harbor', slow, { signal: controller.signal });
      await vi.waitFor(() => expect(started).toBe(true));
      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(JobCancelledError);

      release.open();
      await cache.close();

      expect(await cache.lookup('harbor')).toMatchObject({ query: 'harbor', sourceDurationSeconds: 8 });
    });

    it('should not start a fetch for an already aborted signal', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher();
      const controller = new AbortController();
      controller.abort();

      await expect(cache.resolve('desert', fetcher, { signal: controller.signal })).rejects.toBeInstanceOf(
        JobCancelledError
      );
      expect(calls).toHaveLength(0);
    });
  });

  describe('lifecycle', () => {
    it('should persist entries across opens through the index', async () => {
      const first = await ClipCache.open(rootDir);
      const { fetcher } = fakeFetcher(6.5);
      await first.resolve('Night City', fetcher);
      await first.close();

      const second = await ClipCache.open(rootDir);
      const entry = await second.lookup('night city');

      expect(entry).toMatchObject({ query: 'night city', sourceDurationSeconds: 6.5 });
    });

    it('should reconcile the index with the files on disk', async () => {
      const goneKey = cacheKey('gone');
      const orphanKey = cacheKey('orphan');
      await fs.promises.writeFile(
        path.join(rootDir, 'index.json'),
        JSON.stringify({
          version: 1,
          entries: [{ key: goneKey, query: 'gone', sourceDurationSeconds: 3, fetchedAt: '2024-01-01T00:00:00.000Z' }],
        })
      );
      await fs.promises.writeFile(path.join(rootDir, `${orphanKey}.mp4`), 'orphan-bytes');
      await fs.promises.writeFile(path.join(rootDir, `${orphanKey}.stale.tmp`), 'partial');

      const cache = await ClipCache.open(rootDir, { probeDuration: async () => 4.2 });

      expect(cache.entries()).toHaveLength(1);
      expect(cache.entries()[0]).toMatchObject({ key: orphanKey, query: '', sourceDurationSeconds: 4.2 });
      expect((await fs.promises.readdir(rootDir)).sort()).toEqual([`${orphanKey}.mp4`, 'index.json'].sort());

      const index: unknown = JSON.parse(await fs.promises.readFile(path.join(rootDir, 'index.json'), 'utf-8'));
      expect(index).toMatchObject({ version: 1, entries: [{ key: orphanKey, sourceDurationSeconds: 4.2 }] });
    });

    it('should fetch again over an unindexed clip when opened without a prober', async () => {
      const orphanKey = cacheKey('harbor');
      await fs.promises.writeFile(path.join(rootDir, `${orphanKey}.mp4`), 'old-bytes');

      const cache = await ClipCache.open(rootDir);
      const { fetcher, calls } = fakeFetcher(5);
      const entry = await cache.resolve('harbor', fetcher);

      expect(calls).toHaveLength(1);
      expect(entry.sourceDurationSeconds).toBe(5);
      expect(await fs.promises.readFile(entry.localPath, 'utf-8')).toBe('fake-mp4-bytes');
    });

    it('should serve an adopted clip without fetching', async () => {
      const orphanKey = cacheKey('harbor');
      await fs.promises.writeFile(path.join(rootDir, `${orphanKey}.mp4`), 'old-bytes');

      const cache = await ClipCache.open(rootDir, { probeDuration: async () => 7 });
      const { fetcher, calls } = fakeFetcher();
      const entry = await cache.resolve('harbor', fetcher);

      expect(calls).toHaveLength(0);
      expect(entry).toMatchObject({ key: orphanKey, sourceDurationSeconds: 7 });
    });

    it('should rebuild from a corrupt index', async () => {
      await fs.promises.writeFile(path.join(rootDir, 'index.json'), '{not json');

      const cache = await ClipCache.open(rootDir);

      expect(cache.entries()).toEqual([]);
      const index: unknown = JSON.parse(await fs.promises.readFile(path.join(rootDir, 'index.json'), 'utf-8'));
      expect(index).toEqual({ version: 1, entries: [] });
    });

    it('should clear every clip and the index', async () => {
      const cache = await ClipCache.open(rootDir);
      const { fetcher } = fakeFetcher();
      await cache.resolve('one', fetcher);
      await cache.resolve('two', fetcher);

      const removed = await cache.clear();

      expect(removed).toBe(2);
      expect(cache.entries()).toEqual([]);
      expect(await fs.promises.readdir(rootDir)).toEqual([]);
    });
  });
});
