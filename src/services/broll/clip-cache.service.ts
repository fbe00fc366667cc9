// ===========================================================================
// Clip Cache
//
// Content-addressed store of fetched B-roll clips, shared by every job in the
// process:
//
//   query ─normalize─> "team collab" ─sha256─> <key> ─> <root>/<key>.mp4
//
// Guarantees:
//   - One fetch per key at a time. Concurrent callers for the same key wait
//     on the same in-flight promise instead of issuing a duplicate download.
//   - Clips land via <key>.<uuid>.tmp + rename, so a reader never sees a
//     partial file.
//   - A caller's AbortSignal detaches only that caller. The shared fetch runs
//     to completion for everyone else (and for the next run).
//   - Failed fetches are not remembered; the next call retries.
//
// index.json is an accelerator. The clip files are the source of truth and
// the index is reconciled against them when the cache is opened.
// ===========================================================================

import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { logger } from '../../config/logger';
import {
  CacheWriteError,
  ClipUnavailableError,
  cancellationError,
  errnoCode,
  errorMessage,
  writeErrnoCode,
} from '../../utils/errors';

export interface CacheEntry {
  key: string;
  /** Normalized query; empty for clips adopted from disk without an index entry */
  query: string;
  localPath: string;
  sourceDurationSeconds: number;
  /** ISO timestamp */
  fetchedAt: string;
  sourceUrl?: string;
}

/** What the clip source is asked to do: write one clip to destinationPath. */
export interface ClipFetchRequest {
  query: string;
  destinationPath: string;
  minDurationSeconds?: number;
}

export interface ClipFetchResult {
  durationSeconds: number;
  sourceUrl?: string;
}

/** External clip-sourcing collaborator. null means "nothing usable found". */
export type ClipFetcher = (request: ClipFetchRequest) => Promise<ClipFetchResult | null>;

export type DurationProber = (filePath: string) => Promise<number>;

export interface ClipCacheOptions {
  /**
   * Used to adopt clips found on disk without an index entry. Without it such
   * clips stay unknown and their queries are fetched again over them; pass
   * one whenever the cache serves renders.
   */
  probeDuration?: DurationProber;
  /** Maintain index.json. Default: true */
  useIndex?: boolean;
}

export interface ResolveOptions {
  signal?: AbortSignal;
  /** Forwarded to the fetcher; the first caller for a key decides */
  minDurationSeconds?: number;
}

export interface ResolveResult {
  entry: CacheEntry;
  cacheHit: boolean;
}

const INDEX_FILE = 'index.json';
const CLIP_EXTENSION = '.mp4';
const TEMP_EXTENSION = '.tmp';
const CLIP_FILE_PATTERN = /^[0-9a-f]{64}\.mp4$/;

const CacheIndexSchema = z.object({
  version: z.literal(1),
  entries: z.array(
    z.object({
      key: z.string().regex(/^[0-9a-f]{64}$/),
      query: z.string(),
      sourceDurationSeconds: z.number().positive(),
      fetchedAt: z.string(),
      sourceUrl: z.string().optional(),
    })
  ),
});
type CacheIndex = z.infer<typeof CacheIndexSchema>;

/** Lower-case, trim, collapse runs of whitespace. */
export function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** SHA-256 hex digest of the normalized query. */
export function cacheKey(query: string): string {
  return createHash('sha256').update(normalizeQuery(query), 'utf8').digest('hex');
}

export class ClipCache {
  private readonly entryMap = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<CacheEntry>>();
  private indexWrite: Promise<void> = Promise.resolve();

  private constructor(
    public readonly rootDir: string,
    private readonly options: ClipCacheOptions
  ) {}

  /**
   * Open (creating if needed) the cache rooted at rootDir and reconcile the
   * index with the files actually present. Unindexed clips are adopted only
   * when `options.probeDuration` is set.
   */
  static async open(rootDir: string, options: ClipCacheOptions = {}): Promise<ClipCache> {
    const cache = new ClipCache(path.resolve(rootDir), options);

    try {
      await fs.promises.mkdir(cache.rootDir, { recursive: true });
    } catch (err) {
      throw new CacheWriteError(cache.rootDir, errorMessage(err), err);
    }

    await cache.reconcile();
    return cache;
  }

  clipPath(key: string): string {
    return path.join(this.rootDir, `${key}${CLIP_EXTENSION}`);
  }

  /** Cached entry for a query, if its clip is still on disk. Never fetches. */
  async lookup(query: string): Promise<CacheEntry | undefined> {
    const key = cacheKey(query);
    const entry = this.entryMap.get(key);
    if (!entry) return undefined;

    if (await isUsableFile(entry.localPath)) {
      return entry;
    }

    logger.warn('Cached clip vanished from disk; dropping entry', { key, query: entry.query });
    this.entryMap.delete(key);
    await this.persistIndex();
    return undefined;
  }

  async resolve(query: string, fetchFn: ClipFetcher, options: ResolveOptions = {}): Promise<CacheEntry> {
    const { entry } = await this.resolveDetailed(query, fetchFn, options);
    return entry;
  }

  /** resolve, also reporting whether the clip came from the cache. */
  async resolveDetailed(query: string, fetchFn: ClipFetcher, options: ResolveOptions = {}): Promise<ResolveResult> {
    throwIfAborted(options.signal);

    const cached = await this.lookup(query);
    if (cached) {
      logger.debug('Clip cache hit', { query: normalizeQuery(query), key: cached.key });
      return { entry: cached, cacheHit: true };
    }

    const entry = await this.fetch(query, fetchFn, options);
    return { entry, cacheHit: false };
  }

  /**
   * Fetch through the collaborator, joining an in-flight fetch for the same
   * key if there is one.
   */
  fetch(query: string, fetchFn: ClipFetcher, options: ResolveOptions = {}): Promise<CacheEntry> {
    const normalized = normalizeQuery(query);
    if (!normalized) {
      return Promise.reject(new ClipUnavailableError(query, 'empty search query'));
    }

    const key = cacheKey(normalized);
    let shared = this.inFlight.get(key);

    const existing = this.entryMap.get(key);
    if (!shared && existing) {
      // Landed between the caller's lookup and now
      return Promise.resolve(existing);
    }

    if (shared) {
      logger.debug('Joining in-flight clip fetch', { query: normalized, key });
    } else {
      shared = this.runFetch(key, normalized, fetchFn, options.minDurationSeconds).finally(() => {
        this.inFlight.delete(key);
      });
      this.inFlight.set(key, shared);
    }

    return waitWithSignal(shared, options.signal);
  }

  /** Snapshot of every entry, ordered by key. */
  entries(): CacheEntry[] {
    return [...this.entryMap.values()].sort((a, b) => a.key.localeCompare(b.key));
  }

  /** Remove every clip and the index. Manual maintenance only. */
  async clear(): Promise<number> {
    await Promise.allSettled([...this.inFlight.values()]);
    await this.indexWrite;

    const names = await fs.promises.readdir(this.rootDir);
    let removed = 0;
    for (const name of names) {
      if (CLIP_FILE_PATTERN.test(name) || name === INDEX_FILE) {
        await fs.promises.rm(path.join(this.rootDir, name), { force: true });
        if (name !== INDEX_FILE) removed++;
      }
    }

    this.entryMap.clear();
    logger.info(`Clip cache cleared: ${removed} clip(s) removed`, { rootDir: this.rootDir });
    return removed;
  }

  /** Wait for in-flight fetches and pending index writes. */
  async close(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
    await this.indexWrite;
    logger.debug('Clip cache closed', { rootDir: this.rootDir, entries: this.entryMap.size });
  }

  // -------------------------------------------------------------------------
  // Fetch
  // -------------------------------------------------------------------------

  private async runFetch(
    key: string,
    query: string,
    fetchFn: ClipFetcher,
    minDurationSeconds: number | undefined
  ): Promise<CacheEntry> {
    const finalPath = this.clipPath(key);
    const tempPath = path.join(this.rootDir, `${key}.${uuidv4()}${TEMP_EXTENSION}`);
    const startTime = Date.now();

    logger.info(`Fetching B-roll clip for "${query}"`, { key, minDurationSeconds });

    let result: ClipFetchResult | null;
    try {
      result = await fetchFn({ query, destinationPath: tempPath, minDurationSeconds });
    } catch (err) {
      await removeTemp(tempPath);
      const code = writeErrnoCode(err);
      if (code) {
        throw new CacheWriteError(tempPath, code, err);
      }
      throw new ClipUnavailableError(query, errorMessage(err), err);
    }

    if (!result) {
      await removeTemp(tempPath);
      throw new ClipUnavailableError(query, 'no matching clip found');
    }
    if (!(result.durationSeconds > 0)) {
      await removeTemp(tempPath);
      throw new ClipUnavailableError(query, `clip source reported duration ${result.durationSeconds}`);
    }
    if (!(await isUsableFile(tempPath))) {
      await removeTemp(tempPath);
      throw new ClipUnavailableError(query, 'clip source wrote no data');
    }

    try {
      await fs.promises.rename(tempPath, finalPath);
    } catch (err) {
      await removeTemp(tempPath);
      throw new CacheWriteError(finalPath, errnoCode(err) ?? errorMessage(err), err);
    }

    const entry: CacheEntry = {
      key,
      query,
      localPath: finalPath,
      sourceDurationSeconds: result.durationSeconds,
      fetchedAt: new Date().toISOString(),
      ...(result.sourceUrl ? { sourceUrl: result.sourceUrl } : {}),
    };
    this.entryMap.set(key, entry);
    await this.persistIndex();

    logger.info(`Cached B-roll clip for "${query}"`, {
      key,
      duration: result.durationSeconds.toFixed(2),
      elapsedMs: Date.now() - startTime,
    });

    return entry;
  }

  // -------------------------------------------------------------------------
  // Index
  // -------------------------------------------------------------------------

  private async reconcile(): Promise<void> {
    const names = await fs.promises.readdir(this.rootDir);
    let changed = false;

    // Leftovers from a crash mid-download or mid-index-write
    const temps = names.filter((n) => n.endsWith(TEMP_EXTENSION));
    for (const name of temps) {
      await fs.promises.rm(path.join(this.rootDir, name), { force: true });
    }
    if (temps.length > 0) {
      logger.warn(`Removed ${temps.length} partial file(s) from clip cache`, { rootDir: this.rootDir });
    }

    const index = this.options.useIndex === false ? null : await this.readIndex();
    if (index === undefined) changed = true;

    for (const item of index?.entries ?? []) {
      const localPath = this.clipPath(item.key);
      if (await isUsableFile(localPath)) {
        this.entryMap.set(item.key, { ...item, localPath });
      } else {
        logger.warn('Dropping index entry without a clip file', { key: item.key, query: item.query });
        changed = true;
      }
    }

    const orphans = names.filter((n) => CLIP_FILE_PATTERN.test(n) && !this.entryMap.has(n.slice(0, 64)));
    for (const name of orphans) {
      const adopted = await this.adopt(name);
      if (adopted) changed = true;
    }

    if (changed) {
      await this.persistIndex();
    }

    logger.info('Clip cache opened', { rootDir: this.rootDir, entries: this.entryMap.size });
  }

  /** Index from disk: null when absent, undefined when unreadable. */
  private async readIndex(): Promise<CacheIndex | null | undefined> {
    const indexPath = path.join(this.rootDir, INDEX_FILE);
    let raw: string;
    try {
      raw = await fs.promises.readFile(indexPath, 'utf-8');
    } catch (err) {
      if (errnoCode(err) === 'ENOENT') return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      logger.warn(`Clip cache index is not valid JSON; rebuilding: ${errorMessage(err)}`, { indexPath });
      return undefined;
    }

    const parsed = CacheIndexSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Clip cache index has an unexpected shape; rebuilding', {
        indexPath,
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
      return undefined;
    }
    return parsed.data;
  }

  private async adopt(fileName: string): Promise<boolean> {
    const localPath = path.join(this.rootDir, fileName);
    const key = fileName.slice(0, 64);

    if (!this.options.probeDuration) {
      logger.warn('Unindexed clip left in place (no duration prober configured)', { key });
      return false;
    }

    const stats = await fs.promises.stat(localPath);
    if (stats.size === 0) return false;

    let sourceDurationSeconds: number;
    try {
      sourceDurationSeconds = await this.options.probeDuration(localPath);
    } catch (err) {
      logger.warn(`Could not probe unindexed clip: ${errorMessage(err)}`, { key });
      return false;
    }

    this.entryMap.set(key, {
      key,
      query: '',
      localPath,
      sourceDurationSeconds,
      fetchedAt: stats.mtime.toISOString(),
    });
    logger.info('Adopted unindexed clip', { key, duration: sourceDurationSeconds.toFixed(2) });
    return true;
  }

  /** Queue an index rewrite behind any pending one. */
  private persistIndex(): Promise<void> {
    if (this.options.useIndex === false) return this.indexWrite;
    this.indexWrite = this.indexWrite.then(() => this.writeIndex());
    return this.indexWrite;
  }

  private async writeIndex(): Promise<void> {
    const indexPath = path.join(this.rootDir, INDEX_FILE);
    const tempPath = `${indexPath}${TEMP_EXTENSION}`;
    const index: CacheIndex = {
      version: 1,
      entries: this.entries().map(({ key, query, sourceDurationSeconds, fetchedAt, sourceUrl }) => ({
        key,
        query,
        sourceDurationSeconds,
        fetchedAt,
        ...(sourceUrl ? { sourceUrl } : {}),
      })),
    };

    try {
      await fs.promises.writeFile(tempPath, `${JSON.stringify(index, null, 2)}\n`, 'utf-8');
      await fs.promises.rename(tempPath, indexPath);
    } catch (err) {
      // Clips stay authoritative; the next open rebuilds what it can
      logger.warn(`Failed to write clip cache index: ${errorMessage(err)}`, { indexPath });
      await removeTemp(tempPath);
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function isUsableFile(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return false;
    throw err;
  }
}

async function removeTemp(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (err) {
    logger.warn(`Failed to remove temp file: ${errorMessage(err)}`, { filePath });
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancellationError(signal);
  }
}

/**
 * Wait on a shared promise, bailing out when this caller's signal aborts.
 * The shared promise keeps running either way.
 */
function waitWithSignal<T>(shared: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return shared;

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(cancellationError(signal));
    }

    const onAbort = (): void => {
      reject(cancellationError(signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    shared.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
