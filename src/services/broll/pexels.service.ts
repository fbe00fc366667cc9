import axios, { type AxiosInstance } from 'axios';
import fs from 'fs';
import { z } from 'zod';
import { logger } from '../../config/logger';
import { errorMessage, writeErrnoCode } from '../../utils/errors';
import type { ClipFetchRequest, ClipFetchResult, ClipFetcher } from './clip-cache.service';

/** Pexels free tier: 200 requests per hour. */
const DEFAULT_RATE_LIMIT = { maxRequests: 200, windowMs: 60 * 60 * 1000 };
const DOWNLOAD_ATTEMPTS = 3;
const SEARCH_TIMEOUT_MS = 10000;
const DOWNLOAD_TIMEOUT_MS = 30000;
const MAX_PER_PAGE = 80;

export const CLIP_QUALITIES = ['sd', 'hd', 'uhd'] as const;
export type ClipQuality = (typeof CLIP_QUALITIES)[number];

/** Preferred file width per quality tier */
const QUALITY_WIDTHS: Record<ClipQuality, number> = {
  sd: 640,
  hd: 1280,
  uhd: 1920,
};

const PexelsVideoFileSchema = z.object({
  quality: z.string().nullable().optional(),
  width: z.number().nullable().optional(),
  height: z.number().nullable().optional(),
  link: z.string().min(1),
});

const PexelsVideoSchema = z.object({
  id: z.number(),
  duration: z.number(),
  url: z.string().optional(),
  video_files: z.array(PexelsVideoFileSchema).default([]),
});

const PexelsSearchResponseSchema = z.object({
  videos: z.array(PexelsVideoSchema).default([]),
});

export type PexelsVideoFile = z.infer<typeof PexelsVideoFileSchema>;
export type PexelsVideo = z.infer<typeof PexelsVideoSchema>;

export interface ClipMatch {
  video: PexelsVideo;
  file: PexelsVideoFile;
}

export interface PexelsClipSourceOptions {
  apiKey: string;
  /** Default: https://api.pexels.com/videos */
  apiUrl?: string;
  quality?: ClipQuality;
  resultsPerQuery?: number;
  orientation?: 'portrait' | 'landscape' | 'square';
  rateLimit?: { maxRequests: number; windowMs: number };
  /** First retry delay; doubles per attempt. Default: 1000 */
  retryDelayMs?: number;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Rate limiting
// ---------------------------------------------------------------------------

/**
 * Sliding-window limiter. A caller that would exceed the window waits until
 * the oldest request in it expires.
 */
export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {}

  async acquire(): Promise<void> {
    for (;;) {
      const current = this.now();
      this.timestamps = this.timestamps.filter((t) => current - t < this.windowMs);

      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(current);
        return;
      }

      const waitMs = this.timestamps[0] + this.windowMs - current;
      logger.warn(`Pexels rate limit reached; waiting ${(waitMs / 1000).toFixed(0)}s`, {
        requestsInWindow: this.timestamps.length,
      });
      await this.sleep(waitMs);
    }
  }

  /** Requests left in the current window. */
  remaining(): number {
    const current = this.now();
    return this.maxRequests - this.timestamps.filter((t) => current - t < this.windowMs).length;
  }
}

// ---------------------------------------------------------------------------
// Matching
// ---------------------------------------------------------------------------

/** File of the given quality, exact tier width first. */
export function findQualityFile(files: readonly PexelsVideoFile[], quality: ClipQuality): PexelsVideoFile | undefined {
  const targetWidth = QUALITY_WIDTHS[quality];
  return (
    files.find((f) => f.quality === quality && f.width === targetWidth) ?? files.find((f) => f.quality === quality)
  );
}

/**
 * First video at least durationNeeded long carrying a file of the requested
 * quality; failing that, the first long-enough video with any hd file.
 */
export function findBestMatch(
  videos: readonly PexelsVideo[],
  durationNeeded: number,
  quality: ClipQuality
): ClipMatch | undefined {
  const longEnough = videos.filter((v) => v.duration >= durationNeeded);

  for (const video of longEnough) {
    const file = findQualityFile(video.video_files, quality);
    if (file) return { video, file };
  }

  for (const video of longEnough) {
    const file = findQualityFile(video.video_files, 'hd');
    if (file) return { video, file };
  }

  return undefined;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

/**
 * Pexels video search + download, shaped as the clip cache's fetch collaborator.
 * @see https://www.pexels.com/api/documentation/#videos-search
 */
export class PexelsClipSource {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly quality: ClipQuality;
  private readonly resultsPerQuery: number;
  private readonly orientation: 'portrait' | 'landscape' | 'square';
  private readonly retryDelayMs: number;
  private readonly http: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly limiter: SlidingWindowRateLimiter;

  constructor(options: PexelsClipSourceOptions) {
    this.apiKey = options.apiKey;
    this.apiUrl = (options.apiUrl || 'https://api.pexels.com/videos').replace(/\/+$/, '');
    this.quality = options.quality || 'hd';
    this.resultsPerQuery = Math.min(options.resultsPerQuery || 5, MAX_PER_PAGE);
    this.orientation = options.orientation || 'portrait';
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.http = options.http || axios.create();
    this.sleep = options.sleep || defaultSleep;

    const rateLimit = options.rateLimit || DEFAULT_RATE_LIMIT;
    this.limiter = new SlidingWindowRateLimiter(rateLimit.maxRequests, rateLimit.windowMs, options.now, this.sleep);

    if (!this.apiKey) {
      logger.warn('Pexels API key not configured (PEXELS_API_KEY)');
    }
  }

  isConfigured(): boolean {
    return this.apiKey.length > 0;
  }

  /** Search videos. Throws on non-2xx (including 429) and malformed bodies. */
  async search(query: string): Promise<PexelsVideo[]> {
    if (!this.isConfigured()) {
      throw new Error('Pexels API key is not configured');
    }

    await this.limiter.acquire();

    const response = await this.http.get<unknown>(`${this.apiUrl}/search`, {
      headers: { Authorization: this.apiKey },
      params: { query, per_page: this.resultsPerQuery, orientation: this.orientation },
      timeout: SEARCH_TIMEOUT_MS,
      validateStatus: () => true,
    });

    if (response.status === 429) {
      throw new Error('Rate limit exceeded (429)');
    }
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`Pexels API error ${response.status}`);
    }

    const parsed = PexelsSearchResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(
        `Unexpected Pexels response: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
      );
    }

    logger.debug(`Pexels returned ${parsed.data.videos.length} video(s) for "${query}"`, {
      remainingRequests: this.limiter.remaining(),
    });
    return parsed.data.videos;
  }

  /** Download with exponential backoff between attempts. Local write failures are rethrown at once. */
  async download(url: string, destinationPath: string): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= DOWNLOAD_ATTEMPTS; attempt++) {
      try {
        const response = await this.http.get<ArrayBuffer>(url, {
          responseType: 'arraybuffer',
          timeout: DOWNLOAD_TIMEOUT_MS,
        });
        await fs.promises.writeFile(destinationPath, Buffer.from(response.data));
        logger.debug('Clip download complete', { url, attempt });
        return;
      } catch (err) {
        // The local disk will not recover between attempts
        if (writeErrnoCode(err)) throw err;
        lastError = err;
        if (attempt < DOWNLOAD_ATTEMPTS) {
          const waitMs = this.retryDelayMs * 2 ** (attempt - 1);
          logger.warn(
            `Clip download failed (attempt ${attempt}/${DOWNLOAD_ATTEMPTS}), retrying in ${waitMs}ms: ${errorMessage(err)}`
          );
          await this.sleep(waitMs);
        }
      }
    }

    throw new Error(`Download failed after ${DOWNLOAD_ATTEMPTS} attempts: ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }

  /** ClipFetcher for the clip cache. Bound so it can be passed around directly. */
  readonly fetchClip: ClipFetcher = async (request: ClipFetchRequest): Promise<ClipFetchResult | null> => {
    const durationNeeded = request.minDurationSeconds ?? 0;
    const videos = await this.search(request.query);

    if (videos.length === 0) {
      logger.warn(`No Pexels results for "${request.query}"`);
      return null;
    }

    const match = findBestMatch(videos, durationNeeded, this.quality);
    if (!match) {
      logger.warn(`No Pexels video for "${request.query}" is at least ${durationNeeded.toFixed(1)}s long`, {
        candidates: videos.length,
      });
      return null;
    }

    await this.download(match.file.link, request.destinationPath);

    return { durationSeconds: match.video.duration, sourceUrl: match.video.url || match.file.link };
  };
}
