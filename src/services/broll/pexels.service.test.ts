import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheWriteError } from '../../utils/errors';
import { ClipCache } from './clip-cache.service';
import {
  PexelsClipSource,
  SlidingWindowRateLimiter,
  findBestMatch,
  type PexelsVideo,
} from './pexels.service';

type Route = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

/** axios instance answering from an in-process route instead of the network */
function stubHttp(route: Route): { http: ReturnType<typeof axios.create>; requests: InternalAxiosRequestConfig[] } {
  const requests: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      const { status, data } = route(config);
      return { data, status, statusText: String(status), headers: {}, config };
    },
  });
  return { http, requests };
}

function video(id: number, duration: number, files: PexelsVideo['video_files']): PexelsVideo {
  return { id, duration, url: `https://www.pexels.com/video/${id}/`, video_files: files };
}

const hdFile = (link: string, width = 1280) => ({ quality: 'hd', width, height: 720, link });
const sdFile = (link: string) => ({ quality: 'sd', width: 640, height: 360, link });

describe('findBestMatch', () => {
  it('should prefer the exact tier width', () => {
    const videos = [video(1, 10, [hdFile('https://cdn.example.com/1-wide.mp4', 1920), hdFile('https://cdn.example.com/1.mp4')])];

    expect(findBestMatch(videos, 5, 'hd')?.file.link).toBe('https://cdn.example.com/1.mp4');
  });

  it('should skip videos shorter than needed', () => {
    const videos = [video(1, 3, [hdFile('https://cdn.example.com/1.mp4')]), video(2, 9, [hdFile('https://cdn.example.com/2.mp4')])];

    expect(findBestMatch(videos, 5, 'hd')?.video.id).toBe(2);
  });

  it('should fall back to an hd file when the requested quality is missing', () => {
    const videos = [video(1, 10, [sdFile('https://cdn.example.com/1-sd.mp4'), hdFile('https://cdn.example.com/1-hd.mp4')])];

    expect(findBestMatch(videos, 5, 'uhd')?.file.link).toBe('https://cdn.example.com/1-hd.mp4');
  });

  it('should return undefined when nothing is long enough', () => {
    expect(findBestMatch([video(1, 2, [hdFile('https://cdn.example.com/1.mp4')])], 5, 'hd')).toBeUndefined();
  });
});

describe('PexelsClipSource', () => {
  let dir: string;
  let sleeps: number[];
  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pexels-'));
    sleeps = [];
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should search, pick a clip and download it to the destination', async () => {
    const { http, requests } = stubHttp((config) => {
      if (config.url === 'https://api.pexels.com/videos/search') {
        return { status: 200, data: { videos: [video(7, 12, [hdFile('https://cdn.example.com/7.mp4')])] } };
      }
      return { status: 200, data: Buffer.from('clip-bytes') };
    });
    const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });
    const destinationPath = path.join(dir, 'clip.tmp');

    const result = await source.fetchClip({ query: 'team collab', destinationPath, minDurationSeconds: 6 });

    expect(result).toEqual({ durationSeconds: 12, sourceUrl: 'https://www.pexels.com/video/7/' });
    expect(await fs.promises.readFile(destinationPath, 'utf-8')).toBe('clip-bytes');
    expect(requests[0].params).toEqual({ query: 'team collab', per_page: 5, orientation: 'portrait' });
    expect(requests[0].headers.Authorization).toBe('test-key');
    expect(requests[1].url).toBe('https://cdn.example.com/7.mp4');
  });

  it('should return null when the search is empty', async () => {
    const { http } = stubHttp(() => ({ status: 200, data: { videos: [] } }));
    const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });

    expect(await source.fetchClip({ query: 'nothing', destinationPath: path.join(dir, 'x.tmp') })).toBeNull();
  });

  it('should return null when every result is too short', async () => {
    const { http, requests } = stubHttp(() => ({
      status: 200,
      data: { videos: [video(1, 2, [hdFile('https://cdn.example.com/1.mp4')])] },
    }));
    const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });

    expect(
      await source.fetchClip({ query: 'brief', destinationPath: path.join(dir, 'x.tmp'), minDurationSeconds: 8 })
    ).toBeNull();
    expect(requests).toHaveLength(1);
  });

  it('should surface HTTP 429 as an error', async () => {
    const { http } = stubHttp(() => ({ status: 429, data: { error: 'too many' } }));
    const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });

    await expect(source.fetchClip({ query: 'busy', destinationPath: path.join(dir, 'x.tmp') })).rejects.toThrow(
      'Rate limit exceeded (429)'
    );
  });

  it('should surface other error statuses', async () => {
    const { http } = stubHttp(() => ({ status: 503, data: '' }));
    const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });

    await expect(source.search('down')).rejects.toThrow('Pexels API error 503');
  });

  it('should refuse to search without an API key', async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: { videos: [] } }));
    const source = new PexelsClipSource({ apiKey: '', http, sleep });

    await expect(source.search('anything')).rejects.toThrow('Pexels API key is not configured');
    expect(requests).toHaveLength(0);
  });

  describe('download', () => {
    it('should retry with exponential backoff', async () => {
      let attempts = 0;
      const http = axios.create({
        adapter: async (config): Promise<AxiosResponse> => {
          attempts++;
          if (attempts < 3) throw new Error('socket hang up');
          return { data: Buffer.from('third-time'), status: 200, statusText: 'OK', headers: {}, config };
        },
      });
      const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });
      const destinationPath = path.join(dir, 'retry.tmp');

      await source.download('https://cdn.example.com/flaky.mp4', destinationPath);

      expect(attempts).toBe(3);
      expect(sleeps).toEqual([1000, 2000]);
      expect(await fs.promises.readFile(destinationPath, 'utf-8')).toBe('third-time');
    });

    it.skipIf(!fs.existsSync('/dev/full'))('should not retry when the local disk is full', async () => {
      const { http, requests } = stubHttp(() => ({ status: 200, data: Buffer.from('clip-bytes') }));
      const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });

      await expect(source.download('https://cdn.example.com/big.mp4', '/dev/full')).rejects.toMatchObject({
        code: 'ENOSPC',
      });
      expect(requests).toHaveLength(1);
      expect(sleeps).toEqual([]);
    });

    it('should give up after three attempts', async () => {
      const http = axios.create({
        adapter: async (): Promise<AxiosResponse> => {
          throw new Error('connection reset');
        },
      });
      const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep });

      await expect(source.download('https://cdn.example.com/gone.mp4', path.join(dir, 'gone.tmp'))).rejects.toThrow(
        'Download failed after 3 attempts: connection reset'
      );
      expect(sleeps).toEqual([1000, 2000]);
    });
  });
});

describe('SlidingWindowRateLimiter', () => {
  it('should wait for the oldest request to leave the window', async () => {
    let clock = 0;
    const waits: number[] = [];
    const limiter = new SlidingWindowRateLimiter(
      2,
      1000,
      () => clock,
      async (ms) => {
        waits.push(ms);
        clock += ms;
      }
    );

    await limiter.acquire();
    clock = 200;
    await limiter.acquire();
    clock = 500;
    await limiter.acquire();

    expect(waits).toEqual([500]);
    expect(clock).toBe(1000);
  });

  it('should report the remaining budget', async () => {
    const limiter = new SlidingWindowRateLimiter(3, 1000, () => 0);
    await limiter.acquire();

    expect(limiter.remaining()).toBe(2);
  });
});

describe('PexelsClipSource with ClipCache', () => {
  let rootDir: string;

  beforeEach(async () => {
    rootDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pexels-cache-'));
  });

  afterEach(async () => {
    await fs.promises.rm(rootDir, { recursive: true, force: true });
  });

  it.skipIf(!fs.existsSync('/dev/full'))('should fail a full-disk download as a cache write error', async () => {
    const { http, requests } = stubHttp((config) => {
      if (config.url === 'https://api.pexels.com/videos/search') {
        return { status: 200, data: { videos: [video(3, 10, [hdFile('https://cdn.example.com/3.mp4')])] } };
      }
      return { status: 200, data: Buffer.from('clip-bytes') };
    });
    const source = new PexelsClipSource({ apiKey: 'test-key', http, sleep: async () => undefined });
    const cache = await ClipCache.open(rootDir);

    const result = cache.resolve('city', (request) => source.fetchClip({ ...request, destinationPath: '/dev/full' }));

    await expect(result).rejects.toBeInstanceOf(CacheWriteError);
    await expect(result).rejects.toMatchObject({ details: { reason: 'ENOSPC' } });
    expect(requests.map((r) => r.url)).toEqual(['https://api.pexels.com/videos/search', 'https://cdn.example.com/3.mp4']);
    await cache.close();
  });
});
