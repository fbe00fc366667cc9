import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';

/**
 * Load .env from the working directory or its parent so env vars are available
 * whether the composer runs from the repo root or from a nested tool directory.
 */
export function loadEnv(): void {
  const cwd = process.cwd();
  const candidates = [
    path.join(cwd, '.env'),
    path.join(cwd, '..', '.env'),
  ];

  for (const envPath of candidates) {
    if (fs.existsSync(envPath)) {
      const result = dotenv.config({ path: envPath });
      if (result.error && process.env.NODE_ENV === 'development') {
        console.warn(`[env] Warning loading ${envPath}:`, result.error.message);
      }
      return;
    }
  }
}

/** Process-level settings read from the environment. */
export interface EnvSettings {
  pexelsApiKey: string;
  pexelsApiUrl: string;
  clipCacheDir: string;
  concurrency: number;
  /** 0 disables the per-job timeout */
  jobTimeoutSeconds: number;
  redisUrl: string;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`Environment variable ${name} must be a number >= ${min}, got "${raw}"`);
  }
  return value;
}

export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const cwd = process.cwd();
  return {
    pexelsApiKey: env.PEXELS_API_KEY || '',
    pexelsApiUrl: env.PEXELS_API_URL || 'https://api.pexels.com/videos',
    clipCacheDir: path.resolve(cwd, env.CLIP_CACHE_DIR || path.join('data', 'cache', 'broll')),
    concurrency: Math.floor(readNumber(env, 'COMPOSER_CONCURRENCY', 2, 1)),
    jobTimeoutSeconds: readNumber(env, 'JOB_TIMEOUT_SECONDS', 0, 0),
    redisUrl: env.REDIS_URL || 'redis://localhost:6379',
  };
}
