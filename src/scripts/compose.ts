#!/usr/bin/env node
/**
 * Compose platform-ready reels from an avatar video, word timings and a B-roll plan.
 *
 * Usage:
 *   npm run compose -- --video avatar.mp4 --words words.json --output out/ --broll broll_plan.csv
 *   npm run compose -- --video avatar.mp4 --words words.json --output out/ --platform tiktok,youtube_shorts
 *   npm run compose -- --batch jobs.json        # Run every job in a manifest
 *   npm run compose -- --list-cache             # Show cached B-roll clips
 *   npm run compose -- --clear-cache            # Delete cached B-roll clips
 *
 * Environment:
 *   PEXELS_API_KEY for uncached cutaways, CLIP_CACHE_DIR, COMPOSER_CONCURRENCY,
 *   JOB_TIMEOUT_SECONDS and REDIS_URL (with --enqueue).
 */

import { loadEnv, readEnvSettings, type EnvSettings } from '../config/env';
loadEnv();

import fs from 'fs';
import path from 'path';
import { defaultComposerConfig, loadComposerConfig } from '../config/composer-config';
import { closeRedis, getCompositionQueue } from '../config/redis';
import { ClipCache } from '../services/broll/clip-cache.service';
import { createComposerRuntime } from '../services/composer.runtime';
import type { BatchJobResult, CompositionJob, JobResult } from '../services/composition.orchestrator';
import ffmpegRenderService from '../services/render/ffmpeg.service';
import type { CompositionJobSpec } from '../types/job.types';
import { AppError, errorMessage, PlanFormatError } from '../utils/errors';
import { loadCompositionJob, parseBatchManifest } from '../utils/job-inputs';
import { parseComposeArgs, UsageError, USAGE, type ComposeCommand } from './compose-args';

const RULE = '═══════════════════════════════════════════════════';

function describeError(err: unknown): string {
  return err instanceof AppError ? `[${err.code}] ${err.message}` : errorMessage(err);
}

function printJobResult(result: JobResult): void {
  const { report } = result;
  console.log(`  Job ${report.jobId}: ${report.totalDuration}s, ${report.segments} segment(s), ${report.cutaways} cutaway(s)`);
  console.log(`  Cache: ${report.cacheHits} hit(s), ${report.cacheMisses} miss(es)`);
  for (const skipped of report.skippedCutaways) {
    console.log(`  ⚠️  Skipped cutaway #${skipped.requestIndex} "${skipped.query}": ${skipped.reason}`);
  }
  for (const substituted of report.substitutedCutaways) {
    console.log(`  ⚠️  Default clip for #${substituted.requestIndex} "${substituted.query}": ${substituted.reason}`);
  }
  for (const warning of report.captionWarnings) {
    console.log(`  ⚠️  ${warning.message}`);
  }
  for (const [platform, file] of Object.entries(result.outputs)) {
    console.log(`  ✅ ${platform.padEnd(16)} ${file}`);
  }
  if (result.subtitles) console.log(`  📝 ${result.subtitles.srtPath}`);
  if (result.planPath) console.log(`  🗺️  ${result.planPath}`);
}

// Ctrl-C cancels running renders instead of orphaning ffmpeg
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n  Interrupted, cancelling...');
    controller.abort(new Error('Interrupted'));
  });
  return controller.signal;
}

async function listCache(env: EnvSettings): Promise<number> {
  const cache = await ClipCache.open(env.clipCacheDir, {
    probeDuration: (filePath) => ffmpegRenderService.probeDuration(filePath),
  });
  try {
    const entries = cache.entries();
    console.log(`\n📦 Clip cache: ${env.clipCacheDir}\n`);
    for (const entry of entries) {
      const query = entry.query || '(adopted)';
      console.log(`  - ${entry.key.slice(0, 12)}  ${entry.sourceDurationSeconds.toFixed(2).padStart(7)}s  ${query}`);
    }
    console.log(`\n  Total: ${entries.length} clip(s)\n`);
    return 0;
  } finally {
    await cache.close();
  }
}

async function clearCache(env: EnvSettings): Promise<number> {
  const cache = await ClipCache.open(env.clipCacheDir);
  try {
    const removed = await cache.clear();
    console.log(`\n🧹 Removed ${removed} cached clip(s) from ${env.clipCacheDir}\n`);
    return 0;
  } finally {
    await cache.close();
  }
}

async function enqueue(spec: CompositionJobSpec): Promise<number> {
  const cwd = process.cwd();
  // The worker may run elsewhere; absolute paths only
  const data: CompositionJobSpec = {
    ...spec,
    videoPath: path.resolve(cwd, spec.videoPath),
    wordsPath: path.resolve(cwd, spec.wordsPath),
    outputDir: path.resolve(cwd, spec.outputDir),
    ...(spec.configPath ? { configPath: path.resolve(cwd, spec.configPath) } : {}),
    ...(spec.brollPlanPath ? { brollPlanPath: path.resolve(cwd, spec.brollPlanPath) } : {}),
  };
  try {
    const job = await getCompositionQueue().add('compose', data);
    console.log(`\n📨 Enqueued composition job ${job.id}\n`);
    return 0;
  } finally {
    await closeRedis();
  }
}

async function runSingle(env: EnvSettings, spec: CompositionJobSpec): Promise<number> {
  const startTime = Date.now();
  console.log('\n🎬 Reel Composer');
  console.log(`${RULE}\n`);

  const job = await loadCompositionJob(spec);
  const runtime = await createComposerRuntime(env, job.config.broll);
  try {
    const result = await runtime.orchestrator.runJob(job, interruptSignal());
    printJobResult(result);
  } finally {
    await runtime.close();
  }

  console.log(`\n${RULE}`);
  console.log(`  Done in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
  console.log(`${RULE}\n`);
  return 0;
}

async function readManifest(manifestPath: string): Promise<unknown> {
  const raw = await fs.promises.readFile(manifestPath, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new PlanFormatError(`Batch manifest is not valid JSON: ${manifestPath}`, { reason: errorMessage(err) });
  }
}

async function runBatch(env: EnvSettings, manifestPath: string, strict: boolean): Promise<number> {
  const startTime = Date.now();
  const resolvedManifest = path.resolve(manifestPath);
  const baseDir = path.dirname(resolvedManifest);
  const manifest = parseBatchManifest(await readManifest(resolvedManifest));

  const batchConfig = manifest.configPath
    ? await loadComposerConfig(path.resolve(baseDir, manifest.configPath))
    : defaultComposerConfig();

  console.log('\n🎬 Reel Composer (batch)');
  console.log(`${RULE}\n`);
  console.log(`  ${manifest.jobs.length} job(s) from ${resolvedManifest}\n`);

  // A job whose files fail to load fails alone
  const loaded = await Promise.allSettled(
    manifest.jobs.map((spec) => loadCompositionJob(strict ? { ...spec, strict: true } : spec, baseDir))
  );
  const jobs: CompositionJob[] = [];
  let loadFailures = 0;
  loaded.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      jobs.push(outcome.value);
    } else {
      loadFailures++;
      const label = manifest.jobs[index].jobId ?? `#${index}`;
      console.log(`  ❌ ${label}: ${describeError(outcome.reason)}`);
    }
  });

  const runtime = await createComposerRuntime(env, batchConfig.broll);
  let results: BatchJobResult[];
  try {
    results = await runtime.orchestrator.runBatch(jobs, {
      concurrency: batchConfig.batch.concurrency ?? env.concurrency,
      jobTimeoutSeconds: batchConfig.batch.jobTimeoutSeconds ?? env.jobTimeoutSeconds,
      signal: interruptSignal(),
      onJobSettled: (result) => {
        if (result.status === 'completed') {
          printJobResult(result.result);
        } else if (result.status === 'failed') {
          console.log(`  ❌ ${result.jobId}: ${describeError(result.error)}`);
        } else {
          console.log(`  ⏹️  ${result.jobId}: cancelled (${result.reason})`);
        }
      },
    });
  } finally {
    await runtime.close();
  }

  const completed = results.filter((r) => r.status === 'completed').length;
  const failed = results.filter((r) => r.status === 'failed').length + loadFailures;
  const cancelled = results.filter((r) => r.status === 'cancelled').length;

  console.log(`\n${RULE}`);
  console.log(`  Done in ${((Date.now() - startTime) / 1000).toFixed(1)}s`);
  console.log(`  ✅ Completed: ${completed}`);
  if (failed > 0) console.log(`  ❌ Failed: ${failed}`);
  if (cancelled > 0) console.log(`  ⏹️  Cancelled: ${cancelled}`);
  console.log(`${RULE}\n`);

  return failed + cancelled > 0 ? 1 : 0;
}

async function execute(command: ComposeCommand): Promise<number> {
  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const env = readEnvSettings();
  switch (command.kind) {
    case 'list-cache':
      return listCache(env);
    case 'clear-cache':
      return clearCache(env);
    case 'batch':
      return runBatch(env, command.manifestPath, command.strict);
    case 'run':
      return command.enqueue ? enqueue(command.spec) : runSingle(env, command.spec);
  }
}

async function main(): Promise<number> {
  let command: ComposeCommand;
  try {
    command = parseComposeArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`\n❌ ${err.message}\n`);
      console.error(USAGE);
      return 2;
    }
    throw err;
  }
  return execute(command);
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('\n❌ Fatal error:', describeError(err));
    process.exit(1);
  });
