import path from 'path';
import { defaultComposerConfig, loadComposerConfig, type ComposerConfig } from '../config/composer-config';
import type { CompositionJob } from '../services/composition.orchestrator';
import {
  BatchManifestSchema,
  CompositionJobSpecSchema,
  type BatchManifest,
  type CompositionJobSpec,
} from '../types/job.types';
import { loadBrollPlan } from './broll-plan';
import { PlanFormatError } from './errors';
import { loadWordTimings } from './word-timings';

function formatIssues(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Validate an untrusted job payload (queue data, manifest entry). */
export function parseCompositionJobSpec(raw: unknown): CompositionJobSpec {
  const result = CompositionJobSpecSchema.safeParse(raw);
  if (!result.success) {
    throw new PlanFormatError(`Invalid composition job: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function parseBatchManifest(raw: unknown): BatchManifest {
  const result = BatchManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new PlanFormatError(`Invalid batch manifest: ${formatIssues(result.error)}`);
  }
  const { configPath, jobs } = result.data;
  if (!configPath) return result.data;
  return { configPath, jobs: jobs.map((job) => ({ ...job, configPath: job.configPath ?? configPath })) };
}

function withStrict(config: ComposerConfig): ComposerConfig {
  return { ...config, broll: { ...config.broll, fallback: { ...config.broll.fallback, strict: true } } };
}

/**
 * Read a job's config, word timings and B-roll plan from disk.
 * Relative paths resolve against baseDir.
 */
export async function loadCompositionJob(spec: CompositionJobSpec, baseDir = process.cwd()): Promise<CompositionJob> {
  const resolve = (p: string) => path.resolve(baseDir, p);

  const loaded = spec.configPath ? await loadComposerConfig(resolve(spec.configPath)) : defaultComposerConfig();
  const config = spec.strict ? withStrict(loaded) : loaded;

  const timings = await loadWordTimings(resolve(spec.wordsPath));
  const brollRequests = spec.brollPlanPath
    ? await loadBrollPlan(resolve(spec.brollPlanPath), { defaultFadeSeconds: config.broll.defaultFadeSeconds })
    : [];

  return {
    ...(spec.jobId ? { jobId: spec.jobId } : {}),
    avatarPath: resolve(spec.videoPath),
    totalDuration: spec.totalDurationSeconds ?? timings.totalDurationSeconds,
    words: timings.words,
    brollRequests,
    config,
    outputDir: resolve(spec.outputDir),
    ...(spec.platforms ? { platforms: spec.platforms } : {}),
  };
}
