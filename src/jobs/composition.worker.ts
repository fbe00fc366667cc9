import { Worker } from 'bullmq';
import { defaultComposerConfig } from '../config/composer-config';
import { readEnvSettings } from '../config/env';
import { logger } from '../config/logger';
import { QUEUE_NAMES, getRedisConnection } from '../config/redis';
import { createComposerRuntime, type ComposerRuntime } from '../services/composer.runtime';
import type { CompositionOrchestrator, JobResult } from '../services/composition.orchestrator';
import type { CompositionJobOutcome, CompositionJobSpec } from '../types/job.types';
import { JobCancelledError, errorMessage } from '../utils/errors';
import { loadCompositionJob, parseCompositionJobSpec } from '../utils/job-inputs';

/** The parts of a BullMQ job the processor touches. Data is validated, not trusted. */
export interface CompositionJobHandle {
  id?: string;
  data: unknown;
  updateProgress(progress: number): Promise<void>;
}

export interface CompositionProcessorOptions {
  /** 0 or absent: no timeout */
  jobTimeoutSeconds?: number;
  /** Base for relative paths in job data. Default: process.cwd() */
  baseDir?: string;
}

function toOutcome(result: JobResult): CompositionJobOutcome {
  const outputs: Record<string, string> = {};
  for (const [platform, file] of Object.entries(result.outputs)) {
    if (file) outputs[platform] = file;
  }
  return {
    jobId: result.report.jobId,
    outputs,
    skippedCutaways: result.report.skippedCutaways,
    substitutedCutaways: result.report.substitutedCutaways.length,
    cacheHits: result.report.cacheHits,
  };
}

/**
 * Process clip composition jobs
 */
export function createCompositionProcessor(
  orchestrator: Pick<CompositionOrchestrator, 'runJob'>,
  options: CompositionProcessorOptions = {}
) {
  return async (job: CompositionJobHandle): Promise<CompositionJobOutcome> => {
    const spec = parseCompositionJobSpec(job.data);
    const jobId = spec.jobId ?? job.id;

    logger.info(`Processing composition job ${job.id}`, {
      videoPath: spec.videoPath,
      platforms: spec.platforms,
    });

    await job.updateProgress(10);
    const compositionJob = await loadCompositionJob({ ...spec, jobId }, options.baseDir);
    await job.updateProgress(30);

    const { jobTimeoutSeconds } = options;
    const controller = new AbortController();
    const timer =
      jobTimeoutSeconds && jobTimeoutSeconds > 0
        ? setTimeout(() => {
            controller.abort(new JobCancelledError(`Job ${jobId} timed out after ${jobTimeoutSeconds}s`));
          }, jobTimeoutSeconds * 1000)
        : undefined;

    try {
      const result = await orchestrator.runJob(compositionJob, controller.signal);
      await job.updateProgress(100);
      return toOutcome(result);
    } catch (error) {
      logger.error(`Composition failed for job ${job.id}: ${errorMessage(error)}`);
      throw error;
    } finally {
      clearTimeout(timer);
    }
  };
}

/**
 * Create and start the clip composition worker
 */
export async function createCompositionWorker(): Promise<{
  worker: Worker<CompositionJobSpec, CompositionJobOutcome>;
  runtime: ComposerRuntime;
}> {
  const env = readEnvSettings();
  const runtime = await createComposerRuntime(env, defaultComposerConfig().broll);
  const processor = createCompositionProcessor(runtime.orchestrator, { jobTimeoutSeconds: env.jobTimeoutSeconds });

  const worker = new Worker<CompositionJobSpec, CompositionJobOutcome>(QUEUE_NAMES.CLIP_COMPOSITION, processor, {
    connection: getRedisConnection(env.redisUrl),
    concurrency: env.concurrency,
  });

  worker.on('completed', (job) => {
    logger.info(`Composition job ${job.id} completed successfully`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`Composition job ${job?.id} failed: ${err.message}`, {
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error(`Composition worker error: ${err.message}`);
  });

  logger.info('Clip composition worker started', { concurrency: env.concurrency });

  return { worker, runtime };
}

export default createCompositionWorker;
