import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  resolvePlatformPreset,
  resolveTransitionStyle,
  type ComposerConfig,
} from '../config/composer-config';
import { logger } from '../config/logger';
import type { BrollRequest, CompositionPlan, Segment, WordTiming } from '../types/timeline.types';
import {
  AppError,
  BrollUnavailableError,
  ClipUnavailableError,
  ConfigError,
  JobCancelledError,
  cancellationError,
  errorMessage,
  type FailedCutaway,
} from '../utils/errors';
import { duration } from '../utils/time';
import type { ClipCache, ClipFetcher, DurationProber, ResolveResult } from './broll/clip-cache.service';
import { writeSubtitleFiles, type SubtitleFiles } from './captions/subtitle-writer';
import type { Renderer } from './render/ffmpeg.service';
import type { PlatformId } from './render/platform-presets';
import captionTimelineService, { type CueTimingWarning } from './timeline/caption-timeline.service';
import { createCompositionPlan, serializePlan } from './timeline/composition-plan';
import segmentPlannerService, { type ResolvedClip } from './timeline/segment-planner.service';
import transitionGraphService from './timeline/transition-graph.service';

// ===========================================================================
// Composition Orchestrator
//
//   planJob:  validate ─> resolve clips (shared cache) ─> fallback
//             ─> segments ─> transitions + audio crossfades ─> captions
//             ─> frozen CompositionPlan + JobReport
//   runJob:   planJob ─> plan.json? ─> subtitles ─> render per platform
//   runBatch: runJob over a bounded pool with per-job timeout and abort
//
// Everything that can be checked from memory is checked before the first
// fetch, so a bad plan or script costs no downloads.
// ===========================================================================

export interface CompositionJob {
  /** Generated when absent */
  jobId?: string;
  avatarPath: string;
  /** Seconds; probed from the avatar track when absent */
  totalDuration?: number;
  words: readonly WordTiming[];
  brollRequests: readonly BrollRequest[];
  config: ComposerConfig;
  outputDir: string;
  /** Defaults to config.export.defaultPlatforms */
  platforms?: readonly PlatformId[];
}

export interface OrchestratorDeps {
  /** Process-wide clip cache, shared by every job */
  cache: ClipCache;
  fetchClip: ClipFetcher;
  renderer: Renderer;
  probeDuration: DurationProber;
}

export type SkippedCutaway = FailedCutaway;

export interface SubstitutedCutaway extends FailedCutaway {
  clipPath: string;
}

export interface JobReport {
  jobId: string;
  totalDuration: number;
  segments: number;
  cutaways: number;
  skippedCutaways: SkippedCutaway[];
  substitutedCutaways: SubstitutedCutaway[];
  cacheHits: number;
  cacheMisses: number;
  captionCues: number;
  captionWarnings: CueTimingWarning[];
}

export interface PlannedJob {
  plan: CompositionPlan;
  report: JobReport;
}

export interface JobResult extends PlannedJob {
  outputs: Partial<Record<PlatformId, string>>;
  subtitles?: SubtitleFiles;
  planPath?: string;
}

export type BatchJobResult =
  | { status: 'completed'; jobId: string; result: JobResult }
  | { status: 'failed'; jobId: string; error: Error }
  | { status: 'cancelled'; jobId: string; reason: string };

export interface BatchOptions {
  /** Jobs running at once. Default: 1 */
  concurrency?: number;
  /** 0 or absent: no timeout */
  jobTimeoutSeconds?: number;
  signal?: AbortSignal;
  /** Called as each job settles */
  onJobSettled?: (result: BatchJobResult, index: number) => void;
}

interface KeptRequest {
  request: BrollRequest;
  clip: ResolvedClip;
  requestIndex: number;
}

export class CompositionOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  /**
   * Build the composition plan for one job. Nothing is rendered.
   */
  async planJob(job: CompositionJob, signal?: AbortSignal): Promise<PlannedJob> {
    const jobId = job.jobId ?? uuidv4();
    const { config } = job;
    throwIfAborted(signal);

    const totalDuration = job.totalDuration ?? (await this.deps.probeDuration(job.avatarPath));
    const requests = config.broll.enabled ? job.brollRequests : [];
    if (!config.broll.enabled && job.brollRequests.length > 0) {
      logger.info(`B-roll disabled by config; ignoring ${job.brollRequests.length} request(s)`, { jobId });
    }

    logger.info(`[Job ${jobId}] Planning composition`, {
      totalDuration: totalDuration.toFixed(2),
      words: job.words.length,
      brollRequests: requests.length,
    });

    // -----------------------------------------------------------------------
    // 1. In-memory validation: no I/O past this point until it passes
    // -----------------------------------------------------------------------

    segmentPlannerService.validate(totalDuration, requests);
    const style = resolveTransitionStyle(config.broll.transition);
    const captions = captionTimelineService.build(job.words, config.captions.maxWordsPerCue, {
      highlightMode: config.captions.highlightMode,
      minCueDurationMs: config.captions.minCueDurationMs,
      mergeShortWordsMs: config.captions.mergeShortWordsMs,
    });

    // -----------------------------------------------------------------------
    // 2. Clips, concurrently through the shared cache
    // -----------------------------------------------------------------------

    const settled = await Promise.allSettled(
      requests.map((request) =>
        this.deps.cache.resolveDetailed(request.query, this.deps.fetchClip, {
          signal,
          minDurationSeconds: duration(request.interval),
        })
      )
    );
    throwIfAborted(signal);

    const resolved: (ResolveResult | undefined)[] = [];
    const failures: FailedCutaway[] = [];
    settled.forEach((outcome, requestIndex) => {
      if (outcome.status === 'fulfilled') {
        resolved[requestIndex] = outcome.value;
        return;
      }
      const reason: unknown = outcome.reason;
      if (reason instanceof ClipUnavailableError) {
        failures.push({ requestIndex, query: requests[requestIndex].query, reason: reason.reason });
        return;
      }
      // Cache write failures and cancellations end the job
      throw reason;
    });

    const cacheHits = resolved.filter((r) => r?.cacheHit).length;
    const cacheMisses = resolved.filter((r) => r && !r.cacheHit).length;

    // -----------------------------------------------------------------------
    // 3. Fallback for unavailable clips
    // -----------------------------------------------------------------------

    const { fallback } = config.broll;
    if (failures.length > 0 && fallback.strict) {
      throw new BrollUnavailableError(failures);
    }

    const skippedCutaways: SkippedCutaway[] = [];
    const substitutedCutaways: SubstitutedCutaway[] = [];
    let defaultClip: ResolvedClip | undefined;

    if (failures.length > 0 && fallback.policy === 'default-clip') {
      if (!fallback.defaultClipPath) {
        throw new ConfigError('broll.fallback.defaultClipPath is required when policy is "default-clip"');
      }
      defaultClip = {
        localPath: fallback.defaultClipPath,
        durationSeconds: await this.deps.probeDuration(fallback.defaultClipPath),
      };
    }

    const kept: KeptRequest[] = [];
    requests.forEach((request, requestIndex) => {
      const result = resolved[requestIndex];
      if (result) {
        kept.push({
          request,
          requestIndex,
          clip: { localPath: result.entry.localPath, durationSeconds: result.entry.sourceDurationSeconds },
        });
        return;
      }

      const failure = failures.find((f) => f.requestIndex === requestIndex);
      const reason = failure?.reason ?? 'unavailable';
      if (defaultClip) {
        logger.warn(`Cutaway ${requestIndex} ("${request.query}") uses the default clip: ${reason}`, { jobId });
        substitutedCutaways.push({ requestIndex, query: request.query, reason, clipPath: defaultClip.localPath });
        kept.push({ request, requestIndex, clip: defaultClip });
      } else {
        logger.warn(`Cutaway ${requestIndex} ("${request.query}") skipped: ${reason}`, { jobId });
        skippedCutaways.push({ requestIndex, query: request.query, reason });
      }
    });

    // -----------------------------------------------------------------------
    // 4. Segments, transitions, plan
    // -----------------------------------------------------------------------

    const segments = segmentPlannerService
      .plan(
        totalDuration,
        kept.map((k) => k.request),
        {
          avatarPath: job.avatarPath,
          resolveClip: (_request, index) => kept[index].clip,
        }
      )
      // Report the B-roll plan row, not the position among kept requests
      .map((segment): Segment =>
        segment.kind === 'CUTAWAY' ? { ...segment, requestIndex: kept[segment.requestIndex].requestIndex } : segment
      );

    const transitions = transitionGraphService.build(segments, style);
    const audioCrossfades = transitionGraphService.buildAudio(transitions, style);

    const plan = createCompositionPlan({
      jobId,
      totalDuration,
      avatarPath: job.avatarPath,
      shortClipPolicy: config.broll.shortClipPolicy,
      segments,
      transitions,
      audioCrossfades,
      captions,
    });

    const captionWarnings = captionTimelineService.validateCueTiming(captions);
    for (const warning of captionWarnings) {
      logger.debug(`Caption timing: ${warning.message}`, { jobId });
    }

    const report: JobReport = {
      jobId,
      totalDuration,
      segments: segments.length,
      cutaways: kept.length,
      skippedCutaways,
      substitutedCutaways,
      cacheHits,
      cacheMisses,
      captionCues: captions.length,
      captionWarnings,
    };

    logger.info(`[Job ${jobId}] Composition planned`, {
      segments: report.segments,
      transitions: transitions.length,
      cutaways: report.cutaways,
      skipped: skippedCutaways.length,
      substituted: substitutedCutaways.length,
      cacheHits,
      captionCues: report.captionCues,
    });

    return { plan, report };
  }

  /**
   * Plan and render one job, once per requested platform.
   */
  async runJob(job: CompositionJob, signal?: AbortSignal): Promise<JobResult> {
    const jobId = job.jobId ?? uuidv4();
    const { config, outputDir } = job;
    const startTime = Date.now();

    const { plan, report } = await this.planJob({ ...job, jobId }, signal);
    throwIfAborted(signal);

    const platforms = [...new Set(job.platforms ?? config.export.defaultPlatforms)];
    if (platforms.length === 0) {
      throw new ConfigError('No output platform selected');
    }

    await fs.promises.mkdir(outputDir, { recursive: true });

    let planPath: string | undefined;
    if (config.export.writePlanJson) {
      planPath = path.join(outputDir, `${jobId}.plan.json`);
      await fs.promises.writeFile(planPath, serializePlan(plan), 'utf-8');
      logger.debug('Composition plan written', { jobId, planPath });
    }

    let subtitles: SubtitleFiles | undefined;
    if (config.export.burnCaptions || config.export.writeSubtitles) {
      // ASS scales from its PlayRes, so one script serves every platform
      const frame = resolvePlatformPreset(config, platforms[0]);
      subtitles = await writeSubtitleFiles(outputDir, jobId, plan.captions, config.captions, frame);
    }

    const outputs: Partial<Record<PlatformId, string>> = {};
    try {
      for (const platform of platforms) {
        throwIfAborted(signal);
        const preset = resolvePlatformPreset(config, platform);
        outputs[platform] = await this.deps.renderer.render(plan, {
          outputPath: path.join(outputDir, `${jobId}_${platform}.mp4`),
          preset,
          pip: config.broll.pip,
          subtitlesPath: config.export.burnCaptions ? subtitles?.assPath : undefined,
          signal,
        });
      }
    } finally {
      if (subtitles && !config.export.writeSubtitles) {
        await removeSubtitleFiles(subtitles);
      }
    }

    logger.info(`[Job ${jobId}] Completed`, {
      platforms,
      elapsedSeconds: ((Date.now() - startTime) / 1000).toFixed(1),
      skippedCutaways: report.skippedCutaways.length,
    });

    return {
      plan,
      report,
      outputs,
      ...(subtitles && config.export.writeSubtitles ? { subtitles } : {}),
      ...(planPath ? { planPath } : {}),
    };
  }

  /**
   * Run independent jobs over a bounded pool. Every job settles; the result
   * list is in input order.
   */
  async runBatch(jobs: readonly CompositionJob[], options: BatchOptions = {}): Promise<BatchJobResult[]> {
    const concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    const results: BatchJobResult[] = new Array<BatchJobResult>(jobs.length);
    let next = 0;

    logger.info(`Batch started: ${jobs.length} job(s)`, { concurrency, jobTimeoutSeconds: options.jobTimeoutSeconds });

    const worker = async (): Promise<void> => {
      while (next < jobs.length) {
        const index = next++;
        const result = await this.runSettled(jobs[index], options);
        results[index] = result;
        options.onJobSettled?.(result, index);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, jobs.length) }, () => worker()));

    const count = (status: BatchJobResult['status']) => results.filter((r) => r.status === status).length;
    logger.info('Batch finished', {
      completed: count('completed'),
      failed: count('failed'),
      cancelled: count('cancelled'),
    });

    return results;
  }

  private async runSettled(job: CompositionJob, options: BatchOptions): Promise<BatchJobResult> {
    const jobId = job.jobId ?? uuidv4();
    const { signal, jobTimeoutSeconds } = options;

    if (signal?.aborted) {
      return { status: 'cancelled', jobId, reason: cancellationError(signal).message };
    }

    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    const timer =
      jobTimeoutSeconds && jobTimeoutSeconds > 0
        ? setTimeout(() => {
            controller.abort(new JobCancelledError(`Job ${jobId} timed out after ${jobTimeoutSeconds}s`));
          }, jobTimeoutSeconds * 1000)
        : undefined;

    try {
      const result = await this.runJob({ ...job, jobId }, controller.signal);
      return { status: 'completed', jobId, result };
    } catch (err) {
      if (err instanceof JobCancelledError || controller.signal.aborted) {
        const reason = controller.signal.aborted ? cancellationError(controller.signal).message : errorMessage(err);
        logger.warn(`[Job ${jobId}] Cancelled: ${reason}`);
        return { status: 'cancelled', jobId, reason };
      }
      const error = err instanceof Error ? err : new Error(String(err));
      logger.error(`[Job ${jobId}] Failed: ${error.message}`, {
        code: error instanceof AppError ? error.code : undefined,
      });
      return { status: 'failed', jobId, error };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancellationError(signal);
  }
}

async function removeSubtitleFiles(files: SubtitleFiles): Promise<void> {
  for (const filePath of [files.srtPath, files.assPath]) {
    try {
      await fs.promises.rm(filePath, { force: true });
    } catch (err) {
      logger.warn(`Failed to remove subtitle file: ${errorMessage(err)}`, { filePath });
    }
  }
}
