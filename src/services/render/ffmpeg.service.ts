import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs';
import path from 'path';
import type { PipConfig } from '../../config/composer-config';
import { logger } from '../../config/logger';
import type { CompositionPlan } from '../../types/timeline.types';
import { JobCancelledError, RenderError, cancellationError, errorMessage } from '../../utils/errors';
import { buildFilterGraph, filterComplex } from './filter-graph';
import { platformLimitWarnings, type PlatformPreset } from './platform-presets';

export interface RenderOptions {
  outputPath: string;
  preset: PlatformPreset;
  pip: PipConfig;
  /** ASS captions to burn in */
  subtitlesPath?: string;
  signal?: AbortSignal;
}

/** The part of the renderer the orchestrator depends on. */
export interface Renderer {
  render(plan: CompositionPlan, options: RenderOptions): Promise<string>;
}

class FfmpegRenderService implements Renderer {
  /**
   * Encode a composition plan into one platform's output file.
   */
  async render(plan: CompositionPlan, options: RenderOptions): Promise<string> {
    const { outputPath, preset, signal } = options;
    if (signal?.aborted) throw cancellationError(signal);

    const graph = buildFilterGraph(plan, preset, { pip: options.pip, subtitlesPath: options.subtitlesPath });
    const filterStr = filterComplex(graph);

    for (const warning of platformLimitWarnings(preset, { durationSeconds: plan.totalDuration })) {
      logger.warn(warning, { jobId: plan.jobId, outputPath });
    }

    await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });

    const command = ffmpeg();
    for (const input of graph.inputs) {
      command.input(input.path);
      if (input.options.length > 0) {
        command.inputOptions(input.options);
      }
    }

    command
      .complexFilter(filterStr, [graph.videoOutput, graph.audioOutput])
      .videoCodec('libx264')
      .videoBitrate(preset.videoBitrate)
      .audioCodec('aac')
      .audioBitrate(preset.audioBitrate)
      .outputOptions(['-preset', 'medium', '-pix_fmt', 'yuv420p', '-r', String(preset.fps), '-movflags', '+faststart'])
      .output(outputPath);

    return new Promise<string>((resolve, reject) => {
      const onAbort = () => {
        command.kill('SIGKILL');
        reject(signal ? cancellationError(signal) : new JobCancelledError(`Render of ${plan.jobId} cancelled`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      command
        .on('start', () => {
          logger.info('FFmpeg render started', {
            jobId: plan.jobId,
            outputPath,
            segments: plan.segments.length,
            totalDuration: plan.totalDuration.toFixed(2),
          });
          logger.debug('FFmpeg filter_complex: %s', filterStr);
        })
        .on('progress', (progress: { percent?: number }) => {
          if (progress.percent) logger.debug(`FFmpeg progress: ${Math.round(progress.percent)}%`, { jobId: plan.jobId });
        })
        .on('end', () => {
          signal?.removeEventListener('abort', onAbort);
          logger.info('Render completed', { jobId: plan.jobId, outputPath });
          this.checkOutputSize(outputPath, preset, plan.jobId).then(() => resolve(outputPath), reject);
        })
        .on('error', (err: unknown) => {
          signal?.removeEventListener('abort', onAbort);
          // Already rejected by onAbort
          if (signal?.aborted) return;
          const msg = errorMessage(err);
          logger.error('FFmpeg error: %s', msg, { jobId: plan.jobId });
          reject(new RenderError(`FFmpeg render failed for ${outputPath}: ${msg}`, err));
        });

      command.run();
    });
  }

  private async checkOutputSize(outputPath: string, preset: PlatformPreset, jobId: string): Promise<void> {
    let sizeBytes: number;
    try {
      sizeBytes = (await fs.promises.stat(outputPath)).size;
    } catch (err) {
      throw new RenderError(`Rendered file missing: ${outputPath}`, err);
    }
    for (const warning of platformLimitWarnings(preset, { sizeBytes })) {
      logger.warn(warning, { jobId, outputPath });
    }
  }

  /**
   * Media duration in seconds, from ffprobe.
   */
  async probeDuration(filePath: string): Promise<number> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err: unknown, metadata) => {
        if (err) {
          reject(new RenderError(`ffprobe failed for ${filePath}: ${errorMessage(err)}`, err));
          return;
        }
        const durationSeconds = Number(metadata.format.duration);
        if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
          reject(new RenderError(`ffprobe reported no duration for ${filePath}`));
          return;
        }
        resolve(durationSeconds);
      });
    });
  }
}

export { FfmpegRenderService };
export default new FfmpegRenderService();
