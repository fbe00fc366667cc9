import type { BrollConfig } from '../config/composer-config';
import type { EnvSettings } from '../config/env';
import { logger } from '../config/logger';
import { ClipCache } from './broll/clip-cache.service';
import { PexelsClipSource } from './broll/pexels.service';
import { CompositionOrchestrator } from './composition.orchestrator';
import ffmpegRenderService from './render/ffmpeg.service';

/**
 * Process-wide pieces: one clip cache and one rate-limited clip source
 * shared by every job the process runs.
 */
export interface ComposerRuntime {
  orchestrator: CompositionOrchestrator;
  cache: ClipCache;
  clipSource: PexelsClipSource;
  close(): Promise<void>;
}

export async function createComposerRuntime(
  env: EnvSettings,
  broll: Pick<BrollConfig, 'quality' | 'resultsPerQuery'>
): Promise<ComposerRuntime> {
  const probeDuration = (filePath: string) => ffmpegRenderService.probeDuration(filePath);
  const cache = await ClipCache.open(env.clipCacheDir, { probeDuration });

  const clipSource = new PexelsClipSource({
    apiKey: env.pexelsApiKey,
    apiUrl: env.pexelsApiUrl,
    quality: broll.quality,
    resultsPerQuery: broll.resultsPerQuery,
  });
  if (!clipSource.isConfigured()) {
    logger.warn('PEXELS_API_KEY is not set; uncached cutaways will be unavailable');
  }

  const orchestrator = new CompositionOrchestrator({
    cache,
    fetchClip: clipSource.fetchClip,
    renderer: ffmpegRenderService,
    probeDuration,
  });

  return {
    orchestrator,
    cache,
    clipSource,
    close: () => cache.close(),
  };
}
