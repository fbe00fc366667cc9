import { z } from 'zod';
import { PLATFORM_IDS } from '../services/render/platform-presets';

/**
 * One composition job as files on disk. Queue payloads and batch manifest
 * entries both take this shape; relative paths resolve against the
 * directory the job came from.
 */
export const CompositionJobSpecSchema = z.object({
  jobId: z.string().min(1).optional(),
  videoPath: z.string().min(1),
  wordsPath: z.string().min(1),
  configPath: z.string().min(1).optional(),
  brollPlanPath: z.string().min(1).optional(),
  outputDir: z.string().min(1),
  platforms: z.array(z.enum(PLATFORM_IDS)).min(1).optional(),
  totalDurationSeconds: z.number().positive().optional(),
  strict: z.boolean().optional(),
});

export type CompositionJobSpec = z.infer<typeof CompositionJobSpecSchema>;

export const BatchManifestSchema = z.object({
  /** Config for entries that name none; its batch section sets the pool */
  configPath: z.string().min(1).optional(),
  jobs: z.array(CompositionJobSpecSchema).min(1),
});

export type BatchManifest = z.infer<typeof BatchManifestSchema>;

/** What a finished queue job reports back. Plain JSON. */
export interface CompositionJobOutcome {
  jobId: string;
  outputs: Record<string, string>;
  skippedCutaways: { requestIndex: number; query: string; reason: string }[];
  substitutedCutaways: number;
  cacheHits: number;
}
