// ===========================================================================
// Platform Presets
//
// Encoding targets for the vertical platforms. All three share the 9:16
// 1080x1920 frame; they differ in how long and how large an upload may be.
// The brand config may override any field per platform.
// ===========================================================================

export const PLATFORM_IDS = ['tiktok', 'instagram_reels', 'youtube_shorts'] as const;
export type PlatformId = (typeof PLATFORM_IDS)[number];

/** Full encoding target for one platform. */
export interface PlatformPreset {
  width: number;
  height: number;
  fps: number;
  /** ffmpeg bitrate string, e.g. "5000k" */
  videoBitrate: string;
  audioBitrate: string;
  /** Longest upload the platform accepts */
  maxDurationSeconds: number;
  /** Largest upload in MB; null when the platform sets no practical limit */
  maxSizeMb: number | null;
}

const VERTICAL_FRAME = { width: 1080, height: 1920, fps: 30 };
const SOCIAL_BITRATES = { videoBitrate: '5000k', audioBitrate: '192k' };

export const PLATFORM_PRESETS: Record<PlatformId, PlatformPreset> = {
  tiktok: { ...VERTICAL_FRAME, ...SOCIAL_BITRATES, maxDurationSeconds: 60, maxSizeMb: 287 },
  instagram_reels: { ...VERTICAL_FRAME, ...SOCIAL_BITRATES, maxDurationSeconds: 90, maxSizeMb: 30 },
  youtube_shorts: { ...VERTICAL_FRAME, ...SOCIAL_BITRATES, maxDurationSeconds: 60, maxSizeMb: null },
};

export function isPlatformId(value: string): value is PlatformId {
  return PLATFORM_IDS.some((id) => id === value);
}

/** Get the preset for a platform, with config overrides applied. */
export function getPlatformPreset(platform: PlatformId, overrides: Partial<PlatformPreset> = {}): PlatformPreset {
  return { ...PLATFORM_PRESETS[platform], ...overrides };
}

const BYTES_PER_MB = 1024 * 1024;

/** Warnings for a video that breaks a platform's upload limits. Checks only what is given. */
export function platformLimitWarnings(
  preset: PlatformPreset,
  output: { durationSeconds?: number; sizeBytes?: number }
): string[] {
  const warnings: string[] = [];
  const { durationSeconds, sizeBytes } = output;

  if (durationSeconds !== undefined && durationSeconds > preset.maxDurationSeconds) {
    warnings.push(
      `Video (${durationSeconds.toFixed(1)}s) is longer than the platform limit (${preset.maxDurationSeconds}s)`
    );
  }
  if (sizeBytes !== undefined && preset.maxSizeMb !== null && sizeBytes > preset.maxSizeMb * BYTES_PER_MB) {
    warnings.push(
      `Output (${(sizeBytes / BYTES_PER_MB).toFixed(1)} MB) is larger than the platform limit (${preset.maxSizeMb} MB)`
    );
  }
  return warnings;
}
