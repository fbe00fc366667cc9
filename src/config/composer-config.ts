import fs from 'fs';
import { z } from 'zod';
import { CLIP_QUALITIES } from '../services/broll/pexels.service';
import { PLATFORM_IDS, getPlatformPreset, type PlatformId, type PlatformPreset } from '../services/render/platform-presets';
import {
  HIGHLIGHT_MODES,
  SHORT_CLIP_POLICIES,
  TRANSITION_EFFECTS,
  TRANSITION_PRESETS,
  TRANSITION_PRESET_NAMES,
  type TransitionStyle,
} from '../types/timeline.types';
import { ConfigError, errnoCode, errorMessage } from '../utils/errors';
import { logger } from './logger';

// ===========================================================================
// Composer Config
//
// The brand/composer JSON document. Every section is optional; missing
// fields take the defaults below, so `{}` is a valid config. Transition
// effect names are a closed set and are checked here, never at render time.
// ===========================================================================

// ---------------------------------------------------------------------------
// 1. SCHEMAS
// ---------------------------------------------------------------------------

const HexColorSchema = z.string().regex(/^#[0-9a-fA-F]{6}$/, 'Expected a #RRGGBB colour');
const BitrateSchema = z.string().regex(/^\d+k$/, 'Expected a bitrate such as "5000k"');

export const CAPTION_POSITIONS = ['top', 'center', 'bottom'] as const;
export type CaptionPosition = (typeof CAPTION_POSITIONS)[number];

export const PIP_CORNERS = ['top-left', 'top-right', 'bottom-left', 'bottom-right'] as const;
export type PipCorner = (typeof PIP_CORNERS)[number];

export const FALLBACK_POLICIES = ['skip', 'default-clip'] as const;
export type FallbackPolicy = (typeof FALLBACK_POLICIES)[number];

const BrandSchema = z.object({
  name: z.string().min(1).default('Brand'),
});

const CaptionStyleSchema = z.object({
  maxWordsPerCue: z.number().int().min(1).default(3),
  highlightMode: z.enum(HIGHLIGHT_MODES).default('word'),
  minCueDurationMs: z.number().min(0).default(200),
  mergeShortWordsMs: z.number().min(0).default(0),
  font: z
    .object({
      family: z.string().min(1).default('Arial'),
      size: z.number().int().min(12).max(200).default(72),
      bold: z.boolean().default(true),
    })
    .default({}),
  colors: z
    .object({
      text: HexColorSchema.default('#FFFFFF'),
      highlight: HexColorSchema.default('#FFD700'),
      outline: HexColorSchema.default('#000000'),
    })
    .default({}),
  outlineWidth: z.number().min(0).max(20).default(4),
  position: z.enum(CAPTION_POSITIONS).default('bottom'),
  /** Distance from the top/bottom frame edge in pixels */
  marginV: z.number().int().min(0).default(320),
});

const TransitionConfigSchema = z.object({
  preset: z.enum(TRANSITION_PRESET_NAMES).optional(),
  /** Explicit list; wins over preset */
  effects: z.array(z.enum(TRANSITION_EFFECTS)).min(1).optional(),
  durationSeconds: z.number().positive().default(0.5),
  audioCrossfade: z.boolean().default(true),
});

const FallbackSchema = z
  .object({
    policy: z.enum(FALLBACK_POLICIES).default('skip'),
    defaultClipPath: z.string().min(1).optional(),
    /** All-or-nothing: any unavailable clip fails the job */
    strict: z.boolean().default(false),
  })
  .refine((f) => f.policy !== 'default-clip' || f.defaultClipPath !== undefined, {
    message: 'defaultClipPath is required when policy is "default-clip"',
    path: ['defaultClipPath'],
  });

const BrollSchema = z.object({
  enabled: z.boolean().default(true),
  transition: TransitionConfigSchema.default({}),
  shortClipPolicy: z.enum(SHORT_CLIP_POLICIES).default('loop'),
  fallback: FallbackSchema.default({}),
  defaultFadeSeconds: z.number().min(0).default(0.5),
  pip: z
    .object({
      scale: z.number().min(0.1).max(1).default(0.4),
      corner: z.enum(PIP_CORNERS).default('top-right'),
      margin: z.number().int().min(0).default(40),
    })
    .default({}),
  quality: z.enum(CLIP_QUALITIES).default('hd'),
  resultsPerQuery: z.number().int().min(1).max(80).default(5),
});

const PlatformOverrideSchema = z.object({
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  fps: z.number().positive().optional(),
  videoBitrate: BitrateSchema.optional(),
  audioBitrate: BitrateSchema.optional(),
  maxDurationSeconds: z.number().positive().optional(),
  maxSizeMb: z.number().positive().nullable().optional(),
});

const ExportSchema = z.object({
  platforms: z.record(z.enum(PLATFORM_IDS), PlatformOverrideSchema).default({}),
  /** Rendered when a job names no platform */
  defaultPlatforms: z.array(z.enum(PLATFORM_IDS)).min(1).default(['tiktok']),
  /** Burn the captions into the picture */
  burnCaptions: z.boolean().default(true),
  /** Keep <jobId>.srt and <jobId>.ass next to the outputs */
  writeSubtitles: z.boolean().default(true),
  /** Dump <jobId>.plan.json next to the outputs */
  writePlanJson: z.boolean().default(false),
});

const BatchSchema = z.object({
  concurrency: z.number().int().min(1).optional(),
  jobTimeoutSeconds: z.number().min(0).optional(),
});

export const ComposerConfigSchema = z.object({
  brand: BrandSchema.default({}),
  captions: CaptionStyleSchema.default({}),
  broll: BrollSchema.default({}),
  export: ExportSchema.default({}),
  batch: BatchSchema.default({}),
});

// ---------------------------------------------------------------------------
// 2. TYPES
// ---------------------------------------------------------------------------

export type ComposerConfig = z.infer<typeof ComposerConfigSchema>;
export type CaptionStyleConfig = ComposerConfig['captions'];
export type BrollConfig = ComposerConfig['broll'];
export type TransitionConfig = BrollConfig['transition'];
export type FallbackConfig = BrollConfig['fallback'];
export type PipConfig = BrollConfig['pip'];

// ---------------------------------------------------------------------------
// 3. LOADING
// ---------------------------------------------------------------------------

/** Validate a raw config value and fill in defaults. */
export function parseComposerConfig(raw: unknown): ComposerConfig {
  const result = ComposerConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigError('Invalid composer config', issues);
  }
  return result.data;
}

export function defaultComposerConfig(): ComposerConfig {
  return parseComposerConfig({});
}

export async function loadComposerConfig(configPath: string): Promise<ComposerConfig> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(configPath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(err)}`);
  }

  const config = parseComposerConfig(json);
  logger.debug(`Loaded composer config from ${configPath}`, { brand: config.brand.name });
  return config;
}

// ---------------------------------------------------------------------------
// 4. HELPERS
// ---------------------------------------------------------------------------

/** Transition policy for the graph builder: explicit effects, else the preset (varied by default). */
export function resolveTransitionStyle(transition: TransitionConfig): TransitionStyle {
  return {
    effects: transition.effects ?? TRANSITION_PRESETS[transition.preset ?? 'varied'],
    durationSeconds: transition.durationSeconds,
    audioCrossfade: transition.audioCrossfade,
  };
}

/** Encoding target for a platform with the config's overrides applied. */
export function resolvePlatformPreset(config: ComposerConfig, platform: PlatformId): PlatformPreset {
  // Absent override fields are omitted by the schema, so a spread keeps the preset value
  return getPlatformPreset(platform, config.export.platforms[platform]);
}
