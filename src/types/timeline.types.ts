// ===========================================================================
// Timeline Types
//
// Shared vocabulary for the composition engine. Three timelines meet here:
//
//   voice audio      ─ the avatar track, sampled by AVATAR segments
//   caption words    ─ WordTiming → CaptionCue
//   cutaway clips    ─ BrollRequest → CUTAWAY segments (clips from the cache)
//
// All times are seconds on the output timeline unless a field says otherwise.
// Intervals are half-open: [start, end).
// ===========================================================================

/** Half-open time interval in seconds. Invariant: 0 <= start < end. */
export interface TimeInterval {
  readonly start: number;
  readonly end: number;
}

// ---------------------------------------------------------------------------
// Captions
// ---------------------------------------------------------------------------

/** A spoken word with its timing on the voice track. */
export interface WordTiming {
  readonly text: string;
  readonly interval: TimeInterval;
}

/**
 * A caption unit displayed on screen. In word-highlight mode each group of
 * words becomes a run of cues sharing `words`, with `highlightIndex` stepping
 * through them at each word's start.
 */
export interface CaptionCue {
  readonly interval: TimeInterval;
  readonly words: readonly WordTiming[];
  readonly highlightIndex?: number;
}

export const HIGHLIGHT_MODES = ['word', 'none'] as const;
export type HighlightMode = (typeof HIGHLIGHT_MODES)[number];

// ---------------------------------------------------------------------------
// B-roll
// ---------------------------------------------------------------------------

export const DISPLAY_MODES = ['fullframe', 'pip'] as const;
export type DisplayMode = (typeof DISPLAY_MODES)[number];

/** One row of the B-roll plan, fully typed. */
export interface BrollRequest {
  readonly interval: TimeInterval;
  readonly query: string;
  readonly displayMode: DisplayMode;
  readonly fadeIn: number;
  readonly fadeOut: number;
}

/** How a cutaway fills its on-screen interval when the source clip is shorter. */
export const SHORT_CLIP_POLICIES = ['loop', 'freeze'] as const;
export type ShortClipPolicy = (typeof SHORT_CLIP_POLICIES)[number];

// ---------------------------------------------------------------------------
// Segments
// ---------------------------------------------------------------------------

export type SegmentKind = 'AVATAR' | 'CUTAWAY';

interface SegmentBase {
  readonly kind: SegmentKind;
  readonly interval: TimeInterval;
  /** Media file this segment samples from */
  readonly sourcePath: string;
  /** Start time inside the source media */
  readonly sourceOffset: number;
}

export interface AvatarSegment extends SegmentBase {
  readonly kind: 'AVATAR';
}

export interface CutawaySegment extends SegmentBase {
  readonly kind: 'CUTAWAY';
  readonly query: string;
  readonly displayMode: DisplayMode;
  readonly fadeIn: number;
  readonly fadeOut: number;
  /** Length of the fetched clip; shorter than the interval means loop/freeze at render time */
  readonly sourceDuration: number;
  /** Index of the B-roll request this segment was planned from */
  readonly requestIndex: number;
}

export type Segment = AvatarSegment | CutawaySegment;

// ---------------------------------------------------------------------------
// Transitions
// ---------------------------------------------------------------------------

/** Transition effects the render collaborator supports (ffmpeg xfade names). */
export const TRANSITION_EFFECTS = [
  'fade',
  'dissolve',
  'fadeblack',
  'fadewhite',
  'circleopen',
  'circleclose',
  'zoomin',
  'radial',
  'slideright',
  'slideleft',
  'slideup',
  'slidedown',
  'wipeleft',
  'wiperight',
  'wipeup',
  'wipedown',
] as const;
export type TransitionEffect = (typeof TRANSITION_EFFECTS)[number];

export const TRANSITION_PRESETS = {
  smooth: ['fade', 'dissolve', 'fadeblack', 'fadewhite'],
  dramatic: ['circleopen', 'circleclose', 'zoomin', 'radial'],
  slide: ['slideright', 'slideleft', 'slideup', 'slidedown'],
  wipe: ['wipeleft', 'wiperight', 'wipeup', 'wipedown'],
  // Alternates dynamic entries into B-roll with softer exits back to the avatar
  varied: ['slideright', 'fade', 'dissolve', 'circleopen', 'slideright', 'zoomin'],
} as const satisfies Record<string, readonly TransitionEffect[]>;
export type TransitionPresetName = keyof typeof TRANSITION_PRESETS;
export const TRANSITION_PRESET_NAMES = ['smooth', 'dramatic', 'slide', 'wipe', 'varied'] as const satisfies readonly TransitionPresetName[];

/** Policy handed to the transition graph builder. */
export interface TransitionStyle {
  /** Consumed cyclically, one per boundary */
  readonly effects: readonly TransitionEffect[];
  /** Requested duration before clamping */
  readonly durationSeconds: number;
  readonly audioCrossfade: boolean;
}

export interface TransitionOp {
  /** Shared boundary between the two segments, ms resolution */
  readonly atTime: number;
  readonly style: TransitionEffect;
  readonly duration: number;
  readonly leftSegmentIndex: number;
  readonly rightSegmentIndex: number;
}

export type CrossfadeCurve = 'tri' | 'qsin' | 'exp' | 'log';

/** Audio twin of a TransitionOp; always the same atTime/duration pair. */
export interface AudioCrossfadeOp {
  readonly boundaryIndex: number;
  readonly atTime: number;
  readonly duration: number;
  readonly curve: CrossfadeCurve;
}

// ---------------------------------------------------------------------------
// Composition plan
// ---------------------------------------------------------------------------

export interface CompositionPlan {
  readonly jobId: string;
  readonly totalDuration: number;
  readonly avatarPath: string;
  readonly shortClipPolicy: ShortClipPolicy;
  readonly segments: readonly Segment[];
  readonly transitions: readonly TransitionOp[];
  readonly audioCrossfades: readonly AudioCrossfadeOp[];
  readonly captions: readonly CaptionCue[];
}
