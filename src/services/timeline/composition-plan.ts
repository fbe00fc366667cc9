import type {
  AudioCrossfadeOp,
  CaptionCue,
  CompositionPlan,
  Segment,
  ShortClipPolicy,
  TransitionOp,
} from '../../types/timeline.types';

export interface CompositionPlanParts {
  jobId: string;
  totalDuration: number;
  avatarPath: string;
  shortClipPolicy: ShortClipPolicy;
  segments: readonly Segment[];
  transitions: readonly TransitionOp[];
  audioCrossfades: readonly AudioCrossfadeOp[];
  captions: readonly CaptionCue[];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Assemble the plan handed to the renderer. The result is frozen all the way
 * down; nothing downstream may edit it.
 */
export function createCompositionPlan(parts: CompositionPlanParts): CompositionPlan {
  const plan: CompositionPlan = {
    jobId: parts.jobId,
    totalDuration: parts.totalDuration,
    avatarPath: parts.avatarPath,
    shortClipPolicy: parts.shortClipPolicy,
    segments: parts.segments.map((s) => ({ ...s, interval: { ...s.interval } })),
    transitions: parts.transitions.map((t) => ({ ...t })),
    audioCrossfades: parts.audioCrossfades.map((a) => ({ ...a })),
    captions: parts.captions.map((c) => ({
      ...c,
      interval: { ...c.interval },
      words: c.words.map((w) => ({ ...w, interval: { ...w.interval } })),
    })),
  };
  return deepFreeze(plan);
}

/** Debug dump of a plan; stable key order, two-space indent. */
export function serializePlan(plan: CompositionPlan): string {
  return `${JSON.stringify(plan, null, 2)}\n`;
}
