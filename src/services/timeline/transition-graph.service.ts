// ===========================================================================
// Transition Graph Builder
//
// One transition per internal boundary of the segment list. For N segments:
//
//   seg0 | seg1 | seg2 | ... | segN-1
//        ^op0   ^op1         ^opN-2
//
// atTime is the running sum of segment durations up to the left segment,
// rounded to the millisecond once at emission so long lists never drift.
// The renderer feeds atTime straight into xfade's offset, so both sides
// read the same number.
//
// Duration is clamped to half of the shorter neighbour: a 0.5s fade between
// a 0.4s and a 0.6s segment becomes 0.2s.
// ===========================================================================

import { logger } from '../../config/logger';
import type {
  AudioCrossfadeOp,
  CrossfadeCurve,
  Segment,
  TransitionEffect,
  TransitionOp,
  TransitionStyle,
} from '../../types/timeline.types';
import { ConfigError } from '../../utils/errors';
import { duration, floorMs, roundMs } from '../../utils/time';

/** Triangular curves keep the summed level flat across the overlap. */
const AUDIO_CROSSFADE_CURVE: CrossfadeCurve = 'tri';

/** Effect for boundary i: the configured list, consumed cyclically. */
export function effectForBoundary(effects: readonly TransitionEffect[], boundaryIndex: number): TransitionEffect {
  if (effects.length === 0) {
    throw new ConfigError('Transition style needs at least one effect');
  }
  return effects[boundaryIndex % effects.length];
}

/**
 * Clamp a requested transition so it never takes more than half of either
 * adjoining segment.
 */
export function clampTransitionDuration(requested: number, leftDuration: number, rightDuration: number): number {
  const clamped = Math.min(requested, leftDuration / 2, rightDuration / 2);
  const floored = floorMs(clamped);
  // Neighbours under 2ms floor to zero; keep the exact value so duration stays > 0
  return floored > 0 ? floored : clamped;
}

class TransitionGraphService {
  /**
   * Build the ordered transition list for a segment sequence.
   */
  build(segments: readonly Segment[], style: TransitionStyle): TransitionOp[] {
    if (!(style.durationSeconds > 0)) {
      throw new ConfigError(`Transition duration must be positive, got ${style.durationSeconds}`);
    }

    const ops: TransitionOp[] = [];
    let cursor = 0;

    for (let i = 0; i < segments.length - 1; i++) {
      const left = segments[i];
      const right = segments[i + 1];
      const leftDuration = duration(left.interval);
      const rightDuration = duration(right.interval);

      cursor += leftDuration;

      const transitionDuration = clampTransitionDuration(style.durationSeconds, leftDuration, rightDuration);
      if (transitionDuration < style.durationSeconds) {
        logger.debug(`Transition ${i} clamped from ${style.durationSeconds}s to ${transitionDuration}s`, {
          leftDuration: leftDuration.toFixed(3),
          rightDuration: rightDuration.toFixed(3),
        });
      }

      ops.push({
        atTime: roundMs(cursor),
        style: effectForBoundary(style.effects, i),
        duration: transitionDuration,
        leftSegmentIndex: i,
        rightSegmentIndex: i + 1,
      });
    }

    return ops;
  }

  /**
   * Audio crossfades mirroring the video transitions, keyed by boundary index.
   * Empty when crossfading is disabled.
   */
  buildAudio(transitions: readonly TransitionOp[], style: TransitionStyle): AudioCrossfadeOp[] {
    if (!style.audioCrossfade) return [];

    return transitions.map((op) => ({
      boundaryIndex: op.leftSegmentIndex,
      atTime: op.atTime,
      duration: op.duration,
      curve: AUDIO_CROSSFADE_CURVE,
    }));
  }
}

export { TransitionGraphService };
export default new TransitionGraphService();
