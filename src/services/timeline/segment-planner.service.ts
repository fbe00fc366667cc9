// ===========================================================================
// Segment Planner
//
// Turns the B-roll plan into the cut list. Gaps between requests become
// AVATAR segments sampled from the talking-head track at the same time;
// each request becomes a CUTAWAY sampled from its clip's start.
//
//   requests:   .........[== q1 ==]....[== q2 ==].......
//   segments:   [AVATAR ][CUTAWAY ][AV][CUTAWAY ][AVATAR]
//               0        3.0       6.5 8.0      11.0    15.0
//
// The output tiles [0, totalDuration) exactly: contiguous, non-overlapping,
// ordered by start. Clip length never changes the on-screen interval; a
// short clip is looped or freeze-held by the renderer.
// ===========================================================================

import { logger } from '../../config/logger';
import type {
  AvatarSegment,
  BrollRequest,
  CutawaySegment,
  Segment,
  TimeInterval,
} from '../../types/timeline.types';
import { InvalidIntervalError, OutOfRangeError, OverlapError } from '../../utils/errors';
import { duration, formatInterval, formatSeconds } from '../../utils/time';

/** A fetched clip ready to be sampled by a cutaway. */
export interface ResolvedClip {
  localPath: string;
  durationSeconds: number;
}

/** Where each segment's pixels come from. */
export interface SegmentSources {
  avatarPath: string;
  /** Called once per request, in order */
  resolveClip(request: BrollRequest, requestIndex: number): ResolvedClip;
}

class SegmentPlannerService {
  /**
   * Check the request list against the timeline without touching any source.
   * Runs before clips are fetched so a bad plan costs no I/O.
   */
  validate(totalDuration: number, requests: readonly BrollRequest[]): void {
    if (!Number.isFinite(totalDuration) || totalDuration <= 0) {
      throw new InvalidIntervalError(`Total duration must be positive, got ${totalDuration}`, { totalDuration });
    }

    requests.forEach((request, i) => {
      const { start, end } = request.interval;
      if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start) {
        throw new InvalidIntervalError(
          `B-roll request ${i} ("${request.query}") has an empty or inverted interval ${formatInterval(request.interval)}`,
          { requestIndex: i }
        );
      }
      if (start < 0 || end > totalDuration) {
        throw new OutOfRangeError(
          `B-roll request ${i} ("${request.query}") ${formatInterval(request.interval)} exceeds the video ` +
            `[0.000, ${formatSeconds(totalDuration)})`,
          { requestIndex: i, totalDuration }
        );
      }
      if (i > 0) {
        const previous = requests[i - 1];
        // Adjacent requests (previous.end === start) are allowed
        if (start < previous.interval.end) {
          throw new OverlapError(
            `B-roll request ${i} ("${request.query}") ${formatInterval(request.interval)} overlaps request ${i - 1} ` +
              `("${previous.query}") ${formatInterval(previous.interval)}`,
            { requestIndex: i, previousIndex: i - 1 }
          );
        }
      }
    });
  }

  /**
   * Build the segment sequence covering [0, totalDuration).
   * Requests must be sorted by start and non-overlapping.
   */
  plan(totalDuration: number, requests: readonly BrollRequest[], sources: SegmentSources): Segment[] {
    this.validate(totalDuration, requests);

    const segments: Segment[] = [];
    let cursor = 0;

    requests.forEach((request, requestIndex) => {
      const { start, end } = request.interval;

      // Gap before this cutaway (skipped when the previous one ends exactly here)
      if (start > cursor) {
        segments.push(this.avatarSegment({ start: cursor, end: start }, sources.avatarPath));
      }

      const clip = sources.resolveClip(request, requestIndex);
      const cutaway: CutawaySegment = {
        kind: 'CUTAWAY',
        interval: { start, end },
        sourcePath: clip.localPath,
        // Cutaways always play from the clip's own start
        sourceOffset: 0,
        sourceDuration: clip.durationSeconds,
        query: request.query,
        displayMode: request.displayMode,
        ...clampFades(request),
        requestIndex,
      };

      if (clip.durationSeconds < end - start) {
        logger.debug('Cutaway clip shorter than its interval; renderer will fill the remainder', {
          query: request.query,
          clipDuration: clip.durationSeconds.toFixed(2),
          needed: (end - start).toFixed(2),
        });
      }

      segments.push(cutaway);
      cursor = end;
    });

    if (cursor < totalDuration) {
      segments.push(this.avatarSegment({ start: cursor, end: totalDuration }, sources.avatarPath));
    }

    logger.debug('Segments planned', {
      totalDuration: totalDuration.toFixed(3),
      requests: requests.length,
      segments: segments.length,
    });

    return segments;
  }

  private avatarSegment(interval: TimeInterval, avatarPath: string): AvatarSegment {
    return {
      kind: 'AVATAR',
      interval,
      sourcePath: avatarPath,
      // The avatar track is the master clock, so it is sampled at the same time
      sourceOffset: interval.start,
    };
  }
}

/**
 * Fades that do not fit inside the cutaway are each limited to half of it.
 */
export function clampFades(request: Pick<BrollRequest, 'interval' | 'fadeIn' | 'fadeOut'>): {
  fadeIn: number;
  fadeOut: number;
} {
  const length = duration(request.interval);
  if (request.fadeIn + request.fadeOut < length) {
    return { fadeIn: request.fadeIn, fadeOut: request.fadeOut };
  }
  const half = length / 2;
  return { fadeIn: Math.min(request.fadeIn, half), fadeOut: Math.min(request.fadeOut, half) };
}

export { SegmentPlannerService };
export default new SegmentPlannerService();
