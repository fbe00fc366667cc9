// ===========================================================================
// Caption Timeline
//
// Word timings in, caption cues out. Words are grouped into cues of at most
// maxWordsPerCue; in word-highlight mode each group is expanded into a
// stepped run of cues whose highlightIndex changes exactly at each word's
// start:
//
//   words:      [Build ][faster][today]
//   group cue:  [Build faster today        )
//   steps:      [ 0    )[ 1    )[ 2        )   highlightIndex
//
// Pure and deterministic: no clock, no randomness, so two builds on the
// same input are identical.
// ===========================================================================

import type { CaptionCue, HighlightMode, TimeInterval, WordTiming } from '../../types/timeline.types';
import { ConfigError, EmptyInputError, InvalidIntervalError, UnsortedInputError } from '../../utils/errors';
import { formatInterval } from '../../utils/time';

export interface CaptionTimelineOptions {
  /** Default: 'word' */
  highlightMode?: HighlightMode;
  /** Cues shorter than this are extended up to the next cue's start. 0 disables. */
  minCueDurationMs?: number;
  /** Words shorter than this are merged into the following word. 0 disables. */
  mergeShortWordsMs?: number;
}

/** Timing problems worth a warning but not a failure. */
export interface CueTimingWarning {
  cueIndex: number;
  message: string;
}

const SHORT_CUE_WARNING_SECONDS = 0.1;
const LARGE_GAP_WARNING_SECONDS = 2.0;

class CaptionTimelineService {
  /**
   * Reject input the cue boundaries cannot be built from: an empty list,
   * degenerate word intervals, or a word starting before the previous one ends.
   */
  validate(words: readonly WordTiming[]): void {
    if (words.length === 0) {
      throw new EmptyInputError('Caption timeline needs at least one word timing');
    }

    words.forEach((word, i) => {
      const { start, end } = word.interval;
      if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end <= start) {
        throw new InvalidIntervalError(`Word ${i} ("${word.text}") has an invalid interval ${formatInterval(word.interval)}`, {
          wordIndex: i,
        });
      }
      if (i > 0) {
        const previous = words[i - 1];
        if (start < previous.interval.end) {
          throw new UnsortedInputError(
            `Word ${i} ("${word.text}") starts at ${start.toFixed(3)}s, before word ${i - 1} ` +
              `("${previous.text}") ends at ${previous.interval.end.toFixed(3)}s`,
            { wordIndex: i }
          );
        }
      }
    });
  }

  build(words: readonly WordTiming[], maxWordsPerCue: number, options: CaptionTimelineOptions = {}): CaptionCue[] {
    if (!Number.isInteger(maxWordsPerCue) || maxWordsPerCue < 1) {
      throw new ConfigError(`maxWordsPerCue must be an integer >= 1, got ${maxWordsPerCue}`);
    }
    this.validate(words);

    const { highlightMode = 'word', minCueDurationMs = 0, mergeShortWordsMs = 0 } = options;

    const prepared = mergeShortWordsMs > 0 ? mergeShortWords(words, mergeShortWordsMs / 1000) : [...words];
    let groups = groupWords(prepared, maxWordsPerCue);
    if (minCueDurationMs > 0) {
      groups = enforceMinDuration(groups, minCueDurationMs / 1000);
    }

    if (highlightMode === 'none') {
      return groups;
    }
    return groups.flatMap(highlightSteps);
  }

  /**
   * Warnings for cues that will flicker or leave the screen empty for long.
   */
  validateCueTiming(cues: readonly CaptionCue[]): CueTimingWarning[] {
    const warnings: CueTimingWarning[] = [];

    cues.forEach((cue, i) => {
      const length = cue.interval.end - cue.interval.start;
      if (length < SHORT_CUE_WARNING_SECONDS) {
        warnings.push({ cueIndex: i, message: `Cue ${i} lasts ${(length * 1000).toFixed(0)}ms (may flicker)` });
      }

      const next = cues[i + 1];
      if (next) {
        const gap = next.interval.start - cue.interval.end;
        if (gap > LARGE_GAP_WARNING_SECONDS) {
          warnings.push({ cueIndex: i, message: `Gap of ${gap.toFixed(1)}s after cue ${i}` });
        }
      }
    });

    return warnings;
  }
}

/**
 * Fold each word shorter than the threshold into the word after it.
 * The last word is never merged.
 */
export function mergeShortWords(words: readonly WordTiming[], thresholdSeconds: number): WordTiming[] {
  const merged: WordTiming[] = [];
  let i = 0;

  while (i < words.length) {
    const current = words[i];
    const next = words[i + 1];
    const length = current.interval.end - current.interval.start;

    if (length < thresholdSeconds && next) {
      merged.push({
        text: `${current.text} ${next.text}`,
        interval: { start: current.interval.start, end: next.interval.end },
      });
      i += 2;
    } else {
      merged.push(current);
      i += 1;
    }
  }

  return merged;
}

function groupWords(words: readonly WordTiming[], maxWordsPerCue: number): CaptionCue[] {
  const cues: CaptionCue[] = [];
  for (let i = 0; i < words.length; i += maxWordsPerCue) {
    const group = words.slice(i, i + maxWordsPerCue);
    cues.push({
      interval: { start: group[0].interval.start, end: group[group.length - 1].interval.end },
      words: group,
    });
  }
  return cues;
}

function enforceMinDuration(cues: readonly CaptionCue[], minSeconds: number): CaptionCue[] {
  return cues.map((cue, i) => {
    const { start, end } = cue.interval;
    if (end - start >= minSeconds) return cue;

    const next = cues[i + 1];
    const extendedEnd = next ? Math.min(start + minSeconds, next.interval.start) : start + minSeconds;
    return { ...cue, interval: { start, end: Math.max(end, extendedEnd) } };
  });
}

/** Expand one group cue into its stepped highlight run. */
function highlightSteps(cue: CaptionCue): CaptionCue[] {
  return cue.words.map((word, i) => {
    const next = cue.words[i + 1];
    const interval: TimeInterval = {
      start: word.interval.start,
      end: next ? next.interval.start : cue.interval.end,
    };
    return { interval, words: cue.words, highlightIndex: i };
  });
}

export { CaptionTimelineService };
export default new CaptionTimelineService();
