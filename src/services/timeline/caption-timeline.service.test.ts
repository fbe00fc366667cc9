import { describe, expect, it } from 'vitest';
import type { CaptionCue, WordTiming } from '../../types/timeline.types';
import { ConfigError, EmptyInputError, InvalidIntervalError, UnsortedInputError } from '../../utils/errors';
import captionTimeline, { mergeShortWords } from './caption-timeline.service';

function word(text: string, start: number, end: number): WordTiming {
  return { text, interval: { start, end } };
}

const script: WordTiming[] = [
  word('Build', 0, 0.4),
  word('faster', 0.5, 0.9),
  word('today', 1.0, 1.6),
  word('with', 1.7, 1.9),
  word('us', 2.0, 2.5),
];

describe('CaptionTimeline.build', () => {
  describe('grouping', () => {
    it('should group words up to maxWordsPerCue with first-start to last-end intervals', () => {
      const cues = captionTimeline.build(script, 3, { highlightMode: 'none' });

      expect(cues).toHaveLength(2);
      expect(cues[0].interval).toEqual({ start: 0, end: 1.6 });
      expect(cues[0].words.map((w) => w.text)).toEqual(['Build', 'faster', 'today']);
      expect(cues[1].interval).toEqual({ start: 1.7, end: 2.5 });
      expect(cues[1].words.map((w) => w.text)).toEqual(['with', 'us']);
      expect(cues[0].highlightIndex).toBeUndefined();
    });

    it('should emit one cue per word when maxWordsPerCue is 1', () => {
      const cues = captionTimeline.build(script, 1, { highlightMode: 'none' });

      expect(cues.map((c) => c.words[0].text)).toEqual(['Build', 'faster', 'today', 'with', 'us']);
    });

    it('should reject a maxWordsPerCue below 1', () => {
      expect(() => captionTimeline.build(script, 0)).toThrow(ConfigError);
    });
  });

  describe('word highlighting', () => {
    it('should step the highlight at each word start', () => {
      const cues = captionTimeline.build(script, 3);

      expect(cues.map((c) => [c.interval.start, c.interval.end, c.highlightIndex])).toEqual([
        [0, 0.5, 0],
        [0.5, 1.0, 1],
        [1.0, 1.6, 2],
        [1.7, 2.0, 0],
        [2.0, 2.5, 1],
      ]);
    });

    it('should share the group words across the steps', () => {
      const cues = captionTimeline.build(script, 3);

      expect(cues[1].words.map((w) => w.text)).toEqual(['Build', 'faster', 'today']);
      expect(cues[4].words.map((w) => w.text)).toEqual(['with', 'us']);
    });
  });

  describe('minimum cue duration', () => {
    it('should extend a short cue', () => {
      const cues = captionTimeline.build([word('Hi', 0, 0.05), word('there', 1.0, 1.5)], 1, {
        highlightMode: 'none',
        minCueDurationMs: 200,
      });

      expect(cues[0].interval).toEqual({ start: 0, end: 0.2 });
      expect(cues[1].interval).toEqual({ start: 1.0, end: 1.5 });
    });

    it('should never extend past the next cue start', () => {
      const cues = captionTimeline.build([word('Hi', 0, 0.05), word('there', 0.1, 0.5)], 1, {
        highlightMode: 'none',
        minCueDurationMs: 200,
      });

      expect(cues[0].interval).toEqual({ start: 0, end: 0.1 });
    });
  });

  describe('preconditions', () => {
    it('should reject an empty word list', () => {
      expect(() => captionTimeline.build([], 3)).toThrow(EmptyInputError);
    });

    it('should reject a word starting before the previous one ends', () => {
      const words = [word('one', 0, 1), word('two', 0.5, 1.5)];

      expect(() => captionTimeline.build(words, 3)).toThrow(UnsortedInputError);
      expect(() => captionTimeline.build(words, 3)).toThrow(
        'Word 1 ("two") starts at 0.500s, before word 0 ("one") ends at 1.000s'
      );
    });

    it('should accept words that touch', () => {
      expect(captionTimeline.build([word('one', 0, 1), word('two', 1, 2)], 2, { highlightMode: 'none' })).toHaveLength(1);
    });

    it('should reject a zero-length word', () => {
      expect(() => captionTimeline.build([word('blip', 1, 1)], 3)).toThrow(InvalidIntervalError);
    });
  });

  it('should be idempotent', () => {
    const options = { minCueDurationMs: 200, mergeShortWordsMs: 100 };
    const first = captionTimeline.build(script, 2, options);
    const second = captionTimeline.build(script, 2, options);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});

describe('mergeShortWords', () => {
  it('should fold a short word into the next one', () => {
    const merged = mergeShortWords([word('a', 0, 0.05), word('cat', 0.05, 0.4), word('sat', 0.5, 0.9)], 0.1);

    expect(merged).toEqual([word('a cat', 0, 0.4), word('sat', 0.5, 0.9)]);
  });

  it('should never merge the last word', () => {
    const merged = mergeShortWords([word('go', 0, 0.5), word('!', 0.5, 0.52)], 0.1);

    expect(merged).toHaveLength(2);
  });
});

describe('CaptionTimeline.validateCueTiming', () => {
  it('should warn about large gaps and flickering cues', () => {
    const cues: CaptionCue[] = [
      { interval: { start: 0, end: 0.5 }, words: [word('one', 0, 0.5)] },
      { interval: { start: 3, end: 4 }, words: [word('two', 3, 4)] },
      { interval: { start: 4, end: 4.05 }, words: [word('three', 4, 4.05)] },
    ];

    expect(captionTimeline.validateCueTiming(cues)).toEqual([
      { cueIndex: 0, message: 'Gap of 2.5s after cue 0' },
      { cueIndex: 2, message: 'Cue 2 lasts 50ms (may flicker)' },
    ]);
  });

  it('should return nothing for a clean timeline', () => {
    expect(captionTimeline.validateCueTiming(captionTimeline.build(script, 3))).toEqual([]);
  });
});
