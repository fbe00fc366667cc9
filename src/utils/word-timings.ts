/**
 * Load word-level timings for captions from an aligner's JSON output.
 * Character alignments are folded into words at whitespace.
 */

import fs from 'fs';
import {
  AlignmentPayloadSchema,
  AlignmentWordSchema,
  CharacterAlignmentSchema,
  type AlignmentWord,
  type CharacterAlignment,
} from '../types/alignment.types';
import type { WordTiming } from '../types/timeline.types';
import { PlanFormatError, errnoCode, errorMessage } from './errors';

export interface WordTimingsInput {
  words: WordTiming[];
  /** Present when the source states it (alignment payloads) */
  totalDurationSeconds?: number;
}

function toWordTiming(word: AlignmentWord): WordTiming {
  return {
    text: (word.text ?? word.word ?? '').trim(),
    interval: { start: word.start, end: word.end },
  };
}

/**
 * Convert character-level alignment to word timings. A word runs from its
 * first character's start to its last character's end.
 */
export function characterAlignmentToWords(alignment: CharacterAlignment): WordTiming[] {
  const chars = alignment.characters;
  const starts = alignment.character_start_times_seconds;
  const ends = alignment.character_end_times_seconds;
  if (starts.length !== chars.length || ends.length !== chars.length) {
    throw new PlanFormatError(
      `Character alignment lengths differ: ${chars.length} characters, ${starts.length} start times, ${ends.length} end times`
    );
  }
  const len = chars.length;

  const words: WordTiming[] = [];
  let wordStartChar = -1;

  for (let i = 0; i <= len; i++) {
    const atEnd = i === len;
    const isSpace = !atEnd && /\s/.test(chars[i]);

    if (wordStartChar >= 0 && (isSpace || atEnd)) {
      const text = chars.slice(wordStartChar, i).join('').trim();
      if (text.length > 0) {
        words.push({ text, interval: { start: starts[wordStartChar], end: ends[i - 1] } });
      }
      wordStartChar = -1;
    } else if (!isSpace && !atEnd && wordStartChar < 0) {
      wordStartChar = i;
    }
  }

  return words;
}

/** Accepts any of the three shapes in alignment.types. */
export function parseWordTimings(raw: unknown): WordTimingsInput {
  if (Array.isArray(raw)) {
    const words = AlignmentWordSchema.array().safeParse(raw);
    if (!words.success) {
      throw new PlanFormatError(`Invalid word timings: ${formatIssues(words.error.issues)}`);
    }
    return { words: words.data.map(toWordTiming) };
  }

  const payload = AlignmentPayloadSchema.safeParse(raw);
  if (payload.success) {
    return {
      words: payload.data.words.map(toWordTiming),
      ...(payload.data.total_duration_seconds !== undefined
        ? { totalDurationSeconds: payload.data.total_duration_seconds }
        : {}),
    };
  }

  const characters = CharacterAlignmentSchema.safeParse(raw);
  if (characters.success) {
    return { words: characterAlignmentToWords(characters.data) };
  }

  throw new PlanFormatError(
    'Unrecognised word-timing format: expected a word array, { words: [...] } or a character alignment',
    { issues: formatIssues(payload.error.issues) }
  );
}

export async function loadWordTimings(filePath: string): Promise<WordTimingsInput> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new PlanFormatError(`Word-timing file not found: ${filePath}`);
    }
    throw new PlanFormatError(`Cannot read word-timing file ${filePath}: ${errorMessage(err)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new PlanFormatError(`Word-timing file ${filePath} is not valid JSON: ${errorMessage(err)}`);
  }

  return parseWordTimings(json);
}

function formatIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
