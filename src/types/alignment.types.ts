import { z } from 'zod';

/**
 * Word-timing input formats produced by transcription/alignment tools.
 *
 *   [{ start, end, text }]                          plain word list
 *   { words: [...], total_duration_seconds? }       alignment payload
 *   { characters, character_start_times_seconds,    character alignment
 *     character_end_times_seconds }                 (TTS with-timestamps)
 */

export const AlignmentWordSchema = z
  .object({
    text: z.string().optional(),
    /** Alias used by some aligners */
    word: z.string().optional(),
    start: z.number(),
    end: z.number(),
  })
  .refine((w) => w.text !== undefined || w.word !== undefined, { message: 'Word needs "text" or "word"' });

export const AlignmentPayloadSchema = z.object({
  total_duration_seconds: z.number().positive().optional(),
  words: z.array(AlignmentWordSchema),
});

export const CharacterAlignmentSchema = z.object({
  characters: z.array(z.string()),
  character_start_times_seconds: z.array(z.number()),
  character_end_times_seconds: z.array(z.number()),
});

export type AlignmentWord = z.infer<typeof AlignmentWordSchema>;
export type AlignmentPayload = z.infer<typeof AlignmentPayloadSchema>;
export type CharacterAlignment = z.infer<typeof CharacterAlignmentSchema>;
