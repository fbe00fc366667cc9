import fs from 'fs';
import path from 'path';
import type { CaptionStyleConfig } from '../../config/composer-config';
import type { CaptionCue } from '../../types/timeline.types';

export interface FrameSize {
  width: number;
  height: number;
}

/** ASS numpad alignment per caption position */
const ASS_ALIGNMENT = { top: 8, center: 5, bottom: 2 } as const;
const ASS_SIDE_MARGIN = 60;

function splitTime(seconds: number): { hours: number; minutes: number; secs: number; ms: number } {
  // Split from whole milliseconds so 59.9996 becomes 01:00.000, not 00:59.1000
  const totalMs = Math.max(0, Math.round(seconds * 1000));
  return {
    hours: Math.floor(totalMs / 3_600_000),
    minutes: Math.floor((totalMs % 3_600_000) / 60_000),
    secs: Math.floor((totalMs % 60_000) / 1000),
    ms: totalMs % 1000,
  };
}

const pad = (value: number, width = 2): string => value.toString().padStart(width, '0');

/** SRT timestamp: HH:MM:SS,mmm */
export function formatSrtTimestamp(seconds: number): string {
  const { hours, minutes, secs, ms } = splitTime(seconds);
  return `${pad(hours)}:${pad(minutes)}:${pad(secs)},${pad(ms, 3)}`;
}

/** ASS timestamp: H:MM:SS.cc */
export function formatAssTimestamp(seconds: number): string {
  const totalCs = Math.max(0, Math.round(seconds * 100));
  const hours = Math.floor(totalCs / 360_000);
  const minutes = Math.floor((totalCs % 360_000) / 6000);
  const secs = Math.floor((totalCs % 6000) / 100);
  return `${hours}:${pad(minutes)}:${pad(secs)}.${pad(totalCs % 100)}`;
}

/** #RRGGBB → ASS &HAABBGGRR (alpha 00 = opaque) */
export function hexToAssColor(hex: string, alpha = '00'): string {
  const value = hex.replace(/^#/, '').toUpperCase();
  return `&H${alpha}${value.slice(4, 6)}${value.slice(2, 4)}${value.slice(0, 2)}`;
}

function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/** Override blocks are the only markup ASS knows; braces in text would open one. */
function escapeAss(text: string): string {
  return text.replace(/[{}]/g, '').replace(/\n/g, '\\N');
}

function cueText(cue: CaptionCue, escape: (text: string) => string, highlight: (text: string) => string): string {
  return cue.words
    .map((word, i) => (i === cue.highlightIndex ? highlight(escape(word.text)) : escape(word.text)))
    .join(' ');
}

export function toSrt(cues: readonly CaptionCue[]): string {
  return cues
    .map((cue, i) => {
      const text = cueText(cue, escapeHtml, (t) => `<u>${t}</u>`);
      return `${i + 1}\n${formatSrtTimestamp(cue.interval.start)} --> ${formatSrtTimestamp(cue.interval.end)}\n${text}\n`;
    })
    .join('\n');
}

export function toAss(cues: readonly CaptionCue[], style: CaptionStyleConfig, frame: FrameSize): string {
  const primary = hexToAssColor(style.colors.text);
  const secondary = hexToAssColor(style.colors.highlight);
  const outline = hexToAssColor(style.colors.outline);
  const back = hexToAssColor('#000000', '80');
  // Inline colour overrides take &HBBGGRR& without alpha
  const highlightOverride = `{\\c&H${hexToAssColor(style.colors.highlight).slice(4)}&}`;

  const styleLine = [
    'Default',
    style.font.family,
    style.font.size,
    primary,
    secondary,
    outline,
    back,
    style.font.bold ? -1 : 0,
    0,
    0,
    0,
    100,
    100,
    0,
    0,
    1,
    style.outlineWidth,
    0,
    ASS_ALIGNMENT[style.position],
    ASS_SIDE_MARGIN,
    ASS_SIDE_MARGIN,
    style.marginV,
    1,
  ].join(',');

  const events = cues.map((cue) => {
    const text = cueText(cue, escapeAss, (t) => `${highlightOverride}${t}{\\r}`);
    return `Dialogue: 0,${formatAssTimestamp(cue.interval.start)},${formatAssTimestamp(cue.interval.end)},Default,,0,0,0,,${text}`;
  });

  return [
    '[Script Info]',
    'ScriptType: v4.00+',
    `PlayResX: ${frame.width}`,
    `PlayResY: ${frame.height}`,
    'WrapStyle: 0',
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
    `Style: ${styleLine}`,
    '',
    '[Events]',
    'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
    ...events,
    '',
  ].join('\n');
}

export interface SubtitleFiles {
  srtPath: string;
  assPath: string;
}

/** Write <jobId>.srt and <jobId>.ass into outputDir. */
export async function writeSubtitleFiles(
  outputDir: string,
  jobId: string,
  cues: readonly CaptionCue[],
  style: CaptionStyleConfig,
  frame: FrameSize
): Promise<SubtitleFiles> {
  await fs.promises.mkdir(outputDir, { recursive: true });
  const srtPath = path.join(outputDir, `${jobId}.srt`);
  const assPath = path.join(outputDir, `${jobId}.ass`);
  await fs.promises.writeFile(srtPath, toSrt(cues), 'utf-8');
  await fs.promises.writeFile(assPath, toAss(cues, style, frame), 'utf-8');
  return { srtPath, assPath };
}
