// ===========================================================================
// Filter Graph Builder
//
// Turns a CompositionPlan into ffmpeg inputs plus a filter_complex. Input 0
// is the avatar track; every cutaway adds one input for its clip.
//
//   avatar ─split─┬─ trim [s0, e0 + d0) ─ fit ─ v0 ─────────┐
//                 ├─ trim [s2, e2 + d2) ─ fit ─ v2 ─────────┤ xfade chain ─ subtitles ─ vout
//   clip 1 ───────┴─ loop/freeze, trim ─ fit ─ fades ─ v1 ─┘
//
//   avatar audio ─asplit─ atrim per segment ─ acrossfade chain ─ aout
//
// Every segment is cut with an outgoing handle as long as the transition
// after it, so xfade can take offset = atTime and the stream stays on the
// avatar clock. Audio uses the same handles, which keeps both chains at
// exactly totalDuration.
// ===========================================================================

import type { PipConfig } from '../../config/composer-config';
import type { CompositionPlan, CutawaySegment } from '../../types/timeline.types';
import { RenderError } from '../../utils/errors';
import { duration } from '../../utils/time';
import type { PlatformPreset } from './platform-presets';

export interface FilterGraphInput {
  path: string;
  /** Options placed before `-i` */
  options: string[];
}

export interface FilterGraph {
  inputs: FilterGraphInput[];
  filters: string[];
  videoOutput: string;
  audioOutput: string;
}

export interface FilterGraphOptions {
  pip: PipConfig;
  /** ASS file burned into the picture; omitted means no captions */
  subtitlesPath?: string;
}

const AVATAR_INPUT = 0;

/** Filter arguments use plain decimals; six places covers sub-millisecond transitions. */
export function formatFilterNumber(value: number): string {
  return Number(value.toFixed(6)).toString();
}

/** Escape a path for use as a filter option value. */
export function escapeFilterPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/[:'[\],;]/g, (ch) => `\\${ch}`);
}

function fitToFrame(preset: PlatformPreset): string {
  const { width, height, fps } = preset;
  return (
    `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},` +
    `setsar=1,fps=${fps},format=yuv420p`
  );
}

/** Outgoing handle per segment: the duration of the transition that follows it. */
function outgoingHandles(segmentCount: number, boundaries: readonly { index: number; duration: number }[]): number[] {
  const handles = new Array<number>(segmentCount).fill(0);
  for (const boundary of boundaries) {
    handles[boundary.index] = boundary.duration;
  }
  return handles;
}

function pipPosition(pip: PipConfig): { x: string; y: string } {
  const margin = pip.margin;
  const x = pip.corner.endsWith('left') ? `${margin}` : `main_w-overlay_w-${margin}`;
  const y = pip.corner.startsWith('top') ? `${margin}` : `main_h-overlay_h-${margin}`;
  return { x, y };
}

/** Fade in/out stages for a cutaway; alpha fades for PIP, fades through black otherwise. */
function fadeStages(segment: CutawaySegment, alpha: boolean): string[] {
  const suffix = alpha ? ':alpha=1' : '';
  const segmentLength = duration(segment.interval);
  const stages: string[] = [];
  if (segment.fadeIn > 0) {
    stages.push(`fade=t=in:st=0:d=${formatFilterNumber(segment.fadeIn)}${suffix}`);
  }
  if (segment.fadeOut > 0) {
    stages.push(
      `fade=t=out:st=${formatFilterNumber(segmentLength - segment.fadeOut)}:d=${formatFilterNumber(segment.fadeOut)}${suffix}`
    );
  }
  return stages;
}

/**
 * Clip chain up to (not including) frame fitting. A clip shorter than the
 * window is looped at the demuxer or freeze-held on its last frame.
 */
function clipChain(plan: CompositionPlan, segment: CutawaySegment, inputIndex: number, length: number): string {
  const stages: string[] = [];
  const shortfall = length - segment.sourceDuration;
  if (shortfall > 0 && plan.shortClipPolicy === 'freeze') {
    stages.push(`tpad=stop_mode=clone:stop_duration=${formatFilterNumber(shortfall)}`);
  }
  stages.push(`trim=duration=${formatFilterNumber(length)}`, 'setpts=PTS-STARTPTS');
  return `[${inputIndex}:v]${stages.join(',')}`;
}

export function buildFilterGraph(
  plan: CompositionPlan,
  preset: PlatformPreset,
  options: FilterGraphOptions
): FilterGraph {
  const { segments } = plan;
  if (segments.length === 0 || plan.transitions.length !== segments.length - 1) {
    throw new RenderError(
      `Plan ${plan.jobId} has ${segments.length} segment(s) and ${plan.transitions.length} transition(s); ` +
        'expected one transition per boundary'
    );
  }
  const fit = fitToFrame(preset);
  const inputs: FilterGraphInput[] = [{ path: plan.avatarPath, options: [] }];
  const filters: string[] = [];

  const videoHandles = outgoingHandles(
    segments.length,
    plan.transitions.map((op) => ({ index: op.leftSegmentIndex, duration: op.duration }))
  );

  // -------------------------------------------------------------------------
  // 1. Per-segment video
  // -------------------------------------------------------------------------

  const avatarUses = segments.filter((s) => s.kind === 'AVATAR' || s.displayMode === 'pip').length;
  const avatarLabels = Array.from({ length: avatarUses }, (_, i) => `av${i}`);
  if (avatarUses > 0) {
    filters.push(`[${AVATAR_INPUT}:v]split=${avatarUses}${avatarLabels.map((l) => `[${l}]`).join('')}`);
  }
  let nextAvatarLabel = 0;
  const takeAvatar = (): string => avatarLabels[nextAvatarLabel++];

  segments.forEach((segment, i) => {
    // Source length needed, outgoing handle included
    const windowLength = duration(segment.interval) + videoHandles[i];
    // A PIP base samples the avatar at the segment's own time
    const avatarStart = segment.kind === 'AVATAR' ? segment.sourceOffset : segment.interval.start;
    const trimmedAvatar = () =>
      `[${takeAvatar()}]trim=start=${formatFilterNumber(avatarStart)}:end=${formatFilterNumber(avatarStart + windowLength)},` +
      `setpts=PTS-STARTPTS,${fit}`;

    if (segment.kind === 'AVATAR') {
      filters.push(`${trimmedAvatar()}[v${i}]`);
      return;
    }

    const inputIndex = inputs.length;
    const loop = segment.sourceDuration < windowLength && plan.shortClipPolicy === 'loop';
    inputs.push({ path: segment.sourcePath, options: loop ? ['-stream_loop', '-1'] : [] });

    if (segment.displayMode === 'fullframe') {
      // Fades run over the segment's own interval, through black
      const stages = [fit, ...fadeStages(segment, false)];
      filters.push(`${clipChain(plan, segment, inputIndex, windowLength)},${stages.join(',')}[v${i}]`);
      return;
    }

    // Picture-in-picture: the clip rides on the avatar, fading on its own interval
    const pipWidth = Math.round((preset.width * options.pip.scale) / 2) * 2;
    const pipStages = [`scale=${pipWidth}:-2`, 'format=yuva420p', ...fadeStages(segment, true)];
    const { x, y } = pipPosition(options.pip);

    filters.push(`${trimmedAvatar()}[base${i}]`);
    filters.push(`${clipChain(plan, segment, inputIndex, windowLength)},${pipStages.join(',')}[pip${i}]`);
    filters.push(`[base${i}][pip${i}]overlay=x=${x}:y=${y},format=yuv420p[v${i}]`);
  });

  // -------------------------------------------------------------------------
  // 2. Transition chain and captions
  // -------------------------------------------------------------------------

  let current = 'v0';
  plan.transitions.forEach((op, j) => {
    const label = `x${j + 1}`;
    filters.push(
      `[${current}][v${op.rightSegmentIndex}]xfade=transition=${op.style}:` +
        `duration=${formatFilterNumber(op.duration)}:offset=${formatFilterNumber(op.atTime)}[${label}]`
    );
    current = label;
  });

  const videoOutput = 'vout';
  filters.push(
    options.subtitlesPath
      ? `[${current}]subtitles=filename=${escapeFilterPath(options.subtitlesPath)}[${videoOutput}]`
      : `[${current}]null[${videoOutput}]`
  );

  // -------------------------------------------------------------------------
  // 3. Audio
  // -------------------------------------------------------------------------

  const audioOutput = 'aout';
  if (plan.audioCrossfades.length === 0) {
    filters.push(
      `[${AVATAR_INPUT}:a]atrim=start=0:end=${formatFilterNumber(plan.totalDuration)},asetpts=PTS-STARTPTS[${audioOutput}]`
    );
  } else {
    const audioHandles = outgoingHandles(
      segments.length,
      plan.audioCrossfades.map((op) => ({ index: op.boundaryIndex, duration: op.duration }))
    );
    filters.push(`[${AVATAR_INPUT}:a]asplit=${segments.length}${segments.map((_, i) => `[a${i}]`).join('')}`);
    segments.forEach((segment, i) => {
      // Audio always follows the avatar clock, cutaways included
      const start = segment.interval.start;
      const end = segment.interval.end + audioHandles[i];
      filters.push(
        `[a${i}]atrim=start=${formatFilterNumber(start)}:end=${formatFilterNumber(end)},asetpts=PTS-STARTPTS[as${i}]`
      );
    });

    let currentAudio = 'as0';
    plan.audioCrossfades.forEach((op, j) => {
      const label = j === plan.audioCrossfades.length - 1 ? audioOutput : `ax${j + 1}`;
      filters.push(
        `[${currentAudio}][as${op.boundaryIndex + 1}]acrossfade=d=${formatFilterNumber(op.duration)}:` +
          `c1=${op.curve}:c2=${op.curve}[${label}]`
      );
      currentAudio = label;
    });
  }

  return { inputs, filters, videoOutput, audioOutput };
}

export function filterComplex(graph: FilterGraph): string {
  return graph.filters.join(';');
}
