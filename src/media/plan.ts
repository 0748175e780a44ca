/**
 * Video timing plan. Pure: maps the narration timeline onto the frame grid.
 *
 * Boundaries between segments sit in the middle of each silence gap and are
 * quantized by rounding the cumulative time, never by summing rounded
 * durations, so the total stays within one frame of the audio.
 *
 * Cross-fades are centred on the boundaries. Each clip is rendered with half
 * the transition as lead-in and half as tail-out, so xfade overlaps eat gap
 * time and the output length equals the boundary total.
 */
import type { AudioTimeline, PlannedSegment, VideoPlan } from '../pipeline/types.js';
import { RenderFailure } from '../utils/errors.js';
import { motionFor } from './motion.js';

export interface PlanSettings {
  width: number;
  height: number;
  fps: number;
  crossfadeSeconds: number;
}

const EPSILON = 1e-9;

export function buildVideoPlan(audio: AudioTimeline, settings: PlanSettings): VideoPlan {
  const { offsets, gapSeconds, totalDuration } = audio;
  const { fps } = settings;
  const count = offsets.length;
  if (count === 0) throw new RenderFailure('Cannot plan a video with no segments');

  // Boundary k separates segment k-1 from segment k; 0 and count are the ends.
  const boundaries: number[] = [0];
  for (let k = 1; k < count; k++) {
    const prev = offsets[k - 1];
    if (!prev) throw new RenderFailure(`Missing offset for segment ${k - 1}`);
    boundaries.push(prev.end + gapSeconds / 2);
  }
  boundaries.push(totalDuration);
  const frames = boundaries.map((t) => Math.round(t * fps));

  const transitionFrames = count > 1
    ? Math.round(Math.min(settings.crossfadeSeconds, gapSeconds / 2) * fps)
    : 0;
  const halfIn = Math.floor(transitionFrames / 2);
  const halfOut = transitionFrames - halfIn;

  const segments: PlannedSegment[] = offsets.map((offset, i) => {
    const startFrame = frames[i] ?? 0;
    const endFrame = frames[i + 1] ?? startFrame;
    return {
      ordinal: offset.ordinal,
      narrationStart: offset.start,
      narrationEnd: offset.end,
      start: startFrame / fps,
      duration: (endFrame - startFrame) / fps,
      startFrame,
      endFrame,
      leadInFrames: i > 0 ? halfIn : 0,
      tailOutFrames: i < count - 1 ? halfOut : 0,
      motion: motionFor(offset.ordinal),
    };
  });

  const totalFrames = frames[count] ?? 0;
  return {
    width: settings.width,
    height: settings.height,
    fps,
    transitionFrames,
    segments,
    totalFrames,
    totalDuration: totalFrames / fps,
  };
}

/** Frames a segment's input stream must contain, transition overlap included. */
export function renderedFrames(segment: PlannedSegment): number {
  return segment.endFrame - segment.startFrame + segment.leadInFrames + segment.tailOutFrames;
}

/** xfade offset (seconds into the accumulated output) for the transition into `segment`. */
export function transitionOffset(segment: PlannedSegment, fps: number): number {
  return (segment.startFrame - segment.leadInFrames) / fps;
}

/**
 * Check the plan against the narration before anything is rendered.
 * Throws RenderFailure on the first violation.
 */
export function verifyPlan(plan: VideoPlan, audio: AudioTimeline): void {
  const frame = 1 / plan.fps;

  if (plan.segments.length !== audio.offsets.length) {
    throw new RenderFailure(
      `Plan has ${plan.segments.length} segment(s) but narration has ${audio.offsets.length}`,
    );
  }

  plan.segments.forEach((seg, i) => {
    const offset = audio.offsets[i];
    if (!offset || offset.ordinal !== seg.ordinal) {
      throw new RenderFailure(`Plan segment ${seg.ordinal} has no matching narration offset`);
    }
    if (seg.narrationStart !== offset.start) {
      throw new RenderFailure(
        `Segment ${seg.ordinal} narration starts at ${seg.narrationStart}s, timeline says ${offset.start}s`,
      );
    }
    if (seg.endFrame <= seg.startFrame) {
      throw new RenderFailure(`Segment ${seg.ordinal} rounds to an empty on-screen window`);
    }
    const windowEnd = seg.start + seg.duration;
    if (seg.start > offset.start + frame + EPSILON || windowEnd < offset.end - frame - EPSILON) {
      throw new RenderFailure(
        `Segment ${seg.ordinal} window [${seg.start}, ${windowEnd}) does not cover narration [${offset.start}, ${offset.end})`,
      );
    }
  });

  const drift = Math.abs(plan.totalDuration - audio.totalDuration);
  if (drift > frame + EPSILON) {
    throw new RenderFailure(
      `Video length ${plan.totalDuration}s drifts ${drift.toFixed(4)}s from narration ${audio.totalDuration}s`,
    );
  }
}
