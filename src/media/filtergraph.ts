/**
 * Builds the ffmpeg filter graph and argument vector for the story render.
 *
 * One still image per input. zoompan turns each single frame into exactly
 * `renderedFrames(segment)` frames, so clip lengths are fixed by the plan and
 * not by container timing. The graph goes to a script file because a
 * twenty-segment chain is longer than some shells accept.
 */
import type { PlannedSegment, VideoPlan } from '../pipeline/types.js';
import { renderedFrames, transitionOffset } from './plan.js';
import { zoompanExpressions } from './motion.js';

function seconds(value: number): string {
  return Number(value.toFixed(6)).toString();
}

/** Per-input chain: cover-crop at 2× for zoom headroom, then the Ken Burns path. */
export function segmentFilter(inputIndex: number, segment: PlannedSegment, plan: VideoPlan): string {
  const { width: w, height: h, fps } = plan;
  const frames = renderedFrames(segment);
  const expr = zoompanExpressions(segment.motion, frames);
  return [
    `[${inputIndex}:v]scale=${w * 2}:${h * 2}:force_original_aspect_ratio=increase`,
    `crop=${w * 2}:${h * 2}`,
    'setsar=1',
    `zoompan=z='${expr.z}':x='${expr.x}':y='${expr.y}':d=${frames}:s=${w}x${h}:fps=${fps}`,
    'format=yuv420p',
    `setpts=PTS-STARTPTS[v${inputIndex}]`,
  ].join(',');
}

/** Joins the per-segment streams into `[vout]`. */
export function joinFilter(plan: VideoPlan): string {
  const count = plan.segments.length;
  if (count === 1) return '[v0]null[vout]';

  if (plan.transitionFrames === 0) {
    const inputs = plan.segments.map((_, i) => `[v${i}]`).join('');
    return `${inputs}concat=n=${count}:v=1:a=0[vout]`;
  }

  const duration = seconds(plan.transitionFrames / plan.fps);
  const steps: string[] = [];
  let previous = '[v0]';
  plan.segments.forEach((segment, i) => {
    if (i === 0) return;
    const label = i === count - 1 ? '[vout]' : `[x${i}]`;
    const offset = seconds(transitionOffset(segment, plan.fps));
    steps.push(`${previous}[v${i}]xfade=transition=fade:duration=${duration}:offset=${offset}${label}`);
    previous = label;
  });
  return steps.join(';');
}

export function buildFilterGraph(plan: VideoPlan): string {
  const chains = plan.segments.map((segment, i) => segmentFilter(i, segment, plan));
  return [...chains, joinFilter(plan)].join(';\n');
}

/** `5M` becomes `10M`: rate-control buffer of two seconds at the target bitrate. */
export function bufferSizeFor(bitrate: string): string {
  const match = /^(\d+)([kKmM]?)$/.exec(bitrate);
  if (!match) return bitrate;
  const [, amount = '0', unit = ''] = match;
  return `${Number(amount) * 2}${unit}`;
}

export interface RenderCommandInput {
  plan: VideoPlan;
  imagePaths: readonly string[];
  audioPath: string;
  filterScriptPath: string;
  outputPath: string;
  bitrate: string;
}

export function buildRenderArgs(input: RenderCommandInput): string[] {
  const { plan, imagePaths, audioPath, filterScriptPath, outputPath, bitrate } = input;
  const args: string[] = [];
  for (const imagePath of imagePaths) args.push('-i', imagePath);
  args.push('-i', audioPath);
  args.push(
    '-filter_complex_script', filterScriptPath,
    '-map', '[vout]',
    '-map', `${imagePaths.length}:a`,
    '-c:v', 'libx264',
    '-pix_fmt', 'yuv420p',
    '-r', String(plan.fps),
    '-b:v', bitrate,
    '-maxrate', bitrate,
    '-bufsize', bufferSizeFor(bitrate),
    '-c:a', 'aac',
    '-b:a', '192k',
    '-movflags', '+faststart',
    outputPath,
  );
  return args;
}
