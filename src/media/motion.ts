/**
 * Ken Burns motion: deterministic pan/zoom paths per segment and the
 * zoompan expressions that render them.
 *
 * Selection: even ordinals zoom in, odd ordinals zoom out, so neighbours
 * always differ; pan direction cycles right, left, down, up by ordinal.
 */
import type { MotionDescriptor, PanDirection } from '../pipeline/types.js';

const ZOOM_MIN = 1.05;
const ZOOM_MAX = 1.2;
const PAN_CYCLE: readonly PanDirection[] = ['right', 'left', 'down', 'up'];

// Pan travels across the middle 60% of the free margin
const PAN_NEAR = 0.2;
const PAN_FAR = 0.8;

export function motionFor(ordinal: number): MotionDescriptor {
  const zoomIn = ordinal % 2 === 0;
  const direction = PAN_CYCLE[ordinal % PAN_CYCLE.length] ?? 'right';

  const centre = 0.5;
  let panFrom = { x: centre, y: centre };
  let panTo = { x: centre, y: centre };
  switch (direction) {
    case 'right': panFrom = { x: PAN_NEAR, y: centre }; panTo = { x: PAN_FAR, y: centre }; break;
    case 'left':  panFrom = { x: PAN_FAR, y: centre };  panTo = { x: PAN_NEAR, y: centre }; break;
    case 'down':  panFrom = { x: centre, y: PAN_NEAR }; panTo = { x: centre, y: PAN_FAR };  break;
    case 'up':    panFrom = { x: centre, y: PAN_FAR };  panTo = { x: centre, y: PAN_NEAR }; break;
  }

  return {
    zoomFrom: zoomIn ? ZOOM_MIN : ZOOM_MAX,
    zoomTo:   zoomIn ? ZOOM_MAX : ZOOM_MIN,
    panFrom,
    panTo,
    direction,
  };
}

/** Format a number for an ffmpeg expression (fixed precision, no exponent). */
function num(value: number): string {
  return Number(value.toFixed(6)).toString();
}

/** `from + (to - from) * on / span`, written without commas so it survives a filtergraph. */
function lerpExpr(from: number, to: number, span: number): string {
  const delta = to - from;
  if (delta === 0) return num(from);
  const sign = delta > 0 ? '+' : '-';
  return `${num(from)}${sign}${num(Math.abs(delta))}*on/${span}`;
}

export interface ZoompanExpressions {
  z: string;
  x: string;
  y: string;
}

/**
 * zoompan z/x/y expressions interpolating linearly across `frames` output frames.
 * x/y place the crop window inside the free margin (iw - iw/zoom).
 */
export function zoompanExpressions(motion: MotionDescriptor, frames: number): ZoompanExpressions {
  const span = Math.max(frames - 1, 1);
  return {
    z: lerpExpr(motion.zoomFrom, motion.zoomTo, span),
    x: `(iw-iw/zoom)*(${lerpExpr(motion.panFrom.x, motion.panTo.x, span)})`,
    y: `(ih-ih/zoom)*(${lerpExpr(motion.panFrom.y, motion.panTo.y, span)})`,
  };
}
