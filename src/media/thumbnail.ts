/**
 * Thumbnail rendering: hero image cover-cropped to 1280×720 with a top banner
 * and the title in a bottom band.
 *
 * Best-effort. Any failure yields `{ kind: 'original' }` pointing at the
 * untouched source image; the run never fails on the thumbnail.
 */
import { writeFile } from 'fs/promises';
import path from 'path';
import type { ThumbnailResult } from '../pipeline/types.js';
import type { FfmpegRunner } from './ffmpeg.js';
import { logger } from '../utils/logger.js';

export const THUMBNAIL_WIDTH = 1280;
export const THUMBNAIL_HEIGHT = 720;

const BANNER_HEIGHT = 80;
const BANNER_FONT_SIZE = 40;
const BAND_PADDING = 20;

// ── Title fitting ──────────────────────────────────────────────────────────────

export interface FitOptions {
  width: number;
  maxFontSize: number;
  minFontSize: number;
  step: number;
  /** Average glyph advance as a fraction of the font size. */
  charWidthRatio: number;
  maxLines: number;
  margin: number;
}

export const DEFAULT_FIT: FitOptions = {
  width: THUMBNAIL_WIDTH,
  maxFontSize: 72,
  minFontSize: 36,
  step: 2,
  charWidthRatio: 0.55,
  maxLines: 2,
  margin: 60,
};

export interface FittedTitle {
  fontSize: number;
  lines: string[];
}

function charsPerLine(fontSize: number, opts: FitOptions): number {
  return Math.max(1, Math.floor((opts.width - 2 * opts.margin) / (fontSize * opts.charWidthRatio)));
}

/** Greedy word wrap. Words longer than the line are left whole on their own line. */
function wrap(words: readonly string[], maxChars: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of words) {
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length <= maxChars || !current) {
      current = candidate;
    } else {
      lines.push(current);
      current = word;
    }
  }
  if (current) lines.push(current);
  return lines;
}

function ellipsize(line: string, maxChars: number): string {
  const room = maxChars - 1;
  if (line.length <= room) return `${line}…`;
  const cut = line.slice(0, room);
  const lastSpace = cut.lastIndexOf(' ');
  return `${(lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
}

/**
 * Largest font size (stepping down from max) at which the title wraps into
 * `maxLines` lines. At the minimum size the overflow is cut and the last line
 * ends in an ellipsis.
 */
export function fitTitle(title: string, opts: FitOptions = DEFAULT_FIT): FittedTitle {
  const words = title.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0) return { fontSize: opts.maxFontSize, lines: [] };

  for (let size = opts.maxFontSize; size >= opts.minFontSize; size -= opts.step) {
    const maxChars = charsPerLine(size, opts);
    const lines = wrap(words, maxChars);
    if (lines.length <= opts.maxLines && lines.every((l) => l.length <= maxChars)) {
      return { fontSize: size, lines };
    }
  }

  const maxChars = charsPerLine(opts.minFontSize, opts);
  const wrapped = wrap(words, maxChars).map((l) => (l.length > maxChars ? l.slice(0, maxChars) : l));
  const kept = wrapped.slice(0, opts.maxLines);
  const last = kept.length - 1;
  kept[last] = ellipsize(kept[last] ?? '', maxChars);
  return { fontSize: opts.minFontSize, lines: kept };
}

// ── Rendering ──────────────────────────────────────────────────────────────────

/** Escape a value for a filter option (textfile paths, font paths). */
function escapeFilterValue(s: string): string {
  return s.replace(/[\\:'[\],;]/g, '\\$&');
}

export interface ThumbnailInput {
  runner: FfmpegRunner;
  sourceImagePath: string;
  outputPath: string;
  title: string;
  banner: string;
  fontFile: string;
}

/** Filter chain for the thumbnail; text is read from the given files with expansion off. */
export function thumbnailFilter(
  fitted: FittedTitle,
  files: { banner: string; lines: readonly string[] },
  fontFile: string,
): string {
  const font = escapeFilterValue(fontFile);
  const lineHeight = Math.round(fitted.fontSize * 1.2);
  const bandHeight = fitted.lines.length * lineHeight + 2 * BAND_PADDING;
  const bandTop = THUMBNAIL_HEIGHT - bandHeight;

  const parts = [
    `scale=${THUMBNAIL_WIDTH}:${THUMBNAIL_HEIGHT}:force_original_aspect_ratio=increase`,
    `crop=${THUMBNAIL_WIDTH}:${THUMBNAIL_HEIGHT}`,
    'setsar=1',
    `drawbox=x=0:y=0:w=iw:h=${BANNER_HEIGHT}:color=black@0.55:t=fill`,
    `drawtext=fontfile=${font}:textfile=${escapeFilterValue(files.banner)}:expansion=none:` +
      `fontsize=${BANNER_FONT_SIZE}:fontcolor=yellow:x=(w-text_w)/2:y=(${BANNER_HEIGHT}-text_h)/2`,
  ];
  if (fitted.lines.length > 0) {
    parts.push(`drawbox=x=0:y=${bandTop}:w=iw:h=${bandHeight}:color=black@0.6:t=fill`);
    files.lines.forEach((file, i) => {
      const y = bandTop + BAND_PADDING + i * lineHeight;
      parts.push(
        `drawtext=fontfile=${font}:textfile=${escapeFilterValue(file)}:expansion=none:` +
          `fontsize=${fitted.fontSize}:fontcolor=white:borderw=3:bordercolor=black:x=(w-text_w)/2:y=${y}`,
      );
    });
  }
  return parts.join(',');
}

export async function renderThumbnail(input: ThumbnailInput): Promise<ThumbnailResult> {
  const { runner, sourceImagePath, outputPath, title, banner, fontFile } = input;
  const fitted = fitTitle(title);
  const dir = path.dirname(outputPath);

  try {
    const bannerFile = path.join(dir, 'thumbnail_banner.txt');
    await writeFile(bannerFile, banner, 'utf8');
    const lineFiles = await Promise.all(fitted.lines.map(async (line, i) => {
      const file = path.join(dir, `thumbnail_line_${i + 1}.txt`);
      await writeFile(file, line, 'utf8');
      return file;
    }));

    const filter = thumbnailFilter(fitted, { banner: bannerFile, lines: lineFiles }, fontFile);
    await runner.run(
      ['-i', sourceImagePath, '-vf', filter, '-frames:v', '1', '-q:v', '2', outputPath],
      'renderThumbnail',
    );
    logger.info('Thumbnail: rendered', { outputPath, fontSize: fitted.fontSize, lines: fitted.lines.length });
    return { kind: 'overlaid', path: outputPath, fontSize: fitted.fontSize, lines: fitted.lines };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.warn('Thumbnail: overlay failed, using original image', { reason });
    return { kind: 'original', path: sourceImagePath, reason };
  }
}
