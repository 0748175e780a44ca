/**
 * Story parser: turns the interleaved text/image parts of a generation
 * response into raw segments, and scrubs formatting noise out of narration.
 * Pure; no I/O.
 */
import type { RawImage, RawSegment, RawStory } from './types.js';

export type ResponsePart =
  | { kind: 'text'; text: string }
  | { kind: 'image'; image: RawImage };

// ── Narration cleanup ─────────────────────────────────────────────────────────

const FENCE = /```[a-zA-Z]*\n?/g;
const NOTE_LINE = /^\s*(?:note|image generation)\s*:/i;
const MARKDOWN = /^\s*#{1,6}\s+|\*\*|__/g;
const SEGMENT_LABEL = /^\s*(?:segment|scene|part)\s+\d+\s*(?:[:.)\-–]\s*)?/i;
const NUMBERING = /^\s*(?:\d+[.)\]]|\[\d+\])\s+/;
const BRACKETED = /\[[^\]]*\]/g;

/** Strip fences, labels, numbering, bracketed notes and note lines; collapse whitespace. */
export function cleanNarration(text: string): string {
  const lines = text
    .replace(FENCE, '')
    .split(/\r?\n/)
    .filter((line) => !NOTE_LINE.test(line))
    .map((line) => line.replace(MARKDOWN, '').replace(SEGMENT_LABEL, '').replace(NUMBERING, ''));

  return lines
    .join(' ')
    .replace(BRACKETED, '')
    .replace(/\s+/g, ' ')
    .replace(/\s+([.,!?;:])/g, '$1')
    .trim();
}

// ── Pairing ───────────────────────────────────────────────────────────────────

/** Adjacent text parts (stream chunks) are one block. */
function mergeText(parts: readonly ResponsePart[]): ResponsePart[] {
  const out: ResponsePart[] = [];
  for (const part of parts) {
    const prev = out[out.length - 1];
    if (part.kind === 'text' && prev?.kind === 'text') {
      out[out.length - 1] = { kind: 'text', text: prev.text + part.text };
    } else {
      out.push(part);
    }
  }
  return out;
}

function appendText(segment: RawSegment, text: string): void {
  const extra = cleanNarration(text);
  if (!extra) return;
  segment.text = segment.text ? `${segment.text} ${extra}` : extra;
}

/**
 * Pair narration with images. Whichever kind the response opens with leads
 * each pair: text-first responses caption the following image, image-first
 * responses narrate the preceding one. Narration left after the last image
 * joins the last segment. Images without narration keep an empty text so the
 * validation gate can reject the attempt.
 */
export function pairParts(parts: readonly ResponsePart[]): RawStory {
  const blocks = mergeText(parts);
  const segments: RawSegment[] = [];
  const textFirst = blocks[0]?.kind === 'text';

  if (textFirst) {
    let pending: string | null = null;
    for (const block of blocks) {
      if (block.kind === 'text') {
        pending = block.text;
      } else {
        segments.push({ text: cleanNarration(pending ?? ''), image: block.image });
        pending = null;
      }
    }
    if (pending !== null) {
      const last = segments[segments.length - 1];
      if (last) {
        appendText(last, pending);
      } else {
        const text = cleanNarration(pending);
        if (text) segments.push({ text, image: null });
      }
    }
  } else {
    for (const block of blocks) {
      if (block.kind === 'image') {
        segments.push({ text: '', image: block.image });
        continue;
      }
      const last = segments[segments.length - 1];
      if (last) appendText(last, block.text);
    }
  }

  return { segments };
}
