/**
 * Story stage: asks the content service for a story and admits it only
 * through the validation gate. Rejected attempts use up the retry budget.
 */
import type { ContentService, ImageMimeType, Prompt, RawStory, Story } from './types.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { StoryGenerationExhausted } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const MIME_ALIASES: Record<string, ImageMimeType> = {
  'image/png':  'image/png',
  'image/jpeg': 'image/jpeg',
  'image/jpg':  'image/jpeg',
  'image/webp': 'image/webp',
  'image/gif':  'image/gif',
};

export function toImageMimeType(mimeType: string): ImageMimeType | null {
  return MIME_ALIASES[mimeType.trim().toLowerCase()] ?? null;
}

export class StoryRejected extends Error {
  constructor(reason: string) {
    super(`Story rejected: ${reason}`);
    this.name = 'StoryRejected';
  }
}

/** Validation gate. Throws StoryRejected naming the first problem found. */
export function validateRawStory(raw: RawStory, minSegments: number): void {
  if (raw.segments.length < minSegments) {
    throw new StoryRejected(`${raw.segments.length} segment(s), need at least ${minSegments}`);
  }
  raw.segments.forEach((seg, i) => {
    if (seg.text.trim() === '') throw new StoryRejected(`segment ${i} has no narration`);
    if (!seg.image || seg.image.data.length === 0) throw new StoryRejected(`segment ${i} has no image`);
    if (!toImageMimeType(seg.image.mimeType)) {
      throw new StoryRejected(`segment ${i} image has unsupported type ${seg.image.mimeType}`);
    }
  });
}

/** Build the immutable Story from a raw story that passed the gate. */
export function toStory(prompt: Prompt, raw: RawStory): Story {
  const segments = raw.segments.map((seg, ordinal) => {
    const mimeType = seg.image ? toImageMimeType(seg.image.mimeType) : null;
    if (!seg.image || !mimeType) throw new StoryRejected(`segment ${ordinal} has no usable image`);
    return Object.freeze({
      ordinal,
      text: seg.text.trim(),
      image: Object.freeze({ ordinal, data: seg.image.data, mimeType, aspectRatio: '16:9' as const }),
    });
  });
  return Object.freeze({ prompt, segments: Object.freeze(segments) });
}

export class StoryStage {
  constructor(
    private readonly content: ContentService,
    private readonly policy: RetryPolicy,
    private readonly minSegments: number,
  ) {}

  async generate(prompt: Prompt): Promise<Story> {
    logger.info('Story: requesting story', { minSegments: this.minSegments });
    try {
      const raw = await withRetry(() => this.content.generateStory(prompt), {
        ...this.policy,
        label: 'story',
        validate: (r) => validateRawStory(r, this.minSegments),
      });
      const story = toStory(prompt, raw);
      logger.info('Story: accepted', { segments: story.segments.length });
      return story;
    } catch (err) {
      throw new StoryGenerationExhausted(err);
    }
  }
}
