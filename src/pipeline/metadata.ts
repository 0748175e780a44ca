/**
 * Metadata stage: title, description and tags for the finished video.
 *
 * One guarded service call; whatever goes wrong, a deterministic fallback
 * built from the story text is returned instead. This stage never throws.
 */
import { z } from 'zod';
import type { ContentService, MetadataBundle, Story } from './types.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

export const MAX_TITLE_LENGTH = 100;
export const FALLBACK_TITLE_LENGTH = 60;
export const DESCRIPTION_PREVIEW_LENGTH = 500;
export const MAX_TAGS = 15;

const TITLE_SUFFIX = " | Children's Story";
const HASHTAGS = '#ChildrensStory #Animation #KidsEntertainment';

const STATIC_TAGS = [
  "children's story",
  'kids animation',
  'bedtime story',
  'animated story',
  'family friendly',
  'kids entertainment',
  'story time',
  'animated adventure',
  '3D animation',
  'storybook',
];

// Capitalized words that are not names when they show up mid-sentence
const NOT_NAMES = new Set([
  'The', 'A', 'An', 'And', 'But', 'Or', 'So', 'Then', 'When', 'While', 'Oh', 'Yes', 'No',
  'Hello', 'Hi', 'Wow', 'Look', 'Let', 'Come', 'We', 'You', 'He', 'She', 'They', 'It',
  'His', 'Her', 'Their', 'Our', 'My', 'Your', 'This', 'That', 'What', 'Where', 'Why', 'How',
]);

const ServiceMetadataSchema = z.object({
  title:       z.string().trim().min(1),
  description: z.string().trim().min(1),
  tags:        z.array(z.string()).default([]),
});

// ── Helpers ────────────────────────────────────────────────────────────────────

/** Cut at a word boundary so the result plus an ellipsis fits in `max`. */
export function truncateWords(text: string, max: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length <= max) return clean;
  const cut = clean.slice(0, max - 1);
  const lastSpace = cut.lastIndexOf(' ');
  const base = (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).replace(/[\s.,;:!?-]+$/, '');
  return `${base}…`;
}

export function dedupeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of tags) {
    const tag = raw.trim();
    const key = tag.toLowerCase();
    if (!tag || seen.has(key)) continue;
    seen.add(key);
    out.push(tag);
  }
  return out;
}

interface NameOccurrence {
  name: string;
  opensSentence: boolean;
}

function capitalizedWords(text: string): NameOccurrence[] {
  const found: NameOccurrence[] = [];
  for (const sentence of text.split(/(?<=[.!?])\s+/)) {
    sentence.split(/\s+/).filter(Boolean).forEach((word, i) => {
      const bare = word.replace(/^[^A-Za-z]+|[^A-Za-z]+$/g, '').replace(/'s$/, '');
      if (/^[A-Z][a-z]+$/.test(bare) && !NOT_NAMES.has(bare)) found.push({ name: bare, opensSentence: i === 0 });
    });
  }
  return found;
}

/**
 * Character and place names in story order. A capitalized word counts when
 * it appears mid-sentence, or when it opens a sentence and shows up
 * capitalized again elsewhere in `texts` or in `context` (the prompt).
 */
export function storyNames(texts: readonly string[], context = ''): string[] {
  const occurrences = texts.flatMap(capitalizedWords);
  const inContext = new Set(capitalizedWords(context).map((o) => o.name));
  const counts = new Map<string, number>();
  for (const { name } of occurrences) counts.set(name, (counts.get(name) ?? 0) + 1);

  return occurrences
    .filter(({ name, opensSentence }) =>
      !opensSentence || (counts.get(name) ?? 0) > 1 || inContext.has(name))
    .map((o) => o.name);
}

// ── Normalization & fallback ───────────────────────────────────────────────────

/** Validate untrusted service output. Throws on a shape mismatch. */
export function toMetadataBundle(value: unknown): MetadataBundle {
  const parsed = ServiceMetadataSchema.parse(value);
  return Object.freeze({
    title: truncateWords(parsed.title, MAX_TITLE_LENGTH),
    description: parsed.description,
    tags: Object.freeze(dedupeTags(parsed.tags).slice(0, MAX_TAGS)),
    source: 'service' as const,
  });
}

export function fallbackMetadata(story: Story): MetadataBundle {
  const opening = story.segments[0]?.text.replace(/[.!?,;:]+$/, '') ?? '';
  const excerpt = truncateWords(opening || 'A New Adventure', FALLBACK_TITLE_LENGTH - TITLE_SUFFIX.length);
  const title = `${excerpt}${TITLE_SUFFIX}`;

  const joined = story.segments.map((s) => s.text).join(' ');
  const preview = joined.length > DESCRIPTION_PREVIEW_LENGTH
    ? `${joined.slice(0, DESCRIPTION_PREVIEW_LENGTH).trimEnd()}...`
    : joined;
  const description = `${preview}\n\n${HASHTAGS}`;

  const names = storyNames(story.segments.map((s) => s.text), story.prompt);
  const tags = dedupeTags([...STATIC_TAGS, ...names]).slice(0, MAX_TAGS);

  return Object.freeze({ title, description, tags: Object.freeze(tags), source: 'fallback' as const });
}

// ── Stage ──────────────────────────────────────────────────────────────────────

export class MetadataStage {
  constructor(
    private readonly content: ContentService,
    private readonly policy: RetryPolicy,
  ) {}

  async derive(story: Story): Promise<MetadataBundle> {
    try {
      const bundle = await withRetry(
        async () => toMetadataBundle(await this.content.deriveMetadata(story)),
        { ...this.policy, label: 'metadata' },
      );
      logger.info('Metadata: derived by service', { title: bundle.title, tags: bundle.tags.length });
      return bundle;
    } catch (err) {
      const bundle = fallbackMetadata(story);
      logger.warn('Metadata: service failed, using fallback', { error: String(err), title: bundle.title });
      return bundle;
    }
  }
}
