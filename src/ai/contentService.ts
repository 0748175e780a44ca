/**
 * ContentService backed by Gemini (story + images) and Claude (prompt
 * synthesis, SEO metadata from text and the opening image).
 */
import type { ContentService, RawStory, Story } from '../pipeline/types.js';
import type { TextModel } from './claude.js';
import { NonRetryableError } from '../utils/retry.js';

const STORY_LEAD = 'Generate a story about';
const STYLE_CLAUSE = 'in a highly detailed 3d cartoon animation style';
const ASPECT_CLAUSE = 'Generate images in 16:9 aspect ratio suitable for a widescreen YouTube video.';

const PROMPT_INSTRUCTIONS = `As a creative writing expert for children's stories, write one detailed story prompt for an image-and-text generation model.

Use exactly this shape:
${STORY_LEAD} [CHARACTER] going on an adventure in [SETTING] ${STYLE_CLAUSE}. Make sure each scene has maximum detail, vibrant colors, and professional lighting. The story should be positive, uplifting, and perfect for a children's channel. Tell it in at least six short scenes with one image per scene. ${ASPECT_CLAUSE}

Rules:
- Family-friendly, colorful characters and settings that appeal to young children.
- A new character and fantasy setting every time; no video game worlds, no well-known cartoon characters.
- Reply with the prompt text only, no explanations.`;

/** Make sure a generated prompt carries the lead, the art style and the aspect ratio. */
export function normalizePrompt(raw: string): string {
  let prompt = raw.replace(/```[a-zA-Z]*/g, '').trim();
  const lead = prompt.indexOf(STORY_LEAD);
  if (lead > 0) prompt = prompt.slice(lead);
  if (lead < 0) prompt = `${STORY_LEAD} ${prompt}`;
  if (!prompt.toLowerCase().includes(STYLE_CLAUSE)) {
    prompt = `${prompt.replace(/[.\s]+$/, '')} ${STYLE_CLAUSE}.`;
  }
  if (!prompt.includes('16:9')) prompt = `${prompt} ${ASPECT_CLAUSE}`;
  return prompt.replace(/\s+/g, ' ').trim();
}

/** Pull the JSON object out of a reply that may be fenced or padded with prose. */
export function extractJson(reply: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(reply);
  const body = (fenced?.[1] ?? reply).trim();
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start < 0 || end <= start) throw new Error('Metadata reply contains no JSON object');
  const candidate = body.slice(start, end + 1).replace(/,\s*([}\]])/g, '$1');
  return JSON.parse(candidate);
}

export function metadataPrompt(story: Story): string {
  const text = story.segments.map((s) => s.text).join(' ');
  const preview = text.length > 500 ? `${text.slice(0, 500)}...` : text;
  return `Based on this children's story and its first image, create SEO-optimized metadata for a video.

STORY PREVIEW:
${preview}

PROMPT USED:
${story.prompt}

Return ONLY a JSON object with:
- "title": a catchy, search-friendly title (max 60 characters)
- "description": an engaging description (300-500 characters) with relevant keywords
- "tags": 10-15 relevant tags as strings`;
}

export interface StoryModel {
  generateStory(prompt: string): Promise<RawStory>;
}

export function createContentService(deps: { story: StoryModel; text: TextModel }): ContentService {
  return {
    async completePrompt(seed) {
      const reply = await deps.text.complete(`${PROMPT_INSTRUCTIONS}\n\nUser request: ${seed}`, 600);
      if (!reply.trim()) throw new Error('Prompt model returned an empty reply');
      return normalizePrompt(reply);
    },

    generateStory(prompt) {
      return deps.story.generateStory(prompt);
    },

    async deriveMetadata(story) {
      const first = story.segments[0];
      if (!first) throw new NonRetryableError('Cannot derive metadata for an empty story');
      const reply = await deps.text.describe(
        { text: metadataPrompt(story), image: { data: first.image.data, mimeType: first.image.mimeType } },
        1024,
      );
      return extractJson(reply);
    },
  };
}
