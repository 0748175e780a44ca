import { createContentService, extractJson, normalizePrompt, type StoryModel } from './contentService.js';
import type { TextModel, VisionInput } from './claude.js';
import { makeStory, PIXEL_PNG, rawStory } from '../testing/fixtures.js';
import { NonRetryableError } from '../utils/retry.js';

const STYLE = 'in a highly detailed 3d cartoon animation style';
const ASPECT = 'Generate images in 16:9 aspect ratio suitable for a widescreen YouTube video.';

describe('normalizePrompt', () => {
  it('leaves a complete prompt alone apart from whitespace', () => {
    const prompt = `Generate a story about Pip the goat going on an adventure in Maple Hill ${STYLE}.  Generate images in 16:9.`;
    expect(normalizePrompt(prompt)).toBe(prompt.replace(/\s+/g, ' '));
  });

  it('drops chatter before the lead and adds the missing clauses', () => {
    expect(normalizePrompt('Here you go: Generate a story about Pip.'))
      .toBe(`Generate a story about Pip ${STYLE}. ${ASPECT}`);
  });

  it('adds the lead to a bare idea and strips code fences', () => {
    expect(normalizePrompt('```\na dragon who bakes bread\n```'))
      .toBe(`Generate a story about a dragon who bakes bread ${STYLE}. ${ASPECT}`);
  });
});

describe('extractJson', () => {
  it('reads a fenced object with trailing commas', () => {
    expect(extractJson('```json\n{"title": "Pip", "tags": ["a", "b",],}\n```')).toEqual({ title: 'Pip', tags: ['a', 'b'] });
  });

  it('finds an object padded with prose', () => {
    expect(extractJson('Sure! {"title":"Pip"} Hope this helps')).toEqual({ title: 'Pip' });
  });

  it('throws when there is no object', () => {
    expect(() => extractJson('no json here')).toThrow('Metadata reply contains no JSON object');
  });
});

describe('createContentService', () => {
  const story: StoryModel = { generateStory: async () => rawStory(['Pip woke.']) };

  interface Seen {
    prompts: string[];
    vision: VisionInput[];
    maxTokens: (number | undefined)[];
  }

  const newSeen = (): Seen => ({ prompts: [], vision: [], maxTokens: [] });

  function textModel(reply: string, seen: Seen): TextModel {
    return {
      complete: async (prompt, maxTokens) => {
        seen.prompts.push(prompt);
        seen.maxTokens.push(maxTokens);
        return reply;
      },
      describe: async (input, maxTokens) => {
        seen.vision.push(input);
        seen.maxTokens.push(maxTokens);
        return reply;
      },
    };
  }

  it('writes a prompt from the seed and normalizes it', async () => {
    const seen = newSeen();
    const service = createContentService({ story, text: textModel('Generate a story about Pip.', seen) });

    expect(await service.completePrompt('a curious goat')).toBe(`Generate a story about Pip ${STYLE}. ${ASPECT}`);
    expect(seen.prompts[0]?.endsWith('User request: a curious goat')).toBe(true);
  });

  it('rejects an empty prompt reply', async () => {
    const seen = newSeen();
    const service = createContentService({ story, text: textModel('  ', seen) });
    await expect(service.completePrompt('seed')).rejects.toThrow('Prompt model returned an empty reply');
  });

  it('describes the opening image together with the story text', async () => {
    const seen = newSeen();
    const service = createContentService({
      story,
      text: textModel('```json\n{"title":"Pip","description":"A tale.","tags":["goat"]}\n```', seen),
    });

    const value = await service.deriveMetadata(makeStory());

    expect(value).toEqual({ title: 'Pip', description: 'A tale.', tags: ['goat'] });
    expect(seen.vision[0]?.image).toEqual({ data: PIXEL_PNG, mimeType: 'image/png' });
    expect(seen.vision[0]?.text).toContain('STORY PREVIEW:\nPip the goat woke early. He met Rosa by ponds. They found a golden bell.');
    expect(seen.vision[0]?.text).toContain('PROMPT USED:\nA goat named Pip');
    expect(seen.maxTokens).toEqual([1024]);
  });

  it('refuses to describe an empty story without retrying', async () => {
    const seen = newSeen();
    const service = createContentService({ story, text: textModel('{}', seen) });
    await expect(service.deriveMetadata(makeStory([]))).rejects.toThrow(NonRetryableError);
  });

  it('passes story generation straight to the story model', async () => {
    const seen = newSeen();
    const service = createContentService({ story, text: textModel('', seen) });
    expect(await service.generateStory('p')).toEqual(rawStory(['Pip woke.']));
  });
});
