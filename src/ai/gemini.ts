/**
 * Gemini story client: one request returns the whole story as interleaved
 * narration text and inline images.
 *
 * Streaming first; when the stream throws or ends without a single image the
 * same prompt is sent once more without streaming.
 */
import {
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
  Modality,
  type GenerateContentConfig,
  type GenerateContentResponse,
} from '@google/genai';
import type { RawStory } from '../pipeline/types.js';
import { pairParts, type ResponsePart } from '../pipeline/storyParser.js';
import { logger } from '../utils/logger.js';

const GENERATION_CONFIG: GenerateContentConfig = {
  temperature: 1.0,
  topP: 0.95,
  topK: 64,
  maxOutputTokens: 8192,
  responseModalities: [Modality.TEXT, Modality.IMAGE],
  safetySettings: [
    HarmCategory.HARM_CATEGORY_HARASSMENT,
    HarmCategory.HARM_CATEGORY_HATE_SPEECH,
    HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
    HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
  ].map((category) => ({ category, threshold: HarmBlockThreshold.BLOCK_LOW_AND_ABOVE })),
};

/** Text and inline image parts of the first candidate, in response order. */
export function partsOf(response: Pick<GenerateContentResponse, 'candidates'>): ResponsePart[] {
  const parts: ResponsePart[] = [];
  for (const part of response.candidates?.[0]?.content?.parts ?? []) {
    if (part.thought) continue;
    if (part.text) {
      parts.push({ kind: 'text', text: part.text });
    } else if (part.inlineData?.data) {
      parts.push({
        kind: 'image',
        image: {
          data: Buffer.from(part.inlineData.data, 'base64'),
          mimeType: part.inlineData.mimeType ?? 'image/png',
        },
      });
    }
  }
  return parts;
}

const hasImage = (parts: readonly ResponsePart[]) => parts.some((p) => p.kind === 'image');

export class GeminiStoryClient {
  private readonly ai: GoogleGenAI;

  constructor(apiKey: string, private readonly model: string) {
    this.ai = new GoogleGenAI({ apiKey });
  }

  async generateStory(prompt: string): Promise<RawStory> {
    let parts: ResponsePart[] = [];
    try {
      parts = await this.streamParts(prompt);
    } catch (err) {
      logger.warn('Gemini: streaming generation failed, retrying without streaming', { error: String(err) });
    }

    if (!hasImage(parts)) {
      if (parts.length > 0) logger.warn('Gemini: stream returned no images, retrying without streaming');
      const response = await this.ai.models.generateContent({
        model: this.model,
        contents: prompt,
        config: GENERATION_CONFIG,
      });
      parts = partsOf(response);
    }

    const story = pairParts(parts);
    logger.info('Gemini: story received', {
      parts: parts.length,
      segments: story.segments.length,
      images: parts.filter((p) => p.kind === 'image').length,
    });
    return story;
  }

  private async streamParts(prompt: string): Promise<ResponsePart[]> {
    const stream = await this.ai.models.generateContentStream({
      model: this.model,
      contents: prompt,
      config: GENERATION_CONFIG,
    });
    const parts: ResponsePart[] = [];
    for await (const chunk of stream) {
      parts.push(...partsOf(chunk));
    }
    return parts;
  }
}
