/**
 * Text and vision completions: Anthropic Claude primary, GPT-4o fallback.
 * The content service goes through here; nothing else imports the SDKs.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import type { ImageMimeType } from '../pipeline/types.js';
import { logger } from '../utils/logger.js';

export interface VisionInput {
  text: string;
  image: { data: Buffer; mimeType: ImageMimeType } | null;
}

export interface TextModel {
  complete(prompt: string, maxTokens?: number): Promise<string>;
  describe(input: VisionInput, maxTokens?: number): Promise<string>;
}

export interface TextModelOptions {
  anthropicApiKey: string;
  openaiApiKey: string;
  model: string;
  fallbackModel: string;
}

/** Server-side failures (5xx, overloaded) switch to the fallback model. */
function isUnavailable(err: unknown): boolean {
  return err instanceof Anthropic.APIError && typeof err.status === 'number' && err.status >= 500;
}

function textOf(message: Anthropic.Message): string {
  return message.content
    .filter((b): b is Anthropic.TextBlock => b.type === 'text')
    .map((b) => b.text)
    .join('');
}

export function createTextModel(opts: TextModelOptions): TextModel {
  const anthropic = new Anthropic({ apiKey: opts.anthropicApiKey });
  const openai    = new OpenAI({ apiKey: opts.openaiApiKey });

  async function gpt4oComplete(
    content: OpenAI.Chat.ChatCompletionContentPart[],
    maxTokens: number,
  ): Promise<string> {
    const res = await openai.chat.completions.create({
      model: opts.fallbackModel,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content }],
    });
    return res.choices[0]?.message?.content ?? '';
  }

  return {
    async complete(prompt, maxTokens = 1000) {
      try {
        const res = await anthropic.messages.create({
          model: opts.model,
          max_tokens: maxTokens,
          messages: [{ role: 'user', content: prompt }],
        });
        return textOf(res);
      } catch (err) {
        if (!isUnavailable(err)) throw err;
        logger.warn(`Claude: unavailable, falling back to ${opts.fallbackModel}`, { error: String(err) });
        return gpt4oComplete([{ type: 'text', text: prompt }], maxTokens);
      }
    },

    async describe(input, maxTokens = 1000) {
      const base64 = input.image?.data.toString('base64');
      try {
        const res = await anthropic.messages.create({
          model: opts.model,
          max_tokens: maxTokens,
          messages: [{ role: 'user', content: [
            ...(input.image && base64
              ? [{
                  type: 'image' as const,
                  source: { type: 'base64' as const, media_type: input.image.mimeType, data: base64 },
                }]
              : []),
            { type: 'text' as const, text: input.text },
          ]}],
        });
        return textOf(res);
      } catch (err) {
        if (!isUnavailable(err)) throw err;
        logger.warn(`Claude: unavailable, falling back to ${opts.fallbackModel}`, { error: String(err) });
        return gpt4oComplete([
          ...(input.image && base64
            ? [{
                type: 'image_url' as const,
                image_url: { url: `data:${input.image.mimeType};base64,${base64}` },
              }]
            : []),
          { type: 'text' as const, text: input.text },
        ], maxTokens);
      }
    },
  };
}
