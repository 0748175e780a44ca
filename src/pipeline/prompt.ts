/**
 * Prompt stage: a user-supplied prompt passes through untouched; otherwise
 * the content service writes one from the configured seed idea.
 */
import type { ContentService, Prompt } from './types.js';
import { withRetry, type RetryPolicy } from '../utils/retry.js';
import { GenerationExhausted } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export class PromptStage {
  constructor(
    private readonly content: ContentService,
    private readonly policy: RetryPolicy,
    private readonly seed: string,
  ) {}

  async obtain(userPrompt?: string): Promise<Prompt> {
    if (userPrompt !== undefined && userPrompt.trim() !== '') {
      logger.info('Prompt: using supplied prompt', { chars: userPrompt.length });
      return userPrompt;
    }

    logger.info('Prompt: generating from seed idea');
    try {
      const prompt = await withRetry(() => this.content.completePrompt(this.seed), {
        ...this.policy,
        label: 'prompt',
        validate: (p) => {
          if (p.trim() === '') throw new Error('Content service returned an empty prompt');
        },
      });
      logger.info('Prompt: generated', { preview: prompt.slice(0, 80) });
      return prompt;
    } catch (err) {
      throw new GenerationExhausted(err);
    }
  }
}
