/**
 * Narration synthesis: OpenAI TTS with raw PCM output
 * (24 kHz, signed 16-bit little-endian, mono).
 */
import OpenAI from 'openai';
import type { SpeechService } from '../pipeline/types.js';
import { pcm16FromBytes } from '../media/wav.js';
import { logger } from '../utils/logger.js';

export const OPENAI_PCM_SAMPLE_RATE = 24_000;

export type TtsVoice = 'alloy' | 'echo' | 'fable' | 'onyx' | 'nova' | 'shimmer';

export function createSpeechService(opts: { apiKey: string; model: string; voice: TtsVoice }): SpeechService {
  const openai = new OpenAI({ apiKey: opts.apiKey });

  return {
    sampleRate: OPENAI_PCM_SAMPLE_RATE,

    async synthesize(text) {
      logger.debug('Voice: synthesizing narration', { chars: text.length, voice: opts.voice });
      const res = await openai.audio.speech.create({
        model: opts.model,
        voice: opts.voice,
        input: text,
        response_format: 'pcm',
      });
      const bytes = Buffer.from(await res.arrayBuffer());
      return { samples: pcm16FromBytes(bytes), sampleRate: OPENAI_PCM_SAMPLE_RATE };
    },
  };
}
