/**
 * In-process stand-ins for the collaborators, shared by the test suites.
 */
import type {
  ContentService,
  MetadataBundle,
  RawStory,
  SpeechService,
  Story,
} from '../pipeline/types.js';
import type { FfmpegRunner } from '../media/ffmpeg.js';
import type { RetryPolicy } from '../utils/retry.js';
import { toStory } from '../pipeline/story.js';

/** A 1×1 transparent PNG. */
export const PIXEL_PNG = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mP8z8BQDwAEhQGAhKmMIQAAAABJRU5ErkJggg==',
  'base64',
);

export const GOAT_TEXTS = [
  'Pip the goat woke early.',
  'He met Rosa by ponds.',
  'They found a golden bell.',
];

/** Retry policy with no waiting between attempts. */
export function instantPolicy(maxAttempts: number): RetryPolicy {
  return { maxAttempts, backoff: () => 0 };
}

export function rawStory(texts: readonly string[]): RawStory {
  return { segments: texts.map((text) => ({ text, image: { data: PIXEL_PNG, mimeType: 'image/png' } })) };
}

export function makeStory(texts: readonly string[] = GOAT_TEXTS, prompt = 'A goat named Pip'): Story {
  return toStory(prompt, rawStory(texts));
}

export function fakeContent(overrides: Partial<ContentService> = {}): ContentService {
  return {
    completePrompt: async (seed) => `Generate a story about ${seed}`,
    generateStory: async () => rawStory(GOAT_TEXTS),
    deriveMetadata: async () => ({ title: 'Pip the Goat', description: 'A farm adventure.', tags: ['goat'] }),
    ...overrides,
  };
}

/** Speech that voices every text as `seconds` of silence at `sampleRate`. */
export function fixedSpeech(seconds: number, sampleRate: number): SpeechService {
  return {
    sampleRate,
    synthesize: async () => ({ samples: new Int16Array(Math.round(seconds * sampleRate)), sampleRate }),
  };
}

export const SERVICE_METADATA: MetadataBundle = {
  title: 'Pip the Goat',
  description: 'A farm adventure.',
  tags: ['goat'],
  source: 'service',
};

export interface RunnerCall {
  kind: 'run' | 'probe';
  label: string;
  args: string[];
}

export interface RecordingRunner extends FfmpegRunner {
  calls: RunnerCall[];
}

/**
 * Records every invocation. `failOn` makes calls with that label throw;
 * probes answer with `probeOutput`.
 */
export function recordingRunner(opts: { failOn?: string; probeOutput?: string } = {}): RecordingRunner {
  const calls: RunnerCall[] = [];
  return {
    calls,
    async run(args, label) {
      calls.push({ kind: 'run', label, args });
      if (label === opts.failOn) throw new Error(`FFmpeg ${label} failed: simulated`);
    },
    async probe(args, label) {
      calls.push({ kind: 'probe', label, args });
      if (label === opts.failOn) throw new Error(`FFprobe ${label} failed: simulated`);
      return opts.probeOutput ?? '';
    },
  };
}
