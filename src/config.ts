import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';
import type { RetryPolicy } from './utils/retry.js';
import { exponentialBackoff } from './utils/retry.js';
import { ConfigError } from './utils/errors.js';

// ── Env Schema ────────────────────────────────────────────────────────────────

const DEFAULT_PROMPT_IDEA =
  'A story about a white baby goat named Pip going on an adventure on a farm, ' +
  'told in a highly detailed 3d cartoon animation style with one widescreen 16:9 image per scene.';

export const EnvSchema = z.object({
  // AI / Generation
  GEMINI_API_KEY:           z.string().min(1),
  ANTHROPIC_API_KEY:        z.string().min(1),
  OPENAI_API_KEY:           z.string().min(1),
  STORY_MODEL:              z.string().default('gemini-2.0-flash-preview-image-generation'),
  TEXT_MODEL:               z.string().default('claude-sonnet-4-6'),
  FALLBACK_TEXT_MODEL:      z.string().default('gpt-4o'),
  TTS_MODEL:                z.string().default('tts-1'),
  TTS_VOICE:                z.enum(['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer']).default('nova'),

  // Storage (optional; upload is skipped when unset)
  CLOUDINARY_CLOUD_NAME:    z.string().min(1).optional(),
  CLOUDINARY_API_KEY:       z.string().min(1).optional(),
  CLOUDINARY_API_SECRET:    z.string().min(1).optional(),
  CLOUDINARY_FOLDER:        z.string().default('taleloom'),

  // Retry budgets
  PROMPT_MAX_ATTEMPTS:      z.coerce.number().int().min(1).default(5),
  STORY_MAX_ATTEMPTS:       z.coerce.number().int().min(1).default(5),
  METADATA_MAX_ATTEMPTS:    z.coerce.number().int().min(1).default(2),
  SPEECH_MAX_ATTEMPTS:      z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS:      z.coerce.number().int().min(0).default(10_000),
  RETRY_MAX_DELAY_MS:       z.coerce.number().int().min(0).default(60_000),

  // Story
  MIN_STORY_SEGMENTS:       z.coerce.number().int().min(2).default(6),
  DEFAULT_PROMPT_IDEA:      z.string().min(1).default(DEFAULT_PROMPT_IDEA),

  // Audio
  SEGMENT_GAP_SECONDS:      z.coerce.number().min(0).default(0.5),

  // Video
  VIDEO_WIDTH:              z.coerce.number().int().positive().default(1920),
  VIDEO_HEIGHT:             z.coerce.number().int().positive().default(1080),
  VIDEO_FPS:                z.coerce.number().int().positive().default(30),
  VIDEO_BITRATE:            z.string().regex(/^\d+[kKmM]?$/).default('5M'),
  CROSSFADE_SECONDS:        z.coerce.number().min(0).default(0.25),

  // Thumbnail
  THUMBNAIL_IMAGE_INDEX:    z.coerce.number().int().min(0).default(0),
  THUMBNAIL_FONT_FILE:      z.string().default('/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf'),
  THUMBNAIL_BANNER:         z.string().default("Children's Story Animation"),

  // Local storage / binaries
  OUTPUT_DIR:               z.string().default('./output'),
  FFMPEG_PATH:              z.string().default('ffmpeg'),
  FFPROBE_PATH:             z.string().default('ffprobe'),

  // Scheduling
  PIPELINE_CRON:            z.string().optional(),

  // Logging
  LOG_LEVEL:                z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:               z.enum(['text', 'json']).default('text'),
});

export type Env = z.infer<typeof EnvSchema>;

// ── App Config ────────────────────────────────────────────────────────────────

export interface CloudinaryConfig {
  readonly cloudName: string;
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly folder: string;
}

export interface AppConfig {
  readonly keys: {
    readonly gemini: string;
    readonly anthropic: string;
    readonly openai: string;
  };
  readonly models: {
    readonly story: string;
    readonly text: string;
    readonly fallbackText: string;
    readonly tts: string;
    readonly ttsVoice: Env['TTS_VOICE'];
  };
  readonly retry: {
    readonly prompt: RetryPolicy;
    readonly story: RetryPolicy;
    readonly metadata: RetryPolicy;
    readonly speech: RetryPolicy;
  };
  readonly story: {
    readonly minSegments: number;
    readonly defaultPromptIdea: string;
  };
  readonly audio: {
    readonly gapSeconds: number;
  };
  readonly video: {
    readonly width: number;
    readonly height: number;
    readonly fps: number;
    readonly bitrate: string;
    readonly crossfadeSeconds: number;
  };
  readonly thumbnail: {
    readonly imageIndex: number;
    readonly fontFile: string;
    readonly banner: string;
  };
  readonly outputDir: string;
  readonly ffmpegPath: string;
  readonly ffprobePath: string;
  readonly cloudinary: CloudinaryConfig | null;
  readonly schedule: string | null;
  readonly log: {
    readonly level: Env['LOG_LEVEL'];
    readonly format: Env['LOG_FORMAT'];
  };
}

function cloudinaryFrom(env: Env): CloudinaryConfig | null {
  const parts = [env.CLOUDINARY_CLOUD_NAME, env.CLOUDINARY_API_KEY, env.CLOUDINARY_API_SECRET];
  const set = parts.filter((p) => p !== undefined).length;
  if (set === 0) return null;
  if (!env.CLOUDINARY_CLOUD_NAME || !env.CLOUDINARY_API_KEY || !env.CLOUDINARY_API_SECRET) {
    throw new ConfigError(
      'CLOUDINARY_CLOUD_NAME, CLOUDINARY_API_KEY and CLOUDINARY_API_SECRET must be set together',
    );
  }
  return {
    cloudName: env.CLOUDINARY_CLOUD_NAME,
    apiKey:    env.CLOUDINARY_API_KEY,
    apiSecret: env.CLOUDINARY_API_SECRET,
    folder:    env.CLOUDINARY_FOLDER,
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const child of Object.values(value)) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the immutable application config from a parsed environment.
 * Every stage receives the slice it needs from here; nothing reads
 * `process.env` after startup.
 */
export function buildConfig(env: Env): AppConfig {
  const policy = (maxAttempts: number): RetryPolicy => ({
    maxAttempts,
    backoff: exponentialBackoff({
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs:  env.RETRY_MAX_DELAY_MS,
    }),
  });

  return deepFreeze({
    keys: {
      gemini:    env.GEMINI_API_KEY,
      anthropic: env.ANTHROPIC_API_KEY,
      openai:    env.OPENAI_API_KEY,
    },
    models: {
      story:        env.STORY_MODEL,
      text:         env.TEXT_MODEL,
      fallbackText: env.FALLBACK_TEXT_MODEL,
      tts:          env.TTS_MODEL,
      ttsVoice:     env.TTS_VOICE,
    },
    retry: {
      prompt:   policy(env.PROMPT_MAX_ATTEMPTS),
      story:    policy(env.STORY_MAX_ATTEMPTS),
      metadata: policy(env.METADATA_MAX_ATTEMPTS),
      speech:   policy(env.SPEECH_MAX_ATTEMPTS),
    },
    story: {
      minSegments:       env.MIN_STORY_SEGMENTS,
      defaultPromptIdea: env.DEFAULT_PROMPT_IDEA,
    },
    audio: {
      gapSeconds: env.SEGMENT_GAP_SECONDS,
    },
    video: {
      width:            env.VIDEO_WIDTH,
      height:           env.VIDEO_HEIGHT,
      fps:              env.VIDEO_FPS,
      bitrate:          env.VIDEO_BITRATE,
      crossfadeSeconds: env.CROSSFADE_SECONDS,
    },
    thumbnail: {
      imageIndex: env.THUMBNAIL_IMAGE_INDEX,
      fontFile:   env.THUMBNAIL_FONT_FILE,
      banner:     env.THUMBNAIL_BANNER,
    },
    outputDir:   env.OUTPUT_DIR,
    ffmpegPath:  env.FFMPEG_PATH,
    ffprobePath: env.FFPROBE_PATH,
    cloudinary:  cloudinaryFrom(env),
    schedule:    env.PIPELINE_CRON ?? null,
    log: {
      level:  env.LOG_LEVEL,
      format: env.LOG_FORMAT,
    },
  });
}

/**
 * Parse environment variables (after loading `.env`) into an AppConfig.
 * Throws ConfigError listing every missing or invalid variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  if (source === process.env) dotenvConfig();

  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new ConfigError(`Missing or invalid environment variables: ${missing}`);
  }
  return buildConfig(parsed.data);
}
