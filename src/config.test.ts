import { loadConfig } from './config.js';
import { ConfigError } from './utils/errors.js';

const KEYS = {
  GEMINI_API_KEY: 'test-gemini',
  ANTHROPIC_API_KEY: 'test-anthropic',
  OPENAI_API_KEY: 'test-openai',
};

describe('loadConfig', () => {
  it('applies defaults when only the keys are set', () => {
    const config = loadConfig({ ...KEYS });

    expect(config.keys.gemini).toBe('test-gemini');
    expect(config.video).toEqual({ width: 1920, height: 1080, fps: 30, bitrate: '5M', crossfadeSeconds: 0.25 });
    expect(config.audio).toEqual({ gapSeconds: 0.5 });
    expect(config.story.minSegments).toBe(6);
    expect(config.retry.prompt.maxAttempts).toBe(5);
    expect(config.retry.metadata.maxAttempts).toBe(2);
    expect(config.thumbnail.imageIndex).toBe(0);
    expect(config.cloudinary).toBeNull();
    expect(config.schedule).toBeNull();
  });

  it('returns a deeply frozen config', () => {
    const config = loadConfig({ ...KEYS });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.video)).toBe(true);
    expect(Object.isFrozen(config.retry.story)).toBe(true);
  });

  it('coerces numeric strings', () => {
    const config = loadConfig({ ...KEYS, VIDEO_FPS: '25', SEGMENT_GAP_SECONDS: '0.75', STORY_MAX_ATTEMPTS: '2' });
    expect(config.video.fps).toBe(25);
    expect(config.audio.gapSeconds).toBe(0.75);
    expect(config.retry.story.maxAttempts).toBe(2);
  });

  it('builds retry backoff from the base delay', () => {
    const config = loadConfig({ ...KEYS, RETRY_BASE_DELAY_MS: '1000', RETRY_MAX_DELAY_MS: '5000' });
    const first = config.retry.story.backoff(1);
    expect(first).toBeGreaterThanOrEqual(1000);
    expect(first).toBeLessThanOrEqual(1500);
    expect(config.retry.story.backoff(10)).toBe(5000);
  });

  it('lists every missing key', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(
      'Missing or invalid environment variables: GEMINI_API_KEY, ANTHROPIC_API_KEY, OPENAI_API_KEY',
    );
  });

  it('rejects a minimum segment count below two', () => {
    expect(() => loadConfig({ ...KEYS, MIN_STORY_SEGMENTS: '1' })).toThrow(/MIN_STORY_SEGMENTS/);
  });

  it('requires Cloudinary credentials together', () => {
    expect(() => loadConfig({ ...KEYS, CLOUDINARY_CLOUD_NAME: 'demo' })).toThrow(ConfigError);

    const config = loadConfig({
      ...KEYS,
      CLOUDINARY_CLOUD_NAME: 'demo',
      CLOUDINARY_API_KEY: 'test-key',
      CLOUDINARY_API_SECRET: 'test-secret',
    });
    expect(config.cloudinary).toEqual({ cloudName: 'demo', apiKey: 'test-key', apiSecret: 'test-secret', folder: 'taleloom' });
  });
});
