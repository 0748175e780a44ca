import { contextValue, createCloudinaryStore } from './cloudinary.js';
import { NonRetryableError } from '../utils/retry.js';
import { SERVICE_METADATA } from '../testing/fixtures.js';

const { config, upload } = vi.hoisted(() => ({
  config: vi.fn(),
  upload: vi.fn(),
}));

vi.mock('cloudinary', () => ({
  v2: { config, uploader: { upload } },
}));

const CONFIG = { cloudName: 'demo', apiKey: 'test-key', apiSecret: 'test-secret', folder: 'stories' };

const INPUT = {
  videoPath: '/out/run/story_video.mp4',
  thumbnailPath: '/out/run/thumbnail.jpg',
  metadataPath: '/out/run/metadata.json',
  metadata: { ...SERVICE_METADATA, title: 'Pip | the Goat' },
  runId: 'story_20261019T083000Z_abc123',
};

describe('contextValue', () => {
  it('escapes the context separators', () => {
    expect(contextValue('a=b|c')).toBe('a\\=b\\|c');
    expect(contextValue('plain')).toBe('plain');
  });
});

describe('createCloudinaryStore', () => {
  beforeEach(() => {
    config.mockReset();
    upload.mockReset();
  });

  it('uploads all three artifacts under the run folder', async () => {
    upload.mockImplementation(async (file: string) => ({ secure_url: `https://res.test/${file.split('/').pop()}` }));

    const result = await createCloudinaryStore(CONFIG).upload(INPUT);

    expect(config).toHaveBeenCalledWith({ cloud_name: 'demo', api_key: 'test-key', api_secret: 'test-secret', secure: true });
    expect(result).toEqual({
      videoUrl: 'https://res.test/story_video.mp4',
      thumbnailUrl: 'https://res.test/thumbnail.jpg',
      metadataUrl: 'https://res.test/metadata.json',
    });
    expect(upload).toHaveBeenNthCalledWith(1, '/out/run/story_video.mp4', {
      resource_type: 'video',
      folder: 'stories/story_20261019T083000Z_abc123',
      public_id: 'story_video',
      tags: ['goat'],
      context: 'caption=Pip \\| the Goat|alt=Pip \\| the Goat',
    });
    expect(upload).toHaveBeenNthCalledWith(3, '/out/run/metadata.json', {
      resource_type: 'raw',
      folder: 'stories/story_20261019T083000Z_abc123',
      public_id: 'metadata.json',
    });
  });

  it('still returns the video when the thumbnail upload fails', async () => {
    upload.mockImplementation(async (file: string) => {
      if (file.endsWith('thumbnail.jpg')) throw new NonRetryableError('bad image');
      return { secure_url: `https://res.test/${file.split('/').pop()}` };
    });

    const result = await createCloudinaryStore(CONFIG).upload(INPUT);

    expect(result).toEqual({
      videoUrl: 'https://res.test/story_video.mp4',
      thumbnailUrl: null,
      metadataUrl: 'https://res.test/metadata.json',
    });
  });

  it('fails when the video cannot be uploaded', async () => {
    upload.mockRejectedValue(new NonRetryableError('invalid credentials'));
    await expect(createCloudinaryStore(CONFIG).upload(INPUT)).rejects.toThrow('invalid credentials');
    expect(upload).toHaveBeenCalledTimes(1);
  });
});
