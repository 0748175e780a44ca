/**
 * Cloudinary artifact store: video, thumbnail and metadata JSON land under
 * `<folder>/<runId>/`. The video carries the title and tags so it can be
 * found from the media library.
 */
import { v2 as cloudinary, type UploadApiOptions } from 'cloudinary';
import type { CloudinaryConfig } from '../config.js';
import type { ArtifactStore } from '../pipeline/types.js';
import { withRetry, exponentialBackoff } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

/** Escape a value for Cloudinary's `key=value|key=value` context string. */
export function contextValue(value: string): string {
  return value.replace(/[=|]/g, '\\$&');
}

export function createCloudinaryStore(config: CloudinaryConfig): ArtifactStore {
  cloudinary.config({
    cloud_name: config.cloudName,
    api_key:    config.apiKey,
    api_secret: config.apiSecret,
    secure:     true,
  });

  const upload = (file: string, options: UploadApiOptions, label: string) =>
    withRetry(async () => {
      const res = await cloudinary.uploader.upload(file, options);
      return res.secure_url;
    }, {
      label,
      maxAttempts: 3,
      backoff: exponentialBackoff({ baseDelayMs: 2_000, maxDelayMs: 15_000 }),
    });

  return {
    async upload({ videoPath, thumbnailPath, metadataPath, metadata, runId }) {
      const folder = `${config.folder}/${runId}`;
      logger.info('Cloudinary: uploading', { folder });

      const videoUrl = await upload(videoPath, {
        resource_type: 'video',
        folder,
        public_id: 'story_video',
        tags: [...metadata.tags],
        context: `caption=${contextValue(metadata.title)}|alt=${contextValue(metadata.title)}`,
      }, 'cloudinary.video');

      // Only the video upload is required

      const thumbnailUrl = await upload(thumbnailPath, { resource_type: 'image', folder, public_id: 'thumbnail' }, 'cloudinary.thumbnail')
        .catch((err: unknown) => {
          logger.warn('Cloudinary: thumbnail upload failed', { error: String(err) });
          return null;
        });
      const metadataUrl = await upload(metadataPath, { resource_type: 'raw', folder, public_id: 'metadata.json' }, 'cloudinary.metadata')
        .catch((err: unknown) => {
          logger.warn('Cloudinary: metadata upload failed', { error: String(err) });
          return null;
        });

      return { videoUrl, thumbnailUrl, metadataUrl };
    },
  };
}
