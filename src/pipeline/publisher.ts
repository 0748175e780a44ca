/**
 * Publisher: hands a finished bundle to the artifact store.
 * Upload failures are logged and swallowed into `null`: the local files in
 * the bundle's work directory stay valid either way.
 */
import type { ArtifactBundle, ArtifactStore, PublishResult } from './types.js';
import { logger } from '../utils/logger.js';

export async function publishArtifacts(
  bundle: ArtifactBundle,
  store: ArtifactStore | null,
): Promise<PublishResult | null> {
  if (!store) {
    logger.info('Publisher: no artifact store configured, keeping files local', { workDir: bundle.workDir });
    return null;
  }

  logger.info('Publisher: uploading artifacts', { runId: bundle.runId });
  try {
    const result = await store.upload({
      videoPath: bundle.videoPath,
      thumbnailPath: bundle.thumbnail.path,
      metadataPath: bundle.metadataPath,
      metadata: bundle.metadata,
      runId: bundle.runId,
    });
    logger.info('Publisher: upload complete', { videoUrl: result.videoUrl });
    return result;
  } catch (err) {
    logger.error('Publisher: upload failed, video remains available locally', {
      error: err instanceof Error ? err.message : String(err),
      videoPath: bundle.videoPath,
    });
    return null;
  }
}
