/**
 * Video assembler: stills + narration in, finished MP4 and thumbnail out.
 *
 * Steps:
 * 1. Reject mismatched inputs before touching the filesystem.
 * 2. Plan the frame grid and verify it against the narration timeline.
 * 3. Write inputs to the work directory and render with one ffmpeg call.
 * 4. Probe the result (drift is logged, not fatal).
 * 5. Render the thumbnail (best-effort).
 */
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type {
  AssemblyResult,
  AudioTimeline,
  ImageAsset,
  ImageMimeType,
  MetadataBundle,
  Story,
  VideoPlan,
} from './types.js';
import { buildVideoPlan, verifyPlan } from '../media/plan.js';
import { buildFilterGraph, buildRenderArgs } from '../media/filtergraph.js';
import { probeDuration, type FfmpegRunner } from '../media/ffmpeg.js';
import { renderThumbnail } from '../media/thumbnail.js';
import { AssemblyInputMismatch, RenderFailure } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface AssemblerSettings {
  video: {
    width: number;
    height: number;
    fps: number;
    bitrate: string;
    crossfadeSeconds: number;
  };
  thumbnail: {
    imageIndex: number;
    fontFile: string;
    banner: string;
  };
}

export interface AssemblyInput {
  story: Story;
  images: readonly ImageAsset[];
  audio: AudioTimeline;
  metadata: MetadataBundle;
  workDir: string;
}

const EXTENSIONS: Record<ImageMimeType, string> = {
  'image/png':  'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
  'image/gif':  'gif',
};

export const VIDEO_FILE = 'story_video.mp4';
export const THUMBNAIL_FILE = 'thumbnail.jpg';
export const NARRATION_FILE = 'narration.wav';
export const FILTER_SCRIPT_FILE = 'filtergraph.txt';

export function imageFileName(image: ImageAsset): string {
  return `image_${String(image.ordinal + 1).padStart(2, '0')}.${EXTENSIONS[image.mimeType]}`;
}

export class VideoAssembler {
  constructor(
    private readonly runner: FfmpegRunner,
    private readonly settings: AssemblerSettings,
  ) {}

  async assemble(input: AssemblyInput): Promise<AssemblyResult> {
    const { story, images, audio, metadata, workDir } = input;
    const { video, thumbnail } = this.settings;

    if (images.length !== story.segments.length) {
      throw new AssemblyInputMismatch(images.length, story.segments.length);
    }
    if (audio.offsets.length !== story.segments.length) {
      throw new RenderFailure(
        `Narration has ${audio.offsets.length} segment(s) for ${story.segments.length} story segment(s)`,
      );
    }

    const plan = buildVideoPlan(audio, video);
    verifyPlan(plan, audio);
    logger.info('Assembler: plan verified', {
      segments: plan.segments.length,
      frames: plan.totalFrames,
      seconds: plan.totalDuration,
      transitionFrames: plan.transitionFrames,
    });

    const { imagePaths, audioPath, filterScriptPath } = await this.stageInputs(workDir, images, audio, plan)
      .catch((err: unknown) => {
        throw new RenderFailure('Could not stage render inputs', err);
      });

    const videoPath = path.join(workDir, VIDEO_FILE);
    try {
      await this.runner.run(
        buildRenderArgs({ plan, imagePaths, audioPath, filterScriptPath, outputPath: videoPath, bitrate: video.bitrate }),
        'renderVideo',
      );
    } catch (err) {
      throw new RenderFailure('Video render failed', err);
    }
    await this.checkDuration(videoPath, audio.totalDuration, plan.fps);

    const heroIndex = Math.min(Math.max(thumbnail.imageIndex, 0), imagePaths.length - 1);
    const heroPath = imagePaths[heroIndex];
    if (heroPath === undefined) throw new RenderFailure('No image available for the thumbnail');
    const thumb = await renderThumbnail({
      runner: this.runner,
      sourceImagePath: heroPath,
      outputPath: path.join(workDir, THUMBNAIL_FILE),
      title: metadata.title,
      banner: thumbnail.banner,
      fontFile: thumbnail.fontFile,
    });

    logger.info('Assembler: video ready', { videoPath, thumbnail: thumb.kind });
    return { videoPath, thumbnail: thumb, plan };
  }

  private async stageInputs(workDir: string, images: readonly ImageAsset[], audio: AudioTimeline, plan: VideoPlan) {
    await mkdir(workDir, { recursive: true });
    const imagePaths = await Promise.all(images.map(async (image) => {
      const file = path.join(workDir, imageFileName(image));
      await writeFile(file, image.data);
      return file;
    }));
    const audioPath = path.join(workDir, NARRATION_FILE);
    await writeFile(audioPath, audio.wav);
    const filterScriptPath = path.join(workDir, FILTER_SCRIPT_FILE);
    await writeFile(filterScriptPath, buildFilterGraph(plan), 'utf8');
    return { imagePaths, audioPath, filterScriptPath };
  }

  private async checkDuration(videoPath: string, expected: number, fps: number): Promise<void> {
    try {
      const actual = await probeDuration(this.runner, videoPath);
      if (actual === null) {
        logger.warn('Assembler: could not read rendered duration', { videoPath });
      } else if (Math.abs(actual - expected) > 1 / fps) {
        logger.warn('Assembler: rendered duration drifts from narration', { actual, expected });
      }
    } catch (err) {
      logger.warn('Assembler: duration probe failed', { error: String(err) });
    }
  }
}
