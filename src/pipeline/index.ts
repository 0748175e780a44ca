/**
 * Pipeline orchestrator: prompt, story, then audio and metadata side by side, then assembly.
 *
 * Audio and metadata are the only concurrent stages. Both always settle
 * before anything is decided, so a narration failure is reported only after
 * metadata finishes, and the assembler never starts without both.
 */
import { randomBytes } from 'crypto';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { AppConfig } from '../config.js';
import type {
  ArtifactBundle,
  AssemblyResult,
  AudioTimeline,
  MetadataBundle,
  Prompt,
  Story,
} from './types.js';
import { PromptStage } from './prompt.js';
import { StoryStage } from './story.js';
import { AudioStage } from './audio.js';
import { MetadataStage } from './metadata.js';
import { VideoAssembler, type AssemblyInput } from './assembler.js';
import { GeminiStoryClient } from '../ai/gemini.js';
import { createTextModel } from '../ai/claude.js';
import { createContentService } from '../ai/contentService.js';
import { createSpeechService } from '../ai/voice.js';
import { createFfmpegRunner, type FfmpegRunner } from '../media/ffmpeg.js';
import { describeFailure, PipelineError, type StageName } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface PipelineStages {
  prompt:    { obtain(userPrompt?: string): Promise<Prompt> };
  story:     { generate(prompt: Prompt): Promise<Story> };
  audio:     { synthesize(story: Story): Promise<AudioTimeline> };
  metadata:  { derive(story: Story): Promise<MetadataBundle> };
  assembler: { assemble(input: AssemblyInput): Promise<AssemblyResult> };
}

export interface PipelineOptions {
  outputDir: string;
  now?: () => Date;
}

export interface RunInput {
  userPrompt?: string;
}

export const STORY_TEXT_FILE = 'story.txt';
export const METADATA_FILE = 'metadata.json';

/** `story_20261019T083000Z_1a2b3c`: sortable, unique across concurrent runs. */
export function makeRunId(now: Date): string {
  const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, 'Z');
  return `story_${stamp}_${randomBytes(3).toString('hex')}`;
}

/** Write one file of the run's record, creating the work directory as needed. */
async function writeArtifact(file: string, content: string, stage: StageName): Promise<void> {
  try {
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf8');
  } catch (err) {
    throw new PipelineError(`Could not write ${path.basename(file)}`, stage, { cause: err });
  }
}

export class Pipeline {
  constructor(
    private readonly stages: PipelineStages,
    private readonly opts: PipelineOptions,
  ) {}

  async run(input: RunInput = {}): Promise<ArtifactBundle> {
    const runId = makeRunId(this.opts.now?.() ?? new Date());
    logger.info('Pipeline: starting run', { runId });

    try {
      const prompt = await this.stages.prompt.obtain(input.userPrompt);
      const story = await this.stages.story.generate(prompt);

      const workDir = path.join(this.opts.outputDir, runId);
      await writeArtifact(
        path.join(workDir, STORY_TEXT_FILE),
        story.segments.map((s) => s.text).join('\n\n') + '\n',
        'story',
      );

      const [audioResult, metadataResult] = await Promise.allSettled([
        this.stages.audio.synthesize(story),
        this.stages.metadata.derive(story),
      ]);
      if (audioResult.status === 'rejected') throw audioResult.reason;
      if (metadataResult.status === 'rejected') throw metadataResult.reason;
      const audio = audioResult.value;
      const metadata = metadataResult.value;

      const metadataPath = path.join(workDir, METADATA_FILE);
      await writeArtifact(
        metadataPath,
        JSON.stringify({ title: metadata.title, description: metadata.description, tags: metadata.tags, source: metadata.source }, null, 2),
        'metadata',
      );

      const assembled = await this.stages.assembler.assemble({
        story,
        images: story.segments.map((s) => s.image),
        audio,
        metadata,
        workDir,
      });

      const bundle: ArtifactBundle = Object.freeze({
        runId,
        prompt,
        story,
        audio,
        videoPath: assembled.videoPath,
        thumbnail: assembled.thumbnail,
        metadata,
        metadataPath,
        durationSeconds: assembled.plan.totalDuration,
        workDir,
      });
      logger.info('Pipeline: run complete', { runId, videoPath: bundle.videoPath, seconds: bundle.durationSeconds });
      return bundle;
    } catch (err) {
      logger.error('Pipeline: run failed', { runId, failure: describeFailure(err) });
      throw err;
    }
  }
}

/** Wire the production adapters from config. `runner` is swappable for smoke tests. */
export function createPipeline(config: AppConfig, deps: { runner?: FfmpegRunner } = {}): Pipeline {
  const content = createContentService({
    story: new GeminiStoryClient(config.keys.gemini, config.models.story),
    text: createTextModel({
      anthropicApiKey: config.keys.anthropic,
      openaiApiKey: config.keys.openai,
      model: config.models.text,
      fallbackModel: config.models.fallbackText,
    }),
  });
  const speech = createSpeechService({
    apiKey: config.keys.openai,
    model: config.models.tts,
    voice: config.models.ttsVoice,
  });
  const runner = deps.runner ?? createFfmpegRunner({ ffmpegPath: config.ffmpegPath, ffprobePath: config.ffprobePath });

  return new Pipeline(
    {
      prompt:    new PromptStage(content, config.retry.prompt, config.story.defaultPromptIdea),
      story:     new StoryStage(content, config.retry.story, config.story.minSegments),
      audio:     new AudioStage(speech, config.retry.speech, config.audio),
      metadata:  new MetadataStage(content, config.retry.metadata),
      assembler: new VideoAssembler(runner, { video: config.video, thumbnail: config.thumbnail }),
    },
    { outputDir: config.outputDir },
  );
}
