#!/usr/bin/env node
/**
 * Taleloom: CLI entry point.
 *
 *   taleloom run [prompt...]   one pipeline run, then exit
 *   taleloom schedule          persistent process, runs on PIPELINE_CRON
 */
import cron from 'node-cron';
import { loadConfig, type AppConfig } from './config.js';
import { createPipeline } from './pipeline/index.js';
import { publishArtifacts } from './pipeline/publisher.js';
import { createCloudinaryStore } from './platforms/cloudinary.js';
import type { ArtifactBundle, PublishResult } from './pipeline/types.js';
import { configureLogger, logger } from './utils/logger.js';
import { describeFailure } from './utils/errors.js';

// ── Single run ────────────────────────────────────────────────────────────────

function logSummary(bundle: ArtifactBundle, published: PublishResult | null): void {
  logger.info('Run summary', {
    runId:      bundle.runId,
    title:      bundle.metadata.title,
    metadata:   bundle.metadata.source,
    segments:   bundle.story.segments.length,
    seconds:    Number(bundle.durationSeconds.toFixed(2)),
    video:      bundle.videoPath,
    thumbnail:  bundle.thumbnail.path,
    videoUrl:   published?.videoUrl ?? null,
    thumbUrl:   published?.thumbnailUrl ?? null,
  });
}

async function runOnce(config: AppConfig, userPrompt?: string): Promise<void> {
  const pipeline = createPipeline(config);
  const store = config.cloudinary ? createCloudinaryStore(config.cloudinary) : null;
  const bundle = await pipeline.run({ userPrompt });
  const published = await publishArtifacts(bundle, store);
  logSummary(bundle, published);
}

// ── Schedule ──────────────────────────────────────────────────────────────────

function startSchedule(config: AppConfig): void {
  const expression = config.schedule;
  if (!expression || !cron.validate(expression)) {
    throw new Error(`PIPELINE_CRON must be a valid cron expression (got ${expression ?? 'nothing'})`);
  }

  let running = false;
  cron.schedule(expression, async () => {
    if (running) {
      logger.warn('Cron: previous run still in progress, skipping tick');
      return;
    }
    running = true;
    logger.info('Cron: triggering pipeline');
    try {
      await runOnce(config);
    } catch (err) {
      logger.error('Cron: pipeline error', { failure: describeFailure(err) });
    } finally {
      running = false;
    }
  });
  logger.info('Cron: schedule registered', { expression });
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...rest] = process.argv;

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger(config.log);

  switch (command) {
    case 'run': {
      const prompt = rest.join(' ').trim();
      await runOnce(config, prompt || undefined);
      break;
    }
    case 'schedule':
      startSchedule(config);
      break;
    default:
      logger.error(`Unknown command: ${command ?? '(none)'}. Use: run [prompt...] | schedule`);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  logger.error('Fatal', { failure: describeFailure(err) });
  process.exit(1);
});
