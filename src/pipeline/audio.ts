/**
 * Audio stage: narrates every segment in order and lays the clips out on
 * one timeline with a fixed silence between neighbours.
 *
 * Offsets are computed once, from sample counts, after all clips exist.
 * A segment that cannot be voiced fails the whole stage; there are no
 * partial timelines.
 */
import type { AudioSegment, AudioTimeline, SegmentOffset, SpeechService, Story } from './types.js';
import { NonRetryableError, withRetry, type RetryPolicy } from '../utils/retry.js';
import { AudioGenerationExhausted } from '../utils/errors.js';
import { concatSamples, encodeWav, silence } from '../media/wav.js';
import { logger } from '../utils/logger.js';

export interface AudioSettings {
  gapSeconds: number;
}

export interface TimelineSettings extends AudioSettings {
  sampleRate: number;
}

/** Concatenate clips with `gapSeconds` of silence between them (none after the last). */
export function buildTimeline(clips: readonly AudioSegment[], settings: TimelineSettings): AudioTimeline {
  const { sampleRate } = settings;
  const gap = silence(settings.gapSeconds, sampleRate);

  const offsets: SegmentOffset[] = [];
  const parts: Int16Array[] = [];
  let cursor = 0;
  clips.forEach((clip, i) => {
    if (i > 0) {
      parts.push(gap);
      cursor += gap.length;
    }
    offsets.push({ ordinal: clip.ordinal, start: cursor / sampleRate, end: (cursor + clip.samples.length) / sampleRate });
    parts.push(clip.samples);
    cursor += clip.samples.length;
  });

  const samples = concatSamples(parts);
  return Object.freeze({
    segments: Object.freeze([...clips]),
    gapSeconds: gap.length / sampleRate,
    sampleRate,
    offsets: Object.freeze(offsets),
    totalDuration: samples.length / sampleRate,
    wav: encodeWav(samples, sampleRate),
  });
}

export class AudioStage {
  constructor(
    private readonly speech: SpeechService,
    private readonly policy: RetryPolicy,
    private readonly settings: AudioSettings,
  ) {}

  async synthesize(story: Story): Promise<AudioTimeline> {
    // The timeline runs at whatever rate the speech service produces
    const { sampleRate } = this.speech;
    const clips: AudioSegment[] = [];

    for (const segment of story.segments) {
      try {
        const clip = await withRetry(() => this.speech.synthesize(segment.text), {
          ...this.policy,
          label: `speech[${segment.ordinal}]`,
          validate: (c) => {
            if (c.samples.length === 0) throw new Error('Speech service returned an empty clip');
            if (c.sampleRate !== sampleRate) {
              throw new NonRetryableError(`Clip sample rate ${c.sampleRate} Hz, expected ${sampleRate} Hz`);
            }
          },
        });
        clips.push(Object.freeze({
          ordinal: segment.ordinal,
          samples: clip.samples,
          sampleRate,
          durationSeconds: clip.samples.length / sampleRate,
        }));
        logger.debug('Audio: segment voiced', { ordinal: segment.ordinal, seconds: clip.samples.length / sampleRate });
      } catch (err) {
        throw new AudioGenerationExhausted(segment.ordinal, err);
      }
    }

    const timeline = buildTimeline(clips, { sampleRate, gapSeconds: this.settings.gapSeconds });
    logger.info('Audio: narration ready', { segments: clips.length, seconds: timeline.totalDuration });
    return timeline;
  }
}
