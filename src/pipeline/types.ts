/**
 * Entities passed between pipeline stages. Each is fully built by one stage
 * and treated as read-only by every stage after it.
 */

export type Prompt = string;

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/webp' | 'image/gif';

export interface ImageAsset {
  readonly ordinal: number;
  readonly data: Buffer;
  readonly mimeType: ImageMimeType;
  readonly aspectRatio: '16:9';
}

export interface StorySegment {
  readonly ordinal: number;
  readonly text: string;
  readonly image: ImageAsset;
}

export interface Story {
  readonly prompt: Prompt;
  readonly segments: readonly StorySegment[];
}

// ── Raw (untrusted) service output ────────────────────────────────────────────

export interface RawImage {
  data: Buffer;
  mimeType: string;
}

export interface RawSegment {
  text: string;
  image: RawImage | null;
}

export interface RawStory {
  segments: RawSegment[];
}

// ── Audio ─────────────────────────────────────────────────────────────────────

export interface AudioSegment {
  readonly ordinal: number;
  readonly samples: Int16Array;
  readonly sampleRate: number;
  readonly durationSeconds: number;
}

export interface SegmentOffset {
  readonly ordinal: number;
  /** Seconds from the start of the timeline, inclusive. */
  readonly start: number;
  /** Seconds from the start of the timeline, exclusive. */
  readonly end: number;
}

export interface AudioTimeline {
  readonly segments: readonly AudioSegment[];
  readonly gapSeconds: number;
  readonly sampleRate: number;
  readonly offsets: readonly SegmentOffset[];
  readonly totalDuration: number;
  /** The whole narration encoded as 16-bit mono WAV. */
  readonly wav: Buffer;
}

// ── Metadata ──────────────────────────────────────────────────────────────────

export interface MetadataBundle {
  readonly title: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly source: 'service' | 'fallback';
}

// ── Video ─────────────────────────────────────────────────────────────────────

export type PanDirection = 'right' | 'left' | 'down' | 'up';

/** Start/end crop state for the Ken Burns path. Positions are 0..1 fractions of the free margin. */
export interface MotionDescriptor {
  readonly zoomFrom: number;
  readonly zoomTo: number;
  readonly panFrom: { readonly x: number; readonly y: number };
  readonly panTo: { readonly x: number; readonly y: number };
  readonly direction: PanDirection;
}

export interface PlannedSegment {
  readonly ordinal: number;
  readonly narrationStart: number;
  readonly narrationEnd: number;
  /** On-screen window, seconds, after frame quantization. */
  readonly start: number;
  readonly duration: number;
  readonly startFrame: number;
  readonly endFrame: number;
  /** Extra frames rendered before startFrame for the incoming cross-fade. */
  readonly leadInFrames: number;
  /** Extra frames rendered after endFrame for the outgoing cross-fade. */
  readonly tailOutFrames: number;
  readonly motion: MotionDescriptor;
}

export interface VideoPlan {
  readonly width: number;
  readonly height: number;
  readonly fps: number;
  readonly transitionFrames: number;
  readonly segments: readonly PlannedSegment[];
  readonly totalFrames: number;
  readonly totalDuration: number;
}

export type ThumbnailResult =
  | { readonly kind: 'overlaid'; readonly path: string; readonly fontSize: number; readonly lines: readonly string[] }
  | { readonly kind: 'original'; readonly path: string; readonly reason: string };

export interface AssemblyResult {
  readonly videoPath: string;
  readonly thumbnail: ThumbnailResult;
  readonly plan: VideoPlan;
}

export interface ArtifactBundle {
  readonly runId: string;
  readonly prompt: Prompt;
  readonly story: Story;
  readonly audio: AudioTimeline;
  readonly videoPath: string;
  readonly thumbnail: ThumbnailResult;
  readonly metadata: MetadataBundle;
  readonly metadataPath: string;
  readonly durationSeconds: number;
  readonly workDir: string;
}

export interface PublishResult {
  readonly videoUrl: string;
  readonly thumbnailUrl: string | null;
  readonly metadataUrl: string | null;
}

// ── Collaborator contracts ────────────────────────────────────────────────────

export interface ContentService {
  /** Synthesize a creative story prompt, guided by `seed`. */
  completePrompt(seed: string): Promise<string>;
  generateStory(prompt: Prompt): Promise<RawStory>;
  /** Untrusted: validated by the metadata stage. */
  deriveMetadata(story: Story): Promise<unknown>;
}

export interface SpeechClip {
  samples: Int16Array;
  sampleRate: number;
}

export interface SpeechService {
  /** Rate of every clip this service returns. */
  readonly sampleRate: number;
  synthesize(text: string): Promise<SpeechClip>;
}

export interface ArtifactStore {
  upload(input: {
    videoPath: string;
    thumbnailPath: string;
    metadataPath: string;
    metadata: MetadataBundle;
    runId: string;
  }): Promise<PublishResult>;
}
