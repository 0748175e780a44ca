/**
 * Error taxonomy for a pipeline run.
 *
 * Every stage-level failure is a PipelineError tagged with the stage that
 * raised it, so the orchestrator can surface exactly one terminal error that
 * names the failing stage and its underlying cause.
 */

export type StageName = 'prompt' | 'story' | 'audio' | 'metadata' | 'assemble';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: StageName,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

/** Prompt synthesis ran out of attempts. */
export class GenerationExhausted extends PipelineError {
  constructor(cause: unknown) {
    super('Prompt generation exhausted all attempts', 'prompt', { cause });
    this.name = 'GenerationExhausted';
  }
}

/** No story attempt ever passed the validation gate. */
export class StoryGenerationExhausted extends PipelineError {
  constructor(cause: unknown) {
    super('Story generation never produced a valid story', 'story', { cause });
    this.name = 'StoryGenerationExhausted';
  }
}

export class AudioGenerationExhausted extends PipelineError {
  constructor(public readonly ordinal: number, cause: unknown) {
    super(`Speech synthesis failed permanently for segment ${ordinal}`, 'audio', { cause });
    this.name = 'AudioGenerationExhausted';
  }
}

export class AssemblyInputMismatch extends PipelineError {
  constructor(public readonly imageCount: number, public readonly segmentCount: number) {
    super(`Got ${imageCount} image(s) for ${segmentCount} story segment(s)`, 'assemble');
    this.name = 'AssemblyInputMismatch';
  }
}

export class RenderFailure extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super(message, 'assemble', { cause });
    this.name = 'RenderFailure';
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Walk the cause chain down to the innermost failure. */
export function rootCause(err: unknown): unknown {
  let current = err;
  while (current instanceof Error && current.cause !== undefined) {
    current = current.cause;
  }
  return current;
}

/**
 * One-line description of a terminal failure for the CLI and alerts:
 * `story: Story generation never produced a valid story (cause: ...)`.
 */
export function describeFailure(err: unknown): string {
  if (err instanceof PipelineError) {
    const root = rootCause(err);
    const suffix = root !== err ? ` (cause: ${messageOf(root)})` : '';
    return `${err.stage}: ${err.message}${suffix}`;
  }
  return messageOf(err);
}
