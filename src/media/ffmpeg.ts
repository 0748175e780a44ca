/**
 * FFmpeg process wrapper: runs ffmpeg/ffprobe with an argument vector and a
 * label used in logs and failure messages.
 *
 * `run` throws on non-zero exit with the captured stderr. The runner is an
 * interface so the assembler can be exercised without the binaries.
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import { logger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);

// Filter graphs for long stories make ffmpeg chatty on stderr
const MAX_BUFFER = 64 * 1024 * 1024;

export interface FfmpegRunner {
  run(args: string[], label: string): Promise<void>;
  probe(args: string[], label: string): Promise<string>;
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string' || Buffer.isBuffer(stderr)) return String(stderr).trim();
  }
  return '';
}

export function createFfmpegRunner(opts: { ffmpegPath: string; ffprobePath: string }): FfmpegRunner {
  return {
    async run(args, label) {
      logger.debug(`FFmpeg [${label}]`, { args });
      try {
        await execFileAsync(opts.ffmpegPath, ['-y', '-hide_banner', ...args], { maxBuffer: MAX_BUFFER });
      } catch (err) {
        throw new Error(`FFmpeg ${label} failed: ${stderrOf(err) || String(err)}`);
      }
    },

    async probe(args, label) {
      logger.debug(`FFprobe [${label}]`, { args });
      try {
        const { stdout } = await execFileAsync(opts.ffprobePath, args, { maxBuffer: MAX_BUFFER });
        return stdout.trim();
      } catch (err) {
        throw new Error(`FFprobe ${label} failed: ${stderrOf(err) || String(err)}`);
      }
    },
  };
}

/** Container duration in seconds, or null when ffprobe output is unusable. */
export async function probeDuration(runner: FfmpegRunner, mediaPath: string): Promise<number | null> {
  const raw = await runner.probe(
    ['-v', 'error', '-show_entries', 'format=duration', '-of', 'csv=p=0', mediaPath],
    'probeDuration',
  );
  const value = parseFloat(raw);
  return Number.isFinite(value) ? value : null;
}
