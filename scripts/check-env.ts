#!/usr/bin/env tsx
/**
 * Pre-flight check before the first run: environment variables, ffmpeg and
 * ffprobe binaries, thumbnail font and output directory.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0  all required checks pass
 *   1  one or more required checks failed
 */
import { execFile } from 'child_process';
import { existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { promisify } from 'util';
import { config as dotenvConfig } from 'dotenv';
import { EnvSchema } from '../src/config.js';

dotenvConfig();

const execFileAsync = promisify(execFile);

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

let anyRequiredFailed = false;

function checkRequired(label: string, value: string | undefined, hint?: string): void {
  if (value && value.trim().length > 0) {
    const display = value.length > 10 ? `${value.slice(0, 6)}…` : '(set)';
    pass(label, display);
  } else {
    fail(label, hint ?? `Set ${label} in .env`);
    anyRequiredFailed = true;
  }
}

// ── Section: Required environment variables ───────────────────────────────────

console.log(`\n${BOLD}=== Taleloom: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Required environment variables${RESET}`);

checkRequired('GEMINI_API_KEY',    process.env['GEMINI_API_KEY'],    'Get from https://aistudio.google.com/apikey');
checkRequired('ANTHROPIC_API_KEY', process.env['ANTHROPIC_API_KEY'], 'Get from https://console.anthropic.com');
checkRequired('OPENAI_API_KEY',    process.env['OPENAI_API_KEY'],    'Get from https://platform.openai.com/api-keys');

// ── Section: Schema validation ─────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Configuration values${RESET}`);

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  for (const issue of parsed.error.issues) {
    fail(issue.path.join('.'), issue.message);
  }
  anyRequiredFailed = true;
} else {
  const env = parsed.data;
  pass('schema', 'all values parse');
  console.log(`  ${YELLOW}○${RESET} STORY_MODEL  ${env.STORY_MODEL}`);
  console.log(`  ${YELLOW}○${RESET} TEXT_MODEL   ${env.TEXT_MODEL} (fallback ${env.FALLBACK_TEXT_MODEL})`);
  console.log(`  ${YELLOW}○${RESET} VIDEO        ${env.VIDEO_WIDTH}x${env.VIDEO_HEIGHT} @ ${env.VIDEO_FPS} fps, ${env.VIDEO_BITRATE}`);
  console.log(`  ${YELLOW}○${RESET} PIPELINE_CRON ${env.PIPELINE_CRON ?? '(unset; schedule mode unavailable)'}`);

  const cloudinaryVars = [env.CLOUDINARY_CLOUD_NAME, env.CLOUDINARY_API_KEY, env.CLOUDINARY_API_SECRET];
  const cloudinarySet = cloudinaryVars.filter((v) => v !== undefined).length;
  if (cloudinarySet === 3) {
    pass('Cloudinary upload', `folder ${env.CLOUDINARY_FOLDER}`);
  } else if (cloudinarySet === 0) {
    console.log(`  ${YELLOW}○${RESET} Cloudinary upload  (not configured; videos stay local)`);
  } else {
    fail('Cloudinary credentials', 'Set CLOUDINARY_CLOUD_NAME, CLOUDINARY_API_KEY and CLOUDINARY_API_SECRET together');
    anyRequiredFailed = true;
  }

  // ── Section: Binaries ──────────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 3 ] Binaries${RESET}`);

  for (const [label, bin] of [['ffmpeg', env.FFMPEG_PATH], ['ffprobe', env.FFPROBE_PATH]] as const) {
    try {
      const { stdout } = await execFileAsync(bin, ['-version']);
      pass(label, stdout.split('\n')[0] ?? '');
    } catch (err) {
      fail(label, `Install ffmpeg or set ${label.toUpperCase()}_PATH (${err instanceof Error ? err.message : String(err)})`);
      anyRequiredFailed = true;
    }
  }

  // ── Section: Files & directories ───────────────────────────────────────────

  console.log(`\n${BOLD}[ 4 ] Files & directories${RESET}`);

  if (existsSync(env.THUMBNAIL_FONT_FILE)) {
    pass('thumbnail font', env.THUMBNAIL_FONT_FILE);
  } else {
    console.log(`  ${YELLOW}○${RESET} thumbnail font  (missing: ${env.THUMBNAIL_FONT_FILE}; thumbnails fall back to the plain image)`);
  }

  const outputDir = resolve(env.OUTPUT_DIR);
  try {
    mkdirSync(outputDir, { recursive: true });
    pass('output directory', outputDir);
  } catch (err) {
    fail('output directory', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run dev${RESET}\n`);
}
