#!/usr/bin/env tsx
/**
 * Pre-flight environment validation for the quote reel pipeline.
 * Checks configuration, the ffmpeg/ffprobe binaries, and the encoder and
 * filters the pipeline relies on.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0: all required checks pass
 *   1: one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { env } from '../src/config.js';

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

// ── Result tracking ───────────────────────────────────────────────────────────

let anyRequiredFailed = false;

function runTool(binary: string, args: string[]): string | null {
  try {
    return execFileSync(binary, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });
  } catch {
    return null;
  }
}

// ── Section: Configuration ────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Quote Reel: Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Configuration${RESET}`);

function showSetting(label: string, value: string | number | boolean): void {
  const fromEnv = process.env[label] !== undefined;
  console.log(`  ${YELLOW}○${RESET} ${label}  ${String(value)}${fromEnv ? '' : '  (default)'}`);
}

showSetting('FFMPEG_PATH',             env.FFMPEG_PATH);
showSetting('FFPROBE_PATH',            env.FFPROBE_PATH);
showSetting('CLOSENESS_TOLERANCE_SEC', env.CLOSENESS_TOLERANCE_SEC);
showSetting('FADE_DURATION_SEC',       env.FADE_DURATION_SEC);
showSetting('STRIP_AUDIO_WHEN_CLOSE',  env.STRIP_AUDIO_WHEN_CLOSE);
showSetting('VIDEO_CODEC',             env.VIDEO_CODEC);
showSetting('VIDEO_PRESET',            env.VIDEO_PRESET);
showSetting('VIDEO_CRF',               env.VIDEO_CRF);
showSetting('VIDEO_FPS',               env.VIDEO_FPS);
showSetting('LOG_LEVEL',               env.LOG_LEVEL);

// ── Section: Binaries ─────────────────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Transcoder binaries${RESET}`);

function checkBinary(label: string, binary: string): boolean {
  const out = runTool(binary, ['-version']);
  if (out) {
    pass(label, out.split('\n')[0] ?? '');
    return true;
  }
  fail(label, `Install it or set ${label.toUpperCase()}_PATH in .env (tried "${binary}")`);
  anyRequiredFailed = true;
  return false;
}

const ffmpegOk = checkBinary('ffmpeg', env.FFMPEG_PATH);
checkBinary('ffprobe', env.FFPROBE_PATH);

// ── Section: Encoders and filters ─────────────────────────────────────────────

console.log(`\n${BOLD}[ 3 ] Encoder and filters${RESET}`);

if (ffmpegOk) {
  const encoders = runTool(env.FFMPEG_PATH, ['-hide_banner', '-encoders']) ?? '';
  if (new RegExp(`\\s${env.VIDEO_CODEC}\\s`).test(encoders)) {
    pass(`encoder ${env.VIDEO_CODEC}`);
  } else {
    fail(`encoder ${env.VIDEO_CODEC}`, 'Use an ffmpeg build that includes it, or change VIDEO_CODEC');
    anyRequiredFailed = true;
  }

  const filters = runTool(env.FFMPEG_PATH, ['-hide_banner', '-filters']) ?? '';
  for (const name of ['split', 'concat', 'adelay', 'apad', 'volume', 'afade', 'amix', 'atrim', 'volumedetect']) {
    if (new RegExp(`\\s${name}\\s`).test(filters)) {
      pass(`filter ${name}`);
    } else {
      fail(`filter ${name}`, 'Use a full ffmpeg build (4.4 or newer)');
      anyRequiredFailed = true;
    }
  }
} else {
  console.log(`  ${YELLOW}○${RESET} encoder/filter checks  (skipped, ffmpeg missing above)`);
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED: one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED: all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run smoke-test${RESET}\n`);
}
