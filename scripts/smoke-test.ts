#!/usr/bin/env tsx
/**
 * End-to-end smoke test against the real ffmpeg/ffprobe binaries.
 * Generates synthetic clips and tones in a temp directory, runs every
 * pipeline step on them, and checks durations, stream counts, silence
 * windows, the fade envelope and cleanup.
 * Run: npm run smoke-test
 *
 * Exit codes:
 *   0: all tests pass
 *   1: one or more tests failed
 */
import { mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { TIMING } from '../src/config.js';
import { runFfmpeg } from '../src/media/ffmpeg.js';
import { countAudioStreams, measureMeanVolume, probeDuration } from '../src/media/probe.js';
import { reconcileVideo, splitConcatStrategy, type LoopStrategy } from '../src/media/video.js';
import { padVoice, prepareBackground } from '../src/media/audio.js';
import { mixVoiceAndMusic, prepareVideoForAudio } from '../src/pipeline/index.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

// ── Test runner ───────────────────────────────────────────────────────────────

let allPass = true;
let testNumber = 0;

async function test(name: string, fn: () => Promise<void>): Promise<void> {
  testNumber++;
  const label = `Test ${testNumber.toString().padStart(2, ' ')}: ${name}`;
  process.stdout.write(`  ${label}… `);
  try {
    await fn();
    console.log(`${GREEN}PASS${RESET}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.log(`${RED}FAIL${RESET}`);
    console.error(`           ${YELLOW}${msg}${RESET}`);
    allPass = false;
  }
}

// ── Helpers ───────────────────────────────────────────────────────────────────

const work = mkdtempSync(join(tmpdir(), 'quote-reel-smoke-'));

async function expectDuration(filePath: string, expected: number): Promise<void> {
  const actual = await probeDuration(filePath);
  if (Math.abs(actual - expected) > TIMING.durationEpsilon) {
    throw new Error(`${filePath} lasts ${actual.toFixed(3)}s, expected ${expected}s`);
  }
}

async function expectSilentVideo(filePath: string): Promise<void> {
  const streams = await countAudioStreams(filePath);
  if (streams !== 0) throw new Error(`${filePath} still has ${streams} audio stream(s)`);
}

// Generated tones sit near -20 dBFS; digital silence reads -91 dB.
const SILENCE_FLOOR_DB = -60;

async function expectSilent(filePath: string, start: number, end: number): Promise<void> {
  const level = await measureMeanVolume(filePath, start, end);
  if (level > SILENCE_FLOOR_DB) throw new Error(`[${start}, ${end}] should be silent, measured ${level} dB`);
}

async function expectAudible(filePath: string, start: number, end: number): Promise<void> {
  const level = await measureMeanVolume(filePath, start, end);
  if (level <= SILENCE_FLOOR_DB) throw new Error(`[${start}, ${end}] should be audible, measured ${level} dB`);
}

function expectNoScratch(): void {
  const leftovers = readdirSync(work).filter(f => f.startsWith('.scratch-') || f.startsWith('.tmp-'));
  if (leftovers.length > 0) throw new Error(`scratch files left behind: ${leftovers.join(', ')}`);
}

function makeClip(name: string, seconds: number): string {
  const out = join(work, name);
  runFfmpeg(
    [
      '-f', 'lavfi', '-i', `testsrc=size=320x240:rate=30:duration=${seconds}`,
      '-f', 'lavfi', '-i', `sine=frequency=440:duration=${seconds}`,
      '-c:v', 'libx264', '-pix_fmt', 'yuv420p', '-c:a', 'aac', '-shortest',
      out,
    ],
    `smoke:clip:${name}`,
  );
  return out;
}

function makeTone(name: string, seconds: number, frequency: number): string {
  const out = join(work, name);
  runFfmpeg(['-f', 'lavfi', '-i', `sine=frequency=${frequency}:duration=${seconds}`, out], `smoke:tone:${name}`);
  return out;
}

// ── Fixtures ──────────────────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Quote Reel: Smoke Tests ===${RESET}\n`);
console.log(`  workdir: ${work}\n`);

const shortClip = makeClip('clip_10s.mp4', 10);
const longClip  = makeClip('clip_40s.mp4', 40);
const voice     = makeTone('voice_6s.wav', 6, 300);
const music     = makeTone('music_8s.mp3', 8, 220);

// ── Run tests ─────────────────────────────────────────────────────────────────

await test('loop 10s clip to 25s without audio', async () => {
  const { outputPath, decision } = await prepareVideoForAudio(
    { path: shortClip, kind: 'video' }, 25, join(work, 'looped.mp4'),
  );
  if (decision.kind !== 'loop' || decision.extras !== 2) throw new Error(`unexpected decision ${JSON.stringify(decision)}`);
  await expectDuration(outputPath, 25);
  await expectSilentVideo(outputPath);
});

await test('trim 40s clip to 25s without audio', async () => {
  const { outputPath } = await prepareVideoForAudio({ path: longClip, kind: 'video' }, 25, join(work, 'trimmed.mp4'));
  await expectDuration(outputPath, 25);
  await expectSilentVideo(outputPath);
});

await test('split/concat fallback when the primary strategy fails', async () => {
  const broken: LoopStrategy = {
    name: 'broken',
    buildArgs: ({ sourcePath, outPath }) => ['-i', sourcePath, '-filter_complex', 'no_such_filter', outPath],
  };
  const { outputPath, strategy } = await reconcileVideo(
    { path: shortClip, kind: 'video' }, 18, join(work, 'fallback.mp4'),
    { loopStrategies: [broken, splitConcatStrategy] },
  );
  if (strategy !== 'split_concat') throw new Error(`expected split_concat, got ${String(strategy)}`);
  await expectDuration(outputPath, 18);
  await expectSilentVideo(outputPath);
});

const paddedVoice = join(work, 'voice_padded.wav');
const preparedMusic = join(work, 'music_prepared.wav');

await test('pad 6s voice with 1s delay to 20s', async () => {
  const out = await padVoice({ path: voice, kind: 'audio' }, 1, 20, paddedVoice);
  await expectDuration(out, 20);
});

await test('padded voice is silent before the delay and after the speech', async () => {
  await expectSilent(paddedVoice, 0, 0.95);
  await expectAudible(paddedVoice, 1.05, 6.95);
  await expectSilent(paddedVoice, 7.05, 20);
});

await test('loop 8s music to 20s with fade', async () => {
  const out = await prepareBackground({ path: music, kind: 'audio' }, 20, 0.15, preparedMusic);
  await expectDuration(out, 20);
  expectNoScratch();
});

await test('music level never rises during the final fade', async () => {
  const step = 0.25;
  const fadeStart = 20 - TIMING.fadeDuration;
  let previous = Number.POSITIVE_INFINITY;
  for (let start = fadeStart; start + step <= 20 + 1e-9; start += step) {
    const level = await measureMeanVolume(preparedMusic, start, Math.min(start + step, 20));
    if (level > previous) {
      throw new Error(`level rose from ${previous} dB to ${level} dB at ${start.toFixed(2)}s`);
    }
    previous = level;
  }
});

await test('mix voice and music to 20s and clean up', async () => {
  const { outputPath } = await mixVoiceAndMusic({
    voice: { path: voice, kind: 'audio' },
    music: { path: music, kind: 'audio' },
    targetDuration: 20,
    voiceDelay: 1,
    voiceVolume: 1,
    musicVolume: 0.15,
    outPath: join(work, 'soundtrack.wav'),
  });
  await expectDuration(outputPath, 20);
  expectNoScratch();
});

// ── Summary ───────────────────────────────────────────────────────────────────

rmSync(work, { recursive: true, force: true });

console.log('');
if (allPass) {
  console.log(`${GREEN}${BOLD}ALL ${testNumber} TESTS PASSED${RESET}\n`);
} else {
  console.error(`${RED}${BOLD}ONE OR MORE TESTS FAILED${RESET}\n`);
  process.exit(1);
}
