/**
 * Audio preparation: voice padding, background looping with fade-out, and
 * the final two-stream mix.
 *
 * Gain is applied exactly once per stream: voice volume in the padding
 * chain, music volume in the fade chain. The mixer sums its inputs as they
 * are (amix normalize=0), so it never rescales either stream.
 */
import * as fs from 'fs';
import * as path from 'path';
import { TIMING, type MediaAsset } from '../config.js';
import { logger } from '../utils/logger.js';
import {
  BackgroundPrepError,
  InvalidTargetError,
  MixError,
  PaddingError,
  assertPositiveDuration,
  diagnosticsOf,
} from '../utils/errors.js';
import { withScratchDir, writeAtomically } from '../utils/scratch.js';
import { formatSeconds, playlistLine, runFfmpeg } from './ffmpeg.js';
import { probeDuration } from './probe.js';

const log = logger.child('Audio');

export const MIX_GRAPH = '[0:a][1:a]amix=inputs=2:duration=first:dropout_transition=0:normalize=0[mix]';

// ── Helpers ───────────────────────────────────────────────────────────────────

function assertGain(value: number, label: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidTargetError(`${label} must be between 0 and 1, got ${value}`);
  }
}

/** Delay, gain, then silence up to the full length in a single chain. */
export function buildPadFilter(startDelay: number, totalDuration: number, voiceVolume: number): string {
  const delayMs = Math.round(startDelay * 1000);
  return `adelay=delays=${delayMs}:all=1,volume=${voiceVolume},apad=whole_dur=${formatSeconds(totalDuration)}`;
}

/**
 * Gain plus a linear fade to silence over the last `fadeDuration` seconds.
 * Clips shorter than the fade window fade across their whole length.
 */
export function buildFadeFilter(targetDuration: number, musicVolume: number, fadeDuration: number): string {
  const fadeStart = Math.max(targetDuration - fadeDuration, 0);
  const fadeLength = Math.min(fadeDuration, targetDuration);
  return `volume=${musicVolume},afade=t=out:st=${formatSeconds(fadeStart)}:d=${formatSeconds(fadeLength)}`;
}

export function buildPlaylist(musicPath: string, loops: number): string {
  const line = playlistLine(path.resolve(musicPath));
  return Array.from({ length: loops }, () => line).join('\n') + '\n';
}

// ── Voice ─────────────────────────────────────────────────────────────────────

/**
 * Shift the voice by `startDelay`, pad it with silence and cap it so the
 * result lasts exactly `totalDuration`. Speech running past the end is cut.
 */
export async function padVoice(
  voice: MediaAsset,
  startDelay: number,
  totalDuration: number,
  outPath: string,
  voiceVolume = 1,
): Promise<string> {
  assertPositiveDuration(totalDuration, 'totalDuration');
  if (!Number.isFinite(startDelay) || startDelay < 0) {
    throw new InvalidTargetError(`startDelay must be zero or more seconds, got ${startDelay}`);
  }
  assertGain(voiceVolume, 'voiceVolume');

  const voiceDuration = await probeDuration(voice.path);
  if (startDelay + voiceDuration > totalDuration) {
    log.warn('voice runs past the end and will be truncated', {
      voicePath: voice.path,
      startDelay,
      voiceDuration,
      totalDuration,
    });
  }

  try {
    const outputPath = writeAtomically(outPath, (tempPath) =>
      runFfmpeg(
        ['-i', voice.path, '-af', buildPadFilter(startDelay, totalDuration, voiceVolume), '-t', formatSeconds(totalDuration), tempPath],
        'padVoice',
      ),
    );
    log.info('voice padded', { outputPath, startDelay, totalDuration, voiceVolume });
    return outputPath;
  } catch (err) {
    throw new PaddingError(voice.path, diagnosticsOf(err), err);
  }
}

// ── Background ────────────────────────────────────────────────────────────────

export interface BackgroundOptions {
  fadeDuration?: number;
}

/**
 * Loop `music` until it covers `targetDuration` (lossless playlist concat),
 * then apply gain and the end fade while capping at the target. Only the
 * loop needs a scratch directory.
 */
export async function prepareBackground(
  music: MediaAsset,
  targetDuration: number,
  musicVolume: number,
  outPath: string,
  options: BackgroundOptions = {},
): Promise<string> {
  assertPositiveDuration(targetDuration, 'targetDuration');
  assertGain(musicVolume, 'musicVolume');
  const fadeDuration = options.fadeDuration ?? TIMING.fadeDuration;
  assertPositiveDuration(fadeDuration, 'fadeDuration');

  const musicDuration = await probeDuration(music.path);
  const fade = buildFadeFilter(targetDuration, musicVolume, fadeDuration);

  const fadeInto = (source: string): string => {
    const outputPath = writeAtomically(outPath, (tempPath) =>
      runFfmpeg(['-i', source, '-af', fade, '-t', formatSeconds(targetDuration), tempPath], 'background:fade'),
    );
    log.info('background prepared', { outputPath, targetDuration, musicVolume });
    return outputPath;
  };

  try {
    if (musicDuration >= targetDuration) return fadeInto(music.path);

    return await withScratchDir(outPath, 'music', async (dir) => {
      const loops = Math.ceil(targetDuration / musicDuration);
      const listPath = path.join(dir, 'playlist.txt');
      fs.writeFileSync(listPath, buildPlaylist(music.path, loops), 'utf-8');

      const looped = path.join(dir, `looped${path.extname(music.path) || '.mp3'}`);
      runFfmpeg(
        ['-f', 'concat', '-safe', '0', '-i', listPath, '-t', formatSeconds(targetDuration), '-c', 'copy', looped],
        'background:loop',
      );
      log.info('music looped', { musicPath: music.path, musicDuration, loops });
      return fadeInto(looped);
    });
  } catch (err) {
    throw new BackgroundPrepError(music.path, diagnosticsOf(err), err);
  }
}

// ── Mix ───────────────────────────────────────────────────────────────────────

/**
 * Sum two tracks that already last `targetDuration` and already carry their
 * final gain.
 */
export async function mixTracks(
  musicPath: string,
  voicePath: string,
  targetDuration: number,
  outPath: string,
): Promise<string> {
  assertPositiveDuration(targetDuration, 'targetDuration');
  try {
    const outputPath = writeAtomically(outPath, (tempPath) =>
      runFfmpeg(
        ['-i', musicPath, '-i', voicePath, '-filter_complex', MIX_GRAPH, '-map', '[mix]', '-t', formatSeconds(targetDuration), tempPath],
        'mixTracks',
      ),
    );
    log.info('tracks mixed', { outputPath, targetDuration });
    return outputPath;
  } catch (err) {
    throw new MixError(outPath, diagnosticsOf(err), err);
  }
}
