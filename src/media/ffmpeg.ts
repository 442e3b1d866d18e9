/**
 * Transcoder plumbing. Runs ffmpeg/ffprobe as blocking child processes and
 * builds the argument fragments shared by the video and audio steps.
 *
 * Arguments are passed as arrays (no shell), so paths need no quoting.
 * Both runners throw TranscoderError on non-zero exit with the stderr tail.
 */
import { execFileSync, spawnSync } from 'child_process';
import { env, VIDEO_PROFILE, type VideoProfile } from '../config.js';
import { logger } from '../utils/logger.js';
import { TranscoderError } from '../utils/errors.js';

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

// ── Helpers ────────────────────────────────────────────────────────────────────

function toTranscoderError(label: string, err: unknown): TranscoderError {
  const fields: object = typeof err === 'object' && err !== null ? err : {};
  const status = 'status' in fields && typeof fields.status === 'number' ? fields.status : null;
  const stderr =
    'stderr' in fields && (Buffer.isBuffer(fields.stderr) || typeof fields.stderr === 'string')
      ? String(fields.stderr)
      : '';
  const fallback = err instanceof Error ? err.message : String(err);
  return new TranscoderError(label, status, stderr || fallback, err);
}

// ── Runners ────────────────────────────────────────────────────────────────────

export function runFfmpeg(args: string[], label: string): void {
  logger.debug(`FFmpeg [${label}]`, { args });
  try {
    execFileSync(env.FFMPEG_PATH, ['-y', '-hide_banner', '-loglevel', 'error', ...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: MAX_OUTPUT_BYTES,
      windowsHide: true,
    });
  } catch (err) {
    throw toTranscoderError(`FFmpeg ${label}`, err);
  }
}

export function runFfprobe(args: string[], label: string): string {
  logger.debug(`FFprobe [${label}]`, { args });
  try {
    return execFileSync(env.FFPROBE_PATH, args, {
      encoding: 'utf-8',
      stdio: ['ignore', 'pipe', 'pipe'],
      maxBuffer: MAX_OUTPUT_BYTES,
      windowsHide: true,
    }).trim();
  } catch (err) {
    throw toTranscoderError(`FFprobe ${label}`, err);
  }
}

/**
 * Run an analysis pass and return what ffmpeg printed to stderr. Analysis
 * filters such as volumedetect report at info level, so the banner is hidden
 * but the log level is left alone.
 */
export function runFfmpegReport(args: string[], label: string): string {
  logger.debug(`FFmpeg [${label}]`, { args });
  const result = spawnSync(env.FFMPEG_PATH, ['-hide_banner', '-nostats', ...args], {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: MAX_OUTPUT_BYTES,
    windowsHide: true,
  });
  if (result.error) {
    throw new TranscoderError(`FFmpeg ${label}`, null, result.error.message, result.error);
  }
  if (result.status !== 0) {
    throw new TranscoderError(`FFmpeg ${label}`, result.status, result.stderr);
  }
  return result.stderr;
}

// ── Argument builders ──────────────────────────────────────────────────────────

/** Seconds as the fixed-point text every -t / st= argument uses. */
export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

/** Output options of the canonical re-encode: no audio, fixed rate, H.264, fast start. */
export function canonicalVideoArgs(profile: VideoProfile = VIDEO_PROFILE): string[] {
  return [
    '-an',
    '-r', String(profile.fps),
    '-pix_fmt', profile.pixelFormat,
    '-c:v', profile.codec,
    '-preset', profile.preset,
    '-crf', String(profile.crf),
    '-movflags', '+faststart',
  ];
}

/**
 * A concat-demuxer playlist line. Paths are absolute with forward slashes;
 * a single quote inside the path is closed, escaped and reopened.
 */
export function playlistLine(absolutePath: string): string {
  const normalized = absolutePath.replace(/\\/g, '/');
  return `file '${normalized.replace(/'/g, "'\\''")}'`;
}
