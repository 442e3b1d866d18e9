import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

const EnvSchema = z.object({
  // External tools
  FFMPEG_PATH:                   z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:                  z.string().min(1).default('ffprobe'),

  // Duration reconciliation
  CLOSENESS_TOLERANCE_SEC:       z.coerce.number().nonnegative().default(1.0),
  FADE_DURATION_SEC:             z.coerce.number().positive().default(1.5),
  DURATION_EPSILON_SEC:          z.coerce.number().positive().default(0.05),
  STRIP_AUDIO_WHEN_CLOSE:        booleanFlag.default('false'),

  // Canonical video profile
  VIDEO_FPS:                     z.coerce.number().int().positive().default(30),
  VIDEO_CODEC:                   z.string().min(1).default('libx264'),
  VIDEO_PRESET:                  z.string().min(1).default('veryfast'),
  VIDEO_CRF:                     z.coerce.number().int().min(0).max(51).default(18),
  PIXEL_FORMAT:                  z.string().min(1).default('yuv420p'),

  // Mix defaults
  DEFAULT_VOICE_DELAY_SEC:       z.coerce.number().nonnegative().default(1.0),
  DEFAULT_VOICE_VOLUME:          z.coerce.number().min(0).max(1).default(1.0),
  DEFAULT_MUSIC_VOLUME:          z.coerce.number().min(0).max(1).default(0.15),

  // Logging
  LOG_LEVEL:                     z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:                    z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Domain Types ─────────────────────────────────────────────────────────────

export type MediaKind = 'video' | 'audio';

/** A caller-owned file handle. Duration is probed on demand, never cached. */
export interface MediaAsset {
  path: string;
  kind: MediaKind;
}

export type ReconciliationDecision =
  | { kind: 'as_is' }
  | { kind: 'loop'; extras: number }
  | { kind: 'trim' };

export interface PipelineResult {
  outputPath: string;
}

// ── Timing ────────────────────────────────────────────────────────────────────

export const TIMING = {
  closenessTolerance: env.CLOSENESS_TOLERANCE_SEC,
  fadeDuration:       env.FADE_DURATION_SEC,
  durationEpsilon:    env.DURATION_EPSILON_SEC,
  stripAudioWhenClose: env.STRIP_AUDIO_WHEN_CLOSE,
} as const;

// ── Video profile ─────────────────────────────────────────────────────────────

export interface VideoProfile {
  fps: number;
  codec: string;
  preset: string;
  crf: number;
  pixelFormat: string;
}

export const VIDEO_PROFILE: VideoProfile = Object.freeze({
  fps:         env.VIDEO_FPS,
  codec:       env.VIDEO_CODEC,
  preset:      env.VIDEO_PRESET,
  crf:         env.VIDEO_CRF,
  pixelFormat: env.PIXEL_FORMAT,
});

// ── Mixing ────────────────────────────────────────────────────────────────────

export const MIX_DEFAULTS = {
  voiceDelay:  env.DEFAULT_VOICE_DELAY_SEC,
  voiceVolume: env.DEFAULT_VOICE_VOLUME,
  musicVolume: env.DEFAULT_MUSIC_VOLUME,
} as const;

/**
 * Timing and gain for one mixed soundtrack. Validated before any transcoder
 * call so a bad request never leaves scratch files behind.
 */
export const TargetSpecSchema = z.object({
  targetDuration: z.number().finite().positive(),
  voiceDelay:     z.number().finite().nonnegative().default(MIX_DEFAULTS.voiceDelay),
  voiceVolume:    z.number().min(0).max(1).default(MIX_DEFAULTS.voiceVolume),
  musicVolume:    z.number().min(0).max(1).default(MIX_DEFAULTS.musicVolume),
});

export type TargetSpecInput = z.input<typeof TargetSpecSchema>;
export type TargetSpec = z.output<typeof TargetSpecSchema>;
