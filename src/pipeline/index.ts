/**
 * Pipeline orchestrator for one quote video.
 *
 * prepareVideoForAudio: fit the background clip to the soundtrack length.
 * mixVoiceAndMusic: pad the narration, loop and fade the music, mix both.
 *
 * Each call owns its scratch area next to the output and removes it on every
 * exit path. Cancellation is honoured between steps only; a running
 * transcoder is never interrupted.
 */
import * as path from 'path';
import {
  TIMING,
  TargetSpecSchema,
  type MediaAsset,
  type PipelineResult,
  type ReconciliationDecision,
  type TargetSpecInput,
} from '../config.js';
import { logger } from '../utils/logger.js';
import { AbortedError, InvalidTargetError } from '../utils/errors.js';
import { withScratchDir } from '../utils/scratch.js';
import { reconcileVideo, type ReconcileOptions } from '../media/video.js';
import { mixTracks, padVoice, prepareBackground } from '../media/audio.js';

const log = logger.child('Pipeline');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface PrepareVideoOptions extends ReconcileOptions {
  signal?: AbortSignal;
}

export interface PreparedVideo extends PipelineResult {
  decision: ReconciliationDecision;
  strategy?: string;
}

export interface MixRequest extends TargetSpecInput {
  /** Narration; when absent the soundtrack is the prepared music alone. */
  voice?: MediaAsset;
  music: MediaAsset;
  outPath: string;
  fadeDuration?: number;
  signal?: AbortSignal;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function checkpoint(signal: AbortSignal | undefined, step: string): void {
  if (signal?.aborted) {
    log.warn('aborted', { step });
    throw new AbortedError(step, signal.reason);
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function prepareVideoForAudio(
  video: MediaAsset,
  audioDuration: number,
  outPath: string,
  options: PrepareVideoOptions = {},
): Promise<PreparedVideo> {
  const { signal, ...reconcileOptions } = options;
  checkpoint(signal, 'video reconciliation');

  const result = await reconcileVideo(video, audioDuration, outPath, reconcileOptions);
  return { outputPath: result.outputPath, decision: result.decision, strategy: result.strategy };
}

/**
 * Build the soundtrack: music from 0 s, voice from `voiceDelay`, music fading
 * out over the last seconds, all exactly `targetDuration` long.
 *
 * Steps:
 * 1. Pad the voice (voice gain applied here).
 * 2. Loop and fade the music (music gain applied here).
 * 3. Sum both with no further gain.
 */
export async function mixVoiceAndMusic(request: MixRequest): Promise<PipelineResult> {
  const { voice, music, outPath, signal } = request;
  const fadeDuration = request.fadeDuration ?? TIMING.fadeDuration;

  const parsed = TargetSpecSchema.safeParse({
    targetDuration: request.targetDuration,
    voiceDelay:     request.voiceDelay,
    voiceVolume:    request.voiceVolume,
    musicVolume:    request.musicVolume,
  });
  if (!parsed.success) {
    const invalid = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidTargetError(`Invalid mix request: ${invalid}`);
  }
  const spec = parsed.data;

  log.info('mixing soundtrack', {
    outPath,
    targetDuration: spec.targetDuration,
    voiceDelay: spec.voiceDelay,
    withVoice: voice !== undefined,
  });

  if (!voice) {
    checkpoint(signal, 'background preparation');
    const outputPath = await prepareBackground(music, spec.targetDuration, spec.musicVolume, outPath, { fadeDuration });
    return { outputPath };
  }

  return withScratchDir(outPath, 'mix', async (dir) => {
    checkpoint(signal, 'voice padding');
    const paddedVoice = await padVoice(
      voice,
      spec.voiceDelay,
      spec.targetDuration,
      path.join(dir, 'voice_padded.wav'),
      spec.voiceVolume,
    );

    checkpoint(signal, 'background preparation');
    const preparedMusic = await prepareBackground(
      music,
      spec.targetDuration,
      spec.musicVolume,
      path.join(dir, 'music_prepared.wav'),
      { fadeDuration },
    );

    checkpoint(signal, 'mix');
    const outputPath = await mixTracks(preparedMusic, paddedVoice, spec.targetDuration, outPath);
    log.info('soundtrack ready', { outputPath });
    return { outputPath };
  });
}
