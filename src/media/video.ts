/**
 * Video duration reconciliation. Makes a background clip last exactly as
 * long as the soundtrack by leaving it alone, looping it, or trimming it.
 *
 * Looped and trimmed outputs are always re-encoded to the canonical profile
 * with the source audio dropped; copy-based cuts on MP4 land on keyframes
 * and miss the target.
 */
import {
  TIMING,
  VIDEO_PROFILE,
  type MediaAsset,
  type ReconciliationDecision,
  type VideoProfile,
} from '../config.js';
import { logger } from '../utils/logger.js';
import {
  ReconciliationError,
  assertPositiveDuration,
  diagnosticsOf,
  type StrategyAttempt,
} from '../utils/errors.js';
import { writeAtomically } from '../utils/scratch.js';
import { canonicalVideoArgs, formatSeconds, runFfmpeg } from './ffmpeg.js';
import { countAudioStreams, probeDuration } from './probe.js';

const log = logger.child('Reconciler');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface LoopPlan {
  sourcePath: string;
  targetDuration: number;
  /** Replays beyond the first play. */
  extras: number;
  outPath: string;
  profile: VideoProfile;
}

/** One way of looping a clip; strategies are tried in order until one succeeds. */
export interface LoopStrategy {
  name: string;
  buildArgs(plan: LoopPlan): string[];
}

export interface ReconcileOptions {
  tolerance?: number;
  stripAudioWhenClose?: boolean;
  profile?: VideoProfile;
  loopStrategies?: readonly LoopStrategy[];
}

export interface ReconcileResult {
  outputPath: string;
  decision: ReconciliationDecision;
  sourceDuration: number;
  /** Loop strategy that produced the output, when the clip was looped. */
  strategy?: string;
}

// ── Decision ──────────────────────────────────────────────────────────────────

export function decideReconciliation(
  sourceDuration: number,
  targetDuration: number,
  tolerance: number = TIMING.closenessTolerance,
): ReconciliationDecision {
  if (Math.abs(sourceDuration - targetDuration) < tolerance) return { kind: 'as_is' };
  if (sourceDuration < targetDuration) {
    return { kind: 'loop', extras: Math.max(Math.ceil(targetDuration / sourceDuration) - 1, 0) };
  }
  return { kind: 'trim' };
}

// ── Loop strategies ───────────────────────────────────────────────────────────

/** Replay the single input `extras` more times inside one invocation. */
export const streamLoopStrategy: LoopStrategy = {
  name: 'stream_loop',
  buildArgs: ({ sourcePath, targetDuration, extras, outPath, profile }) => [
    '-stream_loop', String(extras),
    '-i', sourcePath,
    '-t', formatSeconds(targetDuration),
    ...canonicalVideoArgs(profile),
    outPath,
  ],
};

/**
 * Decode the input once, split it and concatenate the copies. Two copies
 * whenever the target is at most twice the source; more when it is longer,
 * so the fallback reaches the same target as the primary strategy.
 */
export const splitConcatStrategy: LoopStrategy = {
  name: 'split_concat',
  buildArgs: ({ sourcePath, targetDuration, extras, outPath, profile }) => {
    const copies = Math.max(2, extras + 1);
    const labels = Array.from({ length: copies }, (_, i) => `[v${i}]`).join('');
    const graph = `[0:v]split=${copies}${labels};${labels}concat=n=${copies}:v=1:a=0[cat]`;
    return [
      '-i', sourcePath,
      '-filter_complex', graph,
      '-map', '[cat]',
      '-t', formatSeconds(targetDuration),
      ...canonicalVideoArgs(profile),
      outPath,
    ];
  },
};

export const DEFAULT_LOOP_STRATEGIES: readonly LoopStrategy[] = [streamLoopStrategy, splitConcatStrategy];

// ── Branches ──────────────────────────────────────────────────────────────────

function loopVideo(plan: Omit<LoopPlan, 'outPath'>, finalPath: string, strategies: readonly LoopStrategy[]) {
  const attempts: StrategyAttempt[] = [];
  let lastError: unknown;
  for (const strategy of strategies) {
    try {
      const outputPath = writeAtomically(finalPath, (tempPath) =>
        runFfmpeg(strategy.buildArgs({ ...plan, outPath: tempPath }), `reconcile:${strategy.name}`),
      );
      return { outputPath, strategy: strategy.name };
    } catch (err) {
      lastError = err;
      const diagnostics = diagnosticsOf(err);
      attempts.push({ strategy: strategy.name, diagnostics });
      log.warn('loop strategy failed', { strategy: strategy.name, diagnostics });
    }
  }
  throw new ReconciliationError(plan.sourcePath, attempts, lastError);
}

function trimVideo(sourcePath: string, targetDuration: number, finalPath: string, profile: VideoProfile): string {
  try {
    return writeAtomically(finalPath, (tempPath) =>
      runFfmpeg(
        ['-i', sourcePath, '-t', formatSeconds(targetDuration), ...canonicalVideoArgs(profile), tempPath],
        'reconcile:trim',
      ),
    );
  } catch (err) {
    throw new ReconciliationError(sourcePath, [{ strategy: 'trim', diagnostics: diagnosticsOf(err) }], err);
  }
}

function stripAudio(sourcePath: string, finalPath: string): string {
  try {
    return writeAtomically(finalPath, (tempPath) =>
      runFfmpeg(
        ['-i', sourcePath, '-map', '0:v', '-c:v', 'copy', '-an', '-movflags', '+faststart', tempPath],
        'reconcile:strip_audio',
      ),
    );
  } catch (err) {
    throw new ReconciliationError(sourcePath, [{ strategy: 'strip_audio', diagnostics: diagnosticsOf(err) }], err);
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Make `video` last `targetDuration` seconds.
 *
 * Clips within the closeness tolerance come back unchanged (their own path),
 * unless `stripAudioWhenClose` is set and they carry audio, in which case the
 * video stream is copied to `outPath` without it.
 */
export async function reconcileVideo(
  video: MediaAsset,
  targetDuration: number,
  outPath: string,
  options: ReconcileOptions = {},
): Promise<ReconcileResult> {
  assertPositiveDuration(targetDuration, 'targetDuration');
  const {
    tolerance = TIMING.closenessTolerance,
    stripAudioWhenClose = TIMING.stripAudioWhenClose,
    profile = VIDEO_PROFILE,
    loopStrategies = DEFAULT_LOOP_STRATEGIES,
  } = options;

  const sourceDuration = await probeDuration(video.path);
  const decision = decideReconciliation(sourceDuration, targetDuration, tolerance);
  log.info('decision', { videoPath: video.path, sourceDuration, targetDuration, decision: decision.kind });

  switch (decision.kind) {
    case 'as_is': {
      if (stripAudioWhenClose && (await countAudioStreams(video.path)) > 0) {
        const outputPath = stripAudio(video.path, outPath);
        log.info('within tolerance, copied video without its audio', { outputPath });
        return { outputPath, decision, sourceDuration };
      }
      return { outputPath: video.path, decision, sourceDuration };
    }
    case 'loop': {
      const { outputPath, strategy } = loopVideo(
        { sourcePath: video.path, targetDuration, extras: decision.extras, profile },
        outPath,
        loopStrategies,
      );
      log.info('looped', { outputPath, strategy, plays: decision.extras + 1 });
      return { outputPath, decision, sourceDuration, strategy };
    }
    case 'trim': {
      const outputPath = trimVideo(video.path, targetDuration, outPath, profile);
      log.info('trimmed', { outputPath });
      return { outputPath, decision, sourceDuration };
    }
  }
}
