/**
 * Quote Reel media pipeline: public surface.
 *
 * The batch front end calls prepareVideoForAudio and mixVoiceAndMusic once
 * per output video and hands both results to the overlay/compose step.
 */
export { prepareVideoForAudio, mixVoiceAndMusic } from './pipeline/index.js';
export type { MixRequest, PrepareVideoOptions, PreparedVideo } from './pipeline/index.js';

export { probeDuration, countAudioStreams, measureMeanVolume, parseMeanVolume } from './media/probe.js';
export {
  reconcileVideo,
  decideReconciliation,
  streamLoopStrategy,
  splitConcatStrategy,
  DEFAULT_LOOP_STRATEGIES,
} from './media/video.js';
export type { LoopPlan, LoopStrategy, ReconcileOptions, ReconcileResult } from './media/video.js';
export { padVoice, prepareBackground, mixTracks } from './media/audio.js';
export type { BackgroundOptions } from './media/audio.js';

export {
  MediaPipelineError,
  ProbeError,
  ReconciliationError,
  PaddingError,
  BackgroundPrepError,
  MixError,
  InvalidTargetError,
  AbortedError,
  TranscoderError,
} from './utils/errors.js';
export type { CleanupWarning, StrategyAttempt } from './utils/errors.js';

export { TIMING, VIDEO_PROFILE, MIX_DEFAULTS, TargetSpecSchema } from './config.js';
export type {
  MediaAsset,
  MediaKind,
  PipelineResult,
  ReconciliationDecision,
  TargetSpec,
  TargetSpecInput,
  VideoProfile,
} from './config.js';
