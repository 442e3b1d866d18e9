/**
 * Error taxonomy for the media pipeline.
 *
 * Every fatal error carries the transcoder's diagnostic text so the batch
 * caller can report the failing item and move on to the next one.
 */

/** Keep the tail of a tool's stderr; ffmpeg prints its banner and stream map first. */
export function tailLines(text: string, count = 12): string {
  return text.trim().split('\n').slice(-count).join('\n');
}

export class TranscoderError extends Error {
  constructor(
    public readonly label: string,
    public readonly exitStatus: number | null,
    public readonly stderr: string,
    cause?: unknown,
  ) {
    const tail = tailLines(stderr);
    super(`${label} exited with ${exitStatus ?? 'no status'}${tail ? `: ${tail}` : ''}`, { cause });
    this.name = 'TranscoderError';
  }
}

/** Diagnostic text for any thrown value. */
export function diagnosticsOf(err: unknown): string {
  if (err instanceof TranscoderError) return tailLines(err.stderr) || err.message;
  if (err instanceof Error) return err.message;
  return String(err);
}

export class MediaPipelineError extends Error {
  constructor(message: string, public readonly diagnostics = '', cause?: unknown) {
    super(diagnostics ? `${message}\n${diagnostics}` : message, { cause });
    this.name = 'MediaPipelineError';
  }
}

export class ProbeError extends MediaPipelineError {
  constructor(public readonly mediaPath: string, reason: string, diagnostics = '', cause?: unknown) {
    super(`Could not probe "${mediaPath}": ${reason}`, diagnostics, cause);
    this.name = 'ProbeError';
  }
}

export interface StrategyAttempt {
  strategy: string;
  diagnostics: string;
}

export class ReconciliationError extends MediaPipelineError {
  constructor(
    public readonly videoPath: string,
    public readonly attempts: StrategyAttempt[],
    cause?: unknown,
  ) {
    const tried = attempts.map(a => a.strategy).join(', ');
    super(
      `Could not reconcile "${videoPath}" (tried: ${tried})`,
      attempts.at(-1)?.diagnostics ?? '',
      cause,
    );
    this.name = 'ReconciliationError';
  }
}

export class PaddingError extends MediaPipelineError {
  constructor(voicePath: string, diagnostics: string, cause?: unknown) {
    super(`Could not pad voice track "${voicePath}"`, diagnostics, cause);
    this.name = 'PaddingError';
  }
}

export class BackgroundPrepError extends MediaPipelineError {
  constructor(musicPath: string, diagnostics: string, cause?: unknown) {
    super(`Could not prepare background track "${musicPath}"`, diagnostics, cause);
    this.name = 'BackgroundPrepError';
  }
}

export class MixError extends MediaPipelineError {
  constructor(outPath: string, diagnostics: string, cause?: unknown) {
    super(`Could not mix audio into "${outPath}"`, diagnostics, cause);
    this.name = 'MixError';
  }
}

export class InvalidTargetError extends MediaPipelineError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidTargetError';
  }
}

export class AbortedError extends MediaPipelineError {
  constructor(step: string, cause?: unknown) {
    super(`Aborted before ${step}`, '', cause);
    this.name = 'AbortedError';
  }
}

/**
 * A scratch file or directory that could not be removed. Logged at warn
 * level and never thrown, so it cannot replace the error that ended the
 * operation.
 */
export interface CleanupWarning {
  kind: 'cleanup_warning';
  path: string;
  reason: string;
}

export function assertPositiveDuration(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidTargetError(`${label} must be a positive number of seconds, got ${value}`);
  }
}
