/**
 * Media inspection. Durations are always probed fresh; a failed or
 * non-positive probe is an error, never a zero-length stand-in.
 */
import { logger } from '../utils/logger.js';
import { InvalidTargetError, ProbeError, diagnosticsOf } from '../utils/errors.js';
import { formatSeconds, runFfmpegReport, runFfprobe } from './ffmpeg.js';

export async function probeDuration(mediaPath: string): Promise<number> {
  let raw: string;
  try {
    raw = runFfprobe(
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', mediaPath],
      'probeDuration',
    );
  } catch (err) {
    throw new ProbeError(mediaPath, 'duration query failed', diagnosticsOf(err), err);
  }

  if (!raw) throw new ProbeError(mediaPath, 'no duration reported');

  const seconds = Number(raw);
  if (!Number.isFinite(seconds)) {
    throw new ProbeError(mediaPath, `unparsable duration "${raw}"`);
  }
  if (seconds <= 0) {
    throw new ProbeError(mediaPath, `non-positive duration ${seconds}`);
  }

  logger.debug('Probe: duration', { mediaPath, seconds });
  return seconds;
}

/** Number of audio streams in a container (0 for silent video). */
export async function countAudioStreams(mediaPath: string): Promise<number> {
  let raw: string;
  try {
    raw = runFfprobe(
      ['-v', 'error', '-select_streams', 'a', '-show_entries', 'stream=index', '-of', 'csv=p=0', mediaPath],
      'countAudioStreams',
    );
  } catch (err) {
    throw new ProbeError(mediaPath, 'could not list audio streams', diagnosticsOf(err), err);
  }
  return raw.split('\n').filter(line => line.trim().length > 0).length;
}

/**
 * Mean level in dBFS from a volumedetect report. Digital silence reads as
 * -91 dB or `-inf`; null when the report has no mean_volume line.
 */
export function parseMeanVolume(report: string): number | null {
  const matches = [...report.matchAll(/mean_volume:\s*(-?inf|-?[\d.]+)\s*dB/g)];
  const value = matches.at(-1)?.[1];
  if (value === undefined) return null;
  if (value.endsWith('inf')) return value.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  return Number(value);
}

/** Mean level of the audio between `start` and `end` seconds, in dBFS. */
export async function measureMeanVolume(mediaPath: string, start: number, end: number): Promise<number> {
  if (!Number.isFinite(start) || !Number.isFinite(end) || start < 0 || end <= start) {
    throw new InvalidTargetError(`Invalid analysis window ${start}-${end}s`);
  }
  const window = `${formatSeconds(start)}-${formatSeconds(end)}s`;

  let report: string;
  try {
    report = runFfmpegReport(
      [
        '-i', mediaPath,
        '-af', `atrim=start=${formatSeconds(start)}:end=${formatSeconds(end)},volumedetect`,
        '-f', 'null', '-',
      ],
      'measureMeanVolume',
    );
  } catch (err) {
    throw new ProbeError(mediaPath, `volume analysis of ${window} failed`, diagnosticsOf(err), err);
  }

  const meanVolume = parseMeanVolume(report);
  if (meanVolume === null) {
    throw new ProbeError(mediaPath, `no mean volume reported for ${window}`);
  }
  logger.debug('Probe: mean volume', { mediaPath, window, meanVolume });
  return meanVolume;
}
