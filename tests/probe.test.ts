import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { countAudioStreams, measureMeanVolume, parseMeanVolume, probeDuration } from '../src/media/probe.js';
import { InvalidTargetError, ProbeError } from '../src/utils/errors.js';
import { fakeTranscoder, writeMedia } from './helpers/fakeTranscoder.js';

vi.mock('child_process', async () => {
  const { fakeTranscoder } = await import('./helpers/fakeTranscoder.js');
  return fakeTranscoder.childProcess();
});

describe('probeDuration', () => {
  let work: string;

  beforeEach(() => {
    fakeTranscoder.reset();
    work = mkdtempSync(join(tmpdir(), 'probe-test-'));
  });

  afterEach(() => {
    rmSync(work, { recursive: true, force: true });
  });

  it('returns the container duration in seconds', async () => {
    const clip = writeMedia(join(work, 'clip.mp4'), { duration: 12.48, videoStreams: 1 });
    await expect(probeDuration(clip)).resolves.toBe(12.48);
  });

  it('asks ffprobe for the bare format duration of the file', async () => {
    const clip = writeMedia(join(work, 'clip.mp4'), { duration: 3 });
    await probeDuration(clip);
    expect(fakeTranscoder.calls).toEqual([
      {
        tool: 'ffprobe',
        args: ['-v', 'error', '-show_entries', 'format=duration', '-of', 'default=noprint_wrappers=1:nokey=1', clip],
      },
    ]);
  });

  it('rejects a missing file with the tool diagnostics', async () => {
    const missing = join(work, 'missing.mp4');
    const err = await probeDuration(missing).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProbeError);
    expect(err).toMatchObject({
      mediaPath: missing,
      diagnostics: `${missing}: No such file or directory`,
    });
  });

  it('rejects a zero duration', async () => {
    const clip = writeMedia(join(work, 'empty.mp4'), { duration: 0 });
    await expect(probeDuration(clip)).rejects.toThrow(`Could not probe "${clip}": non-positive duration 0`);
  });

  it('rejects output that is not a number', async () => {
    const clip = writeMedia(join(work, 'stream.ts'), { duration: 5, probeOutput: 'N/A' });
    await expect(probeDuration(clip)).rejects.toThrow('unparsable duration "N/A"');
  });

  it('rejects empty output', async () => {
    const clip = writeMedia(join(work, 'blank.mp4'), { duration: 5, probeOutput: '' });
    await expect(probeDuration(clip)).rejects.toThrow('no duration reported');
  });
});

describe('countAudioStreams', () => {
  let work: string;

  beforeEach(() => {
    fakeTranscoder.reset();
    work = mkdtempSync(join(tmpdir(), 'probe-test-'));
  });

  afterEach(() => {
    rmSync(work, { recursive: true, force: true });
  });

  it('counts the audio streams of a container', async () => {
    const clip = writeMedia(join(work, 'clip.mp4'), { duration: 10, videoStreams: 1, audioStreams: 2 });
    await expect(countAudioStreams(clip)).resolves.toBe(2);
  });

  it('reports zero for a silent video', async () => {
    const clip = writeMedia(join(work, 'silent.mp4'), { duration: 10, videoStreams: 1 });
    await expect(countAudioStreams(clip)).resolves.toBe(0);
  });

  it('wraps a failed listing in ProbeError', async () => {
    await expect(countAudioStreams(join(work, 'missing.mp4'))).rejects.toThrow(ProbeError);
  });
});

describe('parseMeanVolume', () => {
  it('reads the last mean_volume line of a volumedetect report', () => {
    const report = [
      '[Parsed_volumedetect_1 @ 0x5581] n_samples: 264600',
      '[Parsed_volumedetect_1 @ 0x5581] mean_volume: -20.6 dB',
      '[Parsed_volumedetect_1 @ 0x5581] max_volume: -18.1 dB',
    ].join('\n');
    expect(parseMeanVolume(report)).toBe(-20.6);
  });

  it('reads silence reported as -inf', () => {
    expect(parseMeanVolume('[Parsed_volumedetect_1 @ 0x1] mean_volume: -inf dB')).toBe(Number.NEGATIVE_INFINITY);
  });

  it('returns null when no level was reported', () => {
    expect(parseMeanVolume('[Parsed_volumedetect_1 @ 0x1] n_samples: 0')).toBeNull();
  });
});

describe('measureMeanVolume', () => {
  let work: string;

  beforeEach(() => {
    fakeTranscoder.reset();
    work = mkdtempSync(join(tmpdir(), 'probe-test-'));
  });

  afterEach(() => {
    rmSync(work, { recursive: true, force: true });
  });

  it('measures one window of the track', async () => {
    const voice = writeMedia(join(work, 'voice_padded.wav'), { duration: 20, audioStreams: 1, meanVolume: -23.4 });

    await expect(measureMeanVolume(voice, 1, 7)).resolves.toBe(-23.4);
    expect(fakeTranscoder.calls).toEqual([
      {
        tool: 'ffmpeg',
        args: [
          '-hide_banner', '-nostats',
          '-i', voice,
          '-af', 'atrim=start=1.000:end=7.000,volumedetect',
          '-f', 'null', '-',
        ],
      },
    ]);
  });

  it('rejects a report without a level', async () => {
    const voice = writeMedia(join(work, 'voice_padded.wav'), { duration: 20, audioStreams: 1 });

    await expect(measureMeanVolume(voice, 1, 7)).rejects.toThrow(
      `Could not probe "${voice}": no mean volume reported for 1.000-7.000s`,
    );
  });

  it('wraps a failed analysis with the tool diagnostics', async () => {
    const missing = join(work, 'missing.wav');

    await expect(measureMeanVolume(missing, 0, 1)).rejects.toMatchObject({
      mediaPath: missing,
      diagnostics: `${missing}: No such file or directory`,
    });
  });

  it('rejects an empty or reversed window before running anything', async () => {
    await expect(measureMeanVolume(join(work, 'x.wav'), 5, 5)).rejects.toThrow(InvalidTargetError);
    await expect(measureMeanVolume(join(work, 'x.wav'), -1, 2)).rejects.toThrow(InvalidTargetError);
    expect(fakeTranscoder.calls).toEqual([]);
  });
});
