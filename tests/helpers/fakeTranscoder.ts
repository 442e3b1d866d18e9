/**
 * In-process stand-in for the ffmpeg/ffprobe binaries.
 *
 * "Media" files are small JSON documents describing duration and stream
 * counts. The fake reads them, applies the subset of ffmpeg semantics the
 * pipeline relies on, and writes the resulting document to the output path.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const FakeMediaSchema = z.object({
  duration: z.number(),
  audioStreams: z.number().int().default(0),
  videoStreams: z.number().int().default(0),
  /** Filters applied on the way to this file, oldest first. */
  filters: z.array(z.string()).default([]),
  /** Raw text ffprobe prints for the duration, when it should not be the number. */
  probeOutput: z.string().optional(),
  /** Level volumedetect reports for any window; no mean_volume line when absent. */
  meanVolume: z.number().optional(),
});

export type FakeMedia = z.output<typeof FakeMediaSchema>;

export interface Invocation {
  tool: 'ffmpeg' | 'ffprobe';
  args: string[];
}

type FailurePredicate = (call: Invocation) => boolean;

export function writeMedia(filePath: string, media: z.input<typeof FakeMediaSchema>): string {
  fs.writeFileSync(filePath, JSON.stringify(FakeMediaSchema.parse(media)), 'utf-8');
  return filePath;
}

export function readMedia(filePath: string): FakeMedia {
  return FakeMediaSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
}

class ToolFailure extends Error {
  constructor(public readonly status: number, public readonly stderr: Buffer) {
    super(`Command failed with status ${status}`);
  }
}

function failure(message: string, status = 1): ToolFailure {
  return new ToolFailure(status, Buffer.from(message + '\n'));
}

function loadInput(filePath: string): FakeMedia {
  if (!fs.existsSync(filePath)) throw failure(`${filePath}: No such file or directory`);
  try {
    return readMedia(filePath);
  } catch {
    throw failure(`${filePath}: Invalid data found when processing input`);
  }
}

/** Paths listed in a concat-demuxer playlist, with quote escaping undone. */
export function parsePlaylist(listPath: string): string[] {
  return fs
    .readFileSync(listPath, 'utf-8')
    .split('\n')
    .filter(line => line.startsWith('file '))
    .map(line => line.slice('file '.length).replace(/^'|'$/g, '').replace(/'\\''/g, "'"));
}

export interface SpawnResult {
  status: number | null;
  stdout: string;
  stderr: string;
}

interface InputSpec {
  path: string;
  streamLoop: number;
  concat: boolean;
}

export class FakeTranscoder {
  readonly calls: Invocation[] = [];
  /** Entries of every concat playlist read, in call order. */
  readonly playlists: string[][] = [];
  private failures: FailurePredicate[] = [];

  reset(): void {
    this.calls.length = 0;
    this.playlists.length = 0;
    this.failures = [];
  }

  /** Make every matching invocation exit with status 1. */
  failWhen(predicate: FailurePredicate): void {
    this.failures.push(predicate);
  }

  ffmpegCalls(): string[][] {
    return this.calls.filter(c => c.tool === 'ffmpeg').map(c => c.args);
  }

  exec(file: string, args: readonly string[], options?: { encoding?: string }): string | Buffer {
    const call: Invocation = {
      tool: path.basename(file).startsWith('ffprobe') ? 'ffprobe' : 'ffmpeg',
      args: [...args],
    };
    this.calls.push(call);
    if (this.failures.some(p => p(call))) {
      throw failure(`simulated failure of ${call.tool}`);
    }
    const stdout = call.tool === 'ffprobe' ? this.probe(call.args) : this.transcode(call.args);
    return options?.encoding ? stdout : Buffer.from(stdout);
  }

  /** Stand-in for spawnSync; answers volumedetect analysis passes. */
  spawn(file: string, args: readonly string[]): SpawnResult {
    const call: Invocation = { tool: 'ffmpeg', args: [...args] };
    this.calls.push(call);
    try {
      if (this.failures.some(p => p(call))) throw failure(`simulated failure of ${path.basename(file)}`);
      return { status: 0, stdout: '', stderr: this.analyse(call.args) };
    } catch (err) {
      if (err instanceof ToolFailure) return { status: err.status, stdout: '', stderr: String(err.stderr) };
      throw err;
    }
  }

  /** Module shape installed in place of child_process. */
  childProcess() {
    return {
      execFileSync: (file: string, args: readonly string[], options?: { encoding?: string }) =>
        this.exec(file, args, options),
      spawnSync: (file: string, args: readonly string[]) => this.spawn(file, args),
    };
  }

  private analyse(args: string[]): string {
    const input = args[args.indexOf('-i') + 1] ?? '';
    const media = loadInput(input);
    const filter = args[args.indexOf('-af') + 1] ?? '';
    if (!filter.includes('volumedetect')) throw failure(`unsupported analysis: ${args.join(' ')}`);
    const tag = '[Parsed_volumedetect_1 @ 0x0]';
    const lines = [`${tag} n_samples: 44100`];
    if (media.meanVolume !== undefined) {
      lines.push(`${tag} mean_volume: ${media.meanVolume.toFixed(1)} dB`, `${tag} max_volume: 0.0 dB`);
    }
    return lines.join('\n') + '\n';
  }

  private probe(args: string[]): string {
    const target = args[args.length - 1] ?? '';
    const media = loadInput(target);
    if (args.includes('format=duration')) {
      return (media.probeOutput ?? String(media.duration)) + '\n';
    }
    if (args.includes('stream=index')) {
      return Array.from({ length: media.audioStreams }, (_, i) => `${i + 1}\n`).join('');
    }
    throw failure(`unsupported ffprobe query: ${args.join(' ')}`);
  }

  private transcode(args: string[]): string {
    const outPath = args[args.length - 1] ?? '';
    const inputs: InputSpec[] = [];
    let pending: InputSpec = { path: '', streamLoop: 0, concat: false };
    let cap: number | undefined;
    let dropAudio = false;
    let audioFilter: string | undefined;
    let graph: string | undefined;
    let map: string | undefined;

    for (let i = 0; i < args.length - 1; i++) {
      const arg = args[i];
      const value = args[i + 1] ?? '';
      switch (arg) {
        case '-stream_loop': pending.streamLoop = Number(value); i++; break;
        case '-f': pending.concat = value === 'concat'; i++; break;
        case '-i': inputs.push({ ...pending, path: value }); pending = { path: '', streamLoop: 0, concat: false }; i++; break;
        case '-t': cap = Number(value); i++; break;
        case '-an': dropAudio = true; break;
        case '-af': audioFilter = value; i++; break;
        case '-filter_complex': graph = value; i++; break;
        case '-map': map = value; i++; break;
        default: break;
      }
    }

    if (!fs.existsSync(path.dirname(outPath))) {
      throw failure(`${outPath}: No such file or directory`);
    }

    const sources = inputs.map((input): FakeMedia => {
      if (input.concat) {
        const entries = parsePlaylist(input.path);
        this.playlists.push(entries);
        const parts = entries.map(loadInput);
        const first = parts[0];
        if (!first) throw failure(`${input.path}: empty playlist`);
        return { ...first, duration: parts.reduce((sum, p) => sum + p.duration, 0) };
      }
      const media = loadInput(input.path);
      return { ...media, duration: media.duration * (input.streamLoop + 1) };
    });
    const first = sources[0];
    if (!first) throw failure('no input files');

    let duration = first.duration;
    let audioStreams = first.audioStreams;
    let videoStreams = first.videoStreams;
    const filters = sources.flatMap(s => s.filters);

    if (graph) {
      filters.push(graph);
      const split = /split=(\d+)/.exec(graph);
      if (split) {
        duration = first.duration * Number(split[1]);
        audioStreams = 0;
      }
      if (graph.includes('amix')) {
        audioStreams = 1;
        videoStreams = 0;
      }
    }
    if (audioFilter) {
      filters.push(audioFilter);
      const delay = /adelay=delays=(\d+)/.exec(audioFilter);
      if (delay) duration += Number(delay[1]) / 1000;
      const pad = /apad=whole_dur=([\d.]+)/.exec(audioFilter);
      if (pad) duration = Math.max(duration, Number(pad[1]));
    }
    if (map === '0:v') audioStreams = 0;
    if (dropAudio) audioStreams = 0;
    if (cap !== undefined) duration = Math.min(duration, cap);

    writeMedia(outPath, { duration, audioStreams, videoStreams, filters });
    return '';
  }
}

export const fakeTranscoder = new FakeTranscoder();
