import { spawn, execFile } from 'child_process';
import { DictationError } from '../errors/DictationError.js';
import type { AudioFormat, PcmSource, PcmStreamHandle } from '../types/index.js';

export type RecorderBackend = 'ffmpeg' | 'sox' | 'arecord';

export const RECORDER_BACKENDS: readonly RecorderBackend[] = ['ffmpeg', 'sox', 'arecord'];

export interface RecorderProcess {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  once(event: 'error', listener: (error: Error) => void): this;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnRecorder = (command: string, args: string[]) => RecorderProcess;

export interface AudioRecorderOptions {
  backend?: RecorderBackend;
  inputDevice?: string;
  openTimeoutMs?: number;
  closeGraceMs?: number;
  platform?: NodeJS.Platform;
  spawnProcess?: SpawnRecorder;
  findBackend?: (platform: NodeJS.Platform) => Promise<RecorderBackend | undefined>;
}

const defaultSpawn: SpawnRecorder = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Microphone input through an external recorder process that writes raw
 * s16le PCM to stdout.
 */
export class AudioRecorder implements PcmSource {
  private backend?: RecorderBackend;
  private readonly platform: NodeJS.Platform;
  private readonly spawnProcess: SpawnRecorder;
  private readonly openTimeoutMs: number;
  private readonly closeGraceMs: number;

  constructor(private readonly options: AudioRecorderOptions = {}) {
    this.backend = options.backend;
    this.platform = options.platform ?? process.platform;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.openTimeoutMs = options.openTimeoutMs ?? 3000;
    this.closeGraceMs = options.closeGraceMs ?? 2000;
  }

  async open(format: AudioFormat, onData: (chunk: Buffer) => void): Promise<PcmStreamHandle> {
    const backend = await this.resolveBackend();
    const args = buildRecorderArgs(backend, format, this.platform, this.options.inputDevice);

    console.log(`Starting ${backend} with args:`, args.join(' '));

    let proc: RecorderProcess;
    try {
      proc = this.spawnProcess(backend, args);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DictationError('device-unavailable', `Failed to start ${backend}: ${reason}`);
    }

    return new Promise<PcmStreamHandle>((resolve, reject) => {
      let opened = false;
      let exited = false;
      let stderrText = '';
      const exitWaiters: Array<() => void> = [];

      const fail = (message: string) => {
        if (opened) {
          return;
        }
        opened = true;
        clearTimeout(openTimer);
        reject(new DictationError('device-unavailable', message));
      };

      const openTimer = setTimeout(() => {
        fail(`${backend} produced no audio within ${this.openTimeoutMs}ms`);
        proc.kill('SIGKILL');
      }, this.openTimeoutMs);

      proc.stderr?.on('data', (data: Buffer) => {
        stderrText = (stderrText + data.toString()).slice(-500);
      });

      proc.stdout?.on('data', (chunk: Buffer) => {
        if (!opened) {
          opened = true;
          clearTimeout(openTimer);
          resolve({ close: () => this.closeProcess(proc, () => exited, exitWaiters) });
        }
        onData(chunk);
      });

      proc.once('error', (error) => {
        fail(`Recording failed to start: ${error.message}`);
      });

      proc.once('close', (code, signal) => {
        exited = true;
        exitWaiters.splice(0).forEach((notify) => notify());
        if (!opened) {
          const detail = stderrText.trim() || `code ${code ?? signal}`;
          fail(`${backend} exited before capturing audio: ${detail}`);
        } else {
          console.log(`${backend} exited with ${code ?? signal}`);
        }
      });
    });
  }

  private async resolveBackend(): Promise<RecorderBackend> {
    if (this.backend) {
      return this.backend;
    }
    const find = this.options.findBackend ?? detectRecorderBackend;
    const found = await find(this.platform);
    if (!found) {
      throw new DictationError('device-unavailable', getInstallInstructions(this.platform));
    }
    this.backend = found;
    return found;
  }

  private closeProcess(
    proc: RecorderProcess,
    hasExited: () => boolean,
    exitWaiters: Array<() => void>
  ): Promise<void> {
    if (hasExited()) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const killTimer = setTimeout(() => {
        console.warn(`Recorder did not exit after SIGINT, sending SIGKILL`);
        proc.kill('SIGKILL');
      }, this.closeGraceMs);

      exitWaiters.push(() => {
        clearTimeout(killTimer);
        resolve();
      });

      // ffmpeg and sox flush and exit cleanly on SIGINT
      proc.kill('SIGINT');
    });
  }
}

export function buildRecorderArgs(
  backend: RecorderBackend,
  format: AudioFormat,
  platform: NodeJS.Platform,
  inputDevice?: string
): string[] {
  const rate = String(format.sampleRate);
  const channels = String(format.channels);

  switch (backend) {
    case 'ffmpeg':
      return [
        '-hide_banner', '-loglevel', 'error',
        '-f', getFFmpegInputFormat(platform),
        '-i', inputDevice ?? getFFmpegInputDevice(platform),
        '-ar', rate,
        '-ac', channels,
        '-acodec', 'pcm_s16le',
        '-f', 's16le',
        'pipe:1',
      ];
    case 'sox':
      return [
        '-q', '-d',
        '-t', 'raw',
        '-r', rate,
        '-c', channels,
        '-b', '16',
        '-e', 'signed-integer',
        '-L',
        '-',
      ];
    case 'arecord':
      return [
        '-q',
        ...(inputDevice ? ['-D', inputDevice] : []),
        '-f', 'S16_LE',
        '-r', rate,
        '-c', channels,
        '-t', 'raw',
      ];
  }
}

function getFFmpegInputFormat(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32': return 'dshow';
    case 'darwin': return 'avfoundation';
    default: return 'pulse';
  }
}

function getFFmpegInputDevice(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32': return 'audio=default';
    case 'darwin': return ':default';
    default: return 'default';
  }
}

function getCandidates(platform: NodeJS.Platform): RecorderBackend[] {
  switch (platform) {
    case 'linux':
      return ['arecord', 'sox', 'ffmpeg'];
    case 'win32':
      return ['ffmpeg', 'sox'];
    default:
      return ['sox', 'ffmpeg'];
  }
}

export async function detectRecorderBackend(platform: NodeJS.Platform): Promise<RecorderBackend | undefined> {
  for (const candidate of getCandidates(platform)) {
    if (await binaryExists(candidate, platform)) {
      return candidate;
    }
  }
  return undefined;
}

function binaryExists(name: string, platform: NodeJS.Platform): Promise<boolean> {
  const cmd = platform === 'win32' ? 'where' : 'which';
  return new Promise((resolve) => {
    execFile(cmd, [name], (err) => resolve(!err));
  });
}

function getInstallInstructions(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'darwin':
      return 'No audio recorder found. Install SoX or FFmpeg: brew install sox';
    case 'linux':
      return 'No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils';
    case 'win32':
      return 'No audio recorder found. Install FFmpeg: winget install ffmpeg';
    default:
      return 'No audio recorder found. Install SoX or FFmpeg.';
  }
}
