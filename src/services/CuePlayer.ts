import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CuePlayer } from '../types/index.js';
import { runCommand, type CommandRunner } from './CommandRunner.js';
import { createToneSamples, encodeWav } from './WavEncoder.js';

export interface ToneCueOptions {
  frequencyHz?: number;
  durationMs?: number;
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  outputDir?: string;
  /** Called when no player works; defaults to the terminal bell. */
  fallback?: () => void;
}

const CUE_SAMPLE_RATE = 16000;

/**
 * Plays a short sine beep through the platform's audio player. The WAV is
 * generated once and kept in the temp directory.
 */
export class ToneCuePlayer implements CuePlayer {
  private wavPath: string | null = null;
  private readonly frequencyHz: number;
  private readonly durationMs: number;
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;
  private readonly outputDir: string;
  private readonly fallback: () => void;

  constructor(options: ToneCueOptions = {}) {
    this.frequencyHz = options.frequencyHz ?? 1000;
    this.durationMs = options.durationMs ?? 200;
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? runCommand;
    this.outputDir = options.outputDir ?? os.tmpdir();
    this.fallback = options.fallback ?? (() => process.stdout.write('\x07'));
  }

  async play(): Promise<void> {
    const wavPath = await this.ensureToneFile();

    for (const [command, args] of getPlayerCommands(this.platform, wavPath)) {
      try {
        await this.run(command, args, { timeoutMs: this.durationMs + 3000 });
        return;
      } catch (error) {
        console.warn(`Cue player ${command} failed:`, error instanceof Error ? error.message : error);
      }
    }

    this.fallback();
  }

  private async ensureToneFile(): Promise<string> {
    if (this.wavPath) {
      return this.wavPath;
    }
    const samples = createToneSamples(this.frequencyHz, this.durationMs, CUE_SAMPLE_RATE);
    const wav = encodeWav(samples, { sampleRate: CUE_SAMPLE_RATE, channels: 1, bitDepth: 16 });
    const wavPath = path.join(this.outputDir, `push-to-dictate-cue-${this.frequencyHz}hz.wav`);
    await fs.promises.writeFile(wavPath, wav);
    this.wavPath = wavPath;
    return wavPath;
  }
}

export function getPlayerCommands(platform: NodeJS.Platform, wavPath: string): Array<[string, string[]]> {
  switch (platform) {
    case 'darwin':
      return [['afplay', [wavPath]]];
    case 'win32':
      return [[
        'powershell',
        ['-NoProfile', '-Command', `(New-Object Media.SoundPlayer '${wavPath.replace(/'/g, "''")}').PlaySync()`],
      ]];
    default:
      return [
        ['paplay', [wavPath]],
        ['aplay', ['-q', wavPath]],
      ];
  }
}
