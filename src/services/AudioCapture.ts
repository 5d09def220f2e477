import { DictationError } from '../errors/DictationError.js';
import {
  CAPTURE_FORMAT,
  type AudioFormat,
  type CaptureOutcome,
  type CuePlayer,
  type PcmSource,
  type PcmStreamHandle,
} from '../types/index.js';
import { durationMsToSamples, encodeWav, pcmBytesToSamples, samplesToDurationMs } from './WavEncoder.js';

export interface AudioCaptureOptions {
  /** Recordings shorter than this are rejected without being encoded. */
  minDurationMs: number;
  /** Audio that must be buffered before the ready cue plays. */
  warmupMs: number;
  format?: AudioFormat;
}

type CaptureState = 'idle' | 'starting' | 'capturing' | 'stopping';

/**
 * Buffers microphone PCM in memory between start() and stop() and turns it
 * into a WAV payload once capture has stopped.
 */
export class AudioCapture {
  private state: CaptureState = 'idle';
  private handle: PcmStreamHandle | null = null;
  private chunks: Buffer[] = [];
  private bufferedBytes = 0;
  private cuePlayed = false;
  private readonly format: AudioFormat;

  constructor(
    private readonly source: PcmSource,
    private readonly cue: CuePlayer | null,
    private readonly options: AudioCaptureOptions
  ) {
    this.format = options.format ?? CAPTURE_FORMAT;
  }

  /**
   * Open the input stream and begin buffering.
   */
  async start(): Promise<void> {
    if (this.state !== 'idle') {
      throw new Error('Capture already in progress');
    }

    this.state = 'starting';
    this.chunks = [];
    this.bufferedBytes = 0;
    this.cuePlayed = false;

    try {
      this.handle = await this.source.open(this.format, (chunk) => this.append(chunk));
    } catch (error) {
      this.state = 'idle';
      this.chunks = [];
      this.bufferedBytes = 0;
      if (error instanceof DictationError) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new DictationError('device-unavailable', `No audio input device could be opened: ${reason}`);
    }

    this.state = 'capturing';
    console.log('Capture started');
  }

  /**
   * Halt the input stream and hand back the finished WAV, or a too-short
   * verdict when less than the minimum duration was buffered.
   */
  async stop(): Promise<CaptureOutcome> {
    if (this.state !== 'capturing' || !this.handle) {
      throw new Error('No capture in progress');
    }

    this.state = 'stopping';
    const handle = this.handle;
    this.handle = null;

    try {
      await handle.close();
    } catch (error) {
      console.warn('Input stream did not close cleanly:', error instanceof Error ? error.message : error);
    }

    // The buffer is frozen from here on; late chunks are dropped by append().
    const pcm = Buffer.concat(this.chunks, this.bufferedBytes);
    this.chunks = [];
    this.bufferedBytes = 0;
    this.state = 'idle';

    const samples = pcmBytesToSamples(pcm);
    const durationMs = samplesToDurationMs(samples.length, this.format);
    console.log(`Capture stopped: ${samples.length} samples (${(durationMs / 1000).toFixed(2)}s)`);

    if (durationMs < this.options.minDurationMs) {
      return { kind: 'too-short', sampleCount: samples.length, durationMs };
    }

    return {
      kind: 'audio',
      wav: encodeWav(samples, this.format),
      sampleCount: samples.length,
      durationMs,
    };
  }

  get bufferedSamples(): number {
    return Math.floor(this.bufferedBytes / 2);
  }

  private append(chunk: Buffer): void {
    if (this.state !== 'starting' && this.state !== 'capturing') {
      return;
    }

    this.chunks.push(chunk);
    this.bufferedBytes += chunk.length;

    if (!this.cuePlayed && this.bufferedSamples >= durationMsToSamples(this.options.warmupMs, this.format)) {
      this.cuePlayed = true;
      this.playCue();
    }
  }

  private playCue(): void {
    if (!this.cue) {
      return;
    }
    this.cue.play().catch((error: unknown) => {
      console.warn('Ready cue failed:', error instanceof Error ? error.message : error);
    });
  }
}
