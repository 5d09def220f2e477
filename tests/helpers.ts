import http from 'http';
import type {
  AudioFormat,
  CuePlayer,
  DeliveryGateway,
  Notifier,
  PcmSource,
  PcmStreamHandle,
  StatusEvent,
  Transcriber,
  TranscriptionRequest,
  TranscriptionResult,
} from '../src/types/index.js';

export const SAMPLE_RATE = 16000;

/** Microphone stand-in: audio arrives only when a test pushes it. */
export class FakePcmSource implements PcmSource {
  openCount = 0;
  active = 0;
  maxActive = 0;
  failWith: Error | null = null;
  lastFormat: AudioFormat | null = null;
  private onData: ((chunk: Buffer) => void) | null = null;

  async open(format: AudioFormat, onData: (chunk: Buffer) => void): Promise<PcmStreamHandle> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.openCount++;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    this.lastFormat = format;
    this.onData = onData;

    let closed = false;
    return {
      close: async () => {
        if (!closed) {
          closed = true;
          this.active--;
        }
      },
    };
  }

  get isOpen(): boolean {
    return this.active > 0;
  }

  /** Deliver `count` samples of a deterministic ramp. */
  pushSamples(count: number): void {
    const chunk = Buffer.alloc(count * 2);
    for (let i = 0; i < count; i++) {
      chunk.writeInt16LE((i % 2000) - 1000, i * 2);
    }
    this.pushBytes(chunk);
  }

  pushSeconds(seconds: number): void {
    this.pushSamples(Math.round(seconds * SAMPLE_RATE));
  }

  pushBytes(chunk: Buffer): void {
    this.onData?.(chunk);
  }

  /** The callback handed to the last open(), kept past close. */
  get lastCallback(): ((chunk: Buffer) => void) | null {
    return this.onData;
  }
}

export class FakeCue implements CuePlayer {
  plays = 0;
  failWith: Error | null = null;

  async play(): Promise<void> {
    this.plays++;
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: StatusEvent[] = [];

  notify(event: StatusEvent): void {
    this.events.push(event);
  }

  get statuses(): string[] {
    return this.events.map((event) => event.status);
  }
}

export class FakeGateway implements DeliveryGateway {
  readonly delivered: string[] = [];
  failWith: Error | null = null;

  async deliver(text: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.delivered.push(text);
  }
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Transcriber whose calls stay pending until the test settles them.
 */
export class ControlledTranscriber implements Transcriber {
  readonly provider = 'fake';
  readonly maxPayloadBytes = 25 * 1024 * 1024;
  readonly requests: TranscriptionRequest[] = [];
  readonly pending: Array<Deferred<TranscriptionResult>> = [];
  inFlight = 0;
  maxInFlight = 0;

  transcribe(request: TranscriptionRequest): Promise<TranscriptionResult> {
    this.requests.push(request);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    const call = deferred<TranscriptionResult>();
    this.pending.push(call);
    return call.promise.finally(() => {
      this.inFlight--;
    });
  }

  resolveNext(rawText: string): boolean {
    const call = this.pending.shift();
    call?.resolve({ rawText });
    return call !== undefined;
  }

  async verifyCredential(): Promise<void> {}
}

export interface StalledServer {
  origin: string;
  /** Requests received so far. */
  received: number;
  close(): Promise<void>;
}

/** Local HTTP server that accepts requests and never answers them. */
export async function startStalledServer(): Promise<StalledServer> {
  const server = http.createServer((req) => {
    stalled.received++;
    req.resume();
  });
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => resolve());
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('stalled server is not listening on a TCP port');
  }

  const stalled: StalledServer = {
    origin: `http://127.0.0.1:${address.port}`,
    received: 0,
    close: () => {
      server.closeAllConnections();
      return new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    },
  };
  return stalled;
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** Small deterministic PRNG so randomized sequences are reproducible. */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

interface WavChunks {
  fmt: { audioFormat: number; channels: number; sampleRate: number; bitsPerSample: number };
  riffSize: number;
  dataOffset: number;
  dataSize: number;
}

/** Walk the RIFF chunks of a WAV buffer. */
export function readWavChunks(wav: Buffer): WavChunks {
  if (wav.toString('ascii', 0, 4) !== 'RIFF' || wav.toString('ascii', 8, 12) !== 'WAVE') {
    throw new Error('not a RIFF/WAVE buffer');
  }
  let fmt: WavChunks['fmt'] | null = null;
  let offset = 12;
  while (offset + 8 <= wav.length) {
    const id = wav.toString('ascii', offset, offset + 4);
    const size = wav.readUInt32LE(offset + 4);
    if (id === 'fmt ') {
      fmt = {
        audioFormat: wav.readUInt16LE(offset + 8),
        channels: wav.readUInt16LE(offset + 10),
        sampleRate: wav.readUInt32LE(offset + 12),
        bitsPerSample: wav.readUInt16LE(offset + 22),
      };
    }
    if (id === 'data') {
      if (!fmt) {
        throw new Error('data chunk before fmt chunk');
      }
      return { fmt, riffSize: wav.readUInt32LE(4), dataOffset: offset + 8, dataSize: size };
    }
    offset += 8 + size + (size % 2);
  }
  throw new Error('no data chunk');
}

export function decodeWavSamples(wav: Buffer): Int16Array {
  const { dataOffset, dataSize } = readWavChunks(wav);
  const samples = new Int16Array(dataSize / 2);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = wav.readInt16LE(dataOffset + i * 2);
  }
  return samples;
}
