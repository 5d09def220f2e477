export interface AudioFormat {
  sampleRate: number;
  channels: number;
  bitDepth: 16;
}

/** Mono, 16 kHz, signed 16-bit little-endian PCM. */
export const CAPTURE_FORMAT: Readonly<AudioFormat> = Object.freeze({
  sampleRate: 16000,
  channels: 1,
  bitDepth: 16,
});

export type SessionState = 'idle' | 'recording' | 'transcribing';

export interface RecordingSession {
  id: number;
  state: SessionState;
  startTime: Date;
  endTime?: Date;
  durationMs?: number;
}

export type FailureKind =
  | 'device-unavailable'
  | 'auth-failure'
  | 'rate-limited'
  | 'network-timeout'
  | 'payload-too-large'
  | 'server-error'
  | 'delivery-failed';

export type ResponseFormat = 'json' | 'text' | 'verbose_json';

export interface RecognitionParams {
  model: string;
  language: string;
  temperature: number;
  prompt: string;
  responseFormat: ResponseFormat;
}

export interface TranscriptionRequest extends Readonly<RecognitionParams> {
  readonly audio: Buffer;
  readonly fileName: string;
  readonly mimeType: string;
}

export interface TranscriptionResult {
  rawText: string;
}

export interface Transcriber {
  readonly provider: string;
  /** Largest audio payload, in bytes, the provider accepts. */
  readonly maxPayloadBytes: number;
  transcribe(request: TranscriptionRequest): Promise<TranscriptionResult>;
  verifyCredential(): Promise<void>;
}

export interface CorrectionRuleSource {
  pattern: string;
  replacement: string;
}

export interface CorrectionRule {
  readonly pattern: RegExp;
  readonly replacement: string;
}

export type CaptureOutcome =
  | { kind: 'audio'; wav: Buffer; sampleCount: number; durationMs: number }
  | { kind: 'too-short'; sampleCount: number; durationMs: number };

export interface PcmStreamHandle {
  close(): Promise<void>;
}

/**
 * A microphone. `open` resolves once the device delivers audio and rejects
 * when no input device can be opened.
 */
export interface PcmSource {
  open(format: AudioFormat, onData: (chunk: Buffer) => void): Promise<PcmStreamHandle>;
}

export interface CuePlayer {
  play(): Promise<void>;
}

export interface DeliveryGateway {
  deliver(text: string): Promise<void>;
}

export type StatusKind =
  | 'idle'
  | 'recording'
  | 'transcribing'
  | 'done'
  | 'too-short'
  | 'empty'
  | 'error';

export interface StatusEvent {
  sessionId: number;
  status: StatusKind;
  failure?: FailureKind;
  message?: string;
  text?: string;
}

export interface Notifier {
  notify(event: StatusEvent): void;
}

export type SessionOutcome =
  | { kind: 'delivered'; sessionId: number; text: string; rawText: string }
  | { kind: 'empty'; sessionId: number; rawText: string }
  | { kind: 'too-short'; sessionId: number; durationMs: number }
  | { kind: 'failed'; sessionId: number; failure: FailureKind; message: string };

export type FailedOutcome = Extract<SessionOutcome, { kind: 'failed' }>;

/** What a key-down did: ignored, a running recording, or a session that failed to start. */
export type KeyDownResult =
  | { kind: 'ignored'; state: SessionState }
  | { kind: 'recording'; sessionId: number }
  | FailedOutcome;
