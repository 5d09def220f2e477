import { DictationError } from '../errors/DictationError.js';
import type {
  CaptureOutcome,
  DeliveryGateway,
  FailedOutcome,
  FailureKind,
  KeyDownResult,
  Notifier,
  RecognitionParams,
  RecordingSession,
  SessionOutcome,
  SessionState,
  StatusEvent,
  Transcriber,
} from '../types/index.js';
import type { AudioCapture } from './AudioCapture.js';
import type { TextCorrector } from './TextCorrector.js';
import { createTranscriptionRequest, guessAudioMimeType } from './TranscriptionClient.js';

export interface SessionControllerDeps {
  capture: Pick<AudioCapture, 'start' | 'stop'>;
  transcriber: Transcriber;
  corrector: Pick<TextCorrector, 'apply'>;
  gateway: DeliveryGateway;
  notifier: Notifier;
  recognition: RecognitionParams;
}

export interface FileTranscription {
  rawText: string;
  text: string;
}

/**
 * Push-to-talk state machine: idle -> recording -> transcribing -> idle.
 *
 * Key events are the only entry points. A key-down outside idle and a
 * key-up outside recording are ignored, so at most one session is active
 * at any time. Every session ends in idle with exactly one terminal status,
 * whatever fails along the way.
 */
export class SessionController {
  private state: SessionState = 'idle';
  private session: RecordingSession | null = null;
  private lastSession: RecordingSession | null = null;
  private nextSessionId = 1;
  private starting: Promise<FailedOutcome | null> = Promise.resolve(null);
  private releasing = false;

  constructor(private readonly deps: SessionControllerDeps) {}

  /**
   * Begin a session. Resolves once capture is running, with the failure when
   * the device could not be opened, or as ignored when a session is already
   * active.
   */
  handleKeyDown(): Promise<KeyDownResult> {
    if (this.state !== 'idle') {
      return Promise.resolve<KeyDownResult>({ kind: 'ignored', state: this.state });
    }

    const session: RecordingSession = {
      id: this.nextSessionId++,
      state: 'recording',
      startTime: new Date(),
    };
    this.session = session;
    this.releasing = false;
    this.state = 'recording';
    this.emit({ sessionId: session.id, status: 'recording' });

    this.starting = this.beginCapture(session);
    return this.starting.then((failure): KeyDownResult => failure ?? { kind: 'recording', sessionId: session.id });
  }

  /**
   * End the recording and run transcription, correction and delivery.
   * Resolves to null when the event was ignored.
   */
  async handleKeyUp(): Promise<SessionOutcome | null> {
    const session = this.session;
    if (this.state !== 'recording' || !session || this.releasing) {
      return null;
    }
    this.releasing = true;

    const startFailure = await this.starting;
    if (startFailure) {
      return startFailure;
    }

    let captured: CaptureOutcome;
    try {
      captured = await this.deps.capture.stop();
    } catch (error) {
      return this.fail(session, error, 'device-unavailable');
    }
    session.durationMs = captured.durationMs;

    if (captured.kind === 'too-short') {
      return this.finish(session, {
        kind: 'too-short',
        sessionId: session.id,
        durationMs: captured.durationMs,
      });
    }

    this.state = 'transcribing';
    session.state = 'transcribing';
    this.emit({ sessionId: session.id, status: 'transcribing' });

    let rawText: string;
    try {
      const request = createTranscriptionRequest(captured.wav, this.deps.recognition);
      ({ rawText } = await this.deps.transcriber.transcribe(request));
    } catch (error) {
      return this.fail(session, error, 'server-error');
    }

    const text = this.deps.corrector.apply(rawText);
    if (!text) {
      return this.finish(session, { kind: 'empty', sessionId: session.id, rawText });
    }

    try {
      await this.deps.gateway.deliver(text);
    } catch (error) {
      return this.fail(session, error, 'delivery-failed');
    }

    return this.finish(session, { kind: 'delivered', sessionId: session.id, text, rawText });
  }

  /**
   * Transcribe and correct an existing audio file without touching the
   * session state or delivering the text.
   */
  async transcribeAudio(audio: Buffer, fileName: string): Promise<FileTranscription> {
    const request = createTranscriptionRequest(
      audio,
      this.deps.recognition,
      fileName,
      guessAudioMimeType(fileName)
    );
    const { rawText } = await this.deps.transcriber.transcribe(request);
    return { rawText, text: this.deps.corrector.apply(rawText) };
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * The active session, or the most recent one when idle.
   */
  getSession(): RecordingSession | null {
    const session = this.session ?? this.lastSession;
    return session ? { ...session } : null;
  }

  private async beginCapture(session: RecordingSession): Promise<FailedOutcome | null> {
    try {
      await this.deps.capture.start();
      return null;
    } catch (error) {
      return this.fail(session, error, 'device-unavailable');
    }
  }

  private fail(session: RecordingSession, error: unknown, fallback: FailureKind): FailedOutcome {
    const failure = error instanceof DictationError ? error.kind : fallback;
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Session ${session.id} failed (${failure}):`, message);
    return this.finish(session, { kind: 'failed', sessionId: session.id, failure, message });
  }

  private finish<T extends SessionOutcome>(session: RecordingSession, outcome: T): T {
    session.state = 'idle';
    session.endTime = new Date();
    this.state = 'idle';
    this.session = null;
    this.lastSession = session;
    this.releasing = false;
    this.emit(toStatusEvent(outcome));
    return outcome;
  }

  private emit(event: StatusEvent): void {
    try {
      this.deps.notifier.notify(event);
    } catch (error) {
      console.error('Notifier failed:', error);
    }
  }
}

function toStatusEvent(outcome: SessionOutcome): StatusEvent {
  switch (outcome.kind) {
    case 'delivered':
      return { sessionId: outcome.sessionId, status: 'done', text: outcome.text };
    case 'empty':
      return { sessionId: outcome.sessionId, status: 'empty' };
    case 'too-short':
      return {
        sessionId: outcome.sessionId,
        status: 'too-short',
        message: `${(outcome.durationMs / 1000).toFixed(2)}s recorded`,
      };
    case 'failed':
      return {
        sessionId: outcome.sessionId,
        status: 'error',
        failure: outcome.failure,
        message: outcome.message,
      };
  }
}
