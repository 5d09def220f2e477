import type { DictationSettings } from './config/settings.js';
import { AudioCapture } from './services/AudioCapture.js';
import { AudioRecorder } from './services/AudioRecorder.js';
import { ClipboardPasteGateway } from './services/ClipboardPasteGateway.js';
import { ToneCuePlayer } from './services/CuePlayer.js';
import { GeminiTranscriptionClient } from './services/GeminiTranscriptionClient.js';
import { SessionController } from './services/SessionController.js';
import { StatusBoard } from './services/StatusBoard.js';
import { TextCorrector } from './services/TextCorrector.js';
import { TranscriptionClient, type HttpClientOptions } from './services/TranscriptionClient.js';
import type { DeliveryGateway, PcmSource, RecognitionParams, Transcriber } from './types/index.js';

export interface DictationServices {
  settings: Readonly<DictationSettings>;
  transcriber: Transcriber;
  corrector: TextCorrector;
  statusBoard: StatusBoard;
  capture: AudioCapture;
  controller: SessionController;
}

export interface ServiceOverrides {
  source?: PcmSource;
  gateway?: DeliveryGateway;
  transcriber?: Transcriber;
}

export function createTranscriber(settings: DictationSettings, http: Partial<HttpClientOptions> = {}): Transcriber {
  const options: HttpClientOptions = {
    apiKey: settings.apiKey,
    baseUrl: settings.baseUrl,
    connectTimeoutMs: settings.connectTimeoutMs,
    totalTimeoutMs: settings.totalTimeoutMs,
    ...http,
  };
  return settings.provider === 'gemini'
    ? new GeminiTranscriptionClient(options)
    : new TranscriptionClient(options);
}

export function recognitionParams(settings: DictationSettings): RecognitionParams {
  return {
    model: settings.model,
    language: settings.language,
    temperature: settings.temperature,
    prompt: settings.prompt,
    responseFormat: settings.responseFormat,
  };
}

/**
 * Wire the capture, transcription, correction and delivery services for one
 * process.
 */
export function createServices(settings: Readonly<DictationSettings>, overrides: ServiceOverrides = {}): DictationServices {
  const transcriber = overrides.transcriber ?? createTranscriber(settings);
  const corrector = TextCorrector.fromSources(settings.correctionRules);
  const statusBoard = new StatusBoard(settings.statusClearMs);

  const source = overrides.source ?? new AudioRecorder({
    backend: settings.recorderBackend,
    inputDevice: settings.inputDevice,
  });
  const capture = new AudioCapture(source, settings.cueEnabled ? new ToneCuePlayer() : null, {
    minDurationMs: settings.minDurationMs,
    warmupMs: settings.warmupMs,
  });

  const controller = new SessionController({
    capture,
    transcriber,
    corrector,
    gateway: overrides.gateway ?? new ClipboardPasteGateway(),
    notifier: statusBoard,
    recognition: recognitionParams(settings),
  });

  console.log(`Loaded ${corrector.ruleCount} correction rule(s)`);

  return { settings, transcriber, corrector, statusBoard, capture, controller };
}
