import { Blob } from 'buffer';
import { Agent, FormData, request, type Dispatcher } from 'undici';
import { DictationError } from '../errors/DictationError.js';
import type {
  RecognitionParams,
  Transcriber,
  TranscriptionRequest,
  TranscriptionResult,
} from '../types/index.js';

export const MAX_PROMPT_LENGTH = 800;

/**
 * Cut a prompt to MAX_PROMPT_LENGTH characters, counted in code points so
 * a surrogate pair is never split.
 */
export function boundPrompt(prompt: string): string {
  const chars = Array.from(prompt);
  return chars.length > MAX_PROMPT_LENGTH ? chars.slice(0, MAX_PROMPT_LENGTH).join('') : prompt;
}

/** 25 MB, about 13 minutes of 16 kHz mono 16-bit audio. */
export const OPENAI_MAX_PAYLOAD_BYTES = 25 * 1024 * 1024;

export interface HttpClientOptions {
  apiKey: string;
  baseUrl: string;
  connectTimeoutMs: number;
  totalTimeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Freeze the audio and recognition parameters into one request. The
 * vocabulary prompt is cut to MAX_PROMPT_LENGTH characters and the
 * temperature clamped into [0, 1].
 */
export function createTranscriptionRequest(
  audio: Buffer,
  params: RecognitionParams,
  fileName = 'voice.wav',
  mimeType = 'audio/wav'
): TranscriptionRequest {
  const temperature = Number.isFinite(params.temperature)
    ? Math.min(1, Math.max(0, params.temperature))
    : 0;

  return Object.freeze({
    audio,
    fileName,
    mimeType,
    model: params.model,
    language: params.language,
    temperature,
    prompt: boundPrompt(params.prompt),
    responseFormat: params.responseFormat,
  });
}

const AUDIO_MIME_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.webm': 'audio/webm',
  '.ogg': 'audio/ogg',
  '.flac': 'audio/flac',
};

export function guessAudioMimeType(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  const ext = dot >= 0 ? fileName.slice(dot).toLowerCase() : '';
  return AUDIO_MIME_TYPES[ext] ?? 'application/octet-stream';
}

export function buildTranscriptionForm(req: TranscriptionRequest): FormData {
  const form = new FormData();
  form.append('file', new Blob([req.audio], { type: req.mimeType }), req.fileName);
  form.append('model', req.model);
  if (req.language) {
    form.append('language', req.language);
  }
  form.append('temperature', String(req.temperature));
  form.append('response_format', req.responseFormat);
  if (req.prompt) {
    form.append('prompt', req.prompt);
  }
  return form;
}

/**
 * Read the transcript out of a response body. `text` responses are the
 * transcript itself; anything else must be a JSON document with a string
 * `text` field, otherwise the transcript is empty.
 */
export function parseTranscriptionBody(body: string, responseFormat: TranscriptionRequest['responseFormat']): string {
  if (responseFormat === 'text') {
    return body;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    console.warn('Transcription response is not JSON, treating as empty');
    return '';
  }

  if (typeof payload === 'object' && payload !== null && 'text' in payload && typeof payload.text === 'string') {
    return payload.text;
  }
  return '';
}

/**
 * Client for OpenAI-compatible `/v1/audio/transcriptions` endpoints. One
 * attempt per call; failures surface as DictationError.
 */
export class TranscriptionClient implements Transcriber {
  readonly provider = 'openai';
  readonly maxPayloadBytes = OPENAI_MAX_PAYLOAD_BYTES;
  private readonly dispatcher: Dispatcher;

  constructor(private readonly options: HttpClientOptions) {
    this.dispatcher = options.dispatcher ?? new Agent({
      connect: { timeout: options.connectTimeoutMs },
    });
  }

  async transcribe(req: TranscriptionRequest): Promise<TranscriptionResult> {
    if (req.audio.length > this.maxPayloadBytes) {
      throw new DictationError(
        'payload-too-large',
        `Audio is ${(req.audio.length / 1024 / 1024).toFixed(1)} MB, the limit is ${this.maxPayloadBytes / 1024 / 1024} MB`
      );
    }

    const url = `${trimSlash(this.options.baseUrl)}/v1/audio/transcriptions`;
    console.log(`Transcribing ${req.audio.length} bytes with ${req.model} (${req.language || 'auto'})`);

    let statusCode: number;
    let body: string;
    try {
      const res = await request(url, {
        method: 'POST',
        dispatcher: this.dispatcher,
        headers: { authorization: `Bearer ${this.options.apiKey}` },
        body: buildTranscriptionForm(req),
        headersTimeout: this.options.totalTimeoutMs,
        bodyTimeout: this.options.totalTimeoutMs,
        signal: AbortSignal.timeout(this.options.totalTimeoutMs),
      });
      statusCode = res.statusCode;
      body = await res.body.text();
    } catch (error) {
      throw DictationError.fromTransportError(this.provider, error);
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw DictationError.fromStatus(this.provider, statusCode, body);
    }

    return { rawText: parseTranscriptionBody(body, req.responseFormat) };
  }

  /**
   * List models, which costs nothing, to confirm the key is accepted.
   */
  async verifyCredential(): Promise<void> {
    const url = `${trimSlash(this.options.baseUrl)}/v1/models`;
    let statusCode: number;
    let body: string;
    try {
      const res = await request(url, {
        method: 'GET',
        dispatcher: this.dispatcher,
        headers: { authorization: `Bearer ${this.options.apiKey}` },
        signal: AbortSignal.timeout(this.options.totalTimeoutMs),
      });
      statusCode = res.statusCode;
      body = await res.body.text();
    } catch (error) {
      throw DictationError.fromTransportError(this.provider, error);
    }

    if (statusCode < 200 || statusCode >= 300) {
      throw DictationError.fromStatus(this.provider, statusCode, body);
    }
  }
}

export function trimSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
