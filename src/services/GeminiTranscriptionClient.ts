import { Agent, request, type Dispatcher } from 'undici';
import { DictationError } from '../errors/DictationError.js';
import type { Transcriber, TranscriptionRequest, TranscriptionResult } from '../types/index.js';
import { trimSlash, type HttpClientOptions } from './TranscriptionClient.js';

/** Inline request data limit; base64 grows the audio by a third. */
export const GEMINI_MAX_PAYLOAD_BYTES = Math.floor((20 * 1024 * 1024 * 3) / 4);

export function buildGeminiInstruction(req: TranscriptionRequest): string {
  const parts = [
    'Transcribe the audio verbatim. Output only the transcript, with no explanation, heading or formatting.',
  ];
  if (req.language) {
    parts.push(`Language: ${req.language}.`);
  }
  if (req.prompt) {
    parts.push(`Vocabulary and proper nouns: ${req.prompt}`);
  }
  return parts.join(' ');
}

export function buildGeminiPayload(req: TranscriptionRequest): object {
  return {
    contents: [
      {
        parts: [
          { text: buildGeminiInstruction(req) },
          { inline_data: { mime_type: req.mimeType, data: req.audio.toString('base64') } },
        ],
      },
    ],
    generationConfig: {
      temperature: req.temperature,
      maxOutputTokens: 4096,
    },
  };
}

/**
 * First candidate's text parts, joined. A missing candidate or part is an
 * empty transcript.
 */
export function parseGeminiBody(body: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    console.warn('Gemini response is not JSON, treating as empty');
    return '';
  }

  const candidates = field(payload, 'candidates');
  if (!Array.isArray(candidates) || candidates.length === 0) {
    return '';
  }
  const parts = field(field(candidates[0], 'content'), 'parts');
  if (!Array.isArray(parts)) {
    return '';
  }

  return parts
    .map((part: unknown) => field(part, 'text'))
    .filter((text): text is string => typeof text === 'string')
    .join('')
    .trim();
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

/**
 * Transcription through a multimodal generateContent model.
 */
export class GeminiTranscriptionClient implements Transcriber {
  readonly provider = 'gemini';
  readonly maxPayloadBytes = GEMINI_MAX_PAYLOAD_BYTES;
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
        `Audio is ${(req.audio.length / 1024 / 1024).toFixed(1)} MB, the inline limit is ${(this.maxPayloadBytes / 1024 / 1024).toFixed(1)} MB`
      );
    }

    const url = `${trimSlash(this.options.baseUrl)}/v1beta/models/${encodeURIComponent(req.model)}:generateContent`;
    console.log(`Transcribing ${req.audio.length} bytes with ${req.model}`);

    const { statusCode, body } = await this.send(url, 'POST', JSON.stringify(buildGeminiPayload(req)));
    if (statusCode < 200 || statusCode >= 300) {
      throw DictationError.fromStatus(this.provider, statusCode, body);
    }

    return { rawText: parseGeminiBody(body) };
  }

  async verifyCredential(): Promise<void> {
    const { statusCode, body } = await this.send(`${trimSlash(this.options.baseUrl)}/v1beta/models`, 'GET');
    if (statusCode < 200 || statusCode >= 300) {
      throw DictationError.fromStatus(this.provider, statusCode, body);
    }
  }

  private async send(url: string, method: 'GET' | 'POST', payload?: string): Promise<{ statusCode: number; body: string }> {
    try {
      const res = await request(url, {
        method,
        dispatcher: this.dispatcher,
        headers: {
          'content-type': 'application/json',
          'x-goog-api-key': this.options.apiKey,
        },
        body: payload,
        headersTimeout: this.options.totalTimeoutMs,
        bodyTimeout: this.options.totalTimeoutMs,
        signal: AbortSignal.timeout(this.options.totalTimeoutMs),
      });
      return { statusCode: res.statusCode, body: await res.body.text() };
    } catch (error) {
      throw DictationError.fromTransportError(this.provider, error);
    }
  }
}
