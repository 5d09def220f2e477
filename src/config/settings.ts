import fs from 'fs';
import os from 'os';
import path from 'path';
import { RECORDER_BACKENDS, type RecorderBackend } from '../services/AudioRecorder.js';
import { MAX_PROMPT_LENGTH, boundPrompt } from '../services/TranscriptionClient.js';
import type { ResponseFormat } from '../types/index.js';

export type TranscriptionProvider = 'openai' | 'gemini';

export interface DictationSettings {
  provider: TranscriptionProvider;
  apiKey: string;
  baseUrl: string;
  model: string;
  language: string;
  temperature: number;
  responseFormat: ResponseFormat;
  prompt: string;
  hotkey: string;
  minDurationMs: number;
  warmupMs: number;
  cueEnabled: boolean;
  recorderBackend?: RecorderBackend;
  inputDevice?: string;
  connectTimeoutMs: number;
  totalTimeoutMs: number;
  statusClearMs: number;
  port: number;
  /** Raw rule entries; compiled (and validated) by the TextCorrector. */
  correctionRules: readonly unknown[];
  /** File the settings were read from, if any. */
  source?: string;
}

export interface LoadOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  warn?: (message: string) => void;
}

const PROVIDER_DEFAULTS: Record<TranscriptionProvider, { baseUrl: string; model: string; language: string; keyVar: string }> = {
  openai: {
    baseUrl: 'https://api.openai.com',
    model: 'whisper-1',
    language: 'zh',
    keyVar: 'OPENAI_API_KEY',
  },
  gemini: {
    baseUrl: 'https://generativelanguage.googleapis.com',
    model: 'gemini-1.5-flash',
    language: 'zh-TW',
    keyVar: 'GEMINI_API_KEY',
  },
};

const RESPONSE_FORMATS: readonly ResponseFormat[] = ['json', 'text', 'verbose_json'];

const PLACEHOLDER_KEYS = new Set(['', 'your_openai_api_key_here', 'YOUR_GEMINI_API_KEY_HERE', 'changeme']);

export const CONFIG_DIR_NAME = '.push-to-dictate';

/**
 * Defaults, then the JSON config file, then env.local, then the process
 * environment. The result is frozen.
 */
export function loadSettings(options: LoadOptions = {}): Readonly<DictationSettings> {
  const cwd = options.cwd ?? process.cwd();
  const env = { ...(options.env ?? process.env) };
  const warn = options.warn ?? ((message: string) => console.warn(message));

  loadEnvFile(cwd, env);

  const configPath = findConfigFile(cwd, env, options.homeDir ?? os.homedir());
  const file = configPath ? readJsonObject(configPath, warn) : {};
  const transcription = objectAt(file, 'transcription');
  const recording = objectAt(file, 'recording');
  const server = objectAt(file, 'server');

  const provider = readChoice(transcription, 'provider', ['openai', 'gemini'] as const, 'openai', warn);
  const defaults = PROVIDER_DEFAULTS[provider];

  let temperature = readNumber(transcription, 'temperature', 0, warn);
  if (temperature < 0 || temperature > 1) {
    warn(`transcription.temperature must be within [0, 1], got ${temperature}; using 0`);
    temperature = 0;
  }

  let prompt = readString(transcription, 'prompt', '', warn);
  const bounded = boundPrompt(prompt);
  if (bounded !== prompt) {
    warn(`transcription.prompt is longer than ${MAX_PROMPT_LENGTH} characters and will be cut`);
    prompt = bounded;
  }

  const backend = readOptionalString(recording, 'backend', warn);
  let recorderBackend: RecorderBackend | undefined;
  if (backend !== undefined) {
    recorderBackend = RECORDER_BACKENDS.find((candidate) => candidate === backend);
    if (!recorderBackend) {
      warn(`recording.backend must be one of ${RECORDER_BACKENDS.join(', ')}; detecting automatically`);
    }
  }

  const rules = file.corrections;
  let correctionRules: readonly unknown[] = [];
  if (Array.isArray(rules)) {
    correctionRules = rules;
  } else if (rules !== undefined) {
    warn('corrections must be an array of { pattern, replacement }; ignoring');
  }

  const envPort = Number(env.PORT);

  return Object.freeze({
    provider,
    apiKey: env[defaults.keyVar] ?? readString(transcription, 'apiKey', '', warn),
    baseUrl: readString(transcription, 'baseUrl', defaults.baseUrl, warn),
    model: readString(transcription, 'model', defaults.model, warn),
    language: readString(transcription, 'language', defaults.language, warn),
    temperature,
    responseFormat: readChoice(transcription, 'responseFormat', RESPONSE_FORMATS, 'json', warn),
    prompt,
    hotkey: readString(file, 'hotkey', 'F9', warn),
    minDurationMs: readPositive(recording, 'minDurationMs', 500, warn),
    warmupMs: readPositive(recording, 'warmupMs', 250, warn),
    cueEnabled: readBoolean(recording, 'cue', true, warn),
    recorderBackend,
    inputDevice: readOptionalString(recording, 'inputDevice', warn),
    connectTimeoutMs: readPositive(transcription, 'connectTimeoutMs', 10_000, warn),
    totalTimeoutMs: readPositive(transcription, 'timeoutMs', 30_000, warn),
    statusClearMs: readPositive(file, 'statusClearMs', 3000, warn),
    port: Number.isInteger(envPort) && envPort > 0 ? envPort : readPositive(server, 'port', 3001, warn),
    correctionRules: Object.freeze([...correctionRules]),
    source: configPath,
  });
}

/**
 * Throws when the key is missing or still the sample placeholder.
 */
export function assertApiKey(settings: DictationSettings): void {
  if (PLACEHOLDER_KEYS.has(settings.apiKey.trim())) {
    const keyVar = PROVIDER_DEFAULTS[settings.provider].keyVar;
    throw new Error(`No API key configured. Set ${keyVar} in env.local or the environment.`);
  }
}

function findConfigFile(cwd: string, env: NodeJS.ProcessEnv, homeDir: string): string | undefined {
  const candidates = [
    env.DICTATE_CONFIG ? path.resolve(cwd, env.DICTATE_CONFIG) : undefined,
    path.join(cwd, 'config.json'),
    path.join(homeDir, CONFIG_DIR_NAME, 'config.json'),
  ];
  return candidates.find((candidate): candidate is string => candidate !== undefined && fs.existsSync(candidate));
}

/**
 * KEY=VALUE lines from env.local (or .env.local). Variables already set win.
 */
export function loadEnvFile(cwd: string, env: NodeJS.ProcessEnv): void {
  const envPath = ['env.local', '.env.local']
    .map((name) => path.join(cwd, name))
    .find((candidate) => fs.existsSync(candidate));
  if (!envPath) {
    return;
  }

  for (const rawLine of fs.readFileSync(envPath, 'utf-8').split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || !line.includes('=')) {
      continue;
    }
    const separator = line.indexOf('=');
    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim().replace(/^(['"])(.*)\1$/, '$2');
    if (key && env[key] === undefined) {
      env[key] = value;
    }
  }
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readJsonObject(filePath: string, warn: (message: string) => void): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    warn(`Could not read ${filePath}: ${error instanceof Error ? error.message : error}; using defaults`);
    return {};
  }
  if (!isJsonObject(parsed)) {
    warn(`${filePath} must contain a JSON object; using defaults`);
    return {};
  }
  console.log(`Loaded settings from ${filePath}`);
  return parsed;
}

function objectAt(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  return isJsonObject(value) ? value : {};
}

function readString(obj: JsonObject, key: string, fallback: string, warn: (message: string) => void): string {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === 'string') return value;
  warn(`${key} must be a string; using ${JSON.stringify(fallback)}`);
  return fallback;
}

function readOptionalString(obj: JsonObject, key: string, warn: (message: string) => void): string | undefined {
  const value = obj[key];
  if (value === undefined || value === '') return undefined;
  if (typeof value === 'string') return value;
  warn(`${key} must be a string; ignoring`);
  return undefined;
}

function readNumber(obj: JsonObject, key: string, fallback: number, warn: (message: string) => void): number {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  warn(`${key} must be a number; using ${fallback}`);
  return fallback;
}

function readPositive(obj: JsonObject, key: string, fallback: number, warn: (message: string) => void): number {
  const value = readNumber(obj, key, fallback, warn);
  if (value > 0) return value;
  warn(`${key} must be positive; using ${fallback}`);
  return fallback;
}

function readBoolean(obj: JsonObject, key: string, fallback: boolean, warn: (message: string) => void): boolean {
  const value = obj[key];
  if (value === undefined) return fallback;
  if (typeof value === 'boolean') return value;
  warn(`${key} must be true or false; using ${fallback}`);
  return fallback;
}

function readChoice<T extends string>(
  obj: JsonObject,
  key: string,
  choices: readonly T[],
  fallback: T,
  warn: (message: string) => void
): T {
  const value = obj[key];
  if (value === undefined) return fallback;
  const match = choices.find((choice) => choice === value);
  if (match !== undefined) return match;
  warn(`${key} must be one of ${choices.join(', ')}; using ${fallback}`);
  return fallback;
}
