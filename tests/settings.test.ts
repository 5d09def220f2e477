import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CONFIG_DIR_NAME, assertApiKey, loadEnvFile, loadSettings } from '../src/config/settings.js';

describe('loadSettings', () => {
  let cwd: string;
  let homeDir: string;
  let warnings: string[];

  const load = (env: NodeJS.ProcessEnv = {}) =>
    loadSettings({ cwd, env, homeDir, warn: (message) => warnings.push(message) });

  const writeJson = (filePath: string, value: unknown) => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(value));
  };

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-cwd-'));
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-home-'));
    warnings = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(cwd, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it('uses the built-in defaults without any file', () => {
    const settings = load();

    expect(settings).toEqual({
      provider: 'openai',
      apiKey: '',
      baseUrl: 'https://api.openai.com',
      model: 'whisper-1',
      language: 'zh',
      temperature: 0,
      responseFormat: 'json',
      prompt: '',
      hotkey: 'F9',
      minDurationMs: 500,
      warmupMs: 250,
      cueEnabled: true,
      recorderBackend: undefined,
      inputDevice: undefined,
      connectTimeoutMs: 10_000,
      totalTimeoutMs: 30_000,
      statusClearMs: 3000,
      port: 3001,
      correctionRules: [],
      source: undefined,
    });
    expect(Object.isFrozen(settings)).toBe(true);
    expect(warnings).toEqual([]);
  });

  it('reads config.json from the working directory', () => {
    const configPath = path.join(cwd, 'config.json');
    writeJson(configPath, {
      transcription: { model: 'whisper-large', language: '', temperature: 0.4, prompt: 'n8n', responseFormat: 'text' },
      recording: { minDurationMs: 800, cue: false, backend: 'sox', inputDevice: 'hw:1,0' },
      hotkey: 'F10',
      server: { port: 4100 },
      corrections: [{ pattern: 'N8n|N 8 n', replacement: 'n8n' }],
    });

    const settings = load();

    expect(settings).toMatchObject({
      model: 'whisper-large',
      language: '',
      temperature: 0.4,
      prompt: 'n8n',
      responseFormat: 'text',
      minDurationMs: 800,
      cueEnabled: false,
      recorderBackend: 'sox',
      inputDevice: 'hw:1,0',
      hotkey: 'F10',
      port: 4100,
      correctionRules: [{ pattern: 'N8n|N 8 n', replacement: 'n8n' }],
      source: configPath,
    });
  });

  it('switches defaults and key variable with the gemini provider', () => {
    writeJson(path.join(cwd, 'config.json'), { transcription: { provider: 'gemini' } });

    const settings = load({ GEMINI_API_KEY: 'test-secret', OPENAI_API_KEY: 'other' });

    expect(settings).toMatchObject({
      provider: 'gemini',
      apiKey: 'test-secret',
      baseUrl: 'https://generativelanguage.googleapis.com',
      model: 'gemini-1.5-flash',
      language: 'zh-TW',
    });
  });

  it('prefers DICTATE_CONFIG, then the working directory, then the home directory', () => {
    const homeConfig = path.join(homeDir, CONFIG_DIR_NAME, 'config.json');
    writeJson(homeConfig, { hotkey: 'F7' });
    expect(load()).toMatchObject({ hotkey: 'F7', source: homeConfig });

    writeJson(path.join(cwd, 'config.json'), { hotkey: 'F8' });
    expect(load().hotkey).toBe('F8');

    writeJson(path.join(cwd, 'custom', 'dictate.json'), { hotkey: 'F12' });
    expect(load({ DICTATE_CONFIG: 'custom/dictate.json' }).hotkey).toBe('F12');
  });

  it('fills the key and port from env.local without overriding the environment', () => {
    fs.writeFileSync(
      path.join(cwd, 'env.local'),
      ['# local secrets', 'OPENAI_API_KEY="test-secret"', '', 'PORT=4000', 'not a pair'].join('\n')
    );

    expect(load()).toMatchObject({ apiKey: 'test-secret', port: 4000 });
    expect(load({ OPENAI_API_KEY: 'from-env', PORT: '5000' })).toMatchObject({ apiKey: 'from-env', port: 5000 });
  });

  it('ignores a PORT that is not a positive integer', () => {
    writeJson(path.join(cwd, 'config.json'), { server: { port: 4100 } });
    expect(load({ PORT: 'abc' }).port).toBe(4100);
  });

  it('warns about invalid values and falls back to defaults', () => {
    writeJson(path.join(cwd, 'config.json'), {
      transcription: { temperature: 1.5, prompt: 'p'.repeat(900), responseFormat: 'srt' },
      recording: { backend: 'portaudio', minDurationMs: -1 },
      corrections: { pattern: 'a', replacement: 'b' },
    });

    const settings = load();

    expect(settings).toMatchObject({
      temperature: 0,
      responseFormat: 'json',
      recorderBackend: undefined,
      minDurationMs: 500,
      correctionRules: [],
    });
    expect(settings.prompt).toHaveLength(800);
    expect(warnings).toEqual([
      'transcription.temperature must be within [0, 1], got 1.5; using 0',
      'transcription.prompt is longer than 800 characters and will be cut',
      'recording.backend must be one of ffmpeg, sox, arecord; detecting automatically',
      'corrections must be an array of { pattern, replacement }; ignoring',
      'responseFormat must be one of json, text, verbose_json; using json',
      'minDurationMs must be positive; using 500',
    ]);
  });

  it('cuts a long prompt without splitting an emoji', () => {
    const prompt = `${'a'.repeat(799)}😀 tail`;
    writeJson(path.join(cwd, 'config.json'), { transcription: { prompt } });

    const settings = load();

    expect(settings.prompt).toBe(`${'a'.repeat(799)}😀`);
    expect(warnings).toEqual(['transcription.prompt is longer than 800 characters and will be cut']);
  });

  it('falls back to defaults when the config file is not valid JSON', () => {
    const configPath = path.join(cwd, 'config.json');
    fs.writeFileSync(configPath, '{ "hotkey": ');

    expect(load().hotkey).toBe('F9');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Could not read ${configPath}: `)).toBe(true);
    expect(warnings[0].endsWith('; using defaults')).toBe(true);
  });
});

describe('loadEnvFile', () => {
  it('reads .env.local when env.local is absent', () => {
    const cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'envfile-'));
    fs.writeFileSync(path.join(cwd, '.env.local'), "GEMINI_API_KEY='test-secret'\n");
    const env: NodeJS.ProcessEnv = {};

    loadEnvFile(cwd, env);

    expect(env).toEqual({ GEMINI_API_KEY: 'test-secret' });
    fs.rmSync(cwd, { recursive: true, force: true });
  });
});

describe('assertApiKey', () => {
  let base: ReturnType<typeof loadSettings>;

  beforeEach(() => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'apikey-'));
    base = loadSettings({ cwd: empty, env: {}, homeDir: empty, warn: () => undefined });
    fs.rmSync(empty, { recursive: true, force: true });
  });

  it('rejects a missing or placeholder key', () => {
    expect(() => assertApiKey(base)).toThrow('No API key configured. Set OPENAI_API_KEY in env.local or the environment.');
    expect(() => assertApiKey({ ...base, apiKey: 'your_openai_api_key_here' })).toThrow('No API key configured');
    expect(() => assertApiKey({ ...base, provider: 'gemini', apiKey: ' ' })).toThrow('Set GEMINI_API_KEY');
  });

  it('accepts a real-looking key', () => {
    expect(() => assertApiKey({ ...base, apiKey: 'test-secret' })).not.toThrow();
  });
});
