import pkg from 'wavefile';
const { WaveFile } = pkg;
import type { AudioFormat } from '../types/index.js';

/**
 * Interpret little-endian 16-bit PCM bytes as samples. A trailing odd byte
 * (half a sample) is dropped.
 */
export function pcmBytesToSamples(pcm: Buffer): Int16Array {
  const sampleCount = Math.floor(pcm.length / 2);
  const samples = new Int16Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = pcm.readInt16LE(i * 2);
  }
  return samples;
}

/**
 * Build a complete WAV file (RIFF header with explicit sizes + data chunk).
 */
export function encodeWav(samples: Int16Array, format: AudioFormat): Buffer {
  const wav = new WaveFile();
  wav.fromScratch(format.channels, format.sampleRate, String(format.bitDepth), samples);
  return Buffer.from(wav.toBuffer());
}

export function samplesToDurationMs(sampleCount: number, format: AudioFormat): number {
  return (sampleCount / (format.sampleRate * format.channels)) * 1000;
}

export function durationMsToSamples(durationMs: number, format: AudioFormat): number {
  return Math.round((durationMs / 1000) * format.sampleRate * format.channels);
}

/**
 * Sine tone with a short linear fade at both ends to avoid clicks.
 */
export function createToneSamples(
  frequencyHz: number,
  durationMs: number,
  sampleRate: number,
  amplitude = 0.3
): Int16Array {
  const length = Math.round((durationMs / 1000) * sampleRate);
  const fadeLength = Math.min(Math.round(sampleRate * 0.005), Math.floor(length / 2));
  const peak = Math.round(32767 * amplitude);
  const samples = new Int16Array(length);

  for (let i = 0; i < length; i++) {
    let gain = 1;
    if (fadeLength > 0) {
      if (i < fadeLength) {
        gain = i / fadeLength;
      } else if (i >= length - fadeLength) {
        gain = (length - 1 - i) / fadeLength;
      }
    }
    samples[i] = Math.round(peak * gain * Math.sin((2 * Math.PI * frequencyHz * i) / sampleRate));
  }

  return samples;
}
