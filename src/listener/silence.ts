/**
 * Silence detection
 * Energy-based check that keeps near-silent frames away from the transcriber
 */

import type { AudioFrame } from './types';

const INT16_SCALE = 32768;

/**
 * RMS energy of 16-bit little-endian PCM, normalized to 0-1
 */
export function rms(samples: Buffer): number {
  const count = Math.floor(samples.length / 2);
  if (count === 0) return 0;

  let sum = 0;
  for (let i = 0; i < count * 2; i += 2) {
    const normalized = samples.readInt16LE(i) / INT16_SCALE;
    sum += normalized * normalized;
  }

  return Math.sqrt(sum / count);
}

export function isSilent(frame: AudioFrame, threshold: number): boolean {
  return rms(frame.samples) < threshold;
}
