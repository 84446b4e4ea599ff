/**
 * Audio Utility Functions
 *
 * Level metering for the live recording indicator. Input is 16-bit
 * little-endian mono PCM as streamed by the capture process.
 */

export const AUDIO_METERING = {
  /** Below this the meter reads silence */
  minDecibels: -35,
  /** Normal speech peaks around here */
  maxDecibels: -20,
  /** sqrt curve */
  amplitudeExponent: 0.5,
  visualBoost: 2.5,
  /** Weight of the new reading; the rest carries over from the previous one */
  smoothingFactor: 0.8,
} as const;

/** Floor returned for digital silence */
export const SILENCE_DECIBELS = -160;

/**
 * Root-mean-square of a PCM s16le chunk, 0..1.
 */
export function pcm16Rms(chunk: Buffer): number {
  const sampleCount = Math.floor(chunk.byteLength / 2);
  if (sampleCount === 0) return 0;

  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = chunk.readInt16LE(i * 2) / 32768;
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

export function decibelsFromRms(rms: number): number {
  if (rms <= 0) return SILENCE_DECIBELS;
  return Math.max(SILENCE_DECIBELS, 20 * Math.log10(rms));
}

/**
 * Map an average power reading (dBFS) to an unsmoothed 0..1 display level.
 */
export function levelFromDecibels(decibels: number): number {
  const { minDecibels, maxDecibels, amplitudeExponent, visualBoost } = AUDIO_METERING;
  if (decibels < minDecibels) return 0;

  const clamped = Math.min(decibels, maxDecibels);
  const amplitude = Math.pow(10, 0.05 * clamped);
  const minAmplitude = Math.pow(10, 0.05 * minDecibels);
  const maxAmplitude = Math.pow(10, 0.05 * maxDecibels);
  const normalized = (amplitude - minAmplitude) / (maxAmplitude - minAmplitude);

  return Math.min(Math.pow(normalized, amplitudeExponent) * visualBoost, 1);
}

/**
 * Exponentially smoothed level. Silence snaps straight to zero.
 */
export class AudioLevelMeter {
  private level = 0;

  get current(): number {
    return this.level;
  }

  update(decibels: number): number {
    if (decibels < AUDIO_METERING.minDecibels) {
      this.level = 0;
      return this.level;
    }
    const next = levelFromDecibels(decibels);
    const oldWeight = 1 - AUDIO_METERING.smoothingFactor;
    this.level = this.level * oldWeight + next * AUDIO_METERING.smoothingFactor;
    return this.level;
  }

  reset(): void {
    this.level = 0;
  }
}
