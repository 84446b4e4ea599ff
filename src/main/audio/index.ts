/**
 * Audio Module
 *
 * Microphone capture and level metering.
 */

export {
  RecordingService,
  RecordingError,
  describeRecordingError,
  SAMPLE_RATE,
  buildFfmpegArgs,
  type RecordingErrorKind,
  type RecordingOptions,
} from './RecordingService.js';

export { AudioLevelMeter, AUDIO_METERING, levelFromDecibels, decibelsFromRms, pcm16Rms } from './audioUtils.js';
