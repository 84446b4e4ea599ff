/**
 * TranscriptionCoordinator - routes a recording to the active backend
 *
 * The backend is chosen from settings at call time, so switching modes takes
 * effect on the next session. A request may name its backend explicitly. Every outcome, including thrown provider
 * errors, comes back as a `TranscriptionOutcome`.
 */

import type { TranscriptionMode } from '../../shared/types.js';
import type { SettingsReader } from '../settings/SettingsManager.js';
import {
  TranscriptionCancelledError,
  TranscriptionError,
  describeTranscriptionFailure,
} from './types.js';
import type {
  TranscriptionFailure,
  TranscriptionOutcome,
  TranscriptionProvider,
  TranscriptionRequest,
} from './types.js';
import { createLogger } from '../utils/Logger.js';

const logger = createLogger('TranscriptionCoordinator');

export class TranscriptionCoordinator {
  private readonly settings: SettingsReader;
  private readonly providers: Record<TranscriptionMode, TranscriptionProvider>;
  private readonly inFlight = new Set<string>();

  constructor(settings: SettingsReader, providers: Record<TranscriptionMode, TranscriptionProvider>) {
    this.settings = settings;
    this.providers = providers;
  }

  get activeMode(): TranscriptionMode {
    return this.settings.get('transcriptionMode');
  }

  isInFlight(sessionId: string): boolean {
    return this.inFlight.has(sessionId);
  }

  /**
   * Null when the active backend can run, else what the user needs to fix.
   */
  async validateConfiguration(): Promise<string | null> {
    return this.providers[this.activeMode].validateConfiguration();
  }

  async transcribe(request: TranscriptionRequest): Promise<TranscriptionOutcome> {
    const { sessionId, artifact, token } = request;

    if (this.inFlight.has(sessionId)) {
      logger.warn(`Session ${sessionId} already has a transcription in flight`);
      return { status: 'failed', failure: { kind: 'busy' } };
    }

    if (token.isCancelled) {
      return { status: 'cancelled' };
    }

    const mode = request.mode ?? this.activeMode;
    const provider = this.providers[mode];
    this.inFlight.add(sessionId);
    logger.info(`Session ${sessionId}: transcribing with ${mode} backend`);

    try {
      const text = await provider.transcribe(artifact, token);
      if (token.isCancelled) {
        logger.info(`Session ${sessionId}: result discarded after cancellation`);
        return { status: 'cancelled' };
      }
      return { status: 'completed', text };
    } catch (error) {
      if (error instanceof TranscriptionCancelledError || token.isCancelled) {
        return { status: 'cancelled' };
      }
      const failure = toFailure(error);
      logger.error(`Session ${sessionId}: ${describeTranscriptionFailure(failure)}`);
      return { status: 'failed', failure };
    } finally {
      this.inFlight.delete(sessionId);
    }
  }
}

function toFailure(error: unknown): TranscriptionFailure {
  if (error instanceof TranscriptionError) {
    return error.failure;
  }
  return {
    kind: 'backendRejected',
    message: error instanceof Error ? error.message : String(error),
  };
}
