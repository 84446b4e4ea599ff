/**
 * SerialExecutor - runs async tasks strictly one at a time, in submission order.
 *
 * The speech model runtime is not safe to invoke concurrently, so every
 * on-device transcription in the process goes through `whisperExecutionContext`.
 */

import { createLogger } from '../utils/Logger.js';

const logger = createLogger('SerialExecutor');

export class SerialExecutor {
  readonly name: string;
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  constructor(name: string) {
    this.name = name;
  }

  /** Tasks queued or running */
  get pendingCount(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    if (this.pending > 1) {
      logger.debug(`${this.name}: queued behind ${this.pending - 1} task(s)`);
    }

    const result = this.tail.then(task);
    // A failed task must not poison the queue for the next one
    this.tail = result.then(
      () => undefined,
      () => undefined
    );

    return result.finally(() => {
      this.pending--;
    });
  }
}

export const whisperExecutionContext = new SerialExecutor('whisper');
