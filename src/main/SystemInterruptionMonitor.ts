/**
 * SystemInterruptionMonitor - forces a reset after the machine sleeps or the
 * process is stopped and resumed.
 *
 * Node has no sleep/wake notification, so sleep shows up as timer drift: a
 * heartbeat runs every 2 s and a gap much larger than that means the process
 * was not scheduled for a while. SIGCONT covers `kill -STOP` / Ctrl+Z + `fg`.
 */

import { createLogger } from './utils/Logger.js';

const logger = createLogger('InterruptionMonitor');

export const HEARTBEAT_INTERVAL_MS = 2_000;
export const RESUME_GAP_MS = 10_000;

export interface SignalSource {
  on(signal: 'SIGCONT', listener: () => void): unknown;
  off(signal: 'SIGCONT', listener: () => void): unknown;
}

export interface InterruptionTarget {
  emergencyReset(reason: string): void;
}

export interface InterruptionMonitorOptions {
  now?: () => number;
  /** Omit to skip signal handling (Windows has no SIGCONT) */
  signals?: SignalSource | null;
}

export class SystemInterruptionMonitor {
  private readonly target: InterruptionTarget;
  private readonly now: () => number;
  private readonly signals: SignalSource | null;
  private heartbeat: NodeJS.Timeout | null = null;
  private lastBeat = 0;

  constructor(target: InterruptionTarget, options: InterruptionMonitorOptions = {}) {
    this.target = target;
    this.now = options.now ?? Date.now;
    this.signals = options.signals === undefined
      ? (process.platform === 'win32' ? null : process)
      : options.signals;
  }

  get isRunning(): boolean {
    return this.heartbeat !== null;
  }

  start(): void {
    this.stop();
    this.lastBeat = this.now();
    this.heartbeat = setInterval(() => this.beat(), HEARTBEAT_INTERVAL_MS);
    // Never keep the process alive on its own
    this.heartbeat.unref();
    this.signals?.on('SIGCONT', this.handleContinue);
    logger.debug('Started');
  }

  stop(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
      this.signals?.off('SIGCONT', this.handleContinue);
    }
  }

  private beat(): void {
    const now = this.now();
    const gap = now - this.lastBeat;
    this.lastBeat = now;
    if (gap > RESUME_GAP_MS) {
      logger.warn(`Timer gap of ${gap}ms, assuming the system slept`);
      this.target.emergencyReset('system resumed from sleep');
    }
  }

  private readonly handleContinue = (): void => {
    this.lastBeat = this.now();
    logger.warn('Process continued after being stopped');
    this.target.emergencyReset('process resumed');
  };
}
