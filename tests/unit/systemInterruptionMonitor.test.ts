/**
 * SystemInterruptionMonitor Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { EventEmitter } from 'events';
import {
  HEARTBEAT_INTERVAL_MS,
  SystemInterruptionMonitor,
} from '../../src/main/SystemInterruptionMonitor.js';

describe('SystemInterruptionMonitor', () => {
  let clock: number;
  let signals: EventEmitter;
  let target: { emergencyReset: Mock<(reason: string) => void> };
  let monitor: SystemInterruptionMonitor;

  beforeEach(() => {
    vi.useFakeTimers();
    clock = 1_000;
    signals = new EventEmitter();
    target = { emergencyReset: vi.fn<(reason: string) => void>() };
    monitor = new SystemInterruptionMonitor(target, { now: () => clock, signals });
  });

  afterEach(() => {
    monitor.stop();
    vi.useRealTimers();
  });

  it('stays quiet while the heartbeat keeps time', () => {
    monitor.start();

    for (let i = 0; i < 5; i++) {
      clock += HEARTBEAT_INTERVAL_MS;
      vi.advanceTimersByTime(HEARTBEAT_INTERVAL_MS);
    }

    expect(target.emergencyReset).not.toHaveBeenCalled();
  });

  it('resets after a long gap between beats', () => {
    monitor.start();

    clock += 30_000;
    vi.advanceTimersByTime(HEARTBEAT_INTERVAL_MS);

    expect(target.emergencyReset).toHaveBeenCalledTimes(1);
    expect(target.emergencyReset).toHaveBeenCalledWith('system resumed from sleep');
  });

  it('measures each gap from the previous beat', () => {
    monitor.start();

    clock += 30_000;
    vi.advanceTimersByTime(HEARTBEAT_INTERVAL_MS);
    clock += HEARTBEAT_INTERVAL_MS;
    vi.advanceTimersByTime(HEARTBEAT_INTERVAL_MS);

    expect(target.emergencyReset).toHaveBeenCalledTimes(1);
  });

  it('resets when the process is continued', () => {
    monitor.start();

    signals.emit('SIGCONT');

    expect(target.emergencyReset).toHaveBeenCalledWith('process resumed');
  });

  it('registers the signal handler once across restarts', () => {
    monitor.start();
    monitor.start();

    expect(signals.listenerCount('SIGCONT')).toBe(1);
  });

  it('stops the heartbeat and the signal handler', () => {
    monitor.start();
    monitor.stop();

    clock += 30_000;
    vi.advanceTimersByTime(HEARTBEAT_INTERVAL_MS);
    signals.emit('SIGCONT');

    expect(monitor.isRunning).toBe(false);
    expect(signals.listenerCount('SIGCONT')).toBe(0);
    expect(target.emergencyReset).not.toHaveBeenCalled();
  });

  it('runs without a signal source', () => {
    const quiet = new SystemInterruptionMonitor(target, { now: () => clock, signals: null });

    quiet.start();
    expect(quiet.isRunning).toBe(true);
    quiet.stop();
  });
});
