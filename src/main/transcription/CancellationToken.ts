/**
 * Cooperative cancellation for a session's transcription task.
 *
 * Cancelling does not interrupt a step already running (a whisper process or
 * an HTTP request); it guarantees the result of that step is never acted upon.
 */

export class CancellationToken {
  private cancelled = false;
  private listeners: Array<() => void> = [];

  get isCancelled(): boolean {
    return this.cancelled;
  }

  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      listener();
    }
  }

  /**
   * Register a callback for cancellation. Runs immediately if already cancelled.
   * Returns an unsubscribe function.
   */
  onCancel(listener: () => void): () => void {
    if (this.cancelled) {
      listener();
      return () => {};
    }
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }
}
