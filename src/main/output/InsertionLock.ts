/**
 * Process-wide, non-queuing exclusivity for clipboard insertion.
 *
 * A caller that cannot acquire the lock is rejected immediately; it never
 * waits behind the holder.
 */

export class InsertionLock {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  tryAcquire(): boolean {
    if (this.held) {
      return false;
    }
    this.held = true;
    return true;
  }

  release(): void {
    this.held = false;
  }
}

export const insertionLock = new InsertionLock();
