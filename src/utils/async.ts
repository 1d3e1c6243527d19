/**
 * Async Utility Functions
 *
 * Sleeping and cooperative cancellation for the repeating sync loop.
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Sleeps for `ms`, waking early when the token is cancelled.
 *
 * @returns true if the full duration elapsed, false if cancelled
 */
export function cancellableSleep(ms: number, token: CancellationToken): Promise<boolean> {
  if (token.cancelled) return Promise.resolve(false);

  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(true);
    }, ms);
    const unsubscribe = token.onCancel(() => {
      clearTimeout(timer);
      resolve(false);
    });
  });
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * A token that can be used to cancel async operations.
 * Follows the cancellation token pattern for cooperative cancellation.
 */
export class CancellationToken {
  private _cancelled = false;
  private _reason?: string;
  private listeners: Array<() => void> = [];

  /** Whether the token has been cancelled */
  get cancelled(): boolean {
    return this._cancelled;
  }

  /** The reason for cancellation (if any) */
  get reason(): string | undefined {
    return this._reason;
  }

  /**
   * Cancels the token, notifying all listeners.
   *
   * @param reason - Optional reason for cancellation
   */
  cancel(reason?: string): void {
    if (!this._cancelled) {
      this._cancelled = true;
      this._reason = reason;
      const listeners = this.listeners;
      this.listeners = [];
      listeners.forEach((fn) => fn());
    }
  }

  /**
   * Registers a callback to be called when the token is cancelled.
   * If already cancelled, the callback is invoked immediately.
   *
   * @returns Unsubscribe function
   */
  onCancel(fn: () => void): () => void {
    if (this._cancelled) {
      fn();
      return () => {};
    }
    this.listeners.push(fn);
    return () => {
      const idx = this.listeners.indexOf(fn);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}

/**
 * A CancellationToken source that owns and can cancel a token.
 */
export class CancellationTokenSource {
  readonly token: CancellationToken;

  constructor() {
    this.token = new CancellationToken();
  }

  /**
   * Cancels the associated token.
   *
   * @param reason - Optional reason for cancellation
   */
  cancel(reason?: string): void {
    this.token.cancel(reason);
  }
}
