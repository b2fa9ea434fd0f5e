/**
 * Process-local set of message ids under processing. A message id is admitted at
 * most once while it is in flight; `run` releases it on every exit path.
 */

export type GuardResult<T> = { admitted: true; value: T } | { admitted: false };

export class ReentrancyGuard {
  private readonly inFlight = new Set<string>();

  /** False when the id is already in flight; the caller must skip the message. */
  tryAdmit(messageId: string): boolean {
    if (this.inFlight.has(messageId)) return false;
    this.inFlight.add(messageId);
    return true;
  }

  release(messageId: string): void {
    this.inFlight.delete(messageId);
  }

  isInFlight(messageId: string): boolean {
    return this.inFlight.has(messageId);
  }

  get size(): number {
    return this.inFlight.size;
  }

  async run<T>(messageId: string, body: () => Promise<T>): Promise<GuardResult<T>> {
    if (!this.tryAdmit(messageId)) {
      return { admitted: false };
    }
    try {
      return { admitted: true, value: await body() };
    } finally {
      this.release(messageId);
    }
  }
}
