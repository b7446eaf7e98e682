type PendingReceive<T> = {
  resolve: (value: T) => void;
  reject: (err: Error) => void;
};

/**
 * Unbounded FIFO between the dispatcher and one application task. Messages
 * are delivered in insertion order; a receive with nothing buffered waits
 * for the next put.
 *
 * A mailbox ends in one of two ways. `close(terminal)` delivers whatever is
 * still buffered and then answers every further receive with `terminal`.
 * `fail(err)` does the same but rejects with `err` instead.
 */
export class Mailbox<T> {
  private readonly buffered: T[] = [];
  private readonly pending: PendingReceive<T>[] = [];
  private ending: { kind: "closed"; terminal: T } | { kind: "failed"; error: Error } | null = null;

  get size(): number {
    return this.buffered.length;
  }

  get ended(): boolean {
    return this.ending !== null;
  }

  put(message: T): boolean {
    if (this.ending) {
      return false;
    }
    const waiter = this.pending.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.buffered.push(message);
    }
    return true;
  }

  receive(): Promise<T> {
    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.ending?.kind === "closed") {
      return Promise.resolve(this.ending.terminal);
    }
    if (this.ending?.kind === "failed") {
      return Promise.reject(this.ending.error);
    }
    return new Promise<T>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  close(terminal: T): void {
    if (this.ending) {
      return;
    }
    this.ending = { kind: "closed", terminal };
    // Waiters only exist while the buffer is empty.
    for (const waiter of this.pending.splice(0)) {
      waiter.resolve(terminal);
    }
  }

  fail(error: Error): void {
    if (this.ending) {
      return;
    }
    this.ending = { kind: "failed", error };
    for (const waiter of this.pending.splice(0)) {
      waiter.reject(error);
    }
  }
}
