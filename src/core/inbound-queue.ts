import type { InboundMessage } from '../ports/gateway.js';

/**
 * In-memory FIFO of inbound messages.
 *
 * Producers push without waiting; a consumer awaiting pull() is woken by the
 * next push. After close(), queued messages still drain and then every pull()
 * resolves null.
 */
export class InboundQueue {
  private readonly items: InboundMessage[] = [];
  private readonly waiters: ((message: InboundMessage | null) => void)[] = [];
  private closed = false;

  push(message: InboundMessage): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(message);
    } else {
      this.items.push(message);
    }
    return true;
  }

  pull(): Promise<InboundMessage | null> {
    const next = this.items.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
  }

  reopen(): void {
    this.closed = false;
  }

  size(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
