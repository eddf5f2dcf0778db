/**
 * Unbounded FIFO mailbox.
 *
 * Writers never block: {@link Mailbox.post} appends or hands the message straight
 * to the oldest waiting reader. Readers suspend in {@link Mailbox.take} or
 * {@link Mailbox.poll} until a message arrives.
 */

export type Polled<T> = { status: 'message'; message: T } | { status: 'timeout' };

interface Waiter<T> {
  resolve: (message: T) => void;
  reject: (reason: unknown) => void;
}

export class MailboxClosedError extends Error {
  constructor() {
    super('Mailbox is closed');
    this.name = 'MailboxClosedError';
  }
}

export class Mailbox<T> {
  private messages: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closedWith: unknown = null;
  private closed = false;

  /**
   * Number of messages waiting to be taken
   */
  get size(): number {
    return this.messages.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Deliver a message. Returns false when the mailbox is closed.
   */
  post(message: T): boolean {
    if (this.closed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.messages.push(message);
    }
    return true;
  }

  /**
   * Take the next message, waiting for one if needed.
   *
   * Rejects with `signal.reason` when the signal aborts, and with the close
   * reason once the mailbox is closed and drained.
   */
  take(signal?: AbortSignal): Promise<T> {
    if (this.messages.length > 0) {
      const [message] = this.messages.splice(0, 1);
      return Promise.resolve(message);
    }
    if (this.closed) {
      return Promise.reject(this.closedWith ?? new MailboxClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => {
        this.removeWaiter(waiter);
        reject(signal?.reason);
      };
      const waiter: Waiter<T> = {
        resolve: (message) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(message);
        },
        reject: (reason) => {
          signal?.removeEventListener('abort', onAbort);
          reject(reason);
        },
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Wait up to `timeout` ms for the next message.
   */
  async poll(timeout: number): Promise<Polled<T>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeout);
    try {
      const message = await this.take(controller.signal);
      return { status: 'message', message };
    } catch (error) {
      if (controller.signal.aborted) return { status: 'timeout' };
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Close the mailbox. Pending readers are rejected; buffered messages can still
   * be taken.
   */
  close(reason?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    this.closedWith = reason ?? null;

    const waiters = this.waiters;
    this.waiters = [];
    const error = reason ?? new MailboxClosedError();
    waiters.forEach((w) => w.reject(error));
  }

  /**
   * Remove and return every buffered message
   */
  drain(): T[] {
    const messages = this.messages;
    this.messages = [];
    return messages;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      try {
        yield await this.take();
      } catch (error) {
        if (this.closed) return;
        throw error;
      }
    }
  }

  private removeWaiter(waiter: Waiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) this.waiters.splice(index, 1);
  }
}
