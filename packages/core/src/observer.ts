import { defer, type Deferred } from './defer';
import type { Observer, StoreChange } from './types';

/** Rejected from a pending `receive` when the mailbox closes or the wait times out. */
export class MailboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MailboxError';
  }
}

/**
 * Inbox observer. Changes are buffered until received; once closed it stops
 * being reachable and stores drop it at their next dispatch.
 */
export class Mailbox implements Observer {
  private readonly buffer: StoreChange[] = [];
  private readonly waiting: Deferred<StoreChange>[] = [];
  private open = true;

  get alive(): boolean {
    return this.open;
  }

  /** Number of buffered, not yet received changes. */
  get size(): number {
    return this.buffer.length;
  }

  send(change: StoreChange): void {
    if (!this.open) return;
    const waiter = this.waiting.shift();
    if (waiter) waiter.resolve(change);
    else this.buffer.push(change);
  }

  /** Next change, waiting for one when the buffer is empty. */
  receive(opts: { timeoutMs?: number } = {}): Promise<StoreChange> {
    const next = this.buffer.shift();
    if (next) return Promise.resolve(next);
    if (!this.open) return Promise.reject(new MailboxError('mailbox closed'));
    const waiter = defer<StoreChange>();
    this.waiting.push(waiter);
    if (opts.timeoutMs === undefined) return waiter.promise;
    const timer = setTimeout(() => {
      const i = this.waiting.indexOf(waiter);
      if (i !== -1) this.waiting.splice(i, 1);
      waiter.reject(new MailboxError(`no change received within ${opts.timeoutMs}ms`));
    }, opts.timeoutMs);
    return waiter.promise.finally(() => clearTimeout(timer));
  }

  /** Take every buffered change. */
  drain(): StoreChange[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  close(): void {
    this.open = false;
    this.buffer.length = 0;
    for (const w of this.waiting.splice(0, this.waiting.length)) {
      w.reject(new MailboxError('mailbox closed'));
    }
  }
}

export type CallbackObserver = Observer & { dispose(): void };

/**
 * Observer that hands each change to `fn`. Keep a reference to it for as long
 * as it should receive changes; stores only hold it weakly.
 */
export function observe(fn: (change: StoreChange) => void): CallbackObserver {
  let active = true;
  return {
    get alive() {
      return active;
    },
    send(change) {
      if (active) fn(change);
    },
    dispose() {
      active = false;
    },
  };
}
