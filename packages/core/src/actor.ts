import { defer, type Deferred } from './defer';
import { StoreTerminatedError, UpdateFunctionError, describeReason } from './errors';
import type { ResolvedStoreOptions } from './config';
import type { Labels } from './metrics';
import { addSubscriber, differs, initState, reachable, take, type StoreState } from './state';
import type { Attrs, Key, Observer, TerminationReason, Value } from './types';

/** Requests accepted by the actor's mailbox. Calls carry a reply slot; casts do not. */
export type Request =
  | { type: 'get'; key: Key; fallback: Value; reply: Deferred<Value> }
  | { type: 'take'; keys: readonly Key[]; reply: Deferred<Map<Key, Value>> }
  | { type: 'stop'; reason: TerminationReason; reply: Deferred<void> }
  | { type: 'assign'; entries: ReadonlyArray<readonly [Key, Value]> }
  | { type: 'update'; key: Key; fn: (current: Value) => Value }
  | { type: 'subscribe'; observer: WeakRef<Observer>; keys: readonly Key[] };

export type Call = Extract<Request, { reply: unknown }>;
export type Cast = Exclude<Request, Call>;

const isCall = (r: Request): r is Call => 'reply' in r;

/**
 * Owns one StoreState and applies requests strictly one at a time, in arrival
 * order. Nothing outside this class touches `assigns` or `subscribers`.
 */
export class StoreActor {
  private state: StoreState;
  private readonly mailbox: Request[] = [];
  private scheduled = false;
  private exit: TerminationReason | undefined;
  private readonly done = defer<TerminationReason>();
  private readonly labels: Labels;

  constructor(
    initial: Attrs,
    private readonly opts: ResolvedStoreOptions,
  ) {
    this.labels = { store: opts.name };
    this.state = initState(initial);
    opts.metrics.inc('store_started', 1, 'Stores created', this.labels);
    opts.logger.debug('started', { keys: this.state.assigns.size });
  }

  get name(): string {
    return this.opts.name;
  }

  get alive(): boolean {
    return this.exit === undefined;
  }

  /** Resolves with the termination reason once the actor is gone. */
  get terminated(): Promise<TerminationReason> {
    return this.done.promise;
  }

  /** Enqueue a request and return its reply promise; rejects at once on a dead actor. */
  call<T>(request: Call & { reply: Deferred<T> }): Promise<T> {
    if (this.exit) request.reply.reject(new StoreTerminatedError(this.name, this.exit));
    else this.enqueue(request);
    return request.reply.promise;
  }

  /** Enqueue a fire-and-forget request. Dropped when the actor is gone. */
  cast(request: Cast): void {
    if (this.exit) {
      this.opts.logger.debug(`dropped ${request.type} sent after termination`);
      return;
    }
    this.enqueue(request);
  }

  private enqueue(request: Request): void {
    this.mailbox.push(request);
    this.opts.metrics.set('store_mailbox_depth', this.mailbox.length, 'Requests waiting in the mailbox', this.labels);
    if (!this.scheduled) {
      this.scheduled = true;
      queueMicrotask(() => this.drain());
    }
  }

  private drain(): void {
    try {
      let request: Request | undefined;
      while (!this.exit && (request = this.mailbox.shift())) {
        try {
          this.handle(request);
        } catch (err) {
          this.terminate({ kind: 'crashed', error: err instanceof Error ? err : new Error(String(err)) });
        }
      }
    } finally {
      this.scheduled = false;
      this.opts.metrics.set('store_mailbox_depth', this.mailbox.length, undefined, this.labels);
    }
  }

  private handle(request: Request): void {
    switch (request.type) {
      case 'get':
        request.reply.resolve(this.state.assigns.has(request.key) ? this.state.assigns.get(request.key) : request.fallback);
        break;
      case 'take':
        request.reply.resolve(take(this.state.assigns, request.keys));
        break;
      case 'assign':
        for (const [key, value] of request.entries) this.put(key, value);
        break;
      case 'update': {
        let next: Value;
        try {
          next = request.fn(this.state.assigns.get(request.key));
        } catch (err) {
          this.terminate({ kind: 'crashed', error: new UpdateFunctionError(request.key, err) });
          break;
        }
        this.put(request.key, next);
        break;
      }
      case 'subscribe':
        addSubscriber(this.state.subscribers, request.observer, request.keys);
        break;
      case 'stop':
        this.terminate(request.reason);
        request.reply.resolve();
        break;
      default: {
        const _exhaustive: never = request;
        void _exhaustive;
      }
    }
  }

  /** Write `value` at `key` and notify, unless it structurally equals what is there. */
  private put(key: Key, value: Value): void {
    if (!differs(this.state.assigns, key, value)) {
      this.opts.metrics.inc('store_assigns_unchanged', 1, 'Writes skipped because the value was equal', this.labels);
      return;
    }
    this.state.assigns.set(key, value);
    this.notify(key, value);
  }

  /**
   * Send the change to every reachable subscriber of `key`, in list order, and
   * keep only those in the stored list.
   */
  private notify(key: Key, value: Value): void {
    const refs = this.state.subscribers.get(key);
    if (!refs) return;
    const kept: WeakRef<Observer>[] = [];
    let sent = 0;
    for (const ref of refs) {
      try {
        const observer = reachable(ref);
        if (!observer) continue;
        observer.send({ type: 'store_change', key, value });
      } catch (err) {
        this.opts.logger.warn(`observer failed to accept change for ${String(key)}; dropping it`, err);
        continue;
      }
      kept.push(ref);
      sent++;
    }
    const pruned = refs.length - kept.length;
    if (pruned) this.opts.metrics.inc('store_observers_pruned', pruned, 'Unreachable observers removed', this.labels);
    if (sent) this.opts.metrics.inc('store_notifications_sent', sent, 'Change notifications delivered', this.labels);
    this.state.subscribers.set(key, kept);
  }

  private terminate(reason: TerminationReason): void {
    this.exit = reason;
    if (reason.kind === 'crashed') this.opts.logger.error('terminated', reason.error);
    else this.opts.logger.info(`terminated (${describeReason(reason)})`);
    this.opts.metrics.inc('store_terminated', 1, 'Stores terminated', this.labels);
    const pending = this.mailbox.splice(0, this.mailbox.length);
    for (const request of pending) {
      if (isCall(request)) request.reply.reject(new StoreTerminatedError(this.name, reason));
    }
    this.state = { assigns: new Map(), subscribers: new Map() };
    this.done.resolve(reason);
  }
}
