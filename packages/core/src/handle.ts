import { StoreActor } from './actor';
import { resolveOptions, type StoreOptions } from './config';
import { defer } from './defer';
import { toEntries } from './state';
import type { Attrs, CallOptions, Key, Observer, TerminationReason, Value } from './types';

/** Reject with the signal's reason if it aborts first; the actor still handles the request. */
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // the reply is discarded
    void promise.catch(() => undefined);
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then(resolve, reject).finally(() => signal.removeEventListener('abort', onAbort));
  });
}

/**
 * Reference to one running store. Reads resolve once the store reaches them in
 * its queue. Writes and subscriptions are queued and return this same handle,
 * so their return says nothing about whether they have been applied yet.
 */
export class StoreHandle {
  private readonly actor: StoreActor;

  constructor(initial: Attrs = [], opts?: StoreOptions) {
    this.actor = new StoreActor(initial, resolveOptions(opts));
  }

  get name(): string {
    return this.actor.name;
  }

  /** False once the store crashed or was stopped. */
  get alive(): boolean {
    return this.actor.alive;
  }

  /** Resolves with why the store terminated. Never rejects. */
  get terminated(): Promise<TerminationReason> {
    return this.actor.terminated;
  }

  /** Value bound to `key`, or `fallback` when there is none. */
  get(key: Key, fallback?: Value, opts?: CallOptions): Promise<Value> {
    const reply = defer<Value>();
    return abortable(this.actor.call<Value>({ type: 'get', key, fallback, reply }), opts?.signal);
  }

  /** Entries for those of `keys` that hold a value, in the order asked for. */
  take(keys: Iterable<Key>, opts?: CallOptions): Promise<Map<Key, Value>> {
    const reply = defer<Map<Key, Value>>();
    return abortable(this.actor.call<Map<Key, Value>>({ type: 'take', keys: Array.from(keys), reply }), opts?.signal);
  }

  /**
   * Merge assigns into the store. Keys whose value is structurally unchanged
   * are skipped and produce no notification.
   */
  assign(attrs: Attrs): this;
  assign(key: Key, value: Value): this;
  assign(keyOrAttrs: Key | Attrs, value?: Value): this {
    const entries =
      typeof keyOrAttrs === 'string' || typeof keyOrAttrs === 'symbol' ? [[keyOrAttrs, value] as const] : toEntries(keyOrAttrs);
    this.actor.cast({ type: 'assign', entries });
    return this;
  }

  /**
   * Replace the value at `key` with `fn(current)`; `current` is undefined when
   * the key has no value. A throwing `fn` terminates the store.
   */
  update(key: Key, fn: (current: Value) => Value): this {
    this.actor.cast({ type: 'update', key, fn });
    return this;
  }

  /**
   * Deliver future changes of `keys` to `observer`. The store keeps only a weak
   * reference; the caller decides how long the observer lives.
   */
  subscribe(observer: Observer, keys: Iterable<Key>): this {
    this.actor.cast({ type: 'subscribe', observer: new WeakRef(observer), keys: Array.from(keys) });
    return this;
  }

  /** Terminate after every request queued before this one has been handled. */
  stop(reason = 'normal', opts?: CallOptions): Promise<void> {
    const exit: TerminationReason = reason === 'normal' ? { kind: 'normal' } : { kind: 'stopped', reason };
    return abortable(this.actor.call<void>({ type: 'stop', reason: exit, reply: defer<void>() }), opts?.signal);
  }
}

/** Start a store holding `initial` and return its handle. */
export function createStore(initial: Attrs = [], opts?: StoreOptions): StoreHandle {
  return new StoreHandle(initial, opts);
}
