import { isDeepStrictEqual } from 'node:util';
import type { Attrs, Key, Observer, Pairs, Value } from './types';

/**
 * Private state of one store actor. `assigns` and `subscribers` are independent:
 * a key may be watched before it is ever written, or written with nobody watching.
 */
export type StoreState = {
  assigns: Map<Key, Value>;
  subscribers: Map<Key, WeakRef<Observer>[]>;
};

export const isPairs = (attrs: Attrs): attrs is Pairs =>
  typeof (attrs as { [Symbol.iterator]?: unknown })[Symbol.iterator] === 'function';

/** Flatten a mapping or pair sequence into entries, preserving order. */
export function toEntries(attrs: Attrs): Array<readonly [Key, Value]> {
  return isPairs(attrs) ? Array.from(attrs) : Object.entries(attrs);
}

export function initState(attrs: Attrs): StoreState {
  return { assigns: new Map(toEntries(attrs)), subscribers: new Map() };
}

/** True when writing `value` at `key` would be a change: absent, or structurally different. */
export function differs(assigns: ReadonlyMap<Key, Value>, key: Key, value: Value): boolean {
  return !assigns.has(key) || !isDeepStrictEqual(assigns.get(key), value);
}

/** Sub-mapping restricted to `keys`; keys without a value are left out. */
export function take(assigns: ReadonlyMap<Key, Value>, keys: Iterable<Key>): Map<Key, Value> {
  const out = new Map<Key, Value>();
  for (const key of keys) {
    if (assigns.has(key)) out.set(key, assigns.get(key));
  }
  return out;
}

/** Prepend `ref` to each key's list. Repeated subscriptions are kept as separate entries. */
export function addSubscriber(
  subscribers: Map<Key, WeakRef<Observer>[]>,
  ref: WeakRef<Observer>,
  keys: Iterable<Key>,
): void {
  for (const key of keys) {
    subscribers.set(key, [ref, ...(subscribers.get(key) ?? [])]);
  }
}

/** The observer behind `ref`, or undefined once it was collected or reports itself dead. */
export function reachable(ref: WeakRef<Observer>): Observer | undefined {
  const observer = ref.deref();
  return observer?.alive ? observer : undefined;
}
