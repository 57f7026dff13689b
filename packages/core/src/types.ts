/**
 * Keys are opaque comparable identifiers. Symbols stand in for atoms.
 */
export type Key = string | symbol;

/**
 * Stored values are never interpreted beyond equality checks.
 */
export type Value = unknown;

/**
 * Notification pushed to observers when a key's value changes.
 */
export type StoreChange = { type: 'store_change'; key: Key; value: Value };

/**
 * Initial or merged assigns: a mapping, or ordered pairs where the last write wins.
 */
export type Pairs = Iterable<readonly [Key, Value]>;
export type Attrs = ReadonlyMap<Key, Value> | Pairs | { readonly [key: string]: Value };

/**
 * External recipient of change notifications. The store never owns it.
 */
export interface Observer {
  readonly alive: boolean;
  send(change: StoreChange): void;
}

export type TerminationReason = { kind: 'normal' } | { kind: 'stopped'; reason: string } | { kind: 'crashed'; error: Error };

export type CallOptions = { signal?: AbortSignal };
