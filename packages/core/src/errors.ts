import type { Key, TerminationReason } from './types';

const describeKey = (key: Key): string => (typeof key === 'symbol' ? key.toString() : JSON.stringify(key));

/** The function given to `update` threw; the store that ran it is gone. */
export class UpdateFunctionError extends Error {
  constructor(
    readonly key: Key,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`update function for key ${describeKey(key)} failed: ${detail}`, { cause });
    this.name = 'UpdateFunctionError';
  }
}

/** A call was made to, or was still queued on, a store that has terminated. */
export class StoreTerminatedError extends Error {
  constructor(
    readonly store: string,
    readonly reason: TerminationReason,
  ) {
    super(`store ${store} terminated (${describeReason(reason)})`);
    this.name = 'StoreTerminatedError';
  }
}

export function describeReason(reason: TerminationReason): string {
  switch (reason.kind) {
    case 'normal':
      return 'normal';
    case 'stopped':
      return reason.reason;
    case 'crashed':
      return `crashed: ${reason.error.message}`;
    default: {
      const _exhaustive: never = reason;
      return _exhaustive;
    }
  }
}
