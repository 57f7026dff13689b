import { createStore, Mailbox, type Key, type StoreHandle, type Value } from '@store-actor/core';

const increment = (n: Value) => (typeof n === 'number' ? n + 1 : 1);

/**
 * Headless view that mirrors some store keys into its own assigns, the way a
 * root view and a nested child view share one store.
 */
export class CounterView {
  readonly assigns = new Map<Key, Value>();
  private readonly inbox = new Mailbox();

  constructor(
    readonly store: StoreHandle,
    private readonly keys: readonly Key[] = ['val'],
  ) {}

  /** Subscribe, then copy the current values in. */
  async mount(): Promise<this> {
    this.store.subscribe(this.inbox, this.keys);
    for (const [key, value] of await this.store.take(this.keys)) this.assigns.set(key, value);
    return this;
  }

  /** Apply buffered store changes; returns how many were applied. */
  sync(): number {
    const changes = this.inbox.drain();
    for (const c of changes) this.assigns.set(c.key, c.value);
    return changes.length;
  }

  /** Writes go to the store, never to the local assigns. */
  increment(key: Key = 'val'): void {
    this.store.update(key, increment);
  }

  unmount(): void {
    this.inbox.close();
  }
}

export async function mountCounters(initial = 0): Promise<{ store: StoreHandle; root: CounterView; child: CounterView }> {
  const store = createStore({ val: initial });
  const root = await new CounterView(store).mount();
  const child = await new CounterView(store).mount();
  return { store, root, child };
}
