import { describe, it, expect } from 'vitest';
import { createStore } from './handle';
import { StoreTerminatedError, UpdateFunctionError } from './errors';
import type { Logger } from './logger';
import { Metrics } from './metrics';
import { Mailbox, observe } from './observer';
import type { Observer } from './types';

type Logged = { level: keyof Logger; message: string };

function recorder(): { logger: Logger; logged: Logged[] } {
  const logged: Logged[] = [];
  const at = (level: keyof Logger) => (message: string) => {
    logged.push({ level, message });
  };
  return { logger: { debug: at('debug'), info: at('info'), warn: at('warn'), error: at('error') }, logged };
}

describe('update failures', () => {
  it('a throwing update terminates the store and rejects queued calls', async () => {
    const { logger, logged } = recorder();
    const store = createStore({ n: 1 }, { name: 'crash-test', logger, metrics: new Metrics() });
    const inbox = new Mailbox();
    const pending = store
      .subscribe(inbox, ['n'])
      .update('n', () => {
        throw new Error('boom');
      })
      .get('n');

    await expect(pending).rejects.toBeInstanceOf(StoreTerminatedError);
    const reason = await store.terminated;
    expect(reason.kind).toBe('crashed');
    if (reason.kind === 'crashed') {
      expect(reason.error).toBeInstanceOf(UpdateFunctionError);
      expect(reason.error.message).toBe('update function for key "n" failed: boom');
    }
    expect(store.alive).toBe(false);
    expect(inbox.size).toBe(0);
    expect(logged.filter(l => l.level === 'error')).toEqual([{ level: 'error', message: 'terminated' }]);
  });

  it('calls to a crashed store reject and casts are dropped', async () => {
    const { logger, logged } = recorder();
    const store = createStore({}, { name: 'dead', logger, metrics: new Metrics() });
    store.update('k', () => {
      throw 'not an error';
    });
    await store.terminated;

    expect(store.assign('k', 1)).toBe(store);
    await expect(store.get('k')).rejects.toThrow('store dead terminated (crashed: update function for key "k" failed: not an error)');
    await expect(store.take(['k'])).rejects.toBeInstanceOf(StoreTerminatedError);
    expect(logged).toContainEqual({ level: 'debug', message: 'dropped assign sent after termination' });
  });

  it('writes queued before the failing update stay visible up to the crash', async () => {
    const store = createStore({}, { logLevel: 'silent', metrics: new Metrics() });
    const inbox = new Mailbox();
    store
      .subscribe(inbox, ['a'])
      .assign('a', 1)
      .update('a', () => {
        throw new Error('bad');
      })
      .assign('a', 2);
    await store.terminated;
    expect(inbox.drain()).toEqual([{ type: 'store_change', key: 'a', value: 1 }]);
  });
});

describe('stop', () => {
  it('terminates after earlier requests and rejects later ones', async () => {
    const store = createStore({}, { logLevel: 'silent', metrics: new Metrics() });
    const inbox = new Mailbox();
    store.subscribe(inbox, ['a']).assign('a', 1);
    const stopped = store.stop();
    const late = store.get('a');
    await Promise.all([stopped, expect(late).rejects.toBeInstanceOf(StoreTerminatedError)]);
    expect(await store.terminated).toEqual({ kind: 'normal' });
    expect(inbox.drain()).toEqual([{ type: 'store_change', key: 'a', value: 1 }]);
  });

  it('records a custom reason', async () => {
    const { logger, logged } = recorder();
    const store = createStore({}, { logger, metrics: new Metrics() });
    await store.stop('shutdown');
    expect(await store.terminated).toEqual({ kind: 'stopped', reason: 'shutdown' });
    expect(logged.filter(l => l.level === 'info')).toEqual([{ level: 'info', message: 'terminated (shutdown)' }]);
  });
});

describe('observer failures', () => {
  it('an observer whose send throws is dropped and logged', async () => {
    const { logger, logged } = recorder();
    const metrics = new Metrics();
    const store = createStore({}, { logger, metrics });
    const good = new Mailbox();
    const bad = observe(() => {
      throw new Error('nope');
    });
    store.subscribe(good, ['a']).subscribe(bad, ['a']).assign('a', 1);
    await store.get('a');
    store.assign('a', 2);
    await store.get('a');

    expect(good.drain()).toEqual([
      { type: 'store_change', key: 'a', value: 1 },
      { type: 'store_change', key: 'a', value: 2 },
    ]);
    expect(logged.filter(l => l.level === 'warn')).toEqual([{ level: 'warn', message: 'observer failed to accept change for a; dropping it' }]);
    expect(metrics.value('store_observers_pruned')).toBe(1);
    expect(store.alive).toBe(true);
  });
});

describe('observer liveness failures', () => {
  it('an observer whose alive check throws is dropped and the store keeps going', async () => {
    const { logger, logged } = recorder();
    const metrics = new Metrics();
    const store = createStore({}, { logger, metrics });
    const good = new Mailbox();
    const broken: Observer = {
      get alive(): boolean {
        throw new Error('alive boom');
      },
      send() {},
    };
    store.subscribe(good, ['a']).subscribe(broken, ['a']).assign('a', 1);
    expect(await store.get('a')).toBe(1);
    store.assign('a', 2);
    expect(await store.get('a')).toBe(2);

    expect(good.drain()).toEqual([
      { type: 'store_change', key: 'a', value: 1 },
      { type: 'store_change', key: 'a', value: 2 },
    ]);
    expect(store.alive).toBe(true);
    expect(logged.filter(l => l.level === 'warn')).toEqual([{ level: 'warn', message: 'observer failed to accept change for a; dropping it' }]);
    expect(metrics.value('store_observers_pruned')).toBe(1);
  });
});

describe('call options', () => {
  it('an aborted caller gives up while the store carries on', async () => {
    const store = createStore({ a: 1 }, { logLevel: 'silent', metrics: new Metrics() });
    const controller = new AbortController();
    const reply = store.get('a', undefined, { signal: controller.signal });
    controller.abort(new Error('gave up'));
    await expect(reply).rejects.toThrow('gave up');
    await expect(store.take(['a'], { signal: AbortSignal.abort(new Error('too late')) })).rejects.toThrow('too late');
    expect(await store.get('a')).toBe(1);
  });
});
