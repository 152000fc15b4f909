import { describe, it, expect } from 'vitest';
import { BusError } from '../errors';
import { BaseNode } from '../nodes/node-class';
import type { NodeInstance } from '../nodes/node';
import { NO_REPLY } from '../nodes/types';
import { captureError, createTestBus, Delivery, recordInto } from './helpers';

/**
 * Class whose System hooks append "<id>:<hook>" to `log`
 */
function hookRecorder(name: string, log: string[]) {
  const hook = (label: string) => (node: NodeInstance): void => {
    log.push(`${node.id}:${label}`);
  };
  return BaseNode.extend({
    name,
    System: {
      onInit: hook('init'),
      onStart: hook('start'),
      onStop: hook('stop'),
      onSpawned: hook('spawned'),
      onDespawning: hook('despawning')
    }
  });
}

describe('Lifecycle', () => {
  it('drives every instance through init, start and stop in creation order', () => {
    const log: string[] = [];
    const { bus } = createTestBus();
    bus.register(hookRecorder('Unit', log));
    const a = bus.instantiate('Unit', { id: 'a' });
    bus.instantiate('Unit', { id: 'b' });

    bus.init();
    bus.start();
    expect(a?.state).toBe('started');
    bus.stop();

    expect(log).toEqual(['a:init', 'b:init', 'a:start', 'b:start', 'a:stop', 'b:stop']);
    expect(a?.state).toBe('stopped');
    expect(bus.isStarted()).toBe(false);
  });

  it('requires init before start', () => {
    const { bus } = createTestBus();

    const error = captureError(() => bus.start());

    expect(error).toBeInstanceOf(BusError);
    if (!(error instanceof BusError)) return;
    expect(error.code).toBe('LIFECYCLE');
    expect(error.message).toBe('Bus must be initialized before start');
  });

  it('warns on a second init and on stop before start', () => {
    const { bus, logs } = createTestBus();

    bus.stop();
    bus.init();
    bus.init();

    expect(logs.messages('warn')).toEqual(['Lifecycle: Not started', 'Lifecycle: Already initialized']);
  });

  it('drops sends made during init', () => {
    const results: Array<number | undefined> = [];
    const { bus } = createTestBus();
    bus.register(BaseNode.extend({
      name: 'Eager',
      System: { onInit: node => { results.push(node.out.fire('hello')); } }
    }));
    bus.instantiate('Eager');

    bus.init();

    expect(results).toEqual([undefined]);
  });

  it('lets onStart send to wired peers', () => {
    const received: Delivery[] = [];
    const { bus } = createTestBus();
    bus.registerAll([
      BaseNode.extend({ name: 'Starter', System: { onStart: node => { node.out.fire('ready', { ok: true }); } } }),
      BaseNode.extend({ name: 'Listener', Input: { onReady: recordInto(received) } })
    ]);
    bus.instantiate('Starter', { id: 's1' });
    bus.instantiate('Listener', { id: 'l1' });
    bus.defineMode('M', { wiring: { Starter: ['Listener'] } });

    bus.init();
    bus.switchMode('M');
    bus.start();

    expect(received.map(call => [call.id, call.payload])).toEqual([['l1', { ok: true }]]);
  });

  describe('instantiate()', () => {
    it('generates ids from the class name', () => {
      const { bus } = createTestBus();
      bus.register(BaseNode.extend({ name: 'Dropper' }));

      const node = bus.instantiate('Dropper');

      expect(node?.id).toMatch(/^Dropper_[0-9a-f-]{36}$/);
    });

    it('rejects duplicate ids', () => {
      const { bus } = createTestBus();
      bus.register(BaseNode.extend({ name: 'Dropper' }));
      bus.instantiate('Dropper', { id: 'd1' });

      const error = captureError(() => bus.instantiate('Dropper', { id: 'd1' }));

      expect(error).toBeInstanceOf(BusError);
      if (!(error instanceof BusError)) return;
      expect(error.code).toBe('DUPLICATE_INSTANCE');
      expect(error.message).toBe("Instance 'd1' already exists");
    });

    it('skips classes bound to the other domain', () => {
      const { bus } = createTestBus({ domain: 'server' });
      bus.registerAll([
        BaseNode.extend({ name: 'Hud', domain: 'client' }),
        BaseNode.extend({ name: 'Score', domain: 'shared' })
      ]);

      expect(bus.instantiate('Hud')).toBeUndefined();
      expect(bus.instantiate('Score', { id: 'score' })?.id).toBe('score');
      expect(bus.getInstances().map(node => node.id)).toEqual(['score']);
    });
  });

  describe('spawn()', () => {
    it('runs onSpawned only before init', () => {
      const log: string[] = [];
      const { bus } = createTestBus();
      bus.register(hookRecorder('Unit', log));

      bus.spawn('Unit', { id: 'u1' });

      expect(log).toEqual(['u1:spawned']);
    });

    it('brings a spawned instance up to a running bus', () => {
      const log: string[] = [];
      const { bus } = createTestBus();
      bus.register(hookRecorder('Unit', log));
      bus.init();
      bus.start();

      bus.spawn('Unit', { id: 'u1' });

      expect(log).toEqual(['u1:spawned', 'u1:init', 'u1:start']);
    });

    it('defers start until startInstance', () => {
      const log: string[] = [];
      const { bus } = createTestBus();
      bus.register(hookRecorder('Unit', log));
      bus.init();
      bus.start();

      const node = bus.spawn('Unit', { id: 'u1', deferStart: true });
      expect(node?.state).toBe('initialized');
      expect(log).toEqual(['u1:spawned', 'u1:init']);

      expect(bus.startInstance('u1')).toBe(true);
      expect(log).toEqual(['u1:spawned', 'u1:init', 'u1:start']);
      expect(node?.state).toBe('started');
    });

    it('throws when starting an unknown instance', () => {
      const { bus } = createTestBus();

      const error = captureError(() => bus.startInstance('ghost'));

      expect(error).toBeInstanceOf(BusError);
      if (!(error instanceof BusError)) return;
      expect(error.code).toBe('INSTANCE_NOT_FOUND');
    });
  });

  describe('despawn()', () => {
    it('stops, notifies and removes the instance', () => {
      const log: string[] = [];
      const { bus } = createTestBus();
      bus.register(hookRecorder('Unit', log));
      bus.init();
      bus.start();
      bus.spawn('Unit', { id: 'u1' });
      log.length = 0;

      expect(bus.despawn('u1')).toBe(true);

      expect(log).toEqual(['u1:stop', 'u1:despawning']);
      expect(bus.getInstance('u1')).toBeUndefined();
    });

    it('warns about unknown ids', () => {
      const { bus, logs } = createTestBus();

      expect(bus.despawn('ghost')).toBe(false);
      expect(logs.messages('warn')).toEqual(['Lifecycle: Cannot despawn: instance not found: ghost']);
    });
  });

  it('cancels pending waits on stop', async () => {
    const { bus } = createTestBus();
    bus.register(BaseNode.extend({ name: 'Waiter' }));
    const node = bus.instantiate('Waiter');
    bus.init();
    bus.start();
    if (!node) throw new Error('node was not created');

    const reply = node.waitForSignal('never', 60_000);
    bus.stop();

    await expect(reply).resolves.toBe(NO_REPLY);
    expect(node.isLocked()).toBe(false);
  });

  it('keeps classes and modes across reset', () => {
    const { bus } = createTestBus();
    bus.register(BaseNode.extend({ name: 'Unit' }));
    bus.instantiate('Unit');
    bus.defineMode('M', {});
    bus.init();
    bus.switchMode('M');
    bus.start();

    bus.reset();

    expect(bus.getInstances()).toEqual([]);
    expect(bus.isInitialized()).toBe(false);
    expect(bus.getMode()).toBeNull();
    expect(bus.registry.has('Unit')).toBe(true);
    expect(bus.modes.hasMode('M')).toBe(true);
  });
});
