import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { Bus } from '../bus';
import { BusError } from '../errors';
import {
  BusApplication,
  BusHost,
  configFromEnv,
  loadHostConfig,
  mergeHostConfig,
  parseHostYaml,
  STORE_REFERENCE
} from '../host';
import { MemoryLogSink } from '../logging/logger';
import { BaseNode } from '../nodes/node-class';
import { isAttributeStore, MemoryAttributeStore } from '../persistence';
import { FileTraceStorage } from '../tracing';
import { LoopbackTransport } from '../transport/loopback';
import { captureError, Delivery, recordInto } from './helpers';

const dirs: string[] = [];

function tempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pinwire-host-'));
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('parseHostYaml()', () => {
  it('reads every section and resolves paths against the base directory', () => {
    const config = parseHostYaml([
      'domain: server',
      'log:',
      '  level: warn',
      '  show: [Router]',
      'modesFile: modes.yaml',
      'initialMode: Play',
      'expectedClasses: [Dropper]'
    ].join('\n'), '/srv/game');

    expect(config).toEqual({
      domain: 'server',
      log: { level: 'warn', show: ['Router'] },
      modesFile: '/srv/game/modes.yaml',
      initialMode: 'Play',
      expectedClasses: ['Dropper']
    });
  });

  it('treats an empty document as no settings', () => {
    expect(parseHostYaml('')).toEqual({});
  });

  it('rejects unknown values', () => {
    expect(() => parseHostYaml('domain: moon')).toThrow("Host config: unknown domain 'moon'");
    expect(() => parseHostYaml('log:\n  level: loud')).toThrow("Host config: unknown log level 'loud'");
    expect(() => parseHostYaml('expectedClasses: Dropper')).toThrow(
      'Host config: expectedClasses must be a list of strings'
    );
    expect(() => parseHostYaml('- a\n- b')).toThrow('Host YAML must be a map');
  });
});

describe('configFromEnv()', () => {
  it('reads PINWIRE_ variables', () => {
    expect(configFromEnv({
      PINWIRE_DOMAIN: 'client',
      PINWIRE_LOG_LEVEL: 'trace',
      PINWIRE_LOG_HIDE: 'Router, ,Modes',
      PINWIRE_EXPECTED_CLASSES: 'Hud,Score',
      PINWIRE_STORE_DIR: '/var/pinwire'
    })).toEqual({
      domain: 'client',
      log: { level: 'trace', hide: ['Router', 'Modes'] },
      expectedClasses: ['Hud', 'Score'],
      storeDir: '/var/pinwire'
    });
  });

  it('returns only an empty log section when nothing is set', () => {
    expect(configFromEnv({})).toEqual({ log: {} });
  });

  it('rejects an unknown log level', () => {
    const error = captureError(() => configFromEnv({ PINWIRE_LOG_LEVEL: 'verbose' }));

    expect(error).toBeInstanceOf(BusError);
    expect(error instanceof Error ? error.message : '').toBe("PINWIRE_LOG_LEVEL: unknown log level 'verbose'");
  });
});

describe('mergeHostConfig()', () => {
  it('lets later layers win and merges log settings per key', () => {
    const merged = mergeHostConfig(
      { domain: 'server', log: { level: 'warn', show: ['Router'] }, initialMode: 'Lobby' },
      { log: { level: 'trace' }, initialMode: 'Play' }
    );

    expect(merged).toEqual({
      domain: 'server',
      log: { level: 'trace', show: ['Router'] },
      initialMode: 'Play',
      expectedClasses: []
    });
  });
});

describe('loadHostConfig()', () => {
  it('layers YAML, then .env, then the environment', () => {
    const dir = tempDir();
    const yamlFile = path.join(dir, 'host.yaml');
    const envFile = path.join(dir, '.env');
    fs.writeFileSync(yamlFile, 'domain: server\nlog:\n  level: warn\nstoreDir: store\n');
    fs.writeFileSync(envFile, 'PINWIRE_LOG_LEVEL=info\nPINWIRE_INITIAL_MODE=Lobby\n');

    const config = loadHostConfig({ yamlFile, envFile, env: { PINWIRE_INITIAL_MODE: 'Play' } });

    expect(config).toEqual({
      domain: 'server',
      log: { level: 'info' },
      storeDir: path.join(dir, 'store'),
      initialMode: 'Play',
      expectedClasses: []
    });
  });

  it('skips a missing .env file', () => {
    const config = loadHostConfig({ envFile: path.join(tempDir(), '.env'), env: {} });

    expect(config).toEqual({ domain: 'shared', log: {}, expectedClasses: [] });
  });
});

describe('BusHost', () => {
  const modesYaml = ['modes:', '  Play:', '    wiring:', '      Dropper: [Zone]'].join('\n');

  function gameApp(calls: string[], zone: Delivery[]): BusApplication {
    return {
      register: bus => {
        calls.push('register');
        bus.registerAll([
          BaseNode.extend({ name: 'Dropper', Output: ['spawned'] }),
          BaseNode.extend({ name: 'Zone', Input: { onSpawned: recordInto(zone) } })
        ]);
      },
      defineModes: bus => {
        calls.push(`defineModes:${bus.modes.hasMode('Play')}`);
      },
      populate: async bus => {
        calls.push('populate');
        bus.instantiate('Dropper', { id: 'd1' });
        bus.instantiate('Zone', { id: 'z1' });
      },
      onStart: bus => {
        calls.push(`onStart:${bus.getMode()}:${bus.isStarted()}`);
        bus.getInstance('d1')?.out.fire('spawned', { n: 1 });
      },
      onShutdown: bus => {
        calls.push(`onShutdown:${bus.isStarted()}`);
      }
    };
  }

  function modesFile(): string {
    const file = path.join(tempDir(), 'modes.yaml');
    fs.writeFileSync(file, modesYaml);
    return file;
  }

  it('boots the application in order', async () => {
    const calls: string[] = [];
    const zone: Delivery[] = [];
    const logSink = new MemoryLogSink();
    const file = modesFile();
    const host = new BusHost(mergeHostConfig({ modesFile: file, initialMode: 'Play' }), { logSink });

    const bus = await host.start(gameApp(calls, zone));

    expect(calls).toEqual(['register', 'defineModes:true', 'populate', 'onStart:Play:true']);
    expect(zone.map(call => [call.id, call.payload])).toEqual([['z1', { n: 1 }]]);
    expect(host.current).toBe(bus);
    expect(logSink.messages('info').filter(line => line.startsWith('Host:'))).toEqual([
      'Host: Starting host (domain shared)',
      `Host: Loaded 1 modes from ${file}`,
      'Host: Host started'
    ]);
  });

  it('stops the bus on shutdown', async () => {
    const calls: string[] = [];
    const logSink = new MemoryLogSink();
    const host = new BusHost(mergeHostConfig({ modesFile: modesFile(), initialMode: 'Play' }), { logSink });
    const bus: Bus = await host.start(gameApp(calls, []));

    await host.shutdown();

    expect(calls[calls.length - 1]).toBe('onShutdown:true');
    expect(bus.isStarted()).toBe(false);
    expect(host.current).toBeUndefined();
    expect(logSink.messages('info').pop()).toBe('Host: Host stopped');
  });

  it('refuses to start twice', async () => {
    const host = new BusHost(mergeHostConfig({}), { logSink: new MemoryLogSink() });
    await host.start({ register: () => undefined });

    await expect(host.start({ register: () => undefined })).rejects.toThrow('Host is already started');
  });

  it('fails when expected classes are missing', async () => {
    const host = new BusHost(mergeHostConfig({ expectedClasses: ['Ghost'] }), { logSink: new MemoryLogSink() });

    await expect(host.start({ register: () => undefined })).rejects.toThrow(
      'Missing required node classes:\n  - Ghost'
    );
    expect(host.current).toBeUndefined();
  });

  it('closes the trace file it opened when boot fails', async () => {
    const close = vi.spyOn(FileTraceStorage.prototype, 'close');
    const traceDir = tempDir();
    const logSink = new MemoryLogSink();
    const host = new BusHost(mergeHostConfig({ traceDir, expectedClasses: ['Ghost'] }), { logSink });

    try {
      await expect(host.start({ register: () => undefined })).rejects.toThrow('Missing required node classes');
      expect(close).toHaveBeenCalledTimes(1);
    } finally {
      close.mockRestore();
    }
    expect(host.current).toBeUndefined();
    expect(logSink.messages('error')).toEqual([
      'Host: Host failed to start: Missing required node classes:\n  - Ghost'
    ]);
  });

  it('stops a started bus when onStart fails', async () => {
    let started: Bus | undefined;
    const host = new BusHost(mergeHostConfig({}), { logSink: new MemoryLogSink() });

    await expect(host.start({
      register: bus => {
        started = bus;
      },
      onStart: () => {
        throw new Error('boom');
      }
    })).rejects.toThrow('boom');

    expect(started?.isStarted()).toBe(false);
    expect(host.current).toBeUndefined();
  });

  it('exposes the attribute store as a reference', async () => {
    const store = new MemoryAttributeStore();
    const host = new BusHost(mergeHostConfig({}), { logSink: new MemoryLogSink(), store });

    const bus = await host.start({ register: () => undefined });

    expect(bus.getReference(STORE_REFERENCE)).toBe(store);
  });

  it('builds a memory store when no directory is configured', async () => {
    const host = new BusHost(mergeHostConfig({}), { logSink: new MemoryLogSink() });

    const bus = await host.start({ register: () => undefined });

    expect(isAttributeStore(bus.getReference(STORE_REFERENCE))).toBe(true);
    expect(bus.getReference(STORE_REFERENCE)).toBeInstanceOf(MemoryAttributeStore);
  });

  it('closes the transport and trace file on shutdown', async () => {
    const [transport] = LoopbackTransport.pair();
    const traceDir = tempDir();
    const host = new BusHost(mergeHostConfig({ traceDir }), { logSink: new MemoryLogSink(), transport });
    await host.start({ register: () => undefined });

    await host.shutdown();

    expect(() => transport.sendAcrossBoundary('A', 's', {}, 'client', 1)).toThrow('Loopback transport is closed');
    expect(fs.readdirSync(traceDir).filter(file => /^trace-.*\.jsonl$/.test(file))).toHaveLength(1);
  });
});
