import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger, MemoryLogSink } from '../logging/logger';
import { BaseNode } from '../nodes/node-class';
import {
  FileTraceStorage,
  MemoryTraceStorage,
  parseTraceLine,
  toTraceEvent,
  TraceCategory,
  TraceEvent
} from '../tracing';
import { exportTraces } from '../tracing/format';
import { createTestBus } from './helpers';

function event(overrides: Partial<TraceEvent> = {}): TraceEvent {
  return {
    id: 'e1',
    timestamp: 0,
    level: 'info',
    category: TraceCategory.MESSAGE_SEND,
    component: 'Router',
    operation: 'send',
    data: {},
    ...overrides
  };
}

describe('toTraceEvent()', () => {
  it('fills in id and timestamp', () => {
    const filled = toTraceEvent({
      level: 'info',
      category: TraceCategory.MODE_SWITCH,
      component: 'Modes',
      operation: 'switchMode',
      data: {}
    });

    expect(filled.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(typeof filled.timestamp).toBe('number');
  });

  it('keeps supplied values', () => {
    const filled = toTraceEvent({ ...event(), id: 'given', timestamp: 42 });

    expect(filled.id).toBe('given');
    expect(filled.timestamp).toBe(42);
  });
});

describe('MemoryTraceStorage', () => {
  it('drops the oldest events past maxEvents', () => {
    const storage = new MemoryTraceStorage({ maxEvents: 2 });

    storage.record(event({ id: 'a' }));
    storage.record(event({ id: 'b' }));
    storage.record(event({ id: 'c' }));

    expect(storage.query({}).map(e => e.id)).toEqual(['b', 'c']);
  });

  it('filters by category, component, level and time', () => {
    const storage = new MemoryTraceStorage();
    storage.record(event({ id: 'send', timestamp: 10 }));
    storage.record(event({ id: 'cycle', timestamp: 20, level: 'warn', category: TraceCategory.MESSAGE_CYCLE }));
    storage.record(event({ id: 'spawn', timestamp: 30, component: 'Lifecycle', category: TraceCategory.NODE_SPAWN }));

    expect(storage.query({ categories: [TraceCategory.MESSAGE_CYCLE] }).map(e => e.id)).toEqual(['cycle']);
    expect(storage.query({ components: ['Lifecycle'] }).map(e => e.id)).toEqual(['spawn']);
    expect(storage.query({ level: 'warn' }).map(e => e.id)).toEqual(['cycle']);
    expect(storage.query({ timeRange: { start: 15, end: 30 } }).map(e => e.id)).toEqual(['cycle', 'spawn']);
  });

  it('collects events under their span', () => {
    const storage = new MemoryTraceStorage();
    const span = storage.startSpan('configure', 'game');

    storage.record(event({ id: 'inside', parentId: span.id }));
    storage.record(event({ id: 'outside' }));
    storage.endSpan(span.id);

    const stored = storage.getSpan(span.id);
    expect(span.id).toBe('span-1');
    expect(stored?.events.map(e => e.id)).toEqual(['inside']);
    expect(typeof stored?.endTime).toBe('number');
    expect(storage.query({ parentId: span.id }).map(e => e.id)).toEqual(['inside']);
  });

  it('drops the oldest spans past maxSpans', () => {
    const storage = new MemoryTraceStorage({ maxSpans: 2 });

    const first = storage.startSpan('send', 'Router');
    const second = storage.startSpan('send', 'Router');
    const third = storage.startSpan('send', 'Router');

    expect(storage.getSpan(first.id)).toBeUndefined();
    expect(storage.getSpan(second.id)).toBe(second);
    expect(storage.getSpan(third.id)).toBe(third);
  });

  it('clears events and spans', () => {
    const storage = new MemoryTraceStorage();
    const span = storage.startSpan('configure', 'game');
    storage.record(event());

    storage.clear();

    expect(storage.query({})).toEqual([]);
    expect(storage.getSpan(span.id)).toBeUndefined();
  });
});

describe('exportTraces()', () => {
  it('writes csv with quoted data cells', () => {
    const csv = exportTraces('csv', [event({ data: { a: 1, b: 'x' } }), event({ operation: 'deliver' })], []);

    expect(csv.split('\n')).toEqual([
      'timestamp,level,category,component,operation,data',
      '1970-01-01T00:00:00.000Z,info,message.send,Router,send,"{""a"":1,""b"":""x""}"',
      '1970-01-01T00:00:00.000Z,info,message.send,Router,deliver,{}'
    ]);
  });

  it('groups markdown by component', () => {
    const markdown = exportTraces('markdown', [
      event({ data: { message: 'hello' } }),
      event({ component: 'Lifecycle', operation: 'init' })
    ], []);

    expect(markdown).toBe([
      '# Trace Export',
      '',
      '## Router',
      '',
      '- **1970-01-01T00:00:00.000Z** [info] send',
      '  - hello',
      '',
      '## Lifecycle',
      '',
      '- **1970-01-01T00:00:00.000Z** [info] init',
      ''
    ].join('\n'));
  });

  it('writes events and spans as json', () => {
    const parsed: unknown = JSON.parse(exportTraces('json', [event()], []));

    expect(parsed).toEqual({ events: [event()], spans: [] });
  });
});

describe('FileTraceStorage', () => {
  const dirs: string[] = [];

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pinwire-trace-'));
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('writes JSON lines that a new storage can load', async () => {
    const directory = tempDir();
    const writer = new FileTraceStorage({ directory });
    writer.record(event({ id: 'first', timestamp: 1 }));
    writer.record(event({ id: 'second', timestamp: 2, data: { signal: 'spawned' } }));
    await writer.close();

    const reader = new FileTraceStorage({ directory });
    const loaded = reader.loadFromFile(path.basename(writer.filePath));
    await reader.close();

    expect(loaded).toBe(2);
    expect(reader.query({}).map(e => [e.id, e.data])).toEqual([
      ['first', {}],
      ['second', { signal: 'spawned' }]
    ]);
  });

  it('records span boundaries as lifecycle events', async () => {
    const storage = new FileTraceStorage({ directory: tempDir() });

    const span = storage.startSpan('configure', 'game');
    storage.endSpan(span.id);
    await storage.close();

    expect(storage.query({ categories: [TraceCategory.SYSTEM_LIFECYCLE] }).map(e => e.id)).toEqual([
      `${span.id}-start`,
      `${span.id}-end`
    ]);
  });
});

describe('FileTraceStorage limits', () => {
  const dirs: string[] = [];

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pinwire-trace-'));
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    vi.useRealTimers();
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('keeps only the newest events in memory while rotating files', async () => {
    const storage = new FileTraceStorage({ directory: tempDir(), maxFileSize: 1024, maxEvents: 50 });

    for (let i = 0; i < 500; i++) {
      storage.record(event({ id: `e${i}`, timestamp: i }));
    }
    await storage.close();

    const kept = storage.query({});
    expect(kept).toHaveLength(50);
    expect(kept[0]?.id).toBe('e450');
    expect(kept[49]?.id).toBe('e499');
  });

  it('logs a file that cannot be opened', async () => {
    const directory = tempDir();
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const blocked = path.join(directory, 'trace-2026-01-01T00-00-00-000Z-0001.jsonl');
    fs.mkdirSync(blocked);
    const sink = new MemoryLogSink();

    const storage = new FileTraceStorage({ directory, logger: new Logger({}, sink) });
    vi.useRealTimers();

    expect(storage.filePath).toBe(blocked);
    await vi.waitFor(() => expect(sink.messages('error')).toHaveLength(1));
    expect(sink.messages('error')[0]).toMatch(
      /^FileTraceStorage: Trace file .*trace-2026-01-01T00-00-00-000Z-0001\.jsonl failed: EISDIR/
    );
    await storage.close();
  });
});

describe('parseTraceLine()', () => {
  it('accepts a written trace line', () => {
    const line = JSON.stringify({ ...event({ parentId: 'span-1' }), _type: 'trace' });

    expect(parseTraceLine(line)).toEqual(event({ parentId: 'span-1' }));
  });

  it('rejects lines that are not trace events', () => {
    expect(parseTraceLine('not json')).toBeUndefined();
    expect(parseTraceLine(JSON.stringify(event()))).toBeUndefined();
    expect(parseTraceLine(JSON.stringify({ ...event(), _type: 'trace', level: 'loud' }))).toBeUndefined();
    expect(parseTraceLine(JSON.stringify({ ...event(), _type: 'trace', category: 'made.up' }))).toBeUndefined();
  });
});

describe('bus tracing', () => {
  it('records sends and deliveries from the router', () => {
    const tracer = new MemoryTraceStorage();
    const { bus } = createTestBus({ tracer });
    bus.registerAll([
      BaseNode.extend({ name: 'Starter', System: { onStart: node => { node.out.fire('ready'); } } }),
      BaseNode.extend({ name: 'Listener', Input: { onReady: () => undefined } })
    ]);
    bus.instantiate('Starter', { id: 's1' });
    bus.instantiate('Listener', { id: 'l1' });
    bus.defineMode('M', { wiring: { Starter: ['Listener'] } });

    bus.init();
    bus.switchMode('M');
    bus.start();

    const [send] = tracer.query({ categories: [TraceCategory.MESSAGE_SEND] });
    const [deliver] = tracer.query({ categories: [TraceCategory.MESSAGE_DELIVER] });
    expect(send?.data).toMatchObject({ signal: 'ready', sourceId: 's1' });
    expect(deliver?.data).toMatchObject({ signal: 'ready', targetId: 'l1', handler: 'onReady' });
    expect(deliver?.data.messageId).toBe(send?.data.messageId);
  });

  it('groups a dispatch and the sends it causes under one span', () => {
    const tracer = new MemoryTraceStorage();
    const { bus } = createTestBus({ tracer });
    bus.registerAll([
      BaseNode.extend({ name: 'Relay', Input: { onPing: node => { node.out.fire('pong'); } } }),
      BaseNode.extend({ name: 'Listener', Input: { onPong: () => undefined } })
    ]);
    bus.instantiate('Relay', { id: 'r1' });
    bus.instantiate('Listener', { id: 'l1' });
    bus.defineMode('M', { wiring: { Relay: ['Listener'] } });
    bus.init();
    bus.switchMode('M');
    bus.start();

    bus.sendTo('r1', 'ping');
    bus.sendTo('r1', 'ping');

    const pings = tracer.query({ categories: [TraceCategory.MESSAGE_DELIVER] })
      .filter(e => e.data.signal === 'ping');
    const spanId = pings[0]?.parentId;
    expect(spanId).toBeDefined();
    expect(pings[1]?.parentId).not.toBe(spanId);

    const grouped = tracer.query({ parentId: spanId }).map(e => [e.category, e.data.signal]);
    expect(grouped).toEqual([
      [TraceCategory.MESSAGE_DELIVER, 'ping'],
      [TraceCategory.MESSAGE_SEND, 'pong'],
      [TraceCategory.MESSAGE_DELIVER, 'pong']
    ]);
    const span = spanId === undefined ? undefined : tracer.getSpan(spanId);
    expect(span).toMatchObject({ operation: 'sendTo', component: 'Router' });
    expect(span?.events).toHaveLength(3);
    expect(typeof span?.endTime).toBe('number');
  });

  it('records timed out waits against the node', async () => {
    const tracer = new MemoryTraceStorage();
    const { bus } = createTestBus({ tracer });
    bus.register(BaseNode.extend({ name: 'Waiter' }));
    const node = bus.instantiate('Waiter', { id: 'w1' });
    if (!node) throw new Error('node was not created');

    await node.waitForSignal('never', 10);

    const [timeout] = tracer.query({ components: ['w1'] });
    expect(timeout).toMatchObject({
      category: TraceCategory.NODE_WAIT,
      operation: 'wait',
      data: { timeoutMs: 10, message: "Wait for 'never' timed out" }
    });
  });
});
