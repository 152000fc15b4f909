/**
 * File-based trace storage
 * Appends traces as JSON lines and rotates by size
 */

import * as fs from 'fs';
import * as path from 'path';
import { describeError } from '../errors';
import type { Logger } from '../logging/logger';
import { exportTraces } from './format';
import { matchesQuery } from './memory-trace-storage';
import {
  TraceCategory,
  TraceEvent,
  TraceExportFormat,
  TraceLevel,
  TraceQuery,
  TraceSpan,
  TraceStorage
} from './types';

export interface FileTraceStorageConfig {
  directory: string;
  maxFileSize?: number; // bytes, default 10MB
  keepFiles?: number;   // rotated files kept, default 10
  maxEvents?: number;   // events kept for query, default 10000
  maxSpans?: number;    // spans kept for getSpan, default 1000
  /** Receives write failures; without one they go to the console */
  logger?: Logger;
}

const SOURCE = 'FileTraceStorage';

const CATEGORIES = new Set<string>(Object.values(TraceCategory));
const LEVELS: ReadonlyArray<TraceLevel> = ['trace', 'debug', 'info', 'warn', 'error'];

function isTraceLevel(value: unknown): value is TraceLevel {
  return LEVELS.some(level => level === value);
}

function isTraceCategory(value: unknown): value is TraceCategory {
  return typeof value === 'string' && CATEGORIES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one JSONL line back into a trace event
 */
export function parseTraceLine(line: string): TraceEvent | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed) || parsed._type !== 'trace') return undefined;

  const { id, timestamp, level, category, component, operation, data, parentId } = parsed;
  if (
    typeof id !== 'string' ||
    typeof timestamp !== 'number' ||
    !isTraceLevel(level) ||
    !isTraceCategory(category) ||
    typeof component !== 'string' ||
    typeof operation !== 'string' ||
    !isRecord(data)
  ) {
    return undefined;
  }
  const event: TraceEvent = {
    id,
    timestamp,
    level,
    category,
    component,
    operation,
    data
  };
  if (typeof parentId === 'string') event.parentId = parentId;
  return event;
}

export class FileTraceStorage implements TraceStorage {
  private config: Required<Omit<FileTraceStorageConfig, 'logger'>>;
  private readonly logger?: Logger;
  private currentFile: string;
  private currentStream?: fs.WriteStream;
  private traces: Map<string, TraceEvent> = new Map();
  private spans: Map<string, TraceSpan> = new Map();
  private written = 0;
  private fileCounter = 0;

  constructor(config: FileTraceStorageConfig) {
    this.config = {
      directory: config.directory,
      maxFileSize: config.maxFileSize ?? 10 * 1024 * 1024,
      keepFiles: config.keepFiles ?? 10,
      maxEvents: config.maxEvents ?? 10000,
      maxSpans: config.maxSpans ?? 1000
    };
    this.logger = config.logger;

    fs.mkdirSync(this.config.directory, { recursive: true });

    this.currentFile = this.generateFileName();
    this.openStream();
  }

  /**
   * Path of the file currently being appended to
   */
  get filePath(): string {
    return path.join(this.config.directory, this.currentFile);
  }

  record(event: TraceEvent): void {
    this.remember(event);
    if (event.parentId) {
      this.spans.get(event.parentId)?.events.push(event);
    }
    this.writeTrace(event);
    if (this.written >= this.config.maxFileSize) {
      this.rotate();
    }
  }

  startSpan(operation: string, component: string): TraceSpan {
    const span: TraceSpan = {
      id: `span-${Date.now()}-${++this.fileCounter}`,
      operation,
      component,
      startTime: Date.now(),
      events: [],
      metadata: {}
    };
    this.spans.set(span.id, span);
    trimOldest(this.spans, this.config.maxSpans);

    this.record({
      id: `${span.id}-start`,
      timestamp: span.startTime,
      level: 'debug',
      category: TraceCategory.SYSTEM_LIFECYCLE,
      component,
      operation,
      data: { spanId: span.id, type: 'span-start' }
    });

    return span;
  }

  endSpan(spanId: string): void {
    const span = this.spans.get(spanId);
    if (!span) return;

    span.endTime = Date.now();
    this.record({
      id: `${span.id}-end`,
      timestamp: span.endTime,
      level: 'debug',
      category: TraceCategory.SYSTEM_LIFECYCLE,
      component: span.component,
      operation: span.operation,
      data: { spanId: span.id, duration: span.endTime - span.startTime, type: 'span-end' }
    });
  }

  query(query: TraceQuery): TraceEvent[] {
    return Array.from(this.traces.values())
      .filter(event => matchesQuery(event, query))
      .sort((a, b) => a.timestamp - b.timestamp);
  }

  getSpan(spanId: string): TraceSpan | undefined {
    return this.spans.get(spanId);
  }

  export(format: TraceExportFormat): string {
    return exportTraces(format, this.query({}), Array.from(this.spans.values()));
  }

  clear(): void {
    this.traces.clear();
    this.spans.clear();
  }

  /**
   * Load traces from a file in the trace directory
   * @returns number of events loaded
   */
  loadFromFile(filename: string): number {
    const content = fs.readFileSync(path.join(this.config.directory, filename), 'utf-8');
    let loaded = 0;
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      const event = parseTraceLine(line);
      if (event) {
        this.remember(event);
        loaded++;
      }
    }
    return loaded;
  }

  /**
   * Flush and close the current file
   */
  close(): Promise<void> {
    const stream = this.currentStream;
    this.currentStream = undefined;
    if (!stream) return Promise.resolve();
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  private remember(event: TraceEvent): void {
    this.traces.set(event.id, event);
    trimOldest(this.traces, this.config.maxEvents);
  }

  private writeTrace(trace: TraceEvent): void {
    const stream = this.currentStream ?? this.openStream();
    const line = JSON.stringify({ ...trace, _type: 'trace' }) + '\n';
    this.written += Buffer.byteLength(line);
    stream.write(line);
  }

  private openStream(): fs.WriteStream {
    this.currentStream?.end();
    const file = this.filePath;
    const stream = fs.createWriteStream(file, { flags: 'a' });
    stream.on('error', error => this.reportWriteError(file, error));
    this.currentStream = stream;
    this.written = 0;
    return stream;
  }

  private reportWriteError(file: string, error: unknown): void {
    const message = `Trace file ${file} failed: ${describeError(error)}`;
    if (this.logger) {
      this.logger.error(SOURCE, message);
    } else {
      console.error(`[${SOURCE}] ${message}`);
    }
  }

  private generateFileName(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    return `trace-${timestamp}-${String(++this.fileCounter).padStart(4, '0')}.jsonl`;
  }

  private rotate(): void {
    this.currentFile = this.generateFileName();
    this.openStream();
    this.cleanOldFiles();
  }

  private cleanOldFiles(): void {
    const files = fs.readdirSync(this.config.directory)
      .filter(f => f.startsWith('trace-') && f.endsWith('.jsonl'))
      .sort()
      .reverse();

    for (const file of files.slice(this.config.keepFiles + 1)) {
      fs.unlinkSync(path.join(this.config.directory, file));
    }
  }
}

/** Maps iterate in insertion order, so the first keys are the oldest */
function trimOldest<V>(map: Map<string, V>, max: number): void {
  for (const key of map.keys()) {
    if (map.size <= max) return;
    map.delete(key);
  }
}
