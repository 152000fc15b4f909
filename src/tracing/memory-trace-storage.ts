/**
 * In-memory trace storage
 *
 * Keeps the most recent events (bounded) with query support.
 */

import { exportTraces } from './format';
import {
  TraceEvent,
  TraceExportFormat,
  TraceQuery,
  TraceSpan,
  TraceStorage
} from './types';

export interface MemoryTraceStorageConfig {
  /** Oldest events are dropped past this count (default 10000) */
  maxEvents?: number;
  /** Oldest spans are dropped past this count (default 1000) */
  maxSpans?: number;
}

export function matchesQuery(event: TraceEvent, query: TraceQuery): boolean {
  if (query.categories && !query.categories.includes(event.category)) return false;
  if (query.components && !query.components.includes(event.component)) return false;
  if (query.operations && !query.operations.includes(event.operation)) return false;
  if (query.level && event.level !== query.level) return false;
  if (query.parentId && event.parentId !== query.parentId) return false;
  if (query.timeRange) {
    if (event.timestamp < query.timeRange.start || event.timestamp > query.timeRange.end) {
      return false;
    }
  }
  return true;
}

export class MemoryTraceStorage implements TraceStorage {
  private events: TraceEvent[] = [];
  private spans: Map<string, TraceSpan> = new Map();
  private idCounter = 0;
  private readonly maxEvents: number;
  private readonly maxSpans: number;

  constructor(config: MemoryTraceStorageConfig = {}) {
    this.maxEvents = config.maxEvents ?? 10000;
    this.maxSpans = config.maxSpans ?? 1000;
  }

  record(event: TraceEvent): void {
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    if (event.parentId) {
      this.spans.get(event.parentId)?.events.push(event);
    }
  }

  query(query: TraceQuery): TraceEvent[] {
    return this.events.filter(event => matchesQuery(event, query));
  }

  startSpan(operation: string, component: string): TraceSpan {
    const span: TraceSpan = {
      id: `span-${++this.idCounter}`,
      startTime: Date.now(),
      operation,
      component,
      events: []
    };
    this.spans.set(span.id, span);
    for (const id of this.spans.keys()) {
      if (this.spans.size <= this.maxSpans) break;
      this.spans.delete(id);
    }
    return span;
  }

  endSpan(spanId: string): void {
    const span = this.spans.get(spanId);
    if (span) {
      span.endTime = Date.now();
    }
  }

  getSpan(spanId: string): TraceSpan | undefined {
    return this.spans.get(spanId);
  }

  export(format: TraceExportFormat = 'json'): string {
    return exportTraces(format, this.events, Array.from(this.spans.values()));
  }

  clear(): void {
    this.events = [];
    this.spans.clear();
  }
}
