/**
 * ErrorCollector - the single sink for handler failures and routing anomalies
 */

import { describeError } from '../errors';
import type { Logger } from '../logging/logger';
import type { Payload } from '../nodes/types';

export type ErrorKind = 'handler' | 'routing' | 'node';

export interface ErrorEvent {
  instanceId: string;
  class: string;
  /** "Channel.handlerName", or the operation that failed */
  handler: string;
  error: unknown;
  payload?: Payload;
}

export interface ErrorRecord extends ErrorEvent {
  kind: ErrorKind;
  message: string;
  timestamp: number;
}

export interface TelemetrySink {
  capture(record: ErrorRecord): void;
}

export type ErrorListener = (record: ErrorRecord) => void;

export interface RoutingAnomaly {
  signal: string;
  reason: string;
  instanceId?: string;
  class?: string;
  error?: unknown;
  payload?: Payload;
}

export interface ErrorCollectorOptions {
  logger: Logger;
  sinks?: TelemetrySink[];
  /** Records kept for `recent()` (default 100) */
  capacity?: number;
}

const SOURCE = 'ErrorCollector';

export class ErrorCollector {
  private readonly logger: Logger;
  private readonly sinks: TelemetrySink[];
  private readonly capacity: number;
  private readonly listeners = new Set<ErrorListener>();
  private records: ErrorRecord[] = [];
  private total = 0;

  constructor(options: ErrorCollectorOptions) {
    this.logger = options.logger;
    this.sinks = [...(options.sinks ?? [])];
    this.capacity = Math.max(1, options.capacity ?? 100);
  }

  addSink(sink: TelemetrySink): void {
    this.sinks.push(sink);
  }

  /**
   * Record a failure. Never throws.
   */
  handleError(event: ErrorEvent, kind: ErrorKind = 'handler'): ErrorRecord {
    const record: ErrorRecord = {
      ...event,
      kind,
      message: describeError(event.error),
      timestamp: Date.now()
    };

    this.logger.error(
      SOURCE,
      `${record.class}.${record.handler} failed on ${record.instanceId}: ${record.message}`
    );

    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records.shift();
    }
    this.total++;

    for (const sink of this.sinks) {
      try {
        sink.capture(record);
      } catch (error) {
        this.logger.error(SOURCE, `Telemetry sink failed: ${describeError(error)}`);
      }
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(record);
      } catch (error) {
        this.logger.error(SOURCE, `Error listener failed: ${describeError(error)}`);
      }
    }

    return record;
  }

  /**
   * Record a routing anomaly (transport failure, undeliverable boundary message)
   */
  reportRouting(anomaly: RoutingAnomaly): ErrorRecord {
    return this.handleError(
      {
        instanceId: anomaly.instanceId ?? '',
        class: anomaly.class ?? 'Router',
        handler: anomaly.signal,
        error: anomaly.error ?? anomaly.reason,
        payload: anomaly.payload
      },
      'routing'
    );
  }

  onError(listener: ErrorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Most recent records, oldest first
   */
  recent(limit?: number): ErrorRecord[] {
    return limit === undefined ? [...this.records] : this.records.slice(-limit);
  }

  /**
   * Every error handled since creation or the last clear
   */
  get count(): number {
    return this.total;
  }

  clear(): void {
    this.records = [];
    this.total = 0;
  }
}
