import { toTraceEvent } from '../tracing';
import { TraceCategory, TraceStorage } from '../tracing/types';
import type { ErrorRecord, TelemetrySink } from './error-collector';

/**
 * Telemetry sink that records errors into a trace storage
 */
export class TraceTelemetrySink implements TelemetrySink {
  constructor(private readonly tracer: TraceStorage) {}

  capture(record: ErrorRecord): void {
    this.tracer.record(toTraceEvent({
      timestamp: record.timestamp,
      level: 'error',
      category: TraceCategory.SYSTEM_ERROR,
      component: record.class,
      operation: record.handler,
      data: {
        kind: record.kind,
        instanceId: record.instanceId,
        message: record.message,
        payload: record.payload
      }
    }));
  }
}
