/**
 * Tracing types
 *
 * Traces record what the bus did with each message: where it was
 * delivered, queued, dropped or handed across a boundary.
 */

export type TraceLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface TraceEvent {
  id: string;
  timestamp: number;
  level: TraceLevel;
  category: TraceCategory;
  component: string;  // e.g. "Router", "Lifecycle", "Dispenser_1"
  operation: string;  // e.g. "send", "deliver", "switchMode"
  data: Record<string, unknown>;
  parentId?: string;
  duration?: number;
}

export enum TraceCategory {
  // Message flow
  MESSAGE_SEND = 'message.send',
  MESSAGE_DELIVER = 'message.deliver',
  MESSAGE_QUEUE = 'message.queue',
  MESSAGE_CYCLE = 'message.cycle',
  MESSAGE_DROP = 'message.drop',
  MESSAGE_BROADCAST = 'message.broadcast',
  MESSAGE_ACK = 'message.ack',

  // Cross-domain traffic
  BOUNDARY_OUT = 'boundary.out',
  BOUNDARY_IN = 'boundary.in',

  // Configuration
  MODE_SWITCH = 'mode.switch',

  // Node-level
  NODE_WAIT = 'node.wait',
  NODE_SPAWN = 'node.spawn',

  // System operations
  SYSTEM_ERROR = 'system.error',
  SYSTEM_LIFECYCLE = 'system.lifecycle'
}

export interface TraceSpan {
  id: string;
  startTime: number;
  endTime?: number;
  operation: string;
  component: string;
  events: TraceEvent[];
  metadata?: Record<string, unknown>;
}

export interface TraceQuery {
  categories?: TraceCategory[];
  components?: string[];
  operations?: string[];
  timeRange?: {
    start: number;
    end: number;
  };
  parentId?: string;
  level?: TraceLevel;
}

export type TraceExportFormat = 'json' | 'csv' | 'markdown';

export interface TraceStorage {
  record(event: TraceEvent): void;
  query(query: TraceQuery): TraceEvent[];
  startSpan(operation: string, component: string): TraceSpan;
  endSpan(spanId: string): void;
  getSpan(spanId: string): TraceSpan | undefined;
  export(format: TraceExportFormat): string;
  clear(): void;
}

/**
 * Input accepted by `Tracer.record`; id and timestamp are filled in
 */
export type TraceInput = Omit<TraceEvent, 'id' | 'timestamp'> & Partial<Pick<TraceEvent, 'id' | 'timestamp'>>;
