import { Bus, BusOptions } from '../bus';
import { Logger, MemoryLogSink } from '../logging/logger';
import type { NodeInstance } from '../nodes/node';
import type { DispatchContext, Payload } from '../nodes/types';

export interface Delivery {
  id: string;
  payload: Payload;
  messageId: number;
  sourceId?: string;
}

/**
 * Bus that logs everything into memory
 */
export function createTestBus(options: Omit<BusOptions, 'logger'> = {}): { bus: Bus; logs: MemoryLogSink } {
  const logs = new MemoryLogSink();
  const logger = new Logger({ level: 'trace' }, logs);
  return { bus: new Bus({ ...options, logger }), logs };
}

/**
 * Handler that records every call into `into`
 */
export function recordInto(into: Delivery[]) {
  return (node: NodeInstance, payload: Payload, context: DispatchContext): void => {
    into.push({ id: node.id, payload, messageId: context.messageId, sourceId: context.sourceId });
  };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}
