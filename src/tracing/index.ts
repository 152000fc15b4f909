/**
 * Tracing system exports
 */

import { v4 as uuidv4 } from 'uuid';
import type { TraceEvent, TraceInput } from './types';

export * from './types';
export { MemoryTraceStorage, matchesQuery } from './memory-trace-storage';
export type { MemoryTraceStorageConfig } from './memory-trace-storage';
export { FileTraceStorage, parseTraceLine } from './file-trace-storage';
export type { FileTraceStorageConfig } from './file-trace-storage';

/**
 * Fill in id and timestamp
 */
export function toTraceEvent(input: TraceInput): TraceEvent {
  return {
    ...input,
    id: input.id ?? uuidv4(),
    timestamp: input.timestamp ?? Date.now()
  };
}
