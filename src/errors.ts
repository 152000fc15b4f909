/**
 * Error types raised by the bus.
 *
 * Only configuration-time mistakes are thrown (bad contracts, unknown
 * classes or modes, duplicate ids). Failures during live message flow are
 * collected by the ErrorCollector instead.
 */

import type { HandlerChannel } from './nodes/types';

export type BusErrorCode =
  | 'CONTRACT_VIOLATION'
  | 'DUPLICATE_CLASS'
  | 'CLASS_NOT_FOUND'
  | 'MISSING_CLASSES'
  | 'DUPLICATE_INSTANCE'
  | 'INSTANCE_NOT_FOUND'
  | 'HANDLER_NOT_FOUND'
  | 'MODE_NOT_FOUND'
  | 'MODE_CYCLE'
  | 'INVALID_DEFINITION'
  | 'LIFECYCLE';

export class BusError extends Error {
  readonly code: BusErrorCode;

  constructor(code: BusErrorCode, message: string) {
    super(message);
    this.name = 'BusError';
    this.code = code;
  }
}

export interface ContractViolation {
  channel: HandlerChannel;
  handler: string;
  requiredBy: string;
}

export class ContractViolationError extends BusError {
  readonly className: string;
  readonly violations: ReadonlyArray<ContractViolation>;

  constructor(className: string, violations: ContractViolation[]) {
    const lines = violations.map(
      v => `  - ${v.channel}.${v.handler} (required by: ${v.requiredBy}, no default provided)`
    );
    super(
      'CONTRACT_VIOLATION',
      `Node class '${className}' is missing required handlers:\n${lines.join('\n')}`
    );
    this.name = 'ContractViolationError';
    this.className = className;
    this.violations = violations;
  }
}

export class HandlerNotFoundError extends BusError {
  readonly channel: HandlerChannel;
  readonly handler: string;
  readonly className: string;

  constructor(className: string, channel: HandlerChannel, handler: string) {
    super('HANDLER_NOT_FOUND', `Handler not found: ${className} ${channel}.${handler}`);
    this.name = 'HandlerNotFoundError';
    this.className = className;
    this.channel = channel;
    this.handler = handler;
  }
}

// Helper constructors for consistent error creation
export const Errors = {
  duplicateClass: (name: string) =>
    new BusError('DUPLICATE_CLASS', `Node class '${name}' is already registered`),
  classNotFound: (name: string) =>
    new BusError('CLASS_NOT_FOUND', `Node class '${name}' is not registered`),
  missingClasses: (names: string[]) =>
    new BusError(
      'MISSING_CLASSES',
      `Missing required node classes:\n  - ${names.join('\n  - ')}`
    ),
  duplicateInstance: (id: string) =>
    new BusError('DUPLICATE_INSTANCE', `Instance '${id}' already exists`),
  instanceNotFound: (id: string) =>
    new BusError('INSTANCE_NOT_FOUND', `Instance '${id}' not found`),
  modeNotFound: (name: string) =>
    new BusError('MODE_NOT_FOUND', `Mode '${name}' is not defined`),
  modeCycle: (chain: string[]) =>
    new BusError('MODE_CYCLE', `Mode inheritance cycle: ${chain.join(' -> ')}`),
  invalidDefinition: (message: string) =>
    new BusError('INVALID_DEFINITION', message),
  lifecycle: (message: string) =>
    new BusError('LIFECYCLE', message),
};

/**
 * Normalize anything thrown into a message string
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
