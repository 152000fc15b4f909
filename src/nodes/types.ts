/**
 * Core types for the Node/Channel system
 */

import type { NodeInstance } from './node';

/**
 * Execution-context tag. `shared` classes live on both sides of a split.
 */
export type Domain = 'server' | 'client' | 'shared';

/**
 * Channels that carry handlers. Output is a declaration only.
 */
export type HandlerChannel = 'System' | 'Input' | 'Error';

export type Channel = HandlerChannel | 'Output';

export const HANDLER_CHANNELS: ReadonlyArray<HandlerChannel> = ['System', 'Input', 'Error'];

/**
 * Signal payloads are plain structured objects
 */
export type Payload = Record<string, unknown>;

/**
 * Information about the message being handled
 */
export interface DispatchContext {
  messageId: number;
  signal: string;
  handler: string;
  sourceId?: string;
}

export type Handler = (
  node: NodeInstance,
  payload: Payload,
  context: DispatchContext
) => void | Promise<void>;

export type HandlerTable = Record<string, Handler>;

export type HandlerSet = Partial<Record<HandlerChannel, HandlerTable>>;

export type RequiredHandlers = Partial<Record<HandlerChannel, string[]>>;

/**
 * Lifecycle state of a node instance
 * created → initialized → started → stopped
 */
export type NodeState = 'created' | 'initialized' | 'started' | 'stopped';

/**
 * System signals broadcast by the bus
 */
export const SystemSignals = {
  INIT: 'init',
  START: 'start',
  STOP: 'stop',
  MODE_CHANGE: 'modeChange',
  SPAWNED: 'spawned',
  DESPAWNING: 'despawning'
} as const;

export type SystemSignal = typeof SystemSignals[keyof typeof SystemSignals];

/**
 * Payload of the modeChange system signal
 */
export interface ModeChangePayload extends Payload {
  oldMode: string | null;
  newMode: string;
}

/**
 * Signal name used for automatic acknowledgements
 */
export const ACK_SIGNAL = 'ack';

/**
 * Returned by waitForSignal when no reply arrived before the timeout
 */
export const NO_REPLY: unique symbol = Symbol('no-reply');

export type WaitResult = Payload | typeof NO_REPLY;
