/**
 * Router-facing message types
 */

import type { Payload } from '../nodes/types';

/**
 * Where an automatic acknowledgement goes
 */
export interface ReplyTarget {
  instanceId: string;
  correlationId: string;
}

export interface SendOptions {
  /** Deliver to this instance only, bypassing wiring */
  targetId?: string;
  /** Continue an existing message instead of minting a new id */
  messageId?: number;
  /** Explicit Input handler name instead of the class's signal map */
  handler?: string;
  /** Request an `ack` once the handler succeeds */
  replyTo?: ReplyTarget;
}

/**
 * A message parked on a locked instance
 */
export interface QueuedMessage {
  messageId: number;
  signal: string;
  payload: Payload;
  sourceId?: string;
  handler?: string;
  replyTo?: ReplyTarget;
}

/**
 * What happened to one delivery attempt
 */
export type DeliveryOutcome =
  | 'delivered'
  | 'consumed'
  | 'queued'
  | 'cycle'
  | 'unhandled'
  | 'failed';
