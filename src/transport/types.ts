/**
 * Cross-boundary transport contract
 *
 * The bus hands a signal to the transport once per distinct remote domain;
 * the far side calls the receiver, which re-enters its own router.
 */

import type { Domain, Payload } from '../nodes/types';

export type BoundaryReceiver = (
  sourceClass: string,
  signal: string,
  payload: Payload,
  messageId?: number
) => void;

export interface BoundaryTransport {
  sendAcrossBoundary(
    sourceClass: string,
    signal: string,
    payload: Payload,
    targetDomain: Domain,
    messageId: number
  ): void;

  /**
   * Subscribe to inbound signals
   * @returns unsubscribe
   */
  onReceiveFromBoundary(receiver: BoundaryReceiver): () => void;

  close?(): void | Promise<void>;
}
