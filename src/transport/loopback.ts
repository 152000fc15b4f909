import type { Domain, Payload } from '../nodes/types';
import type { BoundaryReceiver, BoundaryTransport } from './types';

export interface BoundaryEnvelope {
  sourceClass: string;
  signal: string;
  payload: Payload;
  targetDomain: Domain;
  messageId: number;
}

/**
 * In-process transport. Two ends made by `pair()` deliver to each other
 * synchronously, or on a later tick with `{ async: true }`.
 */
export class LoopbackTransport implements BoundaryTransport {
  private peer?: LoopbackTransport;
  private receivers = new Set<BoundaryReceiver>();
  private closed = false;

  /** Everything this end has sent, in order */
  readonly sent: BoundaryEnvelope[] = [];

  constructor(private readonly options: { async?: boolean } = {}) {}

  static pair(options: { async?: boolean } = {}): [LoopbackTransport, LoopbackTransport] {
    const a = new LoopbackTransport(options);
    const b = new LoopbackTransport(options);
    a.peer = b;
    b.peer = a;
    return [a, b];
  }

  sendAcrossBoundary(
    sourceClass: string,
    signal: string,
    payload: Payload,
    targetDomain: Domain,
    messageId: number
  ): void {
    if (this.closed) {
      throw new Error('Loopback transport is closed');
    }
    // Copy so the far side never shares objects with the sender
    const envelope: BoundaryEnvelope = {
      sourceClass,
      signal,
      payload: structuredClone(payload),
      targetDomain,
      messageId
    };
    this.sent.push(envelope);

    const peer = this.peer;
    if (!peer) return;
    if (this.options.async) {
      setImmediate(() => peer.deliver(envelope));
    } else {
      peer.deliver(envelope);
    }
  }

  onReceiveFromBoundary(receiver: BoundaryReceiver): () => void {
    this.receivers.add(receiver);
    return () => {
      this.receivers.delete(receiver);
    };
  }

  close(): void {
    this.closed = true;
    this.receivers.clear();
  }

  private deliver(envelope: BoundaryEnvelope): void {
    if (this.closed) return;
    for (const receiver of [...this.receivers]) {
      receiver(envelope.sourceClass, envelope.signal, envelope.payload, envelope.messageId);
    }
  }
}
