/**
 * WebSocket boundary transport
 *
 * Frames go out as JSON envelopes. Sends issued while the socket is still
 * connecting are held and flushed, in order, once it opens.
 */

import WebSocket from 'ws';
import type { Logger } from '../logging/logger';
import type { Domain, Payload } from '../nodes/types';
import { decodeEnvelope, encodeEnvelope, frameText } from './envelope';
import type { BoundaryReceiver, BoundaryTransport } from './types';

/**
 * The part of a ws socket the transport uses
 */
export interface BoundarySocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  on(event: 'open' | 'message' | 'close' | 'error', listener: (...args: unknown[]) => void): unknown;
}

export interface WebSocketTransportOptions {
  logger?: Logger;
}

const SOURCE = 'WebSocketTransport';

export class WebSocketTransport implements BoundaryTransport {
  private receivers = new Set<BoundaryReceiver>();
  private pending: string[] = [];
  private readonly logger?: Logger;

  constructor(private readonly socket: BoundarySocket, options: WebSocketTransportOptions = {}) {
    this.logger = options.logger;

    socket.on('open', () => this.flush());
    socket.on('message', (data: unknown) => this.handleFrame(data));
    socket.on('close', () => {
      if (this.pending.length > 0) {
        this.logger?.warn(SOURCE, `Socket closed with ${this.pending.length} unsent frame(s)`);
      }
      this.pending = [];
    });
    socket.on('error', (error: unknown) => {
      this.logger?.error(SOURCE, 'Socket error:', error);
    });
  }

  /**
   * Open a client connection to a boundary server
   */
  static connect(url: string, options: WebSocketTransportOptions = {}): WebSocketTransport {
    return new WebSocketTransport(new WebSocket(url), options);
  }

  get queued(): number {
    return this.pending.length;
  }

  sendAcrossBoundary(
    sourceClass: string,
    signal: string,
    payload: Payload,
    targetDomain: Domain,
    messageId: number
  ): void {
    const frame = encodeEnvelope({ sourceClass, signal, payload, targetDomain, messageId });

    switch (this.socket.readyState) {
      case WebSocket.OPEN:
        this.socket.send(frame);
        break;
      case WebSocket.CONNECTING:
        this.pending.push(frame);
        break;
      default:
        throw new Error(`Socket is not open (readyState ${this.socket.readyState})`);
    }
  }

  onReceiveFromBoundary(receiver: BoundaryReceiver): () => void {
    this.receivers.add(receiver);
    return () => {
      this.receivers.delete(receiver);
    };
  }

  close(): void {
    this.receivers.clear();
    this.pending = [];
    this.socket.close();
  }

  private flush(): void {
    const frames = this.pending;
    this.pending = [];
    for (const frame of frames) {
      this.socket.send(frame);
    }
  }

  private handleFrame(data: unknown): void {
    const text = frameText(data);
    const envelope = text === undefined ? undefined : decodeEnvelope(text);
    if (!envelope) {
      this.logger?.warn(SOURCE, 'Ignoring malformed frame');
      return;
    }
    for (const receiver of [...this.receivers]) {
      receiver(envelope.sourceClass, envelope.signal, envelope.payload, envelope.messageId);
    }
  }
}
