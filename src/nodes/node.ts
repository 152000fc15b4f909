/**
 * NodeInstance - a live node created from a NodeClass
 */

import { v4 as uuidv4 } from 'uuid';
import { Errors } from '../errors';
import type { SendOptions, QueuedMessage } from '../router/types';
import type { NodeClass } from './node-class';
import {
  ACK_SIGNAL,
  DispatchContext,
  Domain,
  NO_REPLY,
  NodeState,
  Payload,
  WaitResult
} from './types';

export interface SpawnRequest {
  id?: string;
  attributes?: Record<string, unknown>;
  deferStart?: boolean;
}

/**
 * Run-time instance management available to nodes
 */
export interface Spawner {
  spawn(className: string, options?: SpawnRequest): NodeInstance | undefined;
  despawn(id: string): boolean;
  startInstance(id: string): boolean;
  getInstance(id: string): NodeInstance | undefined;
}

/**
 * What an instance needs from the bus that owns it
 */
export interface NodePort extends Spawner {
  /** Returns the message id used, or undefined when the send was dropped */
  send(sourceId: string, signal: string, payload: Payload, options?: SendOptions): number | undefined;
  replay(target: NodeInstance, message: QueuedMessage): void;
  reportNodeError(node: NodeInstance, error: unknown, details?: NodeErrorDetails): void;
  getReference(id: string): unknown;
  trace(node: NodeInstance, message: string, data?: Record<string, unknown>): void;
}

export interface NodeErrorDetails {
  handler?: string;
  payload?: Payload;
}

/**
 * Observer called after every fire() of an instance; used by composite nodes
 */
export type OutputTap = (signal: string, payload: Payload, messageId: number) => void;

export interface NodeInstanceOptions {
  id: string;
  attributes?: Record<string, unknown>;
}

interface PendingWait {
  signal: string;
  match?: (payload: Payload) => boolean;
  resolve: (result: WaitResult) => void;
  timer: NodeJS.Timeout;
}

const DEFAULT_WAIT_MS = 5000;

/**
 * Output channel bound to one instance
 */
export class OutputChannel {
  constructor(private readonly node: NodeInstance, private readonly port: NodePort) {}

  /**
   * Send a new message through the active wiring
   */
  fire(signal: string, payload: Payload = {}): number | undefined {
    const messageId = this.port.send(this.node.id, signal, payload);
    if (messageId !== undefined) {
      this.node.notifyTaps(signal, payload, messageId);
    }
    return messageId;
  }

  /**
   * Continue the message being handled. Keeps its id so multi-hop
   * chains stay cycle-safe.
   */
  relay(context: DispatchContext, signal?: string, payload?: Payload): number | undefined {
    const nextSignal = signal ?? context.signal;
    const nextPayload = payload ?? {};
    const messageId = this.port.send(this.node.id, nextSignal, nextPayload, {
      messageId: context.messageId
    });
    if (messageId !== undefined) {
      this.node.notifyTaps(nextSignal, nextPayload, messageId);
    }
    return messageId;
  }

  /**
   * Send to one instance, bypassing wiring
   */
  fireTo(targetId: string, signal: string, payload: Payload = {}, options: SendOptions = {}): number | undefined {
    return this.port.send(this.node.id, signal, payload, { ...options, targetId });
  }
}

/**
 * Error channel bound to one instance
 */
export class ErrorChannel {
  constructor(private readonly node: NodeInstance, private readonly port: NodePort) {}

  fire(error: unknown, details: NodeErrorDetails = {}): void {
    this.port.reportNodeError(this.node, error, details);
  }
}

export class NodeInstance {
  readonly id: string;
  readonly nodeClass: NodeClass;
  readonly out: OutputChannel;
  readonly err: ErrorChannel;

  private readonly port: NodePort;
  private readonly attributes = new Map<string, unknown>();
  private lifecycleState: NodeState = 'created';

  private wait: PendingWait | null = null;
  private queue: QueuedMessage[] = [];

  private readonly intervals = new Set<NodeJS.Timeout>();
  private readonly timeouts = new Set<NodeJS.Timeout>();
  private disposers: Array<() => void> = [];
  private readonly taps = new Set<OutputTap>();

  constructor(nodeClass: NodeClass, port: NodePort, options: NodeInstanceOptions) {
    this.id = options.id;
    this.nodeClass = nodeClass;
    this.port = port;
    this.out = new OutputChannel(this, port);
    this.err = new ErrorChannel(this, port);

    const initial = { ...nodeClass.attributeDefaults, ...(options.attributes ?? {}) };
    for (const [key, value] of Object.entries(initial)) {
      this.attributes.set(key, structuredClone(value));
    }
  }

  get className(): string {
    return this.nodeClass.name;
  }

  get domain(): Domain {
    return this.nodeClass.domain;
  }

  get state(): NodeState {
    return this.lifecycleState;
  }

  /**
   * Spawn and despawn other instances on the same bus
   */
  get spawner(): Spawner {
    return this.port;
  }

  /** @internal lifecycle transitions are driven by the bus */
  setState(state: NodeState): void {
    this.lifecycleState = state;
  }

  // Attributes

  getAttribute(name: string): unknown {
    return this.attributes.get(name);
  }

  setAttribute(name: string, value: unknown): void {
    this.attributes.set(name, value);
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name);
  }

  /**
   * Deep copy of every attribute
   */
  getAttributes(): Record<string, unknown> {
    return structuredClone(Object.fromEntries(this.attributes));
  }

  // References

  /**
   * Look up a collaborator registered with the host. A guard narrows the
   * result; values that fail it read as missing.
   */
  getReference(id: string): unknown;
  getReference<T>(id: string, guard: (value: unknown) => value is T): T | undefined;
  getReference<T>(id: string, guard?: (value: unknown) => value is T): unknown {
    const value = this.port.getReference(id);
    if (guard) return guard(value) ? value : undefined;
    return value;
  }

  requireReference(id: string): unknown;
  requireReference<T>(id: string, guard: (value: unknown) => value is T): T;
  requireReference<T>(id: string, guard?: (value: unknown) => value is T): unknown {
    const value = guard ? this.getReference(id, guard) : this.getReference(id);
    if (value === undefined) {
      throw Errors.lifecycle(`Required reference '${id}' is not available to ${this.id}`);
    }
    return value;
  }

  // Locking

  isLocked(): boolean {
    return this.wait !== null;
  }

  /**
   * Lock until `signal` arrives or the timeout passes. Other inbound
   * messages are queued and replayed in order after unlock.
   */
  waitForSignal(
    signal: string,
    timeoutMs: number = DEFAULT_WAIT_MS,
    match?: (payload: Payload) => boolean
  ): Promise<WaitResult> {
    if (this.wait) {
      return Promise.reject(
        Errors.lifecycle(`${this.id} is already waiting for '${this.wait.signal}'`)
      );
    }

    return new Promise<WaitResult>(resolve => {
      const timer = setTimeout(() => {
        this.port.trace(this, `Wait for '${signal}' timed out`, { timeoutMs });
        this.finishWait(NO_REPLY);
      }, timeoutMs);
      this.wait = { signal, match, resolve, timer };
    });
  }

  /**
   * Send to a target with an ack requested, then wait for the ack
   */
  async request(
    targetId: string,
    signal: string,
    payload: Payload = {},
    timeoutMs: number = DEFAULT_WAIT_MS
  ): Promise<WaitResult> {
    const correlationId = uuidv4();
    const reply = this.waitForSignal(
      ACK_SIGNAL,
      timeoutMs,
      ack => ack.correlationId === correlationId
    );
    const sent = this.out.fireTo(targetId, signal, payload, {
      replyTo: { instanceId: this.id, correlationId }
    });
    if (sent === undefined) {
      this.finishWait(NO_REPLY);
    }
    return reply;
  }

  /** @internal true when this message is the one being waited for */
  awaits(signal: string, payload: Payload): boolean {
    if (!this.wait || this.wait.signal !== signal) return false;
    return this.wait.match ? this.wait.match(payload) : true;
  }

  /** @internal deliver the awaited payload and unlock */
  resolveWait(payload: Payload): void {
    this.finishWait(payload);
  }

  /** @internal park a message until unlock */
  enqueue(message: QueuedMessage): void {
    this.queue.push(message);
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  private finishWait(result: WaitResult): void {
    const wait = this.wait;
    if (!wait) return;
    clearTimeout(wait.timer);
    this.wait = null;
    wait.resolve(result);
    this.flushQueue();
  }

  /**
   * Replay queued messages. Messages arriving during the replay join the
   * back of the queue. If a replayed handler locks again, the rest stays
   * queued in order.
   */
  private flushQueue(): void {
    while (this.queue.length > 0 && !this.isLocked()) {
      const next = this.queue.shift();
      if (next) this.port.replay(this, next);
    }
  }

  // Owned resources

  every(intervalMs: number, fn: (node: NodeInstance) => void): () => void {
    const handle = setInterval(() => this.runOwned('every', fn), intervalMs);
    this.intervals.add(handle);
    return () => {
      clearInterval(handle);
      this.intervals.delete(handle);
    };
  }

  after(delayMs: number, fn: (node: NodeInstance) => void): () => void {
    const handle = setTimeout(() => {
      this.timeouts.delete(handle);
      this.runOwned('after', fn);
    }, delayMs);
    this.timeouts.add(handle);
    return () => {
      clearTimeout(handle);
      this.timeouts.delete(handle);
    };
  }

  onDispose(fn: () => void): void {
    this.disposers.push(fn);
  }

  get ownedTimerCount(): number {
    return this.intervals.size + this.timeouts.size;
  }

  private runOwned(kind: string, fn: (node: NodeInstance) => void): void {
    try {
      fn(this);
    } catch (error) {
      this.port.reportNodeError(this, error, { handler: kind });
    }
  }

  // Output taps

  addOutputTap(tap: OutputTap): () => void {
    this.taps.add(tap);
    return () => {
      this.taps.delete(tap);
    };
  }

  /** @internal */
  notifyTaps(signal: string, payload: Payload, messageId: number): void {
    for (const tap of [...this.taps]) {
      tap(signal, payload, messageId);
    }
  }

  /**
   * Release timers, disposers and any pending wait. Queued inbound
   * messages are discarded and handed back to the caller.
   */
  release(): QueuedMessage[] {
    for (const handle of this.intervals) clearInterval(handle);
    this.intervals.clear();
    for (const handle of this.timeouts) clearTimeout(handle);
    this.timeouts.clear();

    const discarded = this.queue;
    this.queue = [];
    if (this.wait) {
      const wait = this.wait;
      clearTimeout(wait.timer);
      this.wait = null;
      wait.resolve(NO_REPLY);
    }

    const disposers = this.disposers;
    this.disposers = [];
    for (const dispose of disposers) {
      try {
        dispose();
      } catch (error) {
        this.port.reportNodeError(this, error, { handler: 'dispose' });
      }
    }

    this.taps.clear();
    return discarded;
  }
}
