/**
 * Router - delivers signals between node instances
 *
 * Dispatch is synchronous and reentrant: a handler that sends from inside
 * its body has that send fully routed before it returns. Every message id
 * carries the set of instances it has reached, so a multi-hop chain that
 * loops back is dropped at the first repeat.
 */

import type { ErrorCollector, ErrorKind } from '../collector/error-collector';
import { HandlerNotFoundError } from '../errors';
import type { Logger } from '../logging/logger';
import type { ModeManager } from '../modes/mode-manager';
import type { InstanceTable } from '../nodes/instance-table';
import type { NodeInstance } from '../nodes/node';
import {
  ACK_SIGNAL,
  DispatchContext,
  Domain,
  Handler,
  HandlerChannel,
  Payload
} from '../nodes/types';
import type { ClassRegistry } from '../registry/class-registry';
import { toTraceEvent } from '../tracing';
import { TraceCategory, TraceLevel, TraceStorage } from '../tracing/types';
import type { BoundaryTransport } from '../transport/types';
import { MessageIdSource } from './message-ids';
import type { DeliveryOutcome, QueuedMessage, SendOptions } from './types';
import { VisitTracker } from './visit-tracker';

export interface RouterOptions {
  domain: Domain;
  registry: ClassRegistry;
  instances: InstanceTable;
  modes: ModeManager;
  collector: ErrorCollector;
  logger: Logger;
  tracer?: TraceStorage;
}

export interface DirectSendOptions extends Omit<SendOptions, 'targetId'> {
  /** Recorded as the sender in the dispatch context */
  sourceId?: string;
}

const SOURCE = 'Router';

export class Router {
  readonly domain: Domain;
  private readonly registry: ClassRegistry;
  private readonly instances: InstanceTable;
  private readonly modes: ModeManager;
  private readonly collector: ErrorCollector;
  private readonly logger: Logger;
  private readonly tracer?: TraceStorage;

  private readonly ids = new MessageIdSource();
  private readonly visits = new VisitTracker();
  private enabled = false;
  private transport?: BoundaryTransport;
  private unsubscribeTransport?: () => void;
  private activeSpan?: string;

  constructor(options: RouterOptions) {
    this.domain = options.domain;
    this.registry = options.registry;
    this.instances = options.instances;
    this.modes = options.modes;
    this.collector = options.collector;
    this.logger = options.logger;
    this.tracer = options.tracer;
  }

  nextMessageId(): number {
    return this.ids.next();
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Message ids still tracked for cycle detection
   */
  get inFlight(): number {
    return this.visits.size;
  }

  /**
   * Attach a transport for cross-domain targets. Replaces any previous one.
   */
  setTransport(transport: BoundaryTransport | undefined): void {
    this.unsubscribeTransport?.();
    this.unsubscribeTransport = undefined;
    this.transport = transport;
    if (transport) {
      this.unsubscribeTransport = transport.onReceiveFromBoundary(
        (sourceClass, signal, payload, messageId) =>
          this.receiveFromBoundary(sourceClass, signal, payload, messageId)
      );
    }
  }

  /**
   * Send from an instance through the active wiring, or to one target
   * @returns the message id, or undefined when the send was dropped
   */
  send(sourceId: string, signal: string, payload: Payload = {}, options: SendOptions = {}): number | undefined {
    if (!this.enabled) {
      this.drop(`Send '${signal}' from ${sourceId} dropped: bus not started`, { sourceId, signal });
      return undefined;
    }
    const source = this.instances.get(sourceId);
    if (!source) {
      this.drop(`Send '${signal}' dropped: unknown source ${sourceId}`, { sourceId, signal });
      return undefined;
    }
    if (source.state !== 'started') {
      this.drop(`Send '${signal}' from ${sourceId} dropped: instance is ${source.state}`, { sourceId, signal });
      return undefined;
    }

    const fresh = options.messageId === undefined;
    const messageId = options.messageId ?? this.nextMessageId();
    const message: QueuedMessage = {
      messageId,
      signal,
      payload,
      sourceId,
      handler: options.handler,
      replyTo: options.replyTo
    };

    this.visits.hold(messageId);
    try {
      // The originator of a new message counts as reached
      if (fresh && options.targetId !== sourceId) {
        this.visits.markVisited(messageId, sourceId);
      }
      this.withinSpan('send', () => {
        this.record('trace', TraceCategory.MESSAGE_SEND, 'send', {
          messageId, signal, sourceId, targetId: options.targetId
        });
        if (options.targetId !== undefined) {
          this.deliverTo(options.targetId, message);
        } else {
          this.fanOut(source.className, message);
        }
      });
    } finally {
      this.visits.release(messageId);
    }
    return messageId;
  }

  /**
   * Deliver to one instance without a sending instance
   */
  sendTo(targetId: string, signal: string, payload: Payload = {}, options: DirectSendOptions = {}): number | undefined {
    if (!this.enabled) {
      this.drop(`Send '${signal}' to ${targetId} dropped: bus not started`, { targetId, signal });
      return undefined;
    }

    const messageId = options.messageId ?? this.nextMessageId();
    this.visits.hold(messageId);
    try {
      this.withinSpan('sendTo', () => this.deliverTo(targetId, {
        messageId,
        signal,
        payload,
        sourceId: options.sourceId,
        handler: options.handler,
        replyTo: options.replyTo
      }));
    } finally {
      this.visits.release(messageId);
    }
    return messageId;
  }

  /**
   * System-channel delivery to every live instance. Missing hooks are skipped.
   */
  broadcast(signal: string, payload: Payload = {}): number {
    const messageId = this.nextMessageId();
    const instances = this.instances.all();
    this.withinSpan('broadcast', () => {
      this.record('trace', TraceCategory.MESSAGE_BROADCAST, 'broadcast', {
        messageId, signal, count: instances.length
      });
      for (const instance of instances) {
        this.invokeSystem(instance, signal, payload, messageId);
      }
    });
    return messageId;
  }

  /**
   * Run one System hook on one instance
   * @returns false when the hook is missing or failed
   */
  invokeSystem(instance: NodeInstance, signal: string, payload: Payload = {}, messageId?: number): boolean {
    const handlerName = instance.nodeClass.handlerFor(signal);
    const handler = this.findHandler(instance, 'System', handlerName);
    if (!handler) return false;
    const outcome = this.invoke(instance, 'System', handlerName, handler, {
      messageId: messageId ?? this.nextMessageId(),
      signal,
      payload
    });
    return outcome === 'delivered';
  }

  /**
   * Re-run a message that was queued on a locked instance
   */
  replay(target: NodeInstance, message: QueuedMessage): void {
    try {
      if (this.instances.get(target.id) === target) {
        this.deliver(target, message, true);
      }
    } finally {
      this.visits.release(message.messageId);
    }
  }

  /**
   * Forget messages that were queued on an instance being released
   */
  discard(target: NodeInstance, messages: QueuedMessage[]): void {
    if (messages.length === 0) return;
    this.logger.trace(SOURCE, `Discarded ${messages.length} queued message(s) for ${target.id}`);
    for (const message of messages) {
      this.visits.release(message.messageId);
    }
  }

  /**
   * Inbound traffic from a transport. Delivered to local targets of the
   * source class's wiring under a fresh local id.
   */
  receiveFromBoundary(sourceClass: string, signal: string, payload: Payload = {}, remoteMessageId?: number): void {
    if (!this.enabled) {
      this.drop(`Boundary signal '${signal}' from ${sourceClass} dropped: bus not started`, {
        sourceClass, signal
      });
      return;
    }

    const messageId = this.nextMessageId();
    this.visits.hold(messageId);
    try {
      this.withinSpan('receive', () => {
        this.record('trace', TraceCategory.BOUNDARY_IN, 'receive', {
          messageId, remoteMessageId, sourceClass, signal
        });
        const targets = this.modes.activeWiring()?.get(sourceClass) ?? [];
        for (const targetClass of targets) {
          if (this.isCrossDomain(this.registry.domainOf(targetClass) ?? 'shared')) continue;
          for (const target of this.instances.byClass(targetClass)) {
            this.deliver(target, { messageId, signal, payload });
          }
        }
      });
    } finally {
      this.visits.release(messageId);
    }
  }

  /**
   * Mode-aware handler lookup: active mode, then its bases, then the
   * class's unscoped table.
   */
  resolveHandler(instance: NodeInstance, channel: HandlerChannel, handlerName: string): Handler {
    const handler = this.findHandler(instance, channel, handlerName);
    if (!handler) {
      throw new HandlerNotFoundError(instance.className, channel, handlerName);
    }
    return handler;
  }

  /**
   * Report a failure on an instance and give its Error channel a chance to react
   */
  reportFailure(
    instance: NodeInstance,
    handler: string,
    error: unknown,
    payload?: Payload,
    kind: ErrorKind = 'handler'
  ): void {
    const record = this.collector.handleError(
      { instanceId: instance.id, class: instance.className, handler, error, payload },
      kind
    );

    if (handler === 'Error.onError') return;
    const onError = this.findHandler(instance, 'Error', 'onError');
    if (!onError) return;
    try {
      const result = onError(instance, { handler, message: record.message }, {
        messageId: this.nextMessageId(),
        signal: 'error',
        handler: 'onError'
      });
      if (result instanceof Promise) {
        result.catch((hookError: unknown) => this.reportFailure(instance, 'Error.onError', hookError));
      }
    } catch (hookError) {
      this.reportFailure(instance, 'Error.onError', hookError);
    }
  }

  private findHandler(instance: NodeInstance, channel: HandlerChannel, handlerName: string): Handler | undefined {
    for (const mode of this.modes.activeChain()) {
      const override = instance.nodeClass.getModeHandler(mode, channel, handlerName);
      if (override) return override;
    }
    return instance.nodeClass.getHandler(channel, handlerName);
  }

  private fanOut(sourceClass: string, message: QueuedMessage): void {
    const wiring = this.modes.activeWiring();
    if (!wiring) {
      this.logger.trace(SOURCE, `No active mode; '${message.signal}' from ${sourceClass} not routed`);
      return;
    }
    const targets = wiring.get(sourceClass);
    if (!targets || targets.length === 0) {
      this.logger.trace(SOURCE, `No wiring for ${sourceClass}`);
      return;
    }

    const handedOff = new Set<Domain>();
    for (const targetClass of targets) {
      const targetDomain = this.registry.domainOf(targetClass) ?? 'shared';
      if (this.isCrossDomain(targetDomain)) {
        if (!handedOff.has(targetDomain)) {
          handedOff.add(targetDomain);
          this.handOff(sourceClass, message, targetDomain);
        }
        continue;
      }
      for (const target of this.instances.byClass(targetClass)) {
        this.deliver(target, message);
      }
    }
  }

  private isCrossDomain(targetDomain: Domain): boolean {
    return this.domain !== 'shared' && targetDomain !== 'shared' && targetDomain !== this.domain;
  }

  private handOff(sourceClass: string, message: QueuedMessage, targetDomain: Domain): void {
    if (!this.transport) {
      this.logger.warn(SOURCE, `No transport for ${targetDomain}; '${message.signal}' from ${sourceClass} not sent`);
      return;
    }
    this.record('trace', TraceCategory.BOUNDARY_OUT, 'handOff', {
      messageId: message.messageId, sourceClass, signal: message.signal, targetDomain
    });
    try {
      this.transport.sendAcrossBoundary(
        sourceClass,
        message.signal,
        message.payload,
        targetDomain,
        message.messageId
      );
    } catch (error) {
      this.collector.reportRouting({
        signal: message.signal,
        reason: `transport to ${targetDomain} failed`,
        class: sourceClass,
        instanceId: message.sourceId,
        error,
        payload: message.payload
      });
    }
  }

  private deliverTo(targetId: string, message: QueuedMessage): DeliveryOutcome | undefined {
    const target = this.instances.get(targetId);
    if (!target) {
      this.logger.warn(SOURCE, `Target not found: ${targetId}`);
      return undefined;
    }
    return this.deliver(target, message);
  }

  /**
   * One delivery: cycle check, lock check, then the Input handler
   */
  private deliver(target: NodeInstance, message: QueuedMessage, replaying = false): DeliveryOutcome {
    const { messageId, signal, payload } = message;

    if (this.visits.hasVisited(messageId, target.id)) {
      this.logger.warn(SOURCE, `Cycle detected: message ${messageId} '${signal}' already reached ${target.id}`);
      this.record('warn', TraceCategory.MESSAGE_CYCLE, 'deliver', { messageId, signal, targetId: target.id });
      return 'cycle';
    }

    // Nothing overtakes messages still waiting in the queue
    const awaited = target.awaits(signal, payload);
    const mustQueue = target.isLocked() || (!replaying && target.queuedCount > 0);
    if (mustQueue && !awaited) {
      target.enqueue(message);
      this.visits.hold(messageId);
      this.record('trace', TraceCategory.MESSAGE_QUEUE, 'deliver', {
        messageId, signal, targetId: target.id, queued: target.queuedCount
      });
      return 'queued';
    }

    this.visits.markVisited(messageId, target.id);

    if (awaited) {
      target.resolveWait(payload);
      this.record('trace', TraceCategory.NODE_WAIT, 'deliver', { messageId, signal, targetId: target.id });
      return 'consumed';
    }

    const handlerName = message.handler ?? target.nodeClass.handlerFor(signal);
    const handler = this.findHandler(target, 'Input', handlerName);
    if (!handler) {
      this.logger.trace(SOURCE, `${target.id} has no Input.${handlerName}`);
      this.record('trace', TraceCategory.MESSAGE_DROP, 'deliver', {
        messageId, signal, targetId: target.id, reason: 'no handler'
      });
      return 'unhandled';
    }

    this.record('trace', TraceCategory.MESSAGE_DELIVER, 'deliver', {
      messageId, signal, targetId: target.id, handler: handlerName
    });
    return this.invoke(target, 'Input', handlerName, handler, message);
  }

  private invoke(
    target: NodeInstance,
    channel: HandlerChannel,
    handlerName: string,
    handler: Handler,
    message: QueuedMessage
  ): DeliveryOutcome {
    const context: DispatchContext = {
      messageId: message.messageId,
      signal: message.signal,
      handler: handlerName,
      sourceId: message.sourceId
    };
    const label = `${channel}.${handlerName}`;

    let result: void | Promise<void>;
    try {
      result = handler(target, message.payload, context);
    } catch (error) {
      this.reportFailure(target, label, error, message.payload);
      return 'failed';
    }

    if (result instanceof Promise) {
      // Keep the visit set alive until the async body settles
      this.visits.hold(message.messageId);
      result
        .then(
          () => this.acknowledge(target, message),
          (error: unknown) => this.reportFailure(target, label, error, message.payload)
        )
        .finally(() => this.visits.release(message.messageId))
        .catch((error: unknown) => this.reportFailure(target, label, error, message.payload));
    } else {
      this.acknowledge(target, message);
    }
    return 'delivered';
  }

  private acknowledge(target: NodeInstance, message: QueuedMessage): void {
    const replyTo = message.replyTo;
    if (!replyTo) return;
    setImmediate(() => {
      this.record('trace', TraceCategory.MESSAGE_ACK, 'ack', {
        messageId: message.messageId, targetId: replyTo.instanceId
      });
      this.sendTo(replyTo.instanceId, ACK_SIGNAL, {
        correlationId: replyTo.correlationId,
        ackFor: message.signal,
        targetId: target.id
      }, { sourceId: target.id });
    });
  }

  private drop(message: string, data: Record<string, unknown>): void {
    this.logger.warn(SOURCE, message);
    this.record('warn', TraceCategory.MESSAGE_DROP, 'send', { ...data, message });
  }

  /**
   * Group everything a top-level dispatch causes under one span.
   * Nested dispatches join the span already open.
   */
  private withinSpan(operation: string, run: () => void): void {
    const tracer = this.tracer;
    if (!tracer || this.activeSpan !== undefined) {
      run();
      return;
    }
    const span = tracer.startSpan(operation, SOURCE);
    this.activeSpan = span.id;
    try {
      run();
    } finally {
      this.activeSpan = undefined;
      tracer.endSpan(span.id);
    }
  }

  private record(level: TraceLevel, category: TraceCategory, operation: string, data: Record<string, unknown>): void {
    this.tracer?.record(toTraceEvent({ level, category, component: SOURCE, operation, data, parentId: this.activeSpan }));
  }
}
