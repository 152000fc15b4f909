/**
 * Bus - one registry, one mode manager, one router, one lifecycle and one
 * error collector. Nothing is module-global; build as many as needed.
 */

import { ErrorCollector, ErrorListener, ErrorRecord, TelemetrySink } from './collector/error-collector';
import { Errors } from './errors';
import { Lifecycle, InstantiateOptions, SpawnOptions } from './lifecycle/lifecycle';
import { Logger } from './logging/logger';
import { ModeManager } from './modes/mode-manager';
import type { WiringConfig } from './modes/types';
import { loadModesFromFile, loadModesFromYaml } from './modes/yaml-loader';
import { InstanceTable } from './nodes/instance-table';
import type { NodeErrorDetails, NodeInstance, NodePort } from './nodes/node';
import type { NodeClass } from './nodes/node-class';
import type { Domain, Handler, HandlerChannel, Payload } from './nodes/types';
import { ClassRegistry } from './registry/class-registry';
import { DirectSendOptions, Router } from './router/router';
import type { QueuedMessage, SendOptions } from './router/types';
import { toTraceEvent } from './tracing';
import { TraceCategory, TraceStorage } from './tracing/types';
import type { BoundaryTransport } from './transport/types';

export interface BusOptions {
  /** Execution domain of this bus (default `shared`) */
  domain?: Domain;
  logger?: Logger;
  tracer?: TraceStorage;
  telemetry?: TelemetrySink[];
  transport?: BoundaryTransport;
  /** Error records kept for recentErrors() */
  errorCapacity?: number;
}

export class Bus implements NodePort {
  readonly domain: Domain;
  readonly logger: Logger;
  readonly tracer?: TraceStorage;
  readonly registry: ClassRegistry;
  readonly modes: ModeManager;
  readonly router: Router;
  readonly lifecycle: Lifecycle;
  readonly collector: ErrorCollector;

  private readonly instances = new InstanceTable();
  private readonly references = new Map<string, unknown>();

  constructor(options: BusOptions = {}) {
    this.domain = options.domain ?? 'shared';
    this.logger = options.logger ?? new Logger();
    this.tracer = options.tracer;

    this.registry = new ClassRegistry(this.logger);
    this.collector = new ErrorCollector({
      logger: this.logger,
      sinks: options.telemetry,
      capacity: options.errorCapacity
    });
    this.modes = new ModeManager({
      logger: this.logger,
      tracer: this.tracer,
      host: {
        broadcast: (signal, payload) => {
          this.router.broadcast(signal, payload);
        },
        instancesOf: className => this.instances.byClass(className),
        hasClass: className => this.registry.has(className)
      }
    });
    this.router = new Router({
      domain: this.domain,
      registry: this.registry,
      instances: this.instances,
      modes: this.modes,
      collector: this.collector,
      logger: this.logger,
      tracer: this.tracer
    });
    this.lifecycle = new Lifecycle({
      domain: this.domain,
      registry: this.registry,
      instances: this.instances,
      router: this.router,
      port: this,
      logger: this.logger,
      tracer: this.tracer
    });

    if (options.transport) {
      this.router.setTransport(options.transport);
    }
  }

  // Classes

  register(nodeClass: NodeClass): this {
    this.registry.register(nodeClass);
    return this;
  }

  registerAll(classes: ReadonlyArray<NodeClass>): this {
    for (const nodeClass of classes) {
      this.registry.register(nodeClass);
    }
    return this;
  }

  // Instances

  instantiate(className: string, options?: InstantiateOptions): NodeInstance | undefined {
    return this.lifecycle.instantiate(className, options);
  }

  spawn(className: string, options?: SpawnOptions): NodeInstance | undefined {
    return this.lifecycle.spawn(className, options);
  }

  despawn(id: string): boolean {
    return this.lifecycle.despawn(id);
  }

  startInstance(id: string): boolean {
    return this.lifecycle.startInstance(id);
  }

  getInstance(id: string): NodeInstance | undefined {
    return this.instances.get(id);
  }

  getInstances(): NodeInstance[] {
    return this.instances.all();
  }

  getInstancesByClass(className: string): NodeInstance[] {
    return this.instances.byClass(className);
  }

  /**
   * Handler an instance would run right now on a channel
   */
  resolveHandler(instanceId: string, channel: HandlerChannel, handlerName: string): Handler {
    const instance = this.instances.get(instanceId);
    if (!instance) {
      throw Errors.instanceNotFound(instanceId);
    }
    return this.router.resolveHandler(instance, channel, handlerName);
  }

  // Modes

  defineMode(name: string, config: WiringConfig): this {
    this.modes.defineMode(name, config);
    return this;
  }

  /**
   * Define every mode in a YAML document; returns their names
   */
  loadModes(yamlText: string): string[] {
    return loadModesFromYaml(this.modes, yamlText);
  }

  loadModesFromFile(filePath: string): string[] {
    return loadModesFromFile(this.modes, filePath);
  }

  switchMode(name: string): void {
    this.modes.switchMode(name);
  }

  getMode(): string | null {
    return this.modes.getMode();
  }

  // Lifecycle

  init(): void {
    this.lifecycle.init();
  }

  start(): void {
    this.lifecycle.start();
  }

  stop(): void {
    this.lifecycle.stop();
  }

  /**
   * Drop every instance and the active mode. Classes and mode
   * definitions stay.
   */
  reset(): void {
    this.lifecycle.reset();
    this.modes.reset();
    this.collector.clear();
  }

  isInitialized(): boolean {
    return this.lifecycle.isInitialized();
  }

  isStarted(): boolean {
    return this.lifecycle.isStarted();
  }

  // Messaging

  nextMessageId(): number {
    return this.router.nextMessageId();
  }

  send(sourceId: string, signal: string, payload: Payload = {}, options?: SendOptions): number | undefined {
    return this.router.send(sourceId, signal, payload, options);
  }

  sendTo(targetId: string, signal: string, payload: Payload = {}, options?: DirectSendOptions): number | undefined {
    return this.router.sendTo(targetId, signal, payload, options);
  }

  broadcast(signal: string, payload: Payload = {}): number {
    return this.router.broadcast(signal, payload);
  }

  receiveFromBoundary(sourceClass: string, signal: string, payload: Payload = {}, messageId?: number): void {
    this.router.receiveFromBoundary(sourceClass, signal, payload, messageId);
  }

  setTransport(transport: BoundaryTransport | undefined): void {
    this.router.setTransport(transport);
  }

  replay(target: NodeInstance, message: QueuedMessage): void {
    this.router.replay(target, message);
  }

  // Errors

  onError(listener: ErrorListener): () => void {
    return this.collector.onError(listener);
  }

  recentErrors(limit?: number): ErrorRecord[] {
    return this.collector.recent(limit);
  }

  reportNodeError(node: NodeInstance, error: unknown, details: NodeErrorDetails = {}): void {
    this.router.reportFailure(node, details.handler ?? 'Error.fire', error, details.payload, 'node');
  }

  // References

  setReference(id: string, value: unknown): void {
    this.references.set(id, value);
  }

  getReference(id: string): unknown {
    return this.references.get(id);
  }

  removeReference(id: string): boolean {
    return this.references.delete(id);
  }

  trace(node: NodeInstance, message: string, data: Record<string, unknown> = {}): void {
    this.logger.trace(node.id, message);
    this.tracer?.record(toTraceEvent({
      level: 'trace',
      category: TraceCategory.NODE_WAIT,
      component: node.id,
      operation: 'wait',
      data: { ...data, message }
    }));
  }
}
