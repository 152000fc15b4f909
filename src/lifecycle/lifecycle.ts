/**
 * Lifecycle - drives instances through init → start → stop, plus
 * spawn and despawn of single instances at run time
 */

import { v4 as uuidv4 } from 'uuid';
import { Errors } from '../errors';
import type { Logger } from '../logging/logger';
import type { InstanceTable } from '../nodes/instance-table';
import { NodeInstance, NodePort, SpawnRequest } from '../nodes/node';
import { Domain, SystemSignals } from '../nodes/types';
import type { ClassRegistry } from '../registry/class-registry';
import type { Router } from '../router/router';
import { toTraceEvent } from '../tracing';
import { TraceCategory, TraceStorage } from '../tracing/types';

export type InstantiateOptions = Omit<SpawnRequest, 'deferStart'>;

/**
 * `deferStart` leaves a spawned instance initialized; call startInstance later
 */
export type SpawnOptions = SpawnRequest;

export interface LifecycleOptions {
  domain: Domain;
  registry: ClassRegistry;
  instances: InstanceTable;
  router: Router;
  port: NodePort;
  logger: Logger;
  tracer?: TraceStorage;
}

const SOURCE = 'Lifecycle';

export class Lifecycle {
  private initialized = false;
  private started = false;
  private readonly options: LifecycleOptions;

  constructor(options: LifecycleOptions) {
    this.options = options;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Create an instance without running any hooks. Classes bound to the
   * other domain are skipped.
   */
  instantiate(className: string, options: InstantiateOptions = {}): NodeInstance | undefined {
    const { registry, instances, port, logger, domain } = this.options;
    const nodeClass = registry.resolve(className);

    if (domain !== 'shared' && nodeClass.domain !== 'shared' && nodeClass.domain !== domain) {
      logger.trace(SOURCE, `Skipping ${className}: ${nodeClass.domain} class on ${domain} bus`);
      return undefined;
    }

    const id = options.id ?? `${className}_${uuidv4()}`;
    if (instances.has(id)) {
      throw Errors.duplicateInstance(id);
    }

    const instance = new NodeInstance(nodeClass, port, { id, attributes: options.attributes });
    instances.add(instance);
    logger.trace(SOURCE, `Created ${id}`);
    return instance;
  }

  /**
   * onInit on every instance
   */
  init(): void {
    const { instances, logger } = this.options;
    if (this.initialized) {
      logger.warn(SOURCE, 'Already initialized');
      return;
    }

    logger.info(SOURCE, 'Initializing...');
    for (const instance of instances.all()) {
      this.initInstance(instance);
    }
    this.initialized = true;
    this.record('init', { instances: instances.size });
    logger.info(SOURCE, `Initialized ${instances.size} instances`);
  }

  /**
   * Enable routing, then onStart on every instance
   */
  start(): void {
    const { instances, router, logger } = this.options;
    if (!this.initialized) {
      throw Errors.lifecycle('Bus must be initialized before start');
    }
    if (this.started) {
      logger.warn(SOURCE, 'Already started');
      return;
    }

    logger.info(SOURCE, 'Starting...');
    router.setEnabled(true);
    this.started = true;
    for (const instance of instances.all()) {
      if (instance.state === 'created') this.initInstance(instance);
      if (instance.state === 'initialized') this.startOne(instance);
    }
    this.record('start', { instances: instances.size });
    logger.info(SOURCE, 'Started, routing enabled');
  }

  /**
   * onStop on every started instance, release owned resources and
   * disable routing
   */
  stop(): void {
    const { instances, router, logger } = this.options;
    if (!this.started) {
      logger.warn(SOURCE, 'Not started');
      return;
    }

    logger.info(SOURCE, 'Stopping...');
    for (const instance of instances.all()) {
      if (instance.state === 'started') {
        router.invokeSystem(instance, SystemSignals.STOP);
      }
      this.releaseOne(instance);
    }
    router.setEnabled(false);
    this.started = false;
    this.initialized = false;
    this.record('stop', { instances: instances.size });
    logger.info(SOURCE, 'Stopped');
  }

  /**
   * Create and bring an instance up to the bus's current phase
   */
  spawn(className: string, options: SpawnOptions = {}): NodeInstance | undefined {
    const { router, logger } = this.options;
    const instance = this.instantiate(className, options);
    if (!instance) return undefined;

    router.invokeSystem(instance, SystemSignals.SPAWNED);
    if (this.initialized) {
      this.initInstance(instance);
    }
    if (this.started && !options.deferStart) {
      this.startOne(instance);
    }

    logger.trace(SOURCE, `Spawned ${instance.id}`);
    this.record('spawn', { instanceId: instance.id, className, deferStart: options.deferStart ?? false });
    return instance;
  }

  /**
   * Second phase of a deferred spawn
   */
  startInstance(id: string): boolean {
    const { instances, logger } = this.options;
    const instance = instances.get(id);
    if (!instance) {
      throw Errors.instanceNotFound(id);
    }
    if (!this.started) {
      logger.warn(SOURCE, `Cannot start ${id}: bus not started`);
      return false;
    }
    if (instance.state === 'started') return true;
    if (instance.state === 'created') this.initInstance(instance);
    this.startOne(instance);
    return true;
  }

  /**
   * Stop, notify and remove one instance
   */
  despawn(id: string): boolean {
    const { instances, router, logger } = this.options;
    const instance = instances.get(id);
    if (!instance) {
      logger.warn(SOURCE, `Cannot despawn: instance not found: ${id}`);
      return false;
    }

    router.invokeSystem(instance, SystemSignals.STOP);
    router.invokeSystem(instance, SystemSignals.DESPAWNING);
    this.releaseOne(instance);
    instances.remove(id);

    logger.trace(SOURCE, `Despawned ${id}`);
    this.record('despawn', { instanceId: id });
    return true;
  }

  /**
   * Drop every instance and return to the unstarted state
   */
  reset(): void {
    const { instances, router } = this.options;
    for (const instance of instances.all()) {
      this.releaseOne(instance);
    }
    instances.clear();
    router.setEnabled(false);
    this.initialized = false;
    this.started = false;
  }

  private initInstance(instance: NodeInstance): void {
    this.options.router.invokeSystem(instance, SystemSignals.INIT);
    instance.setState('initialized');
  }

  private startOne(instance: NodeInstance): void {
    // Started before the hook runs so onStart may send
    instance.setState('started');
    this.options.router.invokeSystem(instance, SystemSignals.START);
  }

  private releaseOne(instance: NodeInstance): void {
    const discarded = instance.release();
    this.options.router.discard(instance, discarded);
    instance.setState('stopped');
  }

  private record(operation: string, data: Record<string, unknown>): void {
    this.options.tracer?.record(toTraceEvent({
      level: 'info',
      category: operation === 'spawn' || operation === 'despawn'
        ? TraceCategory.NODE_SPAWN
        : TraceCategory.SYSTEM_LIFECYCLE,
      component: SOURCE,
      operation,
      data
    }));
  }
}
