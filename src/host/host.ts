/**
 * BusHost - bootstraps a bus from a HostConfig and an application
 *
 * Start order:
 *   logger → tracer → attribute store → bus → register → verify classes →
 *   modes file → defineModes → populate → init → initial mode → start → onStart
 */

import { Bus } from '../bus';
import { TraceTelemetrySink } from '../collector/trace-sink';
import { describeError, Errors } from '../errors';
import { Logger, LogSink } from '../logging/logger';
import { AttributeStore, MemoryAttributeStore } from '../persistence/attribute-store';
import { FileAttributeStore } from '../persistence/file-attribute-store';
import { FileTraceStorage } from '../tracing/file-trace-storage';
import { MemoryTraceStorage } from '../tracing/memory-trace-storage';
import type { TraceStorage } from '../tracing/types';
import type { BoundaryTransport } from '../transport/types';
import { DEFAULT_HOST_CONFIG, HostConfig } from './config';
import type { BusApplication } from './types';

/** Reference id under which nodes find the attribute store */
export const STORE_REFERENCE = 'store';

export interface BusHostOptions {
  /** Where log lines go (default console) */
  logSink?: LogSink;
  transport?: BoundaryTransport;
  /** Used instead of the tracer the config would build */
  tracer?: TraceStorage;
  /** Used instead of the store the config would build */
  store?: AttributeStore;
}

const SOURCE = 'Host';

export class BusHost {
  private bus?: Bus;
  private app?: BusApplication;
  private tracer?: TraceStorage;

  constructor(
    private readonly config: HostConfig = DEFAULT_HOST_CONFIG,
    private readonly options: BusHostOptions = {}
  ) {}

  /**
   * The running bus, if any
   */
  get current(): Bus | undefined {
    return this.bus;
  }

  async start(app: BusApplication): Promise<Bus> {
    if (this.bus) {
      throw Errors.lifecycle('Host is already started');
    }

    const logger = new Logger(this.config.log, this.options.logSink);
    logger.info(SOURCE, `Starting host (domain ${this.config.domain})`);

    const tracer = this.options.tracer ?? this.createTracer(logger);
    const store = this.options.store ?? this.createStore(logger);

    const bus = new Bus({
      domain: this.config.domain,
      logger,
      tracer,
      telemetry: [new TraceTelemetrySink(tracer)],
      transport: this.options.transport
    });
    bus.setReference(STORE_REFERENCE, store);

    try {
      app.register(bus);
      if (this.config.expectedClasses.length > 0) {
        bus.registry.verify(this.config.expectedClasses);
      }

      if (this.config.modesFile) {
        const names = bus.loadModesFromFile(this.config.modesFile);
        logger.info(SOURCE, `Loaded ${names.length} modes from ${this.config.modesFile}`);
      }
      app.defineModes?.(bus);

      await app.populate?.(bus);

      bus.init();
      if (this.config.initialMode) {
        bus.switchMode(this.config.initialMode);
      }
      bus.start();

      await app.onStart?.(bus);
    } catch (error) {
      logger.error(SOURCE, `Host failed to start: ${describeError(error)}`);
      if (bus.isStarted()) {
        bus.stop();
      }
      // Only the trace file the host opened itself
      if (!this.options.tracer && tracer instanceof FileTraceStorage) {
        await tracer.close();
      }
      throw error;
    }

    this.bus = bus;
    this.app = app;
    this.tracer = tracer;
    logger.info(SOURCE, 'Host started');
    return bus;
  }

  /**
   * Stop the bus and close what the host opened
   */
  async shutdown(): Promise<void> {
    const bus = this.bus;
    if (!bus) return;

    await this.app?.onShutdown?.(bus);
    if (bus.isStarted()) {
      bus.stop();
    }
    await this.options.transport?.close?.();

    if (this.tracer instanceof FileTraceStorage) {
      await this.tracer.close();
    }

    bus.logger.info(SOURCE, 'Host stopped');
    this.bus = undefined;
    this.app = undefined;
    this.tracer = undefined;
  }

  private createTracer(logger: Logger): TraceStorage {
    if (this.config.traceDir) {
      return new FileTraceStorage({ directory: this.config.traceDir, logger });
    }
    return new MemoryTraceStorage();
  }

  private createStore(logger: Logger): AttributeStore {
    if (this.config.storeDir) {
      return new FileAttributeStore(this.config.storeDir, logger);
    }
    return new MemoryAttributeStore();
  }
}
