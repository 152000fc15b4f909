/**
 * ModeManager - named wiring configurations and the active mode
 *
 * Wiring resolution folds the base chain first, then overlays each mode's
 * own entries. An entry replaces the inherited one for that source class
 * entirely; target lists are never concatenated.
 */

import { Errors } from '../errors';
import type { Logger } from '../logging/logger';
import type { NodeInstance } from '../nodes/node';
import { ModeChangePayload, SystemSignals } from '../nodes/types';
import { toTraceEvent } from '../tracing';
import { TraceCategory, TraceStorage } from '../tracing/types';
import { normalizeWiringConfig } from './normalize';
import type { ResolvedMode, WiringConfig } from './types';

/**
 * What switchMode needs from the bus
 */
export interface ModeHost {
  broadcast(signal: string, payload: ModeChangePayload): void;
  instancesOf(className: string): NodeInstance[];
  hasClass(className: string): boolean;
}

export interface ModeManagerOptions {
  host: ModeHost;
  logger: Logger;
  tracer?: TraceStorage;
}

const SOURCE = 'Modes';

export class ModeManager {
  private configs = new Map<string, WiringConfig>();
  private active: string | null = null;
  private cache = new Map<string, ResolvedMode>();
  private readonly host: ModeHost;
  private readonly logger: Logger;
  private readonly tracer?: TraceStorage;

  constructor(options: ModeManagerOptions) {
    this.host = options.host;
    this.logger = options.logger;
    this.tracer = options.tracer;
  }

  /**
   * Store a mode. Class names are not checked here.
   */
  defineMode(name: string, config: WiringConfig): void {
    if (typeof name !== 'string' || name === '') {
      throw Errors.invalidDefinition('Mode name must be a non-empty string');
    }
    this.configs.set(name, normalizeWiringConfig(name, config));
    this.cache.clear();
    this.logger.trace(SOURCE, `Defined mode ${name}`);
  }

  hasMode(name: string): boolean {
    return this.configs.has(name);
  }

  getMode(): string | null {
    return this.active;
  }

  getModeConfig(name: string): WiringConfig | undefined {
    const config = this.configs.get(name);
    return config ? normalizeWiringConfig(name, config) : undefined;
  }

  getModes(): string[] {
    return Array.from(this.configs.keys());
  }

  /**
   * The mode name first, then each base in order
   */
  getModeChain(name: string): string[] {
    const chain: string[] = [];
    let current: string | undefined = name;
    while (current !== undefined) {
      if (chain.includes(current)) {
        throw Errors.modeCycle([...chain, current]);
      }
      const config = this.configs.get(current);
      if (!config) {
        throw Errors.modeNotFound(current);
      }
      chain.push(current);
      current = config.base;
    }
    return chain;
  }

  /**
   * Fold the base chain of a mode. Cached until the next defineMode.
   */
  resolve(name: string): ResolvedMode {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const chain = this.getModeChain(name);
    const wiring = new Map<string, ReadonlyArray<string>>();
    const nodes: string[] = [];
    const attributes: Record<string, Record<string, unknown>> = {};

    // Root-most base first so nearer modes overlay it
    for (const modeName of [...chain].reverse()) {
      const config = this.configs.get(modeName);
      if (!config) continue;
      for (const [source, targets] of Object.entries(config.wiring ?? {})) {
        wiring.set(source, Object.freeze([...targets]));
      }
      for (const className of config.nodes ?? []) {
        if (!nodes.includes(className)) nodes.push(className);
      }
      for (const [className, values] of Object.entries(config.attributes ?? {})) {
        attributes[className] = { ...(attributes[className] ?? {}), ...values };
      }
    }

    const resolved: ResolvedMode = { name, chain, nodes, wiring, attributes };
    this.cache.set(name, resolved);
    return resolved;
  }

  resolveWiring(name: string): ReadonlyMap<string, ReadonlyArray<string>> {
    return this.resolve(name).wiring;
  }

  resolveNodes(name: string): string[] {
    return [...this.resolve(name).nodes];
  }

  resolveAttributes(name: string): Record<string, Record<string, unknown>> {
    const attributes = this.resolve(name).attributes;
    return Object.fromEntries(
      Object.entries(attributes).map(([className, values]) => [className, { ...values }])
    );
  }

  /**
   * Wiring of the active mode; undefined when no mode is active
   */
  activeWiring(): ReadonlyMap<string, ReadonlyArray<string>> | undefined {
    return this.active === null ? undefined : this.resolveWiring(this.active);
  }

  /**
   * Active mode and its bases, for handler override resolution
   */
  activeChain(): string[] {
    return this.active === null ? [] : this.resolve(this.active).chain;
  }

  /**
   * Activate a mode: notify every instance, apply the attribute overlay,
   * then commit. Handlers see the old mode during the notification.
   */
  switchMode(name: string): void {
    if (!this.configs.has(name)) {
      throw Errors.modeNotFound(name);
    }
    const resolved = this.resolve(name);
    const oldMode = this.active;

    this.host.broadcast(SystemSignals.MODE_CHANGE, { oldMode, newMode: name });

    for (const [className, values] of Object.entries(resolved.attributes)) {
      for (const instance of this.host.instancesOf(className)) {
        for (const [key, value] of Object.entries(values)) {
          instance.setAttribute(key, structuredClone(value));
        }
      }
    }

    this.active = name;
    this.cache.delete(name);
    this.warnUnknownClasses(this.resolve(name));

    this.logger.info(SOURCE, `Switched to mode: ${name}`);
    this.tracer?.record(toTraceEvent({
      level: 'info',
      category: TraceCategory.MODE_SWITCH,
      component: SOURCE,
      operation: 'switchMode',
      data: { oldMode, newMode: name }
    }));
  }

  /**
   * Forget the active mode. Definitions are kept.
   */
  reset(): void {
    this.active = null;
    this.cache.clear();
  }

  private warnUnknownClasses(mode: ResolvedMode): void {
    const named = new Set<string>(mode.nodes);
    for (const [source, targets] of mode.wiring) {
      named.add(source);
      for (const target of targets) named.add(target);
    }
    for (const className of named) {
      if (!this.host.hasClass(className)) {
        this.logger.warn(SOURCE, `Mode ${mode.name} names unregistered class ${className}`);
      }
    }
  }
}
