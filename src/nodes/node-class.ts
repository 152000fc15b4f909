/**
 * NodeClass - an immutable template for node instances.
 *
 * Classes form a single-inheritance chain rooted at `BaseNode`. Every table
 * (handlers, defaults, required handlers, mode overrides, signal map) is
 * flattened down the chain once, when `extend` is called, so lookups never
 * walk the chain at dispatch time.
 */

import { Errors } from '../errors';
import type { ContractViolation } from '../errors';
import { handlerNameFor } from './signals';
import {
  Domain,
  Handler,
  HandlerChannel,
  HandlerSet,
  HandlerTable,
  HANDLER_CHANNELS,
  RequiredHandlers
} from './types';

/**
 * What a caller supplies to define a class
 */
export interface NodeClassDefinition {
  name: string;
  domain?: Domain;
  /** Handlers subclasses (and this class) must provide */
  required?: RequiredHandlers;
  /** Fallbacks that satisfy `required` when no implementation exists */
  defaults?: HandlerSet;
  System?: HandlerTable;
  Input?: HandlerTable;
  Error?: HandlerTable;
  /** Signal names this class emits */
  Output?: string[];
  /** Per-mode handler overrides */
  modes?: Record<string, HandlerSet>;
  /** Explicit signal → handler name entries, for names that don't follow the on<Signal> rule */
  signals?: Record<string, string>;
  /** Initial attribute values for new instances */
  attributes?: Record<string, unknown>;
}

type ChannelMaps = ReadonlyMap<HandlerChannel, ReadonlyMap<string, Handler>>;

interface Requirement {
  channel: HandlerChannel;
  handler: string;
  requiredBy: string;
}

const DOMAINS: ReadonlyArray<Domain> = ['server', 'client', 'shared'];

function mergeChannels(inherited: ChannelMaps | undefined, own: HandlerSet | undefined): ChannelMaps {
  const merged = new Map<HandlerChannel, ReadonlyMap<string, Handler>>();
  for (const channel of HANDLER_CHANNELS) {
    const table = new Map<string, Handler>(inherited?.get(channel) ?? []);
    const additions = own?.[channel];
    if (additions) {
      for (const [name, handler] of Object.entries(additions)) {
        if (typeof handler !== 'function') {
          throw Errors.invalidDefinition(`Handler ${channel}.${name} must be a function`);
        }
        table.set(name, handler);
      }
    }
    merged.set(channel, table);
  }
  return merged;
}

function noop(): void {
  // default lifecycle hook
}

export class NodeClass {
  readonly name: string;
  readonly domain: Domain;
  readonly parent: NodeClass | null;
  readonly outputs: ReadonlyArray<string>;
  readonly attributeDefaults: Readonly<Record<string, unknown>>;

  private readonly handlers: ChannelMaps;
  private readonly defaults: ChannelMaps;
  private readonly modeHandlers: ReadonlyMap<string, ChannelMaps>;
  private readonly requirements: ReadonlyArray<Requirement>;
  private readonly signalMap: ReadonlyMap<string, string>;
  // Names derived for signals this class has seen; dropped with the class
  private readonly derivedNames = new Map<string, string>();

  private constructor(definition: NodeClassDefinition, parent: NodeClass | null) {
    if (typeof definition.name !== 'string' || definition.name.trim() === '') {
      throw Errors.invalidDefinition('Node class definition requires a non-empty name');
    }
    if (definition.domain !== undefined && !DOMAINS.includes(definition.domain)) {
      throw Errors.invalidDefinition(
        `Node class '${definition.name}' has unknown domain '${String(definition.domain)}'`
      );
    }

    this.name = definition.name;
    this.parent = parent;
    this.domain = definition.domain ?? parent?.domain ?? 'shared';

    this.handlers = mergeChannels(parent?.handlers, {
      System: definition.System,
      Input: definition.Input,
      Error: definition.Error
    });
    this.defaults = mergeChannels(parent?.defaults, definition.defaults);

    // Mode overrides merge per mode and per handler; the subclass wins
    const modes = new Map<string, ChannelMaps>(parent?.modeHandlers ?? []);
    for (const [mode, set] of Object.entries(definition.modes ?? {})) {
      modes.set(mode, mergeChannels(modes.get(mode), set));
    }
    this.modeHandlers = modes;

    // First class in the chain to demand a handler is recorded as its source
    const requirements = [...(parent?.requirements ?? [])];
    for (const channel of HANDLER_CHANNELS) {
      for (const handler of definition.required?.[channel] ?? []) {
        if (!requirements.some(r => r.channel === channel && r.handler === handler)) {
          requirements.push({ channel, handler, requiredBy: definition.name });
        }
      }
    }
    this.requirements = requirements;

    this.signalMap = new Map<string, string>([
      ...(parent?.signalMap ?? []),
      ...Object.entries(definition.signals ?? {})
    ]);

    this.outputs = Object.freeze([
      ...new Set([...(parent?.outputs ?? []), ...(definition.Output ?? [])])
    ]);
    this.attributeDefaults = Object.freeze({
      ...(parent?.attributeDefaults ?? {}),
      ...(definition.attributes ?? {})
    });

    Object.freeze(this);
  }

  /**
   * Create the root class every node class descends from
   */
  static createRoot(): NodeClass {
    return new NodeClass(
      {
        name: 'Node',
        domain: 'shared',
        required: { System: ['onInit', 'onStart', 'onStop'] },
        defaults: {
          System: {
            onInit: noop,
            onStart: noop,
            onStop: noop,
            onModeChange: noop,
            onSpawned: noop,
            onDespawning: noop
          }
        }
      },
      null
    );
  }

  /**
   * Define a subclass of this class
   */
  extend(definition: NodeClassDefinition): NodeClass {
    return new NodeClass(definition, this);
  }

  /**
   * Class chain from the root down to this class
   */
  getChain(): NodeClass[] {
    const chain: NodeClass[] = [];
    let current: NodeClass | null = this;
    while (current) {
      chain.unshift(current);
      current = current.parent;
    }
    return chain;
  }

  /**
   * Unscoped handler: own or inherited implementation, then defaults
   */
  getHandler(channel: HandlerChannel, name: string): Handler | undefined {
    return this.handlers.get(channel)?.get(name) ?? this.defaults.get(channel)?.get(name);
  }

  /**
   * Handler override for one mode only
   */
  getModeHandler(mode: string, channel: HandlerChannel, name: string): Handler | undefined {
    return this.modeHandlers.get(mode)?.get(channel)?.get(name);
  }

  hasHandler(channel: HandlerChannel, name: string): boolean {
    return this.getHandler(channel, name) !== undefined;
  }

  /**
   * Names of every handler on a channel, defaults included
   */
  handlerNames(channel: HandlerChannel): string[] {
    const names = new Set<string>(this.handlers.get(channel)?.keys() ?? []);
    for (const name of this.defaults.get(channel)?.keys() ?? []) names.add(name);
    return [...names];
  }

  /**
   * Handler name a signal is delivered to
   */
  handlerFor(signal: string): string {
    const mapped = this.signalMap.get(signal) ?? this.derivedNames.get(signal);
    if (mapped !== undefined) return mapped;
    const name = handlerNameFor(signal);
    this.derivedNames.set(signal, name);
    return name;
  }

  /**
   * Required handlers that have neither an implementation nor a default
   */
  findViolations(): ContractViolation[] {
    return this.requirements
      .filter(r => !this.hasHandler(r.channel, r.handler))
      .map(r => ({ channel: r.channel, handler: r.handler, requiredBy: r.requiredBy }));
  }

  /**
   * The flattened required set, in the order it was declared down the chain
   */
  getRequirements(): ReadonlyArray<Requirement> {
    return this.requirements;
  }
}

/**
 * Root of every class chain
 */
export const BaseNode = NodeClass.createRoot();
