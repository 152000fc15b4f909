/**
 * Orchestrator - a node that spawns a group of child nodes and routes
 * signals between them by instance id.
 *
 * Configuration happens in three phases: every child is spawned with its
 * start deferred, every wire is installed, then every child is started.
 * A child that fires during its own start therefore already reaches its
 * wired peers.
 *
 * A wire may check its payload against a named or inline schema. With
 * `validate: 'block'` an invalid payload is not delivered and a valid one
 * is cut down to the declared fields; with 'warn' (the default) it is
 * reported and delivered as is.
 *
 * Two targets are reserved: `Out` re-fires on the orchestrator's own
 * output (under `handler` as the new signal name, if given) and `Self`
 * delivers to the orchestrator's own Input handlers.
 *
 * ```ts
 * bus.sendTo('Game', 'configure', {
 *   schemas: { Spawned: { n: { type: 'number', required: true } } },
 *   nodes: {
 *     Spawner: { class: 'Dropper', attributes: { interval: 2 } },
 *     EndZone: { class: 'Zone' }
 *   },
 *   wiring: [
 *     { from: 'Spawner', signal: 'spawned', to: 'EndZone', schema: 'Spawned', validate: 'block' },
 *     { from: 'EndZone', signal: 'entered', to: 'Out', handler: 'reached' }
 *   ],
 *   modes: { rush: { wiring: [...] } }
 * });
 * ```
 *
 * Input: configure, addNode, removeNode, setMode, enable, disable
 * Output: configured, nodeSpawned, nodeDespawned, modeChanged, validationFailed
 */

import { Errors } from '../errors';
import { BaseNode } from './node-class';
import type { NodeInstance } from './node';
import { parsePayloadSchema, PayloadSchema, PayloadValidator } from './payload-schema';
import type { Payload } from './types';

/** Wire target that re-fires on the orchestrator's own output */
export const OUT_TARGET = 'Out';
/** Wire target that delivers to the orchestrator's own Input handlers */
export const SELF_TARGET = 'Self';

const RESERVED_IDS: ReadonlyArray<string> = [OUT_TARGET, SELF_TARGET];

export type ValidateMode = 'block' | 'warn';

export interface WireSpec {
  from: string;
  signal: string;
  to: string;
  /** Input handler on the target, or the new signal name for `Out` */
  handler?: string;
  /** Name of a configured schema, or an inline one */
  schema?: string | PayloadSchema;
  validate?: ValidateMode;
}

export interface ChildSpec {
  class: string;
  attributes?: Record<string, unknown>;
}

export interface OrchestratorConfig {
  schemas: Record<string, PayloadSchema>;
  nodes: Record<string, ChildSpec>;
  wiring: WireSpec[];
  modes: Record<string, WireSpec[]>;
}

interface ActiveWire {
  definition: WireSpec;
  validator?: PayloadValidator;
}

interface OrchestratorState {
  children: Map<string, string>;
  schemas: Map<string, PayloadValidator>;
  defaultWiring: WireSpec[];
  modeWiring: Map<string, WireSpec[]>;
  active: Map<string, ActiveWire[]>;
  taps: Map<string, () => void>;
  currentMode: string;
  enabled: boolean;
}

const states = new WeakMap<NodeInstance, OrchestratorState>();

function stateOf(node: NodeInstance): OrchestratorState {
  let state = states.get(node);
  if (!state) {
    state = {
      children: new Map(),
      schemas: new Map(),
      defaultWiring: [],
      modeWiring: new Map(),
      active: new Map(),
      taps: new Map(),
      currentMode: '',
      enabled: false
    };
    states.set(node, state);
  }
  return state;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseWire(value: unknown, index: number, schemas: ReadonlySet<string>): WireSpec {
  if (!isRecord(value)) {
    throw Errors.invalidDefinition(`Wire ${index} must be an object`);
  }
  const { from, signal, to, handler, schema, validate } = value;
  if (typeof from !== 'string' || typeof signal !== 'string' || typeof to !== 'string') {
    throw Errors.invalidDefinition(`Wire ${index} needs string from, signal and to`);
  }
  if (handler !== undefined && typeof handler !== 'string') {
    throw Errors.invalidDefinition(`Wire ${index}: handler must be a string`);
  }
  if (validate !== undefined && validate !== 'block' && validate !== 'warn') {
    throw Errors.invalidDefinition(`Wire ${index}: validate must be 'block' or 'warn'`);
  }

  const wire: WireSpec = { from, signal, to };
  if (handler !== undefined) wire.handler = handler;
  if (typeof schema === 'string') {
    if (!schemas.has(schema)) {
      throw Errors.invalidDefinition(`Wire ${index} references unknown schema '${schema}'`);
    }
    wire.schema = schema;
  } else if (schema !== undefined) {
    wire.schema = parsePayloadSchema(`wire ${index}`, schema);
  }
  if (validate !== undefined) wire.validate = validate;
  return wire;
}

function parseWiring(value: unknown, schemas: ReadonlySet<string>): WireSpec[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw Errors.invalidDefinition('wiring must be a list of wires');
  }
  return value.map((wire, index) => parseWire(wire, index, schemas));
}

function parseChild(id: string, value: unknown): ChildSpec {
  if (RESERVED_IDS.includes(id)) {
    throw Errors.invalidDefinition(`Node id '${id}' is reserved`);
  }
  if (!isRecord(value) || typeof value.class !== 'string') {
    throw Errors.invalidDefinition(`Node '${id}' needs a class`);
  }
  if (value.attributes !== undefined && !isRecord(value.attributes)) {
    throw Errors.invalidDefinition(`Node '${id}': attributes must be an object`);
  }
  return { class: value.class, attributes: value.attributes };
}

/**
 * Validate a configure payload. Wires may name schemas from the payload
 * or from `knownSchemas`.
 * @throws BusError INVALID_DEFINITION
 */
export function parseOrchestratorConfig(
  payload: Payload,
  knownSchemas: ReadonlySet<string> = new Set()
): OrchestratorConfig {
  const schemas: Record<string, PayloadSchema> = {};
  if (payload.schemas !== undefined) {
    if (!isRecord(payload.schemas)) {
      throw Errors.invalidDefinition('schemas must map names to field definitions');
    }
    for (const [name, definition] of Object.entries(payload.schemas)) {
      schemas[name] = parsePayloadSchema(name, definition);
    }
  }
  const schemaNames = new Set([...knownSchemas, ...Object.keys(schemas)]);

  const nodes: Record<string, ChildSpec> = {};
  if (payload.nodes !== undefined) {
    if (!isRecord(payload.nodes)) {
      throw Errors.invalidDefinition('nodes must map ids to node definitions');
    }
    for (const [id, definition] of Object.entries(payload.nodes)) {
      nodes[id] = parseChild(id, definition);
    }
  }

  const modes: Record<string, WireSpec[]> = {};
  if (payload.modes !== undefined) {
    if (!isRecord(payload.modes)) {
      throw Errors.invalidDefinition('modes must map names to { wiring }');
    }
    for (const [name, mode] of Object.entries(payload.modes)) {
      if (!isRecord(mode)) {
        throw Errors.invalidDefinition(`Mode '${name}' must be an object`);
      }
      modes[name] = parseWiring(mode.wiring, schemaNames);
    }
  }

  return { schemas, nodes, wiring: parseWiring(payload.wiring, schemaNames), modes };
}

// Wiring is the default set plus, additively, the current mode's set
function buildActiveWiring(state: OrchestratorState): void {
  state.active.clear();
  const wires = [...state.defaultWiring, ...(state.modeWiring.get(state.currentMode) ?? [])];
  for (const wire of wires) {
    const key = `${wire.from}.${wire.signal}`;
    const list = state.active.get(key) ?? [];
    list.push({ definition: wire, validator: validatorFor(state, wire) });
    state.active.set(key, list);
  }
}

function validatorFor(state: OrchestratorState, wire: WireSpec): PayloadValidator | undefined {
  if (wire.schema === undefined) return undefined;
  if (typeof wire.schema === 'string') return state.schemas.get(wire.schema);
  return new PayloadValidator(wire.schema);
}

// Undefined when the payload must not be delivered
function checkPayload(
  node: NodeInstance,
  wire: ActiveWire,
  fromId: string,
  signal: string,
  payload: Payload
): Payload | undefined {
  if (!wire.validator) return payload;
  const blocking = wire.definition.validate === 'block';
  const result = wire.validator.check(payload, blocking);
  if (result.valid) return result.payload;

  node.out.fire('validationFailed', { from: fromId, signal, to: wire.definition.to, errors: result.issues });
  const reasons = result.issues.map(issue => issue.message).join('; ');
  node.err.fire(new Error(`Invalid '${signal}' from ${fromId} to ${wire.definition.to}: ${reasons}`), {
    handler: 'validate',
    payload
  });
  return blocking ? undefined : payload;
}

function routeSignal(node: NodeInstance, fromId: string, signal: string, payload: Payload, messageId: number): void {
  const state = stateOf(node);
  if (!state.enabled) return;

  for (const wire of state.active.get(`${fromId}.${signal}`) ?? []) {
    const { to, handler } = wire.definition;
    if (to !== OUT_TARGET && to !== SELF_TARGET && !state.children.has(to)) {
      node.err.fire(new Error(`Target node not found: ${to}`), { handler: 'route', payload });
      continue;
    }
    const delivered = checkPayload(node, wire, fromId, signal, payload);
    if (!delivered) continue;

    if (to === OUT_TARGET) {
      node.out.fire(handler ?? signal, delivered);
    } else if (to === SELF_TARGET) {
      node.out.fireTo(node.id, signal, delivered, { messageId, handler });
    } else {
      node.out.fireTo(to, signal, delivered, { messageId, handler });
    }
  }
}

function wireChild(node: NodeInstance, childId: string): void {
  const state = stateOf(node);
  if (state.taps.has(childId)) return;
  const child = node.spawner.getInstance(childId);
  if (!child) return;
  const untap = child.addOutputTap((signal, payload, messageId) =>
    routeSignal(node, childId, signal, payload, messageId)
  );
  state.taps.set(childId, untap);
}

function unwireChild(node: NodeInstance, childId: string): void {
  const state = stateOf(node);
  state.taps.get(childId)?.();
  state.taps.delete(childId);
}

function enableRouting(node: NodeInstance): void {
  const state = stateOf(node);
  state.enabled = true;
  for (const childId of state.children.keys()) {
    wireChild(node, childId);
  }
}

function disableRouting(node: NodeInstance): void {
  const state = stateOf(node);
  state.enabled = false;
  for (const childId of [...state.taps.keys()]) {
    unwireChild(node, childId);
  }
}

function spawnChild(node: NodeInstance, id: string, definition: ChildSpec): boolean {
  const state = stateOf(node);
  if (state.children.has(id)) {
    node.err.fire(Errors.duplicateInstance(id), { handler: 'spawn' });
    return false;
  }
  try {
    const child = node.spawner.spawn(definition.class, {
      id,
      attributes: definition.attributes,
      deferStart: true
    });
    if (!child) return false;
  } catch (error) {
    node.err.fire(error, { handler: 'spawn' });
    return false;
  }
  state.children.set(id, definition.class);
  return true;
}

function despawnChild(node: NodeInstance, id: string): void {
  const state = stateOf(node);
  unwireChild(node, id);
  if (state.children.delete(id)) {
    node.spawner.despawn(id);
  }
}

export const Orchestrator = BaseNode.extend({
  name: 'Orchestrator',
  domain: 'shared',
  Output: ['configured', 'nodeSpawned', 'nodeDespawned', 'modeChanged', 'validationFailed'],
  attributes: {
    Enabled: true,
    CurrentMode: ''
  },

  System: {
    onInit: node => {
      stateOf(node);
    },

    onStop: node => {
      const state = stateOf(node);
      disableRouting(node);
      for (const childId of [...state.children.keys()]) {
        despawnChild(node, childId);
      }
    }
  },

  Input: {
    onConfigure: (node, payload) => {
      const state = stateOf(node);
      const config = parseOrchestratorConfig(payload, new Set(state.schemas.keys()));

      for (const [name, schema] of Object.entries(config.schemas)) {
        state.schemas.set(name, new PayloadValidator(schema));
      }

      const spawned: string[] = [];
      for (const [id, definition] of Object.entries(config.nodes)) {
        if (spawnChild(node, id, definition)) spawned.push(id);
      }

      state.defaultWiring = config.wiring;
      for (const [name, wires] of Object.entries(config.modes)) {
        state.modeWiring.set(name, wires);
      }
      buildActiveWiring(state);

      if (node.getAttribute('Enabled') !== false) {
        enableRouting(node);
      }

      for (const id of spawned) {
        node.spawner.startInstance(id);
      }

      node.out.fire('configured', {
        nodeCount: state.children.size,
        wireCount: state.defaultWiring.length,
        schemaCount: state.schemas.size
      });
    },

    onAddNode: (node, payload) => {
      const { id } = payload;
      if (typeof id !== 'string') {
        throw Errors.invalidDefinition('addNode needs a string id');
      }
      const definition = parseChild(id, payload);
      if (!spawnChild(node, id, definition)) return;

      if (stateOf(node).enabled) wireChild(node, id);
      node.spawner.startInstance(id);
      node.out.fire('nodeSpawned', { id, class: definition.class });
    },

    onRemoveNode: (node, payload) => {
      const { id } = payload;
      if (typeof id !== 'string') return;
      despawnChild(node, id);
      node.out.fire('nodeDespawned', { id });
    },

    onSetMode: (node, payload) => {
      const { mode } = payload;
      if (typeof mode !== 'string') return;
      const state = stateOf(node);
      const oldMode = state.currentMode;
      if (oldMode === mode) return;

      state.currentMode = mode;
      node.setAttribute('CurrentMode', mode);
      buildActiveWiring(state);
      node.out.fire('modeChanged', { from: oldMode, to: mode });
    },

    onEnable: node => {
      node.setAttribute('Enabled', true);
      enableRouting(node);
    },

    onDisable: node => {
      node.setAttribute('Enabled', false);
      disableRouting(node);
    }
  }
});

/**
 * Ids of the children an orchestrator instance currently owns
 */
export function orchestratorChildren(node: NodeInstance): string[] {
  return Array.from(stateOf(node).children.keys());
}
