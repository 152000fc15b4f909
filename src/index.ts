/**
 * pinwire - signal bus for wiring self-contained nodes together
 */

// Bus
export { Bus } from './bus';
export type { BusOptions } from './bus';

// Errors
export {
  BusError,
  ContractViolationError,
  HandlerNotFoundError,
  Errors,
  describeError
} from './errors';
export type { BusErrorCode, ContractViolation } from './errors';

// Nodes
export { NodeClass, BaseNode } from './nodes/node-class';
export type { NodeClassDefinition } from './nodes/node-class';
export { NodeInstance, OutputChannel, ErrorChannel } from './nodes/node';
export type { NodePort, Spawner, SpawnRequest, NodeErrorDetails, OutputTap } from './nodes/node';
export { InstanceTable } from './nodes/instance-table';
export { handlerNameFor, signalNameFor } from './nodes/signals';
export {
  Orchestrator,
  orchestratorChildren,
  parseOrchestratorConfig,
  OUT_TARGET,
  SELF_TARGET
} from './nodes/orchestrator';
export type { WireSpec, ChildSpec, OrchestratorConfig, ValidateMode } from './nodes/orchestrator';
export { PayloadValidator, parsePayloadSchema, FIELD_TYPES } from './nodes/payload-schema';
export type {
  FieldSchema,
  FieldType,
  FieldValidator,
  PayloadSchema,
  SchemaCheck,
  SchemaIssue
} from './nodes/payload-schema';
export { HANDLER_CHANNELS, SystemSignals, ACK_SIGNAL, NO_REPLY } from './nodes/types';
export type {
  Domain,
  HandlerChannel,
  Channel,
  Payload,
  DispatchContext,
  Handler,
  HandlerTable,
  HandlerSet,
  RequiredHandlers,
  NodeState,
  SystemSignal,
  ModeChangePayload,
  WaitResult
} from './nodes/types';

// Registry
export { ClassRegistry } from './registry/class-registry';
export type { InheritanceTreeNode } from './registry/class-registry';

// Modes
export { ModeManager } from './modes/mode-manager';
export type { ModeHost, ModeManagerOptions } from './modes/mode-manager';
export { normalizeWiringConfig } from './modes/normalize';
export { parseModesYaml, loadModesFromYaml, loadModesFromFile } from './modes/yaml-loader';
export type { WiringConfig, ResolvedMode } from './modes/types';

// Router
export { Router } from './router/router';
export type { RouterOptions, DirectSendOptions } from './router/router';
export { MessageIdSource } from './router/message-ids';
export { VisitTracker } from './router/visit-tracker';
export type { SendOptions, QueuedMessage, ReplyTarget, DeliveryOutcome } from './router/types';

// Lifecycle
export { Lifecycle } from './lifecycle/lifecycle';
export type { LifecycleOptions, InstantiateOptions, SpawnOptions } from './lifecycle/lifecycle';

// Errors collection
export { ErrorCollector } from './collector/error-collector';
export type {
  ErrorKind,
  ErrorEvent,
  ErrorRecord,
  TelemetrySink,
  ErrorListener,
  RoutingAnomaly,
  ErrorCollectorOptions
} from './collector/error-collector';
export { TraceTelemetrySink } from './collector/trace-sink';

// Logging
export { Logger, MemoryLogSink, consoleSink, isLogLevel, LOG_LEVELS } from './logging/logger';
export type { LogLevel, LoggerConfig, LogSink } from './logging/logger';
export { globToRegExp, matchesPattern, expandPattern, matchesAny } from './logging/patterns';

// Tracing
export * from './tracing';

// Transport
export type { BoundaryReceiver, BoundaryTransport } from './transport/types';
export { LoopbackTransport } from './transport/loopback';
export type { BoundaryEnvelope } from './transport/loopback';
export { WebSocketTransport } from './transport/websocket';
export type { BoundarySocket, WebSocketTransportOptions } from './transport/websocket';
export { encodeEnvelope, decodeEnvelope, frameText } from './transport/envelope';

// Persistence
export * from './persistence';

// Host
export * from './host';
