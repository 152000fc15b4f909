/**
 * Types for the host
 */

import type { Bus } from '../bus';

/**
 * What an application hands the host. Hooks run in declaration order
 * during `BusHost.start`.
 */
export interface BusApplication {
  /** Register node classes */
  register(bus: Bus): void;

  /** Define modes in code, after any modes file has been loaded */
  defineModes?(bus: Bus): void;

  /** Create the initial instances; runs before init */
  populate?(bus: Bus): void | Promise<void>;

  /** Called once the bus is running */
  onStart?(bus: Bus): void | Promise<void>;

  /** Called before the bus stops */
  onShutdown?(bus: Bus): void | Promise<void>;
}
