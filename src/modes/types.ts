/**
 * Mode (wiring configuration) types
 */

export interface WiringConfig {
  /** Mode this one inherits from */
  base?: string;
  /** Classes that participate, informational */
  nodes?: string[];
  /** Source class → ordered target classes */
  wiring?: Record<string, string[]>;
  /** Class → attribute values applied on switch */
  attributes?: Record<string, Record<string, unknown>>;
}

/**
 * A mode with its base chain folded in
 */
export interface ResolvedMode {
  name: string;
  /** The mode first, then its bases */
  chain: string[];
  nodes: string[];
  wiring: ReadonlyMap<string, ReadonlyArray<string>>;
  attributes: Record<string, Record<string, unknown>>;
}
