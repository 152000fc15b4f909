/**
 * Attribute persistence
 *
 * Nodes reach a store through a host reference (`node.requireReference`)
 * and decide themselves when to load or save. The router never consults it.
 */

export type AttributeRecord = Record<string, unknown>;

export interface AttributeStore {
  /** Saved attributes for a node, or null if nothing was saved */
  load(nodeId: string): Promise<AttributeRecord | null>;
  save(nodeId: string, attributes: AttributeRecord): Promise<void>;
  /** True if something was removed */
  delete(nodeId: string): Promise<boolean>;
  list(): Promise<string[]>;
}

export function isAttributeStore(value: unknown): value is AttributeStore {
  if (typeof value !== 'object' || value === null) return false;
  return ['load', 'save', 'delete', 'list'].every(
    method => typeof Reflect.get(value, method) === 'function'
  );
}

/**
 * Keeps copies in a map; nothing outlives the process
 */
export class MemoryAttributeStore implements AttributeStore {
  private records = new Map<string, AttributeRecord>();

  async load(nodeId: string): Promise<AttributeRecord | null> {
    const record = this.records.get(nodeId);
    return record ? structuredClone(record) : null;
  }

  async save(nodeId: string, attributes: AttributeRecord): Promise<void> {
    this.records.set(nodeId, structuredClone(attributes));
  }

  async delete(nodeId: string): Promise<boolean> {
    return this.records.delete(nodeId);
  }

  async list(): Promise<string[]> {
    return Array.from(this.records.keys()).sort();
  }
}
