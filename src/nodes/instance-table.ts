/**
 * Live instances of one bus, in creation order
 */

import { Errors } from '../errors';
import type { NodeInstance } from './node';

export class InstanceTable {
  private byId = new Map<string, NodeInstance>();

  add(instance: NodeInstance): void {
    if (this.byId.has(instance.id)) {
      throw Errors.duplicateInstance(instance.id);
    }
    this.byId.set(instance.id, instance);
  }

  remove(id: string): NodeInstance | undefined {
    const instance = this.byId.get(id);
    this.byId.delete(id);
    return instance;
  }

  get(id: string): NodeInstance | undefined {
    return this.byId.get(id);
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * Snapshot of every instance, in creation order
   */
  all(): NodeInstance[] {
    return Array.from(this.byId.values());
  }

  /**
   * Snapshot of one class's instances, in creation order
   */
  byClass(className: string): NodeInstance[] {
    return this.all().filter(instance => instance.className === className);
  }

  get size(): number {
    return this.byId.size;
  }

  clear(): void {
    this.byId.clear();
  }
}
