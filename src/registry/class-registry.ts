/**
 * Registry of node classes for one bus
 *
 * Registration validates the inheritance contract: every handler required
 * anywhere in the chain must have an implementation or a default.
 */

import { ContractViolationError, Errors } from '../errors';
import type { Logger } from '../logging/logger';
import { BaseNode, NodeClass } from '../nodes/node-class';
import type { Domain } from '../nodes/types';

export interface InheritanceTreeNode {
  name: string;
  children: InheritanceTreeNode[];
}

const SOURCE = 'Registry';

export class ClassRegistry {
  private classes = new Map<string, NodeClass>();

  constructor(private readonly logger?: Logger) {}

  /**
   * Validate and store a class
   */
  register(nodeClass: NodeClass): void {
    if (this.classes.has(nodeClass.name)) {
      throw Errors.duplicateClass(nodeClass.name);
    }

    const violations = nodeClass.findViolations();
    if (violations.length > 0) {
      throw new ContractViolationError(nodeClass.name, violations);
    }

    this.classes.set(nodeClass.name, nodeClass);
    this.logger?.trace(SOURCE, `Registered ${nodeClass.name} (${nodeClass.domain})`);
  }

  resolve(name: string): NodeClass {
    const nodeClass = this.classes.get(name);
    if (!nodeClass) {
      throw Errors.classNotFound(name);
    }
    return nodeClass;
  }

  get(name: string): NodeClass | undefined {
    return this.classes.get(name);
  }

  has(name: string): boolean {
    return this.classes.has(name);
  }

  /**
   * Registered class names in registration order
   */
  names(): string[] {
    return Array.from(this.classes.keys());
  }

  /**
   * Domain of a registered class; undefined when unknown
   */
  domainOf(name: string): Domain | undefined {
    return this.classes.get(name)?.domain;
  }

  /**
   * Throw if any expected class has not been registered
   */
  verify(expected: ReadonlyArray<string>): void {
    const missing = expected.filter(name => !this.classes.has(name));
    if (missing.length > 0) {
      throw Errors.missingClasses(missing);
    }
    this.logger?.info(SOURCE, `Verified ${expected.length} classes`);
  }

  /**
   * Class names from the root down to `name`
   */
  getChain(name: string): string[] {
    return this.resolve(name).getChain().map(c => c.name);
  }

  /**
   * Tree of registered classes under the root class. A class whose
   * parent is not registered hangs off its nearest registered ancestor.
   */
  buildInheritanceTree(): InheritanceTreeNode {
    const root: InheritanceTreeNode = { name: BaseNode.name, children: [] };
    const nodes = new Map<NodeClass, InheritanceTreeNode>([[BaseNode, root]]);

    for (const nodeClass of this.classes.values()) {
      if (!nodes.has(nodeClass)) {
        nodes.set(nodeClass, { name: nodeClass.name, children: [] });
      }
    }

    for (const nodeClass of this.classes.values()) {
      const node = nodes.get(nodeClass);
      if (!node || node === root) continue;
      let ancestor = nodeClass.parent;
      while (ancestor && !nodes.has(ancestor)) {
        ancestor = ancestor.parent;
      }
      const parentNode = (ancestor && nodes.get(ancestor)) ?? root;
      parentNode.children.push(node);
    }

    return root;
  }

  /**
   * Indented text rendering of the inheritance tree
   */
  formatTree(): string {
    const lines: string[] = [];
    const walk = (node: InheritanceTreeNode, depth: number): void => {
      lines.push(`${'  '.repeat(depth)}${depth > 0 ? '└── ' : ''}${node.name}`);
      for (const child of node.children) {
        walk(child, depth + 1);
      }
    };
    walk(this.buildInheritanceTree(), 0);
    return lines.join('\n');
  }

  clear(): void {
    this.classes.clear();
  }
}
