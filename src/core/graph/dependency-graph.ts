/**
 * Directed dependency graph over modules.
 * Edges point from a dependency to its dependent; each node tracks how many
 * dependencies it still waits on.
 */

import type { Module } from '../../types/index.js';
import { NotFoundError } from '../../utils/errors.js';

export interface GraphNode {
  module: Module;
  inDegree: number;
}

export class DependencyGraph {
  // Map preserves insertion order, which is the manifest declaration order
  private nodes: Map<string, GraphNode> = new Map();
  private dependents: Map<string, string[]> = new Map();

  /**
   * Register a module with in-degree 0. A node with the same name is replaced;
   * uniqueness is checked before the graph is built.
   */
  addNode(module: Module): void {
    this.nodes.set(module.name, { module, inDegree: 0 });
  }

  /**
   * Record that `to` depends on `from`.
   */
  addEdge(from: string, to: string): void {
    if (!this.nodes.has(from)) {
      throw new NotFoundError('module', from, `dependency '${from}' of module '${to}' not found`);
    }
    const target = this.nodes.get(to);
    if (!target) {
      throw new NotFoundError('module', to);
    }

    const list = this.dependents.get(from);
    if (list) {
      list.push(to);
    } else {
      this.dependents.set(from, [to]);
    }
    target.inDegree++;
  }

  getNode(name: string): GraphNode | undefined {
    return this.nodes.get(name);
  }

  /**
   * Names of the modules that require `name`, in edge-insertion order.
   */
  getDependents(name: string): readonly string[] {
    return this.dependents.get(name) ?? [];
  }

  /**
   * All node names in declaration order.
   */
  getNodeNames(): string[] {
    return Array.from(this.nodes.keys());
  }

  get size(): number {
    return this.nodes.size;
  }
}
