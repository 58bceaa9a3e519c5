/**
 * Dependency resolution: graph construction and OS-filtered topological ordering.
 */

import type { Manifest, Module } from '../../types/index.js';
import { CircularDependencyError, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { appliesToOS } from '../modules.js';
import { DependencyGraph, type GraphNode } from './dependency-graph.js';

export type SkipReason = 'os' | 'dependency';

export interface SkippedModule {
  name: string;
  reason: SkipReason;
  /** For `dependency` skips: the required module that was excluded */
  missing?: string;
}

export interface SortResult {
  /** Modules in dependency order; every module follows all of its requirements */
  modules: Module[];
  /** Modules left out for the target OS, in declaration order of discovery */
  skipped: SkippedModule[];
}

export class Resolver {
  /**
   * Build the dependency graph for a manifest. Nodes are added in declaration
   * order, then one edge per `requires` entry.
   */
  buildGraph(manifest: Manifest): DependencyGraph {
    const seen = new Set<string>();
    for (const module of manifest.modules) {
      if (seen.has(module.name)) {
        throw new ValidationError(`duplicate module name: ${module.name}`, { names: [module.name] });
      }
      seen.add(module.name);
    }

    const graph = new DependencyGraph();
    for (const module of manifest.modules) {
      graph.addNode(module);
    }
    for (const module of manifest.modules) {
      for (const dependency of module.requires) {
        graph.addEdge(dependency, module.name);
      }
    }
    return graph;
  }

  /**
   * Kahn's algorithm restricted to the modules that apply to `targetOS`.
   *
   * Ties between ready modules are broken FIFO in declaration order. A module
   * that requires an OS-excluded module (directly or through another excluded
   * module) is excluded as well and reported in `skipped`.
   */
  topologicalSort(graph: DependencyGraph, targetOS: string): SortResult {
    const names = graph.getNodeNames();
    const skipped: SkippedModule[] = [];
    const working = new Set<string>();

    for (const name of names) {
      const node = this.requireNode(graph, name);
      if (appliesToOS(node.module, targetOS)) {
        working.add(name);
      } else {
        skipped.push({ name, reason: 'os' });
      }
    }

    let changed = true;
    while (changed) {
      changed = false;
      for (const name of names) {
        if (!working.has(name)) continue;
        const missing = this.requireNode(graph, name).module.requires.find(dep => !working.has(dep));
        if (missing !== undefined) {
          working.delete(name);
          skipped.push({ name, reason: 'dependency', missing });
          logger.warn(`Skipping module '${name}': requires '${missing}', which does not apply to ${targetOS}`);
          changed = true;
        }
      }
    }

    // Every remaining module has all of its requirements in the working set,
    // so the graph's in-degree is also the working in-degree.
    const inDegree = new Map<string, number>();
    for (const name of names) {
      if (working.has(name)) {
        inDegree.set(name, this.requireNode(graph, name).inDegree);
      }
    }

    const queue: string[] = names.filter(name => inDegree.get(name) === 0);
    const result: Module[] = [];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      result.push(this.requireNode(graph, current).module);

      for (const dependent of graph.getDependents(current)) {
        const remaining = inDegree.get(dependent);
        if (remaining === undefined) continue;
        inDegree.set(dependent, remaining - 1);
        if (remaining - 1 === 0) {
          queue.push(dependent);
        }
      }
    }

    if (result.length < working.size) {
      const emitted = new Set(result.map(module => module.name));
      const unresolved = names.filter(name => working.has(name) && !emitted.has(name));
      throw new CircularDependencyError(unresolved);
    }

    logger.debug(`Resolved ${result.length} module(s) for ${targetOS}`, {
      order: result.map(module => module.name),
      skipped: skipped.map(entry => entry.name)
    });

    return { modules: result, skipped };
  }

  private requireNode(graph: DependencyGraph, name: string): GraphNode {
    const node = graph.getNode(name);
    if (!node) {
      throw new Error(`graph node '${name}' disappeared during resolution`);
    }
    return node;
  }
}
