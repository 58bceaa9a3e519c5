/**
 * Grouping of resolved modules into per-target build units.
 */

import type { Module } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { getModulePriority, getModuleTarget } from '../modules.js';
import type { TargetResolver } from '../targets/target-resolver.js';

export interface TargetGroup {
  target: string;
  modules: Module[];
}

/**
 * Group modules by their effective target, keeping resolver order inside each group.
 */
export function groupModulesByTarget(modules: readonly Module[]): Map<string, Module[]> {
  const groups = new Map<string, Module[]>();
  for (const module of modules) {
    const target = getModuleTarget(module);
    const group = groups.get(target);
    if (group) {
      group.push(module);
    } else {
      groups.set(target, [module]);
    }
  }
  return groups;
}

/**
 * Keep only the requested targets. Every requested name must be a legal target
 * for the shell; a legal target without modules is dropped with a warning.
 */
export function filterTargetGroups(
  groups: Map<string, Module[]>,
  requested: readonly string[],
  resolver: TargetResolver
): Map<string, Module[]> {
  const filtered = new Map<string, Module[]>();
  for (const raw of requested) {
    const target = raw.toLowerCase();
    if (!resolver.isValidTarget(target)) {
      throw new ValidationError(
        `invalid target filter '${raw}' for shell type '${resolver.shellType}'`,
        { names: [raw] }
      );
    }
    const modules = groups.get(target);
    if (modules) {
      filtered.set(target, modules);
    } else {
      logger.warn(`Requested target '${target}' has no modules`);
    }
  }
  return filtered;
}

/**
 * Stable ascending sort by effective priority; equal priorities keep resolver order.
 */
export function sortByPriority(modules: readonly Module[]): Module[] {
  return [...modules].sort((a, b) => getModulePriority(a) - getModulePriority(b));
}

/**
 * Group, filter and order modules into the build units processed by the build,
 * targets in lexicographic order.
 */
export function planTargetGroups(
  modules: readonly Module[],
  resolver: TargetResolver,
  requestedTargets: readonly string[] = []
): TargetGroup[] {
  let groups = groupModulesByTarget(modules);
  if (requestedTargets.length > 0) {
    groups = filterTargetGroups(groups, requestedTargets, resolver);
  }
  return Array.from(groups.keys())
    .sort()
    .map(target => ({ target, modules: sortByPriority(groups.get(target) ?? []) }));
}
