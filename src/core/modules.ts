/**
 * Module accessors
 * Defaulting rules shared by the resolver, the target resolver and the build.
 */

import type { Module } from '../types/index.js';
import { MODULE_DEFAULTS } from '../constants/index.js';

/**
 * Effective target of a module, lowercased; empty means `zshrc`.
 */
export function getModuleTarget(module: Module): string {
  const target = module.target?.trim();
  return target ? target.toLowerCase() : MODULE_DEFAULTS.TARGET;
}

/**
 * Effective priority of a module; 0 or absent means 50.
 */
export function getModulePriority(module: Module): number {
  return module.priority ? module.priority : MODULE_DEFAULTS.PRIORITY;
}

/**
 * Whether a module applies to the given OS (case-insensitive).
 * A module without an OS list applies everywhere.
 */
export function appliesToOS(module: Module, targetOS: string): boolean {
  if (module.os.length === 0) {
    return true;
  }
  const wanted = targetOS.toLowerCase();
  return module.os.some(os => os.toLowerCase() === wanted);
}

/**
 * Filesystem-safe token for a module name: lowercase, with spaces and
 * path-separator-like characters replaced by underscores.
 */
export function sanitizeModuleName(name: string): string {
  return name.replace(/[\s/\\:]/g, '_').toLowerCase();
}
