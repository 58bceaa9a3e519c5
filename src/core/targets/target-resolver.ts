/**
 * Target resolution: logical target names to shell-specific file paths.
 */

import { isAbsolute, join, relative, resolve } from 'path';
import type { Module, ShellType } from '../../types/index.js';
import { DEFAULT_PATHS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { isPathInside } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { getModuleTarget } from '../modules.js';
import {
  SUPPORTED_SHELLS,
  createShellTargetTable,
  isShellType,
  type ShellTargetTable,
  type TargetDefinition
} from './shell-targets.js';

export interface TargetResolverOptions {
  /**
   * Alternate config root for fish. Defaults to $XDG_CONFIG_HOME; pass
   * `null` to ignore the environment.
   */
  xdgConfigHome?: string | null;
}

/**
 * Resolve the fish config root relative to `baseDir`. Only values that stay
 * inside `baseDir` are honoured; anything else falls back to `.config`.
 */
export function resolveXdgConfigBase(baseDir: string, xdgConfigHome: string | null | undefined): string {
  if (!xdgConfigHome) {
    return DEFAULT_PATHS.XDG_CONFIG;
  }
  const absolute = isAbsolute(xdgConfigHome) ? xdgConfigHome : resolve(baseDir, xdgConfigHome);
  const rel = relative(resolve(baseDir), absolute);
  if (!rel || !isPathInside(absolute, baseDir)) {
    logger.debug(`Ignoring XDG_CONFIG_HOME outside ${baseDir}: ${xdgConfigHome}`);
    return DEFAULT_PATHS.XDG_CONFIG;
  }
  return rel;
}

export class TargetResolver {
  readonly shellType: ShellType;
  readonly baseDir: string;
  private readonly table: ShellTargetTable;

  constructor(shellType: string, baseDir: string, options: TargetResolverOptions = {}) {
    const normalized = shellType.toLowerCase();
    if (!isShellType(normalized)) {
      throw new ValidationError(
        `unsupported shell type: ${shellType} (expected one of ${SUPPORTED_SHELLS.join(', ')})`,
        { names: [shellType] }
      );
    }
    this.shellType = normalized;
    this.baseDir = baseDir;

    const xdgConfigHome = options.xdgConfigHome === undefined
      ? process.env.XDG_CONFIG_HOME
      : options.xdgConfigHome;
    this.table = createShellTargetTable(normalized, resolveXdgConfigBase(baseDir, xdgConfigHome));
  }

  /**
   * Full path of a target under the base directory.
   */
  resolve(target: string): string {
    return join(this.baseDir, this.lookup(target).path);
  }

  /**
   * Path of a target relative to the base directory, as recorded in build metadata.
   */
  getRelativePath(target: string): string {
    return this.lookup(target).path;
  }

  isDirectoryTarget(target: string): boolean {
    return this.table[target.toLowerCase()]?.directory === true;
  }

  /**
   * Extension given to per-module files of a directory target.
   */
  getDirectoryExtension(target: string): string {
    return this.lookup(target).extension ?? '';
  }

  isValidTarget(target: string): boolean {
    return Object.hasOwn(this.table, target.toLowerCase());
  }

  getValidTargets(): string[] {
    return Object.keys(this.table);
  }

  getTargetDescription(target: string): string {
    return this.lookup(target).description;
  }

  /**
   * Fail on the first module whose (defaulted) target is not legal for this shell.
   */
  validateTargets(modules: readonly Module[]): void {
    for (const module of modules) {
      const target = getModuleTarget(module);
      if (!this.isValidTarget(target)) {
        throw new ValidationError(
          `module '${module.name}' has invalid target '${target}' for shell type '${this.shellType}'`,
          { names: [module.name, target] }
        );
      }
    }
  }

  private lookup(target: string): TargetDefinition {
    const key = target.toLowerCase();
    if (!Object.hasOwn(this.table, key)) {
      throw new ValidationError(
        `invalid target '${target}' for shell type '${this.shellType}' (valid: ${this.getValidTargets().join(', ')})`,
        { names: [target] }
      );
    }
    return this.table[key];
  }
}
