/**
 * Per-shell target tables.
 * Maps each logical target to its path relative to the home (or output) directory.
 */

import { join } from 'path';
import type { ShellType } from '../../types/index.js';

export interface TargetDefinition {
  /** Path relative to the base directory */
  path: string;
  /** Directory targets receive one file per module instead of one merged file */
  directory?: boolean;
  /** Extension of the per-module files of a directory target */
  extension?: string;
  description: string;
}

export type ShellTargetTable = Readonly<Record<string, Readonly<TargetDefinition>>>;

export const SUPPORTED_SHELLS: readonly ShellType[] = ['zsh', 'bash', 'fish'];

export function isShellType(value: string): value is ShellType {
  return (SUPPORTED_SHELLS as readonly string[]).includes(value);
}

/**
 * Build the immutable target table for one shell.
 *
 * @param xdgConfigBase - Fish config root relative to the base directory (normally `.config`)
 */
export function createShellTargetTable(shell: ShellType, xdgConfigBase: string): ShellTargetTable {
  switch (shell) {
    case 'zsh':
      return Object.freeze({
        zshrc: { path: '.zshrc', description: 'Interactive shell configuration (aliases, functions, completions)' },
        zprofile: { path: '.zprofile', description: 'Login shell configuration (PATH, environment setup)' },
        zshenv: { path: '.zshenv', description: 'All shells (environment variables read by every zsh instance)' },
        zlogin: { path: '.zlogin', description: 'Login shell startup (after zshrc)' },
        zlogout: { path: '.zlogout', description: 'Login shell exit' },
        profile: { path: '.profile', description: 'Login shell (sh-compatible, read by many shells)' },
      });
    case 'bash':
      return Object.freeze({
        bashrc: { path: '.bashrc', description: 'Interactive non-login shell configuration' },
        bash_profile: { path: '.bash_profile', description: 'Login shell configuration (PATH, environment setup)' },
        profile: { path: '.profile', description: 'Login shell (sh-compatible, read by many shells)' },
        bash_login: { path: '.bash_login', description: 'Login shell startup (fallback if bash_profile missing)' },
        bash_logout: { path: '.bash_logout', description: 'Login shell exit' },
      });
    case 'fish':
      return Object.freeze({
        config: { path: join(xdgConfigBase, 'fish', 'config.fish'), description: 'Fish shell configuration' },
        'conf.d': {
          path: join(xdgConfigBase, 'fish', 'conf.d'),
          directory: true,
          extension: '.fish',
          description: 'Fish modular configs (auto-sourced .fish files in conf.d/)',
        },
      });
  }
}
