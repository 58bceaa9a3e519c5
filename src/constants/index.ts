/**
 * Shared constants for the rcforge CLI
 * Single source of truth for default paths, file names and module defaults.
 */

export const FILE_PATTERNS = {
  MANIFEST_YAML: 'manifest.yaml',
  /** Build metadata written inside the output directory for the deploy step */
  BUILD_METADATA_JSON: '.rcforge-build.json',
  BACKUP_INFIX: '.backup.',
} as const;

export const DEFAULT_PATHS = {
  CONFIG_DIR: 'modules',
  OUTPUT_DIR: './build',
  /** Fish config root when XDG_CONFIG_HOME is unset or unusable */
  XDG_CONFIG: '.config',
} as const;

export const MODULE_DEFAULTS = {
  TARGET: 'zshrc',
  PRIORITY: 50,
  MIN_PRIORITY: 0,
  MAX_PRIORITY: 100,
} as const;

export const DEFAULT_SHELL = 'zsh' as const;

export const GENERATOR_BANNER = '# Generated by rcforge' as const;
