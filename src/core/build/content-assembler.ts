/**
 * Content assembly for build targets.
 *
 * Loading and rendering are separate: sources are loaded through the file
 * system port first, then rendered by pure functions.
 */

import { join } from 'path';
import type { Module, ShellType } from '../../types/index.js';
import { ErrorCodes } from '../../types/index.js';
import { GENERATOR_BANNER } from '../../constants/index.js';
import { isRcForgeError } from '../../utils/errors.js';
import { formatTimestamp } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';
import type { FileSystemPort } from '../ports/file-system.js';

export type ModuleSource =
  | { status: 'loaded'; content: string }
  | { status: 'missing'; path: string }
  | { status: 'unreadable'; path: string; reason: string };

export interface LoadedModule {
  module: Module;
  source: ModuleSource;
}

export interface HeaderInfo {
  shellType: ShellType;
  targetOS: string;
  generatedAt: Date;
}

/**
 * Load a module's source from the config directory. A missing or unreadable
 * source does not fail the build; it becomes a placeholder in the output.
 */
export async function loadModuleSource(
  fs: FileSystemPort,
  configDir: string,
  module: Module
): Promise<ModuleSource> {
  const path = join(configDir, module.file);

  if (!(await fs.fileExists(path))) {
    logger.warn(`Module '${module.name}' source not found: ${path}`);
    return { status: 'missing', path };
  }

  try {
    return { status: 'loaded', content: await fs.readFile(path) };
  } catch (error) {
    if (isRcForgeError(error, ErrorCodes.NOT_FOUND)) {
      logger.warn(`Module '${module.name}' source disappeared: ${path}`);
      return { status: 'missing', path };
    }
    const reason = error instanceof Error ? error.message : String(error);
    logger.warn(`Module '${module.name}' source unreadable: ${path}`, { reason });
    return { status: 'unreadable', path, reason };
  }
}

export async function loadModules(
  fs: FileSystemPort,
  configDir: string,
  modules: readonly Module[]
): Promise<LoadedModule[]> {
  const loaded: LoadedModule[] = [];
  for (const module of modules) {
    loaded.push({ module, source: await loadModuleSource(fs, configDir, module) });
  }
  return loaded;
}

function placeholder(name: string, source: ModuleSource): string | undefined {
  switch (source.status) {
    case 'missing':
      return `# --- ${name} --- (FILE NOT FOUND: ${source.path})`;
    case 'unreadable':
      return `# --- ${name} --- (READ ERROR: ${source.reason})`;
    case 'loaded':
      return undefined;
  }
}

function annotations(module: Module): string[] {
  const lines: string[] = [];
  if (module.description) {
    // every description line stays a comment
    for (const line of module.description.replace(/\s+$/, '').split('\n')) {
      lines.push(`# ${line}`.trimEnd());
    }
  }
  if (module.priority) {
    lines.push(`# Priority: ${module.priority}`);
  }
  return lines;
}

function body(content: string): string[] {
  const trimmed = content.replace(/\s+$/, '');
  return trimmed ? [trimmed] : [];
}

function finish(lines: string[]): string {
  return `${lines.join('\n').replace(/\n+$/, '')}\n`;
}

/**
 * Render one merged file: a shared header, then one `--- name ---` block per
 * module in the given order, blocks separated by blank lines.
 */
export function renderMergedTarget(target: string, modules: readonly LoadedModule[], header: HeaderInfo): string {
  const lines: string[] = [
    GENERATOR_BANNER,
    `# Shell: ${header.shellType}`,
    `# Target: ${target}`,
    `# OS: ${header.targetOS}`,
    `# Modules: ${modules.length}`,
    `# Generated at: ${formatTimestamp(header.generatedAt)}`,
  ];

  for (const { module, source } of modules) {
    lines.push('');
    const missing = placeholder(module.name, source);
    if (missing !== undefined) {
      lines.push(missing);
      continue;
    }
    lines.push(`# --- ${module.name} ---`, ...annotations(module));
    if (source.status === 'loaded') {
      lines.push(...body(source.content));
    }
  }

  return finish(lines);
}

/**
 * Render the standalone file of one module in a directory target.
 */
export function renderModuleFile(target: string, loaded: LoadedModule, header: HeaderInfo): string {
  const { module, source } = loaded;
  const lines: string[] = [
    GENERATOR_BANNER,
    `# Shell: ${header.shellType}`,
    `# Module: ${module.name}`,
    `# Target: ${target}`,
    `# OS: ${header.targetOS}`,
    `# Generated at: ${formatTimestamp(header.generatedAt)}`,
    '',
  ];

  const missing = placeholder(module.name, source);
  if (missing !== undefined) {
    lines.push(missing);
  } else if (source.status === 'loaded') {
    lines.push(...annotations(module), ...body(source.content));
  }

  return finish(lines);
}
