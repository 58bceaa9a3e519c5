/**
 * Validate pipeline
 *
 * Collects every problem in a manifest instead of stopping at the first:
 * structure, targets for the shell, missing or unused sources, and cycles per OS.
 */

import { join, normalize } from 'path';
import type { ForgeContext } from '../../types/forge-context.js';
import type { Manifest } from '../../types/index.js';
import { DEFAULT_PATHS } from '../../constants/index.js';
import { isRcForgeError } from '../../utils/errors.js';
import { loadManifest, validateManifest } from '../../utils/manifest-yml.js';
import { logger } from '../../utils/logger.js';
import { resolveFileSystem } from '../ports/resolve.js';
import type { FileSystemPort } from '../ports/file-system.js';
import { Resolver } from '../graph/resolver.js';
import { TargetResolver } from '../targets/target-resolver.js';
import { getModuleTarget } from '../modules.js';
import { determineShellType } from '../build/build-pipeline.js';

export interface ValidateOptions {
  configDir: string;
  manifestPath: string;
  /** OSes to resolve the graph for; each is checked for cycles */
  osList: string[];
  shell?: string;
}

export interface ValidateReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
  moduleCount: number;
  shellType: string;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function checkTargets(manifest: Manifest, shell: string, errors: string[]): void {
  let targets: TargetResolver;
  try {
    // Only legality is checked here, so the base directory does not matter
    targets = new TargetResolver(shell, DEFAULT_PATHS.OUTPUT_DIR, { xdgConfigHome: null });
  } catch (error) {
    errors.push(describe(error));
    return;
  }
  for (const module of manifest.modules) {
    const target = getModuleTarget(module);
    if (!targets.isValidTarget(target)) {
      errors.push(`module '${module.name}' has invalid target '${target}' for shell type '${targets.shellType}'`);
    }
  }
}

/**
 * Top-level entries of the config directory that no module's file lives in.
 */
async function findUnusedEntries(fs: FileSystemPort, configDir: string, manifest: Manifest): Promise<string[]> {
  if (!(await fs.fileExists(configDir))) {
    return [];
  }
  const used = manifest.modules
    .filter(module => module.file)
    .map(module => normalize(module.file));
  const entries = await fs.listDir(configDir);
  return entries.filter(entry => !used.some(file => file === entry || file.startsWith(`${entry}/`)));
}

export async function runValidatePipeline(options: ValidateOptions, ctx?: ForgeContext): Promise<ValidateReport> {
  const fs = resolveFileSystem(ctx);
  const manifest = await loadManifest(fs, options.manifestPath);
  const shellType = determineShellType(options, manifest);

  const errors: string[] = validateManifest(manifest).map(describe);
  const warnings: string[] = [];

  checkTargets(manifest, shellType, errors);

  for (const module of manifest.modules) {
    if (!module.file) continue;
    const path = join(options.configDir, module.file);
    if (!(await fs.fileExists(path))) {
      warnings.push(`module '${module.name}' source file not found: ${path}`);
    }
  }

  for (const entry of await findUnusedEntries(fs, options.configDir, manifest)) {
    const path = join(options.configDir, entry);
    if (path !== normalize(options.manifestPath)) {
      warnings.push(`'${path}' is not used by any module`);
    }
  }

  // Graph checks only make sense once names and references are sound
  if (errors.length === 0) {
    const resolver = new Resolver();
    const graph = resolver.buildGraph(manifest);
    for (const os of options.osList) {
      try {
        const { skipped } = resolver.topologicalSort(graph, os);
        for (const entry of skipped) {
          if (entry.reason === 'dependency') {
            warnings.push(`${os}: module '${entry.name}' skipped because '${entry.missing}' does not apply`);
          }
        }
      } catch (error) {
        if (!isRcForgeError(error)) throw error;
        errors.push(`${os}: ${error.message}`);
      }
    }
  }

  logger.debug('Validation finished', { errors: errors.length, warnings: warnings.length });

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    moduleCount: manifest.modules.length,
    shellType
  };
}
