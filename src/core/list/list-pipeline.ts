/**
 * List pipeline
 *
 * Shows what a build would produce for one OS: targets in build order and the
 * modules inside each, without reading module sources.
 */

import type { ForgeContext } from '../../types/forge-context.js';
import type { Manifest } from '../../types/index.js';
import { wrapError } from '../../utils/errors.js';
import { loadManifest } from '../../utils/manifest-yml.js';
import { resolveFileSystem } from '../ports/resolve.js';
import type { SkippedModule } from '../graph/resolver.js';
import { TargetResolver } from '../targets/target-resolver.js';
import { getModulePriority } from '../modules.js';
import { planTargetGroups } from '../build/module-grouping.js';
import { determineOutputDir, determineShellType, resolveManifest } from '../build/build-pipeline.js';

export interface ListOptions {
  manifestPath: string;
  os: string;
  shell?: string;
  homeDir?: string;
}

export interface ListedModule {
  name: string;
  priority: number;
  description?: string;
  requires: string[];
}

export interface ListedTarget {
  target: string;
  destPath: string;
  directory: boolean;
  description: string;
  modules: ListedModule[];
}

export interface ListResult {
  shellType: string;
  targetOS: string;
  targets: ListedTarget[];
  skipped: SkippedModule[];
}

export interface TargetInfo {
  target: string;
  path: string;
  directory: boolean;
  description: string;
}

export async function runListPipeline(options: ListOptions, ctx?: ForgeContext): Promise<ListResult> {
  const fs = resolveFileSystem(ctx);
  const { manifest, sorted } = await resolveManifest(fs, options.manifestPath, options.os);
  const shell = determineShellType(options, manifest);

  let targets: TargetResolver;
  try {
    targets = new TargetResolver(shell, determineOutputDir({ homeDir: options.homeDir }, manifest));
    targets.validateTargets(sorted.modules);
  } catch (error) {
    throw wrapError('failed to validate targets', error);
  }

  return {
    shellType: targets.shellType,
    targetOS: options.os,
    targets: planTargetGroups(sorted.modules, targets).map(group => ({
      target: group.target,
      destPath: targets.getRelativePath(group.target),
      directory: targets.isDirectoryTarget(group.target),
      description: targets.getTargetDescription(group.target),
      modules: group.modules.map(module => ({
        name: module.name,
        priority: getModulePriority(module),
        description: module.description,
        requires: module.requires
      }))
    })),
    skipped: sorted.skipped
  };
}

/**
 * Legal targets of the effective shell: the explicit shell, else the
 * manifest's, else the default when there is no manifest.
 */
export async function runListTargets(
  options: Pick<ListOptions, 'manifestPath' | 'shell'>,
  ctx?: ForgeContext
): Promise<{ shellType: string; targets: TargetInfo[] }> {
  const fs = resolveFileSystem(ctx);
  const manifest: Manifest = !options.shell && (await fs.fileExists(options.manifestPath))
    ? await loadManifest(fs, options.manifestPath)
    : { modules: [] };
  const shellType = determineShellType(options, manifest);
  return { shellType, targets: listShellTargets(shellType) };
}

/**
 * Legal targets of a shell with their home-relative paths.
 */
export function listShellTargets(shell: string): TargetInfo[] {
  const targets = new TargetResolver(shell, '', { xdgConfigHome: null });
  return targets.getValidTargets().map(target => ({
    target,
    path: targets.getRelativePath(target),
    directory: targets.isDirectoryTarget(target),
    description: targets.getTargetDescription(target)
  }));
}
