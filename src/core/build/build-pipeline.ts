/**
 * Build pipeline
 *
 * parse manifest -> resolve dependencies -> group by target -> assemble and
 * write each target -> write metadata. Every stage runs to completion before
 * the next starts; the first fatal error aborts the build without rollback.
 */

import { join } from 'path';
import type { Manifest, ShellType } from '../../types/index.js';
import type { ForgeContext } from '../../types/forge-context.js';
import { DEFAULT_PATHS, DEFAULT_SHELL } from '../../constants/index.js';
import { ValidationError, wrapError } from '../../utils/errors.js';
import { expandTilde, getHomeDirectory } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { loadManifest, validateModuleFields } from '../../utils/manifest-yml.js';
import { resolveClock, resolveFileSystem } from '../ports/resolve.js';
import type { FileSystemPort } from '../ports/file-system.js';
import { Resolver, type SkippedModule, type SortResult } from '../graph/resolver.js';
import { TargetResolver } from '../targets/target-resolver.js';
import { sanitizeModuleName } from '../modules.js';
import { planTargetGroups, type TargetGroup } from './module-grouping.js';
import { loadModules, renderMergedTarget, renderModuleFile, type HeaderInfo } from './content-assembler.js';
import {
  createBuildMetadata,
  getBuildMetadataPath,
  serializeBuildMetadata,
  type BuildFileInfo,
  type BuildMetadata
} from './build-metadata.js';

export interface BuildOptions {
  /** Directory module `file` paths are relative to */
  configDir: string;
  manifestPath: string;
  /** Target OS used to filter modules */
  os: string;
  /** Assemble everything but write nothing */
  dryRun?: boolean;
  /** Overrides the manifest's output directory */
  outputDir?: string;
  /** Overrides the manifest's shell type */
  shell?: string;
  /** Build only these targets */
  targets?: string[];
  /** Directory substituted for `~` in the output directory */
  homeDir?: string;
}

export interface BuiltFile {
  target: string;
  /** Full path the file is (or would be) written to */
  path: string;
  /** Path relative to the output directory; also its home-relative destination */
  relativePath: string;
  content: string;
  moduleNames: string[];
}

export interface BuildResult {
  shellType: ShellType;
  targetOS: string;
  outputDir: string;
  generatedAt: Date;
  files: BuiltFile[];
  moduleCount: number;
  skipped: SkippedModule[];
  metadata: BuildMetadata;
  /** Where metadata was written; undefined on dry runs */
  metadataPath?: string;
  dryRun: boolean;
}

export function determineShellType(options: Pick<BuildOptions, 'shell'>, manifest: Manifest): string {
  return (options.shell || manifest.shell?.type || DEFAULT_SHELL).toLowerCase();
}

export function determineOutputDir(options: Pick<BuildOptions, 'outputDir' | 'homeDir'>, manifest: Manifest): string {
  const configured = options.outputDir || manifest.output?.directory || DEFAULT_PATHS.OUTPUT_DIR;
  return expandTilde(configured, options.homeDir ?? getHomeDirectory());
}

/**
 * Parse and structurally check a manifest, then resolve it for one OS.
 * Shared by build, list and validate.
 */
export async function resolveManifest(
  fs: FileSystemPort,
  manifestPath: string,
  targetOS: string
): Promise<{ manifest: Manifest; sorted: SortResult }> {
  let manifest: Manifest;
  try {
    manifest = await loadManifest(fs, manifestPath);
    const [firstProblem] = validateModuleFields(manifest);
    if (firstProblem) {
      throw firstProblem;
    }
  } catch (error) {
    throw wrapError('failed to parse manifest', error);
  }

  const resolver = new Resolver();
  let graph;
  try {
    graph = resolver.buildGraph(manifest);
  } catch (error) {
    throw wrapError('failed to build dependency graph', error);
  }

  try {
    return { manifest, sorted: resolver.topologicalSort(graph, targetOS) };
  } catch (error) {
    throw wrapError('failed to resolve dependencies', error);
  }
}

/**
 * Fail when two modules of a directory target would share one file name.
 */
export function checkDirectoryFileNames(groups: readonly TargetGroup[], targets: TargetResolver): void {
  for (const group of groups) {
    if (!targets.isDirectoryTarget(group.target)) continue;
    const extension = targets.getDirectoryExtension(group.target);
    const owners = new Map<string, string>();
    for (const module of group.modules) {
      const fileName = `${sanitizeModuleName(module.name)}${extension}`;
      const owner = owners.get(fileName);
      if (owner !== undefined) {
        throw new ValidationError(
          `modules '${owner}' and '${module.name}' both map to '${fileName}' in target '${group.target}'`,
          { names: [owner, module.name] }
        );
      }
      owners.set(fileName, module.name);
    }
  }
}

async function writeOutput(fs: FileSystemPort, file: BuiltFile): Promise<void> {
  try {
    await fs.writeFile(file.path, file.content);
  } catch (error) {
    throw wrapError(`failed to write target '${file.target}'`, error);
  }
  logger.debug(`Wrote ${file.target} -> ${file.path}`);
}

async function assembleGroup(
  fs: FileSystemPort,
  group: TargetGroup,
  configDir: string,
  targets: TargetResolver,
  header: HeaderInfo
): Promise<BuiltFile[]> {
  const loaded = await loadModules(fs, configDir, group.modules);

  if (!targets.isDirectoryTarget(group.target)) {
    const relativePath = targets.getRelativePath(group.target);
    return [{
      target: group.target,
      path: targets.resolve(group.target),
      relativePath,
      content: renderMergedTarget(group.target, loaded, header),
      moduleNames: group.modules.map(module => module.name)
    }];
  }

  const directory = targets.resolve(group.target);
  const relativeDir = targets.getRelativePath(group.target);
  const extension = targets.getDirectoryExtension(group.target);

  return loaded.map(entry => {
    const fileName = `${sanitizeModuleName(entry.module.name)}${extension}`;
    return {
      target: group.target,
      path: join(directory, fileName),
      relativePath: join(relativeDir, fileName),
      content: renderModuleFile(group.target, entry, header),
      moduleNames: [entry.module.name]
    };
  });
}

/**
 * Build every target of the manifest for one OS.
 */
export async function runBuildPipeline(options: BuildOptions, ctx?: ForgeContext): Promise<BuildResult> {
  const fs = resolveFileSystem(ctx);
  const generatedAt = resolveClock(ctx)();
  const dryRun = options.dryRun === true;

  logger.debug('Build stage: parse manifest / resolve dependencies', { manifest: options.manifestPath, os: options.os });
  const { manifest, sorted } = await resolveManifest(fs, options.manifestPath, options.os);

  const shell = determineShellType(options, manifest);
  const outputDir = determineOutputDir(options, manifest);

  logger.debug('Build stage: group by target', { shell, outputDir });
  let targets: TargetResolver;
  let groups: TargetGroup[];
  try {
    targets = new TargetResolver(shell, outputDir);
    targets.validateTargets(sorted.modules);
    groups = planTargetGroups(sorted.modules, targets, options.targets);
    checkDirectoryFileNames(groups, targets);
  } catch (error) {
    throw wrapError('failed to validate targets', error);
  }

  const header: HeaderInfo = { shellType: targets.shellType, targetOS: options.os, generatedAt };
  const files: BuiltFile[] = [];
  let moduleCount = 0;

  for (const group of groups) {
    logger.debug(`Build stage: assemble ${group.target}`, { modules: group.modules.map(module => module.name) });
    const built = await assembleGroup(fs, group, options.configDir, targets, header);
    moduleCount += group.modules.length;

    if (!dryRun) {
      for (const file of built) {
        await writeOutput(fs, file);
      }
    }
    files.push(...built);
  }

  const metaFiles: BuildFileInfo[] = files.map(file => ({
    source: file.relativePath,
    target: file.target,
    dest_path: file.relativePath
  }));
  const metadata = createBuildMetadata(targets.shellType, options.os, generatedAt, metaFiles);

  let metadataPath: string | undefined;
  if (!dryRun) {
    metadataPath = getBuildMetadataPath(outputDir);
    try {
      await fs.writeFile(metadataPath, serializeBuildMetadata(metadata));
    } catch (error) {
      throw wrapError('failed to write build metadata', error);
    }
    logger.debug(`Wrote build metadata: ${metadataPath}`);
  }

  return {
    shellType: targets.shellType,
    targetOS: options.os,
    outputDir,
    generatedAt,
    files,
    moduleCount,
    skipped: sorted.skipped,
    metadata,
    metadataPath,
    dryRun
  };
}
