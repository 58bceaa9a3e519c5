/**
 * Deploy pipeline
 *
 * Copies built files to their real destinations as recorded in the build
 * metadata. Per-file failures are recorded and do not stop the other files.
 */

import { join } from 'path';
import type { ForgeContext } from '../../types/forge-context.js';
import { ErrorCodes } from '../../types/index.js';
import { DEFAULT_PATHS, FILE_PATTERNS } from '../../constants/index.js';
import { NotFoundError, isRcForgeError } from '../../utils/errors.js';
import { formatBackupTimestamp } from '../../utils/formatters.js';
import { getHomeDirectory, isPathInside } from '../../utils/home-directory.js';
import { logger } from '../../utils/logger.js';
import { resolveClock, resolveFileSystem } from '../ports/resolve.js';
import { getBuildMetadataPath, parseBuildMetadata, type BuildMetadata } from '../build/build-metadata.js';

export interface DeployOptions {
  buildDir?: string;
  homeDir?: string;
  dryRun?: boolean;
  /** Copy an existing destination aside before overwriting it */
  backup?: boolean;
}

export type DeployStatus = 'deployed' | 'skipped' | 'failed';

export interface DeployedFile {
  target: string;
  sourcePath: string;
  destPath: string;
  status: DeployStatus;
  backupPath?: string;
  error?: string;
}

export interface DeployResult {
  metadata: BuildMetadata;
  files: DeployedFile[];
  deployedCount: number;
  skippedCount: number;
  errorCount: number;
}

export function getBackupPath(path: string, at: Date): string {
  return `${path}${FILE_PATTERNS.BACKUP_INFIX}${formatBackupTimestamp(at)}`;
}

async function readMetadata(ctx: ForgeContext | undefined, buildDir: string): Promise<BuildMetadata> {
  const fs = resolveFileSystem(ctx);
  if (!(await fs.fileExists(buildDir))) {
    throw new NotFoundError(
      'directory',
      buildDir,
      `build directory not found: ${buildDir} (run 'rcforge build' first)`
    );
  }

  const metadataPath = getBuildMetadataPath(buildDir);
  let content: string;
  try {
    content = await fs.readFile(metadataPath);
  } catch (error) {
    if (isRcForgeError(error, ErrorCodes.NOT_FOUND)) {
      throw new NotFoundError(
        'metadata',
        metadataPath,
        `build metadata not found: ${metadataPath} (run 'rcforge build' first)`
      );
    }
    throw error;
  }
  return parseBuildMetadata(content, metadataPath);
}

export async function runDeployPipeline(options: DeployOptions = {}, ctx?: ForgeContext): Promise<DeployResult> {
  const fs = resolveFileSystem(ctx);
  const now = resolveClock(ctx)();
  const buildDir = options.buildDir ?? DEFAULT_PATHS.OUTPUT_DIR;
  const homeDir = options.homeDir ?? getHomeDirectory();

  const metadata = await readMetadata(ctx, buildDir);
  const files: DeployedFile[] = [];

  for (const entry of metadata.files) {
    const sourcePath = join(buildDir, entry.source);
    const destPath = join(homeDir, entry.dest_path);
    const deployed: DeployedFile = { target: entry.target, sourcePath, destPath, status: 'skipped' };
    files.push(deployed);

    if (!isPathInside(entry.source, buildDir) || !isPathInside(entry.dest_path, homeDir)) {
      deployed.status = 'failed';
      deployed.error = `refusing path outside its base: ${entry.source} -> ${entry.dest_path}`;
      logger.warn(deployed.error);
      continue;
    }

    if (options.dryRun) {
      continue;
    }

    try {
      if (options.backup && (await fs.fileExists(destPath))) {
        const backupPath = getBackupPath(destPath, now);
        await fs.copy(destPath, backupPath);
        deployed.backupPath = backupPath;
      }
      await fs.copy(sourcePath, destPath);
      deployed.status = 'deployed';
      logger.debug(`Deployed ${sourcePath} -> ${destPath}`);
    } catch (error) {
      deployed.status = 'failed';
      deployed.error = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to deploy ${sourcePath}`, { error: deployed.error });
    }
  }

  return {
    metadata,
    files,
    deployedCount: files.filter(file => file.status === 'deployed').length,
    skippedCount: files.filter(file => file.status === 'skipped').length,
    errorCount: files.filter(file => file.status === 'failed').length
  };
}
