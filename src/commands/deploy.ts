/**
 * @fileoverview Command setup for 'rcforge deploy'
 *
 * Copies built files to the destinations recorded by the last build.
 */

import { Command } from 'commander';
import pc from 'picocolors';
import { DEFAULT_PATHS } from '../constants/index.js';
import { runDeployPipeline } from '../core/deploy/deploy-pipeline.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCount, formatPathForDisplay } from '../utils/formatters.js';

interface DeployCommandOptions {
  buildDir: string;
  home?: string;
  dryRun?: boolean;
  backup?: boolean;
}

/**
 * Setup the 'rcforge deploy' command
 */
export function setupDeployCommand(program: Command): void {
  program
    .command('deploy')
    .description('Copy built files to their destinations')
    .option('-b, --build-dir <dir>', 'build output directory', DEFAULT_PATHS.OUTPUT_DIR)
    .option('--home <dir>', 'home directory to deploy into')
    .option('--dry-run', 'show what would be copied')
    .option('--backup', 'copy existing files aside before overwriting them')
    .action(
      withErrorHandling(async (options: DeployCommandOptions) => {
        const result = await runDeployPipeline({
          buildDir: options.buildDir,
          homeDir: options.home,
          dryRun: options.dryRun,
          backup: options.backup
        });

        for (const file of result.files) {
          const line = `${formatPathForDisplay(file.sourcePath)} ${pc.dim('→')} ${formatPathForDisplay(file.destPath)}`;
          switch (file.status) {
            case 'deployed':
              consoleOutput.success(file.backupPath ? `${line} ${pc.dim(`(backup: ${formatPathForDisplay(file.backupPath)})`)}` : line);
              break;
            case 'skipped':
              consoleOutput.info(`${pc.dim('~')} ${line}`);
              break;
            case 'failed':
              consoleOutput.error(`${line}: ${file.error ?? 'unknown error'}`);
              break;
          }
        }

        if (result.errorCount > 0) {
          throw new Error(`Deploy finished with ${formatCount(result.errorCount, 'error')}`);
        }
        const summary = options.dryRun
          ? `Dry run: ${formatCount(result.skippedCount, 'file')} would be deployed`
          : `Deployed ${formatCount(result.deployedCount, 'file')}`;
        consoleOutput.info(summary);
      })
    );
}
