/**
 * @fileoverview Command setup for 'rcforge validate'
 */

import { Command } from 'commander';
import { DEFAULT_PATHS, FILE_PATTERNS } from '../constants/index.js';
import { runValidatePipeline } from '../core/validate/validate-pipeline.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCount } from '../utils/formatters.js';
import { detectHostOS } from '../utils/host-os.js';

interface ValidateCommandOptions {
  configDir: string;
  manifest: string;
  os?: string[];
  shell?: string;
}

/**
 * Setup the 'rcforge validate' command
 */
export function setupValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Check a manifest for structural errors, invalid targets, missing files and cycles')
    .option('-c, --config-dir <dir>', 'directory containing module files', DEFAULT_PATHS.CONFIG_DIR)
    .option('-m, --manifest <path>', 'path to the manifest file', FILE_PATTERNS.MANIFEST_YAML)
    .option('--os <names...>', 'operating systems to resolve for; defaults to the host')
    .option('--shell <type>', 'shell type: zsh, bash or fish (overrides the manifest)')
    .action(
      withErrorHandling(async (options: ValidateCommandOptions) => {
        const report = await runValidatePipeline({
          configDir: options.configDir,
          manifestPath: options.manifest,
          osList: options.os && options.os.length > 0 ? options.os : [detectHostOS()],
          shell: options.shell
        });

        for (const warning of report.warnings) {
          consoleOutput.warn(warning);
        }
        for (const error of report.errors) {
          consoleOutput.error(error);
        }

        if (!report.valid) {
          throw new Error(`Manifest is invalid (${formatCount(report.errors.length, 'error')})`);
        }
        consoleOutput.success(`Manifest is valid: ${formatCount(report.moduleCount, 'module')} for ${report.shellType}`);
      })
    );
}
