/**
 * @fileoverview Command setup for 'rcforge build'
 *
 * Assembles shell startup files from the manifest's modules.
 */

import { Command } from 'commander';
import pc from 'picocolors';
import { DEFAULT_PATHS, FILE_PATTERNS } from '../constants/index.js';
import { runBuildPipeline, type BuildResult } from '../core/build/build-pipeline.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';
import { withErrorHandling } from '../utils/errors.js';
import { formatCount, formatPathForDisplay } from '../utils/formatters.js';
import { detectHostOS } from '../utils/host-os.js';

interface BuildCommandOptions {
  configDir: string;
  manifest: string;
  os?: string;
  outputDir?: string;
  shell?: string;
  target?: string[];
  home?: string;
  dryRun?: boolean;
}

function reportBuild(result: BuildResult, output: OutputPort): void {
  for (const entry of result.skipped) {
    if (entry.reason === 'dependency') {
      output.warn(`Skipped '${entry.name}': requires '${entry.missing}', which does not apply to ${result.targetOS}`);
    }
  }

  if (result.dryRun) {
    for (const file of result.files) {
      output.note(file.content, pc.dim(`--- ${formatPathForDisplay(file.path)} (${file.target}) ---`));
    }
    output.info(`\nDry run: ${formatCount(result.files.length, 'file')} not written`);
    return;
  }

  for (const file of result.files) {
    output.success(`${file.target} ${pc.dim('→')} ${formatPathForDisplay(file.path)} ${pc.dim(`(${formatCount(file.moduleNames.length, 'module')})`)}`);
  }
  output.info(
    `Built ${formatCount(result.moduleCount, 'module')} for ${result.shellType} on ${result.targetOS} into ${formatPathForDisplay(result.outputDir)}`
  );
}

/**
 * Setup the 'rcforge build' command
 */
export function setupBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Build shell configuration files from modules')
    .option('-c, --config-dir <dir>', 'directory containing module files', DEFAULT_PATHS.CONFIG_DIR)
    .option('-m, --manifest <path>', 'path to the manifest file', FILE_PATTERNS.MANIFEST_YAML)
    .option('--os <name>', 'target operating system (Mac, Linux, ...); defaults to the host')
    .option('-o, --output-dir <dir>', 'output directory (overrides the manifest)')
    .option('--shell <type>', 'shell type: zsh, bash or fish (overrides the manifest)')
    .option('-t, --target <names...>', 'build only these targets')
    .option('--home <dir>', 'home directory used to expand ~')
    .option('--dry-run', 'print the generated files instead of writing them')
    .action(
      withErrorHandling(async (options: BuildCommandOptions) => {
        const result = await runBuildPipeline({
          configDir: options.configDir,
          manifestPath: options.manifest,
          os: options.os ?? detectHostOS(),
          dryRun: options.dryRun,
          outputDir: options.outputDir,
          shell: options.shell,
          targets: options.target,
          homeDir: options.home
        });
        reportBuild(result, consoleOutput);
      })
    );
}
