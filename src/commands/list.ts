/**
 * @fileoverview Command setup for 'rcforge list'
 *
 * Prints the build plan as a tree: targets, then modules in load order.
 */

import { Command } from 'commander';
import pc from 'picocolors';
import { FILE_PATTERNS } from '../constants/index.js';
import { runListPipeline, runListTargets, type ListResult } from '../core/list/list-pipeline.js';
import { withErrorHandling } from '../utils/errors.js';
import { getTreeConnector, getTreePrefix } from '../utils/formatters.js';
import { detectHostOS } from '../utils/host-os.js';

interface ListCommandOptions {
  manifest: string;
  os?: string;
  shell?: string;
  targets?: boolean;
}

function printPlan(result: ListResult): void {
  console.log(`${pc.bold(result.shellType)} on ${pc.bold(result.targetOS)}`);

  result.targets.forEach((target, ti) => {
    const isLastTarget = ti === result.targets.length - 1;
    const kind = target.directory ? ' (one file per module)' : '';
    console.log(`${getTreeConnector(isLastTarget)}${pc.cyan(target.target)} ${pc.dim(`→ ${target.destPath}${kind}`)}`);

    const prefix = getTreePrefix('', isLastTarget);
    target.modules.forEach((module, mi) => {
      const isLast = mi === target.modules.length - 1;
      const description = module.description ? pc.dim(` - ${module.description}`) : '';
      console.log(`${prefix}${getTreeConnector(isLast)}${module.name} ${pc.dim(`[${module.priority}]`)}${description}`);
    });
  });

  if (result.skipped.length > 0) {
    console.log(pc.dim(`\nSkipped for ${result.targetOS}: ${result.skipped.map(entry => entry.name).join(', ')}`));
  }
}

/**
 * Setup the 'rcforge list' command
 */
export function setupListCommand(program: Command): void {
  program
    .command('list')
    .description('Show modules in load order, grouped by target')
    .option('-m, --manifest <path>', 'path to the manifest file', FILE_PATTERNS.MANIFEST_YAML)
    .option('--os <name>', 'target operating system; defaults to the host')
    .option('--shell <type>', 'shell type: zsh, bash or fish (overrides the manifest)')
    .option('--targets', 'list the valid targets of the shell instead')
    .action(
      withErrorHandling(async (options: ListCommandOptions) => {
        if (options.targets) {
          const { shellType, targets } = await runListTargets({ manifestPath: options.manifest, shell: options.shell });
          console.log(pc.bold(shellType));
          for (const info of targets) {
            console.log(`${pc.cyan(info.target.padEnd(14))}${info.path.padEnd(28)}${pc.dim(info.description)}`);
          }
          return;
        }

        const result = await runListPipeline({
          manifestPath: options.manifest,
          os: options.os ?? detectHostOS(),
          shell: options.shell
        });
        printPlan(result);
      })
    );
}
