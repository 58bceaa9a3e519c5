/**
 * Console Output Adapter
 *
 * Plain console.log-based implementation of OutputPort.
 * Safe for CI/CD pipelines and headless environments.
 */

import pc from 'picocolors';
import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`${pc.green('✓')} ${message}`);
  },

  error(message: string): void {
    console.log(`${pc.red('✗')} ${message}`);
  },

  warn(message: string): void {
    console.log(`${pc.yellow('⚠')} ${message}`);
  },

  note(content: string, title?: string): void {
    if (title) {
      console.log(`\n${pc.bold(title)}\n${content}`);
    } else {
      console.log(`\n${content}`);
    }
  },
};
