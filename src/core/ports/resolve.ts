/**
 * Port Resolution Helpers
 *
 * Resolve ports from a ForgeContext, falling back to the Node/console defaults
 * when they are not explicitly provided.
 */

import type { ForgeContext } from '../../types/forge-context.js';
import type { FileSystemPort } from './file-system.js';
import { nodeFileSystem } from './node-file-system.js';

export function resolveFileSystem(ctx?: ForgeContext): FileSystemPort {
  return ctx?.fs ?? nodeFileSystem;
}

export function resolveClock(ctx?: ForgeContext): () => Date {
  return ctx?.now ?? (() => new Date());
}
