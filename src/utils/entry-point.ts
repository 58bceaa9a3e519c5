import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';

function realPath(path: string): string | undefined {
  try {
    return realpathSync(path);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

/**
 * Whether the script node was started with is the module at `moduleUrl`.
 * Symlinks are followed, so an npm bin link to the module counts.
 */
export function isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
  if (!scriptPath) {
    return false;
  }
  const script = realPath(scriptPath);
  return script !== undefined && script === realPath(fileURLToPath(moduleUrl));
}
