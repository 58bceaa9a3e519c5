/**
 * Forge Context Types
 *
 * Ports threaded through every pipeline so the same core logic can run
 * against the local disk (CLI) or an in-memory store (tests).
 */

import type { FileSystemPort } from '../core/ports/file-system.js';

export interface ForgeContext {
  /** Storage used for manifests, module sources and build outputs */
  fs?: FileSystemPort;

  /** Clock used for generated headers and metadata timestamps */
  now?: () => Date;
}
