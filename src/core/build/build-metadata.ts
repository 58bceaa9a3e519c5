/**
 * Build metadata: the record of which build file goes to which destination.
 * It is the only contract between `build` and `deploy`; fields are only ever added.
 */

import { join } from 'path';
import { FILE_PATTERNS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';
import { formatTimestamp } from '../../utils/formatters.js';

export interface BuildFileInfo {
  /** Path of the built file relative to the build directory */
  source: string;
  /** Logical target name, e.g. `zshrc` or `conf.d` */
  target: string;
  /** Destination path relative to the home directory */
  dest_path: string;
}

export interface BuildMetadata {
  shell: string;
  os: string;
  generated_at: string;
  files: BuildFileInfo[];
}

export function createBuildMetadata(shell: string, os: string, generatedAt: Date, files: BuildFileInfo[]): BuildMetadata {
  return {
    shell,
    os,
    generated_at: formatTimestamp(generatedAt),
    files
  };
}

export function getBuildMetadataPath(buildDir: string): string {
  return join(buildDir, FILE_PATTERNS.BUILD_METADATA_JSON);
}

export function serializeBuildMetadata(metadata: BuildMetadata): string {
  return `${JSON.stringify(metadata, null, 2)}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string, where: string): string {
  const value = record[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`build metadata ${where}: '${key}' must be a string`);
  }
  return value;
}

/**
 * Parse and check a metadata document. Unknown fields are ignored so older
 * deploys keep working against newer builds.
 */
export function parseBuildMetadata(content: string, source: string = FILE_PATTERNS.BUILD_METADATA_JSON): BuildMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`invalid build metadata in ${source}: ${reason}`, { path: source });
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.files)) {
    throw new ValidationError(`invalid build metadata in ${source}: expected an object with a 'files' list`, { path: source });
  }

  const files = parsed.files.map((entry: unknown, index: number): BuildFileInfo => {
    const where = `files[${index}]`;
    if (!isRecord(entry)) {
      throw new ValidationError(`build metadata ${where} must be an object`, { path: source });
    }
    return {
      source: readString(entry, 'source', where),
      target: readString(entry, 'target', where),
      dest_path: readString(entry, 'dest_path', where)
    };
  });

  return {
    shell: typeof parsed.shell === 'string' ? parsed.shell : '',
    os: typeof parsed.os === 'string' ? parsed.os : '',
    generated_at: typeof parsed.generated_at === 'string' ? parsed.generated_at : '',
    files
  };
}
