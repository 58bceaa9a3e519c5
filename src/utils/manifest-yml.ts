import * as yaml from 'js-yaml';
import type { Manifest, Module } from '../types/index.js';
import { ErrorCodes } from '../types/index.js';
import { MODULE_DEFAULTS } from '../constants/index.js';
import type { FileSystemPort } from '../core/ports/file-system.js';
import { NotFoundError, ValidationError, isRcForgeError } from './errors.js';

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(record: YamlRecord, key: string, where: string, source: string): string | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${source}: ${where} '${key}' must be a string`, { path: source });
  }
  return value;
}

function stringList(record: YamlRecord, key: string, where: string, source: string): string[] {
  const value = record[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError(`${source}: ${where} '${key}' must be a list of strings`, { path: source });
  }
  return value;
}

function optionalInteger(record: YamlRecord, key: string, where: string, source: string): number | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${source}: ${where} '${key}' must be an integer`, { path: source });
  }
  return value;
}

function parseModule(raw: unknown, index: number, source: string): Module {
  const where = `modules[${index}]`;
  if (!isRecord(raw)) {
    throw new ValidationError(`${source}: ${where} must be a mapping`, { path: source });
  }
  return {
    name: optionalString(raw, 'name', where, source) ?? '',
    file: optionalString(raw, 'file', where, source) ?? '',
    requires: stringList(raw, 'requires', where, source),
    os: stringList(raw, 'os', where, source),
    target: optionalString(raw, 'target', where, source),
    priority: optionalInteger(raw, 'priority', where, source),
    description: optionalString(raw, 'description', where, source)
  };
}

/**
 * Parse manifest YAML text. Unknown keys are ignored; known keys are type checked.
 *
 * @param source - Path or label used in error messages
 */
export function parseManifestContent(content: string, source: string): Manifest {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`failed to parse YAML in ${source}: ${reason}`, { path: source });
  }

  if (parsed === undefined || parsed === null) {
    return { modules: [] };
  }
  if (!isRecord(parsed)) {
    throw new ValidationError(`${source}: manifest must be a mapping`, { path: source });
  }

  const manifest: Manifest = { modules: [] };

  if (parsed.shell !== undefined && parsed.shell !== null) {
    if (!isRecord(parsed.shell)) {
      throw new ValidationError(`${source}: 'shell' must be a mapping`, { path: source });
    }
    manifest.shell = { type: optionalString(parsed.shell, 'type', 'shell', source) };
  }

  if (parsed.output !== undefined && parsed.output !== null) {
    if (!isRecord(parsed.output)) {
      throw new ValidationError(`${source}: 'output' must be a mapping`, { path: source });
    }
    manifest.output = { directory: optionalString(parsed.output, 'directory', 'output', source) };
  }

  if (parsed.modules !== undefined && parsed.modules !== null) {
    if (!Array.isArray(parsed.modules)) {
      throw new ValidationError(`${source}: 'modules' must be a list`, { path: source });
    }
    manifest.modules = parsed.modules.map((raw: unknown, index: number) => parseModule(raw, index, source));
  }

  return manifest;
}

/**
 * Load and parse a manifest file through the file system port.
 */
export async function loadManifest(fs: FileSystemPort, manifestPath: string): Promise<Manifest> {
  let content: string;
  try {
    content = await fs.readFile(manifestPath);
  } catch (error) {
    if (isRcForgeError(error, ErrorCodes.NOT_FOUND)) {
      throw new NotFoundError('manifest', manifestPath, `manifest not found: ${manifestPath}`);
    }
    throw error;
  }
  return parseManifestContent(content, manifestPath);
}

/**
 * Check the per-module fields: name and file present, priority within 0-100.
 * Duplicates and references are left to the resolver.
 */
export function validateModuleFields(manifest: Manifest): ValidationError[] {
  const errors: ValidationError[] = [];

  manifest.modules.forEach((module, index) => {
    if (!module.name) {
      errors.push(new ValidationError(`module #${index + 1} is missing 'name'`));
      return;
    }
    if (!module.file) {
      errors.push(new ValidationError(`module '${module.name}' is missing 'file'`, { names: [module.name] }));
    }
    const priority = module.priority;
    if (priority !== undefined && (priority < MODULE_DEFAULTS.MIN_PRIORITY || priority > MODULE_DEFAULTS.MAX_PRIORITY)) {
      errors.push(new ValidationError(
        `module '${module.name}' has priority ${priority} outside ${MODULE_DEFAULTS.MIN_PRIORITY}-${MODULE_DEFAULTS.MAX_PRIORITY}`,
        { names: [module.name] }
      ));
    }
  });

  return errors;
}

/**
 * Collect every structural problem in a manifest, including duplicate names
 * and references to modules that do not exist. Never throws.
 */
export function validateManifest(manifest: Manifest): ValidationError[] {
  const errors = validateModuleFields(manifest);
  const seen = new Set<string>();
  const names = new Set(manifest.modules.map(module => module.name));

  for (const module of manifest.modules) {
    if (!module.name) continue;
    if (seen.has(module.name)) {
      errors.push(new ValidationError(`duplicate module name: ${module.name}`, { names: [module.name] }));
    }
    seen.add(module.name);

    for (const dependency of module.requires) {
      if (!names.has(dependency)) {
        errors.push(new ValidationError(
          `module '${module.name}' requires non-existent module '${dependency}'`,
          { names: [module.name, dependency] }
        ));
      }
    }
  }

  return errors;
}
