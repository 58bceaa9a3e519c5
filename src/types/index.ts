/**
 * Core types for the rcforge CLI
 */

export type ShellType = 'zsh' | 'bash' | 'fish';

/**
 * A named unit of shell configuration as declared in the manifest.
 */
export interface Module {
  name: string;
  /** Path of the module's source, relative to the config directory */
  file: string;
  requires: string[];
  /** OS names this module applies to; empty means every OS */
  os: string[];
  /** Logical destination; empty means the default target */
  target?: string;
  /** 0-100, lower sorts earlier within a target; 0 means unset */
  priority?: number;
  description?: string;
}

export interface ManifestShellConfig {
  type?: string;
}

export interface ManifestOutputConfig {
  directory?: string;
}

export interface Manifest {
  shell?: ManifestShellConfig;
  output?: ManifestOutputConfig;
  modules: Module[];
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export enum ErrorCodes {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
  NOT_FOUND = 'NOT_FOUND',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

export type NotFoundKind = 'module' | 'file' | 'manifest' | 'directory' | 'metadata';

export interface ErrorDetailsByCode {
  [ErrorCodes.VALIDATION_ERROR]: { names?: string[]; path?: string };
  [ErrorCodes.CIRCULAR_DEPENDENCY]: { modules: string[] };
  [ErrorCodes.NOT_FOUND]: { kind: NotFoundKind; name: string };
  [ErrorCodes.FILE_SYSTEM_ERROR]: { operation: string; path: string };
}

export class RcForgeError<C extends ErrorCodes = ErrorCodes> extends Error {
  public readonly code: C;
  public readonly details: ErrorDetailsByCode[C];

  constructor(message: string, code: C, details: ErrorDetailsByCode[C], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RcForgeError';
    this.code = code;
    this.details = details;
  }
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
