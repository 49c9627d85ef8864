// ============================================================================
// @nucleocode/cli — Error Types
// ============================================================================

import { NucleocodeError } from '@nucleocode/core';

/**
 * Thrown for a missing argument or an unknown command.
 */
export class UsageError extends NucleocodeError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Thrown when the configuration file cannot be read or fails validation.
 */
export class ConfigError extends NucleocodeError {
  public readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `Config ${path}: ${message}` : message);
    this.name = 'ConfigError';
    this.path = path;
  }
}

/**
 * Thrown when the external aligner cannot be started or exits with an error.
 */
export class AlignerError extends NucleocodeError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(command: string, message: string, exitCode: number | null = null, stderr = '') {
    super(`Aligner "${command}" ${message}`);
    this.name = 'AlignerError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
