// ============================================================================
// @nucleocode/cli — Configuration
// ============================================================================
//
// Optional `nucleocode.config.json` in the working directory (or the file
// given with --config). Command-line flags take precedence over the file;
// NUCLEOCODE_ALIGNER overrides the aligner command.
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import {
  DEFAULT_ALPHABET,
  DEFAULT_MAX_CANDIDATES,
  DEFAULT_ROOT_CODES,
  DEFAULT_UNRESOLVED_MARKER,
  logger,
} from '@nucleocode/core';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const CONFIG_FILE_NAME = 'nucleocode.config.json';

const configSchema = z
  .object({
    alphabet: z.string().min(2).optional(),
    rootCodes: z.array(z.string().min(1)).min(1).optional(),
    maxCandidates: z.number().int().positive().optional(),
    markUnresolved: z.boolean().optional(),
    unresolvedMarker: z.string().optional(),
    aligner: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()).default([]),
      })
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof configSchema>;

export interface AlignerConfig {
  command: string;
  args: string[];
}

export interface ResolvedConfig {
  alphabet: string;
  rootCodes: string[];
  maxCandidates: number;
  markUnresolved: boolean;
  unresolvedMarker: string;
  aligner: AlignerConfig;
}

export const DEFAULT_ALIGNER: AlignerConfig = { command: 'mafft', args: ['--quiet'] };

export interface LoadConfigOptions {
  cwd?: string;
  /** Explicit config path; must exist when given. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

function readConfigFile(file: string): FileConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigError(e instanceof Error ? e.message : String(e), file);
  }
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(`${where}${issue ? issue.message : 'invalid configuration'}`, file);
  }
  return parsed.data;
}

/**
 * Load and validate the configuration, filling in defaults.
 *
 * @throws {ConfigError} If an explicit path is missing or any file fails validation.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let file: FileConfig = {};
  if (options.configPath) {
    const explicit = path.resolve(cwd, options.configPath);
    if (!existsSync(explicit)) throw new ConfigError('file not found', explicit);
    file = readConfigFile(explicit);
  } else {
    const implicit = path.join(cwd, CONFIG_FILE_NAME);
    if (existsSync(implicit)) file = readConfigFile(implicit);
  }

  const aligner: AlignerConfig = file.aligner ?? { ...DEFAULT_ALIGNER };
  if (env.NUCLEOCODE_ALIGNER) {
    logger.debug('aligner command overridden from environment', { command: env.NUCLEOCODE_ALIGNER });
    aligner.command = env.NUCLEOCODE_ALIGNER;
  }

  return {
    alphabet: file.alphabet ?? DEFAULT_ALPHABET,
    rootCodes: file.rootCodes ?? [...DEFAULT_ROOT_CODES],
    maxCandidates: file.maxCandidates ?? DEFAULT_MAX_CANDIDATES,
    markUnresolved: file.markUnresolved ?? false,
    unresolvedMarker: file.unresolvedMarker ?? DEFAULT_UNRESOLVED_MARKER,
    aligner,
  };
}
