// ============================================================================
// @nucleocode/cli — External Aligner
// ============================================================================
//
// Runs a sequence aligner (MAFFT by default) on a framed records file and
// captures the alignment it prints on stdout.
// ============================================================================

import { spawn } from 'node:child_process';
import { logger } from '@nucleocode/core';
import type { AlignerConfig } from './config.js';
import { AlignerError } from './errors.js';

/**
 * Run `command ...args inputPath` and resolve with its stdout.
 *
 * @throws {AlignerError} If the command cannot start or exits non-zero.
 */
export function runAligner(inputPath: string, aligner: AlignerConfig): Promise<string> {
  const t = logger.timer(`aligner ${aligner.command}`);

  return new Promise((resolve, reject) => {
    const child = spawn(aligner.command, [...aligner.args, inputPath], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';

    // Headers carry the source lines, so a chunk may end mid-character
    child.stdout.setEncoding('utf8');
    child.stderr.setEncoding('utf8');

    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });

    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', (err: NodeJS.ErrnoException) => {
      const reason = err.code === 'ENOENT' ? 'was not found on PATH' : `failed to start: ${err.message}`;
      reject(new AlignerError(aligner.command, reason));
    });

    child.on('close', (code) => {
      if (code !== 0) {
        reject(new AlignerError(aligner.command, `exited with code ${code}`, code, stderr.trim()));
        return;
      }
      t.endWith({ outputLength: stdout.length });
      resolve(stdout);
    });
  });
}
