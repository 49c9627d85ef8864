// ============================================================================
// @nucleocode/cli — Prefix-free nucleotide text codec
// ============================================================================
// Commands:
//   nucleocode compress   <file.txt> [--out base] [--roots AAA,CAA,TTT]  → base.pfc + base.pfcd
//   nucleocode decompress <file.pfc> --dict <file.pfcd> [--out file]    → text
//   nucleocode fasta      <file.txt> [--dict file.pfcd] [--out file]    → labelled records
//   nucleocode align      <file.fasta> [--out file]                     → aligner output
//   nucleocode restore    <aligned.fasta> --dict <file.pfcd> [--out file] [--mark-unresolved]
//   nucleocode stats      <file.txt> [--roots ...]                      → compression stats
//   nucleocode pipeline   <file.txt> [--out-dir dir] [--skip-align]     → all of the above
// Global: [--config nucleocode.config.json]
// ============================================================================

import { NucleocodeError } from '@nucleocode/core';
import {
  alignFile,
  compressFile,
  decompressFile,
  fastaFile,
  restoreFile,
  runPipeline,
  statsFile,
} from './commands.js';
import { type ResolvedConfig, loadConfig } from './config.js';
import { UsageError } from './errors.js';

const args = process.argv.slice(2);
const command = args[0];

function getFlag(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  return undefined;
}

function hasFlag(name: string): boolean {
  return args.includes(`--${name}`);
}

function requireInput(usage: string): string {
  const input = args[1];
  if (!input || input.startsWith('--')) throw new UsageError(`Usage: nucleocode ${usage}`);
  return input;
}

function requireFlag(name: string, usage: string): string {
  const value = getFlag(name);
  if (!value) throw new UsageError(`Missing --${name}. Usage: nucleocode ${usage}`);
  return value;
}

function rootsFlag(): string[] | undefined {
  const roots = getFlag('roots');
  if (roots === undefined) return undefined;
  return roots
    .split(',')
    .map((r) => r.trim())
    .filter((r) => r.length > 0);
}

const useColor = !hasFlag('no-color') && process.env.NO_COLOR !== '1' && process.stdout.isTTY === true;

const _c = {
  reset: useColor ? '\x1b[0m' : '',
  bold: useColor ? '\x1b[1m' : '',
  dim: useColor ? '\x1b[2m' : '',
  green: useColor ? '\x1b[32m' : '',
  red: useColor ? '\x1b[31m' : '',
};

function heading(text: string): string {
  return `${_c.bold}${text}${_c.reset}`;
}

function row(label: string, value: string | number): string {
  return `  ${_c.dim}${label.padEnd(18)}${_c.reset}${value}`;
}

function printUsage(): void {
  console.log(`
  ${heading('nucleocode')} — prefix-free nucleotide text codec

  Usage:
    nucleocode compress   <input.txt> [--out base] [--roots AAA,CAA,TTT]
    nucleocode decompress <input.pfc> --dict <input.pfcd> [--out file]
    nucleocode fasta      <input.txt> [--dict input.pfcd] [--out file.fasta] [--roots ...]
    nucleocode align      <input.fasta> [--out aligned.fasta]
    nucleocode restore    <aligned.fasta> --dict <input.pfcd> [--out file] [--mark-unresolved]
    nucleocode stats      <input.txt> [--roots ...]
    nucleocode pipeline   <input.txt> [--out-dir dir] [--skip-align] [--roots ...]

  Options:
    --config <file>   Configuration file (default: ./nucleocode.config.json)
    --no-color        Disable ANSI colors
`);
}

// ── Commands ────────────────────────────────────────────────────────────────

function cmdCompress(config: ResolvedConfig): void {
  const input = requireInput('compress <input.txt> [--out base]');
  const result = compressFile(input, { out: getFlag('out'), rootCodes: rootsFlag() }, config);
  console.log(heading('Compressed'));
  console.log(row('Encoded', result.encodedPath));
  console.log(row('Dictionary', result.dictionaryPath));
  console.log(row('Symbols', result.symbols));
  console.log(row('Ratio', result.stats.ratio.toFixed(4)));
}

function cmdDecompress(): void {
  const usage = 'decompress <input.pfc> --dict <input.pfcd> [--out file]';
  const input = requireInput(usage);
  const dict = requireFlag('dict', usage);
  const out = getFlag('out');
  const text = decompressFile(input, dict, out);
  if (out) {
    console.log(`${_c.green}Decoded${_c.reset} → ${out}`);
  } else {
    process.stdout.write(text);
  }
}

function cmdStats(config: ResolvedConfig): void {
  const input = requireInput('stats <input.txt> [--roots ...]');
  const stats = statsFile(input, config, rootsFlag());
  console.log(heading(`Stats for ${input}`));
  console.log(row('Symbols', stats.symbols));
  console.log(row('Longest code', stats.maxCodeLength));
  console.log(row('Text bytes', stats.textBytes));
  console.log(row('Encoded bytes', stats.encodedBytes));
  console.log(row('Dictionary bytes', stats.dictionaryBytes));
  console.log(row('Ratio', stats.ratio.toFixed(4)));
}

function cmdFasta(config: ResolvedConfig): void {
  const input = requireInput('fasta <input.txt> [--dict input.pfcd] [--out file.fasta]');
  const result = fastaFile(
    input,
    { dictionaryPath: getFlag('dict'), out: getFlag('out'), rootCodes: rootsFlag() },
    config,
  );
  console.log(heading('Records written'));
  console.log(row('Records', result.records));
  console.log(row('FASTA', result.fastaPath));
  console.log(row('Dictionary', result.dictionaryPath));
}

async function cmdAlign(config: ResolvedConfig): Promise<void> {
  const input = requireInput('align <input.fasta> [--out aligned.fasta]');
  const outputPath = await alignFile(input, config, getFlag('out'));
  console.log(`${_c.green}Aligned${_c.reset} → ${outputPath}`);
}

function cmdRestore(config: ResolvedConfig): void {
  const usage = 'restore <aligned.fasta> --dict <input.pfcd> [--out file] [--mark-unresolved]';
  const input = requireInput(usage);
  const dict = requireFlag('dict', usage);
  const result = restoreFile(
    input,
    dict,
    { out: getFlag('out'), markUnresolved: hasFlag('mark-unresolved') || undefined },
    config,
  );
  console.log(`${_c.green}Restored${_c.reset} → ${result.outputPath}`);
}

async function cmdPipeline(config: ResolvedConfig): Promise<void> {
  const input = requireInput('pipeline <input.txt> [--out-dir dir] [--skip-align]');
  const result = await runPipeline(
    input,
    { outDir: getFlag('out-dir'), skipAlign: hasFlag('skip-align'), rootCodes: rootsFlag() },
    config,
  );
  console.log(heading('Pipeline complete'));
  console.log(row('Encoded', result.compress.encodedPath));
  console.log(row('Dictionary', result.compress.dictionaryPath));
  console.log(row('FASTA', result.fastaPath));
  if (result.alignedPath) console.log(row('Aligned', result.alignedPath));
  if (result.restoredPath) console.log(row('Restored', result.restoredPath));
  console.log(row('Ratio', result.compress.stats.ratio.toFixed(4)));
}

// ── Main ────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  if (!command || command === 'help' || hasFlag('help')) {
    printUsage();
    return;
  }

  const config = loadConfig({ configPath: getFlag('config') });

  switch (command) {
    case 'compress':
      cmdCompress(config);
      break;
    case 'decompress':
      cmdDecompress();
      break;
    case 'stats':
      cmdStats(config);
      break;
    case 'fasta':
      cmdFasta(config);
      break;
    case 'align':
      await cmdAlign(config);
      break;
    case 'restore':
      cmdRestore(config);
      break;
    case 'pipeline':
      await cmdPipeline(config);
      break;
    default:
      throw new UsageError(`Unknown command "${command}". Run "nucleocode help" for usage.`);
  }
}

main().catch((err: unknown) => {
  if (err instanceof NucleocodeError) {
    console.error(`${_c.red}${err.name}${_c.reset}: ${err.message}`);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
