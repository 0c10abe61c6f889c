/**
 * Command-line front end: argument parsing, scan dispatch, report output
 */
import { existsSync, statSync, writeFileSync } from 'node:fs';
import { ZodError } from 'zod';
import { errorMessage } from './errors.js';
import { renderJson, renderText, summarize } from './report.js';
import { Scanner } from './scanner.js';
import { CliOptions, type OutputFormat } from './schemas.js';
import type { AnalysisResult } from './types.js';
import logger from './utils/logger.js';

export const VERSION = '0.1.0';

export const USAGE = `
Mission Scanner — classes and equipment in .sqf / .hpp / .ext files

Usage:
  mission-scanner <path> [--format text|json] [--output <file>]

Arguments:
  <path>              File or directory to scan

Options:
  --format <fmt>      Output format: text (default) or json
  --output, -o <file> Write the report to a file instead of stdout
  --version, -v       Print the version
  --help, -h          Show this help

Environment:
  LOG_LEVEL           error | warn | info | debug | silent (default: info)
  SAMPLE_DATA_DIR     Fallback directory for .hpp files
`;

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const defaultIO: CliIO = {
  stdout: text => process.stdout.write(`${text}\n`),
  stderr: text => process.stderr.write(`${text}\n`),
};

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'scan'; options: CliOptions };

/** Throws on unknown arguments, ZodError on invalid option values */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const raw: { path?: string; format?: string; output?: string } = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') return { kind: 'help' };
    if (arg === '--version' || arg === '-v') return { kind: 'version' };

    if (arg === '--format') {
      raw.format = args[++i] ?? '';
    } else if (arg.startsWith('--format=')) {
      raw.format = arg.slice('--format='.length);
    } else if (arg === '--output' || arg === '-o') {
      raw.output = args[++i] ?? '';
    } else if (arg.startsWith('--output=')) {
      raw.output = arg.slice('--output='.length);
    } else if (raw.path === undefined && !arg.startsWith('-')) {
      raw.path = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  return { kind: 'scan', options: CliOptions.parse(raw) };
}

export function render(results: readonly AnalysisResult[], format: OutputFormat): string {
  return format === 'json' ? renderJson(results) : renderText(results);
}

export function scanPath(scanner: Scanner, target: string): AnalysisResult[] {
  if (existsSync(target) && statSync(target).isFile()) return [scanner.scan(target)];
  return scanner.scanDirectory(target);
}

/** Returns the process exit code: 0 ok, 1 scan failure, 2 usage error */
export function run(args: readonly string[], io: CliIO = defaultIO, scanner = new Scanner()): number {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (e) {
    const details = e instanceof ZodError ? e.issues.map(i => i.message).join('; ') : errorMessage(e);
    io.stderr(`Error: ${details}`);
    io.stderr(USAGE);
    return 2;
  }

  if (parsed.kind === 'help') {
    io.stdout(USAGE);
    return 0;
  }
  if (parsed.kind === 'version') {
    io.stdout(VERSION);
    return 0;
  }

  const { path: target, format, output } = parsed.options;
  let results: AnalysisResult[];
  try {
    results = scanPath(scanner, target);
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    return 1;
  }

  const summary = summarize(results);
  const types = Object.entries(summary.byType).map(([t, n]) => `${n} ${t.toUpperCase()}`).join(', ');
  logger.info(`Scanned ${summary.files} file(s)${types ? ` (${types})` : ''}`, { module: 'cli' });
  logger.info(`Classes: ${summary.distinctClasses} distinct, equipment: ${summary.distinctEquipment} distinct`, { module: 'cli' });
  if (summary.failed) logger.warn(`Failed: ${summary.failed} file(s)`, { module: 'cli' });

  const rendered = render(results, format);
  if (output) {
    try {
      writeFileSync(output, rendered, 'utf-8');
    } catch (e) {
      io.stderr(`Error: cannot write ${output}: ${errorMessage(e)}`);
      return 1;
    }
    logger.info(`Report written to ${output}`, { module: 'cli' });
  } else {
    io.stdout(rendered);
  }
  return 0;
}
