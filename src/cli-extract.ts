#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Implements main(), parseArgs() and extractFile() for the fxlit binary.
 * Filter mode reads stdin and writes stdout; one file argument writes to
 * stdout; two file arguments write to the second file.
 */

import * as fs from 'fs';
import { loadConfig, loadConfigFile, type FxConfig } from './cli-config.js';
import { explainError, listErrors } from './cli-explain.js';
import { formatReport, runSelfTest } from './cli-self-test.js';
import {
  createFdSink,
  formatError,
  isFileError,
  readVersion,
} from './cli-shared.js';
import { extractStream } from './extract.js';
import type { ExtractOptions, LiteralEvent } from './options.js';
import { createLineReader, type OutputSink } from './scanner/state.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | {
      mode: 'extract';
      input?: string | undefined;
      output?: string | undefined;
      functionName?: string | undefined;
      lineMarkers: boolean;
      config?: string | undefined;
      verbose: boolean;
    }
  | { mode: 'test' }
  | { mode: 'explain'; errorId: string }
  | { mode: 'help' | 'version' };

const USAGE = `Usage:
  fxlit [options] [<input> [<output>]]

Rewrites f"..." and x"..." extraction literals in C++ source.
Reads stdin when no input is given or the input is -, and writes stdout
when no output is given.

Options:
  -n, --name <fn>       Function wrapped around f literals (default: std::format)
                        A trailing * is replaced by the argument count
  -l, --line-markers    Emit #line markers that keep original columns
  -c, --config <file>   Configuration file (default: .fxlit.yaml)
      --verbose         Log each rewritten literal to stderr
      --test            Run the built-in self test
      --explain <id>    Show documentation for an error id
  -h, --help            Show this help message
  -v, --version         Show version information

Examples:
  fxlit main.fx.cpp main.cpp
  fxlit -n 'fmt::format' < in.cpp > out.cpp
  fxlit --explain FX-P005`;

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const positional: string[] = [];
  let functionName: string | undefined;
  let config: string | undefined;
  let lineMarkers = false;
  let verbose = false;
  let test = false;
  let explain: string | undefined;

  const takeValue = (index: number, flag: string): string => {
    const value = argv[index + 1];
    if (value === undefined || value === '') {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    switch (arg) {
      case '-n':
      case '--name':
        functionName = takeValue(i, arg);
        i++;
        break;
      case '-c':
      case '--config':
        config = takeValue(i, arg);
        i++;
        break;
      case '-l':
      case '--line-markers':
        lineMarkers = true;
        break;
      case '--verbose':
        verbose = true;
        break;
      case '--test':
        test = true;
        break;
      case '--explain':
        explain = takeValue(i, arg);
        i++;
        break;
      default:
        if (arg.startsWith('-') && arg !== '-') {
          throw new Error(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  if (explain !== undefined) {
    return { mode: 'explain', errorId: explain };
  }
  if (test) {
    return { mode: 'test' };
  }
  if (positional.length > 2) {
    throw new Error(`Unexpected argument: ${positional[2] ?? ''}`);
  }

  const [input, output] = positional;
  return {
    mode: 'extract',
    input: input === '-' ? undefined : input,
    output,
    functionName,
    lineMarkers,
    config,
    verbose,
  };
}

/**
 * Merge configuration file values under command-line flags.
 *
 * @param cwd - Directory searched for .fxlit.yaml when no --config is given
 */
export function resolveExtractOptions(
  parsed: Extract<ParsedArgs, { mode: 'extract' }>,
  cwd: string
): ExtractOptions {
  const fileConfig: FxConfig =
    (parsed.config !== undefined
      ? loadConfigFile(parsed.config)
      : loadConfig(cwd)) ?? {};

  return {
    functionName: parsed.functionName ?? fileConfig.functionName,
    emitLocationMarkers: parsed.lineMarkers || (fileConfig.lineMarkers ?? false),
    sourcePath: parsed.input,
  };
}

/** One stderr line per rewritten literal */
export function formatLiteralEvent(event: LiteralEvent): string {
  const where = `${event.location.line}:${event.location.column}`;
  const call = event.callee !== null ? ` via ${event.callee}` : '';
  return `[fxlit] ${where} ${event.kind} literal, ${event.argumentCount} argument(s)${call}`;
}

/**
 * Run extraction from a file (or stdin) to a file (or stdout).
 *
 * @throws Error with a `code` for file errors, FxError for extraction errors
 */
export function extractFile(
  input: string | undefined,
  output: string | undefined,
  options: ExtractOptions
): void {
  const source =
    input === undefined
      ? fs.readFileSync(0, 'utf-8')
      : fs.readFileSync(input, 'utf-8');

  if (output === undefined) {
    const sink: OutputSink = { write: (chunk) => process.stdout.write(chunk) };
    extractStream(createLineReader(source), sink, options);
    return;
  }

  const fd = fs.openSync(output, 'w');
  try {
    extractStream(createLineReader(source), createFdSink(fd), options);
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Entry point for the fxlit binary
 *
 * Exit codes: 0 on success, 1 on extraction errors, failed self tests and
 * usage errors, 2 on file errors.
 */
export function main(argv: string[] = process.argv.slice(2)): void {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${message}`);
    process.exit(1);
    return;
  }

  try {
    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(readVersion());
        return;

      case 'explain': {
        const doc = explainError(parsed.errorId);
        if (doc === null) {
          console.error(`Unknown error ID: ${parsed.errorId}`);
          console.error(`Known errors:\n${listErrors()}`);
          process.exit(1);
          return;
        }
        console.log(doc);
        return;
      }

      case 'test': {
        const report = runSelfTest();
        console.error(formatReport(report));
        process.exit(report.failures.length === 0 ? 0 : 1);
        return;
      }

      case 'extract': {
        const options = resolveExtractOptions(parsed, process.cwd());
        if (parsed.verbose) {
          options.observability = {
            onLiteral: (event) => console.error(formatLiteralEvent(event)),
          };
        }
        extractFile(parsed.input, parsed.output, options);
        return;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error));
    process.exit(isFileError(error) ? 2 : 1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
