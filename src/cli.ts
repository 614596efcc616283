#!/usr/bin/env node
/**
 * Command-line entry point and shared argument parsing utilities.
 * @module cli
 */
import * as path from 'path';
import { isArchiveLayout, loadReleaseConfig } from './config';
import { ConfigError, ReleaseError, toError } from './errors';
import { runRelease } from './release';
import { Logger } from './utils/logger';
import type { ReleaseConfig } from './types';

/**
 * Parse a single-value CLI argument.
 * @param argv - Command line arguments
 * @param flag - Flag name (e.g., '--layout')
 * @returns The value if found, undefined otherwise
 */
export function parseSingleArg(argv: string[], flag: string): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === flag && argv[i + 1]) {
      return argv[i + 1];
    }
  }
  return undefined;
}

/**
 * Check if a boolean flag is present.
 * @param argv - Command line arguments
 * @param flag - Flag name (e.g., '--verbose')
 * @returns True if flag is present
 */
export function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

const VALUE_FLAGS = ['--cwd', '--config', '--layout', '--release-dir'];

/**
 * Get positional argument at index (after filtering out flags and their values).
 * @param argv - Command line arguments
 * @param index - Positional index (0-based)
 * @returns The positional argument if found
 */
export function getPositionalArg(argv: string[], index: number): string | undefined {
  let posIndex = 0;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('-')) {
      if (VALUE_FLAGS.includes(arg)) {
        i++;
      }
      continue;
    }
    if (posIndex === index) {
      return arg;
    }
    posIndex++;
  }
  return undefined;
}

export interface CliOptions {
  cwd?: string;
  configFile?: string;
  overrides: Partial<ReleaseConfig>;
  verbose: boolean;
  quiet: boolean;
  help: boolean;
}

/**
 * Parse command line arguments.
 * @throws ConfigError for an unknown layout
 */
export function parseArgs(argv: string[]): CliOptions {
  const overrides: Partial<ReleaseConfig> = {};

  const layout = parseSingleArg(argv, '--layout');
  if (layout !== undefined) {
    if (!isArchiveLayout(layout)) {
      throw new ConfigError(`--layout must be "flat" or "wrapped" (got "${layout}")`);
    }
    overrides.layout = layout;
  }

  const releaseDir = parseSingleArg(argv, '--release-dir');
  if (releaseDir !== undefined) {
    overrides.releaseDir = releaseDir;
  }

  return {
    cwd: parseSingleArg(argv, '--cwd') ?? getPositionalArg(argv, 0),
    configFile: parseSingleArg(argv, '--config'),
    overrides,
    verbose: hasFlag(argv, '--verbose') || hasFlag(argv, '-v'),
    quiet: hasFlag(argv, '--quiet') || hasFlag(argv, '-q'),
    help: hasFlag(argv, '--help') || hasFlag(argv, '-h'),
  };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
Usage: xrnx-release [options] [project-dir]

Bumps the minor version in manifest.xml and packages the tool into
release/<Id>.xrnx.

Options:
  --cwd <dir>              Project directory (default: current directory)
  --config <file>          Config file (default: .xrnx-release.yml if present)
  --layout <flat|wrapped>  Archive layout (default: wrapped)
  --release-dir <dir>      Output directory (default: release)
  --verbose, -v            Log every step
  --quiet, -q              Only log errors
  --help, -h               Show this help message

Environment Variables:
  SOURCE_DATE_EPOCH        Timestamp (seconds) stamped on archive entries
`);
}

/**
 * Run the CLI.
 * @param argv - Arguments without the node executable and script path
 * @returns Process exit code
 */
export async function main(argv: string[]): Promise<number> {
  const logger = Logger.getInstance();
  try {
    const options = parseArgs(argv);
    if (options.help) {
      printUsage();
      return 0;
    }
    if (options.verbose) {
      logger.setLevel('debug');
    } else if (options.quiet) {
      logger.setLevel('error');
    }

    const cwd = path.resolve(options.cwd ?? process.cwd());
    const config = loadReleaseConfig(cwd, { configFile: options.configFile, overrides: options.overrides });
    const result = await runRelease({ cwd, config });
    console.log(`Created ${result.archivePath}`);
    return 0;
  } catch (error) {
    if (error instanceof ReleaseError) {
      console.error(`Error: ${error.message}`);
    } else {
      const err = toError(error);
      logger.error('Unexpected failure', err);
      console.error(`Error: ${err.message}`);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
