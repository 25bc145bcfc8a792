#!/usr/bin/env node
import { Command } from 'commander';
import * as path from 'node:path';
import {
  MakegenError,
  generateMakefiles,
  formatMakegenOutput,
  type MakegenMode,
  type MakegenOptions,
  type MakegenResult,
} from '../lib/makegen/index.js';
import { configFailure, loadBuildConfig, parseLibs } from './config.js';
import { log, setVerbosity, verbosityFromFlags } from './logger.js';

const VERSION = '0.1.0';

interface CliOptions {
  libs?: string;
  json?: boolean;
  verbose?: number;
  quiet?: boolean;
  config?: string;
  dryRun?: boolean;
  check?: boolean;
}

function outputJson(payload: unknown): void {
  log.result(JSON.stringify(payload, null, 2));
}

function resolveMode(options: CliOptions): MakegenMode {
  if (options.check) return 'check';
  if (options.dryRun) return 'dry-run';
  return 'write';
}

function reportResult(result: MakegenResult, mode: MakegenMode): number {
  if (!result.success) {
    log.error(`makegen failed: ${result.error?.message ?? 'Unknown error'}`);
    return 1;
  }

  for (const warning of result.warnings) {
    log.warn(`${warning.file ?? ''} ${warning.message}`.trim());
  }

  if (mode === 'dry-run') {
    for (const makefile of result.makefiles) {
      log.result(`# ${makefile.file}`);
      log.result(makefile.content);
    }
    return 0;
  }

  if (mode === 'check') {
    if (result.stale.length === 0) {
      log.info('All Makefiles are up to date');
      return 0;
    }
    log.error(`${result.stale.length} Makefiles are out of date:`);
    for (const file of result.stale) {
      log.error(`  ${file}`);
    }
    return 1;
  }

  log.info(`Wrote ${result.stats?.makefiles_written ?? 0} Makefiles`);
  for (const makefile of result.makefiles) {
    log.verbose(`  ${makefile.file}`);
  }
  return 0;
}

function runMakegen(root: string, output: string, options: CliOptions): number {
  const cwd = process.cwd();
  const jsonMode = options.json === true;
  const mode = resolveMode(options);

  setVerbosity(verbosityFromFlags(options.quiet, options.verbose));

  const projectRoot = path.resolve(cwd, root);

  let buildConfig;
  try {
    buildConfig = loadBuildConfig(cwd, projectRoot, options.config);
  } catch (error) {
    if (!(error instanceof MakegenError)) throw error;
    if (jsonMode) {
      outputJson(formatMakegenOutput(configFailure(error), projectRoot, mode));
    } else {
      log.error(`Config error: ${error.message}`);
    }
    return 1;
  }

  const makegenOptions: MakegenOptions = {
    root: projectRoot,
    executableName: output,
    libs: parseLibs(options.libs),
    cxxStd: buildConfig.cxx_std,
    unitExtensions: buildConfig.unit_extensions,
    headerExtensions: buildConfig.header_extensions,
    excludeDirs: buildConfig.exclude_dirs,
    makefileName: buildConfig.makefile_name,
    mode,
    verbose: !jsonMode,
    log: (message: string) => log.verbose(message),
  };

  const result = generateMakefiles(makegenOptions);

  if (jsonMode) {
    outputJson(formatMakegenOutput(result, projectRoot, mode));
    return result.success && result.stale.length === 0 ? 0 : 1;
  }

  return reportResult(result, mode);
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('makegen')
    .description('Generate per-directory Makefiles with transitive header dependencies')
    .version(VERSION, '-V, --version', 'Display version number')
    .argument('<root>', 'Directory holding the entry point (main.cpp)')
    .argument('<output>', 'Name of the linked executable')
    .option('-l, --libs <names>', 'Comma-separated libraries to link, e.g. "m,pthread"')
    .option('--json', 'Output JSON instead of human-readable text')
    .option('-v, --verbose', 'Enable verbose logging', (_: unknown, prev: number) => prev + 1, 0)
    .option('-q, --quiet', 'Suppress non-essential output')
    .option('--config <path>', 'Override makegen.yaml location')
    .option('--dry-run', 'Print the Makefiles instead of writing them')
    .option('--check', 'Exit non-zero when any Makefile on disk is out of date')
    .allowExcessArguments(false)
    .action((root: string, output: string, opts: CliOptions) => {
      const code = runMakegen(root, output, opts);
      process.exit(code);
    });

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exit(1);
  }
}

void main();
