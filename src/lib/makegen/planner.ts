/**
 * Build planner - main orchestration module
 *
 * Discovers units and headers, resolves their include closures, groups
 * units into one package per directory and renders a Makefile for each.
 * Every Makefile is rendered before the first one is written, so a run
 * that fails before writing leaves the previous Makefiles untouched. Each
 * write is an atomic replace, but a write failure part-way through leaves
 * the Makefiles written before it in place.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type {
  DependencyMap,
  DiscoveredFile,
  MakegenErrorCode,
  MakegenOutput,
  MakegenStats,
  MakegenWarning,
  Package,
  RootPackage,
  SourceFile,
  SourceTable,
} from './types.js';
import { MakegenError, MakegenErrorCode as ErrorCodes } from './types.js';
import { createSourceFile, getSortKey } from './source-file.js';
import { DependencyResolver, resolveAllWith } from './resolver.js';
import { addUnit, createPackage, createRootPackage, generateMakefile, setAllPackages } from './package.js';
import { discoverFiles } from './discovery.js';
import { cleanupTempFiles, readExistingMakefile, writeMakefileAtomic } from './writer.js';

/**
 * What a run does with the rendered Makefiles
 */
export type MakegenMode = 'write' | 'dry-run' | 'check';

/**
 * Generation options
 */
export interface MakegenOptions {
  /** Project root directory (holds the entry point) */
  root: string;
  /** Name of the linked executable */
  executableName: string;
  /** Libraries linked as -l<name>, in order */
  libs: string[];
  /** Value for -std= */
  cxxStd: string;
  unitExtensions: string[];
  headerExtensions: string[];
  /** Directory names skipped by discovery */
  excludeDirs: string[];
  makefileName: string;
  mode: MakegenMode;
  /** Verbose logging */
  verbose: boolean;
  /** Logger function */
  log: (message: string) => void;
}

/**
 * One rendered Makefile
 */
export interface RenderedMakefile {
  /** Package directory relative to the root */
  packagePath: string;
  /** Makefile path relative to the root */
  file: string;
  absolutePath: string;
  content: string;
}

/**
 * Generation result
 */
export interface MakegenResult {
  success: boolean;
  error?: {
    code: MakegenErrorCode;
    message: string;
  };
  stats?: MakegenStats;
  makefiles: RenderedMakefile[];
  /** Makefiles whose content on disk differs from the rendered text (check mode) */
  stale: string[];
  warnings: MakegenWarning[];
}

/**
 * Loaded sources and their lookup table
 */
export interface LoadedSources {
  files: SourceFile[];
  table: SourceTable;
}

/**
 * Read every discovered file and index it by `relativePath + filename`
 */
export function loadSourceTable(discovered: readonly DiscoveredFile[]): LoadedSources {
  const files: SourceFile[] = [];
  const table = new Map<string, SourceFile>();

  for (const entry of discovered) {
    let content: string;
    try {
      content = fs.readFileSync(entry.absolutePath, 'utf-8');
    } catch (error) {
      throw new MakegenError(
        ErrorCodes.MAKEGEN_READ_ERROR,
        `Failed to read ${entry.relativePath}${entry.filename}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const file = createSourceFile(entry.relativePath, entry.filename, entry.kind, content);
    files.push(file);
    table.set(getSortKey(file), file);
  }

  return { files, table };
}

/**
 * Packages of a project
 */
export interface PackagePlan {
  root: RootPackage;
  /** Every package, root included, sorted by path */
  packages: Package[];
}

/**
 * Group units by directory
 *
 * Every directory holding a discovered file gets a package; the root
 * package exists even when the root directory holds no file.
 */
export function planPackages(
  files: readonly SourceFile[],
  rootOptions: { executableName: string; libs: string[]; cxxStd: string }
): PackagePlan {
  const root = createRootPackage(rootOptions);
  const byPath = new Map<string, Package>([[root.path, root]]);

  for (const file of files) {
    let pkg = byPath.get(file.relativePath);
    if (!pkg) {
      pkg = createPackage(file.relativePath);
      byPath.set(file.relativePath, pkg);
    }
    if (file.kind === 'unit') {
      addUnit(pkg, file);
    }
  }

  setAllPackages(root, Array.from(byPath.values()));
  return { root, packages: root.allPackages };
}

/**
 * Render the Makefile of every package
 */
export function renderMakefiles(
  packages: readonly Package[],
  dependencies: DependencyMap,
  rootDir: string,
  makefileName: string
): RenderedMakefile[] {
  return packages.map((pkg) => ({
    packagePath: pkg.path,
    file: pkg.path + makefileName,
    absolutePath: path.join(rootDir, pkg.path, makefileName),
    content: generateMakefile(pkg, dependencies),
  }));
}

function toFailure(error: unknown, warnings: MakegenWarning[]): MakegenResult {
  if (error instanceof MakegenError) {
    return {
      success: false,
      error: { code: error.code, message: error.message },
      makefiles: [],
      stale: [],
      warnings,
    };
  }
  throw error;
}

/**
 * Generate the Makefiles of a project
 */
export function generateMakefiles(options: MakegenOptions): MakegenResult {
  const startTime = Date.now();
  const warnings: MakegenWarning[] = [];
  const { log, verbose } = options;
  const rootDir = path.resolve(options.root);

  let makefiles: RenderedMakefile[];
  let stats: MakegenStats;

  try {
    if (verbose) log('Discovering files...');
    const discovery = discoverFiles({
      root: rootDir,
      unitExtensions: options.unitExtensions,
      headerExtensions: options.headerExtensions,
      excludeDirs: options.excludeDirs,
    });

    for (const skipped of discovery.skipped) {
      warnings.push({
        code: 'MAKEGEN_FILE_SKIPPED',
        file: skipped.path,
        message: skipped.reason,
      });
    }

    if (verbose) log(`Found ${discovery.files.length} files`);

    const { files, table } = loadSourceTable(discovery.files);

    if (verbose) log('Resolving includes...');
    const resolver = new DependencyResolver(table);
    const dependencies = resolveAllWith(resolver, files);

    for (const cycle of resolver.cycles) {
      warnings.push({
        code: 'MAKEGEN_INCLUDE_CYCLE',
        file: cycle.files[0],
        message: `Include cycle: ${cycle.files.join(' -> ')}`,
      });
    }

    const plan = planPackages(files, {
      executableName: options.executableName,
      libs: options.libs,
      cxxStd: options.cxxStd,
    });

    if (verbose) log(`Rendering ${plan.packages.length} Makefiles...`);
    makefiles = renderMakefiles(plan.packages, dependencies, rootDir, options.makefileName);

    const units = files.filter((f) => f.kind === 'unit').length;
    stats = {
      total_files: files.length,
      units,
      headers: files.length - units,
      packages: plan.packages.length,
      makefiles_written: 0,
      elapsed_ms: 0,
    };
  } catch (error) {
    return toFailure(error, warnings);
  }

  const stale: string[] = [];

  if (options.mode === 'check') {
    for (const makefile of makefiles) {
      if (readExistingMakefile(makefile.absolutePath) !== makefile.content) {
        stale.push(makefile.file);
      }
    }
  } else if (options.mode === 'write') {
    if (verbose) log('Writing Makefiles...');
    try {
      for (const makefile of makefiles) {
        writeMakefileAtomic(makefile.absolutePath, makefile.content);
        stats.makefiles_written++;
      }
    } catch (err) {
      cleanupTempFiles(makefiles.map((m) => m.absolutePath));
      return {
        success: false,
        error: {
          code: ErrorCodes.MAKEGEN_WRITE_ERROR,
          message: `Failed to write Makefiles: ${err instanceof Error ? err.message : String(err)}`,
        },
        makefiles,
        stale,
        warnings,
      };
    }
  }

  stats.elapsed_ms = Date.now() - startTime;
  if (verbose) log(`Done in ${stats.elapsed_ms}ms`);

  return {
    success: true,
    stats,
    makefiles,
    stale,
    warnings,
  };
}

/**
 * Format a result for JSON output
 */
export function formatMakegenOutput(result: MakegenResult, root: string, mode: MakegenMode): MakegenOutput {
  let status: MakegenOutput['data']['status'] = 'success';
  if (!result.success) {
    status = 'failed';
  } else if (result.stale.length > 0) {
    status = 'stale';
  }

  return {
    generated_at: new Date().toISOString(),
    root,
    command: mode === 'write' ? 'generate' : mode,
    data: {
      status,
      stats: result.stats ?? {
        total_files: 0,
        units: 0,
        headers: 0,
        packages: 0,
        makefiles_written: 0,
        elapsed_ms: 0,
      },
      makefiles: result.makefiles.map((m) => m.file),
      stale: result.stale,
      warnings: result.warnings,
      errors: result.error ? [{ code: result.error.code, message: result.error.message }] : [],
    },
  };
}
