/**
 * makegen Type Definitions
 *
 * Types shared by the include resolver, the Makefile synthesizer
 * and the planner that drives them.
 */

/**
 * Kind of a discovered file
 *
 * Units compile to an object file; headers only feed dependency lists.
 */
export type SourceKind = 'unit' | 'header';

/**
 * One discovered translation unit or header
 */
export interface SourceFile {
  /** Directory relative to the project root: '' for the root, otherwise ending in '/' */
  relativePath: string;
  filename: string;
  /** Filename without its final extension */
  baseName: string;
  kind: SourceKind;
  /** Raw text read at scan time */
  content: string;
}

/**
 * Lookup table from `relativePath + filename` to the file
 */
export type SourceTable = ReadonlyMap<string, SourceFile>;

/**
 * Resolution state of a file inside the resolver arena
 */
export type ResolutionState = 'unvisited' | 'inProgress' | 'resolved';

/**
 * Resolved dependencies: sort key → headers, sorted by sort key
 */
export type DependencyMap = ReadonlyMap<string, readonly SourceFile[]>;

/**
 * File found by discovery, before its content is read
 */
export interface DiscoveredFile {
  relativePath: string;
  filename: string;
  absolutePath: string;
  kind: SourceKind;
}

/**
 * Discovery result
 */
export interface DiscoveryResult {
  files: DiscoveredFile[];
  skipped: Array<{ path: string; reason: string }>;
}

interface PackageBase {
  /** Directory relative to the project root, same form as SourceFile.relativePath */
  path: string;
  units: SourceFile[];
}

/**
 * Ordinary directory package
 */
export interface PlainPackage extends PackageBase {
  role: 'package';
}

/**
 * The package at the project root; owns linking and the recursive targets
 */
export interface RootPackage extends PackageBase {
  role: 'root';
  /** Every package in the project, the root included, sorted by path */
  allPackages: Package[];
  executableName: string;
  /** Names passed to the linker as -l<name>, in order */
  libs: string[];
  /** Value for -std= */
  cxxStd: string;
}

export type Package = PlainPackage | RootPackage;

/**
 * Warning entry reported with a run
 */
export interface MakegenWarning {
  code: string;
  file?: string;
  message: string;
}

/**
 * Run statistics
 */
export interface MakegenStats {
  total_files: number;
  units: number;
  headers: number;
  packages: number;
  makefiles_written: number;
  elapsed_ms: number;
}

/**
 * JSON output for makegen --json
 */
export interface MakegenOutput {
  generated_at: string;
  root: string;
  command: 'generate' | 'check' | 'dry-run';
  data: {
    status: 'success' | 'stale' | 'failed';
    stats: MakegenStats;
    makefiles: string[];
    stale: string[];
    warnings: MakegenWarning[];
    errors: Array<{ code: string; message: string }>;
  };
}

/**
 * makegen error codes
 */
export const MakegenErrorCode = {
  MAKEGEN_ROOT_NOT_FOUND: 'MAKEGEN_ROOT_NOT_FOUND',
  MAKEGEN_READ_ERROR: 'MAKEGEN_READ_ERROR',
  MAKEGEN_WRITE_ERROR: 'MAKEGEN_WRITE_ERROR',
  MAKEGEN_DUPLICATE_UNIT: 'MAKEGEN_DUPLICATE_UNIT',
  MAKEGEN_CONFIG_ERROR: 'MAKEGEN_CONFIG_ERROR',
} as const;

export type MakegenErrorCode = (typeof MakegenErrorCode)[keyof typeof MakegenErrorCode];

/**
 * Error raised by the library; carries one of MakegenErrorCode
 */
export class MakegenError extends Error {
  readonly code: MakegenErrorCode;

  constructor(code: MakegenErrorCode, message: string) {
    super(message);
    this.name = 'MakegenError';
    this.code = code;
  }
}
