/**
 * makegen
 *
 * Main entry point for the Makefile generation library.
 */

// Main planner
export {
  generateMakefiles,
  formatMakegenOutput,
  loadSourceTable,
  planPackages,
  renderMakefiles,
  type MakegenOptions,
  type MakegenMode,
  type MakegenResult,
  type RenderedMakefile,
  type PackagePlan,
} from './planner.js';

// Include resolution
export { DependencyResolver, resolveAll, resolveAllWith, type IncludeCycle } from './resolver.js';
export { createSourceFile, getSortKey, parseQuotedIncludes } from './source-file.js';

// Makefile synthesis
export {
  createPackage,
  createRootPackage,
  addUnit,
  setAllPackages,
  generateMakefile,
  getPathToRoot,
  type RootPackageOptions,
} from './package.js';

// Discovery
export { discoverFiles, type DiscoveryOptions } from './discovery.js';

// Types
export type {
  SourceFile,
  SourceKind,
  SourceTable,
  DependencyMap,
  ResolutionState,
  DiscoveredFile,
  DiscoveryResult,
  Package,
  PlainPackage,
  RootPackage,
  MakegenWarning,
  MakegenStats,
  MakegenOutput,
} from './types.js';

export { MakegenError, MakegenErrorCode } from './types.js';
