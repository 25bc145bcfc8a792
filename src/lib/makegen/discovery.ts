/**
 * File discovery for makegen
 *
 * Globs the project root for translation units and headers by extension.
 * Symlinks are never followed; a symlink whose name matches is reported as
 * skipped.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';
import type { DiscoveredFile, DiscoveryResult, SourceKind } from './types.js';
import { MakegenError, MakegenErrorCode } from './types.js';

/**
 * Discovery options
 */
export interface DiscoveryOptions {
  /** Project root directory */
  root: string;
  /** Extensions of translation units, e.g. '.cpp' */
  unitExtensions: string[];
  /** Extensions of headers, e.g. '.h' */
  headerExtensions: string[];
  /** Directory names never descended into, at any depth */
  excludeDirs: string[];
}

/**
 * Classify a filename by extension; null when it is neither unit nor header
 */
export function classifyFile(
  filename: string,
  unitExtensions: readonly string[],
  headerExtensions: readonly string[]
): SourceKind | null {
  const ext = path.extname(filename);
  if (ext.length === 0) return null;
  if (unitExtensions.includes(ext)) return 'unit';
  if (headerExtensions.includes(ext)) return 'header';
  return null;
}

/**
 * Glob patterns matching every configured extension at any depth
 */
export function buildPatterns(options: Pick<DiscoveryOptions, 'unitExtensions' | 'headerExtensions'>): string[] {
  const extensions = [...new Set([...options.unitExtensions, ...options.headerExtensions])];
  return extensions.map((ext) => `**/*${fg.escapePath(ext)}`);
}

/**
 * Ignore patterns pruning excluded directories wherever they appear
 */
export function buildIgnore(excludeDirs: readonly string[]): string[] {
  return excludeDirs.map((dir) => `**/${fg.escapePath(dir)}/**`);
}

function splitPath(relative: string): { relativePath: string; filename: string } {
  const slash = relative.lastIndexOf('/');
  if (slash < 0) return { relativePath: '', filename: relative };
  return { relativePath: relative.slice(0, slash + 1), filename: relative.slice(slash + 1) };
}

/**
 * Discover units and headers under the root
 */
export function discoverFiles(options: DiscoveryOptions): DiscoveryResult {
  if (!fs.existsSync(options.root) || !fs.statSync(options.root).isDirectory()) {
    throw new MakegenError(
      MakegenErrorCode.MAKEGEN_ROOT_NOT_FOUND,
      `Project root is not a directory: ${options.root}`
    );
  }

  const patterns = buildPatterns(options);
  if (patterns.length === 0) return { files: [], skipped: [] };

  let entries: fg.Entry[];
  try {
    // onlyFiles stays off so symlinks reach the loop below and get reported
    entries = fg.sync(patterns, {
      cwd: options.root,
      dot: true,
      onlyFiles: false,
      followSymbolicLinks: false,
      objectMode: true,
      ignore: buildIgnore(options.excludeDirs),
    });
  } catch (error) {
    throw new MakegenError(
      MakegenErrorCode.MAKEGEN_READ_ERROR,
      `Unable to scan ${options.root}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  entries.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  const result: DiscoveryResult = { files: [], skipped: [] };
  for (const entry of entries) {
    if (entry.dirent.isSymbolicLink()) {
      result.skipped.push({ path: entry.path, reason: 'Symlink skipped' });
      continue;
    }
    if (!entry.dirent.isFile()) continue;

    const { relativePath, filename } = splitPath(entry.path);
    const kind = classifyFile(filename, options.unitExtensions, options.headerExtensions);
    if (!kind) continue;

    result.files.push({
      relativePath,
      filename,
      absolutePath: path.join(options.root, entry.path),
      kind,
    });
  }

  return result;
}
