/**
 * Source file model and include directive parsing
 */

import type { SourceFile, SourceKind } from './types.js';

const INCLUDE_MARKER = '#include';

/**
 * Strip the final extension: `a.b.cpp` → `a.b`
 */
export function getBaseName(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot > 0 ? filename.slice(0, dot) : filename;
}

export function createSourceFile(
  relativePath: string,
  filename: string,
  kind: SourceKind,
  content: string
): SourceFile {
  return {
    relativePath,
    filename,
    baseName: getBaseName(filename),
    kind,
    content,
  };
}

/**
 * Key used both for table lookup and for every deterministic ordering
 */
export function getSortKey(file: SourceFile): string {
  return file.relativePath + file.filename;
}

export function compareSourceFiles(a: SourceFile, b: SourceFile): number {
  const keyA = getSortKey(a);
  const keyB = getSortKey(b);
  if (keyA < keyB) return -1;
  if (keyA > keyB) return 1;
  return 0;
}

export function sortSourceFiles(files: Iterable<SourceFile>): SourceFile[] {
  return Array.from(files).sort(compareSourceFiles);
}

/**
 * Extract quoted include paths
 *
 * Only lines whose first non-blank text is `#include` count. Angle-bracket
 * includes carry no quote and are skipped, and so is a quote with no closing
 * quote. Paths come back root-relative, in first-seen order, without
 * duplicates.
 */
export function parseQuotedIncludes(content: string): string[] {
  const paths: string[] = [];
  const seen = new Set<string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trimStart();
    if (!line.startsWith(INCLUDE_MARKER)) continue;

    const rest = line.slice(INCLUDE_MARKER.length);
    const open = rest.indexOf('"');
    if (open < 0) continue;

    const close = rest.indexOf('"', open + 1);
    if (close < 0) continue;

    const includePath = rest.slice(open + 1, close);
    if (includePath.length === 0 || seen.has(includePath)) continue;

    seen.add(includePath);
    paths.push(includePath);
  }

  return paths;
}
