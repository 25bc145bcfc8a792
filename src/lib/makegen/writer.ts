/**
 * Makefile writer
 *
 * Writes through a temp file + rename so a failed write never leaves a
 * truncated Makefile behind.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

function tempPathFor(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.tmp`);
}

/**
 * Write a Makefile atomically
 */
export function writeMakefileAtomic(filePath: string, content: string): void {
  const tempPath = tempPathFor(filePath);
  fs.writeFileSync(tempPath, content);
  fs.renameSync(tempPath, filePath);
}

/**
 * Read a Makefile from a previous run, or null when there is none
 */
export function readExistingMakefile(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Remove temp files left by a failed write
 */
export function cleanupTempFiles(makefilePaths: readonly string[]): void {
  for (const filePath of makefilePaths) {
    const tempPath = tempPathFor(filePath);
    try {
      if (fs.existsSync(tempPath)) {
        fs.unlinkSync(tempPath);
      }
    } catch {
      // Ignore cleanup errors
    }
  }
}
