/**
 * Include dependency resolver
 *
 * Computes, for every file, the transitive set of local headers reachable
 * through quoted includes. Resolution is memoized per file through an
 * explicit state tag, and cycles are collapsed by strongly connected
 * component so every member of a cycle gets the same closure whatever the
 * order in which files are resolved.
 */

import type { DependencyMap, ResolutionState, SourceFile, SourceTable } from './types.js';
import { getSortKey, parseQuotedIncludes, sortSourceFiles } from './source-file.js';

interface ResolutionRecord {
  file: SourceFile;
  state: ResolutionState;
  direct: SourceFile[];
  transitive: Set<SourceFile>;
  /** DFS discovery index, valid while inProgress */
  index: number;
  lowLink: number;
}

/**
 * Include cycle found during resolution, members sorted by sort key
 */
export interface IncludeCycle {
  files: string[];
}

export class DependencyResolver {
  private readonly table: SourceTable;
  private readonly records = new Map<string, ResolutionRecord>();
  private readonly stack: ResolutionRecord[] = [];
  private readonly foundCycles: IncludeCycle[] = [];
  private nextIndex = 0;

  constructor(table: SourceTable) {
    this.table = table;
  }

  /**
   * Transitive local includes of a file; the file itself is never a member
   *
   * Once resolved, repeated calls return the same instance unchanged.
   */
  resolve(file: SourceFile): ReadonlySet<SourceFile> {
    const record = this.recordFor(file);
    if (record.state === 'unvisited') {
      this.visit(record);
    }
    return record.transitive;
  }

  /**
   * Direct quoted includes found in the table, in first-seen order
   */
  getDirectIncludes(file: SourceFile): readonly SourceFile[] {
    this.resolve(file);
    return this.recordFor(file).direct;
  }

  getState(file: SourceFile): ResolutionState {
    return this.records.get(getSortKey(file))?.state ?? 'unvisited';
  }

  get cycles(): readonly IncludeCycle[] {
    return this.foundCycles;
  }

  private recordFor(file: SourceFile): ResolutionRecord {
    const key = getSortKey(file);
    let record = this.records.get(key);
    if (!record) {
      record = {
        file,
        state: 'unvisited',
        direct: [],
        transitive: new Set(),
        index: -1,
        lowLink: -1,
      };
      this.records.set(key, record);
    }
    return record;
  }

  private findDirectIncludes(file: SourceFile): SourceFile[] {
    const direct: SourceFile[] = [];
    for (const includePath of parseQuotedIncludes(file.content)) {
      // Anything outside the table is a system or external header
      const target = this.table.get(includePath);
      if (target) {
        direct.push(target);
      }
    }
    return direct;
  }

  private visit(record: ResolutionRecord): void {
    record.state = 'inProgress';
    record.index = this.nextIndex;
    record.lowLink = this.nextIndex;
    this.nextIndex++;
    record.direct = this.findDirectIncludes(record.file);
    this.stack.push(record);

    for (const dep of record.direct) {
      const depRecord = this.recordFor(dep);
      if (depRecord.state === 'unvisited') {
        this.visit(depRecord);
        record.lowLink = Math.min(record.lowLink, depRecord.lowLink);
      } else if (depRecord.state === 'inProgress') {
        // Re-entrant: contributes nothing yet, the component closes below
        record.lowLink = Math.min(record.lowLink, depRecord.index);
      }
    }

    if (record.lowLink === record.index) {
      this.closeComponent(record);
    }
  }

  private closeComponent(root: ResolutionRecord): void {
    const members: ResolutionRecord[] = [];
    let member: ResolutionRecord | undefined;
    do {
      member = this.stack.pop();
      if (!member) break;
      members.push(member);
    } while (member !== root);

    const memberFiles = new Set(members.map((m) => m.file));
    const closure = new Set<SourceFile>();
    for (const m of members) {
      for (const dep of m.direct) {
        closure.add(dep);
        if (!memberFiles.has(dep)) {
          for (const transitive of this.recordFor(dep).transitive) {
            closure.add(transitive);
          }
        }
      }
    }

    const isCycle = members.length > 1 || root.direct.includes(root.file);
    if (isCycle) {
      this.foundCycles.push({ files: sortSourceFiles(memberFiles).map(getSortKey) });
    }

    for (const m of members) {
      const transitive = new Set(closure);
      transitive.delete(m.file);
      m.transitive = transitive;
      m.state = 'resolved';
    }
  }
}

/**
 * Resolve every file and linearize each dependency set by sort key
 */
export function resolveAll(files: readonly SourceFile[], table: SourceTable): DependencyMap {
  return resolveAllWith(new DependencyResolver(table), files);
}

/**
 * Same as resolveAll, against a caller-owned resolver (to read its cycles afterwards)
 */
export function resolveAllWith(resolver: DependencyResolver, files: readonly SourceFile[]): DependencyMap {
  const dependencies = new Map<string, readonly SourceFile[]>();
  for (const file of files) {
    dependencies.set(getSortKey(file), sortSourceFiles(resolver.resolve(file)));
  }
  return dependencies;
}
