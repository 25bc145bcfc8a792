/**
 * Makefile synthesis
 *
 * One Makefile per package. Every section is rendered by a single function
 * that switches on the package role: a plain package compiles its own units,
 * the root package also builds every other package, links the executable
 * and cleans the whole tree.
 *
 * Section order: variables, .PHONY, all, executable (root only),
 * object files, clean.
 */

import type { DependencyMap, Package, PlainPackage, RootPackage, SourceFile } from './types.js';
import { MakegenError, MakegenErrorCode } from './types.js';
import { getSortKey, sortSourceFiles } from './source-file.js';

export interface RootPackageOptions {
  executableName: string;
  libs: string[];
  cxxStd: string;
}

export function createPackage(path: string): PlainPackage {
  return { role: 'package', path, units: [] };
}

export function createRootPackage(options: RootPackageOptions): RootPackage {
  return {
    role: 'root',
    path: '',
    units: [],
    allPackages: [],
    executableName: options.executableName,
    libs: [...options.libs],
    cxxStd: options.cxxStd,
  };
}

export function addUnit(pkg: Package, file: SourceFile): void {
  pkg.units.push(file);
}

/**
 * Register every package of the project with the root, sorted by path
 */
export function setAllPackages(root: RootPackage, packages: readonly Package[]): void {
  root.allPackages = [...packages].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}

/**
 * `./` for the root, otherwise one `../` per path separator
 */
export function getPathToRoot(path: string): string {
  const depth = path.split('/').length - 1;
  return depth === 0 ? './' : '../'.repeat(depth);
}

export function headerVariableName(unit: SourceFile): string {
  return `HEADERS_${unit.baseName.toUpperCase()}`;
}

export function objectName(unit: SourceFile): string {
  return `${unit.baseName}.o`;
}

/**
 * Reject units whose object file or header variable would collide
 */
export function assertUniqueUnitNames(pkg: Package): void {
  const owners = new Map<string, SourceFile>();
  for (const unit of sortSourceFiles(pkg.units)) {
    for (const name of [objectName(unit), headerVariableName(unit)]) {
      const previous = owners.get(name);
      if (previous) {
        throw new MakegenError(
          MakegenErrorCode.MAKEGEN_DUPLICATE_UNIT,
          `${getSortKey(previous)} and ${getSortKey(unit)} both map to ${name}`
        );
      }
      owners.set(name, unit);
    }
  }
}

function otherPackages(root: RootPackage): Package[] {
  return root.allPackages.filter((pkg) => pkg.path !== root.path);
}

function dependenciesOf(unit: SourceFile, dependencies: DependencyMap): readonly SourceFile[] {
  return dependencies.get(getSortKey(unit)) ?? [];
}

function renderVariables(pkg: Package, units: SourceFile[], dependencies: DependencyMap): string {
  const pathToRoot = getPathToRoot(pkg.path);
  let content = '';

  if (pkg.role === 'root') {
    content += `CXXFLAGS = -std=${pkg.cxxStd}\n`;
    content += 'export CXXFLAGS\n\n';
  }

  content += `INC = -I ${pathToRoot}\n\n`;

  for (const unit of units) {
    content += `${headerVariableName(unit)} =`;
    for (const dep of sortSourceFiles(dependenciesOf(unit, dependencies))) {
      content += ` \\\n\t${pathToRoot}${dep.relativePath}${dep.filename}`;
    }
    content += '\n\n';
  }

  if (pkg.role === 'root') {
    // Header-only directories produce no object files to glob
    content += 'OBJECTS =';
    for (const member of pkg.allPackages) {
      if (member.units.length === 0) continue;
      content += ` \\\n\t./${member.path}*.o`;
    }
    content += '\n\n';

    content += 'LDLIBS =';
    for (const lib of pkg.libs) {
      content += ` -l${lib}`;
    }
    content += '\n\n';
  }

  return content;
}

function renderPhony(): string {
  return '.PHONY: all clean\n\n';
}

function renderTargetAll(pkg: Package, units: SourceFile[]): string {
  let content = 'all:\n';

  if (pkg.role === 'root') {
    for (const member of otherPackages(pkg)) {
      content += `\t$(MAKE) -C ${member.path} all\n`;
    }
  }

  for (const unit of units) {
    content += `\t$(MAKE) ${objectName(unit)}\n`;
  }

  if (pkg.role === 'root') {
    content += `\t$(MAKE) ${pkg.executableName}\n`;
  }

  return content + '\n';
}

function renderTargetExecutable(pkg: Package): string {
  if (pkg.role !== 'root') {
    return '';
  }
  return (
    `${pkg.executableName}: $(OBJECTS)\n` +
    `\t$(CXX) $(LDFLAGS) $(OBJECTS) $(LDLIBS) -o ${pkg.executableName}\n\n`
  );
}

function renderTargetObjectFiles(units: SourceFile[]): string {
  let content = '';
  for (const unit of units) {
    content += `${objectName(unit)}: ${unit.filename} $(${headerVariableName(unit)})\n`;
    content += `\t$(CXX) $(CPPFLAGS) $(CXXFLAGS) -c ${unit.filename} $(INC)\n\n`;
  }
  return content;
}

function renderTargetClean(pkg: Package): string {
  let content = 'clean:\n';

  if (pkg.role === 'root') {
    for (const member of otherPackages(pkg)) {
      content += `\t$(MAKE) -C ${member.path} clean\n`;
    }
    content += `\trm -f *.o ${pkg.executableName}\n`;
  } else {
    content += '\trm -f *.o\n';
  }

  return content;
}

/**
 * Render the Makefile text of a package
 *
 * Every unit's dependencies must already be resolved in `dependencies`.
 * Output depends only on the package and the dependency map, so an
 * unchanged tree renders byte-identical text.
 */
export function generateMakefile(pkg: Package, dependencies: DependencyMap): string {
  assertUniqueUnitNames(pkg);
  const units = sortSourceFiles(pkg.units);

  return (
    renderVariables(pkg, units, dependencies) +
    renderPhony() +
    renderTargetAll(pkg, units) +
    renderTargetExecutable(pkg) +
    renderTargetObjectFiles(units) +
    renderTargetClean(pkg)
  );
}
