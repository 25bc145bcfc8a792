/**
 * Tests for package.ts - Makefile synthesis
 */

import { describe, it, expect } from 'vitest';
import {
  addUnit,
  assertUniqueUnitNames,
  createPackage,
  createRootPackage,
  generateMakefile,
  getPathToRoot,
  headerVariableName,
  setAllPackages,
} from '../package.js';
import { planPackages } from '../planner.js';
import { resolveAll } from '../resolver.js';
import { createSourceFile } from '../source-file.js';
import { MakegenError, MakegenErrorCode } from '../types.js';
import type { DependencyMap, Package, RootPackage, SourceFile } from '../types.js';

interface Rendered {
  root: RootPackage;
  makefiles: Map<string, string>;
  dependencies: DependencyMap;
}

function render(entries: Record<string, string>, libs: string[] = []): Rendered {
  const files: SourceFile[] = [];
  const table = new Map<string, SourceFile>();
  for (const [key, content] of Object.entries(entries)) {
    const slash = key.lastIndexOf('/');
    const filename = key.slice(slash + 1);
    const file = createSourceFile(
      key.slice(0, slash + 1),
      filename,
      filename.endsWith('.cpp') ? 'unit' : 'header',
      content
    );
    files.push(file);
    table.set(key, file);
  }

  const dependencies = resolveAll(files, table);
  const plan = planPackages(files, { executableName: 'app', libs, cxxStd: 'c++11' });
  const makefiles = new Map<string, string>();
  for (const pkg of plan.packages) {
    makefiles.set(pkg.path, generateMakefile(pkg, dependencies));
  }
  return { root: plan.root, makefiles, dependencies };
}

function lines(...parts: string[]): string {
  return parts.join('\n');
}

describe('package.ts', () => {
  describe('getPathToRoot', () => {
    it('is ./ for the root', () => {
      expect(getPathToRoot('')).toBe('./');
    });

    it('climbs once per directory level', () => {
      expect(getPathToRoot('lib/')).toBe('../');
      expect(getPathToRoot('lib/core/')).toBe('../../');
    });
  });

  describe('headerVariableName', () => {
    it('upper-cases the base name', () => {
      expect(headerVariableName(createSourceFile('', 'parser.cpp', 'unit', ''))).toBe('HEADERS_PARSER');
    });
  });

  describe('generateMakefile', () => {
    it('renders a single-package project', () => {
      const { makefiles } = render({
        'main.cpp': '#include "util.h"\nint main() { return 0; }\n',
        'util.h': '',
      });

      expect(makefiles.get('')).toBe(
        lines(
          'CXXFLAGS = -std=c++11',
          'export CXXFLAGS',
          '',
          'INC = -I ./',
          '',
          'HEADERS_MAIN = \\',
          '\t./util.h',
          '',
          'OBJECTS = \\',
          '\t./*.o',
          '',
          'LDLIBS =',
          '',
          '.PHONY: all clean',
          '',
          'all:',
          '\t$(MAKE) main.o',
          '\t$(MAKE) app',
          '',
          'app: $(OBJECTS)',
          '\t$(CXX) $(LDFLAGS) $(OBJECTS) $(LDLIBS) -o app',
          '',
          'main.o: main.cpp $(HEADERS_MAIN)',
          '\t$(CXX) $(CPPFLAGS) $(CXXFLAGS) -c main.cpp $(INC)',
          '',
          'clean:',
          '\trm -f *.o app',
          ''
        )
      );
    });

    it('lists transitive headers of another directory relative to the root', () => {
      const { makefiles } = render({
        'main.cpp': '#include "sub/api.h"\n',
        'sub/api.h': '#include "sub/impl.h"\n',
        'sub/impl.h': '',
      });

      expect(makefiles.get('')).toContain('HEADERS_MAIN = \\\n\t./sub/api.h \\\n\t./sub/impl.h\n\n');
    });

    it('rewrites header paths relative to a nested package', () => {
      const { makefiles } = render({
        'main.cpp': '',
        'util.h': '',
        'lib/math.cpp': '#include "lib/math.h"\n#include "util.h"\n',
        'lib/math.h': '',
      });

      expect(makefiles.get('lib/')).toBe(
        lines(
          'INC = -I ../',
          '',
          'HEADERS_MATH = \\',
          '\t../lib/math.h \\',
          '\t../util.h',
          '',
          '.PHONY: all clean',
          '',
          'all:',
          '\t$(MAKE) math.o',
          '',
          'math.o: math.cpp $(HEADERS_MATH)',
          '\t$(CXX) $(CPPFLAGS) $(CXXFLAGS) -c math.cpp $(INC)',
          '',
          'clean:',
          '\trm -f *.o',
          ''
        )
      );
    });

    it('emits an empty header variable for a unit without local includes', () => {
      const { makefiles } = render({
        'main.cpp': '#include <cstdio>\n',
      });

      expect(makefiles.get('')).toContain('HEADERS_MAIN =\n\n');
      expect(makefiles.get('')).toContain('main.o: main.cpp $(HEADERS_MAIN)\n');
    });

    it('builds and cleans other packages before the root', () => {
      const { makefiles } = render({
        'main.cpp': '#include "lib/math.h"\n',
        'lib/math.cpp': '#include "lib/math.h"\n',
        'lib/math.h': '',
      });
      const root = makefiles.get('') ?? '';

      expect(root).toContain(
        lines('all:', '\t$(MAKE) -C lib/ all', '\t$(MAKE) main.o', '\t$(MAKE) app', '')
      );
      expect(root).toContain(lines('clean:', '\t$(MAKE) -C lib/ clean', '\trm -f *.o app', ''));
      expect(root).toContain('OBJECTS = \\\n\t./*.o \\\n\t./lib/*.o\n\n');
    });

    it('visits other packages in ascending path order', () => {
      const { makefiles } = render({
        'main.cpp': '',
        'zeta/z.cpp': '',
        'alpha/a.cpp': '',
        'alpha/inner/i.cpp': '',
      });

      expect(makefiles.get('')).toContain(
        lines(
          'all:',
          '\t$(MAKE) -C alpha/ all',
          '\t$(MAKE) -C alpha/inner/ all',
          '\t$(MAKE) -C zeta/ all',
          '\t$(MAKE) main.o',
          ''
        )
      );
    });

    it('leaves header-only directories out of the object list', () => {
      const { makefiles } = render({
        'main.cpp': '#include "include/api.h"\n',
        'include/api.h': '',
      });
      const root = makefiles.get('') ?? '';

      expect(root).toContain('OBJECTS = \\\n\t./*.o\n\n');
      expect(root).toContain('\t$(MAKE) -C include/ all\n');
      expect(makefiles.get('include/')).toBe(
        lines('INC = -I ../', '', '.PHONY: all clean', '', 'all:', '', 'clean:', '\trm -f *.o', '')
      );
    });

    it('prefixes every link library in order', () => {
      const { makefiles } = render({ 'main.cpp': '' }, ['m', 'pthread']);

      expect(makefiles.get('')).toContain('\nLDLIBS = -lm -lpthread\n\n');
    });

    it('sorts units regardless of insertion order', () => {
      const pkg = createPackage('lib/');
      addUnit(pkg, createSourceFile('lib/', 'b.cpp', 'unit', ''));
      addUnit(pkg, createSourceFile('lib/', 'a.cpp', 'unit', ''));

      const makefile = generateMakefile(pkg, new Map());
      expect(makefile).toContain(lines('all:', '\t$(MAKE) a.o', '\t$(MAKE) b.o', ''));
      expect(makefile.indexOf('HEADERS_A =')).toBeLessThan(makefile.indexOf('HEADERS_B ='));
    });

    it('renders byte-identical text on repeated runs', () => {
      const entries = {
        'main.cpp': '#include "lib/x.h"\n#include "a.h"\n',
        'a.h': '#include "lib/x.h"\n',
        'lib/x.h': '',
        'lib/x.cpp': '#include "lib/x.h"\n',
      };

      const first = render(entries);
      const second = render(entries);
      expect(Array.from(second.makefiles.entries())).toEqual(Array.from(first.makefiles.entries()));
    });

    it('uses the configured language standard', () => {
      const root = createRootPackage({ executableName: 'tool', libs: [], cxxStd: 'c++17' });
      setAllPackages(root, [root]);

      expect(generateMakefile(root, new Map())).toMatch(/^CXXFLAGS = -std=c\+\+17\nexport CXXFLAGS\n/);
    });
  });

  describe('assertUniqueUnitNames', () => {
    function packageWith(...filenames: string[]): Package {
      const pkg = createPackage('src/');
      for (const filename of filenames) {
        addUnit(pkg, createSourceFile('src/', filename, 'unit', ''));
      }
      return pkg;
    }

    it('rejects two units with the same base name', () => {
      expect(() => assertUniqueUnitNames(packageWith('io.cpp', 'io.cc'))).toThrow(
        'src/io.cc and src/io.cpp both map to io.o'
      );
    });

    it('rejects base names that differ only in case', () => {
      expect(() => generateMakefile(packageWith('foo.cpp', 'Foo.cpp'), new Map())).toThrow(
        'src/Foo.cpp and src/foo.cpp both map to HEADERS_FOO'
      );
    });

    it('carries the duplicate-unit error code', () => {
      try {
        assertUniqueUnitNames(packageWith('io.cpp', 'io.cc'));
        expect.unreachable('expected a duplicate unit error');
      } catch (error) {
        expect(error).toBeInstanceOf(MakegenError);
        expect(error instanceof MakegenError ? error.code : null).toBe(MakegenErrorCode.MAKEGEN_DUPLICATE_UNIT);
      }
    });

    it('accepts distinct names', () => {
      expect(() => assertUniqueUnitNames(packageWith('a.cpp', 'b.cpp'))).not.toThrow();
    });
  });
});
