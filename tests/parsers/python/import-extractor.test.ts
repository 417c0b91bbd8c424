/**
 * Python Import Extractor Tests
 * @module tests/parsers/python/import-extractor
 */

import { describe, it, expect } from 'vitest';
import { PythonImportExtractor, maskPythonSource } from '@/parsers/python/import-extractor';
import { WarningCodes } from '@/types/warnings';
import type { SourceArtifact } from '@/types/artifact';
import { createSourceFile } from '../../factories';

const extractor = new PythonImportExtractor();

function artifactFor(path: string, text: string): SourceArtifact {
  const [artifact] = extractor.segment(createSourceFile(path, text)).artifacts;
  return artifact;
}

function extract(path: string, text: string) {
  return extractor.extract(artifactFor(path, text));
}

function specifiers(path: string, text: string): string[] {
  return extract(path, text).references.map(ref => `${ref.targetSpecifier}:${ref.kind}:${ref.line}`);
}

describe('PythonImportExtractor', () => {
  describe('metadata', () => {
    it('should identify the import-style family', () => {
      expect(extractor.family).toBe('import-style');
      expect(extractor.name).toBe('python-imports');
      expect(extractor.supportedExtensions).toEqual(['.py']);
    });

    it('should accept python files regardless of extension case', () => {
      expect(extractor.canExtract('pkg/mod.py')).toBe(true);
      expect(extractor.canExtract('pkg/MOD.PY')).toBe(true);
      expect(extractor.canExtract('pkg/mod.pyc')).toBe(false);
      expect(extractor.canExtract('main.tf')).toBe(false);
    });
  });

  describe('segment', () => {
    it('should produce one artifact per file with a dotted id', () => {
      const result = extractor.segment(createSourceFile('app/services/billing.py', 'x = 1\n'));

      expect(result.warnings).toEqual([]);
      expect(result.artifacts).toEqual([
        {
          id: 'app.services.billing',
          family: 'import-style',
          path: 'app/services/billing.py',
          line: 1,
          text: 'x = 1\n',
        },
      ]);
    });

    it('should name a package initializer after its package', () => {
      expect(artifactFor('app/__init__.py', '').id).toBe('app');
    });
  });

  describe('extract', () => {
    it('should extract absolute, relative and wildcard imports in order of appearance', () => {
      const source = [
        'import os',
        'import app.models as m, app.utils',
        'from app.services import billing',
        'from . import helpers',
        'from .models import User, Order',
        'from .. import config',
        'from app.core import *',
      ].join('\n');

      expect(specifiers('app/main.py', source)).toEqual([
        'os:direct:1',
        'app.models:direct:2',
        'app.utils:direct:2',
        'app.services.billing:direct:3',
        'app.helpers:direct:4',
        'app.models.User:direct:5',
        'app.models.Order:direct:5',
        'config:direct:6',
        'app.core:wildcard:7',
      ]);
    });

    it('should resolve relative imports in a package initializer against the package itself', () => {
      expect(specifiers('app/__init__.py', 'from .models import User\n')).toEqual([
        'app.models.User:direct:1',
      ]);
    });

    it('should ignore imports inside comments, strings and docstrings', () => {
      const source = [
        '"""Module docs: import fake"""',
        '# import commented',
        'x = "from nowhere import thing"',
        'import real',
      ].join('\n');

      expect(specifiers('mod.py', source)).toEqual(['real:direct:4']);
    });

    it('should ignore imports inside multi-line docstrings', () => {
      const source = ["'''", 'import hidden', "'''", 'import shown'].join('\n');

      expect(specifiers('mod.py', source)).toEqual(['shown:direct:4']);
    });

    it('should join parenthesized name lists across lines', () => {
      const source = ['from app.models import (', '    User,', '    Order,', ')'].join('\n');

      expect(specifiers('app/views.py', source)).toEqual([
        'app.models.User:direct:1',
        'app.models.Order:direct:1',
      ]);
    });

    it('should join backslash continuations and split on semicolons', () => {
      expect(specifiers('mod.py', 'import os, \\\n    sys\nimport a; import b\n')).toEqual([
        'os:direct:1',
        'sys:direct:1',
        'a:direct:3',
        'b:direct:3',
      ]);
    });

    it('should find imports nested in function bodies', () => {
      expect(specifiers('mod.py', 'def load():\n    import json\n    return json\n')).toEqual([
        'json:direct:2',
      ]);
    });

    it('should find imports written after a compound statement header', () => {
      const source = [
        'try: import ujson as json',
        'except ImportError: import json',
        'if TYPE_CHECKING: from app import models',
        'else: pass',
        'with lock: import a.b; import c',
        'def f(x: int) -> dict[str, int]: import d',
        'if (n := 1): import e',
        'if ready:',
        '    import f',
      ].join('\n');

      expect(specifiers('mod.py', source)).toEqual([
        'ujson:direct:1',
        'json:direct:2',
        'app.models:direct:3',
        'a.b:direct:5',
        'c:direct:5',
        'd:direct:6',
        'e:direct:7',
        'f:direct:9',
      ]);
    });

    it('should resolve relative imports after a compound header', () => {
      expect(specifiers('pkg/m.py', 'if TYPE_CHECKING: from . import sibling\n')).toEqual([
        'pkg.sibling:direct:1',
      ]);
    });

    it('should not mistake identifiers that start with import for statements', () => {
      expect(specifiers('mod.py', 'important = 1\nimported = important\n')).toEqual([]);
    });

    it('should skip __future__ imports', () => {
      expect(specifiers('mod.py', 'from __future__ import annotations\nimport os\n')).toEqual([
        'os:direct:2',
      ]);
    });

    it('should keep one reference per specifier and kind', () => {
      expect(specifiers('mod.py', 'import os\nimport os\nfrom m import *\nimport m\n')).toEqual([
        'os:direct:1',
        'm:wildcard:3',
        'm:direct:4',
      ]);
    });

    it('should record the artifact as the reference source', () => {
      const { references } = extract('pkg/a.py', 'import pkg.b\n');

      expect(references).toEqual([
        { sourceId: 'pkg.a', targetSpecifier: 'pkg.b', kind: 'direct', line: 1 },
      ]);
    });
  });

  describe('warnings', () => {
    it('should warn when a relative import climbs above the root', () => {
      const { references, warnings } = extract('top.py', 'from .. import x\n');

      expect(references).toEqual([]);
      expect(warnings).toEqual([
        {
          type: 'extraction',
          code: WarningCodes.RELATIVE_IMPORT_BEYOND_ROOT,
          message: "Relative import '..' climbs above the analysis root",
          path: 'top.py',
          artifactId: 'top',
          line: 1,
        },
      ]);
    });

    it('should warn on a relative wildcard import of the root package', () => {
      const { warnings } = extract('top.py', 'from . import *\n');

      expect(warnings.map(w => w.code)).toEqual([WarningCodes.RELATIVE_IMPORT_BEYOND_ROOT]);
    });

    it('should warn on malformed statements and keep the other references', () => {
      const { references, warnings } = extract('mod.py', 'import\nimport os\nfrom app import\n');

      expect(references.map(ref => ref.targetSpecifier)).toEqual(['os']);
      expect(warnings.map(w => [w.code, w.line])).toEqual([
        [WarningCodes.INVALID_IMPORT, 1],
        [WarningCodes.INVALID_IMPORT, 3],
      ]);
    });

    it('should warn on invalid module names', () => {
      const { warnings } = extract('mod.py', 'import 9lives\n');

      expect(warnings).toHaveLength(1);
      expect(warnings[0].message).toBe("Invalid module name in import: '9lives'");
    });
  });

  describe('resolveFallback', () => {
    const known = new Set(['y', 'app', 'app.models']);

    it('should resolve to the longest known package prefix', () => {
      expect(extractor.resolveFallback('y.z', known)).toBe('y');
      expect(extractor.resolveFallback('app.models.User', known)).toBe('app.models');
      expect(extractor.resolveFallback('app.views.index', known)).toBe('app');
    });

    it('should return null when no prefix is known', () => {
      expect(extractor.resolveFallback('requests.adapters', known)).toBeNull();
      expect(extractor.resolveFallback('os', known)).toBeNull();
    });
  });
});

describe('maskPythonSource', () => {
  it('should blank strings and comments and keep the text length and lines', () => {
    const source = 'a = "x#y"  # note\nb = 2\n';
    const masked = maskPythonSource(source);

    expect(masked).toBe(`a = ${' '.repeat(13)}\nb = 2\n`);
    expect(masked).toHaveLength(source.length);
  });

  it('should keep newlines inside triple-quoted strings', () => {
    expect(maskPythonSource('"""a\nb"""')).toBe('    \n    ');
  });
});
