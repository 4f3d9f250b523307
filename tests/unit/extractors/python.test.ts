import { describe, it, expect, beforeAll } from 'vitest';
import { PythonExtractor, cleanDocstring } from '../../../src/extractors/python.js';
import type { FileRecord } from '../../../src/types/index.js';

const SAMPLE = `"""Module docstring."""
import os
import pkg.sub as ps
from . import sibling
from ..models import User, Order as O
from .helpers import *
from typing import TYPE_CHECKING

if TYPE_CHECKING:
    from .types import Alias

MAX_SIZE = 10
default_name = "x"
_private = 1


def greet(name: str) -> str:
    """Greet a person."""
    return name


async def fetch(url):
    return url


class UserService(Base):
    '''Service for users.'''

    def run(self):
        pass


@cli.command()
def build():
    pass


@click.group(name="db")
def db():
    """Database commands."""


def _hidden():
    pass
`;

describe('PythonExtractor', () => {
  let extractor: PythonExtractor;
  let record: FileRecord;

  beforeAll(async () => {
    extractor = new PythonExtractor();
    record = await extractor.extract('app/service.py', SAMPLE, 'python');
  });

  function exported(name: string) {
    return record.exports.find(e => e.name === name);
  }

  it('should parse a well-formed module with status ok', () => {
    expect(record.status).toEqual({ state: 'ok' });
  });

  describe('exports', () => {
    it('should export public top-level names in order', () => {
      expect(record.exports.map(e => e.name)).toEqual([
        'MAX_SIZE',
        'default_name',
        'greet',
        'fetch',
        'UserService',
        'build',
        'db',
      ]);
    });

    it('should classify kinds', () => {
      expect(exported('MAX_SIZE')?.kind).toBe('constant');
      expect(exported('default_name')?.kind).toBe('variable');
      expect(exported('greet')?.kind).toBe('function');
      expect(exported('fetch')?.kind).toBe('function');
      expect(exported('UserService')?.kind).toBe('class');
    });

    it('should classify click-style decorated functions as commands', () => {
      expect(exported('build')?.kind).toBe('command');
      expect(exported('db')?.kind).toBe('command');
    });

    it('should capture docstrings', () => {
      expect(exported('greet')?.doc).toBe('Greet a person.');
      expect(exported('UserService')?.doc).toBe('Service for users.');
      expect(exported('db')?.doc).toBe('Database commands.');
      expect(exported('build')?.doc).toBeNull();
      expect(exported('MAX_SIZE')?.doc).toBeNull();
    });

    it('should build signatures from the definition header', () => {
      expect(exported('greet')?.signature).toBe('def greet(name: str) -> str');
      expect(exported('fetch')?.signature).toContain('def fetch(url)');
      expect(exported('UserService')?.signature).toBe('class UserService(Base)');
      expect(exported('MAX_SIZE')?.signature).toBe('MAX_SIZE = 10');
    });

    it('should span decorated definitions from the decorator', () => {
      expect(exported('greet')?.span.startLine).toBe(17);
      expect(exported('build')?.span.startLine).toBe(33);
    });
  });

  describe('imports', () => {
    it('should extract every import statement', () => {
      expect(record.imports.map(i => [i.specifier, i.names])).toEqual([
        ['os', []],
        ['pkg.sub', []],
        ['.', ['sibling']],
        ['..models', ['User', 'Order']],
        ['.helpers', []],
        ['typing', ['TYPE_CHECKING']],
        ['.types', ['Alias']],
      ]);
    });

    it('should mark imports under TYPE_CHECKING as type-only', () => {
      expect(record.imports.filter(i => i.typeOnly).map(i => i.specifier)).toEqual(['.types']);
    });
  });

  describe('__all__', () => {
    it('should restrict exports to the listed names', async () => {
      const result = await extractor.extract(
        'pkg/__init__.py',
        'from .core import engine\n__all__ = ["run", "engine"]\n\ndef run():\n    pass\n\ndef other():\n    pass\n',
        'python'
      );

      expect(result.exports.map(e => [e.name, e.kind])).toEqual([
        ['run', 'function'],
        ['engine', 're-export'],
      ]);
    });

    it('should export listed private names', async () => {
      const result = await extractor.extract(
        'pkg/util.py',
        "__all__ = ('_internal',)\n\ndef _internal():\n    pass\n",
        'python'
      );

      expect(result.exports.map(e => e.name)).toEqual(['_internal']);
    });
  });

  describe('degraded input', () => {
    it('should mark syntax errors partial', async () => {
      const result = await extractor.extract('app/broken.py', 'def broken(:\n    pass\n', 'python');

      expect(result.status.state).toBe('partial');
      if (result.status.state !== 'partial') return;
      expect(result.status.reason.code).toBe('PARSE_ERROR');
    });

    it('should fail files above the size limit', async () => {
      const small = new PythonExtractor({ maxFileSize: 8 });
      const result = await small.extract('app/big.py', 'VALUE = "0123456789"\n', 'python');

      expect(result.status).toEqual({
        state: 'failed',
        reason: { code: 'FILE_TOO_LARGE', message: 'File size (21 B) exceeds limit (8 B)' },
      });
    });

    it('should report no symbols for an empty module', async () => {
      const result = await extractor.extract('app/empty.py', '', 'python');

      expect(result.exports).toEqual([]);
      expect(result.imports).toEqual([]);
      expect(result.status).toEqual({ state: 'ok' });
    });
  });
});

describe('cleanDocstring', () => {
  it('should strip triple quotes', () => {
    expect(cleanDocstring('"""  Summary.  """')).toBe('Summary.');
    expect(cleanDocstring("'''Summary.'''")).toBe('Summary.');
  });

  it('should strip single quotes and string prefixes', () => {
    expect(cleanDocstring('"run"')).toBe('run');
    expect(cleanDocstring('r"""Raw \\d docs"""')).toBe('Raw \\d docs');
  });
});
