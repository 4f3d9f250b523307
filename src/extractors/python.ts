/**
 * Python extractor using tree-sitter
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

import type { ExportDecl, ExportKind, FileRecord, ImportDecl, Language, SourceSpan } from '../types/index.js';
import { errorMessage } from '../errors.js';
import {
  buildFileRecord,
  dedupeExports,
  failedFileRecord,
  fileTooLargeReason,
  isFileTooLarge,
  normalizeSignature,
  reason,
  type ExtractorOptions,
  type SymbolExtractor,
} from './base.js';

interface TreeSitterNode {
  type: string;
  text: string;
  startPosition: { row: number; column: number };
  endPosition: { row: number; column: number };
  children: TreeSitterNode[];
  childForFieldName(name: string): TreeSitterNode | null;
  childrenForFieldName(name: string): TreeSitterNode[];
  namedChildren: TreeSitterNode[];
  parent: TreeSitterNode | null;
}

const MAX_SIGNATURE_LENGTH = 300;
const UPPER_CASE = /^[A-Z][A-Z0-9_]*$/;
const COMMAND_DECORATOR = /(^|\.)(command|group)$/;

interface TopLevelDefinition {
  name: string;
  node: TreeSitterNode;
  kind: ExportKind;
  signature: string;
  doc: string | null;
}

/**
 * Remove string prefixes and quotes from a Python string literal
 */
export function cleanDocstring(raw: string): string {
  let cleaned = raw.replace(/^[rRuUbBfF]{0,2}/, '');
  if (cleaned.startsWith('"""') || cleaned.startsWith("'''")) {
    cleaned = cleaned.slice(3, -3);
  } else if (cleaned.startsWith('"') || cleaned.startsWith("'")) {
    cleaned = cleaned.slice(1, -1);
  }
  return cleaned.trim();
}

export class PythonExtractor implements SymbolExtractor {
  readonly name = 'python';
  readonly languages: readonly Language[] = ['python'];

  private parser: Parser;
  private options: ExtractorOptions;

  constructor(options: ExtractorOptions = {}) {
    this.options = options;
    this.parser = new Parser();
    this.parser.setLanguage(Python as unknown as Parser.Language);
  }

  async extract(path: string, content: string, language: Language): Promise<FileRecord> {
    if (isFileTooLarge(content, this.options.maxFileSize)) {
      return failedFileRecord(path, language, fileTooLargeReason(content, this.options.maxFileSize));
    }

    let root: TreeSitterNode;
    try {
      // The default input buffer truncates sources above 32 KB.
      const tree = this.parser.parse(content, null, { bufferSize: Math.max(32 * 1024, content.length * 4) });
      root = tree.rootNode as unknown as TreeSitterNode;
    } catch (error) {
      return failedFileRecord(path, language, reason('PARSE_ERROR', errorMessage(error)));
    }

    const imports = this.extractImports(root);
    const exports = this.extractExports(root, imports);

    const errorNode = this.findErrorNode(root);
    if (errorNode) {
      return buildFileRecord(path, language, exports, imports, {
        state: 'partial',
        reason: reason('PARSE_ERROR', `Syntax error at line ${errorNode.startPosition.row + 1}`),
      });
    }

    return buildFileRecord(path, language, exports, imports);
  }

  private extractExports(root: TreeSitterNode, imports: ImportDecl[]): ExportDecl[] {
    const definitions = this.collectDefinitions(root);
    const allList = this.findAllList(root);

    if (!allList) {
      return dedupeExports(
        definitions
          .filter(def => !def.name.startsWith('_'))
          .map(def => this.toExport(def))
      );
    }

    // __all__ overrides the underscore convention
    const byName = new Map(definitions.map(def => [def.name, def]));
    const importedNames = new Set(imports.flatMap(imp => imp.names));
    const exports: ExportDecl[] = [];

    for (const name of allList.names) {
      const def = byName.get(name);
      if (def) {
        exports.push(this.toExport(def));
        continue;
      }
      exports.push({
        name,
        kind: importedNames.has(name) ? 're-export' : 'variable',
        signature: `__all__ += [${JSON.stringify(name)}]`,
        doc: null,
        span: this.spanOf(allList.node),
      });
    }

    return dedupeExports(exports);
  }

  private collectDefinitions(root: TreeSitterNode): TopLevelDefinition[] {
    const definitions: TopLevelDefinition[] = [];

    for (const child of root.namedChildren) {
      if (child.type === 'function_definition' || child.type === 'class_definition') {
        const def = this.parseDefinition(child, child, []);
        if (def) definitions.push(def);
      } else if (child.type === 'decorated_definition') {
        const definition = child.childForFieldName('definition');
        const decorators = child.namedChildren.filter(c => c.type === 'decorator').map(c => c.text);
        if (definition) {
          const def = this.parseDefinition(child, definition, decorators);
          if (def) definitions.push(def);
        }
      } else if (child.type === 'expression_statement') {
        const assignment = child.namedChildren[0];
        if (assignment?.type !== 'assignment') continue;
        const left = assignment.childForFieldName('left');
        if (left?.type !== 'identifier' || left.text === '__all__') continue;

        definitions.push({
          name: left.text,
          node: child,
          kind: UPPER_CASE.test(left.text) ? 'constant' : 'variable',
          signature: this.truncate(normalizeSignature(child.text)),
          doc: null,
        });
      }
    }

    return definitions;
  }

  private parseDefinition(
    outer: TreeSitterNode,
    definition: TreeSitterNode,
    decorators: string[]
  ): TopLevelDefinition | null {
    const name = definition.childForFieldName('name')?.text;
    if (!name) return null;

    const doc = this.parseDocstring(definition);

    if (definition.type === 'class_definition') {
      const bases = definition.childForFieldName('superclasses')?.text ?? '';
      return { name, node: outer, kind: 'class', signature: `class ${name}${bases}`, doc };
    }

    if (definition.type !== 'function_definition') return null;

    const isAsync = definition.children[0]?.type === 'async';
    const params = definition.childForFieldName('parameters')?.text ?? '()';
    const returnType = definition.childForFieldName('return_type')?.text;
    const signature = `${isAsync ? 'async ' : ''}def ${name}${params}${returnType ? ` -> ${returnType}` : ''}`;

    return {
      name,
      node: outer,
      kind: decorators.some(d => this.isCommandDecorator(d)) ? 'command' : 'function',
      signature: this.truncate(normalizeSignature(signature)),
      doc,
    };
  }

  /**
   * `@cli.command()`, `@click.group(name="x")`, `@app.command`
   */
  private isCommandDecorator(decorator: string): boolean {
    const match = /^@\s*([\w.]+)/.exec(decorator);
    return match?.[1] !== undefined && COMMAND_DECORATOR.test(match[1]);
  }

  private parseDocstring(node: TreeSitterNode): string | null {
    const body = node.childForFieldName('body');
    const firstStatement = body?.namedChildren[0];
    if (!firstStatement || firstStatement.type !== 'expression_statement') return null;

    const expr = firstStatement.namedChildren[0];
    if (!expr || expr.type !== 'string') return null;

    const docstring = cleanDocstring(expr.text);
    return docstring.length > 0 ? docstring : null;
  }

  private findAllList(root: TreeSitterNode): { node: TreeSitterNode; names: string[] } | null {
    for (const child of root.namedChildren) {
      if (child.type !== 'expression_statement') continue;
      const assignment = child.namedChildren[0];
      if (assignment?.type !== 'assignment') continue;
      if (assignment.childForFieldName('left')?.text !== '__all__') continue;

      const right = assignment.childForFieldName('right');
      if (!right || (right.type !== 'list' && right.type !== 'tuple')) continue;

      const names = right.namedChildren.filter(item => item.type === 'string').map(item => cleanDocstring(item.text));
      return { node: child, names };
    }
    return null;
  }

  private extractImports(root: TreeSitterNode): ImportDecl[] {
    const imports: ImportDecl[] = [];

    this.walk(root, node => {
      if (node.type === 'import_statement') {
        // import a.b, c as d
        for (const child of node.namedChildren) {
          const moduleName = child.type === 'aliased_import' ? child.childForFieldName('name') : child;
          if (moduleName?.type !== 'dotted_name') continue;
          imports.push({ specifier: moduleName.text, names: [], typeOnly: false, span: this.spanOf(node) });
        }
        return false;
      }

      if (node.type === 'import_from_statement') {
        const specifier = node.childForFieldName('module_name')?.text;
        if (!specifier) return false;

        const wildcard = node.namedChildren.some(c => c.type === 'wildcard_import');
        const names: string[] = [];
        for (const nameNode of node.childrenForFieldName('name')) {
          const imported = nameNode.type === 'aliased_import' ? nameNode.childForFieldName('name') : nameNode;
          if (imported) names.push(imported.text);
        }

        imports.push({
          specifier,
          names: wildcard ? [] : names,
          typeOnly: this.isTypeCheckingBlock(node),
          span: this.spanOf(node),
        });
        return false;
      }

      return true;
    });

    return imports;
  }

  /**
   * Imports under `if TYPE_CHECKING:` are only seen by type checkers
   */
  private isTypeCheckingBlock(node: TreeSitterNode): boolean {
    for (let current = node.parent; current; current = current.parent) {
      if (current.type === 'if_statement') {
        const condition = current.childForFieldName('condition')?.text ?? '';
        if (/(^|\.)TYPE_CHECKING$/.test(condition)) return true;
      }
    }
    return false;
  }

  private findErrorNode(root: TreeSitterNode): TreeSitterNode | null {
    let found: TreeSitterNode | null = null;
    this.walk(root, node => {
      if (found) return false;
      if (node.type === 'ERROR') {
        found = node;
        return false;
      }
      return true;
    });
    return found;
  }

  /**
   * Depth-first walk; the visitor returns false to skip a node's children
   */
  private walk(node: TreeSitterNode, visit: (node: TreeSitterNode) => boolean): void {
    if (!visit(node)) return;
    for (const child of node.children) {
      this.walk(child, visit);
    }
  }

  private toExport(def: TopLevelDefinition): ExportDecl {
    return {
      name: def.name,
      kind: def.kind,
      signature: def.signature,
      doc: def.doc,
      span: this.spanOf(def.node),
    };
  }

  private spanOf(node: TreeSitterNode): SourceSpan {
    return {
      startLine: node.startPosition.row + 1,
      startColumn: node.startPosition.column + 1,
      endLine: node.endPosition.row + 1,
      endColumn: node.endPosition.column + 1,
    };
  }

  private truncate(text: string): string {
    return text.length > MAX_SIGNATURE_LENGTH ? `${text.slice(0, MAX_SIGNATURE_LENGTH - 1)}…` : text;
  }
}
