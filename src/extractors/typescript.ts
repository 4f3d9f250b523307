/**
 * TypeScript/JavaScript extractor using ts-morph
 */

import {
  Project,
  Node,
  SyntaxKind,
  VariableDeclarationKind,
  ts,
  type SourceFile,
  type Statement,
  type VariableStatement,
  type ExportDeclaration,
  type ImportDeclaration,
  type JSDoc,
} from 'ts-morph';

import type { ExportDecl, ExportKind, FileRecord, ImportDecl, Language, SourceSpan } from '../types/index.js';
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

const MAX_SIGNATURE_LENGTH = 300;

/** Constructors and factories whose result is a commander command */
const COMMAND_FACTORIES = new Set(['Command', 'createCommand']);

interface LocalDeclaration {
  kind: ExportKind;
  signature: string;
  doc: string | null;
  span: SourceSpan;
}

/**
 * Strip comment delimiters and leading asterisks from a JSDoc block
 */
export function cleanJsDoc(raw: string): string {
  return raw
    .replace(/^\/\*\*+/, '')
    .replace(/\*+\/$/, '')
    .split('\n')
    .map(line => line.replace(/^\s*\*(?!\/)\s?/, '').trimEnd())
    .join('\n')
    .trim();
}

export class TypeScriptExtractor implements SymbolExtractor {
  readonly name = 'typescript';
  readonly languages: readonly Language[] = ['typescript', 'javascript'];

  private project: Project;
  private options: ExtractorOptions;

  constructor(options: ExtractorOptions = {}) {
    this.options = options;
    this.project = new Project({
      useInMemoryFileSystem: true,
      compilerOptions: {
        target: ts.ScriptTarget.ESNext,
        module: ts.ModuleKind.ESNext,
        jsx: ts.JsxEmit.Preserve,
        allowJs: true,
        checkJs: false,
        noEmit: true,
        skipLibCheck: true,
        noLib: true,
      },
    });
  }

  async extract(path: string, content: string, language: Language): Promise<FileRecord> {
    if (isFileTooLarge(content, this.options.maxFileSize)) {
      return failedFileRecord(path, language, fileTooLargeReason(content, this.options.maxFileSize));
    }

    const sourceFile = this.project.createSourceFile(`/${path}`, content, { overwrite: true });

    try {
      const locals = this.collectLocalDeclarations(sourceFile);
      const exports: ExportDecl[] = [];
      const imports: ImportDecl[] = [];

      for (const statement of sourceFile.getStatements()) {
        this.visitStatement(sourceFile, statement, locals, exports, imports);
      }
      imports.push(...this.extractCallImports(sourceFile));

      const diagnostics = this.project.getProgram().getSyntacticDiagnostics(sourceFile);
      const first = diagnostics[0];
      if (first) {
        const message = first.getMessageText();
        const text = typeof message === 'string' ? message : message.getMessageText();
        const line = first.getLineNumber();
        return buildFileRecord(path, language, dedupeExports(exports), imports, {
          state: 'partial',
          reason: reason(
            'PARSE_ERROR',
            `${diagnostics.length} syntax error(s); first${line ? ` at line ${line}` : ''}: ${text}`
          ),
        });
      }

      return buildFileRecord(path, language, dedupeExports(exports), imports);
    } finally {
      this.project.removeSourceFile(sourceFile);
    }
  }

  private visitStatement(
    sourceFile: SourceFile,
    statement: Statement,
    locals: Map<string, LocalDeclaration>,
    exports: ExportDecl[],
    imports: ImportDecl[]
  ): void {
    if (Node.isImportDeclaration(statement)) {
      imports.push(this.importFromDeclaration(sourceFile, statement));
      return;
    }

    if (Node.isImportEqualsDeclaration(statement)) {
      const literal = statement.getModuleReference().getFirstDescendantByKind(SyntaxKind.StringLiteral);
      if (literal) {
        imports.push({
          specifier: literal.getLiteralValue(),
          names: [],
          typeOnly: false,
          span: this.spanOf(sourceFile, statement),
        });
      }
      return;
    }

    if (Node.isExportDeclaration(statement)) {
      this.visitExportDeclaration(sourceFile, statement, locals, exports, imports);
      return;
    }

    if (Node.isExportAssignment(statement)) {
      const expression = statement.getExpression();
      const local = Node.isIdentifier(expression) ? locals.get(expression.getText()) : undefined;
      exports.push({
        name: 'default',
        kind: local?.kind ?? 'variable',
        signature: this.truncate(normalizeSignature(statement.getText())),
        doc: this.docOfNode(statement) ?? local?.doc ?? null,
        span: this.spanOf(sourceFile, statement),
      });
      return;
    }

    if (Node.isVariableStatement(statement)) {
      if (!statement.hasExportKeyword()) return;
      for (const [name, decl] of this.variableDeclarations(sourceFile, statement)) {
        exports.push({ name, ...decl });
      }
      return;
    }

    if (
      Node.isFunctionDeclaration(statement) ||
      Node.isClassDeclaration(statement) ||
      Node.isInterfaceDeclaration(statement) ||
      Node.isTypeAliasDeclaration(statement) ||
      Node.isEnumDeclaration(statement) ||
      Node.isModuleDeclaration(statement)
    ) {
      if (!statement.hasExportKeyword()) return;
      const declaredName = statement.getName();
      const local = declaredName ? locals.get(declaredName) : undefined;
      const name = statement.isDefaultExport() ? 'default' : declaredName;
      if (!name) return;

      exports.push({
        name,
        kind: local?.kind ?? this.kindOfDeclaration(statement),
        signature: local?.signature ?? this.headerOf(sourceFile, statement),
        doc: local?.doc ?? this.docOf(statement.getJsDocs()),
        span: local?.span ?? this.spanOf(sourceFile, statement),
      });
    }
  }

  private visitExportDeclaration(
    sourceFile: SourceFile,
    statement: ExportDeclaration,
    locals: Map<string, LocalDeclaration>,
    exports: ExportDecl[],
    imports: ImportDecl[]
  ): void {
    const specifier = statement.getModuleSpecifierValue();
    const span = this.spanOf(sourceFile, statement);
    const signature = this.truncate(normalizeSignature(statement.getText()));
    const doc = this.docOfNode(statement);
    const typeOnly = statement.isTypeOnly();

    // export * from './m'  /  export * as ns from './m'
    const namespaceExport = statement.getNamespaceExport();
    if (specifier !== undefined && (namespaceExport || statement.isNamespaceExport())) {
      imports.push({ specifier, names: [], typeOnly, span });
      if (namespaceExport) {
        exports.push({ name: namespaceExport.getName(), kind: 'namespace', signature, doc, span });
      }
      return;
    }

    const importedNames: string[] = [];
    for (const named of statement.getNamedExports()) {
      const localName = named.getName();
      const exportedName = named.getAliasNode()?.getText() ?? localName;

      if (specifier !== undefined) {
        importedNames.push(localName);
        exports.push({ name: exportedName, kind: 're-export', signature, doc, span });
        continue;
      }

      const local = locals.get(localName);
      exports.push({
        name: exportedName,
        kind: local?.kind ?? 'variable',
        signature: local?.signature ?? signature,
        doc: local?.doc ?? doc,
        span: local?.span ?? span,
      });
    }

    if (specifier !== undefined) {
      imports.push({ specifier, names: importedNames, typeOnly, span });
    }
  }

  private importFromDeclaration(sourceFile: SourceFile, statement: ImportDeclaration): ImportDecl {
    const names: string[] = [];

    if (statement.getDefaultImport()) {
      names.push('default');
    }
    for (const named of statement.getNamedImports()) {
      names.push(named.getName());
    }

    // A namespace or side-effect import takes the whole module.
    const wholeModule = statement.getNamespaceImport() !== undefined || names.length === 0;

    return {
      specifier: statement.getModuleSpecifierValue(),
      names: wholeModule ? [] : names,
      typeOnly: statement.isTypeOnly(),
      span: this.spanOf(sourceFile, statement),
    };
  }

  /**
   * `require('x')` and `import('x')` with literal specifiers
   */
  private extractCallImports(sourceFile: SourceFile): ImportDecl[] {
    const imports: ImportDecl[] = [];

    for (const call of sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      const callee = call.getExpression();
      const isRequire = Node.isIdentifier(callee) && callee.getText() === 'require';
      const isDynamicImport = callee.getKind() === SyntaxKind.ImportKeyword;
      if (!isRequire && !isDynamicImport) continue;

      const args = call.getArguments();
      const first = args[0];
      if (args.length !== 1 || !first) continue;
      if (!Node.isStringLiteral(first) && !Node.isNoSubstitutionTemplateLiteral(first)) continue;

      imports.push({
        specifier: first.getLiteralValue(),
        names: [],
        typeOnly: false,
        span: this.spanOf(sourceFile, call),
      });
    }

    return imports;
  }

  /**
   * Every top-level declaration by name, exported or not, so that
   * `export { a as b }` lists can report the declaration they publish
   */
  private collectLocalDeclarations(sourceFile: SourceFile): Map<string, LocalDeclaration> {
    const locals = new Map<string, LocalDeclaration>();

    for (const statement of sourceFile.getStatements()) {
      if (Node.isVariableStatement(statement)) {
        for (const [name, decl] of this.variableDeclarations(sourceFile, statement)) {
          if (!locals.has(name)) locals.set(name, decl);
        }
        continue;
      }

      if (
        Node.isFunctionDeclaration(statement) ||
        Node.isClassDeclaration(statement) ||
        Node.isInterfaceDeclaration(statement) ||
        Node.isTypeAliasDeclaration(statement) ||
        Node.isEnumDeclaration(statement) ||
        Node.isModuleDeclaration(statement)
      ) {
        const name = statement.getName();
        if (!name || locals.has(name)) continue;
        locals.set(name, {
          kind: this.kindOfDeclaration(statement),
          signature: this.headerOf(sourceFile, statement),
          doc: this.docOf(statement.getJsDocs()),
          span: this.spanOf(sourceFile, statement),
        });
      }
    }

    return locals;
  }

  private variableDeclarations(
    sourceFile: SourceFile,
    statement: VariableStatement
  ): Array<[string, LocalDeclaration]> {
    const declarationKind = statement.getDeclarationKind();
    const doc = this.docOf(statement.getJsDocs());
    const result: Array<[string, LocalDeclaration]> = [];

    for (const decl of statement.getDeclarations()) {
      const nameNode = decl.getNameNode();
      if (!Node.isIdentifier(nameNode)) continue; // destructuring patterns are skipped

      const name = nameNode.getText();
      const initializer = decl.getInitializer();
      let kind: ExportKind = declarationKind === VariableDeclarationKind.Const ? 'constant' : 'variable';
      let signature = `${declarationKind} ${name}`;

      const typeNode = decl.getTypeNode();
      if (typeNode) {
        signature += `: ${typeNode.getText()}`;
      }

      if (initializer && (Node.isArrowFunction(initializer) || Node.isFunctionExpression(initializer))) {
        kind = 'function';
        const body = initializer.getBody();
        const header = sourceFile.getFullText().slice(decl.getStart(), body.getStart());
        signature = `${declarationKind} ${header.replace(/=>\s*$/, '=>').trim()}`;
      } else if (initializer && this.isCommandInitializer(initializer)) {
        kind = 'command';
      }

      result.push([
        name,
        {
          kind,
          signature: this.truncate(normalizeSignature(signature)),
          doc,
          span: this.spanOf(sourceFile, decl),
        },
      ]);
    }

    return result;
  }

  /**
   * Whether an initializer is a commander chain such as
   * `new Command('build').option(...).action(...)`
   */
  private isCommandInitializer(node: Node): boolean {
    let current: Node = node;

    while (true) {
      if (Node.isCallExpression(current)) {
        const callee = current.getExpression();
        if (Node.isIdentifier(callee)) {
          return COMMAND_FACTORIES.has(callee.getText());
        }
        current = callee;
      } else if (Node.isPropertyAccessExpression(current)) {
        current = current.getExpression();
      } else if (Node.isNewExpression(current)) {
        const constructorName = current.getExpression().getText().split('.').pop() ?? '';
        return COMMAND_FACTORIES.has(constructorName);
      } else if (Node.isParenthesizedExpression(current) || Node.isAsExpression(current)) {
        current = current.getExpression();
      } else {
        return false;
      }
    }
  }

  private kindOfDeclaration(statement: Node): ExportKind {
    if (Node.isFunctionDeclaration(statement)) return 'function';
    if (Node.isClassDeclaration(statement)) return 'class';
    if (Node.isInterfaceDeclaration(statement)) return 'interface';
    if (Node.isTypeAliasDeclaration(statement)) return 'type';
    if (Node.isEnumDeclaration(statement)) return 'enum';
    if (Node.isModuleDeclaration(statement)) return 'namespace';
    return 'variable';
  }

  /**
   * Declaration text up to (not including) its body or member list
   */
  private headerOf(sourceFile: SourceFile, node: Node): string {
    let end = node.getEnd();

    if (Node.isFunctionDeclaration(node) || Node.isModuleDeclaration(node)) {
      const body = node.getBody();
      if (body) end = body.getStart();
    } else {
      const brace = node.getFirstChildByKind(SyntaxKind.OpenBraceToken);
      if (brace && !Node.isTypeAliasDeclaration(node)) end = brace.getStart();
    }

    const text = sourceFile.getFullText().slice(node.getStart(), end).replace(/;\s*$/, '');
    return this.truncate(normalizeSignature(text));
  }

  private docOfNode(node: Node): string | null {
    return Node.isJSDocable(node) ? this.docOf(node.getJsDocs()) : null;
  }

  private docOf(jsDocs: JSDoc[]): string | null {
    const closest = jsDocs[jsDocs.length - 1];
    if (!closest) return null;
    const text = cleanJsDoc(closest.getText());
    return text.length > 0 ? text : null;
  }

  private spanOf(sourceFile: SourceFile, node: Node): SourceSpan {
    const start = sourceFile.getLineAndColumnAtPos(node.getStart());
    const end = sourceFile.getLineAndColumnAtPos(node.getEnd());
    return {
      startLine: start.line,
      startColumn: start.column,
      endLine: end.line,
      endColumn: end.column,
    };
  }

  private truncate(text: string): string {
    return text.length > MAX_SIGNATURE_LENGTH ? `${text.slice(0, MAX_SIGNATURE_LENGTH - 1)}…` : text;
  }
}
