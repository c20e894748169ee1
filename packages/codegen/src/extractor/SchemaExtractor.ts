/**
 * Schema Extractor
 *
 * Reads table declarations out of TypeScript source without running it.
 * Declarations that are not schema tables are skipped silently; recognized
 * tables with unreadable parts produce warnings instead of failures.
 */

import * as ts from 'typescript';

import {
  ColumnType,
  DSL_MODULES,
  ParseFailureError,
  acceptsDefault,
  createColumnDeclaration,
  createEntity,
  deriveEntityName,
  dialectType,
  isColumnTypeMember,
  isDialectColumnKind,
  isDialectName,
  isNumericType,
  isSharedColumnKind,
  nameOf,
  sharedType,
  type AbstractColumnType,
  type ColumnDeclaration,
  type ColumnDeclarationInput,
  type ColumnDefault,
  type EntityDescriptor,
  type SyntaxProblem,
} from '@tabula/core';

import { isIntegerLiteral, parseDecimalLiteral, parseIntegerLiteral } from './literals';

import type { ExtractionDiagnostic, ExtractionResult, SchemaExtractorOptions } from './types';

/**
 * Local names under which the DSL is visible in one source file
 */
interface DslBindings {
  /** Local identifier -> exported DSL name */
  named: Map<string, string>;
  /** Namespace and default import identifiers */
  namespaces: Set<string>;
}

function collectBindings(sourceFile: ts.SourceFile, modules: readonly string[]): DslBindings {
  const bindings: DslBindings = { named: new Map(), namespaces: new Set() };

  for (const statement of sourceFile.statements) {
    if (
      !ts.isImportDeclaration(statement) ||
      !ts.isStringLiteral(statement.moduleSpecifier) ||
      !modules.includes(statement.moduleSpecifier.text)
    ) {
      continue;
    }
    const clause = statement.importClause;
    if (!clause) {
      continue;
    }
    if (clause.name) {
      bindings.namespaces.add(clause.name.text);
    }
    const namedBindings = clause.namedBindings;
    if (!namedBindings) {
      continue;
    }
    if (ts.isNamespaceImport(namedBindings)) {
      bindings.namespaces.add(namedBindings.name.text);
    } else {
      for (const element of namedBindings.elements) {
        bindings.named.set(element.name.text, element.propertyName?.text ?? element.name.text);
      }
    }
  }

  return bindings;
}

function syntaxProblems(source: string, fileName: string): SyntaxProblem[] {
  const { diagnostics = [] } = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { target: ts.ScriptTarget.ES2022, module: ts.ModuleKind.CommonJS },
  });

  return diagnostics
    .filter((diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error)
    .map((diagnostic) => {
      const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
      if (!diagnostic.file || diagnostic.start === undefined) {
        return { message, line: 1, column: 1 };
      }
      const position = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
      return { message, line: position.line + 1, column: position.character + 1 };
    });
}

function stringLiteralText(node: ts.Expression): string | undefined {
  if (ts.isStringLiteral(node) || ts.isNoSubstitutionTemplateLiteral(node)) {
    return node.text;
  }
  return undefined;
}

function propertyNameText(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) {
    return name.text;
  }
  return undefined;
}

function unwrapParentheses(node: ts.Expression): ts.Expression {
  let current = node;
  while (ts.isParenthesizedExpression(current)) {
    current = current.expression;
  }
  return current;
}

/**
 * Per-file extraction state
 */
class FileExtraction {
  readonly diagnostics: ExtractionDiagnostic[] = [];
  private readonly bindings: DslBindings;

  constructor(
    private readonly sourceFile: ts.SourceFile,
    modules: readonly string[],
  ) {
    this.bindings = collectBindings(sourceFile, modules);
  }

  run(): EntityDescriptor[] {
    if (this.bindings.named.size === 0 && this.bindings.namespaces.size === 0) {
      return [];
    }

    const entities: EntityDescriptor[] = [];
    const entityNames = new Set<string>();

    for (const statement of this.sourceFile.statements) {
      if (!ts.isVariableStatement(statement)) {
        continue;
      }
      for (const declaration of statement.declarationList.declarations) {
        const entity = this.readDeclaration(declaration);
        if (!entity) {
          continue;
        }
        if (entityNames.has(entity.name)) {
          this.warn(declaration, `Duplicate entity ${entity.name}; declaration skipped`, entity.name);
          continue;
        }
        entityNames.add(entity.name);
        entities.push(entity);
      }
    }

    return entities;
  }

  // ============================================
  // Name resolution
  // ============================================

  /**
   * Exported DSL name an expression refers to, through a named, renamed or
   * namespace import
   */
  private resolveDslName(node: ts.Node): string | undefined {
    if (ts.isIdentifier(node)) {
      return this.bindings.named.get(node.text);
    }
    if (
      ts.isPropertyAccessExpression(node) &&
      ts.isIdentifier(node.expression) &&
      this.bindings.namespaces.has(node.expression.text)
    ) {
      return node.name.text;
    }
    return undefined;
  }

  private resolveDslTypeName(node: ts.TypeNode): string | undefined {
    if (!ts.isTypeReferenceNode(node)) {
      return undefined;
    }
    const typeName = node.typeName;
    if (ts.isIdentifier(typeName)) {
      return this.bindings.named.get(typeName.text);
    }
    if (ts.isIdentifier(typeName.left) && this.bindings.namespaces.has(typeName.left.text)) {
      return typeName.right.text;
    }
    return undefined;
  }

  /**
   * Column factories resolve through imports, or by their own name
   */
  private resolveFactoryName(callee: ts.Expression): string | undefined {
    const resolved = this.resolveDslName(callee);
    if (resolved !== undefined) {
      return resolved;
    }
    return ts.isIdentifier(callee) ? callee.text : undefined;
  }

  /**
   * Options match by name under any qualifier
   */
  private optionName(callee: ts.Expression): string | undefined {
    if (ts.isIdentifier(callee)) {
      return this.bindings.named.get(callee.text) ?? callee.text;
    }
    if (ts.isPropertyAccessExpression(callee)) {
      return callee.name.text;
    }
    return undefined;
  }

  // ============================================
  // Tables
  // ============================================

  /**
   * Object literal of a table declaration: `table({...})`, `x: Table = {...}`
   * or `{...} satisfies Table`
   */
  private tableLiteral(declaration: ts.VariableDeclaration): ts.ObjectLiteralExpression | undefined {
    if (!declaration.initializer) {
      return undefined;
    }
    let initializer = unwrapParentheses(declaration.initializer);
    let typed = declaration.type !== undefined && this.resolveDslTypeName(declaration.type) === 'Table';

    while (ts.isSatisfiesExpression(initializer) || ts.isAsExpression(initializer)) {
      typed ||= this.resolveDslTypeName(initializer.type) === 'Table';
      initializer = unwrapParentheses(initializer.expression);
    }

    if (ts.isCallExpression(initializer) && this.resolveDslName(initializer.expression) === 'table') {
      const [argument] = initializer.arguments;
      return argument && ts.isObjectLiteralExpression(argument) ? argument : undefined;
    }

    return typed && ts.isObjectLiteralExpression(initializer) ? initializer : undefined;
  }

  private readDeclaration(declaration: ts.VariableDeclaration): EntityDescriptor | undefined {
    if (!ts.isIdentifier(declaration.name)) {
      return undefined;
    }
    const literal = this.tableLiteral(declaration);
    if (!literal) {
      return undefined;
    }

    const entityName = deriveEntityName(declaration.name.text);
    let tableName: string | undefined;
    let columnsNode: ts.Expression | undefined;

    for (const property of literal.properties) {
      if (!ts.isPropertyAssignment(property)) {
        continue;
      }
      const key = propertyNameText(property.name);
      if (key === 'name') {
        tableName = stringLiteralText(property.initializer);
        if (tableName === undefined) {
          this.warn(property.initializer, 'Table name must be a string literal', entityName);
        }
      } else if (key === 'columns') {
        columnsNode = property.initializer;
      }
    }

    if (!tableName) {
      return undefined;
    }

    let columns: ColumnDeclaration[] = [];
    if (columnsNode) {
      if (ts.isArrayLiteralExpression(columnsNode)) {
        columns = this.readColumns(columnsNode, entityName);
      } else {
        this.warn(columnsNode, 'Table columns must be an array literal', entityName);
      }
    }

    return createEntity(entityName, tableName, columns);
  }

  // ============================================
  // Columns
  // ============================================

  private readColumns(list: ts.ArrayLiteralExpression, entity: string): ColumnDeclaration[] {
    const columns: ColumnDeclaration[] = [];
    const names = new Set<string>();

    for (const element of list.elements) {
      const column = this.readColumn(element, entity);
      if (!column) {
        continue;
      }
      if (names.has(column.name)) {
        this.warn(element, `Duplicate column ${column.name}; later declaration skipped`, entity);
        continue;
      }
      names.add(column.name);
      columns.push(column);
    }

    return columns;
  }

  private readColumn(element: ts.Expression, entity: string): ColumnDeclaration | undefined {
    if (!ts.isCallExpression(element)) {
      this.warn(element, 'Column must be a column constructor call', entity);
      return undefined;
    }

    const factory = this.resolveFactoryName(element.expression);
    if (factory === undefined || !isSharedColumnKind(factory)) {
      this.warn(
        element.expression,
        `Unrecognized column constructor ${element.expression.getText(this.sourceFile)}`,
        entity,
      );
      return undefined;
    }

    const [nameArgument, ...optionArguments] = element.arguments;
    const name = nameArgument ? stringLiteralText(nameArgument) : undefined;
    if (!name) {
      this.warn(element, 'Column name must be a non-empty string literal', entity);
      return undefined;
    }

    const input: ColumnDeclarationInput = { name, abstractType: sharedType(factory) };
    let autoIncrementNode: ts.Node | undefined;
    let defaultNode: ts.Node | undefined;

    for (const argument of optionArguments) {
      if (!ts.isCallExpression(argument)) {
        continue;
      }
      switch (this.optionName(argument.expression)) {
        case 'withAutoIncrement': {
          const enabled = this.readBoolean(argument.arguments[0]);
          if (enabled === undefined) {
            this.warn(argument, 'withAutoIncrement expects a boolean literal', entity);
          } else {
            input.autoIncrement = enabled;
            autoIncrementNode = argument;
          }
          break;
        }
        case 'withType': {
          this.readTypeOption(argument, input, entity);
          break;
        }
        case 'withDefault': {
          const value = this.readDefault(argument, entity);
          if (value !== undefined) {
            input.defaultValue = value;
            defaultNode = argument;
          }
          break;
        }
        case 'withLength': {
          input.length = this.readInteger(argument, argument.arguments[0], 'length', entity);
          break;
        }
        case 'withPrecision': {
          input.precision = this.readInteger(argument, argument.arguments[0], 'precision', entity);
          input.scale = this.readInteger(argument, argument.arguments[1], 'scale', entity);
          break;
        }
        default: {
          break;
        }
      }
    }

    if (input.autoIncrement && autoIncrementNode && !isNumericType(input.abstractType)) {
      this.warn(autoIncrementNode, `Auto-increment ignored on non-numeric column ${name}`, entity);
      input.autoIncrement = false;
    }

    if (
      input.defaultValue &&
      defaultNode &&
      !acceptsDefault(input.abstractType, input.defaultValue.kind)
    ) {
      this.warn(
        defaultNode,
        `Default of kind ${input.defaultValue.kind} ignored on ${nameOf(input.abstractType)} column ${name}`,
        entity,
      );
      input.defaultValue = undefined;
    }

    return createColumnDeclaration(input);
  }

  // ============================================
  // Option arguments
  // ============================================

  private readTypeOption(call: ts.CallExpression, input: ColumnDeclarationInput, entity: string): void {
    const [argument] = call.arguments;
    if (!argument) {
      this.warn(call, 'withType expects a type', entity);
      return;
    }

    const raw = stringLiteralText(argument);
    if (raw !== undefined) {
      input.explicitType = raw;
      return;
    }

    const type = this.readColumnType(argument);
    if (!type) {
      this.warn(argument, `Unrecognized column type ${argument.getText(this.sourceFile)}`, entity);
      return;
    }
    input.abstractType = type;
    input.explicitType = nameOf(type);
  }

  /**
   * `ColumnType.Member` or `dialectType('dialect', 'kind')`
   */
  private readColumnType(node: ts.Expression): AbstractColumnType | undefined {
    if (ts.isPropertyAccessExpression(node)) {
      const member = node.name.text;
      if (this.resolveDslName(node.expression) === 'ColumnType' && isColumnTypeMember(member)) {
        return ColumnType[member];
      }
      return undefined;
    }

    if (ts.isCallExpression(node) && this.resolveDslName(node.expression) === 'dialectType') {
      const [dialectNode, kindNode] = node.arguments;
      const dialect = dialectNode ? stringLiteralText(dialectNode) : undefined;
      const kind = kindNode ? stringLiteralText(kindNode) : undefined;
      if (
        dialect !== undefined &&
        kind !== undefined &&
        isDialectName(dialect) &&
        isDialectColumnKind(dialect, kind)
      ) {
        return dialectType(dialect, kind);
      }
    }

    return undefined;
  }

  private readBoolean(node: ts.Expression | undefined): boolean | undefined {
    if (node?.kind === ts.SyntaxKind.TrueKeyword) {
      return true;
    }
    if (node?.kind === ts.SyntaxKind.FalseKeyword) {
      return false;
    }
    return undefined;
  }

  /**
   * Numeric literal text, with an optional leading minus
   */
  private numericText(node: ts.Expression): { raw: string; negative: boolean } | undefined {
    if (ts.isNumericLiteral(node)) {
      return { raw: node.getText(this.sourceFile), negative: false };
    }
    if (
      ts.isPrefixUnaryExpression(node) &&
      node.operator === ts.SyntaxKind.MinusToken &&
      ts.isNumericLiteral(node.operand)
    ) {
      return { raw: node.operand.getText(this.sourceFile), negative: true };
    }
    return undefined;
  }

  /**
   * `withDefault` argument. Integer literals outside the exact range are
   * rejected rather than read as floats.
   */
  private readDefault(call: ts.CallExpression, entity: string): ColumnDefault | undefined {
    const [node] = call.arguments;
    const text = node ? stringLiteralText(node) : undefined;
    if (text !== undefined) {
      return { kind: 'string', value: text };
    }
    const bool = this.readBoolean(node);
    if (bool !== undefined) {
      return { kind: 'boolean', value: bool };
    }
    const numeric = node ? this.numericText(node) : undefined;
    if (numeric && isIntegerLiteral(numeric.raw)) {
      const integer = parseIntegerLiteral(numeric.raw, numeric.negative);
      if (integer === undefined) {
        this.warn(call, `Default ${numeric.raw} is outside the exact integer range`, entity);
        return undefined;
      }
      return { kind: 'integer', value: integer };
    }
    const decimal = numeric ? parseDecimalLiteral(numeric.raw, numeric.negative) : undefined;
    if (decimal === undefined) {
      this.warn(call, 'withDefault expects a string, number or boolean literal', entity);
      return undefined;
    }
    return { kind: 'float', value: decimal };
  }

  /**
   * Non-negative integer literal argument; anything else leaves the
   * attribute unset
   */
  private readInteger(
    call: ts.CallExpression,
    node: ts.Expression | undefined,
    attribute: string,
    entity: string,
  ): number | undefined {
    const numeric = node && ts.isNumericLiteral(node) ? node.getText(this.sourceFile) : undefined;
    const value = numeric === undefined ? undefined : parseIntegerLiteral(numeric);
    if (value === undefined) {
      this.warn(node ?? call, `Invalid ${attribute}: expected an integer literal`, entity);
    }
    return value;
  }

  private warn(node: ts.Node, message: string, entity?: string): void {
    const position = this.sourceFile.getLineAndCharacterOfPosition(node.getStart(this.sourceFile));
    this.diagnostics.push({
      severity: 'warning',
      message,
      fileName: this.sourceFile.fileName,
      line: position.line + 1,
      column: position.character + 1,
      entity,
    });
  }
}

export class SchemaExtractor {
  private readonly modules: readonly string[];

  constructor(options: SchemaExtractorOptions = {}) {
    this.modules = options.modules ?? DSL_MODULES;
  }

  /**
   * Extract entities and warnings from one source text.
   *
   * @throws ParseFailureError when the text is not valid TypeScript
   */
  extract(source: string, fileName = 'schema.ts'): ExtractionResult {
    const problems = syntaxProblems(source, fileName);
    if (problems.length > 0) {
      throw new ParseFailureError(fileName, problems);
    }

    const sourceFile = ts.createSourceFile(
      fileName,
      source,
      ts.ScriptTarget.Latest,
      true,
      ts.ScriptKind.TS,
    );
    const extraction = new FileExtraction(sourceFile, this.modules);
    const entities = extraction.run();
    return { entities, diagnostics: extraction.diagnostics };
  }
}

const defaultExtractor = new SchemaExtractor();

/**
 * Extract entities and warnings using the default DSL modules
 */
export function extractWithDiagnostics(source: string, fileName = 'schema.ts'): ExtractionResult {
  return defaultExtractor.extract(source, fileName);
}

/**
 * Extract entities from schema source text
 *
 * @example
 * ```typescript
 * const [user] = extract(`
 *   import { table, int } from '@tabula/core';
 *   export const UserSchema = table({ name: 'users', columns: [int('id')] });
 * `);
 * user.name; // 'User'
 * ```
 */
export function extract(source: string): EntityDescriptor[] {
  return defaultExtractor.extract(source).entities;
}
