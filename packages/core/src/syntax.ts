// ============================================================================
// @fimsmith/core — Syntax Collaborator
// ============================================================================
//
// Optional per-language capability. Strategies that need it ask
// `supports(language)` before drawing and treat `unavailable` as a reason to
// move their probability mass elsewhere, never as a fatal condition.
//
// The bundled provider parses with the TypeScript compiler API. ArkTS (.ets)
// is close enough to TypeScript that its grammar is reused.
// ============================================================================

import ts from 'typescript';
import type { TextRange } from './types.js';

export interface SyntaxTree {
  /** Body blocks of function-like declarations, braces included, header excluded. */
  functionBodies(): TextRange[];
  /** Identifier occurrences in source order. */
  identifiers(): TextRange[];
}

export type ParseResult =
  | { status: 'ok'; tree: SyntaxTree }
  | { status: 'unavailable'; reason: string };

export interface SyntaxProvider {
  supports(language: string): boolean;
  parse(text: string, language: string): ParseResult;
}

// ---- Null Provider ----

/**
 * Supports no language. Runs with it degrade to the non-syntactic strategies.
 */
export class NullSyntaxProvider implements SyntaxProvider {
  supports(_language: string): boolean {
    return false;
  }

  parse(_text: string, language: string): ParseResult {
    return { status: 'unavailable', reason: `no parser configured for ${language}` };
  }
}

// ---- TypeScript Provider ----

const SCRIPT_KINDS: Record<string, ts.ScriptKind> = {
  typescript: ts.ScriptKind.TS,
  ts: ts.ScriptKind.TS,
  mts: ts.ScriptKind.TS,
  cts: ts.ScriptKind.TS,
  arkts: ts.ScriptKind.TS,
  ets: ts.ScriptKind.TS,
  tsx: ts.ScriptKind.TSX,
  javascript: ts.ScriptKind.JS,
  js: ts.ScriptKind.JS,
  mjs: ts.ScriptKind.JS,
  cjs: ts.ScriptKind.JS,
  jsx: ts.ScriptKind.JSX,
};

const FILE_EXTENSIONS: Partial<Record<ts.ScriptKind, string>> = {
  [ts.ScriptKind.TS]: 'ts',
  [ts.ScriptKind.TSX]: 'tsx',
  [ts.ScriptKind.JS]: 'js',
  [ts.ScriptKind.JSX]: 'jsx',
};

function scriptKindFor(language: string): ts.ScriptKind | undefined {
  const key = language.trim().toLowerCase().replace(/^\./, '');
  return Object.hasOwn(SCRIPT_KINDS, key) ? SCRIPT_KINDS[key] : undefined;
}

function functionBodyOf(node: ts.Node): ts.Block | undefined {
  if (
    ts.isFunctionDeclaration(node) ||
    ts.isFunctionExpression(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isConstructorDeclaration(node) ||
    ts.isGetAccessorDeclaration(node) ||
    ts.isSetAccessorDeclaration(node)
  ) {
    return node.body;
  }
  if (ts.isArrowFunction(node) && ts.isBlock(node.body)) {
    return node.body;
  }
  return undefined;
}

class TypeScriptSyntaxTree implements SyntaxTree {
  private bodies?: TextRange[];
  private idents?: TextRange[];

  constructor(private readonly source: ts.SourceFile) {}

  functionBodies(): TextRange[] {
    if (!this.bodies) {
      const bodies: TextRange[] = [];
      const visit = (node: ts.Node): void => {
        const body = functionBodyOf(node);
        // empty `{}` bodies carry nothing worth predicting
        if (body && body.statements.length > 0) {
          bodies.push({ start: body.getStart(this.source), end: body.getEnd() });
        }
        ts.forEachChild(node, visit);
      };
      visit(this.source);
      this.bodies = bodies.sort((a, b) => a.start - b.start || a.end - b.end);
    }
    return this.bodies;
  }

  identifiers(): TextRange[] {
    if (!this.idents) {
      const idents: TextRange[] = [];
      const visit = (node: ts.Node): void => {
        if (ts.isIdentifier(node) || ts.isPrivateIdentifier(node)) {
          idents.push({ start: node.getStart(this.source), end: node.getEnd() });
        }
        ts.forEachChild(node, visit);
      };
      visit(this.source);
      this.idents = idents.sort((a, b) => a.start - b.start);
    }
    return this.idents;
  }
}

/**
 * Parses TypeScript, JavaScript and ArkTS sources. The compiler's parser is
 * error-tolerant, so malformed code still yields a (partial) tree.
 */
export class TypeScriptSyntaxProvider implements SyntaxProvider {
  supports(language: string): boolean {
    return scriptKindFor(language) !== undefined;
  }

  parse(text: string, language: string): ParseResult {
    const kind = scriptKindFor(language);
    if (kind === undefined) {
      return { status: 'unavailable', reason: `unsupported language: ${language}` };
    }
    const fileName = `input.${FILE_EXTENSIONS[kind] ?? 'ts'}`;
    const source = ts.createSourceFile(fileName, text, ts.ScriptTarget.Latest, true, kind);
    return { status: 'ok', tree: new TypeScriptSyntaxTree(source) };
  }
}
