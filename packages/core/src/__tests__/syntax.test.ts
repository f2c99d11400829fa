import { describe, expect, it } from 'vitest';
import { NullSyntaxProvider, type SyntaxTree, TypeScriptSyntaxProvider } from '../syntax.js';

function treeOf(text: string, language = 'typescript'): SyntaxTree {
  const result = new TypeScriptSyntaxProvider().parse(text, language);
  if (result.status !== 'ok') throw new Error(result.reason);
  return result.tree;
}

describe('NullSyntaxProvider', () => {
  it('supports nothing', () => {
    const provider = new NullSyntaxProvider();
    expect(provider.supports('typescript')).toBe(false);
    expect(provider.parse('const a = 1;', 'typescript').status).toBe('unavailable');
  });
});

describe('TypeScriptSyntaxProvider', () => {
  const provider = new TypeScriptSyntaxProvider();

  it('supports the TypeScript family of languages', () => {
    for (const language of ['typescript', 'TS', '.tsx', 'javascript', 'jsx', 'mjs', 'arkts', 'ets']) {
      expect(provider.supports(language)).toBe(true);
    }
  });

  it('rejects other languages', () => {
    expect(provider.supports('python')).toBe(false);
    expect(provider.supports('constructor')).toBe(false);
    expect(provider.parse('def f(): pass', 'python').status).toBe('unavailable');
  });

  it('returns function bodies with braces and without headers', () => {
    const text = [
      'function add(a: number, b: number) {',
      '  return a + b;',
      '}',
      'const noop = () => {};',
      'const double = (x: number) => x * 2;',
    ].join('\n');
    const bodies = treeOf(text).functionBodies();
    expect(bodies).toEqual([{ start: text.indexOf('{'), end: text.indexOf('}') + 1 }]);
    expect(text.slice(bodies[0].start, bodies[0].end)).toBe('{\n  return a + b;\n}');
  });

  it('includes methods, constructors and accessors', () => {
    const text = [
      'class Counter {',
      '  constructor() { this.count = 0; }',
      '  get value() { return this.count; }',
      '  increment() { this.count++; }',
      '}',
    ].join('\n');
    const bodies = treeOf(text).functionBodies();
    expect(bodies.map((b) => text.slice(b.start, b.end))).toEqual([
      '{ this.count = 0; }',
      '{ return this.count; }',
      '{ this.count++; }',
    ]);
  });

  it('lists identifiers in source order', () => {
    const text = 'const total = price * qty;';
    const idents = treeOf(text).identifiers();
    expect(idents.map((r) => text.slice(r.start, r.end))).toEqual(['total', 'price', 'qty']);
  });

  it('parses JSX with the tsx grammar', () => {
    const text = 'const el = <div>{value}</div>;';
    const names = treeOf(text, 'tsx')
      .identifiers()
      .map((r) => text.slice(r.start, r.end));
    expect(names).toContain('value');
  });
});
