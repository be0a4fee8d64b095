import { describe, it, expect } from 'vitest';
import { parseSource } from '../../src/syntax/parser.js';
import { SourceSyntaxError } from '../../src/syntax/tokenizer.js';
import type { Expr, Stmt } from '../../src/syntax/nodes.js';

function firstStatement(source: string): Stmt {
  const [stmt] = parseSource(source).body;
  return stmt;
}

/** Right-hand side of `v = <source>`. */
function valueOf(source: string): Expr {
  const stmt = firstStatement(`v = ${source}\n`);
  if (stmt.kind !== 'assign') throw new Error(`expected an assignment, got ${stmt.kind}`);
  return stmt.value;
}

describe('parseSource – statements', () => {
  it('parses an assignment with positions', () => {
    expect(firstStatement('x = 1\n')).toEqual({
      kind: 'assign',
      targets: [{ kind: 'name', id: 'x', line: 1, column: 1 }],
      value: { kind: 'constant', value: 1, line: 1, column: 5 },
      line: 1,
      column: 1,
    });
  });

  it('keeps every target of a chained assignment', () => {
    const stmt = firstStatement('a = b = 3\n');
    expect(stmt.kind).toBe('assign');
    if (stmt.kind === 'assign') {
      expect(stmt.targets.map((t) => (t.kind === 'name' ? t.id : t.kind))).toEqual(['a', 'b']);
      expect(stmt.value).toMatchObject({ kind: 'constant', value: 3 });
    }
  });

  it('parses annotated assignments with and without a value', () => {
    expect(firstStatement('self.metadata: Dict[str, Any] = {"a": 1}\n')).toMatchObject({
      kind: 'annassign',
      target: { kind: 'attribute', attr: 'metadata', value: { kind: 'name', id: 'self' } },
      annotation: { kind: 'other', type: 'Subscript' },
      value: { kind: 'dict' },
    });
    expect(firstStatement('count: int\n')).toMatchObject({ kind: 'annassign', value: null });
  });

  it('parses augmented assignment', () => {
    expect(firstStatement('x += 1\n')).toMatchObject({ kind: 'augassign', op: '+=' });
  });

  it('parses bare and valued returns', () => {
    const fn = firstStatement('def f():\n    return\n    return 1, 2\n');
    expect(fn.kind).toBe('function');
    if (fn.kind === 'function') {
      expect(fn.body).toMatchObject([
        { kind: 'return', value: null },
        { kind: 'return', value: { kind: 'other', type: 'Tuple' } },
      ]);
    }
  });

  it('parses a class with bases, keywords and a body', () => {
    const cls = firstStatement('class A(B, metaclass=M):\n    pass\n');
    expect(cls).toMatchObject({
      kind: 'class',
      name: 'A',
      bases: [
        { kind: 'name', id: 'B' },
        { kind: 'name', id: 'M' },
      ],
      body: [{ kind: 'simple', keyword: 'pass' }],
    });
  });

  it('parses decorated async functions and skips their signatures', () => {
    const fn = firstStatement('@dec(1)\nasync def f(a, b: int = 2, *args, **kw) -> Dict[str, int]:\n    return a\n');
    expect(fn).toMatchObject({
      kind: 'function',
      name: 'f',
      isAsync: true,
      decorators: [{ kind: 'call', func: { kind: 'name', id: 'dec' } }],
      body: [{ kind: 'return', value: { kind: 'name', id: 'a' } }],
      line: 2,
      column: 1,
    });
  });

  it('parses nested definitions', () => {
    const cls = firstStatement('class A:\n    def f(self):\n        class B:\n            x = 1\n');
    expect(cls).toMatchObject({
      kind: 'class',
      body: [{ kind: 'function', name: 'f', body: [{ kind: 'class', name: 'B', body: [{ kind: 'assign' }] }] }],
    });
  });

  it('parses compound statements as blocks', () => {
    const body = parseSource(
      [
        'if a:',
        '    x = 1',
        'elif b:',
        '    x = 2',
        'else:',
        '    x = 3',
        'for i, j in pairs:',
        '    pass',
        'try:',
        '    pass',
        'except (ValueError, KeyError) as e:',
        '    raise',
        'finally:',
        '    pass',
        'with open(p) as f, open(q) as g:',
        '    pass',
        'async with lock:',
        '    pass',
        '',
      ].join('\n'),
    ).body;
    expect(body.map((s) => (s.kind === 'block' ? s.keyword : s.kind))).toEqual([
      'if', 'elif', 'else', 'for', 'try', 'except', 'finally', 'with', 'async with',
    ]);
  });

  it('parses a one-line suite with several statements', () => {
    const stmt = firstStatement('if a: x = 1; y = 2\n');
    expect(stmt).toMatchObject({ kind: 'block', keyword: 'if', body: [{ kind: 'assign' }, { kind: 'assign' }] });
  });

  it('treats match and case as blocks only in statement position', () => {
    const body = parseSource('match = 5\nmatch cmd:\n    case "a":\n        pass\n').body;
    expect(body[0]).toMatchObject({ kind: 'assign' });
    expect(body[1]).toMatchObject({ kind: 'block', keyword: 'match', body: [{ kind: 'block', keyword: 'case' }] });
  });

  it('skips simple keyword statements', () => {
    const body = parseSource('import os\nfrom a import (b,\n    c)\nglobal g\nassert x, "m"\n').body;
    expect(body.map((s) => (s.kind === 'simple' ? s.keyword : s.kind))).toEqual(['import', 'from', 'global', 'assert']);
  });
});

describe('parseSource – expressions', () => {
  it('parses constants', () => {
    expect(valueOf('True')).toMatchObject({ kind: 'constant', value: true });
    expect(valueOf('None')).toMatchObject({ kind: 'constant', value: null });
    expect(valueOf('0x10')).toMatchObject({ kind: 'constant', value: 16 });
    expect(valueOf('0o17')).toMatchObject({ kind: 'constant', value: 15 });
    expect(valueOf('0b101')).toMatchObject({ kind: 'constant', value: 5 });
    expect(valueOf('1_000')).toMatchObject({ kind: 'constant', value: 1000 });
    expect(valueOf('1.5e2')).toMatchObject({ kind: 'constant', value: 150 });
  });

  it('marks float literals even when the value is integral', () => {
    expect(valueOf('5.')).toMatchObject({ kind: 'constant', value: 5, float: true });
    expect(valueOf('1e3')).toMatchObject({ kind: 'constant', value: 1000, float: true });
    expect(valueOf('5')).not.toHaveProperty('float');
  });

  it('keeps integers beyond the safe number range exact', () => {
    expect(valueOf('9007199254740991')).toMatchObject({ kind: 'constant', value: 9007199254740991 });
    expect(valueOf('9223372036854775807')).toMatchObject({ kind: 'constant', value: 9223372036854775807n });
    expect(valueOf('0xFFFF_FFFF_FFFF_FFFF')).toMatchObject({ kind: 'constant', value: 18446744073709551615n });
  });

  it('records named escapes on the string constant', () => {
    expect(valueOf('"a\\N{EM DASH}" "\\N{BULLET}"')).toMatchObject({
      kind: 'constant',
      value: 'a\\N{EM DASH}\\N{BULLET}',
      namedEscapes: ['EM DASH', 'BULLET'],
    });
    expect(valueOf('"plain"')).not.toHaveProperty('namedEscapes');
  });

  it('concatenates adjacent string literals', () => {
    expect(valueOf('"ab" \'cd\'')).toMatchObject({ kind: 'constant', value: 'abcd' });
    expect(valueOf('("multi "\n     "line")')).toMatchObject({ kind: 'constant', value: 'multi line' });
  });

  it('keeps f-strings, bytes, complex numbers and ellipsis opaque', () => {
    expect(valueOf('f"{x}"')).toMatchObject({ kind: 'other', type: 'JoinedStr' });
    expect(valueOf('"a" f"{x}"')).toMatchObject({ kind: 'other', type: 'JoinedStr' });
    expect(valueOf('b"x"')).toMatchObject({ kind: 'other', type: 'Bytes' });
    expect(valueOf('2j')).toMatchObject({ kind: 'other', type: 'Complex' });
    expect(valueOf('...')).toMatchObject({ kind: 'other', type: 'Ellipsis' });
  });

  it('parses lists and dicts with trailing commas', () => {
    expect(valueOf('[1, "a",]')).toMatchObject({
      kind: 'list',
      elements: [
        { kind: 'constant', value: 1 },
        { kind: 'constant', value: 'a' },
      ],
    });
    const dict = valueOf('{\n    "a": 1,\n    "b": [2],\n}');
    expect(dict).toMatchObject({
      kind: 'dict',
      keys: [
        { kind: 'constant', value: 'a' },
        { kind: 'constant', value: 'b' },
      ],
      values: [{ kind: 'constant', value: 1 }, { kind: 'list' }],
    });
  });

  it('records dict spreads as null keys', () => {
    const dict = valueOf('{**base, "k": 2}');
    expect(dict.kind).toBe('dict');
    if (dict.kind === 'dict') {
      expect(dict.keys[0]).toBeNull();
      expect(dict.values[0]).toMatchObject({ kind: 'name', id: 'base' });
      expect(dict.keys[1]).toMatchObject({ kind: 'constant', value: 'k' });
    }
  });

  it('parses attribute chains and calls', () => {
    expect(valueOf('self.metadata.update({"a": 1})')).toMatchObject({
      kind: 'call',
      func: {
        kind: 'attribute',
        attr: 'update',
        value: { kind: 'attribute', attr: 'metadata', value: { kind: 'name', id: 'self' } },
      },
      args: [{ kind: 'dict' }],
      keywords: [],
    });
  });

  it('separates positional, starred and keyword arguments', () => {
    const call = valueOf('f(1, key=2, *rest, **extra)');
    expect(call).toMatchObject({
      kind: 'call',
      args: [
        { kind: 'constant', value: 1 },
        { kind: 'other', type: 'Starred' },
      ],
      keywords: [
        { name: 'key', value: { kind: 'constant', value: 2 } },
        { name: null, value: { kind: 'name', id: 'extra' } },
      ],
    });
  });

  it('parses tuples', () => {
    expect(valueOf('1, 2')).toMatchObject({ kind: 'other', type: 'Tuple', children: [{ value: 1 }, { value: 2 }] });
    expect(valueOf('()')).toMatchObject({ kind: 'other', type: 'Tuple', children: [] });
    expect(valueOf('(1,)')).toMatchObject({ kind: 'other', type: 'Tuple', children: [{ value: 1 }] });
    expect(valueOf('(1)')).toMatchObject({ kind: 'constant', value: 1 });
  });

  it('parses comprehensions as opaque nodes', () => {
    expect(valueOf('[x for x in y if x]')).toMatchObject({ kind: 'other', type: 'ListComp' });
    expect(valueOf('{x for x in y}')).toMatchObject({ kind: 'other', type: 'SetComp' });
    expect(valueOf('{k: v for k, v in items}')).toMatchObject({ kind: 'other', type: 'DictComp' });
    expect(valueOf('(x for x in y)')).toMatchObject({ kind: 'other', type: 'GeneratorExp' });
    expect(valueOf('sum(x for x in y)')).toMatchObject({
      kind: 'call',
      args: [{ kind: 'other', type: 'GeneratorExp' }],
    });
  });

  it('parses operators into opaque nodes', () => {
    expect(valueOf('-1')).toMatchObject({ kind: 'other', type: 'UnaryOp', children: [{ value: 1 }] });
    expect(valueOf('a + b * c')).toMatchObject({ kind: 'other', type: 'BinOp' });
    expect(valueOf('a if b else c')).toMatchObject({ kind: 'other', type: 'IfExp' });
    expect(valueOf('a not in b')).toMatchObject({ kind: 'other', type: 'Compare' });
    expect(valueOf('a is not None and not b')).toMatchObject({ kind: 'other', type: 'BoolOp' });
    expect(valueOf('x[1:2, ::3]')).toMatchObject({ kind: 'other', type: 'Subscript' });
    expect(valueOf('await g()')).toMatchObject({ kind: 'other', type: 'Await' });
    expect(valueOf('{1, 2}')).toMatchObject({ kind: 'other', type: 'Set' });
  });

  it('parses lambdas inside dict values', () => {
    const dict = valueOf('{"f": lambda x: x + 1, "g": 2}');
    expect(dict).toMatchObject({
      kind: 'dict',
      values: [{ kind: 'other', type: 'Lambda' }, { kind: 'constant', value: 2 }],
    });
  });
});

describe('parseSource – errors', () => {
  it('reports an unexpected token with its position', () => {
    expect(() => parseSource('x = = 1\n')).toThrow("Unexpected '=' (line 1, column 5)");
  });

  it('requires an indented block after a colon', () => {
    expect(() => parseSource('if a:\nx = 1\n')).toThrow('Expected an indented block (line 2, column 1)');
  });

  it('requires a definition after decorators', () => {
    expect(() => parseSource('@dec\nx = 1\n')).toThrow(
      "Decorator must precede a class or function, found 'x' (line 2, column 1)",
    );
  });

  it('throws SourceSyntaxError for tokenizer failures', () => {
    expect(() => parseSource('x = (\n')).toThrow(SourceSyntaxError);
  });
});
