/**
 * Recursive-descent parser over the token stream from `tokenize`.
 *
 * Statement structure (classes, functions, blocks, assignments, returns) is
 * parsed in full. Compound-statement headers, parameter lists and return
 * annotations are skipped as balanced token runs since nothing reads them.
 */

import type {
  ClassDef,
  DictNode,
  Expr,
  FunctionDef,
  Keyword,
  OtherNode,
  Position,
  Stmt,
  SyntaxTree,
} from './nodes.js';
import { KEYWORDS, SourceSyntaxError, tokenize, type Token } from './tokenizer.js';

const BLOCK_KEYWORDS = new Set(['if', 'elif', 'else', 'for', 'while', 'try', 'except', 'finally', 'with']);
const SOFT_BLOCK_KEYWORDS = new Set(['match', 'case']);
const SIMPLE_KEYWORDS = new Set([
  'pass', 'break', 'continue', 'import', 'from', 'global', 'nonlocal', 'del', 'assert', 'raise',
]);
const AUGMENTED_OPS = new Set(['+=', '-=', '*=', '/=', '//=', '%=', '**=', '>>=', '<<=', '&=', '|=', '^=', '@=']);
const COMPARISON_OPS = new Set(['<', '>', '==', '>=', '<=', '!=']);
const OPENING = new Set(['(', '[', '{']);
const CLOSING = new Set([')', ']', '}']);
const EXPRESSION_END = new Set([')', ']', '}', ';', '=', ':']);
const MAX_SAFE_INTEGER = BigInt(Number.MAX_SAFE_INTEGER);

export function parseSource(source: string): SyntaxTree {
  return new Parser(tokenize(source)).parseModule();
}

class Parser {
  private _tokens: Token[];
  private _pos = 0;

  constructor(tokens: Token[]) {
    this._tokens = tokens;
  }

  parseModule(): SyntaxTree {
    const body: Stmt[] = [];
    while (!this._at('eof')) {
      body.push(...this._parseStatement());
    }
    return { body };
  }

  // ── token helpers ────────────────────────────────────────────────

  private _peek(offset = 0): Token {
    const index = Math.min(this._pos + offset, this._tokens.length - 1);
    return this._tokens[index];
  }

  private _next(): Token {
    const token = this._peek();
    if (token.type !== 'eof') this._pos++;
    return token;
  }

  private _at(type: Token['type'], offset = 0): boolean {
    return this._peek(offset).type === type;
  }

  private _isOp(value: string, offset = 0): boolean {
    const token = this._peek(offset);
    return token.type === 'op' && token.value === value;
  }

  private _isWord(value: string, offset = 0): boolean {
    const token = this._peek(offset);
    return token.type === 'name' && token.value === value;
  }

  private _fail(message: string, token: Token = this._peek()): never {
    throw new SourceSyntaxError(message, token.line, token.column);
  }

  private _describe(token: Token): string {
    if (token.type === 'op' || token.type === 'name') return `'${token.value}'`;
    return token.type;
  }

  private _expectOp(value: string): Token {
    if (!this._isOp(value)) this._fail(`Expected '${value}' but found ${this._describe(this._peek())}`);
    return this._next();
  }

  private _expectName(): Token {
    if (!this._at('name')) this._fail(`Expected a name but found ${this._describe(this._peek())}`);
    return this._next();
  }

  private _expectNewline(): void {
    if (this._at('eof')) return;
    if (!this._at('newline')) this._fail(`Expected end of line but found ${this._describe(this._peek())}`);
    this._next();
  }

  private _where(token: Token): Position {
    return { line: token.line, column: token.column };
  }

  private _other(type: string, children: Expr[], at: Position): OtherNode {
    return { kind: 'other', type, children, line: at.line, column: at.column };
  }

  private _atSimpleEnd(): boolean {
    return this._at('newline') || this._at('eof') || this._isOp(';');
  }

  private _atExpressionEnd(): boolean {
    const token = this._peek();
    if (token.type === 'newline' || token.type === 'eof') return true;
    return token.type === 'op' && (EXPRESSION_END.has(token.value) || AUGMENTED_OPS.has(token.value));
  }

  private _atComprehension(): boolean {
    return this._isWord('for') || (this._isWord('async') && this._isWord('for', 1));
  }

  /** Consume through the bracket that closes an already-consumed opener. */
  private _skipToClose(): void {
    let depth = 0;
    for (;;) {
      const token = this._next();
      if (token.type === 'eof') this._fail('Unexpected end of input inside brackets', token);
      if (token.type !== 'op') continue;
      if (OPENING.has(token.value)) depth++;
      else if (CLOSING.has(token.value)) {
        if (depth === 0) return;
        depth--;
      }
    }
  }

  /** Consume tokens up to (not including) a depth-0 op from `stops` or end of line. */
  private _skipUntil(stops: Set<string>): void {
    let depth = 0;
    for (;;) {
      const token = this._peek();
      if (token.type === 'eof' || (token.type === 'newline' && depth === 0)) return;
      if (token.type === 'op') {
        if (depth === 0 && stops.has(token.value)) return;
        if (OPENING.has(token.value)) depth++;
        else if (CLOSING.has(token.value)) depth--;
      }
      this._next();
    }
  }

  /** True when the logical line starting here ends in a depth-0 colon. */
  private _lineEndsWithColon(): boolean {
    let depth = 0;
    let last: Token | null = null;
    for (let i = this._pos; i < this._tokens.length; i++) {
      const token = this._tokens[i];
      if (token.type === 'newline' || token.type === 'eof') break;
      if (token.type === 'op') {
        if (OPENING.has(token.value)) depth++;
        else if (CLOSING.has(token.value)) depth--;
      }
      if (depth === 0) last = token;
    }
    return last !== null && last.type === 'op' && last.value === ':';
  }

  // ── statements ───────────────────────────────────────────────────

  private _parseStatement(): Stmt[] {
    const token = this._peek();

    if (token.type === 'newline') {
      this._next();
      return [];
    }
    if (token.type === 'indent' || token.type === 'dedent') {
      this._fail('Unexpected indentation', token);
    }
    if (this._isOp('@')) {
      return [this._parseDecorated()];
    }
    if (token.type === 'name') {
      if (token.value === 'class') return [this._parseClass([])];
      if (token.value === 'def') return [this._parseFunction([])];
      if (token.value === 'async') {
        if (this._isWord('def', 1)) return [this._parseFunction([])];
        if (this._isWord('for', 1) || this._isWord('with', 1)) return [this._parseBlock()];
      }
      if (BLOCK_KEYWORDS.has(token.value)) return [this._parseBlock()];
      if (SOFT_BLOCK_KEYWORDS.has(token.value) && !this._isOp('=', 1) && this._lineEndsWithColon()) {
        return [this._parseBlock()];
      }
    }
    return this._parseSimpleLine();
  }

  private _parseDecorated(): Stmt {
    const decorators: Expr[] = [];
    while (this._isOp('@')) {
      this._next();
      decorators.push(this._parseExpression());
      this._expectNewline();
    }
    if (this._isWord('class')) return this._parseClass(decorators);
    if (this._isWord('def') || (this._isWord('async') && this._isWord('def', 1))) {
      return this._parseFunction(decorators);
    }
    return this._fail(`Decorator must precede a class or function, found ${this._describe(this._peek())}`);
  }

  private _parseClass(decorators: Expr[]): ClassDef {
    const start = this._next();
    const name = this._expectName().value;
    if (this._isOp('[')) {
      this._next();
      this._skipToClose();
    }
    let bases: Expr[] = [];
    if (this._isOp('(')) {
      const call = this._parseCallArguments();
      bases = [...call.args, ...call.keywords.map((kw) => kw.value)];
    }
    this._expectOp(':');
    const body = this._parseSuite();
    return { kind: 'class', name, bases, decorators, body, ...this._where(start) };
  }

  private _parseFunction(decorators: Expr[]): FunctionDef {
    const start = this._peek();
    const isAsync = this._isWord('async');
    if (isAsync) this._next();
    this._next();
    const name = this._expectName().value;
    if (this._isOp('[')) {
      this._next();
      this._skipToClose();
    }
    this._expectOp('(');
    this._skipToClose();
    if (this._isOp('->')) {
      this._next();
      this._skipUntil(new Set([':']));
    }
    this._expectOp(':');
    const body = this._parseSuite();
    return { kind: 'function', name, isAsync, decorators, body, ...this._where(start) };
  }

  private _parseBlock(): Stmt {
    const start = this._next();
    let keyword = start.value;
    if (keyword === 'async') keyword = `async ${this._next().value}`;
    this._skipUntil(new Set([':']));
    this._expectOp(':');
    const body = this._parseSuite();
    return { kind: 'block', keyword, body, ...this._where(start) };
  }

  private _parseSuite(): Stmt[] {
    if (!this._at('newline')) {
      return this._parseSimpleLine();
    }
    this._next();
    if (!this._at('indent')) this._fail('Expected an indented block');
    this._next();
    const body: Stmt[] = [];
    while (!this._at('dedent') && !this._at('eof')) {
      body.push(...this._parseStatement());
    }
    if (this._at('dedent')) this._next();
    return body;
  }

  private _parseSimpleLine(): Stmt[] {
    const statements: Stmt[] = [this._parseSimpleStatement()];
    while (this._isOp(';')) {
      this._next();
      if (this._at('newline') || this._at('eof')) break;
      statements.push(this._parseSimpleStatement());
    }
    this._expectNewline();
    return statements;
  }

  private _parseSimpleStatement(): Stmt {
    const start = this._peek();
    const at = this._where(start);

    if (start.type === 'name') {
      if (start.value === 'return') {
        this._next();
        const value = this._atSimpleEnd() ? null : this._parseExpressionList();
        return { kind: 'return', value, ...at };
      }
      if (SIMPLE_KEYWORDS.has(start.value) || (start.value === 'type' && this._at('name', 1))) {
        this._next();
        this._skipUntil(new Set([';']));
        return { kind: 'simple', keyword: start.value, ...at };
      }
    }

    const first = this._parseExpressionList();

    if (this._isOp(':')) {
      this._next();
      const annotation = this._parseExpression();
      let value: Expr | null = null;
      if (this._isOp('=')) {
        this._next();
        value = this._parseExpressionList();
      }
      return { kind: 'annassign', target: first, annotation, value, ...at };
    }

    if (this._isOp('=')) {
      const chain: Expr[] = [first];
      while (this._isOp('=')) {
        this._next();
        chain.push(this._parseExpressionList());
      }
      const value = chain.pop() ?? first;
      return { kind: 'assign', targets: chain, value, ...at };
    }

    const token = this._peek();
    if (token.type === 'op' && AUGMENTED_OPS.has(token.value)) {
      this._next();
      const value = this._parseExpressionList();
      return { kind: 'augassign', target: first, op: token.value, value, ...at };
    }

    return { kind: 'expr', value: first, ...at };
  }

  // ── expressions ──────────────────────────────────────────────────

  /** Comma-separated expressions; more than one becomes a tuple. */
  private _parseExpressionList(): Expr {
    const start = this._where(this._peek());
    const first = this._parseStarOrExpression();
    if (!this._isOp(',')) return first;
    const elements = [first];
    while (this._isOp(',')) {
      this._next();
      if (this._atExpressionEnd()) break;
      elements.push(this._parseStarOrExpression());
    }
    return this._other('Tuple', elements, start);
  }

  private _parseStarOrExpression(): Expr {
    if (this._isOp('*')) {
      const star = this._next();
      return this._other('Starred', [this._parseExpression()], this._where(star));
    }
    return this._parseExpression();
  }

  private _parseExpression(): Expr {
    const start = this._where(this._peek());
    if (this._isWord('lambda')) return this._parseLambda();
    if (this._isWord('yield')) return this._parseYield();

    const value = this._parseOr();
    if (this._isWord('if')) {
      this._next();
      const test = this._parseOr();
      if (!this._isWord('else')) this._fail("Expected 'else' in conditional expression");
      this._next();
      const orelse = this._parseExpression();
      return this._other('IfExp', [value, test, orelse], start);
    }
    if (this._isOp(':=')) {
      this._next();
      return this._other('NamedExpr', [value, this._parseExpression()], start);
    }
    return value;
  }

  private _parseLambda(): Expr {
    const start = this._next();
    this._skipUntil(new Set([':']));
    this._expectOp(':');
    return this._other('Lambda', [this._parseExpression()], this._where(start));
  }

  private _parseYield(): Expr {
    const start = this._next();
    if (this._isWord('from')) this._next();
    const children = this._atExpressionEnd() || this._isOp(',') ? [] : [this._parseExpressionList()];
    return this._other('Yield', children, this._where(start));
  }

  private _parseOr(): Expr {
    let left = this._parseAnd();
    while (this._isWord('or')) {
      this._next();
      left = this._other('BoolOp', [left, this._parseAnd()], left);
    }
    return left;
  }

  private _parseAnd(): Expr {
    let left = this._parseNot();
    while (this._isWord('and')) {
      this._next();
      left = this._other('BoolOp', [left, this._parseNot()], left);
    }
    return left;
  }

  private _parseNot(): Expr {
    if (this._isWord('not')) {
      const start = this._next();
      return this._other('UnaryOp', [this._parseNot()], this._where(start));
    }
    return this._parseComparison();
  }

  private _parseComparison(): Expr {
    let left = this._parseBinary(0);
    for (;;) {
      const token = this._peek();
      if (token.type === 'op' && COMPARISON_OPS.has(token.value)) {
        this._next();
      } else if (this._isWord('in')) {
        this._next();
      } else if (this._isWord('not') && this._isWord('in', 1)) {
        this._next();
        this._next();
      } else if (this._isWord('is')) {
        this._next();
        if (this._isWord('not')) this._next();
      } else {
        return left;
      }
      left = this._other('Compare', [left, this._parseBinary(0)], left);
    }
  }

  private static readonly BINARY_LEVELS: ReadonlyArray<ReadonlySet<string>> = [
    new Set(['|']),
    new Set(['^']),
    new Set(['&']),
    new Set(['<<', '>>']),
    new Set(['+', '-']),
    new Set(['*', '/', '//', '%', '@']),
  ];

  private _parseBinary(level: number): Expr {
    if (level >= Parser.BINARY_LEVELS.length) return this._parseUnary();
    const ops = Parser.BINARY_LEVELS[level];
    let left = this._parseBinary(level + 1);
    for (;;) {
      const token = this._peek();
      if (token.type !== 'op' || !ops.has(token.value)) return left;
      this._next();
      left = this._other('BinOp', [left, this._parseBinary(level + 1)], left);
    }
  }

  private _parseUnary(): Expr {
    const token = this._peek();
    if (token.type === 'op' && (token.value === '-' || token.value === '+' || token.value === '~')) {
      this._next();
      return this._other('UnaryOp', [this._parseUnary()], this._where(token));
    }
    return this._parsePower();
  }

  private _parsePower(): Expr {
    const base = this._isWord('await') ? this._parseAwait() : this._parsePrimary();
    if (this._isOp('**')) {
      this._next();
      return this._other('BinOp', [base, this._parseUnary()], base);
    }
    return base;
  }

  private _parseAwait(): Expr {
    const start = this._next();
    return this._other('Await', [this._parsePrimary()], this._where(start));
  }

  private _parsePrimary(): Expr {
    let expr = this._parseAtom();
    for (;;) {
      if (this._isOp('.')) {
        this._next();
        const attr = this._expectName().value;
        expr = { kind: 'attribute', value: expr, attr, line: expr.line, column: expr.column };
      } else if (this._isOp('(')) {
        const { args, keywords } = this._parseCallArguments();
        expr = { kind: 'call', func: expr, args, keywords, line: expr.line, column: expr.column };
      } else if (this._isOp('[')) {
        expr = this._parseSubscript(expr);
      } else {
        return expr;
      }
    }
  }

  private _parseCallArguments(): { args: Expr[]; keywords: Keyword[] } {
    this._expectOp('(');
    const args: Expr[] = [];
    const keywords: Keyword[] = [];
    while (!this._isOp(')')) {
      if (this._isOp('*')) {
        const star = this._next();
        args.push(this._other('Starred', [this._parseExpression()], this._where(star)));
      } else if (this._isOp('**')) {
        this._next();
        keywords.push({ name: null, value: this._parseExpression() });
      } else if (this._at('name') && !KEYWORDS.has(this._peek().value) && this._isOp('=', 1)) {
        const name = this._next().value;
        this._next();
        keywords.push({ name, value: this._parseExpression() });
      } else {
        const value = this._parseExpression();
        if (this._atComprehension()) {
          this._skipToClose();
          args.push(this._other('GeneratorExp', [value], value));
          return { args, keywords };
        }
        args.push(value);
      }
      if (!this._isOp(',')) break;
      this._next();
    }
    this._expectOp(')');
    return { args, keywords };
  }

  private _parseSubscript(value: Expr): Expr {
    this._expectOp('[');
    const children: Expr[] = [value];
    while (!this._isOp(']')) {
      if (this._isOp(':') || this._isOp(',')) {
        this._next();
        continue;
      }
      children.push(this._parseStarOrExpression());
      if (!this._isOp(':') && !this._isOp(',') && !this._isOp(']')) {
        this._fail(`Unexpected ${this._describe(this._peek())} in subscript`);
      }
    }
    this._next();
    return this._other('Subscript', children, value);
  }

  private _parseAtom(): Expr {
    const token = this._peek();
    const at = this._where(token);

    switch (token.type) {
      case 'name':
        if (token.value === 'lambda') return this._parseLambda();
        if (token.value === 'yield') return this._parseYield();
        this._next();
        if (token.value === 'True') return { kind: 'constant', value: true, ...at };
        if (token.value === 'False') return { kind: 'constant', value: false, ...at };
        if (token.value === 'None') return { kind: 'constant', value: null, ...at };
        if (KEYWORDS.has(token.value)) this._fail(`Unexpected keyword '${token.value}'`, token);
        return { kind: 'name', id: token.value, ...at };

      case 'number':
        this._next();
        return this._number(token.value, at);

      case 'string':
      case 'bytes':
      case 'fstring':
        return this._parseStrings();

      case 'op':
        if (token.value === '(') return this._parseParenthesized();
        if (token.value === '[') return this._parseList();
        if (token.value === '{') return this._parseBraces();
        if (token.value === '...') {
          this._next();
          return this._other('Ellipsis', [], at);
        }
        break;

      default:
        break;
    }
    return this._fail(`Unexpected ${this._describe(token)}`, token);
  }

  private _number(raw: string, at: Position): Expr {
    const text = raw.replace(/_/g, '');
    if (/[jJ]$/.test(text)) return this._other('Complex', [], at);
    const lower = text.toLowerCase();
    if (/^0[xob]/.test(lower) || /^\d+$/.test(text)) {
      const exact = BigInt(lower);
      const value = exact <= MAX_SAFE_INTEGER ? Number(exact) : exact;
      return { kind: 'constant', value, ...at };
    }
    return { kind: 'constant', value: Number(text), float: true, ...at };
  }

  /** Adjacent string literals concatenate; f-strings and bytes stay opaque. */
  private _parseStrings(): Expr {
    const start = this._peek();
    let text = '';
    let formatted = false;
    let bytes = false;
    const namedEscapes: string[] = [];
    while (this._at('string') || this._at('bytes') || this._at('fstring')) {
      const token = this._next();
      if (token.type === 'fstring') formatted = true;
      if (token.type === 'bytes') bytes = true;
      if (token.namedEscapes) namedEscapes.push(...token.namedEscapes);
      text += token.value;
    }
    const at = this._where(start);
    if (formatted) return this._other('JoinedStr', [], at);
    if (bytes) return this._other('Bytes', [], at);
    if (namedEscapes.length > 0) return { kind: 'constant', value: text, namedEscapes, ...at };
    return { kind: 'constant', value: text, ...at };
  }

  private _parseParenthesized(): Expr {
    const open = this._next();
    const at = this._where(open);
    if (this._isOp(')')) {
      this._next();
      return this._other('Tuple', [], at);
    }
    const first = this._parseStarOrExpression();
    if (this._atComprehension()) {
      this._skipToClose();
      return this._other('GeneratorExp', [first], at);
    }
    if (!this._isOp(',')) {
      this._expectOp(')');
      return first;
    }
    const elements = [first];
    while (this._isOp(',')) {
      this._next();
      if (this._isOp(')')) break;
      elements.push(this._parseStarOrExpression());
    }
    this._expectOp(')');
    return this._other('Tuple', elements, at);
  }

  private _parseList(): Expr {
    const open = this._next();
    const at = this._where(open);
    const elements: Expr[] = [];
    if (!this._isOp(']')) {
      const first = this._parseStarOrExpression();
      if (this._atComprehension()) {
        this._skipToClose();
        return this._other('ListComp', [first], at);
      }
      elements.push(first);
      while (this._isOp(',')) {
        this._next();
        if (this._isOp(']')) break;
        elements.push(this._parseStarOrExpression());
      }
    }
    this._expectOp(']');
    return { kind: 'list', elements, ...at };
  }

  private _parseBraces(): Expr {
    const open = this._next();
    const at = this._where(open);
    if (this._isOp('}')) {
      this._next();
      return { kind: 'dict', keys: [], values: [], ...at };
    }
    if (this._isOp('**')) {
      return this._parseDictEntries(at);
    }
    const first = this._parseStarOrExpression();
    if (this._isOp(':')) {
      this._next();
      const value = this._parseExpression();
      if (this._atComprehension()) {
        this._skipToClose();
        return this._other('DictComp', [first, value], at);
      }
      const dict = this._parseDictEntries(at, first, value);
      return dict;
    }
    if (this._atComprehension()) {
      this._skipToClose();
      return this._other('SetComp', [first], at);
    }
    const elements = [first];
    while (this._isOp(',')) {
      this._next();
      if (this._isOp('}')) break;
      elements.push(this._parseStarOrExpression());
    }
    this._expectOp('}');
    return this._other('Set', elements, at);
  }

  private _parseDictEntries(at: Position, firstKey?: Expr, firstValue?: Expr): DictNode {
    const keys: Array<Expr | null> = [];
    const values: Expr[] = [];
    if (firstKey !== undefined && firstValue !== undefined) {
      keys.push(firstKey);
      values.push(firstValue);
      if (this._isOp(',')) this._next();
    }
    while (!this._isOp('}')) {
      if (this._isOp('**')) {
        this._next();
        keys.push(null);
        values.push(this._parseBinary(0));
      } else {
        keys.push(this._parseExpression());
        this._expectOp(':');
        values.push(this._parseExpression());
      }
      if (!this._isOp(',')) break;
      this._next();
    }
    this._expectOp('}');
    return { kind: 'dict', keys, values, ...at };
  }
}
