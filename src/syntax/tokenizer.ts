/**
 * Line-aware tokenizer for Python source.
 *
 * Produces NEWLINE/INDENT/DEDENT tokens the way the reference grammar does:
 * newlines inside brackets are implicit joins, blank and comment-only lines
 * never affect indentation, and a backslash before a newline joins lines.
 */

export type TokenType = 'name' | 'number' | 'string' | 'bytes' | 'fstring' | 'op' | 'newline' | 'indent' | 'dedent' | 'eof';

export interface Token {
  type: TokenType;
  /** Decoded text for string tokens, raw text otherwise. */
  value: string;
  line: number;
  column: number;
  /** Names from `\N{...}` escapes, which are kept undecoded in `value`. */
  namedEscapes?: string[];
}

export class SourceSyntaxError extends Error {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`);
    this.name = 'SourceSyntaxError';
    this.line = line;
    this.column = column;
  }
}

export const KEYWORDS = new Set([
  'False', 'None', 'True', 'and', 'as', 'assert', 'async', 'await', 'break', 'class', 'continue',
  'def', 'del', 'elif', 'else', 'except', 'finally', 'for', 'from', 'global', 'if', 'import', 'in',
  'is', 'lambda', 'nonlocal', 'not', 'or', 'pass', 'raise', 'return', 'try', 'while', 'with', 'yield',
]);

// Longest first so that greedy matching picks `**=` over `**` over `*`.
const OPERATORS = [
  '**=', '//=', '>>=', '<<=', '...',
  '->', ':=', '**', '//', '<<', '>>', '<=', '>=', '==', '!=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '@=',
  '+', '-', '*', '/', '%', '@', '&', '|', '^', '~', '<', '>',
  '(', ')', '[', ']', '{', '}', ',', ':', '.', ';', '=', '!',
];

const CLOSING: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

const STRING_PREFIXES = new Set(['r', 'u', 'f', 'b', 'br', 'rb', 'fr', 'rf']);

const NAME_RE = /[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}]*/uy;
const NUMBER_RE =
  /(?:0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|(?:\d[\d_]*(?:\.[\d_]*)?|\.\d[\d_]*)(?:[eE][+-]?\d[\d_]*)?[jJ]?)/y;

const ESCAPE_RE = /\\(\n|[\\'"abfnrtv]|[0-7]{1,3}|x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|U[0-9a-fA-F]{8}|N\{[^}\n]*\})/g;

const SIMPLE_ESCAPES: Record<string, string> = {
  '\n': '',
  '\\': '\\',
  "'": "'",
  '"': '"',
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
};

/**
 * Decode backslash escapes. `\N{NAME}` needs the Unicode name table, so it is
 * left as written and its name pushed onto `namedEscapes`.
 */
export function decodeEscapes(body: string, namedEscapes: string[] = []): string {
  return body.replace(ESCAPE_RE, (match, seq: string) => {
    if (seq in SIMPLE_ESCAPES) return SIMPLE_ESCAPES[seq];
    if (seq[0] === 'N') {
      namedEscapes.push(seq.slice(2, -1));
      return match;
    }
    if (seq[0] === 'x' || seq[0] === 'u' || seq[0] === 'U') {
      return String.fromCodePoint(parseInt(seq.slice(1), 16));
    }
    return String.fromCharCode(parseInt(seq, 8));
  });
}

export function tokenize(input: string): Token[] {
  const src = input.replace(/^\uFEFF/, '').replace(/\r\n?/g, '\n');
  const tokens: Token[] = [];
  const indents = [0];
  const brackets: string[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;
  let atLineStart = true;

  const column = (at: number): number => at - lineStart + 1;
  const push = (type: TokenType, value: string, at: number): void => {
    tokens.push({ type, value, line, column: column(at) });
  };

  while (pos < src.length) {
    if (atLineStart && brackets.length === 0) {
      let width = 0;
      let p = pos;
      while (p < src.length && (src[p] === ' ' || src[p] === '\t' || src[p] === '\f')) {
        if (src[p] === '\t') width = (Math.floor(width / 8) + 1) * 8;
        else if (src[p] === ' ') width++;
        else width = 0;
        p++;
      }
      if (p >= src.length) {
        pos = p;
        break;
      }
      if (src[p] === '\n' || src[p] === '#') {
        // blank or comment-only line
        while (p < src.length && src[p] !== '\n') p++;
        pos = p + 1;
        line++;
        lineStart = pos;
        continue;
      }
      pos = p;
      atLineStart = false;
      const current = indents[indents.length - 1];
      if (width > current) {
        indents.push(width);
        push('indent', '', pos);
      } else if (width < current) {
        while (width < indents[indents.length - 1]) {
          indents.pop();
          push('dedent', '', pos);
        }
        if (width !== indents[indents.length - 1]) {
          throw new SourceSyntaxError('Unindent does not match any outer indentation level', line, column(pos));
        }
      }
      continue;
    }

    const ch = src[pos];

    if (ch === ' ' || ch === '\t' || ch === '\f') {
      pos++;
      continue;
    }

    if (ch === '#') {
      while (pos < src.length && src[pos] !== '\n') pos++;
      continue;
    }

    if (ch === '\\' && src[pos + 1] === '\n') {
      pos += 2;
      line++;
      lineStart = pos;
      continue;
    }

    if (ch === '\n') {
      if (brackets.length === 0) {
        push('newline', '', pos);
        atLineStart = true;
      }
      pos++;
      line++;
      lineStart = pos;
      continue;
    }

    NAME_RE.lastIndex = pos;
    const nameMatch = NAME_RE.exec(src);
    if (nameMatch) {
      const word = nameMatch[0];
      const after = src[pos + word.length];
      if ((after === '"' || after === "'") && STRING_PREFIXES.has(word.toLowerCase())) {
        pos = readString(word.toLowerCase(), pos + word.length);
        continue;
      }
      push('name', word, pos);
      pos += word.length;
      continue;
    }

    if (ch === '"' || ch === "'") {
      pos = readString('', pos);
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === '.' && /[0-9]/.test(src[pos + 1] ?? ''))) {
      NUMBER_RE.lastIndex = pos;
      const numberMatch = NUMBER_RE.exec(src);
      if (numberMatch) {
        push('number', numberMatch[0], pos);
        pos += numberMatch[0].length;
        continue;
      }
    }

    const op = OPERATORS.find((candidate) => src.startsWith(candidate, pos));
    if (op === undefined) {
      throw new SourceSyntaxError(`Invalid character '${ch}'`, line, column(pos));
    }
    if (op === '(' || op === '[' || op === '{') {
      brackets.push(op);
    } else if (op in CLOSING) {
      if (brackets.pop() !== CLOSING[op]) {
        throw new SourceSyntaxError(`Unmatched '${op}'`, line, column(pos));
      }
    }
    push('op', op, pos);
    pos += op.length;
  }

  if (brackets.length > 0) {
    throw new SourceSyntaxError(`Unclosed '${brackets[brackets.length - 1]}' at end of input`, line, column(pos));
  }
  if (tokens.length > 0 && tokens[tokens.length - 1].type !== 'newline') {
    push('newline', '', pos);
  }
  while (indents.length > 1) {
    indents.pop();
    push('dedent', '', pos);
  }
  push('eof', '', pos);
  return tokens;

  function readString(prefix: string, quoteAt: number): number {
    const quote = src[quoteAt];
    const triple = src.startsWith(quote.repeat(3), quoteAt);
    const delimiter = triple ? quote.repeat(3) : quote;
    const startLine = line;
    const startColumn = column(quoteAt - prefix.length);
    let i = quoteAt + delimiter.length;
    const bodyStart = i;

    for (;;) {
      if (i >= src.length) {
        throw new SourceSyntaxError('Unterminated string literal', startLine, startColumn);
      }
      const c = src[i];
      if (c === '\\') {
        if (src[i + 1] === '\n') {
          line++;
          lineStart = i + 2;
        }
        i += 2;
        continue;
      }
      if (c === '\n') {
        if (!triple) {
          throw new SourceSyntaxError('Unterminated string literal', startLine, startColumn);
        }
        line++;
        lineStart = i + 1;
      }
      if (src.startsWith(delimiter, i)) break;
      i++;
    }

    const body = src.slice(bodyStart, i);
    const type: TokenType = prefix.includes('f') ? 'fstring' : prefix.includes('b') ? 'bytes' : 'string';
    const namedEscapes: string[] = [];
    const token: Token = {
      type,
      value: prefix.includes('r') ? body : decodeEscapes(body, namedEscapes),
      line: startLine,
      column: startColumn,
    };
    if (type === 'string' && namedEscapes.length > 0) token.namedEscapes = namedEscapes;
    tokens.push(token);
    return i + delimiter.length;
  }
}
