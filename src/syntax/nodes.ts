/**
 * Syntax tree for the Python subset that declarative agent modules use.
 *
 * Expressions are a closed tagged union. Anything outside the literal
 * grammar is an `other` node that keeps a type label and whatever
 * sub-expressions were parsed inside it, so walkers can still reach
 * nested calls.
 */

export interface Position {
  line: number;
  column: number;
}

/** `bigint` only for integer literals outside the safe `number` range. */
export type ConstantValue = string | number | bigint | boolean | null;

export interface ConstantNode extends Position {
  kind: 'constant';
  value: ConstantValue;
  /** Written as a float literal (`5.`, `1e3`), even when the value is integral. */
  float?: boolean;
  /** Names of `\N{...}` escapes left undecoded in a string value. */
  namedEscapes?: string[];
}

export interface ListNode extends Position {
  kind: 'list';
  elements: Expr[];
}

export interface DictNode extends Position {
  kind: 'dict';
  /** `null` marks a `**spread` entry. */
  keys: Array<Expr | null>;
  values: Expr[];
}

export interface NameNode extends Position {
  kind: 'name';
  id: string;
}

export interface AttributeNode extends Position {
  kind: 'attribute';
  value: Expr;
  attr: string;
}

export interface Keyword {
  /** `null` for `**kwargs`. */
  name: string | null;
  value: Expr;
}

export interface CallNode extends Position {
  kind: 'call';
  func: Expr;
  args: Expr[];
  keywords: Keyword[];
}

export interface OtherNode extends Position {
  kind: 'other';
  type: string;
  children: Expr[];
}

export type Expr = ConstantNode | ListNode | DictNode | NameNode | AttributeNode | CallNode | OtherNode;

export interface ClassDef extends Position {
  kind: 'class';
  name: string;
  bases: Expr[];
  decorators: Expr[];
  body: Stmt[];
}

export interface FunctionDef extends Position {
  kind: 'function';
  name: string;
  isAsync: boolean;
  decorators: Expr[];
  body: Stmt[];
}

export interface AssignStmt extends Position {
  kind: 'assign';
  targets: Expr[];
  value: Expr;
}

export interface AnnAssignStmt extends Position {
  kind: 'annassign';
  target: Expr;
  annotation: Expr;
  value: Expr | null;
}

export interface AugAssignStmt extends Position {
  kind: 'augassign';
  target: Expr;
  op: string;
  value: Expr;
}

export interface ReturnStmt extends Position {
  kind: 'return';
  value: Expr | null;
}

export interface ExprStmt extends Position {
  kind: 'expr';
  value: Expr;
}

/** `if`/`for`/`while`/`try`/`with`/`match` and their clauses. */
export interface BlockStmt extends Position {
  kind: 'block';
  keyword: string;
  body: Stmt[];
}

/** `import`, `pass`, `raise` and other statements kept only as a marker. */
export interface SimpleStmt extends Position {
  kind: 'simple';
  keyword: string;
}

export type Stmt =
  | ClassDef
  | FunctionDef
  | AssignStmt
  | AnnAssignStmt
  | AugAssignStmt
  | ReturnStmt
  | ExprStmt
  | BlockStmt
  | SimpleStmt;

export interface SyntaxTree {
  body: Stmt[];
}
