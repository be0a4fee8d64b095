export { tokenize, decodeEscapes, SourceSyntaxError, KEYWORDS } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';
export { parseSource } from './parser.js';
export { childExpressions, statementExpressions, visitExpression, visitStatements } from './walk.js';
export type { StatementWalkOptions } from './walk.js';
export type {
  AnnAssignStmt,
  AssignStmt,
  AttributeNode,
  AugAssignStmt,
  BlockStmt,
  CallNode,
  ClassDef,
  ConstantNode,
  ConstantValue,
  DictNode,
  Expr,
  ExprStmt,
  FunctionDef,
  Keyword,
  ListNode,
  NameNode,
  OtherNode,
  Position,
  ReturnStmt,
  SimpleStmt,
  Stmt,
  SyntaxTree,
} from './nodes.js';
