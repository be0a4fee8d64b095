/**
 * Traversal helpers shared by the extractors.
 */

import type { Expr, Stmt } from './nodes.js';

export function childExpressions(expr: Expr): Expr[] {
  switch (expr.kind) {
    case 'constant':
    case 'name':
      return [];
    case 'list':
      return expr.elements;
    case 'dict':
      return [...expr.keys.filter((key): key is Expr => key !== null), ...expr.values];
    case 'attribute':
      return [expr.value];
    case 'call':
      return [expr.func, ...expr.args, ...expr.keywords.map((kw) => kw.value)];
    case 'other':
      return expr.children;
  }
}

/** Expressions that belong to the statement itself, not to nested bodies. */
export function statementExpressions(stmt: Stmt): Expr[] {
  switch (stmt.kind) {
    case 'class':
      return [...stmt.decorators, ...stmt.bases];
    case 'function':
      return stmt.decorators;
    case 'assign':
      return [...stmt.targets, stmt.value];
    case 'annassign':
      return stmt.value === null ? [stmt.target, stmt.annotation] : [stmt.target, stmt.annotation, stmt.value];
    case 'augassign':
      return [stmt.target, stmt.value];
    case 'return':
      return stmt.value === null ? [] : [stmt.value];
    case 'expr':
      return [stmt.value];
    case 'block':
    case 'simple':
      return [];
  }
}

/** Pre-order walk of an expression and everything beneath it. */
export function visitExpression(expr: Expr, visit: (node: Expr) => void): void {
  visit(expr);
  for (const child of childExpressions(expr)) {
    visitExpression(child, visit);
  }
}

export interface StatementWalkOptions {
  /** Descend into `def` bodies. */
  functions: boolean;
  /** Descend into nested `class` bodies. */
  classes: boolean;
}

/** Pre-order walk of statements in source order, through compound blocks. */
export function visitStatements(
  body: Stmt[],
  options: StatementWalkOptions,
  visit: (stmt: Stmt) => void,
): void {
  for (const stmt of body) {
    visit(stmt);
    if (stmt.kind === 'block') {
      visitStatements(stmt.body, options, visit);
    } else if (stmt.kind === 'function' && options.functions) {
      visitStatements(stmt.body, options, visit);
    } else if (stmt.kind === 'class' && options.classes) {
      visitStatements(stmt.body, options, visit);
    }
  }
}
