/**
 * Base metadata template, read from the shared base class's `__init__`.
 */

import { readFileSync } from 'node:fs';
import type { ExtractionSettings } from '../config.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import type { ClassDef, DictNode, Expr, Stmt, SyntaxTree } from '../syntax/nodes.js';
import { parseSource } from '../syntax/parser.js';
import { visitStatements } from '../syntax/walk.js';
import { deepFreeze } from '../utils/index.js';
import { convertMapping, type LiteralMapping, type LiteralScalar } from './literal.js';

export type BaseMetadataTemplate = Readonly<LiteralMapping>;

/**
 * First pass: the first top-level single-target assignment to `name`.
 * Returns `undefined` when it is absent or not a plain constant.
 */
export function findPlaceholderConstant(
  tree: SyntaxTree,
  name: string,
  logger: ContextLogger = silentLogger,
): LiteralScalar | undefined {
  for (const stmt of tree.body) {
    if (stmt.kind !== 'assign' || stmt.targets.length !== 1) continue;
    const target = stmt.targets[0];
    if (target.kind !== 'name' || target.id !== name) continue;
    if (stmt.value.kind === 'constant' && typeof stmt.value.value !== 'bigint') return stmt.value.value;
    logger.warn(`${name} assignment is not a simple constant.`, { line: stmt.line });
    return undefined;
  }
  return undefined;
}

function isSelfAttribute(target: Expr, attr: string): boolean {
  return target.kind === 'attribute' && target.attr === attr && target.value.kind === 'name' && target.value.id === 'self';
}

/** `self.<attr> = {...}` or `self.<attr>: T = {...}` among the direct statements of `__init__`. */
function findMetadataAssignment(cls: ClassDef, attr: string): DictNode | null {
  const init = cls.body.find((stmt) => stmt.kind === 'function' && stmt.name === '__init__' && !stmt.isAsync);
  if (init === undefined || init.kind !== 'function') return null;

  for (const stmt of init.body) {
    let target: Expr | null = null;
    let value: Expr | null = null;
    if (stmt.kind === 'assign' && stmt.targets.length === 1) {
      target = stmt.targets[0];
      value = stmt.value;
    } else if (stmt.kind === 'annassign') {
      target = stmt.target;
      value = stmt.value;
    }
    if (target !== null && value !== null && isSelfAttribute(target, attr) && value.kind === 'dict') {
      return value;
    }
  }
  return null;
}

/**
 * Extract the base template from a parsed tree.
 *
 * Returns `null` when no base class yields a non-empty metadata mapping.
 */
export function extractBaseTemplate(
  tree: SyntaxTree,
  settings: ExtractionSettings,
  logger: ContextLogger = silentLogger,
): LiteralMapping | null {
  const placeholderValue = findPlaceholderConstant(tree, settings.placeholderConstant, logger);

  const candidates: ClassDef[] = [];
  visitStatements(tree.body, { functions: true, classes: true }, (stmt: Stmt) => {
    if (stmt.kind === 'class' && stmt.name === settings.baseClass) candidates.push(stmt);
  });

  for (const cls of candidates) {
    const literal = findMetadataAssignment(cls, settings.metadataAttribute);
    if (literal === null) continue;
    const template = convertMapping(literal, {
      placeholderName: settings.placeholderConstant,
      placeholderValue,
      selfAttribute: settings.selfPlaceholderAttribute,
      logger,
    });
    if (Object.keys(template).length > 0) return template;
  }
  return null;
}

/**
 * Read, parse and extract the base template from `filePath`.
 *
 * Every failure is logged and reported as `null`; the pipeline turns that
 * into a fatal `TemplateMissingError`.
 */
export function loadBaseTemplate(
  filePath: string,
  settings: ExtractionSettings,
  logger: ContextLogger = silentLogger,
): BaseMetadataTemplate | null {
  let source: string;
  try {
    source = readFileSync(filePath, 'utf-8');
  } catch (e) {
    logger.error(`Mesh agent file not found at: ${filePath}`, { error: String(e) });
    return null;
  }

  let template: LiteralMapping | null;
  try {
    template = extractBaseTemplate(parseSource(source), settings, logger);
  } catch (e) {
    logger.error(`Error parsing ${filePath} for base metadata: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }

  if (template === null) {
    logger.error(
      `Could not find 'self.${settings.metadataAttribute} = {...}' or 'self.${settings.metadataAttribute}: type = {...}' assignment in ${filePath}`,
    );
    return null;
  }
  return deepFreeze(template);
}
