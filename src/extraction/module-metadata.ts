/**
 * Per-module extraction of agent metadata and tool schemas.
 */

import { readFileSync } from 'node:fs';
import type { ExtractionSettings } from '../config.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import type { CallNode, ClassDef, DictNode, Expr, FunctionDef, ListNode, SyntaxTree } from '../syntax/nodes.js';
import { parseSource } from '../syntax/parser.js';
import { statementExpressions, visitExpression, visitStatements } from '../syntax/walk.js';
import { convertMapping, convertSchemaMapping, mergeMapping, type LiteralMapping } from './literal.js';

export type ToolSchema = LiteralMapping;

export interface ModuleMetadataRecord {
  className: string;
  metadata: LiteralMapping;
  tools: ToolSchema[];
}

export type FileOutcome =
  | { status: 'extracted'; filePath: string; records: ModuleMetadataRecord[] }
  | { status: 'skipped'; filePath: string; reason: string };

function isSelfAttribute(expr: Expr, attr: string): boolean {
  return expr.kind === 'attribute' && expr.attr === attr && expr.value.kind === 'name' && expr.value.id === 'self';
}

/** `self.<attr>.update({...})` with a dict literal as the first argument. */
function metadataUpdateArgument(call: CallNode, attr: string): DictNode | null {
  const func = call.func;
  if (func.kind !== 'attribute' || func.attr !== 'update' || !isSelfAttribute(func.value, attr)) return null;
  const first = call.args[0];
  return first !== undefined && first.kind === 'dict' ? first : null;
}

function collectMetadata(cls: ClassDef, settings: ExtractionSettings, logger: ContextLogger): LiteralMapping {
  const metadata: LiteralMapping = {};
  const context = {
    placeholderName: settings.placeholderConstant,
    selfAttribute: settings.selfPlaceholderAttribute,
    logger,
  };
  // nested classes have their own `self`
  visitStatements(cls.body, { functions: true, classes: false }, (stmt) => {
    for (const expr of statementExpressions(stmt)) {
      visitExpression(expr, (node) => {
        if (node.kind !== 'call') return;
        const update = metadataUpdateArgument(node, settings.metadataAttribute);
        if (update !== null) mergeMapping(metadata, convertMapping(update, context));
      });
    }
  });
  return metadata;
}

function collectTools(cls: ClassDef, settings: ExtractionSettings, logger: ContextLogger): ToolSchema[] {
  const method = cls.body.find(
    (stmt): stmt is FunctionDef => stmt.kind === 'function' && stmt.name === settings.toolsMethod,
  );
  if (method === undefined) return [];

  const returned: ListNode[] = [];
  visitStatements(method.body, { functions: false, classes: false }, (stmt) => {
    if (stmt.kind === 'return' && stmt.value !== null && stmt.value.kind === 'list') returned.push(stmt.value);
  });
  const schemaList = returned.find(isSchemaList);
  if (schemaList === undefined) {
    if (returned.length > 0) {
      logger.debug(`No list of dict literals returned from ${cls.name}.${settings.toolsMethod}`, {
        lists: returned.length,
      });
    }
    return [];
  }

  return schemaList.elements.flatMap((element) =>
    element.kind === 'dict' ? [convertSchemaMapping(element, logger)] : [],
  );
}

/** A non-empty list literal whose elements are all dict literals. */
function isSchemaList(node: ListNode): boolean {
  return node.elements.length > 0 && node.elements.every((element) => element.kind === 'dict');
}

/** Classes reachable without entering a function body. */
function qualifyingClasses(tree: SyntaxTree, settings: ExtractionSettings): ClassDef[] {
  const classes: ClassDef[] = [];
  visitStatements(tree.body, { functions: false, classes: true }, (stmt) => {
    if (stmt.kind === 'class' && stmt.name.endsWith(settings.classSuffix) && stmt.name !== settings.baseClass) {
      classes.push(stmt);
    }
  });
  return classes;
}

export function extractModuleMetadata(
  tree: SyntaxTree,
  settings: ExtractionSettings,
  logger: ContextLogger = silentLogger,
): ModuleMetadataRecord[] {
  return qualifyingClasses(tree, settings).map((cls) => ({
    className: cls.name,
    metadata: collectMetadata(cls, settings, logger),
    tools: collectTools(cls, settings, logger),
  }));
}

/**
 * Read and extract one agent module.
 *
 * Read and parse failures stay inside this file: they are logged and the
 * file contributes no records.
 */
export function extractModuleFile(
  filePath: string,
  settings: ExtractionSettings,
  logger: ContextLogger = silentLogger,
): FileOutcome {
  try {
    const source = readFileSync(filePath, 'utf-8');
    const records = extractModuleMetadata(parseSource(source), settings, logger);
    logger.debug(`Extracted ${records.length} agent class(es) from ${filePath}`);
    return { status: 'extracted', filePath, records };
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    logger.warn(`Error parsing ${filePath}: ${reason}`);
    return { status: 'skipped', filePath, reason };
  }
}
