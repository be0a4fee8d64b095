/**
 * Literal conversion from syntax-tree nodes to plain values.
 *
 * Conversion is total: anything outside constants, lists, dicts, the one
 * known placeholder name and the `self.<attr>` placeholder comes back as an
 * `UNSUPPORTED_*` string and a warning, never as an exception.
 */

import type { ConstantNode, ConstantValue, DictNode, Expr } from '../syntax/nodes.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { DEFAULT_EXTRACTION } from '../config.js';

export type LiteralScalar = string | number | boolean | null;

export type LiteralValue = LiteralScalar | LiteralValue[] | LiteralMapping;

export interface LiteralMapping {
  [key: string]: LiteralValue;
}

export interface LiteralContext {
  /** Module-level constant that may be substituted, e.g. `DEFAULT_MODEL_ID`. */
  placeholderName: string;
  /** Resolved value for `placeholderName`; `null`/`undefined` leaves it unresolved. */
  placeholderValue?: LiteralScalar;
  /** `self.<attr>` that stands for the agent's own id and converts to `""`. */
  selfAttribute: string;
  logger: ContextLogger;
}

export const UNSUPPORTED_NAME_PREFIX = 'UNSUPPORTED_NAME';
export const UNSUPPORTED_ATTRIBUTE_PREFIX = 'UNSUPPORTED_ATTRIBUTE';
export const UNSUPPORTED_NODE_PREFIX = 'UNSUPPORTED_NODE';

export function isUnsupportedSentinel(value: unknown): boolean {
  return (
    typeof value === 'string' &&
    (value.startsWith(`${UNSUPPORTED_NAME_PREFIX}(`) ||
      value.startsWith(`${UNSUPPORTED_ATTRIBUTE_PREFIX}(`) ||
      value.startsWith(`${UNSUPPORTED_NODE_PREFIX}(`))
  );
}

function resolveContext(context?: Partial<LiteralContext>): LiteralContext {
  return {
    placeholderName: context?.placeholderName ?? DEFAULT_EXTRACTION.placeholderConstant,
    placeholderValue: context?.placeholderValue,
    selfAttribute: context?.selfAttribute ?? DEFAULT_EXTRACTION.selfPlaceholderAttribute,
    logger: context?.logger ?? silentLogger,
  };
}

export function convertLiteral(node: Expr, context?: Partial<LiteralContext>): LiteralValue {
  return convert(node, resolveContext(context));
}

export function convertMapping(node: DictNode, context?: Partial<LiteralContext>): LiteralMapping {
  return convertDict(node, resolveContext(context));
}

function convert(node: Expr, ctx: LiteralContext): LiteralValue {
  switch (node.kind) {
    case 'constant': {
      const value = constantValue(node, ctx.logger);
      return value === undefined ? `${UNSUPPORTED_NODE_PREFIX}(LargeInt)` : value;
    }

    case 'list':
      return node.elements.map((element) => convert(element, ctx));

    case 'dict':
      return convertDict(node, ctx);

    case 'name':
      if (node.id === ctx.placeholderName && ctx.placeholderValue != null) {
        return ctx.placeholderValue;
      }
      ctx.logger.warn(`Skipping unsupported name: ${node.id}`, { line: node.line });
      return `${UNSUPPORTED_NAME_PREFIX}(${node.id})`;

    case 'attribute':
      if (node.value.kind === 'name' && node.value.id === 'self' && node.attr === ctx.selfAttribute) {
        // filled in later with the real agent id
        return '';
      }
      ctx.logger.warn(`Skipping unsupported attribute: ${dumpExpression(node)}`, { line: node.line });
      return `${UNSUPPORTED_ATTRIBUTE_PREFIX}(${dumpExpression(node)})`;

    case 'call':
      ctx.logger.warn('Skipping unsupported node type during conversion: Call', { line: node.line });
      return `${UNSUPPORTED_NODE_PREFIX}(Call)`;

    case 'other':
      ctx.logger.warn(`Skipping unsupported node type during conversion: ${node.type}`, { line: node.line });
      return `${UNSUPPORTED_NODE_PREFIX}(${node.type})`;
  }
}

function convertDict(node: DictNode, ctx: LiteralContext): LiteralMapping {
  const result: LiteralMapping = {};
  node.keys.forEach((key, i) => {
    if (key === null || key.kind !== 'constant') {
      ctx.logger.warn(`Skipping non-constant key in dict: ${key === null ? '**spread' : dumpExpression(key)}`, {
        line: key?.line ?? node.line,
      });
      return;
    }
    setEntry(result, mappingKey(key.value, key.float), convert(node.values[i], ctx));
  });
  return result;
}

/**
 * JSON value of a constant, or `undefined` for an integer that a JSON number
 * cannot hold exactly.
 */
function constantValue(node: ConstantNode, logger: ContextLogger): LiteralScalar | undefined {
  const { value } = node;
  if (typeof value === 'bigint') {
    logger.warn(`Skipping integer outside the exact JSON number range: ${value}`, { line: node.line });
    return undefined;
  }
  if (node.namedEscapes !== undefined) {
    logger.warn(`Leaving \\N{...} escape undecoded: ${node.namedEscapes.join(', ')}`, { line: node.line });
  }
  return value;
}

/**
 * Restricted conversion used for tool schemas.
 *
 * Keys must be constants. Values convert when they are constants, lists or
 * dicts; any other value drops its key. Inside lists, elements that are
 * neither constants nor dicts become `null`. Integers too large for a JSON
 * number count as "any other value".
 */
export function convertSchemaMapping(node: DictNode, logger: ContextLogger = silentLogger): LiteralMapping {
  const result: LiteralMapping = {};
  node.keys.forEach((key, i) => {
    if (key === null || key.kind !== 'constant') return;
    const value = node.values[i];
    const name = mappingKey(key.value, key.float);
    if (value.kind === 'constant') {
      const converted = constantValue(value, logger);
      if (converted !== undefined) setEntry(result, name, converted);
    } else if (value.kind === 'list') {
      setEntry(
        result,
        name,
        value.elements.map((element): LiteralValue => {
          if (element.kind === 'dict') return convertSchemaMapping(element, logger);
          if (element.kind === 'constant') return constantValue(element, logger) ?? null;
          return null;
        }),
      );
    } else if (value.kind === 'dict') {
      setEntry(result, name, convertSchemaMapping(value, logger));
    }
  });
  return result;
}

/** True for anything a JSON parser could have produced. */
export function isLiteralValue(value: unknown): value is LiteralValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (Array.isArray(value)) return value.every(isLiteralValue);
  if (typeof value === 'object') return Object.values(value).every(isLiteralValue);
  return false;
}

/**
 * Constant keys become JSON object keys the way a JSON encoder writes them.
 * Float keys keep their float spelling, so `1.0` gives `"1.0"`, not `"1"`.
 */
export function mappingKey(value: ConstantValue, float = false): string {
  if (value === null) return 'null';
  if (float && typeof value === 'number') return floatKey(value);
  return String(value);
}

function floatKey(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (!Number.isFinite(value)) return value > 0 ? 'Infinity' : '-Infinity';
  if (Object.is(value, -0)) return '-0.0';
  const magnitude = Math.abs(value);
  if (magnitude !== 0 && (magnitude < 1e-4 || magnitude >= 1e16)) {
    // two-digit exponent: 1e-05, 1e+16
    return value.toExponential().replace(/e([+-])(\d)$/, (_match, sign: string, digit: string) => `e${sign}0${digit}`);
  }
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** Shallow merge; later keys win. */
export function mergeMapping(target: LiteralMapping, source: LiteralMapping): LiteralMapping {
  for (const [key, value] of Object.entries(source)) {
    setEntry(target, key, value);
  }
  return target;
}

function setEntry(target: LiteralMapping, key: string, value: LiteralValue): void {
  if (key === '__proto__') {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
  } else {
    target[key] = value;
  }
}

/** Short source-like rendering used in warnings and sentinels. */
export function dumpExpression(node: Expr): string {
  switch (node.kind) {
    case 'constant':
      if (typeof node.value === 'string') return JSON.stringify(node.value);
      if (node.value === null) return 'None';
      if (typeof node.value === 'boolean') return node.value ? 'True' : 'False';
      return String(node.value);
    case 'name':
      return node.id;
    case 'attribute':
      return `${dumpExpression(node.value)}.${node.attr}`;
    case 'call':
      return `${dumpExpression(node.func)}(...)`;
    case 'list':
      return '[...]';
    case 'dict':
      return '{...}';
    case 'other':
      return `<${node.type}>`;
  }
}
