/**
 * Turns extracted class records into the agent map of a registry.
 */

import { EmptyRegistryError } from '../errors.js';
import type { BaseMetadataTemplate } from '../extraction/base-template.js';
import { mergeMapping, type LiteralMapping, type LiteralValue } from '../extraction/literal.js';
import type { ToolSchema } from '../extraction/module-metadata.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { deepCopy, matchesAny, sortByKey } from '../utils/index.js';
import type { AgentMap, AgentRecord, SourcedRecord } from './types.js';

export interface BuildOptions {
  /** Wildcard patterns on class names; matches are left out. */
  exclude?: readonly string[];
  logger?: ContextLogger;
}

function isMapping(value: LiteralValue | undefined): value is LiteralMapping {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/** `function.name` of an OpenAI-style schema, or a top-level `name`. */
export function toolName(tool: ToolSchema): string | null {
  const fn = tool['function'];
  if (isMapping(fn) && typeof fn['name'] === 'string') return fn['name'];
  const name = tool['name'];
  return typeof name === 'string' ? name : null;
}

export function toolNames(tools: readonly ToolSchema[]): string[] {
  return tools.map(toolName).filter((name): name is string => name !== null);
}

function toolInputDescriptors(tools: readonly ToolSchema[]): LiteralMapping[] {
  return [
    {
      name: 'tool',
      description: `Directly specify which tool to call: ${toolNames(tools).join(', ')}. Bypasses LLM.`,
      type: 'str',
      required: false,
    },
    {
      name: 'tool_arguments',
      description: 'Arguments for the tool call as a dictionary',
      type: 'dict',
      required: false,
      default: {},
    },
  ];
}

export function buildAgentRecord(template: BaseMetadataTemplate, source: SourcedRecord): AgentRecord {
  const metadata = mergeMapping(deepCopy<LiteralMapping>(template), deepCopy(source.record.metadata));
  const tools = deepCopy(source.record.tools);

  const inputs = metadata['inputs'];
  if (tools.length > 0 && Array.isArray(inputs)) {
    inputs.push(...toolInputDescriptors(tools));
  }
  return { metadata, module: source.module, tools };
}

/**
 * Build the sorted agent map.
 *
 * Records arrive in scan order, so when two modules declare the same class
 * the later module wins.
 *
 * @throws EmptyRegistryError when nothing survives exclusion
 */
export function buildAgents(
  template: BaseMetadataTemplate,
  sources: readonly SourcedRecord[],
  options: BuildOptions = {},
): AgentMap {
  const exclude = options.exclude ?? [];
  const logger = options.logger ?? silentLogger;
  const agents: AgentMap = {};

  for (const source of sources) {
    const agentId = source.record.className;
    if (matchesAny(exclude, agentId)) {
      logger.debug(`Excluding agent ${agentId}`, { module: source.module });
      continue;
    }
    const previous = agents[agentId];
    if (previous !== undefined) {
      logger.warn(`Duplicate agent ${agentId}: ${source.module} replaces ${previous.module}`);
    }
    agents[agentId] = buildAgentRecord(template, source);
  }

  const count = Object.keys(agents).length;
  if (count === 0) {
    throw new EmptyRegistryError({ scannedRecords: sources.length });
  }
  logger.info(`Found ${count} agents`);
  return sortByKey(agents);
}
