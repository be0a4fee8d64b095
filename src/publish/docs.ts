/**
 * Markdown agent table and its section in the mesh README.
 */

import { readFileSync, writeFileSync } from 'node:fs';
import { DEFAULT_DOCS_HEADING, DEFAULT_DOCS_TERMINATOR } from '../config.js';
import { DocumentationWriteError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { toolNames } from '../registry/builder.js';
import type { AgentRecord, MergedRegistry } from '../registry/types.js';
import { escapeRegExp } from '../utils/index.js';

const TABLE_HEADER = [
  '| Agent ID | Description | Available Tools | Source Code | External APIs |',
  '|----------|-------------|-----------------|-------------|---------------|',
].join('\n');

export interface TableOptions {
  sourceLinkPrefix?: string;
}

function describe(agent: AgentRecord): string {
  const description = agent.metadata['description'];
  return typeof description === 'string' ? description.replace(/\n/g, ' ') : '';
}

function externalApis(agent: AgentRecord): string {
  const apis = agent.metadata['external_apis'];
  if (!Array.isArray(apis) || apis.length === 0) return '-';
  return apis.map((api) => (typeof api === 'string' ? api : JSON.stringify(api))).join(', ');
}

function renderRow(agentId: string, agent: AgentRecord, sourceLinkPrefix: string): string {
  const names = toolNames(agent.tools);
  const tools = names.length > 0 ? names.map((name) => `• ${name}`).join('<br>') : '-';
  const source = agent.module ? `[Source](${sourceLinkPrefix}${agent.module}.py)` : '-';
  return `| ${agentId} | ${describe(agent)} | ${tools} | ${source} | ${externalApis(agent)} |`;
}

export function renderAgentTable(registry: MergedRegistry, options: TableOptions = {}): string {
  const prefix = options.sourceLinkPrefix ?? './agents/';
  const rows = Object.keys(registry.agents)
    .sort()
    .map((agentId) => renderRow(agentId, registry.agents[agentId], prefix));
  return `${TABLE_HEADER}\n${rows.join('\n')}`;
}

export interface SpliceResult {
  found: boolean;
  content: string;
}

/**
 * Replace every `heading\n ... \nterminator` section (shortest match) with
 * `heading\n\n<table>\n<terminator>`.
 */
export function spliceSection(document: string, heading: string, terminator: string, table: string): SpliceResult {
  const pattern = new RegExp(`${escapeRegExp(heading)}\\n[\\s\\S]*?\\n${escapeRegExp(terminator)}`, 'g');
  let found = false;
  const content = document.replace(pattern, () => {
    found = true;
    return `${heading}\n\n${table}\n${terminator}`;
  });
  return { found, content };
}

export type DocsOutcome =
  | { status: 'updated'; path: string }
  | { status: 'missing-file'; path: string }
  | { status: 'missing-anchor'; path: string };

export interface ReadmeOptions {
  heading?: string;
  terminator?: string;
  logger?: ContextLogger;
}

/**
 * Splice `table` into the README at `readmePath`.
 *
 * @throws DocumentationWriteError when the anchor was found but the file could not be written
 */
export function updateReadme(readmePath: string, table: string, options: ReadmeOptions = {}): DocsOutcome {
  const heading = options.heading ?? DEFAULT_DOCS_HEADING;
  const terminator = options.terminator ?? DEFAULT_DOCS_TERMINATOR;
  const logger = options.logger ?? silentLogger;

  let document: string;
  try {
    document = readFileSync(readmePath, 'utf-8');
  } catch (e) {
    logger.warn(`Could not read README at ${readmePath}`, { error: e instanceof Error ? e.message : String(e) });
    return { status: 'missing-file', path: readmePath };
  }

  const { found, content } = spliceSection(document, heading, terminator, table);
  if (!found) {
    logger.warn(`Could not find '${heading}' section in README`);
    return { status: 'missing-anchor', path: readmePath };
  }

  try {
    writeFileSync(readmePath, content, 'utf-8');
  } catch (e) {
    logger.error(`Failed to update README: ${e instanceof Error ? e.message : String(e)}`);
    throw new DocumentationWriteError(readmePath, { cause: e instanceof Error ? e : undefined });
  }
  logger.info('Updated README with new agent table');
  return { status: 'updated', path: readmePath };
}
