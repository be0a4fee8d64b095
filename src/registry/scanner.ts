/**
 * Directory scanner for agent modules.
 */

import { readdirSync, statSync } from 'node:fs';
import { basename, extname, join, resolve } from 'node:path';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Files directly inside `dir` whose names end with `suffix`, sorted by name.
 *
 * A missing directory is logged and yields no files; the caller decides
 * whether an empty scan is fatal.
 */
export function scanAgentFiles(dir: string, suffix: string, logger: ContextLogger = silentLogger): string[] {
  const root = resolve(dir);
  if (!existsAndIsDir(root)) {
    logger.error(`Mesh directory not found: ${root}`);
    return [];
  }

  const files = readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(suffix) && entry.name.length > suffix.length)
    .map((entry) => entry.name)
    .sort();
  logger.debug(`Found ${files.length} agent module(s) in ${root}`);
  return files.map((name) => join(root, name));
}

/** `mesh/agents/exa_search_agent.py` -> `exa_search_agent` */
export function moduleStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}
