#!/usr/bin/env node
/**
 * mesh-registry: rebuild the agent registry, publish it and refresh the README table.
 */

import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { runRegistryUpdate, type RunMode } from './pipeline.js';

export const USAGE = `mesh-registry

Rebuild the agent metadata registry from the mesh agent sources.

Options:
  --dev             Write metadata.json locally instead of uploading to S3
  --root <dir>      Repository root (default: current directory)
  --config <file>   YAML config file (default: mesh-registry.yaml under the root, if present)
  -h, --help        Show this help`;

export interface CliOptions {
  mode: RunMode;
  root: string;
  configPath: string | null;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = { mode: 'remote', root: '.', configPath: null, help: false };

  const valueOf = (flag: string, i: number): string => {
    const next = args[i + 1];
    if (next === undefined || next.startsWith('--')) throw new CliUsageError(`${flag} needs a value`);
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === '--help' || a === '-h') {
      options.help = true;
    } else if (a === '--dev') {
      options.mode = 'local';
    } else if (a === '--root') {
      options.root = valueOf(a, i);
      i++;
    } else if (a === '--config') {
      options.configPath = valueOf(a, i);
      i++;
    } else {
      throw new CliUsageError(`Unknown argument: ${a}`);
    }
  }
  return options;
}

/** Returns the process exit code. */
export async function main(args: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(args);
  } catch (e) {
    if (!(e instanceof CliUsageError)) throw e;
    console.error(`${e.message}\n\n${USAGE}`);
    return 2;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const outcome = await runRegistryUpdate({
    mode: options.mode,
    root: options.root,
    configPath: options.configPath,
  });
  return outcome.status === 'succeeded' ? 0 : 1;
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    },
  );
}
