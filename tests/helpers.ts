/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { ContextLogger } from '../src/observability/context-logger.js';
import type { PutObjectInput, ObjectStore } from '../src/publish/sinks.js';
import type { FetchLike } from '../src/registry/snapshot.js';

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => void lines.push(s) },
    lines,
  };
}

export interface CapturedEntry {
  level: string;
  message: string;
  component: string | null;
  extra: Record<string, unknown> | null;
}

/** JSON logger at trace level whose entries are parsed back for assertions. */
export function createCapturingLogger(): { logger: ContextLogger; entries: () => CapturedEntry[] } {
  const { output, lines } = createBufferOutput();
  const logger = new ContextLogger({ output, level: 'trace', runId: 'test-run' });
  return {
    logger,
    entries: () => lines.map((line): CapturedEntry => JSON.parse(line)),
  };
}

export function makeTempDir(prefix = 'mesh-registry-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write `files` (relative path -> content) under `root`. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [relative, content] of Object.entries(files)) {
    const target = join(root, relative);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content, 'utf-8');
  }
}

export const BASE_AGENT_SOURCE = `import os

DEFAULT_MODEL_ID = "model-x"


class MeshAgent:
    def __init__(self):
        self.agent_name: str = self.__class__.__name__
        self.metadata: dict = {
            "name": self.agent_name,
            "version": "1.0.0",
            "author": "unknown",
            "author_address": "",
            "description": "",
            "inputs": [],
            "outputs": [],
            "external_apis": [],
            "tags": [],
            "large_model_id": DEFAULT_MODEL_ID,
        }

    def get_tool_schemas(self):
        return []
`;

export const DEMO_AGENT_SOURCE = `from mesh.mesh_agent import MeshAgent


class DemoAgent(MeshAgent):
    def __init__(self):
        super().__init__()
        self.metadata.update(
            {
                "name": "Demo",
                "version": "1.0",
                "description": "Looks things up.\\nReturns summaries.",
                "external_apis": ["Exa", "Firecrawl"],
                "inputs": [
                    {"name": "query", "description": "Search query", "type": "str", "required": True},
                ],
            }
        )

    def get_tool_schemas(self):
        return [
            {"type": "function", "function": {"name": "search", "description": "Search the web"}},
            {"type": "function", "function": {"name": "fetch_page", "description": "Fetch a page"}},
        ]
`;

export const ECHO_AGENT_SOURCE = `from mesh.mesh_agent import MeshAgent


class EchoAgent(MeshAgent):
    def __init__(self):
        super().__init__()
        self.metadata.update({"name": "Echo"})
`;

export const README_SOURCE = `# Mesh

Intro text.

## Appendix: All Available Mesh Agents
old table
---

Footer.
`;

/** A repository layout with a base agent, two agent modules and a README. */
export function createMeshRepo(extra: Record<string, string> = {}): string {
  const root = makeTempDir();
  writeTree(root, {
    'mesh/mesh_agent.py': BASE_AGENT_SOURCE,
    'mesh/agents/demo_agent.py': DEMO_AGENT_SOURCE,
    'mesh/agents/echo_agent.py': ECHO_AGENT_SOURCE,
    'mesh/README.md': README_SOURCE,
    ...extra,
  });
  return root;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/** Fetch stand-in that records requested URLs and answers from `respond`. */
export function createFakeFetch(respond: (url: string) => Response | Promise<Response>): {
  fetchImpl: FetchLike;
  calls: string[];
} {
  const calls: string[] = [];
  return {
    calls,
    fetchImpl: async (url: string) => {
      calls.push(url);
      return respond(url);
    },
  };
}

export function failingFetch(message: string): FetchLike {
  return async () => {
    throw new Error(message);
  };
}

export class FakeObjectStore implements ObjectStore {
  readonly puts: PutObjectInput[] = [];
  private _failWith: string | null;

  constructor(failWith: string | null = null) {
    this._failWith = failWith;
  }

  async putObject(input: PutObjectInput): Promise<void> {
    if (this._failWith !== null) throw new Error(this._failWith);
    this.puts.push(input);
  }
}
