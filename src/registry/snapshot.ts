/**
 * Previously published registry: fetch, carry-forward merge, final envelope.
 */

import { Value } from '@sinclair/typebox/value';
import { isLiteralValue } from '../extraction/literal.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import { sortByKey } from '../utils/index.js';
import { EMPTY_SNAPSHOT, RegistrySnapshotSchema, type RegistrySnapshot } from './schema.js';
import type { AgentMap, MergedRegistry } from './types.js';

export type FetchLike = (url: string) => Promise<Response>;

export type SnapshotFetchResult = { ok: true; snapshot: RegistrySnapshot } | { ok: false; reason: string };

async function requestSnapshot(url: string, fetchImpl: FetchLike): Promise<SnapshotFetchResult> {
  let response: Response;
  try {
    response = await fetchImpl(url);
  } catch (e) {
    return { ok: false, reason: e instanceof Error ? e.message : String(e) };
  }
  if (!response.ok) {
    return { ok: false, reason: `HTTP ${response.status} from ${url}` };
  }

  let body: unknown;
  try {
    body = JSON.parse(await response.text());
  } catch (e) {
    return { ok: false, reason: `Invalid JSON from ${url}: ${e instanceof Error ? e.message : String(e)}` };
  }
  if (!Value.Check(RegistrySnapshotSchema, body)) {
    const first = Value.Errors(RegistrySnapshotSchema, body).First();
    return { ok: false, reason: `Unexpected snapshot shape at ${first ? first.path || '/' : '/'}` };
  }
  return { ok: true, snapshot: body };
}

/**
 * One GET, no retries. Failures are logged and reported, never thrown.
 */
export async function fetchSnapshot(
  url: string,
  fetchImpl: FetchLike = (target) => fetch(target),
  logger: ContextLogger = silentLogger,
): Promise<SnapshotFetchResult> {
  const result = await requestSnapshot(url, fetchImpl);
  if (result.ok) {
    logger.debug(`Fetched existing metadata from ${url}`, {
      agents: Object.keys(result.snapshot.agents ?? {}).length,
    });
  } else {
    logger.warn(`Failed to fetch existing metadata: ${result.reason}`);
  }
  return result;
}

/** The snapshot to merge against: the fetched one, or an empty registry. */
export function snapshotOrEmpty(result: SnapshotFetchResult): RegistrySnapshot {
  return result.ok ? result.snapshot : EMPTY_SNAPSHOT;
}

/**
 * Copy allowlisted metadata fields from the snapshot onto agents present in
 * both. Everything else in the candidate is left as built.
 */
export function mergeSnapshot(
  candidate: AgentMap,
  snapshot: RegistrySnapshot,
  carryForward: readonly string[],
): AgentMap {
  const previous = snapshot.agents ?? {};
  const merged: AgentMap = {};

  for (const [agentId, agent] of Object.entries(candidate)) {
    const before = Object.prototype.hasOwnProperty.call(previous, agentId) ? previous[agentId].metadata : undefined;
    if (before === undefined) {
      merged[agentId] = agent;
      continue;
    }
    const metadata = { ...agent.metadata };
    for (const field of carryForward) {
      if (!Object.prototype.hasOwnProperty.call(before, field)) continue;
      const value = before[field];
      if (isLiteralValue(value)) metadata[field] = value;
    }
    merged[agentId] = { ...agent, metadata };
  }
  return merged;
}

export interface RegistryEnvelopeOptions {
  commitSha: string;
  now?: Date;
}

export function createRegistry(agents: AgentMap, options: RegistryEnvelopeOptions): MergedRegistry {
  return {
    last_updated: (options.now ?? new Date()).toISOString(),
    commit_sha: options.commitSha,
    agents: sortByKey(agents),
  };
}
