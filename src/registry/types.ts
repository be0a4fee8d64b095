/**
 * Registry types: AgentRecord, MergedRegistry, SourcedRecord.
 */

import type { LiteralMapping } from '../extraction/literal.js';
import type { ModuleMetadataRecord, ToolSchema } from '../extraction/module-metadata.js';

export interface AgentRecord {
  metadata: LiteralMapping;
  /** File stem of the module that declares the agent class. */
  module: string;
  tools: ToolSchema[];
}

export type AgentMap = Record<string, AgentRecord>;

export interface MergedRegistry {
  last_updated: string;
  commit_sha: string;
  agents: AgentMap;
}

/** An extracted class together with the module it came from. */
export interface SourcedRecord {
  module: string;
  record: ModuleMetadataRecord;
}
