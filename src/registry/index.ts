export type { AgentMap, AgentRecord, MergedRegistry, SourcedRecord } from './types.js';
export { RegistrySnapshotSchema, SnapshotAgentSchema, EMPTY_SNAPSHOT } from './schema.js';
export type { RegistrySnapshot } from './schema.js';
export { scanAgentFiles, moduleStem } from './scanner.js';
export { buildAgents, buildAgentRecord, toolName, toolNames } from './builder.js';
export type { BuildOptions } from './builder.js';
export { fetchSnapshot, snapshotOrEmpty, mergeSnapshot, createRegistry } from './snapshot.js';
export type { FetchLike, SnapshotFetchResult, RegistryEnvelopeOptions } from './snapshot.js';
