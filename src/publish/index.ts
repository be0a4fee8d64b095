export { writeLocal, uploadRemote, createS3Store, serializeRegistry, S3ObjectStore } from './sinks.js';
export type { ObjectStore, PublishOutcome, PutObjectInput, RemoteTarget } from './sinks.js';
export { renderAgentTable, spliceSection, updateReadme } from './docs.js';
export type { DocsOutcome, ReadmeOptions, SpliceResult, TableOptions } from './docs.js';
