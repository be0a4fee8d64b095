/**
 * agent-mesh-registry - Static metadata registry for mesh agent modules.
 */

// Pipeline
export { runRegistryUpdate } from './pipeline.js';
export type { RunMode, RunOptions, RunOutcome, RunResult } from './pipeline.js';

// Config
export {
  Config,
  loadConfig,
  resolveSettings,
  readEnvironment,
  DEFAULT_CONFIG_FILE,
  DEFAULT_EXTRACTION,
  DEFAULT_CARRY_FORWARD,
  DEFAULT_EXCLUDE,
} from './config.js';
export type { ExtractionSettings, RegistrySettings, RunEnvironment, S3Credentials } from './config.js';

// Errors
export {
  RegistryError,
  ConfigNotFoundError,
  ConfigError,
  TemplateMissingError,
  EmptyRegistryError,
  LocalPublishError,
  DocumentationWriteError,
  ErrorCodes,
  toRegistryError,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Syntax
export { parseSource, SourceSyntaxError } from './syntax/index.js';
export type { Expr, Stmt, SyntaxTree } from './syntax/index.js';

// Extraction
export {
  convertLiteral,
  convertMapping,
  convertSchemaMapping,
  isUnsupportedSentinel,
  extractBaseTemplate,
  loadBaseTemplate,
  extractModuleMetadata,
  extractModuleFile,
} from './extraction/index.js';
export type {
  BaseMetadataTemplate,
  FileOutcome,
  LiteralMapping,
  LiteralValue,
  ModuleMetadataRecord,
  ToolSchema,
} from './extraction/index.js';

// Registry
export {
  scanAgentFiles,
  buildAgents,
  fetchSnapshot,
  mergeSnapshot,
  createRegistry,
  RegistrySnapshotSchema,
} from './registry/index.js';
export type { AgentMap, AgentRecord, MergedRegistry, RegistrySnapshot, SnapshotFetchResult } from './registry/index.js';

// Publish
export { writeLocal, uploadRemote, createS3Store, renderAgentTable, spliceSection, updateReadme } from './publish/index.js';
export type { DocsOutcome, ObjectStore, PublishOutcome } from './publish/index.js';

// Observability
export { ContextLogger, silentLogger } from './observability/index.js';
export type { ContextLoggerOptions, WritableOutput } from './observability/index.js';

// Utils
export { matchPattern, matchesAny } from './utils/index.js';
