/**
 * One registry update run: template, scan, extract, build, merge, publish, docs.
 */

import { resolve } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { loadConfig, readEnvironment, resolveSettings, type RegistrySettings, type S3Credentials } from './config.js';
import { TemplateMissingError, toRegistryError, type RegistryError } from './errors.js';
import { loadBaseTemplate } from './extraction/base-template.js';
import { extractModuleFile, type FileOutcome } from './extraction/module-metadata.js';
import { ContextLogger, type WritableOutput } from './observability/context-logger.js';
import { renderAgentTable, updateReadme, type DocsOutcome } from './publish/docs.js';
import { createS3Store, uploadRemote, writeLocal, type ObjectStore, type PublishOutcome } from './publish/sinks.js';
import { buildAgents } from './registry/builder.js';
import { moduleStem, scanAgentFiles } from './registry/scanner.js';
import { createRegistry, fetchSnapshot, mergeSnapshot, snapshotOrEmpty, type FetchLike } from './registry/snapshot.js';
import type { MergedRegistry, SourcedRecord } from './registry/types.js';

export type RunMode = 'local' | 'remote';

export interface RunOptions {
  /** Repository root; every configured path is relative to it. */
  root?: string;
  configPath?: string | null;
  mode?: RunMode;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
  storeFactory?: (credentials: S3Credentials, region: string) => ObjectStore;
  now?: () => Date;
  /** Where log lines go when no logger is given. */
  logOutput?: WritableOutput;
  logger?: ContextLogger;
}

export interface RunResult {
  registry: MergedRegistry;
  publish: PublishOutcome;
  docs: DocsOutcome;
  /** Per-file extraction results, in scan order. */
  files: FileOutcome[];
}

export type RunOutcome =
  | ({ status: 'succeeded'; runId: string } & RunResult)
  | { status: 'aborted'; runId: string; error: RegistryError };

function createRunLogger(options: RunOptions, runId: string, settings?: RegistrySettings): ContextLogger {
  if (options.logger) return options.logger;
  return new ContextLogger({
    level: settings?.logging.level,
    format: settings?.logging.format,
    output: options.logOutput,
    runId,
  });
}

async function execute(
  settings: RegistrySettings,
  options: RunOptions,
  logger: ContextLogger,
): Promise<RunResult> {
  const at = (path: string): string => resolve(settings.root, path);
  const environment = readEnvironment(options.env ?? process.env);

  const basePath = at(settings.paths.baseAgent);
  const template = loadBaseTemplate(basePath, settings.extraction, logger.child('template'));
  if (template === null) throw new TemplateMissingError(basePath);

  const files = scanAgentFiles(at(settings.paths.agentsDir), settings.paths.agentFileSuffix, logger.child('scanner'));
  const extractLogger = logger.child('extract');
  const outcomes = files.map((filePath) => extractModuleFile(filePath, settings.extraction, extractLogger));
  const sources: SourcedRecord[] = outcomes.flatMap((outcome) =>
    outcome.status === 'extracted'
      ? outcome.records.map((record) => ({ module: moduleStem(outcome.filePath), record }))
      : [],
  );

  const agents = buildAgents(template, sources, {
    exclude: settings.registry.exclude,
    logger: logger.child('builder'),
  });

  const snapshotLogger = logger.child('snapshot');
  const fetched = await fetchSnapshot(settings.snapshot.url, options.fetchImpl, snapshotLogger);
  const merged = mergeSnapshot(agents, snapshotOrEmpty(fetched), settings.snapshot.carryForward);
  const registry = createRegistry(merged, {
    commitSha: environment.commitSha,
    now: options.now ? options.now() : new Date(),
  });

  const publishLogger = logger.child('publish');
  let publish: PublishOutcome;
  if (options.mode === 'local') {
    publish = writeLocal(registry, at(settings.paths.localOutput), publishLogger);
  } else {
    const factory = options.storeFactory ?? createS3Store;
    const store = environment.credentials ? factory(environment.credentials, settings.publish.region) : null;
    publish = await uploadRemote(registry, settings.publish, store, publishLogger);
  }

  const table = renderAgentTable(registry, { sourceLinkPrefix: settings.docs.sourceLinkPrefix });
  const docs = updateReadme(at(settings.paths.readme), table, {
    heading: settings.docs.heading,
    terminator: settings.docs.terminator,
    logger: logger.child('docs'),
  });

  return { registry, publish, docs, files: outcomes };
}

/**
 * Run every stage in order. Fatal errors end the run as `aborted`; nothing
 * is thrown to the caller.
 */
export async function runRegistryUpdate(options: RunOptions = {}): Promise<RunOutcome> {
  const runId = options.logger?.runId ?? uuidv4();
  const root = resolve(options.root ?? '.');
  let logger = createRunLogger(options, runId);

  try {
    const settings = resolveSettings(loadConfig(options.configPath, root), root);
    logger = createRunLogger(options, runId, settings);
    logger.info('Starting registry update', { mode: options.mode ?? 'remote', root });
    const result = await execute(settings, options, logger);
    logger.info('Registry update finished', {
      agents: Object.keys(result.registry.agents).length,
      publish: result.publish.status,
      docs: result.docs.status,
    });
    return { status: 'succeeded', runId, ...result };
  } catch (e) {
    const error = toRegistryError(e);
    logger.error('Failed to update metadata', { error: error.toJSON() });
    return { status: 'aborted', runId, error };
  }
}
