/**
 * Configuration: dot-path accessor, YAML loading and resolved run settings.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import yaml from 'js-yaml';
import { ConfigError, ConfigNotFoundError } from './errors.js';

export const DEFAULT_CONFIG_FILE = 'mesh-registry.yaml';

export class Config {
  private _data: Record<string, unknown>;

  constructor(data?: Record<string, unknown>) {
    this._data = data ?? {};
  }

  get(key: string, defaultValue?: unknown): unknown {
    const parts = key.split('.');
    let current: unknown = this._data;
    for (const part of parts) {
      if (current !== null && typeof current === 'object' && part in current) {
        current = (current as Record<string, unknown>)[part];
      } else {
        return defaultValue;
      }
    }
    return current;
  }

  getString(key: string, defaultValue: string): string {
    const value = this.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getStringList(key: string, defaultValue: string[]): string[] {
    const value = this.get(key);
    if (!Array.isArray(value)) return defaultValue;
    return value.filter((item): item is string => typeof item === 'string');
  }
}

const optionalString = Type.Optional(Type.String());
const optionalStringList = Type.Optional(Type.Array(Type.String()));

export const ConfigFileSchema = Type.Object({
  paths: Type.Optional(
    Type.Object({
      base_agent: optionalString,
      agents_dir: optionalString,
      agent_file_suffix: optionalString,
      readme: optionalString,
      local_output: optionalString,
    }),
  ),
  extraction: Type.Optional(
    Type.Object({
      base_class: optionalString,
      class_suffix: optionalString,
      metadata_attribute: optionalString,
      placeholder_constant: optionalString,
      self_placeholder_attribute: optionalString,
      tools_method: optionalString,
    }),
  ),
  registry: Type.Optional(Type.Object({ exclude: optionalStringList })),
  snapshot: Type.Optional(Type.Object({ url: optionalString, carry_forward: optionalStringList })),
  publish: Type.Optional(Type.Object({ bucket: optionalString, key: optionalString, region: optionalString })),
  docs: Type.Optional(
    Type.Object({
      heading: optionalString,
      terminator: optionalString,
      source_link_prefix: optionalString,
    }),
  ),
  logging: Type.Optional(
    Type.Object({
      level: Type.Optional(
        Type.Union([
          Type.Literal('trace'),
          Type.Literal('debug'),
          Type.Literal('info'),
          Type.Literal('warn'),
          Type.Literal('error'),
          Type.Literal('fatal'),
        ]),
      ),
      format: Type.Optional(Type.Union([Type.Literal('json'), Type.Literal('text')])),
    }),
  ),
});

export type ConfigFile = Static<typeof ConfigFileSchema>;

/**
 * Load a YAML config file.
 *
 * An explicit path must exist. Without one, `mesh-registry.yaml` under `root`
 * is used when present and an empty config otherwise.
 */
export function loadConfig(configPath?: string | null, root: string = '.'): Config {
  let filePath: string;
  if (configPath != null) {
    filePath = resolve(root, configPath);
    if (!existsSync(filePath)) throw new ConfigNotFoundError(filePath);
  } else {
    filePath = resolve(root, DEFAULT_CONFIG_FILE);
    if (!existsSync(filePath)) return new Config();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (e) {
    throw new ConfigError(`Invalid YAML in config file: ${filePath}`, { cause: e instanceof Error ? e : undefined });
  }
  if (parsed === null || parsed === undefined) return new Config();

  if (!Value.Check(ConfigFileSchema, parsed)) {
    const first = Value.Errors(ConfigFileSchema, parsed).First();
    const where = first ? `${first.path || '/'}: ${first.message}` : 'unknown error';
    throw new ConfigError(`Invalid config file ${filePath} at ${where}`);
  }
  return new Config(parsed);
}

export interface RegistrySettings {
  root: string;
  paths: {
    baseAgent: string;
    agentsDir: string;
    agentFileSuffix: string;
    readme: string;
    localOutput: string;
  };
  extraction: ExtractionSettings;
  registry: {
    exclude: string[];
  };
  snapshot: {
    url: string;
    carryForward: string[];
  };
  publish: {
    bucket: string;
    key: string;
    region: string;
  };
  docs: {
    heading: string;
    terminator: string;
    sourceLinkPrefix: string;
  };
  logging: {
    level: string;
    format: string;
  };
}

export interface ExtractionSettings {
  baseClass: string;
  classSuffix: string;
  metadataAttribute: string;
  placeholderConstant: string;
  selfPlaceholderAttribute: string;
  toolsMethod: string;
}

export const DEFAULT_EXTRACTION: Readonly<ExtractionSettings> = Object.freeze({
  baseClass: 'MeshAgent',
  classSuffix: 'Agent',
  metadataAttribute: 'metadata',
  placeholderConstant: 'DEFAULT_MODEL_ID',
  selfPlaceholderAttribute: 'agent_name',
  toolsMethod: 'get_tool_schemas',
});

export const DEFAULT_CARRY_FORWARD = Object.freeze(['total_calls', 'greeting_message']);
export const DEFAULT_EXCLUDE = Object.freeze(['*EchoAgent*']);
export const DEFAULT_SNAPSHOT_URL = 'https://mesh.example.com/metadata.json';
export const DEFAULT_DOCS_HEADING = '## Appendix: All Available Mesh Agents';
export const DEFAULT_DOCS_TERMINATOR = '---';

export function resolveSettings(config: Config, root: string = '.'): RegistrySettings {
  return {
    root: resolve(root),
    paths: {
      baseAgent: config.getString('paths.base_agent', 'mesh/mesh_agent.py'),
      agentsDir: config.getString('paths.agents_dir', 'mesh/agents'),
      agentFileSuffix: config.getString('paths.agent_file_suffix', '_agent.py'),
      readme: config.getString('paths.readme', 'mesh/README.md'),
      localOutput: config.getString('paths.local_output', 'metadata.json'),
    },
    extraction: {
      baseClass: config.getString('extraction.base_class', DEFAULT_EXTRACTION.baseClass),
      classSuffix: config.getString('extraction.class_suffix', DEFAULT_EXTRACTION.classSuffix),
      metadataAttribute: config.getString('extraction.metadata_attribute', DEFAULT_EXTRACTION.metadataAttribute),
      placeholderConstant: config.getString('extraction.placeholder_constant', DEFAULT_EXTRACTION.placeholderConstant),
      selfPlaceholderAttribute: config.getString(
        'extraction.self_placeholder_attribute',
        DEFAULT_EXTRACTION.selfPlaceholderAttribute,
      ),
      toolsMethod: config.getString('extraction.tools_method', DEFAULT_EXTRACTION.toolsMethod),
    },
    registry: {
      exclude: config.getStringList('registry.exclude', [...DEFAULT_EXCLUDE]),
    },
    snapshot: {
      url: config.getString('snapshot.url', DEFAULT_SNAPSHOT_URL),
      carryForward: config.getStringList('snapshot.carry_forward', [...DEFAULT_CARRY_FORWARD]),
    },
    publish: {
      bucket: config.getString('publish.bucket', 'mesh'),
      key: config.getString('publish.key', 'metadata.json'),
      region: config.getString('publish.region', 'enam'),
    },
    docs: {
      heading: config.getString('docs.heading', DEFAULT_DOCS_HEADING),
      terminator: config.getString('docs.terminator', DEFAULT_DOCS_TERMINATOR),
      sourceLinkPrefix: config.getString('docs.source_link_prefix', './agents/'),
    },
    logging: {
      level: config.getString('logging.level', 'info'),
      format: config.getString('logging.format', 'json'),
    },
  };
}

export interface S3Credentials {
  endpoint: string;
  accessKeyId: string;
  secretAccessKey: string;
}

export interface RunEnvironment {
  commitSha: string;
  credentials: S3Credentials | null;
}

/** Read `GITHUB_SHA` and the `S3_*` triple; credentials need all three. */
export function readEnvironment(env: NodeJS.ProcessEnv = process.env): RunEnvironment {
  const endpoint = env['S3_ENDPOINT'];
  const accessKeyId = env['S3_ACCESS_KEY'];
  const secretAccessKey = env['S3_SECRET_KEY'];
  const credentials =
    endpoint !== undefined && accessKeyId !== undefined && secretAccessKey !== undefined
      ? { endpoint, accessKeyId, secretAccessKey }
      : null;
  return {
    commitSha: env['GITHUB_SHA'] ?? '',
    credentials,
  };
}
