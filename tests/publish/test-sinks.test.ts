import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { LocalPublishError } from '../../src/errors.js';
import {
  S3ObjectStore,
  createS3Store,
  serializeRegistry,
  uploadRemote,
  writeLocal,
} from '../../src/publish/sinks.js';
import type { MergedRegistry } from '../../src/registry/types.js';
import { FakeObjectStore, createCapturingLogger, makeTempDir, removeDir } from '../helpers.js';

const REGISTRY: MergedRegistry = {
  last_updated: '2026-01-02T03:04:05.678Z',
  commit_sha: 'abc123',
  agents: {
    DemoAgent: { metadata: { name: 'Demo' }, module: 'demo_agent', tools: [] },
  },
};

const TARGET = { bucket: 'mesh', key: 'metadata.json', region: 'us-east-1' };

describe('serializeRegistry', () => {
  it('writes two-space indented JSON', () => {
    expect(serializeRegistry({ last_updated: 't', commit_sha: '', agents: {} })).toBe(
      '{\n  "last_updated": "t",\n  "commit_sha": "",\n  "agents": {}\n}',
    );
  });
});

describe('writeLocal', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTempDir();
  });

  afterEach(() => {
    removeDir(tmpDir);
  });

  it('writes the registry and reports the path', () => {
    const { logger, entries } = createCapturingLogger();
    const outputPath = join(tmpDir, 'metadata.json');
    expect(writeLocal(REGISTRY, outputPath, logger)).toEqual({ status: 'written', target: outputPath });
    expect(readFileSync(outputPath, 'utf-8')).toBe(JSON.stringify(REGISTRY, null, 2));
    expect(entries().map((e) => [e.level, e.message])).toEqual([
      ['info', `Wrote metadata to local file ${outputPath}`],
    ]);
  });

  it('throws LocalPublishError when the directory does not exist', () => {
    const { logger, entries } = createCapturingLogger();
    const outputPath = join(tmpDir, 'missing', 'metadata.json');
    expect(() => writeLocal(REGISTRY, outputPath, logger)).toThrow(LocalPublishError);
    expect(entries().map((e) => e.level)).toEqual(['error']);
    expect(entries()[0].message.startsWith('Failed to write metadata locally: ')).toBe(true);
  });
});

describe('uploadRemote', () => {
  it('skips without a store', async () => {
    const { logger, entries } = createCapturingLogger();
    expect(await uploadRemote(REGISTRY, TARGET, null, logger)).toEqual({
      status: 'skipped',
      reason: 'missing S3 credentials',
    });
    expect(entries().map((e) => [e.level, e.message])).toEqual([
      ['info', 'S3 credentials not found, skipping metadata upload'],
    ]);
  });

  it('puts the serialized registry as JSON', async () => {
    const store = new FakeObjectStore();
    expect(await uploadRemote(REGISTRY, TARGET, store)).toEqual({
      status: 'uploaded',
      target: 's3://mesh/metadata.json',
    });
    expect(store.puts).toEqual([
      {
        Bucket: 'mesh',
        Key: 'metadata.json',
        Body: JSON.stringify(REGISTRY, null, 2),
        ContentType: 'application/json',
      },
    ]);
  });

  it('reports a failed upload without throwing', async () => {
    const { logger, entries } = createCapturingLogger();
    const store = new FakeObjectStore('access denied');
    expect(await uploadRemote(REGISTRY, TARGET, store, logger)).toEqual({
      status: 'failed',
      target: 's3://mesh/metadata.json',
      reason: 'access denied',
    });
    expect(entries().map((e) => [e.level, e.message])).toEqual([
      ['warn', 'Failed to upload metadata to S3: access denied'],
    ]);
  });
});

describe('createS3Store', () => {
  it('wraps an S3 client', () => {
    const store = createS3Store(
      { endpoint: 'http://localhost:9000', accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
      'us-east-1',
    );
    expect(store).toBeInstanceOf(S3ObjectStore);
  });
});
