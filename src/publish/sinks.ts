/**
 * Registry sinks: a local JSON file in dev mode, S3-compatible storage otherwise.
 */

import { writeFileSync } from 'node:fs';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { S3Credentials } from '../config.js';
import { LocalPublishError } from '../errors.js';
import type { ContextLogger } from '../observability/context-logger.js';
import { silentLogger } from '../observability/context-logger.js';
import type { MergedRegistry } from '../registry/types.js';

export type PublishOutcome =
  | { status: 'written'; target: string }
  | { status: 'uploaded'; target: string }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; target: string; reason: string };

export interface PutObjectInput {
  Bucket: string;
  Key: string;
  Body: string;
  ContentType: string;
}

/** The one storage call the publisher makes. */
export interface ObjectStore {
  putObject(input: PutObjectInput): Promise<void>;
}

export interface RemoteTarget {
  bucket: string;
  key: string;
  region: string;
}

export class S3ObjectStore implements ObjectStore {
  private _client: S3Client;

  constructor(client: S3Client) {
    this._client = client;
  }

  async putObject(input: PutObjectInput): Promise<void> {
    await this._client.send(new PutObjectCommand(input));
  }
}

export function createS3Store(credentials: S3Credentials, region: string): ObjectStore {
  const client = new S3Client({
    region,
    endpoint: credentials.endpoint,
    credentials: {
      accessKeyId: credentials.accessKeyId,
      secretAccessKey: credentials.secretAccessKey,
    },
    forcePathStyle: true,
  });
  return new S3ObjectStore(client);
}

export function serializeRegistry(registry: MergedRegistry): string {
  return JSON.stringify(registry, null, 2);
}

/**
 * @throws LocalPublishError when the file cannot be written
 */
export function writeLocal(
  registry: MergedRegistry,
  outputPath: string,
  logger: ContextLogger = silentLogger,
): PublishOutcome {
  try {
    writeFileSync(outputPath, serializeRegistry(registry), 'utf-8');
  } catch (e) {
    logger.error(`Failed to write metadata locally: ${e instanceof Error ? e.message : String(e)}`);
    throw new LocalPublishError(outputPath, { cause: e instanceof Error ? e : undefined });
  }
  logger.info(`Wrote metadata to local file ${outputPath}`);
  return { status: 'written', target: outputPath };
}

/**
 * Upload the registry. Missing credentials skip the upload and a failed
 * upload is reported, so neither stops the run.
 */
export async function uploadRemote(
  registry: MergedRegistry,
  target: RemoteTarget,
  store: ObjectStore | null,
  logger: ContextLogger = silentLogger,
): Promise<PublishOutcome> {
  if (store === null) {
    logger.info('S3 credentials not found, skipping metadata upload');
    return { status: 'skipped', reason: 'missing S3 credentials' };
  }

  const location = `s3://${target.bucket}/${target.key}`;
  try {
    await store.putObject({
      Bucket: target.bucket,
      Key: target.key,
      Body: serializeRegistry(registry),
      ContentType: 'application/json',
    });
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    logger.warn(`Failed to upload metadata to S3: ${reason}`);
    return { status: 'failed', target: location, reason };
  }
  logger.info(`Uploaded metadata to ${location}`);
  return { status: 'uploaded', target: location };
}
