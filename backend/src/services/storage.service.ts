import fs from 'fs/promises';
import path from 'path';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { Logger } from 'pino';
import type { GeneratorConfig, ObjectStore, StoredObject } from '../types/generation.js';
import { StorageError, errorMessage } from '../utils/errors.js';

export const HTML_CONTENT_TYPE = 'text/html';
export const PUBLIC_DAY_CACHE = 'public, max-age=86400';

// The part of S3Client this store calls
export interface PutObjectSender {
  send(command: PutObjectCommand, options?: { abortSignal?: AbortSignal }): Promise<unknown>;
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: PutObjectSender;
  private readonly bucket: string;
  private readonly timeoutMs: number;

  constructor(bucket: string, client: PutObjectSender, timeoutMs: number) {
    this.bucket = bucket;
    this.client = client;
    this.timeoutMs = timeoutMs;
  }

  /** Aborts the PutObject request once `timeoutMs` has passed. */
  async put({ key, body, contentType, cacheControl }: StoredObject): Promise<void> {
    const abortSignal = AbortSignal.timeout(this.timeoutMs);
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: Buffer.from(body, 'utf-8'),
          ContentType: contentType,
          CacheControl: cacheControl,
        }),
        { abortSignal }
      );
    } catch (error) {
      if (abortSignal.aborted) {
        throw new StorageError(`Write to s3://${this.bucket}/${key} aborted after ${this.timeoutMs}ms`);
      }
      throw new StorageError(`Failed to write s3://${this.bucket}/${key}: ${errorMessage(error)}`);
    }
  }
}

/**
 * Writes objects below a directory on disk, for local development.
 * Only the body is kept: content type and cache headers apply to S3 alone.
 */
export class LocalObjectStore implements ObjectStore {
  private readonly rootDir: string;
  private readonly logger: Logger | null;

  constructor(rootDir: string, logger?: Logger) {
    this.rootDir = path.resolve(rootDir);
    this.logger = logger ?? null;
  }

  resolveKey(key: string): string {
    const target = path.resolve(this.rootDir, key);
    if (!target.startsWith(this.rootDir + path.sep)) {
      throw new StorageError(`Object key escapes the output directory: ${key}`);
    }
    return target;
  }

  async put({ key, body, contentType }: StoredObject): Promise<void> {
    const target = this.resolveKey(key);
    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, body, 'utf-8');
    } catch (error) {
      throw new StorageError(`Failed to write ${target}: ${errorMessage(error)}`);
    }
    this.logger?.debug({ key, contentType, target }, '💾 Stored object on disk');
  }
}

export function createObjectStore(config: GeneratorConfig, logger?: Logger): ObjectStore {
  if (config.storageDriver === 'local') {
    return new LocalObjectStore(config.localOutputDir, logger);
  }
  return new S3ObjectStore(config.bucket, new S3Client({ region: config.region }), config.storageTimeoutMs);
}
