/**
 * ObjectStore backed by an S3-compatible service.
 *
 * The SDK's own retries are turned off (maxAttempts: 1); the pipeline
 * executor owns retrying. SDK errors are rethrown as StageErrors carrying
 * the bucket and key, classified the same way the executor would.
 */

import {
  DeleteObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { StorageConfig } from '../config';
import { StageError, classifyFailure, failureMessage, failureStatusCode } from '../engine/failure';
import { logger } from '../logger';
import { ObjectHead, ObjectStore, PutObjectInput, PutObjectOutput } from '../stages/ports';

/** Bodies above this size go through a multipart upload. */
export const MULTIPART_THRESHOLD_BYTES = 5 * 1024 * 1024;

const log = logger.child({ module: 's3-object-store' });

/** Error names S3-compatible services use for a missing object. */
const NOT_FOUND_NAMES = new Set(['NotFound', 'NoSuchKey']);

export function createS3Client(config: StorageConfig): S3Client {
  return new S3Client({
    endpoint: config.endpoint,
    region: config.region,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
    forcePathStyle: true,
    maxAttempts: 1,
  });
}

/** True when an SDK error means the object does not exist. */
export function isNotFoundError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('name' in err && typeof err.name === 'string' && NOT_FOUND_NAMES.has(err.name)) return true;
  if ('Code' in err && typeof err.Code === 'string' && NOT_FOUND_NAMES.has(err.Code)) return true;
  return failureStatusCode(err) === 404;
}

/** Wrap an SDK error with the operation and object it concerns. */
export function toStorageError(err: unknown, operation: string, bucket: string, key: string): StageError {
  const name = typeof err === 'object' && err !== null && 'name' in err && typeof err.name === 'string' ? err.name : undefined;
  return new StageError(`${operation} s3://${bucket}/${key} failed: ${failureMessage(err)}`, classifyFailure(err), {
    statusCode: failureStatusCode(err),
    code: name,
    cause: err,
  });
}

export class S3ObjectStore implements ObjectStore {
  constructor(
    private client: S3Client,
    private multipartThresholdBytes: number = MULTIPART_THRESHOLD_BYTES,
  ) {}

  async putObject(input: PutObjectInput, signal: AbortSignal): Promise<PutObjectOutput> {
    const params = {
      Bucket: input.bucket,
      Key: input.key,
      Body: input.body,
      ContentType: input.contentType,
      Metadata: input.metadata,
    };

    try {
      if (input.body.length <= this.multipartThresholdBytes) {
        const output = await this.client.send(new PutObjectCommand(params), { abortSignal: signal });
        return { etag: output.ETag, multipart: false };
      }

      const upload = new Upload({ client: this.client, params, partSize: MULTIPART_THRESHOLD_BYTES, queueSize: 4 });
      const onAbort = () => {
        upload.abort().catch((err: unknown) => {
          log.warn('Multipart upload abort failed', { bucket: input.bucket, key: input.key, error: failureMessage(err) });
        });
      };
      signal.addEventListener('abort', onAbort, { once: true });
      try {
        const output = await upload.done();
        return { etag: 'ETag' in output ? output.ETag : undefined, multipart: true };
      } finally {
        signal.removeEventListener('abort', onAbort);
      }
    } catch (err) {
      throw toStorageError(err, 'PUT', input.bucket, input.key);
    }
  }

  async deleteObject(bucket: string, key: string, signal: AbortSignal): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }), { abortSignal: signal });
    } catch (err) {
      if (isNotFoundError(err)) {
        log.debug('Object already absent', { bucket, key });
        return;
      }
      throw toStorageError(err, 'DELETE', bucket, key);
    }
  }

  async headObject(bucket: string, key: string, signal: AbortSignal): Promise<ObjectHead | null> {
    try {
      const output = await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }), { abortSignal: signal });
      return {
        sizeBytes: output.ContentLength ?? 0,
        contentType: output.ContentType,
        etag: output.ETag,
        lastModified: output.LastModified?.toISOString(),
        metadata: { ...output.Metadata },
      };
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw toStorageError(err, 'HEAD', bucket, key);
    }
  }
}
