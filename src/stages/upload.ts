/**
 * Upload stage: puts the artifact into object storage.
 *
 * Uploading the same key twice leaves the same object behind, so the stage
 * is idempotent; it still commits an effect so a later failure deletes the
 * object again.
 */

import { Stage } from '../domain/pipeline';
import { PermanentStageError } from '../engine/failure';
import { guessContentType, loadContent, withPublishedKeys } from './content';
import { ObjectStore } from './ports';

export interface UploadStageOptions {
  store: ObjectStore;
  bucket: string;
  /** Base URL objects are publicly reachable under, without trailing slash. */
  publicUrl: string;
  /** Prepended to every object key, e.g. "static/". */
  keyPrefix?: string;
  /** Metadata attached to every uploaded object. */
  metadata?: Record<string, string>;
  name?: string;
}

export function createUploadStage(options: UploadStageOptions): Stage {
  const publicUrl = options.publicUrl.replace(/\/+$/, '');

  return {
    name: options.name ?? 'upload',
    idempotent: true,

    async execute(artifact, context) {
      const body = await loadContent(artifact);
      const key = `${options.keyPrefix ?? ''}${artifact.key}`;
      const contentType = artifact.contentType ?? guessContentType(artifact.key);

      const output = await options.store.putObject(
        {
          bucket: options.bucket,
          key,
          body,
          contentType,
          metadata: { ...options.metadata, 'artifact-id': artifact.id },
        },
        context.signal,
      );

      const storageUrl = `${publicUrl}/${key}`;
      context.logger.info('Object uploaded', { bucket: options.bucket, key, sizeBytes: body.length, multipart: output.multipart });

      return {
        artifact: {
          ...artifact,
          content: body,
          contentType,
          attributes: {
            ...withPublishedKeys(artifact, [key]),
            storageKey: key,
            storageUrl,
            ...(output.etag ? { etag: output.etag } : {}),
          },
        },
        effect: {
          kind: 'object.uploaded',
          description: `Uploaded s3://${options.bucket}/${key}`,
          resource: { bucket: options.bucket, key, sizeBytes: body.length },
        },
      };
    },

    async compensate(effect, context) {
      const { bucket, key } = effect.resource;
      if (typeof bucket !== 'string' || typeof key !== 'string') {
        throw new PermanentStageError(`Effect ${effect.id} does not name an object`);
      }
      await options.store.deleteObject(bucket, key, context.signal);
      context.logger.info('Object deleted', { bucket, key });
    },
  };
}
