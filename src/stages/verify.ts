/**
 * Verify stage: confirms the object is stored and served by the CDN.
 *
 * Read-only; it commits no effect.
 */

import { Stage } from '../domain/pipeline';
import { PermanentStageError, StageError, classifyHttpStatus } from '../engine/failure';
import { CdnClient, ObjectStore } from './ports';

export interface VerifyStageOptions {
  store: ObjectStore;
  bucket: string;
  /** Skips the CDN check when omitted. */
  cdn?: CdnClient;
  name?: string;
}

export function createVerifyStage(options: VerifyStageOptions): Stage {
  return {
    name: options.name ?? 'verify',
    idempotent: true,

    async execute(artifact, context) {
      const key = artifact.attributes.storageKey;
      if (!key) {
        throw new PermanentStageError(`Artifact ${artifact.id} has not been uploaded; nothing to verify`);
      }

      const head = await options.store.headObject(options.bucket, key, context.signal);
      if (!head) {
        throw new PermanentStageError(`Object s3://${options.bucket}/${key} does not exist`, {
          statusCode: 404,
          code: 'NotFound',
        });
      }
      if (artifact.content && head.sizeBytes !== artifact.content.length) {
        throw new PermanentStageError(
          `Object s3://${options.bucket}/${key} has ${head.sizeBytes} bytes, expected ${artifact.content.length}`,
        );
      }

      const attributes: Record<string, string> = { ...artifact.attributes, verified: 'true' };
      const cdnUrl = artifact.attributes.cdnUrl;
      if (options.cdn && cdnUrl) {
        const edge = await options.cdn.fetchEdge(cdnUrl, context.signal);
        if (edge.statusCode !== 200) {
          throw new StageError(`CDN returned ${edge.statusCode} for ${cdnUrl}`, classifyHttpStatus(edge.statusCode), {
            statusCode: edge.statusCode,
          });
        }
        attributes.cdnCacheStatus = edge.cacheStatus;
      }

      context.logger.info('Artifact verified', { key, sizeBytes: head.sizeBytes, cdnCacheStatus: attributes.cdnCacheStatus });
      return { artifact: { ...artifact, attributes } };
    },
  };
}
