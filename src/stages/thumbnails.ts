/**
 * Thumbnail stage: renders an image at several sizes and publishes each one.
 *
 * Every thumbnail is written under `<outputDir>/thumbnails` and uploaded
 * under the `thumbnails/` key prefix. The files and objects together form
 * the stage's single committed effect; compensation removes all of them.
 * When a write or upload fails part way, the thumbnails already published
 * are removed before the error propagates, so a retry starts clean.
 *
 * An image the optimizer cannot decode gets no thumbnails and the run goes
 * on; the `thumbnails` attribute then reads "skipped".
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, posix } from 'path';
import { ImageFormat } from '../config';
import { Stage } from '../domain/pipeline';
import { PermanentStageError } from '../engine/failure';
import { Logger, describeError } from '../logger';
import { loadContent, parseKeyList, resolveWithin, withPublishedKeys } from './content';
import { FORMAT_CONTENT_TYPE, FORMAT_EXTENSION } from './optimize';
import { ImageOptimizer, ObjectStore, OptimizedImage } from './ports';

export interface ThumbnailSize {
  /** Becomes the file name suffix: cat_small.webp */
  name: string;
  width: number;
  height: number;
}

export const DEFAULT_THUMBNAIL_SIZES: ThumbnailSize[] = [
  { name: 'large', width: 1920, height: 1080 },
  { name: 'medium', width: 1280, height: 720 },
  { name: 'small', width: 640, height: 360 },
];

/** Artifact attribute: generated, skipped or disabled. Set it to "disabled" up front to opt out. */
export const THUMBNAILS_ATTRIBUTE = 'thumbnails';

const THUMBNAIL_SOURCE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.webp']);

export interface ThumbnailStageOptions {
  optimizer: ImageOptimizer;
  store: ObjectStore;
  bucket: string;
  outputDir: string;
  format: ImageFormat;
  quality: number;
  /** Default: DEFAULT_THUMBNAIL_SIZES */
  sizes?: ThumbnailSize[];
  /** Default: "thumbnails/" */
  keyPrefix?: string;
  name?: string;
}

interface Rendition {
  key: string;
  path: string;
}

export function createThumbnailStage(options: ThumbnailStageOptions): Stage {
  const sizes = options.sizes ?? DEFAULT_THUMBNAIL_SIZES;
  const keyPrefix = options.keyPrefix ?? 'thumbnails/';

  async function unpublish(bucket: string, renditions: Rendition[], signal: AbortSignal): Promise<void> {
    for (const rendition of [...renditions].reverse()) {
      await options.store.deleteObject(bucket, rendition.key, signal);
      await rm(rendition.path, { force: true });
    }
  }

  async function render(content: Buffer, size: ThumbnailSize, key: string, log: Logger): Promise<OptimizedImage | null> {
    try {
      return await options.optimizer.resize(content, {
        width: size.width,
        height: size.height,
        format: options.format,
        quality: options.quality,
      });
    } catch (err) {
      log.warn('Thumbnail could not be rendered, skipping thumbnails', { key, size: size.name, ...describeError(err) });
      return null;
    }
  }

  return {
    name: options.name ?? 'thumbnails',
    idempotent: false,

    async execute(artifact, context) {
      const content = await loadContent(artifact);
      const extension = posix.extname(artifact.key);
      if (!THUMBNAIL_SOURCE_EXTENSIONS.has(extension.toLowerCase()) || sizes.length === 0) {
        context.logger.debug('No thumbnails for this file', { key: artifact.key });
        return { artifact: { ...artifact, content } };
      }
      if (artifact.attributes[THUMBNAILS_ATTRIBUTE] === 'disabled') {
        context.logger.debug('Thumbnails disabled, passing through', { key: artifact.key });
        return { artifact: { ...artifact, content } };
      }

      const base = posix.join(posix.dirname(artifact.key), posix.basename(artifact.key, extension));
      const published: Rendition[] = [];

      try {
        for (const size of sizes) {
          const image = await render(content, size, artifact.key, context.logger);
          if (!image) {
            await unpublish(options.bucket, published, context.signal);
            return {
              artifact: { ...artifact, content, attributes: { ...artifact.attributes, [THUMBNAILS_ATTRIBUTE]: 'skipped' } },
            };
          }

          const fileName = `${base}_${size.name}${FORMAT_EXTENSION[image.format]}`;
          const path = resolveWithin(options.outputDir, posix.join('thumbnails', fileName));
          const key = `${keyPrefix}${fileName}`;

          await mkdir(dirname(path), { recursive: true });
          await writeFile(path, image.data);
          published.push({ key, path });
          await options.store.putObject(
            {
              bucket: options.bucket,
              key,
              body: image.data,
              contentType: FORMAT_CONTENT_TYPE[image.format],
              metadata: { 'artifact-id': artifact.id, 'thumbnail-size': size.name },
            },
            context.signal,
          );
          context.logger.debug('Thumbnail published', { key, width: image.width, height: image.height });
        }
      } catch (err) {
        await unpublish(options.bucket, published, context.signal).catch((cleanupErr: unknown) => {
          context.logger.warn('Partial thumbnails could not be removed', {
            keys: published.map((r) => r.key),
            ...describeError(cleanupErr),
          });
        });
        throw err;
      }

      const keys = published.map((r) => r.key);
      context.logger.info('Thumbnails published', { key: artifact.key, count: keys.length });

      return {
        artifact: {
          ...artifact,
          content,
          attributes: {
            ...withPublishedKeys(artifact, keys),
            [THUMBNAILS_ATTRIBUTE]: 'generated',
            thumbnailKeys: keys.join(','),
          },
        },
        effect: {
          kind: 'thumbnails.published',
          description: `Published ${keys.length} thumbnails of ${artifact.key}`,
          resource: {
            bucket: options.bucket,
            keys: JSON.stringify(keys),
            paths: JSON.stringify(published.map((r) => r.path)),
          },
        },
      };
    },

    async compensate(effect, context) {
      const bucket = effect.resource.bucket;
      if (typeof bucket !== 'string') {
        throw new PermanentStageError(`Effect ${effect.id} does not name a bucket`);
      }
      const keys = parseKeyList(effect.resource.keys, `Keys of effect ${effect.id}`);
      const paths = parseKeyList(effect.resource.paths, `Paths of effect ${effect.id}`);
      if (keys.length !== paths.length) {
        throw new PermanentStageError(`Effect ${effect.id} lists ${keys.length} keys but ${paths.length} paths`);
      }
      await unpublish(
        bucket,
        keys.map((key, i) => ({ key, path: paths[i] })),
        context.signal,
      );
      context.logger.info('Thumbnails removed', { bucket, count: keys.length });
    },
  };
}

