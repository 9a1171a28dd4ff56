/**
 * Optimize stage: re-encodes images before upload.
 *
 * The optimized image is written next to the configured output directory so
 * it can be inspected or reused; that file is the stage's committed effect
 * and compensation deletes it. Files that are not JPEG/PNG images pass
 * through unchanged and commit nothing, and so does an image the optimizer
 * cannot decode: the original is uploaded instead and the artifact's
 * `optimization` attribute says "skipped".
 *
 * Optimization can be switched off for every run (`enabled: false`) or for
 * one artifact by creating it with `optimization: 'disabled'`.
 */

import { mkdir, rm, writeFile } from 'fs/promises';
import { dirname, posix } from 'path';
import { ImageFormat } from '../config';
import { Stage } from '../domain/pipeline';
import { PermanentStageError, failureMessage } from '../engine/failure';
import { describeError } from '../logger';
import { loadContent, resolveWithin } from './content';
import { ImageOptimizer, OptimizedImage } from './ports';

const OPTIMIZABLE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png']);

/** Artifact attribute recording what happened to an image: optimized, skipped or disabled. */
export const OPTIMIZATION_ATTRIBUTE = 'optimization';

export const FORMAT_EXTENSION: Record<ImageFormat, string> = {
  webp: '.webp',
  jpeg: '.jpg',
  png: '.png',
};

export const FORMAT_CONTENT_TYPE: Record<ImageFormat, string> = {
  webp: 'image/webp',
  jpeg: 'image/jpeg',
  png: 'image/png',
};

export interface OptimizeStageOptions {
  optimizer: ImageOptimizer;
  /** Directory optimized files are written under, mirroring the object key. */
  outputDir: string;
  format: ImageFormat;
  quality: number;
  maxDimension?: number;
  /** Default: true */
  enabled?: boolean;
  name?: string;
}

/** Percentage saved, rounded to two decimals. */
export function reductionPercent(originalSize: number, optimizedSize: number): number {
  if (originalSize === 0) return 0;
  return Math.round(((originalSize - optimizedSize) / originalSize) * 10_000) / 100;
}

export function createOptimizeStage(options: OptimizeStageOptions): Stage {
  return {
    name: options.name ?? 'optimize',
    idempotent: false,

    async execute(artifact, context) {
      const content = await loadContent(artifact);
      const extension = posix.extname(artifact.key);
      if (!OPTIMIZABLE_EXTENSIONS.has(extension.toLowerCase())) {
        context.logger.debug('Not an optimizable image, passing through', { key: artifact.key });
        return { artifact: { ...artifact, content } };
      }

      if (options.enabled === false || artifact.attributes[OPTIMIZATION_ATTRIBUTE] === 'disabled') {
        context.logger.debug('Optimization disabled, passing through', { key: artifact.key });
        return {
          artifact: { ...artifact, content, attributes: { ...artifact.attributes, [OPTIMIZATION_ATTRIBUTE]: 'disabled' } },
        };
      }

      const stem = posix.basename(artifact.key, extension);
      const keyDir = posix.dirname(artifact.key);
      const targetExtension = FORMAT_EXTENSION[options.format];
      const outputPath = resolveWithin(options.outputDir, posix.join(keyDir, `${stem}_optimized${targetExtension}`));

      let optimized: OptimizedImage;
      try {
        optimized = await options.optimizer.optimize(content, {
          format: options.format,
          quality: options.quality,
          maxDimension: options.maxDimension,
        });
      } catch (err) {
        context.logger.warn('Image could not be optimized, uploading the original', { key: artifact.key, ...describeError(err) });
        return {
          artifact: {
            ...artifact,
            content,
            attributes: {
              ...artifact.attributes,
              [OPTIMIZATION_ATTRIBUTE]: 'skipped',
              optimizationError: failureMessage(err),
            },
          },
        };
      }

      await mkdir(dirname(outputPath), { recursive: true });
      await writeFile(outputPath, optimized.data);

      const newKey = keyDir === '.' ? `${stem}${targetExtension}` : `${keyDir}/${stem}${targetExtension}`;
      const saved = reductionPercent(content.length, optimized.data.length);
      context.logger.info('Image optimized', { key: newKey, originalSize: content.length, optimizedSize: optimized.data.length, reductionPercent: saved });

      return {
        artifact: {
          ...artifact,
          key: newKey,
          content: optimized.data,
          contentType: FORMAT_CONTENT_TYPE[optimized.format],
          attributes: {
            ...artifact.attributes,
            [OPTIMIZATION_ATTRIBUTE]: 'optimized',
            optimizedPath: outputPath,
            originalSize: String(content.length),
            optimizedSize: String(optimized.data.length),
            reductionPercent: String(saved),
            dimensions: `${optimized.width}x${optimized.height}`,
          },
        },
        effect: {
          kind: 'file.written',
          description: `Wrote optimized image ${outputPath}`,
          resource: { path: outputPath },
        },
      };
    },

    async compensate(effect) {
      const path = effect.resource.path;
      if (typeof path !== 'string') {
        throw new PermanentStageError(`Effect ${effect.id} does not name a file path`);
      }
      // force: a file that is already gone counts as compensated
      await rm(path, { force: true });
    },
  };
}
