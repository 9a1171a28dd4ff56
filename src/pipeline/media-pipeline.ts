/**
 * Media pipeline: optimize, upload, distribute and verify files.
 *
 * processFile() runs the four stages for one file through the executor.
 * deploySite() walks a directory and runs one independent pipeline per
 * file, a bounded number at a time; a failed file rolls back on its own
 * and never affects the others. processMediaLibrary() publishes one image
 * as an original, a set of thumbnails and an optimized copy, and rolls all
 * of them back together.
 */

import { readdir } from 'fs/promises';
import { basename, join, relative } from 'path';
import { AppConfig, ConfigError } from '../config';
import { createArtifact, toObjectKey } from '../domain/artifact';
import { configError } from '../domain/errors';
import { PipelineResult, PipelineStatus, Stage } from '../domain/pipeline';
import { PipelineExecutor } from '../engine/executor';
import { HttpCdnClient } from '../adapters/http-cdn-client';
import { S3ObjectStore, createS3Client } from '../adapters/s3-object-store';
import { SharpImageOptimizer } from '../adapters/sharp-optimizer';
import { logger } from '../logger';
import { createDistributeStage } from '../stages/distribute';
import { OPTIMIZATION_ATTRIBUTE, createOptimizeStage } from '../stages/optimize';
import { CdnClient, ImageOptimizer, ObjectStore } from '../stages/ports';
import { THUMBNAILS_ATTRIBUTE, ThumbnailSize, createThumbnailStage } from '../stages/thumbnails';
import { createUploadStage } from '../stages/upload';
import { createVerifyStage } from '../stages/verify';
import { mapBounded } from './concurrency';

/** Capability overrides; anything omitted is built from the configuration. */
export interface MediaStageDependencies {
  store?: ObjectStore;
  cdn?: CdnClient;
  optimizer?: ImageOptimizer;
}

export type MediaPipelineConfig = Pick<AppConfig, 'optimizer' | 'storage' | 'cdn'>;

interface Adapters {
  store: ObjectStore;
  cdn: CdnClient;
  optimizer: ImageOptimizer;
  bucket: string;
  publicUrl: string;
  cdnDomain: string;
  waitForPurge: boolean;
}

function resolveAdapters(config: MediaPipelineConfig, deps: MediaStageDependencies): Adapters {
  const { storage, cdn: cdnConfig } = config;
  const missing: string[] = [];
  if (!storage) missing.push('storage: set STORAGE_ENDPOINT, STORAGE_BUCKET, STORAGE_ACCESS_KEY and STORAGE_SECRET_KEY');
  if (!cdnConfig) missing.push('cdn: set CDN_API_ENDPOINT, CDN_SERVICE_ID and CDN_DOMAIN');
  if (!storage || !cdnConfig) {
    throw new ConfigError(configError('The media pipeline needs storage and CDN configuration', missing));
  }

  return {
    store: deps.store ?? new S3ObjectStore(createS3Client(storage)),
    cdn: deps.cdn ?? new HttpCdnClient(cdnConfig),
    optimizer: deps.optimizer ?? new SharpImageOptimizer(),
    bucket: storage.bucket,
    publicUrl: storage.publicUrl ?? `${storage.endpoint.replace(/\/+$/, '')}/${storage.bucket}`,
    cdnDomain: cdnConfig.domain,
    waitForPurge: cdnConfig.waitForPurge,
  };
}

/** The optimize, upload, distribute and verify stages wired to their adapters. */
export function buildMediaStages(config: MediaPipelineConfig, deps: MediaStageDependencies = {}): Stage[] {
  const a = resolveAdapters(config, deps);
  return [
    createOptimizeStage({
      optimizer: a.optimizer,
      outputDir: config.optimizer.outputDir,
      format: config.optimizer.format,
      quality: config.optimizer.quality,
      maxDimension: config.optimizer.maxDimension,
      enabled: config.optimizer.optimizeImages,
    }),
    createUploadStage({ store: a.store, bucket: a.bucket, publicUrl: a.publicUrl }),
    createDistributeStage({ cdn: a.cdn, cdnDomain: a.cdnDomain, waitForCompletion: a.waitForPurge }),
    createVerifyStage({ store: a.store, bucket: a.bucket, cdn: a.cdn }),
  ];
}

export interface MediaLibraryOptions {
  /** Default: large 1920x1080, medium 1280x720, small 640x360 */
  thumbnailSizes?: ThumbnailSize[];
}

/**
 * Stages for publishing one image to the media library: the original under
 * originals/, thumbnails under thumbnails/, the optimized copy under
 * optimized/, then one purge of every published path and verification of
 * the optimized copy.
 */
export function buildMediaLibraryStages(
  config: MediaPipelineConfig,
  deps: MediaStageDependencies = {},
  options: MediaLibraryOptions = {},
): Stage[] {
  const a = resolveAdapters(config, deps);
  const { outputDir, format, quality, maxDimension } = config.optimizer;
  return [
    createUploadStage({ store: a.store, bucket: a.bucket, publicUrl: a.publicUrl, keyPrefix: 'originals/', name: 'upload-original' }),
    createThumbnailStage({
      optimizer: a.optimizer,
      store: a.store,
      bucket: a.bucket,
      outputDir,
      format,
      quality,
      sizes: options.thumbnailSizes,
    }),
    createOptimizeStage({ optimizer: a.optimizer, outputDir, format, quality, maxDimension }),
    createUploadStage({ store: a.store, bucket: a.bucket, publicUrl: a.publicUrl, keyPrefix: 'optimized/' }),
    createDistributeStage({ cdn: a.cdn, cdnDomain: a.cdnDomain, waitForCompletion: a.waitForPurge }),
    createVerifyStage({ store: a.store, bucket: a.bucket, cdn: a.cdn }),
  ];
}

export interface ProcessFileOptions {
  /** Object key; defaults to the source path with forward slashes. */
  key?: string;
  runId?: string;
  signal?: AbortSignal;
  /** False uploads images as they are. Default: true */
  optimizeImages?: boolean;
}

export interface DeploySiteOptions {
  signal?: AbortSignal;
  /** False uploads images as they are. Default: true */
  optimizeImages?: boolean;
}

export interface MediaLibraryRunOptions {
  /** Object key below each prefix; defaults to the file name. */
  key?: string;
  runId?: string;
  signal?: AbortSignal;
  /** Default: true */
  generateThumbnails?: boolean;
}

/** Aggregate outcome of deploying a directory. */
export interface SiteDeploymentReport {
  sourceDir: string;
  totalFiles: number;
  succeeded: number;
  rolledBack: number;
  partial: number;
  /** One result per file, in directory walk order. */
  results: PipelineResult[];
  durationMs: number;
}

export class MediaPipeline {
  private log = logger.child({ module: 'media-pipeline' });

  constructor(
    private executor: PipelineExecutor,
    private stages: Stage[],
    private concurrency: number = 4,
    /** From buildMediaLibraryStages(); processMediaLibrary() needs them. */
    private libraryStages?: Stage[],
  ) {}

  get supportsMediaLibrary(): boolean {
    return this.libraryStages !== undefined;
  }

  /** Run every stage for one file. */
  processFile(sourcePath: string, options: ProcessFileOptions = {}): Promise<PipelineResult> {
    const artifact = createArtifact({
      sourcePath,
      key: options.key,
      attributes: options.optimizeImages === false ? { [OPTIMIZATION_ATTRIBUTE]: 'disabled' } : undefined,
    });
    return this.executor.run(artifact, this.stages, { runId: options.runId, signal: options.signal });
  }

  /** Publish one image as original, thumbnails and optimized copy in a single run. */
  processMediaLibrary(imagePath: string, options: MediaLibraryRunOptions = {}): Promise<PipelineResult> {
    if (!this.libraryStages) {
      return Promise.reject(
        new ConfigError(configError('The media library pipeline is not configured', ['build it with buildMediaLibraryStages()'])),
      );
    }
    const artifact = createArtifact({
      sourcePath: imagePath,
      key: options.key ?? basename(imagePath),
      attributes: options.generateThumbnails === false ? { [THUMBNAILS_ATTRIBUTE]: 'disabled' } : undefined,
    });
    this.log.info('Media library run started', { imagePath, key: artifact.key });
    return this.executor.run(artifact, this.libraryStages, { runId: options.runId, signal: options.signal });
  }

  /** Run one pipeline per file under `sourceDir`; dotfiles and dot-directories are skipped. */
  async deploySite(sourceDir: string, options: DeploySiteOptions = {}): Promise<SiteDeploymentReport> {
    const start = Date.now();
    const files = await listFiles(sourceDir);
    this.log.info('Site deployment started', {
      sourceDir,
      totalFiles: files.length,
      concurrency: this.concurrency,
      optimizeImages: options.optimizeImages !== false,
    });

    const results = await mapBounded(files, this.concurrency, (file) =>
      this.processFile(file, {
        key: toObjectKey(relative(sourceDir, file)),
        signal: options.signal,
        optimizeImages: options.optimizeImages,
      }),
    );

    const report: SiteDeploymentReport = {
      sourceDir,
      totalFiles: files.length,
      succeeded: results.filter((r) => r.status === PipelineStatus.Succeeded).length,
      rolledBack: results.filter((r) => r.status === PipelineStatus.RolledBack).length,
      partial: results.filter((r) => r.status === PipelineStatus.Partial).length,
      results,
      durationMs: Date.now() - start,
    };
    this.log.info('Site deployment finished', {
      sourceDir,
      totalFiles: report.totalFiles,
      succeeded: report.succeeded,
      rolledBack: report.rolledBack,
      partial: report.partial,
      durationMs: report.durationMs,
    });
    return report;
  }
}

/** Regular files under `dir`, depth first, sorted by name at each level. */
export async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const files: string[] = [];
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue;
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path)));
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
  return files;
}
