/**
 * Capability ports the concrete stages depend on.
 *
 * Each port is the narrow slice of a vendor SDK a stage needs. The adapters
 * under src/adapters implement them with the real SDKs; tests supply
 * in-process fakes.
 */

import { ImageFormat } from '../config';

// --- Object storage ---

export interface PutObjectInput {
  bucket: string;
  key: string;
  body: Buffer;
  contentType: string;
  metadata?: Record<string, string>;
}

export interface PutObjectOutput {
  etag?: string;
  /** Set when the upload went through the multipart path. */
  multipart: boolean;
}

export interface ObjectHead {
  sizeBytes: number;
  contentType?: string;
  etag?: string;
  lastModified?: string;
  metadata: Record<string, string>;
}

export interface ObjectStore {
  putObject(input: PutObjectInput, signal: AbortSignal): Promise<PutObjectOutput>;
  /** Succeeds when the object does not exist. */
  deleteObject(bucket: string, key: string, signal: AbortSignal): Promise<void>;
  /** Null when the object does not exist. */
  headObject(bucket: string, key: string, signal: AbortSignal): Promise<ObjectHead | null>;
}

// --- CDN ---

export type PurgeState = 'in_progress' | 'completed' | 'failed';

export interface PurgeRequest {
  purgeId: string;
  state: PurgeState;
}

export interface EdgeResponse {
  statusCode: number;
  /** X-Cache header value: HIT, MISS, BYPASS, or UNKNOWN when absent. */
  cacheStatus: string;
  ageSeconds: number;
}

export interface CdnClient {
  purge(paths: string[], signal: AbortSignal): Promise<PurgeRequest>;
  purgeStatus(purgeId: string, signal: AbortSignal): Promise<PurgeRequest>;
  /** GET a public URL through the CDN edge. */
  fetchEdge(url: string, signal: AbortSignal): Promise<EdgeResponse>;
}

// --- Image optimization ---

export interface OptimizeOptions {
  format: ImageFormat;
  quality: number;
  /** Longest side after resizing; no resize when omitted. */
  maxDimension?: number;
}

export interface OptimizedImage {
  data: Buffer;
  format: ImageFormat;
  width: number;
  height: number;
}

export interface ResizeOptions {
  /** Bounding box; the image keeps its aspect ratio inside it and is never enlarged. */
  width: number;
  height: number;
  format: ImageFormat;
  quality: number;
}

export interface ImageOptimizer {
  optimize(input: Buffer, options: OptimizeOptions): Promise<OptimizedImage>;
  /** Scale the image to fit a box; used for thumbnails. */
  resize(input: Buffer, options: ResizeOptions): Promise<OptimizedImage>;
}
