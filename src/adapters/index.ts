export { HttpCdnClient } from './http-cdn-client';
export type { FetchLike, HttpCdnClientOptions } from './http-cdn-client';
export {
  MULTIPART_THRESHOLD_BYTES,
  S3ObjectStore,
  createS3Client,
  isNotFoundError,
  toStorageError,
} from './s3-object-store';
export { SharpImageOptimizer } from './sharp-optimizer';
