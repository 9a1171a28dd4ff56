export * from './ports';
export { guessContentType, loadContent, publishedKeys, resolveWithin, PUBLISHED_KEYS_ATTRIBUTE } from './content';
export { createOptimizeStage, reductionPercent, OPTIMIZATION_ATTRIBUTE } from './optimize';
export type { OptimizeStageOptions } from './optimize';
export { createThumbnailStage, DEFAULT_THUMBNAIL_SIZES, THUMBNAILS_ATTRIBUTE } from './thumbnails';
export type { ThumbnailSize, ThumbnailStageOptions } from './thumbnails';
export { createUploadStage } from './upload';
export type { UploadStageOptions } from './upload';
export {
  createDistributeStage,
  DEFAULT_PURGE_POLL_BUDGET_MS,
  DEFAULT_PURGE_POLL_INTERVAL_MS,
} from './distribute';
export type { DistributeStageOptions } from './distribute';
export { createVerifyStage } from './verify';
export type { VerifyStageOptions } from './verify';
