export { mapBounded } from './concurrency';
export { MediaPipeline, buildMediaLibraryStages, buildMediaStages, listFiles } from './media-pipeline';
export type {
  DeploySiteOptions,
  MediaLibraryOptions,
  MediaLibraryRunOptions,
  MediaPipelineConfig,
  MediaStageDependencies,
  ProcessFileOptions,
  SiteDeploymentReport,
} from './media-pipeline';
