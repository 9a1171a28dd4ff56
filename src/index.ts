/**
 * media-pipeline: optimize, upload, distribute and verify media files with
 * per-stage retries and compensating rollback.
 *
 * The executor and its domain model are the library; the stage adapters,
 * MediaPipeline and the Express app are ready-made assemblies on top of it.
 * Run src/main.ts to start the HTTP service.
 */

export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export { loadConfig, ConfigError } from './config';
export type { AppConfig, CdnConfig, Env, ImageFormat, OptimizerConfig, StorageConfig } from './config';
export {
  createLogger,
  logger,
  LogLevel,
  parseLogLevel,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
} from './logger';
export type { LogEntry, LogHandler, Logger } from './logger';
export * from './domain';
export * from './engine';
export * from './storage';
export { PipelineEventPublisher } from './data-plane/publisher';
export type { PublishInput } from './data-plane/publisher';
export * from './stages';
export * from './adapters';
export * from './pipeline';
