/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { PipelineEventPublisher } from './data-plane/publisher';
import { PipelineExecutor } from './engine/executor';
import { Sleep } from './engine/stage-runner';
import { RetryPolicyConfig, Stage } from './domain/pipeline';
import { MediaPipeline } from './pipeline/media-pipeline';
import { errorHandler, requestLogger } from './api/middleware';
import { createRunRoutes } from './api/runs';

const startTime = Date.now();
const VERSION = '0.1.0';

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  publisher: PipelineEventPublisher;
  executor: PipelineExecutor;
  pipeline?: MediaPipeline;
}

export interface AppContextOptions {
  store?: Store;
  retry?: Partial<RetryPolicyConfig>;
  /** Files processed at once by a site deployment. */
  concurrency?: number;
  /** Stages every run goes through; without them runs cannot be started. */
  stages?: Stage[];
  /** Stages of a media library run; POST /library answers 503 without them. */
  libraryStages?: Stage[];
  sleep?: Sleep;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const store = options.store ?? createMemoryStore();
  const publisher = new PipelineEventPublisher(store.events);
  const executor = new PipelineExecutor({
    retry: options.retry,
    publisher,
    results: store.results,
    sleep: options.sleep,
  });
  const pipeline = options.stages
    ? new MediaPipeline(executor, options.stages, options.concurrency, options.libraryStages)
    : undefined;

  return { store, publisher, executor, pipeline };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      pipelineConfigured: ctx.pipeline !== undefined,
      mediaLibrary: ctx.pipeline?.supportsMediaLibrary ?? false,
      activeRuns: ctx.executor.activeRuns().length,
    });
  });

  app.use('/api', createRunRoutes(ctx));

  app.use(errorHandler);

  return app;
}
