/**
 * Run API routes.
 *
 *   POST /runs                  Start a pipeline run for one file
 *   GET  /runs                  List finished runs
 *   GET  /runs/:runId           Get a run result
 *   GET  /runs/:runId/events    Events emitted by a run
 *   POST /runs/:runId/cancel    Cancel an in-flight run
 *   POST /library               Publish one image with thumbnails to the media library
 *   POST /deployments           Deploy every file under a directory
 *   GET  /statistics            Aggregate figures over finished runs
 */

import { NextFunction, Request, Response, Router } from 'express';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import { apiError, createTypedError, notFoundError, validationError } from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { PipelineResult, PipelineStatus } from '../domain/pipeline';
import { PipelineEventPublisher } from '../data-plane/publisher';
import { PipelineExecutor } from '../engine/executor';
import { describeError, logger } from '../logger';
import { MediaPipeline } from '../pipeline/media-pipeline';
import { Store } from '../storage/store';

const log = logger.child({ module: 'api' });

const objectKeySchema = z
  .string()
  .min(1)
  .max(1024)
  .refine((key) => !key.startsWith('/') && !key.includes('\\'), 'keys are relative and use "/" as separator')
  .refine((key) => !key.split('/').some((segment) => segment === '..' || segment === '.'), 'keys may not contain "." or ".." segments');

const runIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_.-]{1,128}$/, 'run ids may only contain letters, digits, "_", "." and "-"');

const startRunSchema = z.object({
  sourcePath: z.string().min(1),
  key: objectKeySchema.optional(),
  runId: runIdSchema.optional(),
  optimizeImages: z.boolean().optional(),
  /** Respond with the finished result instead of 202. */
  wait: z.boolean().default(false),
});

const libraryRunSchema = z.object({
  imagePath: z.string().min(1),
  key: objectKeySchema.optional(),
  runId: runIdSchema.optional(),
  generateThumbnails: z.boolean().optional(),
  wait: z.boolean().default(false),
});

const listRunsSchema = z.object({
  status: z.nativeEnum(PipelineStatus).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

const cancelRunSchema = z.object({
  reason: z.string().max(500).optional(),
});

const deploySchema = z.object({
  sourceDir: z.string().min(1),
  optimizeImages: z.boolean().optional(),
});

const EVENT_TYPES: PipelineEventType[] = [
  'run.started',
  'run.succeeded',
  'run.canceled',
  'run.rolled_back',
  'run.partial',
  'stage.started',
  'stage.retrying',
  'stage.committed',
  'stage.failed',
  'stage.skipped',
  'compensation.started',
  'compensation.succeeded',
  'compensation.failed',
];

function isEventType(value: string): value is PipelineEventType {
  return EVENT_TYPES.some((type) => type === value);
}

function sendValidationError(res: Response, error: z.ZodError): void {
  const issues = error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
  res.status(400).json(apiError(validationError(`Invalid request: ${issues.join('; ')}`, { issues })));
}

function isMissingPath(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function notConfigured(res: Response): void {
  res.status(503).json(
    apiError(
      createTypedError({
        code: 'PIPELINE.NOT_CONFIGURED',
        message: 'No media pipeline is configured; set the storage and CDN environment variables',
        retryable: false,
      }),
    ),
  );
}

export interface RunRouteDependencies {
  store: Store;
  executor: PipelineExecutor;
  publisher: PipelineEventPublisher;
  /** Absent when storage or CDN configuration is missing. */
  pipeline?: MediaPipeline;
}

export function createRunRoutes(deps: RunRouteDependencies): Router {
  const { store, executor, publisher, pipeline } = deps;
  const router = Router();

  /** Answer 409 for a taken run id, else start the run and answer 202 or the result. */
  async function startRun(
    res: Response,
    runId: string,
    wait: boolean,
    start: (runId: string) => Promise<PipelineResult>,
  ): Promise<void> {
    if (executor.activeRuns().includes(runId) || (await store.results.getById(runId))) {
      res.status(409).json(
        apiError(
          createTypedError({
            code: 'PIPELINE.ALREADY_RUNNING',
            message: `Run "${runId}" already exists`,
            runId,
            retryable: false,
          }),
        ),
      );
      return;
    }

    const running = start(runId);
    if (wait) {
      const result = await running;
      res.json({ result });
      return;
    }

    running.catch((err: unknown) => {
      log.error('Background run failed to start', { runId, ...describeError(err) });
    });
    res.status(202).json({ runId, status: PipelineStatus.Running });
  }

  /**
   * POST /runs
   * Start a run. Responds 202 right away, or with the result when `wait` is set.
   */
  router.post('/runs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = startRunSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }
      if (!pipeline) {
        notConfigured(res);
        return;
      }

      const { sourcePath, key, optimizeImages, wait } = parsed.data;
      await startRun(res, parsed.data.runId ?? `run_${uuid()}`, wait, (runId) =>
        pipeline.processFile(sourcePath, { key, runId, optimizeImages }),
      );
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /library
   * Publish one image as original, thumbnails and optimized copy.
   */
  router.post('/library', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = libraryRunSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }
      if (!pipeline || !pipeline.supportsMediaLibrary) {
        notConfigured(res);
        return;
      }

      const { imagePath, key, generateThumbnails, wait } = parsed.data;
      await startRun(res, parsed.data.runId ?? `run_${uuid()}`, wait, (runId) =>
        pipeline.processMediaLibrary(imagePath, { key, runId, generateThumbnails }),
      );
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs
   * List finished runs, newest first. Query: status, limit, offset.
   */
  router.get('/runs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = listRunsSchema.safeParse(req.query);
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }
      res.json(await store.results.list(parsed.data));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs/:runId
   * The stored result, or a running marker while the run is in flight.
   */
  router.get('/runs/:runId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { runId } = req.params;
      const result = await store.results.getById(runId);
      if (result) {
        res.json({ result });
        return;
      }
      if (executor.activeRuns().includes(runId)) {
        res.json({ runId, status: PipelineStatus.Running });
        return;
      }
      res.status(404).json(apiError(notFoundError('Run', runId)));
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs/:runId/events
   * Query: type (repeatable) to filter by event type.
   */
  router.get('/runs/:runId/events', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const raw = req.query.type;
      const requested = (Array.isArray(raw) ? raw : [raw]).filter((t): t is string => typeof t === 'string');
      const unknown = requested.filter((t) => !isEventType(t));
      if (unknown.length > 0) {
        res.status(400).json(apiError(validationError(`Unknown event type: ${unknown.join(', ')}`, { allowed: EVENT_TYPES })));
        return;
      }
      const types = requested.filter(isEventType);
      const events = await publisher.getEventsByRun(req.params.runId, types.length > 0 ? types : undefined);
      res.json({ events });
    } catch (err) {
      next(err);
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Cancellation takes effect at the run's next stage boundary.
   */
  router.post('/runs/:runId/cancel', (req: Request, res: Response) => {
    const parsed = cancelRunSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      sendValidationError(res, parsed.error);
      return;
    }
    const { runId } = req.params;
    if (!executor.cancel(runId, parsed.data.reason)) {
      res.status(404).json(apiError(notFoundError('Active run', runId)));
      return;
    }
    log.info('Cancellation requested', { runId, reason: parsed.data.reason });
    res.status(202).json({ runId, cancelRequested: true });
  });

  /**
   * POST /deployments
   * Run one pipeline per file under sourceDir and return the aggregate report.
   */
  router.post('/deployments', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = deploySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
      }
      if (!pipeline) {
        notConfigured(res);
        return;
      }
      const { sourceDir, optimizeImages } = parsed.data;
      const report = await pipeline.deploySite(sourceDir, { optimizeImages }).catch((err: unknown) => {
        if (isMissingPath(err)) return null;
        throw err;
      });
      if (!report) {
        res.status(404).json(apiError(notFoundError('Directory', sourceDir)));
        return;
      }
      res.json({ report });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /statistics
   */
  router.get('/statistics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ statistics: await store.results.statistics() });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
