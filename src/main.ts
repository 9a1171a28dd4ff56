/**
 * HTTP service entry point.
 *
 * Reads configuration from the environment, wires the media stages when
 * storage and CDN are configured, and starts listening.
 */

import { ConfigError, loadConfig } from './config';
import { Stage } from './domain/pipeline';
import { describeError, logger, setLogLevel } from './logger';
import { buildMediaLibraryStages, buildMediaStages } from './pipeline/media-pipeline';
import { createApp, createAppContext } from './server';

function start(): void {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  let stages: Stage[] | undefined;
  let libraryStages: Stage[] | undefined;
  if (config.storage && config.cdn) {
    stages = buildMediaStages(config);
    libraryStages = buildMediaLibraryStages(config);
  } else {
    logger.warn('Storage or CDN not configured; runs cannot be started', {
      storage: config.storage !== undefined,
      cdn: config.cdn !== undefined,
    });
  }

  const context = createAppContext({ retry: config.retry, concurrency: config.concurrency, stages, libraryStages });
  const app = createApp(context);
  app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port, pipelineConfigured: stages !== undefined });
  });
}

try {
  start();
} catch (err) {
  if (err instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: err.typedError.details?.issues });
  } else {
    logger.error('Startup failed', describeError(err));
  }
  process.exitCode = 1;
}
