/**
 * Distribute stage: invalidates every path the run uploaded on the CDN.
 *
 * A purge can be repeated without harm, so the stage is idempotent and has
 * no compensating action. With waitForCompletion the stage polls the purge
 * until it completes, fails, or the poll budget runs out; the last two are
 * transient failures so the executor retries the whole purge.
 */

import { Stage, StageContext } from '../domain/pipeline';
import { PermanentStageError, TransientStageError } from '../engine/failure';
import { Sleep, defaultSleep } from '../engine/stage-runner';
import { publishedKeys } from './content';
import { CdnClient, PurgeRequest } from './ports';

export interface DistributeStageOptions {
  cdn: CdnClient;
  /** Public CDN origin without trailing slash, e.g. https://cdn.example.com */
  cdnDomain: string;
  waitForCompletion?: boolean;
  /** Default: 2_000 */
  pollIntervalMs?: number;
  /** Wall-clock budget for polling one purge. Default: 20_000 */
  pollBudgetMs?: number;
  sleep?: Sleep;
  name?: string;
}

export const DEFAULT_PURGE_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_PURGE_POLL_BUDGET_MS = 20_000;

export function createDistributeStage(options: DistributeStageOptions): Stage {
  const cdnDomain = options.cdnDomain.replace(/\/+$/, '');
  const sleep = options.sleep ?? defaultSleep;

  async function waitForPurge(request: PurgeRequest, context: StageContext): Promise<PurgeRequest> {
    const interval = options.pollIntervalMs ?? DEFAULT_PURGE_POLL_INTERVAL_MS;
    const budget = options.pollBudgetMs ?? DEFAULT_PURGE_POLL_BUDGET_MS;
    const start = Date.now();
    let current = request;
    let pollCount = 0;

    while (current.state === 'in_progress') {
      if (Date.now() - start + interval > budget) {
        throw new TransientStageError(`Purge ${request.purgeId} still in progress after ${pollCount} polls`);
      }
      await sleep(interval);
      pollCount++;
      current = await options.cdn.purgeStatus(request.purgeId, context.signal);
      context.logger.debug('Purge polled', { purgeId: request.purgeId, state: current.state, pollCount });
    }
    return current;
  }

  return {
    name: options.name ?? 'distribute',
    idempotent: true,

    async execute(artifact, context) {
      const key = artifact.attributes.storageKey;
      if (!key) {
        throw new PermanentStageError(`Artifact ${artifact.id} has not been uploaded; nothing to distribute`);
      }
      const path = `/${key}`;
      const paths = publishedKeys(artifact).map((k) => `/${k}`);
      if (!paths.includes(path)) paths.push(path);

      let request = await options.cdn.purge(paths, context.signal);
      if (options.waitForCompletion) {
        request = await waitForPurge(request, context);
      }
      if (request.state === 'failed') {
        throw new TransientStageError(`Purge ${request.purgeId} of ${paths.join(', ')} failed`);
      }

      const cdnUrl = `${cdnDomain}${path}`;
      context.logger.info('CDN purge requested', { purgeId: request.purgeId, paths, state: request.state });

      return {
        artifact: {
          ...artifact,
          attributes: { ...artifact.attributes, cdnUrl, purgeId: request.purgeId, purgeState: request.state },
        },
        effect: {
          kind: 'cdn.purged',
          description: `Purged ${paths.join(', ')} on the CDN`,
          resource: { purgeId: request.purgeId, paths: JSON.stringify(paths) },
        },
      };
    },
  };
}
