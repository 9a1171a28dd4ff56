/**
 * Storage layer interfaces.
 *
 * Pipeline results and events are written once and read by dashboards or
 * the HTTP API; nothing in the executor reads them back.
 */

import { PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineResult, PipelineStatus } from '../domain/pipeline';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Aggregate figures over stored results. */
export interface PipelineStatistics {
  totalRuns: number;
  byStatus: Record<string, number>;
  canceledRuns: number;
  /** Sum of retryCount over every stage of every run. */
  totalRetries: number;
  failedCompensations: number;
  /** Effects left behind by partial rollbacks. */
  unresolvedEffects: number;
  averageDurationMs: number;
}

/** Store interface for pipeline results. */
export interface ResultStore {
  save(result: PipelineResult): Promise<PipelineResult>;
  getById(runId: string): Promise<PipelineResult | null>;
  list(options?: ListOptions & { status?: PipelineStatus }): Promise<ListResult<PipelineResult>>;
  statistics(): Promise<PipelineStatistics>;
}

/** Store interface for pipeline events. */
export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Compute statistics over a set of results. */
export function summarizeResults(results: PipelineResult[]): PipelineStatistics {
  const byStatus: Record<string, number> = {};
  let canceledRuns = 0;
  let totalRetries = 0;
  let failedCompensations = 0;
  let unresolvedEffects = 0;
  let totalDuration = 0;

  for (const result of results) {
    byStatus[result.status] = (byStatus[result.status] ?? 0) + 1;
    if (result.canceled) canceledRuns++;
    totalRetries += result.stages.reduce((sum, stage) => sum + stage.retryCount, 0);
    failedCompensations += result.compensations.filter((c) => c.status === 'failed').length;
    if (result.status !== PipelineStatus.Succeeded) {
      unresolvedEffects += result.remainingEffects.length;
    }
    totalDuration += result.durationMs;
  }

  return {
    totalRuns: results.length,
    byStatus,
    canceledRuns,
    totalRetries,
    failedCompensations,
    unresolvedEffects,
    averageDurationMs: results.length > 0 ? Math.round(totalDuration / results.length) : 0,
  };
}

/** Composite store interface. */
export interface Store {
  results: ResultStore;
  events: EventStore;
}
