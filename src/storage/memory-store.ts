/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every value is
 * deep-copied on the way in and out so callers never share nested arrays
 * (stage outcomes, effects) with the store.
 */

import { PipelineEvent, PipelineEventType } from '../domain/events';
import { PipelineResult, PipelineStatus } from '../domain/pipeline';
import {
  EventStore,
  ListOptions,
  ListResult,
  PipelineStatistics,
  ResultStore,
  Store,
  summarizeResults,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryResultStore implements ResultStore {
  private data = new Map<string, PipelineResult>();

  async save(result: PipelineResult): Promise<PipelineResult> {
    this.data.set(result.runId, deepCopy(result));
    return deepCopy(result);
  }

  async getById(runId: string): Promise<PipelineResult | null> {
    const result = this.data.get(runId);
    return result ? deepCopy(result) : null;
  }

  async list(options?: ListOptions & { status?: PipelineStatus }): Promise<ListResult<PipelineResult>> {
    const status = options?.status;
    const matching = [...this.data.values()]
      .filter((r) => !status || r.status === status)
      .sort((a, b) => b.completedAt.localeCompare(a.completedAt));
    return toListResult(applyListOptions(matching, options).map(deepCopy), matching.length, options);
  }

  async statistics(): Promise<PipelineStatistics> {
    return summarizeResults([...this.data.values()]);
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: PipelineEventType[] },
  ): Promise<PipelineEvent[]> {
    const types = options?.eventTypes;
    const items = this.data.filter(
      (e) => e.runId === runId && (!types?.length || types.includes(e.type)),
    );
    return applyListOptions(items, { limit: 1000, ...options }).map(deepCopy);
  }
}

/** Create a fresh in-memory store. */
export function createMemoryStore(): Store {
  return {
    results: new MemoryResultStore(),
    events: new MemoryEventStore(),
  };
}
