/**
 * Tests for the PipelineEventPublisher.
 *
 * Verifies that:
 * - Events are persisted and delivered to subscribers
 * - Subscriber callback errors don't break event publishing
 * - Subscription filtering works by run and event type
 * - Unsubscribe removes the subscription
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { PipelineEventPublisher } from '../../src/data-plane/publisher';
import { EventStore } from '../../src/storage/store';
import type { PipelineEvent } from '../../src/domain/events';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';

const BASE = { runId: 'run_1', artifactId: 'art_1' };

describe('PipelineEventPublisher', () => {
  let logs: LogEntry[];

  beforeEach(() => {
    logs = [];
    setLogHandler((entry) => logs.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
  });

  it('persists events to the store', async () => {
    const store = createMemoryStore();
    const publisher = new PipelineEventPublisher(store.events);

    const event = await publisher.publish({ ...BASE, type: 'run.started', payload: { stages: ['upload'] } });

    expect(event.type).toBe('run.started');
    expect(event.id).toMatch(/^evt_/);
    expect(event.schemaVersion).toBe('1.0.0');
    expect(event.payload).toEqual({ stages: ['upload'] });

    const storedEvents = await store.events.listByRun('run_1');
    expect(storedEvents).toEqual([event]);
  });

  it('defaults the payload to an empty object', async () => {
    const publisher = new PipelineEventPublisher();
    const event = await publisher.publish({ ...BASE, type: 'stage.started', stage: 'upload' });
    expect(event.payload).toEqual({});
    expect(event.stage).toBe('upload');
  });

  it('delivers events to subscribers of the run only', async () => {
    const publisher = new PipelineEventPublisher();
    const received: PipelineEvent[] = [];
    publisher.subscribe((event) => received.push(event), { runId: 'run_1' });

    await publisher.publish({ ...BASE, type: 'run.started' });
    await publisher.publish({ runId: 'run_2', artifactId: 'art_2', type: 'run.started' });

    expect(received.map((e) => e.runId)).toEqual(['run_1']);
  });

  it('filters by event types when subscribed with eventTypes', async () => {
    const publisher = new PipelineEventPublisher();
    const received: PipelineEvent[] = [];
    publisher.subscribe((event) => received.push(event), { eventTypes: ['run.partial', 'compensation.failed'] });

    await publisher.publish({ ...BASE, type: 'run.started' });
    await publisher.publish({ ...BASE, type: 'compensation.failed', stage: 'upload', effectId: 'eff_1' });
    await publisher.publish({ ...BASE, type: 'run.partial' });

    expect(received.map((e) => e.type)).toEqual(['compensation.failed', 'run.partial']);
    expect(received[0].effectId).toBe('eff_1');
  });

  it('keeps delivering when a subscriber throws', async () => {
    const publisher = new PipelineEventPublisher();
    const received: PipelineEvent[] = [];
    publisher.subscribe(() => {
      throw new Error('Subscriber crashed');
    });
    publisher.subscribe((event) => received.push(event));

    await publisher.publish({ ...BASE, type: 'run.started' });

    expect(received).toHaveLength(1);
    expect(logs.map((l) => [l.level, l.message, l.context?.error])).toEqual([
      ['warn', 'Event subscriber threw', 'Subscriber crashed'],
    ]);
  });

  it('logs and continues when the event store fails', async () => {
    const failingStore: EventStore = {
      create: async () => {
        throw new Error('disk full');
      },
      listByRun: async () => [],
    };
    const publisher = new PipelineEventPublisher(failingStore);
    const received: PipelineEvent[] = [];
    publisher.subscribe((event) => received.push(event));

    await expect(publisher.publish({ ...BASE, type: 'run.started' })).resolves.toMatchObject({ type: 'run.started' });
    expect(received).toHaveLength(1);
    expect(logs[0]).toMatchObject({ level: 'warn', message: 'Event persistence failed' });
  });

  it('unsubscribe removes the subscription', async () => {
    const publisher = new PipelineEventPublisher();
    const received: PipelineEvent[] = [];
    const unsubscribe = publisher.subscribe((event) => received.push(event));

    await publisher.publish({ ...BASE, type: 'run.started' });
    unsubscribe();
    await publisher.publish({ ...BASE, type: 'run.succeeded' });

    expect(received.map((e) => e.type)).toEqual(['run.started']);
  });

  it('queries stored events of a run by type', async () => {
    const store = createMemoryStore();
    const publisher = new PipelineEventPublisher(store.events);
    await publisher.publish({ ...BASE, type: 'stage.started', stage: 'upload' });
    await publisher.publish({ ...BASE, type: 'stage.committed', stage: 'upload' });

    const committed = await publisher.getEventsByRun('run_1', ['stage.committed']);
    expect(committed.map((e) => e.type)).toEqual(['stage.committed']);
    expect(await new PipelineEventPublisher().getEventsByRun('run_1')).toEqual([]);
  });
});
