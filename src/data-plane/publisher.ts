/**
 * Pipeline event publisher.
 *
 * Emits versioned events as runs progress, persists them to the event
 * store, and delivers them to in-process subscribers (log shippers,
 * dashboards). Publishing is observational: a failing store write or
 * subscriber never changes the outcome of a run.
 */

import { v4 as uuid } from 'uuid';
import { PipelineEvent, PipelineEventType, EventSubscription } from '../domain/events';
import { EventStore } from '../storage/store';
import { logger, describeError } from '../logger';

const SCHEMA_VERSION = '1.0.0';

export interface PublishInput {
  type: PipelineEventType;
  runId: string;
  artifactId: string;
  stage?: string;
  effectId?: string;
  payload?: Record<string, unknown>;
}

export class PipelineEventPublisher {
  private subscriptions: EventSubscription[] = [];
  private log = logger.child({ module: 'publisher' });

  constructor(private events?: EventStore) {}

  /** Build, persist and deliver an event. Never throws. */
  async publish(input: PublishInput): Promise<PipelineEvent> {
    const event: PipelineEvent = {
      id: `evt_${uuid()}`,
      type: input.type,
      schemaVersion: SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: input.runId,
      artifactId: input.artifactId,
      stage: input.stage,
      effectId: input.effectId,
      payload: input.payload ?? {},
    };

    if (this.events) {
      try {
        await this.events.create(event);
      } catch (err) {
        this.log.warn('Event persistence failed', { eventType: event.type, runId: event.runId, ...describeError(err) });
      }
    }

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
      try {
        sub.callback(event);
      } catch (err) {
        this.log.warn('Event subscriber threw', { subscriptionId: sub.id, eventType: event.type, ...describeError(err) });
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(
    callback: (event: PipelineEvent) => void,
    filter: { runId?: string; eventTypes?: PipelineEventType[] } = {},
  ): () => void {
    const subscription: EventSubscription = { id: `sub_${uuid()}`, callback, ...filter };
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query persisted events of a run. Empty when no event store is attached. */
  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    if (!this.events) return [];
    return this.events.listByRun(runId, { eventTypes });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
