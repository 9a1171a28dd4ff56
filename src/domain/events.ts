/**
 * Pipeline event domain model.
 *
 * Events are emitted while a run progresses so logging and dashboard
 * collaborators can follow it without touching executor state.
 */

/** Event types emitted by the executor. */
export type PipelineEventType =
  | 'run.started'
  | 'run.succeeded'
  | 'run.canceled'
  | 'run.rolled_back'
  | 'run.partial'
  | 'stage.started'
  | 'stage.retrying'
  | 'stage.committed'
  | 'stage.failed'
  | 'stage.skipped'
  | 'compensation.started'
  | 'compensation.succeeded'
  | 'compensation.failed';

/** A pipeline event with stable schema. */
export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  artifactId: string;
  stage?: string;
  effectId?: string;
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events for this run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: PipelineEventType[];
  callback: (event: PipelineEvent) => void;
}
