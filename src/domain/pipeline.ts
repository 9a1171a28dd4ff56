/**
 * Pipeline domain model.
 *
 * Stages, their retry policies, and the immutable result a pipeline run
 * produces: per-stage outcomes, the compensations applied during rollback,
 * and whatever side effects are still in place afterwards.
 */

import { Artifact, ArtifactSnapshot, CommittedEffect, EffectDescriptor } from './artifact';
import { TypedError } from './errors';
import { Logger } from '../logger';

/** Lifecycle of a whole pipeline run. */
export enum PipelineStatus {
  Running = 'running',
  RollingBack = 'rolling_back',
  /** Every stage committed. */
  Succeeded = 'succeeded',
  /** A stage failed or the run was canceled, and every effect was undone. */
  RolledBack = 'rolled_back',
  /** Rollback ran but some compensations failed; see remainingEffects. */
  Partial = 'partial',
}

/** Lifecycle of one stage within a run. */
export enum StageStatus {
  Pending = 'pending',
  Running = 'running',
  Committed = 'committed',
  Failed = 'failed',
  /** Never started because the run stopped earlier. */
  Skipped = 'skipped',
  RolledBack = 'rolled_back',
  CompensationFailed = 'compensation_failed',
}

/** Valid state transitions for pipeline runs. */
export const VALID_PIPELINE_TRANSITIONS: Record<PipelineStatus, PipelineStatus[]> = {
  [PipelineStatus.Running]: [PipelineStatus.Succeeded, PipelineStatus.RollingBack],
  [PipelineStatus.RollingBack]: [PipelineStatus.RolledBack, PipelineStatus.Partial],
  [PipelineStatus.Succeeded]: [],
  [PipelineStatus.RolledBack]: [],
  [PipelineStatus.Partial]: [],
};

/** Valid state transitions for stages. */
export const VALID_STAGE_TRANSITIONS: Record<StageStatus, StageStatus[]> = {
  [StageStatus.Pending]: [StageStatus.Running, StageStatus.Skipped],
  [StageStatus.Running]: [StageStatus.Committed, StageStatus.Failed],
  [StageStatus.Committed]: [StageStatus.RolledBack, StageStatus.CompensationFailed],
  [StageStatus.Failed]: [],
  [StageStatus.Skipped]: [],
  [StageStatus.RolledBack]: [],
  [StageStatus.CompensationFailed]: [],
};

/** Retry and timeout settings for one stage. */
export interface RetryPolicyConfig {
  /** Total attempts including the first. */
  maxAttempts: number;
  /** Delay before the first retry; doubles on each further retry. */
  backoffBaseMs: number;
  /** Upper bound on any single delay. */
  backoffCapMs: number;
  /** Per-call timeout; exceeding it counts as a transient failure. */
  timeoutMs: number;
}

/** Handed to every execute/compensate call. */
export interface StageContext {
  runId: string;
  stage: string;
  /** 1-based attempt number of this call. */
  attempt: number;
  /** Aborted when the call exceeds its timeout. */
  signal: AbortSignal;
  logger: Logger;
}

/** What a stage's execute returns. */
export interface StageExecution {
  artifact: Artifact;
  /** Omitted by stages that changed nothing outside the process. */
  effect?: EffectDescriptor;
}

/**
 * One step of the pipeline. A stage must either be idempotent or supply a
 * compensating action.
 */
export interface Stage {
  name: string;
  idempotent: boolean;
  /** Overrides applied on top of the executor's default policy. */
  retry?: Partial<RetryPolicyConfig>;
  execute(artifact: Artifact, context: StageContext): Promise<StageExecution>;
  /**
   * Undo a committed effect. Must succeed when the effect is already gone,
   * so replaying it is harmless.
   */
  compensate?(effect: CommittedEffect, context: StageContext): Promise<void>;
}

export type CompensationStatus = 'compensated' | 'not_required' | 'failed';

/** One entry of the rollback log, in the order compensations ran. */
export interface CompensationRecord {
  effectId: string;
  stage: string;
  kind: string;
  status: CompensationStatus;
  attempts: number;
  durationMs: number;
  error?: TypedError;
}

/** Per-stage outcome reported in a PipelineResult. */
export interface StageOutcome {
  stage: string;
  status: StageStatus;
  /** Attempts made, including retries. */
  attempts: number;
  retryCount: number;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** Id of the effect this stage committed, if any. */
  effectId?: string;
  error?: TypedError;
}

/** Immutable summary of one pipeline run. */
export interface PipelineResult {
  runId: string;
  artifactId: string;
  status: PipelineStatus;
  canceled: boolean;
  /** Why the run did not succeed. */
  failure?: TypedError;
  stages: StageOutcome[];
  compensations: CompensationRecord[];
  /** Effects still in place: all of them on success, the unresolved ones otherwise. */
  remainingEffects: CommittedEffect[];
  artifact: ArtifactSnapshot;
  startedAt: string;
  completedAt: string;
  durationMs: number;
}
