/**
 * Run lifecycle: the pipeline status plus one outcome per stage.
 *
 * Every status change is checked against the transition tables in
 * domain/pipeline. Compensation results are accepted only while the run is
 * rolling back, and only for the stage that committed the effect being
 * undone.
 */

import { CommittedEffect } from '../domain/artifact';
import { TypedError, createTypedError } from '../domain/errors';
import {
  PipelineStatus,
  StageOutcome,
  StageStatus,
  VALID_PIPELINE_TRANSITIONS,
  VALID_STAGE_TRANSITIONS,
} from '../domain/pipeline';

/** A lifecycle rule was broken; this is an engine bug, never a stage failure. */
export class StateTransitionError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'StateTransitionError';
  }
}

function invalid(code: string, message: string, details: Record<string, unknown>): StateTransitionError {
  return new StateTransitionError(createTypedError({ code, message, retryable: false, details }));
}

export class RunStateMachine {
  private current: PipelineStatus = PipelineStatus.Running;
  private outcomes: StageOutcome[];

  constructor(
    readonly runId: string,
    stageNames: string[],
  ) {
    this.outcomes = stageNames.map((stage) => ({ stage, status: StageStatus.Pending, attempts: 0, retryCount: 0 }));
  }

  get status(): PipelineStatus {
    return this.current;
  }

  /** Copies of the stage outcomes, in stage order. */
  snapshot(): StageOutcome[] {
    return this.outcomes.map((o) => ({ ...o }));
  }

  /** Move stage `index` from pending to running. */
  start(index: number): StageOutcome {
    const outcome = this.outcomes[index];
    if (!outcome) {
      throw invalid('STAGE.INVALID_TRANSITION', `Run ${this.runId} has no stage #${index + 1}`, { index });
    }
    this.requireRunning(`start stage "${outcome.stage}"`);
    this.moveStage(outcome, StageStatus.Running);
    outcome.startedAt = new Date().toISOString();
    return outcome;
  }

  commit(outcome: StageOutcome, effectId?: string): void {
    this.moveStage(outcome, StageStatus.Committed);
    outcome.effectId = effectId;
  }

  fail(outcome: StageOutcome, error: TypedError): void {
    this.moveStage(outcome, StageStatus.Failed);
    outcome.error = error;
  }

  /** Mark every stage that never started as skipped; returns those outcomes. */
  skipPending(): StageOutcome[] {
    const pending = this.outcomes.filter((o) => o.status === StageStatus.Pending);
    for (const outcome of pending) this.moveStage(outcome, StageStatus.Skipped);
    return pending;
  }

  succeed(): void {
    this.movePipeline(PipelineStatus.Succeeded);
  }

  beginRollback(): void {
    this.movePipeline(PipelineStatus.RollingBack);
  }

  /**
   * Record how undoing `effect` went. The stage that committed it becomes
   * rolled_back or compensation_failed.
   */
  settleCompensation(effect: CommittedEffect, compensated: boolean): void {
    if (this.current !== PipelineStatus.RollingBack) {
      throw invalid(
        'STAGE.INVALID_TRANSITION',
        `Cannot compensate effect ${effect.id} of stage "${effect.stage}" while run ${this.runId} is ${this.current}`,
        { effectId: effect.id, status: this.current },
      );
    }
    const outcome = this.outcomes.find((o) => o.effectId === effect.id);
    if (!outcome || outcome.stage !== effect.stage) {
      throw invalid(
        'STAGE.INVALID_TRANSITION',
        `Effect ${effect.id} was not committed by stage "${effect.stage}" of run ${this.runId}`,
        { effectId: effect.id, stage: effect.stage },
      );
    }
    this.moveStage(outcome, compensated ? StageStatus.RolledBack : StageStatus.CompensationFailed);
  }

  /** Close the rollback: rolled_back when nothing is left in place, partial otherwise. */
  finishRollback(remainingEffects: number): void {
    this.movePipeline(remainingEffects === 0 ? PipelineStatus.RolledBack : PipelineStatus.Partial);
  }

  isTerminal(): boolean {
    return VALID_PIPELINE_TRANSITIONS[this.current].length === 0;
  }

  private requireRunning(action: string): void {
    if (this.current !== PipelineStatus.Running) {
      throw invalid('PIPELINE.INVALID_TRANSITION', `Cannot ${action}: run ${this.runId} is ${this.current}`, {
        status: this.current,
      });
    }
  }

  private moveStage(outcome: StageOutcome, target: StageStatus): void {
    const allowed = VALID_STAGE_TRANSITIONS[outcome.status];
    if (!allowed.includes(target)) {
      throw invalid('STAGE.INVALID_TRANSITION', `Stage "${outcome.stage}" cannot move from ${outcome.status} to ${target}`, {
        current: outcome.status,
        target,
        allowed,
      });
    }
    outcome.status = target;
  }

  private movePipeline(target: PipelineStatus): void {
    const allowed = VALID_PIPELINE_TRANSITIONS[this.current];
    if (!allowed.includes(target)) {
      throw invalid('PIPELINE.INVALID_TRANSITION', `Run ${this.runId} cannot move from ${this.current} to ${target}`, {
        current: this.current,
        target,
        allowed,
      });
    }
    this.current = target;
  }
}
