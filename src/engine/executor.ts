/**
 * Pipeline Executor: the core orchestration engine.
 *
 * Runs an ordered list of stages against one artifact. Each stage starts
 * only after the previous one committed; transient failures are retried per
 * stage policy. When a stage fails terminally, or the run is canceled
 * between stages, every committed effect is compensated in reverse commit
 * order before the result is returned.
 *
 * Expected failures never escape run(): they are reported in the returned
 * PipelineResult. Only malformed stage definitions throw.
 */

import { v4 as uuid } from 'uuid';
import { Artifact, CommittedEffect, snapshotArtifact } from '../domain/artifact';
import {
  TypedError,
  compensationFailedError,
  createTypedError,
  pipelineCanceledError,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import {
  CompensationRecord,
  PipelineResult,
  PipelineStatus,
  RetryPolicyConfig,
  Stage,
} from '../domain/pipeline';
import { PipelineEventPublisher } from '../data-plane/publisher';
import { ResultStore } from '../storage/store';
import { Logger, logger, describeError } from '../logger';
import { failureMessage } from './failure';
import { DEFAULT_RETRY_POLICY, RetryPolicy, validateRetryPolicy } from './retry-policy';
import { Sleep, compensateEffect, defaultSleep, executeStage, toStageError } from './stage-runner';
import { RunStateMachine } from './state-machine';

/** Executor construction options. */
export interface PipelineExecutorOptions {
  /** Default policy; each stage may override parts of it. */
  retry?: Partial<RetryPolicyConfig>;
  publisher?: PipelineEventPublisher;
  /** When set, every result is saved here before run() returns. */
  results?: ResultStore;
  /** Replaces the backoff timer (tests). */
  sleep?: Sleep;
}

/** Per-run options. */
export interface RunOptions {
  /** Caller-chosen run id; generated when omitted. */
  runId?: string;
  /** Aborting this signal cancels the run at the next stage boundary. */
  signal?: AbortSignal;
}

/** Per-run bookkeeping, owned by exactly one run() call. */
interface RunState {
  runId: string;
  artifactId: string;
  machine: RunStateMachine;
  /** Committed effects in commit order. */
  ledger: CommittedEffect[];
  log: Logger;
}

export class PipelineExecutor {
  private defaultPolicy: RetryPolicyConfig;
  private publisher?: PipelineEventPublisher;
  private results?: ResultStore;
  private sleep: Sleep;
  /** Cancellation requests keyed by run id, with the optional reason. */
  private canceledRuns = new Map<string, string | undefined>();
  /** Guard against two concurrent runs sharing a run id. */
  private runningRuns = new Set<string>();

  constructor(options: PipelineExecutorOptions = {}) {
    this.defaultPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.publisher = options.publisher;
    this.results = options.results;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Run ids currently executing. */
  activeRuns(): string[] {
    return [...this.runningRuns];
  }

  /**
   * Request cancellation of an in-flight run. Takes effect at the next
   * stage boundary (or retry boundary), never mid-call. Returns false when
   * no such run is executing.
   */
  cancel(runId: string, reason?: string): boolean {
    if (!this.runningRuns.has(runId)) return false;
    this.canceledRuns.set(runId, reason);
    return true;
  }

  /** Run stages in order against the artifact and return the final result. */
  async run(artifact: Artifact, stages: Stage[], options: RunOptions = {}): Promise<PipelineResult> {
    const problems = validateStages(stages, this.defaultPolicy);
    if (artifact.effects.length > 0) {
      problems.push('artifact already carries committed effects; create a fresh artifact per run');
    }
    if (problems.length > 0) {
      throw new PipelineDefinitionError(
        createTypedError({
          code: 'PIPELINE.INVALID_DEFINITION',
          message: `Invalid pipeline definition: ${problems.join('; ')}`,
          retryable: false,
          details: { problems },
        }),
      );
    }

    const runId = options.runId ?? `run_${uuid()}`;
    if (this.runningRuns.has(runId)) {
      throw new ExecutorError(
        createTypedError({
          code: 'PIPELINE.ALREADY_RUNNING',
          message: `Run "${runId}" is already being executed`,
          runId,
          retryable: false,
        }),
      );
    }
    this.runningRuns.add(runId);

    try {
      return await this.runInternal(runId, artifact, stages, options.signal);
    } finally {
      this.runningRuns.delete(runId);
      this.canceledRuns.delete(runId);
    }
  }

  private async runInternal(
    runId: string,
    artifact: Artifact,
    stages: Stage[],
    signal: AbortSignal | undefined,
  ): Promise<PipelineResult> {
    const startedAt = new Date().toISOString();
    const start = Date.now();
    const state: RunState = {
      runId,
      artifactId: artifact.id,
      machine: new RunStateMachine(runId, stages.map((s) => s.name)),
      ledger: [],
      log: logger.child({ runId, artifactId: artifact.id }),
    };
    const isCanceled = () => this.canceledRuns.has(runId) || signal?.aborted === true;

    state.log.info('Pipeline started', { stages: stages.map((s) => s.name) });
    await this.emit(state, 'run.started', { payload: { stages: stages.map((s) => s.name) } });

    let working: Artifact = { ...artifact, effects: [] };
    let failure: TypedError | undefined;
    let canceled = false;

    for (const [index, stage] of stages.entries()) {
      if (isCanceled()) {
        canceled = true;
        failure = pipelineCanceledError(runId, working.stage ?? undefined, this.cancelReason(runId, signal));
        break;
      }

      const outcome = state.machine.start(index);
      const stageStart = Date.now();
      await this.emit(state, 'stage.started', { stage: stage.name });

      const policy = RetryPolicy.merge(this.defaultPolicy, stage.retry);
      const attempt = await executeStage(stage, { ...working, effects: [...state.ledger] }, {
        runId,
        stage: stage.name,
        policy,
        logger: state.log,
        sleep: this.sleep,
        isCanceled,
        onRetry: (notice) =>
          this.emit(state, 'stage.retrying', {
            stage: stage.name,
            payload: { attempt: notice.attempt, delayMs: notice.delayMs, error: failureMessage(notice.error) },
          }),
      });

      outcome.attempts = attempt.attempts;
      outcome.retryCount = Math.max(0, attempt.attempts - 1);
      outcome.completedAt = new Date().toISOString();
      outcome.durationMs = Date.now() - stageStart;

      if (attempt.status === 'succeeded') {
        const { artifact: produced, effect } = attempt.value;
        let effectId: string | undefined;
        if (effect) {
          const committed: CommittedEffect = {
            id: `eff_${uuid()}`,
            stage: stage.name,
            kind: effect.kind,
            description: effect.description,
            resource: { ...effect.resource },
            committedAt: new Date().toISOString(),
          };
          state.ledger.push(committed);
          effectId = committed.id;
        }
        working = { ...produced, stage: stage.name, effects: [...state.ledger] };
        state.machine.commit(outcome, effectId);
        state.log.info('Stage committed', { stage: stage.name, attempts: outcome.attempts, effectId: outcome.effectId });
        await this.emit(state, 'stage.committed', {
          stage: stage.name,
          effectId: outcome.effectId,
          payload: { attempts: outcome.attempts, retryCount: outcome.retryCount, durationMs: outcome.durationMs },
        });
        continue;
      }

      if (attempt.status === 'canceled') {
        canceled = true;
        failure = pipelineCanceledError(runId, stage.name, this.cancelReason(runId, signal));
      } else {
        failure = { ...toStageError(stage.name, attempt), runId };
      }
      state.machine.fail(outcome, failure);
      state.log.warn('Stage failed', { stage: stage.name, attempts: outcome.attempts, code: failure.code });
      await this.emit(state, 'stage.failed', {
        stage: stage.name,
        payload: { attempts: outcome.attempts, code: failure.code, message: failure.message },
      });
      break;
    }

    for (const skipped of state.machine.skipPending()) {
      await this.emit(state, 'stage.skipped', { stage: skipped.stage });
    }

    let compensations: CompensationRecord[] = [];
    if (failure) {
      state.machine.beginRollback();
      compensations = await this.rollback(state, stages);
      state.machine.finishRollback(state.ledger.length);
    } else {
      state.machine.succeed();
    }

    const result: PipelineResult = {
      runId,
      artifactId: artifact.id,
      status: state.machine.status,
      canceled,
      failure,
      stages: state.machine.snapshot(),
      compensations,
      remainingEffects: state.ledger.map((e) => ({ ...e, resource: { ...e.resource } })),
      artifact: snapshotArtifact({ ...working, effects: state.ledger }),
      startedAt,
      completedAt: new Date().toISOString(),
      durationMs: Date.now() - start,
    };

    await this.persist(state, result);
    await this.emit(state, completionEvent(result), {
      payload: { status: result.status, durationMs: result.durationMs, failure: result.failure?.code },
    });
    state.log.info('Pipeline finished', {
      status: result.status,
      canceled,
      durationMs: result.durationMs,
      remainingEffects: result.remainingEffects.length,
    });

    return result;
  }

  /**
   * Compensate committed effects in strict reverse commit order. Each effect
   * leaves the ledger only once its compensation succeeded or the stage has
   * nothing to undo; failures are recorded and the remaining compensations
   * still run.
   */
  private async rollback(state: RunState, stages: Stage[]): Promise<CompensationRecord[]> {
    const stagesByName = new Map(stages.map((s) => [s.name, s]));
    const records: CompensationRecord[] = [];

    for (const effect of [...state.ledger].reverse()) {
      const stage = stagesByName.get(effect.stage);

      if (!stage?.compensate) {
        this.releaseEffect(state, effect);
        records.push({ effectId: effect.id, stage: effect.stage, kind: effect.kind, status: 'not_required', attempts: 0, durationMs: 0 });
        state.machine.settleCompensation(effect, true);
        continue;
      }

      await this.emit(state, 'compensation.started', { stage: stage.name, effectId: effect.id });
      const start = Date.now();
      const attempt = await compensateEffect(stage, effect, {
        runId: state.runId,
        stage: stage.name,
        policy: RetryPolicy.merge(this.defaultPolicy, stage.retry),
        logger: state.log.child({ phase: 'compensation' }),
        sleep: this.sleep,
      });
      const durationMs = Date.now() - start;

      if (attempt.status === 'succeeded') {
        this.releaseEffect(state, effect);
        records.push({ effectId: effect.id, stage: stage.name, kind: effect.kind, status: 'compensated', attempts: attempt.attempts, durationMs });
        state.machine.settleCompensation(effect, true);
        state.log.info('Effect compensated', { stage: stage.name, effectId: effect.id, kind: effect.kind });
        await this.emit(state, 'compensation.succeeded', { stage: stage.name, effectId: effect.id });
        continue;
      }

      const message = attempt.status === 'failed' ? failureMessage(attempt.error) : 'compensation interrupted';
      const error = { ...compensationFailedError(stage.name, effect.id, message, attempt.attempts), runId: state.runId };
      records.push({ effectId: effect.id, stage: stage.name, kind: effect.kind, status: 'failed', attempts: attempt.attempts, durationMs, error });
      state.machine.settleCompensation(effect, false);
      state.log.error('Compensation failed', { stage: stage.name, effectId: effect.id, kind: effect.kind, error: message });
      await this.emit(state, 'compensation.failed', {
        stage: stage.name,
        effectId: effect.id,
        payload: { message },
      });
    }

    return records;
  }

  private releaseEffect(state: RunState, effect: CommittedEffect): void {
    state.ledger = state.ledger.filter((e) => e.id !== effect.id);
  }

  private cancelReason(runId: string, signal: AbortSignal | undefined): string | undefined {
    const requested = this.canceledRuns.get(runId);
    if (requested) return requested;
    if (signal?.aborted && typeof signal.reason === 'string') return signal.reason;
    return undefined;
  }

  private async emit(
    state: RunState,
    type: PipelineEventType,
    extra: { stage?: string; effectId?: string; payload?: Record<string, unknown> } = {},
  ): Promise<void> {
    if (!this.publisher) return;
    await this.publisher.publish({ type, runId: state.runId, artifactId: state.artifactId, ...extra });
  }

  private async persist(state: RunState, result: PipelineResult): Promise<void> {
    if (!this.results) return;
    try {
      await this.results.save(result);
    } catch (err) {
      state.log.error('Result persistence failed', describeError(err));
    }
  }
}

function completionEvent(result: PipelineResult): PipelineEventType {
  if (result.status === PipelineStatus.Succeeded) return 'run.succeeded';
  if (result.status === PipelineStatus.Partial) return 'run.partial';
  return result.canceled ? 'run.canceled' : 'run.rolled_back';
}

/** Problems with a stage list; empty when it can run. */
export function validateStages(stages: Stage[], basePolicy: RetryPolicyConfig = DEFAULT_RETRY_POLICY): string[] {
  const problems: string[] = [];
  if (stages.length === 0) {
    problems.push('at least one stage is required');
  }

  const seen = new Set<string>();
  stages.forEach((stage, index) => {
    const label = stage.name ? `stage "${stage.name}"` : `stage #${index + 1}`;
    if (!stage.name || stage.name.trim() === '') {
      problems.push(`${label} has no name`);
    } else if (seen.has(stage.name)) {
      problems.push(`${label} is defined more than once`);
    }
    seen.add(stage.name);

    if (typeof stage.execute !== 'function') {
      problems.push(`${label} has no execute function`);
    }
    if (stage.compensate !== undefined && typeof stage.compensate !== 'function') {
      problems.push(`${label} has a compensate value that is not a function`);
    }
    if (!stage.idempotent && !stage.compensate) {
      problems.push(`${label} must be idempotent or provide a compensating action`);
    }
    for (const issue of validateRetryPolicy({ ...basePolicy, ...stage.retry })) {
      problems.push(`${label}: ${issue}`);
    }
  });

  return problems;
}

/** Thrown before any stage runs when the stage list itself is malformed. */
export class PipelineDefinitionError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'PipelineDefinitionError';
  }
}

/** Executor-specific error wrapper. */
export class ExecutorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}
