import { randomUUID } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  ExecutionLifecycleEngine,
  ExecutionTransition,
} from '../engines/execution-lifecycle.engine';
import { ConcurrentModificationError } from '../errors/concurrent-modification.error';
import { ExecutionNotFoundError } from '../errors/execution-not-found.error';
import { EngineEventType } from '../events/engine-event-type.enum';
import type {
  ExecutionCreatedEvent,
  ExecutionStatusEvent,
  ExecutionWaitingEvent,
  StepEvent,
  StepRetryScheduledEvent,
} from '../events/engine-events';
import type { IEntitySnapshotProvider } from '../interfaces/entity-snapshot-provider.interface';
import type {
  ExecutionInstance,
  ExecutionStatus,
  NewStepResult,
  StepResultRecord,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import type { EntitySnapshot } from '../interfaces/rule-set.interface';
import type {
  StepDefinition,
  WorkflowDefinition,
} from '../interfaces/workflow-definition.interface';
import {
  ENTITY_SNAPSHOT_PROVIDER,
  EXECUTION_STORE,
  NURTURE_ENGINE_OPTIONS,
  TRIGGER_NAMESPACE,
} from '../nurture-engine.constants';
import { ActionDispatcher } from './action-dispatcher.service';
import { RuleGate } from './rule-gate.service';
import { StepScheduler } from './step-scheduler.service';
import { WorkflowDefinitionService } from './workflow-definition.service';

type StatusEventType =
  | EngineEventType.EXECUTION_COMPLETED
  | EngineEventType.EXECUTION_FAILED
  | EngineEventType.EXECUTION_PAUSED
  | EngineEventType.EXECUTION_RESUMED
  | EngineEventType.EXECUTION_CANCELLED;

/** `lost` means another writer changed the execution first. */
interface Progress {
  execution: ExecutionInstance;
  lost: boolean;
}

/**
 * Owns every status change of an execution. Each write is a compare-and-swap
 * on `version`; a write that loses the race leaves the newer state alone.
 */
@Injectable()
export class ExecutionStateMachine {
  private readonly logger = new Logger(ExecutionStateMachine.name);
  private readonly lifecycle = new ExecutionLifecycleEngine();

  constructor(
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    @Inject(ENTITY_SNAPSHOT_PROVIDER)
    private readonly snapshotProvider: IEntitySnapshotProvider,
    private readonly definitions: WorkflowDefinitionService,
    private readonly dispatcher: ActionDispatcher,
    private readonly scheduler: StepScheduler,
    private readonly ruleGate: RuleGate,
    private readonly eventEmitter: EventEmitter2,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: Pick<
      ResolvedEngineOptions,
      'clock' | 'maxCasAttempts'
    >,
  ) {
    this.scheduler.registerWakeHandler((executionId) =>
      this.wake(executionId),
    );
  }

  /**
   * Inserts a RUNNING execution unless the pair already has an active one.
   * @returns null when the dedupe invariant rejected the insert
   */
  async create(
    definition: WorkflowDefinition,
    entityId: string,
    triggerPayload: Record<string, unknown>,
  ): Promise<ExecutionInstance | null> {
    const now = this.options.clock();
    const execution: ExecutionInstance = {
      id: randomUUID(),
      workflowId: definition.id,
      entityId,
      status: 'RUNNING',
      currentStepIndex: 0,
      context: { [TRIGGER_NAMESPACE]: triggerPayload },
      retryCountForCurrentStep: 0,
      createdAt: now,
      updatedAt: now,
      nextWakeAt: null,
      completedAt: null,
      error: null,
      version: 1,
    };

    const inserted = await this.store.insertExecutionIfNoActive(execution);
    if (!inserted) {
      this.logger.debug(
        `Workflow ${definition.id} already active for entity ${entityId}`,
      );
      return null;
    }

    this.eventEmitter.emit(EngineEventType.EXECUTION_CREATED, {
      executionId: execution.id,
      workflowId: definition.id,
      entityId,
      triggerKind: definition.triggerKind,
      timestamp: now,
    } satisfies ExecutionCreatedEvent);
    this.logger.log(
      `Execution ${execution.id} created for workflow ${definition.id} / entity ${entityId}`,
    );

    return execution;
  }

  /**
   * Creates the execution and drives it to its first suspension point.
   */
  async start(
    definition: WorkflowDefinition,
    entityId: string,
    triggerPayload: Record<string, unknown>,
  ): Promise<ExecutionInstance | null> {
    const execution = await this.create(definition, entityId, triggerPayload);
    if (!execution) return null;
    return this.run(execution, definition);
  }

  /**
   * Advances a RUNNING execution until it waits, finishes or fails.
   */
  async run(
    execution: ExecutionInstance,
    definition: WorkflowDefinition,
  ): Promise<ExecutionInstance> {
    let current = execution;

    while (current.status === 'RUNNING') {
      let progress: Progress;
      try {
        progress = await this.advance(current, definition);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(
          `Execution ${current.id} step ${current.currentStepIndex} threw unexpectedly`,
          error instanceof Error ? error.stack : error,
        );
        progress = await this.finish(
          current,
          'fail',
          message,
          EngineEventType.EXECUTION_FAILED,
        );
      }

      if (progress.lost) {
        return this.reload(current);
      }
      current = progress.execution;
    }

    return current;
  }

  /**
   * Timer callback. Ignored unless the execution is still WAITING.
   */
  async wake(executionId: string): Promise<void> {
    const execution = await this.store.findExecution(executionId);
    if (!execution) {
      this.logger.debug(`Wake for unknown execution ${executionId} ignored`);
      return;
    }
    if (execution.status !== 'WAITING') {
      this.logger.debug(
        `Wake for execution ${executionId} ignored: status is ${execution.status}`,
      );
      return;
    }

    const definition = await this.definitions.get(execution.workflowId);
    if (!definition) {
      await this.finish(
        execution,
        'fail',
        `Workflow definition ${execution.workflowId} no longer exists`,
        EngineEventType.EXECUTION_FAILED,
      );
      return;
    }

    const claimed = this.next(execution, 'wake', { nextWakeAt: null });
    if (!(await this.commit(execution, claimed))) {
      this.logger.debug(`Wake for execution ${executionId} lost the claim`);
      return;
    }

    await this.run(claimed, definition);
  }

  async pause(executionId: string): Promise<ExecutionInstance> {
    return this.changeStatus(
      executionId,
      'pause',
      { nextWakeAt: null },
      EngineEventType.EXECUTION_PAUSED,
    );
  }

  /**
   * Back to RUNNING; the current step is dispatched again right away.
   */
  async resume(executionId: string): Promise<ExecutionInstance> {
    const resumed = await this.changeStatus(
      executionId,
      'resume',
      {},
      EngineEventType.EXECUTION_RESUMED,
    );

    const definition = await this.definitions.get(resumed.workflowId);
    if (!definition) {
      const failed = await this.finish(
        resumed,
        'fail',
        `Workflow definition ${resumed.workflowId} no longer exists`,
        EngineEventType.EXECUTION_FAILED,
      );
      return failed.lost ? this.reload(resumed) : failed.execution;
    }
    return this.run(resumed, definition);
  }

  async cancel(executionId: string, reason?: string): Promise<ExecutionInstance> {
    return this.changeStatus(
      executionId,
      'cancel',
      {
        nextWakeAt: null,
        completedAt: this.options.clock(),
        error: reason ?? null,
      },
      EngineEventType.EXECUTION_CANCELLED,
    );
  }

  async get(executionId: string): Promise<ExecutionInstance | null> {
    return this.store.findExecution(executionId);
  }

  async getOrThrow(executionId: string): Promise<ExecutionInstance> {
    const execution = await this.store.findExecution(executionId);
    if (!execution) {
      throw new ExecutionNotFoundError(executionId);
    }
    return execution;
  }

  async getHistory(executionId: string): Promise<StepResultRecord[]> {
    return this.store.findStepResults(executionId);
  }

  private async advance(
    current: ExecutionInstance,
    definition: WorkflowDefinition,
  ): Promise<Progress> {
    const step = definition.steps[current.currentStepIndex];
    if (!step) {
      return this.finish(current, 'complete', null, EngineEventType.EXECUTION_COMPLETED);
    }
    return (
      (await this.trySkip(current, definition, step)) ??
      (await this.dispatchStep(current, step))
    );
  }

  private async trySkip(
    current: ExecutionInstance,
    definition: WorkflowDefinition,
    step: StepDefinition,
  ): Promise<Progress | null> {
    if (!step.skipIf) return null;

    const scope = `skip:${definition.id}:${step.index}`;
    let snapshot: EntitySnapshot | null;
    try {
      snapshot = await this.snapshotProvider.getSnapshot(current.entityId);
    } catch (error) {
      this.ruleGate.reportFailure(
        scope,
        current.entityId,
        0,
        `snapshot unavailable: ${error instanceof Error ? error.message : String(error)}`,
        this.options.clock(),
      );
      return null;
    }
    if (!snapshot) {
      this.logger.warn(
        `Execution ${current.id}: no snapshot for entity ${current.entityId}; step ${step.index} skip condition not evaluated`,
      );
      return null;
    }

    const now = this.options.clock();
    const result = this.ruleGate.evaluate(
      scope,
      current.entityId,
      { ...snapshot, [TRIGGER_NAMESPACE]: current.context[TRIGGER_NAMESPACE] },
      step.skipIf,
      now,
    );
    if (result.status !== 'matched') return null;

    const next = this.next(current, null, {
      currentStepIndex: step.index + 1,
      retryCountForCurrentStep: 0,
    });
    const committed = await this.commit(current, next, {
      executionId: current.id,
      stepIndex: step.index,
      actionKind: step.actionKind,
      outcome: 'skipped',
      attempt: current.retryCountForCurrentStep + 1,
      output: null,
      error: null,
      recordedAt: now,
    });
    if (!committed) return { execution: current, lost: true };

    this.emitStep(
      EngineEventType.STEP_SKIPPED,
      next,
      step,
      current.retryCountForCurrentStep + 1,
    );
    return { execution: next, lost: false };
  }

  private async dispatchStep(
    current: ExecutionInstance,
    step: StepDefinition,
  ): Promise<Progress> {
    const attempt = current.retryCountForCurrentStep + 1;
    const result = await this.dispatcher.dispatch(step.actionKind, step.parameters, {
      executionId: current.id,
      workflowId: current.workflowId,
      entityId: current.entityId,
      stepIndex: step.index,
      attempt,
      context: current.context,
    });
    const now = this.options.clock();

    if (result.success) {
      const output = result.output ?? {};
      const waits = step.delayMs > 0;
      const next = this.next(current, waits ? 'wait' : null, {
        context: { ...current.context, [`step_${step.index}`]: output },
        currentStepIndex: step.index + 1,
        retryCountForCurrentStep: 0,
        nextWakeAt: waits ? this.scheduler.computeWakeAt(now, step.delayMs) : null,
        error: null,
      });

      const committed = await this.commit(current, next, {
        executionId: current.id,
        stepIndex: step.index,
        actionKind: step.actionKind,
        outcome: 'succeeded',
        attempt,
        output,
        error: null,
        recordedAt: now,
      });
      if (!committed) return { execution: current, lost: true };

      this.emitStep(EngineEventType.STEP_COMPLETED, next, step, attempt);
      if (waits) {
        await this.suspend(next, step.delayMs);
      }
      return { execution: next, lost: false };
    }

    const decision = this.dispatcher.planRetry(
      result,
      current.retryCountForCurrentStep,
      step.maxRetries,
    );
    const stepResult: NewStepResult = {
      executionId: current.id,
      stepIndex: step.index,
      actionKind: step.actionKind,
      outcome: decision.retry ? 'retry_scheduled' : 'failed',
      attempt,
      output: null,
      error: result.error ?? null,
      recordedAt: now,
    };

    if (!decision.retry) {
      return this.finish(
        current,
        'fail',
        result.error ?? `Step ${step.index} failed`,
        EngineEventType.EXECUTION_FAILED,
        stepResult,
      );
    }

    const nextWakeAt = this.scheduler.computeWakeAt(now, decision.delayMs);
    const next = this.next(current, 'wait', {
      retryCountForCurrentStep: decision.retryCount,
      nextWakeAt,
      error: result.error ?? null,
    });
    if (!(await this.commit(current, next, stepResult))) {
      return { execution: current, lost: true };
    }

    this.eventEmitter.emit(EngineEventType.STEP_RETRY_SCHEDULED, {
      ...this.stepEvent(next, step, attempt),
      error: result.error ?? null,
      retryCount: decision.retryCount,
      nextWakeAt,
    } satisfies StepRetryScheduledEvent);
    this.logger.warn(
      `Execution ${current.id} step ${step.index} failed (attempt ${attempt}); retry ${decision.retryCount}/${step.maxRetries} in ${decision.delayMs}ms`,
    );

    await this.scheduler.scheduleWake(next.id, decision.delayMs);
    return { execution: next, lost: false };
  }

  private async suspend(
    execution: ExecutionInstance,
    delayMs: number,
  ): Promise<void> {
    if (!execution.nextWakeAt) return;

    this.eventEmitter.emit(EngineEventType.EXECUTION_WAITING, {
      executionId: execution.id,
      workflowId: execution.workflowId,
      entityId: execution.entityId,
      stepIndex: execution.currentStepIndex,
      nextWakeAt: execution.nextWakeAt,
      timestamp: execution.updatedAt,
    } satisfies ExecutionWaitingEvent);

    await this.scheduler.scheduleWake(execution.id, delayMs);
  }

  private async finish(
    current: ExecutionInstance,
    transition: 'complete' | 'fail',
    error: string | null,
    eventType: StatusEventType,
    stepResult?: NewStepResult,
  ): Promise<Progress> {
    const next = this.next(current, transition, {
      nextWakeAt: null,
      completedAt: this.options.clock(),
      error,
    });
    if (!(await this.commit(current, next, stepResult))) {
      return { execution: current, lost: true };
    }

    this.emitStatus(eventType, current.status, next);
    if (transition === 'fail') {
      this.logger.warn(`Execution ${next.id} failed: ${error ?? 'unknown error'}`);
    } else {
      this.logger.log(`Execution ${next.id} completed`);
    }
    return { execution: next, lost: false };
  }

  /**
   * Operator-driven transitions, retried against concurrent writers.
   */
  private async changeStatus(
    executionId: string,
    transition: ExecutionTransition,
    changes: Partial<ExecutionInstance>,
    eventType: StatusEventType,
  ): Promise<ExecutionInstance> {
    for (let attempt = 1; attempt <= this.options.maxCasAttempts; attempt++) {
      const current = await this.getOrThrow(executionId);
      const next = this.next(current, transition, changes);

      if (await this.store.updateExecution(next, current.version)) {
        this.emitStatus(eventType, current.status, next);
        this.logger.log(
          `Execution ${executionId}: ${current.status} -> ${next.status}`,
        );
        return next;
      }

      this.logger.debug(
        `Execution ${executionId} changed during ${transition} (attempt ${attempt})`,
      );
    }

    throw new ConcurrentModificationError(
      executionId,
      this.options.maxCasAttempts,
    );
  }

  private next(
    current: ExecutionInstance,
    transition: ExecutionTransition | null,
    changes: Partial<ExecutionInstance>,
  ): ExecutionInstance {
    const status: ExecutionStatus = transition
      ? this.lifecycle.transition(current.id, current.status, transition)
      : current.status;

    return {
      ...current,
      ...changes,
      status,
      updatedAt: this.options.clock(),
      version: current.version + 1,
    };
  }

  /**
   * @returns false when another writer got there first; the step result is
   * then kept as `discarded`
   */
  private async commit(
    current: ExecutionInstance,
    next: ExecutionInstance,
    stepResult?: NewStepResult,
  ): Promise<boolean> {
    const written = await this.store.updateExecution(
      next,
      current.version,
      stepResult,
    );
    if (written) return true;

    this.logger.warn(
      `Execution ${current.id} changed concurrently (expected version ${current.version}); ${next.status} not applied`,
    );
    if (stepResult) {
      await this.store.insertStepResult({
        ...stepResult,
        outcome: 'discarded',
        recordedAt: this.options.clock(),
      });
    }
    return false;
  }

  private async reload(current: ExecutionInstance): Promise<ExecutionInstance> {
    return (await this.store.findExecution(current.id)) ?? current;
  }

  private stepEvent(
    execution: ExecutionInstance,
    step: StepDefinition,
    attempt: number,
  ): StepEvent {
    return {
      executionId: execution.id,
      workflowId: execution.workflowId,
      entityId: execution.entityId,
      stepIndex: step.index,
      actionKind: step.actionKind,
      attempt,
      timestamp: execution.updatedAt,
    };
  }

  private emitStep(
    eventType: EngineEventType.STEP_COMPLETED | EngineEventType.STEP_SKIPPED,
    execution: ExecutionInstance,
    step: StepDefinition,
    attempt: number,
  ): void {
    this.eventEmitter.emit(eventType, this.stepEvent(execution, step, attempt));
  }

  private emitStatus(
    eventType: StatusEventType,
    fromStatus: ExecutionStatus,
    execution: ExecutionInstance,
  ): void {
    this.eventEmitter.emit(eventType, {
      executionId: execution.id,
      workflowId: execution.workflowId,
      entityId: execution.entityId,
      fromStatus,
      toStatus: execution.status,
      stepIndex: execution.currentStepIndex,
      error: execution.error,
      timestamp: execution.updatedAt,
    } satisfies ExecutionStatusEvent);
  }
}
