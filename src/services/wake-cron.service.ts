import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { EngineEventType } from '../events/engine-event-type.enum';
import type { ExecutionStuckEvent } from '../events/engine-events';
import type { ExecutionInstance } from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import {
  EXECUTION_STORE,
  NURTURE_ENGINE_OPTIONS,
  WAKE_CRON_JOB_NAME,
} from '../nurture-engine.constants';
import { StepScheduler } from './step-scheduler.service';

export type WakeCronOptions = Pick<
  ResolvedEngineOptions,
  | 'wakeCronExpression'
  | 'enableWakeCron'
  | 'wakeBatchSize'
  | 'stuckThresholdMs'
  | 'clock'
>;

export interface WakeProcessingFailure {
  executionId: string;
  error: string;
}

export interface StuckExecution {
  executionId: string;
  workflowId: string;
  nextWakeAt: Date;
  overdueMs: number;
}

export interface WakeProcessingResult {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  dueFound: number;
  attempted: number;
  succeeded: number;
  failed: number;
  stuck: number;
  failures: WakeProcessingFailure[];
  stuckExecutions: StuckExecution[];
}

/**
 * Delivers persisted wakes. Each tick loads WAITING executions whose wake
 * time has passed and hands them to StepScheduler.onWake.
 */
@Injectable()
export class WakeCronService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(WakeCronService.name);
  private job: CronJob | null = null;
  private running = false;

  constructor(
    private readonly scheduler: StepScheduler,
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    private readonly eventEmitter: EventEmitter2,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: WakeCronOptions,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableWakeCron) {
      this.logger.log('Wake cron disabled by configuration');
      return;
    }

    this.job = new CronJob(this.options.wakeCronExpression, () => {
      this.tick();
    });
    this.job.start();
    this.logger.log(
      `Wake cron ${WAKE_CRON_JOB_NAME} registered with expression: ${this.options.wakeCronExpression}`,
    );
  }

  onModuleDestroy(): void {
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
  }

  tick(): void {
    if (this.running) {
      this.logger.debug('Previous wake sweep still running; tick skipped');
      return;
    }

    this.running = true;
    this.processDueWakes()
      .then((summary) => {
        if (summary.dueFound > 0) {
          this.logger.log(
            `Wake cron summary: due=${summary.dueFound}, attempted=${summary.attempted}, succeeded=${summary.succeeded}, failed=${summary.failed}, stuck=${summary.stuck}, durationMs=${summary.durationMs}`,
          );
        }
      })
      .catch((err) => {
        this.logger.error(
          'Unhandled error in wake cron',
          err instanceof Error ? err.stack : err,
        );
      })
      .finally(() => {
        this.running = false;
      });
  }

  async processDueWakes(): Promise<WakeProcessingResult> {
    const startedAt = this.options.clock();
    const summary: WakeProcessingResult = {
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      dueFound: 0,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      stuck: 0,
      failures: [],
      stuckExecutions: [],
    };

    const stuckCutoff = new Date(
      startedAt.getTime() - this.options.stuckThresholdMs,
    );
    const stuck = await this.store.findDueExecutions(
      stuckCutoff,
      this.options.wakeBatchSize,
    );
    const due = await this.store.findDueExecutions(
      startedAt,
      this.options.wakeBatchSize,
      stuckCutoff,
    );
    summary.dueFound = stuck.length + due.length;

    for (const execution of stuck) {
      this.reportStuck(execution, startedAt, summary);
    }

    for (const execution of due) {
      summary.attempted++;
      try {
        await this.scheduler.onWake(execution.id);
        summary.succeeded++;
      } catch (error) {
        summary.failed++;
        summary.failures.push({
          executionId: execution.id,
          error: error instanceof Error ? error.message : String(error),
        });

        // keep waking the rest of the batch
        this.logger.error(
          `Failed to wake execution ${execution.id}`,
          error instanceof Error ? error.stack : error,
        );
      }
    }

    summary.finishedAt = this.options.clock();
    summary.durationMs =
      summary.finishedAt.getTime() - summary.startedAt.getTime();

    return summary;
  }

  private reportStuck(
    execution: ExecutionInstance,
    now: Date,
    summary: WakeProcessingResult,
  ): void {
    const nextWakeAt = execution.nextWakeAt ?? now;
    const overdueMs = now.getTime() - nextWakeAt.getTime();

    summary.stuck++;
    summary.stuckExecutions.push({
      executionId: execution.id,
      workflowId: execution.workflowId,
      nextWakeAt,
      overdueMs,
    });
    this.eventEmitter.emit(EngineEventType.EXECUTION_STUCK, {
      executionId: execution.id,
      workflowId: execution.workflowId,
      entityId: execution.entityId,
      nextWakeAt,
      overdueMs,
      timestamp: now,
    } satisfies ExecutionStuckEvent);
    this.logger.warn(
      `Execution ${execution.id} is stuck: wake overdue by ${overdueMs}ms`,
    );
  }
}
