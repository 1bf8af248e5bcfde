import { Inject, Injectable } from '@nestjs/common';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import {
  EXECUTION_STORE,
  NURTURE_ENGINE_OPTIONS,
} from '../nurture-engine.constants';
import { isActiveStatus } from '../utils/execution-status';
import { WorkflowDefinitionService } from './workflow-definition.service';

export interface WorkflowMetrics {
  workflowId: string;
  workflowName: string;
  periodDays: number;
  totalExecutions: number;
  completedExecutions: number;
  failedExecutions: number;
  cancelledExecutions: number;
  activeExecutions: number;
  /** Percentages, rounded to two decimals. */
  completionRate: number;
  failureRate: number;
  /** Over completed executions only; null when none completed. */
  avgCompletionTimeHours: number | null;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

function percentage(part: number, total: number): number {
  if (total === 0) return 0;
  return Math.round((part / total) * 10000) / 100;
}

@Injectable()
export class WorkflowMetricsService {
  constructor(
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    private readonly definitions: WorkflowDefinitionService,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: Pick<ResolvedEngineOptions, 'clock'>,
  ) {}

  async getMetrics(workflowId: string, periodDays = 30): Promise<WorkflowMetrics> {
    const definition = await this.definitions.getOrThrow(workflowId);
    const since = new Date(this.options.clock().getTime() - periodDays * DAY_MS);
    const executions = await this.store.findExecutionsByWorkflow(workflowId, since);

    let completed = 0;
    let failed = 0;
    let cancelled = 0;
    let active = 0;
    let completionMs = 0;

    for (const execution of executions) {
      if (execution.status === 'COMPLETED') {
        completed++;
        if (execution.completedAt) {
          completionMs +=
            execution.completedAt.getTime() - execution.createdAt.getTime();
        }
      } else if (execution.status === 'FAILED') {
        failed++;
      } else if (execution.status === 'CANCELLED') {
        cancelled++;
      } else if (isActiveStatus(execution.status)) {
        active++;
      }
    }

    const total = executions.length;
    return {
      workflowId,
      workflowName: definition.name,
      periodDays,
      totalExecutions: total,
      completedExecutions: completed,
      failedExecutions: failed,
      cancelledExecutions: cancelled,
      activeExecutions: active,
      completionRate: percentage(completed, total),
      failureRate: percentage(failed, total),
      avgCompletionTimeHours:
        completed > 0
          ? Math.round((completionMs / completed / HOUR_MS) * 100) / 100
          : null,
    };
  }
}
