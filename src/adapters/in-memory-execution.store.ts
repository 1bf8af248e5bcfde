import { randomUUID } from 'crypto';
import type {
  ExecutionInstance,
  NewStepResult,
  StepResultRecord,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import { isActiveStatus } from '../utils/execution-status';

function cloneJson(value: Record<string, unknown>): Record<string, unknown> {
  return structuredClone(value);
}

function cloneDate(value: Date | null): Date | null {
  return value ? new Date(value) : null;
}

function cloneDefinition(definition: WorkflowDefinition): WorkflowDefinition {
  return {
    ...definition,
    entryRules: definition.entryRules.map((rule) => ({ ...rule })),
    steps: definition.steps.map((step) => ({
      ...step,
      parameters: cloneJson(step.parameters),
      ...(step.skipIf ? { skipIf: step.skipIf.map((rule) => ({ ...rule })) } : {}),
    })),
    createdAt: new Date(definition.createdAt),
  };
}

function cloneExecution(execution: ExecutionInstance): ExecutionInstance {
  return {
    ...execution,
    context: cloneJson(execution.context),
    createdAt: new Date(execution.createdAt),
    updatedAt: new Date(execution.updatedAt),
    nextWakeAt: cloneDate(execution.nextWakeAt),
    completedAt: cloneDate(execution.completedAt),
  };
}

function cloneStepResult(record: StepResultRecord): StepResultRecord {
  return {
    ...record,
    output: record.output ? cloneJson(record.output) : null,
    recordedAt: new Date(record.recordedAt),
  };
}

/**
 * Single-process store. Every method finishes its check and write without
 * awaiting, so conditional inserts and version checks are atomic.
 */
export class InMemoryExecutionStore implements IExecutionStore {
  private readonly definitions = new Map<string, WorkflowDefinition>();
  private readonly executions = new Map<string, ExecutionInstance>();
  private readonly stepResults: StepResultRecord[] = [];

  async insertDefinition(definition: WorkflowDefinition): Promise<boolean> {
    if (this.definitions.has(definition.id)) return false;
    this.definitions.set(definition.id, cloneDefinition(definition));
    return true;
  }

  async findDefinition(id: string): Promise<WorkflowDefinition | null> {
    const definition = this.definitions.get(id);
    return definition ? cloneDefinition(definition) : null;
  }

  async findActiveDefinitions(
    triggerKind: string,
  ): Promise<WorkflowDefinition[]> {
    return Array.from(this.definitions.values())
      .filter((d) => d.isActive && d.triggerKind === triggerKind)
      .sort(
        (a, b) =>
          a.createdAt.getTime() - b.createdAt.getTime() ||
          a.id.localeCompare(b.id),
      )
      .map(cloneDefinition);
  }

  async setDefinitionActive(id: string, isActive: boolean): Promise<boolean> {
    const definition = this.definitions.get(id);
    if (!definition) return false;
    this.definitions.set(id, { ...definition, isActive });
    return true;
  }

  async insertExecutionIfNoActive(
    execution: ExecutionInstance,
  ): Promise<boolean> {
    if (this.findActive(execution.workflowId, execution.entityId)) {
      return false;
    }
    this.executions.set(execution.id, cloneExecution(execution));
    return true;
  }

  async findExecution(id: string): Promise<ExecutionInstance | null> {
    const execution = this.executions.get(id);
    return execution ? cloneExecution(execution) : null;
  }

  async findActiveExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null> {
    const execution = this.findActive(workflowId, entityId);
    return execution ? cloneExecution(execution) : null;
  }

  async findLatestFinishedExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null> {
    let latest: ExecutionInstance | null = null;
    for (const execution of this.executions.values()) {
      if (
        execution.workflowId !== workflowId ||
        execution.entityId !== entityId ||
        (execution.status !== 'COMPLETED' && execution.status !== 'FAILED') ||
        !execution.completedAt
      ) {
        continue;
      }
      if (
        !latest?.completedAt ||
        execution.completedAt.getTime() > latest.completedAt.getTime()
      ) {
        latest = execution;
      }
    }
    return latest ? cloneExecution(latest) : null;
  }

  async countExecutions(workflowId: string, entityId: string): Promise<number> {
    let count = 0;
    for (const execution of this.executions.values()) {
      if (execution.workflowId === workflowId && execution.entityId === entityId) {
        count++;
      }
    }
    return count;
  }

  async updateExecution(
    execution: ExecutionInstance,
    expectedVersion: number,
    stepResult?: NewStepResult,
  ): Promise<boolean> {
    const stored = this.executions.get(execution.id);
    if (!stored || stored.version !== expectedVersion) {
      return false;
    }
    this.executions.set(execution.id, cloneExecution(execution));
    if (stepResult) {
      this.appendStepResult(stepResult);
    }
    return true;
  }

  async findDueExecutions(
    now: Date,
    limit: number,
    after?: Date,
  ): Promise<ExecutionInstance[]> {
    const due: ExecutionInstance[] = [];
    for (const execution of this.executions.values()) {
      const wakeAt = execution.nextWakeAt?.getTime();
      if (
        execution.status === 'WAITING' &&
        wakeAt !== undefined &&
        wakeAt <= now.getTime() &&
        (!after || wakeAt > after.getTime())
      ) {
        due.push(execution);
      }
    }

    return due
      .sort(
        (a, b) =>
          (a.nextWakeAt?.getTime() ?? 0) - (b.nextWakeAt?.getTime() ?? 0) ||
          a.id.localeCompare(b.id),
      )
      .slice(0, limit)
      .map(cloneExecution);
  }

  async findExecutionsByWorkflow(
    workflowId: string,
    createdSince: Date,
  ): Promise<ExecutionInstance[]> {
    return Array.from(this.executions.values())
      .filter(
        (e) =>
          e.workflowId === workflowId &&
          e.createdAt.getTime() >= createdSince.getTime(),
      )
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(cloneExecution);
  }

  async insertStepResult(stepResult: NewStepResult): Promise<void> {
    this.appendStepResult(stepResult);
  }

  async findStepResults(executionId: string): Promise<StepResultRecord[]> {
    return this.stepResults
      .filter((record) => record.executionId === executionId)
      .map(cloneStepResult);
  }

  private findActive(
    workflowId: string,
    entityId: string,
  ): ExecutionInstance | undefined {
    for (const execution of this.executions.values()) {
      if (
        execution.workflowId === workflowId &&
        execution.entityId === entityId &&
        isActiveStatus(execution.status)
      ) {
        return execution;
      }
    }
    return undefined;
  }

  private appendStepResult(stepResult: NewStepResult): void {
    this.stepResults.push({
      ...stepResult,
      id: randomUUID(),
      output: stepResult.output ? cloneJson(stepResult.output) : null,
      recordedAt: new Date(stepResult.recordedAt),
    });
  }
}
