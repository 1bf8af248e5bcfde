import type { WorkflowDefinition } from './workflow-definition.interface';
import type {
  ExecutionInstance,
  NewStepResult,
  StepResultRecord,
} from './execution-records.interface';

export interface IExecutionStore {
  /**
   * Insert a published definition.
   * @returns false when a definition with the same id already exists
   */
  insertDefinition(definition: WorkflowDefinition): Promise<boolean>;

  findDefinition(id: string): Promise<WorkflowDefinition | null>;

  findActiveDefinitions(triggerKind: string): Promise<WorkflowDefinition[]>;

  /**
   * @returns false when the definition does not exist
   */
  setDefinitionActive(id: string, isActive: boolean): Promise<boolean>;

  /**
   * Atomically insert the execution unless the same (workflowId, entityId)
   * pair already has a RUNNING, WAITING or PAUSED execution.
   * @returns false when an active execution already exists
   */
  insertExecutionIfNoActive(execution: ExecutionInstance): Promise<boolean>;

  findExecution(id: string): Promise<ExecutionInstance | null>;

  findActiveExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null>;

  /**
   * Most recently finished COMPLETED or FAILED execution of the pair.
   */
  findLatestFinishedExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null>;

  countExecutions(workflowId: string, entityId: string): Promise<number>;

  /**
   * Compare-and-swap write. Persists `execution` only if the stored row still
   * carries `expectedVersion`, and records `stepResult` in the same unit of work.
   * @returns false when the row changed since it was read
   */
  updateExecution(
    execution: ExecutionInstance,
    expectedVersion: number,
    stepResult?: NewStepResult,
  ): Promise<boolean>;

  /**
   * WAITING executions with `after < nextWakeAt <= now`, oldest first.
   * Without `after` every wake at or before `now` matches.
   */
  findDueExecutions(
    now: Date,
    limit: number,
    after?: Date,
  ): Promise<ExecutionInstance[]>;

  findExecutionsByWorkflow(
    workflowId: string,
    createdSince: Date,
  ): Promise<ExecutionInstance[]>;

  insertStepResult(stepResult: NewStepResult): Promise<void>;

  findStepResults(executionId: string): Promise<StepResultRecord[]>;
}
