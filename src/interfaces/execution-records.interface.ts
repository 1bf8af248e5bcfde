export type ExecutionStatus =
  | 'RUNNING'
  | 'WAITING'
  | 'PAUSED'
  | 'COMPLETED'
  | 'FAILED'
  | 'CANCELLED';

export interface ExecutionInstance {
  id: string;
  workflowId: string;
  entityId: string;
  status: ExecutionStatus;
  currentStepIndex: number;
  context: Record<string, unknown>;
  retryCountForCurrentStep: number;
  createdAt: Date;
  updatedAt: Date;
  nextWakeAt: Date | null;
  /** Set when the execution reaches any terminal status. */
  completedAt: Date | null;
  error: string | null;
  /** Compare-and-swap token, incremented on every write. */
  version: number;
}

export type StepOutcome =
  | 'succeeded'
  | 'skipped'
  | 'retry_scheduled'
  | 'failed'
  | 'discarded';

export interface StepResultRecord {
  id: string;
  executionId: string;
  stepIndex: number;
  actionKind: string;
  outcome: StepOutcome;
  attempt: number;
  output: Record<string, unknown> | null;
  error: string | null;
  recordedAt: Date;
}

export type NewStepResult = Omit<StepResultRecord, 'id'>;
