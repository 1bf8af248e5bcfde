import type { ExecutionStatus } from '../interfaces/execution-records.interface';

export interface ExecutionCreatedEvent {
  executionId: string;
  workflowId: string;
  entityId: string;
  triggerKind: string;
  timestamp: Date;
}

export interface ExecutionStatusEvent {
  executionId: string;
  workflowId: string;
  entityId: string;
  fromStatus: ExecutionStatus;
  toStatus: ExecutionStatus;
  stepIndex: number;
  error: string | null;
  timestamp: Date;
}

export interface ExecutionWaitingEvent {
  executionId: string;
  workflowId: string;
  entityId: string;
  stepIndex: number;
  nextWakeAt: Date;
  timestamp: Date;
}

export interface ExecutionStuckEvent {
  executionId: string;
  workflowId: string;
  entityId: string;
  nextWakeAt: Date;
  overdueMs: number;
  timestamp: Date;
}

export interface StepEvent {
  executionId: string;
  workflowId: string;
  entityId: string;
  stepIndex: number;
  actionKind: string;
  attempt: number;
  timestamp: Date;
}

export interface StepRetryScheduledEvent extends StepEvent {
  error: string | null;
  retryCount: number;
  nextWakeAt: Date;
}

export interface RuleEvaluationFailedEvent {
  /** What the rule set gates, e.g. `entry:welcome-v1` or `segment:hot_leads`. */
  scope: string;
  entityId: string;
  ruleIndex: number;
  error: string;
  timestamp: Date;
}

export interface DefinitionChangedEvent {
  definitionId: string;
  triggerKind: string;
  isActive: boolean;
  timestamp: Date;
}

export interface SegmentDefinedEvent {
  segmentId: string;
  isDynamic: boolean;
  timestamp: Date;
}

export interface SegmentRecalculatedEvent {
  segmentId: string;
  added: number;
  removed: number;
  total: number;
  failures: number;
  timestamp: Date;
}
