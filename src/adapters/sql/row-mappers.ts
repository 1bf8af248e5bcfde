import type {
  ExecutionInstance,
  StepOutcome,
  StepResultRecord,
} from '../../interfaces/execution-records.interface';
import type {
  MembershipSource,
  SegmentDefinition,
  SegmentMembership,
} from '../../interfaces/segment.interface';
import type { WorkflowDefinition } from '../../interfaces/workflow-definition.interface';
import { isExecutionStatus } from '../../utils/execution-status';
import { parseRuleSet } from '../../utils/parse-rule-set';
import { parseStepDefinitions } from '../../utils/parse-workflow-definition';

export type SqlRow = Record<string, unknown>;

const STEP_OUTCOMES: readonly StepOutcome[] = [
  'succeeded',
  'skipped',
  'retry_scheduled',
  'failed',
  'discarded',
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Row array from a driver result. node-postgres wraps rows in `{ rows }`,
 * postgres-js returns the array itself.
 */
export function extractRows(result: unknown): SqlRow[] {
  const rows: unknown[] = Array.isArray(result)
    ? result
    : isRecord(result) && Array.isArray(result.rows)
      ? result.rows
      : [];
  return rows.filter(isRecord);
}

/** jsonb arrives parsed from pg, json/text columns as strings. */
export function parseJsonColumn(value: unknown): unknown {
  return typeof value === 'string' ? JSON.parse(value) : value;
}

function text(row: SqlRow, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`Column ${column} is not text`);
  }
  return value;
}

function nullableText(row: SqlRow, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : String(value);
}

/** pg returns BIGINT as a string. */
function integer(row: SqlRow, column: string): number {
  const value = Number(row[column]);
  if (!Number.isFinite(value)) {
    throw new Error(`Column ${column} is not numeric`);
  }
  return value;
}

function nullableInteger(row: SqlRow, column: string): number | null {
  const value = row[column];
  return value === null || value === undefined ? null : integer(row, column);
}

function timestamp(row: SqlRow, column: string): Date {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    return new Date(value);
  }
  throw new Error(`Column ${column} is not a timestamp`);
}

function nullableTimestamp(row: SqlRow, column: string): Date | null {
  const value = row[column];
  return value === null || value === undefined ? null : timestamp(row, column);
}

function jsonObject(row: SqlRow, column: string): Record<string, unknown> {
  const value = parseJsonColumn(row[column]);
  return isRecord(value) ? value : {};
}

function nullableJsonObject(
  row: SqlRow,
  column: string,
): Record<string, unknown> | null {
  const value = parseJsonColumn(row[column]);
  return isRecord(value) ? value : null;
}

export function toWorkflowDefinition(row: SqlRow): WorkflowDefinition {
  const id = text(row, 'id');
  return {
    id,
    name: text(row, 'name'),
    triggerKind: text(row, 'trigger_kind'),
    entryRules: parseRuleSet(
      parseJsonColumn(row.entry_rules),
      `workflow ${id} entry_rules`,
    ),
    steps: parseStepDefinitions(
      parseJsonColumn(row.steps),
      `workflow ${id} steps`,
    ),
    isActive: row.is_active === true,
    maxConcurrentPerEntity: integer(row, 'max_concurrent_per_entity'),
    maxExecutionsPerEntity: nullableInteger(row, 'max_executions_per_entity'),
    cooldownMs: integer(row, 'cooldown_ms'),
    createdAt: timestamp(row, 'created_at'),
  };
}

export function toExecutionInstance(row: SqlRow): ExecutionInstance {
  const status = row.status;
  if (!isExecutionStatus(status)) {
    throw new Error(`Unknown execution status ${String(status)}`);
  }
  return {
    id: text(row, 'id'),
    workflowId: text(row, 'workflow_id'),
    entityId: text(row, 'entity_id'),
    status,
    currentStepIndex: integer(row, 'current_step_index'),
    context: jsonObject(row, 'context'),
    retryCountForCurrentStep: integer(row, 'retry_count_for_current_step'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
    nextWakeAt: nullableTimestamp(row, 'next_wake_at'),
    completedAt: nullableTimestamp(row, 'completed_at'),
    error: nullableText(row, 'error'),
    version: integer(row, 'version'),
  };
}

export function toStepResultRecord(row: SqlRow): StepResultRecord {
  const outcome = STEP_OUTCOMES.find((o) => o === row.outcome);
  if (!outcome) {
    throw new Error(`Unknown step outcome ${String(row.outcome)}`);
  }
  return {
    id: text(row, 'id'),
    executionId: text(row, 'execution_id'),
    stepIndex: integer(row, 'step_index'),
    actionKind: text(row, 'action_kind'),
    outcome,
    attempt: integer(row, 'attempt'),
    output: nullableJsonObject(row, 'output'),
    error: nullableText(row, 'error'),
    recordedAt: timestamp(row, 'recorded_at'),
  };
}

export function toSegmentDefinition(row: SqlRow): SegmentDefinition {
  const id = text(row, 'id');
  return {
    id,
    name: text(row, 'name'),
    rules: parseRuleSet(parseJsonColumn(row.rules), `segment ${id} rules`),
    isDynamic: row.is_dynamic === true,
    isActive: row.is_active === true,
    priority: integer(row, 'priority'),
    memberCount: integer(row, 'member_count'),
    lastCalculatedAt: nullableTimestamp(row, 'last_calculated_at'),
    createdAt: timestamp(row, 'created_at'),
  };
}

export function toSegmentMembership(row: SqlRow): SegmentMembership {
  const addedBy: MembershipSource =
    row.added_by === 'manual' ? 'manual' : 'recalculation';
  return {
    id: text(row, 'id'),
    segmentId: text(row, 'segment_id'),
    entityId: text(row, 'entity_id'),
    joinedAt: timestamp(row, 'joined_at'),
    leftAt: nullableTimestamp(row, 'left_at'),
    addedBy,
    reason: text(row, 'reason'),
    leaveReason: nullableText(row, 'leave_reason'),
  };
}
