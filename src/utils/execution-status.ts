import type { ExecutionStatus } from '../interfaces/execution-records.interface';

export const ACTIVE_STATUSES: readonly ExecutionStatus[] = [
  'RUNNING',
  'WAITING',
  'PAUSED',
];

export const TERMINAL_STATUSES: readonly ExecutionStatus[] = [
  'COMPLETED',
  'FAILED',
  'CANCELLED',
];

export function isActiveStatus(status: ExecutionStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminalStatus(status: ExecutionStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isExecutionStatus(value: unknown): value is ExecutionStatus {
  return (
    ACTIVE_STATUSES.some((s) => s === value) ||
    TERMINAL_STATUSES.some((s) => s === value)
  );
}
