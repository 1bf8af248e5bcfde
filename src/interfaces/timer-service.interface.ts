/**
 * Delivers wake-ups for waiting executions. Implementations must survive a
 * process restart; the wake time itself is already persisted on the execution.
 */
export interface ITimerService {
  scheduleWake(executionId: string, delayMs: number): Promise<void>;
}
