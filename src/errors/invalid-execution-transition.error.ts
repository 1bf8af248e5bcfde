import type { ExecutionStatus } from '../interfaces/execution-records.interface';

export class InvalidExecutionTransitionError extends Error {
  constructor(
    public readonly executionId: string,
    public readonly fromStatus: ExecutionStatus,
    public readonly transition: string,
    public readonly terminal: boolean,
  ) {
    super(
      terminal
        ? `Execution ${executionId} is ${fromStatus} (terminal) and cannot ${transition}.`
        : `Execution ${executionId} cannot ${transition} from ${fromStatus}.`,
    );
    this.name = 'InvalidExecutionTransitionError';
  }
}
