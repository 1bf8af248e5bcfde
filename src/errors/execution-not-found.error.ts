export class ExecutionNotFoundError extends Error {
  constructor(public readonly executionId: string) {
    super(`No workflow execution found with id "${executionId}".`);
    this.name = 'ExecutionNotFoundError';
  }
}
