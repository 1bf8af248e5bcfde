export class ConcurrentModificationError extends Error {
  constructor(
    public readonly executionId: string,
    public readonly attempts: number,
  ) {
    super(
      `Execution ${executionId} kept changing concurrently; gave up after ${attempts} attempt(s).`,
    );
    this.name = 'ConcurrentModificationError';
  }
}
