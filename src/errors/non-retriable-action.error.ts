/**
 * Thrown by action handlers to fail the step without retrying it.
 */
export class NonRetriableActionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NonRetriableActionError';
  }
}
