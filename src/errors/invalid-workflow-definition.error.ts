export class InvalidWorkflowDefinitionError extends Error {
  constructor(
    public readonly definitionId: string,
    message: string,
  ) {
    super(`Workflow definition ${definitionId}: ${message}`);
    this.name = 'InvalidWorkflowDefinitionError';
  }
}
