export class WorkflowDefinitionNotFoundError extends Error {
  constructor(public readonly definitionId: string) {
    super(`No workflow definition published with id "${definitionId}".`);
    this.name = 'WorkflowDefinitionNotFoundError';
  }
}
