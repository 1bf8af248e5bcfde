export class DuplicateActionHandlerError extends Error {
  constructor(
    public readonly actionKind: string,
    public readonly handler1: string,
    public readonly handler2: string,
  ) {
    super(
      `Duplicate action handler for kind "${actionKind}". ` +
        `Both ${handler1} and ${handler2} are registered for the same kind.`,
    );
    this.name = 'DuplicateActionHandlerError';
  }
}
