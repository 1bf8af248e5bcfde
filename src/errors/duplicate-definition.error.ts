export class DuplicateDefinitionError extends Error {
  constructor(
    public readonly kind: 'workflow' | 'segment',
    public readonly definitionId: string,
  ) {
    super(
      `Duplicate ${kind} definition "${definitionId}". ` +
        `Published definitions are immutable; publish a new version under a new id.`,
    );
    this.name = 'DuplicateDefinitionError';
  }
}
