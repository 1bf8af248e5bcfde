export class InvalidSegmentDefinitionError extends Error {
  constructor(
    public readonly segmentId: string,
    message: string,
  ) {
    super(`Segment definition ${segmentId}: ${message}`);
    this.name = 'InvalidSegmentDefinitionError';
  }
}
