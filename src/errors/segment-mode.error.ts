export class SegmentModeError extends Error {
  constructor(
    public readonly segmentId: string,
    public readonly operation: 'recalculate' | 'manual-edit',
  ) {
    super(
      operation === 'recalculate'
        ? `Segment ${segmentId} is static; only dynamic segments are recalculated.`
        : `Segment ${segmentId} is dynamic; its membership is written only by recalculation.`,
    );
    this.name = 'SegmentModeError';
  }
}
