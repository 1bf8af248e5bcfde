export class SegmentNotFoundError extends Error {
  constructor(public readonly segmentId: string) {
    super(`No segment defined with id "${segmentId}".`);
    this.name = 'SegmentNotFoundError';
  }
}
