import type {
  MembershipChangeMeta,
  MembershipChangeSet,
  SegmentDefinition,
  SegmentMembership,
} from './segment.interface';

export interface SegmentQuery {
  dynamicOnly?: boolean;
  activeOnly?: boolean;
}

export interface ISegmentStore {
  /**
   * @returns false when a segment with the same id already exists
   */
  insertSegment(segment: SegmentDefinition): Promise<boolean>;

  findSegment(id: string): Promise<SegmentDefinition | null>;

  /** Ordered by priority, then id. */
  findSegments(query?: SegmentQuery): Promise<SegmentDefinition[]>;

  findActiveMemberIds(segmentId: string): Promise<string[]>;

  findActiveMemberships(entityId: string): Promise<SegmentMembership[]>;

  /** Open and closed memberships of the pair, oldest first. */
  findMembershipHistory(
    segmentId: string,
    entityId: string,
  ): Promise<SegmentMembership[]>;

  /**
   * Opens a membership for every added entity without an active one and
   * closes (sets left_at) the active membership of every removed entity.
   * Entities already in the requested state are left untouched.
   */
  applyMembershipChanges(
    segmentId: string,
    changes: MembershipChangeSet,
    meta: MembershipChangeMeta,
  ): Promise<void>;

  markCalculated(
    segmentId: string,
    calculatedAt: Date,
    memberCount: number,
  ): Promise<void>;
}
