import { randomUUID } from 'crypto';
import type {
  MembershipChangeMeta,
  MembershipChangeSet,
  SegmentDefinition,
  SegmentMembership,
} from '../interfaces/segment.interface';
import type {
  ISegmentStore,
  SegmentQuery,
} from '../interfaces/segment-store.interface';

function cloneSegment(segment: SegmentDefinition): SegmentDefinition {
  return {
    ...segment,
    rules: segment.rules.map((rule) => ({ ...rule })),
    lastCalculatedAt: segment.lastCalculatedAt
      ? new Date(segment.lastCalculatedAt)
      : null,
    createdAt: new Date(segment.createdAt),
  };
}

function cloneMembership(membership: SegmentMembership): SegmentMembership {
  return {
    ...membership,
    joinedAt: new Date(membership.joinedAt),
    leftAt: membership.leftAt ? new Date(membership.leftAt) : null,
  };
}

export class InMemorySegmentStore implements ISegmentStore {
  private readonly segments = new Map<string, SegmentDefinition>();
  private readonly memberships: SegmentMembership[] = [];

  async insertSegment(segment: SegmentDefinition): Promise<boolean> {
    if (this.segments.has(segment.id)) return false;
    this.segments.set(segment.id, cloneSegment(segment));
    return true;
  }

  async findSegment(id: string): Promise<SegmentDefinition | null> {
    const segment = this.segments.get(id);
    return segment ? cloneSegment(segment) : null;
  }

  async findSegments(query: SegmentQuery = {}): Promise<SegmentDefinition[]> {
    return Array.from(this.segments.values())
      .filter((s) => !query.dynamicOnly || s.isDynamic)
      .filter((s) => !query.activeOnly || s.isActive)
      .sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id))
      .map(cloneSegment);
  }

  async findActiveMemberIds(segmentId: string): Promise<string[]> {
    return this.memberships
      .filter((m) => m.segmentId === segmentId && m.leftAt === null)
      .map((m) => m.entityId)
      .sort();
  }

  async findActiveMemberships(entityId: string): Promise<SegmentMembership[]> {
    return this.memberships
      .filter((m) => m.entityId === entityId && m.leftAt === null)
      .map(cloneMembership);
  }

  async findMembershipHistory(
    segmentId: string,
    entityId: string,
  ): Promise<SegmentMembership[]> {
    return this.memberships
      .filter((m) => m.segmentId === segmentId && m.entityId === entityId)
      .map(cloneMembership);
  }

  async applyMembershipChanges(
    segmentId: string,
    changes: MembershipChangeSet,
    meta: MembershipChangeMeta,
  ): Promise<void> {
    for (const entityId of changes.added) {
      if (this.findOpen(segmentId, entityId)) continue;
      this.memberships.push({
        id: randomUUID(),
        segmentId,
        entityId,
        joinedAt: new Date(meta.at),
        leftAt: null,
        addedBy: meta.source,
        reason: meta.reason,
        leaveReason: null,
      });
    }

    for (const entityId of changes.removed) {
      const open = this.findOpen(segmentId, entityId);
      if (!open) continue;
      open.leftAt = new Date(meta.at);
      open.leaveReason = meta.reason;
    }
  }

  async markCalculated(
    segmentId: string,
    calculatedAt: Date,
    memberCount: number,
  ): Promise<void> {
    const segment = this.segments.get(segmentId);
    if (!segment) return;
    this.segments.set(segmentId, {
      ...segment,
      lastCalculatedAt: new Date(calculatedAt),
      memberCount,
    });
  }

  private findOpen(
    segmentId: string,
    entityId: string,
  ): SegmentMembership | undefined {
    return this.memberships.find(
      (m) =>
        m.segmentId === segmentId && m.entityId === entityId && m.leftAt === null,
    );
  }
}
