import type { RuleSet } from './rule-set.interface';

export interface SegmentDefinition {
  id: string;
  name: string;
  rules: RuleSet;
  isDynamic: boolean;
  isActive: boolean;
  /** Lower value wins when an entity belongs to several segments. */
  priority: number;
  memberCount: number;
  lastCalculatedAt: Date | null;
  createdAt: Date;
}

export interface SegmentDefinitionInput {
  id: string;
  name?: string;
  rules: RuleSet;
  isDynamic?: boolean;
  isActive?: boolean;
  priority?: number;
}

export type MembershipSource = 'recalculation' | 'manual';

export interface SegmentMembership {
  id: string;
  segmentId: string;
  entityId: string;
  joinedAt: Date;
  leftAt: Date | null;
  addedBy: MembershipSource;
  reason: string;
  leaveReason: string | null;
}

export interface MembershipChangeSet {
  added: string[];
  removed: string[];
}

export interface MembershipChangeMeta {
  source: MembershipSource;
  reason: string;
  at: Date;
}

export interface EntityEvaluationFailure {
  entityId: string;
  error: string;
}

export interface SegmentRecalculationResult {
  segmentId: string;
  added: string[];
  removed: string[];
  total: number;
  failures: EntityEvaluationFailure[];
}
