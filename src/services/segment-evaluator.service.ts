import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DuplicateDefinitionError } from '../errors/duplicate-definition.error';
import { InvalidSegmentDefinitionError } from '../errors/invalid-segment-definition.error';
import { SegmentModeError } from '../errors/segment-mode.error';
import { SegmentNotFoundError } from '../errors/segment-not-found.error';
import { EngineEventType } from '../events/engine-event-type.enum';
import type {
  SegmentDefinedEvent,
  SegmentRecalculatedEvent,
} from '../events/engine-events';
import type { IEntitySnapshotProvider } from '../interfaces/entity-snapshot-provider.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import type {
  EntityEvaluationFailure,
  SegmentDefinition,
  SegmentDefinitionInput,
  SegmentMembership,
  SegmentRecalculationResult,
} from '../interfaces/segment.interface';
import type { ISegmentStore } from '../interfaces/segment-store.interface';
import {
  ENTITY_SNAPSHOT_PROVIDER,
  NURTURE_ENGINE_OPTIONS,
  SEGMENT_STORE,
} from '../nurture-engine.constants';
import { KeyedMutex } from '../utils/keyed-mutex';
import { TtlCache } from '../utils/ttl-cache';
import { RuleEvaluator } from './rule-evaluator.service';
import { RuleGate } from './rule-gate.service';

export interface SegmentFailure {
  segmentId: string;
  error: string;
}

export interface RecalculateAllResult {
  results: SegmentRecalculationResult[];
  failures: SegmentFailure[];
}

export interface EntitySegmentChanges {
  entityId: string;
  joined: string[];
  left: string[];
  failures: SegmentFailure[];
}

const ACTIVE_DYNAMIC_KEY = 'active-dynamic';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class SegmentEvaluator {
  private readonly logger = new Logger(SegmentEvaluator.name);
  private readonly mutex = new KeyedMutex();
  private readonly dynamicSegments: TtlCache<string, SegmentDefinition[]>;

  constructor(
    @Inject(SEGMENT_STORE) private readonly store: ISegmentStore,
    @Inject(ENTITY_SNAPSHOT_PROVIDER)
    private readonly snapshotProvider: IEntitySnapshotProvider,
    private readonly evaluator: RuleEvaluator,
    private readonly ruleGate: RuleGate,
    private readonly eventEmitter: EventEmitter2,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: Pick<
      ResolvedEngineOptions,
      'definitionCacheTtlMs' | 'clock'
    >,
  ) {
    this.dynamicSegments = new TtlCache(options.definitionCacheTtlMs, () =>
      options.clock().getTime(),
    );
    this.eventEmitter.on(EngineEventType.SEGMENT_DEFINED, () =>
      this.dynamicSegments.clear(),
    );
  }

  /**
   * Stores a new segment. A dynamic segment is calculated right away.
   */
  async define(input: SegmentDefinitionInput): Promise<SegmentDefinition> {
    if (!input.id || typeof input.id !== 'string') {
      throw new InvalidSegmentDefinitionError(
        String(input.id),
        'id must be a non-empty string',
      );
    }
    if (!Array.isArray(input.rules)) {
      throw new InvalidSegmentDefinitionError(input.id, 'rules must be an array');
    }
    const isDynamic = input.isDynamic ?? true;
    if (isDynamic && input.rules.length === 0) {
      throw new InvalidSegmentDefinitionError(
        input.id,
        'a dynamic segment needs at least one rule',
      );
    }
    this.evaluator.validate(input.rules, `segment ${input.id} rules`);

    const segment: SegmentDefinition = {
      id: input.id,
      name: input.name ?? input.id,
      rules: input.rules,
      isDynamic,
      isActive: input.isActive ?? true,
      priority: input.priority ?? 0,
      memberCount: 0,
      lastCalculatedAt: null,
      createdAt: this.options.clock(),
    };

    const inserted = await this.store.insertSegment(segment);
    if (!inserted) {
      throw new DuplicateDefinitionError('segment', segment.id);
    }

    this.eventEmitter.emit(EngineEventType.SEGMENT_DEFINED, {
      segmentId: segment.id,
      isDynamic: segment.isDynamic,
      timestamp: segment.createdAt,
    } satisfies SegmentDefinedEvent);
    this.logger.log(
      `Defined ${segment.isDynamic ? 'dynamic' : 'static'} segment ${segment.id}`,
    );

    if (segment.isDynamic && segment.isActive) {
      await this.recalculate(segment.id);
      return (await this.store.findSegment(segment.id)) ?? segment;
    }
    return segment;
  }

  /**
   * Re-evaluates every entity and applies the membership diff. Running it
   * twice on unchanged data changes nothing the second time.
   */
  async recalculate(segmentId: string): Promise<SegmentRecalculationResult> {
    const segment = await this.getOrThrow(segmentId);
    if (!segment.isDynamic) {
      throw new SegmentModeError(segmentId, 'recalculate');
    }

    return this.mutex.runExclusive(segmentId, () =>
      this.recalculateExclusive(segment),
    );
  }

  async recalculateAll(): Promise<RecalculateAllResult> {
    const segments = await this.store.findSegments({
      dynamicOnly: true,
      activeOnly: true,
    });

    const outcome: RecalculateAllResult = { results: [], failures: [] };
    for (const segment of segments) {
      try {
        outcome.results.push(await this.recalculate(segment.id));
      } catch (error) {
        outcome.failures.push({
          segmentId: segment.id,
          error: errorMessage(error),
        });
        this.logger.error(
          `Recalculation of segment ${segment.id} failed`,
          error instanceof Error ? error.stack : error,
        );
      }
    }
    return outcome;
  }

  /**
   * Incremental path after one entity changed: re-checks it against every
   * active dynamic segment.
   */
  async evaluateEntity(entityId: string): Promise<EntitySegmentChanges> {
    const changes: EntitySegmentChanges = {
      entityId,
      joined: [],
      left: [],
      failures: [],
    };

    const snapshot = await this.snapshotProvider.getSnapshot(entityId);
    if (!snapshot) {
      this.logger.debug(`Segment evaluation: unknown entity ${entityId}`);
      return changes;
    }

    const segments = await this.dynamicSegments.getOrLoad(
      ACTIVE_DYNAMIC_KEY,
      () => this.store.findSegments({ dynamicOnly: true, activeOnly: true }),
    );

    for (const segment of segments) {
      try {
        await this.mutex.runExclusive(segment.id, async () => {
          const now = this.options.clock();
          const result = this.ruleGate.evaluate(
            `segment:${segment.id}`,
            entityId,
            snapshot,
            segment.rules,
            now,
          );
          if (result.status === 'error') {
            changes.failures.push({ segmentId: segment.id, error: result.error });
            return;
          }

          const memberships = await this.store.findActiveMemberships(entityId);
          const isMember = memberships.some((m) => m.segmentId === segment.id);
          const qualifies = result.status === 'matched';

          if (qualifies && !isMember) {
            await this.store.applyMembershipChanges(
              segment.id,
              { added: [entityId], removed: [] },
              { source: 'recalculation', reason: 'entity matched segment rules', at: now },
            );
            changes.joined.push(segment.id);
          } else if (!qualifies && isMember) {
            await this.store.applyMembershipChanges(
              segment.id,
              { added: [], removed: [entityId] },
              { source: 'recalculation', reason: 'entity no longer matches segment rules', at: now },
            );
            changes.left.push(segment.id);
          }
        });
      } catch (error) {
        changes.failures.push({ segmentId: segment.id, error: errorMessage(error) });
        this.logger.error(
          `Segment ${segment.id}: evaluation of entity ${entityId} failed`,
          error instanceof Error ? error.stack : error,
        );
      }
    }

    return changes;
  }

  async addMember(
    segmentId: string,
    entityId: string,
    reason = 'added manually',
  ): Promise<void> {
    await this.editStaticMembership(segmentId, entityId, 'add', reason);
  }

  async removeMember(
    segmentId: string,
    entityId: string,
    reason = 'removed manually',
  ): Promise<void> {
    await this.editStaticMembership(segmentId, entityId, 'remove', reason);
  }

  async getMemberships(entityId: string): Promise<SegmentMembership[]> {
    return this.store.findActiveMemberships(entityId);
  }

  async getMembershipHistory(
    segmentId: string,
    entityId: string,
  ): Promise<SegmentMembership[]> {
    return this.store.findMembershipHistory(segmentId, entityId);
  }

  /**
   * The active segment with the lowest priority value the entity belongs to.
   */
  async getPrimarySegment(entityId: string): Promise<SegmentDefinition | null> {
    const memberships = await this.store.findActiveMemberships(entityId);
    if (memberships.length === 0) return null;

    const memberOf = new Set(memberships.map((m) => m.segmentId));
    const segments = await this.store.findSegments({ activeOnly: true });
    return segments.find((segment) => memberOf.has(segment.id)) ?? null;
  }

  async getOrThrow(segmentId: string): Promise<SegmentDefinition> {
    const segment = await this.store.findSegment(segmentId);
    if (!segment) {
      throw new SegmentNotFoundError(segmentId);
    }
    return segment;
  }

  private async recalculateExclusive(
    segment: SegmentDefinition,
  ): Promise<SegmentRecalculationResult> {
    const now = this.options.clock();
    const entityIds = await this.snapshotProvider.listEntityIds();
    const currentMembers = new Set(await this.store.findActiveMemberIds(segment.id));

    const qualifying = new Set<string>();
    const failed = new Set<string>();
    const failures: EntityEvaluationFailure[] = [];

    for (const entityId of entityIds) {
      try {
        const snapshot = await this.snapshotProvider.getSnapshot(entityId);
        if (!snapshot) {
          throw new Error('snapshot unavailable');
        }
        const result = this.ruleGate.evaluate(
          `segment:${segment.id}`,
          entityId,
          snapshot,
          segment.rules,
          now,
        );
        if (result.status === 'error') {
          throw new Error(`rule ${result.ruleIndex}: ${result.error}`);
        }
        if (result.status === 'matched') {
          qualifying.add(entityId);
        }
      } catch (error) {
        failed.add(entityId);
        failures.push({ entityId, error: errorMessage(error) });
      }
    }

    const added = [...qualifying].filter((id) => !currentMembers.has(id));
    const removed = [...currentMembers].filter(
      (id) => !qualifying.has(id) && !failed.has(id),
    );

    if (added.length > 0 || removed.length > 0) {
      await this.store.applyMembershipChanges(
        segment.id,
        { added, removed },
        { source: 'recalculation', reason: 'segment recalculation', at: now },
      );
    }

    const total = currentMembers.size + added.length - removed.length;
    await this.store.markCalculated(segment.id, now, total);

    this.eventEmitter.emit(EngineEventType.SEGMENT_RECALCULATED, {
      segmentId: segment.id,
      added: added.length,
      removed: removed.length,
      total,
      failures: failures.length,
      timestamp: now,
    } satisfies SegmentRecalculatedEvent);
    this.logger.log(
      `Segment ${segment.id} recalculated: +${added.length} -${removed.length} total=${total} failures=${failures.length}`,
    );

    return { segmentId: segment.id, added, removed, total, failures };
  }

  private async editStaticMembership(
    segmentId: string,
    entityId: string,
    operation: 'add' | 'remove',
    reason: string,
  ): Promise<void> {
    const segment = await this.getOrThrow(segmentId);
    if (segment.isDynamic) {
      throw new SegmentModeError(segmentId, 'manual-edit');
    }

    await this.mutex.runExclusive(segmentId, async () => {
      const now = this.options.clock();
      await this.store.applyMembershipChanges(
        segmentId,
        operation === 'add'
          ? { added: [entityId], removed: [] }
          : { added: [], removed: [entityId] },
        { source: 'manual', reason, at: now },
      );
      const members = await this.store.findActiveMemberIds(segmentId);
      await this.store.markCalculated(segmentId, now, members.length);
    });
  }
}
