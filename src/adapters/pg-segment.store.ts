import type { Pool, PoolClient } from 'pg';
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
import {
  SqlRow,
  toSegmentDefinition,
  toSegmentMembership,
} from './sql/row-mappers';
import { deriveTableNames, EngineTableNames } from './sql/table-names';

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

const SEGMENT_COLUMNS =
  'id, name, rules, is_dynamic, is_active, priority, member_count, last_calculated_at, created_at';

const MEMBERSHIP_COLUMNS =
  'id, segment_id, entity_id, joined_at, left_at, added_by, reason, leave_reason';

export class PgSegmentStore implements ISegmentStore {
  private readonly tables: EngineTableNames;

  constructor(
    private readonly pool: Pool,
    private readonly tablePrefix: string,
    private readonly client?: PoolClient,
  ) {
    this.tables = deriveTableNames(tablePrefix);
  }

  async insertSegment(segment: SegmentDefinition): Promise<boolean> {
    const result = await this.getConn().query(
      `INSERT INTO ${this.tables.segments} (${SEGMENT_COLUMNS})
       VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7, $8, $9)
       ON CONFLICT (id) DO NOTHING`,
      [
        segment.id,
        segment.name,
        JSON.stringify(segment.rules),
        segment.isDynamic,
        segment.isActive,
        segment.priority,
        segment.memberCount,
        segment.lastCalculatedAt,
        segment.createdAt,
      ],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findSegment(id: string): Promise<SegmentDefinition | null> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${SEGMENT_COLUMNS} FROM ${this.tables.segments} WHERE id = $1`,
      [id],
    );
    if (result.rows.length === 0) return null;
    return toSegmentDefinition(result.rows[0]);
  }

  async findSegments(query: SegmentQuery = {}): Promise<SegmentDefinition[]> {
    const conditions: string[] = [];
    if (query.dynamicOnly) conditions.push('is_dynamic = TRUE');
    if (query.activeOnly) conditions.push('is_active = TRUE');
    const where =
      conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';

    const result = await this.getConn().query<SqlRow>(
      `SELECT ${SEGMENT_COLUMNS} FROM ${this.tables.segments}${where}
       ORDER BY priority, id`,
    );
    return result.rows.map((row) => toSegmentDefinition(row));
  }

  async findActiveMemberIds(segmentId: string): Promise<string[]> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT entity_id FROM ${this.tables.memberships}
       WHERE segment_id = $1 AND left_at IS NULL
       ORDER BY entity_id`,
      [segmentId],
    );
    return result.rows.map((row) => String(row.entity_id));
  }

  async findActiveMemberships(entityId: string): Promise<SegmentMembership[]> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM ${this.tables.memberships}
       WHERE entity_id = $1 AND left_at IS NULL
       ORDER BY joined_at, segment_id`,
      [entityId],
    );
    return result.rows.map((row) => toSegmentMembership(row));
  }

  async findMembershipHistory(
    segmentId: string,
    entityId: string,
  ): Promise<SegmentMembership[]> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM ${this.tables.memberships}
       WHERE segment_id = $1 AND entity_id = $2
       ORDER BY joined_at, id`,
      [segmentId, entityId],
    );
    return result.rows.map((row) => toSegmentMembership(row));
  }

  async applyMembershipChanges(
    segmentId: string,
    changes: MembershipChangeSet,
    meta: MembershipChangeMeta,
  ): Promise<void> {
    if (changes.added.length === 0 && changes.removed.length === 0) return;

    await this.transaction(async (store) => {
      const conn = store.getConn();

      if (changes.added.length > 0) {
        await conn.query(
          `INSERT INTO ${this.tables.memberships}
           (id, segment_id, entity_id, joined_at, added_by, reason)
           SELECT gen_random_uuid(), $1, entity_id, $2, $3, $4
           FROM unnest($5::text[]) AS entity_id
           ON CONFLICT (segment_id, entity_id) WHERE left_at IS NULL DO NOTHING`,
          [segmentId, meta.at, meta.source, meta.reason, changes.added],
        );
      }

      if (changes.removed.length > 0) {
        await conn.query(
          `UPDATE ${this.tables.memberships}
           SET left_at = $3, leave_reason = $4
           WHERE segment_id = $1 AND entity_id = ANY($2::text[]) AND left_at IS NULL`,
          [segmentId, changes.removed, meta.at, meta.reason],
        );
      }
    });
  }

  async markCalculated(
    segmentId: string,
    calculatedAt: Date,
    memberCount: number,
  ): Promise<void> {
    await this.getConn().query(
      `UPDATE ${this.tables.segments}
       SET last_calculated_at = $2, member_count = $3
       WHERE id = $1`,
      [segmentId, calculatedAt, memberCount],
    );
  }

  async transaction<T>(cb: (store: PgSegmentStore) => Promise<T>): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txStore = new PgSegmentStore(this.pool, this.tablePrefix, client);
      const result = await cb(txStore);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
