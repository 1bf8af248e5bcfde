import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { PgSegmentStore } from '../../src/adapters/pg-segment.store';
import { START } from '../helpers';

function createQueryResult<T extends QueryResultRow>(
  rows: T[] = [],
  rowCount?: number,
): QueryResult<T> {
  return {
    rows,
    rowCount: rowCount ?? rows.length,
    command: '',
    oid: 0,
    fields: [],
  };
}

function createMockPool() {
  const query = jest.fn<
    Promise<QueryResult<QueryResultRow>>,
    [string, unknown[]?]
  >();
  const release = jest.fn();
  const clientQuery = jest.fn<
    Promise<QueryResult<QueryResultRow>>,
    [string, unknown[]?]
  >();
  const connect = jest.fn<Promise<PoolClient>, []>().mockResolvedValue({
    query: clientQuery,
    release,
  } as unknown as PoolClient);

  const pool = { query, connect } as unknown as Pool;

  return { pool, query, connect, clientQuery, release };
}

describe('PgSegmentStore', () => {
  it('should filter segments and order them by priority', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(
      createQueryResult([
        {
          id: 'hot_leads',
          name: 'Hot leads',
          rules: [{ field: 'score', operator: 'gte', value: 80 }],
          is_dynamic: true,
          is_active: true,
          priority: 1,
          member_count: 4,
          last_calculated_at: '2025-01-01T00:00:00.000Z',
          created_at: '2024-12-01T00:00:00.000Z',
        },
      ]),
    );
    const store = new PgSegmentStore(pool, 'nurture');

    const segments = await store.findSegments({ dynamicOnly: true, activeOnly: true });

    expect(segments).toEqual([
      {
        id: 'hot_leads',
        name: 'Hot leads',
        rules: [{ field: 'score', operator: 'gte', value: 80 }],
        isDynamic: true,
        isActive: true,
        priority: 1,
        memberCount: 4,
        lastCalculatedAt: START,
        createdAt: new Date('2024-12-01T00:00:00.000Z'),
      },
    ]);
    const [text] = query.mock.calls[0];
    expect(text).toContain(
      'FROM nurture_segments WHERE is_dynamic = TRUE AND is_active = TRUE',
    );
    expect(text).toContain('ORDER BY priority, id');
  });

  it('should not filter without a query', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(createQueryResult([]));
    const store = new PgSegmentStore(pool, 'nurture');

    await store.findSegments();

    expect(query.mock.calls[0][0]).not.toContain('WHERE');
  });

  it('should map membership rows', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(
      createQueryResult([
        {
          id: 'm-1',
          segment_id: 'vip',
          entity_id: 'lead-1',
          joined_at: '2025-01-01T00:00:00.000Z',
          left_at: null,
          added_by: 'manual',
          reason: 'added manually',
          leave_reason: null,
        },
      ]),
    );
    const store = new PgSegmentStore(pool, 'nurture');

    await expect(store.findActiveMemberships('lead-1')).resolves.toEqual([
      {
        id: 'm-1',
        segmentId: 'vip',
        entityId: 'lead-1',
        joinedAt: START,
        leftAt: null,
        addedBy: 'manual',
        reason: 'added manually',
        leaveReason: null,
      },
    ]);
    expect(query.mock.calls[0][0]).toContain('FROM nurture_segment_memberships');
  });

  describe('applyMembershipChanges', () => {
    it('should do nothing for an empty change set', async () => {
      const { pool, query, connect } = createMockPool();
      const store = new PgSegmentStore(pool, 'nurture');

      await store.applyMembershipChanges(
        'hot_leads',
        { added: [], removed: [] },
        { source: 'recalculation', reason: 'segment recalculation', at: START },
      );

      expect(connect).not.toHaveBeenCalled();
      expect(query).not.toHaveBeenCalled();
    });

    it('should open and close memberships in one transaction', async () => {
      const { pool, clientQuery, release } = createMockPool();
      clientQuery.mockResolvedValue(createQueryResult());
      const store = new PgSegmentStore(pool, 'nurture');

      await store.applyMembershipChanges(
        'hot_leads',
        { added: ['lead-1', 'lead-2'], removed: ['lead-3'] },
        { source: 'recalculation', reason: 'segment recalculation', at: START },
      );

      const calls = clientQuery.mock.calls;
      expect(calls.map(([text]) => text.trim().split(/\s+/)[0])).toEqual([
        'BEGIN',
        'INSERT',
        'UPDATE',
        'COMMIT',
      ]);
      expect(calls[1][0]).toContain('FROM unnest($5::text[]) AS entity_id');
      expect(calls[1][1]).toEqual([
        'hot_leads',
        START,
        'recalculation',
        'segment recalculation',
        ['lead-1', 'lead-2'],
      ]);
      expect(calls[2][1]).toEqual([
        'hot_leads',
        ['lead-3'],
        START,
        'segment recalculation',
      ]);
      expect(release).toHaveBeenCalledTimes(1);
    });
  });

  it('should store the member count with the calculation time', async () => {
    const { pool, query } = createMockPool();
    query.mockResolvedValueOnce(createQueryResult([], 1));
    const store = new PgSegmentStore(pool, 'nurture');

    await store.markCalculated('hot_leads', START, 7);

    expect(query.mock.calls[0][1]).toEqual(['hot_leads', START, 7]);
  });
});
