import { InvalidRuleSetError } from '../../src/errors/invalid-rule-set.error';
import type {
  ComputedFieldDefinition,
  EntitySnapshot,
  RuleSet,
} from '../../src/interfaces/rule-set.interface';
import { RuleEvaluator } from '../../src/services/rule-evaluator.service';
import { ValueResolver } from '../../src/services/value-resolver.service';
import { LEAD_SCHEMA, START } from '../helpers';

const DAY_MS = 24 * 60 * 60 * 1000;

const daysSinceCreated: ComputedFieldDefinition = {
  name: 'days_since_created',
  type: 'number',
  resolve: (snapshot: EntitySnapshot, now: Date) => {
    const createdAt = snapshot.created_at;
    if (!(createdAt instanceof Date)) return null;
    return Math.floor((now.getTime() - createdAt.getTime()) / DAY_MS);
  },
};

describe('RuleEvaluator', () => {
  const evaluator = new RuleEvaluator(new ValueResolver(), {
    fieldSchema: LEAD_SCHEMA,
    computedFields: [daysSinceCreated],
  });

  it('should match an empty rule set', () => {
    expect(evaluator.evaluate({}, [], START)).toEqual({ status: 'matched' });
  });

  it('should match when every rule passes', () => {
    const rules: RuleSet = [
      { field: 'status', operator: 'eq', value: 'new' },
      { field: 'score', operator: 'gte', value: 70 },
    ];

    expect(evaluator.evaluate({ status: 'new', score: 80 }, rules, START)).toEqual(
      { status: 'matched' },
    );
  });

  it('should report the index of the first failing rule', () => {
    const rules: RuleSet = [
      { field: 'status', operator: 'eq', value: 'new' },
      { field: 'score', operator: 'gte', value: 70 },
    ];

    expect(evaluator.evaluate({ status: 'new', score: 50 }, rules, START)).toEqual(
      { status: 'not_matched', ruleIndex: 1 },
    );
  });

  it('should fail every operator on a missing field, not_eq included', () => {
    expect(
      evaluator.evaluate({}, [{ field: 'score', operator: 'gt', value: 0 }], START),
    ).toEqual({ status: 'not_matched', ruleIndex: 0 });
    expect(
      evaluator.evaluate(
        { status: null },
        [{ field: 'status', operator: 'not_eq', value: 'lost' }],
        START,
      ),
    ).toEqual({ status: 'not_matched', ruleIndex: 0 });
  });

  it('should coerce numeric strings on number fields', () => {
    expect(
      evaluator.matches(
        { score: '85' },
        [{ field: 'score', operator: 'gte', value: 70 }],
        START,
      ),
    ).toBe(true);
  });

  it('should return an error result on a type mismatch instead of throwing', () => {
    expect(
      evaluator.evaluate(
        { score: 'abc' },
        [{ field: 'score', operator: 'gt', value: 10 }],
        START,
      ),
    ).toEqual({
      status: 'error',
      ruleIndex: 0,
      error: 'actual value abc is not a number',
    });
  });

  it('should report unparseable dates as errors', () => {
    expect(
      evaluator.evaluate(
        { created_at: 'not-a-date' },
        [
          {
            field: 'created_at',
            operator: 'gt',
            value: new Date('2024-01-01T00:00:00.000Z'),
          },
        ],
        START,
      ),
    ).toEqual({
      status: 'error',
      ruleIndex: 0,
      error: 'actual value not-a-date is not a date',
    });
  });

  describe('contains', () => {
    it('should use strict membership on lists', () => {
      const snapshot = { tags: ['vip', 'webinar'] };

      expect(
        evaluator.matches(
          snapshot,
          [{ field: 'tags', operator: 'contains', value: 'vip' }],
          START,
        ),
      ).toBe(true);
      expect(
        evaluator.matches(
          snapshot,
          [{ field: 'tags', operator: 'contains', value: 'VIP' }],
          START,
        ),
      ).toBe(false);
    });

    it('should match substrings case-insensitively', () => {
      expect(
        evaluator.matches(
          { email: 'Jane@Example.com' },
          [{ field: 'email', operator: 'contains', value: 'example' }],
          START,
        ),
      ).toBe(true);
    });
  });

  it('should compare prefixes and suffixes case-insensitively', () => {
    const snapshot = { email: 'Jane@Example.COM' };

    expect(
      evaluator.matches(
        snapshot,
        [
          { field: 'email', operator: 'starts_with', value: 'jane@' },
          { field: 'email', operator: 'ends_with', value: '@example.com' },
        ],
        START,
      ),
    ).toBe(true);
  });

  it('should match "in" against each listed value', () => {
    const rules: RuleSet = [
      { field: 'status', operator: 'in', value: ['new', 'contacted'] },
    ];

    expect(evaluator.matches({ status: 'contacted' }, rules, START)).toBe(true);
    expect(evaluator.matches({ status: 'lost' }, rules, START)).toBe(false);
  });

  it('should compare booleans strictly', () => {
    const rules: RuleSet = [
      { field: 'is_subscribed', operator: 'eq', value: true },
    ];

    expect(evaluator.matches({ is_subscribed: true }, rules, START)).toBe(true);
    expect(evaluator.matches({ is_subscribed: 'true' }, rules, START)).toBe(false);
  });

  describe('dates', () => {
    const inactiveForAWeek: RuleSet = [
      {
        field: 'last_activity_at',
        operator: 'lt',
        value: { type: 'relative', amount: 7, unit: 'days', direction: 'ago' },
      },
    ];

    it('should resolve relative values against the evaluation time', () => {
      expect(
        evaluator.matches(
          { last_activity_at: new Date('2024-12-20T00:00:00.000Z') },
          inactiveForAWeek,
          START,
        ),
      ).toBe(true);
      expect(
        evaluator.matches(
          { last_activity_at: new Date('2024-12-30T00:00:00.000Z') },
          inactiveForAWeek,
          START,
        ),
      ).toBe(false);
    });

    it('should accept ISO strings in the snapshot', () => {
      expect(
        evaluator.matches(
          { last_activity_at: '2024-12-20T00:00:00.000Z' },
          inactiveForAWeek,
          START,
        ),
      ).toBe(true);
    });

    it('should compare date equality by instant', () => {
      expect(
        evaluator.matches(
          { created_at: '2024-06-01T12:00:00.000Z' },
          [
            {
              field: 'created_at',
              operator: 'eq',
              value: new Date('2024-06-01T12:00:00.000Z'),
            },
          ],
          START,
        ),
      ).toBe(true);
    });

    it('should order an untyped field by instant when the value is a date string', () => {
      const submittedAfter: RuleSet = [
        { field: 'trigger.submitted_at', operator: 'gt', value: '2024-01-01T00:00:00Z' },
      ];

      expect(() => evaluator.validate(submittedAfter, 'entryRules')).not.toThrow();
      expect(
        evaluator.evaluate(
          { trigger: { submitted_at: '2025-01-01T00:00:00.000Z' } },
          submittedAfter,
          START,
        ),
      ).toEqual({ status: 'matched' });
      expect(
        evaluator.evaluate(
          { trigger: { submitted_at: '2023-06-01T00:00:00.000Z' } },
          submittedAfter,
          START,
        ),
      ).toEqual({ status: 'not_matched', ruleIndex: 0 });
    });

    it('should keep numeric strings numeric on an untyped field', () => {
      expect(
        evaluator.evaluate(
          { trigger: { page_views: '12' } },
          [{ field: 'trigger.page_views', operator: 'gt', value: '9' }],
          START,
        ),
      ).toEqual({ status: 'matched' });
    });
  });

  it('should resolve dotted paths into nested objects', () => {
    expect(
      evaluator.matches(
        { metadata: { company_size: '50-200' } },
        [{ field: 'metadata.company_size', operator: 'eq', value: '50-200' }],
        START,
      ),
    ).toBe(true);
  });

  it('should read trigger payload fields', () => {
    expect(
      evaluator.matches(
        { trigger: { form_id: 'demo-request' } },
        [{ field: 'trigger.form_id', operator: 'eq', value: 'demo-request' }],
        START,
      ),
    ).toBe(true);
  });

  it('should evaluate computed fields at the evaluation time', () => {
    const snapshot = { created_at: new Date('2024-12-22T00:00:00.000Z') };
    const rules: RuleSet = [
      { field: 'days_since_created', operator: 'gte', value: 10 },
    ];

    expect(evaluator.matches(snapshot, rules, START)).toBe(true);
    expect(
      evaluator.matches(snapshot, rules, new Date('2024-12-31T00:00:00.000Z')),
    ).toBe(false);
  });

  it('should be deterministic for identical inputs', () => {
    const snapshot = { score: 72, status: 'new' };
    const rules: RuleSet = [{ field: 'score', operator: 'gt', value: 71 }];

    expect(evaluator.evaluate(snapshot, rules, START)).toEqual(
      evaluator.evaluate(snapshot, rules, START),
    );
  });

  describe('validate', () => {
    it('should accept a well-typed rule set', () => {
      expect(() =>
        evaluator.validate(
          [{ field: 'days_since_created', operator: 'lt', value: 3 }],
          'entry rules',
        ),
      ).not.toThrow();
    });

    it('should throw InvalidRuleSetError for unknown fields', () => {
      expect(() =>
        evaluator.validate(
          [{ field: 'budget', operator: 'gt', value: 1000 }],
          'entry rules',
        ),
      ).toThrow(
        new InvalidRuleSetError('entry rules', ['rule 0 (budget): unknown field']),
      );
    });
  });
});
