import { Inject, Injectable } from '@nestjs/common';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import type {
  EntitySnapshot,
  FieldType,
  RuleExpression,
  RuleEvaluationResult,
  RuleLiteral,
  RuleSet,
} from '../interfaces/rule-set.interface';
import { NURTURE_ENGINE_OPTIONS } from '../nurture-engine.constants';
import { resolveFieldPath } from '../utils/resolve-field-path';
import { validateRuleSet } from '../utils/validate-rule-set';
import { ValueResolver } from './value-resolver.service';

export type RuleEvaluatorOptions = Pick<
  ResolvedEngineOptions,
  'fieldSchema' | 'computedFields'
>;

class RuleTypeError extends Error {}

function toEpochMs(value: unknown, side: string): number {
  if (value instanceof Date) {
    const ms = value.getTime();
    if (!Number.isNaN(ms)) return ms;
  } else if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  } else if (typeof value === 'string') {
    const ms = Date.parse(value);
    if (!Number.isNaN(ms)) return ms;
  }
  throw new RuleTypeError(`${side} value ${String(value)} is not a date`);
}

function toNumber(value: unknown, side: string): number {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  throw new RuleTypeError(`${side} value ${String(value)} is not a number`);
}

/** A non-numeric string that parses as a date, e.g. an ISO timestamp. */
function isDateString(value: unknown): value is string {
  return (
    typeof value === 'string' &&
    Number.isNaN(Number(value)) &&
    !Number.isNaN(Date.parse(value))
  );
}

/**
 * Pure rule evaluation: (snapshot, rule set, time) to outcome.
 * No I/O; the same inputs always give the same result.
 */
@Injectable()
export class RuleEvaluator {
  constructor(
    private readonly valueResolver: ValueResolver,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: RuleEvaluatorOptions,
  ) {}

  /**
   * @throws InvalidRuleSetError listing every problem found
   */
  validate(ruleSet: RuleSet, location: string): void {
    validateRuleSet(
      ruleSet,
      this.options.fieldSchema,
      this.options.computedFields,
      location,
    );
  }

  evaluate(
    snapshot: EntitySnapshot,
    ruleSet: RuleSet,
    now: Date,
  ): RuleEvaluationResult {
    for (let ruleIndex = 0; ruleIndex < ruleSet.length; ruleIndex++) {
      let passed: boolean;
      try {
        passed = this.evaluateRule(snapshot, ruleSet[ruleIndex], now);
      } catch (error) {
        return {
          status: 'error',
          ruleIndex,
          error: error instanceof Error ? error.message : String(error),
        };
      }
      if (!passed) {
        return { status: 'not_matched', ruleIndex };
      }
    }
    return { status: 'matched' };
  }

  matches(snapshot: EntitySnapshot, ruleSet: RuleSet, now: Date): boolean {
    return this.evaluate(snapshot, ruleSet, now).status === 'matched';
  }

  private resolveActual(
    snapshot: EntitySnapshot,
    field: string,
    now: Date,
  ): { value: unknown; type: FieldType | undefined } {
    const computed = this.options.computedFields.find((f) => f.name === field);
    if (computed) {
      return { value: computed.resolve(snapshot, now), type: computed.type };
    }
    return {
      value: resolveFieldPath(snapshot, field),
      type: this.options.fieldSchema[field],
    };
  }

  private evaluateRule(
    snapshot: EntitySnapshot,
    rule: RuleExpression,
    now: Date,
  ): boolean {
    const { value: actual, type } = this.resolveActual(snapshot, rule.field, now);
    if (actual === undefined || actual === null) {
      return false;
    }

    const expected = this.valueResolver.resolve(rule.value, now);
    const asDate = type === 'date' || expected instanceof Date;

    switch (rule.operator) {
      case 'eq':
        return this.equals(actual, expected, type, asDate);
      case 'not_eq':
        return !this.equals(actual, expected, type, asDate);
      case 'gt':
        return this.compare(actual, expected, type, asDate) > 0;
      case 'gte':
        return this.compare(actual, expected, type, asDate) >= 0;
      case 'lt':
        return this.compare(actual, expected, type, asDate) < 0;
      case 'lte':
        return this.compare(actual, expected, type, asDate) <= 0;
      case 'in':
        if (!Array.isArray(expected)) {
          throw new RuleTypeError('operator "in" needs an array value');
        }
        return expected.some((candidate) =>
          this.equals(actual, candidate, type, asDate),
        );
      case 'contains':
        if (Array.isArray(actual)) {
          return actual.some((item) => item === expected);
        }
        if (typeof actual === 'string') {
          return actual.toLowerCase().includes(String(expected).toLowerCase());
        }
        return false;
      case 'starts_with':
        return (
          typeof actual === 'string' &&
          actual.toLowerCase().startsWith(String(expected).toLowerCase())
        );
      case 'ends_with':
        return (
          typeof actual === 'string' &&
          actual.toLowerCase().endsWith(String(expected).toLowerCase())
        );
    }
  }

  private equals(
    actual: unknown,
    expected: RuleLiteral | RuleLiteral[],
    type: FieldType | undefined,
    asDate: boolean,
  ): boolean {
    if (Array.isArray(expected)) {
      throw new RuleTypeError('equality does not take an array value');
    }
    if (asDate) {
      return toEpochMs(actual, 'actual') === toEpochMs(expected, 'expected');
    }
    if (type === 'number') {
      return toNumber(actual, 'actual') === toNumber(expected, 'expected');
    }
    return actual === expected;
  }

  private compare(
    actual: unknown,
    expected: RuleLiteral | RuleLiteral[],
    type: FieldType | undefined,
    asDate: boolean,
  ): number {
    if (Array.isArray(expected)) {
      throw new RuleTypeError('ordering operators do not take an array value');
    }
    // untyped fields such as trigger.* take their kind from the literal
    if (asDate || (type === undefined && isDateString(expected))) {
      return toEpochMs(actual, 'actual') - toEpochMs(expected, 'expected');
    }
    return toNumber(actual, 'actual') - toNumber(expected, 'expected');
  }
}
