import { Injectable } from '@nestjs/common';
import type {
  RelativeTimeExpression,
  RelativeTimeUnit,
  RuleLiteral,
  RuleValue,
} from '../interfaces/rule-set.interface';
import { isRelativeExpression } from '../utils/parse-rule-set';

const UNIT_MS: Record<RelativeTimeUnit, number> = {
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
  weeks: 7 * 24 * 60 * 60 * 1000,
};

@Injectable()
export class ValueResolver {
  /**
   * Turns symbolic rule values into concrete ones for a single evaluation.
   * Relative expressions become absolute dates anchored at `now`.
   */
  resolve(value: RuleValue, now: Date): RuleLiteral | RuleLiteral[] {
    if (isRelativeExpression(value)) {
      return this.resolveRelative(value, now);
    }
    return value;
  }

  resolveRelative(expression: RelativeTimeExpression, now: Date): Date {
    const offset = expression.amount * UNIT_MS[expression.unit];
    return new Date(
      expression.direction === 'ago'
        ? now.getTime() - offset
        : now.getTime() + offset,
    );
  }
}
