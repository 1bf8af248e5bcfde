import type {
  RelativeTimeExpression,
  RelativeTimeUnit,
  RuleExpression,
  RuleLiteral,
  RuleOperator,
  RuleSet,
  RuleValue,
} from '../interfaces/rule-set.interface';

export const RULE_OPERATORS: readonly RuleOperator[] = [
  'eq',
  'not_eq',
  'gt',
  'lt',
  'gte',
  'lte',
  'in',
  'contains',
  'starts_with',
  'ends_with',
];

export const RELATIVE_TIME_UNITS: readonly RelativeTimeUnit[] = [
  'minutes',
  'hours',
  'days',
  'weeks',
];

const RELATIVE_STRING_REGEX = /^(\d+)_(minutes|hours|days|weeks)_(ago|from_now)$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isRuleOperator(value: unknown): value is RuleOperator {
  return RULE_OPERATORS.some((operator) => operator === value);
}

export function isRelativeTimeUnit(value: unknown): value is RelativeTimeUnit {
  return RELATIVE_TIME_UNITS.some((unit) => unit === value);
}

export function isRelativeExpression(
  value: unknown,
): value is RelativeTimeExpression {
  return (
    isRecord(value) &&
    value.type === 'relative' &&
    typeof value.amount === 'number' &&
    isRelativeTimeUnit(value.unit) &&
    (value.direction === 'ago' || value.direction === 'from_now')
  );
}

/**
 * Parses the stored shorthand `"<n>_<unit>_ago"` / `"<n>_<unit>_from_now"`.
 * @returns null when the string is not a relative expression
 */
export function parseRelativeExpression(
  value: string,
): RelativeTimeExpression | null {
  const match = RELATIVE_STRING_REGEX.exec(value);
  if (!match) return null;

  const [, amount, unit, direction] = match;
  if (!isRelativeTimeUnit(unit)) return null;

  return {
    type: 'relative',
    amount: Number.parseInt(amount, 10),
    unit,
    direction: direction === 'ago' ? 'ago' : 'from_now',
  };
}

function parseLiteral(raw: unknown, location: string): RuleLiteral {
  if (
    typeof raw === 'string' ||
    typeof raw === 'number' ||
    typeof raw === 'boolean' ||
    raw instanceof Date
  ) {
    return raw;
  }
  throw new Error(`${location}: unsupported literal ${JSON.stringify(raw)}`);
}

function parseValue(raw: unknown, location: string): RuleValue {
  if (Array.isArray(raw)) {
    return raw.map((item, i) => parseLiteral(item, `${location}[${i}]`));
  }
  if (isRelativeExpression(raw)) {
    return {
      type: 'relative',
      amount: raw.amount,
      unit: raw.unit,
      direction: raw.direction,
    };
  }
  if (typeof raw === 'string') {
    return parseRelativeExpression(raw) ?? raw;
  }
  return parseLiteral(raw, location);
}

/**
 * Converts persisted JSON into a typed rule set. Shape only: operator/type
 * compatibility is checked by `validateRuleSet` at definition time.
 */
export function parseRuleSet(raw: unknown, location = 'rules'): RuleSet {
  if (raw === null || raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw new Error(`${location}: expected an array of rules`);
  }

  return raw.map((item, index): RuleExpression => {
    const at = `${location}[${index}]`;
    if (!isRecord(item)) {
      throw new Error(`${at}: expected an object`);
    }
    if (typeof item.field !== 'string' || item.field.length === 0) {
      throw new Error(`${at}: field must be a non-empty string`);
    }
    if (!isRuleOperator(item.operator)) {
      throw new Error(`${at}: unknown operator ${String(item.operator)}`);
    }
    return {
      field: item.field,
      operator: item.operator,
      value: parseValue(item.value, `${at}.value`),
    };
  });
}
