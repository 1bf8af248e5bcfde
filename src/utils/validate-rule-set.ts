import { InvalidRuleSetError } from '../errors/invalid-rule-set.error';
import type {
  ComputedFieldDefinition,
  FieldSchema,
  FieldType,
  RuleExpression,
  RuleOperator,
  RuleSet,
  RuleValue,
} from '../interfaces/rule-set.interface';
import { TRIGGER_NAMESPACE } from '../nurture-engine.constants';
import { isRelativeExpression, isRuleOperator } from './parse-rule-set';

export const OPERATORS_BY_FIELD_TYPE: Readonly<
  Record<FieldType, readonly RuleOperator[]>
> = {
  string: ['eq', 'not_eq', 'in', 'contains', 'starts_with', 'ends_with'],
  number: ['eq', 'not_eq', 'gt', 'lt', 'gte', 'lte', 'in'],
  date: ['eq', 'not_eq', 'gt', 'lt', 'gte', 'lte'],
  boolean: ['eq', 'not_eq'],
  list: ['contains'],
};

const ORDERING_OPERATORS: readonly RuleOperator[] = ['gt', 'lt', 'gte', 'lte'];
const TEXT_OPERATORS: readonly RuleOperator[] = ['starts_with', 'ends_with'];

function isDateLike(value: RuleValue): boolean {
  if (value instanceof Date) return !Number.isNaN(value.getTime());
  if (isRelativeExpression(value)) return true;
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value === 'string') return !Number.isNaN(Date.parse(value));
  return false;
}

function isScalar(value: RuleValue): boolean {
  return !Array.isArray(value) && !isRelativeExpression(value);
}

function valueIssue(
  rule: RuleExpression,
  fieldType: FieldType | undefined,
): string | null {
  const { operator, value } = rule;

  if (operator === 'in') {
    if (!Array.isArray(value) || value.length === 0) {
      return 'operator "in" needs a non-empty array value';
    }
    if (fieldType === 'number' && value.some((v) => typeof v !== 'number')) {
      return 'operator "in" on a number field needs an array of numbers';
    }
    if (fieldType === 'string' && value.some((v) => typeof v !== 'string')) {
      return 'operator "in" on a string field needs an array of strings';
    }
    return null;
  }

  if (Array.isArray(value)) {
    return `operator "${operator}" does not take an array value`;
  }

  if (TEXT_OPERATORS.includes(operator)) {
    return typeof value === 'string'
      ? null
      : `operator "${operator}" needs a string value`;
  }

  if (operator === 'contains') {
    if (fieldType === 'list') {
      return isScalar(value) ? null : 'operator "contains" needs a scalar value';
    }
    return typeof value === 'string'
      ? null
      : 'operator "contains" needs a string value';
  }

  if (fieldType === 'date') {
    return isDateLike(value) ? null : `"${String(value)}" is not a date`;
  }

  if (ORDERING_OPERATORS.includes(operator)) {
    if (fieldType === 'number') {
      return typeof value === 'number'
        ? null
        : `operator "${operator}" on a number field needs a number value`;
    }
    return typeof value === 'number' || isDateLike(value)
      ? null
      : `operator "${operator}" needs a number, date or relative value`;
  }

  // eq / not_eq
  if (isRelativeExpression(value)) {
    return fieldType === undefined
      ? null
      : 'relative values are only valid on date fields';
  }
  if (fieldType === 'number' && typeof value !== 'number') {
    return `operator "${operator}" on a number field needs a number value`;
  }
  if (fieldType === 'boolean' && typeof value !== 'boolean') {
    return `operator "${operator}" on a boolean field needs a boolean value`;
  }
  if (fieldType === 'string' && typeof value !== 'string') {
    return `operator "${operator}" on a string field needs a string value`;
  }
  return null;
}

function isTriggerField(field: string): boolean {
  return field.startsWith(`${TRIGGER_NAMESPACE}.`);
}

/**
 * Collects every problem in the rule set instead of stopping at the first.
 */
export function collectRuleSetIssues(
  ruleSet: RuleSet,
  schema: FieldSchema,
  computedFields: readonly ComputedFieldDefinition[] = [],
): string[] {
  const issues: string[] = [];

  ruleSet.forEach((rule, index) => {
    const at = `rule ${index} (${rule.field})`;

    if (!isRuleOperator(rule.operator)) {
      issues.push(`${at}: unknown operator "${String(rule.operator)}"`);
      return;
    }

    const computed = computedFields.find((f) => f.name === rule.field);
    const fieldType: FieldType | undefined =
      computed?.type ?? schema[rule.field];

    if (fieldType === undefined && !isTriggerField(rule.field)) {
      issues.push(`${at}: unknown field`);
      return;
    }

    if (
      fieldType !== undefined &&
      !OPERATORS_BY_FIELD_TYPE[fieldType].includes(rule.operator)
    ) {
      issues.push(
        `${at}: operator "${rule.operator}" is not valid for ${fieldType} fields`,
      );
      return;
    }

    const issue = valueIssue(rule, fieldType);
    if (issue) {
      issues.push(`${at}: ${issue}`);
    }
  });

  return issues;
}

export function validateRuleSet(
  ruleSet: RuleSet,
  schema: FieldSchema,
  computedFields: readonly ComputedFieldDefinition[],
  location: string,
): void {
  const issues = collectRuleSetIssues(ruleSet, schema, computedFields);
  if (issues.length > 0) {
    throw new InvalidRuleSetError(location, issues);
  }
}
