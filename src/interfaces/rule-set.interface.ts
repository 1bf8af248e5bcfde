export type RuleOperator =
  | 'eq'
  | 'not_eq'
  | 'gt'
  | 'lt'
  | 'gte'
  | 'lte'
  | 'in'
  | 'contains'
  | 'starts_with'
  | 'ends_with';

export type RelativeTimeUnit = 'minutes' | 'hours' | 'days' | 'weeks';

/**
 * Symbolic offset from the evaluation time, e.g. "7 days ago".
 * Resolved on every evaluation; never stored as a concrete date.
 */
export interface RelativeTimeExpression {
  type: 'relative';
  amount: number;
  unit: RelativeTimeUnit;
  direction: 'ago' | 'from_now';
}

export type RuleLiteral = string | number | boolean | Date;

export type RuleValue = RuleLiteral | RuleLiteral[] | RelativeTimeExpression;

export interface RuleExpression {
  /** Snapshot attribute, dotted path (`metadata.company_size`) or computed field name. */
  field: string;
  operator: RuleOperator;
  value: RuleValue;
}

/** AND-combined, evaluated in order. */
export type RuleSet = RuleExpression[];

export type FieldType = 'string' | 'number' | 'boolean' | 'date' | 'list';

export type FieldSchema = Record<string, FieldType>;

export type EntitySnapshot = Record<string, unknown>;

export interface ComputedFieldDefinition {
  name: string;
  type: FieldType;
  /** Must be a pure function of the snapshot and the evaluation time. */
  resolve(snapshot: EntitySnapshot, now: Date): unknown;
}

export type RuleEvaluationResult =
  | { status: 'matched' }
  | { status: 'not_matched'; ruleIndex: number }
  | { status: 'error'; ruleIndex: number; error: string };
