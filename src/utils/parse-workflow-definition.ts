import type {
  StepDefinition,
  StepDefinitionInput,
  WorkflowDefinitionInput,
} from '../interfaces/workflow-definition.interface';
import { DEFAULT_MAX_RETRIES } from '../nurture-engine.constants';
import { parseRuleSet } from './parse-rule-set';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalNumber(
  record: Record<string, unknown>,
  key: string,
  location: string,
): number | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new Error(`${location}.${key}: expected a number`);
  }
  return value;
}

function requiredString(
  record: Record<string, unknown>,
  key: string,
  location: string,
): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${location}.${key}: expected a non-empty string`);
  }
  return value;
}

function parseStepInput(raw: unknown, location: string): StepDefinitionInput {
  if (!isRecord(raw)) {
    throw new Error(`${location}: expected an object`);
  }
  const parameters = raw.parameters;
  if (parameters !== undefined && parameters !== null && !isRecord(parameters)) {
    throw new Error(`${location}.parameters: expected an object`);
  }

  return {
    actionKind: requiredString(raw, 'actionKind', location),
    parameters: isRecord(parameters) ? parameters : {},
    delayMs: optionalNumber(raw, 'delayMs', location),
    skipIf:
      raw.skipIf === undefined || raw.skipIf === null
        ? undefined
        : parseRuleSet(raw.skipIf, `${location}.skipIf`),
    maxRetries: optionalNumber(raw, 'maxRetries', location),
  };
}

/**
 * Parses stored step JSON. Indices come from array position.
 */
export function parseStepDefinitions(
  raw: unknown,
  location = 'steps',
): StepDefinition[] {
  if (!Array.isArray(raw)) {
    throw new Error(`${location}: expected an array of steps`);
  }
  return raw.map((item, index) => {
    const step = parseStepInput(item, `${location}[${index}]`);
    return {
      index,
      actionKind: step.actionKind,
      parameters: step.parameters ?? {},
      delayMs: step.delayMs ?? 0,
      ...(step.skipIf && step.skipIf.length > 0 ? { skipIf: step.skipIf } : {}),
      maxRetries: step.maxRetries ?? DEFAULT_MAX_RETRIES,
    };
  });
}

export function parseWorkflowDefinitionInput(
  raw: unknown,
): WorkflowDefinitionInput {
  if (!isRecord(raw)) {
    throw new Error('definition: expected an object');
  }
  if (!Array.isArray(raw.steps)) {
    throw new Error('definition.steps: expected an array of steps');
  }

  const maxExecutions = raw.maxExecutionsPerEntity;
  if (
    maxExecutions !== undefined &&
    maxExecutions !== null &&
    typeof maxExecutions !== 'number'
  ) {
    throw new Error('definition.maxExecutionsPerEntity: expected a number');
  }
  if (raw.isActive !== undefined && typeof raw.isActive !== 'boolean') {
    throw new Error('definition.isActive: expected a boolean');
  }

  return {
    id: requiredString(raw, 'id', 'definition'),
    name: typeof raw.name === 'string' ? raw.name : undefined,
    triggerKind: requiredString(raw, 'triggerKind', 'definition'),
    entryRules: parseRuleSet(raw.entryRules, 'definition.entryRules'),
    steps: raw.steps.map((step, index) =>
      parseStepInput(step, `definition.steps[${index}]`),
    ),
    isActive: raw.isActive,
    maxConcurrentPerEntity: optionalNumber(
      raw,
      'maxConcurrentPerEntity',
      'definition',
    ),
    maxExecutionsPerEntity:
      typeof maxExecutions === 'number' ? maxExecutions : null,
    cooldownMs: optionalNumber(raw, 'cooldownMs', 'definition'),
  };
}
