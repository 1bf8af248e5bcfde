import { InvalidWorkflowDefinitionError } from '../errors/invalid-workflow-definition.error';
import type {
  StepDefinition,
  WorkflowDefinition,
  WorkflowDefinitionInput,
} from '../interfaces/workflow-definition.interface';
import { DEFAULT_MAX_RETRIES } from '../nurture-engine.constants';

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Fills defaults and assigns contiguous step indices.
 */
export function normalizeWorkflowDefinition(
  input: WorkflowDefinitionInput,
  createdAt: Date,
): WorkflowDefinition {
  const steps: StepDefinition[] = input.steps.map((step, index) => ({
    index,
    actionKind: step.actionKind,
    parameters: { ...(step.parameters ?? {}) },
    delayMs: step.delayMs ?? 0,
    ...(step.skipIf && step.skipIf.length > 0 ? { skipIf: step.skipIf } : {}),
    maxRetries: step.maxRetries ?? DEFAULT_MAX_RETRIES,
  }));

  return {
    id: input.id,
    name: input.name ?? input.id,
    triggerKind: input.triggerKind,
    entryRules: input.entryRules ?? [],
    steps,
    isActive: input.isActive ?? true,
    maxConcurrentPerEntity: input.maxConcurrentPerEntity ?? 1,
    maxExecutionsPerEntity: input.maxExecutionsPerEntity ?? null,
    cooldownMs: input.cooldownMs ?? 0,
    createdAt,
  };
}

/**
 * Structural checks only; rule sets and action kinds are checked by
 * WorkflowDefinitionService, which knows the field schema and handlers.
 */
export function validateWorkflowDefinition(
  definition: WorkflowDefinition,
): void {
  if (!definition.id || typeof definition.id !== 'string') {
    throw new Error('Workflow definition id must be a non-empty string');
  }

  const fail = (message: string): never => {
    throw new InvalidWorkflowDefinitionError(definition.id, message);
  };

  if (!definition.triggerKind) {
    fail('triggerKind must be a non-empty string');
  }

  if (definition.steps.length === 0) {
    fail('at least one step is required');
  }

  definition.steps.forEach((step, position) => {
    if (step.index !== position) {
      fail(`step indices must be contiguous from 0 (found ${step.index} at ${position})`);
    }
    if (!step.actionKind) {
      fail(`step ${position} has no actionKind`);
    }
    if (!isNonNegativeInteger(step.delayMs)) {
      fail(`step ${position} has invalid delayMs`);
    }
    if (!isNonNegativeInteger(step.maxRetries)) {
      fail(`step ${position} has invalid maxRetries`);
    }
  });

  if (definition.maxConcurrentPerEntity !== 1) {
    fail('maxConcurrentPerEntity must be 1');
  }

  if (
    definition.maxExecutionsPerEntity !== null &&
    (!Number.isInteger(definition.maxExecutionsPerEntity) ||
      definition.maxExecutionsPerEntity < 1)
  ) {
    fail('maxExecutionsPerEntity must be a positive integer or null');
  }

  if (!isNonNegativeInteger(definition.cooldownMs)) {
    fail('cooldownMs must be a non-negative integer');
  }
}
