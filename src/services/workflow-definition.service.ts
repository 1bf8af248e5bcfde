import { Inject, Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DuplicateDefinitionError } from '../errors/duplicate-definition.error';
import { InvalidWorkflowDefinitionError } from '../errors/invalid-workflow-definition.error';
import { WorkflowDefinitionNotFoundError } from '../errors/workflow-definition-not-found.error';
import { EngineEventType } from '../events/engine-event-type.enum';
import type { DefinitionChangedEvent } from '../events/engine-events';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import type {
  WorkflowDefinition,
  WorkflowDefinitionInput,
} from '../interfaces/workflow-definition.interface';
import {
  EXECUTION_STORE,
  NURTURE_ENGINE_OPTIONS,
} from '../nurture-engine.constants';
import { parseWorkflowDefinitionInput } from '../utils/parse-workflow-definition';
import { TtlCache } from '../utils/ttl-cache';
import {
  normalizeWorkflowDefinition,
  validateWorkflowDefinition,
} from '../utils/validate-workflow-definition';
import { ActionHandlerRegistry } from './action-handler-registry.service';
import { RuleEvaluator } from './rule-evaluator.service';

function rawDefinitionId(raw: unknown): string {
  if (typeof raw === 'object' && raw !== null && 'id' in raw) {
    return String(raw.id);
  }
  return '(unknown)';
}

@Injectable()
export class WorkflowDefinitionService {
  private readonly logger = new Logger(WorkflowDefinitionService.name);
  private readonly activeByTrigger: TtlCache<string, WorkflowDefinition[]>;

  constructor(
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    private readonly evaluator: RuleEvaluator,
    private readonly handlers: ActionHandlerRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: Pick<
      ResolvedEngineOptions,
      'definitionCacheTtlMs' | 'clock'
    >,
  ) {
    this.activeByTrigger = new TtlCache(options.definitionCacheTtlMs, () =>
      options.clock().getTime(),
    );

    const invalidate = (event: DefinitionChangedEvent) =>
      this.activeByTrigger.invalidate(event.triggerKind);
    this.eventEmitter.on(EngineEventType.DEFINITION_PUBLISHED, invalidate);
    this.eventEmitter.on(EngineEventType.DEFINITION_DEACTIVATED, invalidate);
  }

  /**
   * Validates and stores a new definition. Definitions are immutable:
   * publishing an id twice fails.
   */
  async publish(input: WorkflowDefinitionInput): Promise<WorkflowDefinition> {
    const definition = normalizeWorkflowDefinition(input, this.options.clock());
    validateWorkflowDefinition(definition);

    this.evaluator.validate(
      definition.entryRules,
      `workflow ${definition.id} entryRules`,
    );
    for (const step of definition.steps) {
      if (step.skipIf) {
        this.evaluator.validate(
          step.skipIf,
          `workflow ${definition.id} step ${step.index} skipIf`,
        );
      }
      if (!this.handlers.has(step.actionKind)) {
        throw new InvalidWorkflowDefinitionError(
          definition.id,
          `step ${step.index} uses unregistered action kind "${step.actionKind}"`,
        );
      }
    }

    const inserted = await this.store.insertDefinition(definition);
    if (!inserted) {
      throw new DuplicateDefinitionError('workflow', definition.id);
    }

    this.eventEmitter.emit(EngineEventType.DEFINITION_PUBLISHED, {
      definitionId: definition.id,
      triggerKind: definition.triggerKind,
      isActive: definition.isActive,
      timestamp: definition.createdAt,
    } satisfies DefinitionChangedEvent);
    this.logger.log(
      `Published workflow ${definition.id} (${definition.steps.length} steps) on trigger ${definition.triggerKind}`,
    );

    return definition;
  }

  /** Accepts a JSON string or an already-parsed object. */
  async publishFromJson(raw: unknown): Promise<WorkflowDefinition> {
    let input: WorkflowDefinitionInput;
    let value = raw;
    try {
      if (typeof value === 'string') {
        value = JSON.parse(value);
      }
      input = parseWorkflowDefinitionInput(value);
    } catch (error) {
      throw new InvalidWorkflowDefinitionError(
        rawDefinitionId(value),
        error instanceof Error ? error.message : String(error),
      );
    }
    return this.publish(input);
  }

  /**
   * Stops new entries. Executions already running continue.
   */
  async deactivate(id: string): Promise<void> {
    const definition = await this.getOrThrow(id);
    if (!definition.isActive) return;

    const updated = await this.store.setDefinitionActive(id, false);
    if (!updated) {
      throw new WorkflowDefinitionNotFoundError(id);
    }

    this.eventEmitter.emit(EngineEventType.DEFINITION_DEACTIVATED, {
      definitionId: id,
      triggerKind: definition.triggerKind,
      isActive: false,
      timestamp: this.options.clock(),
    } satisfies DefinitionChangedEvent);
    this.logger.log(`Deactivated workflow ${id}`);
  }

  async get(id: string): Promise<WorkflowDefinition | null> {
    return this.store.findDefinition(id);
  }

  async getOrThrow(id: string): Promise<WorkflowDefinition> {
    const definition = await this.store.findDefinition(id);
    if (!definition) {
      throw new WorkflowDefinitionNotFoundError(id);
    }
    return definition;
  }

  async findActiveByTrigger(triggerKind: string): Promise<WorkflowDefinition[]> {
    return this.activeByTrigger.getOrLoad(triggerKind, () =>
      this.store.findActiveDefinitions(triggerKind),
    );
  }
}
