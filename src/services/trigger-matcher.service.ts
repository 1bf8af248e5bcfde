import { Inject, Injectable, Logger } from '@nestjs/common';
import type { IEntitySnapshotProvider } from '../interfaces/entity-snapshot-provider.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import type { EntitySnapshot } from '../interfaces/rule-set.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import {
  ENTITY_SNAPSHOT_PROVIDER,
  EXECUTION_STORE,
  NURTURE_ENGINE_OPTIONS,
  TRIGGER_NAMESPACE,
} from '../nurture-engine.constants';
import { ExecutionStateMachine } from './execution-state-machine.service';
import { RuleGate } from './rule-gate.service';
import { WorkflowDefinitionService } from './workflow-definition.service';

/**
 * Ingress for external events: decides which workflows an entity enters.
 */
@Injectable()
export class TriggerMatcher {
  private readonly logger = new Logger(TriggerMatcher.name);

  constructor(
    @Inject(EXECUTION_STORE) private readonly store: IExecutionStore,
    @Inject(ENTITY_SNAPSHOT_PROVIDER)
    private readonly snapshotProvider: IEntitySnapshotProvider,
    private readonly definitions: WorkflowDefinitionService,
    private readonly stateMachine: ExecutionStateMachine,
    private readonly ruleGate: RuleGate,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: Pick<ResolvedEngineOptions, 'clock'>,
  ) {}

  /**
   * @returns ids of the executions created, in definition order
   */
  async onTrigger(
    triggerKind: string,
    entityId: string,
    payload: Record<string, unknown> = {},
  ): Promise<string[]> {
    const snapshot = await this.snapshotProvider.getSnapshot(entityId);
    if (!snapshot) {
      this.logger.debug(`Trigger ${triggerKind}: unknown entity ${entityId}`);
      return [];
    }

    const candidates = await this.definitions.findActiveByTrigger(triggerKind);
    const evaluationSnapshot: EntitySnapshot = {
      ...snapshot,
      [TRIGGER_NAMESPACE]: payload,
    };

    const created: string[] = [];
    for (const definition of candidates) {
      try {
        const executionId = await this.enter(
          definition,
          entityId,
          evaluationSnapshot,
          payload,
        );
        if (executionId) created.push(executionId);
      } catch (error) {
        this.logger.error(
          `Trigger ${triggerKind}: workflow ${definition.id} failed for entity ${entityId}`,
          error instanceof Error ? error.stack : error,
        );
      }
    }

    return created;
  }

  private async enter(
    definition: WorkflowDefinition,
    entityId: string,
    snapshot: EntitySnapshot,
    payload: Record<string, unknown>,
  ): Promise<string | null> {
    const now = this.options.clock();

    const result = this.ruleGate.evaluate(
      `entry:${definition.id}`,
      entityId,
      snapshot,
      definition.entryRules,
      now,
    );
    if (result.status !== 'matched') return null;

    if (await this.inCooldown(definition, entityId, now)) {
      this.logger.debug(
        `Workflow ${definition.id}: entity ${entityId} is in cooldown`,
      );
      return null;
    }

    if (definition.maxExecutionsPerEntity !== null) {
      const count = await this.store.countExecutions(definition.id, entityId);
      if (count >= definition.maxExecutionsPerEntity) {
        this.logger.debug(
          `Workflow ${definition.id}: entity ${entityId} reached ${count} execution(s)`,
        );
        return null;
      }
    }

    const execution = await this.stateMachine.start(definition, entityId, payload);
    return execution?.id ?? null;
  }

  private async inCooldown(
    definition: WorkflowDefinition,
    entityId: string,
    now: Date,
  ): Promise<boolean> {
    if (definition.cooldownMs <= 0) return false;

    const latest = await this.store.findLatestFinishedExecution(
      definition.id,
      entityId,
    );
    if (!latest?.completedAt) return false;

    return now.getTime() - latest.completedAt.getTime() < definition.cooldownMs;
  }
}
