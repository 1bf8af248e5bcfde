import { randomUUID } from 'crypto';
import { sql, SQL } from 'drizzle-orm';
import type {
  ExecutionInstance,
  NewStepResult,
  StepResultRecord,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import {
  extractRows,
  toExecutionInstance,
  toStepResultRecord,
  toWorkflowDefinition,
} from './sql/row-mappers';
import { deriveTableNames, EngineTableNames } from './sql/table-names';

/**
 * The part of a drizzle PostgreSQL database (node-postgres or postgres-js)
 * this store uses.
 */
export interface DrizzleExecutor {
  execute(query: SQL): Promise<unknown>;
  transaction<T>(cb: (tx: DrizzleExecutor) => Promise<T>): Promise<T>;
}

const DEFINITION_COLUMNS = sql.raw(
  'id, name, trigger_kind, entry_rules, steps, is_active, max_concurrent_per_entity, max_executions_per_entity, cooldown_ms, created_at',
);

const EXECUTION_COLUMNS = sql.raw(
  'id, workflow_id, entity_id, status, current_step_index, context, retry_count_for_current_step, created_at, updated_at, next_wake_at, completed_at, error, version',
);

const STEP_RESULT_COLUMNS = sql.raw(
  'id, execution_id, step_index, action_kind, outcome, attempt, output, error, recorded_at',
);

const ACTIVE_STATUSES = sql.raw(`('RUNNING', 'WAITING', 'PAUSED')`);

export class DrizzleExecutionStore implements IExecutionStore {
  private readonly tables: EngineTableNames;

  constructor(
    private readonly db: DrizzleExecutor,
    private readonly tablePrefix: string,
  ) {
    this.tables = deriveTableNames(tablePrefix);
  }

  async insertDefinition(definition: WorkflowDefinition): Promise<boolean> {
    const result = await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.tables.definitions)} (${DEFINITION_COLUMNS})
          VALUES (${definition.id}, ${definition.name}, ${definition.triggerKind},
            ${JSON.stringify(definition.entryRules)}::jsonb, ${JSON.stringify(definition.steps)}::jsonb,
            ${definition.isActive}, ${definition.maxConcurrentPerEntity}, ${definition.maxExecutionsPerEntity},
            ${definition.cooldownMs}, ${definition.createdAt})
          ON CONFLICT (id) DO NOTHING
          RETURNING id`,
    );
    return extractRows(result).length > 0;
  }

  async findDefinition(id: string): Promise<WorkflowDefinition | null> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${DEFINITION_COLUMNS} FROM ${sql.raw(this.tables.definitions)} WHERE id = ${id}`,
      ),
    );
    return rows.length === 0 ? null : toWorkflowDefinition(rows[0]);
  }

  async findActiveDefinitions(
    triggerKind: string,
  ): Promise<WorkflowDefinition[]> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${DEFINITION_COLUMNS} FROM ${sql.raw(this.tables.definitions)}
            WHERE trigger_kind = ${triggerKind} AND is_active = TRUE
            ORDER BY created_at, id`,
      ),
    );
    return rows.map((row) => toWorkflowDefinition(row));
  }

  async setDefinitionActive(id: string, isActive: boolean): Promise<boolean> {
    const result = await this.db.execute(
      sql`UPDATE ${sql.raw(this.tables.definitions)} SET is_active = ${isActive} WHERE id = ${id} RETURNING id`,
    );
    return extractRows(result).length > 0;
  }

  async insertExecutionIfNoActive(
    execution: ExecutionInstance,
  ): Promise<boolean> {
    const result = await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.tables.executions)} (${EXECUTION_COLUMNS})
          VALUES (${execution.id}, ${execution.workflowId}, ${execution.entityId}, ${execution.status},
            ${execution.currentStepIndex}, ${JSON.stringify(execution.context)}::jsonb,
            ${execution.retryCountForCurrentStep}, ${execution.createdAt}, ${execution.updatedAt},
            ${execution.nextWakeAt}, ${execution.completedAt}, ${execution.error}, ${execution.version})
          ON CONFLICT (workflow_id, entity_id) WHERE status IN ${ACTIVE_STATUSES}
          DO NOTHING
          RETURNING id`,
    );
    return extractRows(result).length > 0;
  }

  async findExecution(id: string): Promise<ExecutionInstance | null> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${EXECUTION_COLUMNS} FROM ${sql.raw(this.tables.executions)} WHERE id = ${id}`,
      ),
    );
    return rows.length === 0 ? null : toExecutionInstance(rows[0]);
  }

  async findActiveExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${EXECUTION_COLUMNS} FROM ${sql.raw(this.tables.executions)}
            WHERE workflow_id = ${workflowId} AND entity_id = ${entityId}
              AND status IN ${ACTIVE_STATUSES}
            LIMIT 1`,
      ),
    );
    return rows.length === 0 ? null : toExecutionInstance(rows[0]);
  }

  async findLatestFinishedExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${EXECUTION_COLUMNS} FROM ${sql.raw(this.tables.executions)}
            WHERE workflow_id = ${workflowId} AND entity_id = ${entityId}
              AND status IN ('COMPLETED', 'FAILED') AND completed_at IS NOT NULL
            ORDER BY completed_at DESC
            LIMIT 1`,
      ),
    );
    return rows.length === 0 ? null : toExecutionInstance(rows[0]);
  }

  async countExecutions(workflowId: string, entityId: string): Promise<number> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT COUNT(*)::int AS count FROM ${sql.raw(this.tables.executions)}
            WHERE workflow_id = ${workflowId} AND entity_id = ${entityId}`,
      ),
    );
    return Number(rows[0]?.count ?? 0);
  }

  async updateExecution(
    execution: ExecutionInstance,
    expectedVersion: number,
    stepResult?: NewStepResult,
  ): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const result = await tx.execute(
        sql`UPDATE ${sql.raw(this.tables.executions)} SET
              status = ${execution.status},
              current_step_index = ${execution.currentStepIndex},
              context = ${JSON.stringify(execution.context)}::jsonb,
              retry_count_for_current_step = ${execution.retryCountForCurrentStep},
              updated_at = ${execution.updatedAt},
              next_wake_at = ${execution.nextWakeAt},
              completed_at = ${execution.completedAt},
              error = ${execution.error},
              version = ${execution.version}
            WHERE id = ${execution.id} AND version = ${expectedVersion}
            RETURNING id`,
      );
      if (extractRows(result).length === 0) return false;

      if (stepResult) {
        const txStore = new DrizzleExecutionStore(tx, this.tablePrefix);
        await txStore.insertStepResult(stepResult);
      }
      return true;
    });
  }

  async findDueExecutions(
    now: Date,
    limit: number,
    after?: Date,
  ): Promise<ExecutionInstance[]> {
    const afterClause = after ? sql` AND next_wake_at > ${after}` : sql``;
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${EXECUTION_COLUMNS} FROM ${sql.raw(this.tables.executions)}
            WHERE status = 'WAITING' AND next_wake_at <= ${now}${afterClause}
            ORDER BY next_wake_at, id
            LIMIT ${limit}`,
      ),
    );
    return rows.map((row) => toExecutionInstance(row));
  }

  async findExecutionsByWorkflow(
    workflowId: string,
    createdSince: Date,
  ): Promise<ExecutionInstance[]> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${EXECUTION_COLUMNS} FROM ${sql.raw(this.tables.executions)}
            WHERE workflow_id = ${workflowId} AND created_at >= ${createdSince}
            ORDER BY created_at, id`,
      ),
    );
    return rows.map((row) => toExecutionInstance(row));
  }

  async insertStepResult(stepResult: NewStepResult): Promise<void> {
    const output =
      stepResult.output === null ? null : JSON.stringify(stepResult.output);
    await this.db.execute(
      sql`INSERT INTO ${sql.raw(this.tables.stepResults)}
          (id, execution_id, step_index, action_kind, outcome, attempt, output, error, recorded_at)
          VALUES (${randomUUID()}, ${stepResult.executionId}, ${stepResult.stepIndex}, ${stepResult.actionKind},
            ${stepResult.outcome}, ${stepResult.attempt}, ${output}::jsonb, ${stepResult.error}, ${stepResult.recordedAt})`,
    );
  }

  async findStepResults(executionId: string): Promise<StepResultRecord[]> {
    const rows = extractRows(
      await this.db.execute(
        sql`SELECT ${STEP_RESULT_COLUMNS} FROM ${sql.raw(this.tables.stepResults)}
            WHERE execution_id = ${executionId}
            ORDER BY recorded_at, id`,
      ),
    );
    return rows.map((row) => toStepResultRecord(row));
  }
}
