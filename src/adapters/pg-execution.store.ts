import { randomUUID } from 'crypto';
import type { Pool, PoolClient } from 'pg';
import type {
  ExecutionInstance,
  NewStepResult,
  StepResultRecord,
} from '../interfaces/execution-records.interface';
import type { IExecutionStore } from '../interfaces/execution-store.interface';
import type { WorkflowDefinition } from '../interfaces/workflow-definition.interface';
import {
  SqlRow,
  toExecutionInstance,
  toStepResultRecord,
  toWorkflowDefinition,
} from './sql/row-mappers';
import { deriveTableNames, EngineTableNames } from './sql/table-names';

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

const DEFINITION_COLUMNS =
  'id, name, trigger_kind, entry_rules, steps, is_active, max_concurrent_per_entity, max_executions_per_entity, cooldown_ms, created_at';

const EXECUTION_COLUMNS =
  'id, workflow_id, entity_id, status, current_step_index, context, retry_count_for_current_step, created_at, updated_at, next_wake_at, completed_at, error, version';

const STEP_RESULT_COLUMNS =
  'id, execution_id, step_index, action_kind, outcome, attempt, output, error, recorded_at';

const ACTIVE_STATUS_SQL = `('RUNNING', 'WAITING', 'PAUSED')`;

export class PgExecutionStore implements IExecutionStore {
  private readonly tables: EngineTableNames;

  constructor(
    private readonly pool: Pool,
    private readonly tablePrefix: string,
    private readonly client?: PoolClient,
  ) {
    this.tables = deriveTableNames(tablePrefix);
  }

  async insertDefinition(definition: WorkflowDefinition): Promise<boolean> {
    const result = await this.getConn().query(
      `INSERT INTO ${this.tables.definitions} (${DEFINITION_COLUMNS})
       VALUES ($1, $2, $3, $4::jsonb, $5::jsonb, $6, $7, $8, $9, $10)
       ON CONFLICT (id) DO NOTHING`,
      [
        definition.id,
        definition.name,
        definition.triggerKind,
        JSON.stringify(definition.entryRules),
        JSON.stringify(definition.steps),
        definition.isActive,
        definition.maxConcurrentPerEntity,
        definition.maxExecutionsPerEntity,
        definition.cooldownMs,
        definition.createdAt,
      ],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findDefinition(id: string): Promise<WorkflowDefinition | null> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${DEFINITION_COLUMNS} FROM ${this.tables.definitions} WHERE id = $1`,
      [id],
    );
    if (result.rows.length === 0) return null;
    return toWorkflowDefinition(result.rows[0]);
  }

  async findActiveDefinitions(
    triggerKind: string,
  ): Promise<WorkflowDefinition[]> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${DEFINITION_COLUMNS} FROM ${this.tables.definitions}
       WHERE trigger_kind = $1 AND is_active = TRUE
       ORDER BY created_at, id`,
      [triggerKind],
    );
    return result.rows.map((row) => toWorkflowDefinition(row));
  }

  async setDefinitionActive(id: string, isActive: boolean): Promise<boolean> {
    const result = await this.getConn().query(
      `UPDATE ${this.tables.definitions} SET is_active = $2 WHERE id = $1`,
      [id, isActive],
    );
    return (result.rowCount ?? 0) > 0;
  }

  async insertExecutionIfNoActive(
    execution: ExecutionInstance,
  ): Promise<boolean> {
    const result = await this.getConn().query(
      `INSERT INTO ${this.tables.executions} (${EXECUTION_COLUMNS})
       VALUES ($1::uuid, $2, $3, $4, $5, $6::jsonb, $7, $8, $9, $10, $11, $12, $13)
       ON CONFLICT (workflow_id, entity_id) WHERE status IN ${ACTIVE_STATUS_SQL}
       DO NOTHING`,
      this.executionParams(execution),
    );
    return (result.rowCount ?? 0) > 0;
  }

  async findExecution(id: string): Promise<ExecutionInstance | null> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${EXECUTION_COLUMNS} FROM ${this.tables.executions} WHERE id = $1::uuid`,
      [id],
    );
    if (result.rows.length === 0) return null;
    return toExecutionInstance(result.rows[0]);
  }

  async findActiveExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${EXECUTION_COLUMNS} FROM ${this.tables.executions}
       WHERE workflow_id = $1 AND entity_id = $2 AND status IN ${ACTIVE_STATUS_SQL}
       LIMIT 1`,
      [workflowId, entityId],
    );
    if (result.rows.length === 0) return null;
    return toExecutionInstance(result.rows[0]);
  }

  async findLatestFinishedExecution(
    workflowId: string,
    entityId: string,
  ): Promise<ExecutionInstance | null> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${EXECUTION_COLUMNS} FROM ${this.tables.executions}
       WHERE workflow_id = $1 AND entity_id = $2
         AND status IN ('COMPLETED', 'FAILED') AND completed_at IS NOT NULL
       ORDER BY completed_at DESC
       LIMIT 1`,
      [workflowId, entityId],
    );
    if (result.rows.length === 0) return null;
    return toExecutionInstance(result.rows[0]);
  }

  async countExecutions(workflowId: string, entityId: string): Promise<number> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT COUNT(*)::int AS count FROM ${this.tables.executions}
       WHERE workflow_id = $1 AND entity_id = $2`,
      [workflowId, entityId],
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async updateExecution(
    execution: ExecutionInstance,
    expectedVersion: number,
    stepResult?: NewStepResult,
  ): Promise<boolean> {
    return this.transaction(async (store) => {
      const result = await store.getConn().query(
        `UPDATE ${this.tables.executions} SET
           status = $2,
           current_step_index = $3,
           context = $4::jsonb,
           retry_count_for_current_step = $5,
           updated_at = $6,
           next_wake_at = $7,
           completed_at = $8,
           error = $9,
           version = $10
         WHERE id = $1::uuid AND version = $11`,
        [
          execution.id,
          execution.status,
          execution.currentStepIndex,
          JSON.stringify(execution.context),
          execution.retryCountForCurrentStep,
          execution.updatedAt,
          execution.nextWakeAt,
          execution.completedAt,
          execution.error,
          execution.version,
          expectedVersion,
        ],
      );
      if ((result.rowCount ?? 0) === 0) return false;

      if (stepResult) {
        await store.insertStepResult(stepResult);
      }
      return true;
    });
  }

  async findDueExecutions(
    now: Date,
    limit: number,
    after?: Date,
  ): Promise<ExecutionInstance[]> {
    const afterClause = after ? ' AND next_wake_at > $3' : '';
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${EXECUTION_COLUMNS} FROM ${this.tables.executions}
       WHERE status = 'WAITING' AND next_wake_at <= $1${afterClause}
       ORDER BY next_wake_at, id
       LIMIT $2`,
      after ? [now, limit, after] : [now, limit],
    );
    return result.rows.map((row) => toExecutionInstance(row));
  }

  async findExecutionsByWorkflow(
    workflowId: string,
    createdSince: Date,
  ): Promise<ExecutionInstance[]> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${EXECUTION_COLUMNS} FROM ${this.tables.executions}
       WHERE workflow_id = $1 AND created_at >= $2
       ORDER BY created_at, id`,
      [workflowId, createdSince],
    );
    return result.rows.map((row) => toExecutionInstance(row));
  }

  async insertStepResult(stepResult: NewStepResult): Promise<void> {
    await this.getConn().query(
      `INSERT INTO ${this.tables.stepResults}
       (id, execution_id, step_index, action_kind, outcome, attempt, output, error, recorded_at)
       VALUES ($1::uuid, $2::uuid, $3, $4, $5, $6, $7::jsonb, $8, $9)`,
      [
        randomUUID(),
        stepResult.executionId,
        stepResult.stepIndex,
        stepResult.actionKind,
        stepResult.outcome,
        stepResult.attempt,
        stepResult.output === null ? null : JSON.stringify(stepResult.output),
        stepResult.error,
        stepResult.recordedAt,
      ],
    );
  }

  async findStepResults(executionId: string): Promise<StepResultRecord[]> {
    const result = await this.getConn().query<SqlRow>(
      `SELECT ${STEP_RESULT_COLUMNS} FROM ${this.tables.stepResults}
       WHERE execution_id = $1::uuid
       ORDER BY recorded_at, id`,
      [executionId],
    );
    return result.rows.map((row) => toStepResultRecord(row));
  }

  async transaction<T>(
    cb: (store: PgExecutionStore) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txStore = new PgExecutionStore(this.pool, this.tablePrefix, client);
      const result = await cb(txStore);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }

  private executionParams(execution: ExecutionInstance): unknown[] {
    return [
      execution.id,
      execution.workflowId,
      execution.entityId,
      execution.status,
      execution.currentStepIndex,
      JSON.stringify(execution.context),
      execution.retryCountForCurrentStep,
      execution.createdAt,
      execution.updatedAt,
      execution.nextWakeAt,
      execution.completedAt,
      execution.error,
      execution.version,
    ];
  }
}
