import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { IExecutionStore } from './execution-store.interface';
import type { ISegmentStore } from './segment-store.interface';
import type { IEntitySnapshotProvider } from './entity-snapshot-provider.interface';
import type { ITimerService } from './timer-service.interface';
import type {
  ComputedFieldDefinition,
  FieldSchema,
} from './rule-set.interface';

export interface NurtureEngineModuleOptions {
  /** Persistence for workflow definitions, executions and step results */
  executionStore: IExecutionStore;
  /** Persistence for segments and their memberships */
  segmentStore: ISegmentStore;
  /** Source of entity field values */
  snapshotProvider: IEntitySnapshotProvider;
  /** Declared type of every entity field rules may reference */
  fieldSchema: FieldSchema;
  computedFields?: ComputedFieldDefinition[];

  /** Durable wake delivery. Default: persisted wake time + sweep */
  timerService?: ITimerService;

  /** Cron expression for the wake sweep. Default: every 30 seconds */
  wakeCronExpression?: string;
  /** Enable internal wake sweep registration. Default: true */
  enableWakeCron?: boolean;
  /** Max executions woken per sweep. Default: 100 */
  wakeBatchSize?: number;
  /** Overdue age after which a waiting execution is reported as stuck. Default: 24h */
  stuckThresholdMs?: number;

  /** First retry backoff. Default: 30s */
  retryBaseDelayMs?: number;
  /** Backoff ceiling. Default: 1h */
  retryMaxDelayMs?: number;

  /** TTL of cached definition and segment lookups. Default: 60s */
  definitionCacheTtlMs?: number;
  /** Attempts for pause/resume/cancel under concurrent writes. Default: 5 */
  maxCasAttempts?: number;

  clock?: () => Date;
}

export interface NurtureEngineModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory(
    ...args: unknown[]
  ): Promise<NurtureEngineModuleOptions> | NurtureEngineModuleOptions;
  inject?: FactoryProvider['inject'];
}

export interface ResolvedEngineOptions {
  fieldSchema: FieldSchema;
  computedFields: ComputedFieldDefinition[];
  wakeCronExpression: string;
  enableWakeCron: boolean;
  wakeBatchSize: number;
  stuckThresholdMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  definitionCacheTtlMs: number;
  maxCasAttempts: number;
  clock: () => Date;
}
