import 'reflect-metadata';

// Module
export { NurtureEngineModule } from './nurture-engine.module';

// Services
export { TriggerMatcher } from './services/trigger-matcher.service';
export { ExecutionStateMachine } from './services/execution-state-machine.service';
export { WorkflowDefinitionService } from './services/workflow-definition.service';
export { StepScheduler } from './services/step-scheduler.service';
export type { WakeHandler } from './services/step-scheduler.service';
export { StoreBackedTimerService } from './services/store-backed-timer.service';
export { ActionDispatcher } from './services/action-dispatcher.service';
export type {
  RetryDecision,
  RetryPolicyOptions,
} from './services/action-dispatcher.service';
export { ActionHandlerRegistry } from './services/action-handler-registry.service';
export type { RegisteredActionHandler } from './services/action-handler-registry.service';
export { RuleEvaluator } from './services/rule-evaluator.service';
export type { RuleEvaluatorOptions } from './services/rule-evaluator.service';
export { RuleGate } from './services/rule-gate.service';
export { ValueResolver } from './services/value-resolver.service';
export { SegmentEvaluator } from './services/segment-evaluator.service';
export type {
  EntitySegmentChanges,
  RecalculateAllResult,
  SegmentFailure,
} from './services/segment-evaluator.service';
export { WakeCronService } from './services/wake-cron.service';
export type {
  StuckExecution,
  WakeCronOptions,
  WakeProcessingFailure,
  WakeProcessingResult,
} from './services/wake-cron.service';
export { WorkflowMetricsService } from './services/workflow-metrics.service';
export type { WorkflowMetrics } from './services/workflow-metrics.service';

// Decorators and built-in handlers
export { ActionHandler } from './decorators/action-handler.decorator';
export type { ActionHandlerMetadata } from './decorators/action-handler.decorator';
export { WaitActionHandler, WAIT_ACTION_KIND } from './handlers/wait.handler';
export { ExecutionLifecycleEngine } from './engines/execution-lifecycle.engine';
export type { ExecutionTransition } from './engines/execution-lifecycle.engine';

// Interfaces
export type {
  ActionExecutionContext,
  ActionResult,
  IActionHandler,
} from './interfaces/action-handler.interface';
export type { IEntitySnapshotProvider } from './interfaces/entity-snapshot-provider.interface';
export type {
  ExecutionInstance,
  ExecutionStatus,
  NewStepResult,
  StepOutcome,
  StepResultRecord,
} from './interfaces/execution-records.interface';
export type { IExecutionStore } from './interfaces/execution-store.interface';
export type {
  NurtureEngineModuleAsyncOptions,
  NurtureEngineModuleOptions,
  ResolvedEngineOptions,
} from './interfaces/nurture-engine-module-options.interface';
export type {
  ComputedFieldDefinition,
  EntitySnapshot,
  FieldSchema,
  FieldType,
  RelativeTimeExpression,
  RelativeTimeUnit,
  RuleEvaluationResult,
  RuleExpression,
  RuleLiteral,
  RuleOperator,
  RuleSet,
  RuleValue,
} from './interfaces/rule-set.interface';
export type {
  ISegmentStore,
  SegmentQuery,
} from './interfaces/segment-store.interface';
export type {
  EntityEvaluationFailure,
  MembershipChangeMeta,
  MembershipChangeSet,
  MembershipSource,
  SegmentDefinition,
  SegmentDefinitionInput,
  SegmentMembership,
  SegmentRecalculationResult,
} from './interfaces/segment.interface';
export type { ITimerService } from './interfaces/timer-service.interface';
export type {
  StepDefinition,
  StepDefinitionInput,
  WorkflowDefinition,
  WorkflowDefinitionInput,
} from './interfaces/workflow-definition.interface';

// Adapters
export { InMemoryExecutionStore } from './adapters/in-memory-execution.store';
export { InMemorySegmentStore } from './adapters/in-memory-segment.store';
export { PgExecutionStore } from './adapters/pg-execution.store';
export { PgSegmentStore } from './adapters/pg-segment.store';
export { DrizzleExecutionStore } from './adapters/drizzle-execution.store';
export type { DrizzleExecutor } from './adapters/drizzle-execution.store';
export { deriveTableNames } from './adapters/sql/table-names';
export type { EngineTableNames } from './adapters/sql/table-names';

// Rule utilities
export { parseRuleSet, parseRelativeExpression } from './utils/parse-rule-set';
export { validateRuleSet } from './utils/validate-rule-set';
export { parseWorkflowDefinitionInput } from './utils/parse-workflow-definition';

// Errors
export { ConcurrentModificationError } from './errors/concurrent-modification.error';
export { DuplicateActionHandlerError } from './errors/duplicate-action-handler.error';
export { DuplicateDefinitionError } from './errors/duplicate-definition.error';
export { ExecutionNotFoundError } from './errors/execution-not-found.error';
export { InvalidExecutionTransitionError } from './errors/invalid-execution-transition.error';
export { InvalidRuleSetError } from './errors/invalid-rule-set.error';
export { InvalidSegmentDefinitionError } from './errors/invalid-segment-definition.error';
export { InvalidWorkflowDefinitionError } from './errors/invalid-workflow-definition.error';
export { NonRetriableActionError } from './errors/non-retriable-action.error';
export { SegmentModeError } from './errors/segment-mode.error';
export { SegmentNotFoundError } from './errors/segment-not-found.error';
export { WorkflowDefinitionNotFoundError } from './errors/workflow-definition-not-found.error';

// Events
export { EngineEventType } from './events/engine-event-type.enum';
export type {
  DefinitionChangedEvent,
  ExecutionCreatedEvent,
  ExecutionStatusEvent,
  ExecutionStuckEvent,
  ExecutionWaitingEvent,
  RuleEvaluationFailedEvent,
  SegmentDefinedEvent,
  SegmentRecalculatedEvent,
  StepEvent,
  StepRetryScheduledEvent,
} from './events/engine-events';

// CLI
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  ACTION_HANDLER_METADATA,
  DEFAULT_WAKE_CRON_EXPRESSION,
  ENTITY_SNAPSHOT_PROVIDER,
  EXECUTION_STORE,
  NURTURE_ENGINE_OPTIONS,
  SEGMENT_STORE,
  TIMER_SERVICE,
  TRIGGER_NAMESPACE,
} from './nurture-engine.constants';
