export enum EngineEventType {
  EXECUTION_CREATED = 'workflow.execution.created',
  EXECUTION_WAITING = 'workflow.execution.waiting',
  EXECUTION_COMPLETED = 'workflow.execution.completed',
  EXECUTION_FAILED = 'workflow.execution.failed',
  EXECUTION_PAUSED = 'workflow.execution.paused',
  EXECUTION_RESUMED = 'workflow.execution.resumed',
  EXECUTION_CANCELLED = 'workflow.execution.cancelled',
  EXECUTION_STUCK = 'workflow.execution.stuck',
  STEP_COMPLETED = 'workflow.step.completed',
  STEP_SKIPPED = 'workflow.step.skipped',
  STEP_RETRY_SCHEDULED = 'workflow.step.retry_scheduled',
  RULE_EVALUATION_FAILED = 'rules.evaluation.failed',
  DEFINITION_PUBLISHED = 'workflow.definition.published',
  DEFINITION_DEACTIVATED = 'workflow.definition.deactivated',
  SEGMENT_DEFINED = 'segment.defined',
  SEGMENT_RECALCULATED = 'segment.recalculated',
}
