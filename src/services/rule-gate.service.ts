import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { EngineEventType } from '../events/engine-event-type.enum';
import type { RuleEvaluationFailedEvent } from '../events/engine-events';
import type {
  EntitySnapshot,
  RuleEvaluationResult,
  RuleSet,
} from '../interfaces/rule-set.interface';
import { RuleEvaluator } from './rule-evaluator.service';

/**
 * Runs the evaluator for a gating decision and reports the outcome:
 * a non-match is a debug line, an evaluation error is a warning plus a
 * `rules.evaluation.failed` event.
 */
@Injectable()
export class RuleGate {
  private readonly logger = new Logger(RuleGate.name);

  constructor(
    private readonly evaluator: RuleEvaluator,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  evaluate(
    scope: string,
    entityId: string,
    snapshot: EntitySnapshot,
    ruleSet: RuleSet,
    now: Date,
  ): RuleEvaluationResult {
    const result = this.evaluator.evaluate(snapshot, ruleSet, now);

    if (result.status === 'not_matched') {
      this.logger.debug(
        `${scope}: entity ${entityId} failed rule ${result.ruleIndex}`,
      );
    } else if (result.status === 'error') {
      this.reportFailure(scope, entityId, result.ruleIndex, result.error, now);
    }

    return result;
  }

  /**
   * Reports a rule set that could not be evaluated at all, such as when the
   * snapshot itself failed to load. The error is attributed to `ruleIndex`.
   */
  reportFailure(
    scope: string,
    entityId: string,
    ruleIndex: number,
    error: string,
    now: Date,
  ): void {
    this.logger.warn(
      `${scope}: rule ${ruleIndex} could not be evaluated for entity ${entityId}: ${error}`,
    );
    this.eventEmitter.emit(EngineEventType.RULE_EVALUATION_FAILED, {
      scope,
      entityId,
      ruleIndex,
      error,
      timestamp: now,
    } satisfies RuleEvaluationFailedEvent);
  }
}
