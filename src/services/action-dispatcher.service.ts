import { Inject, Injectable, Logger } from '@nestjs/common';
import { NonRetriableActionError } from '../errors/non-retriable-action.error';
import type {
  ActionExecutionContext,
  ActionResult,
} from '../interfaces/action-handler.interface';
import type { ResolvedEngineOptions } from '../interfaces/nurture-engine-module-options.interface';
import { NURTURE_ENGINE_OPTIONS } from '../nurture-engine.constants';
import { computeBackoffMs } from '../utils/compute-backoff';
import { ActionHandlerRegistry } from './action-handler-registry.service';

export type RetryPolicyOptions = Pick<
  ResolvedEngineOptions,
  'retryBaseDelayMs' | 'retryMaxDelayMs'
>;

export type RetryDecision =
  | { retry: true; retryCount: number; delayMs: number }
  | { retry: false };

@Injectable()
export class ActionDispatcher {
  private readonly logger = new Logger(ActionDispatcher.name);

  constructor(
    private readonly registry: ActionHandlerRegistry,
    @Inject(NURTURE_ENGINE_OPTIONS)
    private readonly options: RetryPolicyOptions,
  ) {}

  /**
   * Runs the handler for `actionKind`. Never throws: a thrown handler error
   * becomes a failed result, retriable unless it is a NonRetriableActionError.
   */
  async dispatch(
    actionKind: string,
    parameters: Record<string, unknown>,
    context: ActionExecutionContext,
  ): Promise<ActionResult> {
    const handler = this.registry.get(actionKind);
    if (!handler) {
      return {
        success: false,
        error: `No action handler registered for kind "${actionKind}"`,
        retriable: false,
      };
    }

    try {
      const result = await handler.execute(parameters, context);
      if (result.success) {
        return { success: true, output: result.output ?? {} };
      }
      return {
        success: false,
        error: result.error ?? `Action "${actionKind}" failed`,
        retriable: result.retriable ?? true,
      };
    } catch (error) {
      const retriable = !(error instanceof NonRetriableActionError);
      this.logger.error(
        `Action "${actionKind}" threw for execution ${context.executionId} step ${context.stepIndex} (attempt ${context.attempt})`,
        error instanceof Error ? error.stack : error,
      );
      return {
        success: false,
        error: error instanceof Error ? error.message : String(error),
        retriable,
      };
    }
  }

  /**
   * Retry policy for a failed dispatch: another attempt after exponential
   * backoff while `retryCount < maxRetries`, otherwise give up.
   */
  planRetry(
    result: ActionResult,
    retryCount: number,
    maxRetries: number,
  ): RetryDecision {
    if (result.success || result.retriable === false || retryCount >= maxRetries) {
      return { retry: false };
    }
    return {
      retry: true,
      retryCount: retryCount + 1,
      delayMs: computeBackoffMs(
        retryCount,
        this.options.retryBaseDelayMs,
        this.options.retryMaxDelayMs,
      ),
    };
  }
}
