export interface ActionResult {
  success: boolean;
  output?: Record<string, unknown>;
  error?: string;
  /** Only consulted when `success` is false. */
  retriable?: boolean;
}

export interface ActionExecutionContext {
  executionId: string;
  workflowId: string;
  entityId: string;
  stepIndex: number;
  /** 1 for the first dispatch of the step, incremented on each retry. */
  attempt: number;
  context: Readonly<Record<string, unknown>>;
}

export interface IActionHandler {
  execute(
    parameters: Record<string, unknown>,
    context: ActionExecutionContext,
  ): Promise<ActionResult>;
}
