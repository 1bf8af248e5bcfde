import { SetMetadata } from '@nestjs/common';
import { ACTION_HANDLER_METADATA } from '../nurture-engine.constants';

export interface ActionHandlerMetadata {
  actionKind: string;
}

/**
 * Marks a provider implementing IActionHandler as the handler for
 * `actionKind`. Picked up by ActionHandlerRegistry at module init.
 */
export function ActionHandler(actionKind: string): ClassDecorator {
  return (target: Function) => {
    const metadata: ActionHandlerMetadata = { actionKind };
    SetMetadata(ACTION_HANDLER_METADATA, metadata)(target);
  };
}
