import { Injectable } from '@nestjs/common';
import { ActionHandler } from '../decorators/action-handler.decorator';
import type {
  ActionResult,
  IActionHandler,
} from '../interfaces/action-handler.interface';

export const WAIT_ACTION_KIND = 'wait';

/** Does nothing; for steps that exist only to carry a delay. */
@Injectable()
@ActionHandler(WAIT_ACTION_KIND)
export class WaitActionHandler implements IActionHandler {
  async execute(): Promise<ActionResult> {
    return { success: true };
  }
}
