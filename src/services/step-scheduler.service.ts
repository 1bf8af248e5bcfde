import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ITimerService } from '../interfaces/timer-service.interface';
import { TIMER_SERVICE } from '../nurture-engine.constants';

export type WakeHandler = (executionId: string) => Promise<void>;

/**
 * The engine's only suspension point. Callers persist `nextWakeAt` first,
 * then ask for a wake; the timer calls back through `onWake`.
 */
@Injectable()
export class StepScheduler {
  private readonly logger = new Logger(StepScheduler.name);
  private wakeHandler: WakeHandler | null = null;

  constructor(
    @Inject(TIMER_SERVICE) private readonly timerService: ITimerService,
  ) {}

  registerWakeHandler(handler: WakeHandler): void {
    this.wakeHandler = handler;
  }

  computeWakeAt(now: Date, delayMs: number): Date {
    return new Date(now.getTime() + delayMs);
  }

  async scheduleWake(executionId: string, delayMs: number): Promise<void> {
    await this.timerService.scheduleWake(executionId, delayMs);
  }

  async onWake(executionId: string): Promise<void> {
    if (!this.wakeHandler) {
      throw new Error(
        `No wake handler registered; cannot wake execution ${executionId}`,
      );
    }
    this.logger.debug(`Delivering wake for ${executionId}`);
    await this.wakeHandler(executionId);
  }
}
