import { Injectable, Logger } from '@nestjs/common';
import type { ITimerService } from '../interfaces/timer-service.interface';

/**
 * Default timer. The wake time is already persisted on the execution, so
 * delivery is left to WakeCronService; this only records the request.
 */
@Injectable()
export class StoreBackedTimerService implements ITimerService {
  private readonly logger = new Logger(StoreBackedTimerService.name);

  async scheduleWake(executionId: string, delayMs: number): Promise<void> {
    this.logger.debug(
      `Wake for ${executionId} in ${delayMs}ms left to the wake sweep`,
    );
  }
}
