import type { ITimerService } from '../../src/interfaces/timer-service.interface';
import { StepScheduler } from '../../src/services/step-scheduler.service';
import { StoreBackedTimerService } from '../../src/services/store-backed-timer.service';
import { START } from '../helpers';

describe('StepScheduler', () => {
  it('should compute the wake time from the delay', () => {
    const scheduler = new StepScheduler(new StoreBackedTimerService());

    expect(scheduler.computeWakeAt(START, 90_000)).toEqual(
      new Date('2025-01-01T00:01:30.000Z'),
    );
  });

  it('should hand wake requests to the timer service', async () => {
    const timer: jest.Mocked<ITimerService> = {
      scheduleWake: jest.fn().mockResolvedValue(undefined),
    };
    const scheduler = new StepScheduler(timer);

    await scheduler.scheduleWake('ex-1', 60_000);

    expect(timer.scheduleWake).toHaveBeenCalledWith('ex-1', 60_000);
  });

  it('should deliver wakes to the registered handler', async () => {
    const scheduler = new StepScheduler(new StoreBackedTimerService());
    const handler = jest.fn().mockResolvedValue(undefined);
    scheduler.registerWakeHandler(handler);

    await scheduler.onWake('ex-1');

    expect(handler).toHaveBeenCalledWith('ex-1');
  });

  it('should refuse to deliver a wake before a handler is registered', async () => {
    const scheduler = new StepScheduler(new StoreBackedTimerService());

    await expect(scheduler.onWake('ex-1')).rejects.toThrow(
      'No wake handler registered; cannot wake execution ex-1',
    );
  });
});
