import { SweepScheduler } from './sweep-scheduler';
import type { Logger } from '@remedy/core';

describe('SweepScheduler', () => {
  let logger: jest.Mocked<Logger.Logger>;

  beforeEach(() => {
    jest.useFakeTimers();
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should run each sweep at start and then on its interval', async () => {
    const reminders = jest.fn().mockResolvedValue(undefined);
    const acts = jest.fn().mockResolvedValue(undefined);
    const scheduler = new SweepScheduler([
      { name: 'reminders', intervalHours: 1, run: reminders },
      { name: 'acts', intervalHours: 2, run: acts },
    ], logger);

    await scheduler.start();
    expect(reminders).toHaveBeenCalledTimes(1);
    expect(acts).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(2 * 60 * 60 * 1000);
    scheduler.stop();

    expect(reminders).toHaveBeenCalledTimes(3);
    expect(acts).toHaveBeenCalledTimes(2);
  });

  it('should log a failed run and keep the schedule', async () => {
    const run = jest.fn().mockRejectedValue(new Error('store offline'));
    const scheduler = new SweepScheduler([{ name: 'acts', intervalHours: 1, run }], logger);

    await scheduler.start();
    await jest.advanceTimersByTimeAsync(60 * 60 * 1000);
    scheduler.stop();

    expect(run).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith('acts failed: store offline');
  });

  it('should not overlap runs of the same sweep', async () => {
    let release: () => void = () => undefined;
    const run = jest.fn(() => new Promise<void>(resolve => {
      release = resolve;
    }));
    const scheduler = new SweepScheduler([{ name: 'acts', intervalHours: 1, run }], logger);
    const sweep = { name: 'acts', intervalHours: 1, run };

    const first = scheduler.tick(sweep);
    await scheduler.tick(sweep);
    release();
    await first;

    expect(run).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('acts: previous run still in progress, skipping');
  });
});
