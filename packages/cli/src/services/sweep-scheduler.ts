import { Logger } from '@remedy/core';

const MS_PER_HOUR = 60 * 60 * 1000;

export type ScheduledSweep = {
  name: string;
  intervalHours: number;
  run: () => Promise<unknown>;
};

/**
 * Interval trigger for the reminder and act sweeps. Each sweep runs once
 * at start, then every `intervalHours`. A run that is still going when its
 * next tick fires is not started twice.
 */
export class SweepScheduler {
  private timers: NodeJS.Timeout[] = [];
  private running = new Set<string>();
  private readonly logger: Logger.Logger;

  constructor(private readonly sweeps: ScheduledSweep[], logger?: Logger.Logger) {
    this.logger = logger ?? Logger.createLogger('[Scheduler] ');
  }

  async start(): Promise<void> {
    for (const sweep of this.sweeps) {
      await this.tick(sweep);
      this.timers.push(setInterval(() => {
        void this.tick(sweep);
      }, sweep.intervalHours * MS_PER_HOUR));
      this.logger.info(`${sweep.name}: every ${sweep.intervalHours}h`);
    }
  }

  stop(): void {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
  }

  /**
   * Runs one sweep now. Failures are logged; the schedule continues.
   */
  async tick(sweep: ScheduledSweep): Promise<void> {
    if (this.running.has(sweep.name)) {
      this.logger.warn(`${sweep.name}: previous run still in progress, skipping`);
      return;
    }

    this.running.add(sweep.name);
    try {
      await sweep.run();
    } catch (error) {
      this.logger.error(`${sweep.name} failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      this.running.delete(sweep.name);
    }
  }
}
