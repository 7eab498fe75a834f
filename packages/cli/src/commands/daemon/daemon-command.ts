import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { SweepScheduler } from '../../services/sweep-scheduler';

/**
 * DaemonCommand - runs the reminder and act sweeps on the configured
 * intervals until interrupted.
 */
export class DaemonCommand extends BaseCommand {

  register(program: Command): void {
    program
      .command('daemon')
      .description('Run reminder and act sweeps periodically (Ctrl+C to stop)')
      .option('-v, --verbose', 'Verbose output')
      .action(async (options: BaseCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: BaseCommandOptions): Promise<SweepScheduler | undefined> {
    try {
      const remedy = await this.dependencyService.getRemedy();
      const config = await this.dependencyService.getConfigManager().resolveConfig();

      const scheduler = new SweepScheduler([
        {
          name: 'reminders',
          intervalHours: config.reminders.intervalHours,
          run: () => remedy.sendDueReminders(new Date()),
        },
        {
          name: 'acts',
          intervalHours: config.acts.intervalHours,
          run: () => remedy.runActSweep(),
        },
      ]);

      const shutdown = () => {
        scheduler.stop();
        void this.dependencyService.dispose().then(() => process.exit(0));
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);

      await scheduler.start();
      console.log(`🕒 Remedy daemon running for ${config.projectName}`);
      return scheduler;
    } catch (error) {
      this.handleError(
        `Failed to start daemon: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error
      );
      return undefined;
    }
  }
}
