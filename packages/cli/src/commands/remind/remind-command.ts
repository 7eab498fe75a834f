import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface RemindOptions extends BaseCommandOptions {
  date?: string;
  dryRun?: boolean;
}

/**
 * RemindCommand - one reminder sweep.
 */
export class RemindCommand extends BaseCommand<RemindOptions> {

  register(program: Command): void {
    program
      .command('remind')
      .description('Send deadline reminders for problems due within the window')
      .option('-d, --date <YYYY-MM-DD>', 'Day to evaluate (default: today)')
      .option('--dry-run', 'List due reminders without sending them')
      .option('--json', 'Output as JSON')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: RemindOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: RemindOptions): Promise<void> {
    await this.run(options, 'Reminder sweep failed', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const today = options.date ?? new Date();

      if (options.dryRun) {
        const reminders = await remedy.dueReminders(today);
        const lines = reminders.map(r => `   ${r.assigneeId}: ${r.problemId} due ${r.dueDate} (${r.daysLeft}d)`);
        this.handleSuccess({ reminders }, options, [`${reminders.length} reminders due`, ...lines].join('\n'));
        return;
      }

      const outcome = await remedy.sendDueReminders(today);
      this.handleSuccess(outcome, options, `Reminders: ${outcome.sent} sent, ${outcome.failed} failed`);
    });
  }
}
