import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * ActsCommand - completion certificate sweep.
 */
export class ActsCommand extends BaseCommand {

  register(program: Command): void {
    const acts = program
      .command('acts')
      .description('Completion certificates ("acts")');

    acts
      .command('sweep')
      .description('Issue one certificate per executor for newly accepted problems')
      .option('--json', 'Output as JSON')
      .option('-q, --quiet', 'Quiet output')
      .action(async (options: BaseCommandOptions) => {
        await this.executeSweep(options);
      });
  }

  async executeSweep(options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Act sweep failed', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const entries = await remedy.runActSweep();
      await remedy.waitForIdle();

      const lines = entries.map(e =>
        `   ${e.assigneeId}: problems ${e.certificateContext.problemNumbers.join(', ')} → ${e.document}`
      );
      this.handleSuccess(
        { certificates: entries },
        options,
        [`${entries.length} certificates issued`, ...lines].join('\n')
      );
    });
  }
}
