import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { readRowsFile } from '../../services/row-reader';

/**
 * StaffCommand - the executor directory used on certificates.
 */
export class StaffCommand extends BaseCommand {

  register(program: Command): void {
    const staff = program
      .command('staff')
      .description('Manage the staff directory (post and full name per executor)');

    staff
      .command('import <file>')
      .description('Upsert staff rows {assignee, post, fio} from a JSON or YAML file')
      .option('--json', 'Output as JSON')
      .option('-q, --quiet', 'Quiet output')
      .action(async (file: string, options: BaseCommandOptions) => {
        await this.executeImport(file, options);
      });

    staff
      .command('list')
      .description('List the staff directory')
      .option('--json', 'Output as JSON')
      .action(async (options: BaseCommandOptions) => {
        await this.executeList(options);
      });
  }

  async executeImport(file: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Failed to import staff', async () => {
      const { rows } = await readRowsFile(file);
      const remedy = await this.dependencyService.getRemedy();
      const members = await remedy.identity.importStaff(rows);

      this.handleSuccess({ imported: members.length }, options, `${members.length} staff entries imported`);
    });
  }

  async executeList(options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Failed to list staff', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const members = await remedy.identity.listStaff();

      const lines = members.map(m => `   ${m.assigneeId}: ${m.fio ?? '—'}, ${m.post ?? '—'}`);
      this.handleSuccess({ staff: members }, options, [`${members.length} staff entries`, ...lines].join('\n'));
    });
  }
}
