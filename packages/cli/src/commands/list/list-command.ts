import { Command } from 'commander';
import type { Records } from '@remedy/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { readRowsFile } from '../../services/row-reader';

export interface ListImportOptions extends BaseCommandOptions {
  title?: string;
}

export interface ListShowOptions extends BaseCommandOptions {
  open?: boolean;
}

export interface ListDeleteOptions extends BaseCommandOptions {
  yes?: boolean;
}

const STATUS_ICONS: Record<Records.ProblemStatus, string> = {
  in_progress: '⏳',
  report_sent: '📤',
  accepted: '✅',
  rejected: '❌',
};

function formatProblem(problem: Records.ProblemRecord): string {
  const due = problem.dueDate ? ` (due ${problem.dueDate})` : '';
  const assignees = problem.assignees.length > 0 ? ` → ${problem.assignees.join(', ')}` : '';
  return `   ${STATUS_ICONS[problem.status]} #${problem.number} ${problem.title}${due}${assignees}`;
}

/**
 * ListCommand - problem list import, display, statistics and removal.
 */
export class ListCommand extends BaseCommand {

  register(program: Command): void {
    const list = program
      .command('list')
      .description('Manage problem lists')
      .alias('l');

    // remedy list import ROOF ./roof.yaml --title "Roof repairs"
    list
      .command('import <code> <file>')
      .description('Create or update a list from a JSON or YAML file of problems')
      .option('-t, --title <title>', 'List title (default: file title or code)')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (code: string, file: string, options: ListImportOptions) => {
        await this.executeImport(code, file, options);
      });

    list
      .command('show [code]')
      .description('Show one list with its problems, or every list')
      .option('--open', 'Only open lists')
      .option('--json', 'Output as JSON')
      .action(async (code: string | undefined, options: ListShowOptions) => {
        await this.executeShow(code, options);
      });

    list
      .command('stats <code>')
      .description('Count problems per status')
      .option('--json', 'Output as JSON')
      .action(async (code: string, options: BaseCommandOptions) => {
        await this.executeStats(code, options);
      });

    list
      .command('delete <code>')
      .description('Delete a list with its problems, reports, reviews and media')
      .option('-y, --yes', 'Confirm deletion')
      .option('--json', 'Output as JSON')
      .action(async (code: string, options: ListDeleteOptions) => {
        await this.executeDelete(code, options);
      });
  }

  async executeImport(code: string, file: string, options: ListImportOptions): Promise<void> {
    await this.run(options, 'Failed to import list', async () => {
      const { rows, title } = await readRowsFile(file);
      const remedy = await this.dependencyService.getRemedy();

      const list = await remedy.upsertProblems(code, rows, options.title ?? title);
      const problems = await remedy.problems.listProblems(list.code);

      this.handleSuccess(
        { list, problemCount: problems.length },
        options,
        `List ${list.code} "${list.title}" imported: ${problems.length} problems`
      );
    });
  }

  async executeShow(code: string | undefined, options: ListShowOptions): Promise<void> {
    await this.run(options, 'Failed to show lists', async () => {
      const remedy = await this.dependencyService.getRemedy();

      if (code === undefined) {
        const lists = await remedy.problems.listLists({ onlyOpen: options.open ?? false });
        const lines = lists.map(l => `   ${l.isClosed ? '🔒' : '📋'} ${l.code} ${l.title}`);
        this.handleSuccess({ lists }, options, [`${lists.length} lists`, ...lines].join('\n'));
        return;
      }

      const list = await remedy.problems.getList(code);
      if (!list) {
        throw new Error(`List ${code} not found`);
      }
      const problems = await remedy.problems.listProblems(code);
      const state = list.isClosed ? `closed ${list.closedAt ?? ''}`.trim() : 'open';
      this.handleSuccess(
        { list, problems },
        options,
        [`${list.code} "${list.title}" (${state})`, ...problems.map(formatProblem)].join('\n')
      );
    });
  }

  async executeStats(code: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Failed to compute statistics', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const stats = await remedy.problems.getListStats(code);

      this.handleSuccess(stats, options, [
        `${code}: ${stats.total} problems`,
        `   in progress: ${stats.inProgress}`,
        `   report sent: ${stats.reportSent}`,
        `   accepted:    ${stats.accepted}`,
        `   rejected:    ${stats.rejected}`,
      ].join('\n'));
    });
  }

  async executeDelete(code: string, options: ListDeleteOptions): Promise<void> {
    if (!options.yes) {
      this.handleError(`Refusing to delete list ${code} without --yes`, options);
      return;
    }

    await this.run(options, 'Failed to delete list', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const result = await remedy.problems.deleteList(code);

      this.handleSuccess(
        result,
        options,
        `List ${code} deleted: ${result.problems} problems, ${result.reports} reports`
      );
    });
  }
}
