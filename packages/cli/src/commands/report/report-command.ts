import { Command } from 'commander';
import type { Records } from '@remedy/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface ReportSubmitOptions extends BaseCommandOptions {
  user: string;
  caption?: string;
  photo?: string[];
  file?: string[];
}

export interface ReportVoteOptions extends BaseCommandOptions {
  admin: string;
  approve?: boolean;
  reject?: boolean;
  reason?: string;
}

const DECISION_ICONS: Record<Records.ReviewDecision | 'pending', string> = {
  approved: '👍',
  rejected: '👎',
  pending: '…',
};

/**
 * ReportCommand - report submission, admin votes and vote breakdown.
 */
export class ReportCommand extends BaseCommand {

  register(program: Command): void {
    const report = program
      .command('report')
      .description('Submit and review completion reports')
      .alias('r');

    // remedy report submit ROOF 3 --user 100 --caption "done" --photo ./a.jpg
    report
      .command('submit <listCode> <number>')
      .description('Submit a completion report for a problem')
      .requiredOption('-u, --user <id>', 'Submitting executor id')
      .option('-c, --caption <text>', 'Report comment')
      .option('--photo <paths...>', 'Attached photo paths')
      .option('--file <paths...>', 'Attached document paths')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .option('-q, --quiet', 'Quiet output')
      .action(async (listCode: string, number: string, options: ReportSubmitOptions) => {
        await this.executeSubmit(listCode, number, options);
      });

    report
      .command('vote <reportId>')
      .description('Approve or reject a report as an admin')
      .requiredOption('-a, --admin <id>', 'Voting admin id')
      .option('--approve', 'Approve the report')
      .option('--reject', 'Reject the report')
      .option('-r, --reason <text>', 'Rejection reason')
      .option('--json', 'Output as JSON')
      .option('-v, --verbose', 'Verbose output')
      .action(async (reportId: string, options: ReportVoteOptions) => {
        await this.executeVote(reportId, options);
      });

    report
      .command('summary <reportId>')
      .description('Show the report and every admin vote on it')
      .option('--json', 'Output as JSON')
      .action(async (reportId: string, options: BaseCommandOptions) => {
        await this.executeSummary(reportId, options);
      });
  }

  async executeSubmit(listCode: string, number: string, options: ReportSubmitOptions): Promise<void> {
    const problemNumber = Number(number);
    if (!Number.isInteger(problemNumber) || problemNumber < 1) {
      this.handleError(`Problem number must be a positive integer, got "${number}"`, options);
      return;
    }

    await this.run(options, 'Failed to submit report', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const problem = await remedy.problems.getProblemByNumber(listCode, problemNumber);
      if (!problem) {
        throw new Error(`Problem #${problemNumber} not found in list ${listCode}`);
      }

      const media = [
        ...(options.photo ?? []).map(p => ({ kind: 'photo', path: p })),
        ...(options.file ?? []).map(p => ({ kind: 'document', path: p })),
      ];
      const reportId = await remedy.submitReport(problem.id, options.user, {
        caption: options.caption,
        media,
      });
      await remedy.waitForIdle();

      this.handleSuccess(
        { reportId, problemId: problem.id },
        options,
        `Report ${reportId} submitted for ${listCode} #${problemNumber}`
      );
    });
  }

  async executeVote(reportId: string, options: ReportVoteOptions): Promise<void> {
    if (options.approve === options.reject) {
      this.handleError('Pass exactly one of --approve or --reject', options);
      return;
    }
    const decision: Records.ReviewDecision = options.approve ? 'approved' : 'rejected';

    await this.run(options, 'Failed to record vote', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const result = await remedy.castVote(reportId, options.admin, decision, options.reason);
      await remedy.waitForIdle();

      let message = `Vote recorded: ${decision}`;
      if (result.finalized) {
        message = `Report ${reportId} finalized as ${result.status}`;
      } else if (result.escalated) {
        message = `Vote recorded: every regular admin approved, report forwarded to main admins`;
      }
      this.handleSuccess(result, options, message);
    });
  }

  async executeSummary(reportId: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Failed to read votes', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const report = await remedy.reports.getReport(reportId);
      const votes = await remedy.getVoteSummary(reportId);

      const lines = votes.map(v => `   ${DECISION_ICONS[v.decision]} ${v.adminId} (${v.tier ?? 'former admin'}): ${v.decision}`);
      const header = report
        ? `Report ${reportId}: ${report.status}${report.escalatedAt ? ', escalated' : ''}`
        : `Report ${reportId}`;
      this.handleSuccess({ report, votes }, options, [header, ...lines].join('\n'));
    });
  }
}
