import type { ReportRecord, ReportMediaRecord } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { IEventStream, ReportSubmittedEvent } from '../../event_bus';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';
import type { IIdentityAdapter } from '../identity_adapter';
import type { IProblemAdapter, SubmissionTransition } from '../problem_adapter';
import type { IEscalationCheck } from '../review_adapter';
import type {
  IReportAdapter,
  ReportAdapterDependencies,
  ReportStatsEntry,
  SubmitReportInput,
} from './report_adapter.types';

import { createReportRecord, createMediaRecords } from '../../record_factories';
import { assertReportMedia } from '../../validation';
import {
  InvalidStateError,
  ListClosedError,
  NotAssigneeError,
  RecordNotFoundError,
} from '../../errors';
import { createLogger } from '../../logger';
import { systemClock } from '../../utils/date_utils';

/**
 * ReportAdapter - accepts completion reports from executors.
 *
 * A submission creates a pending report, stores its media metadata and
 * drives the problem to report_sent. Regular admins hear about it through
 * `report.submitted`; when there are none, the report is escalated to the
 * main admins straight away.
 */
export class ReportAdapter implements IReportAdapter {
  private entityStore: EntityStore;
  private problemAdapter: IProblemAdapter;
  private identityAdapter: IIdentityAdapter;
  private escalation: IEscalationCheck;
  private eventBus: IEventStream | undefined;
  private clock: Clock;
  private logger: Logger;

  constructor(dependencies: ReportAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.problemAdapter = dependencies.problemAdapter;
    this.identityAdapter = dependencies.identityAdapter;
    this.escalation = dependencies.escalation;
    this.eventBus = dependencies.eventBus;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger('[Reports] ');
  }

  async submitReport(input: SubmitReportInput): Promise<string> {
    const { problemId, submitterUserId } = input;

    const problem = await this.entityStore.getProblem(problemId);
    if (!problem) {
      throw new RecordNotFoundError('Problem', problemId);
    }
    const list = await this.entityStore.getList(problem.listId);
    if (list?.isClosed) {
      throw new ListClosedError(list.code);
    }
    if (problem.assignees.length > 0 && !problem.assignees.includes(submitterUserId)) {
      throw new NotAssigneeError(problemId, submitterUserId);
    }
    if (problem.status === 'accepted') {
      throw new InvalidStateError(`Problem ${problemId} is already accepted`);
    }

    const media: unknown = input.media ?? [];
    assertReportMedia(media);

    await this.identityAdapter.ensureUser({ id: submitterUserId, ...input.submitter });

    const report = await this.entityStore.insertReport(createReportRecord({
      problemId,
      submitterUserId,
      caption: input.caption ?? null,
      now: this.clock(),
    }));
    await this.entityStore.insertMedia(createMediaRecords(report.id, media));

    let transition: SubmissionTransition;
    try {
      transition = await this.problemAdapter.markReportSent(problemId, report.id);
    } catch (error) {
      // problem changed state since the checks above
      await this.entityStore.deleteReport(report.id);
      throw error;
    }
    const { supersededReportId } = transition;

    this.logger.info(
      `report ${report.id} submitted on problem ${problemId} by ${submitterUserId}` +
      (supersededReportId ? ` (supersedes ${supersededReportId})` : '')
    );

    if (this.eventBus) {
      const event: ReportSubmittedEvent = {
        type: 'report.submitted',
        timestamp: this.clock().getTime(),
        source: 'report_adapter',
        payload: {
          reportId: report.id,
          problemId,
          listId: problem.listId,
          submitterUserId,
          resubmission: supersededReportId !== null,
        },
      };
      this.eventBus.publish(event);
    }

    await this.escalation.checkEscalation(report.id);
    return report.id;
  }

  async getReport(reportId: string): Promise<ReportRecord | null> {
    return this.entityStore.getReport(reportId);
  }

  async listReportsForProblem(problemId: string): Promise<ReportRecord[]> {
    return this.entityStore.findReports({ problemId });
  }

  async getReportMedia(reportId: string): Promise<ReportMediaRecord[]> {
    return this.entityStore.findMediaForReport(reportId);
  }

  /**
   * Report counts per problem, for problems with at least one report.
   */
  async getReportStats(): Promise<ReportStatsEntry[]> {
    const reports = await this.entityStore.findReports();
    const byProblem = new Map<string, ReportRecord[]>();
    for (const report of reports) {
      const bucket = byProblem.get(report.problemId) ?? [];
      bucket.push(report);
      byProblem.set(report.problemId, bucket);
    }

    const problems = await this.entityStore.findProblems();
    const stats: ReportStatsEntry[] = [];
    for (const problem of problems) {
      const problemReports = byProblem.get(problem.id);
      if (!problemReports) continue;
      stats.push({
        problemId: problem.id,
        title: problem.title,
        total: problemReports.length,
        accepted: problemReports.filter(r => r.status === 'accepted').length,
        rejected: problemReports.filter(r => r.status === 'rejected').length,
      });
    }
    return stats;
  }
}
