import type {
  ProblemListRecord,
  ProblemRecord,
  ProblemStatus,
  ReviewDecision,
} from '../../record_types';
import type { EntityStore, DeleteListResult } from '../../entity_store';
import type {
  IEventStream,
  ListClosedEvent,
  ProblemStatusChangedEvent,
} from '../../event_bus';
import type { AggregateLock } from '../../transaction';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';
import type {
  IProblemAdapter,
  ProblemAdapterDependencies,
  ProblemStats,
  SubmissionTransition,
  DecisionTransition,
} from './problem_adapter.types';

import {
  createProblemListRecord,
  createProblemRecord,
  importedProblemFields,
} from '../../record_factories';
import { assertProblemImportRows } from '../../validation';
import {
  ConflictError,
  DetailedValidationError,
  InvalidStateError,
  ListClosedError,
  RecordNotFoundError,
} from '../../errors';
import { lockKeys } from '../../transaction';
import { createLogger } from '../../logger';
import { systemClock } from '../../utils/date_utils';

export const DEFAULT_REJECTION_REASON = 'No reason given';

function countByStatus(problems: ProblemRecord[]): ProblemStats {
  const stats: ProblemStats = { total: 0, inProgress: 0, reportSent: 0, accepted: 0, rejected: 0 };
  for (const problem of problems) {
    stats.total++;
    switch (problem.status) {
      case 'in_progress': stats.inProgress++; break;
      case 'report_sent': stats.reportSent++; break;
      case 'accepted': stats.accepted++; break;
      case 'rejected': stats.rejected++; break;
    }
  }
  return stats;
}

/**
 * ProblemAdapter - owns the problem state machine.
 *
 *   in_progress ─submit─▶ report_sent ─approve─▶ accepted (terminal)
 *        rejected ◀─reject─┘      ▲
 *           └──────resubmit───────┘
 *
 * Every transition runs under the problem's aggregate lock. After a
 * transition into accepted, the owning list is closed if every one of
 * its problems is accepted; that check takes the list lock only once
 * the problem lock has been released.
 */
export class ProblemAdapter implements IProblemAdapter {
  private entityStore: EntityStore;
  private lock: AggregateLock;
  private eventBus: IEventStream | undefined;
  private clock: Clock;
  private logger: Logger;

  constructor(dependencies: ProblemAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.lock = dependencies.lock;
    this.eventBus = dependencies.eventBus;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger('[Problems] ');
  }

  // ─── Import ─────────────────────────────────────────────

  /**
   * Find-or-create the list by code, then find-or-create each row's problem
   * by number. Existing problems get title, assignees and due date
   * overwritten; their status is left alone. All rows are validated before
   * anything is written.
   */
  async upsertProblems(listCode: string, rows: unknown, listTitle?: string): Promise<ProblemListRecord> {
    const code = listCode.trim();
    if (!code) {
      throw new DetailedValidationError('ProblemList', [
        { field: 'code', message: 'must not be empty', value: listCode },
      ]);
    }
    assertProblemImportRows(rows);
    const importRows = rows;

    const found = await this.findOrCreateList(code, listTitle);

    return this.lock.run(lockKeys.list(found.id), async () => {
      let list = await this.entityStore.getList(found.id);
      if (!list) {
        throw new RecordNotFoundError('ProblemList', code);
      }
      if (list.isClosed) {
        throw new ListClosedError(list.code);
      }

      const title = listTitle?.trim();
      if (title && title !== list.title) {
        list = await this.entityStore.updateList(list.id, { title });
      }

      let created = 0;
      let updated = 0;
      for (const row of importRows) {
        const record = createProblemRecord(list.id, row);
        await this.lock.run(lockKeys.problem(record.id), async () => {
          const existing = await this.entityStore.getProblem(record.id);
          if (existing) {
            await this.entityStore.updateProblem(record.id, importedProblemFields(row));
            updated++;
          } else {
            await this.entityStore.insertProblem(record);
            created++;
          }
        });
      }

      this.logger.info(`list ${list.code}: ${created} problems created, ${updated} updated`);
      return list;
    });
  }

  // ─── Transitions ────────────────────────────────────────

  /**
   * in_progress | rejected | report_sent → report_sent, making `reportId`
   * the live report. Fails on an accepted problem.
   */
  async markReportSent(problemId: string, reportId: string): Promise<SubmissionTransition> {
    const transition = await this.lock.run(lockKeys.problem(problemId), async () => {
      const problem = await this.requireProblem(problemId);
      if (problem.status === 'accepted') {
        throw new InvalidStateError(`Problem ${problemId} is already accepted`);
      }

      const updated = await this.entityStore.updateProblem(problemId, {
        status: 'report_sent',
        lastReportId: reportId,
      });
      return {
        problem: updated,
        previousStatus: problem.status,
        supersededReportId: problem.lastReportId,
      };
    });

    if (transition.previousStatus !== 'report_sent') {
      this.publishStatusChange(transition.problem, transition.previousStatus, reportId);
    }
    return transition;
  }

  /**
   * report_sent → accepted | rejected for the live report. A decision on a
   * superseded report leaves the problem untouched.
   */
  async applyDecision(
    problemId: string,
    reportId: string,
    decision: ReviewDecision,
    reason?: string | null
  ): Promise<DecisionTransition> {
    const outcome = await this.lock.run(lockKeys.problem(problemId), async () => {
      const problem = await this.requireProblem(problemId);

      if (problem.lastReportId !== reportId) {
        this.logger.debug(`report ${reportId} is superseded on problem ${problemId}; status kept`);
        return { problem, previousStatus: problem.status, applied: false };
      }
      if (problem.status !== 'report_sent') {
        throw new InvalidStateError(
          `Problem ${problemId} is ${problem.status}; a decision needs report_sent`
        );
      }

      const updated = decision === 'approved'
        ? await this.entityStore.updateProblem(problemId, { status: 'accepted', note: null })
        : await this.entityStore.updateProblem(problemId, {
          status: 'rejected',
          note: reason || DEFAULT_REJECTION_REASON,
        });
      return { problem: updated, previousStatus: problem.status, applied: true };
    });

    if (!outcome.applied) {
      return { problem: outcome.problem, applied: false, listClosed: false };
    }

    this.publishStatusChange(outcome.problem, outcome.previousStatus, reportId);

    const listClosed = outcome.problem.status === 'accepted'
      ? await this.closeListIfComplete(outcome.problem.listId)
      : false;

    return { problem: outcome.problem, applied: true, listClosed };
  }

  /**
   * Closes a non-empty list whose problems are all accepted. Never reopens.
   */
  async closeListIfComplete(listId: string): Promise<boolean> {
    const closed = await this.lock.run(lockKeys.list(listId), async () => {
      const list = await this.entityStore.getList(listId);
      if (!list || list.isClosed) {
        return null;
      }

      const problems = await this.entityStore.findProblems({ listId });
      if (problems.length === 0 || problems.some(p => p.status !== 'accepted')) {
        return null;
      }

      return this.entityStore.updateList(listId, {
        isClosed: true,
        closedAt: this.clock().toISOString(),
      });
    });

    if (!closed) {
      return false;
    }

    this.logger.info(`list ${closed.code} closed`);
    if (this.eventBus) {
      const event: ListClosedEvent = {
        type: 'list.closed',
        timestamp: this.clock().getTime(),
        source: 'problem_adapter',
        payload: { listId: closed.id, code: closed.code, title: closed.title },
      };
      this.eventBus.publish(event);
    }
    return true;
  }

  // ─── Queries ────────────────────────────────────────────

  async getProblem(problemId: string): Promise<ProblemRecord | null> {
    return this.entityStore.getProblem(problemId);
  }

  async getProblemByNumber(listCode: string, number: number): Promise<ProblemRecord | null> {
    const list = await this.entityStore.findListByCode(listCode);
    if (!list) {
      return null;
    }
    return this.entityStore.findProblemByNumber(list.id, number);
  }

  async listProblems(listCode: string): Promise<ProblemRecord[]> {
    const list = await this.requireList(listCode);
    return this.entityStore.findProblems({ listId: list.id });
  }

  async getProblemsForAssignee(
    userId: string,
    options: { onlyOpenLists?: boolean } = {}
  ): Promise<ProblemRecord[]> {
    const problems = await this.entityStore.findProblems({ assignee: userId });
    if (!(options.onlyOpenLists ?? true)) {
      return problems;
    }
    const openListIds = new Set((await this.entityStore.listLists({ onlyOpen: true })).map(l => l.id));
    return problems.filter(problem => openListIds.has(problem.listId));
  }

  async getList(listCode: string): Promise<ProblemListRecord | null> {
    return this.entityStore.findListByCode(listCode);
  }

  async listLists(options: { onlyOpen?: boolean } = {}): Promise<ProblemListRecord[]> {
    return this.entityStore.listLists(options);
  }

  // ─── Statistics ─────────────────────────────────────────

  async getListStats(listCode: string): Promise<ProblemStats> {
    return countByStatus(await this.listProblems(listCode));
  }

  async getAssigneeStats(userId: string): Promise<ProblemStats> {
    return countByStatus(await this.entityStore.findProblems({ assignee: userId }));
  }

  // ─── Administrative ─────────────────────────────────────

  async deleteList(listCode: string): Promise<DeleteListResult> {
    const list = await this.requireList(listCode);
    const result = await this.lock.run(lockKeys.list(list.id), () => this.entityStore.deleteList(list.id));
    this.logger.info(
      `list ${list.code} deleted with ${result.problems} problems and ${result.reports} reports`
    );
    return result;
  }

  // ─── Helpers ────────────────────────────────────────────

  private async findOrCreateList(code: string, title: string | undefined): Promise<ProblemListRecord> {
    const existing = await this.entityStore.findListByCode(code);
    if (existing) {
      return existing;
    }

    try {
      const list = await this.entityStore.insertList(createProblemListRecord(code, title, this.clock()));
      this.logger.info(`list ${code} created`);
      return list;
    } catch (error) {
      if (error instanceof ConflictError) {
        const current = await this.entityStore.findListByCode(code);
        if (current) return current;
      }
      throw error;
    }
  }

  private async requireProblem(problemId: string): Promise<ProblemRecord> {
    const problem = await this.entityStore.getProblem(problemId);
    if (!problem) {
      throw new RecordNotFoundError('Problem', problemId);
    }
    return problem;
  }

  private async requireList(listCode: string): Promise<ProblemListRecord> {
    const list = await this.entityStore.findListByCode(listCode);
    if (!list) {
      throw new RecordNotFoundError('ProblemList', listCode);
    }
    return list;
  }

  private publishStatusChange(problem: ProblemRecord, oldStatus: ProblemStatus, reportId: string): void {
    if (!this.eventBus) return;

    const event: ProblemStatusChangedEvent = {
      type: 'problem.status.changed',
      timestamp: this.clock().getTime(),
      source: 'problem_adapter',
      payload: {
        problemId: problem.id,
        listId: problem.listId,
        oldStatus,
        newStatus: problem.status,
        reportId,
      },
    };
    this.eventBus.publish(event);
  }
}
