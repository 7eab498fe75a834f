import type { ProblemListRecord, ProblemRecord } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { IEventStream, ActGeneratedEvent } from '../../event_bus';
import type { AggregateLock } from '../../transaction';
import type { CertificateContext, DocumentRenderer } from '../../document_renderer';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';

import { createActEntryRecord } from '../../record_factories';
import { ConflictError } from '../../errors';
import { lockKeys } from '../../transaction';
import { createLogger } from '../../logger';
import { formatCalendarDate, systemClock } from '../../utils/date_utils';
import { isValidExternalId } from '../../utils/id_generator';

export type ActSweepEntry = {
  assigneeId: string;
  certificateContext: CertificateContext;
  coveredProblemIds: string[];
  /** Reference returned by the renderer */
  document: string;
};

/**
 * ActAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface ActAdapterDependencies {
  entityStore: EntityStore;
  renderer: DocumentRenderer;
  lock: AggregateLock;

  // Optional: Event Bus for event-driven integration
  eventBus?: IEventStream;
  clock?: Clock;
  logger?: Logger;
}

/**
 * ActAdapter - issues completion certificates ("acts").
 *
 * For each executor, collects accepted problems they are assigned to and
 * have no act entry for, renders one certificate covering all of them and
 * then records one entry per problem. Entries are written only after a
 * successful render, so a crash in between can duplicate a certificate
 * but never lose one.
 */
export class ActAdapter {
  private entityStore: EntityStore;
  private renderer: DocumentRenderer;
  private lock: AggregateLock;
  private eventBus: IEventStream | undefined;
  private clock: Clock;
  private logger: Logger;

  constructor(dependencies: ActAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.renderer = dependencies.renderer;
    this.lock = dependencies.lock;
    this.eventBus = dependencies.eventBus;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger('[Acts] ');
  }

  async runActSweep(): Promise<ActSweepEntry[]> {
    const lists = new Map(
      (await this.entityStore.listLists()).map(list => [list.id, list] as const)
    );
    const accepted = await this.entityStore.findProblems({ statuses: ['accepted'] });
    const listCode = (problem: ProblemRecord) => lists.get(problem.listId)?.code ?? '';
    const ordered = [...accepted].sort(
      (a, b) => listCode(a).localeCompare(listCode(b)) || a.number - b.number
    );

    const results: ActSweepEntry[] = [];
    for (const assigneeId of await this.knownExecutors()) {
      if (!isValidExternalId(assigneeId)) {
        this.logger.warn(`skipping executor with unusable id "${assigneeId}"`);
        continue;
      }
      const entry = await this.lock.run(lockKeys.acts(assigneeId), () =>
        this.runForExecutor(assigneeId, ordered, lists)
      );
      if (entry) {
        results.push(entry);
      }
    }

    this.logger.info(`act sweep: ${results.length} certificates generated`);
    return results;
  }

  /**
   * Every assignee of any problem plus every staff directory entry.
   */
  private async knownExecutors(): Promise<string[]> {
    const executors = new Set<string>();
    for (const problem of await this.entityStore.findProblems()) {
      for (const assigneeId of problem.assignees) {
        executors.add(assigneeId);
      }
    }
    for (const member of await this.entityStore.listStaff()) {
      executors.add(member.assigneeId);
    }
    return [...executors].sort();
  }

  private async runForExecutor(
    assigneeId: string,
    accepted: ProblemRecord[],
    lists: Map<string, ProblemListRecord>
  ): Promise<ActSweepEntry | null> {
    const pending: ProblemRecord[] = [];
    for (const problem of accepted) {
      if (!problem.assignees.includes(assigneeId)) continue;
      if (await this.entityStore.findActEntry(problem.id, assigneeId)) continue;
      pending.push(problem);
    }

    const [first] = pending;
    if (!first) {
      return null;
    }

    const staff = await this.entityStore.findStaff(assigneeId);
    const firstList = lists.get(first.listId);
    const context: CertificateContext = {
      assigneeId,
      fio: staff?.fio ?? null,
      post: staff?.post ?? null,
      listCode: firstList?.code ?? '',
      listTitle: firstList?.title ?? '',
      problemNumbers: pending.map(problem => problem.number),
      problems: pending.map(problem => ({
        listCode: lists.get(problem.listId)?.code ?? '',
        number: problem.number,
        title: problem.title,
      })),
      generatedOn: formatCalendarDate(this.clock()),
    };

    let document: string;
    try {
      document = (await this.renderer.render(context)).reference;
    } catch (error) {
      this.logger.error(
        `certificate for ${assigneeId} failed: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }

    const now = this.clock();
    for (const problem of pending) {
      try {
        await this.entityStore.insertActEntry(createActEntryRecord(problem.id, assigneeId, now));
      } catch (error) {
        if (!(error instanceof ConflictError)) {
          throw error;
        }
        this.logger.debug(`act entry for ${problem.id}/${assigneeId} already recorded`);
      }
    }

    const coveredProblemIds = pending.map(problem => problem.id);
    if (this.eventBus) {
      const event: ActGeneratedEvent = {
        type: 'act.generated',
        timestamp: now.getTime(),
        source: 'act_adapter',
        payload: {
          assigneeId,
          problemIds: coveredProblemIds,
          problemNumbers: context.problemNumbers,
          listCode: context.listCode,
          document,
        },
      };
      this.eventBus.publish(event);
    }

    return { assigneeId, certificateContext: context, coveredProblemIds, document };
  }
}
