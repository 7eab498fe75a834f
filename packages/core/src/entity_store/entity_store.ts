import type { RecordStore, RecordStores } from '../record_store';
import type {
  UserRecord,
  UserRole,
  ProblemListRecord,
  ProblemRecord,
  ProblemStatus,
  ReportRecord,
  ReportReviewRecord,
  ReportMediaRecord,
  ActEntryRecord,
  StaffMemberRecord,
} from '../record_types';
import { ConflictError, RecordNotFoundError } from '../errors';
import {
  generateActEntryId,
  generateProblemId,
  generateReviewId,
  generateStaffId,
} from '../utils/id_generator';

type Identified = { id: string };

export type ProblemQuery = {
  listId?: string;
  statuses?: ProblemStatus[];
  /** Executor id that must be a member of `assignees` */
  assignee?: string;
};

export type DeleteListResult = {
  problems: number;
  reports: number;
  reviews: number;
  media: number;
};

/**
 * EntityStore - typed CRUD over the record stores
 *
 * Uniqueness is enforced through ids: problems, reviews, act entries and
 * staff rows use ids derived from their unique key, so two writers of the
 * same key address the same record. `insert*` fails with ConflictError if
 * the id exists; `update*` fails with RecordNotFoundError if it doesn't.
 *
 * Set queries scan the store. Where ids share a prefix with their parent
 * (problems of a list, reviews of a report) only matching ids are read.
 */
export class EntityStore {
  constructor(private readonly stores: RecordStores) { }

  // ─── Users ──────────────────────────────────────────────

  getUser(id: string): Promise<UserRecord | null> {
    return this.stores.users.get(id);
  }

  insertUser(user: UserRecord): Promise<UserRecord> {
    return this.insert(this.stores.users, 'User', user);
  }

  updateUser(id: string, patch: Partial<Omit<UserRecord, 'id'>>): Promise<UserRecord> {
    return this.update(this.stores.users, 'User', id, patch);
  }

  async findUsers(query: { role?: UserRole } = {}): Promise<UserRecord[]> {
    const users = await this.all(this.stores.users);
    return users
      .filter(user => query.role === undefined || user.role === query.role)
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  // ─── Problem lists ──────────────────────────────────────

  getList(id: string): Promise<ProblemListRecord | null> {
    return this.stores.lists.get(id);
  }

  async findListByCode(code: string): Promise<ProblemListRecord | null> {
    const lists = await this.all(this.stores.lists);
    return lists.find(list => list.code === code) ?? null;
  }

  async insertList(list: ProblemListRecord): Promise<ProblemListRecord> {
    if (await this.findListByCode(list.code)) {
      throw new ConflictError('ProblemList', list.code);
    }
    return this.insert(this.stores.lists, 'ProblemList', list);
  }

  updateList(id: string, patch: Partial<Omit<ProblemListRecord, 'id'>>): Promise<ProblemListRecord> {
    return this.update(this.stores.lists, 'ProblemList', id, patch);
  }

  async listLists(query: { onlyOpen?: boolean } = {}): Promise<ProblemListRecord[]> {
    const lists = await this.all(this.stores.lists);
    return lists
      .filter(list => !query.onlyOpen || !list.isClosed)
      .sort((a, b) => a.code.localeCompare(b.code));
  }

  // ─── Problems ───────────────────────────────────────────

  getProblem(id: string): Promise<ProblemRecord | null> {
    return this.stores.problems.get(id);
  }

  findProblemByNumber(listId: string, number: number): Promise<ProblemRecord | null> {
    return this.stores.problems.get(generateProblemId(listId, number));
  }

  insertProblem(problem: ProblemRecord): Promise<ProblemRecord> {
    return this.insert(this.stores.problems, 'Problem', problem);
  }

  updateProblem(id: string, patch: Partial<Omit<ProblemRecord, 'id'>>): Promise<ProblemRecord> {
    return this.update(this.stores.problems, 'Problem', id, patch);
  }

  /**
   * Problems matching every given criterion, ordered by list then number.
   */
  async findProblems(query: ProblemQuery = {}): Promise<ProblemRecord[]> {
    const prefix = query.listId !== undefined ? `${query.listId}-problem-` : undefined;
    const problems = await this.all(this.stores.problems, prefix);
    return problems
      .filter(problem =>
        (query.listId === undefined || problem.listId === query.listId) &&
        (query.statuses === undefined || query.statuses.includes(problem.status)) &&
        (query.assignee === undefined || problem.assignees.includes(query.assignee))
      )
      .sort((a, b) => a.listId.localeCompare(b.listId) || a.number - b.number);
  }

  // ─── Reports ────────────────────────────────────────────

  getReport(id: string): Promise<ReportRecord | null> {
    return this.stores.reports.get(id);
  }

  insertReport(report: ReportRecord): Promise<ReportRecord> {
    return this.insert(this.stores.reports, 'Report', report);
  }

  updateReport(id: string, patch: Partial<Omit<ReportRecord, 'id'>>): Promise<ReportRecord> {
    return this.update(this.stores.reports, 'Report', id, patch);
  }

  /**
   * Reports in submission order.
   */
  async findReports(query: { problemId?: string } = {}): Promise<ReportRecord[]> {
    const reports = await this.all(this.stores.reports);
    return reports
      .filter(report => query.problemId === undefined || report.problemId === query.problemId)
      .sort((a, b) => a.submittedAt.localeCompare(b.submittedAt) || a.id.localeCompare(b.id));
  }

  /**
   * Deletes a report with its reviews and media.
   */
  async deleteReport(reportId: string): Promise<{ reviews: number; media: number }> {
    const reviews = await this.findReviewsForReport(reportId);
    for (const review of reviews) {
      await this.stores.reviews.delete(review.id);
    }
    const media = await this.findMediaForReport(reportId);
    for (const item of media) {
      await this.stores.media.delete(item.id);
    }
    await this.stores.reports.delete(reportId);
    return { reviews: reviews.length, media: media.length };
  }

  // ─── Reviews ────────────────────────────────────────────

  findReview(reportId: string, adminId: string): Promise<ReportReviewRecord | null> {
    return this.stores.reviews.get(generateReviewId(reportId, adminId));
  }

  /**
   * Writes the admin's current vote, replacing any earlier one.
   */
  async upsertReview(review: ReportReviewRecord): Promise<ReportReviewRecord> {
    const id = generateReviewId(review.reportId, review.adminId);
    const record = { ...review, id };
    await this.stores.reviews.put(id, record);
    return record;
  }

  async findReviewsForReport(reportId: string): Promise<ReportReviewRecord[]> {
    const reviews = await this.all(this.stores.reviews, `${reportId}-review-`);
    return reviews
      .filter(review => review.reportId === reportId)
      .sort((a, b) => a.adminId.localeCompare(b.adminId));
  }

  // ─── Media ──────────────────────────────────────────────

  async insertMedia(media: ReportMediaRecord[]): Promise<void> {
    for (const item of media) {
      if (await this.stores.media.exists(item.id)) {
        throw new ConflictError('ReportMedia', item.id);
      }
    }
    await this.stores.media.putMany(media.map(item => ({ id: item.id, value: item })));
  }

  async findMediaForReport(reportId: string): Promise<ReportMediaRecord[]> {
    const media = await this.all(this.stores.media, `${reportId}-media-`);
    return media
      .filter(item => item.reportId === reportId)
      .sort((a, b) => a.id.localeCompare(b.id, undefined, { numeric: true }));
  }

  // ─── Act entries ────────────────────────────────────────

  findActEntry(problemId: string, assigneeId: string): Promise<ActEntryRecord | null> {
    return this.stores.acts.get(generateActEntryId(problemId, assigneeId));
  }

  insertActEntry(entry: ActEntryRecord): Promise<ActEntryRecord> {
    return this.insert(this.stores.acts, 'ActEntry', {
      ...entry,
      id: generateActEntryId(entry.problemId, entry.assigneeId),
    });
  }

  async findActEntries(query: { assigneeId?: string } = {}): Promise<ActEntryRecord[]> {
    const entries = await this.all(this.stores.acts);
    return entries
      .filter(entry => query.assigneeId === undefined || entry.assigneeId === query.assigneeId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id));
  }

  // ─── Staff directory ────────────────────────────────────

  findStaff(assigneeId: string): Promise<StaffMemberRecord | null> {
    return this.stores.staff.get(generateStaffId(assigneeId));
  }

  async upsertStaff(member: StaffMemberRecord): Promise<StaffMemberRecord> {
    const id = generateStaffId(member.assigneeId);
    const record = { ...member, id };
    await this.stores.staff.put(id, record);
    return record;
  }

  async listStaff(): Promise<StaffMemberRecord[]> {
    const staff = await this.all(this.stores.staff);
    return staff.sort((a, b) => a.assigneeId.localeCompare(b.assigneeId));
  }

  // ─── Administrative ─────────────────────────────────────

  /**
   * Deletes a list with its problems and their reports, reviews and media.
   * Act entries stay: they record certificates that were already issued.
   */
  async deleteList(listId: string): Promise<DeleteListResult> {
    const list = await this.getList(listId);
    if (!list) {
      throw new RecordNotFoundError('ProblemList', listId);
    }

    const result: DeleteListResult = { problems: 0, reports: 0, reviews: 0, media: 0 };
    const problems = await this.findProblems({ listId });

    for (const problem of problems) {
      const reports = await this.findReports({ problemId: problem.id });
      for (const report of reports) {
        const removed = await this.deleteReport(report.id);
        result.reviews += removed.reviews;
        result.media += removed.media;
        result.reports++;
      }
      await this.stores.problems.delete(problem.id);
      result.problems++;
    }

    await this.stores.lists.delete(listId);
    return result;
  }

  // ─── Helpers ────────────────────────────────────────────

  private async all<T>(store: RecordStore<T>, idPrefix?: string): Promise<T[]> {
    const ids = await store.list();
    const records: T[] = [];
    for (const id of ids) {
      if (idPrefix !== undefined && !id.startsWith(idPrefix)) continue;
      const record = await store.get(id);
      if (record !== null) {
        records.push(record);
      }
    }
    return records;
  }

  private async insert<T extends Identified>(
    store: RecordStore<T>,
    recordType: string,
    record: T
  ): Promise<T> {
    if (await store.exists(record.id)) {
      throw new ConflictError(recordType, record.id);
    }
    await store.put(record.id, record);
    return record;
  }

  private async update<T extends Identified>(
    store: RecordStore<T>,
    recordType: string,
    id: string,
    patch: Partial<Omit<T, 'id'>>
  ): Promise<T> {
    const current = await store.get(id);
    if (!current) {
      throw new RecordNotFoundError(recordType, id);
    }
    const updated: T = { ...current, ...patch, id };
    await store.put(id, updated);
    return updated;
  }
}
