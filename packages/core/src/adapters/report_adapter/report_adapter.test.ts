import { createRemedy } from '../../remedy';
import type { Remedy } from '../../remedy';
import { createMemoryRecordStores } from '../../record_store/memory';
import { RecordingNotifier } from '../../notifier/memory';
import { MemoryDocumentRenderer } from '../../document_renderer/memory';
import {
  DetailedValidationError,
  InvalidStateError,
  ListClosedError,
  NotAssigneeError,
  RecordNotFoundError,
} from '../../errors';

describe('ReportAdapter', () => {
  const now = new Date('2025-03-01T10:00:00.000Z');
  let remedy: Remedy;
  let notifier: RecordingNotifier;
  let listId: string;

  beforeEach(async () => {
    notifier = new RecordingNotifier();
    remedy = createRemedy({
      stores: createMemoryRecordStores(),
      notifier,
      renderer: new MemoryDocumentRenderer(),
      mainAdminIds: ['m1'],
      clock: () => now,
    });
    await remedy.identity.ensureBootstrapAdmins(['r1', 'r2', 'm1']);
    const list = await remedy.upsertProblems('ROOF', [
      { number: 1, title: 'Fix roof', assignees: ['100', '200'] },
      { number: 2, title: 'Paint wall', assignees: [] },
    ]);
    listId = list.id;
  });

  afterEach(async () => {
    await remedy.dispose();
  });

  describe('submitReport', () => {
    it('should create a pending report with media and notify regular admins', async () => {
      const problemId = `${listId}-problem-1`;

      const reportId = await remedy.submitReport(problemId, '200', {
        submitter: { username: 'petr' },
        caption: ' Done ',
        media: [
          { kind: 'photo', fileRef: 'file-1' },
          { kind: 'document', path: 'docs/act.pdf', caption: 'scan' },
        ],
      });
      await remedy.waitForIdle();

      expect(await remedy.reports.getReport(reportId)).toEqual({
        id: reportId,
        problemId,
        submitterUserId: '200',
        status: 'pending',
        adminReason: null,
        decidingAdminId: null,
        submittedAt: '2025-03-01T10:00:00.000Z',
        escalatedAt: null,
        caption: 'Done',
      });
      expect(await remedy.reports.getReportMedia(reportId)).toEqual([
        { id: `${reportId}-media-0`, reportId, kind: 'photo', fileRef: 'file-1', path: null, caption: null },
        { id: `${reportId}-media-1`, reportId, kind: 'document', fileRef: null, path: 'docs/act.pdf', caption: 'scan' },
      ]);
      expect(await remedy.problems.getProblem(problemId)).toMatchObject({
        status: 'report_sent',
        lastReportId: reportId,
      });
      expect((await remedy.identity.getUser('200'))?.username).toBe('petr');

      const submitted = notifier.ofKind('report.submitted');
      expect(submitted.map(s => s.recipientId)).toEqual(['r1', 'r2']);
      expect(submitted[0]?.notification).toEqual({
        kind: 'report.submitted',
        problemId,
        listCode: 'ROOF',
        listTitle: 'ROOF',
        problemNumber: 1,
        problemTitle: 'Fix roof',
        reportId,
        submitterUserId: '200',
        caption: 'Done',
        resubmission: false,
      });
    });

    it('should flag resubmissions', async () => {
      const problemId = `${listId}-problem-1`;
      await remedy.submitReport(problemId, '100');
      await remedy.waitForIdle();
      await remedy.submitReport(problemId, '100');
      await remedy.waitForIdle();

      expect(notifier.ofKind('report.submitted').map(s => s.notification)).toEqual([
        expect.objectContaining({ resubmission: false }),
        expect.objectContaining({ resubmission: false }),
        expect.objectContaining({ resubmission: true }),
        expect.objectContaining({ resubmission: true }),
      ]);
      expect(await remedy.reports.listReportsForProblem(problemId)).toHaveLength(2);
    });

    it('should let anyone report on a problem without assignees', async () => {
      const reportId = await remedy.submitReport(`${listId}-problem-2`, '999');

      expect((await remedy.reports.getReport(reportId))?.submitterUserId).toBe('999');
    });

    it('should refuse a submitter who is not assigned', async () => {
      const problemId = `${listId}-problem-1`;

      await expect(remedy.submitReport(problemId, '999')).rejects.toThrow(NotAssigneeError);
      expect(await remedy.reports.listReportsForProblem(problemId)).toEqual([]);
      expect(await remedy.identity.getUser('999')).toBeNull();
    });

    it('should refuse an accepted problem', async () => {
      const problemId = `${listId}-problem-1`;
      const reportId = await remedy.submitReport(problemId, '100');
      await remedy.castVote(reportId, 'm1', 'approved');

      await expect(remedy.submitReport(problemId, '100')).rejects.toThrow(InvalidStateError);
    });

    it('should refuse submissions on a closed list', async () => {
      const closed = await remedy.upsertProblems('DONE', [{ number: 1, title: 'a', assignees: ['100'] }]);
      const problemId = `${closed.id}-problem-1`;
      const reportId = await remedy.submitReport(problemId, '100');
      await remedy.castVote(reportId, 'm1', 'approved');

      await expect(remedy.submitReport(problemId, '100')).rejects.toThrow(ListClosedError);
    });

    it('should refuse malformed media without writing a report', async () => {
      const problemId = `${listId}-problem-1`;

      await expect(
        remedy.submitReport(problemId, '100', { media: [{ kind: 'hologram' }] })
      ).rejects.toThrow(DetailedValidationError);
      expect(await remedy.reports.listReportsForProblem(problemId)).toEqual([]);
    });

    it('should fail for an unknown problem', async () => {
      await expect(remedy.submitReport('missing', '100')).rejects.toThrow(RecordNotFoundError);
    });
  });

  describe('getReportStats', () => {
    it('should count reports per problem that has any', async () => {
      const problemId = `${listId}-problem-1`;
      const first = await remedy.submitReport(problemId, '100');
      await remedy.castVote(first, 'r1', 'rejected', 'redo');
      const second = await remedy.submitReport(problemId, '100');
      await remedy.castVote(second, 'm1', 'approved');

      expect(await remedy.reports.getReportStats()).toEqual([
        { problemId, title: 'Fix roof', total: 2, accepted: 1, rejected: 1 },
      ]);
    });
  });
});
