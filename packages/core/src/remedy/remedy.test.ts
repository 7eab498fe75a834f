import { createRemedy } from './remedy';
import type { Remedy } from './remedy';
import { createMemoryRecordStores } from '../record_store/memory';
import { RecordingNotifier } from '../notifier/memory';
import { MemoryDocumentRenderer } from '../document_renderer/memory';

describe('Remedy', () => {
  const now = new Date('2025-03-01T12:00:00.000Z');
  let remedy: Remedy;
  let notifier: RecordingNotifier;
  let renderer: MemoryDocumentRenderer;
  let listId: string;

  beforeEach(async () => {
    notifier = new RecordingNotifier();
    renderer = new MemoryDocumentRenderer();
    remedy = createRemedy({
      stores: createMemoryRecordStores(),
      notifier,
      renderer,
      mainAdminIds: ['m1'],
      clock: () => now,
    });
    await remedy.identity.ensureBootstrapAdmins(['r1', 'm1']);
  });

  afterEach(async () => {
    await remedy.dispose();
  });

  describe('a problem with two assignees due in two days', () => {
    let problemId: string;

    beforeEach(async () => {
      const list = await remedy.upsertProblems('L', [
        { number: 1, title: 'Seal the leak', assignees: ['100', '200'], dueDate: '2025-03-03' },
      ]);
      listId = list.id;
      problemId = `${listId}-problem-1`;
    });

    it('should remind both assignees before any report', async () => {
      expect(await remedy.dueReminders('2025-03-01')).toEqual([
        { problemId, assigneeId: '100', dueDate: '2025-03-03', daysLeft: 2 },
        { problemId, assigneeId: '200', dueDate: '2025-03-03', daysLeft: 2 },
      ]);
    });

    it('should escalate then accept and close the list', async () => {
      const reportId = await remedy.submitReport(problemId, '100');
      expect((await remedy.problems.getProblem(problemId))?.status).toBe('report_sent');

      await remedy.waitForIdle();
      const regular = await remedy.castVote(reportId, 'r1', 'approved');
      await remedy.waitForIdle();
      const main = await remedy.castVote(reportId, 'm1', 'approved');
      await remedy.waitForIdle();

      expect(regular).toEqual({ finalized: false, escalated: true, status: 'pending' });
      expect(main).toEqual({ finalized: true, escalated: false, status: 'accepted' });
      expect((await remedy.reports.getReport(reportId))?.status).toBe('accepted');
      expect((await remedy.problems.getProblem(problemId))?.status).toBe('accepted');
      expect(await remedy.problems.getList('L')).toMatchObject({
        isClosed: true,
        closedAt: '2025-03-01T12:00:00.000Z',
      });
      expect(await remedy.dueReminders('2025-03-01')).toEqual([]);
      expect(await remedy.getVoteSummary(reportId)).toEqual([
        { adminId: 'm1', tier: 'main', decision: 'approved' },
        { adminId: 'r1', tier: 'regular', decision: 'approved' },
      ]);
      const delivered = notifier.sent.map(s => `${s.notification.kind}:${s.recipientId}`);
      expect(delivered.slice(0, 2)).toEqual(['report.submitted:r1', 'report.escalated:m1']);
      expect(delivered.slice(2).sort()).toEqual(['list.closed:m1', 'list.closed:r1', 'report.accepted:100']);
    });

    it('should reject with a reason and accept a resubmission by the other assignee', async () => {
      const first = await remedy.submitReport(problemId, '100');

      const result = await remedy.castVote(first, 'm1', 'rejected', 'incomplete');

      expect(result).toEqual({ finalized: true, escalated: false, status: 'rejected' });
      expect(await remedy.reports.getReport(first)).toMatchObject({
        status: 'rejected',
        adminReason: 'incomplete',
        decidingAdminId: 'm1',
      });
      expect(await remedy.problems.getProblem(problemId)).toMatchObject({
        status: 'rejected',
        note: 'incomplete',
      });

      const second = await remedy.submitReport(problemId, '200');

      expect(second).not.toBe(first);
      expect(await remedy.problems.getProblem(problemId)).toMatchObject({
        status: 'report_sent',
        lastReportId: second,
      });
    });

    it('should let a later rejection win over earlier approvals', async () => {
      const reportId = await remedy.submitReport(problemId, '100');

      await remedy.castVote(reportId, 'r1', 'approved');
      await remedy.castVote(reportId, 'r1', 'rejected', 'blurry photo');

      expect((await remedy.reports.getReport(reportId))?.status).toBe('rejected');
      await expect(remedy.castVote(reportId, 'm1', 'approved')).rejects.toThrow();
      expect((await remedy.reports.getReport(reportId))?.status).toBe('rejected');
    });
  });

  describe('certificates', () => {
    it('should cover both accepted problems of an executor in one certificate', async () => {
      const list = await remedy.upsertProblems('W', [
        { number: 1, title: 'Patch wall', assignees: ['100'] },
        { number: 2, title: 'Paint wall', assignees: ['100'] },
      ]);
      for (const number of [1, 2]) {
        const reportId = await remedy.submitReport(`${list.id}-problem-${number}`, '100');
        await remedy.castVote(reportId, 'm1', 'approved');
      }

      const entries = await remedy.runActSweep();

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        assigneeId: '100',
        coveredProblemIds: [`${list.id}-problem-1`, `${list.id}-problem-2`],
      });
      expect((await remedy.entityStore.findActEntries({ assigneeId: '100' })).map(e => e.problemId)).toEqual([
        `${list.id}-problem-1`,
        `${list.id}-problem-2`,
      ]);
      expect(await remedy.runActSweep()).toEqual([]);
      expect(renderer.rendered).toHaveLength(1);
    });
  });
});
