import { NotificationAdapter } from './notification_adapter';
import { ConfigAdminTierResolver, IdentityAdapter, staticMainAdminIds } from '../identity_adapter';
import { EntityStore } from '../../entity_store';
import { EventBus } from '../../event_bus';
import type { ReportSubmittedEvent } from '../../event_bus';
import { createMemoryRecordStores } from '../../record_store/memory';
import { RecordingNotifier } from '../../notifier/memory';
import type { Logger } from '../../logger';

describe('NotificationAdapter', () => {
  let entityStore: EntityStore;
  let eventBus: EventBus;
  let notifier: RecordingNotifier;
  let logger: jest.Mocked<Logger>;
  let adapter: NotificationAdapter;

  const submitted: ReportSubmittedEvent = {
    type: 'report.submitted',
    timestamp: 1,
    source: 'test',
    payload: {
      reportId: 'r-1',
      problemId: 'L-problem-4',
      listId: 'L',
      submitterUserId: '100',
      resubmission: false,
    },
  };

  beforeEach(async () => {
    entityStore = new EntityStore(createMemoryRecordStores());
    eventBus = new EventBus();
    notifier = new RecordingNotifier();
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };

    await new IdentityAdapter({ entityStore }).ensureBootstrapAdmins(['r1', 'r2', 'm1']);
    await entityStore.insertList({
      id: 'L', code: 'ROOF', title: 'Roof', isClosed: false, closedAt: null, createdAt: 't',
    });
    await entityStore.insertProblem({
      id: 'L-problem-4', listId: 'L', number: 4, title: 'Fix gutter', assignees: ['100'],
      dueDate: null, status: 'report_sent', note: null, lastReportId: 'r-1',
    });
    await entityStore.insertReport({
      id: 'r-1', problemId: 'L-problem-4', submitterUserId: '100', status: 'pending',
      adminReason: null, decidingAdminId: null, submittedAt: 't', escalatedAt: null, caption: 'see photo',
    });

    adapter = new NotificationAdapter({
      entityStore,
      eventBus,
      notifier,
      tierResolver: new ConfigAdminTierResolver({ entityStore, mainAdminIds: staticMainAdminIds(['m1']) }),
      logger,
    });
  });

  afterEach(() => {
    adapter.dispose();
  });

  it('should keep delivering when one recipient fails', async () => {
    notifier.failFor('r1');

    const outcome = await adapter.handleReportSubmitted(submitted);

    expect(outcome).toEqual({ sent: 1, failed: 1 });
    expect(notifier.sent.map(s => s.recipientId)).toEqual(['r2']);
    expect(logger.warn).toHaveBeenCalledWith('report.submitted: Delivery to r1 failed: chat unavailable for r1');
  });

  it('should forward a finalized rejection to the submitter', async () => {
    eventBus.publish({
      type: 'report.finalized',
      timestamp: 2,
      source: 'test',
      payload: {
        reportId: 'r-1',
        problemId: 'L-problem-4',
        submitterUserId: '100',
        status: 'rejected',
        decidingAdminId: 'r2',
        reason: 'Too dark',
      },
    });
    await eventBus.waitForIdle();

    expect(notifier.sent).toEqual([{
      channel: 'user',
      recipientId: '100',
      notification: {
        kind: 'report.rejected',
        problemId: 'L-problem-4',
        listCode: 'ROOF',
        listTitle: 'Roof',
        problemNumber: 4,
        problemTitle: 'Fix gutter',
        reportId: 'r-1',
        reason: 'Too dark',
      },
    }]);
  });

  it('should tell every admin when a list closes', async () => {
    eventBus.publish({
      type: 'list.closed',
      timestamp: 3,
      source: 'test',
      payload: { listId: 'L', code: 'ROOF', title: 'Roof' },
    });
    await eventBus.waitForIdle();

    expect(notifier.sent.map(s => [s.channel, s.recipientId])).toEqual([
      ['admin', 'm1'],
      ['admin', 'r1'],
      ['admin', 'r2'],
    ]);
  });

  it('should tell every admin about a generated act', async () => {
    eventBus.publish({
      type: 'act.generated',
      timestamp: 4,
      source: 'test',
      payload: {
        assigneeId: '100',
        problemIds: ['L-problem-4'],
        problemNumbers: [4],
        listCode: 'ROOF',
        document: 'memory://act/1',
      },
    });
    await eventBus.waitForIdle();

    expect(notifier.ofKind('act.generated')).toHaveLength(3);
    expect(notifier.sent[0]?.notification).toEqual({
      kind: 'act.generated',
      assigneeId: '100',
      listCode: 'ROOF',
      problemNumbers: [4],
      document: 'memory://act/1',
    });
  });

  it('should skip a report that no longer exists', async () => {
    await entityStore.deleteReport('r-1');

    const outcome = await adapter.handleReportSubmitted(submitted);

    expect(outcome).toEqual({ sent: 0, failed: 0 });
    expect(logger.warn).toHaveBeenCalledWith('report r-1 disappeared before notification');
  });

  it('should stop listening after dispose', async () => {
    adapter.dispose();

    eventBus.publish(submitted);
    await eventBus.waitForIdle();

    expect(notifier.sent).toEqual([]);
  });
});
