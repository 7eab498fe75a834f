jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { createRemedy } from '@remedy/core';
import type { Remedy } from '@remedy/core';
import { createMemoryRecordStores, MemoryDocumentRenderer, RecordingNotifier } from '@remedy/core/memory';
import { RemindCommand } from './remind-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
jest.spyOn(process, 'exit').mockImplementation();

describe('RemindCommand', () => {
  let remindCommand: RemindCommand;
  let remedy: Remedy;
  let notifier: RecordingNotifier;
  let problemId: string;

  beforeEach(async () => {
    jest.clearAllMocks();

    notifier = new RecordingNotifier();
    remedy = createRemedy({
      stores: createMemoryRecordStores(),
      notifier,
      renderer: new MemoryDocumentRenderer(),
    });
    const list = await remedy.upsertProblems('ROOF', [
      { number: 1, title: 'Seal leak', assignees: ['100', '200'], dueDate: '2025-03-12' },
    ]);
    problemId = `${list.id}-problem-1`;

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue({ getRemedy: jest.fn().mockResolvedValue(remedy) } as never);

    remindCommand = new RemindCommand();
  });

  afterEach(async () => {
    await remedy.dispose();
  });

  it('should list due reminders on a dry run without sending', async () => {
    await remindCommand.execute({ date: '2025-03-10', dryRun: true });

    expect(mockConsoleLog).toHaveBeenCalledWith(
      '✅ 2 reminders due\n' +
      `   100: ${problemId} due 2025-03-12 (2d)\n` +
      `   200: ${problemId} due 2025-03-12 (2d)`
    );
    expect(notifier.sent).toEqual([]);
  });

  it('should send reminders and count failures', async () => {
    notifier.failFor('200');

    await remindCommand.execute({ date: '2025-03-10' });

    expect(mockConsoleLog).toHaveBeenCalledWith('✅ Reminders: 1 sent, 1 failed');
    expect(notifier.sent.map(s => s.recipientId)).toEqual(['100']);
  });

  it('should reject a malformed date', async () => {
    await remindCommand.execute({ date: '12/03/2025' });

    expect(mockConsoleError).toHaveBeenCalledWith(
      '❌ Reminder sweep failed: ReminderSweep validation failed: today: must be a YYYY-MM-DD calendar date\n' +
      '   • today: must be a YYYY-MM-DD calendar date'
    );
  });
});
