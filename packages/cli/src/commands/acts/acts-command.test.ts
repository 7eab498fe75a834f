jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { createRemedy } from '@remedy/core';
import type { Remedy } from '@remedy/core';
import { createMemoryRecordStores, MemoryDocumentRenderer, RecordingNotifier } from '@remedy/core/memory';
import { ActsCommand } from './acts-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
jest.spyOn(console, 'error').mockImplementation();
jest.spyOn(process, 'exit').mockImplementation();

describe('ActsCommand', () => {
  let actsCommand: ActsCommand;
  let remedy: Remedy;

  beforeEach(async () => {
    jest.clearAllMocks();

    remedy = createRemedy({
      stores: createMemoryRecordStores(),
      notifier: new RecordingNotifier(),
      renderer: new MemoryDocumentRenderer(),
      mainAdminIds: ['m1'],
    });
    await remedy.identity.ensureBootstrapAdmins(['m1']);
    const list = await remedy.upsertProblems('WALL', [
      { number: 1, title: 'Patch', assignees: ['100'] },
      { number: 2, title: 'Paint', assignees: ['100'] },
    ]);
    for (const number of [1, 2]) {
      const reportId = await remedy.submitReport(`${list.id}-problem-${number}`, '100');
      await remedy.castVote(reportId, 'm1', 'approved');
    }

    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue({ getRemedy: jest.fn().mockResolvedValue(remedy) } as never);

    actsCommand = new ActsCommand();
  });

  afterEach(async () => {
    await remedy.dispose();
  });

  it('should issue one certificate and nothing on the next sweep', async () => {
    await actsCommand.executeSweep({});
    await actsCommand.executeSweep({});

    expect(mockConsoleLog).toHaveBeenNthCalledWith(1, '✅ 1 certificates issued\n   100: problems 1, 2 → memory://act/1');
    expect(mockConsoleLog).toHaveBeenNthCalledWith(2, '✅ 0 certificates issued');
  });
});
