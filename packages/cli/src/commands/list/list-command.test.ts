jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createRemedy } from '@remedy/core';
import type { Remedy } from '@remedy/core';
import { createMemoryRecordStores, MemoryDocumentRenderer, RecordingNotifier } from '@remedy/core/memory';
import { ListCommand } from './list-command';
import { DependencyInjectionService } from '../../services/dependency-injection';

const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

function jsonOutput(): { success: boolean; data?: Record<string, unknown> } {
  const call = mockConsoleLog.mock.calls.find(args => typeof args[0] === 'string' && args[0].includes('"success"'));
  return JSON.parse(String(call?.[0]));
}

describe('ListCommand', () => {
  let listCommand: ListCommand;
  let remedy: Remedy;
  let dir: string;
  let rowsFile: string;

  beforeEach(async () => {
    jest.clearAllMocks();

    remedy = createRemedy({
      stores: createMemoryRecordStores(),
      notifier: new RecordingNotifier(),
      renderer: new MemoryDocumentRenderer(),
    });
    (DependencyInjectionService.getInstance as jest.MockedFunction<typeof DependencyInjectionService.getInstance>)
      .mockReturnValue({ getRemedy: jest.fn().mockResolvedValue(remedy) } as never);

    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'remedy-list-'));
    rowsFile = path.join(dir, 'roof.yaml');
    await fs.writeFile(rowsFile, [
      'title: Roof repairs',
      'rows:',
      '  - { number: 1, title: Seal leak, assignees: ["100"], dueDate: "2025-03-10" }',
      '  - { number: 2, title: Paint, assignees: [] }',
    ].join('\n'));

    listCommand = new ListCommand();
  });

  afterEach(async () => {
    await remedy.dispose();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should import a list using the file title', async () => {
    await listCommand.executeImport('ROOF', rowsFile, {});

    expect(mockConsoleLog).toHaveBeenCalledWith('✅ List ROOF "Roof repairs" imported: 2 problems');
  });

  it('should let --title override the file title', async () => {
    await listCommand.executeImport('ROOF', rowsFile, { title: 'Roof', json: true });

    const output = jsonOutput();
    expect(output.data?.['problemCount']).toBe(2);
    expect((await remedy.problems.getList('ROOF'))?.title).toBe('Roof');
  });

  it('should surface row validation errors field by field', async () => {
    await fs.writeFile(rowsFile, JSON.stringify([{ number: 1, assignees: [] }]));

    await listCommand.executeImport('ROOF', rowsFile, {});

    expect(mockConsoleError).toHaveBeenCalledWith(
      "❌ Failed to import list: ProblemImportRow validation failed: rows[0].title: must have required property 'title'\n" +
      "   • rows[0].title: must have required property 'title'"
    );
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should show one list with its problems', async () => {
    await listCommand.executeImport('ROOF', rowsFile, { quiet: true });

    await listCommand.executeShow('ROOF', {});

    expect(mockConsoleLog).toHaveBeenCalledWith(
      '✅ ROOF "Roof repairs" (open)\n' +
      '   ⏳ #1 Seal leak (due 2025-03-10) → 100\n' +
      '   ⏳ #2 Paint'
    );
  });

  it('should report counts per status', async () => {
    await listCommand.executeImport('ROOF', rowsFile, { quiet: true });

    await listCommand.executeStats('ROOF', { json: true });

    expect(jsonOutput().data).toEqual({ total: 2, inProgress: 2, reportSent: 0, accepted: 0, rejected: 0 });
  });

  it('should refuse to delete without --yes', async () => {
    await listCommand.executeDelete('ROOF', {});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Refusing to delete list ROOF without --yes');
    expect(mockProcessExit).toHaveBeenCalledWith(1);
  });

  it('should delete a list with its problems', async () => {
    await listCommand.executeImport('ROOF', rowsFile, { quiet: true });

    await listCommand.executeDelete('ROOF', { yes: true, json: true });

    expect(jsonOutput().data).toEqual({ problems: 2, reports: 0, reviews: 0, media: 0 });
    expect(await remedy.problems.getList('ROOF')).toBeNull();
  });
});
