import { Command } from 'commander';
import { ReportCommand } from './report-command';

export function registerReportCommands(program: Command): void {
  new ReportCommand().register(program);
}
