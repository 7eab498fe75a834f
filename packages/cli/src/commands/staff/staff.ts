import { Command } from 'commander';
import { StaffCommand } from './staff-command';

export function registerStaffCommands(program: Command): void {
  new StaffCommand().register(program);
}
