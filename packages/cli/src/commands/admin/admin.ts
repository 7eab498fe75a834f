import { Command } from 'commander';
import { AdminCommand } from './admin-command';

export function registerAdminCommands(program: Command): void {
  new AdminCommand().register(program);
}
