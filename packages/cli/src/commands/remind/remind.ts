import { Command } from 'commander';
import { RemindCommand } from './remind-command';

export function registerRemindCommands(program: Command): void {
  new RemindCommand().register(program);
}
