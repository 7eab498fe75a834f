import { Command } from 'commander';
import { ListCommand } from './list-command';

export function registerListCommands(program: Command): void {
  new ListCommand().register(program);
}
