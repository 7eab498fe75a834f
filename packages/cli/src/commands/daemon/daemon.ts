import { Command } from 'commander';
import { DaemonCommand } from './daemon-command';

export function registerDaemonCommands(program: Command): void {
  new DaemonCommand().register(program);
}
