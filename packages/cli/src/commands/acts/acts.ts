import { Command } from 'commander';
import { ActsCommand } from './acts-command';

export function registerActsCommands(program: Command): void {
  new ActsCommand().register(program);
}
