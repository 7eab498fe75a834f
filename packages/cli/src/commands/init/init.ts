import { Command } from 'commander';
import { InitCommand } from './init-command';

/**
 * Registers init command following the Remedy CLI standard
 */
export function registerInitCommands(program: Command): void {
  new InitCommand().register(program);
}
