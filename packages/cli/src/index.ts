#!/usr/bin/env node

import { config } from 'dotenv';
import { Command } from 'commander';
import { registerInitCommands } from './commands/init/init';
import { registerListCommands } from './commands/list/list';
import { registerStaffCommands } from './commands/staff/staff';
import { registerReportCommands } from './commands/report/report';
import { registerAdminCommands } from './commands/admin/admin';
import { registerRemindCommands } from './commands/remind/remind';
import { registerActsCommands } from './commands/acts/acts';
import { registerDaemonCommands } from './commands/daemon/daemon';
import { DependencyInjectionService } from './services/dependency-injection';

config();

const program = new Command();

program
  .name('remedy')
  .description('Remedy CLI - remediation tasks with two-tier report approval')
  .version('0.1.0');

// Core log level follows the output flags of the command being run
program.hook('preAction', (_program, actionCommand) => {
  const options = actionCommand.opts();
  const diService = DependencyInjectionService.getInstance();
  if (options['verbose'] === true) {
    diService.setLogLevel('debug');
  } else if (options['quiet'] === true || options['json'] === true) {
    diService.setLogLevel('error');
  }
});

registerInitCommands(program);
registerListCommands(program);
registerStaffCommands(program);
registerReportCommands(program);
registerAdminCommands(program);
registerRemindCommands(program);
registerActsCommands(program);
registerDaemonCommands(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
