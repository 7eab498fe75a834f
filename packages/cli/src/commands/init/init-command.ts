import * as path from 'path';
import { Command } from 'commander';
import type { Config } from '@remedy/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Init Command Options interface
 */
export interface InitCommandOptions extends BaseCommandOptions {
  name?: string;
  admin?: string[];
  main?: string[];
  force?: boolean;
}

/**
 * InitCommand - creates `.remedy/config.json` and the bootstrap admins.
 */
export class InitCommand extends BaseCommand<InitCommandOptions> {

  register(program: Command): void {
    program
      .command('init')
      .description('Initialize a Remedy project in the current directory (or REMEDY_HOME)')
      .option('-n, --name <name>', 'Project name (default: directory name)')
      .option('-a, --admin <ids...>', 'Admin user ids created on startup')
      .option('-m, --main <ids...>', 'Main-tier admin ids (also made admins)')
      .option('-f, --force', 'Overwrite an existing configuration')
      .option('--json', 'Output in JSON format for automation')
      .option('-v, --verbose', 'Show technical details on failure')
      .option('-q, --quiet', 'Minimal output for scripting')
      .action(async (options: InitCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: InitCommandOptions): Promise<void> {
    await this.run(options, 'Failed to initialize', async () => {
      const projectRoot = this.dependencyService.getInitRoot();
      const configManager = this.dependencyService.getConfigManager(projectRoot);

      if (await configManager.loadConfig() && !options.force) {
        throw new Error(`Already initialized at ${projectRoot}. Use --force to overwrite.`);
      }

      const mainAdminIds = options.main ?? [];
      const config: Config.RemedyConfig = {
        projectName: options.name ?? path.basename(projectRoot),
        createdAt: new Date().toISOString(),
        bootstrapAdminIds: [...new Set([...(options.admin ?? []), ...mainAdminIds])],
        mainAdminIds,
      };
      await configManager.saveConfig(config);

      const remedy = await this.dependencyService.getRemedy();
      const admins = await remedy.tierResolver.listAdmins();

      const adminLines = admins.map(a => `   ${a.adminId} (${a.tier})`);
      this.handleSuccess(
        { projectRoot, projectName: config.projectName, admins },
        options,
        [`Remedy initialized at ${projectRoot}`, ...adminLines].join('\n')
      );
    });
  }
}
