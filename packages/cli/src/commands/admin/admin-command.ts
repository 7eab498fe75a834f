import { Command } from 'commander';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface AdminAddOptions extends BaseCommandOptions {
  main?: boolean;
}

/**
 * AdminCommand - grants and revokes the admin role and main tier.
 *
 * The role lives on the user record; the main tier lives in config.json.
 */
export class AdminCommand extends BaseCommand {

  register(program: Command): void {
    const admin = program
      .command('admin')
      .description('Manage admins and their tier');

    admin
      .command('add <userId>')
      .description('Make a user an admin')
      .option('-m, --main', 'Also place the admin in the main tier')
      .option('--json', 'Output as JSON')
      .option('-q, --quiet', 'Quiet output')
      .action(async (userId: string, options: AdminAddOptions) => {
        await this.executeAdd(userId, options);
      });

    admin
      .command('remove <userId>')
      .description('Revoke the admin role (and main tier)')
      .option('--json', 'Output as JSON')
      .option('-q, --quiet', 'Quiet output')
      .action(async (userId: string, options: BaseCommandOptions) => {
        await this.executeRemove(userId, options);
      });

    admin
      .command('list')
      .description('List admins with their tier')
      .option('--json', 'Output as JSON')
      .action(async (options: BaseCommandOptions) => {
        await this.executeList(options);
      });
  }

  async executeAdd(userId: string, options: AdminAddOptions): Promise<void> {
    await this.run(options, 'Failed to add admin', async () => {
      const remedy = await this.dependencyService.getRemedy();
      await remedy.identity.setAdmin(userId, true);
      if (options.main) {
        await this.dependencyService.getConfigManager().setMainAdmin(userId, true);
      }
      await remedy.recheckEscalations();
      await remedy.waitForIdle();
      const tier = await remedy.tierResolver.tierOf(userId);

      this.handleSuccess({ adminId: userId, tier }, options, `${userId} is now a ${tier ?? 'regular'} admin`);
    });
  }

  async executeRemove(userId: string, options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Failed to remove admin', async () => {
      const remedy = await this.dependencyService.getRemedy();
      await remedy.identity.setAdmin(userId, false);
      await this.dependencyService.getConfigManager().setMainAdmin(userId, false);
      await remedy.recheckEscalations();
      await remedy.waitForIdle();

      this.handleSuccess({ adminId: userId, tier: null }, options, `${userId} is no longer an admin`);
    });
  }

  async executeList(options: BaseCommandOptions): Promise<void> {
    await this.run(options, 'Failed to list admins', async () => {
      const remedy = await this.dependencyService.getRemedy();
      const admins = await remedy.tierResolver.listAdmins();

      const lines = admins.map(a => `   ${a.tier === 'main' ? '⭐' : '👤'} ${a.adminId} (${a.tier})`);
      this.handleSuccess({ admins }, options, [`${admins.length} admins`, ...lines].join('\n'));
    });
  }
}
