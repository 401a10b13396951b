import type { Command } from 'commander';
import { WhitelistStore } from '@unilist/core';
import { createCommandContext, type CliEnvironment, type GlobalOptions } from '../utils/context';

export function registerListCommand(program: Command, env: CliEnvironment) {
  program
    .command('list')
    .description('Show the whitelisted code points per file')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();
      const ctx = await createCommandContext(globalOpts, env);
      const store = await WhitelistStore.load(ctx.whitelistPath, { logger: ctx.logger });

      ctx.renderer.renderList(store);
    });
}
