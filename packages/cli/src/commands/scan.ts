import type { Command } from 'commander';
import {
  addScanOptions,
  createScanContext,
  type CliEnvironment,
  type GlobalOptions,
  type ScanCommandOptions,
} from '../utils/context';

export function registerScanCommand(program: Command, env: CliEnvironment) {
  addScanOptions(
    program
      .command('scan')
      .description('Report new non-ASCII characters and add them to the whitelist'),
  ).action(async (options: ScanCommandOptions) => {
    const globalOpts = program.opts<GlobalOptions>();
    const ctx = await createScanContext(globalOpts, options, env);

    const result = await ctx.scanner.scan(ctx.source, ctx.store, {
      excludePrefixes: ctx.config.excludePrefixes,
      update: true,
      persist: ctx.config.persist,
      dedupePerLine: ctx.config.dedupePerLine,
      onFinding: (finding) => ctx.renderer.finding(finding),
    });

    ctx.renderer.renderScan(result, ctx.whitelistLabel);
  });
}
