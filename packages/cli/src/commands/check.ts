import type { Command } from 'commander';
import {
  addScanOptions,
  createScanContext,
  type CliEnvironment,
  type GlobalOptions,
  type ScanCommandOptions,
} from '../utils/context';

export function registerCheckCommand(program: Command, env: CliEnvironment) {
  addScanOptions(
    program
      .command('check')
      .description('Report new non-ASCII characters without touching the whitelist'),
  ).action(async (options: ScanCommandOptions) => {
    const globalOpts = program.opts<GlobalOptions>();
    const ctx = await createScanContext(globalOpts, options, env);

    const result = await ctx.scanner.scan(ctx.source, ctx.store, {
      excludePrefixes: ctx.config.excludePrefixes,
      update: false,
      dedupePerLine: ctx.config.dedupePerLine,
      onFinding: (finding) => ctx.renderer.finding(finding),
    });

    ctx.renderer.renderCheck(result);
    if (result.findings.length > 0) {
      env.exitCode = 1;
    }
  });
}
