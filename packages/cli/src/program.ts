import { Command, CommanderError } from 'commander';
import { AppError, exitCodeFor } from '@unilist/shared';
import { version } from '../package.json';
import { registerScanCommand } from './commands/scan';
import { registerCheckCommand } from './commands/check';
import { registerListCommand } from './commands/list';
import type { CliEnvironment, GlobalOptions } from './utils/context';

export function createProgram(env: CliEnvironment): Command {
  const program = new Command();

  program
    .name('unilist')
    .description('Track the non-ASCII characters each file of a repository is allowed to contain')
    .version(version)
    .exitOverride()
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .option('--trace <file>', 'Append structured scan events to a JSONL file')
    .option('--whitelist <path>', 'Path to the whitelist file');

  registerScanCommand(program, env);
  registerCheckCommand(program, env);
  registerListCommand(program, env);

  return program;
}

function reportError(e: unknown, opts: GlobalOptions): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv` and runs the selected command, returning the process exit code.
 */
export async function run(
  argv: string[],
  options: { cwd?: string; spawn?: CliEnvironment['spawn'] } = {},
): Promise<number> {
  const env: CliEnvironment = {
    cwd: options.cwd ?? process.cwd(),
    spawn: options.spawn,
    exitCode: 0,
  };
  const program = createProgram(env);

  try {
    await program.parseAsync(argv);
    return env.exitCode;
  } catch (e) {
    // Commander has already printed its own message.
    if (e instanceof CommanderError) {
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts<GlobalOptions>());
    return exitCodeFor(e);
  }
}
