import { Command } from 'commander';
import { resolve } from 'path';

import type { CommandRequest, ResolveOptions } from './types';
import { COMMANDS } from './types';
import { defaultConfigDir } from './helpers/config';
import { ERROR_MESSAGES, ErrorCounter, InterruptedError, ResticRunError, errorMessage } from './helpers/errors';
import { Logger, levelFromFlags } from './helpers/log';
import { TempResources } from './helpers/temp';
import { ResticRunner } from './runner';

export interface CliOptions {
  repository?: string;
  set?: string;
  tag?: string;
  snapshot?: string;
  configDir?: string;
  debug?: boolean;
  verbose?: boolean;
  compare?: boolean;
  added?: boolean;
  modified?: boolean;
  removed?: boolean;
  yes?: boolean;
}

export interface Invocation {
  request: CommandRequest;
  resolveOptions: ResolveOptions;
  options: CliOptions;
}

/** Exit statuses above this wrap around to 0 in the parent process. */
export const MAX_EXIT_STATUS = 255;

export function exitStatus(errorCount: number): number {
  return Math.min(errorCount, MAX_EXIT_STATUS);
}

export function toInvocation(command: string, args: string[], options: CliOptions, env: NodeJS.ProcessEnv = process.env): Invocation {
  return {
    request: {
      command,
      args,
      snapshot: options.snapshot,
      compare: Boolean(options.compare),
      added: Boolean(options.added),
      modified: Boolean(options.modified),
      removed: Boolean(options.removed),
      assumeYes: Boolean(options.yes)
    },
    resolveOptions: {
      configDir: options.configDir ? resolve(options.configDir) : defaultConfigDir(env),
      repository: options.repository,
      set: options.set,
      tag: options.tag
    },
    options
  };
}

export function createProgram(onInvoke: (invocation: Invocation) => Promise<void>): Command {
  const program = new Command();

  program
    .name('resticrun')
    .description('Run restic operations from layered repository and backup-set configuration')
    .version('1.0.0')
    .argument('<command>', `one of: ${COMMANDS.join(', ')} (command is an alias of passthrough)`)
    .argument('[args...]', 'command arguments: snapshot ids, number of files, mount point or raw restic arguments (put -- before restic options that resticrun also accepts, e.g. passthrough -- backup --tag x)')
    .option('-r, --repository <name>', 'repository configuration to use')
    .option('-s, --set <name>', 'backup set configuration to use')
    .option('-t, --tag <tag>', 'override the configured snapshot tag')
    .option('--snapshot <id>', 'snapshot to diff against or verify')
    .option('--config-dir <path>', 'configuration directory (default: $RESTICRUN_CONFIG_DIR or ~/.config/resticrun)')
    .option('-d, --debug', 'print debug output, including engine invocations')
    .option('-v, --verbose', 'print progress details')
    .option('-c, --compare', 'verify-randomly: compare restored files with the live filesystem')
    .option('--added', 'diff: show added entries')
    .option('--modified', 'diff: show modified entries')
    .option('--removed', 'diff: show removed entries')
    .option('-y, --yes', 'expire: do not ask for confirmation')
    .allowUnknownOption()
    .action(async (command: string, args: string[], options: CliOptions) => {
      await onInvoke(toInvocation(command, args, options));
    });

  return program;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const errors = new ErrorCounter();
  let logger = new Logger();
  let resources = new TempResources(logger);

  const program = createProgram(async ({ request, resolveOptions, options }) => {
    logger = new Logger(levelFromFlags(options));
    resources = new TempResources(logger);
    resources.attach(signal => {
      errors.record();
      logger.error(new InterruptedError(signal).message);
      process.exit(exitStatus(errors.value));
    });

    const runner = new ResticRunner({ logger, errors, resources });
    await runner.run(request, resolveOptions);
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    errors.record();
    logger.error(errorMessage(error));
    if (error instanceof ResticRunError) {
      logger.debug(`${error.code} (${ERROR_MESSAGES[error.code]}): ${JSON.stringify(error)}`);
    }
  } finally {
    resources.cleanup();
  }
  return exitStatus(errors.value);
}
