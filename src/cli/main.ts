#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { createDeckRuntime, type DeckRuntime } from './runtime-factory.js';
import { listPlugins } from './list.js';
import { validatePluginCommand } from './validate.js';
import { runPluginCommand, type RunCommandOptions } from './run.js';
import { isLogLevel, type LogLevel } from '../logging/logger.js';
import { DeckError, errorMessage } from '../errors.js';
import { APP_DIR_NAME, APP_VERSION, EXIT_CODE } from '../constants.js';

interface GlobalOptions {
  configDir?: string;
  pluginsDir?: string;
  logLevel?: LogLevel;
}

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Expected a non-negative number of seconds.');
  }
  return seconds;
}

function parseLevel(value: string): LogLevel {
  if (!isLogLevel(value)) throw new InvalidArgumentError('Expected debug, info, warn or error.');
  return value;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function withRuntime(
  program: Command,
  action: (runtime: DeckRuntime) => number | Promise<number>,
): Promise<never> {
  const opts = program.opts<GlobalOptions>();
  let code: number;
  try {
    const runtime = await createDeckRuntime({
      configDir: opts.configDir,
      pluginsDir: opts.pluginsDir,
      logLevel: opts.logLevel,
    });
    code = await action(runtime);
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    code = e instanceof DeckError && e.code === 'VALIDATION_ERROR' ? EXIT_CODE.USAGE : EXIT_CODE.PLUGIN_ERROR;
  }
  process.exit(code);
}

function createProgram(): Command {
  const program = new Command();

  program
    .name(APP_DIR_NAME)
    .description('Discover plugins in a directory and run them')
    .version(APP_VERSION)
    .option('--config-dir <dir>', 'Directory holding a config.json layered over the global one')
    .option('--plugins-dir <dir>', 'Plugins directory (overrides config)')
    .option('--log-level <level>', 'debug, info, warn or error', parseLevel)
    .exitOverride();

  program
    .command('list')
    .description('List discovered plugins')
    .action(async () => withRuntime(program, (runtime) => listPlugins(runtime)));

  program
    .command('validate <id>')
    .description('Check that a plugin can be loaded and run')
    .action(async (id: string) => withRuntime(program, (runtime) => validatePluginCommand(runtime, id)));

  program
    .command('run <id>')
    .description('Run a plugin in the foreground; Ctrl-C requests cancellation')
    .option('-p, --param <key=value>', 'Parameter passed to the plugin (repeatable)', collect, [])
    .option('-t, --timeout <seconds>', 'Timeout in seconds, 0 for none', parseSeconds)
    .action(async (id: string, opts: RunCommandOptions) =>
      withRuntime(program, (runtime) => runPluginCommand(runtime, id, opts)));

  return program;
}

try {
  await createProgram().parseAsync();
} catch (e) {
  if (!(e instanceof CommanderError)) throw e;
  process.exit(e.exitCode === 0 ? EXIT_CODE.OK : EXIT_CODE.USAGE);
}
