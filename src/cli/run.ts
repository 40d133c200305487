/**
 * @fileoverview Command dispatch
 *
 * Kept apart from the executable entry so it can run in-process: it takes
 * the argument list and an output sink and resolves to an exit code.
 */

import { parseArgs } from 'node:util';
import { CliError, EXIT_CODES, createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { getCommandHelp } from './help.js';
import { recommendCommand } from './commands/recommend.js';
import { conflictsCommand, objectivesCommand } from './commands/vocabulary.js';
import { consoleIO, type CliIO, type CommandContext } from './commands/types.js';

export const CLI_VERSION = '0.1.0';

type Command = 'recommend' | 'objectives' | 'conflicts';

const COMMANDS: Record<Command, (context: CommandContext) => Promise<void>> = {
  recommend: recommendCommand,
  objectives: objectivesCommand,
  conflicts: conflictsCommand,
};

function isCommand(value: string): value is Command {
  return value in COMMANDS;
}

export interface RunOptions {
  io?: CliIO;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export async function runCli(argv: string[], options: RunOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const jsonMode = argv.includes('--json');

  // Global flags only; command flags are parsed by each command.
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
    },
    allowPositionals: true,
    strict: false,
  });

  const [command, ...rest] = positionals;
  if (values.version === true && !command) {
    io.stdout(`concord ${CLI_VERSION}`);
    return EXIT_CODES.ok;
  }
  if (!command || command === 'help') {
    io.stdout(getCommandHelp(command === 'help' ? rest[0] : undefined));
    return EXIT_CODES.ok;
  }
  if (values.help === true) {
    io.stdout(getCommandHelp(command));
    return EXIT_CODES.ok;
  }

  try {
    if (!isCommand(command)) {
      throw createError('UNKNOWN_COMMAND', `Unknown command: ${command}`);
    }
    const commandArgs = argv.slice(argv.indexOf(command) + 1);
    await COMMANDS[command]({
      args: commandArgs,
      io,
      env: options.env ?? process.env,
      cwd: options.cwd ?? process.cwd(),
    });
    return EXIT_CODES.ok;
  } catch (error) {
    io.stderr(jsonMode ? formatErrorJson(error) : formatError(error));
    if (!(error instanceof CliError) && getExitCode(error) === EXIT_CODES.failure && error instanceof Error && error.stack) {
      io.stderr(error.stack);
    }
    return getExitCode(error);
  }
}
