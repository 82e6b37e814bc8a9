/**
 * @fileoverview CLI dispatcher
 *
 * Parses global options, routes to a command and turns failures into
 * formatted output plus an exit code. Kept apart from the executable entry
 * point so it can be driven in-process.
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import { LANGSENSE_VERSION } from '../version.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';
import { inspectCommand } from './commands/inspect.js';
import { memlistCommand } from './commands/memlist.js';
import { CliError, createError, formatError, formatErrorJson, getExitCode } from './errors.js';
import { showHelp } from './help.js';

type Command = 'inspect' | 'memlist' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  inspect: {
    description: "Show a snapshot's module documentation and members",
    usage: 'langsense inspect <snapshot> [--member <name>] [--json]',
  },
  memlist: {
    description: 'Regenerate the member-list sidecar of a snapshot',
    usage: 'langsense memlist <snapshot> [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'langsense help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

const GLOBAL_VALUE_OPTIONS = new Set(['-w', '--workspace']);
const GLOBAL_FLAG_OPTIONS = new Set(['-h', '--help', '-v', '--version']);

/**
 * Run the CLI against `argv` (without the node and script entries).
 *
 * @returns The process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  const { values, tokens } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
    },
    allowPositionals: true,
    strict: false,
    tokens: true,
  });

  if (values.version === true) {
    console.log(`langsense ${LANGSENSE_VERSION.string}`);
    return 0;
  }

  const commandToken = tokens.find((token) => token.kind === 'positional');
  const command = commandToken?.kind === 'positional' ? commandToken.value : undefined;
  const commandArgs = commandToken ? stripGlobalOptions(argv.slice(commandToken.index + 1)) : [];
  const workspace = typeof values.workspace === 'string' ? values.workspace : process.cwd();
  const jsonMode = argv.includes('--json');

  if (values.help === true || !command || command === 'help') {
    showHelp(command === 'help' ? commandArgs[0] : command);
    return 0;
  }

  try {
    if (!isCommand(command)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
        available: Object.keys(COMMANDS),
      });
    }
    switch (command) {
      case 'inspect':
        await inspectCommand({ workspace, args: commandArgs });
        break;
      case 'memlist':
        await memlistCommand({ workspace, args: commandArgs });
        break;
    }
    return 0;
  } catch (rawError) {
    const error = toCliError(rawError);
    console.error(jsonMode ? formatErrorJson(error) : formatError(error));
    return getExitCode(error);
  }
}

/**
 * Option parsing failures from `node:util` become usage errors.
 */
function toCliError(error: unknown): unknown {
  if (error instanceof CliError) {
    return error;
  }
  if (getErrorCode(error)?.startsWith('ERR_PARSE_ARGS') === true) {
    return createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
  return error;
}

function stripGlobalOptions(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (GLOBAL_VALUE_OPTIONS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--workspace=') || GLOBAL_FLAG_OPTIONS.has(arg)) {
      continue;
    }
    result.push(arg);
  }
  return result;
}
