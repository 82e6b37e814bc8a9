/**
 * @fileoverview Detailed help text for langsense CLI commands
 */

const HELP_TEXT = {
  main: `
langsense - inspect language metadata snapshots

USAGE:
    langsense <command> [options]

COMMANDS:
    inspect <snapshot>  Show a snapshot's module documentation and members
    memlist <snapshot>  Regenerate the member-list sidecar of a snapshot
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Set workspace directory (default: current directory)
    --json              Print results and errors as JSON

CONFIGURATION:
    <workspace>/.langsense/config.yaml, overridden by LANGSENSE_LOAD_TIMEOUT_MS,
    LANGSENSE_LOG_LEVEL and LANGSENSE_SNAPSHOT_EXTENSION.
`,

  inspect: `
langsense inspect - Show a snapshot's module documentation and members

USAGE:
    langsense inspect <snapshot> [--member <name>] [--json]

OPTIONS:
    --member <name>     Show a single member in detail
    --json              Print the result as JSON

EXAMPLES:
    langsense inspect stubs/os/path.idb
    langsense inspect stubs/os/path.idb --member join --json
`,

  memlist: `
langsense memlist - Regenerate the member-list sidecar of a snapshot

USAGE:
    langsense memlist <snapshot> [--json]

The sidecar lists one member name per line and is written next to the
snapshot (suffix from snapshot.memberListSuffix, default .memlist).
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

export function isHelpTopic(value: string): value is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, value);
}

export function getHelpText(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  return HELP_TEXT.main;
}

export function showHelp(command?: string): void {
  console.log(getHelpText(command));
}
