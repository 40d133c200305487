/**
 * @fileoverview Detailed help text for concord CLI commands
 */

const HELP_TEXT = {
  main: `
concord - Conflict-aware repository recommendations

USAGE:
    concord <command> [options]

COMMANDS:
    recommend <intent>  Rank candidate repositories for an intent
    objectives          List the objective vocabulary
    conflicts           List the registered objective trade-offs
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information

ENVIRONMENT:
    CONCORD_LOG_LEVEL   debug | info | warn | error | silent (logs go to stderr)
    CONCORD_PRESET      minimal | balanced | maximal
    CONCORD_DB_PATH     SQLite file for sessions and caches

EXAMPLES:
    concord recommend "fast and simple http client" --candidates repos.json
    concord recommend "comprehensive audit" -w security=0.8 -w speed=0.2 --json
    concord conflicts --severity hard

For more information on a specific command, run:
    concord help <command>
`,

  recommend: `
concord recommend - Rank candidate repositories for an intent

USAGE:
    concord recommend "<intent>" [options]

OPTIONS:
    -c, --candidates <file>     JSON file: an array of candidates or { "candidates": [...] }
    -w, --weight <name=value>   Explicit objective weight (repeatable)
    --preset <name>             minimal | balanced | maximal
    -n, --limit <n>             Recommendations to return
    -p, --parallelism <n>       Scorer worker lanes
    -s, --session <id>          Continue a session's running aggregate
    --db <file>                 Persist sessions and caches in SQLite
    --config <file>             YAML config file (default: ./concord.config.yaml)
    --min-harmony <x>           Reject policies with harmony below x (0-1)
    --timeout <ms>              Scoring deadline; partial results are kept
    --fallback-to-relevance     Fold unknown objectives into general relevance
    --json                      Print the full output as JSON

EXIT CODES:
    0  success
    1  internal or storage failure
    2  invalid arguments or configuration
    3  request rejected (unknown objective or unresolvable conflict)

EXAMPLES:
    concord recommend "exhaustive but instant search" -c repos.json
    concord recommend "simple" -c repos.json --session thread-1 --db concord.db
`,

  objectives: `
concord objectives - List the objective vocabulary

USAGE:
    concord objectives [--json]

Shows each objective in registration order with its direction and keywords.
`,

  conflicts: `
concord conflicts - List the registered objective trade-offs

USAGE:
    concord conflicts [--severity low|moderate|hard] [--json]
`,
};

function isHelpTopic(command: string): command is keyof typeof HELP_TEXT {
  return command in HELP_TEXT;
}

export function getCommandHelp(command?: string): string {
  if (command && isHelpTopic(command)) {
    return HELP_TEXT[command];
  }
  if (command) {
    return `Unknown command: ${command}\n${HELP_TEXT.main}`;
  }
  return HELP_TEXT.main;
}
