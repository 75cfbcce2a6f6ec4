/**
 * @fileoverview Detailed help text for fastening-advisor CLI commands
 */

const HELP_TEXT: Record<string, string> = {
  main: `
fastening-advisor - Choose a fastening or bonding method by answering questions

USAGE:
    fastening-advisor <command> [options]

COMMANDS:
    ask                 Interactive consultation, one question at a time
    recommend           Evaluate a set of answers non-interactively
    check               Validate a knowledge base and summarize its contents
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --json              Structured output (and structured errors) on stdout/stderr

ENVIRONMENT:
    ADVISOR_KB_PATH         Knowledge base file (default: bundled data/knowledge_base.yaml)
    ADVISOR_LOG_LEVEL       debug | info | warn | error | silent (default: info)
    ADVISOR_SNAPSHOT_PATH   Where 'ask' writes its debug snapshot after each answer

EXIT CODES:
    0   Success (an empty recommendation list is still a success)
    1   Unexpected failure
    2   The knowledge base failed to load
    3   An answer was rejected
    64  Invalid command line usage
    66  A file given on the command line was not found
    78  Invalid ADVISOR_* configuration

EXAMPLES:
    fastening-advisor ask
    fastening-advisor recommend --set material_a_type=wood --set material_b_type=wood
    fastening-advisor recommend --answers answers.yaml --trace
    fastening-advisor check --kb ./my_knowledge_base.yaml

For more information on a specific command, run:
    fastening-advisor help <command>
`,

  ask: `
fastening-advisor ask - Interactive consultation

USAGE:
    fastening-advisor ask [--kb <path>] [--snapshot <path>] [--stop-at <n>]

OPTIONS:
    --kb <path>         Knowledge base file (overrides ADVISOR_KB_PATH)
    --snapshot <path>   Write the debug snapshot (YAML) here after every answer
    --stop-at <n>       Stop asking once n or fewer methods remain (default: 1)

DESCRIPTION:
    Questions are asked in knowledge base order. A question is left out when
    its conditions do not hold or when it only matters for categories no
    remaining method belongs to. Answer boolean questions with y/n, choice
    questions with the choice number or name, and type 's' to skip.
    End of input finishes the consultation with the answers given so far.
`,

  recommend: `
fastening-advisor recommend - Evaluate answers non-interactively

USAGE:
    fastening-advisor recommend [--answers <file>] [--set <question>=<answer> ...] [options]

OPTIONS:
    --kb <path>         Knowledge base file (overrides ADVISOR_KB_PATH)
    --answers <file>    YAML map of question id to answer (null = skipped),
                        or a debug snapshot whose question history is replayed
    --set q=a           Answer a question; repeatable, applied after --answers
    --trace             Also list fired rules and rejected methods with the failing gate
    --json              Print the result as JSON

EXAMPLES:
    fastening-advisor recommend --set material_a_type=metal --set material_b_type=metal --trace
    fastening-advisor recommend --answers snapshot.yaml --json
`,

  check: `
fastening-advisor check - Validate a knowledge base

USAGE:
    fastening-advisor check [--kb <path>] [--strict] [--json]

OPTIONS:
    --kb <path>         Knowledge base file (overrides ADVISOR_KB_PATH)
    --strict            Treat references to undeclared attributes as errors
    --json              Print the summary as JSON

DESCRIPTION:
    Loads the knowledge base, reports the first structural problem with its
    location (exit code 2), or prints entity counts and consistency warnings.
`,
};

export function showHelp(command?: string): void {
  if (command && Object.hasOwn(HELP_TEXT, command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return (Object.hasOwn(HELP_TEXT, command) ? HELP_TEXT[command] : undefined) ?? HELP_TEXT.main ?? '';
}
