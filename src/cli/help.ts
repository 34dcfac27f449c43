/**
 * CLI help text for global and per-command --help output.
 *
 * Each subcommand help follows a consistent structure:
 *   SYNOPSIS, DESCRIPTION, FLAGS, EXAMPLES
 */

const COMMAND_HELP: Record<string, string> = {
  verify: `
SYNOPSIS
  pactcheck verify [--pact=URI] [--provider=NAME] [--consumer=NAME]
                   [--base-url=URL] [--description=TEXT] [--state=LABEL]
                   [--config=PATH] [--timeout=MS] [--json]

DESCRIPTION
  Replay the interactions recorded in a pact against a running provider
  and check each response against what the consumer expects. The pact
  can be a local file or an http(s) URL; broker credentials are read
  from .pactcheck.yml or PACT_BROKER_USERNAME / PACT_BROKER_PASSWORD.
  Flags take precedence over the config file.

FLAGS
  --pact=URI            Pact file path or URL
  --provider=NAME       Provider name
  --consumer=NAME       Consumer name the pact was recorded for
  --base-url=URL        Base URL of the running provider
  --description=TEXT    Only verify interactions with this description
  --state=LABEL         Only verify interactions with this provider state
  --config=PATH         Config file (default: .pactcheck.yml)
  --timeout=MS          Per-request timeout for provider calls
  --json                Output the verification report as JSON

EXIT CODES
  0   every selected interaction verified
  1   one or more interactions failed
  2   configuration, pact source or filter error

EXAMPLES
  pactcheck verify --pact=./pacts/web-shop-orders-api.json --base-url=http://localhost:3000 \\
    --provider=orders-api --consumer=web-shop
  pactcheck verify --state="an order exists"
  pactcheck verify --pact=https://broker.example.com/pacts/provider/orders-api/consumer/web-shop/latest --json
`.trim(),
};

export function getGlobalHelp(): string {
  const lines: string[] = [
    'Usage: pactcheck <command> [options]',
    '',
    'Verify that a provider honours the HTTP contracts its consumers recorded.',
    '',
    'Commands:',
    '  verify                Replay a pact against a running provider',
    '  help                  Show this help',
    '',
    'Run `pactcheck <command> --help` for detailed usage of each command.',
    '',
    'Global Options:',
    '  --help                Show help (global or per-command)',
    '  --json                Output results as JSON',
    '',
    'Environment:',
    '  LOG_LEVEL             Log level for diagnostics on stderr (default: info)',
    '  PACT_BROKER_USERNAME  Basic-auth user for remote pacts',
    '  PACT_BROKER_PASSWORD  Basic-auth password for remote pacts',
    '  PACTCHECK_TIMEOUT_MS  Default provider request timeout (default: 10000)',
  ];
  return lines.join('\n');
}

export function getCommandHelp(command: string): string | undefined {
  return COMMAND_HELP[command];
}
