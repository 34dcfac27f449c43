/**
 * pactcheck CLI entry point.
 *
 * Usage:
 *   pactcheck verify [options]   Replay a pact against a running provider
 *   pactcheck help               Show usage
 */

import { runVerify, type VerifyDeps } from './commands/verify';
import { getGlobalHelp, getCommandHelp } from './help';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        // --key value, unless the key is a known boolean flag
        const key = arg.slice(2);
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

export async function run(
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
  deps: VerifyDeps = {},
): Promise<number> {
  const { command, flags, options } = parseArgs(argv);

  if (flags.help || flags.h) {
    if (command) {
      const cmdHelp = getCommandHelp(command);
      if (cmdHelp) {
        write(cmdHelp);
        return 0;
      }
    }
    write(getGlobalHelp());
    return 0;
  }

  switch (command) {
    case 'verify':
      return runVerify(
        {
          pact: options.pact,
          provider: options.provider,
          consumer: options.consumer,
          baseUrl: options['base-url'],
          description: options.description,
          state: options.state,
          config: options.config,
          timeout: options.timeout,
          json: !!flags.json,
        },
        write,
        deps,
      );

    case 'help':
    case '':
      write(getGlobalHelp());
      return 0;

    default:
      write(`Unknown command: ${command}. Run \`pactcheck help\` for usage.`);
      return 2;
  }
}
