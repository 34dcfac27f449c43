import { describe, it, expect } from 'vitest';
import { parseArgs, run } from '../../src/cli/index';
import { getCommandHelp, getGlobalHelp } from '../../src/cli/help';
import { jsonResponse, pactJson, silentLogger, stripAnsi } from '../helpers/pact-test-helpers';

function argv(...args: string[]): string[] {
  return ['node', 'pactcheck', ...args];
}

async function runCli(...args: string[]): Promise<{ code: number; output: string[] }> {
  const output: string[] = [];
  const code = await run(argv(...args), (msg) => output.push(stripAnsi(msg)), {
    env: { LOG_LEVEL: 'silent' },
    logger: silentLogger(),
    sourceClient: async () =>
      new Response(
        pactJson([
          {
            description: 'get order 42',
            request: { method: 'GET', path: '/orders/42' },
            response: { status: 200, body: { id: 42 } },
          },
        ]),
      ),
    providerClient: async () => jsonResponse({ id: 42 }),
  });
  return { code, output };
}

describe('parseArgs', () => {
  it('separates the command, options and flags', () => {
    expect(
      parseArgs(argv('verify', '--pact', './pacts/web-shop.json', '--state=order 42 exists', '--json', '-h')),
    ).toEqual({
      command: 'verify',
      args: [],
      flags: { json: true, h: true },
      options: { pact: './pacts/web-shop.json', state: 'order 42 exists' },
    });
  });

  it('does not let a boolean flag swallow the next argument', () => {
    expect(parseArgs(argv('verify', '--json', 'extra'))).toEqual({
      command: 'verify',
      args: ['extra'],
      flags: { json: true },
      options: {},
    });
  });

  it('returns an empty command for no arguments', () => {
    expect(parseArgs(argv()).command).toBe('');
  });
});

describe('run', () => {
  it('prints global help with no command', async () => {
    const { code, output } = await runCli();
    expect(code).toBe(0);
    expect(output).toEqual([getGlobalHelp()]);
  });

  it('prints command help with --help', async () => {
    const { code, output } = await runCli('verify', '--help');
    expect(code).toBe(0);
    expect(output).toEqual([getCommandHelp('verify')]);
  });

  it('falls back to global help for an unknown command with --help', async () => {
    const { output } = await runCli('publish', '--help');
    expect(output).toEqual([getGlobalHelp()]);
  });

  it('rejects an unknown command', async () => {
    const { code, output } = await runCli('publish');
    expect(code).toBe(2);
    expect(output).toEqual(['Unknown command: publish. Run `pactcheck help` for usage.']);
  });

  it('maps verify flags onto the verification', async () => {
    const { code, output } = await runCli(
      'verify',
      '--pact=https://broker.test/pact',
      '--provider=orders-api',
      '--consumer=web-shop',
      '--base-url=http://provider.test',
      '--config=/nonexistent/pactcheck.yml',
      '--json',
    );

    expect(code).toBe(0);
    expect(JSON.parse(output[0])).toMatchObject({ success: true, verdicts: [{ description: 'get order 42' }] });
  });
});
