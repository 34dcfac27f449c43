import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import { loadPactCheckConfig, CONFIG_DEFAULTS } from '../../src/config/loader';

vi.mock('fs');

const mockReadFileSync = vi.mocked(fs.readFileSync);

describe('loadPactCheckConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // --- Missing / Empty file → defaults ---

  it('returns defaults when the file is missing', () => {
    mockReadFileSync.mockImplementation(() => {
      throw new Error('ENOENT: no such file or directory');
    });

    const { config, warnings } = loadPactCheckConfig();

    expect(warnings).toHaveLength(0);
    expect(config).toEqual(CONFIG_DEFAULTS);
    expect(mockReadFileSync).toHaveBeenCalledWith('.pactcheck.yml', 'utf-8');
  });

  it('returns defaults when the file is only whitespace', () => {
    mockReadFileSync.mockReturnValue('   \n  \n  ');

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toHaveLength(0);
    expect(config).toEqual(CONFIG_DEFAULTS);
  });

  it('returns defaults when the file is only YAML comments', () => {
    mockReadFileSync.mockReturnValue('# provider settings live here\n');

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toHaveLength(0);
    expect(config).toEqual(CONFIG_DEFAULTS);
  });

  // --- Valid YAML ---

  it('parses valid YAML and merges with defaults', () => {
    mockReadFileSync.mockReturnValue(`
provider:
  name: orders-api
  base_url: http://localhost:3000
  timeout_ms: 2500
consumer:
  name: web-shop
pact:
  uri: ./pacts/web-shop-orders-api.json
`);

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toHaveLength(0);
    expect(config).toEqual({
      provider: { name: 'orders-api', base_url: 'http://localhost:3000', timeout_ms: 2500 },
      consumer: { name: 'web-shop' },
      pact: { uri: './pacts/web-shop-orders-api.json' },
      filter: { description: '', state: '' },
    });
  });

  it('reads broker credentials and filters', () => {
    mockReadFileSync.mockReturnValue(`
pact:
  uri: https://broker.test/pacts/latest
  username: test-user
  password: test-secret
filter:
  state: order 42 exists
`);

    const { config } = loadPactCheckConfig('.pactcheck.yml');

    expect(config.pact).toEqual({
      uri: 'https://broker.test/pacts/latest',
      username: 'test-user',
      password: 'test-secret',
    });
    expect(config.filter).toEqual({ description: '', state: 'order 42 exists' });
  });

  // --- Invalid YAML ---

  it('warns with E501 on invalid YAML syntax', () => {
    mockReadFileSync.mockReturnValue('provider: [unclosed');

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toHaveLength(1);
    expect(warnings[0].field).toBe('_yaml');
    expect(warnings[0].message).toMatch(/^E501: Invalid YAML syntax: /);
    expect(config).toEqual(CONFIG_DEFAULTS);
  });

  it('warns with E501 when the document is not a mapping', () => {
    mockReadFileSync.mockReturnValue('- provider\n- consumer\n');

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toEqual([{ field: '_yaml', message: 'E501: Config must be a YAML mapping. Using defaults.' }]);
    expect(config).toEqual(CONFIG_DEFAULTS);
  });

  // --- Unknown keys / invalid values ---

  it('suggests a known key for a misspelled one', () => {
    mockReadFileSync.mockReturnValue(`
provider:
  nmae: orders-api
  base_url: http://localhost:3000
`);

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toEqual([
      { field: 'provider.nmae', message: 'E502: Unknown key "provider.nmae". Did you mean "provider.name"?' },
    ]);
    expect(config.provider).toEqual({ name: '', base_url: 'http://localhost:3000' });
  });

  it('suggests a known section for a misspelled top-level key', () => {
    mockReadFileSync.mockReturnValue('consumr:\n  name: web-shop\n');

    const { warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toEqual([{ field: 'consumr', message: 'E502: Unknown key "consumr". Did you mean "consumer"?' }]);
  });

  it('falls back to the default for an invalid value and keeps the rest', () => {
    mockReadFileSync.mockReturnValue(`
provider:
  name: orders-api
  timeout_ms: 5
consumer:
  name: web-shop
`);

    const { config, warnings } = loadPactCheckConfig('.pactcheck.yml');

    expect(warnings).toHaveLength(1);
    expect(warnings[0].field).toBe('provider.timeout_ms');
    expect(warnings[0].message).toMatch(/^E502: .+\. Using default for this field\.$/);
    expect(config.provider).toEqual({ name: 'orders-api', base_url: '' });
    expect(config.consumer).toEqual({ name: 'web-shop' });
  });
});
