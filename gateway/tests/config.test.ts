import type { GatewayConfig } from '../src/config';

const ORIGINAL_ENV = { ...process.env };

function loadWithEnv(overrides: Record<string, string | undefined>): GatewayConfig {
  process.env = { ...ORIGINAL_ENV };
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  jest.resetModules();
  const { loadConfig } = require('../src/config') as typeof import('../src/config');
  return loadConfig();
}

const BASE_ENV = {
  TOKEN_ADDRESS: '0xf39fd6e51aad88f6f4ce6ab8827279cfffb92266',
  PORT: undefined,
  TOKEN_NAME: undefined,
  TOKEN_SYMBOL: undefined,
  TOKEN_DECIMALS: undefined,
  GENESIS_FILE: undefined,
  LEDGER_MAX_CALL_DEPTH: undefined,
};

describe('gateway config', () => {
  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  test('applies defaults and checksums the token address', () => {
    const config = loadWithEnv(BASE_ENV);

    expect(config.port).toBe(3400);
    expect(config.tokenAddress).toBe('0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266');
    expect(config.tokenName).toBe('Payable Token');
    expect(config.tokenSymbol).toBe('PAY');
    expect(config.tokenDecimals).toBe(18);
    expect(config.maxCallDepth).toBe(64);
    expect(config.genesisFile.endsWith('genesis.example.json')).toBe(true);
  });

  test('reads overrides', () => {
    const config = loadWithEnv({
      ...BASE_ENV,
      PORT: '8080',
      TOKEN_SYMBOL: 'TST',
      TOKEN_DECIMALS: '6',
      LEDGER_MAX_CALL_DEPTH: '8',
    });

    expect(config.port).toBe(8080);
    expect(config.tokenSymbol).toBe('TST');
    expect(config.tokenDecimals).toBe(6);
    expect(config.maxCallDepth).toBe(8);
  });

  test('requires a valid token address', () => {
    expect(() => loadWithEnv({ ...BASE_ENV, TOKEN_ADDRESS: 'not-an-address' })).toThrow(
      'TOKEN_ADDRESS must be a valid EVM address, received "not-an-address"',
    );
    expect(() => loadWithEnv({ ...BASE_ENV, TOKEN_ADDRESS: undefined })).toThrow('TOKEN_ADDRESS is missing');
  });

  test('rejects out-of-range values', () => {
    expect(() => loadWithEnv({ ...BASE_ENV, TOKEN_DECIMALS: '40' })).toThrow(
      'TOKEN_DECIMALS must be between 0 and 36',
    );
    expect(() => loadWithEnv({ ...BASE_ENV, LEDGER_MAX_CALL_DEPTH: '0' })).toThrow(
      'LEDGER_MAX_CALL_DEPTH must be an integer between 1 and 1024',
    );
  });
});
