/**
 * SPDX-License-Identifier: Apache-2.0
 */
function withEnv(overrides: Record<string, string | undefined>, run: () => void): void {
    const original = process.env;
    process.env = { ...original };

    for (const [key, value] of Object.entries(overrides)) {
        if (value === undefined) {
            delete process.env[key];
        } else {
            process.env[key] = value;
        }
    }

    try {
        run();
    } finally {
        process.env = original;
        jest.resetModules();
    }
}

function loadConfigModule() {
    jest.resetModules();
    return require('../src/config') as typeof import('../src/config');
}

describe('ledger config', () => {
    test('defaults the call depth when unset', () => {
        withEnv({ LEDGER_MAX_CALL_DEPTH: undefined }, () => {
            const { loadLedgerConfig, DEFAULT_MAX_CALL_DEPTH } = loadConfigModule();
            expect(loadLedgerConfig()).toEqual({ maxCallDepth: DEFAULT_MAX_CALL_DEPTH });
        });
    });

    test('reads the call depth from the environment', () => {
        withEnv({ LEDGER_MAX_CALL_DEPTH: '12' }, () => {
            expect(loadConfigModule().loadLedgerConfig()).toEqual({ maxCallDepth: 12 });
        });
    });

    test.each(['0', '1025', '2.5', 'deep'])('rejects LEDGER_MAX_CALL_DEPTH=%s', (value) => {
        withEnv({ LEDGER_MAX_CALL_DEPTH: value }, () => {
            expect(() => loadConfigModule().loadLedgerConfig()).toThrow(/LEDGER_MAX_CALL_DEPTH must be/);
        });
    });
});
