/**
 * SPDX-License-Identifier: Apache-2.0
 */
import dotenv from 'dotenv';
import { strict as assert } from 'assert';

dotenv.config();

/** Nesting depth of operations triggered from inside callbacks, outermost included. */
export const DEFAULT_MAX_CALL_DEPTH = 64;
export const MAX_CALL_DEPTH_LIMIT = 1024;

export interface LedgerConfig {
    maxCallDepth: number;
}

function envNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw === '') {
        return fallback;
    }
    const parsed = Number(raw);
    assert(Number.isInteger(parsed), `${name} must be an integer`);
    return parsed;
}

export function assertCallDepth(value: number, name = 'maxCallDepth'): void {
    assert(
        Number.isInteger(value) && value >= 1 && value <= MAX_CALL_DEPTH_LIMIT,
        `${name} must be an integer between 1 and ${MAX_CALL_DEPTH_LIMIT}`
    );
}

export function loadLedgerConfig(): LedgerConfig {
    const maxCallDepth = envNumber('LEDGER_MAX_CALL_DEPTH', DEFAULT_MAX_CALL_DEPTH);
    assertCallDepth(maxCallDepth, 'LEDGER_MAX_CALL_DEPTH');
    return { maxCallDepth };
}
