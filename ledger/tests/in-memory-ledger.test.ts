/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { InMemoryLedger } from '../src/ledger/in-memory-ledger';
import { InvalidAmountError, InvalidTargetError } from '../src/types/errors';

const ALICE = ethers.getAddress('0x' + 'a1'.repeat(20));
const BOB = ethers.getAddress('0x' + 'b0'.repeat(20));

describe('InMemoryLedger', () => {
    test('genesis sets balances, supply and mint events', () => {
        const ledger = new InMemoryLedger([
            { account: ALICE.toLowerCase(), amount: 100n },
            { account: BOB, amount: 5n },
            { account: ALICE, amount: 1n },
        ]);

        expect(ledger.totalSupply()).toBe(106n);
        expect(ledger.getBalance(ALICE)).toBe(101n);
        expect(ledger.getBalance(BOB)).toBe(5n);
        expect(ledger.getEvents()).toEqual([
            { type: 'Transfer', from: ethers.ZeroAddress, to: ALICE, value: 100n },
            { type: 'Transfer', from: ethers.ZeroAddress, to: BOB, value: 5n },
            { type: 'Transfer', from: ethers.ZeroAddress, to: ALICE, value: 1n },
        ]);
        expect(ledger.checkpoint()).toBe(0);
    });

    test('genesis rejects zero accounts and supply overflow', () => {
        expect(() => new InMemoryLedger([{ account: ethers.ZeroAddress, amount: 1n }])).toThrow(InvalidTargetError);
        expect(() => new InMemoryLedger([
            { account: ALICE, amount: ethers.MaxUint256 },
            { account: BOB, amount: 1n },
        ])).toThrow(InvalidAmountError);
    });

    test('debit refuses to overdraw without touching state', () => {
        const ledger = new InMemoryLedger([{ account: ALICE, amount: 10n }]);

        expect(ledger.debit(ALICE, 11n)).toEqual({ ok: false, reason: 'INSUFFICIENT_BALANCE', available: 10n });
        expect(ledger.getBalance(ALICE)).toBe(10n);
        expect(ledger.checkpoint()).toBe(0);
    });

    test('revertTo undoes balances, allowances and events in reverse order', () => {
        const ledger = new InMemoryLedger([{ account: ALICE, amount: 10n }]);
        ledger.setAllowance(ALICE, BOB, 3n);
        const checkpoint = ledger.checkpoint();

        ledger.debit(ALICE, 4n);
        ledger.credit(BOB, 4n);
        ledger.setAllowance(ALICE, BOB, 9n);
        ledger.setAllowance(ALICE, BOB, 1n);
        ledger.recordEvent({ type: 'Transfer', from: ALICE, to: BOB, value: 4n });

        ledger.revertTo(checkpoint);

        expect(ledger.getBalance(ALICE)).toBe(10n);
        expect(ledger.getBalance(BOB)).toBe(0n);
        expect(ledger.getAllowance(ALICE, BOB)).toBe(3n);
        expect(ledger.getEvents()).toHaveLength(1);
        expect(ledger.checkpoint()).toBe(checkpoint);
    });

    test('events since an inner checkpoint stay revertible by the enclosing one', () => {
        const ledger = new InMemoryLedger([{ account: ALICE, amount: 10n }]);
        const outer = ledger.checkpoint();
        ledger.debit(ALICE, 2n);
        ledger.credit(BOB, 2n);

        const inner = ledger.checkpoint();
        ledger.debit(BOB, 1n);
        ledger.credit(ALICE, 1n);
        ledger.recordEvent({ type: 'Transfer', from: BOB, to: ALICE, value: 1n });

        expect(ledger.eventsSince(inner)).toEqual([{ type: 'Transfer', from: BOB, to: ALICE, value: 1n }]);
        expect(ledger.checkpoint()).toBe(5);

        ledger.revertTo(outer);

        expect(ledger.getBalance(ALICE)).toBe(10n);
        expect(ledger.getBalance(BOB)).toBe(0n);
        expect(ledger.getEvents()).toHaveLength(1);
    });

    test('commit finalizes the journal', () => {
        const ledger = new InMemoryLedger([{ account: ALICE, amount: 10n }]);
        ledger.debit(ALICE, 2n);
        ledger.credit(BOB, 2n);
        ledger.recordEvent({ type: 'Transfer', from: ALICE, to: BOB, value: 2n });

        expect(ledger.commit()).toEqual([{ type: 'Transfer', from: ALICE, to: BOB, value: 2n }]);
        expect(ledger.checkpoint()).toBe(0);

        ledger.revertTo(0);
        expect(ledger.getBalance(BOB)).toBe(2n);
    });

    test('rejects unknown checkpoints', () => {
        const ledger = new InMemoryLedger();
        expect(() => ledger.revertTo(3)).toThrow('unknown ledger checkpoint 3');
        expect(() => ledger.eventsSince(-1)).toThrow(RangeError);
    });
});
