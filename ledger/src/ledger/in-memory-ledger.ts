/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { InvalidAmountError } from '../types/errors';
import type { Address, DebitResult, GenesisAllocation, LedgerEvent, LedgerStore } from '../types/ledger';
import { MAX_AMOUNT, requireAccount, requireAmount } from '../utils/validation';

type JournalEntry =
    | { type: 'BALANCE'; account: Address; previous: bigint }
    | { type: 'ALLOWANCE'; key: string; previous: bigint }
    | { type: 'EVENT' };

function allowanceKey(owner: Address, spender: Address): string {
    return `${owner}:${spender}`;
}

function writeAmount<K>(map: Map<K, bigint>, key: K, value: bigint): void {
    if (value === 0n) {
        map.delete(key);
    } else {
        map.set(key, value);
    }
}

/**
 * Balances and allowances kept in process memory, with an undo journal.
 *
 * Total supply is fixed by the genesis allocation; debit and credit only move
 * amounts between accounts.
 */
export class InMemoryLedger implements LedgerStore {
    private readonly balances = new Map<Address, bigint>();
    private readonly allowances = new Map<string, bigint>();
    private readonly events: LedgerEvent[] = [];
    private readonly journal: JournalEntry[] = [];
    private supply = 0n;

    constructor(genesis: readonly GenesisAllocation[] = []) {
        for (const allocation of genesis) {
            const account = requireAccount(allocation.account, 'genesis account');
            const amount = requireAmount(allocation.amount, 'genesis amount');
            if (this.supply + amount > MAX_AMOUNT) {
                throw new InvalidAmountError('genesis allocations exceed uint256 supply', {
                    account,
                    amount,
                });
            }
            this.supply += amount;
            writeAmount(this.balances, account, this.getBalance(account) + amount);
            this.events.push({ type: 'Transfer', from: ethers.ZeroAddress, to: account, value: amount });
        }
    }

    totalSupply(): bigint {
        return this.supply;
    }

    getBalance(account: Address): bigint {
        return this.balances.get(account) ?? 0n;
    }

    debit(account: Address, amount: bigint): DebitResult {
        const available = this.getBalance(account);
        if (available < amount) {
            return { ok: false, reason: 'INSUFFICIENT_BALANCE', available };
        }
        this.journal.push({ type: 'BALANCE', account, previous: available });
        writeAmount(this.balances, account, available - amount);
        return { ok: true };
    }

    credit(account: Address, amount: bigint): void {
        const previous = this.getBalance(account);
        this.journal.push({ type: 'BALANCE', account, previous });
        writeAmount(this.balances, account, previous + amount);
    }

    getAllowance(owner: Address, spender: Address): bigint {
        return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
    }

    setAllowance(owner: Address, spender: Address, amount: bigint): void {
        const key = allowanceKey(owner, spender);
        this.journal.push({ type: 'ALLOWANCE', key, previous: this.allowances.get(key) ?? 0n });
        writeAmount(this.allowances, key, amount);
    }

    recordEvent(event: LedgerEvent): void {
        this.journal.push({ type: 'EVENT' });
        this.events.push(event);
    }

    getEvents(): readonly LedgerEvent[] {
        return this.events;
    }

    checkpoint(): number {
        return this.journal.length;
    }

    revertTo(checkpoint: number): void {
        this.assertCheckpoint(checkpoint);
        while (this.journal.length > checkpoint) {
            const entry = this.journal.pop();
            if (!entry) {
                break;
            }
            switch (entry.type) {
                case 'BALANCE':
                    writeAmount(this.balances, entry.account, entry.previous);
                    break;
                case 'ALLOWANCE':
                    writeAmount(this.allowances, entry.key, entry.previous);
                    break;
                case 'EVENT':
                    this.events.pop();
                    break;
            }
        }
    }

    eventsSince(checkpoint: number): LedgerEvent[] {
        this.assertCheckpoint(checkpoint);
        const eventCount = this.journal
            .slice(checkpoint)
            .filter((entry) => entry.type === 'EVENT').length;
        return this.events.slice(this.events.length - eventCount);
    }

    commit(): LedgerEvent[] {
        const committed = this.eventsSince(0);
        this.journal.length = 0;
        return committed;
    }

    private assertCheckpoint(checkpoint: number): void {
        if (!Number.isInteger(checkpoint) || checkpoint < 0 || checkpoint > this.journal.length) {
            throw new RangeError(`unknown ledger checkpoint ${checkpoint}`);
        }
    }
}
