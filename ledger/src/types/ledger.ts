/**
 * SPDX-License-Identifier: Apache-2.0
 */

/** Checksummed 20-byte hex account address. */
export type Address = string;

export interface TransferEvent {
    type: 'Transfer';
    from: Address;
    to: Address;
    value: bigint;
}

export interface ApprovalEvent {
    type: 'Approval';
    owner: Address;
    spender: Address;
    value: bigint;
}

export type LedgerEvent = TransferEvent | ApprovalEvent;

export interface GenesisAllocation {
    account: Address;
    amount: bigint;
}

export type DebitResult =
    | { ok: true }
    | { ok: false; reason: 'INSUFFICIENT_BALANCE'; available: bigint };

/**
 * Storage collaborator behind the token. Every mutation is journaled so the
 * coordinator can unwind an operation back to the checkpoint it took.
 */
export interface LedgerStore {
    totalSupply(): bigint;
    getBalance(account: Address): bigint;
    debit(account: Address, amount: bigint): DebitResult;
    credit(account: Address, amount: bigint): void;
    getAllowance(owner: Address, spender: Address): bigint;
    setAllowance(owner: Address, spender: Address, amount: bigint): void;
    recordEvent(event: LedgerEvent): void;
    /** Committed and in-flight events, oldest first. */
    getEvents(): readonly LedgerEvent[];

    checkpoint(): number;
    /** Undo every mutation and event journaled after `checkpoint`. */
    revertTo(checkpoint: number): void;
    /** Events journaled after `checkpoint`, still revertible. */
    eventsSince(checkpoint: number): LedgerEvent[];
    /** Finalizes the journal and returns the events it held. */
    commit(): LedgerEvent[];
}
