/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { randomUUID } from 'crypto';
import { ethers } from 'ethers';
import { assertCallDepth, DEFAULT_MAX_CALL_DEPTH } from '../config';
import { InMemoryLedger } from '../ledger/in-memory-ledger';
import {
    incrementCallbackOutcome,
    incrementOperation,
} from '../metrics/counters';
import {
    CallbackRejectedError,
    InsufficientAllowanceError,
    InsufficientBalanceError,
    InvalidTargetError,
    LedgerError,
    ResourceExhaustedError,
} from '../types/errors';
import type { Address, GenesisAllocation, LedgerEvent, LedgerStore } from '../types/ledger';
import {
    DeployedContract,
    DispatchOutcome,
    DispatchStatus,
    NotificationKind,
    NotificationRequest,
    OperationName,
    OperationReceipt,
} from '../types/notification';
import { Logger } from '../utils/logger';
import { MAX_AMOUNT, requireAccount, requireAmount, requirePayload } from '../utils/validation';
import { validateAcceptance } from './acceptance-validator';
import { CallbackDispatcher } from './callback-dispatcher';
import { CapabilityProber, InterfaceDeclaration } from './capability-prober';
import { ContractRegistry } from './contract-registry';
import type { UnitParticipant } from './unit-of-work';
import {
    ERC165_INTERFACE_ID,
    ERC20_INTERFACE_ID,
    PAYABLE_TOKEN_INTERFACE_ID,
} from './interface-ids';

export const PAYABLE_TOKEN_DECLARATION = new InterfaceDeclaration([
    ERC165_INTERFACE_ID,
    ERC20_INTERFACE_ID,
    PAYABLE_TOKEN_INTERFACE_ID,
]);

const EMPTY_DATA = '0x';

export interface PayableTokenOptions {
    address: Address;
    name: string;
    symbol: string;
    decimals?: number;
    genesis?: readonly GenesisAllocation[];
    /**
     * Shared execution substrate; a private one is created when omitted. Tokens
     * sharing a registry commit and revert as one unit of work.
     */
    registry?: ContractRegistry;
    maxCallDepth?: number;
}

export type LedgerEventListener = (events: readonly LedgerEvent[]) => void;

/**
 * Fungible token whose transfers and approvals can complete with a verified
 * callback into the counterparty.
 *
 * Every public operation is one atomic unit: the ledger is mutated first, the
 * counterparty is notified, and a rejected notification unwinds the whole
 * operation, including anything nested operations committed while the callback
 * was running. Listeners only see events once the outermost operation commits.
 *
 * @example
 * ```typescript
 * const token = new PayableToken({ address: tokenAddress, name: 'Test', symbol: 'TST', genesis })
 * token.registry.deploy(new NotificationReceiver(receiverAddress))
 * token.transferAndCall(holder, receiverAddress, 40n, '0x01')
 * ```
 */
export class PayableToken implements DeployedContract {
    readonly address: Address;
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
    readonly declaredInterfaces = PAYABLE_TOKEN_DECLARATION.list();
    readonly registry: ContractRegistry;

    private readonly ledger: LedgerStore;
    private readonly prober: CapabilityProber;
    private readonly dispatcher = new CallbackDispatcher();
    private readonly maxCallDepth: number;
    private readonly listeners = new Set<LedgerEventListener>();
    private readonly participant: UnitParticipant = {
        checkpoint: () => this.ledger.checkpoint(),
        revertTo: (checkpoint) => this.ledger.revertTo(checkpoint),
        commit: () => this.ledger.commit(),
        publish: (events) => this.publish(events),
    };

    constructor(options: PayableTokenOptions) {
        this.address = requireAccount(options.address, 'token');
        this.name = options.name;
        this.symbol = options.symbol;
        this.decimals = options.decimals ?? 18;
        this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
        assertCallDepth(this.maxCallDepth);

        this.ledger = new InMemoryLedger(options.genesis ?? []);
        this.registry = options.registry ?? new ContractRegistry();
        this.registry.deploy(this);
        this.prober = new CapabilityProber(this.registry);
    }

    // ---------------------------------------------------------------------------
    // Views
    // ---------------------------------------------------------------------------

    totalSupply(): bigint {
        return this.ledger.totalSupply();
    }

    balanceOf(account: Address): bigint {
        return this.ledger.getBalance(normalizeAccount(account, 'account'));
    }

    allowance(owner: Address, spender: Address): bigint {
        return this.ledger.getAllowance(normalizeAccount(owner, 'owner'), normalizeAccount(spender, 'spender'));
    }

    supportsInterface(interfaceId: string): boolean {
        return PAYABLE_TOKEN_DECLARATION.supports(interfaceId);
    }

    /** Events recorded so far, including those of operations still in progress. */
    getEvents(): readonly LedgerEvent[] {
        return this.ledger.getEvents();
    }

    subscribe(listener: LedgerEventListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    // ---------------------------------------------------------------------------
    // Plain operations
    // ---------------------------------------------------------------------------

    transfer(caller: Address, to: Address, amount: bigint): OperationReceipt {
        return this.execute('transfer', () => {
            const from = requireAccount(caller, 'sender');
            const recipient = requireAccount(to, 'recipient');
            const value = requireAmount(amount);

            this.move(from, recipient, value);
            return false;
        });
    }

    transferFrom(caller: Address, from: Address, to: Address, amount: bigint): OperationReceipt {
        return this.execute('transferFrom', () => {
            const spender = requireAccount(caller, 'spender');
            const owner = requireAccount(from, 'sender');
            const recipient = requireAccount(to, 'recipient');
            const value = requireAmount(amount);

            this.spendAndMove(spender, owner, recipient, value);
            return false;
        });
    }

    approve(caller: Address, spender: Address, amount: bigint): OperationReceipt {
        return this.execute('approve', () => {
            const owner = requireAccount(caller, 'approver');
            const approved = requireAccount(spender, 'spender');
            const value = requireAmount(amount);

            this.writeAllowance(owner, approved, value);
            return false;
        });
    }

    // ---------------------------------------------------------------------------
    // Operations with notification
    // ---------------------------------------------------------------------------

    transferAndCall(caller: Address, to: Address, amount: bigint, data: string = EMPTY_DATA): OperationReceipt {
        return this.execute('transferAndCall', (operationId) => {
            const from = requireAccount(caller, 'sender');
            const recipient = requireAccount(to, 'recipient');
            const value = requireAmount(amount);
            const payload = requirePayload(data);

            this.move(from, recipient, value);
            return this.notify(operationId, {
                kind: NotificationKind.TRANSFER_NOTIFY,
                operator: from,
                from,
                target: recipient,
                amount: value,
                data: payload,
            });
        });
    }

    transferFromAndCall(
        caller: Address,
        from: Address,
        to: Address,
        amount: bigint,
        data: string = EMPTY_DATA
    ): OperationReceipt {
        return this.execute('transferFromAndCall', (operationId) => {
            const spender = requireAccount(caller, 'spender');
            const owner = requireAccount(from, 'sender');
            const recipient = requireAccount(to, 'recipient');
            const value = requireAmount(amount);
            const payload = requirePayload(data);

            this.spendAndMove(spender, owner, recipient, value);
            return this.notify(operationId, {
                kind: NotificationKind.TRANSFER_NOTIFY,
                operator: spender,
                from: owner,
                target: recipient,
                amount: value,
                data: payload,
            });
        });
    }

    approveAndCall(caller: Address, spender: Address, amount: bigint, data: string = EMPTY_DATA): OperationReceipt {
        return this.execute('approveAndCall', (operationId) => {
            const owner = requireAccount(caller, 'approver');
            const approved = requireAccount(spender, 'spender');
            const value = requireAmount(amount);
            const payload = requirePayload(data);

            this.writeAllowance(owner, approved, value);
            return this.notify(operationId, {
                kind: NotificationKind.APPROVE_NOTIFY,
                operator: owner,
                from: owner,
                target: approved,
                amount: value,
                data: payload,
            });
        });
    }

    // ---------------------------------------------------------------------------
    // Internals
    // ---------------------------------------------------------------------------

    private execute(operation: OperationName, body: (operationId: string) => boolean): OperationReceipt {
        const unit = this.registry.unit;
        if (unit.depth >= this.maxCallDepth) {
            incrementOperation(operation, 'REVERTED');
            Logger.warn('Call depth exhausted', { operation, depth: unit.depth, maxCallDepth: this.maxCallDepth });
            throw new ResourceExhaustedError(`call depth limit of ${this.maxCallDepth} reached`, {
                operation,
                maxCallDepth: this.maxCallDepth,
            });
        }

        const operationId = randomUUID();
        const depth = unit.depth + 1;
        let outcome: { notified: boolean; events: LedgerEvent[] };
        try {
            outcome = unit.run(this.participant, () => {
                const checkpoint = this.ledger.checkpoint();
                const notified = body(operationId);
                return { notified, events: this.ledger.eventsSince(checkpoint) };
            });
        } catch (error: unknown) {
            incrementOperation(operation, 'REVERTED');
            Logger.warn('Operation reverted', {
                operationId,
                operation,
                depth,
                code: error instanceof LedgerError ? error.code : 'UNEXPECTED_ERROR',
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }

        incrementOperation(operation, 'COMMITTED');
        Logger.info('Operation committed', {
            operationId,
            operation,
            depth,
            notified: outcome.notified,
            eventCount: outcome.events.length,
        });

        return { operationId, operation, notified: outcome.notified, events: outcome.events };
    }

    private notify(operationId: string, request: NotificationRequest): boolean {
        const probe = this.prober.probe(request.target, request.kind);
        if (probe.status === 'NO_CODE') {
            incrementCallbackOutcome(request.kind, 'SKIPPED_NO_CODE');
            return false;
        }

        const outcome: DispatchOutcome = probe.status === 'UNSUPPORTED'
            ? { status: DispatchStatus.HANDLER_MISSING }
            : this.dispatcher.dispatch(probe.contract, request);

        const verdict = validateAcceptance(request.kind, outcome);
        if (verdict.verdict === 'REJECT') {
            incrementCallbackOutcome(request.kind, verdict.reason);
            Logger.warn('Callback rejected', {
                operationId,
                target: request.target,
                kind: request.kind,
                reason: verdict.reason,
                detail: verdict.detail,
            });
            throw new CallbackRejectedError(
                `${request.target} rejected ${request.kind}: ${verdict.detail}`,
                verdict.reason,
                { operationId, kind: request.kind, target: request.target, detail: verdict.detail }
            );
        }

        incrementCallbackOutcome(request.kind, 'ACCEPT');
        return true;
    }

    private requireBalance(account: Address, value: bigint): void {
        const available = this.ledger.getBalance(account);
        if (available < value) {
            throw new InsufficientBalanceError('insufficient balance', { account, available, needed: value });
        }
    }

    private move(from: Address, to: Address, value: bigint): void {
        const debited = this.ledger.debit(from, value);
        if (!debited.ok) {
            throw new InsufficientBalanceError('insufficient balance', {
                account: from,
                available: debited.available,
                needed: value,
            });
        }
        this.ledger.credit(to, value);
        this.ledger.recordEvent({ type: 'Transfer', from, to, value });
    }

    /** Allowance and balance are both checked before either is touched. */
    private spendAndMove(spender: Address, owner: Address, to: Address, value: bigint): void {
        const current = this.ledger.getAllowance(owner, spender);
        if (current < value) {
            throw new InsufficientAllowanceError('insufficient allowance', {
                owner,
                spender,
                allowance: current,
                needed: value,
            });
        }
        this.requireBalance(owner, value);

        // the maximum allowance never decreases
        if (current !== MAX_AMOUNT) {
            this.ledger.setAllowance(owner, spender, current - value);
        }
        this.move(owner, to, value);
    }

    private writeAllowance(owner: Address, spender: Address, value: bigint): void {
        this.ledger.setAllowance(owner, spender, value);
        this.ledger.recordEvent({ type: 'Approval', owner, spender, value });
    }

    private publish(events: readonly LedgerEvent[]): void {
        if (events.length === 0) {
            return;
        }
        for (const listener of this.listeners) {
            try {
                listener(events);
            } catch (error: unknown) {
                Logger.error('Ledger event listener failed', error);
            }
        }
    }
}

function normalizeAccount(value: Address, fieldName: string): Address {
    if (!ethers.isAddress(value)) {
        throw new InvalidTargetError(`invalid ${fieldName} address`, { address: value, fieldName });
    }
    return ethers.getAddress(value);
}
