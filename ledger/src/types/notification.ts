/**
 * SPDX-License-Identifier: Apache-2.0
 */
import type { Address, LedgerEvent } from './ledger';
import type { RejectionReason } from './errors';

export enum NotificationKind {
    TRANSFER_NOTIFY = 'TRANSFER_NOTIFY',
    APPROVE_NOTIFY = 'APPROVE_NOTIFY'
}

export interface NotificationRequest {
    kind: NotificationKind;
    /** Account that initiated the operation. */
    operator: Address;
    /** Previous holder for transfers, allowance owner for approvals. */
    from: Address;
    /** Recipient for transfers, spender for approvals. */
    target: Address;
    amount: bigint;
    /** Opaque hex payload handed to the handler as-is. */
    data: string;
}

export enum DispatchStatus {
    RETURNED = 'RETURNED',
    HANDLER_MISSING = 'HANDLER_MISSING',
    HANDLER_FAILED = 'HANDLER_FAILED'
}

export type DispatchOutcome =
    | { status: DispatchStatus.RETURNED; value: unknown }
    | { status: DispatchStatus.HANDLER_MISSING }
    | { status: DispatchStatus.HANDLER_FAILED; reason: string };

export type AcceptanceVerdict =
    | { verdict: 'ACCEPT' }
    | { verdict: 'REJECT'; reason: RejectionReason; detail: string };

export interface TransferReceiver {
    onTransferReceived(operator: Address, from: Address, amount: bigint, data: string): unknown;
}

export interface ApprovalReceiver {
    onApprovalReceived(owner: Address, amount: bigint, data: string): unknown;
}

/**
 * Executable code living at an address. Handlers are optional and their return
 * values are untrusted.
 */
export interface DeployedContract extends Partial<TransferReceiver>, Partial<ApprovalReceiver> {
    readonly address: Address;
    /** ERC-165 style interface identifiers the contract claims to implement. */
    readonly declaredInterfaces?: readonly string[];
}

export type OperationName =
    | 'transfer'
    | 'transferFrom'
    | 'approve'
    | 'transferAndCall'
    | 'transferFromAndCall'
    | 'approveAndCall';

export interface OperationReceipt {
    operationId: string;
    operation: OperationName;
    /** Whether the counterparty was notified and accepted. */
    notified: boolean;
    /** Events recorded by this operation, including those of nested operations. */
    events: LedgerEvent[];
}
