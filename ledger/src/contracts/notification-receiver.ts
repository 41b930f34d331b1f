/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import {
    APPROVAL_RECEIVED_SENTINEL,
    APPROVAL_RECEIVER_INTERFACE_ID,
    EMPTY_RESPONSE,
    ERC165_INTERFACE_ID,
    TRANSFER_RECEIVED_SENTINEL,
    TRANSFER_RECEIVER_INTERFACE_ID,
} from '../core/interface-ids';
import type { Address } from '../types/ledger';
import {
    ApprovalReceiver,
    DeployedContract,
    NotificationKind,
    TransferReceiver,
} from '../types/notification';

export enum ReceiverBehavior {
    ACCEPT = 'ACCEPT',
    REJECT_WITH_ERROR = 'REJECT_WITH_ERROR',
    WRONG_SENTINEL = 'WRONG_SENTINEL',
    EMPTY_RESPONSE = 'EMPTY_RESPONSE',
    /** Answers each notification with the other handler's sentinel. */
    CROSS_KIND_SENTINEL = 'CROSS_KIND_SENTINEL',
}

export interface ReceivedNotification {
    kind: NotificationKind;
    operator: Address | null;
    from: Address;
    amount: bigint;
    data: string;
}

/** Runs inside the callback window, before the handler answers. */
export type NotificationHook = (notification: ReceivedNotification) => void;

export class ReceiverRejectedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ReceiverRejectedError';
    }
}

const WRONG_SENTINEL_VALUE = '0xdeadbeef';

/**
 * Reference contract implementing both notification handlers.
 */
export class NotificationReceiver implements DeployedContract, TransferReceiver, ApprovalReceiver {
    readonly address: Address;
    readonly declaredInterfaces = [
        ERC165_INTERFACE_ID,
        TRANSFER_RECEIVER_INTERFACE_ID,
        APPROVAL_RECEIVER_INTERFACE_ID,
    ];
    readonly received: ReceivedNotification[] = [];

    constructor(
        address: Address,
        public behavior: ReceiverBehavior = ReceiverBehavior.ACCEPT,
        private readonly hook?: NotificationHook
    ) {
        this.address = ethers.getAddress(address);
    }

    onTransferReceived(operator: Address, from: Address, amount: bigint, data: string): string {
        this.receive({ kind: NotificationKind.TRANSFER_NOTIFY, operator, from, amount, data });
        return this.respond(TRANSFER_RECEIVED_SENTINEL, APPROVAL_RECEIVED_SENTINEL);
    }

    onApprovalReceived(owner: Address, amount: bigint, data: string): string {
        this.receive({ kind: NotificationKind.APPROVE_NOTIFY, operator: null, from: owner, amount, data });
        return this.respond(APPROVAL_RECEIVED_SENTINEL, TRANSFER_RECEIVED_SENTINEL);
    }

    private receive(notification: ReceivedNotification): void {
        this.received.push(notification);
        this.hook?.(notification);
    }

    private respond(sentinel: string, otherSentinel: string): string {
        switch (this.behavior) {
            case ReceiverBehavior.ACCEPT:
                return sentinel;
            case ReceiverBehavior.REJECT_WITH_ERROR:
                throw new ReceiverRejectedError('receiver refused the notification');
            case ReceiverBehavior.WRONG_SENTINEL:
                return WRONG_SENTINEL_VALUE;
            case ReceiverBehavior.EMPTY_RESPONSE:
                return EMPTY_RESPONSE;
            case ReceiverBehavior.CROSS_KIND_SENTINEL:
                return otherSentinel;
        }
    }
}
