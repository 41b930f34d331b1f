/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import {
    AcceptanceVerdict,
    DispatchOutcome,
    DispatchStatus,
    NotificationKind,
} from '../types/notification';
import { APPROVAL_RECEIVED_SENTINEL, TRANSFER_RECEIVED_SENTINEL } from './interface-ids';

export function expectedSentinel(kind: NotificationKind): string {
    switch (kind) {
        case NotificationKind.TRANSFER_NOTIFY:
            return TRANSFER_RECEIVED_SENTINEL;
        case NotificationKind.APPROVE_NOTIFY:
            return APPROVAL_RECEIVED_SENTINEL;
    }
}

function describeValue(value: unknown): string {
    if (typeof value === 'string') {
        return JSON.stringify(value);
    }
    if (typeof value === 'bigint') {
        return `${value.toString()}n`;
    }
    if (value === null || value === undefined) {
        return String(value);
    }
    return `<${typeof value}>`;
}

/**
 * Accepts only a returned 4-byte value equal to the sentinel of `kind`.
 * Hex comparison is by bytes, so letter case does not matter.
 */
export function validateAcceptance(kind: NotificationKind, outcome: DispatchOutcome): AcceptanceVerdict {
    switch (outcome.status) {
        case DispatchStatus.HANDLER_MISSING:
            return {
                verdict: 'REJECT',
                reason: 'HANDLER_MISSING',
                detail: `target does not implement the ${kind} handler`,
            };
        case DispatchStatus.HANDLER_FAILED:
            return {
                verdict: 'REJECT',
                reason: 'HANDLER_FAILED',
                detail: outcome.reason,
            };
        case DispatchStatus.RETURNED: {
            const sentinel = expectedSentinel(kind);
            const value = outcome.value;
            if (typeof value === 'string' && ethers.isHexString(value, 4) && value.toLowerCase() === sentinel) {
                return { verdict: 'ACCEPT' };
            }
            return {
                verdict: 'REJECT',
                reason: 'INVALID_SENTINEL',
                detail: `expected ${sentinel}, handler returned ${describeValue(value)}`,
            };
        }
    }
}
