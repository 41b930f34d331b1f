/**
 * SPDX-License-Identifier: Apache-2.0
 */
import {
    DeployedContract,
    DispatchOutcome,
    DispatchStatus,
    NotificationKind,
    NotificationRequest,
} from '../types/notification';

function describeFailure(error: unknown): string {
    if (error instanceof Error) {
        return `${error.name}: ${error.message}`;
    }
    return `non-error thrown: ${String(error)}`;
}

/**
 * Invokes the notification handler of a deployed contract.
 *
 * Handlers run synchronously and may call back into the token; anything they
 * throw becomes a HANDLER_FAILED outcome and whatever they return is handed
 * to the validator untouched.
 */
export class CallbackDispatcher {
    dispatch(contract: DeployedContract, request: NotificationRequest): DispatchOutcome {
        try {
            switch (request.kind) {
                case NotificationKind.TRANSFER_NOTIFY: {
                    if (typeof contract.onTransferReceived !== 'function') {
                        return { status: DispatchStatus.HANDLER_MISSING };
                    }
                    const value = contract.onTransferReceived(
                        request.operator,
                        request.from,
                        request.amount,
                        request.data
                    );
                    return { status: DispatchStatus.RETURNED, value };
                }
                case NotificationKind.APPROVE_NOTIFY: {
                    if (typeof contract.onApprovalReceived !== 'function') {
                        return { status: DispatchStatus.HANDLER_MISSING };
                    }
                    const value = contract.onApprovalReceived(request.from, request.amount, request.data);
                    return { status: DispatchStatus.RETURNED, value };
                }
            }
        } catch (error: unknown) {
            return { status: DispatchStatus.HANDLER_FAILED, reason: describeFailure(error) };
        }
    }
}
