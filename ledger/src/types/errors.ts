/**
 * SPDX-License-Identifier: Apache-2.0
 */
export type LedgerErrorCode =
    | 'INSUFFICIENT_BALANCE'
    | 'INSUFFICIENT_ALLOWANCE'
    | 'CALLBACK_REJECTED'
    | 'INVALID_TARGET'
    | 'INVALID_AMOUNT'
    | 'INVALID_PAYLOAD'
    | 'RESOURCE_EXHAUSTED'
    | 'CONTRACT_REGISTRY_ERROR';

export type RejectionReason = 'HANDLER_MISSING' | 'HANDLER_FAILED' | 'INVALID_SENTINEL';

export class LedgerError extends Error {
    constructor(
        message: string,
        public code: LedgerErrorCode,
        public context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'LedgerError';
    }
}

export class InsufficientBalanceError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INSUFFICIENT_BALANCE', context);
        this.name = 'InsufficientBalanceError';
    }
}

export class InsufficientAllowanceError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INSUFFICIENT_ALLOWANCE', context);
        this.name = 'InsufficientAllowanceError';
    }
}

export class CallbackRejectedError extends LedgerError {
    constructor(
        message: string,
        public reason: RejectionReason,
        context?: Record<string, unknown>
    ) {
        super(message, 'CALLBACK_REJECTED', { reason, ...context });
        this.name = 'CallbackRejectedError';
    }
}

export class InvalidTargetError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_TARGET', context);
        this.name = 'InvalidTargetError';
    }
}

export class InvalidAmountError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_AMOUNT', context);
        this.name = 'InvalidAmountError';
    }
}

export class InvalidPayloadError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'INVALID_PAYLOAD', context);
        this.name = 'InvalidPayloadError';
    }
}

/** Raised when nested operations exceed the configured call depth. */
export class ResourceExhaustedError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'RESOURCE_EXHAUSTED', context);
        this.name = 'ResourceExhaustedError';
    }
}

export class ContractRegistryError extends LedgerError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'CONTRACT_REGISTRY_ERROR', context);
        this.name = 'ContractRegistryError';
    }
}
