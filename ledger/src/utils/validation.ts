/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { InvalidAmountError, InvalidPayloadError, InvalidTargetError } from '../types/errors';
import type { Address } from '../types/ledger';

/** Largest amount a uint256 balance or allowance can hold. */
export const MAX_AMOUNT = ethers.MaxUint256;

/**
 * Checksums `value`, rejecting malformed input and the reserved zero address.
 */
export function requireAccount(value: string, fieldName: string): Address {
    if (!ethers.isAddress(value)) {
        throw new InvalidTargetError(`invalid ${fieldName} address`, { address: value, fieldName });
    }
    const address = ethers.getAddress(value);
    if (address === ethers.ZeroAddress) {
        throw new InvalidTargetError(`${fieldName} cannot be zero address`, { address, fieldName });
    }
    return address;
}

export function requireAmount(amount: bigint, fieldName = 'amount'): bigint {
    if (typeof amount !== 'bigint') {
        throw new InvalidAmountError(`${fieldName} must be a bigint`, { fieldName });
    }
    if (amount < 0n) {
        throw new InvalidAmountError(`${fieldName} cannot be negative`, { amount, fieldName });
    }
    if (amount > MAX_AMOUNT) {
        throw new InvalidAmountError(`${fieldName} exceeds uint256 range`, { amount, fieldName });
    }
    return amount;
}

/** Notification payloads are even-length hex strings; `0x` is the empty payload. */
export function requirePayload(data: string): string {
    if (!ethers.isHexString(data, true)) {
        throw new InvalidPayloadError('data must be an even-length 0x-prefixed hex string', { data });
    }
    return data;
}
