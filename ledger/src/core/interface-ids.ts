/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';

/** First four bytes of keccak256(signature), as lowercase 0x-prefixed hex. */
export function selector(signature: string): string {
    return ethers.id(signature).slice(0, 10);
}

/** ERC-165 interface identifier: XOR of the selectors of every function in the interface. */
export function interfaceId(signatures: readonly string[]): string {
    const combined = signatures.reduce(
        (acc, signature) => (acc ^ Number.parseInt(selector(signature).slice(2), 16)) >>> 0,
        0
    );
    return '0x' + combined.toString(16).padStart(8, '0');
}

export const ERC165_SIGNATURES = ['supportsInterface(bytes4)'] as const;

export const ERC20_SIGNATURES = [
    'totalSupply()',
    'balanceOf(address)',
    'transfer(address,uint256)',
    'transferFrom(address,address,uint256)',
    'approve(address,uint256)',
    'allowance(address,address)',
] as const;

/** Public operations of the payable token, including the overloads without data. */
export const PAYABLE_TOKEN_SIGNATURES = [
    'transferAndCall(address,uint256)',
    'transferAndCall(address,uint256,bytes)',
    'transferFromAndCall(address,address,uint256)',
    'transferFromAndCall(address,address,uint256,bytes)',
    'approveAndCall(address,uint256)',
    'approveAndCall(address,uint256,bytes)',
] as const;

export const TRANSFER_RECEIVER_SIGNATURE = 'onTransferReceived(address,address,uint256,bytes)';
export const APPROVAL_RECEIVER_SIGNATURE = 'onApprovalReceived(address,uint256,bytes)';

export const ERC165_INTERFACE_ID = interfaceId(ERC165_SIGNATURES);
export const ERC20_INTERFACE_ID = interfaceId(ERC20_SIGNATURES);
export const PAYABLE_TOKEN_INTERFACE_ID = interfaceId(PAYABLE_TOKEN_SIGNATURES);
export const TRANSFER_RECEIVER_INTERFACE_ID = interfaceId([TRANSFER_RECEIVER_SIGNATURE]);
export const APPROVAL_RECEIVER_INTERFACE_ID = interfaceId([APPROVAL_RECEIVER_SIGNATURE]);

/** ERC-165 reserves this identifier; nothing may claim it. */
export const INVALID_INTERFACE_ID = '0xffffffff';

// Handlers acknowledge a notification by returning their own selector.
export const TRANSFER_RECEIVED_SENTINEL = selector(TRANSFER_RECEIVER_SIGNATURE);
export const APPROVAL_RECEIVED_SENTINEL = selector(APPROVAL_RECEIVER_SIGNATURE);

/** What a contract that does not implement a handler effectively answers. */
export const EMPTY_RESPONSE = '0x00000000';
