/**
 * SPDX-License-Identifier: Apache-2.0
 */
import type { Address } from '../types/ledger';
import { DeployedContract, NotificationKind } from '../types/notification';
import { ContractRegistry } from './contract-registry';
import {
    APPROVAL_RECEIVER_INTERFACE_ID,
    INVALID_INTERFACE_ID,
    TRANSFER_RECEIVER_INTERFACE_ID,
} from './interface-ids';

/** Fixed set of interface identifiers a contract type claims to implement. */
export class InterfaceDeclaration {
    private readonly ids: ReadonlySet<string>;

    constructor(interfaceIds: readonly string[]) {
        this.ids = new Set(
            interfaceIds
                .map((id) => id.toLowerCase())
                .filter((id) => id !== INVALID_INTERFACE_ID)
        );
    }

    supports(interfaceId: string): boolean {
        return this.ids.has(interfaceId.toLowerCase());
    }

    list(): string[] {
        return [...this.ids];
    }
}

export type ProbeResult =
    | { status: 'NO_CODE' }
    | { status: 'UNSUPPORTED'; contract: DeployedContract }
    | { status: 'CANDIDATE'; contract: DeployedContract };

export function handlerInterfaceId(kind: NotificationKind): string {
    return kind === NotificationKind.TRANSFER_NOTIFY
        ? TRANSFER_RECEIVER_INTERFACE_ID
        : APPROVAL_RECEIVER_INTERFACE_ID;
}

/**
 * Decides whether a notification should be attempted against `target`.
 *
 * Code presence is checked first: a plain holder is never notified. A contract
 * that publishes a declaration without the handler's interface is rejected
 * without being called; a contract that publishes none is a candidate and the
 * dispatcher resolves the handler itself.
 */
export class CapabilityProber {
    constructor(private readonly registry: ContractRegistry) {}

    probe(target: Address, kind: NotificationKind): ProbeResult {
        const contract = this.registry.getContract(target);
        if (!contract) {
            return { status: 'NO_CODE' };
        }

        if (contract.declaredInterfaces !== undefined) {
            const declaration = new InterfaceDeclaration(contract.declaredInterfaces);
            if (!declaration.supports(handlerInterfaceId(kind))) {
                return { status: 'UNSUPPORTED', contract };
            }
        }

        return { status: 'CANDIDATE', contract };
    }

    /** Whether the contract at `target` declares `interfaceId`; plain holders declare nothing. */
    supportsInterface(target: Address, interfaceId: string): boolean {
        const declared = this.registry.getContract(target)?.declaredInterfaces;
        return declared !== undefined && new InterfaceDeclaration(declared).supports(interfaceId);
    }
}
