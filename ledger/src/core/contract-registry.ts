/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { ContractRegistryError } from '../types/errors';
import type { Address } from '../types/ledger';
import type { DeployedContract } from '../types/notification';
import { UnitOfWork } from './unit-of-work';

/**
 * Which addresses carry executable code, and the code deployed there.
 * Addresses missing from the registry are plain holders.
 */
export class ContractRegistry {
    private readonly contracts = new Map<Address, DeployedContract>();
    /** Operations on every token deployed here nest into this unit. */
    readonly unit = new UnitOfWork();

    deploy<T extends DeployedContract>(contract: T): T {
        if (!ethers.isAddress(contract.address)) {
            throw new ContractRegistryError('invalid contract address', { address: contract.address });
        }
        const address = ethers.getAddress(contract.address);
        if (address === ethers.ZeroAddress) {
            throw new ContractRegistryError('cannot deploy to zero address', { address });
        }
        if (this.contracts.has(address)) {
            throw new ContractRegistryError('address already has code', { address });
        }
        this.contracts.set(address, contract);
        return contract;
    }

    hasCode(address: Address): boolean {
        return this.contracts.has(ethers.getAddress(address));
    }

    getContract(address: Address): DeployedContract | undefined {
        return this.contracts.get(ethers.getAddress(address));
    }

    addresses(): Address[] {
        return [...this.contracts.keys()];
    }
}
