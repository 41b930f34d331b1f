import fs from 'fs';
import {
  ContractRegistry,
  GenesisAllocation,
  NotificationReceiver,
  ReceiverBehavior,
} from '@payable-ledger/ledger';
import { ethers } from 'ethers';

export interface HostedContract {
  address: string;
  behavior: ReceiverBehavior;
}

export interface GenesisDocument {
  allocations: GenesisAllocation[];
  contracts: HostedContract[];
}

const BEHAVIORS = new Set<string>(Object.values(ReceiverBehavior));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBehavior(value: string): value is ReceiverBehavior {
  return BEHAVIORS.has(value);
}

function readAddress(value: unknown, field: string): string {
  if (typeof value !== 'string' || !ethers.isAddress(value)) {
    throw new Error(`${field} must be a valid EVM address`);
  }
  return ethers.getAddress(value);
}

function readAmount(value: unknown, field: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new Error(`${field} must be a non-negative integer string`);
  }
  return BigInt(value);
}

function readList(document: Record<string, unknown>, key: string): unknown[] {
  const value = document[key] ?? [];
  if (!Array.isArray(value)) {
    throw new Error(`genesis.${key} must be an array`);
  }
  return value;
}

export function parseGenesis(raw: unknown): GenesisDocument {
  if (!isRecord(raw)) {
    throw new Error('genesis must be a JSON object');
  }

  const allocations = readList(raw, 'allocations').map((entry, index) => {
    if (!isRecord(entry)) {
      throw new Error(`genesis.allocations[${index}] must be an object`);
    }
    return {
      account: readAddress(entry.account, `genesis.allocations[${index}].account`),
      amount: readAmount(entry.amount, `genesis.allocations[${index}].amount`),
    };
  });

  const contracts = readList(raw, 'contracts').map((entry, index) => {
    if (!isRecord(entry)) {
      throw new Error(`genesis.contracts[${index}] must be an object`);
    }
    const behavior = entry.behavior ?? ReceiverBehavior.ACCEPT;
    if (typeof behavior !== 'string' || !isBehavior(behavior)) {
      throw new Error(
        `genesis.contracts[${index}].behavior must be one of ${[...BEHAVIORS].join(', ')}`,
      );
    }
    return {
      address: readAddress(entry.address, `genesis.contracts[${index}].address`),
      behavior,
    };
  });

  return { allocations, contracts };
}

export function loadGenesisFile(filePath: string): GenesisDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`failed to read genesis file ${filePath}: ${reason}`);
  }
  return parseGenesis(raw);
}

/** Deploys a reference receiver for every hosted contract in the document. */
export function deployHostedContracts(registry: ContractRegistry, contracts: HostedContract[]): NotificationReceiver[] {
  return contracts.map((contract) => registry.deploy(new NotificationReceiver(contract.address, contract.behavior)));
}
