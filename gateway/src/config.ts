import dotenv from 'dotenv';
import path from 'path';
import { strict as assert } from 'assert';
import { ethers } from 'ethers';
import { loadLedgerConfig } from '@payable-ledger/ledger';

dotenv.config();

export interface GatewayConfig {
  port: number;
  tokenAddress: string;
  tokenName: string;
  tokenSymbol: string;
  tokenDecimals: number;
  genesisFile: string;
  maxCallDepth: number;
}

const DEFAULT_GENESIS_FILE = path.resolve(__dirname, '../config/genesis.example.json');

function env(name: string): string {
  const value = process.env[name];
  assert(value, `${name} is missing`);
  return value;
}

function envOptional(name: string, fallback: string): string {
  const raw = process.env[name];
  return raw === undefined || raw.trim() === '' ? fallback : raw.trim();
}

function envNumber(name: string, fallback?: number): number {
  const raw = process.env[name];
  if ((raw === undefined || raw === '') && fallback !== undefined) {
    return fallback;
  }
  const value = raw ?? env(name);
  const parsed = Number.parseInt(value, 10);
  assert(!Number.isNaN(parsed), `${name} must be a number`);
  return parsed;
}

function envAddress(name: string): string {
  const value = env(name);
  if (!ethers.isAddress(value)) {
    throw new Error(`${name} must be a valid EVM address, received "${value}"`);
  }
  const normalized = ethers.getAddress(value);
  assert(normalized !== ethers.ZeroAddress, `${name} cannot be the zero address`);
  return normalized;
}

export function loadConfig(): GatewayConfig {
  const config: GatewayConfig = {
    port: envNumber('PORT', 3400),
    tokenAddress: envAddress('TOKEN_ADDRESS'),
    tokenName: envOptional('TOKEN_NAME', 'Payable Token'),
    tokenSymbol: envOptional('TOKEN_SYMBOL', 'PAY'),
    tokenDecimals: envNumber('TOKEN_DECIMALS', 18),
    genesisFile: path.resolve(envOptional('GENESIS_FILE', DEFAULT_GENESIS_FILE)),
    maxCallDepth: loadLedgerConfig().maxCallDepth,
  };

  assert(config.port > 0 && config.port < 65536, 'PORT must be between 1 and 65535');
  assert(config.tokenDecimals >= 0 && config.tokenDecimals <= 36, 'TOKEN_DECIMALS must be between 0 and 36');

  return config;
}

export const config = loadConfig();
