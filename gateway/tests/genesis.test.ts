import path from 'path';
import { ethers } from 'ethers';
import { ContractRegistry, NotificationReceiver, ReceiverBehavior } from '@payable-ledger/ledger';
import { deployHostedContracts, loadGenesisFile, parseGenesis } from '../src/genesis';

const EXAMPLE_FILE = path.resolve(__dirname, '../config/genesis.example.json');

describe('parseGenesis', () => {
  test('normalizes addresses and parses string amounts', () => {
    const document = parseGenesis({
      allocations: [{ account: '0x' + 'ab'.repeat(20), amount: '115792089237316195423570985008687907853269984665640564039457584007913129639935' }],
      contracts: [{ address: '0x' + 'cd'.repeat(20) }],
    });

    expect(document).toEqual({
      allocations: [{ account: ethers.getAddress('0x' + 'ab'.repeat(20)), amount: ethers.MaxUint256 }],
      contracts: [{ address: ethers.getAddress('0x' + 'cd'.repeat(20)), behavior: ReceiverBehavior.ACCEPT }],
    });
  });

  test('missing sections default to empty lists', () => {
    expect(parseGenesis({})).toEqual({ allocations: [], contracts: [] });
  });

  test.each([
    [[], 'genesis must be a JSON object'],
    [{ allocations: {} }, 'genesis.allocations must be an array'],
    [{ allocations: ['x'] }, 'genesis.allocations[0] must be an object'],
    [{ allocations: [{ account: 'nobody', amount: '1' }] }, 'genesis.allocations[0].account must be a valid EVM address'],
    [
      { allocations: [{ account: '0x' + '11'.repeat(20), amount: 1 }] },
      'genesis.allocations[0].amount must be a non-negative integer string',
    ],
    [
      { contracts: [{ address: '0x' + '11'.repeat(20), behavior: 'IGNORE' }] },
      'genesis.contracts[0].behavior must be one of ACCEPT, REJECT_WITH_ERROR, WRONG_SENTINEL, EMPTY_RESPONSE, CROSS_KIND_SENTINEL',
    ],
  ])('rejects %j', (raw, message) => {
    expect(() => parseGenesis(raw)).toThrow(message);
  });
});

describe('loadGenesisFile', () => {
  test('reads the bundled example', () => {
    const document = loadGenesisFile(EXAMPLE_FILE);

    expect(document.allocations).toHaveLength(2);
    expect(document.allocations[0]).toEqual({
      account: '0xf39Fd6e51aad88F6F4ce6aB8827279cffFb92266',
      amount: 1000n * 10n ** 18n,
    });
    expect(document.contracts.map((contract) => contract.behavior)).toEqual([
      ReceiverBehavior.ACCEPT,
      ReceiverBehavior.WRONG_SENTINEL,
    ]);
  });

  test('wraps unreadable files', () => {
    const missing = path.resolve(__dirname, 'missing-genesis.json');
    expect(() => loadGenesisFile(missing)).toThrow(`failed to read genesis file ${missing}`);
  });
});

describe('deployHostedContracts', () => {
  test('deploys one receiver per hosted contract', () => {
    const registry = new ContractRegistry();
    const receiverAddress = ethers.getAddress('0x' + 'c7'.repeat(20));

    const deployed = deployHostedContracts(registry, [
      { address: receiverAddress, behavior: ReceiverBehavior.EMPTY_RESPONSE },
    ]);

    expect(deployed).toHaveLength(1);
    expect(deployed[0]).toBeInstanceOf(NotificationReceiver);
    expect(deployed[0].behavior).toBe(ReceiverBehavior.EMPTY_RESPONSE);
    expect(registry.hasCode(receiverAddress)).toBe(true);
  });
});
