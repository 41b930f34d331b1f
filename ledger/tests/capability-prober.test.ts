/**
 * SPDX-License-Identifier: Apache-2.0
 */
import { ethers } from 'ethers';
import { CapabilityProber, InterfaceDeclaration, handlerInterfaceId } from '../src/core/capability-prober';
import { ContractRegistry } from '../src/core/contract-registry';
import {
    APPROVAL_RECEIVER_INTERFACE_ID,
    ERC165_INTERFACE_ID,
    TRANSFER_RECEIVER_INTERFACE_ID,
} from '../src/core/interface-ids';
import { ContractRegistryError } from '../src/types/errors';
import { NotificationKind } from '../src/types/notification';

const HOLDER = ethers.getAddress('0x' + '01'.repeat(20));
const DECLARING = ethers.getAddress('0x' + '02'.repeat(20));
const SILENT = ethers.getAddress('0x' + '03'.repeat(20));

function setup() {
    const registry = new ContractRegistry();
    const declaring = registry.deploy({
        address: DECLARING,
        declaredInterfaces: [ERC165_INTERFACE_ID, TRANSFER_RECEIVER_INTERFACE_ID],
        onTransferReceived: () => '0x88a7ca5c',
    });
    const silent = registry.deploy({ address: SILENT });
    return { registry, prober: new CapabilityProber(registry), declaring, silent };
}

describe('InterfaceDeclaration', () => {
    test('matches ids case-insensitively', () => {
        const declaration = new InterfaceDeclaration(['0xB0202A11']);
        expect(declaration.supports('0xb0202a11')).toBe(true);
        expect(declaration.supports('0x36372b07')).toBe(false);
    });

    test('never claims the reserved invalid id', () => {
        const declaration = new InterfaceDeclaration(['0xffffffff', '0x01ffc9a7']);
        expect(declaration.supports('0xffffffff')).toBe(false);
        expect(declaration.list()).toEqual(['0x01ffc9a7']);
    });
});

describe('CapabilityProber', () => {
    test('plain holders have no code and are never probed further', () => {
        const { prober } = setup();
        expect(prober.probe(HOLDER, NotificationKind.TRANSFER_NOTIFY)).toEqual({ status: 'NO_CODE' });
    });

    test('a contract declaring the handler interface is a candidate', () => {
        const { prober, declaring } = setup();
        expect(prober.probe(DECLARING, NotificationKind.TRANSFER_NOTIFY))
            .toEqual({ status: 'CANDIDATE', contract: declaring });
    });

    test('a contract declaring other interfaces only is unsupported for that kind', () => {
        const { prober, declaring } = setup();
        expect(prober.probe(DECLARING, NotificationKind.APPROVE_NOTIFY))
            .toEqual({ status: 'UNSUPPORTED', contract: declaring });
    });

    test('a contract without a declaration is left to the dispatcher', () => {
        const { prober, silent } = setup();
        expect(prober.probe(SILENT, NotificationKind.APPROVE_NOTIFY))
            .toEqual({ status: 'CANDIDATE', contract: silent });
    });

    test('lookups accept lowercase addresses', () => {
        const { prober, declaring } = setup();
        expect(prober.probe(DECLARING.toLowerCase(), NotificationKind.TRANSFER_NOTIFY))
            .toEqual({ status: 'CANDIDATE', contract: declaring });
    });

    test('supportsInterface reads the declaration of the target', () => {
        const { prober } = setup();
        expect(prober.supportsInterface(DECLARING, TRANSFER_RECEIVER_INTERFACE_ID)).toBe(true);
        expect(prober.supportsInterface(DECLARING, APPROVAL_RECEIVER_INTERFACE_ID)).toBe(false);
        expect(prober.supportsInterface(SILENT, ERC165_INTERFACE_ID)).toBe(false);
        expect(prober.supportsInterface(HOLDER, ERC165_INTERFACE_ID)).toBe(false);
    });

    test('handlerInterfaceId maps kinds to receiver interfaces', () => {
        expect(handlerInterfaceId(NotificationKind.TRANSFER_NOTIFY)).toBe(TRANSFER_RECEIVER_INTERFACE_ID);
        expect(handlerInterfaceId(NotificationKind.APPROVE_NOTIFY)).toBe(APPROVAL_RECEIVER_INTERFACE_ID);
    });
});

describe('ContractRegistry', () => {
    test('rejects a second deployment at the same address', () => {
        const { registry } = setup();
        expect(() => registry.deploy({ address: SILENT.toLowerCase() })).toThrow(ContractRegistryError);
    });

    test('rejects malformed and zero addresses', () => {
        const registry = new ContractRegistry();
        expect(() => registry.deploy({ address: '0x1234' })).toThrow('invalid contract address');
        expect(() => registry.deploy({ address: ethers.ZeroAddress })).toThrow('cannot deploy to zero address');
    });

    test('tracks which addresses have code', () => {
        const { registry } = setup();
        expect(registry.hasCode(DECLARING)).toBe(true);
        expect(registry.hasCode(HOLDER)).toBe(false);
        expect(registry.addresses()).toEqual([DECLARING, SILENT]);
    });
});
