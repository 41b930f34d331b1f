/**
 * SPDX-License-Identifier: Apache-2.0
 */
// token
export { PayableToken, PAYABLE_TOKEN_DECLARATION } from './core/transaction-coordinator';
export type { PayableTokenOptions, LedgerEventListener } from './core/transaction-coordinator';

// callback machinery
export { CallbackDispatcher } from './core/callback-dispatcher';
export { validateAcceptance, expectedSentinel } from './core/acceptance-validator';
export { CapabilityProber, InterfaceDeclaration, handlerInterfaceId } from './core/capability-prober';
export type { ProbeResult } from './core/capability-prober';
export { ContractRegistry } from './core/contract-registry';
export { UnitOfWork } from './core/unit-of-work';
export type { UnitParticipant } from './core/unit-of-work';
export * from './core/interface-ids';

// storage
export { InMemoryLedger } from './ledger/in-memory-ledger';

// reference receiver
export { NotificationReceiver, ReceiverBehavior, ReceiverRejectedError } from './contracts/notification-receiver';
export type { ReceivedNotification, NotificationHook } from './contracts/notification-receiver';

// types
export * from './types/ledger';
export * from './types/notification';
export * from './types/errors';

// config, metrics
export * from './config';
export { snapshotCounters, resetCounters } from './metrics/counters';
export type { MetricsSnapshot } from './metrics/counters';

// utils
export { Logger } from './utils/logger';
export { MAX_AMOUNT, requireAccount, requireAmount, requirePayload } from './utils/validation';
