/**
 * SPDX-License-Identifier: Apache-2.0
 */
import type { RejectionReason } from '../types/errors';
import type { NotificationKind, OperationName } from '../types/notification';
import { Logger } from '../utils/logger';

export type OperationResult = 'COMMITTED' | 'REVERTED';
export type CallbackVerdict = 'ACCEPT' | RejectionReason | 'SKIPPED_NO_CODE';

export interface MetricsSnapshot {
    operationsTotal: Record<string, number>;
    callbackOutcomesTotal: Record<string, number>;
}

const counters = {
    operationsTotal: new Map<string, number>(),
    callbackOutcomesTotal: new Map<string, number>(),
};

function bump(counter: Map<string, number>, key: string): number {
    const value = (counter.get(key) ?? 0) + 1;
    counter.set(key, value);
    return value;
}

export function incrementOperation(operation: OperationName, result: OperationResult): void {
    const value = bump(counters.operationsTotal, `${operation}:${result}`);
    Logger.info('Metric increment', {
        metric: 'ledger_operations_total',
        operation,
        result,
        value,
    });
}

export function incrementCallbackOutcome(kind: NotificationKind, verdict: CallbackVerdict): void {
    const value = bump(counters.callbackOutcomesTotal, `${kind}:${verdict}`);
    Logger.info('Metric increment', {
        metric: 'ledger_callback_outcomes_total',
        kind,
        verdict,
        value,
    });
}

export function snapshotCounters(): MetricsSnapshot {
    return {
        operationsTotal: Object.fromEntries(counters.operationsTotal),
        callbackOutcomesTotal: Object.fromEntries(counters.callbackOutcomesTotal),
    };
}

export function resetCounters(): void {
    counters.operationsTotal.clear();
    counters.callbackOutcomesTotal.clear();
}
