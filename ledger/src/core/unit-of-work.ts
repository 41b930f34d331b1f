/**
 * SPDX-License-Identifier: Apache-2.0
 */
import type { LedgerEvent } from '../types/ledger';

/** A journaled store taking part in a unit of work. */
export interface UnitParticipant {
    checkpoint(): number;
    revertTo(checkpoint: number): void;
    /** Finalizes everything journaled and returns the events among it. */
    commit(): readonly LedgerEvent[];
    publish(events: readonly LedgerEvent[]): void;
}

/**
 * Outermost operation and everything nested inside its callbacks, across every
 * participant sharing the same registry.
 *
 * A failed operation unwinds all participants to where they stood when it
 * started, including participants first touched during its callbacks. Nothing
 * is finalized or published until the outermost operation succeeds.
 */
export class UnitOfWork {
    private readonly enrolled = new Map<UnitParticipant, number>();
    private currentDepth = 0;

    get depth(): number {
        return this.currentDepth;
    }

    run<T>(participant: UnitParticipant, body: () => T): T {
        if (!this.enrolled.has(participant)) {
            this.enrolled.set(participant, participant.checkpoint());
        }
        const savepoint = new Map<UnitParticipant, number>();
        for (const member of this.enrolled.keys()) {
            savepoint.set(member, member.checkpoint());
        }

        this.currentDepth += 1;
        let result: T;
        try {
            result = body();
        } catch (error: unknown) {
            this.revertTo(savepoint);
            if (this.currentDepth === 1) {
                this.enrolled.clear();
            }
            throw error;
        } finally {
            this.currentDepth -= 1;
        }

        if (this.currentDepth === 0) {
            this.commitAll();
        }
        return result;
    }

    private revertTo(savepoint: ReadonlyMap<UnitParticipant, number>): void {
        for (const [member, enrolledAt] of [...this.enrolled].reverse()) {
            member.revertTo(savepoint.get(member) ?? enrolledAt);
            if (!savepoint.has(member)) {
                this.enrolled.delete(member);
            }
        }
    }

    private commitAll(): void {
        const members = [...this.enrolled.keys()];
        this.enrolled.clear();
        const committed = members.map((member) => ({ member, events: member.commit() }));
        for (const { member, events } of committed) {
            member.publish(events);
        }
    }
}
