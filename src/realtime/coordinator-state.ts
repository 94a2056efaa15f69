/**
 * Coordinator State
 * In-memory state of one station group: per-station status, the active
 * station/document pair and the learned coordinates.
 *
 * Written only by the running refresh cycle. The active pair is one object
 * that is replaced, never edited, so a reader sees either the previous
 * selection or the next one.
 */

import { AcquisitionError } from '../weather/errors.js';
import {
    ActiveSelection,
    Coordinates,
    ObservationDocument,
    SourceConfig,
    SourceState,
    SourceStatus,
} from '../weather/types.js';

/**
 * Where the fetcher reads and learns the group's coordinates
 */
export interface CoordinateStore {
    coordinates(): Coordinates | null;
    /** First write wins; returns the coordinates now in effect */
    learnCoordinates(candidate: Coordinates): Coordinates;
    /** Resolves with the coordinates once known, or null after `timeoutMs` */
    waitForCoordinates(timeoutMs: number): Promise<Coordinates | null>;
}

type CoordinateWaiter = (coordinates: Coordinates | null) => void;

export class CoordinatorState implements CoordinateStore {
    private statuses: Map<string, SourceStatus> = new Map();
    private active: ActiveSelection | null = null;
    private learned: Coordinates | null;
    private lastCycleSucceeded: boolean = false;
    private everSucceeded: boolean = false;
    private failedCycles: number = 0;
    private disposed: boolean = false;
    private waiters: Set<CoordinateWaiter> = new Set();

    constructor(sources: readonly SourceConfig[], fixedCoordinates?: Coordinates) {
        for (const source of sources) {
            this.statuses.set(source.id, {
                source,
                state: 'UNKNOWN',
                lastDocument: null,
                lastSuccessAt: null,
                lastAttemptAt: null,
                lastError: null,
                consecutiveFailures: 0,
            });
        }
        this.learned = fixedCoordinates ? { ...fixedCoordinates } : null;
    }

    coordinates(): Coordinates | null {
        return this.learned;
    }

    /**
     * Replace the coordinates only if they still equal `expected`
     */
    compareAndSetCoordinates(expected: Coordinates | null, next: Coordinates): boolean {
        if (this.disposed) return false;
        const current = this.learned;
        const matches = current === expected ||
            (current !== null && expected !== null && current.lat === expected.lat && current.lon === expected.lon);
        if (!matches) return false;
        this.learned = { lat: next.lat, lon: next.lon };
        this.notifyWaiters(this.learned);
        return true;
    }

    learnCoordinates(candidate: Coordinates): Coordinates {
        if (this.learned === null) {
            this.compareAndSetCoordinates(null, candidate);
        }
        return this.learned ?? candidate;
    }

    waitForCoordinates(timeoutMs: number): Promise<Coordinates | null> {
        if (this.learned !== null || this.disposed) {
            return Promise.resolve(this.learned);
        }
        return new Promise(resolve => {
            const waiter: CoordinateWaiter = coordinates => {
                clearTimeout(timer);
                this.waiters.delete(waiter);
                resolve(coordinates);
            };
            const timer = setTimeout(() => waiter(null), timeoutMs);
            this.waiters.add(waiter);
        });
    }

    private notifyWaiters(coordinates: Coordinates | null): void {
        for (const waiter of [...this.waiters]) {
            waiter(coordinates);
        }
    }

    getStatus(sourceId: string): SourceStatus | undefined {
        return this.statuses.get(sourceId);
    }

    getStatuses(): ReadonlyMap<string, SourceStatus> {
        return this.statuses;
    }

    getStateOf(sourceId: string): SourceState | undefined {
        return this.statuses.get(sourceId)?.state;
    }

    recordSuccess(source: SourceConfig, document: ObservationDocument, at: Date = new Date()): void {
        if (this.disposed) return;
        this.statuses.set(source.id, {
            source,
            state: 'ONLINE',
            lastDocument: document,
            lastSuccessAt: at,
            lastAttemptAt: at,
            lastError: null,
            consecutiveFailures: 0,
        });
    }

    recordFailure(source: SourceConfig, error: AcquisitionError, at: Date = new Date()): void {
        if (this.disposed) return;
        const previous = this.statuses.get(source.id);
        this.statuses.set(source.id, {
            source,
            state: 'OFFLINE',
            // Kept for diagnostics only; never promoted to active from here
            lastDocument: previous?.lastDocument ?? null,
            lastSuccessAt: previous?.lastSuccessAt ?? null,
            lastAttemptAt: at,
            lastError: error,
            consecutiveFailures: (previous?.consecutiveFailures ?? 0) + 1,
        });
    }

    /**
     * Close a refresh cycle. A null selection keeps the previous active pair
     * (stale but available) and counts as a failed cycle.
     */
    commitCycle(selection: ActiveSelection | null): void {
        if (this.disposed) return;
        if (selection) {
            this.active = selection;
            this.lastCycleSucceeded = true;
            this.everSucceeded = true;
            this.failedCycles = 0;
        } else {
            this.lastCycleSucceeded = false;
            this.failedCycles++;
        }
    }

    getActive(): ActiveSelection | null {
        return this.active;
    }

    getActiveDocument(): ObservationDocument | undefined {
        return this.active?.document;
    }

    lastRefreshSucceeded(): boolean {
        return this.lastCycleSucceeded;
    }

    hasEverSucceeded(): boolean {
        return this.everSucceeded;
    }

    consecutiveFailedCycles(): number {
        return this.failedCycles;
    }

    isDisposed(): boolean {
        return this.disposed;
    }

    dispose(): void {
        this.disposed = true;
        this.notifyWaiters(null);
    }
}
