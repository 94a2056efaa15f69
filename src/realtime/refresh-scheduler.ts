/**
 * Refresh Scheduler
 * Drives refresh cycles on a fixed interval with at most one cycle in flight.
 * IDLE → REFRESHING → IDLE, with a `degraded` flag set while the latest cycle
 * found no working station.
 */

import { EventEmitter } from 'events';
import { logger } from '../logger.js';
import { AcquisitionError, NotReadyError } from '../weather/errors.js';
import { FallbackSelector } from '../weather/fallback-selector.js';
import { AcquisitionConfig, CoordinatorHealth, RefreshOutcome, SourceState } from '../weather/types.js';
import { CoordinatorState } from './coordinator-state.js';

export type SchedulerState = 'IDLE' | 'REFRESHING';

/**
 * Events emitted by the scheduler
 */
export interface SchedulerEvents {
    refreshed: [outcome: RefreshOutcome];
    refreshFailed: [outcome: RefreshOutcome];
    degraded: [outcome: RefreshOutcome];
    recovered: [outcome: RefreshOutcome];
    failing: [consecutiveFailedCycles: number];
    sourceStatusChanged: [sourceId: string, from: SourceState, to: SourceState];
}

export class RefreshScheduler extends EventEmitter {
    private state: SchedulerState = 'IDLE';
    private inFlight: Promise<RefreshOutcome> | null = null;
    private timeoutId: NodeJS.Timeout | null = null;
    private isRunning: boolean = false;
    private degraded: boolean = false;
    private failingAnnounced: boolean = false;
    private abortController: AbortController = new AbortController();

    constructor(
        private readonly config: AcquisitionConfig,
        private readonly selector: FallbackSelector,
        private readonly store: CoordinatorState
    ) {
        super();
    }

    getState(): SchedulerState {
        return this.state;
    }

    isDegraded(): boolean {
        return this.degraded;
    }

    /**
     * True once any cycle has produced an active document
     */
    isReady(): boolean {
        return this.store.hasEverSucceeded();
    }

    health(): CoordinatorHealth {
        if (!this.degraded) return 'healthy';
        return this.store.consecutiveFailedCycles() >= this.config.failureThreshold ? 'failing' : 'degraded';
    }

    /**
     * Run a cycle, or join the one already running
     */
    refresh(): Promise<RefreshOutcome> {
        if (this.store.isDisposed()) {
            return Promise.reject(new AcquisitionError('Coordinator has been disposed'));
        }
        if (this.inFlight) {
            logger.debug('Refresh already in flight, joining it');
            return this.inFlight;
        }

        this.state = 'REFRESHING';
        this.inFlight = this.runCycle().finally(() => {
            this.inFlight = null;
            this.state = 'IDLE';
        });
        return this.inFlight;
    }

    /**
     * First refresh of a coordinator. Rejects with NotReadyError when no
     * station delivered data, so setup can abort or retry.
     */
    async firstRefresh(): Promise<RefreshOutcome> {
        const outcome = await this.refresh();
        if (!outcome.succeeded && !this.store.hasEverSucceeded()) {
            throw new NotReadyError(outcome.failures);
        }
        return outcome;
    }

    /**
     * Start the fixed-interval schedule
     */
    start(): void {
        if (this.isRunning || this.store.isDisposed()) {
            return;
        }

        this.isRunning = true;
        logger.info('RefreshScheduler started', {
            group: this.config.groupName,
            intervalMinutes: this.config.refreshIntervalMs / 60000,
        });

        this.scheduleNextRefresh();
    }

    /**
     * Stop the schedule; a cycle already running completes
     */
    stop(): void {
        if (!this.isRunning) {
            return;
        }

        this.isRunning = false;

        if (this.timeoutId) {
            clearTimeout(this.timeoutId);
            this.timeoutId = null;
        }

        logger.info('RefreshScheduler stopped');
    }

    /**
     * Stop, abandon in-flight requests and freeze the state
     */
    dispose(): void {
        this.stop();
        this.store.dispose();
        this.abortController.abort();
        this.removeAllListeners();
    }

    private scheduleNextRefresh(): void {
        if (!this.isRunning || this.store.isDisposed()) {
            return;
        }

        this.timeoutId = setTimeout(() => {
            this.runScheduledRefresh().catch(error => {
                logger.error('Error in scheduled refresh', { error: error instanceof Error ? error.message : String(error) });
            });
        }, this.config.refreshIntervalMs);
    }

    private async runScheduledRefresh(): Promise<void> {
        if (!this.isRunning || this.store.isDisposed()) {
            return;
        }

        try {
            await this.refresh();
        } finally {
            this.scheduleNextRefresh();
        }
    }

    private async runCycle(): Promise<RefreshOutcome> {
        const before = new Map(
            Array.from(this.store.getStatuses(), ([id, status]) => [id, status.state])
        );

        const result = await this.selector.selectActive(this.config.sources, this.abortController.signal);

        if (this.store.isDisposed()) {
            return {
                succeeded: false,
                activeSourceId: null,
                failures: result.failures,
                completedAt: new Date(),
            };
        }

        this.store.commitCycle(result.active);

        const outcome: RefreshOutcome = {
            succeeded: result.active !== null,
            activeSourceId: this.store.getActive()?.source.id ?? null,
            failures: result.failures,
            completedAt: new Date(),
        };

        this.emitStatusChanges(before);

        if (outcome.succeeded) {
            this.onSuccess(outcome);
        } else {
            this.onFailure(outcome);
        }
        return outcome;
    }

    private onSuccess(outcome: RefreshOutcome): void {
        const wasDegraded = this.degraded;
        this.degraded = false;
        this.failingAnnounced = false;

        this.emitEvent('refreshed', outcome);
        if (wasDegraded) {
            logger.info(`Station group ${this.config.groupName} recovered`, { activeSource: outcome.activeSourceId });
            this.emitEvent('recovered', outcome);
        }
    }

    private onFailure(outcome: RefreshOutcome): void {
        const wasDegraded = this.degraded;
        this.degraded = true;

        this.emitEvent('refreshFailed', outcome);
        if (!wasDegraded) {
            this.emitEvent('degraded', outcome);
        }

        const failedCycles = this.store.consecutiveFailedCycles();
        if (failedCycles >= this.config.failureThreshold && !this.failingAnnounced) {
            this.failingAnnounced = true;
            logger.error(`Station group ${this.config.groupName} has failed ${failedCycles} consecutive refreshes`, {
                staleSource: this.store.getActive()?.source.id ?? null,
            });
            this.emitEvent('failing', failedCycles);
        }
    }

    private emitEvent<K extends keyof SchedulerEvents>(event: K, ...args: SchedulerEvents[K]): void {
        this.emit(event, ...args);
    }

    private emitStatusChanges(before: Map<string, SourceState>): void {
        for (const [id, status] of this.store.getStatuses()) {
            const previous = before.get(id) ?? 'UNKNOWN';
            if (previous !== status.state) {
                this.emitEvent('sourceStatusChanged', id, previous, status.state);
            }
        }
    }
}
