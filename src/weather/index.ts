/**
 * PWS Coordinator
 * One station group: fetch, fail over, cache, and read.
 * A single station is a group of one.
 */

import { AxiosInstance } from 'axios';
import { sortByPriority } from '../config.js';
import { CoordinatorState } from '../realtime/coordinator-state.js';
import { RefreshScheduler, SchedulerEvents, SchedulerState } from '../realtime/refresh-scheduler.js';
import { FieldAccessor } from './accessor.js';
import { SourceFetcher } from './clients/base-client.js';
import { WundergroundClient } from './clients/wunderground-client.js';
import { FallbackSelector } from './fallback-selector.js';
import { UnitTable } from './units.js';
import {
    AcquisitionConfig,
    Coordinates,
    CoordinatorHealth,
    DailyForecastEntry,
    FieldValue,
    RefreshOutcome,
    SourceConfig,
    SourceStatusReport,
    WeatherCondition,
} from './types.js';

export interface CoordinatorOptions {
    /** Replaces the default axios instance (tests, proxies) */
    httpClient?: AxiosInstance;
    /** Replaces the Weather Underground client entirely */
    fetcher?: SourceFetcher;
}

export class PwsCoordinator {
    /** The configuration in effect, stations sorted by priority */
    readonly config: AcquisitionConfig;
    private readonly state: CoordinatorState;
    private readonly scheduler: RefreshScheduler;
    private readonly accessor: FieldAccessor;

    constructor(config: AcquisitionConfig, options: CoordinatorOptions = {}) {
        if (config.sources.length === 0) {
            throw new Error('A coordinator needs at least one station');
        }
        this.config = Object.freeze({ ...config, sources: sortByPriority(config.sources) });

        this.state = new CoordinatorState(this.config.sources, this.config.coordinates);
        const fetcher = options.fetcher ?? new WundergroundClient(this.config, this.state, options.httpClient);
        const selector = new FallbackSelector(fetcher, this.state);
        this.scheduler = new RefreshScheduler(this.config, selector, this.state);
        this.accessor = new FieldAccessor(this.config, () => this.state.getActive());
    }

    // Lifecycle

    refresh(): Promise<RefreshOutcome> {
        return this.scheduler.refresh();
    }

    firstRefresh(): Promise<RefreshOutcome> {
        return this.scheduler.firstRefresh();
    }

    start(): void {
        this.scheduler.start();
    }

    stop(): void {
        this.scheduler.stop();
    }

    dispose(): void {
        this.scheduler.dispose();
    }

    on<K extends keyof SchedulerEvents>(event: K, listener: (...args: SchedulerEvents[K]) => void): this {
        this.scheduler.on(event, listener);
        return this;
    }

    // Status

    isReady(): boolean {
        return this.scheduler.isReady();
    }

    lastRefreshSucceeded(): boolean {
        return this.state.lastRefreshSucceeded();
    }

    isDegraded(): boolean {
        return this.scheduler.isDegraded();
    }

    health(): CoordinatorHealth {
        return this.scheduler.health();
    }

    schedulerState(): SchedulerState {
        return this.scheduler.getState();
    }

    activeSource(): SourceConfig | null {
        return this.state.getActive()?.source ?? null;
    }

    activeSourceId(): string | null {
        return this.activeSource()?.id ?? null;
    }

    coordinates(): Coordinates | null {
        return this.state.coordinates();
    }

    /**
     * Status of every station, in priority order
     */
    sourceStatuses(): Record<string, SourceStatusReport> {
        const activeId = this.activeSourceId();
        const report: Record<string, SourceStatusReport> = {};
        for (const source of this.config.sources) {
            const status = this.state.getStatus(source.id);
            report[source.id] = {
                name: source.displayName,
                priority: source.priority,
                isActive: source.id === activeId,
                lastSuccessTime: status?.lastSuccessAt ?? null,
                state: status?.state ?? 'UNKNOWN',
                lastError: status?.lastError?.message ?? null,
                consecutiveFailures: status?.consecutiveFailures ?? 0,
            };
        }
        return report;
    }

    // Field access

    getCondition(field: string): FieldValue | undefined {
        return this.accessor.getCondition(field);
    }

    getForecast(field: string, period: number = 0): FieldValue | undefined {
        return this.accessor.getForecast(field, period);
    }

    getDailyValue(field: string, day: number = 0): FieldValue | undefined {
        return this.accessor.getDailyValue(field, day);
    }

    iconToCondition(code: unknown): WeatherCondition | undefined {
        return this.accessor.iconToCondition(code);
    }

    currentCondition(): WeatherCondition | undefined {
        return this.accessor.currentCondition();
    }

    dailyForecast(): DailyForecastEntry[] {
        return this.accessor.dailyForecast();
    }

    units(): Readonly<UnitTable> {
        return this.accessor.units();
    }

    unitOf(field: string): string | undefined {
        return this.accessor.unitOf(field);
    }

    attribution(): string {
        return this.accessor.attribution();
    }
}

export { loadConfig, toAcquisitionConfig, validateConfig, parseStations } from '../config.js';
export * from './errors.js';
export * from './fields.js';
export * from './types.js';
export * from './units.js';
export { iconToCondition, conditionFromSolarRadiation, ICON_CONDITION_MAP } from './conditions.js';
export { RequestBuilder, redactUrl } from './request-builder.js';
export { WundergroundClient } from './clients/wunderground-client.js';
export type { SourceFetcher } from './clients/base-client.js';
export { FallbackSelector, rankByPriority } from './fallback-selector.js';
export type { SelectionResult } from './fallback-selector.js';
export { FieldAccessor, MAX_FORECAST_DAYS } from './accessor.js';
export { CoordinatorState } from '../realtime/coordinator-state.js';
export { RefreshScheduler } from '../realtime/refresh-scheduler.js';
export type { SchedulerEvents, SchedulerState } from '../realtime/refresh-scheduler.js';
